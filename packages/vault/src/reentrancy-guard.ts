/**
 * Reentrancy Guard
 *
 * A single "currently executing" sentinel per vault. Every guarded entry
 * point takes it for its whole duration; any nested or concurrent entry
 * fails with REENTRANT before touching state.
 */

import { VaultError } from "./errors.js";

export class ReentrancyGuard {
  private active: string | undefined;

  get locked(): boolean {
    return this.active !== undefined;
  }

  /** The operation holding the lock, if any. */
  get holder(): string | undefined {
    return this.active;
  }

  enter(operation: string): void {
    if (this.active !== undefined) {
      throw new VaultError(
        "REENTRANT",
        `${operation} rejected: ${this.active} is still executing`,
        { operation },
      );
    }
    this.active = operation;
  }

  exit(): void {
    this.active = undefined;
  }

  /**
   * Hold the lock for the duration of `fn`. The lock is released
   * whether `fn` resolves or rejects.
   */
  async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    this.enter(operation);
    try {
      return await fn();
    } finally {
      this.exit();
    }
  }
}
