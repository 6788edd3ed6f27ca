/**
 * Vault errors.
 *
 * Every failure aborts the whole operation and surfaces one of these
 * codes. Nothing is retried or recovered locally.
 */

import { SlippageRejection } from "@lpvault/types";

export type VaultErrorCode =
  | "UNAUTHORIZED"
  | "INVALID_STATE"
  | "INVALID_REFERENCE"
  | "SLIPPAGE_VIOLATION"
  | "TRANSFER_FAILURE"
  | "CONFIGURATION_ERROR"
  | "REENTRANT";

export interface VaultErrorOptions {
  readonly operation?: string;
  readonly cause?: unknown;
}

export class VaultError extends Error {
  public readonly code: VaultErrorCode;
  public readonly operation: string | undefined;

  constructor(code: VaultErrorCode, message: string, options: VaultErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = "VaultError";
    this.code = code;
    this.operation = options.operation;
  }
}

export function isVaultError(err: unknown, code?: VaultErrorCode): err is VaultError {
  return err instanceof VaultError && (code === undefined || err.code === code);
}

/**
 * Run an engine call, translating a minimum-output rejection into
 * SLIPPAGE_VIOLATION. Every other error propagates unchanged.
 */
export async function callEngine<T>(
  operation: string,
  fn: () => Promise<T>,
): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    if (err instanceof SlippageRejection) {
      throw new VaultError("SLIPPAGE_VIOLATION", `${operation}: ${err.message}`, {
        operation,
        cause: err,
      });
    }
    throw err;
  }
}
