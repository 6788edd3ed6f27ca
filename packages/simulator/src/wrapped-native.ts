/**
 * Simulated Wrapped Native
 *
 * An ERC-20 at its own address, backed 1:1 by the native currency the
 * contract holds.
 */

import type { Address, WrappedNative } from "@lpvault/types";
import type { SimulatedChain } from "./chain.js";

export class SimulatedWrappedNative {
  constructor(
    private readonly chain: SimulatedChain,
    readonly address: Address,
  ) {}

  bind(caller: Address): WrappedNative {
    return {
      address: this.address,
      deposit: (amount) => this.deposit(caller, amount),
      withdraw: (amount) => this.withdraw(caller, amount),
    };
  }

  async deposit(caller: Address, amount: bigint): Promise<void> {
    this.chain.moveNative(caller, this.address, amount);
    this.chain.creditTokens(this.address, caller, amount);
  }

  /** Burns the caller's tokens and pays native currency back; reverts if refused. */
  async withdraw(caller: Address, amount: bigint): Promise<void> {
    this.chain.burnTokens(this.address, caller, amount);
    await this.chain.payNative(this.address, caller, amount);
  }
}
