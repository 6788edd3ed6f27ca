/**
 * Simulated Chain
 *
 * An in-process stand-in for an EVM chain: ERC-20 balances and
 * allowances, native balances, a liquidity engine, a swap engine and a
 * wrapped-native contract. Calls made through `connect(identity)` act
 * as that identity.
 *
 * `transact` gives all-or-nothing semantics: if the callback throws,
 * every balance, allowance and position change it made is undone.
 * Hooks, receivers and pools are setup, not state, and survive rollback.
 */

import { getContractAddress, zeroAddress } from "viem";
import type {
  Address,
  ChainConnections,
  ChainConnector,
  Clock,
  NativeReceiver,
  PoolDirectory,
  PoolKey,
  TokenClient,
  TransactionBoundary,
} from "@lpvault/types";
import { SimulatorError } from "./errors.js";
import { SimulatedPositionManager } from "./position-manager.js";
import { emptyState, stateKey } from "./state.js";
import type { ChainState, SimulatedPosition } from "./state.js";
import { SimulatedSwapRouter } from "./swap-router.js";
import { SimulatedWrappedNative } from "./wrapped-native.js";

// =============================================================================
// Types
// =============================================================================

export interface TokenTransfer {
  readonly token: Address;
  readonly from: Address;
  readonly to: Address;
  readonly amount: bigint;
}

/** Runs after a token transfer lands; a throw reverts the transfer. */
export type TokenReceiptHook = (transfer: TokenTransfer) => Promise<void>;

export interface SimulatedChainOptions {
  /** Unix seconds. Default: 1_700_000_000 */
  readonly startTime?: bigint;
}

/** Deploys the simulated contracts; only used to derive addresses. */
export const SIMULATOR_DEPLOYER: Address = "0x5100000000000000000000000000000000000005";

// =============================================================================
// Chain
// =============================================================================

export class SimulatedChain implements ChainConnector, TransactionBoundary, PoolDirectory, Clock {
  readonly positionManager: SimulatedPositionManager;
  readonly swapRouter: SimulatedSwapRouter;
  readonly wrappedNative: SimulatedWrappedNative;

  private _state: ChainState;
  private deployNonce = 0n;
  private readonly pools = new Map<string, PoolKey & { readonly address: Address }>();
  private readonly poolAddresses = new Map<string, Address>();
  private readonly tokenHooks = new Map<string, TokenReceiptHook>();
  private readonly receivers = new Map<string, NativeReceiver>();

  constructor(options: SimulatedChainOptions = {}) {
    this._state = emptyState(options.startTime ?? 1_700_000_000n);
    this.positionManager = new SimulatedPositionManager(this, this.deploy());
    this.swapRouter = new SimulatedSwapRouter(this, this.deploy());
    this.wrappedNative = new SimulatedWrappedNative(this, this.deploy());
  }

  /** Current journaled state. Engines mutate it through the methods below. */
  get state(): ChainState {
    return this._state;
  }

  // ─── Transactions ─────────────────────────────────────────────────────

  async transact<T>(fn: () => Promise<T>): Promise<T> {
    const saved = structuredClone(this._state);
    try {
      return await fn();
    } catch (err) {
      this._state = saved;
      throw err;
    }
  }

  // ─── Clock ────────────────────────────────────────────────────────────

  now(): bigint {
    return this._state.timestamp;
  }

  advanceTime(seconds: bigint): void {
    this._state.timestamp += seconds;
  }

  // ─── Identities ───────────────────────────────────────────────────────

  connect(identity: Address): ChainConnections {
    return {
      tokens: this.tokenClient(identity),
      native: {
        nativeBalance: async (account) => this.nativeBalance(account),
        sendNative: (to, amount) => this.sendNative(identity, to, amount),
      },
      liquidity: this.positionManager.bind(identity),
      swap: this.swapRouter.bind(identity),
      wrappedNative: this.wrappedNative.bind(identity),
      clock: this,
      boundary: this,
    };
  }

  registerNativeReceiver(address: Address, receiver: NativeReceiver): void {
    this.receivers.set(stateKey(address), receiver);
  }

  onTokenReceived(account: Address, hook: TokenReceiptHook): void {
    this.tokenHooks.set(stateKey(account), hook);
  }

  clearTokenHook(account: Address): void {
    this.tokenHooks.delete(stateKey(account));
  }

  // ─── Pools ────────────────────────────────────────────────────────────

  createPool(token0: Address, token1: Address, fee: number): Address {
    const existing = this.poolAddresses.get(poolKey(token0, token1, fee));
    if (existing !== undefined) return existing;

    const address = this.deploy();
    this.pools.set(stateKey(address), { address, token0, token1, fee });
    this.poolAddresses.set(poolKey(token0, token1, fee), address);
    this.poolAddresses.set(poolKey(token1, token0, fee), address);
    return address;
  }

  async describe(pool: Address): Promise<PoolKey> {
    const found = this.pools.get(stateKey(pool));
    if (found === undefined) {
      throw new SimulatorError("UNKNOWN_POOL", `No pool deployed at ${pool}`);
    }
    return { token0: found.token0, token1: found.token1, fee: found.fee };
  }

  async getPool(token0: Address, token1: Address, fee: number): Promise<Address> {
    return this.poolAddresses.get(poolKey(token0, token1, fee)) ?? zeroAddress;
  }

  // ─── Tokens ───────────────────────────────────────────────────────────

  balanceOf(token: Address, account: Address): bigint {
    return this._state.balances.get(stateKey(token, account)) ?? 0n;
  }

  allowance(token: Address, owner: Address, spender: Address): bigint {
    return this._state.allowances.get(stateKey(token, owner, spender)) ?? 0n;
  }

  /**
   * Faucet: create tokens out of nothing. Wrapped native stays fully
   * backed: the contract is funded with the same amount of native currency.
   */
  mintTokens(token: Address, to: Address, amount: bigint): void {
    if (stateKey(token) === stateKey(this.wrappedNative.address)) {
      this.fundNative(token, amount);
    }
    this.credit(token, to, amount);
  }

  /** Credit tokens whose backing the caller already holds. */
  creditTokens(token: Address, to: Address, amount: bigint): void {
    this.credit(token, to, amount);
  }

  burnTokens(token: Address, from: Address, amount: bigint): void {
    this.debit(token, from, amount);
  }

  approve(token: Address, owner: Address, spender: Address, amount: bigint): void {
    this._state.allowances.set(stateKey(token, owner, spender), amount);
  }

  async transfer(token: Address, from: Address, to: Address, amount: bigint): Promise<void> {
    this.debit(token, from, amount);
    this.credit(token, to, amount);

    const hook = this.tokenHooks.get(stateKey(to));
    if (hook !== undefined) {
      await hook({ token, from, to, amount });
    }
  }

  async transferFrom(
    spender: Address,
    token: Address,
    from: Address,
    to: Address,
    amount: bigint,
  ): Promise<void> {
    const allowed = this.allowance(token, from, spender);
    if (allowed < amount) {
      throw new SimulatorError(
        "INSUFFICIENT_ALLOWANCE",
        `${spender} may spend ${allowed} of ${from}'s ${token}, needs ${amount}`,
      );
    }
    this.approve(token, from, spender, allowed - amount);
    await this.transfer(token, from, to, amount);
  }

  // ─── Native currency ──────────────────────────────────────────────────

  nativeBalance(account: Address): bigint {
    return this._state.native.get(stateKey(account)) ?? 0n;
  }

  fundNative(account: Address, amount: bigint): void {
    this._state.native.set(stateKey(account), this.nativeBalance(account) + amount);
  }

  /** Move native currency without notifying the recipient. */
  moveNative(from: Address, to: Address, amount: bigint): void {
    const balance = this.nativeBalance(from);
    if (balance < amount) {
      throw new SimulatorError(
        "INSUFFICIENT_BALANCE",
        `${from} holds ${balance} native, needs ${amount}`,
      );
    }
    this._state.native.set(stateKey(from), balance - amount);
    this.fundNative(to, amount);
  }

  /**
   * Low-level value call. A receiver that throws refuses the payment:
   * the transfer and anything the receiver did are undone and the
   * result is false.
   */
  async sendNative(from: Address, to: Address, amount: bigint): Promise<boolean> {
    const saved = structuredClone(this._state);
    this.moveNative(from, to, amount);

    const receiver = this.receivers.get(stateKey(to));
    if (receiver === undefined) return true;
    try {
      await receiver.receiveNative(from, amount);
      return true;
    } catch {
      this._state = saved;
      return false;
    }
  }

  /** Like `sendNative`, but a refusal reverts the caller. */
  async payNative(from: Address, to: Address, amount: bigint): Promise<void> {
    if (!(await this.sendNative(from, to, amount))) {
      throw new SimulatorError("NATIVE_TRANSFER_FAILED", `${to} refused ${amount} native from ${from}`);
    }
  }

  // ─── Positions ────────────────────────────────────────────────────────

  position(tokenId: bigint): SimulatedPosition {
    const found = this._state.positions.get(tokenId);
    if (found === undefined) {
      throw new SimulatorError("UNKNOWN_POSITION", `Invalid token ID ${tokenId}`);
    }
    return found;
  }

  // ─── Internals ────────────────────────────────────────────────────────

  private tokenClient(identity: Address): TokenClient {
    return {
      balanceOf: async (token, account) => this.balanceOf(token, account),
      allowance: async (token, owner, spender) => this.allowance(token, owner, spender),
      transfer: (token, to, amount) => this.transfer(token, identity, to, amount),
      transferFrom: (token, from, to, amount) =>
        this.transferFrom(identity, token, from, to, amount),
      approve: async (token, spender, amount) => this.approve(token, identity, spender, amount),
    };
  }

  private credit(token: Address, account: Address, amount: bigint): void {
    this._state.balances.set(stateKey(token, account), this.balanceOf(token, account) + amount);
  }

  private debit(token: Address, account: Address, amount: bigint): void {
    const balance = this.balanceOf(token, account);
    if (balance < amount) {
      throw new SimulatorError(
        "INSUFFICIENT_BALANCE",
        `${account} holds ${balance} of ${token}, needs ${amount}`,
      );
    }
    this._state.balances.set(stateKey(token, account), balance - amount);
  }

  private deploy(): Address {
    const address = getContractAddress({ from: SIMULATOR_DEPLOYER, nonce: this.deployNonce });
    this.deployNonce += 1n;
    return address;
  }
}

function poolKey(token0: Address, token1: Address, fee: number): string {
  return stateKey(token0, token1, String(fee));
}
