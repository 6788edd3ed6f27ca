/**
 * Shared vault test setup on the simulated chain.
 */

import { InMemoryEventStore } from "@lpvault/event-store";
import { SimulatedChain } from "@lpvault/simulator";
import type {
  Address,
  BoundPool,
  FeeConfigSource,
  ManagerRegistryReader,
  PositionId,
  ProtocolFees,
} from "@lpvault/types";
import { Vault } from "../src/vault.js";
import type { VaultDependencies } from "../src/vault.js";
import type { MintParams } from "../src/types.js";

// Digit-only addresses are their own checksum form.
export const VAULT: Address = "0x9000000000000000000000000000000000000009";
export const OWNER: Address = "0x1000000000000000000000000000000000000001";
export const MANAGER: Address = "0x2000000000000000000000000000000000000002";
export const STRANGER: Address = "0x3000000000000000000000000000000000000003";
export const ADVERSARY: Address = "0x4000000000000000000000000000000000000004";
export const FEE_RECIPIENT: Address = "0x5000000000000000000000000000000000000005";
export const TOKEN_A: Address = "0x1100000000000000000000000000000000000011";
export const TOKEN_B: Address = "0x2200000000000000000000000000000000000022";
export const TOKEN_C: Address = "0x3300000000000000000000000000000000000033";

export const POOL_FEE = 3000;
export const DEFAULT_FEE_BPS = 1_000;
export const INITIAL_BALANCE = 10_000n;

export class TestRegistry implements ManagerRegistryReader {
  private readonly approved = new Set<string>();
  reads = 0;

  approve(identity: Address): void {
    this.approved.add(identity.toLowerCase());
  }

  revoke(identity: Address): void {
    this.approved.delete(identity.toLowerCase());
  }

  async isApproved(identity: Address): Promise<boolean> {
    this.reads += 1;
    return this.approved.has(identity.toLowerCase());
  }
}

export class TestFeeSource implements FeeConfigSource {
  /** Runs on every read, before the fees are returned */
  onRead: (() => Promise<void>) | undefined;

  constructor(public fees: ProtocolFees) {}

  async protocolFees(): Promise<ProtocolFees> {
    if (this.onRead !== undefined) {
      await this.onRead();
    }
    return this.fees;
  }
}

export interface FixtureOptions {
  /** Make token0 the wrapped-native asset */
  readonly wrappedToken0?: boolean;
  readonly unwrapNative?: boolean;
  readonly fund0?: bigint;
  readonly fund1?: bigint;
}

export interface VaultFixture {
  readonly chain: SimulatedChain;
  readonly vault: Vault;
  readonly registry: TestRegistry;
  readonly feeSource: TestFeeSource;
  readonly notifications: InMemoryEventStore;
  readonly pool: BoundPool;
  readonly deps: VaultDependencies;
}

export function createFixture(options: FixtureOptions = {}): VaultFixture {
  const chain = new SimulatedChain();
  const token0 = options.wrappedToken0 === true ? chain.wrappedNative.address : TOKEN_A;
  const token1 = TOKEN_B;
  const pool: BoundPool = {
    address: chain.createPool(token0, token1, POOL_FEE),
    token0,
    token1,
    fee: POOL_FEE,
  };

  const registry = new TestRegistry();
  registry.approve(MANAGER);
  const feeSource = new TestFeeSource({ feeBps: DEFAULT_FEE_BPS, recipient: FEE_RECIPIENT });
  const notifications = new InMemoryEventStore();
  const deps: VaultDependencies = {
    chain: chain.connect(VAULT),
    registry,
    feeSource,
    notifications,
  };

  const vault = new Vault(
    {
      address: VAULT,
      owner: OWNER,
      manager: MANAGER,
      pool,
      unwrapNative: options.unwrapNative ?? false,
    },
    deps,
  );
  chain.registerNativeReceiver(VAULT, vault);

  chain.mintTokens(token0, VAULT, options.fund0 ?? INITIAL_BALANCE);
  chain.mintTokens(token1, VAULT, options.fund1 ?? INITIAL_BALANCE);

  return { chain, vault, registry, feeSource, notifications, pool, deps };
}

export function mintParams(f: VaultFixture, overrides: Partial<MintParams> = {}): MintParams {
  return {
    token0: f.pool.token0,
    token1: f.pool.token1,
    fee: f.pool.fee,
    tickLower: -600,
    tickUpper: 600,
    amount0Desired: 1_000n,
    amount1Desired: 1_000n,
    amount0Min: 1n,
    amount1Min: 1n,
    recipient: VAULT,
    deadline: f.chain.now() + 600n,
    ...overrides,
  };
}

/** Mint the default 1000/1000 position (liquidity 2000). */
export async function openPosition(f: VaultFixture, caller: Address = OWNER): Promise<PositionId> {
  const { positionId } = await f.vault.mint(caller, mintParams(f));
  return positionId;
}

export function eventTypes(f: VaultFixture): string[] {
  return f.vault.history().map((stored) => stored.event.type);
}

export function vaultBalance(f: VaultFixture, token: Address): bigint {
  return f.chain.balanceOf(token, VAULT);
}
