/**
 * Shared factory test setup on the simulated chain.
 */

import { InMemoryEventStore } from "@lpvault/event-store";
import { SimulatedChain } from "@lpvault/simulator";
import type { Address } from "@lpvault/types";
import { VaultFactory } from "../src/factory.js";
import type { FactoryConfigInput } from "../src/config.js";
import { ManagerRegistry } from "../src/registry.js";

export const FACTORY: Address = "0x6000000000000000000000000000000000000006";
export const REGISTRY: Address = "0x6100000000000000000000000000000000000006";
export const ADMIN: Address = "0x7000000000000000000000000000000000000007";
export const OWNER: Address = "0x1000000000000000000000000000000000000001";
export const MANAGER: Address = "0x2000000000000000000000000000000000000002";
export const STRANGER: Address = "0x3000000000000000000000000000000000000003";
export const FEE_RECIPIENT: Address = "0x5000000000000000000000000000000000000005";
export const TOKEN_A: Address = "0x1100000000000000000000000000000000000011";
export const TOKEN_B: Address = "0x2200000000000000000000000000000000000022";

export const POOL_FEE = 500;

export interface FactoryFixture {
  readonly chain: SimulatedChain;
  readonly registry: ManagerRegistry;
  readonly factory: VaultFactory;
  readonly notifications: InMemoryEventStore;
  readonly pool: Address;
  readonly config: FactoryConfigInput;
}

export function factoryConfig(chain: SimulatedChain): FactoryConfigInput {
  return {
    address: FACTORY,
    admin: ADMIN,
    liquidityEngine: chain.positionManager.address,
    swapEngine: chain.swapRouter.address,
    wrappedNative: chain.wrappedNative.address,
    protocolFee: { feeBps: 1_000, recipient: FEE_RECIPIENT },
  };
}

export function createFactoryFixture(): FactoryFixture {
  const chain = new SimulatedChain();
  const notifications = new InMemoryEventStore();
  const registry = new ManagerRegistry({ address: REGISTRY, admin: ADMIN, notifications });
  const config = factoryConfig(chain);
  const factory = new VaultFactory(config, {
    connector: chain,
    directory: chain,
    registry,
    notifications,
  });
  const pool = chain.createPool(TOKEN_A, TOKEN_B, POOL_FEE);
  return { chain, registry, factory, notifications, pool, config };
}

export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error("expected a throw");
}
