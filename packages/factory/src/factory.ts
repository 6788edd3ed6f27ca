/**
 * Vault Factory
 *
 * Deploys vaults bound to canonical pools and holds the protocol fee
 * configuration every vault reads live at teardown.
 *
 * Rules:
 * - A pool is accepted only if the pool directory maps its own
 *   (token0, token1, fee) back to it
 * - The caller of createVault becomes the vault's owner
 * - Protocol fees change only through the admin, within the fee ceiling
 */

import { randomUUID } from "node:crypto";
import pino from "pino";
import type { Logger } from "pino";
import { getContractAddress, zeroAddress } from "viem";
import { InMemoryEventStore, createEvent, streamIdFor } from "@lpvault/event-store";
import type { EventPayloads, EventStore, EventType } from "@lpvault/event-store";
import type {
  Address,
  ChainConnector,
  FeeConfigSource,
  ManagerRegistryReader,
  PoolDirectory,
  PoolKey,
  ProtocolFees,
} from "@lpvault/types";
import { AddressSchema, NonZeroAddressSchema, Vault, VaultError, parseConfig, sameAddress } from "@lpvault/vault";
import { FactoryConfigSchema, ProtocolFeeSchema } from "./config.js";
import type { FactoryConfig, FactoryConfigInput } from "./config.js";

// =============================================================================
// Types
// =============================================================================

export interface VaultFactoryDependencies {
  readonly connector: ChainConnector;
  readonly directory: PoolDirectory;
  readonly registry: ManagerRegistryReader;
  /** Shared by the factory and every vault it creates */
  readonly notifications?: EventStore;
  readonly logger?: Logger;
}

export interface CreateVaultRequest {
  readonly pool: Address;
  /** Initial delegate. Default: none */
  readonly manager?: Address;
  readonly unwrapNative?: boolean;
}

// =============================================================================
// Factory
// =============================================================================

export class VaultFactory implements FeeConfigSource {
  readonly address: Address;
  readonly admin: Address;

  private readonly config: FactoryConfig;
  private fees: ProtocolFees;
  private nonce = 1n;
  private readonly vaults = new Map<string, Vault>();
  private readonly owners = new Map<string, Address[]>();
  private readonly notifications: EventStore;
  private readonly logger: Logger;

  constructor(
    config: FactoryConfigInput,
    private readonly deps: VaultFactoryDependencies,
  ) {
    this.config = parseConfig(FactoryConfigSchema, config, "factory configuration");
    this.address = this.config.address;
    this.admin = this.config.admin;
    this.fees = this.config.protocolFee;
    this.notifications = deps.notifications ?? new InMemoryEventStore();
    this.logger = (deps.logger ?? pino({ level: "silent" })).child({
      component: "factory",
      factory: this.address,
    });
  }

  // ─── Protocol fees ────────────────────────────────────────────────────

  async protocolFees(): Promise<ProtocolFees> {
    return this.fees;
  }

  setProtocolFees(caller: Address, feeBps: number, recipient: Address): void {
    this.requireAdmin(caller, "setProtocolFees");
    this.fees = parseConfig(ProtocolFeeSchema, { feeBps, recipient }, "protocol fees");

    this.emit("protocol.fees.changed", { feeBps: this.fees.feeBps, recipient: this.fees.recipient }, caller);
    this.logger.info({ feeBps: this.fees.feeBps, recipient: this.fees.recipient }, "protocol fees changed");
  }

  // ─── Vaults ───────────────────────────────────────────────────────────

  get vaultCount(): number {
    return this.vaults.size;
  }

  vault(address: Address): Vault | undefined {
    return this.vaults.get(address.toLowerCase());
  }

  vaultsOf(owner: Address): readonly Vault[] {
    const addresses = this.owners.get(owner.toLowerCase()) ?? [];
    return addresses.flatMap((address) => {
      const found = this.vault(address);
      return found === undefined ? [] : [found];
    });
  }

  async createVault(caller: Address, request: CreateVaultRequest): Promise<Vault> {
    const owner = parseConfig(NonZeroAddressSchema, caller, "vault owner");
    const pool = parseConfig(NonZeroAddressSchema, request.pool, "pool address");
    const manager = parseConfig(AddressSchema, request.manager ?? zeroAddress, "manager address");

    const key = await this.resolvePool(pool);

    const address = getContractAddress({ from: this.address, nonce: this.nonce });
    const chain = this.deps.connector.connect(address);
    this.assertEngines(chain.liquidity.address, chain.swap.address, chain.wrappedNative.address);

    const vault = new Vault(
      {
        address,
        owner,
        manager,
        pool: { address: pool, ...key },
        unwrapNative: request.unwrapNative ?? false,
      },
      {
        chain,
        registry: this.deps.registry,
        feeSource: this,
        notifications: this.notifications,
        ...(this.deps.logger !== undefined ? { logger: this.deps.logger } : {}),
      },
    );
    this.deps.connector.registerNativeReceiver(address, vault);

    this.nonce += 1n;
    this.vaults.set(address.toLowerCase(), vault);
    this.owners.set(owner.toLowerCase(), [...(this.owners.get(owner.toLowerCase()) ?? []), address]);

    this.emit("vault.created", { vault: address, owner, manager, pool }, owner);
    this.logger.info({ vault: address, owner, pool }, "vault created");
    return vault;
  }

  // ─── Internals ────────────────────────────────────────────────────────

  private async resolvePool(pool: Address): Promise<PoolKey> {
    let key: PoolKey;
    try {
      key = await this.deps.directory.describe(pool);
    } catch (err) {
      throw new VaultError("CONFIGURATION_ERROR", `${pool} is not a pool`, {
        operation: "createVault",
        cause: err,
      });
    }

    const canonical = await this.deps.directory.getPool(key.token0, key.token1, key.fee);
    if (!sameAddress(canonical, pool)) {
      throw new VaultError(
        "CONFIGURATION_ERROR",
        `${pool} is not the canonical pool for ${key.token0}/${key.token1}/${key.fee}`,
        { operation: "createVault" },
      );
    }
    return key;
  }

  private assertEngines(liquidity: Address, swap: Address, wrappedNative: Address): void {
    const expected = [
      ["liquidity engine", this.config.liquidityEngine, liquidity],
      ["swap engine", this.config.swapEngine, swap],
      ["wrapped native", this.config.wrappedNative, wrappedNative],
    ] as const;
    for (const [label, configured, connected] of expected) {
      if (!sameAddress(configured, connected)) {
        throw new VaultError(
          "CONFIGURATION_ERROR",
          `Connected ${label} ${connected} does not match configured ${configured}`,
          { operation: "createVault" },
        );
      }
    }
  }

  private requireAdmin(caller: Address, operation: string): void {
    if (!sameAddress(caller, this.admin)) {
      throw new VaultError("UNAUTHORIZED", `${operation} is admin-only`, { operation });
    }
  }

  private emit<T extends EventType>(type: T, payload: EventPayloads[T], actor: Address): void {
    this.notifications.append(streamIdFor("factory", this.address), [
      createEvent(type, payload, actor, randomUUID()),
    ]);
  }
}
