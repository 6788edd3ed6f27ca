/**
 * Manager Registry
 *
 * An admin-maintained approval table. Vaults consult it on every
 * delegated call; it never grants anything by itself.
 */

import { randomUUID } from "node:crypto";
import pino from "pino";
import type { Logger } from "pino";
import { getAddress, zeroAddress } from "viem";
import { InMemoryEventStore, createEvent, streamIdFor } from "@lpvault/event-store";
import type { EventStore } from "@lpvault/event-store";
import type { Address, ManagerRegistryReader } from "@lpvault/types";
import { NonZeroAddressSchema, VaultError, parseConfig, sameAddress } from "@lpvault/vault";

export interface ManagerRegistryOptions {
  readonly address: Address;
  readonly admin: Address;
  readonly notifications?: EventStore;
  readonly logger?: Logger;
}

export class ManagerRegistry implements ManagerRegistryReader {
  readonly address: Address;
  readonly admin: Address;

  private readonly approved = new Map<string, Address>();
  private readonly notifications: EventStore;
  private readonly logger: Logger;

  constructor(options: ManagerRegistryOptions) {
    this.address = parseConfig(NonZeroAddressSchema, options.address, "registry address");
    this.admin = parseConfig(NonZeroAddressSchema, options.admin, "registry admin");
    this.notifications = options.notifications ?? new InMemoryEventStore();
    this.logger = (options.logger ?? pino({ level: "silent" })).child({
      component: "registry",
      registry: this.address,
    });
  }

  async isApproved(identity: Address): Promise<boolean> {
    return this.approved.has(identity.toLowerCase());
  }

  approvedManagers(): readonly Address[] {
    return [...this.approved.values()];
  }

  setApproved(caller: Address, manager: Address, approved: boolean): void {
    if (!sameAddress(caller, this.admin)) {
      throw new VaultError("UNAUTHORIZED", "setApproved is admin-only", {
        operation: "setApproved",
      });
    }
    if (sameAddress(manager, zeroAddress)) {
      throw new VaultError("INVALID_REFERENCE", "Cannot approve the zero address", {
        operation: "setApproved",
      });
    }
    const checksummed = parseConfig(NonZeroAddressSchema, manager, "manager address");

    if (approved) {
      this.approved.set(checksummed.toLowerCase(), checksummed);
    } else {
      this.approved.delete(checksummed.toLowerCase());
    }

    this.notifications.append(streamIdFor("registry", this.address), [
      createEvent(
        "manager.approval.changed",
        { manager: checksummed, approved },
        caller,
        randomUUID(),
      ),
    ]);
    this.logger.info({ manager: checksummed, approved }, "manager approval changed");
  }
}
