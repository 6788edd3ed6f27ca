/**
 * Authorization Gate
 *
 * Decides who may call what. The owner may call everything. The manager
 * may call delegated operations only while it is both the vault's
 * current manager and approved by the registry; approval is read at the
 * moment of the call and never cached. Capital operations are owner-only.
 */

import { zeroAddress } from "viem";
import type { Address, ManagerRegistryReader } from "@lpvault/types";
import { sameAddress } from "./addresses.js";
import { VaultError } from "./errors.js";
import type { OperationClass, VaultOperation } from "./types.js";

// =============================================================================
// Authority
// =============================================================================

export type Authority =
  | { readonly role: "owner"; readonly caller: Address }
  | { readonly role: "manager"; readonly caller: Address }
  | { readonly role: "denied"; readonly caller: Address; readonly reason: string };

export type GrantedAuthority = Exclude<Authority, { role: "denied" }>;

export const OPERATION_CLASS: Readonly<Record<VaultOperation, OperationClass>> = {
  mint: "delegated",
  increaseLiquidity: "delegated",
  decreaseLiquidity: "delegated",
  burn: "delegated",
  collectFees: "delegated",
  closePosition: "delegated",
  rebalance: "delegated",
  withdrawAll: "capital",
  deposit: "capital",
  setManager: "capital",
  setUnwrapNative: "capital",
};

// =============================================================================
// Gate
// =============================================================================

export class AuthorizationGate {
  constructor(
    private readonly owner: Address,
    private readonly currentManager: () => Address,
    private readonly registry: ManagerRegistryReader,
  ) {}

  /**
   * Resolve the caller's standing, without regard to any operation.
   */
  async authorize(caller: Address): Promise<Authority> {
    if (sameAddress(caller, zeroAddress)) {
      return { role: "denied", caller, reason: "zero address" };
    }
    if (sameAddress(caller, this.owner)) {
      return { role: "owner", caller };
    }

    const manager = this.currentManager();
    if (sameAddress(manager, zeroAddress) || !sameAddress(caller, manager)) {
      return { role: "denied", caller, reason: "neither owner nor manager" };
    }
    if (!(await this.registry.isApproved(caller))) {
      return { role: "denied", caller, reason: "manager is not approved by the registry" };
    }
    return { role: "manager", caller };
  }

  /**
   * Authorize `caller` for `operation` or throw UNAUTHORIZED.
   */
  async require(caller: Address, operation: VaultOperation): Promise<GrantedAuthority> {
    if (OPERATION_CLASS[operation] === "capital") {
      if (!sameAddress(caller, zeroAddress) && sameAddress(caller, this.owner)) {
        return { role: "owner", caller };
      }
      throw new VaultError("UNAUTHORIZED", `${operation} is owner-only`, { operation });
    }

    const authority = await this.authorize(caller);
    if (authority.role === "denied") {
      throw new VaultError(
        "UNAUTHORIZED",
        `${operation} rejected for ${caller}: ${authority.reason}`,
        { operation },
      );
    }
    return authority;
  }
}
