/**
 * Tests for AuthorizationGate — owner, manager, and capital-only rules.
 */

import { describe, it, expect, beforeEach } from "vitest";
import { zeroAddress } from "viem";
import type { Address } from "@lpvault/types";
import { AuthorizationGate, OPERATION_CLASS } from "../src/authorization.js";
import type { VaultOperation } from "../src/types.js";
import { MANAGER, OWNER, STRANGER, TestRegistry } from "./fixtures.js";

const DELEGATED: VaultOperation[] = [
  "mint",
  "increaseLiquidity",
  "decreaseLiquidity",
  "burn",
  "collectFees",
  "closePosition",
  "rebalance",
];
const CAPITAL: VaultOperation[] = ["withdrawAll", "deposit", "setManager", "setUnwrapNative"];

describe("OPERATION_CLASS", () => {
  it("classifies every operation", () => {
    for (const op of DELEGATED) expect(OPERATION_CLASS[op]).toBe("delegated");
    for (const op of CAPITAL) expect(OPERATION_CLASS[op]).toBe("capital");
    expect(Object.keys(OPERATION_CLASS)).toHaveLength(DELEGATED.length + CAPITAL.length);
  });
});

describe("AuthorizationGate", () => {
  let registry: TestRegistry;
  let manager: Address;
  let gate: AuthorizationGate;

  beforeEach(() => {
    registry = new TestRegistry();
    registry.approve(MANAGER);
    manager = MANAGER;
    gate = new AuthorizationGate(OWNER, () => manager, registry);
  });

  describe("authorize", () => {
    it("recognises the owner without consulting the registry", async () => {
      expect(await gate.authorize(OWNER)).toEqual({ role: "owner", caller: OWNER });
      expect(registry.reads).toBe(0);
    });

    it("recognises an approved manager", async () => {
      expect(await gate.authorize(MANAGER)).toEqual({ role: "manager", caller: MANAGER });
    });

    it("matches addresses regardless of case", async () => {
      manager = "0xabcdef0000000000000000000000000000000001";
      registry.approve(manager);

      const upper: Address = "0xABCDEF0000000000000000000000000000000001";
      expect((await gate.authorize(upper)).role).toBe("manager");
    });

    it("denies a manager the registry no longer approves", async () => {
      registry.revoke(MANAGER);

      expect(await gate.authorize(MANAGER)).toEqual({
        role: "denied",
        caller: MANAGER,
        reason: "manager is not approved by the registry",
      });
    });

    it("denies an approved identity that is not the vault's manager", async () => {
      registry.approve(STRANGER);

      expect((await gate.authorize(STRANGER)).role).toBe("denied");
    });

    it("always denies the zero address", async () => {
      manager = zeroAddress;
      registry.approve(zeroAddress);

      expect(await gate.authorize(zeroAddress)).toEqual({
        role: "denied",
        caller: zeroAddress,
        reason: "zero address",
      });
    });
  });

  describe("require", () => {
    it("lets the owner call every operation", async () => {
      for (const op of [...DELEGATED, ...CAPITAL]) {
        expect((await gate.require(OWNER, op)).role).toBe("owner");
      }
    });

    it("lets an approved manager call delegated operations", async () => {
      for (const op of DELEGATED) {
        expect((await gate.require(MANAGER, op)).role).toBe("manager");
      }
    });

    it("reads approval on every call", async () => {
      await gate.require(MANAGER, "mint");
      await gate.require(MANAGER, "burn");

      expect(registry.reads).toBe(2);
    });

    it("takes effect the moment approval is revoked", async () => {
      await gate.require(MANAGER, "mint");
      registry.revoke(MANAGER);

      await expect(gate.require(MANAGER, "mint")).rejects.toMatchObject({
        code: "UNAUTHORIZED",
        operation: "mint",
      });
    });

    it("keeps capital operations owner-only for an approved manager", async () => {
      for (const op of CAPITAL) {
        await expect(gate.require(MANAGER, op)).rejects.toMatchObject({ code: "UNAUTHORIZED" });
      }
      expect(registry.reads).toBe(0);
    });

    it("rejects strangers for every operation", async () => {
      for (const op of [...DELEGATED, ...CAPITAL]) {
        await expect(gate.require(STRANGER, op)).rejects.toMatchObject({ code: "UNAUTHORIZED" });
      }
    });

    it("rejects the former manager once the field is cleared", async () => {
      manager = zeroAddress;

      await expect(gate.require(MANAGER, "rebalance")).rejects.toThrow(
        `rebalance rejected for ${MANAGER}: neither owner nor manager`,
      );
    });
  });
});
