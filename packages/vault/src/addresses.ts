import { isAddress, isAddressEqual } from "viem";
import type { Address, BoundPool } from "@lpvault/types";
import { VaultError } from "./errors.js";

/**
 * Case-insensitive address comparison. Malformed input never matches.
 */
export function sameAddress(a: Address, b: Address): boolean {
  return (
    isAddress(a, { strict: false }) &&
    isAddress(b, { strict: false }) &&
    isAddressEqual(a, b)
  );
}

export function isPoolToken(pool: BoundPool, token: Address): boolean {
  return sameAddress(pool.token0, token) || sameAddress(pool.token1, token);
}

/** True when `{a, b}` is exactly the pool's pair, in either order. */
export function isPoolPair(pool: BoundPool, a: Address, b: Address): boolean {
  return (
    (sameAddress(pool.token0, a) && sameAddress(pool.token1, b)) ||
    (sameAddress(pool.token1, a) && sameAddress(pool.token0, b))
  );
}

export function assertRecipient(recipient: Address, vault: Address, operation: string): void {
  if (!sameAddress(recipient, vault)) {
    throw new VaultError("INVALID_REFERENCE", `${operation}: recipient must be the vault`, {
      operation,
    });
  }
}
