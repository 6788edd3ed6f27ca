/**
 * Vault configuration schemas.
 *
 * Validates construction input and restored snapshots with Zod.
 * Addresses come out checksummed; any violation is a
 * CONFIGURATION_ERROR and no vault is created.
 */

import { getAddress, isAddress, zeroAddress } from "viem";
import type { Address } from "viem";
import { z } from "zod";
import { VaultError } from "./errors.js";

// =============================================================================
// Schema
// =============================================================================

export const AddressSchema = z
  .string()
  .refine((value) => isAddress(value, { strict: false }), {
    message: "must be a 20-byte hex address",
  })
  .transform((value): Address => getAddress(value));

export const NonZeroAddressSchema = AddressSchema.refine(
  (value) => value !== zeroAddress,
  { message: "must not be the zero address" },
);

export const BoundPoolSchema = z
  .object({
    address: NonZeroAddressSchema,
    token0: NonZeroAddressSchema,
    token1: NonZeroAddressSchema,
    fee: z.number().int().min(0).max(1_000_000),
  })
  .refine((pool) => pool.token0 !== pool.token1, {
    message: "token0 and token1 must differ",
    path: ["token1"],
  });

export const VaultConfigSchema = z.object({
  address: NonZeroAddressSchema,
  owner: NonZeroAddressSchema,
  /** The zero address means no delegate */
  manager: AddressSchema.default(zeroAddress),
  pool: BoundPoolSchema,
  unwrapNative: z.boolean().default(false),
});

export type VaultConfigInput = z.input<typeof VaultConfigSchema>;
export type VaultConfig = z.output<typeof VaultConfigSchema>;

const UintStringSchema = z.string().regex(/^\d+$/, "must be a base-10 integer string");

export const VaultSnapshotSchema = z.object({
  version: z.literal(1),
  address: NonZeroAddressSchema,
  owner: NonZeroAddressSchema,
  manager: AddressSchema,
  pool: BoundPoolSchema,
  positionId: UintStringSchema,
  ledger: z
    .object({
      accruedFee0: UintStringSchema,
      accruedFee1: UintStringSchema,
      owedPrincipal0: UintStringSchema,
      owedPrincipal1: UintStringSchema,
    })
    .refine((ledger) => BigInt(ledger.accruedFee0) === 0n && BigInt(ledger.accruedFee1) === 0n, {
      message: "accrued fees must be zero between operations",
    }),
  unwrapNative: z.boolean(),
  savedAt: z.string(),
});

export type VaultSnapshot = z.output<typeof VaultSnapshotSchema>;

// =============================================================================
// Parsing
// =============================================================================

/**
 * Parse with a schema, reporting failures as CONFIGURATION_ERROR.
 */
export function parseConfig<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
  what: string,
): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const detail = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new VaultError("CONFIGURATION_ERROR", `Invalid ${what}: ${detail}`, {
      cause: result.error,
    });
  }
  return result.data;
}
