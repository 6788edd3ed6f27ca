/**
 * @lpvault/factory — Configuration.
 *
 * Protocol-level settings validated with Zod. Any violation surfaces as
 * a CONFIGURATION_ERROR before anything is stored.
 */

import { z } from "zod";
import { MAX_PROTOCOL_FEE_BPS } from "@lpvault/ledger";
import { NonZeroAddressSchema } from "@lpvault/vault";

// =============================================================================
// Schema
// =============================================================================

export const ProtocolFeeSchema = z.object({
  feeBps: z.number().int().min(0).max(MAX_PROTOCOL_FEE_BPS),
  recipient: NonZeroAddressSchema,
});

export const FactoryConfigSchema = z.object({
  /** The factory's own identity; vault addresses derive from it */
  address: NonZeroAddressSchema,
  admin: NonZeroAddressSchema,
  liquidityEngine: NonZeroAddressSchema,
  swapEngine: NonZeroAddressSchema,
  wrappedNative: NonZeroAddressSchema,
  protocolFee: ProtocolFeeSchema,
});

export type ProtocolFeeInput = z.input<typeof ProtocolFeeSchema>;
export type FactoryConfigInput = z.input<typeof FactoryConfigSchema>;
export type FactoryConfig = z.output<typeof FactoryConfigSchema>;
