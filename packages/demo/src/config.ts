/**
 * @lpvault/demo — Configuration.
 *
 * Loads and validates the walkthrough's settings from environment
 * variables using Zod.
 */

import { z } from "zod";
import { MAX_PROTOCOL_FEE_BPS } from "@lpvault/ledger";

// =============================================================================
// Schema
// =============================================================================

export const DemoConfigSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("warn"),
  LOG_PRETTY: z
    .string()
    .transform((v) => v === "true")
    .default("false"),

  // Protocol
  PROTOCOL_FEE_BPS: z.coerce.number().int().min(0).max(MAX_PROTOCOL_FEE_BPS).default(1000),

  // Pacing between walkthrough steps
  DEMO_DELAY_MS: z.coerce.number().int().min(0).default(0),
});

export type DemoConfig = z.infer<typeof DemoConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if a variable is present but invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): DemoConfig {
  return DemoConfigSchema.parse(env);
}
