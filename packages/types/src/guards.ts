/**
 * Runtime Type Guards
 *
 * Narrowing functions for shared domain types, used where values cross
 * a boundary (restored snapshots, deserialized events, engine replies).
 */

import { isAddress } from "viem";
import type { PoolKey, TokenAmounts } from "./chain.js";
import type { DomainEvent, EventMetadata, EventSource } from "./event.js";

// =============================================================================
// Chain guards
// =============================================================================

export function isPoolKey(value: unknown): value is PoolKey {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.token0 === "string" &&
    isAddress(v.token0, { strict: false }) &&
    typeof v.token1 === "string" &&
    isAddress(v.token1, { strict: false }) &&
    typeof v.fee === "number" &&
    Number.isInteger(v.fee) &&
    v.fee >= 0
  );
}

export function isTokenAmounts(value: unknown): value is TokenAmounts {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.amount0 === "bigint" &&
    v.amount0 >= 0n &&
    typeof v.amount1 === "bigint" &&
    v.amount1 >= 0n
  );
}

/**
 * A non-negative integer written in base 10, as carried by event
 * payloads and snapshots.
 */
export function isUintString(value: unknown): value is string {
  return typeof value === "string" && /^\d+$/.test(value);
}

// =============================================================================
// Event guards
// =============================================================================

const EVENT_SOURCES = new Set<string>(["vault", "factory", "registry"]);

export function isEventSource(value: unknown): value is EventSource {
  return typeof value === "string" && EVENT_SOURCES.has(value);
}

export function isEventMetadata(value: unknown): value is EventMetadata {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.eventId === "string" &&
    typeof v.timestamp === "string" &&
    typeof v.actor === "string" &&
    typeof v.correlationId === "string" &&
    isEventSource(v.source)
  );
}

export function isDomainEvent(value: unknown): value is DomainEvent {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.type === "string" &&
    isEventMetadata(v.metadata) &&
    v.payload !== null &&
    typeof v.payload === "object"
  );
}
