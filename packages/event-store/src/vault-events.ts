/**
 * @lpvault/event-store — Domain event definitions.
 *
 * The catalog of every notification the vault stack emits. Payloads are
 * observability only: nothing in the vault reads them back.
 *
 * Amounts and position ids are decimal strings so that payloads stay
 * JSON-safe and canonicalizable.
 */

import { randomUUID } from "node:crypto";
import type { DomainEvent, EventSource } from "@lpvault/types";

// =============================================================================
// Vault Events
// =============================================================================

export type ManagerChangedPayload = {
  readonly previousManager: string;
  readonly newManager: string;
};

export type DepositedPayload = {
  readonly token: string;
  readonly from: string;
  readonly amount: string;
};

export type WithdrawnPayload = {
  readonly token: string;
  readonly to: string;
  readonly amount: string;
};

export type NativeWithdrawnPayload = {
  readonly to: string;
  readonly amount: string;
};

export type PositionOpenedPayload = {
  readonly positionId: string;
  readonly tickLower: number;
  readonly tickUpper: number;
  readonly liquidity: string;
  readonly amount0: string;
  readonly amount1: string;
};

export type LiquidityChangedPayload = {
  readonly positionId: string;
  readonly liquidity: string;
  readonly amount0: string;
  readonly amount1: string;
};

export type PositionBurnedPayload = {
  readonly positionId: string;
};

export type PositionClosedPayload = {
  readonly positionId: string;
  readonly principal0: string;
  readonly principal1: string;
};

export type FeeTakenPayload = {
  readonly positionId: string;
  readonly recipient: string;
  readonly feeBps: number;
  readonly income0: string;
  readonly income1: string;
  readonly fee0: string;
  readonly fee1: string;
};

export type RebalancedPayload = {
  readonly tokenIn: string;
  readonly tokenOut: string;
  readonly amountIn: string;
  readonly amountOut: string;
};

export type UnwrapPreferenceChangedPayload = {
  readonly enabled: boolean;
};

// =============================================================================
// Factory & Registry Events
// =============================================================================

export type VaultCreatedPayload = {
  readonly vault: string;
  readonly owner: string;
  readonly manager: string;
  readonly pool: string;
};

export type ProtocolFeesChangedPayload = {
  readonly feeBps: number;
  readonly recipient: string;
};

export type ManagerApprovalChangedPayload = {
  readonly manager: string;
  readonly approved: boolean;
};

// =============================================================================
// Catalog
// =============================================================================

export interface EventPayloads {
  readonly "manager.changed": ManagerChangedPayload;
  readonly "deposited": DepositedPayload;
  readonly "withdrawn": WithdrawnPayload;
  readonly "native.withdrawn": NativeWithdrawnPayload;
  readonly "position.opened": PositionOpenedPayload;
  readonly "liquidity.increased": LiquidityChangedPayload;
  readonly "liquidity.decreased": LiquidityChangedPayload;
  readonly "position.burned": PositionBurnedPayload;
  readonly "position.closed": PositionClosedPayload;
  readonly "fee.taken": FeeTakenPayload;
  readonly "rebalanced": RebalancedPayload;
  readonly "unwrap.preference.changed": UnwrapPreferenceChangedPayload;
  readonly "vault.created": VaultCreatedPayload;
  readonly "protocol.fees.changed": ProtocolFeesChangedPayload;
  readonly "manager.approval.changed": ManagerApprovalChangedPayload;
}

export type EventType = keyof EventPayloads;

/** Which component emits each event type. */
export const EVENT_SOURCES: Readonly<Record<EventType, EventSource>> = {
  "manager.changed": "vault",
  "deposited": "vault",
  "withdrawn": "vault",
  "native.withdrawn": "vault",
  "position.opened": "vault",
  "liquidity.increased": "vault",
  "liquidity.decreased": "vault",
  "position.burned": "vault",
  "position.closed": "vault",
  "fee.taken": "vault",
  "rebalanced": "vault",
  "unwrap.preference.changed": "vault",
  "vault.created": "factory",
  "protocol.fees.changed": "factory",
  "manager.approval.changed": "registry",
};

/**
 * A DomainEvent whose payload is known from its type.
 */
export interface TypedEvent<T extends EventType> extends DomainEvent {
  readonly type: T;
  readonly payload: EventPayloads[T];
}

/**
 * Build a domain event with fresh metadata.
 */
export function createEvent<T extends EventType>(
  type: T,
  payload: EventPayloads[T],
  actor: string,
  correlationId: string,
): TypedEvent<T> {
  return {
    type,
    metadata: {
      eventId: randomUUID(),
      timestamp: new Date().toISOString(),
      actor,
      correlationId,
      source: EVENT_SOURCES[type],
    },
    payload,
  };
}

/**
 * Narrow a stored domain event to a catalog type.
 */
export function isEventOfType<T extends EventType>(
  event: DomainEvent,
  type: T,
): event is TypedEvent<T> {
  return event.type === type;
}

/** Stream id for a component's notifications. */
export function streamIdFor(source: EventSource, address: string): string {
  return `${source}:${address.toLowerCase()}`;
}
