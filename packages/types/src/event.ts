/**
 * Event Types
 *
 * Every notification emitted by a vault, the factory or the manager
 * registry is captured as a DomainEvent.
 *
 * Rules:
 * - Events are immutable after creation
 * - Every event has metadata (who, when, which operation)
 * - Payloads are JSON-safe: amounts and ids travel as decimal strings
 */

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Address of the caller whose operation emitted this event */
  readonly actor: string;

  /** Shared by every event emitted within one top-level operation */
  readonly correlationId: string;

  /** Which component emitted this event */
  readonly source: EventSource;
}

export type EventSource = "vault" | "factory" | "registry";

/**
 * A domain event. Discriminated by `type`.
 */
export interface DomainEvent {
  /** Event type identifier (e.g., "fee.taken", "manager.changed") */
  readonly type: string;

  readonly metadata: EventMetadata;

  /** Event-specific payload (typed by consumers) */
  readonly payload: Readonly<Record<string, unknown>>;
}
