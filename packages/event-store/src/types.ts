/**
 * @lpvault/event-store — Core types.
 *
 * Append-only, hash-chained notification log.
 *
 * Design principles:
 * - Events are immutable after creation
 * - Streams are append-only (one stream per emitting component)
 * - Every event has a monotonically increasing version within its stream
 * - Every event carries the hash of its global predecessor
 */

import type { DomainEvent } from "@lpvault/types";

// =============================================================================
// Stored Event
// =============================================================================

/**
 * An event as persisted in the store.
 */
export interface StoredEvent {
  readonly event: DomainEvent;

  /** Stream this event belongs to (e.g. "vault:0xabc…") */
  readonly streamId: string;

  /** Position within this stream (1-based) */
  readonly version: number;

  /** Position across all streams (1-based) */
  readonly globalPosition: number;

  /** When this event was persisted (store-level, not domain-level) */
  readonly appendedAt: string;

  /** SHA-256 over the canonical event content and `previousHash` */
  readonly hash: string;

  /** Hash of the event at globalPosition - 1, or GENESIS_HASH */
  readonly previousHash: string;
}

/**
 * The hashed content of a stored event (everything except the hashes).
 */
export type StoredEventContent = Omit<StoredEvent, "hash" | "previousHash">;

export interface AppendResult {
  readonly streamId: string;
  readonly fromVersion: number;
  readonly toVersion: number;
  readonly count: number;
}

// =============================================================================
// Integrity
// =============================================================================

export interface IntegrityError {
  readonly position: number;
  readonly reason: string;
}

export interface EventStoreIntegrityResult {
  readonly valid: boolean;
  readonly lastVerifiedPosition: number;
  readonly errors: readonly IntegrityError[];
}

// =============================================================================
// Event Store Interface
// =============================================================================

/**
 * Append-only event store.
 *
 * Invariants:
 * - Events are immutable once appended
 * - Stream versions are contiguous (1, 2, 3, ...) with no gaps
 * - Global positions are monotonically increasing with no gaps
 */
export interface EventStore {
  /**
   * Append one or more events to a stream. A batch is appended
   * entirely or not at all.
   */
  append(streamId: string, events: readonly DomainEvent[]): AppendResult;

  read(streamId: string): readonly StoredEvent[];

  readAll(): readonly StoredEvent[];

  verifyIntegrity(): EventStoreIntegrityResult;
}

// =============================================================================
// Errors
// =============================================================================

export type EventStoreErrorCode =
  | "INVALID_STREAM_ID"
  | "EMPTY_APPEND";

export class EventStoreError extends Error {
  constructor(
    public readonly code: EventStoreErrorCode,
    message: string,
    public readonly streamId?: string,
  ) {
    super(message);
    this.name = "EventStoreError";
  }
}
