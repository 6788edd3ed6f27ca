/**
 * @lpvault/event-store — In-memory EventStore implementation.
 *
 * Keeps per-stream arrays plus a global log.
 *
 * Not durable: all state is lost on process exit.
 */

import type { DomainEvent } from "@lpvault/types";
import type {
  AppendResult,
  EventStore,
  EventStoreIntegrityResult,
  StoredEvent,
  StoredEventContent,
} from "./types.js";
import { EventStoreError } from "./types.js";
import { computeEventHash, GENESIS_HASH, verifyHashChain } from "./hash-chain.js";

export class InMemoryEventStore implements EventStore {
  private readonly _streams = new Map<string, StoredEvent[]>();
  private readonly _globalLog: StoredEvent[] = [];
  private _lastHash: string = GENESIS_HASH;

  // ─── Append ─────────────────────────────────────────────────────────

  append(streamId: string, events: readonly DomainEvent[]): AppendResult {
    this._validateStreamId(streamId);

    if (events.length === 0) {
      throw new EventStoreError("EMPTY_APPEND", "Cannot append zero events", streamId);
    }

    const existing = this._streams.get(streamId) ?? [];
    const fromVersion = existing.length + 1;
    const appendedAt = new Date().toISOString();

    // Build the whole batch before touching any stored state
    const batch: StoredEvent[] = [];
    let previousHash = this._lastHash;
    events.forEach((event, i) => {
      const content: StoredEventContent = {
        event,
        streamId,
        version: fromVersion + i,
        globalPosition: this._globalLog.length + i + 1,
        appendedAt,
      };
      const hash = computeEventHash(content, previousHash);
      batch.push({ ...content, hash, previousHash });
      previousHash = hash;
    });

    this._streams.set(streamId, [...existing, ...batch]);
    this._globalLog.push(...batch);
    this._lastHash = previousHash;

    return {
      streamId,
      fromVersion,
      toVersion: fromVersion + batch.length - 1,
      count: batch.length,
    };
  }

  // ─── Read ───────────────────────────────────────────────────────────

  read(streamId: string): readonly StoredEvent[] {
    this._validateStreamId(streamId);
    return [...(this._streams.get(streamId) ?? [])];
  }

  readAll(): readonly StoredEvent[] {
    return [...this._globalLog];
  }

  // ─── Integrity ──────────────────────────────────────────────────────

  verifyIntegrity(): EventStoreIntegrityResult {
    return verifyHashChain(this._globalLog);
  }

  // ─── Internal ───────────────────────────────────────────────────────

  private _validateStreamId(streamId: string): void {
    if (streamId.length === 0) {
      throw new EventStoreError("INVALID_STREAM_ID", "Stream ID must be a non-empty string");
    }
  }
}
