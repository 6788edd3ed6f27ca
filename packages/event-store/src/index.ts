/**
 * @lpvault/event-store — Append-only notification log.
 *
 * Provides:
 * - EventStore interface for append-only event streams
 * - InMemoryEventStore with a SHA-256 hash chain
 * - The catalog of vault, factory and registry notifications
 *
 * @packageDocumentation
 */

// Core types
export type {
  StoredEvent,
  StoredEventContent,
  AppendResult,
  EventStore,
  EventStoreErrorCode,
  IntegrityError,
  EventStoreIntegrityResult,
} from "./types.js";
export { EventStoreError } from "./types.js";

// Hash chain
export { computeEventHash, verifyHashChain, GENESIS_HASH } from "./hash-chain.js";

// Implementation
export { InMemoryEventStore } from "./in-memory-store.js";

// Domain events
export {
  EVENT_SOURCES,
  createEvent,
  isEventOfType,
  streamIdFor,
} from "./vault-events.js";
export type {
  EventPayloads,
  EventType,
  TypedEvent,
  ManagerChangedPayload,
  DepositedPayload,
  WithdrawnPayload,
  NativeWithdrawnPayload,
  PositionOpenedPayload,
  LiquidityChangedPayload,
  PositionBurnedPayload,
  PositionClosedPayload,
  FeeTakenPayload,
  RebalancedPayload,
  UnwrapPreferenceChangedPayload,
  VaultCreatedPayload,
  ProtocolFeesChangedPayload,
  ManagerApprovalChangedPayload,
} from "./vault-events.js";
