/**
 * Tests for the notification log hash chain.
 */

import { describe, it, expect } from "vitest";
import type { DomainEvent } from "@lpvault/types";
import { InMemoryEventStore } from "../src/in-memory-store.js";
import { computeEventHash, verifyHashChain, GENESIS_HASH } from "../src/hash-chain.js";
import type { StoredEvent, StoredEventContent } from "../src/types.js";

function makeEvent(type: string, payload: Record<string, unknown> = {}): DomainEvent {
  return {
    type,
    metadata: {
      eventId: `evt-${type}`,
      timestamp: "2026-01-01T00:00:00.000Z",
      actor: "tester",
      correlationId: "op-1",
      source: "vault",
    },
    payload,
  };
}

const CONTENT: StoredEventContent = {
  event: makeEvent("fee.taken", { fee0: "10" }),
  streamId: "vault:a",
  version: 1,
  globalPosition: 1,
  appendedAt: "2026-01-01T00:00:00.000Z",
};

// =============================================================================
// computeEventHash
// =============================================================================

describe("computeEventHash", () => {
  it("produces a 64-char hex string", () => {
    expect(computeEventHash(CONTENT, GENESIS_HASH)).toMatch(/^[0-9a-f]{64}$/);
  });

  it("is deterministic for the same input", () => {
    expect(computeEventHash(CONTENT, GENESIS_HASH)).toBe(
      computeEventHash(CONTENT, GENESIS_HASH),
    );
  });

  it("changes when the payload changes", () => {
    const altered: StoredEventContent = {
      ...CONTENT,
      event: makeEvent("fee.taken", { fee0: "11" }),
    };
    expect(computeEventHash(altered, GENESIS_HASH)).not.toBe(
      computeEventHash(CONTENT, GENESIS_HASH),
    );
  });

  it("changes when the predecessor changes", () => {
    expect(computeEventHash(CONTENT, "other")).not.toBe(
      computeEventHash(CONTENT, GENESIS_HASH),
    );
  });

  it("ignores key order in payloads", () => {
    const a: StoredEventContent = { ...CONTENT, event: makeEvent("x", { a: "1", b: "2" }) };
    const b: StoredEventContent = { ...CONTENT, event: makeEvent("x", { b: "2", a: "1" }) };
    expect(computeEventHash(a, GENESIS_HASH)).toBe(computeEventHash(b, GENESIS_HASH));
  });
});

// =============================================================================
// verifyHashChain
// =============================================================================

describe("verifyHashChain", () => {
  it("accepts an empty log", () => {
    expect(verifyHashChain([])).toEqual({
      valid: true,
      lastVerifiedPosition: 0,
      errors: [],
    });
  });

  it("accepts the chain an in-memory store produces", () => {
    const store = new InMemoryEventStore();
    store.append("vault:a", [makeEvent("deposited"), makeEvent("position.opened")]);
    store.append("vault:b", [makeEvent("deposited")]);

    const result = store.verifyIntegrity();

    expect(result.valid).toBe(true);
    expect(result.lastVerifiedPosition).toBe(3);
  });

  it("links the first event to the genesis hash", () => {
    const store = new InMemoryEventStore();
    store.append("vault:a", [makeEvent("deposited"), makeEvent("withdrawn")]);

    const [first, second] = store.readAll();
    expect(first!.previousHash).toBe(GENESIS_HASH);
    expect(second!.previousHash).toBe(first!.hash);
  });

  it("detects a tampered payload", () => {
    const store = new InMemoryEventStore();
    store.append("vault:a", [
      makeEvent("fee.taken", { fee0: "10" }),
      makeEvent("withdrawn"),
    ]);
    const [first, second] = store.readAll();
    const tampered: StoredEvent = {
      ...first!,
      event: makeEvent("fee.taken", { fee0: "0" }),
    };

    const result = verifyHashChain([tampered, second!]);

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      { position: 1, reason: "Hash mismatch at position 1" },
    ]);
    expect(result.lastVerifiedPosition).toBe(0);
  });

  it("detects a removed event", () => {
    const store = new InMemoryEventStore();
    store.append("vault:a", [makeEvent("e1"), makeEvent("e2"), makeEvent("e3")]);
    const [first, , third] = store.readAll();

    const result = verifyHashChain([first!, third!]);

    expect(result.valid).toBe(false);
    expect(result.errors[0]!.position).toBe(3);
    expect(result.lastVerifiedPosition).toBe(1);
  });
});
