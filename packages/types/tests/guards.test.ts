/**
 * Runtime type guard tests for @multicustody/types
 *
 * Guards must accept well-formed values and reject malformed ones at
 * system boundaries.
 */
import { describe, it, expect } from "vitest";
import { isRecord, isDomainEvent } from "../src/guards.js";

// =============================================================================
// Records
// =============================================================================

describe("isRecord", () => {
  it("accepts plain objects", () => {
    expect(isRecord({})).toBe(true);
  });

  it("rejects arrays, null and primitives", () => {
    expect(isRecord([])).toBe(false);
    expect(isRecord(null)).toBe(false);
    expect(isRecord("x")).toBe(false);
  });
});

// =============================================================================
// Events
// =============================================================================

describe("isDomainEvent", () => {
  const metadata = {
    eventId: "evt-1",
    timestamp: "2026-01-01T00:00:00Z",
    actor: "rA",
    correlationId: "proposal-0",
    source: "approval",
  };

  it("accepts a valid event", () => {
    expect(isDomainEvent({ type: "approval.submission", metadata, payload: {} })).toBe(true);
  });

  it("rejects a null payload", () => {
    expect(isDomainEvent({ type: "approval.submission", metadata, payload: null })).toBe(false);
  });

  it("rejects metadata from an unknown source", () => {
    expect(isDomainEvent({ type: "approval.submission", metadata: { ...metadata, source: "vault" }, payload: {} })).toBe(false);
  });

  it("rejects incomplete metadata", () => {
    const { correlationId: _correlation, ...partial } = metadata;
    expect(isDomainEvent({ type: "approval.submission", metadata: partial, payload: {} })).toBe(false);
  });
});
