/**
 * Runtime type guard tests for @tracebound/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject invalid / malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import {
  isHex,
  isAddressLike,
  isBytes32,
  isZeroAddress,
  isZeroBytes32,
  isEventMetadata,
  isDomainEvent,
  isTraceHop,
} from "../src/guards.js";
import { ZERO_ADDRESS, ZERO_BYTES32 } from "../src/primitives.js";
import { ProtocolError, protocolErrorCode } from "../src/errors.js";

const TOKEN = `0x${"ab".repeat(32)}` as const;
const AUTHORITY = "0x1000000000000000000000000000000000000001";

// =============================================================================
// Hex guards
// =============================================================================

describe("isHex", () => {
  it("accepts the empty byte string", () => {
    expect(isHex("0x")).toBe(true);
  });

  it("accepts mixed-case whole bytes", () => {
    expect(isHex("0xdeadBEEF")).toBe(true);
  });

  it("rejects odd-length hex", () => {
    expect(isHex("0xabc")).toBe(false);
  });

  it("rejects missing prefix and non-strings", () => {
    expect(isHex("abcd")).toBe(false);
    expect(isHex(42)).toBe(false);
    expect(isHex(null)).toBe(false);
  });
});

describe("isAddressLike", () => {
  it("accepts a 20-byte hex address", () => {
    expect(isAddressLike(AUTHORITY)).toBe(true);
  });

  it("rejects a 19-byte value", () => {
    expect(isAddressLike("0x10000000000000000000000000000000000001")).toBe(false);
  });
});

describe("isBytes32", () => {
  it("accepts 32 bytes", () => {
    expect(isBytes32(TOKEN)).toBe(true);
  });

  it("rejects an address", () => {
    expect(isBytes32(AUTHORITY)).toBe(false);
  });
});

describe("zero checks", () => {
  it("recognizes the zero address in any case", () => {
    expect(isZeroAddress(ZERO_ADDRESS)).toBe(true);
    expect(isZeroAddress(AUTHORITY)).toBe(false);
  });

  it("recognizes the zero token", () => {
    expect(isZeroBytes32(ZERO_BYTES32)).toBe(true);
    expect(isZeroBytes32(TOKEN)).toBe(false);
  });
});

// =============================================================================
// Event guards
// =============================================================================

const metadata = {
  eventId: "evt-1",
  timestamp: "2026-01-01T00:00:00.000Z",
  actor: AUTHORITY,
  correlationId: TOKEN,
  source: "review",
};

describe("isEventMetadata", () => {
  it("accepts valid metadata", () => {
    expect(isEventMetadata(metadata)).toBe(true);
  });

  it("rejects an unknown source", () => {
    expect(isEventMetadata({ ...metadata, source: "vault" })).toBe(false);
  });

  it("rejects missing correlationId", () => {
    const { correlationId: _omit, ...rest } = metadata;
    expect(isEventMetadata(rest)).toBe(false);
  });
});

describe("isDomainEvent", () => {
  it("accepts a well-formed event", () => {
    expect(
      isDomainEvent({ type: "workflow.request.created", metadata, payload: {} }),
    ).toBe(true);
  });

  it("rejects a null payload", () => {
    expect(
      isDomainEvent({ type: "workflow.request.created", metadata, payload: null }),
    ).toBe(false);
  });
});

// =============================================================================
// Trace guards
// =============================================================================

describe("isTraceHop", () => {
  const hop = {
    correlationToken: TOKEN,
    authority: AUTHORITY,
    identityId: 0,
    action: "reviewRequested",
    timestamp: "2026-01-01T00:00:00.000Z",
    position: 1,
  };

  it("accepts a hop with identityId 0", () => {
    expect(isTraceHop(hop)).toBe(true);
  });

  it("rejects a negative identityId", () => {
    expect(isTraceHop({ ...hop, identityId: -1 })).toBe(false);
  });

  it("rejects a short token", () => {
    expect(isTraceHop({ ...hop, correlationToken: "0x01" })).toBe(false);
  });
});

// =============================================================================
// Errors
// =============================================================================

describe("protocolErrorCode", () => {
  it("reads the code from a ProtocolError", () => {
    expect(protocolErrorCode(new ProtocolError("INVALID_STATE", "done"))).toBe(
      "INVALID_STATE",
    );
  });

  it("reads the code from a plain error-like object", () => {
    expect(protocolErrorCode({ code: "UNAUTHORIZED", message: "no" })).toBe(
      "UNAUTHORIZED",
    );
  });

  it("ignores foreign codes", () => {
    expect(protocolErrorCode({ code: "ECONNRESET" })).toBeUndefined();
    expect(protocolErrorCode("INVALID_STATE")).toBeUndefined();
  });
});
