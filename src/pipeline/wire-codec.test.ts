import { describe, expect, it } from "vitest";
import { EncodeError } from "./errors.js";
import type { Message } from "./types.js";
import { decodeMessage, encodeMessage, MAX_PAYLOAD_SIZE, WIRE_VERSION } from "./wire-codec.js";

function message(overrides: Partial<Message> = {}): Message {
  return {
    sourceId: "a",
    destinationId: "b",
    epoch: 0xdead_beef,
    sequence: 7,
    payloadType: "STATE",
    payload: new Uint8Array([1, 2, 3]),
    createdAtMs: 1_700_000_000_123,
    ...overrides,
  };
}

function decodeErrorCode(bytes: Uint8Array): string | null {
  const result = decodeMessage(bytes);
  return result.ok ? null : result.error.code;
}

// Offsets for sourceId "a" and destinationId "b".
const EPOCH_OFFSET = 1;
const TYPE_OFFSET = 13;
const PAYLOAD_LENGTH_OFFSET = 22;
const PAYLOAD_OFFSET = 26;

describe("wire codec", () => {
  it("round-trips every field", () => {
    const original = message({ sourceId: "res00", destinationId: "res01", epoch: 0, sequence: 0xffff_ffff });
    const result = decodeMessage(encodeMessage(original));

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.message).toEqual(original);
    }
  });

  it("round-trips empty and maximum-size payloads", () => {
    const empty = message({ payloadType: "ACK", payload: new Uint8Array(0) });
    const max = message({ payloadType: "VECTOR", payload: new Uint8Array(MAX_PAYLOAD_SIZE).fill(0xab) });

    const decodedEmpty = decodeMessage(encodeMessage(empty));
    const decodedMax = decodeMessage(encodeMessage(max));

    expect(decodedEmpty.ok && decodedEmpty.message.payload.length).toBe(0);
    expect(decodedMax.ok && decodedMax.message.payload).toEqual(max.payload);
  });

  it("writes the version byte first, then the sender epoch", () => {
    const frame = encodeMessage(message());
    expect(frame[0]).toBe(WIRE_VERSION);
    expect(new DataView(frame.buffer).getUint32(EPOCH_OFFSET)).toBe(0xdead_beef);
  });

  it("refuses to encode an oversized payload", () => {
    const oversized = message({ payload: new Uint8Array(MAX_PAYLOAD_SIZE + 1) });
    expect(() => encodeMessage(oversized)).toThrow(EncodeError);
    expect(() => encodeMessage(oversized)).toThrow(`payload exceeds ${MAX_PAYLOAD_SIZE} bytes (65537)`);
  });

  it("refuses to encode a negative sequence or a fractional epoch", () => {
    expect(() => encodeMessage(message({ sequence: -1 }))).toThrow(/sequence out of range/);
    expect(() => encodeMessage(message({ epoch: 1.5 }))).toThrow(/epoch out of range/);
  });

  it("rejects a corrupted payload byte", () => {
    const frame = encodeMessage(message());
    frame[PAYLOAD_OFFSET] ^= 0xff;
    expect(decodeErrorCode(frame)).toBe("CHECKSUM_MISMATCH");
  });

  it("rejects truncated frames", () => {
    const frame = encodeMessage(message());
    expect(decodeErrorCode(frame.subarray(0, frame.length - 1))).toBe("TRUNCATED");
    expect(decodeErrorCode(new Uint8Array(0))).toBe("TRUNCATED");
  });

  it("rejects trailing bytes", () => {
    const frame = encodeMessage(message());
    const padded = new Uint8Array(frame.length + 1);
    padded.set(frame);
    expect(decodeErrorCode(padded)).toBe("TRAILING_BYTES");
  });

  it("rejects an unknown version before checking anything else", () => {
    const frame = encodeMessage(message());
    frame[0] = 1;
    expect(decodeErrorCode(frame)).toBe("UNKNOWN_VERSION");
  });

  it("rejects an unknown payload type", () => {
    const frame = encodeMessage(message());
    expect(frame[TYPE_OFFSET]).toBe(1);
    frame[TYPE_OFFSET] = 9;
    expect(decodeErrorCode(frame)).toBe("UNKNOWN_PAYLOAD_TYPE");
  });

  it("rejects a declared payload length over the limit", () => {
    const frame = encodeMessage(message());
    new DataView(frame.buffer).setUint32(PAYLOAD_LENGTH_OFFSET, MAX_PAYLOAD_SIZE + 1);
    expect(decodeErrorCode(frame)).toBe("PAYLOAD_TOO_LARGE");
  });
});
