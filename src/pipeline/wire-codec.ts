import { createHash } from "node:crypto";
import { DecodeError, EncodeError } from "./errors.js";
import { PAYLOAD_TYPES, type Message, type PayloadType } from "./types.js";

/**
 * Frame layout (v2, big-endian):
 *
 *   version u8 | epoch u32 | sourceId (u8 len + utf8) | destinationId (u8 len + utf8)
 *   | sequence u32 | payloadType u8 | createdAtMs f64
 *   | payload (u32 len + bytes) | checksum u32
 *
 * The checksum is the first four bytes of SHA-256 over everything before it.
 * Deployed nodes depend on this field order; bump WIRE_VERSION for any change.
 * v2 added the sender epoch.
 */
export const WIRE_VERSION = 2;
export const MAX_PAYLOAD_SIZE = 64 * 1024;
const MAX_ID_BYTES = 255;
const CHECKSUM_BYTES = 4;

export type DecodeResult = { ok: true; message: Message } | { ok: false; error: DecodeError };

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder("utf-8", { fatal: true });

export function frameChecksum(bytes: Uint8Array): number {
  const digest = createHash("sha256").update(bytes).digest();
  return digest.readUInt32BE(0);
}

function encodeId(field: string, value: string): Uint8Array {
  const bytes = textEncoder.encode(value);
  if (bytes.length > MAX_ID_BYTES) {
    throw new EncodeError("ID_TOO_LONG", `${field} exceeds ${MAX_ID_BYTES} bytes`);
  }
  return bytes;
}

function isU32(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= 0xffff_ffff;
}

/** Throws EncodeError when the message cannot be framed. */
export function encodeMessage(message: Message): Uint8Array {
  if (message.payload.length > MAX_PAYLOAD_SIZE) {
    throw new EncodeError(
      "PAYLOAD_TOO_LARGE",
      `payload exceeds ${MAX_PAYLOAD_SIZE} bytes (${message.payload.length})`,
    );
  }
  if (!isU32(message.sequence)) {
    throw new EncodeError("SEQUENCE_OUT_OF_RANGE", `sequence out of range: ${message.sequence}`);
  }
  if (!isU32(message.epoch)) {
    throw new EncodeError("EPOCH_OUT_OF_RANGE", `epoch out of range: ${message.epoch}`);
  }
  const source = encodeId("sourceId", message.sourceId);
  const destination = encodeId("destinationId", message.destinationId);
  const bodyLength =
    1 + 4 + 1 + source.length + 1 + destination.length + 4 + 1 + 8 + 4 + message.payload.length;

  const frame = new Uint8Array(bodyLength + CHECKSUM_BYTES);
  const view = new DataView(frame.buffer);
  let offset = 0;

  view.setUint8(offset, WIRE_VERSION);
  offset += 1;
  view.setUint32(offset, message.epoch);
  offset += 4;
  view.setUint8(offset, source.length);
  offset += 1;
  frame.set(source, offset);
  offset += source.length;
  view.setUint8(offset, destination.length);
  offset += 1;
  frame.set(destination, offset);
  offset += destination.length;
  view.setUint32(offset, message.sequence);
  offset += 4;
  view.setUint8(offset, PAYLOAD_TYPES.indexOf(message.payloadType));
  offset += 1;
  view.setFloat64(offset, message.createdAtMs);
  offset += 8;
  view.setUint32(offset, message.payload.length);
  offset += 4;
  frame.set(message.payload, offset);
  offset += message.payload.length;

  view.setUint32(offset, frameChecksum(frame.subarray(0, offset)));
  return frame;
}

/** Big-endian cursor over a frame or payload. Running short throws DecodeError TRUNCATED. */
export class ByteReader {
  private offset = 0;
  private readonly view: DataView;

  constructor(
    private readonly bytes: Uint8Array,
    private readonly what = "frame",
  ) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get remaining(): number {
    return this.bytes.length - this.offset;
  }

  get position(): number {
    return this.offset;
  }

  private need(count: number, field: string): void {
    if (this.offset + count > this.bytes.length) {
      throw new DecodeError("TRUNCATED", `truncated ${this.what} while reading ${field}`);
    }
  }

  u8(field: string): number {
    this.need(1, field);
    const value = this.view.getUint8(this.offset);
    this.offset += 1;
    return value;
  }

  u16(field: string): number {
    this.need(2, field);
    const value = this.view.getUint16(this.offset);
    this.offset += 2;
    return value;
  }

  u32(field: string): number {
    this.need(4, field);
    const value = this.view.getUint32(this.offset);
    this.offset += 4;
    return value;
  }

  f64(field: string): number {
    this.need(8, field);
    const value = this.view.getFloat64(this.offset);
    this.offset += 8;
    return value;
  }

  bytesOf(count: number, field: string): Uint8Array {
    this.need(count, field);
    const slice = this.bytes.slice(this.offset, this.offset + count);
    this.offset += count;
    return slice;
  }

  utf8(field: string): string {
    const length = this.u8(`${field} length`);
    const raw = this.bytesOf(length, field);
    try {
      return textDecoder.decode(raw);
    } catch {
      throw new DecodeError("MALFORMED_PAYLOAD", `${field} is not valid utf-8`);
    }
  }
}

function isPayloadTypeIndex(index: number): boolean {
  return index >= 0 && index < PAYLOAD_TYPES.length;
}

function readFrame(bytes: Uint8Array): Message {
  const reader = new ByteReader(bytes);
  const version = reader.u8("version");
  if (version !== WIRE_VERSION) {
    throw new DecodeError("UNKNOWN_VERSION", `unsupported wire version ${version}`);
  }
  const epoch = reader.u32("epoch");
  const sourceId = reader.utf8("sourceId");
  const destinationId = reader.utf8("destinationId");
  const sequence = reader.u32("sequence");
  const typeIndex = reader.u8("payloadType");
  if (!isPayloadTypeIndex(typeIndex)) {
    throw new DecodeError("UNKNOWN_PAYLOAD_TYPE", `unknown payload type ${typeIndex}`);
  }
  const payloadType: PayloadType = PAYLOAD_TYPES[typeIndex];
  const createdAtMs = reader.f64("createdAtMs");
  const payloadLength = reader.u32("payload length");
  if (payloadLength > MAX_PAYLOAD_SIZE) {
    throw new DecodeError("PAYLOAD_TOO_LARGE", `payload length ${payloadLength} exceeds limit`);
  }
  const payload = reader.bytesOf(payloadLength, "payload");

  const bodyEnd = reader.position;
  const checksum = reader.u32("checksum");
  if (reader.position !== bytes.length) {
    throw new DecodeError("TRAILING_BYTES", `${bytes.length - reader.position} unexpected trailing bytes`);
  }
  if (frameChecksum(bytes.subarray(0, bodyEnd)) !== checksum) {
    throw new DecodeError("CHECKSUM_MISMATCH", "frame checksum mismatch");
  }

  return { sourceId, destinationId, epoch, sequence, payloadType, payload, createdAtMs };
}

export function decodeMessage(bytes: Uint8Array): DecodeResult {
  try {
    return { ok: true, message: readFrame(bytes) };
  } catch (err) {
    if (err instanceof DecodeError) {
      return { ok: false, error: err };
    }
    throw err;
  }
}
