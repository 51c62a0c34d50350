import type { RawData } from "ws";

export function rawDataToBytes(raw: RawData): Uint8Array {
  if (Array.isArray(raw)) {
    return new Uint8Array(Buffer.concat(raw));
  }
  if (raw instanceof ArrayBuffer) {
    return new Uint8Array(raw);
  }
  return new Uint8Array(raw.buffer, raw.byteOffset, raw.byteLength);
}
