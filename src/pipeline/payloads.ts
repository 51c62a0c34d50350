import { z } from "zod";
import { DecodeError, EncodeError } from "./errors.js";
import type { MovementVector, ReadoutModel } from "./types.js";
import { ByteReader, MAX_PAYLOAD_SIZE } from "./wire-codec.js";

/**
 * Largest reservoir state a node may run. A model with five servo rows and a
 * dozen class rows over this many features still fits in one frame.
 */
export const MAX_STATE_DIM = 512;

export type VectorPayload = {
  vectors: MovementVector[];
  /** Activity label attached by the producer, carried to the trainer. */
  target?: number;
};

export type StatePayload = {
  state: number[];
  target?: number;
};

const MovementVectorSchema = z
  .object({
    regionId: z.string(),
    magnitude: z.number(),
    direction: z.number(),
    dx: z.number(),
    dy: z.number(),
    frameIndex: z.number().int(),
    timestampMs: z.number(),
  })
  .strict();

const VectorPayloadSchema = z
  .object({
    vectors: z.array(MovementVectorSchema),
    target: z.number().int().optional(),
  })
  .strict();

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder();

function parseJsonPayload<T>(bytes: Uint8Array, schema: z.ZodType<T>, kind: string): T {
  let parsed: unknown;
  try {
    parsed = JSON.parse(textDecoder.decode(bytes));
  } catch {
    throw new DecodeError("MALFORMED_PAYLOAD", `${kind} payload is not valid JSON`);
  }
  const result = schema.safeParse(parsed);
  if (!result.success) {
    throw new DecodeError("MALFORMED_PAYLOAD", `${kind} payload: ${result.error.issues[0]?.message ?? "invalid"}`);
  }
  return result.data;
}

export function encodeVectorPayload(payload: VectorPayload): Uint8Array {
  return textEncoder.encode(JSON.stringify(payload));
}

export function decodeVectorPayload(bytes: Uint8Array): VectorPayload {
  return parseJsonPayload(bytes, VectorPayloadSchema, "VECTOR");
}

/** STATE layout: u32 dim | f64[dim] | f64 target (NaN when absent). */
export function encodeStatePayload(payload: StatePayload): Uint8Array {
  const dim = payload.state.length;
  const bytes = new Uint8Array(4 + dim * 8 + 8);
  const view = new DataView(bytes.buffer);
  view.setUint32(0, dim);
  payload.state.forEach((value, i) => view.setFloat64(4 + i * 8, value));
  view.setFloat64(4 + dim * 8, payload.target ?? Number.NaN);
  return bytes;
}

export function decodeStatePayload(bytes: Uint8Array): StatePayload {
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  if (bytes.length < 4) {
    throw new DecodeError("TRUNCATED", "STATE payload missing dimension");
  }
  const dim = view.getUint32(0);
  if (bytes.length !== 4 + dim * 8 + 8) {
    throw new DecodeError("MALFORMED_PAYLOAD", `STATE payload length does not match dimension ${dim}`);
  }
  const state: number[] = [];
  for (let i = 0; i < dim; i++) {
    state.push(view.getFloat64(4 + i * 8));
  }
  const target = view.getFloat64(4 + dim * 8);
  return Number.isNaN(target) ? { state } : { state, target };
}

type Rows = ReadonlyArray<ReadonlyArray<number>>;

function rowsSize(rows: Rows): number {
  return rows.reduce((size, row) => size + 2 + row.length * 8, 2);
}

function writeRows(view: DataView, offset: number, rows: Rows): number {
  view.setUint16(offset, rows.length);
  let at = offset + 2;
  for (const row of rows) {
    view.setUint16(at, row.length);
    at += 2;
    for (const value of row) {
      view.setFloat64(at, value);
      at += 8;
    }
  }
  return at;
}

function readRows(reader: ByteReader, field: string): number[][] {
  const count = reader.u16(`${field} rows`);
  const rows: number[][] = [];
  for (let r = 0; r < count; r++) {
    const length = reader.u16(`${field} row ${r} length`);
    const row: number[] = [];
    for (let c = 0; c < length; c++) {
      const value = reader.f64(`${field}[${r}][${c}]`);
      if (!Number.isFinite(value)) {
        throw new DecodeError("MALFORMED_PAYLOAD", `MODEL_UPDATE payload: ${field}[${r}][${c}] is not finite`);
      }
      row.push(value);
    }
    rows.push(row);
  }
  return rows;
}

/**
 * MODEL_UPDATE layout (big-endian):
 *
 *   u32 updatesPerformed | f64 trainedAtMs
 *   | f64 accuracy | f64 precision | f64 recall | f64 f1 | u32 trainSize | u32 testSize
 *   | u16 classCount | f64[classCount] classes | rows weights | rows servoWeights
 *
 * where rows is `u16 count` followed by `u16 length | f64[length]` per row.
 * Throws EncodeError when the model does not fit in one frame.
 */
export function encodeModelPayload(model: ReadoutModel): Uint8Array {
  const size =
    4 + 8 + 4 * 8 + 4 + 4 + 2 + model.classes.length * 8 + rowsSize(model.weights) + rowsSize(model.servoWeights);
  if (size > MAX_PAYLOAD_SIZE) {
    throw new EncodeError(
      "PAYLOAD_TOO_LARGE",
      `MODEL_UPDATE payload of ${size} bytes exceeds ${MAX_PAYLOAD_SIZE}`,
    );
  }
  const bytes = new Uint8Array(size);
  const view = new DataView(bytes.buffer);
  const { metrics } = model;
  view.setUint32(0, model.updatesPerformed);
  view.setFloat64(4, model.trainedAtMs);
  view.setFloat64(12, metrics.accuracy);
  view.setFloat64(20, metrics.precision);
  view.setFloat64(28, metrics.recall);
  view.setFloat64(36, metrics.f1);
  view.setUint32(44, metrics.trainSize);
  view.setUint32(48, metrics.testSize);
  view.setUint16(52, model.classes.length);
  let offset = 54;
  for (const label of model.classes) {
    view.setFloat64(offset, label);
    offset += 8;
  }
  offset = writeRows(view, offset, model.weights);
  writeRows(view, offset, model.servoWeights);
  return bytes;
}

export function decodeModelPayload(bytes: Uint8Array): ReadoutModel {
  const reader = new ByteReader(bytes, "MODEL_UPDATE payload");
  const updatesPerformed = reader.u32("updatesPerformed");
  const trainedAtMs = reader.f64("trainedAtMs");
  const accuracy = reader.f64("accuracy");
  const precision = reader.f64("precision");
  const recall = reader.f64("recall");
  const f1 = reader.f64("f1");
  const trainSize = reader.u32("trainSize");
  const testSize = reader.u32("testSize");
  const classCount = reader.u16("class count");
  const classes: number[] = [];
  for (let i = 0; i < classCount; i++) {
    classes.push(reader.f64(`classes[${i}]`));
  }
  const weights = readRows(reader, "weights");
  const servoWeights = readRows(reader, "servoWeights");
  if (reader.remaining !== 0) {
    throw new DecodeError("MALFORMED_PAYLOAD", `MODEL_UPDATE payload has ${reader.remaining} trailing bytes`);
  }
  return {
    weights,
    classes,
    servoWeights,
    trainedAtMs,
    metrics: { accuracy, precision, recall, f1, trainSize, testSize },
    updatesPerformed,
  };
}
