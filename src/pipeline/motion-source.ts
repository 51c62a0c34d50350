import { readFile } from "node:fs/promises";
import { setTimeout as sleep } from "node:timers/promises";
import { z } from "zod";
import { createRng, type Rng } from "./rng.js";
import type { MovementVector, Region } from "./types.js";

/** Batches of movement vectors, one batch per processed frame. */
export type MotionVectorSource = AsyncIterable<MovementVector[]>;

/** Mean-magnitude boundaries between the low/medium/high/very-high activity classes. */
export const ACTIVITY_THRESHOLDS = [5, 15, 30] as const;

export function createMovementVector(params: {
  regionId: string;
  dx: number;
  dy: number;
  frameIndex: number;
  timestampMs: number;
}): MovementVector {
  return Object.freeze({
    regionId: params.regionId,
    magnitude: Math.hypot(params.dx, params.dy),
    direction: Math.atan2(params.dy, params.dx),
    dx: params.dx,
    dy: params.dy,
    frameIndex: params.frameIndex,
    timestampMs: params.timestampMs,
  });
}

/** Split a frame into a grid and return one region per cell, ids "r0".."rN". */
export function createGridRegions(params: {
  columns: number;
  rows: number;
  frameWidth: number;
  frameHeight: number;
}): Region[] {
  const cellWidth = params.frameWidth / params.columns;
  const cellHeight = params.frameHeight / params.rows;
  const regions: Region[] = [];
  for (let row = 0; row < params.rows; row++) {
    for (let col = 0; col < params.columns; col++) {
      regions.push(
        Object.freeze({
          id: `r${regions.length}`,
          cells: Object.freeze([Object.freeze([col, row] as const)]),
          bounds: Object.freeze({
            x: Math.round(col * cellWidth),
            y: Math.round(row * cellHeight),
            width: Math.round(cellWidth),
            height: Math.round(cellHeight),
          }),
        }),
      );
    }
  }
  return regions;
}

export function meanMagnitude(vectors: ReadonlyArray<MovementVector>): number {
  if (vectors.length === 0) {
    return 0;
  }
  return vectors.reduce((sum, v) => sum + v.magnitude, 0) / vectors.length;
}

/** Activity class 0..3 by mean magnitude against ACTIVITY_THRESHOLDS. */
export function labelActivity(vectors: ReadonlyArray<MovementVector>): number {
  const mean = meanMagnitude(vectors);
  return ACTIVITY_THRESHOLDS.filter((threshold) => mean >= threshold).length;
}

export type InputEncoding = {
  /** Region ids in input order. Vectors for other regions are ignored. */
  regionIds: ReadonlyArray<string>;
  /** Append t_sin/t_cos of the time of day. */
  timeFeatures: boolean;
};

export function inputDimension(encoding: InputEncoding): number {
  return encoding.regionIds.length + (encoding.timeFeatures ? 2 : 0);
}

/** Time of day as a point on the unit circle. */
export function timeOfDayFeatures(at: Date): [number, number] {
  const seconds = at.getHours() * 3600 + at.getMinutes() * 60 + at.getSeconds();
  const phase = (2 * Math.PI * seconds) / 86_400;
  return [Math.sin(phase), Math.cos(phase)];
}

/** One mean magnitude per region in encoding order, then the optional time features. */
export function toInputVector(
  vectors: ReadonlyArray<MovementVector>,
  encoding: InputEncoding,
  at: Date,
): number[] {
  const sums = new Map<string, { total: number; count: number }>();
  for (const vector of vectors) {
    const entry = sums.get(vector.regionId) ?? { total: 0, count: 0 };
    entry.total += vector.magnitude;
    entry.count += 1;
    sums.set(vector.regionId, entry);
  }
  const input = encoding.regionIds.map((id) => {
    const entry = sums.get(id);
    return entry ? entry.total / entry.count : 0;
  });
  if (encoding.timeFeatures) {
    input.push(...timeOfDayFeatures(at));
  }
  return input;
}

export type SyntheticMotionSourceOptions = {
  regions: ReadonlyArray<Pick<Region, "id">>;
  intervalMs?: number;
  /** Stop after this many batches. Default: unbounded. */
  maxBatches?: number;
  seed?: number;
  now?: () => number;
};

/**
 * Timer-driven stand-in for the camera pipeline. Activity drifts slowly so
 * every activity class shows up over a long enough run.
 */
export class SyntheticMotionSource implements MotionVectorSource {
  private readonly rng: Rng;
  private readonly abort = new AbortController();
  private frameIndex = 0;
  private level = 10;

  constructor(private readonly opts: SyntheticMotionSourceOptions) {
    this.rng = createRng(opts.seed ?? 7);
  }

  /** Next batch without waiting. */
  nextBatch(): MovementVector[] {
    const now = (this.opts.now ?? Date.now)();
    this.level = Math.max(0, Math.min(40, this.level + (this.rng() - 0.5) * 8));
    const frameIndex = this.frameIndex;
    this.frameIndex += 1;
    return this.opts.regions.map((region) => {
      const magnitude = this.level * (0.5 + this.rng());
      const direction = this.rng() * 2 * Math.PI;
      return createMovementVector({
        regionId: region.id,
        dx: magnitude * Math.cos(direction),
        dy: magnitude * Math.sin(direction),
        frameIndex,
        timestampMs: now,
      });
    });
  }

  stop(): void {
    this.abort.abort();
  }

  async *[Symbol.asyncIterator](): AsyncIterator<MovementVector[]> {
    const intervalMs = this.opts.intervalMs ?? 100;
    const limit = this.opts.maxBatches ?? Number.POSITIVE_INFINITY;
    let produced = 0;
    while (produced < limit && !this.abort.signal.aborted) {
      try {
        await sleep(intervalMs, undefined, { signal: this.abort.signal });
      } catch (err) {
        if (this.abort.signal.aborted) {
          return;
        }
        throw err;
      }
      produced += 1;
      yield this.nextBatch();
    }
  }
}

const RecordedVectorSchema = z
  .object({
    regionId: z.string(),
    dx: z.number(),
    dy: z.number(),
    frameIndex: z.number().int(),
    timestampMs: z.number(),
  })
  .strict();

const RecordingSchema = z
  .object({
    batches: z.array(z.array(RecordedVectorSchema)),
  })
  .strict();

/** Load recorded movement batches from a JSON file `{ "batches": [[{regionId, dx, dy, frameIndex, timestampMs}]] }`. */
export async function loadMotionRecording(path: string): Promise<MovementVector[][]> {
  const raw: unknown = JSON.parse(await readFile(path, "utf8"));
  const parsed = RecordingSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`invalid motion recording ${path}: ${issue?.path.join(".") ?? ""} ${issue?.message ?? ""}`);
  }
  return parsed.data.batches.map((batch) => batch.map((vector) => createMovementVector(vector)));
}

export type ReplayMotionSourceOptions = {
  batches: ReadonlyArray<ReadonlyArray<MovementVector>>;
  /** Delay between batches. Default: 0. */
  intervalMs?: number;
  /** Start over after the last batch. Default: false. */
  loop?: boolean;
};

/** Replays recorded batches, as the builder role does with stored movement data. */
export class ReplayMotionSource implements MotionVectorSource {
  private readonly abort = new AbortController();

  constructor(private readonly opts: ReplayMotionSourceOptions) {}

  static async fromFile(
    path: string,
    opts: Omit<ReplayMotionSourceOptions, "batches"> = {},
  ): Promise<ReplayMotionSource> {
    return new ReplayMotionSource({ ...opts, batches: await loadMotionRecording(path) });
  }

  stop(): void {
    this.abort.abort();
  }

  async *[Symbol.asyncIterator](): AsyncIterator<MovementVector[]> {
    const intervalMs = this.opts.intervalMs ?? 0;
    if (this.opts.batches.length === 0) {
      return;
    }
    do {
      for (const batch of this.opts.batches) {
        if (this.abort.signal.aborted) {
          return;
        }
        // A 0ms sleep still yields to timers and I/O between batches.
        try {
          await sleep(intervalMs, undefined, { signal: this.abort.signal });
        } catch (err) {
          if (this.abort.signal.aborted) {
            return;
          }
          throw err;
        }
        yield [...batch];
      }
    } while (this.opts.loop && !this.abort.signal.aborted);
  }
}
