import { type Matrix, matVec, spectralNorm } from "./linalg.js";
import { createRng } from "./rng.js";

/** Inputs are clipped to ±INPUT_LIMIT before the weight product. */
export const INPUT_LIMIT = 1e9;

export type ReservoirParams = {
  inputDim: number;
  stateDim: number;
  /** Leak rate in (0, 1]. Default: 0.3. */
  leakRate?: number;
  /** Target spectral norm of W_res. Default: 0.9. */
  spectralNorm?: number;
  /** Input weights are drawn from ±inputScale. Default: 1. */
  inputScale?: number;
  seed: number;
};

export type Reservoir = {
  readonly inputDim: number;
  readonly stateDim: number;
  readonly leakRate: number;
  /** stateDim × inputDim */
  readonly win: Matrix;
  /** stateDim × stateDim */
  readonly wres: Matrix;
};

function freezeMatrix(rows: number[][]): Matrix {
  return Object.freeze(rows.map((row) => Object.freeze(row)));
}

function randomMatrix(r: number, c: number, draw: () => number): number[][] {
  const out: number[][] = [];
  for (let i = 0; i < r; i++) {
    const row: number[] = [];
    for (let j = 0; j < c; j++) {
      row.push(draw());
    }
    out.push(row);
  }
  return out;
}

/** Build a reservoir from explicit weights (validated and frozen). */
export function defineReservoir(params: { win: number[][]; wres: number[][]; leakRate: number }): Reservoir {
  const stateDim = params.wres.length;
  if (stateDim === 0) {
    throw new Error("reservoir needs at least one state component");
  }
  if (params.wres.some((row) => row.length !== stateDim)) {
    throw new Error("W_res must be square");
  }
  if (params.win.length !== stateDim) {
    throw new Error(`W_in must have ${stateDim} rows`);
  }
  const inputDim = params.win[0].length;
  if (params.win.some((row) => row.length !== inputDim)) {
    throw new Error("W_in rows must have equal length");
  }
  if (!(params.leakRate > 0 && params.leakRate <= 1)) {
    throw new Error(`leak rate must be in (0, 1], got ${params.leakRate}`);
  }
  return Object.freeze({
    inputDim,
    stateDim,
    leakRate: params.leakRate,
    win: freezeMatrix(params.win.map((row) => [...row])),
    wres: freezeMatrix(params.wres.map((row) => [...row])),
  });
}

/** Seeded random reservoir with W_res rescaled to the target spectral norm. */
export function createReservoir(params: ReservoirParams): Reservoir {
  const rng = createRng(params.seed);
  const inputScale = params.inputScale ?? 1;
  const uniform = () => rng() * 2 - 1;

  const win = randomMatrix(params.stateDim, params.inputDim, () => uniform() * inputScale);
  const wres = randomMatrix(params.stateDim, params.stateDim, uniform);
  const sigma = spectralNorm(wres);
  const target = params.spectralNorm ?? 0.9;
  const scale = sigma > 0 ? target / sigma : 0;

  return defineReservoir({
    win,
    wres: wres.map((row) => row.map((x) => x * scale)),
    leakRate: params.leakRate ?? 0.3,
  });
}

/**
 * Fit an input to `dim` components: NaN becomes 0, ±Infinity and huge
 * magnitudes are clipped, short inputs are zero-padded and long ones truncated.
 */
export function sanitizeInput(input: ReadonlyArray<number>, dim: number): number[] {
  const out = new Array<number>(dim).fill(0);
  for (let i = 0; i < dim && i < input.length; i++) {
    const value = input[i];
    out[i] = Number.isNaN(value) ? 0 : Math.max(-INPUT_LIMIT, Math.min(INPUT_LIMIT, value));
  }
  return out;
}

export function zeroState(reservoir: Reservoir): number[] {
  return new Array<number>(reservoir.stateDim).fill(0);
}

/** state' = (1 - leak)·state + leak·tanh(W_in·u + W_res·state) */
export function stepReservoir(
  reservoir: Reservoir,
  state: ReadonlyArray<number>,
  input: ReadonlyArray<number>,
): number[] {
  const u = sanitizeInput(input, reservoir.inputDim);
  const x = sanitizeInput(state, reservoir.stateDim).map(clampUnit);
  const drive = matVec(reservoir.win, u);
  const recur = matVec(reservoir.wres, x);
  const leak = reservoir.leakRate;
  return x.map((xi, i) => clampUnit((1 - leak) * xi + leak * Math.tanh(drive[i] + recur[i])));
}

export function clampUnit(value: number): number {
  if (Number.isNaN(value)) {
    return 0;
  }
  return Math.max(-1, Math.min(1, value));
}
