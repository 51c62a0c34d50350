import type { ReadoutModel, TrainingMetrics } from "./types.js";

export const EMPTY_METRICS: Readonly<TrainingMetrics> = Object.freeze({
  accuracy: 0,
  precision: 0,
  recall: 0,
  f1: 0,
  trainSize: 0,
  testSize: 0,
});

/** Cube servos driven by the servo readout. */
export const SERVO_OUTPUTS = 5;

type Rows = ReadonlyArray<ReadonlyArray<number>>;

function freezeRows(rows: Rows): Rows {
  return Object.freeze(rows.map((row) => Object.freeze([...row])));
}

export function freezeModel(model: ReadoutModel): ReadoutModel {
  return Object.freeze({
    weights: freezeRows(model.weights),
    classes: Object.freeze([...model.classes]),
    servoWeights: freezeRows(model.servoWeights),
    trainedAtMs: model.trainedAtMs,
    metrics: Object.freeze({ ...model.metrics }),
    updatesPerformed: model.updatesPerformed,
  });
}

function identityRows(stateDim: number, outputs: number): number[][] {
  const rows: number[][] = [];
  for (let o = 0; o < outputs; o++) {
    const row = new Array<number>(stateDim + 1).fill(0);
    if (o < stateDim) {
      row[o] = 1;
    }
    rows.push(row);
  }
  return rows;
}

/**
 * Untrained readout that passes the first `outputs` state components through,
 * on both the class rows and the servo rows. Used until the first model update
 * arrives.
 */
export function createIdentityReadout(stateDim: number, outputs = SERVO_OUTPUTS): ReadoutModel {
  return freezeModel({
    weights: identityRows(stateDim, outputs),
    classes: [],
    servoWeights: identityRows(stateDim, outputs),
    trainedAtMs: 0,
    metrics: EMPTY_METRICS,
    updatesPerformed: 0,
  });
}

function applyRows(rows: Rows, state: ReadonlyArray<number>): number[] {
  return rows.map((row) => {
    const features = row.length - 1;
    let sum = row[features] ?? 0;
    for (let j = 0; j < features; j++) {
      sum += row[j] * (state[j] ?? 0);
    }
    return sum;
  });
}

/** Class scores, one per weight row; the last entry of each row is the bias. */
export function applyReadout(model: ReadoutModel, state: ReadonlyArray<number>): number[] {
  return applyRows(model.weights, state);
}

/** One output per servo row. */
export function applyServoReadout(model: ReadoutModel, state: ReadonlyArray<number>): number[] {
  return applyRows(model.servoWeights, state);
}

export function argmax(values: ReadonlyArray<number>): number {
  let best = 0;
  for (let i = 1; i < values.length; i++) {
    if (values[i] > values[best]) {
      best = i;
    }
  }
  return best;
}

/** Class label with the highest score, or the output index for untrained readouts. */
export function predictClass(model: ReadoutModel, state: ReadonlyArray<number>): number {
  const index = argmax(applyReadout(model, state));
  return model.classes[index] ?? index;
}

/**
 * Holds the active readout. Models are frozen and replaced by reference, so a
 * reader never sees a half-installed model.
 */
export class ModelHolder {
  private model: ReadoutModel;

  constructor(initial: ReadoutModel) {
    this.model = freezeModel(initial);
  }

  get current(): ReadoutModel {
    return this.model;
  }

  /**
   * Install a model if it is newer than the active one. Returns false for
   * stale or repeated updates.
   */
  install(model: ReadoutModel): boolean {
    if (model.updatesPerformed <= this.model.updatesPerformed) {
      return false;
    }
    this.model = freezeModel(model);
    return true;
  }
}
