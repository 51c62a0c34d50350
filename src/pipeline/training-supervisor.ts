import { EventEmitter } from "node:events";
import { EmptyTrainingSplit } from "./errors.js";
import { ridgeRegression } from "./linalg.js";
import { ACTIVITY_THRESHOLDS } from "./motion-source.js";
import { type ModelHolder, predictClass, SERVO_OUTPUTS } from "./readout.js";
import { TrainingBuffer } from "./training-buffer.js";
import type { PipelineLogger, ReadoutModel, TrainingExample, TrainingMetrics } from "./types.js";

export type TrainingSupervisorOptions = {
  models: ModelHolder;
  /** Training buffer capacity. Default: 1000. */
  capacity?: number;
  /** Run a cycle after this many new examples. Default: 50. */
  everyExamples?: number;
  /** Run a cycle on this interval when new examples arrived. Default: 30000. */
  intervalMs?: number;
  /** Fraction of buffered examples used for fitting. Default: 0.7. */
  trainRatio?: number;
  /** Ridge regularization strength. Default: 1e-3. */
  ridgeLambda?: number;
  /** Called with each newly installed model, after the swap. */
  publish?: (model: ReadoutModel) => void;
  now?: () => number;
  log?: PipelineLogger;
};

export type TrainingCycleResult =
  | { ok: true; model: ReadoutModel }
  | { ok: false; error: EmptyTrainingSplit };

export type TrainingSupervisorEvents = {
  trained: [model: ReadoutModel];
  skipped: [error: EmptyTrainingSplit];
};

export type SplitExamples = { train: TrainingExample[]; test: TrainingExample[] };

/**
 * Examples that all carry a split tag are partitioned by tag. Otherwise the
 * first round(n · trainRatio) examples in arrival order train and the rest test.
 */
export function splitExamples(examples: TrainingExample[], trainRatio: number): SplitExamples {
  if (examples.length > 0 && examples.every((example) => example.split !== undefined)) {
    return {
      train: examples.filter((example) => example.split === "train"),
      test: examples.filter((example) => example.split === "test"),
    };
  }
  const trainSize = Math.round(examples.length * trainRatio);
  return { train: examples.slice(0, trainSize), test: examples.slice(trainSize) };
}

function safeDivide(numerator: number, denominator: number): number {
  return denominator === 0 ? 0 : numerator / denominator;
}

function harmonic(precision: number, recall: number): number {
  return safeDivide(2 * precision * recall, precision + recall);
}

/**
 * Accuracy plus precision, recall and f1. With at most two labels the highest
 * label is the positive class; with more the scores are macro averages.
 * A zero denominator scores 0.
 */
export function evaluateClassifier(
  truth: ReadonlyArray<number>,
  predicted: ReadonlyArray<number>,
): Omit<TrainingMetrics, "trainSize" | "testSize"> {
  const n = truth.length;
  let correct = 0;
  for (let i = 0; i < n; i++) {
    if (truth[i] === predicted[i]) {
      correct += 1;
    }
  }
  const accuracy = safeDivide(correct, n);
  const labels = [...new Set([...truth, ...predicted])].sort((a, b) => a - b);

  const scoreLabel = (label: number) => {
    let tp = 0;
    let fp = 0;
    let fn = 0;
    for (let i = 0; i < n; i++) {
      const isTrue = truth[i] === label;
      const isPredicted = predicted[i] === label;
      if (isTrue && isPredicted) {
        tp += 1;
      } else if (isPredicted) {
        fp += 1;
      } else if (isTrue) {
        fn += 1;
      }
    }
    const precision = safeDivide(tp, tp + fp);
    const recall = safeDivide(tp, tp + fn);
    return { precision, recall, f1: harmonic(precision, recall) };
  };

  if (labels.length === 0) {
    return { accuracy, precision: 0, recall: 0, f1: 0 };
  }
  if (labels.length <= 2) {
    return { accuracy, ...scoreLabel(labels[labels.length - 1]) };
  }
  const scores = labels.map(scoreLabel);
  const mean = (pick: (s: { precision: number; recall: number; f1: number }) => number) =>
    scores.reduce((sum, s) => sum + pick(s), 0) / scores.length;
  return {
    accuracy,
    precision: mean((s) => s.precision),
    recall: mean((s) => s.recall),
    f1: mean((s) => s.f1),
  };
}

/**
 * Servo targets for an activity label: the level scaled to [0, 1], with
 * alternate cubes turning the opposite way. Labels outside the activity
 * range are clamped to it.
 */
export function activityPose(label: number, outputs = SERVO_OUTPUTS): number[] {
  const level = Math.min(1, Math.max(0, label / ACTIVITY_THRESHOLDS.length));
  return Array.from({ length: outputs }, (_, i) => (i % 2 === 0 ? level : -level));
}

export type FittedReadout = { weights: number[][]; classes: number[]; servoWeights: number[][] };

/**
 * Fit ridge readouts on [state, 1] over the given examples: one-hot class rows
 * for evaluation, and one row per servo regressed onto the activity pose.
 */
export function fitReadout(train: ReadonlyArray<TrainingExample>, lambda: number): FittedReadout {
  const classes = [...new Set(train.map((example) => example.target))].sort((a, b) => a - b);
  const stateDim = Math.max(...train.map((example) => example.state.length));
  const x = train.map((example) => {
    const row = new Array<number>(stateDim + 1).fill(0);
    example.state.forEach((value, i) => {
      row[i] = value;
    });
    row[stateDim] = 1;
    return row;
  });
  const y = train.map((example) => classes.map((label) => (label === example.target ? 1 : 0)));
  const poses = train.map((example) => activityPose(example.target));
  return {
    weights: ridgeRegression(x, y, lambda),
    classes,
    servoWeights: ridgeRegression(x, poses, lambda),
  };
}

/**
 * Periodic fit/evaluate/publish loop running beside the node. Owns the
 * training buffer; the node is its only producer.
 */
export class TrainingSupervisor extends EventEmitter<TrainingSupervisorEvents> {
  readonly buffer: TrainingBuffer;
  private readonly models: ModelHolder;
  private readonly everyExamples: number;
  private readonly intervalMs: number;
  private readonly trainRatio: number;
  private readonly ridgeLambda: number;
  private readonly publish?: (model: ReadoutModel) => void;
  private readonly now: () => number;
  private readonly log?: PipelineLogger;
  private interval: ReturnType<typeof setInterval> | null = null;
  private sinceLastCycle = 0;

  constructor(opts: TrainingSupervisorOptions) {
    super();
    this.models = opts.models;
    this.buffer = new TrainingBuffer(opts.capacity ?? 1000);
    this.everyExamples = Math.max(1, opts.everyExamples ?? 50);
    this.intervalMs = opts.intervalMs ?? 30_000;
    this.trainRatio = opts.trainRatio ?? 0.7;
    this.ridgeLambda = opts.ridgeLambda ?? 1e-3;
    this.publish = opts.publish;
    this.now = opts.now ?? Date.now;
    this.log = opts.log;
  }

  record(state: ReadonlyArray<number>, target: number): void {
    this.buffer.push({ state: [...state], target });
    this.sinceLastCycle += 1;
    if (this.sinceLastCycle >= this.everyExamples) {
      this.runCycle();
    }
  }

  /** Refill the buffer with stored examples. Does not count toward the next cycle. */
  restore(examples: ReadonlyArray<TrainingExample>): void {
    for (const example of examples) {
      this.buffer.push(example);
    }
  }

  start(): void {
    if (this.interval) {
      return;
    }
    this.interval = setInterval(() => {
      if (this.sinceLastCycle > 0) {
        this.runCycle();
      }
    }, this.intervalMs);
  }

  stop(): void {
    if (this.interval) {
      clearInterval(this.interval);
      this.interval = null;
    }
  }

  runCycle(): TrainingCycleResult {
    this.sinceLastCycle = 0;
    const { train, test } = splitExamples(this.buffer.snapshot(), this.trainRatio);
    if (train.length === 0 || test.length === 0) {
      const error = new EmptyTrainingSplit(train.length, test.length);
      this.log?.warn(`trainer: ${error.message}; keeping model #${this.models.current.updatesPerformed}`);
      this.emit("skipped", error);
      return { ok: false, error };
    }

    const fitted = fitReadout(train, this.ridgeLambda);
    const candidate: ReadoutModel = {
      weights: fitted.weights,
      classes: fitted.classes,
      servoWeights: fitted.servoWeights,
      trainedAtMs: this.now(),
      metrics: { accuracy: 0, precision: 0, recall: 0, f1: 0, trainSize: train.length, testSize: test.length },
      updatesPerformed: this.models.current.updatesPerformed + 1,
    };
    const predicted = test.map((example) => predictClass(candidate, example.state));
    const scores = evaluateClassifier(
      test.map((example) => example.target),
      predicted,
    );
    const model: ReadoutModel = {
      ...candidate,
      metrics: { ...scores, trainSize: train.length, testSize: test.length },
    };

    this.models.install(model);
    const installed = this.models.current;
    this.log?.info(
      `trainer: model #${installed.updatesPerformed} accuracy=${scores.accuracy.toFixed(3)} f1=${scores.f1.toFixed(3)} (train=${train.length} test=${test.length})`,
    );
    this.emit("trained", installed);
    this.publish?.(installed);
    return { ok: true, model: installed };
  }
}
