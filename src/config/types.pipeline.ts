import type { NodeRole } from "../pipeline/types.js";

export type PipelineNodeConfig = {
  /** Logical node name (e.g. "res00"). */
  name: string;
  /** Host or IP the node listens on and is reached at. */
  host: string;
  port: number;
  role: NodeRole;
  /** Name of the downstream node. Omit for a terminal node. */
  destination?: string;
  /**
   * What a source node sends downstream: its reservoir state, or the raw
   * movement batches as VECTOR messages for the next node to evolve. Default: "state".
   */
  emit?: "state" | "vector";
  description?: string;
};

export type LinkConfig = {
  /** First retransmit delay in milliseconds. Default: 500. */
  retryTimeoutMs?: number;
  /** Retransmit delay multiplier. Default: 2. */
  backoffFactor?: number;
  /** Transmissions per message before the link reports degraded. Default: 5. */
  maxAttempts?: number;
  /** How long a sequence hole may block release. Default: 2000. */
  reorderTimeoutMs?: number;
  /** Recent-sequence window for duplicate suppression. Default: 1024. */
  dedupWindow?: number;
  /** Replace a queued, not yet sent STATE with the newer one. Default: true. */
  coalesce?: boolean;
};

export type ReservoirConfig = {
  /** Reservoir state dimension, at most 512. Default: 20. */
  stateDim?: number;
  /** Default: 0.3. */
  leakRate?: number;
  /** Target spectral norm of the recurrent weights. Default: 0.9. */
  spectralNorm?: number;
  /** Default: 1. */
  inputScale?: number;
  /** Base seed; each node derives its own from its name. Default: 42. */
  seed?: number;
};

export type TrainingConfig = {
  /** Default: 1000. */
  bufferCapacity?: number;
  /** Default: 50. */
  everyExamples?: number;
  /** Default: 30000. */
  intervalMs?: number;
  /** Default: 0.7. */
  trainRatio?: number;
  /** Default: 0.001. */
  ridgeLambda?: number;
  /** Directory for the daily example CSV files and model files. Omit to keep training in memory. */
  dataDir?: string;
};

export type ServoConfig = {
  id: number;
  /** Default: -150. */
  minAngle?: number;
  /** Default: 150. */
  maxAngle?: number;
  /** Full-sweep time in milliseconds. Default: 1000. */
  speedMs?: number;
};

export type ActuationConfig = {
  /** Cube servos in readout order. Default: ids 0..4. */
  servos?: ServoConfig[];
  /** Clock servo, or false to disable it. Default: id 5. */
  clockServo?: ServoConfig | false;
  /** Default: 150. */
  outputGain?: number;
  /** Mean |state| at which the relay turns on. Omit to disable the relay. */
  relayThreshold?: number;
};

export type MotionConfig = {
  /** Region ids in reservoir input order. Default: r0..r4. */
  regions?: string[];
  /** Append t_sin/t_cos time-of-day features. Default: true. */
  timeFeatures?: boolean;
  /** Synthetic source batch interval. Default: 100. */
  intervalMs?: number;
};

export type PipelineConfig = {
  nodes: PipelineNodeConfig[];
  link?: LinkConfig;
  reservoir?: ReservoirConfig;
  training?: TrainingConfig;
  actuation?: ActuationConfig;
  motion?: MotionConfig;
  /** Scheduling tick (re-emit and actuation rate limiting). Default: 1000. */
  tickMs?: number;
};
