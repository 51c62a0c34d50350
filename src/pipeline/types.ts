export type NodeRole = "source" | "relay" | "trainer" | "builder" | "sink";

export type NodeIdentity = {
  /** Logical node name (e.g. "res00"). Unique within a topology. */
  readonly name: string;
  /** WebSocket URL this node accepts upstream links on (e.g. "ws://192.168.1.74:8765"). */
  readonly listenAddress: string;
  /** Listen address of the downstream peer, or null for a terminal node. */
  readonly sendAddress: string | null;
  readonly role: NodeRole;
};

export type PeerAddress = {
  name: string;
  address: string;
};

export type Region = {
  id: string;
  /** Grid cells (column, row) selected for this region. */
  cells: ReadonlyArray<readonly [number, number]>;
  /** Pixel bounding box of the region within the frame. */
  bounds: { x: number; y: number; width: number; height: number };
};

export type MovementVector = {
  readonly regionId: string;
  readonly magnitude: number;
  /** Direction of motion in radians, atan2(dy, dx). */
  readonly direction: number;
  readonly dx: number;
  readonly dy: number;
  readonly frameIndex: number;
  readonly timestampMs: number;
};

export const PAYLOAD_TYPES = ["VECTOR", "STATE", "MODEL_UPDATE", "ACK"] as const;

export type PayloadType = (typeof PAYLOAD_TYPES)[number];

export type Message = {
  sourceId: string;
  destinationId: string;
  /** Sender session, chosen at random when the sending link is created. ACKs echo the epoch they acknowledge. */
  epoch: number;
  /** Monotonic per link, starting at 0. */
  sequence: number;
  payloadType: PayloadType;
  payload: Uint8Array;
  createdAtMs: number;
};

export type MessageDraft = Pick<Message, "payloadType" | "payload">;

export type ReservoirState = {
  nodeId: string;
  vector: number[];
  /** Sequence of the inbound message that produced this state (-1 before the first update). */
  lastSequence: number;
};

export type TrainingSplit = "train" | "test";

export type TrainingExample = {
  state: number[];
  /** Class label for this observation. */
  target: number;
  split?: TrainingSplit;
};

export type TrainingMetrics = {
  accuracy: number;
  precision: number;
  recall: number;
  f1: number;
  trainSize: number;
  testSize: number;
};

export type ReadoutModel = {
  /** Classifier rows, one per class; each row has stateDim + 1 entries (last is the bias). */
  readonly weights: ReadonlyArray<ReadonlyArray<number>>;
  /** Class label for each output row. Empty for untrained pass-through readouts. */
  readonly classes: ReadonlyArray<number>;
  /** One row per cube servo, same row layout as `weights`. Drives actuation. */
  readonly servoWeights: ReadonlyArray<ReadonlyArray<number>>;
  readonly trainedAtMs: number;
  readonly metrics: Readonly<TrainingMetrics>;
  readonly updatesPerformed: number;
};

export type ServoCommand =
  | { kind: "angle"; servoId: number; angleDegrees: number }
  | { kind: "relay"; on: boolean };

export type PipelineLogger = {
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
};
