import { EventEmitter } from "node:events";
import { DecodeError, EncodeError } from "./errors.js";
import { type InputEncoding, labelActivity, toInputVector } from "./motion-source.js";
import {
  decodeModelPayload,
  decodeStatePayload,
  decodeVectorPayload,
  encodeModelPayload,
  encodeStatePayload,
  encodeVectorPayload,
} from "./payloads.js";
import type { ModelHolder } from "./readout.js";
import type { ReliableLink, SendResult } from "./reliable-link.js";
import { clampUnit, type Reservoir, sanitizeInput, stepReservoir, zeroState } from "./reservoir.js";
import type {
  Message,
  MovementVector,
  NodeIdentity,
  PipelineLogger,
  ReadoutModel,
  ReservoirState,
} from "./types.js";

export type NodePhase = "IDLE" | "AWAITING_INPUT" | "UPDATING" | "FORWARDING" | "SHUT_DOWN";

export type PhaseTransition = { from: NodePhase; to: NodePhase };

export type StateMeta = {
  target: number | undefined;
  /** True when a held state is sent again after an inbound failure. */
  reemit: boolean;
};

export type ReservoirNodeEvents = {
  transition: [transition: PhaseTransition];
  /** A new or re-emitted state, with the activity label it carries when known. */
  state: [state: ReservoirState, meta: StateMeta];
  model: [model: ReadoutModel];
  warning: [message: string];
};

export type ReservoirNodeOptions = {
  identity: NodeIdentity;
  /** Null makes the node adopt incoming state instead of evolving a reservoir. */
  reservoir: Reservoir | null;
  /** State dimension used when there is no reservoir. */
  stateDim?: number;
  downstream: ReliableLink | null;
  models: ModelHolder;
  /** How movement batches become reservoir input (source and builder roles). */
  encoding?: InputEncoding;
  /**
   * Send local movement batches downstream as VECTOR messages instead of
   * evolving a reservoir (an input node feeding a separate controller).
   */
  relayVectors?: boolean;
  /** Scheduling tick for re-emitting held state. Default: 1000. */
  tickMs?: number;
  clock?: () => Date;
  log?: PipelineLogger;
};

export type ReservoirNodeStats = {
  updates: number;
  forwarded: number;
  forwardFailures: number;
  /** Queued sends replaced by a newer state before they left. */
  superseded: number;
  reemits: number;
  inboundFailures: number;
  modelsInstalled: number;
};

/**
 * One controller in the chain. Consumes VECTOR or STATE input, updates its
 * reservoir and forwards the new state downstream without waiting on the link.
 * Inbound failures keep the last valid state and schedule a re-emit; a send
 * the downstream link gives up on is only counted.
 */
export class ReservoirNode extends EventEmitter<ReservoirNodeEvents> {
  readonly identity: NodeIdentity;
  readonly stats: ReservoirNodeStats = {
    updates: 0,
    forwarded: 0,
    forwardFailures: 0,
    superseded: 0,
    reemits: 0,
    inboundFailures: 0,
    modelsInstalled: 0,
  };

  private readonly reservoir: Reservoir | null;
  private readonly downstream: ReliableLink | null;
  private readonly models: ModelHolder;
  private readonly encoding: InputEncoding;
  private readonly relayVectors: boolean;
  private readonly tickMs: number;
  private readonly clock: () => Date;
  private readonly log?: PipelineLogger;

  private current: NodePhase = "IDLE";
  private vector: number[];
  private lastSequence = -1;
  private lastTarget: number | undefined;
  private reemitPending = false;
  private tickTimer: ReturnType<typeof setInterval> | null = null;
  private localSequence = 0;

  constructor(opts: ReservoirNodeOptions) {
    super();
    this.identity = opts.identity;
    this.reservoir = opts.reservoir;
    this.downstream = opts.downstream;
    this.models = opts.models;
    this.encoding = opts.encoding ?? { regionIds: [], timeFeatures: false };
    this.relayVectors = opts.relayVectors ?? false;
    this.tickMs = opts.tickMs ?? 1000;
    this.clock = opts.clock ?? (() => new Date());
    this.log = opts.log;
    this.vector = this.reservoir
      ? zeroState(this.reservoir)
      : new Array<number>(opts.stateDim ?? 0).fill(0);
  }

  get phase(): NodePhase {
    return this.current;
  }

  /** Copy of the current state. */
  snapshot(): ReservoirState {
    return { nodeId: this.identity.name, vector: [...this.vector], lastSequence: this.lastSequence };
  }

  start(): void {
    if (this.current !== "IDLE") {
      return;
    }
    this.tickTimer = setInterval(() => this.tick(), this.tickMs);
    this.transition("AWAITING_INPUT");
  }

  /** Inbound message from an upstream link, already released in sequence order. */
  handleMessage(message: Message): void {
    if (!this.accepting(`${message.payloadType} seq ${message.sequence} from ${message.sourceId}`)) {
      return;
    }
    try {
      switch (message.payloadType) {
        case "VECTOR": {
          const payload = decodeVectorPayload(message.payload);
          this.ingestVectors(payload.vectors, { target: payload.target, sequence: message.sequence });
          return;
        }
        case "STATE": {
          const payload = decodeStatePayload(message.payload);
          this.update(payload.state, payload.target, message.sequence);
          return;
        }
        case "MODEL_UPDATE":
          this.installModel(decodeModelPayload(message.payload));
          return;
        case "ACK":
          return;
      }
    } catch (err) {
      if (err instanceof DecodeError) {
        this.reportInboundFailure(`${message.payloadType} from ${message.sourceId}: ${err.message}`);
        return;
      }
      throw err;
    }
  }

  /**
   * Movement batch from the local motion source (or a VECTOR payload). The
   * label defaults to the batch's activity class.
   */
  ingestVectors(
    vectors: ReadonlyArray<MovementVector>,
    opts: { target?: number; sequence?: number } = {},
  ): void {
    if (!this.accepting(`movement batch of ${vectors.length}`)) {
      return;
    }
    if (this.relayVectors) {
      this.sendVectors(vectors, opts.target ?? labelActivity(vectors));
      return;
    }
    const input = toInputVector(vectors, this.encoding, this.clock());
    const sequence = opts.sequence ?? this.localSequence;
    this.localSequence += 1;
    this.update(input, opts.target ?? labelActivity(vectors), sequence);
  }

  /** Hold the last valid state and re-emit it on the next tick. */
  reportInboundFailure(reason: string): void {
    if (this.current === "SHUT_DOWN") {
      return;
    }
    this.stats.inboundFailures += 1;
    this.reemitPending = true;
    const message = `node: ${this.identity.name} holding state after inbound failure: ${reason}`;
    this.log?.warn(message);
    this.emit("warning", message);
  }

  /** Install a newer readout model and pass it downstream. */
  installModel(model: ReadoutModel): boolean {
    if (!this.models.install(model)) {
      return false;
    }
    this.stats.modelsInstalled += 1;
    const installed = this.models.current;
    this.log?.info(`node: ${this.identity.name} installed model #${installed.updatesPerformed}`);
    this.emit("model", installed);
    this.publishModel(installed);
    return true;
  }

  /** Send a model downstream without waiting for the ACK. */
  publishModel(model: ReadoutModel): void {
    if (!this.downstream) {
      return;
    }
    let payload: Uint8Array;
    try {
      payload = encodeModelPayload(model);
    } catch (err) {
      if (!(err instanceof EncodeError)) {
        throw err;
      }
      this.stats.forwardFailures += 1;
      this.log?.warn(
        `node: ${this.identity.name} cannot publish model #${model.updatesPerformed}: ${err.message}`,
      );
      return;
    }
    this.track(this.downstream.send({ payloadType: "MODEL_UPDATE", payload }), "MODEL_UPDATE");
  }

  /** Stop ticking, drain downstream sends within their retry budget, then shut down. */
  async stop(): Promise<void> {
    if (this.current === "SHUT_DOWN") {
      return;
    }
    if (this.tickTimer) {
      clearInterval(this.tickTimer);
      this.tickTimer = null;
    }
    if (this.downstream) {
      await this.downstream.close();
    }
    this.transition("SHUT_DOWN");
  }

  private accepting(what: string): boolean {
    if (this.current === "AWAITING_INPUT") {
      return true;
    }
    this.log?.warn(`node: ${this.identity.name} dropped ${what} while ${this.current}`);
    return false;
  }

  private update(input: ReadonlyArray<number>, target: number | undefined, sequence: number): void {
    this.transition("UPDATING");
    this.vector = this.reservoir
      ? stepReservoir(this.reservoir, this.vector, input)
      : sanitizeInput(input, Math.max(input.length, this.vector.length)).map(clampUnit);
    this.lastSequence = sequence;
    this.lastTarget = target;
    this.reemitPending = false;
    this.stats.updates += 1;
    this.forward(false);
  }

  private forward(reemit: boolean): void {
    this.transition("FORWARDING");
    const state = this.snapshot();
    this.emit("state", state, { target: this.lastTarget, reemit });
    if (this.downstream) {
      this.track(
        this.downstream.send({
          payloadType: "STATE",
          payload: encodeStatePayload({ state: state.vector, target: this.lastTarget }),
        }),
        "STATE",
      );
    }
    this.transition("AWAITING_INPUT");
  }

  private sendVectors(vectors: ReadonlyArray<MovementVector>, target: number): void {
    this.transition("FORWARDING");
    if (this.downstream) {
      this.track(
        this.downstream.send({
          payloadType: "VECTOR",
          payload: encodeVectorPayload({ vectors: [...vectors], target }),
        }),
        "VECTOR",
      );
    }
    this.transition("AWAITING_INPUT");
  }

  private tick(): void {
    if (!this.reemitPending || this.current !== "AWAITING_INPUT" || this.lastSequence < 0) {
      return;
    }
    this.reemitPending = false;
    this.stats.reemits += 1;
    this.log?.info(`node: ${this.identity.name} re-emitting held state seq ${this.lastSequence}`);
    this.forward(true);
  }

  private track(pending: Promise<SendResult>, kind: string): void {
    void pending
      .then((result) => {
        if (result.ok) {
          this.stats.forwarded += 1;
        } else if (result.error.code === "SEND_SUPERSEDED") {
          this.stats.superseded += 1;
        } else {
          this.stats.forwardFailures += 1;
        }
      })
      .catch((err) => {
        this.log?.error(`node: ${this.identity.name} ${kind} send failed: ${String(err)}`);
      });
  }

  private transition(to: NodePhase): void {
    const from = this.current;
    if (from === to) {
      return;
    }
    this.current = to;
    this.emit("transition", { from, to });
  }
}
