import type { PipelineConfig, PipelineNodeConfig } from "../config/types.pipeline.js";
import { ActuationMapper, DEFAULT_CLOCK_SERVO, type ServoSpec } from "./actuation.js";
import { type ActuatorDriver, RecordingActuatorDriver, type ServoRange } from "./actuator-driver.js";
import {
  type InputEncoding,
  type MotionVectorSource,
  SyntheticMotionSource,
  inputDimension,
} from "./motion-source.js";
import { createWsTransportFactory, type LinkTransport, type LinkTransportFactory } from "./link-transport.js";
import { createIdentityReadout, ModelHolder } from "./readout.js";
import { ReliableLink, type RetryPolicy } from "./reliable-link.js";
import { createReservoir, type Reservoir } from "./reservoir.js";
import { ReservoirNode } from "./reservoir-node.js";
import { hashSeed } from "./rng.js";
import { createTopologyRouter, type NodeRoute, type TopologyRouter } from "./topology.js";
import { TrainingStore } from "./training-store.js";
import { TrainingSupervisor } from "./training-supervisor.js";
import type { NodeIdentity, PipelineLogger, ReadoutModel } from "./types.js";

export const DEFAULT_STATE_DIM = 20;
export const DEFAULT_REGION_IDS: ReadonlyArray<string> = ["r0", "r1", "r2", "r3", "r4"];

export type StoppableMotionSource = MotionVectorSource & { stop?: () => void };

export type PipelineNodeRuntimeOptions = {
  config: PipelineConfig;
  /** Which node of the topology this process runs. */
  nodeName: string;
  /** Default: WebSocket transports. */
  transports?: LinkTransportFactory;
  /** Replace the seeded reservoir (null adopts incoming state). */
  reservoir?: Reservoir | null;
  /** Readout in force before the first model update. Default: identity over the first five components. */
  initialModel?: ReadoutModel;
  /** Sink actuator. Default: in-memory recording driver. */
  actuator?: ActuatorDriver;
  /** Movement input for source and builder roles. Default: synthetic motion. */
  motionSource?: StoppableMotionSource;
  clock?: () => Date;
  log?: PipelineLogger;
};

const DEFAULT_LOGGER: PipelineLogger = {
  info: (msg) => console.log(msg),
  warn: (msg) => console.warn(msg),
  error: (msg) => console.error(msg),
};

function servoSpec(config: { id: number; minAngle?: number; maxAngle?: number; speedMs?: number }): ServoSpec {
  return {
    id: config.id,
    minAngle: config.minAngle ?? -150,
    maxAngle: config.maxAngle ?? 150,
    speedMs: config.speedMs ?? 1000,
  };
}

/** Angle ranges of the configured cube and clock servos, for drivers that scale per servo. */
export function configuredServoRanges(config: PipelineConfig): ServoRange[] {
  const actuation = config.actuation ?? {};
  const servos = [...(actuation.servos ?? [])];
  if (actuation.clockServo) {
    servos.push(actuation.clockServo);
  }
  return servos.map((servo) => {
    const spec = servoSpec(servo);
    return { id: spec.id, minAngle: spec.minAngle, maxAngle: spec.maxAngle };
  });
}

export type ActuationStats = {
  applied: number;
  /** States replaced by a newer one while the actuator was busy. */
  superseded: number;
};

/**
 * One pipeline process: listens for upstream links, connects downstream,
 * drives its ReservoirNode and, depending on role, the motion source, the
 * training supervisor or the actuation mapper.
 */
export class PipelineNodeRuntime {
  readonly router: TopologyRouter;
  readonly route: NodeRoute;
  readonly identity: NodeIdentity;
  readonly models: ModelHolder;
  readonly encoding: InputEncoding;
  readonly supervisor?: TrainingSupervisor;
  readonly mapper?: ActuationMapper;
  readonly actuator?: ActuatorDriver;
  readonly store?: TrainingStore;
  readonly actuationStats: ActuationStats = { applied: 0, superseded: 0 };

  private readonly opts: PipelineNodeRuntimeOptions;
  private readonly config: PipelineConfig;
  private readonly transports: LinkTransportFactory;
  private readonly log: PipelineLogger;
  private readonly stateDim: number;
  private readonly nodeConfig: PipelineNodeConfig | undefined;

  private node: ReservoirNode | null = null;
  private listener: LinkTransport | null = null;
  private downstreamTransport: LinkTransport | null = null;
  private readonly upstreamLinks: ReliableLink[] = [];
  private downstreamLink: ReliableLink | null = null;
  private motionSource: StoppableMotionSource | null = null;
  private motionDone: Promise<void> | null = null;
  private actuation: Promise<void> = Promise.resolve();
  private pendingActuation: number[] | null = null;
  private actuating = false;
  private saving: Promise<void> = Promise.resolve();
  private stopping = false;

  constructor(opts: PipelineNodeRuntimeOptions) {
    this.opts = opts;
    this.config = opts.config;
    this.log = opts.log ?? DEFAULT_LOGGER;
    this.transports = opts.transports ?? createWsTransportFactory({ log: this.log });
    this.router = createTopologyRouter(this.config.nodes);
    this.route = this.router.route(opts.nodeName);
    this.identity = this.route.identity;
    this.nodeConfig = this.config.nodes.find((node) => node.name === opts.nodeName);
    this.stateDim = this.config.reservoir?.stateDim ?? DEFAULT_STATE_DIM;
    this.encoding = {
      regionIds: this.config.motion?.regions ?? DEFAULT_REGION_IDS,
      timeFeatures: this.config.motion?.timeFeatures ?? true,
    };
    this.models = new ModelHolder(opts.initialModel ?? createIdentityReadout(this.stateDim));

    const role = this.identity.role;
    if (role === "trainer") {
      const training = this.config.training ?? {};
      this.supervisor = new TrainingSupervisor({
        models: this.models,
        capacity: training.bufferCapacity,
        everyExamples: training.everyExamples,
        intervalMs: training.intervalMs,
        trainRatio: training.trainRatio,
        ridgeLambda: training.ridgeLambda,
        publish: (model) => this.node?.publishModel(model),
        log: this.log,
      });
      if (training.dataDir) {
        this.store = new TrainingStore({ dir: training.dataDir, log: this.log });
      }
    }
    if (role === "sink") {
      const actuation = this.config.actuation ?? {};
      this.actuator = opts.actuator ?? new RecordingActuatorDriver({ log: this.log });
      this.mapper = new ActuationMapper({
        driver: this.actuator,
        model: () => this.models.current,
        servos: actuation.servos?.map(servoSpec),
        clockServo:
          actuation.clockServo === false
            ? null
            : actuation.clockServo
              ? servoSpec(actuation.clockServo)
              : DEFAULT_CLOCK_SERVO,
        outputGain: actuation.outputGain,
        tickMs: this.config.tickMs,
        relayThreshold: actuation.relayThreshold,
        clock: opts.clock,
        log: this.log,
      });
    }
  }

  get reservoirNode(): ReservoirNode {
    if (!this.node) {
      throw new Error(`pipeline: node ${this.identity.name} is not started`);
    }
    return this.node;
  }

  get upstream(): ReadonlyArray<ReliableLink> {
    return this.upstreamLinks;
  }

  get downstream(): ReliableLink | null {
    return this.downstreamLink;
  }

  /** Source node that sends its movement batches downstream instead of its own state. */
  get emitsVectors(): boolean {
    return this.identity.role === "source" && this.nodeConfig?.emit === "vector";
  }

  /** Some upstream source sends movement batches here. */
  get receivesVectors(): boolean {
    return this.route.upstream.some(
      (peer) => this.config.nodes.find((node) => node.name === peer.name)?.emit === "vector",
    );
  }

  async start(): Promise<void> {
    if (this.node) {
      return;
    }
    const name = this.identity.name;
    const retry = this.retryPolicy();
    const linkConfig = this.config.link ?? {};
    const restored = await this.restoreTraining();

    if (this.route.downstream) {
      this.downstreamTransport = this.transports.connect(this.route.downstream.address);
      this.downstreamLink = new ReliableLink({
        localId: name,
        peerId: this.route.downstream.name,
        transport: this.downstreamTransport,
        retry,
        reorderTimeoutMs: linkConfig.reorderTimeoutMs,
        dedupWindow: linkConfig.dedupWindow,
        coalesce: linkConfig.coalesce === false ? [] : ["STATE"],
        log: this.log,
      });
    }

    const node = new ReservoirNode({
      identity: this.identity,
      reservoir: this.buildReservoir(),
      stateDim: this.stateDim,
      downstream: this.downstreamLink,
      models: this.models,
      encoding: this.encoding,
      relayVectors: this.emitsVectors,
      tickMs: this.config.tickMs,
      clock: this.opts.clock,
      log: this.log,
    });
    this.node = node;
    this.wireRole(node);
    node.start();
    if (restored) {
      node.publishModel(restored);
    }

    if (this.route.upstream.length > 0) {
      this.listener = await this.transports.listen(this.identity.listenAddress);
      for (const peer of this.route.upstream) {
        const link = new ReliableLink({
          localId: name,
          peerId: peer.name,
          transport: this.listener,
          retry,
          reorderTimeoutMs: linkConfig.reorderTimeoutMs,
          dedupWindow: linkConfig.dedupWindow,
          log: this.log,
        });
        link.on("message", (message) => node.handleMessage(message));
        link.on("decode-error", (err) => node.reportInboundFailure(`${peer.name}: ${err.message}`));
        link.on("gap-skip", (gap) =>
          node.reportInboundFailure(`${peer.name}: gap seq ${gap.from}..${gap.resumedAt - 1}`),
        );
        this.upstreamLinks.push(link);
      }
    }

    this.supervisor?.start();
    if (this.identity.role === "source" || this.identity.role === "builder") {
      this.startMotion(node);
    }

    this.log.info(
      `pipeline: ${name} (${this.identity.role}) listening=${this.listener ? this.identity.listenAddress : "-"} downstream=${this.route.downstream?.name ?? "-"} upstream=${this.route.upstream.map((p) => p.name).join(",") || "-"}`,
    );
  }

  async stop(): Promise<void> {
    if (this.stopping) {
      return;
    }
    this.stopping = true;
    this.motionSource?.stop?.();
    if (this.motionDone) {
      await this.motionDone;
    }
    this.supervisor?.stop();
    if (this.node) {
      await this.node.stop();
    }
    for (const link of this.upstreamLinks) {
      await link.close();
    }
    await this.actuation;
    await this.saving;
    await this.store?.flush();
    await this.downstreamTransport?.close();
    await this.listener?.close();
    this.log.info(`pipeline: ${this.identity.name} stopped`);
  }

  private retryPolicy(): Partial<RetryPolicy> {
    const link = this.config.link ?? {};
    return {
      timeoutMs: link.retryTimeoutMs,
      backoffFactor: link.backoffFactor,
      maxAttempts: link.maxAttempts,
    };
  }

  private buildReservoir(): Reservoir | null {
    if (this.opts.reservoir !== undefined) {
      return this.opts.reservoir;
    }
    const role = this.identity.role;
    if (role === "sink" || this.emitsVectors) {
      return null;
    }
    const params = this.config.reservoir ?? {};
    const inputDim =
      role === "source" || role === "builder" || this.receivesVectors
        ? inputDimension(this.encoding)
        : this.stateDim;
    return createReservoir({
      inputDim,
      stateDim: this.stateDim,
      leakRate: params.leakRate,
      spectralNorm: params.spectralNorm,
      inputScale: params.inputScale,
      seed: hashSeed(this.identity.name, params.seed ?? 42),
    });
  }

  /**
   * Load the newest stored model and the most recent examples into the
   * trainer. Returns the restored model, or null when none was installed.
   */
  private async restoreTraining(): Promise<ReadoutModel | null> {
    const store = this.store;
    const supervisor = this.supervisor;
    if (!store || !supervisor) {
      return null;
    }
    await store.open();
    const examples = await store.loadRecentExamples(supervisor.buffer.capacity);
    supervisor.restore(examples.filter((example) => example.state.length === this.stateDim));
    const model = await store.loadLatestModel();
    if (model && model.servoWeights.some((row) => row.length !== this.stateDim + 1)) {
      this.log.warn(
        `pipeline: ignoring stored model #${model.updatesPerformed}: rows do not match stateDim ${this.stateDim}`,
      );
      return null;
    }
    const installed = model !== null && this.models.install(model);
    this.log.info(
      `pipeline: restored ${installed ? `model #${this.models.current.updatesPerformed}` : "no model"} and ${supervisor.buffer.size} examples from ${store.dir}`,
    );
    return installed ? this.models.current : null;
  }

  private wireRole(node: ReservoirNode): void {
    const supervisor = this.supervisor;
    if (supervisor) {
      const store = this.store;
      node.on("state", (state, meta) => {
        if (!meta.reemit && meta.target !== undefined) {
          supervisor.record(state.vector, meta.target);
          store?.append({ state: [...state.vector], target: meta.target });
        }
      });
      if (store) {
        supervisor.on("trained", (model) => {
          this.saving = this.saving
            .then(async () => {
              const file = await store.saveModel(model);
              this.log.info(`pipeline: saved model #${model.updatesPerformed} to ${file}`);
            })
            .catch((err) => {
              this.log.error(`pipeline: cannot save model #${model.updatesPerformed}: ${String(err)}`);
            });
        });
      }
    }
    const mapper = this.mapper;
    if (mapper) {
      node.on("state", (state) => this.queueActuation(mapper, state.vector));
    }
  }

  /** The actuator works on at most one state; while it is busy only the newest state waits. */
  private queueActuation(mapper: ActuationMapper, vector: ReadonlyArray<number>): void {
    if (this.pendingActuation) {
      this.actuationStats.superseded += 1;
    }
    this.pendingActuation = [...vector];
    if (this.actuating) {
      return;
    }
    this.actuating = true;
    this.actuation = this.drainActuation(mapper);
  }

  private async drainActuation(mapper: ActuationMapper): Promise<void> {
    try {
      let vector = this.pendingActuation;
      while (vector) {
        this.pendingActuation = null;
        try {
          await mapper.actuate(vector);
          this.actuationStats.applied += 1;
        } catch (err) {
          this.log.error(`pipeline: actuation failed: ${String(err)}`);
        }
        vector = this.pendingActuation;
      }
    } finally {
      this.actuating = false;
    }
  }

  private startMotion(node: ReservoirNode): void {
    const source =
      this.opts.motionSource ??
      new SyntheticMotionSource({
        regions: this.encoding.regionIds.map((id) => ({ id })),
        intervalMs: this.config.motion?.intervalMs,
        seed: hashSeed(this.identity.name),
      });
    this.motionSource = source;
    this.motionDone = (async () => {
      for await (const batch of source) {
        if (this.stopping) {
          break;
        }
        node.ingestVectors(batch);
      }
    })().catch((err) => {
      this.log.error(`pipeline: motion source failed: ${String(err)}`);
    });
  }
}
