import type { PipelineConfig, PipelineNodeConfig } from "../config/types.pipeline.js";
import { RecordingActuatorDriver } from "./actuator-driver.js";
import { MemoryNetwork } from "./link-transport.js";
import { ReplayMotionSource, SyntheticMotionSource } from "./motion-source.js";
import { DEFAULT_REGION_IDS, PipelineNodeRuntime } from "./node-runtime.js";
import type { ReliableLinkStats } from "./reliable-link.js";
import type { NodeRole, PipelineLogger } from "./types.js";

export type SimulationOptions = {
  /** Chain length including source and sink. Default: 3. */
  nodes?: number;
  /** Movement batches fed to the source. Default: 20. */
  ticks?: number;
  lossRate?: number;
  duplicateRate?: number;
  maxDelayMs?: number;
  seed?: number;
  /** Delay between movement batches. Default: 20. */
  intervalMs?: number;
  /** Trainer cycle size. Default: 10. */
  everyExamples?: number;
  log?: PipelineLogger;
};

export type SimulationReport = {
  nodes: Array<{ name: string; role: NodeRole; updates: number; reemits: number; modelsInstalled: number }>;
  links: Array<{ from: string; to: string; stats: ReliableLinkStats }>;
  network: { sent: number; dropped: number; duplicated: number };
  finalAngles: Array<{ servoId: number; angleDegrees: number }>;
  modelUpdates: number;
};

function chainRole(index: number, count: number): NodeRole {
  if (index === 0) {
    return "source";
  }
  if (index === count - 1) {
    return "sink";
  }
  return index === count - 2 ? "trainer" : "relay";
}

/** source → relay… → trainer → sink, with in-process addresses. */
export function createChainConfig(count: number, basePort = 9000): PipelineConfig {
  if (!Number.isInteger(count) || count < 2) {
    throw new Error(`a chain needs at least 2 nodes, got ${count}`);
  }
  const nodes: PipelineNodeConfig[] = [];
  for (let i = 0; i < count; i++) {
    const name = `res${String(i).padStart(2, "0")}`;
    nodes.push({
      name,
      host: "sim.local",
      port: basePort + i,
      role: chainRole(i, count),
      destination: i < count - 1 ? `res${String(i + 1).padStart(2, "0")}` : undefined,
    });
  }
  return { nodes };
}

function waitForUpdates(runtime: PipelineNodeRuntime, count: number): Promise<void> {
  const node = runtime.reservoirNode;
  return new Promise<void>((resolve) => {
    if (node.stats.updates >= count) {
      resolve();
      return;
    }
    const onState = () => {
      if (node.stats.updates >= count) {
        node.off("state", onState);
        resolve();
      }
    };
    node.on("state", onState);
  });
}

/**
 * Run a whole chain in one process over a lossy MemoryNetwork and report what
 * reached the sink.
 */
export async function runSimulation(opts: SimulationOptions = {}): Promise<SimulationReport> {
  const count = opts.nodes ?? 3;
  const ticks = opts.ticks ?? 20;
  const seed = opts.seed ?? 1;
  const config: PipelineConfig = {
    ...createChainConfig(count),
    // Every batch is accounted for at the sink, so no state may be superseded.
    link: { retryTimeoutMs: 10, backoffFactor: 1.5, maxAttempts: 10, reorderTimeoutMs: 200, coalesce: false },
    training: { everyExamples: opts.everyExamples ?? 10 },
    motion: { regions: [...DEFAULT_REGION_IDS], timeFeatures: true },
    tickMs: 100,
  };
  const network = new MemoryNetwork({
    lossRate: opts.lossRate ?? 0,
    duplicateRate: opts.duplicateRate ?? 0,
    maxDelayMs: opts.maxDelayMs ?? 2,
    seed,
  });
  const synthetic = new SyntheticMotionSource({
    regions: DEFAULT_REGION_IDS.map((id) => ({ id })),
    seed,
  });
  const batches = Array.from({ length: ticks }, () => synthetic.nextBatch());
  const actuator = new RecordingActuatorDriver({ maxHistory: 1000, log: opts.log });

  const runtimes = config.nodes.map(
    (node) =>
      new PipelineNodeRuntime({
        config,
        nodeName: node.name,
        transports: network,
        actuator: node.role === "sink" ? actuator : undefined,
        motionSource:
          node.role === "source"
            ? new ReplayMotionSource({ batches, intervalMs: opts.intervalMs ?? 20 })
            : undefined,
        log: opts.log,
      }),
  );

  try {
    // Sink first so every downstream listener exists before traffic starts.
    for (const runtime of [...runtimes].reverse()) {
      await runtime.start();
    }
    await waitForUpdates(runtimes[0], ticks);
    for (const runtime of runtimes) {
      await runtime.downstream?.drain();
    }
  } finally {
    for (const runtime of runtimes) {
      await runtime.stop();
    }
    network.shutdown();
  }

  const links = runtimes.flatMap((runtime) => {
    const link = runtime.downstream;
    return link ? [{ from: link.localId, to: link.peerId, stats: { ...link.stats } }] : [];
  });
  const snapshot = actuator.snapshot();
  return {
    nodes: runtimes.map((runtime) => ({
      name: runtime.identity.name,
      role: runtime.identity.role,
      updates: runtime.reservoirNode.stats.updates,
      reemits: runtime.reservoirNode.stats.reemits,
      modelsInstalled: runtime.reservoirNode.stats.modelsInstalled,
    })),
    links,
    network: { ...network.stats },
    finalAngles: snapshot.servos.map((s) => ({ servoId: s.servoId, angleDegrees: s.angleDegrees })),
    modelUpdates: runtimes.reduce((max, runtime) => Math.max(max, runtime.models.current.updatesPerformed), 0),
  };
}
