import { mkdtemp, readdir, rm } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import type { PipelineConfig } from "../config/types.pipeline.js";
import { type ActuatorDriver, RecordingActuatorDriver } from "./actuator-driver.js";
import { UnknownPeer } from "./errors.js";
import { MemoryNetwork } from "./link-transport.js";
import { createMovementVector, ReplayMotionSource } from "./motion-source.js";
import { configuredServoRanges, PipelineNodeRuntime } from "./node-runtime.js";
import { encodeModelPayload, encodeStatePayload } from "./payloads.js";
import { createIdentityReadout, EMPTY_METRICS } from "./readout.js";
import { defineReservoir } from "./reservoir.js";
import type { Message, MovementVector, PayloadType, ReadoutModel } from "./types.js";
import { encodeMessage } from "./wire-codec.js";

const quiet = { info: () => {}, warn: () => {}, error: () => {} };

function identity(n: number, scale: number): number[][] {
  return Array.from({ length: n }, (_, i) => Array.from({ length: n }, (_, j) => (i === j ? scale : 0)));
}

function chainConfig(middleRole: "relay" | "trainer"): PipelineConfig {
  return {
    nodes: [
      { name: "res00", host: "mem.local", port: 9100, role: "source", destination: "res01" },
      { name: "res01", host: "mem.local", port: 9101, role: middleRole, destination: "res02" },
      { name: "res02", host: "mem.local", port: 9102, role: "sink" },
    ],
    link: { retryTimeoutMs: 20, backoffFactor: 1.5, maxAttempts: 8 },
    reservoir: { stateDim: 5 },
    training: { everyExamples: 2 },
    actuation: { clockServo: false, outputGain: 1 },
    motion: { regions: ["r0", "r1", "r2", "r3", "r4"], timeFeatures: false },
  };
}

/** Pass-through readout scaled by 1000. */
const sinkModel: ReadoutModel = {
  weights: identity(5, 1000).map((row) => [...row, 0]),
  classes: [],
  servoWeights: identity(5, 1000).map((row) => [...row, 0]),
  trainedAtMs: 0,
  metrics: EMPTY_METRICS,
  updatesPerformed: 0,
};

function message(
  route: { from: string; to: string },
  sequence: number,
  payloadType: PayloadType,
  payload: Uint8Array,
): Message {
  return {
    sourceId: route.from,
    destinationId: route.to,
    epoch: 7,
    sequence,
    payloadType,
    payload,
    createdAtMs: 0,
  };
}

function batch(magnitudes: Record<string, [number, number]>, frameIndex = 0): MovementVector[] {
  return Object.entries(magnitudes).map(([regionId, [dx, dy]]) =>
    createMovementVector({ regionId, dx, dy, frameIndex, timestampMs: frameIndex }),
  );
}

describe("PipelineNodeRuntime", () => {
  let network: MemoryNetwork | null = null;
  let runtimes: PipelineNodeRuntime[] = [];

  afterEach(async () => {
    for (const runtime of runtimes) {
      await runtime.stop();
    }
    runtimes = [];
    network?.shutdown();
    network = null;
  });

  async function startChain(config: PipelineConfig, build: (name: string) => PipelineNodeRuntime) {
    runtimes = config.nodes.map((node) => build(node.name));
    for (const runtime of [...runtimes].reverse()) {
      await runtime.start();
    }
    return runtimes;
  }

  async function startRelayChain(batches: MovementVector[][], actuator: RecordingActuatorDriver) {
    const net = new MemoryNetwork();
    network = net;
    const config = chainConfig("relay");
    return await startChain(config, (name) => {
      if (name === "res00") {
        return new PipelineNodeRuntime({
          config,
          nodeName: name,
          transports: net,
          reservoir: defineReservoir({ win: identity(5, 0.01), wres: identity(5, 0), leakRate: 1 }),
          motionSource: new ReplayMotionSource({ batches }),
          log: quiet,
        });
      }
      if (name === "res01") {
        return new PipelineNodeRuntime({
          config,
          nodeName: name,
          transports: net,
          reservoir: defineReservoir({ win: identity(5, 1), wres: identity(5, 0), leakRate: 1 }),
          log: quiet,
        });
      }
      return new PipelineNodeRuntime({
        config,
        nodeName: name,
        transports: net,
        actuator,
        initialModel: sinkModel,
        log: quiet,
      });
    });
  }

  it("carries movement from the source to the sink actuators", async () => {
    const actuator = new RecordingActuatorDriver();
    const [source, relay, sink] = await startRelayChain(
      [batch({ r0: [3, 4], r1: [6, 8], r3: [30, 40], r4: [60, 80] })],
      actuator,
    );

    await vi.waitFor(() => expect(actuator.snapshot().servos).toHaveLength(5));

    const expected = [5, 10, 0, 50, 100].map((m) => Math.min(150, 1000 * Math.tanh(Math.tanh(0.01 * m))));
    for (let id = 0; id < 5; id++) {
      expect(actuator.angle(id)).toBeCloseTo(expected[id], 9);
    }
    expect(actuator.angle(3)).toBe(150);
    expect(source.downstream?.peerId).toBe("res01");
    expect(relay.upstream.map((link) => link.peerId)).toEqual(["res00"]);
    expect(sink.downstream).toBeNull();
    expect(sink.reservoirNode.snapshot().lastSequence).toBe(0);
    expect(sink.reservoirNode.stats.updates).toBe(1);
  });

  it("drives over-range input to the same clamped angles as input already at the limit", async () => {
    const actuator = new RecordingActuatorDriver();
    await startRelayChain(
      [
        batch({ r0: [300, 400], r1: [0, 400], r3: [180, 240], r4: [360, 480] }, 0),
        batch({ r0: [90, 120], r1: [90, 120], r3: [90, 120], r4: [90, 120] }, 1),
      ],
      actuator,
    );

    await vi.waitFor(() => expect(actuator.snapshot().history).toHaveLength(10));

    const angles = actuator.snapshot().history.map((event) => (event.kind === "angle" ? event.angleDegrees : null));
    expect(angles.slice(0, 5)).toEqual([150, 150, 0, 150, 150]);
    expect(angles.slice(5)).toEqual(angles.slice(0, 5));
  });

  it("publishes trained models down the chain", async () => {
    network = new MemoryNetwork();
    const config = chainConfig("trainer");
    const net = network;
    const [, trainer, sink] = await startChain(
      config,
      (name) =>
        new PipelineNodeRuntime({
          config,
          nodeName: name,
          transports: net,
          motionSource:
            name === "res00"
              ? new ReplayMotionSource({
                  batches: [
                    batch({ r0: [3, 4], r1: [0, 2] }, 0),
                    batch({ r0: [30, 40], r2: [60, 80] }, 1),
                    batch({ r1: [6, 8] }, 2),
                    batch({ r3: [12, 16], r4: [24, 32] }, 3),
                  ],
                })
              : undefined,
          log: quiet,
        }),
    );

    await vi.waitFor(() => expect(sink.models.current.updatesPerformed).toBeGreaterThanOrEqual(1));

    expect(trainer.supervisor?.buffer.totalRecorded).toBeGreaterThanOrEqual(2);
    expect(sink.models.current.weights).toHaveLength(sink.models.current.classes.length);
    expect(sink.models.current.servoWeights).toHaveLength(5);
    expect(sink.reservoirNode.stats.modelsInstalled).toBeGreaterThanOrEqual(1);
  });

  it("evolves the reservoir on the node after a source that emits vectors", async () => {
    const net = new MemoryNetwork();
    network = net;
    const base = chainConfig("relay");
    const config: PipelineConfig = {
      ...base,
      nodes: base.nodes.map((node) => (node.name === "res00" ? { ...node, emit: "vector" } : node)),
    };
    const actuator = new RecordingActuatorDriver();
    const [source, relay] = await startChain(config, (name) => {
      if (name === "res00") {
        return new PipelineNodeRuntime({
          config,
          nodeName: name,
          transports: net,
          motionSource: new ReplayMotionSource({
            batches: [batch({ r0: [3, 4], r1: [6, 8], r3: [30, 40], r4: [60, 80] })],
          }),
          log: quiet,
        });
      }
      if (name === "res01") {
        return new PipelineNodeRuntime({
          config,
          nodeName: name,
          transports: net,
          reservoir: defineReservoir({ win: identity(5, 0.01), wres: identity(5, 0), leakRate: 1 }),
          log: quiet,
        });
      }
      return new PipelineNodeRuntime({
        config,
        nodeName: name,
        transports: net,
        actuator,
        initialModel: sinkModel,
        log: quiet,
      });
    });

    await vi.waitFor(() => expect(actuator.snapshot().servos).toHaveLength(5));

    const expected = [5, 10, 0, 50, 100].map((m) => Math.min(150, 1000 * Math.tanh(0.01 * m)));
    for (let id = 0; id < 5; id++) {
      expect(actuator.angle(id)).toBeCloseTo(expected[id], 9);
    }
    expect(source.emitsVectors).toBe(true);
    expect(source.reservoirNode.stats.updates).toBe(0);
    expect(relay.receivesVectors).toBe(true);
    expect(relay.reservoirNode.stats.updates).toBe(1);
  });

  it("re-emits the held state when an upstream frame fails to decode", async () => {
    const net = new MemoryNetwork();
    network = net;
    const config: PipelineConfig = { ...chainConfig("relay"), tickMs: 20 };
    const relay = new PipelineNodeRuntime({ config, nodeName: "res01", transports: net, reservoir: null, log: quiet });
    const sink = new PipelineNodeRuntime({ config, nodeName: "res02", transports: net, log: quiet });
    runtimes = [relay, sink];
    await sink.start();
    await relay.start();
    const upstream = net.connect("ws://mem.local:9101");
    const route = { from: "res00", to: "res01" };
    const state = [0.1, 0.2, 0.3, 0.4, 0.5];

    upstream.send(encodeMessage(message(route, 0, "STATE", encodeStatePayload({ state, target: 1 }))));
    await vi.waitFor(() => expect(sink.reservoirNode.stats.updates).toBe(1));

    const corrupt = encodeMessage(message(route, 1, "STATE", encodeStatePayload({ state: [0.9], target: 2 })));
    corrupt[corrupt.length - 1] ^= 0xff;
    upstream.send(corrupt);

    await vi.waitFor(() => expect(sink.reservoirNode.stats.updates).toBe(2));
    expect(relay.upstream[0].stats.decodeErrors).toBe(1);
    expect(relay.reservoirNode.stats.inboundFailures).toBe(1);
    expect(relay.reservoirNode.stats.reemits).toBe(1);
    expect(sink.reservoirNode.snapshot()).toEqual({ nodeId: "res02", vector: state, lastSequence: 1 });
    await upstream.close();
  });

  it("re-emits the held state after skipping a lost upstream frame", async () => {
    const net = new MemoryNetwork();
    network = net;
    const base = chainConfig("relay");
    const config: PipelineConfig = { ...base, tickMs: 20, link: { ...base.link, reorderTimeoutMs: 30 } };
    const relay = new PipelineNodeRuntime({ config, nodeName: "res01", transports: net, reservoir: null, log: quiet });
    const sink = new PipelineNodeRuntime({ config, nodeName: "res02", transports: net, log: quiet });
    runtimes = [relay, sink];
    await sink.start();
    await relay.start();
    const upstream = net.connect("ws://mem.local:9101");
    const route = { from: "res00", to: "res01" };

    upstream.send(encodeMessage(message(route, 0, "STATE", encodeStatePayload({ state: [0.5, 0, 0, 0, 0] }))));
    await vi.waitFor(() => expect(sink.reservoirNode.stats.updates).toBe(1));

    // seq 1 never arrives; seq 2 carries a model, which leaves the state as it was.
    const model: ReadoutModel = { ...createIdentityReadout(5), updatesPerformed: 1 };
    upstream.send(encodeMessage(message(route, 2, "MODEL_UPDATE", encodeModelPayload(model))));

    await vi.waitFor(() => expect(sink.reservoirNode.stats.updates).toBe(2));
    expect(relay.upstream[0].stats.gapSkips).toBe(1);
    expect(relay.reservoirNode.stats.inboundFailures).toBe(1);
    expect(relay.reservoirNode.stats.reemits).toBe(1);
    expect(relay.models.current.updatesPerformed).toBe(1);
    await vi.waitFor(() => expect(sink.models.current.updatesPerformed).toBe(1));
    await upstream.close();
  });

  it("actuates only the newest state while the actuator is busy", async () => {
    const config = chainConfig("relay");
    const recorder = new RecordingActuatorDriver();
    const gates: Array<() => void> = [];
    const actuator: ActuatorDriver = {
      setAngle: async (servoId, angleDegrees) => {
        await new Promise<void>((resolve) => gates.push(resolve));
        return await recorder.setAngle(servoId, angleDegrees);
      },
      setRelay: async (on) => await recorder.setRelay(on),
    };
    const sink = new PipelineNodeRuntime({
      config,
      nodeName: "res02",
      transports: new MemoryNetwork(),
      actuator,
      log: quiet,
    });
    runtimes = [sink];
    await sink.start();

    for (let i = 0; i < 10; i++) {
      const level = (i + 1) / 20;
      sink.reservoirNode.handleMessage(
        message({ from: "res01", to: "res02" }, i, "STATE", encodeStatePayload({ state: new Array<number>(5).fill(level) })),
      );
    }
    for (let write = 0; write < 10; write++) {
      await vi.waitFor(() => expect(gates).toHaveLength(1));
      gates.shift()?.();
    }

    await vi.waitFor(() => expect(sink.actuationStats.applied).toBe(2));
    expect(sink.actuationStats.superseded).toBe(8);
    const angles = recorder.snapshot().history.map((event) => (event.kind === "angle" ? event.angleDegrees : null));
    expect(angles).toHaveLength(10);
    angles.slice(0, 5).forEach((angle) => expect(angle).toBeCloseTo(0.05, 12));
    angles.slice(5).forEach((angle) => expect(angle).toBeCloseTo(0.5, 12));
  });

  it("stores examples and models and restores them on the next start", async () => {
    const dataDir = await mkdtemp(path.join(os.tmpdir(), "pipeline-runtime-"));
    try {
      const base = chainConfig("trainer");
      const config: PipelineConfig = { ...base, training: { everyExamples: 2, dataDir } };
      const startTrainer = async () => {
        const net = new MemoryNetwork();
        network = net;
        const trainer = new PipelineNodeRuntime({
          config,
          nodeName: "res01",
          transports: net,
          reservoir: null,
          log: quiet,
        });
        const sink = new PipelineNodeRuntime({ config, nodeName: "res02", transports: net, log: quiet });
        runtimes = [trainer, sink];
        await sink.start();
        await trainer.start();
        return { trainer, sink };
      };

      const first = await startTrainer();
      const states = [
        [0.8, 0, 0, 0, 0],
        [0, 0.8, 0, 0, 0],
        [0.7, 0.1, 0, 0, 0],
        [0.1, 0.7, 0, 0, 0],
      ];
      states.forEach((state, i) => {
        first.trainer.reservoirNode.handleMessage(
          message({ from: "res00", to: "res01" }, i, "STATE", encodeStatePayload({ state, target: i % 2 })),
        );
      });
      expect(first.trainer.models.current.updatesPerformed).toBe(2);
      await first.trainer.stop();
      await first.sink.stop();
      network?.shutdown();

      const files = await readdir(dataDir);
      expect(files.filter((name) => name.startsWith("model-"))).toHaveLength(2);
      expect(files.filter((name) => name.startsWith("examples-"))).toHaveLength(1);

      const second = await startTrainer();
      expect(second.trainer.models.current.updatesPerformed).toBe(2);
      expect(second.trainer.supervisor?.buffer.size).toBe(4);
      await vi.waitFor(() => expect(second.sink.models.current.updatesPerformed).toBe(2));
    } finally {
      for (const runtime of runtimes) {
        await runtime.stop();
      }
      runtimes = [];
      await rm(dataDir, { recursive: true, force: true });
    }
  });

  it("lists configured servo ranges for the serial driver", () => {
    const config: PipelineConfig = {
      ...chainConfig("relay"),
      actuation: { servos: [{ id: 0, minAngle: -90, maxAngle: 90 }, { id: 1 }], clockServo: { id: 5, maxAngle: 60 } },
    };
    expect(configuredServoRanges(config)).toEqual([
      { id: 0, minAngle: -90, maxAngle: 90 },
      { id: 1, minAngle: -150, maxAngle: 150 },
      { id: 5, minAngle: -150, maxAngle: 60 },
    ]);
  });

  it("rejects a node name outside the topology", () => {
    expect(
      () => new PipelineNodeRuntime({ config: chainConfig("relay"), nodeName: "res09", log: quiet }),
    ).toThrow(UnknownPeer);
  });

  it("has no reservoir node before start", () => {
    const runtime = new PipelineNodeRuntime({
      config: chainConfig("relay"),
      nodeName: "res01",
      transports: new MemoryNetwork(),
      log: quiet,
    });
    expect(() => runtime.reservoirNode).toThrow(/not started/);
  });
});
