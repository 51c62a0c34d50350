import { Command } from "commander";
import { loadPipelineConfig } from "../config/load.js";
import { clockAngle, clockSector } from "../pipeline/actuation.js";
import {
  type ActuatorDriver,
  createLoggingLineChannel,
  RecordingActuatorDriver,
  SerialActuatorDriver,
  type ServoRange,
} from "../pipeline/actuator-driver.js";
import { ReplayMotionSource } from "../pipeline/motion-source.js";
import { configuredServoRanges, PipelineNodeRuntime } from "../pipeline/node-runtime.js";
import { runSimulation } from "../pipeline/simulation.js";
import { createTopologyRouter } from "../pipeline/topology.js";
import type { PipelineLogger } from "../pipeline/types.js";

const consoleLog: PipelineLogger = {
  info: (msg) => console.log(msg),
  warn: (msg) => console.warn(msg),
  error: (msg) => console.error(msg),
};

const silentLog: PipelineLogger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new Error(`expected an integer, got "${value}"`);
  }
  return parsed;
}

function parseProbability(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed < 0 || parsed > 1) {
    throw new Error(`expected a probability in [0, 1], got "${value}"`);
  }
  return parsed;
}

/** "HH:MM" on today's date. */
export function parseClockTime(value: string, base = new Date()): Date {
  const match = /^(\d{1,2}):(\d{2})$/.exec(value.trim());
  if (!match) {
    throw new Error(`invalid time "${value}" (use HH:MM)`);
  }
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (hours > 23 || minutes > 59) {
    throw new Error(`invalid time "${value}" (use HH:MM)`);
  }
  const at = new Date(base);
  at.setHours(hours, minutes, 0, 0);
  return at;
}

function createActuator(kind: string, ranges: ReadonlyArray<ServoRange> = []): ActuatorDriver {
  if (kind === "log") {
    return new SerialActuatorDriver({ channel: createLoggingLineChannel(consoleLog), ranges });
  }
  if (kind === "none") {
    return new RecordingActuatorDriver();
  }
  throw new Error(`unknown actuator "${kind}" (use log or none)`);
}

export function createPipelineCli(): Command {
  const program = new Command();
  program
    .name("rchain")
    .description("Distributed reservoir pipeline: motion in, servo angles out")
    .version("0.1.0");

  // ── runtime ──────────────────────────────────────────────
  program
    .command("start")
    .description("Run one node of the pipeline over WebSocket links")
    .requiredOption("--config <file>", "Pipeline config (JSON)")
    .requiredOption("--node <name>", "Node name from the config")
    .option("--replay <file>", "Recorded movement batches to feed a source or builder node")
    .option("--replay-interval <ms>", "Delay between replayed batches", parseInteger, 100)
    .option("--actuator <kind>", "Sink actuator: log (serial protocol to stdout) or none", "log")
    .action(
      async (opts: {
        config: string;
        node: string;
        replay?: string;
        replayInterval: number;
        actuator: string;
      }) => {
        const config = await loadPipelineConfig(opts.config);
        const motionSource = opts.replay
          ? await ReplayMotionSource.fromFile(opts.replay, {
              intervalMs: opts.replayInterval,
              loop: true,
            })
          : undefined;
        const runtime = new PipelineNodeRuntime({
          config,
          nodeName: opts.node,
          actuator: createActuator(opts.actuator, configuredServoRanges(config)),
          motionSource,
          log: consoleLog,
        });

        await runtime.start();
        console.log(`Node:       ${runtime.identity.name} (${runtime.identity.role})`);
        console.log(`Listening:  ${runtime.upstream.length > 0 ? runtime.identity.listenAddress : "(no upstream)"}`);
        console.log(`Downstream: ${runtime.route.downstream?.address ?? "(terminal)"}`);
        console.log("Press Ctrl+C to stop.");

        await new Promise<void>((resolve) => {
          const shutdown = async () => {
            process.off("SIGINT", onSignal);
            process.off("SIGTERM", onSignal);
            await runtime.stop();
            resolve();
          };
          const onSignal = () => {
            shutdown().catch((err) => {
              console.error(`pipeline: shutdown failed: ${String(err)}`);
              resolve();
            });
          };
          process.once("SIGINT", onSignal);
          process.once("SIGTERM", onSignal);
        });
      },
    );

  // ── topology ─────────────────────────────────────────────
  program
    .command("topology")
    .description("Print the resolved links of a pipeline config")
    .requiredOption("--config <file>", "Pipeline config (JSON)")
    .action(async (opts: { config: string }) => {
      const config = await loadPipelineConfig(opts.config);
      const router = createTopologyRouter(config.nodes);
      for (const name of router.names()) {
        const route = router.route(name);
        const upstream = route.upstream.map((peer) => peer.name).join(", ") || "-";
        console.log(
          `${name.padEnd(10)} ${route.identity.role.padEnd(8)} ${route.identity.listenAddress.padEnd(28)} <- ${upstream}  -> ${route.downstream?.name ?? "-"}`,
        );
      }
      const origin = config.nodes.find((node) => node.role === "source") ?? config.nodes[0];
      const walk = router.walk(origin.name);
      console.log(`Path from ${origin.name}: ${walk.path.join(" -> ")}${walk.closesRing ? " -> (ring)" : ""}`);
    });

  // ── simulation ───────────────────────────────────────────
  program
    .command("simulate")
    .description("Run a whole chain in-process over a lossy simulated network")
    .option("--nodes <n>", "Chain length", parseInteger, 3)
    .option("--ticks <n>", "Movement batches to feed", parseInteger, 20)
    .option("--loss <p>", "Packet loss probability", parseProbability, 0.1)
    .option("--duplicate <p>", "Packet duplication probability", parseProbability, 0.05)
    .option("--seed <n>", "Seed for the network and the motion source", parseInteger, 1)
    .option("--verbose", "Log every node's activity")
    .action(
      async (opts: {
        nodes: number;
        ticks: number;
        loss: number;
        duplicate: number;
        seed: number;
        verbose?: boolean;
      }) => {
        const report = await runSimulation({
          nodes: opts.nodes,
          ticks: opts.ticks,
          lossRate: opts.loss,
          duplicateRate: opts.duplicate,
          seed: opts.seed,
          log: opts.verbose ? consoleLog : silentLog,
        });
        for (const node of report.nodes) {
          console.log(
            `${node.name} ${node.role.padEnd(8)} updates=${node.updates} reemits=${node.reemits} models=${node.modelsInstalled}`,
          );
        }
        for (const link of report.links) {
          const s = link.stats;
          console.log(
            `${link.from} -> ${link.to}: tx=${s.transmissions} acked=${s.acknowledged} degraded=${s.degraded}`,
          );
        }
        console.log(
          `Network: sent=${report.network.sent} dropped=${report.network.dropped} duplicated=${report.network.duplicated}`,
        );
        console.log(`Model updates: ${report.modelUpdates}`);
        console.log(
          `Final angles: ${report.finalAngles.map((a) => `${a.servoId}=${a.angleDegrees.toFixed(1)}`).join(" ")}`,
        );
      },
    );

  // ── clock ────────────────────────────────────────────────
  program
    .command("clock")
    .description("Print the clock servo sector and angle")
    .option("--time <HH:MM>", "Time of day (default: now)")
    .action((opts: { time?: string }) => {
      const at = opts.time ? parseClockTime(opts.time) : new Date();
      console.log(`Sector: ${clockSector(at)}`);
      console.log(`Angle:  ${clockAngle(at)}`);
    });

  return program;
}
