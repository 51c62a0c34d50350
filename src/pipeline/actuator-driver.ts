import { ActuatorWriteFailure } from "./errors.js";
import type { PipelineLogger } from "./types.js";

export type ActuatorResult = { ok: true } | { ok: false; error: ActuatorWriteFailure };

export interface ActuatorDriver {
  setAngle(servoId: number, angleDegrees: number): Promise<ActuatorResult>;
  setRelay(on: boolean): Promise<ActuatorResult>;
}

/** Request/reply text channel to a microcontroller (one line out, one line back). */
export interface LineChannel {
  request(line: string): Promise<string>;
}

export const SERIAL_LEVEL_MIN = 20;
export const SERIAL_LEVEL_MAX = 127;

/**
 * Map an angle within [minAngle, maxAngle] onto the controller's accepted
 * level range 20..127.
 */
export function angleToLevel(angleDegrees: number, minAngle: number, maxAngle: number): number {
  const span = maxAngle - minAngle;
  const fraction = span > 0 ? (angleDegrees - minAngle) / span : 0;
  const clamped = Math.max(0, Math.min(1, fraction));
  return Math.round(SERIAL_LEVEL_MIN + clamped * (SERIAL_LEVEL_MAX - SERIAL_LEVEL_MIN));
}

export type ServoRange = { id: number; minAngle: number; maxAngle: number };

export type SerialActuatorDriverOptions = {
  channel: LineChannel;
  /** Angle range per servo id. Servos not listed use the default range. */
  ranges?: ReadonlyArray<ServoRange>;
  /** Default: -150. */
  minAngle?: number;
  /** Default: 150. */
  maxAngle?: number;
};

/**
 * Text line protocol: "on"/"off" for the relay and "<servoId> <level>" for
 * servo angles. The controller answers "ok" on success.
 */
export class SerialActuatorDriver implements ActuatorDriver {
  private readonly channel: LineChannel;
  private readonly fallback: { minAngle: number; maxAngle: number };
  private readonly ranges = new Map<number, ServoRange>();

  constructor(opts: SerialActuatorDriverOptions) {
    this.channel = opts.channel;
    this.fallback = { minAngle: opts.minAngle ?? -150, maxAngle: opts.maxAngle ?? 150 };
    for (const range of opts.ranges ?? []) {
      this.ranges.set(range.id, range);
    }
  }

  rangeOf(servoId: number): { minAngle: number; maxAngle: number } {
    return this.ranges.get(servoId) ?? this.fallback;
  }

  async setAngle(servoId: number, angleDegrees: number): Promise<ActuatorResult> {
    const { minAngle, maxAngle } = this.rangeOf(servoId);
    return await this.write(`${servoId} ${angleToLevel(angleDegrees, minAngle, maxAngle)}`);
  }

  async setRelay(on: boolean): Promise<ActuatorResult> {
    return await this.write(on ? "on" : "off");
  }

  private async write(line: string): Promise<ActuatorResult> {
    let reply: string;
    try {
      reply = await this.channel.request(line);
    } catch (err) {
      return { ok: false, error: new ActuatorWriteFailure(line, String(err)) };
    }
    const trimmed = reply.trim();
    if (trimmed !== "ok") {
      return { ok: false, error: new ActuatorWriteFailure(line, `unexpected reply "${trimmed}"`) };
    }
    return { ok: true };
  }
}

/** Channel that logs each line and always answers "ok". Used by `start --actuator log`. */
export function createLoggingLineChannel(log: PipelineLogger): LineChannel {
  return {
    request: async (line) => {
      log.info(`actuation: -> ${line}`);
      return "ok";
    },
  };
}

export type ServoStateRecord = {
  servoId: number;
  angleDegrees: number;
  updatedAtMs: number;
};

export type ActuatorHistoryEvent =
  | { kind: "angle"; servoId: number; angleDegrees: number; appliedAtMs: number }
  | { kind: "relay"; on: boolean; appliedAtMs: number };

/** In-memory actuator for simulation and tests. Keeps the latest state and a bounded history. */
export class RecordingActuatorDriver implements ActuatorDriver {
  private servos = new Map<number, ServoStateRecord>();
  private relay: boolean | null = null;
  private history: ActuatorHistoryEvent[] = [];
  private maxHistory: number;
  private log?: PipelineLogger;
  private now: () => number;

  constructor(opts?: { maxHistory?: number; log?: PipelineLogger; now?: () => number }) {
    this.maxHistory = Math.max(1, opts?.maxHistory ?? 100);
    this.log = opts?.log;
    this.now = opts?.now ?? Date.now;
  }

  async setAngle(servoId: number, angleDegrees: number): Promise<ActuatorResult> {
    const appliedAtMs = this.now();
    this.servos.set(servoId, { servoId, angleDegrees, updatedAtMs: appliedAtMs });
    this.push({ kind: "angle", servoId, angleDegrees, appliedAtMs });
    this.log?.info(`actuation: servo ${servoId} <- ${angleDegrees.toFixed(1)}°`);
    return { ok: true };
  }

  async setRelay(on: boolean): Promise<ActuatorResult> {
    const appliedAtMs = this.now();
    this.relay = on;
    this.push({ kind: "relay", on, appliedAtMs });
    this.log?.info(`actuation: relay <- ${on ? "on" : "off"}`);
    return { ok: true };
  }

  angle(servoId: number): number | undefined {
    return this.servos.get(servoId)?.angleDegrees;
  }

  snapshot() {
    return {
      servos: [...this.servos.values()].map((s) => ({ ...s })),
      relay: this.relay,
      history: this.history.map((h) => ({ ...h })),
    };
  }

  private push(event: ActuatorHistoryEvent): void {
    this.history.push(event);
    if (this.history.length > this.maxHistory) {
      this.history.splice(0, this.history.length - this.maxHistory);
    }
  }
}
