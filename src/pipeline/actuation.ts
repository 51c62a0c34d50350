import type { ActuatorDriver, ActuatorResult } from "./actuator-driver.js";
import { ActuatorWriteFailure } from "./errors.js";
import { applyServoReadout } from "./readout.js";
import type { PipelineLogger, ReadoutModel, ServoCommand } from "./types.js";

export type ServoSpec = {
  id: number;
  minAngle: number;
  maxAngle: number;
  /** Time for a full min→max sweep. */
  speedMs: number;
};

export const DEFAULT_CUBE_SERVOS: ReadonlyArray<ServoSpec> = Object.freeze(
  [0, 1, 2, 3, 4].map((id) => Object.freeze({ id, minAngle: -150, maxAngle: 150, speedMs: 1000 })),
);

export const DEFAULT_CLOCK_SERVO: ServoSpec = Object.freeze({
  id: 5,
  minAngle: -150,
  maxAngle: 150,
  speedMs: 1000,
});

/** Clock angle per four-hour sector of the day. */
export const CLOCK_ANGLES = [-150, -90, -30, 30, 90, 150] as const;

export function clockSector(at: Date): number {
  return Math.floor(at.getHours() / 4);
}

export function clockAngle(at: Date): number {
  return CLOCK_ANGLES[clockSector(at)] ?? CLOCK_ANGLES[0];
}

export function clampAngle(angle: number, servo: Pick<ServoSpec, "minAngle" | "maxAngle">): number {
  return Math.max(servo.minAngle, Math.min(servo.maxAngle, angle));
}

/** Largest angle change a servo may make in one tick. */
export function maxStepPerTick(servo: ServoSpec, tickMs: number): number {
  return ((servo.maxAngle - servo.minAngle) * tickMs) / servo.speedMs;
}

export function describeCommand(command: ServoCommand): string {
  return command.kind === "relay"
    ? `relay ${command.on ? "on" : "off"}`
    : `servo ${command.servoId} ${command.angleDegrees.toFixed(1)}`;
}

export type ActuationMapperOptions = {
  driver: ActuatorDriver;
  /** Active readout, read on every mapping. */
  model: () => ReadoutModel;
  servos?: ReadonlyArray<ServoSpec>;
  /** Null disables the clock servo. */
  clockServo?: ServoSpec | null;
  /** Degrees per unit readout output. Default: 150. */
  outputGain?: number;
  tickMs?: number;
  /** Relay turns on when the mean |state| reaches this value. Omit to disable the relay. */
  relayThreshold?: number;
  clock?: () => Date;
  log?: PipelineLogger;
};

export type ActuationReport = {
  commands: ServoCommand[];
  dispatched: number;
  failed: number;
};

/**
 * Final stage: readout → cube angles (rate-limited, then clamped), the clock
 * angle from wall time and an optional relay command.
 */
export class ActuationMapper {
  private readonly driver: ActuatorDriver;
  private readonly model: () => ReadoutModel;
  private readonly servos: ReadonlyArray<ServoSpec>;
  private readonly clockServo: ServoSpec | null;
  private readonly outputGain: number;
  private readonly tickMs: number;
  private readonly relayThreshold?: number;
  private readonly clock: () => Date;
  private readonly log?: PipelineLogger;
  private readonly lastAngles = new Map<number, number>();

  constructor(opts: ActuationMapperOptions) {
    this.driver = opts.driver;
    this.model = opts.model;
    this.servos = opts.servos ?? DEFAULT_CUBE_SERVOS;
    this.clockServo = opts.clockServo === undefined ? DEFAULT_CLOCK_SERVO : opts.clockServo;
    this.outputGain = opts.outputGain ?? 150;
    this.tickMs = opts.tickMs ?? 1000;
    this.relayThreshold = opts.relayThreshold;
    this.clock = opts.clock ?? (() => new Date());
    this.log = opts.log;
  }

  /** Commands for one tick. Updates the rate limiter's notion of each servo's position. */
  map(state: ReadonlyArray<number>): ServoCommand[] {
    const outputs = applyServoReadout(this.model(), state);
    const commands: ServoCommand[] = this.servos.map((servo, i) => {
      const raw = (outputs[i] ?? 0) * this.outputGain;
      const previous = this.lastAngles.get(servo.id);
      let angle = Number.isFinite(raw) ? raw : (previous ?? 0);
      if (previous !== undefined) {
        const step = maxStepPerTick(servo, this.tickMs);
        angle = Math.max(previous - step, Math.min(previous + step, angle));
      }
      angle = clampAngle(angle, servo);
      this.lastAngles.set(servo.id, angle);
      return { kind: "angle", servoId: servo.id, angleDegrees: angle };
    });

    if (this.clockServo) {
      commands.push({
        kind: "angle",
        servoId: this.clockServo.id,
        angleDegrees: clampAngle(clockAngle(this.clock()), this.clockServo),
      });
    }

    if (this.relayThreshold !== undefined && state.length > 0) {
      const meanAbs = state.reduce((sum, x) => sum + Math.abs(x), 0) / state.length;
      commands.push({ kind: "relay", on: meanAbs >= this.relayThreshold });
    }
    return commands;
  }

  /** Map and dispatch. Write failures are logged and dropped. */
  async actuate(state: ReadonlyArray<number>): Promise<ActuationReport> {
    const commands = this.map(state);
    let dispatched = 0;
    let failed = 0;
    for (const command of commands) {
      const result = await this.dispatch(command);
      if (result.ok) {
        dispatched += 1;
      } else {
        failed += 1;
        this.log?.warn(`actuation: ${result.error.message}`);
      }
    }
    return { commands, dispatched, failed };
  }

  private async dispatch(command: ServoCommand): Promise<ActuatorResult> {
    try {
      if (command.kind === "relay") {
        return await this.driver.setRelay(command.on);
      }
      return await this.driver.setAngle(command.servoId, command.angleDegrees);
    } catch (err) {
      return { ok: false, error: new ActuatorWriteFailure(describeCommand(command), String(err)) };
    }
  }
}
