import { z } from "zod";
import { MAX_STATE_DIM } from "../pipeline/payloads.js";

const NodeRoleSchema = z.enum(["source", "relay", "trainer", "builder", "sink"]);

const PipelineNodeSchema = z
  .object({
    name: z.string().min(1).max(255),
    host: z.string().min(1),
    port: z.number().int().min(0).max(65535),
    role: NodeRoleSchema,
    destination: z.string().min(1).optional(),
    emit: z.enum(["state", "vector"]).optional(),
    description: z.string().optional(),
  })
  .strict()
  .refine((node) => node.emit !== "vector" || (node.role === "source" && node.destination !== undefined), {
    message: 'emit "vector" needs a source node with a destination',
  });

const LinkSchema = z
  .object({
    retryTimeoutMs: z.number().int().positive().optional(),
    backoffFactor: z.number().min(1).optional(),
    maxAttempts: z.number().int().min(1).optional(),
    reorderTimeoutMs: z.number().int().positive().optional(),
    dedupWindow: z.number().int().min(1).optional(),
    coalesce: z.boolean().optional(),
  })
  .strict();

const ReservoirSchema = z
  .object({
    stateDim: z.number().int().min(1).max(MAX_STATE_DIM).optional(),
    leakRate: z.number().gt(0).max(1).optional(),
    spectralNorm: z.number().positive().optional(),
    inputScale: z.number().positive().optional(),
    seed: z.number().int().optional(),
  })
  .strict();

const TrainingSchema = z
  .object({
    bufferCapacity: z.number().int().min(2).optional(),
    everyExamples: z.number().int().min(1).optional(),
    intervalMs: z.number().int().positive().optional(),
    trainRatio: z.number().gt(0).lt(1).optional(),
    ridgeLambda: z.number().positive().optional(),
    dataDir: z.string().min(1).optional(),
  })
  .strict();

const ServoSchema = z
  .object({
    id: z.number().int().min(0),
    minAngle: z.number().optional(),
    maxAngle: z.number().optional(),
    speedMs: z.number().positive().optional(),
  })
  .strict()
  .refine((servo) => (servo.minAngle ?? -150) < (servo.maxAngle ?? 150), {
    message: "minAngle must be below maxAngle",
  });

const ActuationSchema = z
  .object({
    servos: z.array(ServoSchema).optional(),
    clockServo: z.union([ServoSchema, z.literal(false)]).optional(),
    outputGain: z.number().optional(),
    relayThreshold: z.number().min(0).max(1).optional(),
  })
  .strict();

const MotionSchema = z
  .object({
    regions: z.array(z.string().min(1)).min(1).optional(),
    timeFeatures: z.boolean().optional(),
    intervalMs: z.number().int().positive().optional(),
  })
  .strict();

export const PipelineSchema = z
  .object({
    nodes: z.array(PipelineNodeSchema).min(1),
    link: LinkSchema.optional(),
    reservoir: ReservoirSchema.optional(),
    training: TrainingSchema.optional(),
    actuation: ActuationSchema.optional(),
    motion: MotionSchema.optional(),
    tickMs: z.number().int().positive().optional(),
  })
  .strict();
