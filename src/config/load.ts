import { readFile } from "node:fs/promises";
import { ConfigError } from "../pipeline/errors.js";
import type { PipelineConfig } from "./types.pipeline.js";
import { PipelineSchema } from "./zod-schema.pipeline.js";

export function parsePipelineConfig(raw: unknown, source = "config"): PipelineConfig {
  const result = PipelineSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`invalid ${source}: ${details}`);
  }
  return result.data;
}

export async function loadPipelineConfig(path: string): Promise<PipelineConfig> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    throw new ConfigError(`cannot read ${path}: ${String(err)}`);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`${path} is not valid JSON: ${String(err)}`);
  }
  return parsePipelineConfig(raw, path);
}
