import { appendFile, mkdir, readdir, readFile, stat, writeFile } from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { PipelineLogger, ReadoutModel, TrainingExample } from "./types.js";

const EXAMPLE_FILE = /^examples-(\d{4}-\d{2}-\d{2})\.csv$/;
const MODEL_FILE = /^model-\d{8}T\d{9}Z-\d{6}\.json$/;
const CSV_HEADER_PREFIX = "recorded_at,target,split";

const RowsSchema = z.array(z.array(z.number()));

const StoredModelSchema = z
  .object({
    weights: RowsSchema,
    classes: z.array(z.number()),
    servoWeights: RowsSchema,
    trainedAtMs: z.number(),
    metrics: z
      .object({
        accuracy: z.number(),
        precision: z.number(),
        recall: z.number(),
        f1: z.number(),
        trainSize: z.number().int(),
        testSize: z.number().int(),
      })
      .strict(),
    updatesPerformed: z.number().int().min(0),
  })
  .strict();

export type TrainingStoreOptions = {
  /** Directory holding the daily example files and the model files. */
  dir: string;
  now?: () => number;
  log?: PipelineLogger;
};

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/** `20261018T101500123Z` */
function compactTimestamp(ms: number): string {
  return new Date(ms).toISOString().replace(/[-:.]/g, "");
}

export function exampleFileName(ms: number): string {
  return `examples-${new Date(ms).toISOString().slice(0, 10)}.csv`;
}

export function modelFileName(model: ReadoutModel, savedAtMs: number): string {
  return `model-${compactTimestamp(savedAtMs)}-${String(model.updatesPerformed).padStart(6, "0")}.json`;
}

export function formatExampleRow(example: TrainingExample, recordedAtMs: number): string {
  return [new Date(recordedAtMs).toISOString(), example.target, example.split ?? "", ...example.state].join(",");
}

/** Null for headers and rows that do not parse. */
export function parseExampleRow(line: string): TrainingExample | null {
  const fields = line.trim().split(",");
  if (fields.length < 3 || line.startsWith(CSV_HEADER_PREFIX)) {
    return null;
  }
  const [, targetField, split, ...stateFields] = fields;
  const target = Number(targetField);
  const state = stateFields.map(Number);
  if (targetField === "" || !Number.isFinite(target) || state.some((value) => !Number.isFinite(value))) {
    return null;
  }
  if (split === "train" || split === "test") {
    return { state, target, split };
  }
  return split === "" ? { state, target } : null;
}

/**
 * Trainer persistence: every recorded example is appended to a CSV file per
 * UTC day, and every trained model is written to its own timestamped JSON
 * file. On startup the trainer reloads the newest model and the most recent
 * examples.
 */
export class TrainingStore {
  readonly dir: string;
  private readonly now: () => number;
  private readonly log?: PipelineLogger;
  private pendingRows = new Map<string, string[]>();
  private writing: Promise<void> | null = null;
  private readonly knownFiles = new Set<string>();

  constructor(opts: TrainingStoreOptions) {
    this.dir = opts.dir;
    this.now = opts.now ?? Date.now;
    this.log = opts.log;
  }

  async open(): Promise<void> {
    await mkdir(this.dir, { recursive: true });
  }

  /** Queue an example for the current day's file. Rows are written in the background, in order. */
  append(example: TrainingExample): void {
    const recordedAtMs = this.now();
    const file = exampleFileName(recordedAtMs);
    const rows = this.pendingRows.get(file) ?? [];
    rows.push(formatExampleRow(example, recordedAtMs));
    this.pendingRows.set(file, rows);
    this.startWriting();
  }

  /** Resolves once every queued example has been written or its write has failed and been logged. */
  async flush(): Promise<void> {
    while (this.writing) {
      await this.writing;
    }
  }

  async saveModel(model: ReadoutModel): Promise<string> {
    const file = path.join(this.dir, modelFileName(model, this.now()));
    await writeFile(file, `${JSON.stringify(model)}\n`, "utf8");
    return file;
  }

  /** Newest model file that parses, or null when there is none. */
  async loadLatestModel(): Promise<ReadoutModel | null> {
    const names = (await this.list()).filter((name) => MODEL_FILE.test(name)).sort().reverse();
    for (const name of names) {
      const file = path.join(this.dir, name);
      try {
        const parsed = StoredModelSchema.safeParse(JSON.parse(await readFile(file, "utf8")));
        if (parsed.success) {
          return parsed.data;
        }
        this.log?.warn(`trainer: skipping ${file}: ${parsed.error.issues[0]?.message ?? "invalid model"}`);
      } catch (err) {
        this.log?.warn(`trainer: skipping ${file}: ${String(err)}`);
      }
    }
    return null;
  }

  /** Up to `limit` of the most recently stored examples, oldest first. */
  async loadRecentExamples(limit: number): Promise<TrainingExample[]> {
    const names = (await this.list()).filter((name) => EXAMPLE_FILE.test(name)).sort().reverse();
    const newestFirst: TrainingExample[][] = [];
    let total = 0;
    for (const name of names) {
      if (total >= limit) {
        break;
      }
      const text = await readFile(path.join(this.dir, name), "utf8");
      const examples = text.split("\n").flatMap((line) => {
        const example = parseExampleRow(line);
        return example ? [example] : [];
      });
      newestFirst.push(examples);
      total += examples.length;
    }
    return newestFirst.reverse().flat().slice(-limit);
  }

  private async list(): Promise<string[]> {
    try {
      return await readdir(this.dir);
    } catch (err) {
      if (isMissing(err)) {
        return [];
      }
      throw err;
    }
  }

  private startWriting(): void {
    if (this.writing || this.pendingRows.size === 0) {
      return;
    }
    this.writing = this.writePending()
      .catch((err) => {
        this.log?.error(`trainer: cannot write examples to ${this.dir}: ${String(err)}`);
      })
      .finally(() => {
        this.writing = null;
        this.startWriting();
      });
  }

  private async writePending(): Promise<void> {
    while (this.pendingRows.size > 0) {
      const batches = this.pendingRows;
      this.pendingRows = new Map();
      for (const [name, rows] of batches) {
        const file = path.join(this.dir, name);
        const header = (await this.isNewFile(file, name))
          ? `${CSV_HEADER_PREFIX},state...\n`
          : "";
        await appendFile(file, `${header}${rows.join("\n")}\n`, "utf8");
        this.knownFiles.add(name);
      }
    }
  }

  private async isNewFile(file: string, name: string): Promise<boolean> {
    if (this.knownFiles.has(name)) {
      return false;
    }
    try {
      await stat(file);
      return false;
    } catch (err) {
      if (isMissing(err)) {
        return true;
      }
      throw err;
    }
  }
}
