/**
 * StatsLogger: structured run logging for training experiments
 *
 * Creates directory structure:
 *   runs/{run-id}/
 *     metadata.json       - Run configuration and timestamp
 *     checkpoints.jsonl   - Per-stage loss and evaluation time series
 *     models/
 *       {model-id}.jsonl  - Per-local-model metrics time series
 */

import { appendFile, mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";

export type TrainingStage = "forward" | "nonlinearity" | "tanh-phase1" | "tanh-phase2" | "inverse";

/**
 * Checkpoint metrics
 */
export interface CheckpointMetrics {
  stage: TrainingStage;
  epoch: number;
  loss: number;
  rmse?: number;
  maxAbsError?: number;
  computeMs?: number;
}

/**
 * Per-local-model metrics
 */
export interface LocalModelMetrics {
  modelId: string;
  epoch: number;
  [key: string]: number | string;
}

export interface RunMetadata {
  runId: string;
  timestamp: string;
  experiment: string;
  config: Record<string, unknown>;
}

export interface StatsLoggerConfig {
  baseDir?: string; // default: "runs"
  runId?: string; // default: experiment slug + timestamp
}

export class StatsLogger {
  private readonly runId: string;
  private readonly runDir: string;
  private readonly modelsDir: string;
  // Appends are chained so lines land in call order
  private pending: Promise<void> = Promise.resolve();
  private closed = false;

  private constructor(runId: string, runDir: string) {
    this.runId = runId;
    this.runDir = runDir;
    this.modelsDir = join(runDir, "models");
  }

  static async create(
    metadata: Omit<RunMetadata, "runId" | "timestamp">,
    config?: StatsLoggerConfig
  ): Promise<StatsLogger> {
    const baseDir = config?.baseDir ?? "runs";
    const runId = config?.runId ?? `${metadata.experiment.toLowerCase().replace(/\s+/g, "-")}-${Date.now()}`;
    const runDir = join(baseDir, runId);

    await mkdir(join(runDir, "models"), { recursive: true });

    const fullMetadata: RunMetadata = {
      runId,
      timestamp: new Date().toISOString(),
      ...metadata,
    };
    await writeFile(join(runDir, "metadata.json"), JSON.stringify(fullMetadata, null, 2));
    await writeFile(join(runDir, "checkpoints.jsonl"), "");

    return new StatsLogger(runId, runDir);
  }

  logCheckpoint(metrics: CheckpointMetrics): Promise<void> {
    return this.append(join(this.runDir, "checkpoints.jsonl"), metrics);
  }

  /** Model file is created on first write. */
  logModel(metrics: LocalModelMetrics): Promise<void> {
    const { modelId, ...data } = metrics;
    return this.append(join(this.modelsDir, `${modelId.replace(/[^\w.-]/g, "_")}.jsonl`), data);
  }

  /** Log every epoch of a training report as checkpoints. */
  async logLosses(stage: TrainingStage, losses: readonly number[]): Promise<void> {
    await Promise.all(losses.map((loss, epoch) => this.logCheckpoint({ stage, epoch, loss })));
  }

  getRunDir(): string {
    return this.runDir;
  }

  getRunId(): string {
    return this.runId;
  }

  /** Wait for pending writes; further logging throws. */
  async close(): Promise<void> {
    this.closed = true;
    await this.pending;
  }

  private append(path: string, record: object): Promise<void> {
    if (this.closed) {
      return Promise.reject(new Error(`StatsLogger ${this.runId} is closed`));
    }
    const line = `${JSON.stringify(record)}\n`;
    const write = this.pending.then(() => appendFile(path, line));
    // A failed append rejects only its own caller; the chain keeps going
    this.pending = write.catch(() => undefined);
    return write;
  }
}
