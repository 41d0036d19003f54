/**
 * Core types for the lockstep system.
 */

// ── Shape helpers ──────────────────────────────────────────────────────────
export type Shape = readonly number[];

export function shapeSize(shape: Shape): number {
  let s = 1;
  for (const d of shape) s *= d;
  return s;
}

export function sameShape(a: Shape, b: Shape): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

// ── Log level ──────────────────────────────────────────────────────────────
export type LogLevelName = "debug" | "info" | "warn" | "error";

export const logLevelNames: readonly LogLevelName[] = ["debug", "info", "warn", "error"];

// ── Training config ────────────────────────────────────────────────────────
export interface TrainConfig {
  readonly batchSize: number;
  readonly validBatchSize: number;
  readonly lr: number;
  readonly momentum: number;
  readonly optimizer: string;
  /** Apply the optimizer once every N batches, accumulating gradients in between. */
  readonly iterationsPerUpdate: number;
  /** Stop once this many epochs have completed (null = no horizon). */
  readonly maxEpochs: number | null;
  /** Stop after this many evaluations without a new best validation value (null = off). */
  readonly earlyStopPatience: number | null;
  /** Number of rolling epoch checkpoints to retain. */
  readonly checkpointKeep: number;
  /** Save a rolling checkpoint every N epochs (null = off). */
  readonly checkpointEvery: number | null;
  /** Fixed per-epoch sample budget, independent of the dataset size (null = full pass). */
  readonly samplesPerEpoch: number | null;
  readonly numWorkers: number;
  readonly prefetch: number;
  readonly seed: number;
  readonly logLevel: LogLevelName;
  readonly runDir: string;
  /** Glob pattern (relative to runDir) of the checkpoint to resume from (null = fresh start). */
  readonly resume: string | null;
}

export const defaultTrainConfig: TrainConfig = {
  batchSize: 16,
  validBatchSize: 32,
  lr: 0.05,
  momentum: 0.9,
  optimizer: "sgd",
  iterationsPerUpdate: 1,
  maxEpochs: 50,
  earlyStopPatience: 5,
  checkpointKeep: 3,
  checkpointEvery: 1,
  samplesPerEpoch: null,
  numWorkers: 2,
  prefetch: 2,
  seed: 42,
  logLevel: "info",
  runDir: "runs/default",
  resume: null,
};
