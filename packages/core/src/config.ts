/**
 * Load and validate TrainConfig from file, merge with defaults.
 */
import { ConfigError } from "./errors.js";
import { defaultTrainConfig, logLevelNames, type LogLevelName, type TrainConfig } from "./types.js";

/** Load a TrainConfig from a JSON file path, merging with defaults. */
export async function loadTrainConfig(path?: string): Promise<TrainConfig> {
  if (!path) return { ...defaultTrainConfig };

  const fs = await import("node:fs/promises");
  let raw: string;
  try {
    raw = await fs.readFile(path, "utf-8");
  } catch (e) {
    throw new ConfigError({ message: `Cannot read train config at ${path}`, cause: e });
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e) {
    throw new ConfigError({ message: `Failed to parse train config at ${path}: invalid JSON`, cause: e });
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ConfigError({ message: `Train config at ${path} must be a JSON object` });
  }

  const config = mergeTrainConfig(defaultTrainConfig, parsed);
  validateTrainConfig(config);
  return config;
}

/** Overlay untyped values (JSON file, CLI flags) onto a config, checking each field's type. */
export function mergeTrainConfig(base: TrainConfig, overrides: object): TrainConfig {
  const out: Record<keyof TrainConfig, unknown> = { ...base };
  for (const [key, value] of Object.entries(overrides)) {
    if (!isConfigKey(key)) {
      throw new ConfigError({ message: `Unknown config key "${key}"` });
    }
    out[key] = value;
  }
  return {
    batchSize: num(out, "batchSize"),
    validBatchSize: num(out, "validBatchSize"),
    lr: num(out, "lr"),
    momentum: num(out, "momentum"),
    optimizer: str(out, "optimizer"),
    iterationsPerUpdate: num(out, "iterationsPerUpdate"),
    maxEpochs: nullableNum(out, "maxEpochs"),
    earlyStopPatience: nullableNum(out, "earlyStopPatience"),
    checkpointKeep: num(out, "checkpointKeep"),
    checkpointEvery: nullableNum(out, "checkpointEvery"),
    samplesPerEpoch: nullableNum(out, "samplesPerEpoch"),
    numWorkers: num(out, "numWorkers"),
    prefetch: num(out, "prefetch"),
    seed: num(out, "seed"),
    logLevel: logLevel(out.logLevel),
    runDir: str(out, "runDir"),
    resume: nullableStr(out, "resume"),
  };
}

/** Validate a TrainConfig, throwing on invalid values. */
export function validateTrainConfig(config: TrainConfig): void {
  positiveInt("batchSize", config.batchSize);
  positiveInt("validBatchSize", config.validBatchSize);
  if (!(config.lr > 0)) {
    throw new ConfigError({ message: `lr must be > 0, got ${config.lr}` });
  }
  if (config.momentum < 0 || config.momentum >= 1) {
    throw new ConfigError({ message: `momentum must be in [0,1), got ${config.momentum}` });
  }
  positiveInt("iterationsPerUpdate", config.iterationsPerUpdate);
  if (config.maxEpochs !== null) positiveInt("maxEpochs", config.maxEpochs);
  if (config.earlyStopPatience !== null) positiveInt("earlyStopPatience", config.earlyStopPatience);
  positiveInt("checkpointKeep", config.checkpointKeep);
  if (config.checkpointEvery !== null) positiveInt("checkpointEvery", config.checkpointEvery);
  if (config.samplesPerEpoch !== null) positiveInt("samplesPerEpoch", config.samplesPerEpoch);
  positiveInt("numWorkers", config.numWorkers);
  positiveInt("prefetch", config.prefetch);
  if (!Number.isInteger(config.seed)) {
    throw new ConfigError({ message: `seed must be an integer, got ${config.seed}` });
  }
  if (config.runDir.length === 0) {
    throw new ConfigError({ message: "runDir must not be empty" });
  }
  if (config.resume !== null && config.resume.length === 0) {
    throw new ConfigError({ message: "resume pattern must not be empty (use null to start fresh)" });
  }
}

export function positiveInt(key: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError({ message: `${key} must be an integer >= 1, got ${value}` });
  }
}

// ── field readers ──────────────────────────────────────────────────────────

function isConfigKey(key: string): key is keyof TrainConfig {
  return Object.prototype.hasOwnProperty.call(defaultTrainConfig, key);
}

function num(src: Record<string, unknown>, key: string): number {
  const v = src[key];
  if (typeof v !== "number" || Number.isNaN(v)) {
    throw new ConfigError({ message: `${key} must be a number, got ${JSON.stringify(v)}` });
  }
  return v;
}

function nullableNum(src: Record<string, unknown>, key: string): number | null {
  return src[key] === null ? null : num(src, key);
}

function str(src: Record<string, unknown>, key: string): string {
  const v = src[key];
  if (typeof v !== "string") {
    throw new ConfigError({ message: `${key} must be a string, got ${JSON.stringify(v)}` });
  }
  return v;
}

function nullableStr(src: Record<string, unknown>, key: string): string | null {
  return src[key] === null ? null : str(src, key);
}

function logLevel(v: unknown): LogLevelName {
  const found = logLevelNames.find((name) => name === v);
  if (!found) {
    throw new ConfigError({ message: `logLevel must be one of ${logLevelNames.join(", ")}, got ${JSON.stringify(v)}` });
  }
  return found;
}
