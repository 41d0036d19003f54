/**
 * Simple arg parsing helpers.
 * Supports --key=value and --flag syntax.
 */
import { ConfigError, loadTrainConfig, mergeTrainConfig, validateTrainConfig, type TrainConfig } from "@lockstep/core";

export function parseKV(args: string[]): Record<string, string> {
  const result: Record<string, string> = {};
  for (const arg of args) {
    if (arg.startsWith("--")) {
      const eqIdx = arg.indexOf("=");
      if (eqIdx > 0) {
        result[arg.slice(2, eqIdx)] = arg.slice(eqIdx + 1);
      } else {
        result[arg.slice(2)] = "true";
      }
    }
  }
  return result;
}

export function intArg(kv: Record<string, string>, key: string, defaultVal: number): number {
  const val = kv[key];
  if (!val) return defaultVal;
  const n = Number(val);
  if (!Number.isInteger(n)) {
    throw new ConfigError({ message: `--${key} must be an integer, got "${val}"` });
  }
  return n;
}

export function floatArg(kv: Record<string, string>, key: string, defaultVal: number): number {
  const val = kv[key];
  if (!val) return defaultVal;
  const n = Number(val);
  if (Number.isNaN(n)) {
    throw new ConfigError({ message: `--${key} must be a number, got "${val}"` });
  }
  return n;
}

export function strArg(kv: Record<string, string>, key: string, defaultVal: string): string {
  return kv[key] ?? defaultVal;
}

export function boolArg(kv: Record<string, string>, key: string, defaultVal: boolean): boolean {
  const val = kv[key];
  if (!val) return defaultVal;
  return val === "true" || val === "1";
}

/** "none" / "null" / "off" switch a feature off. */
function isOff(val: string): boolean {
  return val === "none" || val === "null" || val === "off";
}

// CLI flag → TrainConfig key
const numericFlags: Readonly<Record<string, keyof TrainConfig>> = {
  batch: "batchSize",
  validBatch: "validBatchSize",
  lr: "lr",
  momentum: "momentum",
  accumSteps: "iterationsPerUpdate",
  keep: "checkpointKeep",
  workers: "numWorkers",
  prefetch: "prefetch",
  seed: "seed",
};

const nullableNumericFlags: Readonly<Record<string, keyof TrainConfig>> = {
  maxEpochs: "maxEpochs",
  patience: "earlyStopPatience",
  checkpointEvery: "checkpointEvery",
  samplesPerEpoch: "samplesPerEpoch",
};

const stringFlags: Readonly<Record<string, keyof TrainConfig>> = {
  optim: "optimizer",
  log: "logLevel",
  runDir: "runDir",
};

/** Translate train flags into config overrides. Unset flags are left out. */
export function configOverrides(kv: Record<string, string>): Partial<Record<keyof TrainConfig, unknown>> {
  const out: Partial<Record<keyof TrainConfig, unknown>> = {};
  for (const [flag, key] of Object.entries(numericFlags)) {
    if (kv[flag] !== undefined) out[key] = floatArg(kv, flag, Number.NaN);
  }
  for (const [flag, key] of Object.entries(nullableNumericFlags)) {
    const val = kv[flag];
    if (val !== undefined) out[key] = isOff(val) ? null : floatArg(kv, flag, Number.NaN);
  }
  for (const [flag, key] of Object.entries(stringFlags)) {
    if (kv[flag] !== undefined) out[key] = kv[flag];
  }
  const resume = kv["resume"];
  if (resume !== undefined) out.resume = isOff(resume) ? null : resume;
  return out;
}

/** Load `--config` (if given) over the defaults, then apply CLI overrides and validate. */
export async function loadConfig(kv: Record<string, string>): Promise<TrainConfig> {
  const base = await loadTrainConfig(kv["config"]);
  const config = mergeTrainConfig(base, configOverrides(kv));
  validateTrainConfig(config);
  return config;
}
