/**
 * RollingSaver keeps the `keep` most recent records of one logical name.
 *
 * Retention is FIFO by creation. Eviction happens right after the save that
 * pushed the set past `keep`, and only once that save succeeded. On first use
 * the saver adopts records left by an earlier run (suffix matching
 * `adoptSuffix`, digits by default) so the bound also holds across resumes.
 */
import { Effect } from "effect";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { CheckpointError, describeCause, positiveInt } from "@lockstep/core";
import { CHECKPOINT_EXTENSION } from "./format.js";
import { compareRecords, statRecord } from "./resolve.js";
import type { Saver } from "./savers.js";

interface Retained {
  readonly suffix: string;
  readonly path: string;
}

export interface RollingSaverOptions {
  readonly keep: number;
  readonly adoptSuffix?: RegExp;
}

export class RollingSaver {
  readonly saver: Saver;
  readonly keep: number;
  private readonly adoptSuffix: RegExp;
  private retained: Retained[] | null = null;

  constructor(saver: Saver, options: RollingSaverOptions) {
    positiveInt("keep", options.keep);
    this.saver = saver;
    this.keep = options.keep;
    this.adoptSuffix = options.adoptSuffix ?? /^\d+$/;
  }

  /** Paths currently retained, oldest first. Empty until the first save. */
  files(): readonly string[] {
    return (this.retained ?? []).map((r) => r.path);
  }

  save(suffix: string | number): Effect.Effect<string, CheckpointError> {
    return Effect.gen(this, function* () {
      const retained = yield* this.adopt();
      const key = String(suffix);
      const file = yield* this.saver.save(key);

      const existing = retained.findIndex((r) => r.suffix === key);
      if (existing >= 0) retained.splice(existing, 1);
      retained.push({ suffix: key, path: file });

      while (retained.length > this.keep) {
        const oldest = retained[0];
        yield* Effect.tryPromise({
          try: () => fs.rm(oldest.path, { force: true }),
          catch: (e) => new CheckpointError({
            message: `could not remove old checkpoint ${oldest.path}: ${describeCause(e)}`,
            path: oldest.path,
            cause: e,
          }),
        });
        retained.shift();
        yield* Effect.logDebug(`removed old checkpoint ${oldest.path}`);
      }
      return file;
    });
  }

  private adopt(): Effect.Effect<Retained[], CheckpointError> {
    if (this.retained) return Effect.succeed(this.retained);
    return Effect.gen(this, function* () {
      const dir = this.saver.directory;
      const names = yield* Effect.tryPromise({
        try: () => readdirOrEmpty(dir),
        catch: (e) => new CheckpointError({ message: `cannot list ${dir}: ${describeCause(e)}`, cause: e }),
      });

      const prefix = `${this.saver.name}-`;
      const suffixes = new Map<string, string>();
      for (const n of names) {
        if (!n.startsWith(prefix) || !n.endsWith(CHECKPOINT_EXTENSION)) continue;
        const suffix = n.slice(prefix.length, n.length - CHECKPOINT_EXTENSION.length);
        if (this.adoptSuffix.test(suffix)) suffixes.set(path.join(dir, n), suffix);
      }

      const records = yield* Effect.forEach([...suffixes.keys()], statRecord);
      records.sort(compareRecords);
      const retained: Retained[] = [];
      for (const r of records) {
        const suffix = suffixes.get(r.path);
        if (suffix !== undefined) retained.push({ suffix, path: r.path });
      }
      if (retained.length > 0) {
        yield* Effect.logInfo(`adopted ${retained.length} existing "${this.saver.name}" checkpoint(s) in ${dir}`);
      }
      this.retained = retained;
      return retained;
    });
  }
}

async function readdirOrEmpty(dir: string): Promise<string[]> {
  try {
    return await fs.readdir(dir);
  } catch (e) {
    if (e instanceof Error && "code" in e && e.code === "ENOENT") return [];
    throw e;
  }
}
