/**
 * Resolve a glob pattern to one checkpoint record.
 *
 * Several matches resolve to the newest by modification time; records with the
 * same mtime are ordered by file name with digit runs compared numerically, so
 * `epoch-10` sorts after `epoch-9`.
 */
import { Effect } from "effect";
import { glob } from "glob";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { CheckpointError, describeCause } from "@lockstep/core";
import { TEMP_MARKER } from "./format.js";

export interface CheckpointRecord {
  readonly path: string;
  readonly mtimeMs: number;
}

export type Resolution =
  | { readonly _tag: "NoMatch"; readonly pattern: string }
  | { readonly _tag: "Unique"; readonly path: string }
  | { readonly _tag: "Latest"; readonly path: string; readonly candidates: readonly string[] };

const collator = new Intl.Collator("en", { numeric: true });

/** Oldest first. */
export function compareRecords(a: CheckpointRecord, b: CheckpointRecord): number {
  if (a.mtimeMs !== b.mtimeMs) return a.mtimeMs - b.mtimeMs;
  return collator.compare(path.basename(a.path), path.basename(b.path));
}

export function statRecord(file: string): Effect.Effect<CheckpointRecord, CheckpointError> {
  return Effect.tryPromise({
    try: async () => ({ path: file, mtimeMs: (await fs.stat(file)).mtimeMs }),
    catch: (e) => new CheckpointError({ message: `cannot stat ${file}: ${describeCause(e)}`, path: file, cause: e }),
  });
}

/** Every file under `directory` matching `pattern`, oldest first. Unfinished writes never match. */
export function listCheckpoints(directory: string, pattern: string): Effect.Effect<CheckpointRecord[], CheckpointError> {
  return Effect.gen(function* () {
    const files = yield* Effect.tryPromise({
      try: () => glob(pattern, { cwd: directory, absolute: true, nodir: true, ignore: `**/*${TEMP_MARKER}*` }),
      catch: (e) => new CheckpointError({
        message: `cannot list "${pattern}" in ${directory}: ${describeCause(e)}`,
        cause: e,
      }),
    });
    const records = yield* Effect.forEach(files, statRecord);
    return records.sort(compareRecords);
  });
}

export function resolveCheckpoint(directory: string, pattern: string): Effect.Effect<Resolution, CheckpointError> {
  return Effect.gen(function* () {
    const records = yield* listCheckpoints(directory, pattern);
    const newest = records[records.length - 1];
    if (!newest) {
      yield* Effect.logDebug(`no checkpoint in ${directory} matches "${pattern}"`);
      return { _tag: "NoMatch", pattern } as const;
    }
    if (records.length === 1) {
      yield* Effect.logInfo(`checkpoint "${pattern}" resolved to ${newest.path}`);
      return { _tag: "Unique", path: newest.path } as const;
    }
    yield* Effect.logInfo(
      `${records.length} checkpoints match "${pattern}", using the most recent: ${newest.path}`,
    );
    return { _tag: "Latest", path: newest.path, candidates: records.map((r) => r.path) } as const;
  });
}
