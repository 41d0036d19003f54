/**
 * Command: lockstep checkpoints — list the records matching a pattern and show
 * which one a resume would pick.
 */
import { Effect } from "effect";
import * as path from "node:path";
import { loggingLayer, parseLogLevel } from "@lockstep/effect-runtime";
import { listCheckpoints, resolveCheckpoint } from "@lockstep/checkpoint";
import { parseKV, strArg } from "../parse.js";

export async function checkpointsCmd(args: string[]): Promise<void> {
  const kv = parseKV(args);
  const dir = strArg(kv, "dir", "runs/default");
  const pattern = strArg(kv, "pattern", "*.ckpt");

  const program = Effect.gen(function* () {
    const records = yield* listCheckpoints(dir, pattern);
    if (records.length === 0) {
      console.log(`No checkpoints matching "${pattern}" in ${dir}`);
      return;
    }
    console.log(`${records.length} checkpoint(s) in ${dir}, oldest first:`);
    for (const r of records) {
      console.log(`  ${new Date(r.mtimeMs).toISOString()}  ${path.basename(r.path)}`);
    }
    const resolved = yield* resolveCheckpoint(dir, pattern);
    if (resolved._tag !== "NoMatch") console.log(`\nResume would load: ${resolved.path}`);
  });

  await Effect.runPromise(program.pipe(Effect.provide(loggingLayer(parseLogLevel(strArg(kv, "log", "warn"))))));
}
