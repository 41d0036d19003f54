/**
 * Checkpoint file format.
 *
 * Binary layout:
 *   [4 bytes: magic "LKST"]
 *   [4 bytes: uint32 LE header JSON byte length]
 *   [N bytes: header JSON (UTF-8)]
 *   [remaining: concatenated raw Float32 tensor data]
 *
 * The header holds the state tree with every tensor replaced by
 * `{ "$tensor": index }` and every non-finite number by `{ "$num": "NaN" }`
 * (or "Infinity", "-Infinity"), so JSON never sees either.
 */
import { Effect } from "effect";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import {
  CheckpointError, describeCause, isStateArray, isStateDict, isTensorData, shapeSize,
  type StateDict, type StateValue, type TensorData,
} from "@lockstep/core";

export const CHECKPOINT_EXTENSION = ".ckpt";
const MAGIC = Buffer.from("LKST");
const VERSION = 1;

interface TensorEntry {
  shape: number[];
  elements: number;
}

type Encoded = number | string | boolean | null | Encoded[] | { [key: string]: Encoded };

// ── Encode ─────────────────────────────────────────────────────────────────

export function encodeState(state: StateDict): Buffer {
  const entries: TensorEntry[] = [];
  const chunks: Float32Array[] = [];

  const encode = (v: StateValue): Encoded => {
    if (typeof v === "number") {
      return Number.isFinite(v) ? v : { $num: String(v) };
    }
    if (typeof v === "string" || typeof v === "boolean" || v === null) return v;
    if (isTensorData(v)) {
      entries.push({ shape: [...v.shape], elements: v.data.length });
      chunks.push(v.data);
      return { $tensor: entries.length - 1 };
    }
    if (isStateArray(v)) return v.map(encode);
    const out: { [key: string]: Encoded } = {};
    for (const [k, child] of Object.entries(v)) out[k] = encode(child);
    return out;
  };

  const tree = encode(state);
  const header = Buffer.from(JSON.stringify({ version: VERSION, tensors: entries, state: tree }), "utf-8");
  const len = Buffer.alloc(4);
  len.writeUInt32LE(header.length, 0);
  return Buffer.concat([
    MAGIC,
    len,
    header,
    ...chunks.map((f32) => Buffer.from(f32.buffer, f32.byteOffset, f32.byteLength)),
  ]);
}

// ── Decode ─────────────────────────────────────────────────────────────────

export function decodeState(data: Buffer, file?: string): StateDict {
  const fail = (message: string, cause?: unknown) =>
    new CheckpointError({ message: `${file ?? "checkpoint"}: ${message}`, path: file, cause });

  if (data.length < 8 || !data.subarray(0, 4).equals(MAGIC)) throw fail("not a checkpoint (bad magic)");
  const headerLen = data.readUInt32LE(4);
  if (8 + headerLen > data.length) throw fail("truncated header");

  let header: unknown;
  try {
    header = JSON.parse(data.subarray(8, 8 + headerLen).toString("utf-8"));
  } catch (e) {
    throw fail("header is not valid JSON", e);
  }
  if (typeof header !== "object" || header === null || Array.isArray(header)) throw fail("header is not an object");
  const version = Reflect.get(header, "version");
  if (version !== VERSION) throw fail(`unsupported version ${JSON.stringify(version)}`);

  const rawEntries: unknown = Reflect.get(header, "tensors");
  if (!Array.isArray(rawEntries)) throw fail("header has no tensor table");

  let offset = 8 + headerLen;
  const tensors: TensorData[] = [];
  for (const entry of rawEntries) {
    const shape = readShape(entry);
    if (!shape) throw fail(`malformed tensor entry #${tensors.length}`);
    const byteLen = shapeSize(shape) * 4;
    if (offset + byteLen > data.length) throw fail(`tensor #${tensors.length} runs past end of file`);
    const f32 = new Float32Array(data.buffer.slice(data.byteOffset + offset, data.byteOffset + offset + byteLen));
    tensors.push({ shape, data: f32 });
    offset += byteLen;
  }
  if (offset !== data.length) throw fail(`${data.length - offset} trailing byte(s)`);

  const decode = (v: unknown, where: string): StateValue => {
    if (typeof v === "number" || typeof v === "string" || typeof v === "boolean" || v === null) return v;
    if (Array.isArray(v)) return v.map((child, i) => decode(child, `${where}[${i}]`));
    if (typeof v !== "object") throw fail(`unexpected ${typeof v} at ${where}`);
    const keys = Object.keys(v);
    if (keys.length === 1 && keys[0] === "$tensor") {
      const index = Reflect.get(v, "$tensor");
      const t = typeof index === "number" ? tensors[index] : undefined;
      if (!t) throw fail(`bad tensor reference at ${where}`);
      return t;
    }
    if (keys.length === 1 && keys[0] === "$num") {
      const n = Number(Reflect.get(v, "$num"));
      if (Number.isFinite(n)) throw fail(`bad number marker at ${where}`);
      return n;
    }
    const out: Record<string, StateValue> = {};
    for (const k of keys) out[k] = decode(Reflect.get(v, k), where ? `${where}.${k}` : k);
    return out;
  };

  const state = decode(Reflect.get(header, "state"), "");
  if (!isStateDict(state)) throw fail("root state is not an object");
  return state;
}

function readShape(entry: unknown): number[] | null {
  if (typeof entry !== "object" || entry === null) return null;
  const shape: unknown = Reflect.get(entry, "shape");
  const elements: unknown = Reflect.get(entry, "elements");
  if (!Array.isArray(shape)) return null;
  const dims: number[] = [];
  for (const d of shape) {
    if (typeof d !== "number" || !Number.isInteger(d) || d < 0) return null;
    dims.push(d);
  }
  return elements === shapeSize(dims) ? dims : null;
}

// ── File I/O ───────────────────────────────────────────────────────────────

/** Marks in-progress writes; a crash can leave `<file>.tmp-<pid>-<n>` behind. */
export const TEMP_MARKER = ".tmp-";

let tmpCounter = 0;

/**
 * Write atomically: temp sibling, fsync, rename. On failure the temp file is
 * removed and whatever was at `file` before is untouched.
 */
export function writeCheckpoint(file: string, state: StateDict): Effect.Effect<void, CheckpointError> {
  const tmp = `${file}${TEMP_MARKER}${process.pid}-${tmpCounter++}`;
  return Effect.tryPromise({
    try: async () => {
      const bytes = encodeState(state);
      await fs.mkdir(path.dirname(file), { recursive: true });
      const handle = await fs.open(tmp, "w");
      try {
        await handle.writeFile(bytes);
        await handle.sync();
      } finally {
        await handle.close();
      }
      await fs.rename(tmp, file);
    },
    catch: (e) => new CheckpointError({ message: `Failed to save checkpoint ${file}: ${describeCause(e)}`, path: file, cause: e }),
  }).pipe(
    Effect.tapError(() =>
      Effect.tryPromise(() => fs.rm(tmp, { force: true })).pipe(
        Effect.catchAll((e) => Effect.logWarning(`could not remove ${tmp}: ${describeCause(e)}`)),
      )),
  );
}

export function readCheckpoint(file: string): Effect.Effect<StateDict, CheckpointError> {
  return Effect.tryPromise({
    try: () => fs.readFile(file),
    catch: (e) => new CheckpointError({ message: `Failed to read checkpoint ${file}: ${describeCause(e)}`, path: file, cause: e }),
  }).pipe(
    Effect.flatMap((raw) => Effect.try({
      try: () => decodeState(raw, file),
      catch: (e) => e instanceof CheckpointError
        ? e
        : new CheckpointError({ message: `Failed to decode checkpoint ${file}: ${describeCause(e)}`, path: file, cause: e }),
    })),
  );
}
