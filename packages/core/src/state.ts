/**
 * Serializable state trees.
 *
 * Everything a checkpoint persists is a StateValue: JSON-like scalars and
 * containers, with Float32 tensors allowed as leaves.
 */
import { StateError } from "./errors.js";
import type { TensorData } from "./interfaces.js";
import type { RestoreReport } from "./params.js";

export type StateValue =
  | number
  | string
  | boolean
  | null
  | TensorData
  | readonly StateValue[]
  | StateDict;

export interface StateDict {
  readonly [key: string]: StateValue;
}

export interface LoadOptions {
  /**
   * Strict (default) loads fail on any parameter mismatch. Otherwise
   * mismatched parameters are dropped, together with the optimizer and
   * accumulator entries that belong to them, and reported.
   */
  readonly strict?: boolean;
}

export interface Stateful {
  stateDict(): StateDict;
  /** Returns a report when model parameters were part of the state. */
  loadStateDict(state: StateDict, options?: LoadOptions): RestoreReport | void;
}

export function isTensorData(v: unknown): v is TensorData {
  return (
    typeof v === "object" && v !== null &&
    "data" in v && v.data instanceof Float32Array &&
    "shape" in v && Array.isArray(v.shape)
  );
}

export function isStateDict(v: StateValue | undefined): v is StateDict {
  return typeof v === "object" && v !== null && !Array.isArray(v) && !isTensorData(v);
}

export function isStateArray(v: StateValue | undefined): v is readonly StateValue[] {
  return Array.isArray(v);
}

// ── Readers (throw StateError on malformed state) ──────────────────────────

export function getNumber(state: StateDict, key: string): number {
  const v = state[key];
  if (typeof v !== "number") throw missing(key, "number", v);
  return v;
}

export function getNullableNumber(state: StateDict, key: string): number | null {
  const v = state[key];
  if (v === null) return null;
  if (typeof v !== "number") throw missing(key, "number or null", v);
  return v;
}

export function getString(state: StateDict, key: string): string {
  const v = state[key];
  if (typeof v !== "string") throw missing(key, "string", v);
  return v;
}

export function getDict(state: StateDict, key: string): StateDict {
  const v = state[key];
  if (!isStateDict(v)) throw missing(key, "object", v);
  return v;
}

/** A dict whose values are all tensors (parameter maps, optimizer buffers). */
export function getTensorMap(state: StateDict, key: string): Map<string, TensorData> {
  const dict = getDict(state, key);
  const out = new Map<string, TensorData>();
  for (const [name, v] of Object.entries(dict)) {
    if (!isTensorData(v)) throw missing(`${key}.${name}`, "tensor", v);
    out.set(name, v);
  }
  return out;
}

/** A dict whose values are all numbers (optimizer scalars). */
export function getNumberMap(state: StateDict, key: string): Record<string, number> {
  const dict = getDict(state, key);
  const out: Record<string, number> = {};
  for (const [name, v] of Object.entries(dict)) {
    if (typeof v !== "number") throw missing(`${key}.${name}`, "number", v);
    out[name] = v;
  }
  return out;
}

export function tensorMapToState(map: ReadonlyMap<string, TensorData>): StateDict {
  const out: Record<string, TensorData> = {};
  for (const [name, t] of map) {
    out[name] = { shape: [...t.shape], data: new Float32Array(t.data) };
  }
  return out;
}

function describe(v: StateValue | undefined): string {
  if (v === undefined) return "nothing";
  if (isTensorData(v)) return "a tensor";
  if (Array.isArray(v)) return "an array";
  return typeof v;
}

function missing(key: string, expected: string, got: StateValue | undefined): StateError {
  return new StateError({ message: `state field "${key}": expected ${expected}, got ${describe(got)}` });
}
