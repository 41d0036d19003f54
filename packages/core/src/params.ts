/**
 * Copy saved tensors back into a module's live parameters.
 */
import type { Module, TensorData } from "./interfaces.js";
import { StateError } from "./errors.js";
import { sameShape } from "./types.js";

export interface DroppedParam {
  readonly name: string;
  readonly reason: "shape" | "unexpected";
  readonly saved: readonly number[];
  readonly expected?: readonly number[];
}

export interface RestoreReport {
  readonly module: string;
  readonly loaded: readonly string[];
  readonly dropped: readonly DroppedParam[];
  /** Parameters of the module that the saved state does not provide. */
  readonly missing: readonly string[];
}

/**
 * Copy saved tensors into the module's live parameters.
 *
 * Strict mode throws on any mismatch before touching a single parameter.
 * Non-strict mode drops shape-mismatched and unknown entries and loads the rest.
 */
export function restoreParams(
  module: Module,
  saved: ReadonlyMap<string, TensorData>,
  strict: boolean,
): RestoreReport {
  const live = module.parameters();
  const loaded: string[] = [];
  const dropped: DroppedParam[] = [];
  const missing: string[] = [];

  for (const [name, s] of saved) {
    const target = live.get(name);
    if (!target) {
      dropped.push({ name, reason: "unexpected", saved: [...s.shape] });
    } else if (!sameShape(target.shape, s.shape) || target.data.length !== s.data.length) {
      dropped.push({ name, reason: "shape", saved: [...s.shape], expected: [...target.shape] });
    } else {
      loaded.push(name);
    }
  }
  for (const name of live.keys()) {
    if (!saved.has(name)) missing.push(name);
  }

  if (strict && (dropped.length > 0 || missing.length > 0)) {
    const parts = [
      ...dropped.map((d) => d.reason === "shape"
        ? `${d.name}: saved [${d.saved}] vs model [${d.expected ?? []}]`
        : `${d.name}: not in model`),
      ...missing.map((m) => `${m}: missing from checkpoint`),
    ];
    throw new StateError({ message: `parameters of "${module.name}" do not match: ${parts.join("; ")}` });
  }

  for (const name of loaded) {
    const target = live.get(name);
    const s = saved.get(name);
    if (target && s) target.data.set(s.data);
  }
  return { module: module.name, loaded, dropped, missing };
}
