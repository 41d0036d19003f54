/**
 * Contracts (ports) between the control layer and its collaborators.
 *
 * The engine never looks inside a model, an optimizer or a batch payload: it only
 * moves named tensors between them and the checkpoint subsystem.
 */
import type { Shape } from "./types.js";

// ── Tensor (lightweight handle) ────────────────────────────────────────────
export interface TensorData {
  readonly shape: Shape;
  readonly data: Float32Array;
}

// ── Model ──────────────────────────────────────────────────────────────────
export interface Module {
  readonly name: string;
  /** Live parameter tensors keyed by qualified name. Optimizers update them in place. */
  parameters(): ReadonlyMap<string, TensorData>;
}

// ── Optimizer ──────────────────────────────────────────────────────────────
export interface OptimizerState {
  readonly step: number;
  /** Keyed `<parameter>.<slot>`, e.g. `fc.weight.m`. */
  readonly buffers: ReadonlyMap<string, TensorData>;
  /** Running scalars (e.g. bias-correction powers) that must survive a resume exactly. */
  readonly scalars: Readonly<Record<string, number>>;
}

export interface Optimizer {
  readonly name: string;
  step(
    params: ReadonlyMap<string, TensorData>,
    grads: ReadonlyMap<string, TensorData>,
    gradScale?: number,
  ): void;
  stateDict(): OptimizerState;
  loadStateDict(state: OptimizerState): void;
}

// ── RNG ────────────────────────────────────────────────────────────────────
export interface Rng {
  next(): number;
  nextGauss(): number;
  state(): number;
  setState(s: number): void;
  seed(s: number): void;
}

// ── Batches ────────────────────────────────────────────────────────────────
export interface Batch<T> {
  /** Sample identifiers, used only for diagnostics. */
  readonly ids: readonly string[];
  readonly data: T;
}

/** Restartable, finite producer of batches. Each call starts a fresh pass. */
export interface BatchSource<T> {
  batches(epoch: number): AsyncIterable<Batch<T>>;
}
