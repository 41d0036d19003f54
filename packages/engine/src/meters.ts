/**
 * Meters accumulate per-batch observations into one scalar per epoch.
 */
import { DataError } from "@lockstep/core";

export interface Meter {
  readonly name: string;
  /** Undefined until something has been added since the last reset. */
  readonly value: number | undefined;
  reset(): void;
}

export class RunningAverageMeter implements Meter {
  readonly name: string;
  private sum = 0;
  private weight = 0;

  constructor(name: string) {
    this.name = name;
  }

  add(value: number, weight = 1): void {
    this.sum += value * weight;
    this.weight += weight;
  }

  get count(): number {
    return this.weight;
  }

  get value(): number | undefined {
    return this.weight > 0 ? this.sum / this.weight : undefined;
  }

  reset(): void {
    this.sum = 0;
    this.weight = 0;
  }
}

/** Wall-clock time since the last reset, in milliseconds. */
export class TimeMeter implements Meter {
  readonly name: string;
  private start = performance.now();

  constructor(name: string) {
    this.name = name;
  }

  get value(): number {
    return performance.now() - this.start;
  }

  reset(): void {
    this.start = performance.now();
  }
}

/** Levenshtein distance between two symbol sequences (unit costs). */
export function editDistance<S>(a: readonly S[], b: readonly S[]): number {
  if (a.length === 0) return b.length;
  if (b.length === 0) return a.length;
  let prev = new Array<number>(b.length + 1);
  let curr = new Array<number>(b.length + 1);
  for (let j = 0; j <= b.length; j++) prev[j] = j;
  for (let i = 1; i <= a.length; i++) {
    curr[0] = i;
    for (let j = 1; j <= b.length; j++) {
      const sub = prev[j - 1] + (a[i - 1] === b[j - 1] ? 0 : 1);
      curr[j] = Math.min(sub, prev[j] + 1, curr[j - 1] + 1);
    }
    [prev, curr] = [curr, prev];
  }
  return prev[b.length];
}

/** Total edit distance over total reference length, across every pair added since reset. */
export class SequenceErrorMeter<S> implements Meter {
  readonly name: string;
  private errors = 0;
  private length = 0;

  constructor(name: string) {
    this.name = name;
  }

  add(refs: readonly (readonly S[])[], hyps: readonly (readonly S[])[]): void {
    if (refs.length !== hyps.length) {
      throw new DataError({
        message: `${this.name}: ${refs.length} reference(s) but ${hyps.length} hypothesis(es)`,
      });
    }
    for (let i = 0; i < refs.length; i++) {
      this.errors += editDistance(refs[i], hyps[i]);
      this.length += refs[i].length;
    }
  }

  get value(): number | undefined {
    return this.length > 0 ? this.errors / this.length : undefined;
  }

  reset(): void {
    this.errors = 0;
    this.length = 0;
  }
}
