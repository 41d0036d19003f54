/**
 * Feeders adapt a batch payload into what a compute step consumes.
 *
 *   const feed = new ItemFeeder("img").then(new TensorFeeder());
 *   const x = feed.feed(batch.data);   // TensorData
 */
import { FeederError, isTensorData, type TensorData } from "@lockstep/core";

export interface Feeder<In, Out> {
  feed(x: In): Out;
  then<Next>(next: Feeder<Out, Next>): Feeder<In, Next>;
}

export abstract class BaseFeeder<In, Out> implements Feeder<In, Out> {
  abstract feed(x: In): Out;

  then<Next>(next: Feeder<Out, Next>): Feeder<In, Next> {
    return new ChainedFeeder(this, next);
  }
}

class ChainedFeeder<In, Mid, Out> extends BaseFeeder<In, Out> {
  constructor(private readonly first: Feeder<In, Mid>, private readonly second: Feeder<Mid, Out>) {
    super();
  }

  feed(x: In): Out {
    return this.second.feed(this.first.feed(x));
  }
}

/** Wrap a plain function as a feeder. */
export function feeder<In, Out>(fn: (x: In) => Out): Feeder<In, Out> {
  return new (class extends BaseFeeder<In, Out> {
    feed(x: In): Out {
      return fn(x);
    }
  })();
}

/** Pick one field out of a record-shaped payload. */
export class ItemFeeder extends BaseFeeder<unknown, unknown> {
  constructor(readonly key: string) {
    super();
  }

  feed(x: unknown): unknown {
    if (typeof x !== "object" || x === null || !(this.key in x)) {
      throw new FeederError({ message: `item "${this.key}" is not present in the batch` });
    }
    return Reflect.get(x, this.key);
  }
}

/**
 * Numbers, rectangular nested number arrays, Float32Arrays and tensors become a
 * fresh Float32 tensor. Anything else is rejected.
 */
export class TensorFeeder extends BaseFeeder<unknown, TensorData> {
  feed(x: unknown): TensorData {
    if (typeof x === "number") return { shape: [], data: Float32Array.of(x) };
    if (x instanceof Float32Array) return { shape: [x.length], data: new Float32Array(x) };
    if (isTensorData(x)) return { shape: [...x.shape], data: new Float32Array(x.data) };
    if (Array.isArray(x)) {
      const shape = shapeOf(x);
      if (shape) {
        const flat: number[] = [];
        flatten(x, flat);
        return { shape, data: Float32Array.from(flat) };
      }
      throw new FeederError({ message: "Type ragged or non-numeric array is not supported" });
    }
    throw new FeederError({ message: `Type ${typeName(x)} is not supported` });
  }
}

function typeName(x: unknown): string {
  if (x === null) return "null";
  if (typeof x === "object") return x.constructor?.name ?? "object";
  return typeof x;
}

/** Shape of a rectangular nested number array, or null if it is not one. */
function shapeOf(x: unknown): number[] | null {
  if (typeof x === "number") return [];
  if (!Array.isArray(x)) return null;
  if (x.length === 0) return [0];
  const inner = shapeOf(x[0]);
  if (!inner) return null;
  for (let i = 1; i < x.length; i++) {
    const s = shapeOf(x[i]);
    if (!s || s.length !== inner.length || s.some((d, j) => d !== inner[j])) return null;
  }
  return [x.length, ...inner];
}

function flatten(x: unknown, out: number[]): void {
  if (typeof x === "number") {
    out.push(x);
  } else if (Array.isArray(x)) {
    for (const v of x) flatten(v, out);
  }
}
