/**
 * Scalar sources that conditions observe: monotonic counters and metric streams.
 */

export interface Observable {
  readonly name: string;
  /** Newest value, or undefined when nothing has been observed yet. */
  latest(): number | undefined;
}

export class Counter implements Observable {
  readonly name: string;
  private _value: number;

  constructor(name: string, initial = 0) {
    this.name = name;
    this._value = initial;
  }

  get value(): number {
    return this._value;
  }

  increment(): number {
    return ++this._value;
  }

  set(value: number): void {
    this._value = value;
  }

  latest(): number {
    return this._value;
  }
}

/** Append-only sequence of scalar observations for one named metric. */
export class MetricStream implements Observable {
  readonly name: string;
  private readonly _values: number[] = [];

  constructor(name: string) {
    this.name = name;
  }

  push(value: number): void {
    this._values.push(value);
  }

  latest(): number | undefined {
    return this._values.length > 0 ? this._values[this._values.length - 1] : undefined;
  }

  values(): readonly number[] {
    return this._values;
  }

  get length(): number {
    return this._values.length;
  }

  /** Replace the history wholesale (checkpoint restore). */
  restore(values: readonly number[]): void {
    this._values.length = 0;
    this._values.push(...values);
  }
}
