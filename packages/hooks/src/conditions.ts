/**
 * Conditions: stateful predicates over metric streams and counters.
 *
 * Each condition is evaluated at most once per event firing and owns whatever
 * memory it needs (best value so far, streak length). That memory is part of the
 * resumable training state, so every condition can round-trip it through
 * stateDict()/loadStateDict().
 *
 * A source with no observation yet makes every condition evaluate false and
 * leaves its state untouched.
 */
import {
  StateError, getNullableNumber, getNumber, isStateArray, isStateDict,
  type StateDict, type StateValue,
} from "@lockstep/core";
import type { Observable } from "./observable.js";

export interface Condition {
  readonly name: string;
  evaluate(): boolean;
  /** Serializable memory; null for stateless conditions. */
  stateDict(): StateValue;
  loadStateDict(state: StateValue): void;
}

abstract class StatelessCondition implements Condition {
  abstract readonly name: string;
  abstract evaluate(): boolean;

  stateDict(): StateValue {
    return null;
  }

  loadStateDict(_state: StateValue): void {}
}

function asDict(name: string, state: StateValue): StateDict {
  if (!isStateDict(state)) {
    throw new StateError({ message: `condition "${name}": expected an object state` });
  }
  return state;
}

// ── Thresholds ─────────────────────────────────────────────────────────────

export class Always extends StatelessCondition {
  readonly name = "always";

  evaluate(): boolean {
    return true;
  }
}

/** `value >= target` — absolute horizons such as "stop at epoch N". */
export class GEqThan extends StatelessCondition {
  readonly name: string;

  constructor(private readonly source: Observable, private readonly target: number) {
    super();
    this.name = `${source.name} >= ${target}`;
  }

  evaluate(): boolean {
    const v = this.source.latest();
    return v !== undefined && v >= this.target;
  }
}

export class LEqThan extends StatelessCondition {
  readonly name: string;

  constructor(private readonly source: Observable, private readonly target: number) {
    super();
    this.name = `${source.name} <= ${target}`;
  }

  evaluate(): boolean {
    const v = this.source.latest();
    return v !== undefined && v <= this.target;
  }
}

/**
 * `(value - offset) % n === 0`, for periodic actions. Never true when n is not a
 * positive integer; callers that mean "disabled" should not register the hook.
 */
export class MultipleOf extends StatelessCondition {
  readonly name: string;

  constructor(
    private readonly source: Observable,
    private readonly n: number,
    private readonly offset = 0,
  ) {
    super();
    this.name = offset === 0 ? `${source.name} % ${n}` : `(${source.name} - ${offset}) % ${n}`;
  }

  evaluate(): boolean {
    if (!Number.isInteger(this.n) || this.n <= 0) return false;
    const v = this.source.latest();
    if (v === undefined) return false;
    return (v - this.offset) % this.n === 0;
  }
}

// ── Best-so-far ────────────────────────────────────────────────────────────

abstract class ExtremumCondition implements Condition {
  abstract readonly name: string;
  private best: number | null = null;

  constructor(protected readonly source: Observable) {}

  protected abstract improves(value: number, best: number): boolean;

  /** True on the first observation and on every strict improvement. Ties and NaN never improve. */
  evaluate(): boolean {
    const v = this.source.latest();
    if (v === undefined || Number.isNaN(v)) return false;
    if (this.best === null || this.improves(v, this.best)) {
      this.best = v;
      return true;
    }
    return false;
  }

  get bestValue(): number | null {
    return this.best;
  }

  stateDict(): StateValue {
    return { best: this.best };
  }

  loadStateDict(state: StateValue): void {
    this.best = getNullableNumber(asDict(this.name, state), "best");
  }
}

export class Lowest extends ExtremumCondition {
  readonly name: string;

  constructor(source: Observable) {
    super(source);
    this.name = `lowest ${source.name}`;
  }

  protected improves(value: number, best: number): boolean {
    return value < best;
  }
}

export class Highest extends ExtremumCondition {
  readonly name: string;

  constructor(source: Observable) {
    super(source);
    this.name = `highest ${source.name}`;
  }

  protected improves(value: number, best: number): boolean {
    return value > best;
  }
}

// ── Streaks ────────────────────────────────────────────────────────────────

abstract class StreakCondition implements Condition {
  abstract readonly name: string;
  private best: number | null = null;
  private _streak = 0;

  constructor(protected readonly source: Observable, protected readonly n: number) {}

  protected abstract improves(value: number, best: number): boolean;

  /**
   * The streak counts observations since the last new extremum (0 right after
   * one). True while the streak is at least n.
   */
  evaluate(): boolean {
    const v = this.source.latest();
    if (v === undefined) return false;
    if (!Number.isNaN(v) && (this.best === null || this.improves(v, this.best))) {
      this.best = v;
      this._streak = 0;
    } else {
      this._streak++;
    }
    return this.n > 0 && this._streak >= this.n;
  }

  get streak(): number {
    return this._streak;
  }

  stateDict(): StateValue {
    return { best: this.best, streak: this._streak };
  }

  loadStateDict(state: StateValue): void {
    const dict = asDict(this.name, state);
    this.best = getNullableNumber(dict, "best");
    this._streak = getNumber(dict, "streak");
  }
}

/** "No new minimum in n observations" — early stopping on a loss or error rate. */
export class ConsecutiveNonDecreasing extends StreakCondition {
  readonly name: string;

  constructor(source: Observable, n: number) {
    super(source, n);
    this.name = `${source.name} not decreasing x${n}`;
  }

  protected improves(value: number, best: number): boolean {
    return value < best;
  }
}

export class ConsecutiveNonIncreasing extends StreakCondition {
  readonly name: string;

  constructor(source: Observable, n: number) {
    super(source, n);
    this.name = `${source.name} not increasing x${n}`;
  }

  protected improves(value: number, best: number): boolean {
    return value > best;
  }
}

// ── Composites ─────────────────────────────────────────────────────────────
// Children are always all evaluated so none of them misses an observation.

abstract class CompositeCondition implements Condition {
  abstract readonly name: string;
  protected readonly children: readonly Condition[];

  constructor(children: readonly Condition[]) {
    this.children = children;
  }

  abstract evaluate(): boolean;

  protected evaluateAll(): boolean[] {
    return this.children.map((c) => c.evaluate());
  }

  stateDict(): StateValue {
    return { children: this.children.map((c) => c.stateDict()) };
  }

  loadStateDict(state: StateValue): void {
    const children = asDict(this.name, state)["children"];
    if (!isStateArray(children) || children.length !== this.children.length) {
      throw new StateError({ message: `condition "${this.name}": expected ${this.children.length} child states` });
    }
    this.children.forEach((c, i) => c.loadStateDict(children[i]));
  }
}

export class Not extends CompositeCondition {
  readonly name: string;

  constructor(child: Condition) {
    super([child]);
    this.name = `not (${child.name})`;
  }

  evaluate(): boolean {
    return !this.evaluateAll()[0];
  }
}

export class All extends CompositeCondition {
  readonly name: string;

  constructor(...children: Condition[]) {
    super(children);
    this.name = children.map((c) => `(${c.name})`).join(" and ");
  }

  evaluate(): boolean {
    return this.evaluateAll().every(Boolean);
  }
}

export class Any extends CompositeCondition {
  readonly name: string;

  constructor(...children: Condition[]) {
    super(children);
    this.name = children.map((c) => `(${c.name})`).join(" or ");
  }

  evaluate(): boolean {
    return this.evaluateAll().some(Boolean);
  }
}
