/**
 * Hook = one Condition + one Action. HookList = ordered hooks for one event.
 */
import { Effect, Either } from "effect";
import {
  HookError, StateError, describeCause, getString, isStateDict,
  type HookFailure, type StateValue,
} from "@lockstep/core";
import type { Condition } from "./conditions.js";
import type { Action, HookContext } from "./action.js";

export class Hook {
  readonly name: string;

  constructor(readonly condition: Condition, readonly action: Action, name?: string) {
    this.name = name ?? `${action.name} when ${condition.name}`;
  }

  /** Evaluate the condition once; run the action if it holds. Succeeds with whether it ran. */
  fire(ctx: HookContext): Effect.Effect<boolean, HookError> {
    const fail = (cause: unknown) =>
      new HookError({
        message: `hook "${this.name}" failed on ${ctx.event}: ${describeCause(cause)}`,
        event: ctx.event,
        failures: [{ hook: this.name, cause }],
      });

    return Effect.gen(this, function* () {
      const holds = yield* Effect.try({ try: () => this.condition.evaluate(), catch: fail });
      if (!holds) return false;
      yield* Effect.mapError(this.action.run(ctx), fail);
      return true;
    });
  }
}

export class HookList {
  private readonly hooks: Hook[] = [];

  add(hook: Hook): this {
    this.hooks.push(hook);
    return this;
  }

  get size(): number {
    return this.hooks.length;
  }

  list(): readonly Hook[] {
    return this.hooks;
  }

  /**
   * Fire every hook in registration order. A failing hook never prevents the
   * ones after it from firing; failures are reported together afterwards.
   * Succeeds with the number of hooks whose action ran.
   */
  fire(ctx: HookContext): Effect.Effect<number, HookError> {
    return Effect.gen(this, function* () {
      const failures: HookFailure[] = [];
      let ran = 0;
      for (const hook of this.hooks) {
        const result = yield* Effect.either(hook.fire(ctx));
        if (Either.isLeft(result)) {
          yield* Effect.logError(result.left.message);
          failures.push(...result.left.failures);
        } else if (result.right) {
          ran++;
        }
      }
      if (failures.length > 0) {
        return yield* Effect.fail(new HookError({
          message: `${failures.length} hook(s) failed on ${ctx.event}: ${failures.map((f) => f.hook).join(", ")}`,
          event: ctx.event,
          failures,
        }));
      }
      return ran;
    });
  }

  stateDict(): StateValue[] {
    return this.hooks.map((h) => ({ hook: h.name, condition: h.condition.stateDict() }));
  }

  /** Restore condition memory. Entries are matched by position and must carry the same hook name. */
  loadStateDict(states: readonly StateValue[]): void {
    if (states.length !== this.hooks.length) {
      throw new StateError({
        message: `expected state for ${this.hooks.length} hook(s), got ${states.length}`,
      });
    }
    this.hooks.forEach((hook, i) => {
      const entry = states[i];
      if (!isStateDict(entry)) {
        throw new StateError({ message: `hook state #${i} is not an object` });
      }
      const name = getString(entry, "hook");
      if (name !== hook.name) {
        throw new StateError({ message: `hook state #${i} belongs to "${name}", not "${hook.name}"` });
      }
      hook.condition.loadStateDict(entry["condition"] ?? null);
    });
  }
}
