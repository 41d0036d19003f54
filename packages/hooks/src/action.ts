/**
 * Actions: deferred calls with configuration bound at setup and firing context
 * appended at call time.
 *
 *   action(saveAs, "best")        // later called as saveAs("best", ctx)
 *   action(() => trainer.stop())  // the context can be ignored
 */
import { Effect } from "effect";

/** What the firer knows when a hook fires. */
export interface HookContext {
  readonly event: string;
  /** Completed epochs of the firing engine. */
  readonly epoch: number;
  /** Processed batches of the firing engine. */
  readonly iteration: number;
}

export interface Action {
  readonly name: string;
  run(ctx: HookContext): Effect.Effect<void, unknown>;
}

/** Bind a plain (sync or async) function. */
export function action<B extends unknown[]>(
  fn: (...args: [...B, HookContext]) => void | Promise<void>,
  ...bound: B
): Action {
  return {
    name: fn.name || "action",
    run: (ctx) =>
      Effect.tryPromise({
        try: async () => {
          await fn(...bound, ctx);
        },
        catch: (e) => e,
      }),
  };
}

/** Bind a function that returns an Effect; its failures and logs stay in the caller's fiber. */
export function effectAction<B extends unknown[], E>(
  fn: (...args: [...B, HookContext]) => Effect.Effect<unknown, E>,
  ...bound: B
): Action {
  return {
    name: fn.name || "action",
    run: (ctx) => Effect.asVoid(Effect.suspend(() => fn(...bound, ctx))),
  };
}

/** Give an action a readable name for logs and error reports. */
export function named(name: string, inner: Action): Action {
  return { name, run: (ctx) => inner.run(ctx) };
}
