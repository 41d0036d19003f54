export { Counter, MetricStream, type Observable } from "./observable.js";
export {
  Always, GEqThan, LEqThan, MultipleOf, Lowest, Highest,
  ConsecutiveNonDecreasing, ConsecutiveNonIncreasing, Not, All, Any,
  type Condition,
} from "./conditions.js";
export { action, effectAction, named, type Action, type HookContext } from "./action.js";
export { Hook, HookList } from "./hook.js";
