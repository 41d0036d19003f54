/**
 * Lifecycle events an Engine fires, in the order they occur within a run.
 */
export const EngineEvent = {
  Start: "start",
  EpochStart: "epochStart",
  IterationStart: "iterationStart",
  IterationEnd: "iterationEnd",
  EpochEnd: "epochEnd",
  End: "end",
} as const;

export type EngineEvent = (typeof EngineEvent)[keyof typeof EngineEvent];

export const engineEvents: readonly EngineEvent[] = Object.values(EngineEvent);
