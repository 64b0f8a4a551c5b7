import { AsyncLocalStorage } from "async_hooks";
import type { HarvestStage } from "./types.js";

export interface TelemetryContextValue {
  stage: HarvestStage;
  iteration: number;
}

const storage = new AsyncLocalStorage<TelemetryContextValue>();

export function runInStage<T>(
  stage: HarvestStage,
  iteration: number,
  fn: () => Promise<T>
): Promise<T> {
  return storage.run({ stage, iteration }, fn);
}

export function getTelemetryContext(): TelemetryContextValue {
  return storage.getStore() ?? { stage: "system", iteration: 0 };
}
