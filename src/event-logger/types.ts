import type { Effect } from "effect";
import type { ComparisonSummary, SimulationConfig } from "../microgrid-simulator/types.js";

export type ISimulationEventLogger = {
  onComparisonStarted: (config: SimulationConfig) => Effect.Effect<void>;
  onComparisonCompleted: (summary: ComparisonSummary) => Effect.Effect<void>;
};
