import type { ISimulationEventLogger } from "./types.js";
import type { ComparisonSummary, SimulationConfig } from "../microgrid-simulator/types.js";
import { Effect } from "effect";

export class SimulationEventLogger implements ISimulationEventLogger {

  public onComparisonStarted(config: SimulationConfig) {
    return Effect.logDebug('Running baseline and smart dispatch', { config });
  }

  public onComparisonCompleted(summary: ComparisonSummary) {
    return Effect.logInfo(
      `Smart dispatch saved ${summary.cost_saved} (${summary.cost_saved_percent}%) and ${summary.grid_reduced} kWh of grid import (${summary.grid_reduced_percent}%)`,
      {
        baselineTotalCost: summary.baseline_total_cost,
        smartTotalCost: summary.smart_total_cost,
        batteryCapacityKwh: summary.battery_capacity_kwh,
      }
    );
  }
}
