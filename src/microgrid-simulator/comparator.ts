import { Effect } from "effect";
import type { ComparisonResult, ComparisonSummary, HourRecord, SimulationConfig } from "./types.js";
import { generateProfile } from "./profile-generator.js";
import { dispatch } from "./dispatch-engine.js";
import { roundTo } from "./rounding.js";

const sumOf = (records: readonly HourRecord[], field: "hourly_cost" | "grid_usage"): number =>
  records.reduce((total, record) => total + record[field], 0);

// 0 instead of NaN/Infinity when there is nothing to save against
export const savingsPercent = (saved: number, baselineTotal: number): number =>
  baselineTotal > 0 ? (saved / baselineTotal) * 100 : 0;

export const summarize = (
  config: SimulationConfig,
  baseline: readonly HourRecord[],
  smart: readonly HourRecord[]
): ComparisonSummary => {
  const baselineTotalCost = sumOf(baseline, "hourly_cost");
  const smartTotalCost = sumOf(smart, "hourly_cost");
  const baselineGridUsage = sumOf(baseline, "grid_usage");
  const smartGridUsage = sumOf(smart, "grid_usage");

  const costSaved = baselineTotalCost - smartTotalCost;
  const gridReduced = baselineGridUsage - smartGridUsage;

  return {
    baseline_total_cost: roundTo(baselineTotalCost, 2),
    smart_total_cost: roundTo(smartTotalCost, 2),
    cost_saved: roundTo(costSaved, 2),
    cost_saved_percent: roundTo(savingsPercent(costSaved, baselineTotalCost), 1),
    baseline_grid_usage: roundTo(baselineGridUsage, 2),
    smart_grid_usage: roundTo(smartGridUsage, 2),
    grid_reduced: roundTo(gridReduced, 2),
    grid_reduced_percent: roundTo(savingsPercent(gridReduced, baselineGridUsage), 1),
    battery_capacity_kwh: config.batteryCapacityKwh,
    peak_price: config.peakPrice,
    off_peak_price: config.offPeakPrice,
  };
};

/**
 * Both strategies run over the same generated profile, each with its own
 * battery trajectory starting from the initial SoC.
 */
export const runComparison = (config: SimulationConfig): Effect.Effect<ComparisonResult> =>
  generateProfile(config).pipe(
    Effect.map((profile) => {
      const baseline = dispatch("baseline", profile, config);
      const smart = dispatch("smart", profile, config);

      return {
        baseline_data: baseline,
        smart_data: smart,
        summary: summarize(config, baseline, smart),
      };
    })
  );
