import type { DispatchStrategy, HourlyProfile, HourRecord, SimulationConfig } from "./types.js";
import { roundTo } from "./rounding.js";

// Pure hour-by-hour dispatch for the two battery strategies

type HourInputs = {
  readonly hour: number;
  readonly solar: number;
  readonly load: number;
  readonly price: number;
  readonly isPeak: boolean;
};

type HourFlows = {
  readonly solarUsed: number;
  readonly solarExcess: number;
  readonly gridUsage: number;
  readonly batteryCharge: number;
  readonly batteryDischarge: number;
  readonly soc: number;
};

export const isPeakHour = (hour: number, peakHours: SimulationConfig["peakHours"]): boolean =>
  peakHours[0] <= hour && hour < peakHours[1];

const hourInputs = (profile: HourlyProfile, config: SimulationConfig): HourInputs[] =>
  profile.loadKw.map((load, hour) => ({
    hour,
    solar: profile.solarKw[hour] ?? 0,
    load,
    price: profile.pricePerKwh[hour] ?? 0,
    isPeak: isPeakHour(hour, config.peakHours),
  }));

const toHourRecord = (inputs: HourInputs, flows: HourFlows): HourRecord => ({
  hour: inputs.hour,
  solar_generation: roundTo(inputs.solar, 2),
  load_demand: roundTo(inputs.load, 2),
  solar_used: roundTo(flows.solarUsed, 2),
  solar_excess: roundTo(flows.solarExcess, 2),
  grid_usage: roundTo(flows.gridUsage, 2),
  battery_charge: roundTo(flows.batteryCharge, 2),
  battery_discharge: roundTo(flows.batteryDischarge, 2),
  battery_soc: roundTo(flows.soc * 100, 1),
  grid_price: roundTo(inputs.price, 3),
  hourly_cost: roundTo(flows.gridUsage * inputs.price, 3),
  is_peak_hour: inputs.isPeak,
});

/**
 * Battery stays idle: solar covers what it can, the grid covers the rest and
 * surplus solar is wasted. The reported SoC is the untouched initial SoC.
 */
export const dispatchBaseline = (
  profile: HourlyProfile,
  config: SimulationConfig
): HourRecord[] =>
  hourInputs(profile, config).map((inputs) =>
    toHourRecord(inputs, {
      solarUsed: Math.min(inputs.solar, inputs.load),
      solarExcess: Math.max(0, inputs.solar - inputs.load),
      gridUsage: Math.max(0, inputs.load - inputs.solar),
      batteryCharge: 0,
      batteryDischarge: 0,
      soc: config.initialSoc,
    })
  );

/**
 * Peak shaving: surplus solar charges the battery whenever there is room, and
 * the battery covers the deficit only inside the configured peak hours.
 *
 * Efficiency is lost on the way in (`stored = excess * efficiency`) and again
 * on the way out (`delivered = drawn * efficiency`).
 */
export const dispatchSmart = (
  profile: HourlyProfile,
  config: SimulationConfig
): HourRecord[] => {
  const capacity = config.batteryCapacityKwh;
  const efficiency = config.batteryEfficiency;
  // A battery without capacity or efficiency can neither store nor deliver
  const canCycle = capacity > 0 && efficiency > 0;

  let soc = config.initialSoc;

  return hourInputs(profile, config).map((inputs) => {
    const solarUsed = Math.min(inputs.solar, inputs.load);
    let remainingLoad = inputs.load - solarUsed;
    const solarExcess = Math.max(0, inputs.solar - inputs.load);

    let batteryCharge = 0;
    let batteryDischarge = 0;
    let gridUsage = 0;

    if (canCycle && solarExcess > 0 && soc < config.maxSoc) {
      const availableCapacity = (config.maxSoc - soc) * capacity;
      batteryCharge = Math.min(solarExcess * efficiency, availableCapacity);
      soc = Math.min(soc + batteryCharge / capacity, config.maxSoc);
    }

    if (remainingLoad > 0) {
      if (canCycle && inputs.isPeak && soc > config.minSoc) {
        const availableEnergy = (soc - config.minSoc) * capacity;
        batteryDischarge = Math.min(remainingLoad, availableEnergy * efficiency);
        const drawnFromBattery = batteryDischarge / efficiency;
        soc = Math.max(soc - drawnFromBattery / capacity, config.minSoc);
        remainingLoad -= batteryDischarge;
      }

      gridUsage = Math.max(0, remainingLoad);
    }

    return toHourRecord(inputs, {
      solarUsed,
      // net of what the battery captured this hour
      solarExcess: Math.max(0, inputs.solar - inputs.load - batteryCharge),
      gridUsage,
      batteryCharge,
      batteryDischarge,
      soc,
    });
  });
};

export const DispatchStrategies: Record<
  DispatchStrategy,
  (profile: HourlyProfile, config: SimulationConfig) => HourRecord[]
> = {
  baseline: dispatchBaseline,
  smart: dispatchSmart,
};

export const dispatch = (
  strategy: DispatchStrategy,
  profile: HourlyProfile,
  config: SimulationConfig
): HourRecord[] => DispatchStrategies[strategy](profile, config);
