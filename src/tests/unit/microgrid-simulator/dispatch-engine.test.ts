import { describe, it, expect } from "@effect/vitest";
import { Effect } from "effect";
import {
  dispatch,
  dispatchBaseline,
  dispatchSmart,
  isPeakHour,
} from "../../../microgrid-simulator/dispatch-engine.js";
import { generateProfile } from "../../../microgrid-simulator/profile-generator.js";
import type { HourlyProfile, SimulationConfig } from "../../../microgrid-simulator/types.js";
import { DEFAULT_SIMULATION_CONFIG } from "../../../config.js";

const hourly = (values: Record<number, number>, fallback = 0): number[] =>
  Array.from({ length: 24 }, (_, hour) => values[hour] ?? fallback);

// Midday surplus, an off-peak deficit at 15:00 and two evening peak hours
const testProfile: HourlyProfile = {
  solarKw: hourly({ 12: 5 }),
  loadKw: hourly({ 12: 2, 15: 1, 19: 4, 20: 4 }),
  pricePerKwh: hourly({ 18: 2, 19: 2, 20: 2, 21: 2 }, 1),
};

const testConfig: SimulationConfig = {
  ...DEFAULT_SIMULATION_CONFIG,
  batteryCapacityKwh: 10,
  batteryEfficiency: 0.8,
  minSoc: 0.2,
  maxSoc: 1.0,
  initialSoc: 0.5,
  peakHours: [18, 22],
};

describe("dispatch-engine", () => {
  describe("isPeakHour", () => {
    it("should treat the peak window as half-open", () => {
      expect(isPeakHour(17, [18, 22])).toBe(false);
      expect(isPeakHour(18, [18, 22])).toBe(true);
      expect(isPeakHour(21, [18, 22])).toBe(true);
      expect(isPeakHour(22, [18, 22])).toBe(false);
    });
  });

  describe("dispatchBaseline", () => {
    it("should cover the deficit from the grid and waste the surplus", () => {
      const records = dispatchBaseline(testProfile, testConfig);

      expect(records[12]).toEqual({
        hour: 12,
        solar_generation: 5,
        load_demand: 2,
        solar_used: 2,
        solar_excess: 3,
        grid_usage: 0,
        battery_charge: 0,
        battery_discharge: 0,
        battery_soc: 50,
        grid_price: 1,
        hourly_cost: 0,
        is_peak_hour: false,
      });
      expect(records[19]).toMatchObject({ grid_usage: 4, hourly_cost: 8, is_peak_hour: true });
    });

    it("should report the initial SoC for every hour", () => {
      const records = dispatchBaseline(testProfile, { ...testConfig, initialSoc: 0.35 });

      expect(records.map((record) => record.battery_soc)).toEqual(hourly({}, 35));
    });
  });

  describe("dispatchSmart", () => {
    it("should store surplus solar at the charging efficiency", () => {
      const records = dispatchSmart(testProfile, testConfig);

      expect(records[12]).toMatchObject({
        solar_used: 2,
        battery_charge: 2.4,
        // 5 - 2 - 2.4 left after the battery took its share
        solar_excess: 0.6,
        grid_usage: 0,
        battery_soc: 74,
      });
    });

    it("should not discharge outside the peak hours", () => {
      const records = dispatchSmart(testProfile, testConfig);

      expect(records[15]).toMatchObject({
        battery_discharge: 0,
        grid_usage: 1,
        hourly_cost: 1,
        battery_soc: 74,
      });
    });

    it("should discharge during peak hours down to the minimum SoC", () => {
      const records = dispatchSmart(testProfile, testConfig);

      // 4 kWh delivered costs 4 / 0.8 = 5 kWh of stored energy
      expect(records[19]).toMatchObject({
        battery_discharge: 4,
        grid_usage: 0,
        hourly_cost: 0,
        battery_soc: 24,
      });
      // only 0.4 kWh left above the floor, 0.32 kWh of it reaches the load
      expect(records[20]).toMatchObject({
        battery_discharge: 0.32,
        grid_usage: 3.68,
        hourly_cost: 7.36,
        battery_soc: 20,
      });
      expect(records[21]).toMatchObject({ battery_discharge: 0, grid_usage: 0, battery_soc: 20 });
    });

    it("should stop charging at the maximum SoC", () => {
      const records = dispatchSmart(testProfile, { ...testConfig, initialSoc: 0.95 });

      expect(records[12]).toMatchObject({
        battery_charge: 0.5,
        solar_excess: 2.5,
        battery_soc: 100,
      });
    });

    it("should leave the battery untouched without capacity or efficiency", () => {
      for (const config of [
        { ...testConfig, batteryCapacityKwh: 0 },
        { ...testConfig, batteryEfficiency: 0 },
      ]) {
        const records = dispatchSmart(testProfile, config);

        expect(records.map((record) => record.battery_soc)).toEqual(hourly({}, 50));
        expect(records.map((record) => record.battery_charge)).toEqual(hourly({}));
        expect(records.map((record) => record.battery_discharge)).toEqual(hourly({}));
        expect(records[20]).toMatchObject({ grid_usage: 4, hourly_cost: 8 });
      }
    });

    it.effect("should keep the SoC within bounds for generated profiles", () => Effect.gen(function* () {
      const configs: SimulationConfig[] = [
        DEFAULT_SIMULATION_CONFIG,
        { ...DEFAULT_SIMULATION_CONFIG, batteryCapacityKwh: 1, initialSoc: 1 },
        { ...DEFAULT_SIMULATION_CONFIG, minSoc: 0.4, maxSoc: 0.8, initialSoc: 0.4, weatherMode: "cloudy" },
        { ...DEFAULT_SIMULATION_CONFIG, batteryCapacityKwh: 100, peakHours: [0, 24] },
      ];

      for (const config of configs) {
        const profile = yield* generateProfile(config);

        for (const record of dispatchSmart(profile, config)) {
          expect(record.battery_soc).toBeGreaterThanOrEqual(config.minSoc * 100);
          expect(record.battery_soc).toBeLessThanOrEqual(config.maxSoc * 100);
        }
      }
    }));

    it.effect("should balance every hour's load", () => Effect.gen(function* () {
      const profile = yield* generateProfile(DEFAULT_SIMULATION_CONFIG);

      for (const record of dispatchSmart(profile, DEFAULT_SIMULATION_CONFIG)) {
        expect(record.solar_used + record.grid_usage + record.battery_discharge).toBeCloseTo(record.load_demand, 1);
      }
    }));
  });

  describe("dispatch", () => {
    it.effect("should keep baseline solar use and excess within generation", () => Effect.gen(function* () {
      const profile = yield* generateProfile(DEFAULT_SIMULATION_CONFIG);

      for (const record of dispatch("baseline", profile, DEFAULT_SIMULATION_CONFIG)) {
        expect(record.solar_used + record.solar_excess).toBeLessThanOrEqual(record.solar_generation + 0.01);
      }
    }));

    it("should run each strategy from the same initial SoC", () => {
      const smartFirst = dispatch("smart", testProfile, testConfig);
      const smartSecond = dispatch("smart", testProfile, testConfig);

      expect(smartSecond).toEqual(smartFirst);
      expect(dispatch("baseline", testProfile, testConfig)).toEqual(dispatchBaseline(testProfile, testConfig));
    });

    it("should produce 24 records in hour order", () => {
      for (const strategy of ["baseline", "smart"] as const) {
        expect(dispatch(strategy, testProfile, testConfig).map((record) => record.hour)).toEqual(
          Array.from({ length: 24 }, (_, hour) => hour)
        );
      }
    });
  });
});
