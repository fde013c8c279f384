import { Effect, Random } from "effect";
import type { HourlyProfile, SimulationConfig, WeatherMode } from "./types.js";
import { roundTo } from "./rounding.js";

// Pure generators for the three hourly series of a simulated day

export const HOURS_PER_DAY = 24;

export const SOLAR_PERTURBATION_SEED = 42;
export const LOAD_PERTURBATION_SEED = 43;

const SOLAR_PERTURBATION_SPREAD = 0.1;
const LOAD_PERTURBATION_SPREAD = 0.05;

// Daylight window [sunrise, sunset) and bell curve centred on solar noon
const SUNRISE_HOUR = 6;
const SUNSET_HOUR = 19;
const SOLAR_NOON_HOUR = 12;
const SOLAR_CURVE_SIGMA_HOURS = 3;

// A 5 kW array peaks at ~7 kW on the reference curve
const REFERENCE_ARRAY_KW = 5.0;
const REFERENCE_PEAK_KW = 7.0;

const WEATHER_EFFICIENCY: Record<WeatherMode, number> = {
  sunny: 1.0,
  cloudy: 0.5,
};

// Residential summer demand (kW): low nights, morning peak, AC ramp in the afternoon, evening peak
export const BASE_LOAD_KW: readonly number[] = [
  1.5, 1.5, 1.5, 1.5, 2.0, 2.5,
  3.5, 4.0, 4.5, 3.5, 3.0, 2.5,
  2.5, 2.5, 3.0, 3.5, 4.0, 5.0,
  6.5, 7.0, 6.5, 5.5, 4.0, 2.5,
];

// Pricing tiers are fixed and independent of the dispatch peak hours
const STANDARD_TIER_START_HOUR = 6;
const PEAK_TIER_START_HOUR = 18;
const PEAK_TIER_END_HOUR = 22;

/**
 * One multiplicative factor per hour, `1 + spread * (r - 0.5)` with `r` in [0, 1).
 * The generator is seeded locally, so the same seed always yields the same factors.
 */
export const perturbationFactors = (
  seed: number,
  spread: number
): Effect.Effect<readonly number[]> =>
  Effect.replicateEffect(Random.next, HOURS_PER_DAY).pipe(
    Effect.map((draws) => draws.map((draw) => 1 + spread * (draw - 0.5))),
    Effect.withRandom(Random.make(seed))
  );

export const clearSkySolarKw = (hour: number, solarCapacityKw: number): number => {
  if (hour < SUNRISE_HOUR || hour >= SUNSET_HOUR) {
    return 0;
  }

  const peakGeneration = REFERENCE_PEAK_KW * (solarCapacityKw / REFERENCE_ARRAY_KW);
  return peakGeneration * Math.exp(-0.5 * Math.pow((hour - SOLAR_NOON_HOUR) / SOLAR_CURVE_SIGMA_HOURS, 2));
};

export const generateSolar = (
  config: Pick<SimulationConfig, "solarCapacityKw" | "weatherMode">
): Effect.Effect<readonly number[]> =>
  perturbationFactors(SOLAR_PERTURBATION_SEED, SOLAR_PERTURBATION_SPREAD).pipe(
    Effect.map((factors) => {
      const weatherEfficiency = WEATHER_EFFICIENCY[config.weatherMode];

      return factors.map((factor, hour) =>
        roundTo(
          Math.max(0, clearSkySolarKw(hour, config.solarCapacityKw) * weatherEfficiency * factor),
          2
        )
      );
    })
  );

/**
 * The load curve takes no configuration: every run sees the same residential
 * demand, whatever the battery, array or tariff.
 */
export const generateLoad = (): Effect.Effect<readonly number[]> =>
  perturbationFactors(LOAD_PERTURBATION_SEED, LOAD_PERTURBATION_SPREAD).pipe(
    Effect.map((factors) =>
      BASE_LOAD_KW.map((baseLoad, hour) => roundTo(baseLoad * (factors[hour] ?? 1), 2))
    )
  );

export const priceForHour = (
  hour: number,
  config: Pick<SimulationConfig, "offPeakPrice" | "standardPrice" | "peakPrice">
): number => {
  if (hour < STANDARD_TIER_START_HOUR) {
    return config.offPeakPrice;
  }
  if (hour < PEAK_TIER_START_HOUR) {
    return config.standardPrice;
  }
  if (hour < PEAK_TIER_END_HOUR) {
    return config.peakPrice;
  }
  return config.offPeakPrice;
};

export const generatePrice = (
  config: Pick<SimulationConfig, "offPeakPrice" | "standardPrice" | "peakPrice">
): readonly number[] =>
  Array.from({ length: HOURS_PER_DAY }, (_, hour) => priceForHour(hour, config));

export const generateProfile = (config: SimulationConfig): Effect.Effect<HourlyProfile> =>
  Effect.all({
    solarKw: generateSolar(config),
    loadKw: generateLoad(),
  }).pipe(
    Effect.map(({ solarKw, loadKw }) => ({
      solarKw,
      loadKw,
      pricePerKwh: generatePrice(config),
    }))
  );
