import { Schema } from "effect";
import { DEFAULT_SIMULATION_CONFIG } from "../config.js";
import type { SimulationConfig } from "../microgrid-simulator/types.js";

const defaults = DEFAULT_SIMULATION_CONFIG;

const Fraction = Schema.Number.pipe(Schema.between(0, 1));
const HourOfDay = Schema.Int.pipe(Schema.between(0, 24));

export const WeatherModeSchema = Schema.Literal("sunny", "cloudy");

export const SimulationRequestSchema = Schema.Struct({
  battery_capacity_kwh: Schema.optionalWith(Schema.Number.pipe(Schema.between(1, 100)), {
    default: () => defaults.batteryCapacityKwh,
  }),
  solar_capacity_kw: Schema.optionalWith(Schema.Number.pipe(Schema.between(3, 7)), {
    default: () => defaults.solarCapacityKw,
  }),
  weather_mode: Schema.optionalWith(WeatherModeSchema, {
    default: () => defaults.weatherMode,
  }),
  off_peak_price: Schema.optionalWith(Schema.Number.pipe(Schema.between(2, 10)), {
    default: () => defaults.offPeakPrice,
  }),
  standard_price: Schema.optionalWith(Schema.Number.pipe(Schema.between(3, 12)), {
    default: () => defaults.standardPrice,
  }),
  peak_price: Schema.optionalWith(Schema.Number.pipe(Schema.between(5, 15)), {
    default: () => defaults.peakPrice,
  }),
  initial_soc: Schema.optionalWith(Fraction, {
    default: () => defaults.initialSoc,
  }),
  battery_efficiency: Schema.optionalWith(
    Schema.Number.pipe(Schema.greaterThan(0), Schema.lessThanOrEqualTo(1)),
    { default: () => defaults.batteryEfficiency }
  ),
  min_soc: Schema.optionalWith(Fraction, {
    default: () => defaults.minSoc,
  }),
  max_soc: Schema.optionalWith(Fraction, {
    default: () => defaults.maxSoc,
  }),
  peak_hours: Schema.optionalWith(Schema.Tuple(HourOfDay, HourOfDay), {
    default: () => defaults.peakHours,
  }),
}).pipe(
  Schema.filter((request) => request.min_soc < request.max_soc || "min_soc must be below max_soc"),
  Schema.filter(
    (request) =>
      (request.initial_soc >= request.min_soc && request.initial_soc <= request.max_soc) ||
      "initial_soc must lie within [min_soc, max_soc]"
  ),
  Schema.filter(
    (request) =>
      request.peak_hours[0] < request.peak_hours[1] ||
      "peak_hours must be a non-empty [start, end) interval"
  )
);

export type SimulationRequest = typeof SimulationRequestSchema.Type;

// An empty or `null` body means "all defaults"
const isMissingBody = (body: string) => {
  const trimmed = body.trim();
  return trimmed === "" || trimmed === "null";
};

export const decodeSimulationRequest = (body: string) =>
  Schema.decodeUnknown(Schema.parseJson(SimulationRequestSchema))(
    isMissingBody(body) ? "{}" : body
  );

export const toSimulationConfig = (request: SimulationRequest): SimulationConfig => ({
  batteryCapacityKwh: request.battery_capacity_kwh,
  batteryEfficiency: request.battery_efficiency,
  minSoc: request.min_soc,
  maxSoc: request.max_soc,
  initialSoc: request.initial_soc,
  solarCapacityKw: request.solar_capacity_kw,
  weatherMode: request.weather_mode,
  offPeakPrice: request.off_peak_price,
  standardPrice: request.standard_price,
  peakPrice: request.peak_price,
  peakHours: request.peak_hours,
});

export const toDefaultsResponse = (config: SimulationConfig) => ({
  battery_capacity_kwh: config.batteryCapacityKwh,
  battery_efficiency: config.batteryEfficiency,
  min_soc: config.minSoc,
  max_soc: config.maxSoc,
  initial_soc: config.initialSoc,
  solar_capacity_kw: config.solarCapacityKw,
  weather_mode: config.weatherMode,
  off_peak_price: config.offPeakPrice,
  standard_price: config.standardPrice,
  peak_price: config.peakPrice,
  peak_hours: config.peakHours,
});
