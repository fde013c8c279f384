import { Config as EffectConfig, LogLevel } from "effect";
import type { SimulationConfig } from "./microgrid-simulator/types.js";


export const AppConfig = {
  server: {
    port: EffectConfig.integer("PORT").pipe(EffectConfig.withDefault(8000)),
    corsAllowedOrigins: EffectConfig.array(EffectConfig.string(), "CORS_ALLOWED_ORIGINS").pipe(
      EffectConfig.withDefault([
        "http://localhost:3000",
        "http://127.0.0.1:3000",
        "http://localhost:3001",
      ])
    ),
  },

  logLevel: EffectConfig.logLevel("LOG_LEVEL").pipe(
    EffectConfig.withDefault(LogLevel.Info)
  ),
};

export const SERVICE_NAME = "Microgrid Dispatch Simulator API";
export const SERVICE_VERSION = "1.0.0";

// 10 kWh home battery, 5 kW rooftop array, three-tier time-of-use tariff
export const DEFAULT_SIMULATION_CONFIG: SimulationConfig = {
  batteryCapacityKwh: 10.0,
  batteryEfficiency: 0.95,
  minSoc: 0.2,
  maxSoc: 1.0,
  initialSoc: 0.5,
  solarCapacityKw: 5.0,
  weatherMode: "sunny",
  offPeakPrice: 4.0,
  standardPrice: 6.5,
  peakPrice: 8.5,
  peakHours: [18, 22],
};
