#!/usr/bin/env node
import { NodeRuntime } from '@effect/platform-node';
import { Effect, Logger } from 'effect';
import { AppConfig } from './config.js';
import { decodeSimulationRequest, toSimulationConfig } from './http/schema.js';
import { MicrogridSimulator } from './microgrid-simulator/index.js';
import { serviceLayers } from './layers.js';

// Usage: simulate ['{"battery_capacity_kwh": 20, "weather_mode": "cloudy"}']
const program = Effect.gen(function*() {
  const request = yield* decodeSimulationRequest(process.argv[2] ?? '');
  const simulator = yield* MicrogridSimulator;

  const { summary } = yield* simulator.runComparison(toSimulationConfig(request));

  console.log('=== MICROGRID SIMULATION RESULTS ===\n');
  console.log(`Battery Capacity: ${summary.battery_capacity_kwh} kWh`);
  console.log(`Peak Price: ${summary.peak_price}/kWh`);
  console.log(`Off-Peak Price: ${summary.off_peak_price}/kWh`);
  console.log();
  console.log(`Baseline Total Cost: ${summary.baseline_total_cost.toFixed(2)}`);
  console.log(`Smart Strategy Cost: ${summary.smart_total_cost.toFixed(2)}`);
  console.log(`Cost Saved: ${summary.cost_saved.toFixed(2)} (${summary.cost_saved_percent.toFixed(1)}%)`);
  console.log();
  console.log(`Grid Usage Reduction: ${summary.grid_reduced.toFixed(1)} kWh (${summary.grid_reduced_percent.toFixed(1)}%)`);
});

NodeRuntime.runMain(
  Effect.flatMap(AppConfig.logLevel, (logLevel) =>
    program.pipe(
      Effect.provide(serviceLayers),
      Logger.withMinimumLogLevel(logLevel),
    )
  )
);
