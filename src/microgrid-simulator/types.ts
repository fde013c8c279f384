export type WeatherMode = "sunny" | "cloudy";

export type DispatchStrategy = "baseline" | "smart";

export type SimulationConfig = {
  readonly batteryCapacityKwh: number;
  readonly batteryEfficiency: number; // applied once on charge and once on discharge
  readonly minSoc: number; // fraction 0-1
  readonly maxSoc: number; // fraction 0-1
  readonly initialSoc: number; // fraction 0-1, reset at the start of every dispatch run
  readonly solarCapacityKw: number;
  readonly weatherMode: WeatherMode;
  readonly offPeakPrice: number; // per kWh, 00:00-06:00 and 22:00-24:00
  readonly standardPrice: number; // per kWh, 06:00-18:00
  readonly peakPrice: number; // per kWh, 18:00-22:00
  readonly peakHours: readonly [start: number, end: number]; // [start, end) for battery discharge
};

export type HourlyProfile = {
  readonly solarKw: readonly number[];
  readonly loadKw: readonly number[];
  readonly pricePerKwh: readonly number[];
};

export type HourRecord = {
  readonly hour: number;
  readonly solar_generation: number;
  readonly load_demand: number;
  readonly solar_used: number;
  readonly solar_excess: number;
  readonly grid_usage: number;
  readonly battery_charge: number;
  readonly battery_discharge: number;
  readonly battery_soc: number; // percentage 0-100
  readonly grid_price: number;
  readonly hourly_cost: number;
  readonly is_peak_hour: boolean;
};

export type ComparisonSummary = {
  readonly baseline_total_cost: number;
  readonly smart_total_cost: number;
  readonly cost_saved: number;
  readonly cost_saved_percent: number;
  readonly baseline_grid_usage: number;
  readonly smart_grid_usage: number;
  readonly grid_reduced: number;
  readonly grid_reduced_percent: number;
  readonly battery_capacity_kwh: number;
  readonly peak_price: number;
  readonly off_peak_price: number;
};

export type ComparisonResult = {
  readonly baseline_data: readonly HourRecord[];
  readonly smart_data: readonly HourRecord[];
  readonly summary: ComparisonSummary;
};
