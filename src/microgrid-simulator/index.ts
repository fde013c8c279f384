import { Context, Effect, Layer } from "effect";
import type { ComparisonResult, HourRecord, SimulationConfig } from "./types.js";
import { runComparison } from "./comparator.js";
import { HOURS_PER_DAY } from "./profile-generator.js";
import { SimulationFailedError } from "../errors/simulation-failed.error.js";
import { IncompleteDayError } from "../errors/incomplete-day.error.js";
import type { ISimulationEventLogger } from "../event-logger/types.js";
import { SimulationEventLogger } from "../event-logger/index.js";

export type {
  WeatherMode,
  DispatchStrategy,
  SimulationConfig,
  HourlyProfile,
  HourRecord,
  ComparisonSummary,
  ComparisonResult,
} from "./types.js";
export { generateSolar, generateLoad, generatePrice, generateProfile } from "./profile-generator.js";
export { dispatch, dispatchBaseline, dispatchSmart, isPeakHour } from "./dispatch-engine.js";
export { runComparison, summarize, savingsPercent } from "./comparator.js";

export class MicrogridSimulator extends Context.Tag("MicrogridSimulator")<
  MicrogridSimulator,
  {
    readonly runComparison: (
      config: SimulationConfig
    ) => Effect.Effect<ComparisonResult, SimulationFailedError>;
  }
>() {}

export type IMicrogridSimulator = Context.Tag.Service<typeof MicrogridSimulator>;

const ensureCompleteDay = (
  strategy: string,
  records: readonly HourRecord[]
): Effect.Effect<void, IncompleteDayError> => {
  const hours = records.map((record) => record.hour);
  const isCompleteDay =
    hours.length === HOURS_PER_DAY && hours.every((hour, index) => hour === index);

  return isCompleteDay
    ? Effect.void
    : Effect.fail(new IncompleteDayError({ strategy, hours }));
};

export type CompareStrategies = (config: SimulationConfig) => Effect.Effect<ComparisonResult>;

export const makeMicrogridSimulator = (
  eventLogger: ISimulationEventLogger = new SimulationEventLogger(),
  compare: CompareStrategies = runComparison
): IMicrogridSimulator => ({
  runComparison: (config) =>
    Effect.gen(function* () {
      yield* eventLogger.onComparisonStarted(config);

      const result = yield* compare(config);
      yield* ensureCompleteDay("baseline", result.baseline_data);
      yield* ensureCompleteDay("smart", result.smart_data);

      yield* eventLogger.onComparisonCompleted(result.summary);

      return result;
    }).pipe(
      Effect.catchTags({
        IncompleteDay: (err) =>
          Effect.fail(
            new SimulationFailedError({
              message: `${err.strategy} dispatch produced hours [${err.hours.join(", ")}] instead of a full day`,
              cause: err,
            })
          ),
      }),
      // no partial results: anything that blows up mid-run is reported as one failure
      Effect.catchAllDefect((defect) =>
        Effect.fail(
          new SimulationFailedError({
            message: defect instanceof Error ? defect.message : String(defect),
            cause: defect,
          })
        )
      ),
      Effect.withSpan("MicrogridSimulator.runComparison")
    ),
});

export const MicrogridSimulatorLayer = Layer.sync(MicrogridSimulator, () =>
  makeMicrogridSimulator()
);
