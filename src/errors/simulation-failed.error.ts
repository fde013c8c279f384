import { Data } from "effect";

export class SimulationFailedError extends Data.TaggedError('SimulationFailed')<{
  message: string;
  cause?: unknown;
}> {}
