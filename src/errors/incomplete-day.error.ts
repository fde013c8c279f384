import { Data } from "effect";

export class IncompleteDayError extends Data.TaggedError('IncompleteDay')<{
  strategy: string;
  hours: readonly number[];
}> {}
