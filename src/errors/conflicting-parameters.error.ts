import { Data } from "effect";

export class ConflictingParametersError extends Data.TaggedError('ConflictingParameters')<{
  parameters: readonly string[];
  message: string;
}> {}
