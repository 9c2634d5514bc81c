import { Data } from "effect";

export class MissingParameterError extends Data.TaggedError('MissingParameter')<{
  parameters: readonly string[];
  message: string;
}> {}
