import type { ParseError } from "effect/ParseResult";
import { Data } from "effect";

export class InvalidParameterError extends Data.TaggedError('InvalidParameter')<{
  message: string;
  previous: ParseError;
}> {}
