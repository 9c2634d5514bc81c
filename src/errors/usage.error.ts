import { Data } from "effect";

export class UsageError extends Data.TaggedError('Usage')<{
  message: string;
}> {}
