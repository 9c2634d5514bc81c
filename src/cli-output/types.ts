import type { Effect } from "effect";

export type ICliOutput = {
  printCurve: (curve: string) => Effect.Effect<void>;
  printError: (message: string) => Effect.Effect<void>;
};
