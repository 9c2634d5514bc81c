import type { ICliOutput } from "./types.js";
import { Console } from "effect";

// The curve alone goes to stdout so it can be piped into a request.
export class ConsoleOutput implements ICliOutput {

  public printCurve(curve: string) {
    return Console.log(curve);
  }

  public printError(message: string) {
    return Console.error(`error: ${message}`);
  }
}
