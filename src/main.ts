#!/usr/bin/env node
import { NodeRuntime } from "@effect/platform-node"
import { Console, Effect, Logger } from "effect"
import { AppConfig } from './config.js';
import { runConsumptionCurveCli } from './app.js';

// stdout carries the curve only, diagnostics go to stderr.
const StderrLogger = Logger.replace(
  Logger.defaultLogger,
  Logger.withConsoleError(Logger.logfmtLogger),
);

const program = Effect.gen(function*() {
  const logLevel = yield* AppConfig.logLevel.pipe(
    Effect.tapError((err) => Console.error(`error: invalid LOG_LEVEL ${String(err)}`)),
  );

  yield* runConsumptionCurveCli(process.argv.slice(2)).pipe(
    Logger.withMinimumLogLevel(logLevel),
  );
}).pipe(
  Effect.provide(StderrLogger),
);

// Failures are already reported above; runMain only sets the exit code.
NodeRuntime.runMain(program, { disableErrorReporting: true, disablePrettyLogger: true });
