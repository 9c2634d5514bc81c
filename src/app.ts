import { Effect } from 'effect';
import { parseArgv } from './cli.js';
import { ConsoleOutput } from './cli-output/index.js';
import type { ICliOutput } from './cli-output/types.js';
import type { UsageError } from './errors/usage.error.js';
import { decodeVehicleParameterInput } from './vehicle-parameters/schema.js';
import { resolveParameters } from './vehicle-parameters/resolver.js';
import { computeConsumptionCurve, formatConsumptionCurve } from './consumption-curve/index.js';
import type { InvalidParameterError } from './errors/invalid-parameter.error.js';
import type { MissingParameterError } from './errors/missing-parameter.error.js';
import type { ConflictingParametersError } from './errors/conflicting-parameters.error.js';

export type ConsumptionCurveError = InvalidParameterError | MissingParameterError | ConflictingParametersError;

export const generateConsumptionCurve = (rawOptions: unknown): Effect.Effect<string, ConsumptionCurveError> =>
  Effect.gen(function* () {
    const input = yield* decodeVehicleParameterInput(rawOptions);
    const { vehicle, curve: curveOptions } = yield* resolveParameters(input);

    const curve = computeConsumptionCurve(vehicle, curveOptions);
    yield* Effect.logDebug(`Computed ${curve.length} curve points up to ${curveOptions.maxSpeedKmh}km/h`);

    return formatConsumptionCurve(curve);
  });

/**
 * Runs the tool for one argv: prints the curve, or reports the failure and fails
 * so that the runtime exits non-zero.
 */
export const runConsumptionCurveCli = (
  argv: readonly string[],
  output: ICliOutput = new ConsoleOutput(),
): Effect.Effect<void, UsageError | ConsumptionCurveError> =>
  Effect.gen(function* () {
    const options = yield* parseArgv(argv);
    if (options === null) {
      return;
    }

    const curve = yield* generateConsumptionCurve(options);
    yield* output.printCurve(curve);
  }).pipe(
    Effect.tapError((err) => output.printError(err.message)),
  );
