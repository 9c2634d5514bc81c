import { Effect } from "effect";
import { MissingParameterError } from "../errors/missing-parameter.error.js";
import { ConflictingParametersError } from "../errors/conflicting-parameters.error.js";
import type { VehicleParameterInput } from "./schema.js";
import type { ResolvedParameters } from "./types.js";
import {
  DEFAULT_DRAG_COEFFICIENT,
  DEFAULT_DRIVETRAIN_EFFICIENCY,
  DEFAULT_IDLE_POWER_KW,
  DEFAULT_LOAD_WEIGHT_KG,
  DEFAULT_MAX_SPEED_KMH,
  DEFAULT_ROLLING_RESISTANCE_COEFFICIENT,
  DEFAULT_TEMPERATURE_C,
  FRONTAL_AREA_FACTOR,
} from "./defaults.js";

export const resolveWeight = (
  input: Pick<VehicleParameterInput, 'weight' | 'curbWeight'>
): Effect.Effect<number, MissingParameterError | ConflictingParametersError> => Effect.gen(function* () {
  if (input.weight !== undefined && input.curbWeight !== undefined) {
    return yield* Effect.fail(new ConflictingParametersError({
      parameters: ['--weight', '--curb-weight'],
      message: 'Cannot have both --weight and --curb-weight.',
    }));
  }

  if (input.weight !== undefined) {
    return input.weight;
  }

  if (input.curbWeight !== undefined) {
    yield* Effect.logDebug(`Adding ${DEFAULT_LOAD_WEIGHT_KG}kg load to curb weight of ${input.curbWeight}kg`);
    return input.curbWeight + DEFAULT_LOAD_WEIGHT_KG;
  }

  return yield* Effect.fail(new MissingParameterError({
    parameters: ['--weight', '--curb-weight'],
    message: 'Need either --weight or --curb-weight.',
  }));
});

export const resolveDragArea = (
  input: Pick<VehicleParameterInput, 'dragArea' | 'dragCoefficient' | 'frontalArea' | 'width' | 'height'>
): Effect.Effect<number, MissingParameterError> => Effect.gen(function* () {
  // An explicit drag area wins over everything else.
  if (input.dragArea !== undefined) {
    yield* Effect.logDebug(`Using drag area ${input.dragArea}m²`);
    return input.dragArea;
  }

  const dragCoefficient = input.dragCoefficient ?? DEFAULT_DRAG_COEFFICIENT;

  if (input.frontalArea !== undefined) {
    yield* Effect.logDebug(`Using drag coefficient ${dragCoefficient} with frontal area ${input.frontalArea}m²`);
    return dragCoefficient * input.frontalArea;
  }

  if (input.width !== undefined && input.height !== undefined) {
    const frontalArea = FRONTAL_AREA_FACTOR * input.width * input.height;
    yield* Effect.logDebug(`Using drag coefficient ${dragCoefficient} with estimated frontal area ${frontalArea}m²`);
    return dragCoefficient * frontalArea;
  }

  if (input.width !== undefined || input.height !== undefined) {
    const missing = input.width === undefined ? '--width' : '--height';
    return yield* Effect.fail(new MissingParameterError({
      parameters: [missing],
      message: `Both --width and --height must be given together, missing ${missing}.`,
    }));
  }

  return yield* Effect.fail(new MissingParameterError({
    parameters: ['--drag-area', '--frontal-area', '--width', '--height'],
    message: 'Must specify --drag-area or --frontal-area or --width and --height.',
  }));
});

export const resolveParameters = (
  input: VehicleParameterInput
): Effect.Effect<ResolvedParameters, MissingParameterError | ConflictingParametersError> => Effect.gen(function* () {
  const weightKg = yield* resolveWeight(input);
  const dragAreaM2 = yield* resolveDragArea(input);

  const resolved: ResolvedParameters = {
    vehicle: {
      weightKg,
      dragAreaM2,
      rollingResistanceCoefficient: input.rollingResistanceCoefficient ?? DEFAULT_ROLLING_RESISTANCE_COEFFICIENT,
      drivetrainEfficiency: input.drivetrainEfficiency ?? DEFAULT_DRIVETRAIN_EFFICIENCY,
      idlePowerKw: input.idlePower ?? DEFAULT_IDLE_POWER_KW,
      temperatureC: input.temperature ?? DEFAULT_TEMPERATURE_C,
    },
    curve: {
      maxSpeedKmh: Math.trunc(input.maxSpeed ?? DEFAULT_MAX_SPEED_KMH),
      // Wh/km -> kWh/100km
      ...(input.highwayConsumption !== undefined
        ? { highwayConsumptionKwhPer100Km: (input.highwayConsumption / 1000) * 100 }
        : {}),
    },
  };

  yield* Effect.logDebug(`Resolved vehicle parameters: ${JSON.stringify(resolved.vehicle)}`);

  return resolved;
});
