import { Effect, ParseResult, Schema } from "effect";
import type { ParseError } from "effect/ParseResult";
import { InvalidParameterError } from "../errors/invalid-parameter.error.js";

// Replaces both "not a number" and "out of range" failures.
const flagMessage = (message: string) => ({
  message: () => ({ message, override: true }),
});

const NumberBetween = (minimum: number, maximum: number) =>
  Schema.NumberFromString.pipe(Schema.between(minimum, maximum))
    .annotations(flagMessage(`must be a number between ${minimum} and ${maximum}`));

const NumberFlag = (minimum: number, maximum: number) =>
  Schema.optionalWith(NumberBetween(minimum, maximum), { exact: true });

// Flags arrive as strings from the command line; each one is optional and range-checked.
export const VehicleParameterInputSchema = Schema.Struct({
  weight: NumberFlag(200, 80_000),
  curbWeight: NumberFlag(200, 80_000),
  dragArea: NumberFlag(0.1, 4.0),
  dragCoefficient: NumberFlag(0.03, 5.0),
  frontalArea: NumberFlag(0.5, 8.0),
  width: NumberFlag(0.5, 4.0),
  height: NumberFlag(0.5, 4.0),
  rollingResistanceCoefficient: NumberFlag(0.003, 0.05),
  drivetrainEfficiency: Schema.optionalWith(
    Schema.NumberFromString.pipe(Schema.greaterThan(0), Schema.lessThanOrEqualTo(1))
      .annotations(flagMessage('must be a number greater than 0 and at most 1')),
    { exact: true }
  ),
  idlePower: NumberFlag(0, 6), // kW
  highwayConsumption: NumberFlag(50, 1000), // Wh/km
  temperature: NumberFlag(-90, 60),
  maxSpeed: NumberFlag(20, 250),
});

export type VehicleParameterInput = typeof VehicleParameterInputSchema.Type

// weight -> --weight, curbWeight -> --curb-weight
export const flagName = (key: PropertyKey): string =>
  `--${String(key).replace(/[A-Z]/g, (letter) => `-${letter.toLowerCase()}`)}`;

/**
 * One line naming the offending flag, e.g. "--temperature: must be a number between -90 and 60".
 */
export const formatInputError = (error: ParseError): string => {
  const [issue] = ParseResult.ArrayFormatter.formatErrorSync(error);
  if (issue === undefined) {
    return error.message;
  }

  const [key] = issue.path;
  return key === undefined ? issue.message : `${flagName(key)}: ${issue.message}`;
};

export const decodeVehicleParameterInput = (raw: unknown): Effect.Effect<VehicleParameterInput, InvalidParameterError> =>
  Schema.decodeUnknown(VehicleParameterInputSchema)(raw).pipe(
    Effect.mapError((previous) => new InvalidParameterError({
      message: formatInputError(previous),
      previous,
    })),
  );
