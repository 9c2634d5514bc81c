import { Command, CommanderError } from 'commander';
import { Effect } from 'effect';
import { UsageError } from './errors/usage.error.js';
import {
  DEFAULT_DRAG_COEFFICIENT,
  DEFAULT_DRIVETRAIN_EFFICIENCY,
  DEFAULT_IDLE_POWER_KW,
  DEFAULT_LOAD_WEIGHT_KG,
  DEFAULT_MAX_SPEED_KMH,
  DEFAULT_ROLLING_RESISTANCE_COEFFICIENT,
  DEFAULT_TEMPERATURE_C,
} from './vehicle-parameters/defaults.js';

// Values stay strings here; decoding and range checks happen in the parameter schema.
export type RawCliOptions = Partial<Record<
  | 'weight'
  | 'curbWeight'
  | 'dragArea'
  | 'dragCoefficient'
  | 'frontalArea'
  | 'width'
  | 'height'
  | 'rollingResistanceCoefficient'
  | 'drivetrainEfficiency'
  | 'idlePower'
  | 'highwayConsumption'
  | 'temperature'
  | 'maxSpeed',
  string
>>;

const DESCRIPTION = `Calculate the consumption curve of an electric car from its physical parameters.
The curve gives the consumption at a given constant speed on a flat surface, as
"speed1,consumption1:speed2,consumption2:..." with speed in km/h and consumption in kWh/100km,
ready for a routing API's constantSpeedConsumptionInkWhPerHundredkm parameter.`;

const USAGE_NOTES = `
Recommended usage:
  * Specify the curb weight.
  * Specify the drag area.
    * If the drag area is not available, specify drag coefficient and frontal area.
      * If frontal area is not available, specify width and height.
  * Consider specifying rolling resistance coefficient, drivetrain efficiency, and idle power.
  * Consider using different consumption curves for different temperatures.

Example:
  ev-consumption-curve --curb-weight=1812 --width=1.805 --height=1.570`;

export const buildCommand = (): Command =>
  new Command('ev-consumption-curve')
    .description(DESCRIPTION)
    .option('--weight <kg>', 'Total vehicle weight (kg), including passengers and load, typically 1400–2300.')
    .option('--curb-weight <kg>', `Vehicle curb weight (kg), typically 1300–2200. Assumes an extra load of ${DEFAULT_LOAD_WEIGHT_KG}kg.`)
    .option('--drag-area <m2>', 'Drag area (CdA, m²), typically 0.4–1.0.')
    .option('--drag-coefficient <cd>', `Drag coefficient (Cd), typically 0.2–0.4. Default: ${DEFAULT_DRAG_COEFFICIENT}.`)
    .option('--frontal-area <m2>', 'Frontal area (m²), typically 2.0–2.7.')
    .option('--width <m>', 'Width (m), typically 1.7–2.0.')
    .option('--height <m>', 'Height (m), typically 1.4–1.8.')
    .option('--rolling-resistance-coefficient <crr>', `Rolling resistance coefficient, typically 0.007–0.013. Default: ${DEFAULT_ROLLING_RESISTANCE_COEFFICIENT}.`)
    .option('--drivetrain-efficiency <ratio>', `Drivetrain efficiency, typically 0.8–0.95. Default: ${DEFAULT_DRIVETRAIN_EFFICIENCY}.`)
    .option('--idle-power <kw>', `Idle power (kW), typically 0.5–1.5. Default: ${DEFAULT_IDLE_POWER_KW}.`)
    .option('--highway-consumption <whkm>', 'Consumption at 110km/h and 23°C without auxiliaries like A/C (Wh/km), typically 150–300. Scales the curve to match it.')
    .option('--temperature <celsius>', `Temperature (°C), typically −15–35. Default: ${DEFAULT_TEMPERATURE_C}.`)
    .option('--max-speed <kmh>', `Maximum speed (km/h). Default: ${DEFAULT_MAX_SPEED_KMH}.`)
    .addHelpText('after', USAGE_NOTES);

export const parseCliOptions = (command: Command, argv: readonly string[]): RawCliOptions => {
  command.parse([...argv], { from: 'user' });
  return command.opts<RawCliOptions>();
};

/**
 * Parses argv without letting commander exit the process.
 * Succeeds with null once help has been printed.
 */
export const parseArgv = (argv: readonly string[]): Effect.Effect<RawCliOptions | null, UsageError> =>
  Effect.try({
    try: () => parseCliOptions(
      buildCommand().exitOverride().configureOutput({ writeErr: () => undefined }),
      argv,
    ),
    catch: (err) => err,
  }).pipe(
    Effect.catchAll((err): Effect.Effect<null, UsageError> => {
      if (err instanceof CommanderError && err.exitCode === 0) {
        return Effect.succeed(null);
      }

      // commander prefixes its own messages with "error: "
      const message = err instanceof Error ? err.message.replace(/^error: /, '') : String(err);
      return Effect.fail(new UsageError({ message }));
    }),
  );
