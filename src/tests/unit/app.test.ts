import { describe, it, expect, vitest, beforeEach } from "@effect/vitest";
import type { MockedObject } from "@effect/vitest";
import { Effect, Exit } from "effect";
import { generateConsumptionCurve, runConsumptionCurveCli } from "../../app.js";
import type { ICliOutput } from "../../cli-output/types.js";
import { buildCommand, parseCliOptions } from "../../cli.js";

const run = (argv: readonly string[]) =>
  generateConsumptionCurve(parseCliOptions(buildCommand(), argv));

describe('generateConsumptionCurve', () => {
  it.effect('should print the documented curve from width and height', () => Effect.gen(function* () {
    const output = yield* run(['--weight=1812', '--width=1.805', '--height=1.570']);

    expect(output).toBe(
      '10,10.57:20,8.34:30,7.94:40,8.14:50,8.68:60,9.48:70,10.50:80,11.73:90,13.15:100,14.76:' +
      '110,16.56:120,18.54:130,20.70:140,23.05:150,25.57:160,28.27:170,31.14:180,34.20:190,37.43:200,40.84'
    );
  }));

  it.effect('should emit speeds 10 to 200 in steps of 10', () => Effect.gen(function* () {
    const output = yield* run(['--weight=1812', '--drag-area=0.6']);
    const pairs = output.split(':');

    expect(pairs).toHaveLength(20);
    expect(pairs.map((pair) => pair.split(',')[0])).toEqual(
      ['10', '20', '30', '40', '50', '60', '70', '80', '90', '100', '110', '120', '130', '140', '150', '160', '170', '180', '190', '200']
    );
    for (const pair of pairs) {
      expect(pair).toMatch(/^\d+,\d+\.\d{2}$/);
    }
  }));

  it.effect('should add the load weight to the curb weight', () => Effect.gen(function* () {
    const output = yield* run(['--curb-weight=1812', '--width=1.805', '--height=1.570', '--max-speed=50']);

    expect(output).toBe('10,10.85:20,8.61:30,8.22:40,8.41:50,8.95');
  }));

  it.effect('should let the drag area override drag coefficient and frontal area', () => Effect.gen(function* () {
    const direct = yield* run(['--weight=2000', '--drag-area=0.6']);
    const overridden = yield* run(['--weight=2000', '--drag-area=0.6', '--drag-coefficient=0.4', '--frontal-area=3']);

    expect(overridden).toBe(direct);
    expect(direct.startsWith('10,11.14:20,8.90:30,8.50:')).toBe(true);
  }));

  it.effect('should apply temperature, idle power and frontal area', () => Effect.gen(function* () {
    const output = yield* run([
      '--weight=1500',
      '--drag-coefficient=0.3',
      '--frontal-area=2.2',
      '--temperature=-10',
      '--idle-power=0',
      '--max-speed=30',
    ]);

    expect(output).toBe('10,4.65:20,4.96:30,5.49');
  }));

  it.effect('should scale the curve to a measured highway consumption', () => Effect.gen(function* () {
    const output = yield* run(['--weight=2000', '--drag-area=0.6', '--highway-consumption=200', '--max-speed=50']);

    expect(output).toBe('10,13.25:20,10.59:30,10.11:40,10.33:50,10.95');
  }));

  it.effect('should fail with MissingParameter when weight is omitted', () => Effect.gen(function* () {
    const error = yield* Effect.flip(run(['--width=1.805', '--height=1.570']));

    expect(error._tag).toBe('MissingParameter');
  }));

  it.effect('should fail with MissingParameter without any drag area source', () => Effect.gen(function* () {
    const error = yield* Effect.flip(run(['--weight=1812', '--drag-coefficient=0.3']));

    expect(error._tag).toBe('MissingParameter');
  }));

  it.effect('should fail with InvalidParameter for out of range values', () => Effect.gen(function* () {
    const error = yield* Effect.flip(run(['--weight=1812', '--drag-area=0.6', '--temperature=80']));

    expect(error._tag).toBe('InvalidParameter');
  }));
});

describe('runConsumptionCurveCli', () => {
  const outputMock: MockedObject<ICliOutput> = {
    printCurve: vitest.fn(),
    printError: vitest.fn(),
  };

  beforeEach(() => {
    vitest.clearAllMocks();
    outputMock.printCurve.mockReturnValue(Effect.void);
    outputMock.printError.mockReturnValue(Effect.void);
  });

  it.effect('should print the curve and succeed', () => Effect.gen(function* () {
    const exit = yield* Effect.exit(runConsumptionCurveCli(['--weight=2000', '--drag-area=0.6', '--max-speed=30'], outputMock));

    expect(Exit.isSuccess(exit)).toBe(true);
    expect(outputMock.printCurve).toHaveBeenCalledWith('10,11.14:20,8.90:30,8.50');
    expect(outputMock.printError).not.toHaveBeenCalled();
  }));

  it.effect('should report a missing weight and fail', () => Effect.gen(function* () {
    const exit = yield* Effect.exit(runConsumptionCurveCli(['--drag-area=0.6'], outputMock));

    expect(Exit.isFailure(exit)).toBe(true);
    expect(outputMock.printError).toHaveBeenCalledWith('Need either --weight or --curb-weight.');
    expect(outputMock.printCurve).not.toHaveBeenCalled();
  }));

  it.effect('should report a missing drag area source and fail', () => Effect.gen(function* () {
    const exit = yield* Effect.exit(runConsumptionCurveCli(['--weight=1812'], outputMock));

    expect(Exit.isFailure(exit)).toBe(true);
    expect(outputMock.printError).toHaveBeenCalledWith('Must specify --drag-area or --frontal-area or --width and --height.');
  }));

  it.effect('should report half of width and height and fail', () => Effect.gen(function* () {
    const exit = yield* Effect.exit(runConsumptionCurveCli(['--weight=1812', '--width=1.805'], outputMock));

    expect(Exit.isFailure(exit)).toBe(true);
    expect(outputMock.printError).toHaveBeenCalledWith('Both --width and --height must be given together, missing --height.');
  }));

  it.effect('should report an out of range value on one line naming the flag', () => Effect.gen(function* () {
    const exit = yield* Effect.exit(runConsumptionCurveCli(['--weight=1812', '--drag-area=0.6', '--temperature=80'], outputMock));

    expect(Exit.isFailure(exit)).toBe(true);
    expect(outputMock.printError).toHaveBeenCalledWith('--temperature: must be a number between -90 and 60');
  }));

  it.effect('should report a value that is not a number on one line naming the flag', () => Effect.gen(function* () {
    const exit = yield* Effect.exit(runConsumptionCurveCli(['--weight=abc', '--drag-area=0.6'], outputMock));

    expect(Exit.isFailure(exit)).toBe(true);
    const [message] = outputMock.printError.mock.calls[0] ?? [];
    expect(message).toContain('--weight');
    expect(message).not.toContain('\n');
  }));

  it.effect('should report an unknown flag and fail', () => Effect.gen(function* () {
    const exit = yield* Effect.exit(runConsumptionCurveCli(['--weight=1812', '--bogus'], outputMock));

    expect(Exit.isFailure(exit)).toBe(true);
    expect(outputMock.printError).toHaveBeenCalledWith(expect.stringMatching(/^unknown option '--bogus'/));
  }));

  it.effect('should succeed without a curve when help is requested', () => Effect.gen(function* () {
    const writeOut = vitest.spyOn(process.stdout, 'write').mockImplementation(() => true);
    const exit = yield* Effect.exit(runConsumptionCurveCli(['--help'], outputMock));
    writeOut.mockRestore();

    expect(Exit.isSuccess(exit)).toBe(true);
    expect(outputMock.printCurve).not.toHaveBeenCalled();
    expect(outputMock.printError).not.toHaveBeenCalled();
  }));
});
