import type { CurveOptions, VehicleParameters } from "../vehicle-parameters/types.js";
import { DEFAULT_MAX_SPEED_KMH } from "../vehicle-parameters/defaults.js";
import { consumptionInKwhPer100Km } from "./physics.js";

export type ConsumptionPoint = {
  readonly speedKmh: number;
  readonly consumptionKwhPer100Km: number;
};

export type ConsumptionCurve = readonly ConsumptionPoint[];

const MIN_SPEED_KMH = 10;
const SPEED_STEP_KMH = 10;

// Reference conditions for a measured highway consumption.
const HIGHWAY_SPEED_KMH = 110;
const HIGHWAY_TEMPERATURE_C = 23;

export const curveSpeeds = (maxSpeedKmh: number = DEFAULT_MAX_SPEED_KMH): readonly number[] => {
  const speeds: number[] = [];
  for (let speed = MIN_SPEED_KMH; speed <= maxSpeedKmh; speed += SPEED_STEP_KMH) {
    speeds.push(speed);
  }
  return speeds;
};

export const highwayScalingFactor = (
  vehicle: VehicleParameters,
  highwayConsumptionKwhPer100Km: number | undefined
): number => {
  if (highwayConsumptionKwhPer100Km === undefined) {
    return 1.0;
  }

  return highwayConsumptionKwhPer100Km /
    consumptionInKwhPer100Km(vehicle, HIGHWAY_SPEED_KMH, HIGHWAY_TEMPERATURE_C);
};

export const computeConsumptionCurve = (
  vehicle: VehicleParameters,
  options: CurveOptions = { maxSpeedKmh: DEFAULT_MAX_SPEED_KMH }
): ConsumptionCurve => {
  const scalingFactor = highwayScalingFactor(vehicle, options.highwayConsumptionKwhPer100Km);

  return curveSpeeds(options.maxSpeedKmh).map((speedKmh) => ({
    speedKmh,
    consumptionKwhPer100Km: scalingFactor * consumptionInKwhPer100Km(vehicle, speedKmh),
  }));
};

/**
 * Serializes a curve as "speed1,consumption1:speed2,consumption2:...",
 * the shape routing APIs take for a constant-speed consumption model.
 */
export const formatConsumptionCurve = (curve: ConsumptionCurve): string =>
  curve
    .map(({ speedKmh, consumptionKwhPer100Km }) =>
      `${speedKmh},${consumptionKwhPer100Km.toFixed(2)}`)
    .join(':');
