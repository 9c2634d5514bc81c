import type { VehicleParameters } from "../vehicle-parameters/types.js";

// Pure functions for the constant-speed force balance. MKS units unless noted.

const ATMOSPHERIC_PRESSURE_PA = 101325; // standard, at sea level
const SPECIFIC_GAS_CONSTANT_DRY_AIR = 287.053; // J/(K·kg)
const ZERO_CELSIUS_IN_KELVIN = 273.15;
const STANDARD_GRAVITY = 9.81; // m/s²

// 1 N = 1 Ws/m = (100 / 3600) kWh/100km
const NEWTON_TO_KWH_PER_100KM = 100 / 3600;

/**
 * Air density in kg/m³ from the ideal gas law, rho = P / (R * T).
 */
export const airDensity = (temperatureC: number): number =>
  ATMOSPHERIC_PRESSURE_PA /
  (SPECIFIC_GAS_CONSTANT_DRY_AIR * (ZERO_CELSIUS_IN_KELVIN + temperatureC));

export const kmhToMetersPerSecond = (speedKmh: number): number =>
  speedKmh * (1000 / 3600);

export const rollingResistanceForce = (vehicle: VehicleParameters): number => {
  const normalForce = vehicle.weightKg * STANDARD_GRAVITY;
  return vehicle.rollingResistanceCoefficient * normalForce;
};

export const airDragForce = (
  vehicle: VehicleParameters,
  speedMs: number,
  temperatureC: number
): number =>
  0.5 * airDensity(temperatureC) * vehicle.dragAreaM2 * speedMs ** 2;

// Idle draw spread over the distance covered: 1 W = 1 N·m/s
export const idlePowerForce = (vehicle: VehicleParameters, speedMs: number): number =>
  (1000 * vehicle.idlePowerKw) / speedMs;

export const totalForce = (
  vehicle: VehicleParameters,
  speedMs: number,
  temperatureC: number
): number =>
  (rollingResistanceForce(vehicle) + airDragForce(vehicle, speedMs, temperatureC)) /
    vehicle.drivetrainEfficiency +
  idlePowerForce(vehicle, speedMs);

/**
 * Consumption in kWh/100km at a constant speed on a flat road.
 * Temperature defaults to the vehicle's ambient temperature.
 */
export const consumptionInKwhPer100Km = (
  vehicle: VehicleParameters,
  speedKmh: number,
  temperatureC: number = vehicle.temperatureC
): number =>
  totalForce(vehicle, kmhToMetersPerSecond(speedKmh), temperatureC) *
  NEWTON_TO_KWH_PER_100KM;
