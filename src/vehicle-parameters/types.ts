export type VehicleParameters = {
  readonly weightKg: number; // total, including passengers and load
  readonly dragAreaM2: number; // CdA
  readonly rollingResistanceCoefficient: number;
  readonly drivetrainEfficiency: number; // (0, 1]
  readonly idlePowerKw: number;
  readonly temperatureC: number;
};

export type CurveOptions = {
  readonly maxSpeedKmh: number;
  // measured at 110 km/h and 23°C; the curve is scaled to hit it
  readonly highwayConsumptionKwhPer100Km?: number;
};

export type ResolvedParameters = {
  readonly vehicle: VehicleParameters;
  readonly curve: CurveOptions;
};
