// Passengers and luggage added on top of the curb weight.
export const DEFAULT_LOAD_WEIGHT_KG = 90;

export const DEFAULT_DRAG_COEFFICIENT = 0.27;
export const DEFAULT_ROLLING_RESISTANCE_COEFFICIENT = 0.01;
export const DEFAULT_DRIVETRAIN_EFFICIENCY = 0.9;
export const DEFAULT_IDLE_POWER_KW = 0.5;
export const DEFAULT_TEMPERATURE_C = 20;
export const DEFAULT_MAX_SPEED_KMH = 200;

// Width x height overestimates the frontal area since a car is not a rectangle.
// 0.8 follows "Prediction of vehicle reference frontal area", https://www.osti.gov/biblio/6602653
export const FRONTAL_AREA_FACTOR = 0.8;
