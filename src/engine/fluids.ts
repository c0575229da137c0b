/**
 * Default fluid, pipe-wall and reference-condition constants.
 *
 * These are the values applied when a caller leaves an optional field out of
 * a calculation input. They are read-only; a caller that wants a different
 * fluid passes its own values on the input record.
 */

export interface FluidProperties {
  /** kg/m³ */
  densityKgM3: number;
  /** m²/s */
  kinematicViscosityM2s: number;
}

/** Water at 20 °C, 1 atm. */
export const WATER_20C: Readonly<FluidProperties> = Object.freeze({
  densityKgM3: 998.2,
  kinematicViscosityM2s: 1.004e-6,
});

/** Absolute roughness of new commercial steel pipe: 0.045 mm. */
export const COMMERCIAL_STEEL_ROUGHNESS_M = 4.5e-5;

/** Standard acceleration due to gravity (m/s²). */
export const GRAVITY_M_S2 = 9.80665;

/** Gas reference conditions: 15 °C, 1.01325 bara. */
export const STANDARD_CONDITIONS = Object.freeze({
  temperatureK: 288.15,
  pressureBara: 1.01325,
});

/** Atmospheric pressure added to gauge readings (bar). */
export const ATMOSPHERIC_PRESSURE_BAR = 1.01325;
