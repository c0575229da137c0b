/**
 * GasPropertiesModule
 *
 * Natural-gas property report from a molar composition at a line pressure and
 * temperature:
 *
 *   - molar mass and specific gravity (air = 28.964 g/mol)
 *   - pseudo-critical properties by Kay's rule
 *   - compressibility Z from Peng-Robinson on the pseudo-critical point
 *   - density at line and standard (15 °C, 1.01325 bara) conditions
 *   - heating values and Wobbe index
 *
 * This is an engineering estimate. It is not an AGA8 detail-characterisation
 * calculation and should not be used for custody transfer.
 */

import { z } from 'zod';
import type { AssumptionV1 } from '../../contracts/CalculationOutputV1';
import { ASSUMPTION_IDS } from '../../contracts/assumptions.ids';
import { AssumptionsBuilder } from '../AssumptionsBuilder';
import { InvalidInputError, requireNonNegative } from '../errors';
import { ATMOSPHERIC_PRESSURE_BAR, STANDARD_CONDITIONS } from '../fluids';
import gasData from '../data/gasComponents.json';

/** Molar gas constant, J/(mol·K). */
const R_J_PER_MOL_K = 8.314462618;
const PA_PER_BAR = 1e5;
const PA_PER_MPA = 1e6;
const KELVIN_OFFSET_C = 273.15;
/** Sum-of-percentages slack before a composition counts as "not 100 %". */
const COMPOSITION_TOLERANCE_PCT = 1e-6;

const GasComponentSchema = z.object({
  molarMassGMol: z.number().positive(),
  critical: z.object({
    temperatureK: z.number().positive(),
    pressureMPa: z.number().positive(),
    densityKgM3: z.number().positive(),
    acentricFactor: z.number(),
  }).optional(),
  hhvMJm3: z.number().nonnegative().optional(),
  lhvMJm3: z.number().nonnegative().optional(),
});

const GasDataSchema = z.object({
  airMolarMassGMol: z.number().positive(),
  components: z.record(GasComponentSchema),
});

export type GasComponentData = z.infer<typeof GasComponentSchema>;

const GAS_DATA = GasDataSchema.parse(gasData);

export const GAS_COMPONENTS: readonly string[] = Object.freeze(Object.keys(GAS_DATA.components));

export interface GasReportInput {
  /** Component id → mol %. Normalised to 100 % before use. */
  composition: Record<string, number>;
  pressureBarg: number;
  temperatureC: number;
}

export interface PseudoCriticalProperties {
  temperatureK: number;
  pressureMPa: number;
  densityKgM3: number;
  acentricFactor: number;
  /** Mole fraction of the mixture covered by components with critical data. */
  coveredFraction: number;
}

export interface GasReport {
  conditions: {
    pressureBarg: number;
    pressureBara: number;
    temperatureC: number;
    temperatureK: number;
    /** Normalised composition, mol %. */
    composition: Record<string, number>;
  };
  molarMassGMol: number;
  specificGravity: number;
  compressibilityFactor: number;
  densityKgM3: number;
  standardCompressibilityFactor: number;
  standardDensityKgM3: number;
  higherHeatingValueMJm3: number;
  lowerHeatingValueMJm3: number;
  wobbeIndexMJm3: number;
  pseudoCritical: PseudoCriticalProperties;
  reducedTemperature: number;
  reducedPressure: number;
  volumeFactor: number;
  notes: string[];
  assumptions: AssumptionV1[];
}

function componentData(id: string): GasComponentData {
  const data = Object.prototype.hasOwnProperty.call(GAS_DATA.components, id)
    ? GAS_DATA.components[id]
    : undefined;
  if (!data) {
    throw new InvalidInputError(
      `Unknown gas component '${id}'. Known components: ${GAS_COMPONENTS.join(', ')}`,
      'composition',
    );
  }
  return data;
}

/**
 * Scale mole percentages so they sum to 100.
 *
 * @throws InvalidInputError for an empty composition, a negative entry, an
 *         unknown component or a zero total.
 */
export function normalizeComposition(composition: Record<string, number>): Record<string, number> {
  const entries = Object.entries(composition);
  if (entries.length === 0) {
    throw new InvalidInputError('Gas composition cannot be empty', 'composition');
  }
  for (const [id, pct] of entries) {
    componentData(id);
    requireNonNegative(pct, `mol % of ${id}`);
  }
  const total = entries.reduce((sum, [, pct]) => sum + pct, 0);
  if (total === 0) {
    throw new InvalidInputError('Total composition cannot be zero', 'composition');
  }
  return Object.fromEntries(entries.map(([id, pct]) => [id, (pct / total) * 100]));
}

/** Mole-weighted molar mass (g/mol) of a normalised composition. */
export function molarMass(composition: Record<string, number>): number {
  return Object.entries(composition)
    .reduce((sum, [id, pct]) => sum + (pct / 100) * componentData(id).molarMassGMol, 0);
}

export function specificGravity(composition: Record<string, number>): number {
  return molarMass(composition) / GAS_DATA.airMolarMassGMol;
}

/**
 * Kay's-rule pseudo-critical properties, weighted over the components that
 * carry critical data and renormalised to that covered fraction.
 */
export function pseudoCriticalProperties(composition: Record<string, number>): PseudoCriticalProperties {
  let covered = 0;
  let tc = 0;
  let pc = 0;
  let rhoc = 0;
  let omega = 0;

  for (const [id, pct] of Object.entries(composition)) {
    const critical = componentData(id).critical;
    if (!critical) continue;
    const x = pct / 100;
    covered += x;
    tc += x * critical.temperatureK;
    pc += x * critical.pressureMPa;
    rhoc += x * critical.densityKgM3;
    omega += x * critical.acentricFactor;
  }

  if (covered === 0) {
    throw new InvalidInputError(
      'None of the supplied components has critical-point data; compressibility cannot be estimated',
      'composition',
    );
  }

  return {
    temperatureK: tc / covered,
    pressureMPa: pc / covered,
    densityKgM3: rhoc / covered,
    acentricFactor: omega / covered,
    coveredFraction: covered,
  };
}

/** Real roots of z³ + a2·z² + a1·z + a0 = 0. */
export function solveCubic(a2: number, a1: number, a0: number): number[] {
  const p = a1 - (a2 * a2) / 3;
  const q = (2 * a2 ** 3) / 27 - (a2 * a1) / 3 + a0;
  const shift = a2 / 3;
  const disc = (q / 2) ** 2 + (p / 3) ** 3;

  if (disc > 0) {
    const s = Math.sqrt(disc);
    return [Math.cbrt(-q / 2 + s) + Math.cbrt(-q / 2 - s) - shift];
  }
  if (p === 0) {
    return [Math.cbrt(-q) - shift];
  }

  const r = 2 * Math.sqrt(-p / 3);
  const cosArg = Math.min(1, Math.max(-1, ((3 * q) / (2 * p)) * Math.sqrt(-3 / p)));
  const phi = Math.acos(cosArg) / 3;
  return [0, 1, 2].map(k => r * Math.cos(phi - (2 * Math.PI * k) / 3) - shift);
}

/**
 * Peng-Robinson compressibility factor (vapour root) at `pressurePa`,
 * `temperatureK` for a fluid with the given pseudo-critical point.
 */
export function pengRobinsonZ(
  pressurePa: number,
  temperatureK: number,
  critical: Pick<PseudoCriticalProperties, 'temperatureK' | 'pressureMPa' | 'acentricFactor'>,
): number {
  const tcK = critical.temperatureK;
  const pcPa = critical.pressureMPa * PA_PER_MPA;
  const omega = critical.acentricFactor;

  const kappa = 0.37464 + 1.54226 * omega - 0.26992 * omega ** 2;
  const alpha = (1 + kappa * (1 - Math.sqrt(temperatureK / tcK))) ** 2;
  const a = (0.45724 * R_J_PER_MOL_K ** 2 * tcK ** 2 / pcPa) * alpha;
  const b = 0.0778 * R_J_PER_MOL_K * tcK / pcPa;

  const rt = R_J_PER_MOL_K * temperatureK;
  const A = (a * pressurePa) / rt ** 2;
  const B = (b * pressurePa) / rt;

  const roots = solveCubic(-(1 - B), A - 3 * B ** 2 - 2 * B, -(A * B - B ** 2 - B ** 3))
    .filter(root => root > B);

  if (roots.length === 0) {
    throw new InvalidInputError(
      `No physical compressibility root at ${pressurePa.toFixed(0)} Pa, ${temperatureK.toFixed(2)} K`,
    );
  }
  return Math.max(...roots);
}

/** ρ = P·M / (Z·R·T), kg/m³. */
export function gasDensity(pressurePa: number, temperatureK: number, molarMassGMol: number, zFactor: number): number {
  return (pressurePa * (molarMassGMol / 1000)) / (zFactor * R_J_PER_MOL_K * temperatureK);
}

export function heatingValues(composition: Record<string, number>): { hhv: number; lhv: number } {
  let hhv = 0;
  let lhv = 0;
  for (const [id, pct] of Object.entries(composition)) {
    const data = componentData(id);
    hhv += (pct / 100) * (data.hhvMJm3 ?? 0);
    lhv += (pct / 100) * (data.lhvMJm3 ?? 0);
  }
  return { hhv, lhv };
}

export function gasPropertiesReport(input: GasReportInput): GasReport {
  const assumptions = new AssumptionsBuilder().add(ASSUMPTION_IDS.GAS_PENG_ROBINSON);
  const notes: string[] = [];

  requireNonNegative(input.pressureBarg, 'pressure');
  if (!Number.isFinite(input.temperatureC) || input.temperatureC <= -KELVIN_OFFSET_C) {
    throw new InvalidInputError(
      `Temperature must be above absolute zero (got ${input.temperatureC} °C)`,
      'temperature',
    );
  }

  const rawTotal = Object.values(input.composition).reduce((sum, pct) => sum + pct, 0);
  const composition = normalizeComposition(input.composition);
  assumptions.addIf(
    Math.abs(rawTotal - 100) > COMPOSITION_TOLERANCE_PCT,
    ASSUMPTION_IDS.GAS_COMPOSITION_NORMALISED,
  );

  const pressureBara = input.pressureBarg + ATMOSPHERIC_PRESSURE_BAR;
  const temperatureK = input.temperatureC + KELVIN_OFFSET_C;
  const pressurePa = pressureBara * PA_PER_BAR;

  const molarMassGMol = molarMass(composition);
  const sg = molarMassGMol / GAS_DATA.airMolarMassGMol;
  const pseudoCritical = pseudoCriticalProperties(composition);

  if (pseudoCritical.coveredFraction < 1 - COMPOSITION_TOLERANCE_PCT / 100) {
    notes.push(
      `Only ${(pseudoCritical.coveredFraction * 100).toFixed(2)} mol % of the gas has critical-point data; ` +
      `pseudo-critical properties are weighted over that fraction.`,
    );
  }

  const zLine = pengRobinsonZ(pressurePa, temperatureK, pseudoCritical);
  const standardPressurePa = STANDARD_CONDITIONS.pressureBara * PA_PER_BAR;
  const zStd = pengRobinsonZ(standardPressurePa, STANDARD_CONDITIONS.temperatureK, pseudoCritical);
  const { hhv, lhv } = heatingValues(composition);

  return {
    conditions: {
      pressureBarg: input.pressureBarg,
      pressureBara,
      temperatureC: input.temperatureC,
      temperatureK,
      composition,
    },
    molarMassGMol,
    specificGravity: sg,
    compressibilityFactor: zLine,
    densityKgM3: gasDensity(pressurePa, temperatureK, molarMassGMol, zLine),
    standardCompressibilityFactor: zStd,
    standardDensityKgM3: gasDensity(standardPressurePa, STANDARD_CONDITIONS.temperatureK, molarMassGMol, zStd),
    higherHeatingValueMJm3: hhv,
    lowerHeatingValueMJm3: lhv,
    wobbeIndexMJm3: hhv / Math.sqrt(sg),
    pseudoCritical,
    reducedTemperature: temperatureK / pseudoCritical.temperatureK,
    reducedPressure: pressurePa / (pseudoCritical.pressureMPa * PA_PER_MPA),
    volumeFactor: 1 / zLine,
    notes,
    assumptions: assumptions.build(),
  };
}
