/**
 * FrictionFactorModule
 *
 * Reynolds number, flow-regime classification and Darcy friction factor.
 *
 * Regime bands:
 *   Re < 2300          laminar       f = 64 / Re  (Hagen-Poiseuille)
 *   2300 ≤ Re < 4000   transitional  turbulent estimate, flagged
 *   Re ≥ 4000          turbulent     Swamee-Jain
 *
 * Swamee-Jain (1976) is an explicit fit to Colebrook-White:
 *   f = 0.25 / [log10(ε/(3.7·D) + 5.74 / Re^0.9)]²
 *
 * Quoted accuracy is ±1 % against Colebrook for 1e-6 ≤ ε/D ≤ 1e-2 and
 * 5e3 ≤ Re ≤ 1e8. With ε = 0 the first term vanishes and the expression
 * becomes the smooth-pipe form.
 */

import type { FlowRegime } from '../../contracts/CalculationOutputV1';
import { InvalidInputError, requireNonNegative, requirePositive } from '../errors';

export const LAMINAR_UPPER_RE = 2300;
export const TURBULENT_LOWER_RE = 4000;

/** Validity band of the Swamee-Jain fit. */
export const SWAMEE_JAIN_RANGE = {
  minRelativeRoughness: 1e-6,
  maxRelativeRoughness: 1e-2,
  minRe: 5e3,
  maxRe: 1e8,
} as const;

/**
 * Re = ρ·V·D / μ
 */
export function reynoldsNumber(
  densityKgM3: number,
  velocityMps: number,
  diameterM: number,
  dynamicViscosityPaS: number,
): number {
  requirePositive(densityKgM3, 'density');
  requireNonNegative(velocityMps, 'velocity');
  requirePositive(diameterM, 'diameter');
  requirePositive(dynamicViscosityPaS, 'viscosity');
  return (densityKgM3 * velocityMps * diameterM) / dynamicViscosityPaS;
}

export function classifyFlowRegime(re: number): FlowRegime {
  if (re < LAMINAR_UPPER_RE) return 'laminar';
  if (re < TURBULENT_LOWER_RE) return 'transitional';
  return 'turbulent';
}

/**
 * Swamee-Jain estimate of the turbulent Darcy friction factor.
 */
export function swameeJainFrictionFactor(re: number, relativeRoughness: number): number {
  const logArgument = relativeRoughness / 3.7 + 5.74 / re ** 0.9;
  // log10 ≥ 0 here puts the fit past its pole
  if (logArgument >= 1) {
    throw new InvalidInputError(
      `Relative roughness ${relativeRoughness} is too large for a friction factor at Re = ${re}`,
    );
  }
  const logTerm = Math.log10(logArgument);
  return 0.25 / logTerm ** 2;
}

/**
 * Darcy friction factor for a given Reynolds number and relative roughness ε/D.
 *
 * Returns 0 at Re = 0: with no flow there is no wall shear to report.
 */
export function frictionFactor(re: number, relativeRoughness: number): number {
  requireNonNegative(re, 'Reynolds number');
  requireNonNegative(relativeRoughness, 'relative roughness');

  if (re === 0) return 0;
  if (classifyFlowRegime(re) === 'laminar') return 64 / re;
  return swameeJainFrictionFactor(re, relativeRoughness);
}

/** True when (Re, ε/D) lies outside the band the Swamee-Jain fit was made for. */
export function isOutsideSwameeJainRange(re: number, relativeRoughness: number): boolean {
  return (
    re > SWAMEE_JAIN_RANGE.maxRe ||
    (relativeRoughness > 0 && relativeRoughness < SWAMEE_JAIN_RANGE.minRelativeRoughness) ||
    relativeRoughness > SWAMEE_JAIN_RANGE.maxRelativeRoughness
  );
}

export interface FrictionCurvePoint {
  reynoldsNumber: number;
  frictionFactor: number;
  regime: FlowRegime;
}

/**
 * Friction factor at `points` Reynolds numbers spaced evenly in log10 between
 * `reMin` and `reMax`: one line of a Moody chart.
 */
export function sampleFrictionCurve(
  relativeRoughness: number,
  reMin = 500,
  reMax = 1e8,
  points = 60,
): FrictionCurvePoint[] {
  requirePositive(reMin, 'minimum Reynolds number');
  if (!(reMax > reMin)) {
    throw new InvalidInputError(`Reynolds range is empty (${reMin} to ${reMax})`);
  }
  if (!Number.isInteger(points) || points < 2) {
    throw new InvalidInputError(`A friction curve needs at least two points (got ${points})`);
  }

  const logMin = Math.log10(reMin);
  const step = (Math.log10(reMax) - logMin) / (points - 1);
  return Array.from({ length: points }, (_, i) => {
    const re = 10 ** (logMin + i * step);
    return {
      reynoldsNumber: re,
      frictionFactor: frictionFactor(re, relativeRoughness),
      regime: classifyFlowRegime(re),
    };
  });
}
