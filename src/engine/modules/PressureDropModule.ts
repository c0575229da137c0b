/**
 * PressureDropModule
 *
 * Darcy-Weisbach frictional pressure loss along a straight circular pipe:
 *   ΔP = f × (L / D) × (ρ × V² / 2)
 *
 * Inputs are SI. Optional fluid and wall properties fall back to the defaults
 * in ../fluids (water at 20 °C, commercial steel) per call; every fallback
 * used is listed in the result's `assumptions`.
 */

import type { AssumptionV1, FlowRegime } from '../../contracts/CalculationOutputV1';
import { ASSUMPTION_IDS } from '../../contracts/assumptions.ids';
import { AssumptionsBuilder } from '../AssumptionsBuilder';
import { InvalidInputError, requireNonNegative, requirePositive } from '../errors';
import { COMMERCIAL_STEEL_ROUGHNESS_M, GRAVITY_M_S2, WATER_20C } from '../fluids';
import { solveFlowState } from './FlowStateModule';
import {
  SWAMEE_JAIN_RANGE,
  classifyFlowRegime,
  frictionFactor,
  isOutsideSwameeJainRange,
  reynoldsNumber,
} from './FrictionFactorModule';

export interface PressureDropInputs {
  /** Volumetric flow rate (m³/s), ≥ 0. */
  flowM3s: number;
  /** Internal bore (m), > 0. */
  diameterM: number;
  /** Pipe run length (m), > 0. */
  lengthM: number;
  /** Absolute wall roughness ε (m), ≥ 0. Defaults to commercial steel. */
  roughnessM?: number;
  /** kg/m³. Defaults to water at 20 °C. */
  densityKgM3?: number;
  /** ν (m²/s). Used when no dynamic viscosity is given. */
  kinematicViscosityM2s?: number;
  /** μ (Pa·s). Takes precedence over kinematic viscosity. */
  dynamicViscosityPaS?: number;
}

export interface PressureDropResult {
  deltaPPa: number;
  /** ΔP expressed as head of the flowing fluid (m). */
  headLossM: number;
  frictionFactor: number;
  reynoldsNumber: number;
  flowRegime: FlowRegime;
  velocityMps: number;
  relativeRoughness: number;
  dynamicViscosityPaS: number;
  notes: string[];
  assumptions: AssumptionV1[];
}

function resolveDynamicViscosity(
  inputs: PressureDropInputs,
  densityKgM3: number,
  assumptions: AssumptionsBuilder,
): number {
  if (inputs.dynamicViscosityPaS !== undefined) {
    requirePositive(inputs.dynamicViscosityPaS, 'dynamic viscosity');
    return inputs.dynamicViscosityPaS;
  }
  if (inputs.kinematicViscosityM2s === undefined) {
    assumptions.add(ASSUMPTION_IDS.FLUID_VISCOSITY_DEFAULTED);
  }
  const nu = inputs.kinematicViscosityM2s ?? WATER_20C.kinematicViscosityM2s;
  requirePositive(nu, 'kinematic viscosity');
  assumptions.add(ASSUMPTION_IDS.FLUID_VISCOSITY_FROM_KINEMATIC);
  return densityKgM3 * nu;
}

export function pressureDrop(inputs: PressureDropInputs): PressureDropResult {
  const assumptions = new AssumptionsBuilder();
  const notes: string[] = [];

  requireNonNegative(inputs.flowM3s, 'flow rate');
  requirePositive(inputs.diameterM, 'diameter');
  requirePositive(inputs.lengthM, 'length');

  assumptions.addIf(inputs.densityKgM3 === undefined, ASSUMPTION_IDS.FLUID_DENSITY_DEFAULTED);
  const densityKgM3 = inputs.densityKgM3 ?? WATER_20C.densityKgM3;
  requirePositive(densityKgM3, 'density');

  assumptions.addIf(inputs.roughnessM === undefined, ASSUMPTION_IDS.PIPE_ROUGHNESS_DEFAULTED);
  const roughnessM = inputs.roughnessM ?? COMMERCIAL_STEEL_ROUGHNESS_M;
  requireNonNegative(roughnessM, 'roughness');
  if (roughnessM >= inputs.diameterM) {
    throw new InvalidInputError(
      `Roughness (${roughnessM} m) must be smaller than the pipe diameter (${inputs.diameterM} m)`,
    );
  }

  const mu = resolveDynamicViscosity(inputs, densityKgM3, assumptions);

  // ── 1. Velocity from continuity ───────────────────────────────────────────
  const { velocityMps } = solveFlowState(inputs.diameterM, { flowM3s: inputs.flowM3s });

  // ── 2–3. Reynolds number and regime ───────────────────────────────────────
  const re = reynoldsNumber(densityKgM3, velocityMps, inputs.diameterM, mu);
  const flowRegime = classifyFlowRegime(re);
  const relativeRoughness = roughnessM / inputs.diameterM;

  // ── 4. Friction factor ────────────────────────────────────────────────────
  const f = frictionFactor(re, relativeRoughness);

  if (re === 0) {
    notes.push('No flow: pressure drop is zero.');
  } else if (flowRegime !== 'laminar') {
    assumptions.add(ASSUMPTION_IDS.FRICTION_SWAMEE_JAIN);
    if (flowRegime === 'transitional') {
      assumptions.add(ASSUMPTION_IDS.FRICTION_TRANSITIONAL_ESTIMATE);
      notes.push(
        `Transitional flow (Re = ${re.toFixed(0)}): friction factor is a turbulent estimate and may be unreliable.`,
      );
    }
    if (isOutsideSwameeJainRange(re, relativeRoughness)) {
      notes.push(
        `ε/D = ${relativeRoughness.toExponential(2)}, Re = ${re.toExponential(2)} lies outside the ` +
        `Swamee-Jain fit range (ε/D ${SWAMEE_JAIN_RANGE.minRelativeRoughness}–${SWAMEE_JAIN_RANGE.maxRelativeRoughness}, ` +
        `Re ≤ ${SWAMEE_JAIN_RANGE.maxRe.toExponential(0)}).`,
      );
    }
  }

  // ── 5. Darcy-Weisbach ─────────────────────────────────────────────────────
  const dynamicPressurePa = (densityKgM3 * velocityMps ** 2) / 2;
  const deltaPPa = f * (inputs.lengthM / inputs.diameterM) * dynamicPressurePa;

  return {
    deltaPPa,
    headLossM: deltaPPa / (densityKgM3 * GRAVITY_M_S2),
    frictionFactor: f,
    reynoldsNumber: re,
    flowRegime,
    velocityMps,
    relativeRoughness,
    dynamicViscosityPaS: mu,
    notes,
    assumptions: assumptions.build(),
  };
}
