import type { z } from 'zod';
import type {
  ConversionResultV1,
  FlowResultV1,
  PressureDropResultV1,
} from '../contracts/CalculationOutputV1';
import { InvalidInputError } from './errors';
import { solveFlowState } from './modules/FlowStateModule';
import { gasPropertiesReport } from './modules/GasPropertiesModule';
import type { GasReport } from './modules/GasPropertiesModule';
import { pressureDrop } from './modules/PressureDropModule';
import {
  ConversionInputSchema,
  FlowInputSchema,
  GasReportInputSchema,
  PressureDropInputSchema,
} from './schema/CalculatorInputV1';
import type {
  ConversionInput,
  FlowInput,
  GasReportInputV1,
  PressureDropInput,
} from './schema/CalculatorInputV1';
import { convert, fromBase, toBase } from './units/UnitConversionModule';

/**
 * Calculator boundary.
 *
 * Caller units in → SI → engine → caller units out. Everything crossing this
 * boundary is validated with the CalculatorInputV1 schemas; schema failures
 * are raised as InvalidInputError so callers see one error taxonomy.
 */

function parseInput<O, I>(schema: z.ZodType<O, z.ZodTypeDef, I>, input: unknown): O {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map(issue => `${issue.path.join('.') || 'input'}: ${issue.message}`)
      .join('; ');
    throw new InvalidInputError(`Invalid input – ${detail}`);
  }
  return parsed.data;
}

/** Flow in any registered flow unit → m³/s. */
function flowToM3s(value: number, unit: string): number {
  return fromBase(toBase(value, unit, 'flow'), 'm3s', 'flow');
}

export function runConversion(input: ConversionInput): ConversionResultV1 {
  const { value, from, to, kind } = parseInput(ConversionInputSchema, input);
  return {
    kind,
    input: { value, unit: from },
    result: { value: convert(value, from, to, kind), unit: to },
  };
}

export function runFlowCalculation(input: FlowInput): FlowResultV1 {
  const parsed = parseInput(FlowInputSchema, input);

  const diameterM = toBase(parsed.diameter, parsed.diameterUnit, 'length');
  const state = solveFlowState(diameterM, {
    velocityMps: parsed.velocity === undefined
      ? undefined
      : toBase(parsed.velocity, parsed.velocityUnit, 'velocity'),
    flowM3s: parsed.flowRate === undefined
      ? undefined
      : flowToM3s(parsed.flowRate, parsed.flowUnit),
  });

  return {
    ...state,
    flowM3h: convert(state.flowM3s, 'm3s', 'm3h', 'flow'),
    flowGpm: convert(state.flowM3s, 'm3s', 'gpm', 'flow'),
  };
}

export function runPressureDropCalculation(input: PressureDropInput): PressureDropResultV1 {
  const parsed = parseInput(PressureDropInputSchema, input);

  const result = pressureDrop({
    flowM3s: flowToM3s(parsed.flowRate, parsed.flowUnit),
    diameterM: toBase(parsed.diameter, parsed.diameterUnit, 'length'),
    lengthM: toBase(parsed.length, parsed.lengthUnit, 'length'),
    roughnessM: parsed.roughness === undefined
      ? undefined
      : toBase(parsed.roughness, parsed.roughnessUnit, 'length'),
    densityKgM3: parsed.density,
    kinematicViscosityM2s: parsed.kinematicViscosity,
    dynamicViscosityPaS: parsed.dynamicViscosity,
  });

  return {
    deltaPPa: result.deltaPPa,
    deltaPPsi: convert(result.deltaPPa, 'pa', 'psi', 'pressure'),
    deltaPBar: convert(result.deltaPPa, 'pa', 'bar', 'pressure'),
    headLossM: result.headLossM,
    velocityMps: result.velocityMps,
    reynoldsNumber: result.reynoldsNumber,
    frictionFactor: result.frictionFactor,
    flowRegime: result.flowRegime,
    relativeRoughness: result.relativeRoughness,
    notes: result.notes,
    assumptions: result.assumptions,
  };
}

export function runGasReport(input: GasReportInputV1): GasReport {
  return gasPropertiesReport(parseInput(GasReportInputSchema, input));
}
