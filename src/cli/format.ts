/**
 * Plain-text renderers for CLI results. Each returns the lines to print;
 * writing them is left to the caller.
 */

import type {
  AssumptionV1,
  ConversionResultV1,
  FlowResultV1,
  PressureDropResultV1,
} from '../contracts/CalculationOutputV1';
import { QUANTITY_KINDS, UNIT_LABELS } from '../contracts/units.ids';
import type { QuantityKind } from '../contracts/units.ids';
import type { GasReport } from '../engine/modules/GasPropertiesModule';
import { BASE_UNIT, listUnits } from '../engine/units/UnitConversionModule';
import { STANDARD_CONDITIONS } from '../engine/fluids';

const RULE_WIDTH = 80;
const SECTION_RULE = '-'.repeat(40);

export function formatConversion(result: ConversionResultV1): string[] {
  return [`${result.input.value} ${result.input.unit} = ${result.result.value.toFixed(4)} ${result.result.unit}`];
}

export function formatFlow(result: FlowResultV1): string[] {
  return [
    'Flow Calculation Results:',
    `  Diameter: ${result.diameterM.toFixed(4)} m`,
    `  Pipe Area: ${result.areaM2.toFixed(6)} m²`,
    `  Flow Rate: ${result.flowM3h.toFixed(2)} m³/h (${result.flowGpm.toFixed(2)} GPM)`,
    `  Velocity: ${result.velocityMps.toFixed(2)} m/s`,
  ];
}

export function formatPressureDrop(result: PressureDropResultV1): string[] {
  return [
    'Pressure Drop Calculation Results:',
    `  Pressure Drop: ${result.deltaPPa.toFixed(0)} Pa (${result.deltaPPsi.toFixed(2)} psi, ${result.deltaPBar.toFixed(4)} bar)`,
    `  Head Loss: ${result.headLossM.toFixed(3)} m`,
    `  Velocity: ${result.velocityMps.toFixed(2)} m/s`,
    `  Reynolds Number: ${result.reynoldsNumber.toFixed(0)}`,
    `  Friction Factor: ${result.frictionFactor.toFixed(6)}`,
    `  Flow Regime: ${result.flowRegime}`,
  ];
}

/** `carbon_dioxide` → `Carbon-Dioxide`, `n-butane` → `N-Butane`. */
export function componentLabel(id: string): string {
  return id
    .split(/[-_]/)
    .map(part => part.charAt(0).toUpperCase() + part.slice(1))
    .join('-');
}

function section(title: string): string[] {
  return ['', `${title}:`, SECTION_RULE];
}

function row(label: string, value: string): string {
  return `${`${label}:`.padEnd(25)}${value}`;
}

export function formatGasReport(report: GasReport): string[] {
  const { conditions, pseudoCritical } = report;
  const rule = '='.repeat(RULE_WIDTH);

  const composition = Object.entries(conditions.composition)
    .filter(([, pct]) => pct > 0)
    .map(([id, pct]) => `${componentLabel(id).padEnd(15)}: ${pct.toFixed(4).padStart(8)}%`);

  return [
    rule,
    'GAS PROPERTIES REPORT'.padStart(50),
    rule,
    ...section('INPUT CONDITIONS'),
    `Pressure:     ${conditions.pressureBarg.toFixed(3)} barg (${conditions.pressureBara.toFixed(3)} bara)`,
    `Temperature:  ${conditions.temperatureC.toFixed(2)} °C (${conditions.temperatureK.toFixed(2)} K)`,
    ...section('GAS COMPOSITION (mol%)'),
    ...composition,
    ...section('BASIC PROPERTIES'),
    row('Molecular Weight', `${report.molarMassGMol.toFixed(3)} g/mol`),
    row('Specific Gravity', `${report.specificGravity.toFixed(4)} (relative to air)`),
    row('Compressibility Factor', report.compressibilityFactor.toFixed(6)),
    row('Density (actual)', `${report.densityKgM3.toFixed(3)} kg/m³`),
    row('Density (std 15°C)', `${report.standardDensityKgM3.toFixed(3)} kg/m³`),
    ...section('HEATING VALUES'),
    row('Higher Heating Value', `${report.higherHeatingValueMJm3.toFixed(2)} MJ/m³`),
    row('Lower Heating Value', `${report.lowerHeatingValueMJm3.toFixed(2)} MJ/m³`),
    row('Wobbe Index', `${report.wobbeIndexMJm3.toFixed(2)} MJ/m³`),
    ...section('PSEUDO-CRITICAL PROPERTIES'),
    row('Critical Temperature', `${pseudoCritical.temperatureK.toFixed(2)} K (${(pseudoCritical.temperatureK - 273.15).toFixed(2)} °C)`),
    row('Critical Pressure', `${pseudoCritical.pressureMPa.toFixed(3)} MPa (${(pseudoCritical.pressureMPa * 10).toFixed(1)} bar)`),
    row('Critical Density', `${pseudoCritical.densityKgM3.toFixed(1)} kg/m³`),
    ...section('ADDITIONAL PROPERTIES'),
    row('Volume Factor', report.volumeFactor.toFixed(6)),
    row('Reduced Temperature', report.reducedTemperature.toFixed(4)),
    row('Reduced Pressure', report.reducedPressure.toFixed(4)),
    '',
    rule,
    'Note: Compressibility from Peng-Robinson on Kay\'s-rule pseudo-critical properties',
    `Standard conditions: 15°C (${STANDARD_CONDITIONS.temperatureK} K), ${STANDARD_CONDITIONS.pressureBara} bara`,
    rule,
  ];
}

export function formatNotes(notes: readonly string[]): string[] {
  return notes.map(note => `  Note: ${note}`);
}

export function formatAssumptions(assumptions: readonly AssumptionV1[]): string[] {
  if (assumptions.length === 0) return [];
  return [
    'Assumptions:',
    ...assumptions.map(a => `  [${a.severity}] ${a.title}: ${a.detail}`),
  ];
}

export function formatUnitList(kinds: readonly QuantityKind[] = QUANTITY_KINDS): string[] {
  const lines: string[] = [];
  for (const kind of kinds) {
    lines.push(`${kind} (base: ${BASE_UNIT[kind]})`);
    for (const unit of listUnits(kind)) {
      lines.push(`  ${unit.padEnd(6)}${UNIT_LABELS[unit]}`);
    }
  }
  return lines;
}
