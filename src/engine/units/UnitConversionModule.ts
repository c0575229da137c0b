/**
 * UnitConversionModule
 *
 * Converts values between units of the same quantity kind.
 *
 * Every unit carries exactly one rule to its kind's base unit:
 *   flow        → L/min
 *   pressure    → Pa
 *   length      → m
 *   velocity    → m/s
 *   temperature → K
 *
 * Linear kinds use a multiplicative factor (base = value × factor).
 * Temperature uses an affine rule (base = (value + offset) × scale), because
 * Celsius, Fahrenheit, Kelvin and Rankine do not share a zero point.
 *
 * Conversions always go unit → base → unit, the same normalisation path the
 * hydraulic boundary uses when it brings caller inputs into SI.
 *
 * Symbols are namespaced per kind. A lookup must always state its kind.
 */

import { QUANTITY_KINDS, UNIT_SYMBOLS } from '../../contracts/units.ids';
import type { QuantityKind, UnitSymbol } from '../../contracts/units.ids';
import { KindMismatchError, UnknownUnitError } from '../errors';

export interface LinearRule {
  type: 'linear';
  /** Multiplier from this unit to the kind's base unit. */
  factor: number;
}

export interface AffineRule {
  type: 'affine';
  /** Added to the value before scaling. */
  offset: number;
  /** Multiplier applied after the offset. */
  scale: number;
}

export type ConversionRule = LinearRule | AffineRule;

const linear = (factor: number): LinearRule => ({ type: 'linear', factor });
const affine = (offset: number, scale: number): AffineRule => ({ type: 'affine', offset, scale });

/** Litres in one US liquid gallon (exact). */
const LITRES_PER_US_GALLON = 3.785411784;
/** Litres in one cubic foot (exact). */
const LITRES_PER_CUBIC_FOOT = 28.316846592;
/** Litres in one oil barrel (42 US gallons). */
const LITRES_PER_BARREL = 42 * LITRES_PER_US_GALLON;
const MINUTES_PER_DAY = 1440;

/** Pascals in one pound-force per square inch. */
const PA_PER_PSI = 6894.757293168;
/** Pascals in one millimetre of mercury (conventional). */
const PA_PER_MMHG = 133.322387415;

const METRES_PER_FOOT = 0.3048;
const METRES_PER_INCH = 0.0254;

const KELVIN_OFFSET_C = 273.15;
const RANKINE_OFFSET_F = 459.67;
const RANKINE_TO_KELVIN = 5 / 9;

export const BASE_UNIT: Readonly<Record<QuantityKind, UnitSymbol>> = Object.freeze({
  flow: 'lpm',
  pressure: 'pa',
  temperature: 'k',
  length: 'm',
  velocity: 'mps',
});

type RuleTable = { readonly [K in QuantityKind]: Readonly<Record<UnitSymbol<K>, ConversionRule>> };

const CONVERSION_RULES: RuleTable = Object.freeze({
  flow: Object.freeze({
    lpm: linear(1),
    gpm: linear(LITRES_PER_US_GALLON),
    cfm: linear(LITRES_PER_CUBIC_FOOT),
    m3h: linear(1000 / 60),
    m3s: linear(60_000),
    lps: linear(60),
    bpd: linear(LITRES_PER_BARREL / MINUTES_PER_DAY),
  }),
  pressure: Object.freeze({
    pa: linear(1),
    kpa: linear(1e3),
    mpa: linear(1e6),
    bar: linear(1e5),
    mbar: linear(100),
    psi: linear(PA_PER_PSI),
    mmhg: linear(PA_PER_MMHG),
  }),
  temperature: Object.freeze({
    k: affine(0, 1),
    c: affine(KELVIN_OFFSET_C, 1),
    f: affine(RANKINE_OFFSET_F, RANKINE_TO_KELVIN),
    r: affine(0, RANKINE_TO_KELVIN),
  }),
  length: Object.freeze({
    m: linear(1),
    cm: linear(0.01),
    mm: linear(0.001),
    in: linear(METRES_PER_INCH),
    ft: linear(METRES_PER_FOOT),
  }),
  velocity: Object.freeze({
    mps: linear(1),
    fps: linear(METRES_PER_FOOT),
  }),
});

/** Rule for (kind, symbol), or undefined when the symbol is not registered for that kind. */
export function lookupRule(kind: QuantityKind, unit: string): ConversionRule | undefined {
  const table: Readonly<Record<string, ConversionRule>> | undefined = CONVERSION_RULES[kind];
  if (!table || !Object.prototype.hasOwnProperty.call(table, unit)) return undefined;
  return table[unit];
}

export function isUnitOf(unit: string, kind: QuantityKind): boolean {
  return lookupRule(kind, unit) !== undefined;
}

/** Every kind under which `unit` is registered. Empty when the symbol is unknown. */
export function kindsOfUnit(unit: string): QuantityKind[] {
  return QUANTITY_KINDS.filter(kind => isUnitOf(unit, kind));
}

export function listUnits(kind: QuantityKind): readonly UnitSymbol[] {
  return UNIT_SYMBOLS[kind];
}

function requireRule(kind: QuantityKind, unit: string): ConversionRule {
  const rule = lookupRule(kind, unit);
  if (!rule) throw new UnknownUnitError(unit, kind);
  return rule;
}

function applyToBase(value: number, rule: ConversionRule): number {
  return rule.type === 'linear'
    ? value * rule.factor
    : (value + rule.offset) * rule.scale;
}

function applyFromBase(base: number, rule: ConversionRule): number {
  return rule.type === 'linear'
    ? base / rule.factor
    : base / rule.scale - rule.offset;
}

/** Express `value` (in `unit`) in the base unit of `kind`. */
export function toBase(value: number, unit: string, kind: QuantityKind): number {
  return applyToBase(value, requireRule(kind, unit));
}

/** Express a base-unit `value` of `kind` in `unit`. */
export function fromBase(value: number, unit: string, kind: QuantityKind): number {
  return applyFromBase(value, requireRule(kind, unit));
}

/**
 * Convert `value` from `fromUnit` to `toUnit`, both of quantity kind `kind`.
 *
 * Throws KindMismatchError when the two symbols are registered only under
 * different kinds (checked before `kind`, so the order of the units and the
 * stated kind do not matter), and UnknownUnitError when either symbol is not
 * registered under `kind`.
 */
export function convert(value: number, fromUnit: string, toUnit: string, kind: QuantityKind): number {
  const fromKinds = kindsOfUnit(fromUnit);
  const toKinds = kindsOfUnit(toUnit);
  if (fromKinds.length > 0 && toKinds.length > 0 && !fromKinds.some(k => toKinds.includes(k))) {
    throw new KindMismatchError(fromUnit, toUnit, fromKinds, toKinds);
  }

  const fromRule = requireRule(kind, fromUnit);
  const toRule = requireRule(kind, toUnit);

  if (fromUnit === toUnit) return value;

  return applyFromBase(applyToBase(value, fromRule), toRule);
}
