/**
 * Quantity kinds and the closed unit vocabulary for each kind.
 *
 * Symbols are lower-case and scoped to one kind. The same symbol may never be
 * looked up without its kind; see UnitConversionModule.
 */
export const QUANTITY_KINDS = ['flow', 'pressure', 'temperature', 'length', 'velocity'] as const;

export type QuantityKind = typeof QUANTITY_KINDS[number];

export const UNIT_SYMBOLS = {
  flow:        ['lpm', 'gpm', 'cfm', 'm3h', 'm3s', 'lps', 'bpd'],
  pressure:    ['pa', 'kpa', 'mpa', 'bar', 'mbar', 'psi', 'mmhg'],
  temperature: ['k', 'c', 'f', 'r'],
  length:      ['m', 'cm', 'mm', 'in', 'ft'],
  velocity:    ['mps', 'fps'],
} as const;

export type UnitSymbol<K extends QuantityKind = QuantityKind> = typeof UNIT_SYMBOLS[K][number];

export type FlowUnit = UnitSymbol<'flow'>;
export type PressureUnit = UnitSymbol<'pressure'>;
export type TemperatureUnit = UnitSymbol<'temperature'>;
export type LengthUnit = UnitSymbol<'length'>;
export type VelocityUnit = UnitSymbol<'velocity'>;

/** Display labels used by the CLI `units` listing and the UI selects. */
export const UNIT_LABELS: Record<UnitSymbol, string> = {
  lpm: 'litres per minute',
  gpm: 'US gallons per minute',
  cfm: 'cubic feet per minute',
  m3h: 'cubic metres per hour',
  m3s: 'cubic metres per second',
  lps: 'litres per second',
  bpd: 'barrels per day',
  pa: 'pascal',
  kpa: 'kilopascal',
  mpa: 'megapascal',
  bar: 'bar',
  mbar: 'millibar',
  psi: 'pounds per square inch',
  mmhg: 'millimetres of mercury',
  k: 'kelvin',
  c: 'degrees Celsius',
  f: 'degrees Fahrenheit',
  r: 'degrees Rankine',
  m: 'metre',
  cm: 'centimetre',
  mm: 'millimetre',
  in: 'inch',
  ft: 'foot',
  mps: 'metres per second',
  fps: 'feet per second',
};

export function isQuantityKind(value: string): value is QuantityKind {
  return QUANTITY_KINDS.some(kind => kind === value);
}
