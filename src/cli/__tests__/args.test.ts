import { describe, it, expect } from 'vitest';
import {
  UsageError,
  assertKnownFlags,
  expectPositionals,
  numberFlag,
  parseArgs,
  parseNumber,
} from '../args';

describe('parseArgs', () => {
  it('treats negative numbers as positionals', () => {
    const parsed = parseArgs(['convert', '-40', 'c', 'f', 'temperature']);
    expect(parsed.positionals).toEqual(['convert', '-40', 'c', 'f', 'temperature']);
    expect(parsed.flags.size).toBe(0);
  });

  it('accepts --name value and --name=value', () => {
    const parsed = parseArgs(['flow', '0.1', '--velocity', '2.5', '--flow-unit=gpm']);
    expect(parsed.positionals).toEqual(['flow', '0.1']);
    expect(parsed.flags.get('velocity')).toBe('2.5');
    expect(parsed.flags.get('flow-unit')).toBe('gpm');
  });

  it('takes a negative number as a flag value', () => {
    expect(parseArgs(['--velocity', '-1e-3']).flags.get('velocity')).toBe('-1e-3');
  });

  it('boolean flags and short aliases take no value', () => {
    const parsed = parseArgs(['-v', 'units', '--help']);
    expect(parsed.positionals).toEqual(['units']);
    expect(parsed.flags.get('verbose')).toBe(true);
    expect(parsed.flags.get('help')).toBe(true);
  });

  it('rejects malformed options', () => {
    expect(() => parseArgs(['flow', '--velocity'])).toThrow('Option --velocity requires a value');
    expect(() => parseArgs(['flow', '--velocity', '--flow-rate', '3'])).toThrow('Option --velocity requires a value');
    expect(() => parseArgs(['--verbose=yes'])).toThrow('Option --verbose does not take a value');
    expect(() => parseArgs(['-x'])).toThrow("Unknown option '-x'");
  });
});

describe('parseNumber', () => {
  it('parses decimal and exponent forms', () => {
    expect(parseNumber('2.5', 'v')).toBe(2.5);
    expect(parseNumber(' 1e3 ', 'v')).toBe(1000);
    expect(parseNumber('-40', 'v')).toBe(-40);
  });

  it('rejects blanks and non-numbers', () => {
    expect(() => parseNumber('', 'diameter')).toThrow("Invalid number for diameter: ''");
    expect(() => parseNumber('abc', 'diameter')).toThrow(UsageError);
    expect(() => parseNumber('Infinity', 'diameter')).toThrow(UsageError);
  });
});

describe('command helpers', () => {
  it('numberFlag parses or returns undefined', () => {
    const parsed = parseArgs(['--density', '850']);
    expect(numberFlag(parsed, 'density')).toBe(850);
    expect(numberFlag(parsed, 'viscosity')).toBeUndefined();
    expect(() => numberFlag(parseArgs(['--density=thick']), 'density'))
      .toThrow("Invalid number for --density: 'thick'");
  });

  it('assertKnownFlags allows the boolean flags everywhere', () => {
    expect(() => assertKnownFlags(parseArgs(['--verbose']), [])).not.toThrow();
    expect(() => assertKnownFlags(parseArgs(['--density', '1']), ['roughness']))
      .toThrow("Unknown option '--density'");
  });

  it('expectPositionals reports the first missing or extra argument', () => {
    expect(expectPositionals(parseArgs(['1', '2']), ['a', 'b'])).toEqual(['1', '2']);
    expect(() => expectPositionals(parseArgs(['1']), ['a', 'b'])).toThrow('Missing argument <b>');
    expect(() => expectPositionals(parseArgs(['1', '2', '3']), ['a', 'b'])).toThrow("Unexpected argument '3'");
  });
});
