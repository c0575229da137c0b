import { describe, it, expect } from 'vitest';
import {
  BASE_UNIT,
  convert,
  fromBase,
  kindsOfUnit,
  listUnits,
  toBase,
} from '../units/UnitConversionModule';
import { KindMismatchError, UnknownUnitError } from '../errors';
import { QUANTITY_KINDS } from '../../contracts/units.ids';

describe('convert – worked conversions', () => {
  it('100 gpm → 378.5410 lpm (±0.001)', () => {
    expect(Math.abs(convert(100, 'gpm', 'lpm', 'flow') - 378.541)).toBeLessThanOrEqual(0.001);
  });

  it('150 psi → 10.3421 bar (±0.001)', () => {
    expect(Math.abs(convert(150, 'psi', 'bar', 'pressure') - 10.3421)).toBeLessThanOrEqual(0.001);
  });

  it('25 °C → 77 °F', () => {
    const f = convert(25, 'c', 'f', 'temperature');
    expect(f).toBeCloseTo(77, 9);
    expect(f.toFixed(4)).toBe('77.0000');
  });

  it('-40 °C → -40 °F (scales cross)', () => {
    expect(convert(-40, 'c', 'f', 'temperature')).toBeCloseTo(-40, 9);
  });

  it('212 °F → 373.15 K', () => {
    expect(toBase(212, 'f', 'temperature')).toBeCloseTo(373.15, 9);
  });

  it('491.67 °R → 0 °C', () => {
    expect(convert(491.67, 'r', 'c', 'temperature')).toBeCloseTo(0, 9);
  });

  it('0 K → 0 °R', () => {
    expect(convert(0, 'k', 'r', 'temperature')).toBe(0);
  });

  it('1 m³/h → 16.667 L/min', () => {
    expect(convert(1, 'm3h', 'lpm', 'flow')).toBeCloseTo(1000 / 60, 9);
  });

  it('1 bbl/day → 0.1104078437 L/min', () => {
    expect(convert(1, 'bpd', 'lpm', 'flow')).toBeCloseTo(0.1104078437, 9);
  });

  it('1 ft → 12 in', () => {
    expect(convert(1, 'ft', 'in', 'length')).toBeCloseTo(12, 9);
  });

  it('1 MPa → 145.0377 psi', () => {
    expect(convert(1, 'mpa', 'psi', 'pressure')).toBeCloseTo(145.0377, 3);
  });

  it('10 ft/s → 3.048 m/s', () => {
    expect(convert(10, 'fps', 'mps', 'velocity')).toBeCloseTo(3.048, 12);
  });

  it('negative values convert without complaint', () => {
    expect(convert(-2, 'bar', 'kpa', 'pressure')).toBeCloseTo(-200, 9);
  });
});

describe('convert – identity', () => {
  for (const kind of QUANTITY_KINDS) {
    it(`returns the value unchanged for every ${kind} unit`, () => {
      for (const unit of listUnits(kind)) {
        expect(convert(123.456, unit, unit, kind)).toBe(123.456);
        expect(convert(-0.1, unit, unit, kind)).toBe(-0.1);
      }
    });
  }
});

describe('convert – round trip', () => {
  const values = [-40, 0, 1, 123.456, 1e6];

  for (const kind of QUANTITY_KINDS) {
    it(`every ${kind} unit pair round-trips within 1e-9 relative`, () => {
      const units = listUnits(kind);
      for (const u1 of units) {
        for (const u2 of units) {
          for (const v of values) {
            const back = convert(convert(v, u1, u2, kind), u2, u1, kind);
            expect(Math.abs(back - v)).toBeLessThanOrEqual(1e-9 * Math.max(1, Math.abs(v)));
          }
        }
      }
    });
  }

  it('fromBase inverts toBase for a temperature unit', () => {
    expect(fromBase(toBase(98.6, 'f', 'temperature'), 'f', 'temperature')).toBeCloseTo(98.6, 9);
  });
});

describe('convert – kind isolation', () => {
  it('flow → pressure fails with KindMismatchError', () => {
    expect(() => convert(1, 'gpm', 'psi', 'flow')).toThrow(KindMismatchError);
  });

  it('pressure → flow fails with KindMismatchError', () => {
    expect(() => convert(1, 'psi', 'gpm', 'flow')).toThrow(KindMismatchError);
  });

  it('mismatch is reported whatever kind is stated', () => {
    for (const kind of QUANTITY_KINDS) {
      expect(() => convert(1, 'gpm', 'psi', kind)).toThrow(KindMismatchError);
      expect(() => convert(1, 'psi', 'gpm', kind)).toThrow(KindMismatchError);
    }
  });

  it('temperature → length fails with KindMismatchError', () => {
    expect(() => convert(20, 'c', 'mm', 'temperature')).toThrow(KindMismatchError);
  });

  it('error names both units and their kinds', () => {
    expect(() => convert(1, 'gpm', 'psi', 'flow'))
      .toThrow("Cannot convert 'gpm' (flow) to 'psi' (pressure): units measure different quantities");
  });
});

describe('convert – unknown units', () => {
  it('units of the wrong stated kind fail with UnknownUnitError', () => {
    expect(() => convert(1, 'gpm', 'lpm', 'pressure')).toThrow(UnknownUnitError);
  });

  it('unregistered source symbol fails with UnknownUnitError', () => {
    expect(() => convert(1, 'furlong', 'm', 'length')).toThrow(UnknownUnitError);
  });

  it('unregistered target symbol fails with UnknownUnitError', () => {
    expect(() => convert(1, 'm', 'furlong', 'length')).toThrow("Unit 'furlong' is not a registered length unit");
  });

  it('symbols are case-sensitive at the engine', () => {
    expect(() => convert(1, 'GPM', 'lpm', 'flow')).toThrow(UnknownUnitError);
  });

  it('toBase rejects a unit outside the stated kind', () => {
    expect(() => toBase(1, 'psi', 'length')).toThrow(UnknownUnitError);
  });
});

describe('unit registry', () => {
  it('each symbol belongs to exactly one kind', () => {
    for (const kind of QUANTITY_KINDS) {
      for (const unit of listUnits(kind)) {
        expect(kindsOfUnit(unit)).toEqual([kind]);
      }
    }
  });

  it('unknown symbols belong to no kind', () => {
    expect(kindsOfUnit('parsec')).toEqual([]);
  });

  it('prototype keys are not units', () => {
    expect(kindsOfUnit('toString')).toEqual([]);
  });

  it('every base unit converts to itself with factor 1', () => {
    for (const kind of QUANTITY_KINDS) {
      expect(toBase(5, BASE_UNIT[kind], kind)).toBe(5);
    }
  });
});
