import { describe, it, expect } from 'vitest';
import {
  GAS_COMPONENTS,
  gasPropertiesReport,
  heatingValues,
  molarMass,
  normalizeComposition,
  pengRobinsonZ,
  pseudoCriticalProperties,
  solveCubic,
  specificGravity,
} from '../modules/GasPropertiesModule';
import { InvalidInputError } from '../errors';

const typicalGas = {
  methane: 94.5,
  ethane: 3.2,
  propane: 1.1,
  'n-butane': 0.3,
  nitrogen: 0.7,
  carbon_dioxide: 0.2,
};

describe('solveCubic', () => {
  it('three real roots of (z−1)(z−2)(z−3)', () => {
    const roots = solveCubic(-6, 11, -6).sort((a, b) => a - b);
    expect(roots).toHaveLength(3);
    expect(roots[0]).toBeCloseTo(1, 9);
    expect(roots[1]).toBeCloseTo(2, 9);
    expect(roots[2]).toBeCloseTo(3, 9);
  });

  it('single real root of (z−2)(z²+1)', () => {
    const roots = solveCubic(-2, 1, -2);
    expect(roots).toHaveLength(1);
    expect(roots[0]).toBeCloseTo(2, 9);
  });
});

describe('normalizeComposition', () => {
  it('leaves a 100 % composition unchanged', () => {
    const normalised = normalizeComposition({ methane: 90, ethane: 10 });
    expect(Object.keys(normalised)).toEqual(['methane', 'ethane']);
    expect(normalised.methane).toBeCloseTo(90, 12);
    expect(normalised.ethane).toBeCloseTo(10, 12);
  });

  it('scales a short composition up to 100 %', () => {
    const normalised = normalizeComposition({ methane: 45, ethane: 5 });
    expect(normalised.methane).toBeCloseTo(90, 12);
    expect(normalised.ethane).toBeCloseTo(10, 12);
  });

  it('rejects empty, zero-sum, negative and unknown entries', () => {
    expect(() => normalizeComposition({})).toThrow('Gas composition cannot be empty');
    expect(() => normalizeComposition({ methane: 0 })).toThrow('Total composition cannot be zero');
    expect(() => normalizeComposition({ methane: 101, ethane: -1 })).toThrow(InvalidInputError);
    expect(() => normalizeComposition({ unobtainium: 100 })).toThrow(/Unknown gas component 'unobtainium'/);
  });
});

describe('mixture properties', () => {
  it('pure methane molar mass is 16.043 g/mol', () => {
    expect(molarMass({ methane: 100 })).toBeCloseTo(16.043, 12);
  });

  it('pure methane specific gravity ≈ 0.5539', () => {
    expect(specificGravity({ methane: 100 })).toBeCloseTo(0.55389, 4);
  });

  it('heating values are mole-weighted', () => {
    const { hhv, lhv } = heatingValues({ methane: 90, ethane: 10 });
    expect(hhv).toBeCloseTo(0.9 * 39.82 + 0.1 * 70.36, 9);
    expect(lhv).toBeCloseTo(0.9 * 35.89 + 0.1 * 64.36, 9);
  });

  it('inert components contribute no heating value', () => {
    expect(heatingValues({ nitrogen: 100 }).hhv).toBe(0);
  });

  it("Kay's rule for a single component returns its critical point", () => {
    const pc = pseudoCriticalProperties({ methane: 100 });
    expect(pc.temperatureK).toBeCloseTo(190.564, 9);
    expect(pc.pressureMPa).toBeCloseTo(4.5992, 9);
    expect(pc.coveredFraction).toBeCloseTo(1, 12);
  });

  it('components without critical data are left out of the weighting', () => {
    const pc = pseudoCriticalProperties({ methane: 95, hydrogen: 5 });
    expect(pc.temperatureK).toBeCloseTo(190.564, 9);
    expect(pc.coveredFraction).toBeCloseTo(0.95, 12);
  });

  it('a gas with no critical data cannot be characterised', () => {
    expect(() => pseudoCriticalProperties({ hydrogen: 100 })).toThrow(InvalidInputError);
  });

  it('every listed component has a molar mass', () => {
    for (const id of GAS_COMPONENTS) {
      expect(molarMass({ [id]: 100 })).toBeGreaterThan(0);
    }
  });
});

describe('pengRobinsonZ', () => {
  const methane = pseudoCriticalProperties({ methane: 100 });

  it('methane at 15 °C, 1 atm is close to ideal', () => {
    expect(pengRobinsonZ(101325, 288.15, methane)).toBeCloseTo(0.998, 2);
  });

  it('Z falls with pressure below the Boyle temperature', () => {
    const low = pengRobinsonZ(101325, 288.15, methane);
    const high = pengRobinsonZ(50e5, 288.15, methane);
    expect(high).toBeLessThan(low);
    expect(high).toBeGreaterThan(0.8);
  });
});

describe('gasPropertiesReport', () => {
  it('pure methane at standard conditions', () => {
    const report = gasPropertiesReport({ composition: { methane: 100 }, pressureBarg: 0, temperatureC: 15 });
    expect(report.conditions.pressureBara).toBeCloseTo(1.01325, 12);
    expect(report.conditions.temperatureK).toBeCloseTo(288.15, 12);
    expect(report.standardDensityKgM3).toBeCloseTo(0.68, 2);
    expect(report.wobbeIndexMJm3).toBeCloseTo(53.5, 1);
    expect(report.compressibilityFactor).toBeCloseTo(report.standardCompressibilityFactor, 12);
    expect(report.volumeFactor).toBeCloseTo(1 / report.compressibilityFactor, 12);
    expect(report.notes).toEqual([]);
  });

  it('typical pipeline gas at 20 barg, 25 °C', () => {
    const report = gasPropertiesReport({ composition: typicalGas, pressureBarg: 20, temperatureC: 25 });
    expect(report.molarMassGMol).toBeGreaterThan(16.043);
    expect(report.compressibilityFactor).toBeLessThan(1);
    expect(report.compressibilityFactor).toBeGreaterThan(0.9);
    expect(report.densityKgM3).toBeGreaterThan(report.standardDensityKgM3);
    expect(report.reducedPressure).toBeCloseTo(21.01325e5 / (report.pseudoCritical.pressureMPa * 1e6), 12);
    expect(report.assumptions.map(a => a.id)).toEqual(['gas.peng_robinson_estimate']);
  });

  it('flags a composition that does not sum to 100 %', () => {
    const report = gasPropertiesReport({ composition: { methane: 90, ethane: 5 }, pressureBarg: 1, temperatureC: 10 });
    expect(report.conditions.composition.methane).toBeCloseTo(94.736842, 5);
    expect(report.assumptions.map(a => a.id)).toContain('gas.composition_normalised');
  });

  it('notes partial critical-data coverage', () => {
    const report = gasPropertiesReport({ composition: { methane: 95, hydrogen: 5 }, pressureBarg: 1, temperatureC: 10 });
    expect(report.notes).toEqual([
      'Only 95.00 mol % of the gas has critical-point data; pseudo-critical properties are weighted over that fraction.',
    ]);
  });

  it('rejects negative gauge pressure and temperatures at or below absolute zero', () => {
    expect(() => gasPropertiesReport({ composition: typicalGas, pressureBarg: -1, temperatureC: 15 }))
      .toThrow(InvalidInputError);
    expect(() => gasPropertiesReport({ composition: typicalGas, pressureBarg: 1, temperatureC: -273.15 }))
      .toThrow('Temperature must be above absolute zero (got -273.15 °C)');
  });
});
