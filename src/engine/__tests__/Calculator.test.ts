import { describe, it, expect } from 'vitest';
import {
  runConversion,
  runFlowCalculation,
  runGasReport,
  runPressureDropCalculation,
} from '../Calculator';
import { InvalidInputError, KindMismatchError, UnknownUnitError } from '../errors';
import { pressureDrop } from '../modules/PressureDropModule';

const GALLON_M3 = 3.785411784e-3;

describe('runConversion', () => {
  it('normalises unit symbols before converting', () => {
    const result = runConversion({ value: 100, from: 'GPM', to: ' lpm ', kind: 'flow' });
    expect(result.kind).toBe('flow');
    expect(result.input).toEqual({ value: 100, unit: 'gpm' });
    expect(result.result.unit).toBe('lpm');
    expect(result.result.value).toBeCloseTo(378.5411784, 9);
  });

  it('rejects a non-finite value as invalid input', () => {
    expect(() => runConversion({ value: Number.NaN, from: 'psi', to: 'bar', kind: 'pressure' }))
      .toThrow(InvalidInputError);
  });

  it('passes unit errors through from the conversion engine', () => {
    expect(() => runConversion({ value: 1, from: 'furlong', to: 'm', kind: 'length' }))
      .toThrow(UnknownUnitError);
    expect(() => runConversion({ value: 1, from: 'gpm', to: 'psi', kind: 'flow' }))
      .toThrow(KindMismatchError);
  });
});

describe('runFlowCalculation', () => {
  it('6 in bore at 2.5 m/s', () => {
    const diameterM = 6 * 0.0254;
    const expectedM3s = (Math.PI * diameterM ** 2 / 4) * 2.5;
    const result = runFlowCalculation({ diameter: 6, diameterUnit: 'in', velocity: 2.5 });
    expect(result.diameterM).toBeCloseTo(0.1524, 12);
    expect(result.velocityMps).toBe(2.5);
    expect(result.flowM3s).toBeCloseTo(expectedM3s, 12);
    expect(result.flowM3h).toBeCloseTo(expectedM3s * 3600, 9);
    expect(result.flowM3h).toBeCloseTo(164.173, 3);
    expect(result.flowGpm).toBeCloseTo((expectedM3s / GALLON_M3) * 60, 9);
  });

  it('100 gpm through a 4 in bore', () => {
    const diameterM = 4 * 0.0254;
    const flowM3s = (100 * GALLON_M3) / 60;
    const result = runFlowCalculation({ diameter: 4, diameterUnit: 'in', flowRate: 100, flowUnit: 'gpm' });
    expect(result.flowM3s).toBeCloseTo(flowM3s, 12);
    expect(result.velocityMps).toBeCloseTo(flowM3s / (Math.PI * diameterM ** 2 / 4), 12);
    expect(result.flowGpm).toBeCloseTo(100, 9);
  });

  it('velocity in ft/s is converted before solving', () => {
    const result = runFlowCalculation({ diameter: 0.1, velocity: 10, velocityUnit: 'fps' });
    expect(result.velocityMps).toBeCloseTo(3.048, 12);
  });

  it('rejects both velocity and flow rate', () => {
    expect(() => runFlowCalculation({ diameter: 0.1, velocity: 1, flowRate: 10 }))
      .toThrow('Supply either velocity or flow rate, not both');
  });

  it('rejects a diameter in a pressure unit', () => {
    expect(() => runFlowCalculation({ diameter: 4, diameterUnit: 'psi', velocity: 1 }))
      .toThrow(UnknownUnitError);
  });
});

describe('runPressureDropCalculation', () => {
  it('36 m³/h through 100 mm × 100 m of steel with water defaults', () => {
    const result = runPressureDropCalculation({
      flowRate: 36,
      diameter: 100,
      diameterUnit: 'mm',
      length: 100,
    });
    const direct = pressureDrop({ flowM3s: 0.01, diameterM: 0.1, lengthM: 100 });

    expect(result.flowRegime).toBe('turbulent');
    expect(result.deltaPPa).toBeCloseTo(direct.deltaPPa, 6);
    expect(result.deltaPPsi).toBeCloseTo(result.deltaPPa / 6894.757293168, 9);
    expect(result.deltaPBar).toBeCloseTo(result.deltaPPa / 1e5, 12);
    expect(result.assumptions.map(a => a.id)).toEqual([
      'fluid.density_defaulted',
      'pipe.roughness_defaulted',
      'fluid.viscosity_defaulted',
      'fluid.viscosity_from_kinematic',
      'friction.swamee_jain',
    ]);
  });

  it('an explicit roughness suppresses the roughness assumption', () => {
    const result = runPressureDropCalculation({
      flowRate: 36,
      diameter: 0.1,
      length: 100,
      roughness: 0.045,
    });
    expect(result.relativeRoughness).toBeCloseTo(4.5e-4, 12);
    expect(result.assumptions.map(a => a.id)).not.toContain('pipe.roughness_defaulted');
  });

  it('reports schema failures with their field path', () => {
    expect(() => runPressureDropCalculation({ flowRate: 36, diameter: 0.1, length: Number.POSITIVE_INFINITY }))
      .toThrow(/^Invalid input – length: /);
  });
});

describe('runGasReport', () => {
  it('lower-cases component ids', () => {
    const report = runGasReport({ composition: { Methane: 100 }, pressureBarg: 0, temperatureC: 15 });
    expect(Object.keys(report.conditions.composition)).toEqual(['methane']);
  });

  it('rejects ids that collide once lower-cased', () => {
    const input = { composition: { Methane: 50, methane: 50 }, pressureBarg: 0, temperatureC: 15 };
    expect(() => runGasReport(input)).toThrow(InvalidInputError);
    expect(() => runGasReport(input)).toThrow("composition: component 'methane' is given more than once");
  });
});
