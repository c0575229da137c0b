import { createContext, useContext } from 'react';
import type { ReactNode } from 'react';
import type {
  FlowUnit,
  LengthUnit,
  PressureUnit,
  TemperatureUnit,
  VelocityUnit,
} from '../contracts/units.ids';

export type UnitPresetId = 'metric' | 'us';

export interface UnitPreset {
  presetId: UnitPresetId;
  label: string;
  diameterUnit: LengthUnit;
  lengthUnit: LengthUnit;
  roughnessUnit: LengthUnit;
  flowUnit: FlowUnit;
  velocityUnit: VelocityUnit;
  pressureUnit: PressureUnit;
  temperatureUnit: TemperatureUnit;
}

// ─── Built-in presets ─────────────────────────────────────────────────────────

const UNIT_PRESETS: Record<UnitPresetId, UnitPreset> = {
  metric: {
    presetId: 'metric',
    label: 'Metric',
    diameterUnit: 'mm',
    lengthUnit: 'm',
    roughnessUnit: 'mm',
    flowUnit: 'm3h',
    velocityUnit: 'mps',
    pressureUnit: 'bar',
    temperatureUnit: 'c',
  },
  us: {
    presetId: 'us',
    label: 'US customary',
    diameterUnit: 'in',
    lengthUnit: 'ft',
    roughnessUnit: 'in',
    flowUnit: 'gpm',
    velocityUnit: 'fps',
    pressureUnit: 'psi',
    temperatureUnit: 'f',
  },
};

// ─── Context ──────────────────────────────────────────────────────────────────

const UnitPresetContext = createContext<UnitPreset>(UNIT_PRESETS.metric);

// ─── Provider ─────────────────────────────────────────────────────────────────

interface UnitPresetProviderProps {
  presetId?: UnitPresetId;
  children: ReactNode;
}

/**
 * UnitPresetProvider
 *
 * Supplies the default input units for every calculator panel below it.
 * Panels still let the user override each unit individually.
 */
export function UnitPresetProvider({ presetId = 'metric', children }: UnitPresetProviderProps) {
  return (
    <UnitPresetContext.Provider value={UNIT_PRESETS[presetId]}>
      {children}
    </UnitPresetContext.Provider>
  );
}

// ─── Hook ─────────────────────────────────────────────────────────────────────

/** Active preset from the nearest provider; metric when there is none. */
export function useUnitPreset(): UnitPreset {
  return useContext(UnitPresetContext);
}

// ─── Utility ─────────────────────────────────────────────────────────────────

export function getUnitPreset(presetId: UnitPresetId): UnitPreset {
  return UNIT_PRESETS[presetId];
}

export function isUnitPresetId(value: string): value is UnitPresetId {
  return Object.prototype.hasOwnProperty.call(UNIT_PRESETS, value);
}

export { UNIT_PRESETS };
