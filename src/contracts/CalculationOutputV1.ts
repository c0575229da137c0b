import type { AssumptionId } from './assumptions.ids';
import type { QuantityKind } from './units.ids';

export interface AssumptionV1 {
  id: AssumptionId;
  title: string;
  detail: string;
  severity: 'info' | 'warn';
  improveBy?: string;
}

/** A value tagged with the unit it is expressed in. */
export interface QuantityV1 {
  value: number;
  unit: string;
}

export type FlowRegime = 'laminar' | 'transitional' | 'turbulent';

export interface ConversionResultV1 {
  kind: QuantityKind;
  input: QuantityV1;
  result: QuantityV1;
}

export interface FlowResultV1 {
  diameterM: number;
  areaM2: number;
  velocityMps: number;
  flowM3s: number;
  /** Flow rate restated in m³/h and US gpm for reporting. */
  flowM3h: number;
  flowGpm: number;
}

export interface PressureDropResultV1 {
  deltaPPa: number;
  deltaPPsi: number;
  deltaPBar: number;
  headLossM: number;
  velocityMps: number;
  reynoldsNumber: number;
  frictionFactor: number;
  flowRegime: FlowRegime;
  relativeRoughness: number;
  notes: string[];
  assumptions: AssumptionV1[];
}
