import { useState } from 'react';
import { runPressureDropCalculation } from '../engine/Calculator';
import { COMMERCIAL_STEEL_ROUGHNESS_M, WATER_20C } from '../engine/fluids';
import { convert } from '../engine/units/UnitConversionModule';
import { evaluate, parseField } from './calculationState';
import {
  AssumptionsList,
  EmptyNote,
  ErrorNote,
  MetricRow,
  NotesList,
  NumberField,
  QuantityField,
} from './CalculatorFields';
import { useUnitPreset } from './UnitPresetProvider';
import FrictionFactorCurve from './visualizers/FrictionFactorCurve';
import HydraulicVelocityBar from './visualizers/HydraulicVelocityBar';

export default function PressureDropPanel() {
  const preset = useUnitPreset();
  const [flowRate, setFlowRate] = useState('');
  const [flowUnit, setFlowUnit] = useState<string>(preset.flowUnit);
  const [diameter, setDiameter] = useState('');
  const [diameterUnit, setDiameterUnit] = useState<string>(preset.diameterUnit);
  const [length, setLength] = useState('');
  const [lengthUnit, setLengthUnit] = useState<string>(preset.lengthUnit);
  const [roughness, setRoughness] = useState('');
  const [roughnessUnit, setRoughnessUnit] = useState<string>(preset.roughnessUnit);
  const [density, setDensity] = useState('');
  const [viscosity, setViscosity] = useState('');

  const state = evaluate(() => {
    const q = parseField(flowRate);
    const d = parseField(diameter);
    const l = parseField(length);
    if (q === undefined || d === undefined || l === undefined) return undefined;
    return runPressureDropCalculation({
      flowRate: q,
      flowUnit,
      diameter: d,
      diameterUnit,
      length: l,
      lengthUnit,
      roughness: parseField(roughness),
      roughnessUnit,
      density: parseField(density),
      kinematicViscosity: parseField(viscosity),
    });
  });

  const defaultRoughness = convert(COMMERCIAL_STEEL_ROUGHNESS_M, 'm', roughnessUnit, 'length');

  return (
    <section className="panel">
      <h2>Pressure Drop (Darcy-Weisbach)</h2>

      <QuantityField label="Flow rate" kind="flow" value={flowRate} unit={flowUnit}
        onValueChange={setFlowRate} onUnitChange={setFlowUnit} />
      <QuantityField label="Internal diameter" kind="length" value={diameter} unit={diameterUnit}
        onValueChange={setDiameter} onUnitChange={setDiameterUnit} />
      <QuantityField label="Pipe length" kind="length" value={length} unit={lengthUnit}
        onValueChange={setLength} onUnitChange={setLengthUnit} />
      <QuantityField label="Wall roughness" kind="length" value={roughness} unit={roughnessUnit}
        onValueChange={setRoughness} onUnitChange={setRoughnessUnit}
        placeholder={`${Number(defaultRoughness.toPrecision(3))} (steel)`} />
      <div className="form-row">
        <NumberField label="Density (kg/m³)" value={density} onChange={setDensity}
          placeholder={`${WATER_20C.densityKgM3} (water)`} />
        <NumberField label="Kinematic viscosity (m²/s)" value={viscosity} onChange={setViscosity}
          placeholder={`${WATER_20C.kinematicViscosityM2s} (water)`} />
      </div>

      {state.status === 'empty' && <EmptyNote>Enter flow rate, diameter and length.</EmptyNote>}
      {state.status === 'error' && <ErrorNote message={state.message} />}
      {state.status === 'ok' && (
        <div className="results">
          <MetricRow
            label="Pressure drop"
            value={convert(state.result.deltaPPa, 'pa', preset.pressureUnit, 'pressure').toFixed(preset.pressureUnit === 'bar' ? 4 : 2)}
            unit={preset.pressureUnit}
          />
          <MetricRow label="Pressure drop" value={state.result.deltaPPa.toFixed(0)} unit="Pa" />
          <MetricRow label="Head loss" value={state.result.headLossM.toFixed(3)} unit="m" />
          <MetricRow label="Reynolds number" value={state.result.reynoldsNumber.toFixed(0)} />
          <MetricRow label="Friction factor" value={state.result.frictionFactor.toFixed(6)} />
          <MetricRow
            label="Flow regime"
            value={state.result.flowRegime}
            highlight={state.result.flowRegime === 'transitional' ? 'warn' : 'neutral'}
          />
          <HydraulicVelocityBar velocityMps={state.result.velocityMps} displayUnit={preset.velocityUnit} />
          <NotesList notes={state.result.notes} />
          <FrictionFactorCurve
            relativeRoughness={state.result.relativeRoughness}
            reynoldsNumber={state.result.reynoldsNumber > 0 ? state.result.reynoldsNumber : undefined}
            frictionFactor={state.result.reynoldsNumber > 0 ? state.result.frictionFactor : undefined}
          />
          <AssumptionsList assumptions={state.result.assumptions} />
        </div>
      )}
    </section>
  );
}
