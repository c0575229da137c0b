import { useState } from 'react';
import { runFlowCalculation } from '../engine/Calculator';
import { convert } from '../engine/units/UnitConversionModule';
import { evaluate, parseField } from './calculationState';
import { EmptyNote, ErrorNote, MetricRow, QuantityField } from './CalculatorFields';
import { useUnitPreset } from './UnitPresetProvider';
import HydraulicVelocityBar from './visualizers/HydraulicVelocityBar';

type SolveFor = 'flow' | 'velocity';

export default function FlowCalculatorPanel() {
  const preset = useUnitPreset();
  const [solveFor, setSolveFor] = useState<SolveFor>('flow');
  const [diameter, setDiameter] = useState('');
  const [diameterUnit, setDiameterUnit] = useState<string>(preset.diameterUnit);
  const [velocity, setVelocity] = useState('');
  const [velocityUnit, setVelocityUnit] = useState<string>(preset.velocityUnit);
  const [flowRate, setFlowRate] = useState('');
  const [flowUnit, setFlowUnit] = useState<string>(preset.flowUnit);

  const state = evaluate(() => {
    const d = parseField(diameter);
    const known = parseField(solveFor === 'flow' ? velocity : flowRate);
    if (d === undefined || known === undefined) return undefined;
    return runFlowCalculation(solveFor === 'flow'
      ? { diameter: d, diameterUnit, velocity: known, velocityUnit }
      : { diameter: d, diameterUnit, flowRate: known, flowUnit });
  });

  return (
    <section className="panel">
      <h2>Flow Calculator</h2>
      <div className="kind-tabs" role="tablist">
        <button
          role="tab"
          aria-selected={solveFor === 'flow'}
          className={`kind-tab${solveFor === 'flow' ? ' active' : ''}`}
          onClick={() => setSolveFor('flow')}
        >
          Flow from velocity
        </button>
        <button
          role="tab"
          aria-selected={solveFor === 'velocity'}
          className={`kind-tab${solveFor === 'velocity' ? ' active' : ''}`}
          onClick={() => setSolveFor('velocity')}
        >
          Velocity from flow
        </button>
      </div>

      <QuantityField
        label="Internal diameter"
        kind="length"
        value={diameter}
        unit={diameterUnit}
        onValueChange={setDiameter}
        onUnitChange={setDiameterUnit}
      />
      {solveFor === 'flow' ? (
        <QuantityField
          label="Velocity"
          kind="velocity"
          value={velocity}
          unit={velocityUnit}
          onValueChange={setVelocity}
          onUnitChange={setVelocityUnit}
        />
      ) : (
        <QuantityField
          label="Flow rate"
          kind="flow"
          value={flowRate}
          unit={flowUnit}
          onValueChange={setFlowRate}
          onUnitChange={setFlowUnit}
        />
      )}

      {state.status === 'empty' && (
        <EmptyNote>{`Enter the pipe diameter and ${solveFor === 'flow' ? 'velocity' : 'flow rate'}.`}</EmptyNote>
      )}
      {state.status === 'error' && <ErrorNote message={state.message} />}
      {state.status === 'ok' && (
        <div className="results">
          <MetricRow label="Diameter" value={state.result.diameterM.toFixed(4)} unit="m" />
          <MetricRow label="Pipe area" value={state.result.areaM2.toFixed(6)} unit="m²" />
          <MetricRow label="Flow rate" value={state.result.flowM3h.toFixed(2)} unit="m³/h" />
          <MetricRow label="Flow rate" value={state.result.flowGpm.toFixed(2)} unit="GPM" />
          <MetricRow
            label="Velocity"
            value={convert(state.result.velocityMps, 'mps', preset.velocityUnit, 'velocity').toFixed(2)}
            unit={preset.velocityUnit === 'mps' ? 'm/s' : 'ft/s'}
          />
          <HydraulicVelocityBar velocityMps={state.result.velocityMps} displayUnit={preset.velocityUnit} />
        </div>
      )}
    </section>
  );
}
