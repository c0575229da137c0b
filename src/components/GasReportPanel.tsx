import { useState } from 'react';
import { runGasReport } from '../engine/Calculator';
import { GAS_COMPONENTS } from '../engine/modules/GasPropertiesModule';
import { evaluate, parseCompositionText, parseField } from './calculationState';
import { AssumptionsList, EmptyNote, ErrorNote, MetricRow, NotesList, NumberField } from './CalculatorFields';

const SAMPLE_COMPOSITION = 'methane=94.5\nethane=3.2\npropane=1.1\nnitrogen=0.9\ncarbon_dioxide=0.3';

export default function GasReportPanel() {
  const [pressureBarg, setPressureBarg] = useState('20');
  const [temperatureC, setTemperatureC] = useState('15');
  const [composition, setComposition] = useState(SAMPLE_COMPOSITION);

  const state = evaluate(() => {
    const p = parseField(pressureBarg);
    const t = parseField(temperatureC);
    if (p === undefined || t === undefined || composition.trim() === '') return undefined;
    return runGasReport({ composition: parseCompositionText(composition), pressureBarg: p, temperatureC: t });
  });

  return (
    <section className="panel">
      <h2>Gas Properties</h2>
      <div className="form-row">
        <NumberField label="Line pressure (barg)" value={pressureBarg} onChange={setPressureBarg} />
        <NumberField label="Line temperature (°C)" value={temperatureC} onChange={setTemperatureC} />
      </div>
      <label className="field">
        <span className="field-label">Composition (mol %)</span>
        <textarea
          rows={6}
          value={composition}
          onChange={e => setComposition(e.target.value)}
          title={`Known components: ${GAS_COMPONENTS.join(', ')}`}
        />
      </label>

      {state.status === 'empty' && <EmptyNote>Enter pressure, temperature and composition.</EmptyNote>}
      {state.status === 'error' && <ErrorNote message={state.message} />}
      {state.status === 'ok' && (
        <div className="results">
          <MetricRow label="Molecular weight" value={state.result.molarMassGMol.toFixed(3)} unit="g/mol" />
          <MetricRow label="Specific gravity" value={state.result.specificGravity.toFixed(4)} />
          <MetricRow label="Compressibility Z" value={state.result.compressibilityFactor.toFixed(6)} />
          <MetricRow label="Density (line)" value={state.result.densityKgM3.toFixed(3)} unit="kg/m³" />
          <MetricRow label="Density (std 15 °C)" value={state.result.standardDensityKgM3.toFixed(3)} unit="kg/m³" />
          <MetricRow label="Higher heating value" value={state.result.higherHeatingValueMJm3.toFixed(2)} unit="MJ/m³" />
          <MetricRow label="Lower heating value" value={state.result.lowerHeatingValueMJm3.toFixed(2)} unit="MJ/m³" />
          <MetricRow label="Wobbe index" value={state.result.wobbeIndexMJm3.toFixed(2)} unit="MJ/m³" />
          <MetricRow label="Volume factor" value={state.result.volumeFactor.toFixed(6)} />
          <NotesList notes={state.result.notes} />
          <AssumptionsList assumptions={state.result.assumptions} />
        </div>
      )}
    </section>
  );
}
