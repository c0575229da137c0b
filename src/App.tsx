import { useState } from 'react';
import FlowCalculatorPanel from './components/FlowCalculatorPanel';
import GasReportPanel from './components/GasReportPanel';
import PressureDropPanel from './components/PressureDropPanel';
import UnitConverterPanel from './components/UnitConverterPanel';
import { UNIT_PRESETS, UnitPresetProvider, isUnitPresetId } from './components/UnitPresetProvider';
import type { UnitPresetId } from './components/UnitPresetProvider';

type Tool = 'convert' | 'flow' | 'pressure' | 'gas';

const TOOL_LABELS: Record<Tool, string> = {
  convert: '🔁 Units',
  flow: '💧 Flow',
  pressure: '📉 Pressure Drop',
  gas: '🔥 Gas',
};

const TOOL_ORDER: Tool[] = ['convert', 'flow', 'pressure', 'gas'];

export default function App() {
  const [tool, setTool] = useState<Tool>('convert');
  const [presetId, setPresetId] = useState<UnitPresetId>('metric');

  return (
    <UnitPresetProvider presetId={presetId}>
      <div className="app">
        <header className="app-header">
          <h1>Meter Calc</h1>
          <p className="subtitle">Unit conversion, pipe flow and Darcy-Weisbach pressure drop</p>
          <label className="preset-picker">
            Units{' '}
            <select value={presetId} onChange={e => { if (isUnitPresetId(e.target.value)) setPresetId(e.target.value); }}>
              {Object.values(UNIT_PRESETS).map(p => <option key={p.presetId} value={p.presetId}>{p.label}</option>)}
            </select>
          </label>
        </header>

        <nav className="tool-tabs" role="tablist">
          {TOOL_ORDER.map(t => (
            <button
              key={t}
              role="tab"
              aria-selected={t === tool}
              className={`tool-tab${t === tool ? ' active' : ''}`}
              onClick={() => setTool(t)}
            >
              {TOOL_LABELS[t]}
            </button>
          ))}
        </nav>

        {/* Keyed on the preset so panels pick up its default units. */}
        <main key={presetId}>
          {tool === 'convert' && <UnitConverterPanel />}
          {tool === 'flow' && <FlowCalculatorPanel />}
          {tool === 'pressure' && <PressureDropPanel />}
          {tool === 'gas' && <GasReportPanel />}
        </main>
      </div>
    </UnitPresetProvider>
  );
}
