import { useState } from 'react';
import { QUANTITY_KINDS, UNIT_LABELS } from '../contracts/units.ids';
import type { QuantityKind } from '../contracts/units.ids';
import { runConversion } from '../engine/Calculator';
import { listUnits } from '../engine/units/UnitConversionModule';
import { evaluate, parseField } from './calculationState';
import { EmptyNote, ErrorNote, NumberField, UnitSelect } from './CalculatorFields';
import { useUnitPreset } from './UnitPresetProvider';
import type { UnitPreset } from './UnitPresetProvider';

function presetUnitFor(kind: QuantityKind, preset: UnitPreset): string {
  switch (kind) {
    case 'flow': return preset.flowUnit;
    case 'pressure': return preset.pressureUnit;
    case 'temperature': return preset.temperatureUnit;
    case 'length': return preset.lengthUnit;
    case 'velocity': return preset.velocityUnit;
  }
}

/** First unit of `kind` that is not `unit`. */
function otherUnit(kind: QuantityKind, unit: string): string {
  return listUnits(kind).find(u => u !== unit) ?? unit;
}

function unitLabel(unit: string): string {
  const match = Object.entries(UNIT_LABELS).find(([symbol]) => symbol === unit);
  return match ? match[1] : unit;
}

export default function UnitConverterPanel() {
  const preset = useUnitPreset();
  const [kind, setKind] = useState<QuantityKind>('flow');
  const [value, setValue] = useState('100');
  const [from, setFrom] = useState<string>(preset.flowUnit);
  const [to, setTo] = useState<string>(otherUnit('flow', preset.flowUnit));

  function changeKind(next: QuantityKind) {
    const start = presetUnitFor(next, preset);
    setKind(next);
    setFrom(start);
    setTo(otherUnit(next, start));
  }

  const state = evaluate(() => {
    const v = parseField(value);
    return v === undefined ? undefined : runConversion({ value: v, from, to, kind });
  });

  return (
    <section className="panel">
      <h2>Unit Converter</h2>
      <div className="kind-tabs" role="tablist">
        {QUANTITY_KINDS.map(k => (
          <button
            key={k}
            role="tab"
            aria-selected={k === kind}
            className={`kind-tab${k === kind ? ' active' : ''}`}
            onClick={() => changeKind(k)}
          >
            {k}
          </button>
        ))}
      </div>

      <div className="form-row">
        <NumberField label="Value" value={value} onChange={setValue} />
        <UnitSelect kind={kind} value={from} onChange={setFrom} ariaLabel="From unit" />
        <button
          className="swap-btn"
          aria-label="Swap units"
          onClick={() => { setFrom(to); setTo(from); }}
        >
          ⇄
        </button>
        <UnitSelect kind={kind} value={to} onChange={setTo} ariaLabel="To unit" />
      </div>

      {state.status === 'empty' && <EmptyNote>Enter a value to convert.</EmptyNote>}
      {state.status === 'error' && <ErrorNote message={state.message} />}
      {state.status === 'ok' && (
        <div className="conversion-result">
          <span className="conversion-value">{state.result.result.value.toFixed(4)}</span>
          {' '}
          <span>{state.result.result.unit}</span>
          <div className="conversion-caption">
            {state.result.input.value} {unitLabel(state.result.input.unit)} ={' '}
            {state.result.result.value.toFixed(4)} {unitLabel(state.result.result.unit)}
          </div>
        </div>
      )}
    </section>
  );
}
