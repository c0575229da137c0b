/**
 * Form and result building blocks shared by the calculator panels.
 */

import type { AssumptionV1 } from '../contracts/CalculationOutputV1';
import { UNIT_LABELS } from '../contracts/units.ids';
import type { QuantityKind, UnitSymbol } from '../contracts/units.ids';
import { listUnits } from '../engine/units/UnitConversionModule';

// ─── Inputs ───────────────────────────────────────────────────────────────────

export function NumberField({ label, value, onChange, placeholder }: {
  label: string;
  value: string;
  onChange: (value: string) => void;
  placeholder?: string;
}) {
  return (
    <label className="field">
      <span className="field-label">{label}</span>
      <input
        type="text"
        inputMode="decimal"
        value={value}
        placeholder={placeholder}
        onChange={e => onChange(e.target.value)}
      />
    </label>
  );
}

export function UnitSelect({ kind, value, onChange, ariaLabel }: {
  kind: QuantityKind;
  value: string;
  onChange: (unit: UnitSymbol) => void;
  ariaLabel: string;
}) {
  const units = listUnits(kind);
  return (
    <select
      className="unit-select"
      aria-label={ariaLabel}
      value={value}
      onChange={e => {
        const unit = units.find(u => u === e.target.value);
        if (unit) onChange(unit);
      }}
    >
      {units.map(unit => (
        <option key={unit} value={unit} title={UNIT_LABELS[unit]}>{unit}</option>
      ))}
    </select>
  );
}

/** A number field followed by its unit selector. */
export function QuantityField({ label, kind, value, unit, onValueChange, onUnitChange, placeholder }: {
  label: string;
  kind: QuantityKind;
  value: string;
  unit: string;
  onValueChange: (value: string) => void;
  onUnitChange: (unit: UnitSymbol) => void;
  placeholder?: string;
}) {
  return (
    <div className="quantity-field">
      <NumberField label={label} value={value} onChange={onValueChange} placeholder={placeholder} />
      <UnitSelect kind={kind} value={unit} onChange={onUnitChange} ariaLabel={`${label} unit`} />
    </div>
  );
}

// ─── Results ──────────────────────────────────────────────────────────────────

export function MetricRow({ label, value, unit, highlight }: {
  label: string;
  value: string;
  unit?: string;
  highlight?: 'ok' | 'warn' | 'neutral';
}) {
  const valueColor = highlight === 'ok' ? '#276749' : highlight === 'warn' ? '#c05621' : '#2d3748';
  return (
    <div className="metric-row">
      <span className="metric-label">{label}</span>
      <span style={{ fontWeight: 600, color: valueColor }}>
        {value}{unit ? ` ${unit}` : ''}
      </span>
    </div>
  );
}

export function ErrorNote({ message }: { message: string }) {
  return <div className="error-note" role="alert">⚠️ {message}</div>;
}

export function EmptyNote({ children }: { children: string }) {
  return <p className="empty-note">{children}</p>;
}

export function NotesList({ notes }: { notes: readonly string[] }) {
  if (notes.length === 0) return null;
  return (
    <ul className="notes-list">
      {notes.map(note => <li key={note}>{note}</li>)}
    </ul>
  );
}

export function AssumptionsList({ assumptions }: { assumptions: readonly AssumptionV1[] }) {
  if (assumptions.length === 0) return null;
  return (
    <details className="assumptions">
      <summary>Assumptions ({assumptions.length})</summary>
      <ul>
        {assumptions.map(a => (
          <li key={a.id} className={`assumption assumption-${a.severity}`}>
            <strong>{a.title}</strong> – {a.detail}
            {a.improveBy && <div className="assumption-improve">{a.improveBy}</div>}
          </li>
        ))}
      </ul>
    </details>
  );
}
