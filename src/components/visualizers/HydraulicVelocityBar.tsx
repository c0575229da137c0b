/**
 * HydraulicVelocityBar
 *
 * Horizontal bar placing the mean pipe velocity against three colour-coded
 * bands for liquid service:
 *   Low (< 0.6 m/s, solids may settle) · Normal (0.6–3.0 m/s) · High (> 3.0 m/s, erosion and noise)
 *
 * The bar spans 0 → MAX_DISPLAY_MPS; the marker is clamped to that range and
 * labels are shown in the caller's velocity unit.
 */

import type { VelocityUnit } from '../../contracts/units.ids';
import { convert } from '../../engine/units/UnitConversionModule';

interface Props {
  velocityMps: number;
  displayUnit?: VelocityUnit;
}

const MAX_DISPLAY_MPS = 4.5;
const LOW_LIMIT_MPS = 0.6;
const HIGH_LIMIT_MPS = 3.0;

type VelocityBand = 'low' | 'normal' | 'high';

export function velocityBand(velocityMps: number): VelocityBand {
  if (velocityMps < LOW_LIMIT_MPS) return 'low';
  if (velocityMps > HIGH_LIMIT_MPS) return 'high';
  return 'normal';
}

const BAND_LABEL: Record<VelocityBand, string> = {
  low: '⚠️ Low – solids may settle',
  normal: '✅ Normal range',
  high: '🔴 High – erosion and noise risk',
};

const BAND_COLOR: Record<VelocityBand, string> = {
  low: '#c05621',
  normal: '#276749',
  high: '#e53e3e',
};

export default function HydraulicVelocityBar({ velocityMps, displayUnit = 'mps' }: Props) {
  const show = (mps: number) => `${convert(mps, 'mps', displayUnit, 'velocity').toFixed(2)} ${displayUnit === 'mps' ? 'm/s' : 'ft/s'}`;

  const markerPct = (Math.min(velocityMps, MAX_DISPLAY_MPS) / MAX_DISPLAY_MPS) * 100;
  const lowWidthPct = (LOW_LIMIT_MPS / MAX_DISPLAY_MPS) * 100;
  const normalWidthPct = ((HIGH_LIMIT_MPS - LOW_LIMIT_MPS) / MAX_DISPLAY_MPS) * 100;
  const highWidthPct = 100 - lowWidthPct - normalWidthPct;

  const band = velocityBand(velocityMps);
  const color = BAND_COLOR[band];

  return (
    <div style={{ margin: '12px 0 4px' }}>
      <div style={{ display: 'flex', justifyContent: 'space-between', fontSize: '0.7rem', color: '#718096', marginBottom: 2 }}>
        <span>Low</span>
        <span>Normal</span>
        <span>High</span>
      </div>

      <div style={{ position: 'relative', height: 14, borderRadius: 4, display: 'flex' }}>
        <div style={{ width: `${lowWidthPct}%`, background: '#fefcbf', borderRadius: '4px 0 0 4px' }} />
        <div style={{ width: `${normalWidthPct}%`, background: '#c6f6d5' }} />
        <div style={{ width: `${highWidthPct}%`, background: '#fed7d7', borderRadius: '0 4px 4px 0' }} />
        <div
          aria-label={`Mean velocity: ${show(velocityMps)}`}
          style={{
            position: 'absolute',
            left: `${markerPct}%`,
            top: -3,
            transform: 'translateX(-50%)',
            width: 3,
            height: 20,
            background: color,
            borderRadius: 2,
          }}
        />
      </div>

      <div style={{ position: 'relative', height: 14, fontSize: '0.65rem', color: '#718096' }}>
        <span style={{ position: 'absolute', left: `${lowWidthPct}%`, transform: 'translateX(-50%)' }}>
          {show(LOW_LIMIT_MPS)}
        </span>
        <span style={{ position: 'absolute', left: `${lowWidthPct + normalWidthPct}%`, transform: 'translateX(-50%)' }}>
          {show(HIGH_LIMIT_MPS)}
        </span>
        <span style={{ position: 'absolute', right: 0 }}>{show(MAX_DISPLAY_MPS)}</span>
      </div>

      <div style={{ marginTop: 4, fontSize: '0.78rem', color, fontWeight: 600 }}>
        ▲ {show(velocityMps)} · {BAND_LABEL[band]}
      </div>
    </div>
  );
}
