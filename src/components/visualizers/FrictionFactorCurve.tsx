/**
 * FrictionFactorCurve
 *
 * Moody-chart line of Darcy friction factor against Reynolds number for the
 * current relative roughness, with the laminar/turbulent band edges and the
 * operating point marked.
 */

import {
  LineChart,
  Line,
  XAxis,
  YAxis,
  CartesianGrid,
  Tooltip,
  ResponsiveContainer,
  ReferenceLine,
  ReferenceDot,
} from 'recharts';
import {
  LAMINAR_UPPER_RE,
  TURBULENT_LOWER_RE,
  sampleFrictionCurve,
} from '../../engine/modules/FrictionFactorModule';

interface Props {
  relativeRoughness: number;
  /** Operating point to mark; omitted at zero flow. */
  reynoldsNumber?: number;
  frictionFactor?: number;
}

const RE_MIN = 500;
const RE_MAX = 1e8;

function formatRe(re: number): string {
  return re >= 1e4 ? re.toExponential(0) : re.toFixed(0);
}

export default function FrictionFactorCurve({ relativeRoughness, reynoldsNumber, frictionFactor }: Props) {
  const data = sampleFrictionCurve(relativeRoughness, RE_MIN, RE_MAX, 80).map(point => ({
    re: point.reynoldsNumber,
    f: Number(point.frictionFactor.toFixed(5)),
  }));

  const showPoint = reynoldsNumber !== undefined && frictionFactor !== undefined
    && reynoldsNumber >= RE_MIN && reynoldsNumber <= RE_MAX;

  return (
    <ResponsiveContainer width="100%" height={260}>
      <LineChart data={data} margin={{ top: 10, right: 20, left: 0, bottom: 10 }}>
        <CartesianGrid strokeDasharray="3 3" stroke="#f0f0f0" />
        <XAxis
          dataKey="re"
          type="number"
          scale="log"
          domain={[RE_MIN, RE_MAX]}
          tickFormatter={formatRe}
          tick={{ fontSize: 10 }}
          label={{ value: 'Reynolds number', position: 'insideBottom', offset: -4, fontSize: 11 }}
        />
        <YAxis
          dataKey="f"
          scale="log"
          domain={['auto', 'auto']}
          tick={{ fontSize: 10 }}
          label={{ value: 'f (Darcy)', angle: -90, position: 'insideLeft', fontSize: 11 }}
        />
        <Tooltip
          contentStyle={{ fontSize: '0.85rem', borderRadius: '8px' }}
          labelFormatter={(label: number) => `Re ${formatRe(label)}`}
        />
        <ReferenceLine x={LAMINAR_UPPER_RE} stroke="#a0aec0" strokeDasharray="4 4" />
        <ReferenceLine
          x={TURBULENT_LOWER_RE}
          stroke="#a0aec0"
          strokeDasharray="4 4"
          label={{ value: 'transitional', fontSize: 10, fill: '#718096' }}
        />
        <Line type="monotone" dataKey="f" stroke="#3182ce" strokeWidth={2.5} dot={false} />
        {showPoint && (
          <ReferenceDot x={reynoldsNumber} y={frictionFactor} r={5} fill="#e53e3e" stroke="white" />
        )}
      </LineChart>
    </ResponsiveContainer>
  );
}
