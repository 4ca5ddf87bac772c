import { renderToStaticMarkup } from 'react-dom/server';
import type { ReactElement } from 'react';
import {
  Bar,
  BarChart,
  CartesianGrid,
  Customized,
  Line,
  LineChart,
  Scatter,
  ScatterChart,
  XAxis,
  YAxis
} from 'recharts';

import type { CityHourlySeries, HistogramBin, RiskCounts } from './analyze.js';
import { RISK_FLAGS } from './types.js';

const WIDTH = 900;
const HEIGHT = 520;
const MARGIN = { top: 48, right: 32, bottom: 40, left: 24 };
const SVG_NS = 'http://www.w3.org/2000/svg';

const PALETTE = ['#2563eb', '#dc2626', '#16a34a', '#d97706', '#7c3aed', '#0891b2', '#db2777', '#4b5563'];
const RISK_COLORS: Record<(typeof RISK_FLAGS)[number], string> = {
  'High Risk': '#dc2626',
  'Moderate Risk': '#f59e0b',
  'Low Risk': '#10b981'
};

type LegendEntry = { label: string; color: string };

function ChartTitle({ text }: { text: string }) {
  return (
    <text x={WIDTH / 2} y={24} textAnchor="middle" fontSize={18} fontWeight={600} fill="#0f172a">
      {text}
    </text>
  );
}

function ChartLegend({ entries }: { entries: LegendEntry[] }) {
  return (
    <g>
      {entries.map((entry, index) => (
        <g key={entry.label} transform={`translate(${WIDTH - 170}, ${MARGIN.top + 8 + index * 18})`}>
          <rect width={12} height={12} fill={entry.color} />
          <text x={18} y={10} fontSize={12} fill="#334155">
            {entry.label}
          </text>
        </g>
      ))}
    </g>
  );
}

/**
 * Renders a chart element to a standalone SVG document. Recharts wraps the
 * surface in a div, which is dropped here.
 */
export function toStandaloneSvg(chart: ReactElement): string {
  const markup = renderToStaticMarkup(chart);
  const start = markup.indexOf('<svg');
  const end = markup.lastIndexOf('</svg>');
  if (start === -1 || end === -1) {
    throw new Error('Chart rendering produced no SVG surface');
  }
  const svg = markup.slice(start, end + '</svg>'.length);
  const withNamespace = svg.includes('xmlns=') ? svg : svg.replace('<svg', `<svg xmlns="${SVG_NS}"`);
  return `<?xml version="1.0" encoding="UTF-8"?>\n${withNamespace}\n`;
}

export function renderHistogramSvg(bins: HistogramBin[]): string {
  const data = bins.map((bin) => ({ label: bin.start.toFixed(1), count: bin.count }));
  return toStandaloneSvg(
    <BarChart width={WIDTH} height={HEIGHT} data={data} margin={MARGIN} barCategoryGap={1}>
      <Customized component={<ChartTitle text="Histogram of PM2.5" />} />
      <CartesianGrid strokeDasharray="3 3" vertical={false} stroke="#e2e8f0" />
      <XAxis dataKey="label" label={{ value: 'PM2.5', position: 'insideBottom', offset: -24 }} />
      <YAxis allowDecimals={false} label={{ value: 'Frequency', angle: -90, position: 'insideLeft' }} />
      <Bar dataKey="count" fill={PALETTE[0]} isAnimationActive={false} />
    </BarChart>
  );
}

export function renderRiskBarSvg(counts: RiskCounts[]): string {
  return toStandaloneSvg(
    <BarChart width={WIDTH} height={HEIGHT} data={counts} margin={MARGIN}>
      <Customized component={<ChartTitle text="Risk Flags per City" />} />
      <Customized component={<ChartLegend entries={RISK_FLAGS.map((flag) => ({ label: flag, color: RISK_COLORS[flag] }))} />} />
      <CartesianGrid strokeDasharray="3 3" vertical={false} stroke="#e2e8f0" />
      <XAxis dataKey="city" label={{ value: 'City', position: 'insideBottom', offset: -24 }} />
      <YAxis allowDecimals={false} label={{ value: 'Count', angle: -90, position: 'insideLeft' }} />
      {RISK_FLAGS.map((flag) => (
        <Bar key={flag} dataKey={flag} fill={RISK_COLORS[flag]} isAnimationActive={false} />
      ))}
    </BarChart>
  );
}

export function renderHourlyTrendSvg(series: CityHourlySeries[]): string {
  const data = Array.from({ length: 24 }, (_, hour) => {
    const point: Record<string, number | null> = { hour };
    for (const entry of series) point[entry.city] = entry.hourly[hour] ?? null;
    return point;
  });
  const legend = series.map((entry, index) => ({ label: entry.city, color: PALETTE[index % PALETTE.length] ?? '#000000' }));

  return toStandaloneSvg(
    <LineChart width={WIDTH} height={HEIGHT} data={data} margin={MARGIN}>
      <Customized component={<ChartTitle text="Hourly Average PM2.5 by City (Hour of Day)" />} />
      <Customized component={<ChartLegend entries={legend} />} />
      <CartesianGrid strokeDasharray="3 3" stroke="#e2e8f0" />
      <XAxis dataKey="hour" type="number" domain={[0, 23]} tickCount={12} label={{ value: 'Hour of day', position: 'insideBottom', offset: -24 }} />
      <YAxis label={{ value: 'Avg PM2.5', angle: -90, position: 'insideLeft' }} />
      {legend.map((entry) => (
        <Line key={entry.label} type="monotone" dataKey={entry.label} stroke={entry.color} dot={false} connectNulls isAnimationActive={false} />
      ))}
    </LineChart>
  );
}

export function renderSeverityScatterSvg(points: Array<{ pm2_5: number; severity: number }>): string {
  return toStandaloneSvg(
    <ScatterChart width={WIDTH} height={HEIGHT} margin={MARGIN}>
      <Customized component={<ChartTitle text="Severity Score vs PM2.5" />} />
      <CartesianGrid strokeDasharray="3 3" stroke="#e2e8f0" />
      <XAxis dataKey="pm2_5" type="number" name="PM2.5" label={{ value: 'PM2.5', position: 'insideBottom', offset: -24 }} />
      <YAxis dataKey="severity" type="number" name="Severity Score" label={{ value: 'Severity Score', angle: -90, position: 'insideLeft' }} />
      <Scatter data={points} fill={PALETTE[0]} isAnimationActive={false} />
    </ScatterChart>
  );
}
