import { writeFile } from 'node:fs/promises';
import path from 'node:path';

import { renderHistogramSvg, renderHourlyTrendSvg, renderRiskBarSvg, renderSeverityScatterSvg } from './charts.js';
import type { StoreContext } from './context.js';
import { toCsv } from './csv.js';
import { hourOfDay } from './scoring.js';
import { RISK_FLAGS } from './types.js';
import type { AnalysisResult, CityRiskDistribution, KpiSummary, RiskFlag, StoredRow, TrendPoint } from './types.js';

export const SUMMARY_FILE = 'summary_metrics.csv';
export const RISK_DISTRIBUTION_FILE = 'city_risk_distribution.csv';
export const TRENDS_FILE = 'pollution_trends.csv';
export const CHART_FILES = {
  histogram: 'hist_pm2_5.svg',
  riskBar: 'bar_risk_per_city.svg',
  hourlyTrend: 'line_hourly_pm2_5_trends.svg',
  scatter: 'scatter_severity_vs_pm2_5.svg'
} as const;

const KPI_HEADER = [
  'city_highest_avg_pm2_5',
  'highest_avg_pm2_5_value',
  'city_highest_severity',
  'highest_severity_value',
  'pct_high_risk',
  'pct_moderate_risk',
  'pct_low_risk',
  'worst_aqi_hour',
  'worst_aqi_hour_avg_pm2_5'
] as const satisfies ReadonlyArray<keyof KpiSummary>;

export type HistogramBin = { start: number; end: number; count: number };

export type CityHourlySeries = { city: string; hourly: Array<number | null> };

export type RiskCounts = { city: string } & Record<RiskFlag, number>;

export function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function isRiskFlag(value: string | null): value is RiskFlag {
  return RISK_FLAGS.some((flag) => flag === value);
}

/** Mean of the non-null values per group; groups with no values are left out. */
export function groupMeans<K>(rows: StoredRow[], keyOf: (row: StoredRow) => K | null, valueOf: (row: StoredRow) => number | null): Map<K, number> {
  const sums = new Map<K, { total: number; count: number }>();
  for (const row of rows) {
    const key = keyOf(row);
    const value = valueOf(row);
    if (key == null || value == null) continue;
    const entry = sums.get(key) ?? { total: 0, count: 0 };
    entry.total += value;
    entry.count += 1;
    sums.set(key, entry);
  }
  return new Map([...sums].map(([key, { total, count }]): [K, number] => [key, total / count]));
}

/** Highest value; ties go to the key that sorts first under `compare`. */
export function argmax<K>(means: Map<K, number>, compare: (a: K, b: K) => number): { key: K; value: number } | null {
  let best: { key: K; value: number } | null = null;
  for (const key of [...means.keys()].sort(compare)) {
    const value = means.get(key);
    if (value === undefined) continue;
    if (!best || value > best.value) best = { key, value };
  }
  return best;
}

export function rowHour(row: StoredRow): number | null {
  if (row.hour != null) return row.hour;
  return row.time == null ? null : hourOfDay(row.time);
}

function percentage(count: number, total: number): number {
  return total > 0 ? (count / total) * 100 : 0;
}

export function computeKpis(rows: StoredRow[]): KpiSummary {
  const topPm25 = argmax(groupMeans(rows, (row) => row.city, (row) => row.pm2_5), compareText);
  const topSeverity = argmax(groupMeans(rows, (row) => row.city, (row) => row.severity_score), compareText);
  const worstHour = argmax(groupMeans(rows, rowHour, (row) => row.pm2_5), (a, b) => a - b);

  const flagged = rows.filter((row) => row.risk_flag != null);
  const share = (flag: RiskFlag) => percentage(flagged.filter((row) => row.risk_flag === flag).length, flagged.length);

  return {
    city_highest_avg_pm2_5: topPm25?.key ?? null,
    highest_avg_pm2_5_value: topPm25?.value ?? null,
    city_highest_severity: topSeverity?.key ?? null,
    highest_severity_value: topSeverity?.value ?? null,
    pct_high_risk: share('High Risk'),
    pct_moderate_risk: share('Moderate Risk'),
    pct_low_risk: share('Low Risk'),
    worst_aqi_hour: worstHour?.key ?? null,
    worst_aqi_hour_avg_pm2_5: worstHour?.value ?? null
  };
}

export function riskCountsByCity(rows: StoredRow[]): Array<RiskCounts & { total: number }> {
  const byCity = new Map<string, RiskCounts & { total: number }>();
  for (const row of rows) {
    if (row.risk_flag == null) continue;
    const entry = byCity.get(row.city) ?? { city: row.city, 'High Risk': 0, 'Moderate Risk': 0, 'Low Risk': 0, total: 0 };
    if (isRiskFlag(row.risk_flag)) entry[row.risk_flag] += 1;
    entry.total += 1;
    byCity.set(row.city, entry);
  }
  return [...byCity.values()].sort((a, b) => compareText(a.city, b.city));
}

export function cityRiskDistribution(rows: StoredRow[]): CityRiskDistribution[] {
  return riskCountsByCity(rows).map((counts) => ({
    city: counts.city,
    'High Risk': percentage(counts['High Risk'], counts.total),
    'Moderate Risk': percentage(counts['Moderate Risk'], counts.total),
    'Low Risk': percentage(counts['Low Risk'], counts.total)
  }));
}

/** Long-form trends ordered by city then time; rows without a time sort last within their city. */
export function pollutionTrends(rows: StoredRow[]): TrendPoint[] {
  return rows
    .map((row) => ({ city: row.city, time: row.time, pm2_5: row.pm2_5, pm10: row.pm10, ozone: row.ozone }))
    .sort((a, b) => {
      const byCity = compareText(a.city, b.city);
      if (byCity !== 0) return byCity;
      if (a.time == null || b.time == null) return a.time == null ? (b.time == null ? 0 : 1) : -1;
      return compareText(a.time, b.time);
    });
}

export function hourlyAverageByCity(rows: StoredRow[]): CityHourlySeries[] {
  const cities = [...new Set(rows.map((row) => row.city))].sort(compareText);
  return cities.map((city) => {
    const means = groupMeans(rows.filter((row) => row.city === city), rowHour, (row) => row.pm2_5);
    return { city, hourly: Array.from({ length: 24 }, (_, hour) => means.get(hour) ?? null) };
  });
}

/** Equal-width bins over [min, max]; a single distinct value gets the range [v - 0.5, v + 0.5]. */
export function histogram(values: number[], bins: number): HistogramBin[] {
  if (values.length === 0 || bins < 1) return [];
  let min = values.reduce((low, value) => Math.min(low, value), Infinity);
  let max = values.reduce((high, value) => Math.max(high, value), -Infinity);
  if (min === max) {
    min -= 0.5;
    max += 0.5;
  }
  const width = (max - min) / bins;
  const result = Array.from({ length: bins }, (_, index) => ({
    start: min + index * width,
    end: index === bins - 1 ? max : min + (index + 1) * width,
    count: 0
  }));
  for (const value of values) {
    const index = Math.min(bins - 1, Math.floor((value - min) / width));
    const bin = result[index];
    if (bin) bin.count += 1;
  }
  return result;
}

export function severityVsPm25(rows: StoredRow[]): Array<{ pm2_5: number; severity: number }> {
  const points: Array<{ pm2_5: number; severity: number }> = [];
  for (const row of rows) {
    if (row.pm2_5 != null && row.severity_score != null) {
      points.push({ pm2_5: row.pm2_5, severity: row.severity_score });
    }
  }
  return points;
}

export async function analyzeStore(context: StoreContext): Promise<AnalysisResult | null> {
  const { config, logger, paths, store } = context;
  await logger.info(`Fetching rows from ${config.store.table}...`);
  const rows = await store.selectAll();
  if (rows.length === 0) {
    await logger.warn(`No data found in ${config.store.table}. Nothing to analyze.`);
    return null;
  }

  const summary = computeKpis(rows);
  const riskDistribution = cityRiskDistribution(rows);
  const trends = pollutionTrends(rows);

  const outputs: Array<[string, string]> = [
    [SUMMARY_FILE, toCsv(KPI_HEADER, [summary])],
    [RISK_DISTRIBUTION_FILE, toCsv(['city', ...RISK_FLAGS], riskDistribution)],
    [TRENDS_FILE, toCsv(['city', 'time', 'pm2_5', 'pm10', 'ozone'], trends)],
    [
      CHART_FILES.histogram,
      renderHistogramSvg(histogram(rows.flatMap((row) => (row.pm2_5 == null ? [] : [row.pm2_5])), config.analysis.histogramBins))
    ],
    [CHART_FILES.riskBar, renderRiskBarSvg(riskCountsByCity(rows))],
    [CHART_FILES.hourlyTrend, renderHourlyTrendSvg(hourlyAverageByCity(rows))],
    [CHART_FILES.scatter, renderSeverityScatterSvg(severityVsPm25(rows))]
  ];

  const files: string[] = [];
  for (const [name, content] of outputs) {
    const filePath = path.join(paths.processedDir, name);
    await writeFile(filePath, content, 'utf8');
    files.push(filePath);
  }

  await logger.info(`Analysis complete: ${rows.length} rows, files written to ${paths.processedDir}`);
  return { summary, riskDistribution, trends, files };
}
