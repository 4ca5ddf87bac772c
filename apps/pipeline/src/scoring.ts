import type { AqiCategory, HourlyReading, PollutantValues, RiskFlag, StagedRecord } from './types.js';

/** PM2.5 step bands; boundaries belong to the lower band. A missing reading counts as 0. */
export function aqiCategory(pm25: number | null): AqiCategory {
  const value = pm25 ?? 0;
  if (value <= 50) return 'Good';
  if (value <= 100) return 'Moderate';
  if (value <= 200) return 'Unhealthy';
  if (value <= 300) return 'Very Unhealthy';
  return 'Hazardous';
}

/** Weighted pollution burden; missing pollutants contribute 0 and UV index is not weighted. */
export function severityScore(values: PollutantValues): number {
  return (
    (values.pm2_5 ?? 0) * 5 +
    (values.pm10 ?? 0) * 3 +
    (values.nitrogen_dioxide ?? 0) * 4 +
    (values.sulphur_dioxide ?? 0) * 4 +
    (values.carbon_monoxide ?? 0) * 2 +
    (values.ozone ?? 0) * 3
  );
}

export function riskFlag(severity: number): RiskFlag {
  if (severity > 400) return 'High Risk';
  if (severity > 200) return 'Moderate Risk';
  return 'Low Risk';
}

const CLOCK_HOUR = /^\d{4}-\d{2}-\d{2}[T ](\d{2})/;

export function hourOfDay(time: string): number | null {
  const match = CLOCK_HOUR.exec(time.trim());
  if (match?.[1]) return Number(match[1]);
  const parsed = new Date(time);
  return Number.isNaN(parsed.getTime()) ? null : parsed.getUTCHours();
}

export function deriveRecord(reading: HourlyReading): StagedRecord {
  const severity = severityScore(reading);
  return {
    ...reading,
    aqiCategory: aqiCategory(reading.pm2_5),
    severityScore: severity,
    riskFlag: riskFlag(severity),
    hour: hourOfDay(reading.time)
  };
}
