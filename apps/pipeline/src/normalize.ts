import { POLLUTANTS } from './types.js';
import type { HourlyReading, PollutantValues, RawAirQualityResponse } from './types.js';

const RAW_FILE_PATTERN = /^(.+)_raw_.+\.json$/;

export function isRawFileName(fileName: string): boolean {
  return RAW_FILE_PATTERN.test(fileName);
}

/** `delhi_raw_20240101_000000.json` -> `Delhi` */
export function cityFromRawFileName(fileName: string): string | null {
  const match = RAW_FILE_PATTERN.exec(fileName);
  const prefix = match?.[1];
  if (!prefix) return null;
  return prefix.charAt(0).toUpperCase() + prefix.slice(1).toLowerCase();
}

export function toNumberOrNull(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Any JSON object is a response; a missing or malformed `hourly` just yields no readings. */
export function isAirQualityResponse(value: unknown): value is RawAirQualityResponse {
  return isRecord(value);
}

/** The `hourly` section when it is an object with at least one series, else `null`. */
export function hourlySection(raw: RawAirQualityResponse): Record<string, unknown> | null {
  const hourly = raw.hourly;
  if (!isRecord(hourly) || Object.keys(hourly).length === 0) return null;
  return hourly;
}

function valueAt(series: unknown, index: number): number | null {
  if (!Array.isArray(series) || index >= series.length) return null;
  return toNumberOrNull(series[index]);
}

function pollutantsAt(hourly: Record<string, unknown>, index: number): PollutantValues {
  return {
    pm10: valueAt(hourly.pm10, index),
    pm2_5: valueAt(hourly.pm2_5, index),
    carbon_monoxide: valueAt(hourly.carbon_monoxide, index),
    nitrogen_dioxide: valueAt(hourly.nitrogen_dioxide, index),
    sulphur_dioxide: valueAt(hourly.sulphur_dioxide, index),
    ozone: valueAt(hourly.ozone, index),
    uv_index: valueAt(hourly.uv_index, index)
  };
}

export function flattenHourly(raw: RawAirQualityResponse, city: string): HourlyReading[] {
  const hourly = hourlySection(raw);
  if (!hourly || !Array.isArray(hourly.time)) return [];

  const times: unknown[] = hourly.time;
  return times.map((time, index) => ({ city, time: String(time), ...pollutantsAt(hourly, index) }));
}

export function hasAnyPollutant(values: PollutantValues): boolean {
  return POLLUTANTS.some((pollutant) => values[pollutant] != null);
}
