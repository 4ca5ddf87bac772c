import { isAirQualityResponse } from './normalize.js';
import type { AirQualityConfig, CityConfig, RawAirQualityResponse } from './types.js';

export function buildAirQualityUrl(config: AirQualityConfig, city: CityConfig): URL {
  const url = new URL('/v1/air-quality', config.source.baseUrl);
  url.searchParams.set('latitude', String(city.lat));
  url.searchParams.set('longitude', String(city.lon));
  url.searchParams.set('hourly', config.source.pollutants.join(','));
  if (config.source.timezone) url.searchParams.set('timezone', config.source.timezone);
  return url;
}

async function fetchJson(url: URL, init?: RequestInit): Promise<unknown> {
  const response = await fetch(url, init);
  if (!response.ok) {
    throw new Error(`HTTP ${response.status} for ${url.toString()}`);
  }
  return response.json();
}

export async function fetchAirQuality(config: AirQualityConfig, city: CityConfig): Promise<RawAirQualityResponse> {
  const url = buildAirQualityUrl(config, city);
  const body = await fetchJson(url, { signal: AbortSignal.timeout(config.source.timeoutSeconds * 1000) });
  if (!isAirQualityResponse(body)) {
    throw new Error(`Unexpected response body for ${url.toString()}: expected a JSON object`);
  }
  return body;
}
