import { writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { PipelineContext } from './context.js';
import { hourlySection } from './normalize.js';
import { fetchAirQuality } from './sources.js';
import type { CityConfig, ExtractResult, RawAirQualityResponse } from './types.js';

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** Local wall-clock stamp, e.g. `20240101_093000`. */
export function formatRunTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

export function rawFileName(city: string, timestamp: string, attempt = 0): string {
  const suffix = attempt === 0 ? '' : `_${attempt}`;
  return `${city.toLowerCase()}_raw_${timestamp}${suffix}.json`;
}

function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

/** Writes `data` under a fresh name; an existing raw file is never replaced. */
async function writeRawFile(rawDir: string, city: string, timestamp: string, data: RawAirQualityResponse): Promise<string> {
  const body = `${JSON.stringify(data, null, 2)}\n`;
  for (let attempt = 0; ; attempt++) {
    const filePath = path.join(rawDir, rawFileName(city, timestamp, attempt));
    try {
      await writeFile(filePath, body, { encoding: 'utf8', flag: 'wx' });
      return filePath;
    } catch (error) {
      if (!hasErrorCode(error, 'EEXIST')) throw error;
    }
  }
}

export async function fetchCityWithRetry(context: PipelineContext, city: CityConfig): Promise<RawAirQualityResponse | null> {
  const { config, logger, sleep } = context;
  const { retries, retryDelaySeconds } = config.source;

  for (let attempt = 1; attempt <= retries; attempt++) {
    try {
      await logger.info(`Requesting ${city.name} air quality (attempt ${attempt}/${retries})`);
      const data = await fetchAirQuality(config, city);
      if (!hourlySection(data)) {
        await logger.warn(`Empty response for ${city.name}`);
      }
      await logger.info(`SUCCESS - Fetched data for ${city.name}`);
      return data;
    } catch (error) {
      await logger.error(`ERROR - Failed to fetch ${city.name} | Attempt ${attempt} | Error: ${(error as Error).message}`);
      if (attempt < retries) {
        await logger.warn(`Attempt ${attempt} failed for ${city.name}. Retrying in ${retryDelaySeconds}s...`);
        await sleep(retryDelaySeconds * 1000);
      }
    }
  }

  await logger.error(`FAILED - ${city.name} data not fetched after ${retries} attempts.`);
  return null;
}

export async function extractAll(context: PipelineContext): Promise<ExtractResult> {
  const { config, logger, paths } = context;
  const savedFiles: string[] = [];
  const failedCities: string[] = [];

  await logger.info(`Starting air quality extraction for ${config.cities.length} cities`);
  for (const city of config.cities) {
    const data = await fetchCityWithRetry(context, city);
    if (!data) {
      failedCities.push(city.name);
      continue;
    }
    const filePath = await writeRawFile(paths.rawDir, city.name, formatRunTimestamp(context.now()), data);
    await logger.info(`Saved file: ${filePath}`);
    savedFiles.push(filePath);
  }

  await logger.info(`Extraction completed: ${savedFiles.length} saved, ${failedCities.length} failed`);
  return { savedFiles, failedCities };
}
