import { readdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { PipelineContext } from './context.js';
import { toCsv } from './csv.js';
import { cityFromRawFileName, flattenHourly, hasAnyPollutant, isAirQualityResponse, isRawFileName } from './normalize.js';
import { deriveRecord } from './scoring.js';
import type { HourlyReading, RawAirQualityResponse, StagedRecord, TransformResult } from './types.js';

export const STAGED_HEADER = [
  'city',
  'time',
  'pm10',
  'pm2_5',
  'carbon_monoxide',
  'nitrogen_dioxide',
  'sulphur_dioxide',
  'ozone',
  'uv_index',
  'AQI_Category',
  'Pollution_Severity',
  'Risk_Level',
  'hour'
] as const;

export type StagedCsvRow = Record<(typeof STAGED_HEADER)[number], string | number | null>;

export function stagedRow(record: StagedRecord): StagedCsvRow {
  return {
    city: record.city,
    time: record.time,
    pm10: record.pm10,
    pm2_5: record.pm2_5,
    carbon_monoxide: record.carbon_monoxide,
    nitrogen_dioxide: record.nitrogen_dioxide,
    sulphur_dioxide: record.sulphur_dioxide,
    ozone: record.ozone,
    uv_index: record.uv_index,
    AQI_Category: record.aqiCategory,
    Pollution_Severity: record.severityScore,
    Risk_Level: record.riskFlag,
    hour: record.hour
  };
}

/** Every raw file ever extracted, oldest name first; reprocessed in full on each run. */
export async function listRawFiles(rawDir: string): Promise<string[]> {
  const entries = await readdir(rawDir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && isRawFileName(entry.name))
    .map((entry) => entry.name)
    .sort()
    .map((name) => path.join(rawDir, name));
}

/** Drops readings with no pollutant at all and derives category, severity, risk and hour. */
export function buildStagedRecords(readings: HourlyReading[]): { records: StagedRecord[]; droppedRows: number } {
  const kept = readings.filter(hasAnyPollutant);
  return { records: kept.map(deriveRecord), droppedRows: readings.length - kept.length };
}

async function readRawFile(filePath: string): Promise<RawAirQualityResponse> {
  const parsed: unknown = JSON.parse(await readFile(filePath, 'utf8'));
  if (!isAirQualityResponse(parsed)) {
    throw new Error('expected a JSON object');
  }
  return parsed;
}

export async function transformAll(context: PipelineContext): Promise<TransformResult> {
  const { logger, paths } = context;
  const files = await listRawFiles(paths.rawDir);
  const readings: HourlyReading[] = [];
  let filesRead = 0;

  for (const filePath of files) {
    const city = cityFromRawFileName(path.basename(filePath));
    if (!city) continue;
    let raw: RawAirQualityResponse;
    try {
      raw = await readRawFile(filePath);
    } catch (error) {
      await logger.warn(`Skipping unreadable raw file ${filePath}: ${(error as Error).message}`);
      continue;
    }
    filesRead += 1;
    readings.push(...flattenHourly(raw, city));
  }

  const { records, droppedRows } = buildStagedRecords(readings);
  await writeFile(paths.stagedFile, toCsv(STAGED_HEADER, records.map(stagedRow)), 'utf8');
  await logger.info(
    `Transformed ${records.length} rows from ${filesRead} raw files (${droppedRows} empty rows dropped) -> ${paths.stagedFile}`
  );
  return { records, outputPath: paths.stagedFile, filesRead, droppedRows };
}
