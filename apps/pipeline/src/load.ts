import { readFile } from 'node:fs/promises';

import type { Sleep, StoreContext } from './context.js';
import { parseCsv } from './csv.js';
import type { CsvRow } from './csv.js';
import type { Logger } from './logger.js';
import { toNumberOrNull } from './normalize.js';
import { airQualitySchema, buildCreateTableSql, STAGED_TO_STORED_COLUMNS } from './schema.js';
import type { TableSchema } from './schema.js';
import type { AirQualityStore, SchemaApplyResult } from './store.js';
import type { LoadReport, StoredRow } from './types.js';

const TIMESTAMP_PARTS = /^(\d{4}-\d{2}-\d{2})[T ](\d{2}):(\d{2})(?::(\d{2}))?/;

/** `2024-01-01T05:00` and `2024-01-01 05:00:00` both become `2024-01-01T05:00:00`. */
export function canonicalTimestamp(text: string): string | null {
  const trimmed = text.trim();
  if (trimmed === '') return null;
  const match = TIMESTAMP_PARTS.exec(trimmed);
  if (match) {
    const [, date, hours, minutes, seconds] = match;
    return `${date}T${hours}:${minutes}:${seconds ?? '00'}`;
  }
  const parsed = new Date(trimmed);
  return Number.isNaN(parsed.getTime()) ? null : parsed.toISOString().slice(0, 19);
}

export function renameColumns(row: CsvRow): CsvRow {
  const renamed: CsvRow = {};
  for (const [name, value] of Object.entries(row)) {
    renamed[STAGED_TO_STORED_COLUMNS[name] ?? name] = value;
  }
  return renamed;
}

function textOrNull(value: string | undefined): string | null {
  return value == null || value.trim() === '' ? null : value;
}

function numberOrNull(value: string | undefined): number | null {
  return textOrNull(value) == null ? null : toNumberOrNull(value);
}

export function toStoredRow(row: CsvRow): StoredRow {
  const renamed = renameColumns(row);
  const hour = numberOrNull(renamed.hour);
  return {
    city: renamed.city ?? '',
    time: canonicalTimestamp(renamed.time ?? ''),
    pm10: numberOrNull(renamed.pm10),
    pm2_5: numberOrNull(renamed.pm2_5),
    carbon_monoxide: numberOrNull(renamed.carbon_monoxide),
    nitrogen_dioxide: numberOrNull(renamed.nitrogen_dioxide),
    sulphur_dioxide: numberOrNull(renamed.sulphur_dioxide),
    ozone: numberOrNull(renamed.ozone),
    uv_index: numberOrNull(renamed.uv_index),
    aqi_category: textOrNull(renamed.aqi_category),
    severity_score: numberOrNull(renamed.severity_score),
    risk_flag: textOrNull(renamed.risk_flag),
    hour: hour == null ? null : Math.trunc(hour)
  };
}

export async function readStagedRows(stagedPath: string): Promise<StoredRow[]> {
  let content: string;
  try {
    content = await readFile(stagedPath, 'utf8');
  } catch (error) {
    throw new Error(`No staged file found at ${stagedPath}. Run the transform stage first. (${(error as Error).message})`);
  }
  return parseCsv(content).rows.map(toStoredRow);
}

/** Splits `items` into consecutive batches of at most `size`, preserving order. */
export function chunk<T>(items: T[], size: number): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new Error(`Batch size must be a positive integer, got ${size}`);
  }
  const batches: T[][] = [];
  for (let start = 0; start < items.length; start += size) {
    batches.push(items.slice(start, start + size));
  }
  return batches;
}

/**
 * Best-effort table creation. A create the store cannot perform, or a store that
 * throws while trying, is reported with its DDL for manual application; loading
 * continues either way.
 */
export async function ensureTable(store: AirQualityStore, logger: Logger, schema: TableSchema): Promise<SchemaApplyResult> {
  await logger.info(`Ensuring table ${schema.table} (schema v${schema.version})`);
  let result: SchemaApplyResult;
  try {
    result = await store.applySchema(schema);
  } catch (error) {
    result = { status: 'requires-manual-step', sql: buildCreateTableSql(schema), reason: (error as Error).message };
  }
  if (result.status === 'applied') {
    await logger.info(`Table ${schema.table} created`);
  } else if (result.status === 'already-exists') {
    await logger.info(`Table ${schema.table} already exists`);
  } else {
    await logger.warn(`Table create failed: ${result.reason}`);
    await logger.warn(`Run this SQL manually in the database SQL editor:\n\n${result.sql}\n`);
  }
  return result;
}

export type LoadOptions = {
  batchSize: number;
  retryDelayMs: number;
  logger: Logger;
  sleep: Sleep;
};

/** Inserts batch by batch; each failed batch is retried once and then skipped. Not atomic. */
export async function loadRows(store: AirQualityStore, rows: StoredRow[], options: LoadOptions): Promise<LoadReport> {
  const { batchSize, retryDelayMs, logger, sleep } = options;
  const batches = chunk(rows, batchSize);
  const report: LoadReport = { totalRows: rows.length, batchCount: batches.length, insertedRows: 0, failedBatches: [] };
  await logger.info(`Loading ${rows.length} rows (batch size = ${batchSize})`);

  for (const [index, batch] of batches.entries()) {
    const batchNumber = index + 1;
    try {
      await store.insertRows(batch);
      report.insertedRows += batch.length;
      await logger.info(`Inserted batch ${batchNumber}`);
      continue;
    } catch (error) {
      await logger.warn(`Insert failed in batch ${batchNumber}: ${(error as Error).message}`);
    }

    await logger.info(`Retrying batch ${batchNumber} in ${retryDelayMs / 1000} seconds...`);
    await sleep(retryDelayMs);
    try {
      await store.insertRows(batch);
      report.insertedRows += batch.length;
      await logger.info(`Retry success for batch ${batchNumber}`);
    } catch (error) {
      report.failedBatches.push(batchNumber);
      await logger.error(`Retry failed for batch ${batchNumber}: ${(error as Error).message}`);
    }
  }

  await logger.info(`Load complete: ${report.insertedRows}/${report.totalRows} rows inserted, ${report.failedBatches.length} batches failed`);
  return report;
}

export async function loadStaged(context: StoreContext): Promise<LoadReport> {
  const { config, logger, paths, sleep, store } = context;
  await ensureTable(store, logger, airQualitySchema(config.store.table));
  const rows = await readStagedRows(paths.stagedFile);
  return loadRows(store, rows, {
    batchSize: config.store.batchSize,
    retryDelayMs: config.store.retryDelaySeconds * 1000,
    logger,
    sleep
  });
}
