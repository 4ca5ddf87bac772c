import { mkdtemp } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { ensureDirectories, resolvePaths } from '../src/context.js';
import type { StoreContext } from '../src/context.js';
import type { Logger, LogLevel } from '../src/logger.js';
import { StoreError } from '../src/store.js';
import type { AirQualityStore, SchemaApplyResult } from '../src/store.js';
import type { AirQualityConfig, StoredRow } from '../src/types.js';

export function makeValidConfig(): AirQualityConfig {
  return {
    project: {
      name: 'Test Pipeline',
      dataDir: 'data',
      logDir: 'logs',
      logFile: 'pipeline.log'
    },
    source: {
      baseUrl: 'https://air.test',
      pollutants: ['pm10', 'pm2_5', 'carbon_monoxide', 'nitrogen_dioxide', 'ozone', 'sulphur_dioxide', 'uv_index'],
      timeoutSeconds: 5,
      retries: 3,
      retryDelaySeconds: 2
    },
    cities: [
      { name: 'Delhi', lat: 28.7041, lon: 77.1025 },
      { name: 'Mumbai', lat: 19.076, lon: 72.8777 }
    ],
    store: {
      table: 'air_quality_data',
      urlEnv: 'SUPABASE_URL',
      keyEnv: 'SUPABASE_KEY',
      batchSize: 200,
      retryDelaySeconds: 3,
      pageSize: 1000
    },
    analysis: {
      histogramBins: 10
    }
  };
}

export type MemoryLogger = Logger & { lines: Array<{ level: LogLevel; message: string }> };

export function createMemoryLogger(): MemoryLogger {
  const lines: MemoryLogger['lines'] = [];
  const push = (level: LogLevel) => async (message: string) => {
    lines.push({ level, message });
  };
  return { lines, info: push('INFO'), warn: push('WARNING'), error: push('ERROR') };
}

/** Store fake; `failOnCalls` lists 1-based insert call numbers that are rejected. */
export class InMemoryStore implements AirQualityStore {
  rows: StoredRow[] = [];
  insertCalls = 0;
  appliedSchemas: string[] = [];

  constructor(
    private readonly options: { schemaResult?: SchemaApplyResult; failOnCalls?: number[] } = {}
  ) {}

  async applySchema(schema: { table: string }): Promise<SchemaApplyResult> {
    this.appliedSchemas.push(schema.table);
    return this.options.schemaResult ?? { status: 'already-exists' };
  }

  async insertRows(rows: StoredRow[]): Promise<void> {
    this.insertCalls += 1;
    if (this.options.failOnCalls?.includes(this.insertCalls)) {
      throw new StoreError(`simulated outage on call ${this.insertCalls}`);
    }
    const offset = this.rows.length;
    this.rows.push(...rows.map((row, index) => ({ ...row, id: offset + index + 1 })));
  }

  async selectAll(): Promise<StoredRow[]> {
    return [...this.rows];
  }
}

/** Store whose create call throws instead of reporting a result. */
export class SchemaFailingStore extends InMemoryStore {
  override async applySchema(schema: { table: string }): Promise<SchemaApplyResult> {
    this.appliedSchemas.push(schema.table);
    throw new StoreError('connection refused');
  }
}

/** Store that accepts inserts but cannot be read back. */
export class UnreadableStore extends InMemoryStore {
  override async selectAll(): Promise<StoredRow[]> {
    throw new StoreError('Select from air_quality_data failed: permission denied for table air_quality_data');
  }
}

export function makeRow(overrides: Partial<StoredRow> & { city: string }): StoredRow {
  return {
    time: '2024-01-01T00:00:00',
    pm10: null,
    pm2_5: null,
    carbon_monoxide: null,
    nitrogen_dioxide: null,
    sulphur_dioxide: null,
    ozone: null,
    uv_index: null,
    aqi_category: null,
    severity_score: null,
    risk_flag: null,
    hour: null,
    ...overrides
  };
}

export type TestContext = StoreContext & { logger: MemoryLogger; sleeps: number[]; store: InMemoryStore };

export async function makeTestContext(
  options: { config?: AirQualityConfig; store?: InMemoryStore; now?: Date } = {}
): Promise<TestContext> {
  const rootDir = await mkdtemp(path.join(os.tmpdir(), 'air-quality-'));
  const config = options.config ?? makeValidConfig();
  const paths = resolvePaths(config, rootDir);
  await ensureDirectories(paths);
  const sleeps: number[] = [];
  const now = options.now ?? new Date(2024, 0, 2, 9, 30, 0);
  return {
    config,
    paths,
    logger: createMemoryLogger(),
    sleep: async (ms) => {
      sleeps.push(ms);
    },
    now: () => now,
    store: options.store ?? new InMemoryStore(),
    sleeps
  };
}
