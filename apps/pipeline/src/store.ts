import { createClient } from '@supabase/supabase-js';
import type { SupabaseClient } from '@supabase/supabase-js';

import { toNumberOrNull } from './normalize.js';
import { buildCreateTableSql } from './schema.js';
import type { TableSchema } from './schema.js';
import type { StoreCredentials, StoredRow } from './types.js';

export type SchemaApplyResult =
  | { status: 'applied' }
  | { status: 'already-exists' }
  | { status: 'requires-manual-step'; sql: string; reason: string };

/** Storage collaborator used by the load and analyze stages. */
export interface AirQualityStore {
  applySchema(schema: TableSchema): Promise<SchemaApplyResult>;
  /** Inserts one batch; throws {@link StoreError} when the store rejects it. */
  insertRows(rows: StoredRow[]): Promise<void>;
  selectAll(): Promise<StoredRow[]>;
}

export class StoreError extends Error {
  constructor(message: string, readonly code: string | null = null) {
    super(message);
    this.name = 'StoreError';
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringOrNull(value: unknown): string | null {
  return typeof value === 'string' ? value : null;
}

/** Narrows one row returned by the store; rows without a city are rejected. */
export function parseStoredRow(value: unknown): StoredRow | null {
  if (!isRecord(value) || typeof value.city !== 'string') return null;
  const id = toNumberOrNull(value.id);
  const hour = toNumberOrNull(value.hour);
  return {
    ...(id == null ? {} : { id }),
    city: value.city,
    time: stringOrNull(value.time),
    pm10: toNumberOrNull(value.pm10),
    pm2_5: toNumberOrNull(value.pm2_5),
    carbon_monoxide: toNumberOrNull(value.carbon_monoxide),
    nitrogen_dioxide: toNumberOrNull(value.nitrogen_dioxide),
    sulphur_dioxide: toNumberOrNull(value.sulphur_dioxide),
    ozone: toNumberOrNull(value.ozone),
    uv_index: toNumberOrNull(value.uv_index),
    aqi_category: stringOrNull(value.aqi_category),
    severity_score: toNumberOrNull(value.severity_score),
    risk_flag: stringOrNull(value.risk_flag),
    hour: hour == null ? null : Math.trunc(hour)
  };
}

export type SupabaseStoreOptions = {
  table: string;
  pageSize: number;
  /** Database function that executes a DDL string; must be created out-of-band. */
  sqlFunction?: string;
};

export class SupabaseAirQualityStore implements AirQualityStore {
  private readonly sqlFunction: string;

  constructor(
    private readonly client: SupabaseClient,
    private readonly options: SupabaseStoreOptions
  ) {
    this.sqlFunction = options.sqlFunction ?? 'execute_sql';
  }

  async applySchema(schema: TableSchema): Promise<SchemaApplyResult> {
    const probe = await this.client.from(schema.table).select('id').limit(1);
    if (!probe.error) return { status: 'already-exists' };

    const sql = buildCreateTableSql(schema);
    const { error } = await this.client.rpc(this.sqlFunction, { query: sql });
    if (error) {
      return { status: 'requires-manual-step', sql, reason: error.message };
    }
    return { status: 'applied' };
  }

  async insertRows(rows: StoredRow[]): Promise<void> {
    const { error } = await this.client.from(this.options.table).insert(rows);
    if (error) {
      throw new StoreError(error.message, error.code || null);
    }
  }

  async selectAll(): Promise<StoredRow[]> {
    const rows: StoredRow[] = [];
    const { pageSize, table } = this.options;
    for (let from = 0; ; ) {
      const { data, error } = await this.client
        .from(table)
        .select('*')
        .order('id', { ascending: true })
        .range(from, from + pageSize - 1);
      if (error) {
        throw new StoreError(`Select from ${table} failed: ${error.message}`, error.code || null);
      }

      const page: unknown[] = data ?? [];
      if (page.length === 0) return rows;
      for (const item of page) {
        const row = parseStoredRow(item);
        if (row) rows.push(row);
      }
      // The server may cap a page below pageSize; advance by what actually came back.
      from += page.length;
    }
  }
}

export function createSupabaseStore(credentials: StoreCredentials, options: SupabaseStoreOptions): SupabaseAirQualityStore {
  const client = createClient(credentials.url, credentials.key, {
    auth: { persistSession: false, autoRefreshToken: false }
  });
  return new SupabaseAirQualityStore(client, options);
}
