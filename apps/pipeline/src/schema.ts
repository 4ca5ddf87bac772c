export type ColumnType = 'BIGSERIAL' | 'TEXT' | 'TIMESTAMP' | 'DOUBLE PRECISION' | 'INTEGER';

export type ColumnDefinition = {
  name: string;
  type: ColumnType;
  primaryKey?: boolean;
};

export type TableSchema = {
  version: number;
  table: string;
  columns: ColumnDefinition[];
};

export const AIR_QUALITY_COLUMNS: ColumnDefinition[] = [
  { name: 'id', type: 'BIGSERIAL', primaryKey: true },
  { name: 'city', type: 'TEXT' },
  { name: 'time', type: 'TIMESTAMP' },
  { name: 'pm10', type: 'DOUBLE PRECISION' },
  { name: 'pm2_5', type: 'DOUBLE PRECISION' },
  { name: 'carbon_monoxide', type: 'DOUBLE PRECISION' },
  { name: 'nitrogen_dioxide', type: 'DOUBLE PRECISION' },
  { name: 'sulphur_dioxide', type: 'DOUBLE PRECISION' },
  { name: 'ozone', type: 'DOUBLE PRECISION' },
  { name: 'uv_index', type: 'DOUBLE PRECISION' },
  { name: 'aqi_category', type: 'TEXT' },
  { name: 'severity_score', type: 'DOUBLE PRECISION' },
  { name: 'risk_flag', type: 'TEXT' },
  { name: 'hour', type: 'INTEGER' }
];

export function airQualitySchema(table = 'air_quality_data'): TableSchema {
  return { version: 1, table, columns: AIR_QUALITY_COLUMNS };
}

export function buildCreateTableSql(schema: TableSchema): string {
  const columns = schema.columns
    .map((column) => `    ${column.name} ${column.type}${column.primaryKey ? ' PRIMARY KEY' : ''}`)
    .join(',\n');
  return `CREATE TABLE IF NOT EXISTS public.${schema.table} (\n${columns}\n);`;
}

/** Staged CSV header -> stored column. Headers not listed here keep their name. */
export const STAGED_TO_STORED_COLUMNS: Readonly<Record<string, string>> = {
  AQI_Category: 'aqi_category',
  Pollution_Severity: 'severity_score',
  Risk_Level: 'risk_flag',
  'pm2.5': 'pm2_5',
  'PM2.5': 'pm2_5',
  PM10: 'pm10',
  Carbon_Monoxide: 'carbon_monoxide',
  Nitrogen_Dioxide: 'nitrogen_dioxide',
  Sulphur_Dioxide: 'sulphur_dioxide',
  Ozone: 'ozone',
  UV_Index: 'uv_index',
  Hour: 'hour',
  City: 'city'
};
