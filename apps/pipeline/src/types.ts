export const POLLUTANTS = [
  'pm10',
  'pm2_5',
  'carbon_monoxide',
  'nitrogen_dioxide',
  'sulphur_dioxide',
  'ozone',
  'uv_index'
] as const;

export type Pollutant = (typeof POLLUTANTS)[number];

export const RISK_FLAGS = ['High Risk', 'Moderate Risk', 'Low Risk'] as const;

export type RiskFlag = (typeof RISK_FLAGS)[number];

export type AqiCategory = 'Good' | 'Moderate' | 'Unhealthy' | 'Very Unhealthy' | 'Hazardous';

export type CityConfig = {
  name: string;
  lat: number;
  lon: number;
};

export type AirQualityConfig = {
  project: {
    name: string;
    dataDir: string;
    logDir: string;
    logFile: string;
  };
  source: {
    baseUrl: string;
    pollutants: Pollutant[];
    timezone?: string;
    timeoutSeconds: number;
    retries: number;
    retryDelaySeconds: number;
  };
  cities: CityConfig[];
  store: {
    table: string;
    urlEnv: string;
    keyEnv: string;
    batchSize: number;
    retryDelaySeconds: number;
    pageSize: number;
  };
  analysis: {
    histogramBins: number;
  };
};

export type StoreCredentials = {
  url: string;
  key: string;
};

export type PipelinePaths = {
  root: string;
  rawDir: string;
  stagedDir: string;
  processedDir: string;
  logDir: string;
  logFile: string;
  stagedFile: string;
};

/** Open-Meteo air quality payload, kept verbatim on disk; `hourly` is only trusted after narrowing. */
export type RawAirQualityResponse = Record<string, unknown>;

export type PollutantValues = Record<Pollutant, number | null>;

export type HourlyReading = PollutantValues & {
  city: string;
  time: string;
};

export type StagedRecord = HourlyReading & {
  aqiCategory: AqiCategory;
  severityScore: number;
  riskFlag: RiskFlag;
  hour: number | null;
};

export type StoredRow = PollutantValues & {
  id?: number;
  city: string;
  time: string | null;
  aqi_category: string | null;
  severity_score: number | null;
  risk_flag: string | null;
  hour: number | null;
};

export type KpiSummary = {
  city_highest_avg_pm2_5: string | null;
  highest_avg_pm2_5_value: number | null;
  city_highest_severity: string | null;
  highest_severity_value: number | null;
  pct_high_risk: number;
  pct_moderate_risk: number;
  pct_low_risk: number;
  worst_aqi_hour: number | null;
  worst_aqi_hour_avg_pm2_5: number | null;
};

export type CityRiskDistribution = {
  city: string;
} & Record<RiskFlag, number>;

export type TrendPoint = {
  city: string;
  time: string | null;
  pm2_5: number | null;
  pm10: number | null;
  ozone: number | null;
};

export type ExtractResult = {
  savedFiles: string[];
  failedCities: string[];
};

export type TransformResult = {
  records: StagedRecord[];
  outputPath: string;
  filesRead: number;
  droppedRows: number;
};

export type LoadReport = {
  totalRows: number;
  batchCount: number;
  insertedRows: number;
  failedBatches: number[];
};

export type AnalysisResult = {
  summary: KpiSummary;
  riskDistribution: CityRiskDistribution[];
  trends: TrendPoint[];
  files: string[];
};
