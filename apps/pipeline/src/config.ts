import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import AjvModule from 'ajv';
import type { SchemaObject } from 'ajv';
import addFormatsModule from 'ajv-formats';
import YAML from 'yaml';

import type { AirQualityConfig, StoreCredentials } from './types.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);
const repoRoot = path.resolve(__dirname, '../../..');

// ajv and ajv-formats are CommonJS; under NodeNext the class sits on `.default`.
const Ajv = AjvModule.default;
const addFormats = addFormatsModule.default;

export function getRepoRoot(): string {
  return repoRoot;
}

export function getDefaultConfigPath(): string {
  return path.join(repoRoot, 'config', 'air-quality.yaml');
}

export async function parseConfigYaml(configPath: string): Promise<unknown> {
  const raw = await readFile(configPath, 'utf8');
  return YAML.parse(raw);
}

export async function loadConfigSchema(): Promise<SchemaObject> {
  const schemaPath = path.join(repoRoot, 'config', 'air-quality.schema.json');
  const raw = await readFile(schemaPath, 'utf8');
  return JSON.parse(raw);
}

export async function validateConfigObject(config: unknown): Promise<AirQualityConfig> {
  const schema = await loadConfigSchema();
  const ajv = new Ajv({ allErrors: true, strict: false });
  addFormats(ajv);
  const validate = ajv.compile<AirQualityConfig>(schema);
  if (!validate(config)) {
    const details = (validate.errors ?? [])
      .map((e) => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`)
      .join('; ');
    throw new Error(`Config schema validation failed: ${details}`);
  }

  if (config.cities.length < 1) {
    throw new Error('Config semantic validation failed: at least 1 city must be configured');
  }

  // Raw file names carry the lower-cased city, so names must stay distinct once lower-cased.
  const seen = new Set<string>();
  for (const city of config.cities) {
    const key = city.name.toLowerCase();
    if (seen.has(key)) {
      throw new Error(`Config semantic validation failed: duplicate city "${city.name}"`);
    }
    seen.add(key);
  }

  if (!config.source.pollutants.includes('pm2_5')) {
    throw new Error('Config semantic validation failed: source.pollutants must include pm2_5');
  }

  if (config.source.retries < 1) {
    throw new Error('Config semantic validation failed: source.retries must be >= 1');
  }

  if (config.store.batchSize < 1) {
    throw new Error('Config semantic validation failed: store.batchSize must be >= 1');
  }

  return config;
}

export async function loadValidatedConfig(configPath = getDefaultConfigPath()): Promise<AirQualityConfig> {
  const parsed = await parseConfigYaml(configPath);
  return validateConfigObject(parsed);
}

export function loadStoreCredentials(
  config: AirQualityConfig,
  env: NodeJS.ProcessEnv = process.env
): StoreCredentials {
  const url = env[config.store.urlEnv]?.trim();
  const key = env[config.store.keyEnv]?.trim();
  if (!url || !key) {
    throw new Error(`Missing ${config.store.urlEnv} or ${config.store.keyEnv} in environment`);
  }
  return { url, key };
}
