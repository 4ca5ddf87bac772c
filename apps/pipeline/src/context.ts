import { mkdir } from 'node:fs/promises';
import path from 'node:path';
import { setTimeout as delay } from 'node:timers/promises';

import { getRepoRoot, loadStoreCredentials, loadValidatedConfig } from './config.js';
import { createLogger } from './logger.js';
import type { Logger } from './logger.js';
import { createSupabaseStore } from './store.js';
import type { AirQualityStore } from './store.js';
import type { AirQualityConfig, PipelinePaths } from './types.js';

export const STAGED_FILE_NAME = 'air_quality_transformed.csv';

export type Sleep = (ms: number) => Promise<void>;

/** Everything a stage needs; built once by the caller and passed down. */
export type PipelineContext = {
  config: AirQualityConfig;
  paths: PipelinePaths;
  logger: Logger;
  sleep: Sleep;
  now: () => Date;
};

export type StoreContext = PipelineContext & {
  store: AirQualityStore;
};

export type ContextOptions = {
  configPath?: string;
  rootDir?: string;
  logger?: Logger;
  sleep?: Sleep;
  now?: () => Date;
};

export type StoreContextOptions = ContextOptions & {
  store?: AirQualityStore;
  env?: NodeJS.ProcessEnv;
};

export const defaultSleep: Sleep = async (ms) => {
  await delay(ms);
};

export function resolvePaths(config: AirQualityConfig, rootDir: string = getRepoRoot()): PipelinePaths {
  const dataDir = path.resolve(rootDir, config.project.dataDir);
  const logDir = path.resolve(rootDir, config.project.logDir);
  const stagedDir = path.join(dataDir, 'staged');
  return {
    root: rootDir,
    rawDir: path.join(dataDir, 'raw'),
    stagedDir,
    processedDir: path.join(dataDir, 'processed'),
    logDir,
    logFile: path.join(logDir, config.project.logFile),
    stagedFile: path.join(stagedDir, STAGED_FILE_NAME)
  };
}

export async function ensureDirectories(paths: PipelinePaths): Promise<void> {
  await Promise.all(
    [paths.rawDir, paths.stagedDir, paths.processedDir, paths.logDir].map((dir) => mkdir(dir, { recursive: true }))
  );
}

function buildContext(config: AirQualityConfig, paths: PipelinePaths, options: ContextOptions): PipelineContext {
  return {
    config,
    paths,
    logger: options.logger ?? createLogger(paths.logFile),
    sleep: options.sleep ?? defaultSleep,
    now: options.now ?? (() => new Date())
  };
}

export async function createPipelineContext(options: ContextOptions = {}): Promise<PipelineContext> {
  const config = await loadValidatedConfig(options.configPath);
  const paths = resolvePaths(config, options.rootDir);
  await ensureDirectories(paths);
  return buildContext(config, paths, options);
}

/**
 * Adds a store handle to the context. Without an injected store, credentials are
 * read from the environment and their absence fails before any directory or stage work.
 */
export async function createStoreContext(options: StoreContextOptions = {}): Promise<StoreContext> {
  const config = await loadValidatedConfig(options.configPath);
  const store = options.store ?? createSupabaseStore(loadStoreCredentials(config, options.env), {
    table: config.store.table,
    pageSize: config.store.pageSize
  });
  const paths = resolvePaths(config, options.rootDir);
  await ensureDirectories(paths);
  return { ...buildContext(config, paths, options), store };
}
