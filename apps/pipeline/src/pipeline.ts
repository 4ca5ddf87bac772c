import { analyzeStore } from './analyze.js';
import { createStoreContext } from './context.js';
import type { StoreContext, StoreContextOptions } from './context.js';
import { extractAll } from './extract.js';
import { loadStaged } from './load.js';
import { transformAll } from './transform.js';
import type { AnalysisResult, ExtractResult, LoadReport, TransformResult } from './types.js';

export type PipelineRun = {
  extract: ExtractResult;
  transform: TransformResult;
  load: LoadReport;
  analysis: AnalysisResult | null;
};

/**
 * Runs extract, transform, load and analyze strictly in order. The first stage
 * that throws aborts the rest; there is no resume.
 */
export async function runPipeline(context: StoreContext): Promise<PipelineRun> {
  const { logger } = context;

  await logger.info('STEP 1: Extracting data...');
  const extract = await extractAll(context);

  await logger.info('STEP 2: Transforming data...');
  const transform = await transformAll(context);

  await logger.info('STEP 3: Loading data into the store...');
  const load = await loadStaged(context);

  await logger.info('STEP 4: Running analysis...');
  const analysis = await analyzeStore(context);

  await logger.info('Pipeline completed successfully');
  return { extract, transform, load, analysis };
}

export async function runPipelineOnce(options: StoreContextOptions = {}): Promise<PipelineRun> {
  const context = await createStoreContext(options);
  return runPipeline(context);
}

export { analyzeStore } from './analyze.js';
export { createPipelineContext, createStoreContext } from './context.js';
export type { PipelineContext, StoreContext } from './context.js';
export { extractAll } from './extract.js';
export { loadStaged } from './load.js';
export { transformAll } from './transform.js';
export type { AirQualityStore, SchemaApplyResult } from './store.js';
