import { readdir } from 'node:fs/promises';

import nock from 'nock';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { runPipeline } from '../src/pipeline.js';
import { makeTestContext, SchemaFailingStore, UnreadableStore } from './helpers.js';

const delhi = {
  hourly: {
    time: ['2024-01-02T00:00', '2024-01-02T01:00'],
    pm2_5: [250, null]
  }
};

const mumbai = {
  hourly: {
    time: ['2024-01-02T00:00', '2024-01-02T01:00'],
    pm2_5: [40, 60]
  }
};

function mockSource() {
  nock('https://air.test')
    .get('/v1/air-quality')
    .query((query) => query.latitude === '28.7041')
    .reply(200, delhi)
    .get('/v1/air-quality')
    .query((query) => query.latitude === '19.076')
    .reply(200, mumbai);
}

describe('pipeline run (mocked HTTP, in-memory store)', () => {
  beforeEach(() => {
    nock.disableNetConnect();
  });

  afterEach(() => {
    nock.cleanAll();
    nock.enableNetConnect();
  });

  it('runs every stage in order and analyzes what was loaded', async () => {
    mockSource();
    const context = await makeTestContext();

    const run = await runPipeline(context);

    expect(run.extract.savedFiles).toHaveLength(2);
    expect(run.transform).toMatchObject({ filesRead: 2, droppedRows: 1 });
    expect(run.load).toEqual({ totalRows: 3, batchCount: 1, insertedRows: 3, failedBatches: [] });
    expect(context.store.appliedSchemas).toEqual(['air_quality_data']);
    expect(context.store.rows.map((row) => [row.city, row.time, row.pm2_5])).toEqual([
      ['Delhi', '2024-01-02T00:00:00', 250],
      ['Mumbai', '2024-01-02T00:00:00', 40],
      ['Mumbai', '2024-01-02T01:00:00', 60]
    ]);
    expect(run.analysis?.summary.city_highest_avg_pm2_5).toBe('Delhi');
    expect(run.analysis?.summary.highest_avg_pm2_5_value).toBe(250);
    expect(run.analysis?.files).toHaveLength(7);

    const steps = context.logger.lines.filter((line) => line.message.startsWith('STEP')).map((line) => line.message);
    expect(steps).toEqual([
      'STEP 1: Extracting data...',
      'STEP 2: Transforming data...',
      'STEP 3: Loading data into the store...',
      'STEP 4: Running analysis...'
    ]);
  });

  it('keeps loading and analyzing when the table create throws', async () => {
    mockSource();
    const context = await makeTestContext({ store: new SchemaFailingStore() });

    const run = await runPipeline(context);

    expect(context.store.appliedSchemas).toEqual(['air_quality_data']);
    expect(run.load).toEqual({ totalRows: 3, batchCount: 1, insertedRows: 3, failedBatches: [] });
    expect(run.analysis?.files).toHaveLength(7);
    expect(context.logger.lines).toContainEqual({ level: 'WARNING', message: 'Table create failed: connection refused' });
  });

  it('stops at the first failing stage', async () => {
    mockSource();
    const context = await makeTestContext({ store: new UnreadableStore() });

    await expect(runPipeline(context)).rejects.toThrow('permission denied for table air_quality_data');

    expect(context.store.rows).toHaveLength(3);
    expect(context.logger.lines.some((line) => line.message === 'Pipeline completed successfully')).toBe(false);
    expect(await readdir(context.paths.processedDir)).toEqual([]);
  });
});
