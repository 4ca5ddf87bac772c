import { readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { describe, expect, it } from 'vitest';

import { cityFromRawFileName, flattenHourly, hasAnyPollutant, toNumberOrNull } from '../src/normalize.js';
import { buildStagedRecords, listRawFiles, STAGED_HEADER, transformAll } from '../src/transform.js';
import { makeTestContext } from './helpers.js';

describe('raw file normalization', () => {
  it('infers the city from the raw file name', () => {
    expect(cityFromRawFileName('delhi_raw_20240101_000000.json')).toBe('Delhi');
    expect(cityFromRawFileName('BENGALURU_raw_20240101_000000_1.json')).toBe('Bengaluru');
    expect(cityFromRawFileName('summary.json')).toBeNull();
  });

  it('fills nulls for short, missing and non-numeric pollutant arrays', () => {
    const readings = flattenHourly(
      {
        hourly: {
          time: ['2024-01-01T00:00', '2024-01-01T01:00', '2024-01-01T02:00'],
          pm2_5: [12.5, '14', null],
          pm10: [30],
          ozone: 'n/a'
        }
      },
      'Mumbai'
    );

    expect(readings).toHaveLength(3);
    expect(readings[0]).toEqual({
      city: 'Mumbai',
      time: '2024-01-01T00:00',
      pm10: 30,
      pm2_5: 12.5,
      carbon_monoxide: null,
      nitrogen_dioxide: null,
      sulphur_dioxide: null,
      ozone: null,
      uv_index: null
    });
    expect(readings[1]?.pm2_5).toBe(14);
    expect(readings[1]?.pm10).toBeNull();
    expect(readings[2]?.pm2_5).toBeNull();
  });

  it('returns no readings without an hourly time array', () => {
    expect(flattenHourly({}, 'Delhi')).toEqual([]);
    expect(flattenHourly({ hourly: { pm2_5: [1, 2] } }, 'Delhi')).toEqual([]);
    expect(flattenHourly({ hourly: 'unavailable' }, 'Delhi')).toEqual([]);
    expect(flattenHourly({ hourly: [['2024-01-01T00:00', 12]] }, 'Delhi')).toEqual([]);
  });

  it('parses only finite numbers', () => {
    expect(toNumberOrNull('3.5')).toBe(3.5);
    expect(toNumberOrNull('')).toBeNull();
    expect(toNumberOrNull(Number.NaN)).toBeNull();
    expect(toNumberOrNull(true)).toBeNull();
  });
});

describe('staged records', () => {
  it('drops a row only when all seven pollutants are null', () => {
    const readings = flattenHourly(
      {
        hourly: {
          time: ['2024-01-01T00:00', '2024-01-01T01:00'],
          uv_index: [null, 0.4]
        }
      },
      'Delhi'
    );
    expect(readings.map(hasAnyPollutant)).toEqual([false, true]);

    const { records, droppedRows } = buildStagedRecords(readings);
    expect(droppedRows).toBe(1);
    expect(records).toHaveLength(1);
    expect(records[0]?.time).toBe('2024-01-01T01:00');
    expect(records[0]?.severityScore).toBe(0);
  });
});

describe('transformAll', () => {
  it('stages every raw file with derived category, severity, risk and hour', async () => {
    const context = await makeTestContext();
    await writeFile(
      path.join(context.paths.rawDir, 'delhi_raw_20240101_000000.json'),
      JSON.stringify({ hourly: { time: ['2024-01-01T00:00', '2024-01-01T01:00'], pm2_5: [40, 120] } }),
      'utf8'
    );
    await writeFile(path.join(context.paths.rawDir, 'notes.txt'), 'ignored', 'utf8');

    const result = await transformAll(context);

    expect(result.filesRead).toBe(1);
    expect(result.records.map((record) => record.aqiCategory)).toEqual(['Good', 'Moderate']);
    expect(result.records.map((record) => record.severityScore)).toEqual([200, 600]);
    expect(result.records.map((record) => record.riskFlag)).toEqual(['Low Risk', 'High Risk']);
    expect(result.records.map((record) => record.hour)).toEqual([0, 1]);

    const staged = await readFile(context.paths.stagedFile, 'utf8');
    expect(staged.split('\n')).toEqual([
      STAGED_HEADER.join(','),
      ['Delhi', '2024-01-01T00:00', '', '40', '', '', '', '', '', 'Good', '200', 'Low Risk', '0'].join(','),
      ['Delhi', '2024-01-01T01:00', '', '120', '', '', '', '', '', 'Moderate', '600', 'High Risk', '1'].join(','),
      ''
    ]);
  });

  it('reprocesses historical raw files and skips unreadable ones', async () => {
    const context = await makeTestContext();
    const payload = (value: number) => JSON.stringify({ hourly: { time: ['2024-01-01T05:00'], pm10: [value] } });
    await writeFile(path.join(context.paths.rawDir, 'delhi_raw_20240101_000000.json'), payload(10), 'utf8');
    await writeFile(path.join(context.paths.rawDir, 'delhi_raw_20240102_000000.json'), payload(20), 'utf8');
    await writeFile(path.join(context.paths.rawDir, 'kolkata_raw_20240102_000000.json'), '{not json', 'utf8');

    expect(await listRawFiles(context.paths.rawDir)).toHaveLength(3);
    const result = await transformAll(context);

    expect(result.filesRead).toBe(2);
    expect(result.records.map((record) => record.pm10)).toEqual([10, 20]);
    expect(context.logger.lines.some((line) => line.level === 'WARNING' && line.message.includes('kolkata_raw_20240102_000000.json'))).toBe(true);
  });
});
