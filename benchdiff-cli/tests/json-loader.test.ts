/**
 * Tests for the BenchmarkDotNet JSON Loader and loader dispatch
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { compareDatasets } from '@benchdiff/engine';
import { parseBenchmarkJson, toRow } from '../src/data/json-loader.js';
import { loadDataset } from '../src/data/load-dataset.js';
import { LoadError, LoadErrorCode } from '../src/data/load-error.js';
import { createTempDir, removeTempDir, writeFixture } from './helpers.js';

function report(benchmarks: unknown[]): string {
  return JSON.stringify({ Title: 'Suite-20240101', Benchmarks: benchmarks });
}

function entry(name: string, mean: number, extra: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    FullName: `Suite.Parser.${name}`,
    MethodTitle: name,
    Statistics: { Mean: mean, Percentiles: { P95: mean * 2 } },
    Memory: { AllocatedBytes: 256 },
    ...extra,
  };
}

function parseError(content: string): LoadError {
  try {
    parseBenchmarkJson(content);
  } catch (error) {
    if (error instanceof LoadError) {
      return error;
    }
    throw error;
  }
  throw new Error('parseBenchmarkJson did not throw');
}

describe('parseBenchmarkJson', () => {
  it('flattens each benchmark into a row', () => {
    const dataset = parseBenchmarkJson(report([entry('Parse', 1234.5)]), 'old.json');

    expect(dataset.headers).toEqual(['Benchmark', 'Mean', 'P95', 'Allocated']);
    expect(dataset.source).toBe('old.json');
    expect(dataset.rows).toEqual([
      { Benchmark: 'Suite.Parser.Parse::Parse', Mean: '1234.5', P95: '2469', Allocated: '256' },
    ]);
  });

  it('uses zero for missing allocation and an empty cell for missing P95', () => {
    const dataset = parseBenchmarkJson(
      report([
        { FullName: 'Suite.Render', MethodTitle: 'Render', Statistics: { Mean: 80 } },
        {
          FullName: 'Suite.Stream',
          MethodTitle: 'Stream',
          Statistics: { Mean: 90, Percentiles: null },
          Memory: { AllocatedBytes: null },
        },
      ])
    );

    expect(dataset.rows).toEqual([
      { Benchmark: 'Suite.Render::Render', Mean: '80', P95: '', Allocated: '0' },
      { Benchmark: 'Suite.Stream::Stream', Mean: '90', P95: '', Allocated: '0' },
    ]);
  });

  it('rejects malformed JSON', () => {
    const error = parseError('{"Benchmarks": [');
    expect(error.code).toBe(LoadErrorCode.PARSE_FAILED);
    expect(error.message.startsWith('Invalid JSON in <memory>: ')).toBe(true);
  });

  it('rejects a document without Benchmarks', () => {
    const error = parseError('{}');
    expect(error.code).toBe(LoadErrorCode.INVALID_FORMAT);
    expect(error.message).toBe('Not a BenchmarkDotNet report: <memory> (Benchmarks: Required)');
  });

  it('names the path of a wrongly typed statistic', () => {
    const error = parseError(report([entry('Parse', 1, { Statistics: { Mean: '1 ns' } })]));
    expect(error.code).toBe(LoadErrorCode.INVALID_FORMAT);
    expect(error.message).toContain('Benchmarks.0.Statistics.Mean');
  });

  it('feeds the comparison engine directly', () => {
    const baseline = parseBenchmarkJson(report([entry('Parse', 100)]));
    const candidate = parseBenchmarkJson(report([entry('Parse', 110)]));
    const result = compareDatasets(baseline, candidate);

    expect(result.keyColumns).toEqual(['Benchmark']);
    expect(result.metrics).toEqual(['Mean', 'P95', 'Allocated']);
    expect(result.rows[0].caseKey).toBe('Benchmark=Suite.Parser.Parse::Parse');
    expect(result.rows[0].cells.map((cell) => cell.deltaPct)).toEqual([10, 10, 0]);
  });
});

describe('toRow', () => {
  it('joins FullName and MethodTitle', () => {
    expect(
      toRow({ FullName: 'A.B', MethodTitle: 'C', Statistics: { Mean: 1 } }).Benchmark
    ).toBe('A.B::C');
  });
});

describe('loadDataset', () => {
  let dir: string;

  beforeEach(() => {
    dir = createTempDir();
  });

  afterEach(() => {
    removeTempDir(dir);
  });

  it('reads .json files as BenchmarkDotNet reports', async () => {
    const filePath = writeFixture(dir, 'report-full.JSON', report([entry('Parse', 5)]));
    const dataset = await loadDataset(filePath);
    expect(dataset.headers).toEqual(['Benchmark', 'Mean', 'P95', 'Allocated']);
  });

  it('reads everything else as CSV', async () => {
    const filePath = writeFixture(dir, 'report.txt', 'Method,Mean\nParse,5 ns\n');
    const dataset = await loadDataset(filePath);
    expect(dataset.headers).toEqual(['Method', 'Mean']);
  });

  it('reports a missing file', async () => {
    await expect(loadDataset(`${dir}/none.json`)).rejects.toMatchObject({ code: LoadErrorCode.FILE_NOT_FOUND });
  });
});
