/**
 * Tests for the CLI run flow
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as path from 'path';
import { run } from '../src/cli/run.js';
import { HELP_TEXT, USAGE } from '../src/cli/args.js';
import { CONFIG_FILE_NAME } from '../src/config/config-loader.js';
import { configureLogger } from '../src/logging/logger.js';
import { ExitCode } from '../src/types.js';
import { captureIO, createTempDir, removeTempDir, writeFixture } from './helpers.js';

const BASELINE = 'Method,Mean,Allocated\nParse,100 ns,1000 B\nRender,200 ns,512 B\n';
const CANDIDATE = 'Method,Mean,Allocated\nParse,110 ns,1000 B\nRender,150 ns,512 B\n';

describe('run', () => {
  let dir: string;

  beforeEach(() => {
    dir = createTempDir();
    writeFixture(dir, 'baseline.csv', BASELINE);
    writeFixture(dir, 'candidate.csv', CANDIDATE);
  });

  afterEach(() => {
    removeTempDir(dir);
    configureLogger();
  });

  describe('reports', () => {
    it('prints the table and regressions and exits 0 by default', async () => {
      const io = captureIO(dir);
      const code = await run(['baseline.csv', 'candidate.csv'], io);

      expect(code).toBe(ExitCode.OK);
      expect(io.err).toEqual([]);
      expect(io.out).toHaveLength(7);
      expect(io.out[0].startsWith('Benchmark Key')).toBe(true);
      expect(io.out[2].startsWith('Method=Parse')).toBe(true);
      expect(io.out[3].startsWith('Method=Render')).toBe(true);
      expect(io.out.slice(4)).toEqual([
        '',
        'Potential regressions (thresholds applied):',
        ' - Mean in Method=Parse: +10.00%',
      ]);
    });

    it('exits 2 on regression with --fail-on-regression', async () => {
      const io = captureIO(dir);
      expect(await run(['baseline.csv', 'candidate.csv', '--fail-on-regression'], io)).toBe(ExitCode.REGRESSION);
    });

    it('exits 0 with --fail-on-regression when thresholds are looser', async () => {
      const io = captureIO(dir);
      const code = await run(['baseline.csv', 'candidate.csv', '--fail-on-regression', '--warn-time', '15'], io);

      expect(code).toBe(ExitCode.OK);
      expect(io.out[io.out.length - 1]).toBe('No regressions detected with current thresholds.');
    });

    it('takes thresholds from the environment', async () => {
      const io = captureIO(dir, { BENCHDIFF_WARN_TIME: '15' });
      await run(['baseline.csv', 'candidate.csv'], io);
      expect(io.out[io.out.length - 1]).toBe('No regressions detected with current thresholds.');
    });

    it('takes settings from benchdiff.config.json', async () => {
      writeFixture(dir, CONFIG_FILE_NAME, JSON.stringify({ failOnRegression: true, timeUnit: 'us' }));
      const io = captureIO(dir);

      expect(await run(['baseline.csv', 'candidate.csv'], io)).toBe(ExitCode.REGRESSION);
      expect(io.out[2]).toContain('0.100 us');
    });

    it('writes the long-form CSV with --out', async () => {
      const io = captureIO(dir);
      await run(['baseline.csv', 'candidate.csv', '--out', 'diff.csv'], io);

      expect(io.out.slice(-2)).toEqual(['', 'Wrote detailed comparison to: diff.csv']);
      const written = fs.readFileSync(path.join(dir, 'diff.csv'), 'utf-8').split('\n');
      expect(written[0]).toBe('key,status,metric,old,new,delta_pct,delta_sign,better_direction');
      expect(written[1]).toBe('Method=Parse,changed,Mean,100.000 ns,110.000 ns,10.0000,pos,down');
      expect(written).toHaveLength(6);
    });

    it('compares BenchmarkDotNet JSON reports', async () => {
      const report = (mean: number): string =>
        JSON.stringify({
          Benchmarks: [{ FullName: 'Suite.Parse', MethodTitle: 'Parse', Statistics: { Mean: mean } }],
        });
      writeFixture(dir, 'old.json', report(200));
      writeFixture(dir, 'new.json', report(100));
      const io = captureIO(dir);

      expect(await run(['old.json', 'new.json', '--metrics', 'Mean'], io)).toBe(ExitCode.OK);
      expect(io.out[2].startsWith('Benchmark=Suite.Parse::Parse')).toBe(true);
      expect(io.out[2]).toContain('-50.00% ↓');
    });
  });

  describe('failures', () => {
    it('prints help and exits 0', async () => {
      const io = captureIO(dir);
      expect(await run(['--help'], io)).toBe(ExitCode.OK);
      expect(io.out).toEqual([HELP_TEXT]);
    });

    it('exits 1 on usage errors', async () => {
      const io = captureIO(dir);
      expect(await run(['baseline.csv'], io)).toBe(ExitCode.FAILURE);
      expect(io.err).toEqual(['ERROR: Expected a baseline and a candidate file', USAGE]);
      expect(io.out).toEqual([]);
    });

    it('exits 1 on invalid settings and names their source', async () => {
      const io = captureIO(dir);
      expect(await run(['baseline.csv', 'candidate.csv', '--warn-alloc', '-3'], io)).toBe(ExitCode.FAILURE);
      expect(io.err).toEqual(['ERROR: thresholds.alloc: must not be negative (command line)']);
    });

    it('exits 1 when an input is missing', async () => {
      const io = captureIO(dir);
      expect(await run(['baseline.csv', 'missing.csv'], io)).toBe(ExitCode.FAILURE);
      expect(io.err).toEqual([`ERROR: File not found: ${path.join(dir, 'missing.csv')}`]);
    });

    it('exits 1 when no key column can be resolved', async () => {
      writeFixture(dir, 'a.csv', 'Mean,Error\n1 ns,0.1 ns\n');
      writeFixture(dir, 'b.csv', 'Mean,Error\n2 ns,0.1 ns\n');
      const io = captureIO(dir);

      expect(await run(['a.csv', 'b.csv'], io)).toBe(ExitCode.FAILURE);
      expect(io.err).toEqual([
        'ERROR: Could not determine key columns. Specify --key with column names present in both files.',
      ]);
      expect(io.out).toEqual([]);
    });

    it('exits 1 when no metric is shared', async () => {
      writeFixture(dir, 'a.csv', 'Method,Mean\nParse,1 ns\n');
      writeFixture(dir, 'b.csv', 'Method,Median\nParse,1 ns\n');
      const io = captureIO(dir);

      expect(await run(['a.csv', 'b.csv'], io)).toBe(ExitCode.FAILURE);
      expect(io.err).toEqual(['ERROR: No comparable metrics found. Use --metrics to specify columns to compare.']);
    });
  });

  describe('logging', () => {
    function entries(logs: readonly string[]): Array<Record<string, unknown>> {
      return logs.map((line) => JSON.parse(line));
    }

    it('warns about duplicate case keys', async () => {
      writeFixture(dir, 'dup.csv', 'Method,Mean\nParse,100 ns\nParse,120 ns\n');
      const io = captureIO(dir);
      await run(['dup.csv', 'candidate.csv'], io);

      expect(entries(io.logs)).toEqual([
        expect.objectContaining({
          level: 40,
          component: 'cli',
          side: 'baseline',
          caseKey: 'Method=Parse',
          msg: 'Duplicate case key; the last row wins',
        }),
      ]);
    });

    it('logs resolved columns at debug level', async () => {
      const io = captureIO(dir);
      await run(['baseline.csv', 'candidate.csv', '--log-level', 'debug'], io);

      const resolved = entries(io.logs).find((entry) => entry.msg === 'Resolved comparison columns');
      expect(resolved).toMatchObject({ keyColumns: ['Method'], metrics: ['Mean', 'Allocated'] });
    });

    it('logs fatal comparison errors', async () => {
      writeFixture(dir, 'a.csv', 'Method,Mean\nParse,1 ns\n');
      writeFixture(dir, 'b.csv', 'Method,Median\nParse,1 ns\n');
      const io = captureIO(dir);
      await run(['a.csv', 'b.csv'], io);

      expect(entries(io.logs)).toEqual([
        expect.objectContaining({ level: 50, code: 'NO_COMPARABLE_METRICS', msg: 'No comparable metrics found.' }),
      ]);
    });
  });
});
