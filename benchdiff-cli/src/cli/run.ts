/**
 * CLI Run
 *
 * One complete invocation: parse arguments, resolve settings, load both
 * exports, compare them and render the report. Output goes through the
 * injected writers and the exit code is returned, never applied, so the
 * whole flow runs in-process under test.
 *
 * @module cli/run
 */

import * as path from 'path';
import type { pino } from 'pino';
import { compareDatasets, hasRegressions, isComparisonError, type ComparisonResult } from '@benchdiff/engine';
import { isConfigError, type ValidationError } from '../config/config-validator.js';
import { resolveConfig } from '../config/config-loader.js';
import { loadDataset } from '../data/load-dataset.js';
import { isLoadError } from '../data/load-error.js';
import { configureLogger, getLogger, prettyRequested } from '../logging/logger.js';
import { renderTable } from '../report/console-table.js';
import { writeLongFormCsv } from '../report/csv-report.js';
import { ExitCode, type BenchdiffConfig } from '../types.js';
import { HELP_TEXT, USAGE, parseArgs } from './args.js';

/**
 * Process surroundings of a run
 */
export interface CliIO {
  /** Receives report lines */
  stdout: (line: string) => void;
  /** Receives error lines */
  stderr: (line: string) => void;
  cwd: string;
  env: NodeJS.ProcessEnv;
  /** Log sink; stderr when omitted */
  logDestination?: pino.DestinationStream;
}

function formatProblem(problem: ValidationError): string {
  const label = problem.severity === 'error' ? 'ERROR' : 'WARNING';
  return problem.source ? `${label}: ${problem.message} (${problem.source})` : `${label}: ${problem.message}`;
}

function logDuplicates(result: ComparisonResult): void {
  const log = getLogger('cli');
  for (const [side, keys] of Object.entries(result.duplicateKeys)) {
    for (const caseKey of keys) {
      log.warn({ side, caseKey }, 'Duplicate case key; the last row wins');
    }
  }
}

async function compareFiles(
  baselinePath: string,
  candidatePath: string,
  config: BenchdiffConfig,
  io: CliIO
): Promise<ExitCode> {
  const log = getLogger('cli');
  const [baseline, candidate] = await Promise.all([
    loadDataset(path.resolve(io.cwd, baselinePath)),
    loadDataset(path.resolve(io.cwd, candidatePath)),
  ]);

  const result = compareDatasets(baseline, candidate, {
    keyColumns: config.key,
    metrics: config.metrics,
    timeUnit: config.timeUnit,
    memoryUnit: config.memUnit,
    thresholds: {
      time: config.thresholds.time,
      memory: config.thresholds.alloc,
      throughput: config.thresholds.throughput,
    },
  });

  log.debug({ keyColumns: result.keyColumns, metrics: result.metrics }, 'Resolved comparison columns');
  logDuplicates(result);

  for (const line of renderTable(result)) {
    io.stdout(line);
  }

  if (config.out) {
    await writeLongFormCsv(path.resolve(io.cwd, config.out), result);
    io.stdout('');
    io.stdout(`Wrote detailed comparison to: ${config.out}`);
  }

  log.info({ cases: result.summary.totalCases, regressions: result.summary.regressions }, 'Comparison complete');

  if (hasRegressions(result) && config.failOnRegression) {
    return ExitCode.REGRESSION;
  }
  return ExitCode.OK;
}

/**
 * Run benchdiff with the given arguments.
 *
 * @param argv - Arguments without the node and script entries
 * @returns Process exit code
 */
export async function run(argv: readonly string[], io: CliIO): Promise<ExitCode> {
  const args = parseArgs(argv);

  if (args.help) {
    io.stdout(HELP_TEXT);
    return ExitCode.OK;
  }

  if (args.errors.length > 0) {
    for (const error of args.errors) {
      io.stderr(`ERROR: ${error}`);
    }
    io.stderr(USAGE);
    return ExitCode.FAILURE;
  }

  let config: BenchdiffConfig;
  let warnings: ValidationError[];
  try {
    ({ config, warnings } = await resolveConfig({
      cwd: io.cwd,
      env: io.env,
      configPath: args.configPath,
      overrides: args.overrides,
    }));
  } catch (error) {
    if (isConfigError(error)) {
      for (const problem of error.problems) {
        io.stderr(formatProblem(problem));
      }
      return ExitCode.FAILURE;
    }
    throw error;
  }

  configureLogger({
    level: config.logLevel,
    pretty: prettyRequested(io.env),
    destination: io.logDestination,
  });
  const log = getLogger('cli');
  for (const warning of warnings) {
    log.warn({ path: warning.path, source: warning.source }, warning.message);
  }

  const [baselinePath, candidatePath] = args.positionals;
  try {
    return await compareFiles(baselinePath, candidatePath, config, io);
  } catch (error) {
    if (isComparisonError(error)) {
      log.error({ code: error.code, details: error.info.details }, error.message);
      io.stderr(`ERROR: ${error.describe()}`);
      return ExitCode.FAILURE;
    }
    if (isLoadError(error)) {
      log.error({ code: error.code, filePath: error.filePath }, error.message);
      io.stderr(`ERROR: ${error.message}`);
      return ExitCode.FAILURE;
    }
    throw error;
  }
}
