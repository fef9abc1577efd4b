/**
 * Command-line argument parsing
 *
 * @module cli/args
 */

import type { RawConfigLayer, ThresholdSettings } from '../types.js';

export const USAGE = 'Usage: benchdiff <baseline> <candidate> [options]';

export const HELP_TEXT = `
benchdiff - compare two benchmark result exports

${USAGE}

Inputs are BenchmarkDotNet CSV exports, or full JSON reports (*.json).

Options:
  --key <a,b>              Columns that identify a benchmark case (default: auto)
  --metrics <a,b>          Metric columns to compare (default: auto-pick common metrics)
  --time-unit <unit>       Display unit for time metrics: ns, us, ms, s (default: ns)
  --mem-unit <unit>        Display unit for memory metrics: B, KB, MB, GB (default: B)
  --warn-time <pct>        Flag time/gc increases above this percent (default: 5)
  --warn-alloc <pct>       Flag allocation increases above this percent (default: 10)
  --warn-throughput <pct>  Flag throughput decreases beyond this percent (default: 5)
  --fail-on-regression     Exit with code 2 if regressions are detected
  --out <path>             Write a long-form comparison CSV to this path
  --config <path>          Config file (default: nearest benchdiff.config.json)
  --log-level <level>      error, warn, info or debug (default: warn)
  -h, --help               Show this help

Environment:
  BENCHDIFF_WARN_TIME, BENCHDIFF_WARN_ALLOC, BENCHDIFF_WARN_THROUGHPUT,
  BENCHDIFF_LOG_LEVEL      Override config file settings
  BENCHDIFF_LOG_PRETTY=1   Human-readable log output on stderr
`;

/**
 * Result of parsing argv
 */
export interface ParsedArgs {
  /** Baseline and candidate paths, in order */
  positionals: string[];
  help: boolean;
  configPath?: string;
  /** Settings given as flags */
  overrides: RawConfigLayer;
  /** Usage problems; non-empty means the run must not proceed */
  errors: string[];
}

/**
 * Split a comma-separated column list
 */
export function splitList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '');
}

/**
 * Parse command-line arguments (without the node and script entries)
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const parsed: ParsedArgs = { positionals: [], help: false, overrides: {}, errors: [] };
  const thresholds: Partial<ThresholdSettings> = {};

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (!arg.startsWith('-') || arg === '-') {
      parsed.positionals.push(arg);
      continue;
    }

    const eq = arg.indexOf('=');
    const flag = arg.startsWith('--') && eq > 0 ? arg.slice(0, eq) : arg;
    const inline = flag === arg ? undefined : arg.slice(eq + 1);

    // Value of an option: inline after "=", or the next argument
    const takeValue = (): string | undefined => {
      if (inline !== undefined) {
        return inline === '' ? undefined : inline;
      }
      const next = argv[i + 1];
      if (next === undefined || next.startsWith('--')) {
        return undefined;
      }
      i++;
      return next;
    };

    const requireValue = (): string | undefined => {
      const value = takeValue();
      if (value === undefined) {
        parsed.errors.push(`Option ${flag} requires a value`);
      }
      return value;
    };

    switch (flag) {
      case '--key': {
        const value = requireValue();
        if (value !== undefined) parsed.overrides.key = splitList(value);
        break;
      }
      case '--metrics': {
        const value = requireValue();
        if (value !== undefined) parsed.overrides.metrics = splitList(value);
        break;
      }
      case '--time-unit': {
        const value = requireValue();
        if (value !== undefined) parsed.overrides.timeUnit = value;
        break;
      }
      case '--mem-unit': {
        const value = requireValue();
        if (value !== undefined) parsed.overrides.memUnit = value;
        break;
      }
      case '--warn-time': {
        const value = requireValue();
        if (value !== undefined) thresholds.time = Number(value);
        break;
      }
      case '--warn-alloc': {
        const value = requireValue();
        if (value !== undefined) thresholds.alloc = Number(value);
        break;
      }
      case '--warn-throughput': {
        const value = requireValue();
        if (value !== undefined) thresholds.throughput = Number(value);
        break;
      }
      case '--fail-on-regression':
        if (inline !== undefined) {
          parsed.errors.push(`Option ${flag} does not take a value`);
        } else {
          parsed.overrides.failOnRegression = true;
        }
        break;
      case '--out': {
        const value = requireValue();
        if (value !== undefined) parsed.overrides.out = value;
        break;
      }
      case '--config': {
        const value = requireValue();
        if (value !== undefined) parsed.configPath = value;
        break;
      }
      case '--log-level': {
        const value = requireValue();
        if (value !== undefined) parsed.overrides.logLevel = value.toLowerCase();
        break;
      }
      case '--help':
      case '-h':
        parsed.help = true;
        break;
      default:
        parsed.errors.push(`Unknown option: ${arg}`);
    }
  }

  if (Object.keys(thresholds).length > 0) {
    parsed.overrides.thresholds = thresholds;
  }

  if (!parsed.help && parsed.errors.length === 0 && parsed.positionals.length !== 2) {
    parsed.errors.push(
      parsed.positionals.length < 2
        ? 'Expected a baseline and a candidate file'
        : `Unexpected argument: ${parsed.positionals[2]}`
    );
  }

  return parsed;
}
