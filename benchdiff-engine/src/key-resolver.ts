/**
 * Key Resolver
 *
 * Picks the columns that jointly identify a benchmark case in both
 * datasets, so the same case maps to the same composite key in each.
 * Resolution runs an ordered list of strategies and stops at the first
 * one that yields columns.
 *
 * @module key-resolver
 */

import { ComparisonError, ComparisonErrorCode } from './comparison-error.js';
import { indexHeaders, normalizeName, type Dataset } from './dataset.js';
import { CANDIDATE_METRICS } from './metric-selector.js';
import type { DatasetRow } from './types.js';

/** Columns that are unique identifiers on their own, in priority order */
export const UNIQUE_ID_COLUMNS: readonly string[] = ['FullName', 'Benchmark'];

/** Identity columns composed into a key, in order */
export const IDENTITY_COLUMNS: readonly string[] = [
  'Namespace',
  'Type',
  'Method',
  'Parameters',
  'Param',
  'Arguments',
];

/** Run-configuration dimensions that distinguish otherwise identical cases */
export const RUN_CONFIG_COLUMNS: readonly string[] = ['Runtime', 'Job', 'Platform', 'Jit'];

/**
 * Normalized names never used as free parameter columns: statistics and
 * metrics, ranking columns and run metadata
 */
export const NON_IDENTITY_COLUMNS: ReadonlySet<string> = new Set([
  // statistics and metrics
  'mean',
  'median',
  'p95',
  'min',
  'max',
  'q1',
  'q3',
  'stddev',
  'error',
  'op/s',
  'operationspersecond',
  'allocated',
  'alloc b/op',
  'allocated/op',
  'gen 0',
  'gen 1',
  'gen 2',
  // ranking
  'rank',
  'baseline',
  // run metadata
  'iterationcount',
  'launchcount',
  'warmupcount',
  'invocationcount',
  'unrollfactor',
  'toolchain',
  'evaluateoverhead',
  'powerplan',
  'servergc',
  'concurrencyvisualizer',
  'description',
  'hardwareintrinsics',
  'hardwarecounter',
  'memoryrandomization',
  'enginefactory',
]);

/** Separator between column=value pairs in a case key */
export const KEY_SEPARATOR = ' | ';

/**
 * Header sets of both datasets, indexed by normalized name
 */
export interface KeyContext {
  baselineHeaders: readonly string[];
  baseline: Map<string, string>;
  candidate: Map<string, string>;
  explicit: readonly string[];
}

/**
 * A key resolution strategy; an empty result defers to the next one
 */
export interface KeyStrategy {
  name: string;
  resolve: (context: KeyContext) => string[];
}

function inBoth(context: KeyContext, name: string): boolean {
  const key = normalizeName(name);
  return context.baseline.has(key) && context.candidate.has(key);
}

/**
 * Baseline spelling for each wanted column present in both datasets
 */
function pickShared(context: KeyContext, wanted: readonly string[]): string[] {
  const picked: string[] = [];
  for (const name of wanted) {
    const header = context.baseline.get(normalizeName(name));
    if (header !== undefined && inBoth(context, name)) {
      picked.push(header);
    }
  }
  return picked;
}

const CANDIDATE_METRIC_NAMES: ReadonlySet<string> = new Set(CANDIDATE_METRICS.map(normalizeName));

/**
 * Ordered key strategies
 */
export const KEY_STRATEGIES: readonly KeyStrategy[] = [
  {
    name: 'explicit',
    resolve: (context) => pickShared(context, context.explicit),
  },
  {
    name: 'unique-id',
    resolve: (context) => {
      for (const name of UNIQUE_ID_COLUMNS) {
        const picked = pickShared(context, [name]);
        if (picked.length > 0) {
          return picked;
        }
      }
      return [];
    },
  },
  {
    name: 'composite',
    resolve: (context) => {
      const picked = [
        ...pickShared(context, IDENTITY_COLUMNS),
        ...pickShared(context, RUN_CONFIG_COLUMNS),
      ];
      const taken = new Set(picked.map(normalizeName));
      for (const header of context.baselineHeaders) {
        const key = normalizeName(header);
        if (
          NON_IDENTITY_COLUMNS.has(key) ||
          CANDIDATE_METRIC_NAMES.has(key) ||
          taken.has(key) ||
          !context.candidate.has(key)
        ) {
          continue;
        }
        picked.push(header);
        taken.add(key);
      }
      return picked;
    },
  },
  {
    name: 'method',
    resolve: (context) => pickShared(context, ['Method']),
  },
  {
    name: 'shared-columns',
    resolve: (context) =>
      [...context.baseline.entries()]
        .filter(([key]) => context.candidate.has(key) && !NON_IDENTITY_COLUMNS.has(key))
        .map(([, header]) => header),
  },
];

/**
 * Determine the ordered key columns for two header sets.
 *
 * @param baselineHeaders - Headers of the baseline dataset
 * @param candidateHeaders - Headers of the candidate dataset
 * @param explicit - Caller-specified columns, used when any are present in both
 * @returns Column names in baseline spelling
 * @throws ComparisonError with code UNRESOLVABLE_KEY when nothing qualifies
 */
export function resolveKeyColumns(
  baselineHeaders: readonly string[],
  candidateHeaders: readonly string[],
  explicit: readonly string[] = []
): string[] {
  const context: KeyContext = {
    baselineHeaders,
    baseline: indexHeaders(baselineHeaders),
    candidate: indexHeaders(candidateHeaders),
    explicit,
  };

  for (const strategy of KEY_STRATEGIES) {
    const columns = strategy.resolve(context);
    if (columns.length > 0) {
      return columns;
    }
  }

  throw new ComparisonError({
    code: ComparisonErrorCode.UNRESOLVABLE_KEY,
    message: 'Could not determine key columns.',
    details: {
      baselineHeaders: [...baselineHeaders],
      candidateHeaders: [...candidateHeaders],
      requested: [...explicit],
    },
  });
}

/**
 * Build the composite case key for one row: "Type=Foo | Method=Bar"
 */
export function buildCaseKey(dataset: Dataset, row: DatasetRow, keyColumns: readonly string[]): string {
  return keyColumns
    .map((column) => `${column}=${dataset.cell(row, column) ?? ''}`)
    .join(KEY_SEPARATOR);
}
