/**
 * Metric Classifier
 *
 * Maps a column name to its MetricKind through an ordered rule table.
 * Rules are evaluated top to bottom and the first match wins; names that
 * match nothing are treated as time statistics.
 *
 * @module metric-classifier
 */

import { normalizeName } from './dataset.js';
import { MetricKind } from './types.js';

/**
 * A single classification rule, tested against the normalized column name
 */
export interface ClassificationRule {
  /** Short label for debugging */
  name: string;
  test: (normalized: string) => boolean;
  kind: MetricKind;
}

export const THROUGHPUT_METRICS: ReadonlySet<string> = new Set([
  'op/s',
  'ops/s',
  'op per s',
  'ops per s',
  'operationspersecond',
  'operations/s',
]);

export const MEMORY_METRICS: ReadonlySet<string> = new Set([
  'allocated',
  'allocated/op',
  'alloc/op',
  'alloc b/op',
  'alloc',
]);

export const GC_METRICS: ReadonlySet<string> = new Set(['gen 0', 'gen 1', 'gen 2']);

export const TIME_METRICS: ReadonlySet<string> = new Set([
  'mean',
  'median',
  'p95',
  'min',
  'max',
  'q1',
  'q3',
  'stddev',
  'error',
]);

/**
 * Default rule chain. Order matters: "Alloc/op" must be caught by the
 * memory rule before the "/s" heuristic could ever see it.
 */
export const DEFAULT_CLASSIFICATION_RULES: readonly ClassificationRule[] = [
  {
    name: 'throughput-name',
    test: (k) => THROUGHPUT_METRICS.has(k),
    kind: MetricKind.Throughput,
  },
  {
    name: 'memory-name',
    test: (k) => MEMORY_METRICS.has(k) || k.includes('alloc') || k.startsWith('allocated'),
    kind: MetricKind.Memory,
  },
  {
    name: 'gc-name',
    test: (k) => GC_METRICS.has(k),
    kind: MetricKind.GCCount,
  },
  {
    name: 'time-name',
    test: (k) => TIME_METRICS.has(k),
    kind: MetricKind.Time,
  },
  {
    name: 'per-second-heuristic',
    test: (k) => k.includes('/s') || k.includes('persecond'),
    kind: MetricKind.Throughput,
  },
];

/**
 * Classify a metric column by name.
 *
 * @param name - Column name, any casing or spacing
 * @param extraRules - Rules evaluated ahead of the defaults
 */
export function classifyMetric(
  name: string,
  extraRules: readonly ClassificationRule[] = []
): MetricKind {
  const normalized = normalizeName(name);
  for (const rule of [...extraRules, ...DEFAULT_CLASSIFICATION_RULES]) {
    if (rule.test(normalized)) {
      return rule.kind;
    }
  }
  return MetricKind.Time;
}

/**
 * Favourable direction of change for a metric kind
 */
export function betterDirection(kind: MetricKind): 'up' | 'down' {
  return kind === MetricKind.Throughput ? 'up' : 'down';
}
