/**
 * Metric Selector
 *
 * Decides which metric columns to compare. Caller requests win when any
 * of them exist in both datasets; otherwise the shared columns from a
 * fixed preference table are used.
 *
 * @module metric-selector
 */

import { ComparisonError, ComparisonErrorCode } from './comparison-error.js';
import { indexHeaders, normalizeName } from './dataset.js';

/**
 * Metric columns picked automatically, in preference order
 */
export const CANDIDATE_METRICS: readonly string[] = [
  'Mean',
  'Median',
  'P95',
  'Min',
  'Max',
  'StdDev',
  'Error',
  'Op/s',
  'OperationsPerSecond',
  'Allocated',
  'Alloc B/op',
  'Allocated/op',
  'Gen 0',
  'Gen 1',
  'Gen 2',
];

/**
 * Resolve caller-requested metrics. Each keeps the baseline spelling,
 * or the candidate's when only the candidate spells it differently.
 */
function selectRequested(
  baseline: Map<string, string>,
  candidate: Map<string, string>,
  requested: readonly string[]
): string[] {
  const selected: string[] = [];
  for (const name of requested) {
    const key = normalizeName(name);
    const header = baseline.get(key) ?? candidate.get(key);
    if (header !== undefined && baseline.has(key) && candidate.has(key)) {
      selected.push(header);
    }
  }
  return selected;
}

function selectAutomatic(baseline: Map<string, string>, candidate: Map<string, string>): string[] {
  const selected: string[] = [];
  const seen = new Set<string>();
  for (const name of CANDIDATE_METRICS) {
    const key = normalizeName(name);
    const header = baseline.get(key);
    if (header === undefined || !candidate.has(key) || seen.has(key)) {
      continue;
    }
    selected.push(header);
    seen.add(key);
  }
  return selected;
}

/**
 * Determine the ordered metric columns to compare.
 *
 * @param baselineHeaders - Headers of the baseline dataset
 * @param candidateHeaders - Headers of the candidate dataset
 * @param requested - Caller-specified metrics; exact repeats are kept
 * @throws ComparisonError with code NO_COMPARABLE_METRICS when nothing qualifies
 */
export function selectMetrics(
  baselineHeaders: readonly string[],
  candidateHeaders: readonly string[],
  requested: readonly string[] = []
): string[] {
  const baseline = indexHeaders(baselineHeaders);
  const candidate = indexHeaders(candidateHeaders);

  const explicit = selectRequested(baseline, candidate, requested);
  if (explicit.length > 0) {
    return explicit;
  }

  const automatic = selectAutomatic(baseline, candidate);
  if (automatic.length > 0) {
    return automatic;
  }

  throw new ComparisonError({
    code: ComparisonErrorCode.NO_COMPARABLE_METRICS,
    message: 'No comparable metrics found.',
    details: {
      baselineHeaders: [...baselineHeaders],
      candidateHeaders: [...candidateHeaders],
      requested: [...requested],
    },
  });
}
