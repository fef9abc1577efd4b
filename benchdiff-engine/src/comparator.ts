/**
 * Comparator
 *
 * Orchestrates a comparison run: resolves key and metric columns, indexes
 * both datasets by case key, and produces one row per case in the union
 * of both key spaces with a comparison cell per metric.
 *
 * The run is a pure, synchronous fold. Inputs are never mutated and no
 * state outlives a single call.
 *
 * @module comparator
 */

import type { Dataset } from './dataset.js';
import { formatValue } from './formatting.js';
import { buildCaseKey, resolveKeyColumns } from './key-resolver.js';
import { betterDirection, classifyMetric, type ClassificationRule } from './metric-classifier.js';
import { selectMetrics } from './metric-selector.js';
import {
  DEFAULT_THRESHOLDS,
  MetricKind,
  type CaseStatus,
  type CompareOptions,
  type ComparisonCell,
  type ComparisonResult,
  type ComparisonRow,
  type ComparisonSummary,
  type DatasetRow,
  type DeltaDirection,
  type MemoryUnit,
  type Regression,
  type RegressionThresholds,
  type TimeUnit,
  type Verdict,
} from './types.js';
import { convertToBase } from './unit-normalizer.js';

/**
 * Settings that stay fixed for every cell of a run
 */
export interface CellSettings {
  timeUnit: TimeUnit;
  memoryUnit: MemoryUnit;
  thresholds: RegressionThresholds;
  rules: readonly ClassificationRule[];
}

/**
 * Rows of one dataset indexed by case key
 */
interface KeyedRows {
  rows: Map<string, DatasetRow>;
  duplicates: string[];
}

function indexByKey(dataset: Dataset, keyColumns: readonly string[]): KeyedRows {
  const rows = new Map<string, DatasetRow>();
  const duplicates = new Set<string>();
  for (const row of dataset.rows) {
    const key = buildCaseKey(dataset, row, keyColumns);
    if (rows.has(key)) {
      duplicates.add(key);
    }
    // Later rows replace earlier ones
    rows.set(key, row);
  }
  return { rows, duplicates: [...duplicates].sort() };
}

/**
 * Percent change from old to new; undefined unless both values exist and
 * the old value is non-zero
 */
export function percentDelta(oldValue: number | undefined, newValue: number | undefined): number | undefined {
  if (oldValue === undefined || newValue === undefined || oldValue === 0) {
    return undefined;
  }
  return ((newValue - oldValue) / oldValue) * 100;
}

function directionOf(delta: number): DeltaDirection {
  if (delta > 0) return 'up';
  if (delta < 0) return 'down';
  return 'flat';
}

function verdictOf(direction: DeltaDirection, kind: MetricKind): Verdict {
  if (direction === 'flat') {
    return 'same';
  }
  return direction === betterDirection(kind) ? 'better' : 'worse';
}

/**
 * Threshold that applies to a delta of the given kind, or undefined when
 * the delta does not cross it in the unfavourable direction
 */
export function regressionThreshold(
  kind: MetricKind,
  delta: number,
  thresholds: RegressionThresholds
): number | undefined {
  switch (kind) {
    case MetricKind.Time:
    case MetricKind.GCCount:
      return delta > thresholds.time ? thresholds.time : undefined;
    case MetricKind.Memory:
      return delta > thresholds.memory ? thresholds.memory : undefined;
    case MetricKind.Throughput:
      return delta < -thresholds.throughput ? thresholds.throughput : undefined;
  }
}

/**
 * Compare one metric for one case
 */
export function compareCell(
  baseline: Dataset,
  candidate: Dataset,
  oldRow: DatasetRow | undefined,
  newRow: DatasetRow | undefined,
  metric: string,
  settings: CellSettings
): ComparisonCell {
  const kind = classifyMetric(metric, settings.rules);
  const oldRaw = oldRow ? (baseline.cell(oldRow, metric) ?? '') : '';
  const newRaw = newRow ? (candidate.cell(newRow, metric) ?? '') : '';
  const oldBase = oldRow ? convertToBase(metric, oldRaw, settings.rules) : undefined;
  const newBase = newRow ? convertToBase(metric, newRaw, settings.rules) : undefined;
  const deltaPct = percentDelta(oldBase, newBase);

  const cell: ComparisonCell = {
    metric,
    kind,
    oldRaw,
    newRaw,
    oldBase,
    newBase,
    oldDisplay: formatValue(kind, oldBase, settings.timeUnit, settings.memoryUnit),
    newDisplay: formatValue(kind, newBase, settings.timeUnit, settings.memoryUnit),
    deltaPct,
    betterDirection: betterDirection(kind),
    isRegression: false,
  };

  if (deltaPct !== undefined) {
    cell.direction = directionOf(deltaPct);
    cell.verdict = verdictOf(cell.direction, kind);
    cell.isRegression = regressionThreshold(kind, deltaPct, settings.thresholds) !== undefined;
  }

  return cell;
}

/**
 * Fill unset thresholds from the defaults
 */
export function resolveThresholds(overrides: Partial<RegressionThresholds> = {}): RegressionThresholds {
  return {
    time: overrides.time ?? DEFAULT_THRESHOLDS.time,
    memory: overrides.memory ?? DEFAULT_THRESHOLDS.memory,
    throughput: overrides.throughput ?? DEFAULT_THRESHOLDS.throughput,
  };
}

function statusOf(inBaseline: boolean, inCandidate: boolean): CaseStatus {
  if (inBaseline && inCandidate) return 'changed';
  return inCandidate ? 'added' : 'removed';
}

function summarize(rows: readonly ComparisonRow[], regressions: readonly Regression[]): ComparisonSummary {
  const summary: ComparisonSummary = {
    totalCases: rows.length,
    changed: 0,
    added: 0,
    removed: 0,
    better: 0,
    worse: 0,
    same: 0,
    incomparable: 0,
    regressions: regressions.length,
  };
  for (const row of rows) {
    summary[row.status] += 1;
    for (const cell of row.cells) {
      if (cell.verdict === undefined) {
        summary.incomparable += 1;
      } else {
        summary[cell.verdict] += 1;
      }
    }
  }
  return summary;
}

/**
 * Compare a baseline and a candidate dataset.
 *
 * @throws ComparisonError when key columns or metrics cannot be resolved
 */
export function compareDatasets(
  baseline: Dataset,
  candidate: Dataset,
  options: CompareOptions = {}
): ComparisonResult {
  const keyColumns = resolveKeyColumns(baseline.headers, candidate.headers, options.keyColumns);
  const metrics = selectMetrics(baseline.headers, candidate.headers, options.metrics);

  const settings: CellSettings = {
    timeUnit: options.timeUnit ?? 'ns',
    memoryUnit: options.memoryUnit ?? 'B',
    thresholds: resolveThresholds(options.thresholds),
    rules: options.classificationRules ?? [],
  };

  const oldIndex = indexByKey(baseline, keyColumns);
  const newIndex = indexByKey(candidate, keyColumns);
  const keys = [...new Set([...oldIndex.rows.keys(), ...newIndex.rows.keys()])].sort();

  const rows: ComparisonRow[] = [];
  const regressions: Regression[] = [];

  for (const caseKey of keys) {
    const oldRow = oldIndex.rows.get(caseKey);
    const newRow = newIndex.rows.get(caseKey);
    const cells = metrics.map((metric) =>
      compareCell(baseline, candidate, oldRow, newRow, metric, settings)
    );

    for (const cell of cells) {
      if (cell.deltaPct === undefined) {
        continue;
      }
      const threshold = regressionThreshold(cell.kind, cell.deltaPct, settings.thresholds);
      if (threshold !== undefined) {
        regressions.push({ caseKey, metric: cell.metric, kind: cell.kind, deltaPct: cell.deltaPct, threshold });
      }
    }

    rows.push({
      caseKey,
      status: statusOf(oldRow !== undefined, newRow !== undefined),
      cells,
    });
  }

  return {
    keyColumns,
    metrics,
    timeUnit: settings.timeUnit,
    memoryUnit: settings.memoryUnit,
    thresholds: settings.thresholds,
    rows,
    regressions,
    summary: summarize(rows, regressions),
    duplicateKeys: {
      baseline: oldIndex.duplicates,
      candidate: newIndex.duplicates,
    },
  };
}

/**
 * Whether a run found any regression
 */
export function hasRegressions(result: Pick<ComparisonResult, 'regressions'>): boolean {
  return result.regressions.length > 0;
}
