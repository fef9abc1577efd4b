/**
 * benchdiff Engine TypeScript Type Definitions
 */

import type { ClassificationRule } from './metric-classifier.js';

/**
 * Semantic category of a metric column.
 * Governs unit conversion and which direction of change is favourable.
 */
export enum MetricKind {
  Time = 'time',
  Memory = 'memory',
  Throughput = 'throughput',
  GCCount = 'gc',
}

/**
 * Display unit for time metrics
 */
export type TimeUnit = 'ns' | 'us' | 'ms' | 's';

/**
 * Display unit for memory metrics
 */
export type MemoryUnit = 'B' | 'KB' | 'MB' | 'GB';

/**
 * Presence of a benchmark case across the two runs
 */
export type CaseStatus = 'changed' | 'added' | 'removed';

/**
 * Sign of a percent delta
 */
export type DeltaDirection = 'up' | 'down' | 'flat';

/**
 * Whether a change moved the metric the favourable way for its kind
 */
export type Verdict = 'better' | 'worse' | 'same';

/**
 * A single data row: column name (original spelling) to raw cell text
 */
export type DatasetRow = Readonly<Record<string, string>>;

/**
 * Regression thresholds, all in percent
 */
export interface RegressionThresholds {
  /** Maximum tolerated increase for time and GC-count metrics */
  time: number;
  /** Maximum tolerated increase for memory metrics */
  memory: number;
  /** Maximum tolerated decrease for throughput metrics */
  throughput: number;
}

/**
 * Default thresholds: 5% time, 10% memory, 5% throughput
 */
export const DEFAULT_THRESHOLDS: Readonly<RegressionThresholds> = {
  time: 5,
  memory: 10,
  throughput: 5,
};

/**
 * Options for a comparison run
 */
export interface CompareOptions {
  /** Explicit key column names; auto-resolved when omitted or unmatched */
  keyColumns?: readonly string[];
  /** Explicit metric column names; auto-selected when omitted or unmatched */
  metrics?: readonly string[];
  /** Display unit for time values (default: ns) */
  timeUnit?: TimeUnit;
  /** Display unit for memory values (default: B) */
  memoryUnit?: MemoryUnit;
  /** Regression thresholds (defaults: DEFAULT_THRESHOLDS) */
  thresholds?: Partial<RegressionThresholds>;
  /** Extra metric classification rules, evaluated ahead of the defaults */
  classificationRules?: readonly ClassificationRule[];
}

/**
 * Comparison of one metric for one benchmark case
 */
export interface ComparisonCell {
  /** Metric column name (baseline spelling) */
  metric: string;
  kind: MetricKind;
  /** Raw baseline cell, empty when the case or column is absent */
  oldRaw: string;
  /** Raw candidate cell, empty when the case or column is absent */
  newRaw: string;
  /** Baseline value in base units, undefined when absent or unparsable */
  oldBase?: number;
  /** Candidate value in base units, undefined when absent or unparsable */
  newBase?: number;
  /** Baseline value in the display unit, or "-" */
  oldDisplay: string;
  /** Candidate value in the display unit, or "-" */
  newDisplay: string;
  /** Percent change, undefined when it cannot be computed */
  deltaPct?: number;
  direction?: DeltaDirection;
  verdict?: Verdict;
  /** Favourable direction for this metric's kind */
  betterDirection: 'up' | 'down';
  /** Whether the delta crossed its threshold in the unfavourable direction */
  isRegression: boolean;
}

/**
 * One benchmark case in the comparison output
 */
export interface ComparisonRow {
  caseKey: string;
  status: CaseStatus;
  cells: ComparisonCell[];
}

/**
 * A case x metric delta that crossed its threshold
 */
export interface Regression {
  caseKey: string;
  metric: string;
  kind: MetricKind;
  deltaPct: number;
  /** Threshold that was crossed, in percent */
  threshold: number;
}

/**
 * Aggregate counts for a comparison run
 */
export interface ComparisonSummary {
  totalCases: number;
  changed: number;
  added: number;
  removed: number;
  better: number;
  worse: number;
  same: number;
  /** Cells whose delta could not be computed */
  incomparable: number;
  regressions: number;
}

/**
 * Complete result of comparing two datasets
 */
export interface ComparisonResult {
  keyColumns: string[];
  metrics: string[];
  timeUnit: TimeUnit;
  memoryUnit: MemoryUnit;
  thresholds: RegressionThresholds;
  /** One row per unique case key, sorted by key */
  rows: ComparisonRow[];
  regressions: Regression[];
  summary: ComparisonSummary;
  /** Case keys that appeared more than once; the later row was used */
  duplicateKeys: {
    baseline: string[];
    candidate: string[];
  };
}
