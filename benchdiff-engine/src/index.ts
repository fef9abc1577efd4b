/**
 * @benchdiff/engine - comparison engine for microbenchmark result snapshots
 *
 * Compares a baseline and a candidate export of the same benchmark suite
 * and reports, per benchmark case, how each metric moved.
 *
 * @example
 * ```typescript
 * import { Dataset, compareDatasets } from '@benchdiff/engine';
 *
 * const baseline = new Dataset(['Method', 'Mean'], [{ Method: 'Parse', Mean: '100 ns' }]);
 * const candidate = new Dataset(['Method', 'Mean'], [{ Method: 'Parse', Mean: '110 ns' }]);
 *
 * const result = compareDatasets(baseline, candidate, { thresholds: { time: 5 } });
 * console.log(result.regressions); // [{ caseKey: 'Method=Parse', metric: 'Mean', deltaPct: 10, ... }]
 * ```
 *
 * @module @benchdiff/engine
 */

// Core types
export { MetricKind, DEFAULT_THRESHOLDS } from './types.js';

export type {
  TimeUnit,
  MemoryUnit,
  CaseStatus,
  DeltaDirection,
  Verdict,
  DatasetRow,
  RegressionThresholds,
  CompareOptions,
  ComparisonCell,
  ComparisonRow,
  Regression,
  ComparisonSummary,
  ComparisonResult,
} from './types.js';

// Dataset
export { Dataset, normalizeName, indexHeaders } from './dataset.js';

// Cell parsing and unit normalization
export { parseNumber, unitSuffix } from './value-parser.js';

export {
  TIME_UNIT_FACTORS,
  toBaseTime,
  toBaseMemory,
  normalizeValue,
  convertToBase,
  fromBase,
  isTimeUnit,
  isMemoryUnit,
} from './unit-normalizer.js';

// Metric classification
export {
  classifyMetric,
  betterDirection,
  DEFAULT_CLASSIFICATION_RULES,
  THROUGHPUT_METRICS,
  MEMORY_METRICS,
  GC_METRICS,
  TIME_METRICS,
} from './metric-classifier.js';

export type { ClassificationRule } from './metric-classifier.js';

// Key and metric resolution
export {
  resolveKeyColumns,
  buildCaseKey,
  KEY_STRATEGIES,
  KEY_SEPARATOR,
  UNIQUE_ID_COLUMNS,
  IDENTITY_COLUMNS,
  RUN_CONFIG_COLUMNS,
  NON_IDENTITY_COLUMNS,
} from './key-resolver.js';

export type { KeyContext, KeyStrategy } from './key-resolver.js';

export { selectMetrics, CANDIDATE_METRICS } from './metric-selector.js';

// Comparison
export {
  compareDatasets,
  compareCell,
  percentDelta,
  regressionThreshold,
  resolveThresholds,
  hasRegressions,
} from './comparator.js';

export type { CellSettings } from './comparator.js';

// Formatting
export {
  PLACEHOLDER,
  formatValue,
  formatDeltaPct,
  formatDeltaCell,
  directionArrow,
} from './formatting.js';

// Errors
export {
  ComparisonError,
  ComparisonErrorCode,
  isComparisonError,
} from './comparison-error.js';

export type { ComparisonErrorInfo } from './comparison-error.js';
