/**
 * Display formatting shared by the report renderers
 *
 * @module formatting
 */

import { fromBase } from './unit-normalizer.js';
import { MetricKind, type ComparisonCell, type MemoryUnit, type TimeUnit } from './types.js';

/** Shown wherever a value or delta is unavailable */
export const PLACEHOLDER = '-';

/**
 * Format a base value in its display unit with three decimals
 */
export function formatValue(
  kind: MetricKind,
  base: number | undefined,
  timeUnit: TimeUnit,
  memoryUnit: MemoryUnit
): string {
  if (base === undefined) {
    return PLACEHOLDER;
  }
  const value = fromBase(kind, base, timeUnit, memoryUnit).toFixed(3);
  switch (kind) {
    case MetricKind.Time:
      return `${value} ${timeUnit}`;
    case MetricKind.Memory:
      return `${value} ${memoryUnit.toUpperCase()}`;
    case MetricKind.Throughput:
      return `${value} ops/s`;
    case MetricKind.GCCount:
      return value;
  }
}

/**
 * Format a percent delta as "+10.00%", "-3.50%" or "0.00%"
 */
export function formatDeltaPct(delta: number | undefined): string {
  if (delta === undefined) {
    return PLACEHOLDER;
  }
  const sign = delta > 0 ? '+' : '';
  return `${sign}${delta.toFixed(2)}%`;
}

/**
 * Arrow for the sign of a delta
 */
export function directionArrow(delta: number): string {
  if (delta > 0) return '↑';
  if (delta < 0) return '↓';
  return '→';
}

/**
 * Delta column text for a cell: "+10.00% ↑", or "-" when undefined
 */
export function formatDeltaCell(cell: Pick<ComparisonCell, 'deltaPct'>): string {
  if (cell.deltaPct === undefined) {
    return PLACEHOLDER;
  }
  return `${formatDeltaPct(cell.deltaPct)} ${directionArrow(cell.deltaPct)}`;
}
