/**
 * Unit Normalizer
 *
 * Converts a parsed magnitude and unit suffix into the canonical base unit
 * for its metric kind: nanoseconds for time, bytes for memory. Throughput
 * and GC counts pass through unchanged.
 *
 * Unlabeled time cells are taken as nanoseconds and unlabeled memory cells
 * as bytes, matching the BenchmarkDotNet exporter conventions. An export
 * with unlabeled microsecond cells would be misread; that is a known
 * limitation of the heuristic.
 *
 * @module unit-normalizer
 */

import { classifyMetric, type ClassificationRule } from './metric-classifier.js';
import { MetricKind, type MemoryUnit, type TimeUnit } from './types.js';
import { parseNumber, unitSuffix } from './value-parser.js';

/**
 * Time unit prefixes to nanosecond factors, most specific first.
 * A suffix is matched by prefix, so "ms/op" resolves to milliseconds.
 */
export const TIME_UNIT_FACTORS: ReadonlyArray<readonly [string, number]> = [
  ['ns', 1],
  ['us', 1_000],
  ['µs', 1_000],
  ['μs', 1_000],
  ['ms', 1_000_000],
  ['s', 1_000_000_000],
];

/**
 * Spelling variants folded before memory unit lookup, in order
 */
const MEMORY_SPELLINGS: ReadonlyArray<readonly [string, string]> = [
  ['bytes', 'b'],
  ['byte', 'b'],
  ['kib', 'kb'],
  ['mib', 'mb'],
  ['gib', 'gb'],
];

const MEMORY_UNIT_FACTORS: Readonly<Record<string, number>> = {
  b: 1,
  kb: 1024,
  k: 1024,
  mb: 1024 ** 2,
  m: 1024 ** 2,
  gb: 1024 ** 3,
  g: 1024 ** 3,
};

const DISPLAY_TIME_FACTORS: Readonly<Record<TimeUnit, number>> = {
  ns: 1,
  us: 1_000,
  ms: 1_000_000,
  s: 1_000_000_000,
};

const DISPLAY_MEMORY_FACTORS: Readonly<Record<MemoryUnit, number>> = {
  B: 1,
  KB: 1024,
  MB: 1024 ** 2,
  GB: 1024 ** 3,
};

/**
 * Convert a time value to nanoseconds.
 * Unknown or empty suffixes are assumed to be nanoseconds already.
 */
export function toBaseTime(value: number, suffix: string): number {
  for (const [unit, factor] of TIME_UNIT_FACTORS) {
    if (suffix.startsWith(unit)) {
      return value * factor;
    }
  }
  return value;
}

/**
 * Convert a memory value to bytes.
 * An empty suffix means the value is already bytes.
 */
export function toBaseMemory(value: number, suffix: string): number {
  if (!suffix) {
    return value;
  }
  let unit = suffix.toLowerCase();
  for (const [from, to] of MEMORY_SPELLINGS) {
    unit = unit.replaceAll(from, to);
  }
  const factor = MEMORY_UNIT_FACTORS[unit.trim()];
  return factor === undefined ? value : value * factor;
}

/**
 * Normalize a magnitude to the base unit of its metric kind
 */
export function normalizeValue(value: number, suffix: string, kind: MetricKind): number {
  switch (kind) {
    case MetricKind.Time:
      return toBaseTime(value, suffix);
    case MetricKind.Memory:
      return toBaseMemory(value, suffix);
    case MetricKind.Throughput:
    case MetricKind.GCCount:
      return value;
  }
}

/**
 * Parse a raw cell and convert it to base units for the given metric
 *
 * @returns Base value, or undefined when the cell holds no number
 */
export function convertToBase(
  metric: string,
  raw: string | undefined,
  rules?: readonly ClassificationRule[]
): number | undefined {
  const value = parseNumber(raw);
  if (value === undefined) {
    return undefined;
  }
  return normalizeValue(value, unitSuffix(raw), classifyMetric(metric, rules));
}

/**
 * Convert a base value to the chosen display unit.
 * Throughput and GC counts are returned unchanged.
 */
export function fromBase(
  kind: MetricKind,
  value: number,
  timeUnit: TimeUnit,
  memoryUnit: MemoryUnit
): number {
  if (kind === MetricKind.Time) {
    return value / DISPLAY_TIME_FACTORS[timeUnit];
  }
  if (kind === MetricKind.Memory) {
    return value / DISPLAY_MEMORY_FACTORS[memoryUnit];
  }
  return value;
}

/**
 * Type guard for display time units
 */
export function isTimeUnit(value: string): value is TimeUnit {
  return Object.prototype.hasOwnProperty.call(DISPLAY_TIME_FACTORS, value);
}

/**
 * Type guard for display memory units (upper-case spelling)
 */
export function isMemoryUnit(value: string): value is MemoryUnit {
  return Object.prototype.hasOwnProperty.call(DISPLAY_MEMORY_FACTORS, value);
}
