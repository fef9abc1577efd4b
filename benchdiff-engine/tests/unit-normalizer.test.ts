/**
 * Tests for the Unit Normalizer
 */

import { describe, it, expect } from 'vitest';
import {
  toBaseTime,
  toBaseMemory,
  normalizeValue,
  convertToBase,
  fromBase,
  isTimeUnit,
  isMemoryUnit,
  TIME_UNIT_FACTORS,
} from '../src/unit-normalizer.js';
import { parseNumber, unitSuffix } from '../src/value-parser.js';
import { MetricKind } from '../src/types.js';

describe('toBaseTime', () => {
  it.each([
    ['ns', 2],
    ['us', 2_000],
    ['ms', 2_000_000],
    ['s', 2_000_000_000],
  ])('scales %s to nanoseconds', (suffix, expected) => {
    expect(toBaseTime(2, suffix)).toBe(expected);
  });

  it('treats micro-sign spellings as microseconds', () => {
    expect(toBaseTime(3, 'µs')).toBe(3_000);
    expect(toBaseTime(3, 'μs')).toBe(3_000);
  });

  it('matches units by prefix', () => {
    expect(toBaseTime(4, 'ms/op')).toBe(4_000_000);
    expect(toBaseTime(1, 'sec')).toBe(1_000_000_000);
  });

  it('leaves unknown or empty suffixes as nanoseconds', () => {
    expect(toBaseTime(7, '')).toBe(7);
    expect(toBaseTime(7, 'ticks')).toBe(7);
  });

  it('round-trips every recognized suffix through the parser', () => {
    for (const [suffix, factor] of TIME_UNIT_FACTORS) {
      const raw = `2.5 ${suffix}`;
      const value = parseNumber(raw);
      expect(value).toBe(2.5);
      expect(normalizeValue(2.5, unitSuffix(raw), MetricKind.Time)).toBe(2.5 * factor);
    }
  });
});

describe('toBaseMemory', () => {
  it('treats an empty suffix as bytes', () => {
    expect(toBaseMemory(450, '')).toBe(450);
  });

  it('scales by powers of 1024', () => {
    expect(toBaseMemory(1, 'b')).toBe(1);
    expect(toBaseMemory(2, 'kb')).toBe(2048);
    expect(toBaseMemory(1, 'mb')).toBe(1_048_576);
    expect(toBaseMemory(1, 'gb')).toBe(1_073_741_824);
  });

  it('folds spelling variants', () => {
    expect(toBaseMemory(450, 'bytes')).toBe(450);
    expect(toBaseMemory(1, 'byte')).toBe(1);
    expect(toBaseMemory(2, 'kib')).toBe(2048);
    expect(toBaseMemory(1, 'mib')).toBe(1_048_576);
    expect(toBaseMemory(1, 'gib')).toBe(1_073_741_824);
  });

  it('is insensitive to suffix casing', () => {
    expect(toBaseMemory(2, 'KiB')).toBe(toBaseMemory(2, 'kib'));
    expect(toBaseMemory(3, 'MB')).toBe(toBaseMemory(3, 'mb'));
    expect(toBaseMemory(1, 'GiB')).toBe(1_073_741_824);
  });

  it('accepts single-letter units', () => {
    expect(toBaseMemory(1, 'k')).toBe(1024);
    expect(toBaseMemory(1, 'm')).toBe(1_048_576);
    expect(toBaseMemory(1, 'g')).toBe(1_073_741_824);
  });

  it('leaves unknown units unchanged', () => {
    expect(toBaseMemory(5, 'widgets')).toBe(5);
  });
});

describe('normalizeValue', () => {
  it('passes throughput and GC counts through', () => {
    expect(normalizeValue(12, 'ms', MetricKind.Throughput)).toBe(12);
    expect(normalizeValue(12, 'kb', MetricKind.GCCount)).toBe(12);
  });
});

describe('convertToBase', () => {
  it('parses, classifies and normalizes a cell', () => {
    expect(convertToBase('Mean', '1.5 ms')).toBe(1_500_000);
    expect(convertToBase('Allocated', '1.5 KB')).toBe(1536);
    expect(convertToBase('Op/s', '1,000.5')).toBe(1000.5);
    expect(convertToBase('Gen 0', '12 ms')).toBe(12);
  });

  it('returns undefined for cells without a number', () => {
    expect(convertToBase('Mean', '-')).toBeUndefined();
    expect(convertToBase('Mean', '')).toBeUndefined();
  });

  it('applies extra classification rules', () => {
    const rules = [{ name: 'heap', test: (k: string) => k === 'heap', kind: MetricKind.Memory }];
    expect(convertToBase('Heap', '2 KB', rules)).toBe(2048);
    expect(convertToBase('Heap', '2 KB')).toBe(2);
  });
});

describe('fromBase', () => {
  it('converts nanoseconds to the display unit', () => {
    expect(fromBase(MetricKind.Time, 1_500, 'us', 'B')).toBe(1.5);
    expect(fromBase(MetricKind.Time, 2_000_000_000, 's', 'B')).toBe(2);
  });

  it('converts bytes to the display unit', () => {
    expect(fromBase(MetricKind.Memory, 2048, 'ns', 'KB')).toBe(2);
    expect(fromBase(MetricKind.Memory, 1_048_576, 'ns', 'MB')).toBe(1);
  });

  it('leaves throughput and GC counts unchanged', () => {
    expect(fromBase(MetricKind.Throughput, 900, 'ms', 'GB')).toBe(900);
    expect(fromBase(MetricKind.GCCount, 3, 'ms', 'GB')).toBe(3);
  });
});

describe('unit guards', () => {
  it('recognizes display units', () => {
    expect(isTimeUnit('us')).toBe(true);
    expect(isTimeUnit('min')).toBe(false);
    expect(isMemoryUnit('KB')).toBe(true);
    expect(isMemoryUnit('kb')).toBe(false);
  });
});
