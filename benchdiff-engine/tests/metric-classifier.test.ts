/**
 * Tests for the Metric Classifier
 */

import { describe, it, expect } from 'vitest';
import { classifyMetric, betterDirection, type ClassificationRule } from '../src/metric-classifier.js';
import { MetricKind } from '../src/types.js';

describe('classifyMetric', () => {
  it.each([
    ['Gen 0', MetricKind.GCCount],
    ['Gen 2', MetricKind.GCCount],
    ['Op/s', MetricKind.Throughput],
    ['OperationsPerSecond', MetricKind.Throughput],
    ['Allocated', MetricKind.Memory],
    ['Alloc B/op', MetricKind.Memory],
    ['Mean', MetricKind.Time],
    ['StdDev', MetricKind.Time],
    ['P95', MetricKind.Time],
  ])('classifies %s', (name, kind) => {
    expect(classifyMetric(name)).toBe(kind);
  });

  it('ignores case and surrounding or repeated whitespace', () => {
    expect(classifyMetric('  gen   1 ')).toBe(MetricKind.GCCount);
    expect(classifyMetric('OP/S')).toBe(MetricKind.Throughput);
    expect(classifyMetric('mEaN')).toBe(MetricKind.Time);
  });

  it('classifies alloc-like names as memory before the per-second heuristic', () => {
    expect(classifyMetric('Alloc/op')).toBe(MetricKind.Memory);
    expect(classifyMetric('AllocatedBytes')).toBe(MetricKind.Memory);
    expect(classifyMetric('Alloc/s')).toBe(MetricKind.Memory);
  });

  it('falls back to the per-second heuristic', () => {
    expect(classifyMetric('Bytes/s')).toBe(MetricKind.Throughput);
    expect(classifyMetric('RequestsPerSecond')).toBe(MetricKind.Throughput);
  });

  it('defaults unknown names to time', () => {
    expect(classifyMetric('CustomStat')).toBe(MetricKind.Time);
    expect(classifyMetric('Ratio')).toBe(MetricKind.Time);
  });

  it('evaluates extra rules ahead of the defaults', () => {
    const rules: ClassificationRule[] = [
      { name: 'custom', test: (k) => k === 'customstat', kind: MetricKind.Throughput },
      { name: 'mean-as-gc', test: (k) => k === 'mean', kind: MetricKind.GCCount },
    ];
    expect(classifyMetric('CustomStat', rules)).toBe(MetricKind.Throughput);
    expect(classifyMetric('Mean', rules)).toBe(MetricKind.GCCount);
    expect(classifyMetric('Median', rules)).toBe(MetricKind.Time);
  });
});

describe('betterDirection', () => {
  it('prefers increases only for throughput', () => {
    expect(betterDirection(MetricKind.Throughput)).toBe('up');
    expect(betterDirection(MetricKind.Time)).toBe('down');
    expect(betterDirection(MetricKind.Memory)).toBe('down');
    expect(betterDirection(MetricKind.GCCount)).toBe('down');
  });
});
