/**
 * benchdiff CLI Type Definitions
 */

import type { MemoryUnit, TimeUnit } from '@benchdiff/engine';
import type { LogLevel } from './logging/logger.js';

/**
 * Regression thresholds in percent, as named in configuration
 */
export interface ThresholdSettings {
  /** Tolerated increase for time and GC-count metrics */
  time: number;
  /** Tolerated increase for memory metrics */
  alloc: number;
  /** Tolerated decrease for throughput metrics */
  throughput: number;
}

/**
 * Fully resolved settings for one run
 */
export interface BenchdiffConfig {
  /** Explicit key columns; empty means automatic */
  key: string[];
  /** Explicit metric columns; empty means automatic */
  metrics: string[];
  timeUnit: TimeUnit;
  memUnit: MemoryUnit;
  thresholds: ThresholdSettings;
  /** Exit with code 2 when a regression is found */
  failOnRegression: boolean;
  /** Path of the long-form CSV report */
  out?: string;
  logLevel: LogLevel;
}

/**
 * Partial, unvalidated settings from one source (file, environment or
 * command line)
 */
export interface RawConfigLayer {
  key?: string[];
  metrics?: string[];
  timeUnit?: string;
  memUnit?: string;
  thresholds?: Partial<ThresholdSettings>;
  failOnRegression?: boolean;
  out?: string;
  logLevel?: string;
}

/**
 * Process exit codes
 */
export enum ExitCode {
  OK = 0,
  /** Usage, configuration, load or column resolution failure */
  FAILURE = 1,
  /** Regressions found with failOnRegression set */
  REGRESSION = 2,
}
