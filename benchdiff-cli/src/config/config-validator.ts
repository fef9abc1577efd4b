/**
 * Configuration Validator
 *
 * Checks one layer of settings and reports every problem found, each with
 * the dotted path of the offending setting. Unknown settings are warnings;
 * everything else is an error.
 *
 * @module config/config-validator
 */

import { z } from 'zod';

/**
 * Validation problem with location information
 */
export interface ValidationError {
  message: string;
  /** Dotted setting path, empty for the document itself */
  path: string;
  severity: 'error' | 'warning';
  /** Where the layer came from: a file path, "environment" or "command line" */
  source?: string;
}

const threshold = z
  .number({ invalid_type_error: 'must be a number' })
  .nonnegative('must not be negative');

const columnList = z.array(z.string({ invalid_type_error: 'must be a string' }), {
  invalid_type_error: 'must be an array of column names',
});

export const ThresholdsSchema = z.object({
  time: threshold.optional(),
  alloc: threshold.optional(),
  throughput: threshold.optional(),
});

export const ConfigLayerSchema = z.object({
  key: columnList.optional(),
  metrics: columnList.optional(),
  timeUnit: z.enum(['ns', 'us', 'ms', 's']).optional(),
  memUnit: z
    .string()
    .transform((unit) => unit.toUpperCase())
    .pipe(z.enum(['B', 'KB', 'MB', 'GB']))
    .optional(),
  thresholds: ThresholdsSchema.optional(),
  failOnRegression: z.boolean({ invalid_type_error: 'must be true or false' }).optional(),
  out: z.string().min(1, 'must not be empty').optional(),
  logLevel: z.enum(['error', 'warn', 'info', 'debug']).optional(),
});

/** A validated layer, with the memory unit upper-cased */
export type ConfigLayer = z.output<typeof ConfigLayerSchema>;

const KNOWN_SETTINGS: ReadonlySet<string> = new Set(Object.keys(ConfigLayerSchema.shape));
const KNOWN_THRESHOLDS: ReadonlySet<string> = new Set(Object.keys(ThresholdsSchema.shape));

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function unknownSettings(value: Record<string, unknown>, source?: string): ValidationError[] {
  const warnings: ValidationError[] = [];
  for (const key of Object.keys(value)) {
    if (!KNOWN_SETTINGS.has(key)) {
      warnings.push({ message: `Unknown setting "${key}" will be ignored`, path: key, severity: 'warning', source });
    }
  }
  const thresholds = value.thresholds;
  if (isObject(thresholds)) {
    for (const key of Object.keys(thresholds)) {
      if (!KNOWN_THRESHOLDS.has(key)) {
        warnings.push({
          message: `Unknown threshold "${key}" will be ignored`,
          path: `thresholds.${key}`,
          severity: 'warning',
          source,
        });
      }
    }
  }
  return warnings;
}

/**
 * Validate one settings layer and return the parsed layer when it has no errors
 */
export function checkConfigLayer(
  value: unknown,
  source?: string
): { layer?: ConfigLayer; problems: ValidationError[] } {
  if (!isObject(value)) {
    return {
      problems: [{ message: 'Configuration must be a JSON object', path: '', severity: 'error', source }],
    };
  }

  const problems = unknownSettings(value, source);
  const parsed = ConfigLayerSchema.safeParse(value);

  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      const path = issue.path.join('.');
      problems.push({
        message: path ? `${path}: ${issue.message}` : issue.message,
        path,
        severity: 'error',
        source,
      });
    }
    return { problems };
  }

  return { layer: parsed.data, problems };
}

/**
 * Validate config structure and values
 */
export function validateConfig(value: unknown, source?: string): ValidationError[] {
  return checkConfigLayer(value, source).problems;
}

/**
 * Whether any problem is fatal
 */
export function hasErrors(problems: readonly ValidationError[]): boolean {
  return problems.some((problem) => problem.severity === 'error');
}

/**
 * Raised when settings cannot be used; carries every problem found
 */
export class ConfigError extends Error {
  constructor(public readonly problems: readonly ValidationError[]) {
    super(describeProblems(problems));
    this.name = 'ConfigError';
  }
}

function describeProblems(problems: readonly ValidationError[]): string {
  const first = problems.find((problem) => problem.severity === 'error');
  return first ? `Invalid configuration: ${first.message}` : 'Invalid configuration';
}

/**
 * Type guard for ConfigError
 */
export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}
