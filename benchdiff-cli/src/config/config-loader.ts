/**
 * Configuration Loader
 *
 * Resolves settings in layers: built-in defaults, then benchdiff.config.json,
 * then BENCHDIFF_* environment variables, then command-line flags. Each
 * layer is validated on its own so problems name their source.
 *
 * @module config/config-loader
 */

import * as fs from 'fs';
import * as path from 'path';
import { DEFAULT_THRESHOLDS } from '@benchdiff/engine';
import { DEFAULT_LOG_LEVEL, getLogger } from '../logging/logger.js';
import type { BenchdiffConfig, RawConfigLayer } from '../types.js';
import {
  ConfigError,
  checkConfigLayer,
  hasErrors,
  type ConfigLayer,
  type ValidationError,
} from './config-validator.js';

export const CONFIG_FILE_NAME = 'benchdiff.config.json';

/** Parent directories searched above the working directory */
export const MAX_PARENT_LEVELS = 5;

export const DEFAULT_CONFIG: Readonly<BenchdiffConfig> = {
  key: [],
  metrics: [],
  timeUnit: 'ns',
  memUnit: 'B',
  thresholds: {
    time: DEFAULT_THRESHOLDS.time,
    alloc: DEFAULT_THRESHOLDS.memory,
    throughput: DEFAULT_THRESHOLDS.throughput,
  },
  failOnRegression: false,
  logLevel: DEFAULT_LOG_LEVEL,
};

export const ENVIRONMENT_SOURCE = 'environment';

/**
 * Check if a file exists
 */
async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stats = await fs.promises.stat(filePath);
    return stats.isFile();
  } catch {
    return false;
  }
}

/**
 * Find the config file in the start directory or up to five parents
 */
export async function findConfigFile(startDir: string): Promise<string | undefined> {
  let currentPath = path.resolve(startDir);

  for (let level = 0; level <= MAX_PARENT_LEVELS; level++) {
    const configPath = path.join(currentPath, CONFIG_FILE_NAME);
    if (await fileExists(configPath)) {
      return configPath;
    }

    const parentPath = path.dirname(currentPath);
    if (parentPath === currentPath) {
      // Reached root
      break;
    }
    currentPath = parentPath;
  }

  return undefined;
}

/**
 * Read and parse a config file without validating it
 *
 * @throws ConfigError when the file is missing or is not valid JSON
 */
export async function readConfigFile(configPath: string): Promise<unknown> {
  if (!(await fileExists(configPath))) {
    throw new ConfigError([
      { message: `Config file not found: ${configPath}`, path: '', severity: 'error', source: configPath },
    ]);
  }

  const text = await fs.promises.readFile(configPath, 'utf-8');
  try {
    return JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError([
      { message: `Config file is not valid JSON: ${reason}`, path: '', severity: 'error', source: configPath },
    ]);
  }
}

function envNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return Number(value);
}

/**
 * Settings taken from BENCHDIFF_* environment variables
 */
export function environmentLayer(env: NodeJS.ProcessEnv): RawConfigLayer {
  const layer: RawConfigLayer = {};
  const thresholds = {
    time: envNumber(env.BENCHDIFF_WARN_TIME),
    alloc: envNumber(env.BENCHDIFF_WARN_ALLOC),
    throughput: envNumber(env.BENCHDIFF_WARN_THROUGHPUT),
  };

  if (thresholds.time !== undefined || thresholds.alloc !== undefined || thresholds.throughput !== undefined) {
    layer.thresholds = thresholds;
  }

  const logLevel = env.BENCHDIFF_LOG_LEVEL?.trim();
  if (logLevel) {
    layer.logLevel = logLevel.toLowerCase();
  }

  return layer;
}

/**
 * Overlay the settings a layer sets onto a resolved config
 */
export function applyLayer(config: BenchdiffConfig, layer: ConfigLayer): BenchdiffConfig {
  return {
    key: layer.key ?? config.key,
    metrics: layer.metrics ?? config.metrics,
    timeUnit: layer.timeUnit ?? config.timeUnit,
    memUnit: layer.memUnit ?? config.memUnit,
    thresholds: {
      time: layer.thresholds?.time ?? config.thresholds.time,
      alloc: layer.thresholds?.alloc ?? config.thresholds.alloc,
      throughput: layer.thresholds?.throughput ?? config.thresholds.throughput,
    },
    failOnRegression: layer.failOnRegression ?? config.failOnRegression,
    out: layer.out ?? config.out,
    logLevel: layer.logLevel ?? config.logLevel,
  };
}

/**
 * Inputs for resolving the settings of one run
 */
export interface ResolveConfigOptions {
  /** Directory the config file search starts from */
  cwd: string;
  env: NodeJS.ProcessEnv;
  /** Explicit config file; disables the search */
  configPath?: string;
  /** Command-line settings */
  overrides?: RawConfigLayer;
}

/**
 * Resolved settings with the file they came from and any warnings
 */
export interface ResolvedConfig {
  config: BenchdiffConfig;
  configPath?: string;
  warnings: ValidationError[];
}

/**
 * Resolve settings from every layer.
 *
 * @throws ConfigError listing every problem when any layer has an error
 */
export async function resolveConfig(options: ResolveConfigOptions): Promise<ResolvedConfig> {
  const configPath = options.configPath
    ? path.resolve(options.cwd, options.configPath)
    : await findConfigFile(options.cwd);

  const layers: Array<{ value: unknown; source: string }> = [];
  if (configPath) {
    getLogger('config').debug({ configPath }, 'Using config file');
    layers.push({ value: await readConfigFile(configPath), source: configPath });
  }
  layers.push({ value: environmentLayer(options.env), source: ENVIRONMENT_SOURCE });
  if (options.overrides) {
    layers.push({ value: options.overrides, source: 'command line' });
  }

  const problems: ValidationError[] = [];
  let config: BenchdiffConfig = { ...DEFAULT_CONFIG };

  for (const { value, source } of layers) {
    const checked = checkConfigLayer(value, source);
    problems.push(...checked.problems);
    if (checked.layer) {
      config = applyLayer(config, checked.layer);
    }
  }

  if (hasErrors(problems)) {
    throw new ConfigError(problems);
  }

  return { config, configPath, warnings: problems };
}
