/**
 * @benchdiff/cli - loaders, configuration and reports for the benchdiff CLI
 *
 * @module @benchdiff/cli
 */

export { run } from './cli/run.js';
export type { CliIO } from './cli/run.js';
export { parseArgs, splitList, HELP_TEXT, USAGE } from './cli/args.js';
export type { ParsedArgs } from './cli/args.js';

// Configuration
export {
  resolveConfig,
  findConfigFile,
  readConfigFile,
  environmentLayer,
  applyLayer,
  CONFIG_FILE_NAME,
  DEFAULT_CONFIG,
} from './config/config-loader.js';
export type { ResolveConfigOptions, ResolvedConfig } from './config/config-loader.js';
export {
  validateConfig,
  checkConfigLayer,
  hasErrors,
  ConfigError,
  isConfigError,
  ConfigLayerSchema,
} from './config/config-validator.js';
export type { ConfigLayer, ValidationError } from './config/config-validator.js';

// Loaders
export { parseCsv, loadCsvFile } from './data/csv-loader.js';
export type { CsvOptions } from './data/csv-loader.js';
export { parseBenchmarkJson, loadJsonFile, BenchmarkReportSchema } from './data/json-loader.js';
export type { BenchmarkReport, BenchmarkEntry } from './data/json-loader.js';
export { loadDataset } from './data/load-dataset.js';
export { LoadError, LoadErrorCode, isLoadError } from './data/load-error.js';

// Reports
export { renderTable, tableHeaders, formatRegression } from './report/console-table.js';
export {
  toLongFormRecords,
  serializeLongForm,
  writeLongFormCsv,
  escapeCsvValue,
  LONG_FORM_FIELDS,
} from './report/csv-report.js';
export type { LongFormRecord } from './report/csv-report.js';

// Logging
export { createLogger, configureLogger, getLogger, isLogLevel, LOG_LEVELS } from './logging/logger.js';
export type { LogLevel, LoggerOptions } from './logging/logger.js';

export { ExitCode } from './types.js';
export type { BenchdiffConfig, RawConfigLayer, ThresholdSettings } from './types.js';
