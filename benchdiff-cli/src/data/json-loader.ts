/**
 * BenchmarkDotNet JSON Loader
 *
 * Reads a full JSON report ("*-report-full.json") into a Dataset with the
 * columns Benchmark, Mean, P95 and Allocated. Statistics in these reports
 * are already nanoseconds and allocations bytes, so the cells are written
 * without unit labels.
 *
 * @module data/json-loader
 */

import { z } from 'zod';
import { Dataset } from '@benchdiff/engine';
import { getLogger } from '../logging/logger.js';
import { readInputFile } from './input-file.js';
import { LoadError, LoadErrorCode } from './load-error.js';

export const BenchmarkEntrySchema = z.object({
  FullName: z.string(),
  MethodTitle: z.string(),
  Statistics: z.object({
    Mean: z.number(),
    Percentiles: z
      .object({
        P95: z.number().nullish(),
      })
      .nullish(),
  }),
  Memory: z
    .object({
      AllocatedBytes: z.number().nullish(),
    })
    .nullish(),
});

export const BenchmarkReportSchema = z.object({
  Benchmarks: z.array(BenchmarkEntrySchema),
});

export type BenchmarkEntry = z.infer<typeof BenchmarkEntrySchema>;
export type BenchmarkReport = z.infer<typeof BenchmarkReportSchema>;

/** Columns produced for every report */
export const JSON_COLUMNS: readonly string[] = ['Benchmark', 'Mean', 'P95', 'Allocated'];

/** Separator between FullName and MethodTitle in the Benchmark column */
export const NAME_SEPARATOR = '::';

/**
 * Flatten one report entry into a row
 */
export function toRow(entry: BenchmarkEntry): Record<string, string> {
  const p95 = entry.Statistics.Percentiles?.P95;
  return {
    Benchmark: `${entry.FullName}${NAME_SEPARATOR}${entry.MethodTitle}`,
    Mean: String(entry.Statistics.Mean),
    P95: p95 === undefined || p95 === null ? '' : String(p95),
    Allocated: String(entry.Memory?.AllocatedBytes ?? 0),
  };
}

/**
 * Parse a BenchmarkDotNet JSON report.
 *
 * @throws LoadError PARSE_FAILED for malformed JSON, INVALID_FORMAT when the
 * document does not have the report shape
 */
export function parseBenchmarkJson(content: string, source = '<memory>'): Dataset {
  let document: unknown;
  try {
    document = JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new LoadError(`Invalid JSON in ${source}: ${reason}`, LoadErrorCode.PARSE_FAILED, source);
  }

  const parsed = BenchmarkReportSchema.safeParse(document);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue.path.length > 0 ? issue.path.join('.') : '<root>';
    throw new LoadError(
      `Not a BenchmarkDotNet report: ${source} (${where}: ${issue.message})`,
      LoadErrorCode.INVALID_FORMAT,
      source
    );
  }

  const rows = parsed.data.Benchmarks.map(toRow);
  getLogger('json-loader').debug({ source, benchmarks: rows.length }, 'Parsed JSON report');

  return new Dataset(JSON_COLUMNS, rows, source);
}

/**
 * Load a BenchmarkDotNet JSON report from disk
 *
 * @throws LoadError
 */
export async function loadJsonFile(filePath: string): Promise<Dataset> {
  getLogger('json-loader').debug({ filePath }, 'Loading JSON report');
  const content = await readInputFile(filePath);
  return parseBenchmarkJson(content, filePath);
}
