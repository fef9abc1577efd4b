/**
 * Long-form CSV Report
 *
 * One record per case and metric, for spreadsheets and CI artifacts.
 *
 * @module report/csv-report
 */

import * as fs from 'fs';
import type { ComparisonResult } from '@benchdiff/engine';
import { getLogger } from '../logging/logger.js';

export const LONG_FORM_FIELDS = [
  'key',
  'status',
  'metric',
  'old',
  'new',
  'delta_pct',
  'delta_sign',
  'better_direction',
] as const;

export type LongFormField = (typeof LONG_FORM_FIELDS)[number];

export type LongFormRecord = Record<LongFormField, string>;

function deltaSign(delta: number | undefined): 'pos' | 'neg' | 'zero' {
  if (delta !== undefined && delta > 0) return 'pos';
  if (delta !== undefined && delta < 0) return 'neg';
  return 'zero';
}

/**
 * Flatten a comparison into long-form records, in row then metric order
 */
export function toLongFormRecords(result: ComparisonResult): LongFormRecord[] {
  const records: LongFormRecord[] = [];
  for (const row of result.rows) {
    for (const cell of row.cells) {
      records.push({
        key: row.caseKey,
        status: row.status,
        metric: cell.metric,
        old: cell.oldDisplay,
        new: cell.newDisplay,
        delta_pct: cell.deltaPct === undefined ? '' : cell.deltaPct.toFixed(4),
        delta_sign: deltaSign(cell.deltaPct),
        better_direction: cell.betterDirection,
      });
    }
  }
  return records;
}

/**
 * Quote a value when it contains a comma, quote or line break
 */
export function escapeCsvValue(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

/**
 * Serialize records with a header line
 */
export function serializeLongForm(records: readonly LongFormRecord[]): string {
  const lines = [LONG_FORM_FIELDS.join(',')];
  for (const record of records) {
    lines.push(LONG_FORM_FIELDS.map((field) => escapeCsvValue(record[field])).join(','));
  }
  return lines.join('\n') + '\n';
}

/**
 * Write the long-form report to disk
 */
export async function writeLongFormCsv(filePath: string, result: ComparisonResult): Promise<number> {
  const records = toLongFormRecords(result);
  await fs.promises.writeFile(filePath, serializeLongForm(records), 'utf-8');
  getLogger('csv-report').debug({ filePath, records: records.length }, 'Wrote long-form report');
  return records.length;
}
