/**
 * Dataset abstraction
 *
 * Wraps the ordered header list and rows of one benchmark export, with
 * case- and whitespace-insensitive column lookup. Header spelling is
 * preserved exactly as it appeared in the source.
 *
 * @module dataset
 */

import type { DatasetRow } from './types.js';

/**
 * Normalize a column name for comparison: trim, collapse inner
 * whitespace to a single space, lower-case.
 */
export function normalizeName(name: string): string {
  return name.trim().replace(/\s+/g, ' ').toLowerCase();
}

/**
 * Map from normalized name to the first header that produced it
 */
export function indexHeaders(headers: readonly string[]): Map<string, string> {
  const index = new Map<string, string>();
  for (const header of headers) {
    const key = normalizeName(header);
    if (!index.has(key)) {
      index.set(key, header);
    }
  }
  return index;
}

/**
 * An immutable tabular dataset
 */
export class Dataset {
  /** Distinct headers in source order */
  public readonly headers: readonly string[];
  public readonly rows: readonly DatasetRow[];
  /** Human-readable origin, used in diagnostics */
  public readonly source: string;
  private readonly headerIndex: Map<string, string>;

  constructor(headers: readonly string[], rows: readonly DatasetRow[], source = '<memory>') {
    this.headers = Object.freeze(Array.from(new Set(headers)));
    this.rows = Object.freeze(rows.map((row) => Object.freeze({ ...row })));
    this.source = source;
    this.headerIndex = indexHeaders(this.headers);
  }

  /**
   * Build a dataset from plain row objects, taking headers from first appearance
   */
  static fromRecords(records: readonly Record<string, string>[], source?: string): Dataset {
    const headers: string[] = [];
    const seen = new Set<string>();
    for (const record of records) {
      for (const column of Object.keys(record)) {
        if (!seen.has(column)) {
          seen.add(column);
          headers.push(column);
        }
      }
    }
    return new Dataset(headers, records, source);
  }

  get rowCount(): number {
    return this.rows.length;
  }

  /**
   * Check whether a column exists (case/whitespace-insensitive)
   */
  hasColumn(name: string): boolean {
    return this.headerIndex.has(normalizeName(name));
  }

  /**
   * Resolve a column name to this dataset's original spelling
   */
  resolveColumn(name: string): string | undefined {
    return this.headerIndex.get(normalizeName(name));
  }

  /**
   * Read a cell by column name (case/whitespace-insensitive).
   * Returns undefined when the column does not exist or the row lacks it.
   */
  cell(row: DatasetRow, column: string): string | undefined {
    const header = this.resolveColumn(column);
    if (header === undefined) {
      return undefined;
    }
    return Object.prototype.hasOwnProperty.call(row, header) ? row[header] : undefined;
  }
}
