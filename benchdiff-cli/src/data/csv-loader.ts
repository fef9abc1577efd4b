/**
 * CSV Loader
 *
 * Reads a BenchmarkDotNet CSV export (or any delimited table with a header
 * row) into a Dataset. Header spelling is kept as written; lookups are
 * case-insensitive later on through the Dataset helpers.
 *
 * @module data/csv-loader
 */

import { Dataset } from '@benchdiff/engine';
import { getLogger } from '../logging/logger.js';
import { readInputFile } from './input-file.js';
import { LoadError, LoadErrorCode } from './load-error.js';

/**
 * CSV parsing options
 */
export interface CsvOptions {
  /** Origin shown in diagnostics (default: "<memory>") */
  source?: string;
  /** Delimiter character (default: comma) */
  delimiter?: string;
}

const BOM = '\uFEFF';

/**
 * Split CSV text into records. Quoted fields may contain the delimiter,
 * escaped quotes ("") and line breaks. Blank lines produce no record.
 */
function parseRecords(content: string, delimiter: string, source: string): string[][] {
  const records: string[][] = [];
  let record: string[] = [];
  let field = '';
  let inQuotes = false;
  let line = 1;
  let quoteLine = 1;
  let i = 0;

  const endRecord = (): void => {
    record.push(field.trim());
    if (!(record.length === 1 && record[0] === '')) {
      records.push(record);
    }
    record = [];
    field = '';
  };

  while (i < content.length) {
    const char = content[i];

    if (inQuotes) {
      if (char === '"') {
        if (content[i + 1] === '"') {
          // Escaped quote
          field += '"';
          i += 2;
          continue;
        }
        inQuotes = false;
        i++;
        continue;
      }
      if (char === '\n') {
        line++;
      }
      field += char;
      i++;
      continue;
    }

    if (char === '"') {
      inQuotes = true;
      quoteLine = line;
      i++;
      continue;
    }

    if (char === delimiter) {
      record.push(field.trim());
      field = '';
      i++;
      continue;
    }

    if (char === '\r' || char === '\n') {
      if (char === '\r' && content[i + 1] === '\n') {
        i++;
      }
      endRecord();
      line++;
      i++;
      continue;
    }

    field += char;
    i++;
  }

  if (inQuotes) {
    throw new LoadError(
      `Unterminated quoted field starting on line ${quoteLine} of ${source}`,
      LoadErrorCode.PARSE_FAILED,
      source
    );
  }

  if (field !== '' || record.length > 0) {
    endRecord();
  }

  return records;
}

/**
 * Parse CSV content into a Dataset.
 * Short rows are padded with empty cells; extra cells are dropped. When a
 * header repeats, the first column of that name wins.
 *
 * @throws LoadError FILE_EMPTY when there is no header row, PARSE_FAILED on
 * malformed quoting or an unusable delimiter
 */
export function parseCsv(content: string, options: CsvOptions = {}): Dataset {
  const source = options.source ?? '<memory>';
  const delimiter = options.delimiter ?? ',';

  if (delimiter.length !== 1 || delimiter === '"' || delimiter === '\n' || delimiter === '\r') {
    throw new LoadError(`Unsupported delimiter: ${JSON.stringify(delimiter)}`, LoadErrorCode.PARSE_FAILED, source);
  }

  const text = content.startsWith(BOM) ? content.slice(BOM.length) : content;
  const records = parseRecords(text, delimiter, source);

  if (records.length === 0) {
    throw new LoadError(`CSV content is empty: ${source}`, LoadErrorCode.FILE_EMPTY, source);
  }

  const [headers, ...dataRecords] = records;
  const rows = dataRecords.map((values) => {
    const row: Record<string, string> = {};
    headers.forEach((header, j) => {
      if (!Object.prototype.hasOwnProperty.call(row, header)) {
        row[header] = values[j] ?? '';
      }
    });
    return row;
  });

  getLogger('csv-loader').debug({ source, columns: headers.length, rows: rows.length }, 'Parsed CSV');

  return new Dataset(headers, rows, source);
}

/**
 * Load a CSV export from disk
 *
 * @throws LoadError
 */
export async function loadCsvFile(filePath: string, options: Omit<CsvOptions, 'source'> = {}): Promise<Dataset> {
  getLogger('csv-loader').debug({ filePath }, 'Loading CSV file');
  const content = await readInputFile(filePath);
  return parseCsv(content, { ...options, source: filePath });
}
