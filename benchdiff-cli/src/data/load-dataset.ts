/**
 * Picks a loader by file extension
 *
 * @module data/load-dataset
 */

import * as path from 'path';
import type { Dataset } from '@benchdiff/engine';
import { loadCsvFile } from './csv-loader.js';
import { loadJsonFile } from './json-loader.js';

/**
 * Load a benchmark export: ".json" reads a BenchmarkDotNet JSON report,
 * anything else is read as CSV
 *
 * @throws LoadError
 */
export async function loadDataset(filePath: string): Promise<Dataset> {
  if (path.extname(filePath).toLowerCase() === '.json') {
    return loadJsonFile(filePath);
  }
  return loadCsvFile(filePath);
}
