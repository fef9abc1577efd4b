/**
 * Shared file reading for the dataset loaders
 *
 * @module data/input-file
 */

import * as fs from 'fs';
import { LoadError, LoadErrorCode } from './load-error.js';

/**
 * Read a whole export file as UTF-8.
 *
 * @throws LoadError FILE_NOT_FOUND or FILE_EMPTY
 */
export async function readInputFile(filePath: string): Promise<string> {
  if (!fs.existsSync(filePath)) {
    throw new LoadError(`File not found: ${filePath}`, LoadErrorCode.FILE_NOT_FOUND, filePath);
  }

  const content = await fs.promises.readFile(filePath, 'utf-8');

  if (!content.trim()) {
    throw new LoadError(`File is empty: ${filePath}`, LoadErrorCode.FILE_EMPTY, filePath);
  }

  return content;
}
