import fs from 'node:fs/promises';

import { getErrorMessage, isNodeSystemError, wrapError } from '@lotwise/core';
import { err, ok, type Result } from 'neverthrow';

import { SourceFileNotFoundError, SourceFileValidationError } from '../errors.js';

import { CsvParser } from './csv-parser.js';

/**
 * Read a source file as UTF-8 text
 */
export async function readSourceFile(filePath: string): Promise<Result<string, Error>> {
  try {
    return ok(await fs.readFile(filePath, 'utf-8'));
  } catch (error) {
    if (isNodeSystemError(error) && error.code === 'ENOENT') {
      return err(new SourceFileNotFoundError(filePath));
    }
    return wrapError(error, `Failed to read ${filePath}`);
  }
}

/**
 * Check the header for the required columns, then parse the rows.
 * Malformed CSV (unbalanced quotes, ragged rows) is reported, not thrown.
 */
export function parseCsvSource(
  content: string,
  source: string,
  requiredColumns: readonly string[]
): Result<Record<string, string>[], SourceFileValidationError> {
  const missingColumns = CsvParser.findMissingColumns(content, requiredColumns);
  if (missingColumns.length > 0) {
    return err(new SourceFileValidationError(source, [`Missing column(s): ${missingColumns.join(', ')}`]));
  }

  try {
    return ok(CsvParser.parseContent(content));
  } catch (error) {
    return err(new SourceFileValidationError(source, [getErrorMessage(error)]));
  }
}
