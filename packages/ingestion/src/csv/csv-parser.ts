import { parse } from 'csv-parse/sync';

/**
 * Generic CSV parser with common preprocessing
 */
export class CsvParser {
  /**
   * Parse CSV text into row objects keyed by header
   */
  static parseContent(content: string): Record<string, string>[] {
    const cleanContent = stripBom(content);

    const records: unknown = parse(cleanContent, {
      columns: true,
      skip_empty_lines: true,
      trim: true,
    });
    if (!Array.isArray(records) || !records.every(isStringRecord)) {
      throw new Error('CSV parser returned rows that are not keyed by header');
    }
    return records;
  }

  /**
   * Header columns of CSV text, trimmed
   */
  static getHeaders(content: string): string[] {
    const headerLine = stripBom(content).split(/\r?\n/, 1)[0] ?? '';
    if (headerLine.trim() === '') return [];

    const records: unknown = parse(headerLine, { trim: true });
    const [headers] = Array.isArray(records) ? records : [];
    return isStringArray(headers) ? headers : [];
  }

  /**
   * Required columns that the header does not contain
   */
  static findMissingColumns(content: string, requiredColumns: readonly string[]): string[] {
    const headers = new Set(CsvParser.getHeaders(content));
    return requiredColumns.filter((column) => !headers.has(column));
  }
}

function isStringRecord(value: unknown): value is Record<string, string> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.values(value).every((field) => typeof field === 'string')
  );
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((field) => typeof field === 'string');
}

function stripBom(content: string): string {
  return content.replace(/^\uFEFF/, ''); // Remove BOM
}
