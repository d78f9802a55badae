/**
 * The input file does not exist
 */
export class SourceFileNotFoundError extends Error {
  readonly kind = 'file_not_found' as const;

  constructor(readonly filePath: string) {
    super(`File not found: ${filePath}`);
    this.name = 'SourceFileNotFoundError';
  }
}

/**
 * The input file was read but its header or rows are not usable
 */
export class SourceFileValidationError extends Error {
  readonly kind = 'invalid_source_file' as const;

  constructor(
    readonly filePath: string,
    readonly issues: string[]
  ) {
    super(`Invalid file ${filePath}: ${issues.join('; ')}`);
    this.name = 'SourceFileValidationError';
  }
}

export type SourceFileError = SourceFileNotFoundError | SourceFileValidationError;
