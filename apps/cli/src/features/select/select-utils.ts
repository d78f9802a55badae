import {
  InsufficientFundsError,
  InvalidSelectionRequestError,
  MissingPriceError,
  type LotSelectionError,
} from '@lotwise/accounting';
import { formatZodIssues } from '@lotwise/core';
import { SourceFileNotFoundError, SourceFileValidationError, type SourceFileError } from '@lotwise/ingestion';
import { err, ok, type Result } from 'neverthrow';

import type { CommandFailure } from '../shared/cli-response.js';
import { ExitCodes } from '../shared/exit-codes.js';
import { SelectCommandInputSchema, type SelectCommandInput } from '../shared/schemas.js';

export interface RawSelectArgs {
  accountFile: string;
  priceFile: string;
  target: string;
  taxRate?: string | undefined;
}

/** `error.code` in the JSON envelope */
export type SelectErrorCode = LotSelectionError['kind'] | SourceFileError['kind'] | 'invalid_config' | 'unexpected';

/** `error.details` in the JSON envelope */
export type SelectErrorDetails =
  | { filePath: string }
  | { filePath: string; issues: string[] }
  | { holdingIds: string[] }
  | { availableNetAmount: string; target: string }
  | { issues: string[] };

export type SelectFailure = CommandFailure<SelectErrorCode, SelectErrorDetails>;

const USAGE_TIP = 'Check your command arguments and try again.\nRun with --help for usage information.';

/**
 * Validate command arguments. A missing tax rate falls back to the configured
 * default, then to zero.
 */
export function buildSelectParams(
  args: RawSelectArgs,
  rawOptions: unknown,
  defaultTaxRate: string | undefined
): Result<SelectCommandInput, InvalidSelectionRequestError> {
  const options = typeof rawOptions === 'object' && rawOptions !== null ? rawOptions : {};
  const parsed = SelectCommandInputSchema.safeParse({
    ...options,
    accountFile: args.accountFile,
    priceFile: args.priceFile,
    target: args.target,
    taxRate: args.taxRate ?? defaultTaxRate ?? '0',
  });

  if (!parsed.success) {
    return err(new InvalidSelectionRequestError(formatZodIssues(parsed.error)));
  }
  return ok(parsed.data);
}

/**
 * Classify a failed selection run: envelope code, structured details,
 * exit code and text-mode tip.
 */
export function describeSelectFailure(error: Error): SelectFailure {
  if (error instanceof SourceFileNotFoundError) {
    return {
      code: error.kind,
      details: { filePath: error.filePath },
      error,
      exitCode: ExitCodes.NOT_FOUND,
      tip: 'Double-check the file path and try again.',
    };
  }
  if (error instanceof SourceFileValidationError) {
    return {
      code: error.kind,
      details: { filePath: error.filePath, issues: [...error.issues] },
      error,
      exitCode: ExitCodes.VALIDATION_ERROR,
    };
  }
  if (error instanceof MissingPriceError) {
    return {
      code: error.kind,
      details: { holdingIds: [...error.holdingIds] },
      error,
      exitCode: ExitCodes.VALIDATION_ERROR,
      tip: 'Add a "Fund,Share price" row for each listed holding to the price file.',
    };
  }
  if (error instanceof InvalidSelectionRequestError) {
    return {
      code: error.kind,
      details: { issues: [...error.issues] },
      error,
      exitCode: ExitCodes.INVALID_ARGS,
      tip: USAGE_TIP,
    };
  }
  if (error instanceof InsufficientFundsError) {
    return {
      code: error.kind,
      details: {
        availableNetAmount: error.availableNetAmount.toFixed(),
        target: error.target.toFixed(),
      },
      error,
      exitCode: ExitCodes.GENERAL_ERROR,
    };
  }
  return { code: 'unexpected', error, exitCode: ExitCodes.GENERAL_ERROR };
}

/**
 * An environment variable the command reads failed validation.
 */
export function describeConfigFailure(error: Error): SelectFailure {
  return {
    code: 'invalid_config',
    error,
    exitCode: ExitCodes.GENERAL_ERROR,
    tip: 'Fix or unset the variables listed above.',
  };
}
