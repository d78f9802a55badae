import { isDevelopment } from '@lotwise/env';

import type { ExitCode } from './exit-codes.js';

/**
 * A failed run, classified once and rendered by either output mode.
 */
export interface CommandFailure<TCode extends string = string, TDetails = unknown> {
  code: TCode;
  details?: TDetails | undefined;
  error: Error;
  exitCode: ExitCode;
  /** Shown under the message in text mode */
  tip?: string | undefined;
}

export interface RunMetadata {
  duration_ms: number;
}

export interface SuccessResponse<TData, TMetadata extends object> {
  success: true;
  command: string;
  /** ISO 8601 */
  timestamp: string;
  data: TData;
  metadata: TMetadata & RunMetadata;
}

export interface ErrorResponse<TCode extends string, TDetails> {
  success: false;
  command: string;
  timestamp: string;
  error: {
    code: TCode;
    details?: TDetails | undefined;
    message: string;
    /** Development only */
    stack?: string | undefined;
  };
}

export function createSuccessResponse<TData, TMetadata extends object>(
  command: string,
  data: TData,
  metadata: TMetadata & RunMetadata
): SuccessResponse<TData, TMetadata> {
  return {
    success: true,
    command,
    timestamp: new Date().toISOString(),
    data,
    metadata,
  };
}

export function createErrorResponse<TCode extends string, TDetails>(
  command: string,
  failure: CommandFailure<TCode, TDetails>
): ErrorResponse<TCode, TDetails> {
  const error: ErrorResponse<TCode, TDetails>['error'] = {
    code: failure.code,
    message: failure.error.message,
  };

  if (failure.details !== undefined) {
    error.details = failure.details;
  }

  if (isDevelopment() && failure.error.stack) {
    error.stack = failure.error.stack;
  }

  return {
    success: false,
    command,
    timestamp: new Date().toISOString(),
    error,
  };
}
