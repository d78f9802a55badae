import * as p from '@clack/prompts';
import { isDevelopment } from '@lotwise/env';
import { getLogger, setLoggerTransports } from '@lotwise/logger';
import pc from 'picocolors';

import { createErrorResponse, createSuccessResponse, type CommandFailure } from './cli-response.js';

const logger = getLogger('OutputManager');

export type OutputFormat = 'json' | 'text';

/**
 * Route diagnostic logging for a command run.
 *
 * `--verbose` turns console logging on; `--json` always turns it off so
 * stdout carries nothing but the response.
 */
export function configureCommandLogging(options: { json?: boolean | undefined; verbose?: boolean | undefined }): void {
  setLoggerTransports({ console: options.json !== true && options.verbose === true });
}

/**
 * Writes one command's results: @clack/prompts framing and plain report lines
 * in text mode, a single response envelope on stdout in JSON mode.
 */
export class OutputManager {
  private readonly startTime = Date.now();

  constructor(
    private readonly command: string,
    private readonly format: OutputFormat = 'text'
  ) {}

  isJsonMode(): boolean {
    return this.format === 'json';
  }

  isTextMode(): boolean {
    return this.format === 'text';
  }

  /**
   * Write the success envelope (JSON mode only).
   */
  json<TData, TMetadata extends object>(data: TData, metadata: TMetadata): void {
    if (this.format !== 'json') return;

    const response = createSuccessResponse(this.command, data, {
      ...metadata,
      duration_ms: Date.now() - this.startTime,
    });
    console.log(JSON.stringify(response, undefined, 2));
  }

  /**
   * Print report lines to stdout (text mode only).
   */
  print(lines: readonly string[]): void {
    if (this.format !== 'text') return;

    for (const line of lines) {
      console.log(line);
    }
  }

  /**
   * Report a classified failure and exit with its code.
   */
  error<TCode extends string, TDetails>(failure: CommandFailure<TCode, TDetails>): never {
    logger.debug({ code: failure.code, exitCode: failure.exitCode }, failure.error.message);

    if (this.format === 'json') {
      // stdout, not stderr, so callers can parse the response
      console.log(JSON.stringify(createErrorResponse(this.command, failure), undefined, 2));
    } else {
      this.displayTextError(failure);
    }

    process.exit(failure.exitCode);
  }

  intro(message: string): void {
    if (this.format === 'text') {
      p.intro(pc.bgCyan(pc.black(` ${message} `)));
    }
  }

  outro(message: string): void {
    if (this.format === 'text') {
      p.outro(message);
    }
  }

  note(message: string, title?: string): void {
    if (this.format === 'text') {
      p.note(message, title);
    }
  }

  warn(message: string): void {
    if (this.format === 'text') {
      p.log.warn(pc.yellow(message));
    } else {
      logger.warn(message);
    }
  }

  private displayTextError(failure: CommandFailure<string, unknown>): void {
    p.log.error(`${pc.red('✗')} ${failure.error.message}`);

    if (failure.tip) {
      p.note(failure.tip, 'Tip');
    }

    if (isDevelopment() && failure.error.stack) {
      process.stderr.write(`\n${pc.dim(failure.error.stack)}\n\n`);
    }
  }
}
