import * as p from '@clack/prompts';
import { InvalidSelectionRequestError } from '@lotwise/accounting';
import { resetEnvCache } from '@lotwise/env';
import { SourceFileNotFoundError } from '@lotwise/ingestion';
import { setLoggerTransports } from '@lotwise/logger';
import type { MockInstance } from 'vitest';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { describeSelectFailure } from '../../select/select-utils.js';
import { ExitCodes } from '../exit-codes.js';
import { configureCommandLogging, OutputManager } from '../output.js';

// Mock @clack/prompts
vi.mock('@clack/prompts', () => ({
  intro: vi.fn(),
  outro: vi.fn(),
  note: vi.fn(),
  log: {
    message: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  },
}));

// Mock logger
vi.mock('@lotwise/logger', () => ({
  getLogger: vi.fn(() => ({
    info: vi.fn(),
    warn: vi.fn(),
    debug: vi.fn(),
    error: vi.fn(),
  })),
  setLoggerTransports: vi.fn(),
}));

function spyOnStderr() {
  return vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
}

describe('OutputManager', () => {
  let consoleLogSpy: MockInstance<(message?: unknown, ...optionalParams: unknown[]) => void>;
  let processExitSpy: MockInstance<(code?: number | string | null) => never>;
  let stderrSpy: ReturnType<typeof spyOnStderr>;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-01-01T00:00:00.000Z'));
    vi.stubEnv('NODE_ENV', 'test');
    resetEnvCache();

    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {
      // Mock implementation
    });
    processExitSpy = vi.spyOn(process, 'exit').mockImplementation((_code?: number | string | null) => {
      throw new Error('process.exit called');
    });
    stderrSpy = spyOnStderr();

    vi.clearAllMocks();
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.unstubAllEnvs();
    resetEnvCache();
    consoleLogSpy.mockRestore();
    processExitSpy.mockRestore();
    stderrSpy.mockRestore();
  });

  it('should default to text format', () => {
    const output = new OutputManager('select');
    expect(output.isTextMode()).toBe(true);
    expect(output.isJsonMode()).toBe(false);
  });

  describe('json', () => {
    it('should write the selection envelope with run metadata and duration', () => {
      const output = new OutputManager('select', 'json');
      vi.advanceTimersByTime(1000);

      output.json({ lots: [], target: '600', taxRate: '0' }, { accountFile: 'account.csv', lotCount: 0 });

      expect(consoleLogSpy).toHaveBeenCalledOnce();
      expect(JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]))).toEqual({
        success: true,
        command: 'select',
        timestamp: '2024-01-01T00:00:01.000Z',
        data: { lots: [], target: '600', taxRate: '0' },
        metadata: { accountFile: 'account.csv', lotCount: 0, duration_ms: 1000 },
      });
    });

    it('should print nothing in text mode', () => {
      new OutputManager('select', 'text').json({ lots: [] }, { lotCount: 0 });

      expect(consoleLogSpy).not.toHaveBeenCalled();
    });
  });

  describe('print', () => {
    it('should write each report line in text mode', () => {
      new OutputManager('select', 'text').print(['', 'Total sale amount: 700.000']);

      expect(consoleLogSpy.mock.calls).toEqual([[''], ['Total sale amount: 700.000']]);
    });

    it('should keep stdout clean in json mode', () => {
      new OutputManager('select', 'json').print(['Total sale amount: 700.000']);

      expect(consoleLogSpy).not.toHaveBeenCalled();
    });
  });

  describe('error', () => {
    it('should write the classified failure as JSON and exit with its code', () => {
      const output = new OutputManager('select', 'json');

      expect(() => output.error(describeSelectFailure(new SourceFileNotFoundError('missing.csv')))).toThrow(
        'process.exit called'
      );

      expect(JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]))).toEqual({
        success: false,
        command: 'select',
        timestamp: '2024-01-01T00:00:00.000Z',
        error: {
          code: 'file_not_found',
          details: { filePath: 'missing.csv' },
          message: 'File not found: missing.csv',
        },
      });
      expect(processExitSpy).toHaveBeenCalledWith(ExitCodes.NOT_FOUND);
    });

    it('should show the message and usage tip in text mode', () => {
      const output = new OutputManager('select', 'text');
      const failure = describeSelectFailure(
        new InvalidSelectionRequestError(['target: Sale target must be greater than 0'])
      );

      expect(() => output.error(failure)).toThrow('process.exit called');

      expect(p.log.error).toHaveBeenCalledWith(
        expect.stringContaining('Invalid selection request: target: Sale target must be greater than 0')
      );
      expect(p.note).toHaveBeenCalledWith(
        'Check your command arguments and try again.\nRun with --help for usage information.',
        'Tip'
      );
      expect(processExitSpy).toHaveBeenCalledWith(ExitCodes.INVALID_ARGS);
      expect(stderrSpy).not.toHaveBeenCalled();
    });

    it('should skip the tip when the failure has none', () => {
      const output = new OutputManager('select', 'text');

      expect(() => output.error(describeSelectFailure(new Error('disk full')))).toThrow('process.exit called');

      expect(p.note).not.toHaveBeenCalled();
      expect(processExitSpy).toHaveBeenCalledWith(ExitCodes.GENERAL_ERROR);
    });

    it('should write the stack trace to stderr in development', () => {
      vi.stubEnv('NODE_ENV', 'development');
      resetEnvCache();
      const output = new OutputManager('select', 'text');

      expect(() => output.error(describeSelectFailure(new Error('disk full')))).toThrow('process.exit called');

      expect(stderrSpy).toHaveBeenCalledOnce();
      expect(String(stderrSpy.mock.calls[0]?.[0])).toContain('Error: disk full');
    });
  });

  describe('text-only output', () => {
    it('should show intro, note and outro in text mode', () => {
      const output = new OutputManager('select', 'text');
      output.intro('lotwise select');
      output.note('Reading fund prices from: prices.csv', 'Request');
      output.outro('Selected 2 of 2 lot(s)');

      expect(p.intro).toHaveBeenCalled();
      expect(p.note).toHaveBeenCalledWith('Reading fund prices from: prices.csv', 'Request');
      expect(p.outro).toHaveBeenCalledWith('Selected 2 of 2 lot(s)');
    });

    it('should stay silent in json mode', () => {
      const output = new OutputManager('select', 'json');
      output.intro('lotwise select');
      output.note('Reading fund prices from: prices.csv', 'Request');
      output.outro('Selected 2 of 2 lot(s)');
      output.warn('Ignored 1 account row(s) that did not add shares');

      expect(p.intro).not.toHaveBeenCalled();
      expect(p.note).not.toHaveBeenCalled();
      expect(p.outro).not.toHaveBeenCalled();
      expect(p.log.warn).not.toHaveBeenCalled();
    });
  });
});

describe('configureCommandLogging', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('enables console logging for --verbose', () => {
    configureCommandLogging({ verbose: true });

    expect(setLoggerTransports).toHaveBeenCalledWith({ console: true });
  });

  it('keeps console logging off for --json even with --verbose', () => {
    configureCommandLogging({ json: true, verbose: true });

    expect(setLoggerTransports).toHaveBeenCalledWith({ console: false });
  });

  it('keeps console logging off by default', () => {
    configureCommandLogging({});

    expect(setLoggerTransports).toHaveBeenCalledWith({ console: false });
  });
});
