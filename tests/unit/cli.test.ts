/**
 * CLI Unit Tests
 *
 * Tests for the CLI entry point components:
 * - program.ts: Commander setup and option parsing
 * - errorHandler.ts: Error handling and exit codes
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { createProgram, parseCliOptions } from '../../src/cli/program.js';
import {
  EXIT_CODES,
  isConfigError,
  getExitCode,
  getResultExitCode,
  withErrorHandling,
} from '../../src/cli/errorHandler.js';
import type { HarvestResult } from '../../src/cli/runHarvest.js';
import { ExtractionFormatError } from '../../src/collectors/longText.js';
import { logError } from '../../src/utils/logger.js';

vi.mock('../../src/utils/logger.js', () => ({
  logError: vi.fn(),
  logWarning: vi.fn(),
  logRunResult: vi.fn(),
}));

// ============================================
// Program Tests
// ============================================

describe('createProgram', () => {
  it('is named weibo-harvest', () => {
    expect(createProgram().name()).toBe('weibo-harvest');
  });

  it('declares every option', () => {
    const longs = createProgram().options.map((option) => option.long);

    expect(longs).toEqual(
      expect.arrayContaining([
        '--csv',
        '--txt',
        '--out',
        '--encoding',
        '--step-range',
        '--delay-range',
        '--seed',
        '--expand-long-text',
        '--verbose',
      ])
    );
  });

  it('parses ids and options from argv', () => {
    const program = createProgram();
    program.exitOverride();

    program.parse(['node', 'weibo-harvest', '1669879400', '1749127163', '--step-range', '2-4', '--expand-long-text']);
    const { idSources, options } = parseCliOptions(program.opts(), program.args);

    expect(idSources).toEqual({ ids: ['1669879400', '1749127163'], csv: undefined, txt: undefined });
    expect(options).toEqual({
      out: undefined,
      encoding: 'utf8',
      stepRange: '2-4',
      delayRange: '6-10',
      seed: undefined,
      expandLongText: true,
      verbose: undefined,
    });
  });
});

describe('parseCliOptions', () => {
  it('maps file sources', () => {
    const { idSources } = parseCliOptions({ csv: 'users.csv', txt: 'ids.txt' }, []);

    expect(idSources).toEqual({ ids: [], csv: 'users.csv', txt: 'ids.txt' });
  });

  it('ignores values of the wrong type', () => {
    const { options } = parseCliOptions({ seed: 42, verbose: 'yes' }, []);

    expect(options.seed).toBeUndefined();
    expect(options.verbose).toBeUndefined();
  });
});

// ============================================
// Error Handler Tests
// ============================================

function result(overrides: Partial<HarvestResult> = {}): HarvestResult {
  return {
    recordCount: 0,
    rounds: 0,
    interrupted: false,
    missingUsers: [],
    durationMs: 0,
    ...overrides,
  };
}

describe('exit codes', () => {
  it('classifies configuration errors', () => {
    expect(isConfigError(new Error('Configuration invalid: apiUrl: Invalid url'))).toBe(true);
    expect(isConfigError(new Error('Input file not found: /tmp/x.txt'))).toBe(true);
    expect(isConfigError(new Error('Invalid --csv option: a.csv has no "id" column'))).toBe(true);
    expect(isConfigError(new Error('No user ids given.'))).toBe(true);
    expect(isConfigError(new Error('socket hang up'))).toBe(false);
  });

  it('maps errors to exit codes', () => {
    expect(getExitCode(new ExtractionFormatError('marker missing', '<html>'))).toBe(EXIT_CODES.EXTRACTION_ERROR);
    expect(getExitCode(new Error('Configuration invalid: x'))).toBe(EXIT_CODES.CONFIG_ERROR);
    expect(getExitCode(new Error('boom'))).toBe(EXIT_CODES.RUN_ERROR);
  });

  it('reports partial failure when users were missing', () => {
    expect(getResultExitCode(result())).toBe(EXIT_CODES.SUCCESS);
    expect(getResultExitCode(result({ interrupted: true }))).toBe(EXIT_CODES.SUCCESS);
    expect(getResultExitCode(result({ missingUsers: [{ userId: '1', reason: 'gone' }] }))).toBe(
      EXIT_CODES.PARTIAL_FAILURE
    );
  });
});

describe('withErrorHandling', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('passes results through', async () => {
    const outcome = await withErrorHandling(async () => 7, { startTime: Date.now() });

    expect(outcome).toEqual({ success: true, result: 7 });
  });

  it('logs failures and returns their exit code', async () => {
    const outcome = await withErrorHandling(
      async () => {
        throw new ExtractionFormatError('marker missing', '<html>');
      },
      { startTime: Date.now() }
    );

    expect(outcome).toEqual({ success: false, exitCode: EXIT_CODES.EXTRACTION_ERROR });
    expect(logError).toHaveBeenCalledWith('Long post extraction failed: marker missing');
    expect(logError).toHaveBeenCalledWith('Offending text: <html>');
  });

  it('wraps non-Error throws', async () => {
    const outcome = await withErrorHandling(
      async () => Promise.reject('plain string'),
      { startTime: Date.now() }
    );

    expect(outcome).toEqual({ success: false, exitCode: EXIT_CODES.RUN_ERROR });
  });
});
