/**
 * CLI Error Handler
 *
 * Maps run outcomes and errors to exit codes and logs failures.
 */

import { ExtractionFormatError } from '../collectors/longText.js';
import { logError, logRunResult } from '../utils/logger.js';
import type { HarvestResult } from './runHarvest.js';

// ============================================
// Exit Codes
// ============================================

/**
 * 0: Success (including a user interrupt)
 * 1: Run error - unexpected failure during the run
 * 2: Configuration error - bad options, missing input files, no ids
 * 3: Partial failure - some users could not be looked up
 * 4: Extraction error - the long-post page layout changed
 */
export const EXIT_CODES = {
  SUCCESS: 0,
  RUN_ERROR: 1,
  CONFIG_ERROR: 2,
  PARTIAL_FAILURE: 3,
  EXTRACTION_ERROR: 4,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

// ============================================
// Error Classification
// ============================================

const CONFIG_ERROR_PATTERNS = [
  /configuration invalid/i,
  /invalid.*option/i,
  /input file not found/i,
  /no user ids/i,
];

export function isConfigError(error: Error): boolean {
  return CONFIG_ERROR_PATTERNS.some((pattern) => pattern.test(error.message));
}

export function getExitCode(error: Error): ExitCode {
  if (error instanceof ExtractionFormatError) {
    return EXIT_CODES.EXTRACTION_ERROR;
  }
  return isConfigError(error) ? EXIT_CODES.CONFIG_ERROR : EXIT_CODES.RUN_ERROR;
}

/**
 * Exit code for a run that finished (possibly interrupted).
 */
export function getResultExitCode(result: HarvestResult): ExitCode {
  return result.missingUsers.length > 0 ? EXIT_CODES.PARTIAL_FAILURE : EXIT_CODES.SUCCESS;
}

// ============================================
// Error Handling
// ============================================

export interface ErrorContext {
  /** Run start time (Date.now()) */
  startTime: number;
  /** Records written before the failure */
  recordCount?: () => number;
}

/**
 * Log an error and return its exit code.
 */
export function handleRunError(error: Error, context: ErrorContext): ExitCode {
  const durationMs = Date.now() - context.startTime;

  logError(error.message);
  if (error instanceof ExtractionFormatError) {
    logError(`Offending text: ${error.snippet}`);
  }

  logRunResult(false, durationMs, context.recordCount ? context.recordCount() : 0, error.message);

  return getExitCode(error);
}

export type ErrorHandlingResult<T> =
  | { success: true; result: T }
  | { success: false; exitCode: ExitCode };

/**
 * Run `fn`, converting any thrown error into a logged failure with an exit code.
 */
export async function withErrorHandling<T>(
  fn: () => Promise<T>,
  context: ErrorContext
): Promise<ErrorHandlingResult<T>> {
  try {
    const result = await fn();
    return { success: true, result };
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    return { success: false, exitCode: handleRunError(err, context) };
  }
}
