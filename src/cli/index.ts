/**
 * CLI Module
 */

export { createProgram, parseCliOptions, type ParsedCliResult } from './program.js';

export {
  EXIT_CODES,
  type ExitCode,
  getResultExitCode,
  withErrorHandling,
  type ErrorHandlingResult,
} from './errorHandler.js';

export {
  runHarvestWithErrorHandling,
  type HarvestDeps,
  type HarvestResult,
} from './runHarvest.js';
