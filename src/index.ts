#!/usr/bin/env node
/**
 * Weibo Feed Harvester CLI
 *
 * Parses arguments, loads user ids, builds configuration and runs the
 * harvest. Records go to stdout or --out; progress goes to stderr.
 *
 * Usage:
 *   npx tsx src/index.ts <ids...> [options]
 */

import { CommanderError } from 'commander';
import {
  createProgram,
  parseCliOptions,
  runHarvestWithErrorHandling,
  withErrorHandling,
  getResultExitCode,
  EXIT_CODES,
} from './cli/index.js';
import { buildConfig } from './config.js';
import { collectUserIds } from './utils/idLoader.js';
import { logError, logWarning } from './utils/logger.js';

// ============================================
// Main Entry Point
// ============================================

/**
 * Flow:
 * 1. Parse CLI arguments with Commander
 * 2. Collect user ids and build configuration
 * 3. Run the harvest, stopping cleanly on Ctrl-C
 * 4. Exit with the matching code
 */
async function main(): Promise<void> {
  const program = createProgram();
  program.exitOverride();

  try {
    program.parse(process.argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      // --help and --version also land here, with exitCode 0
      process.exit(error.exitCode === 0 ? EXIT_CODES.SUCCESS : EXIT_CODES.CONFIG_ERROR);
    }
    throw error;
  }

  const { idSources, options } = parseCliOptions(program.opts(), program.args);
  const startTime = Date.now();

  const prepared = await withErrorHandling(
    async () => {
      const config = buildConfig(options);
      const userIds = collectUserIds(idSources);
      if (userIds.length === 0) {
        throw new Error('No user ids given. Pass ids as arguments or use --csv / --txt.');
      }
      return { config, userIds };
    },
    { startTime }
  );

  if (!prepared.success) {
    program.outputHelp({ error: true });
    process.exit(prepared.exitCode);
  }

  const { config, userIds } = prepared.result;

  const controller = new AbortController();
  process.once('SIGINT', () => {
    logWarning('Interrupt received, stopping after the current request...');
    controller.abort();
  });

  const outcome = await runHarvestWithErrorHandling(userIds, config, { signal: controller.signal });

  if (!outcome.success) {
    process.exit(outcome.exitCode);
  }

  process.exit(getResultExitCode(outcome.result));
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  logError(`Fatal error: ${message}`);
  process.exit(EXIT_CODES.RUN_ERROR);
});
