/**
 * Logger
 *
 * Coloured progress output for harvest runs. Everything is written to
 * stderr: stdout may be the JSONL record stream.
 * Supports verbose mode for detailed debugging output.
 */

import chalk from 'chalk';

// ============================================
// Logger State
// ============================================

/**
 * Global verbose mode flag.
 * Set via setVerbose() before starting a run.
 */
let verboseMode = false;

/**
 * Enable or disable verbose logging
 */
export function setVerbose(enabled: boolean): void {
  verboseMode = enabled;
}

function write(line: string): void {
  console.error(line);
}

// ============================================
// Timestamp Formatting
// ============================================

/**
 * Get current timestamp in HH:MM:SS format
 */
function timestamp(): string {
  const now = new Date();
  return now.toTimeString().slice(0, 8);
}

/**
 * Format duration in human-readable format
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  if (ms < 60000) {
    return `${(ms / 1000).toFixed(1)}s`;
  }
  const minutes = Math.floor(ms / 60000);
  const seconds = ((ms % 60000) / 1000).toFixed(0);
  return `${minutes}m ${seconds}s`;
}

// ============================================
// Logging Functions
// ============================================

/**
 * Log a stage header with timestamp.
 *
 * @param name - Stage name (e.g., "Profile Lookup", "Harvest")
 */
export function logStage(name: string): void {
  const line = '─'.repeat(50);
  write('');
  write(chalk.cyan(line));
  write(chalk.cyan.bold(`  ${name}`));
  write(chalk.cyan(`  ${timestamp()}`));
  write(chalk.cyan(line));
}

/**
 * Log progress indicator.
 *
 * total <= 0 prints the counter without a bar; current > total clamps to 100%.
 */
export function logProgress(current: number, total: number, message?: string): void {
  const msg = message ? ` ${message}` : '';

  if (total <= 0) {
    write(chalk.gray(`  [${' '.repeat(20)}] ${current}/${total}${msg}`));
    return;
  }

  const percent = Math.min(100, Math.max(0, Math.round((current / total) * 100)));
  const filled = Math.floor(percent / 5);
  const bar = '█'.repeat(filled) + '░'.repeat(20 - filled);
  write(chalk.gray(`  [${bar}] ${current}/${total} (${percent}%)${msg}`));
}

export function logSuccess(message: string): void {
  write(chalk.green(`✓ ${message}`));
}

export function logWarning(message: string): void {
  write(chalk.yellow(`⚠ ${message}`));
}

export function logError(message: string): void {
  write(chalk.red(`✗ ${message}`));
}

export function logInfo(message: string): void {
  write(chalk.white(`  ${message}`));
}

/**
 * Log verbose message (only if verbose mode enabled).
 */
export function logVerbose(message: string): void {
  if (verboseMode) {
    write(chalk.gray(`  [verbose] ${message}`));
  }
}

/**
 * Log a horizontal divider line
 */
export function logDivider(): void {
  write(chalk.gray('─'.repeat(50)));
}

// ============================================
// Specialized Logging
// ============================================

/**
 * Log run configuration summary
 */
export function logConfig(config: {
  userCount: number;
  stepRange: readonly [number, number];
  delayRange: readonly [number, number];
  expandLongText: boolean;
  outputPath?: string;
}): void {
  write('');
  write(chalk.cyan.bold('  Harvest Configuration:'));
  write(chalk.gray('  ─────────────────────────────'));
  write(chalk.white(`  Users:         ${config.userCount}`));
  write(chalk.white(`  Pause every:   ${config.stepRange[0]}-${config.stepRange[1]} requests`));
  write(chalk.white(`  Pause length:  ${config.delayRange[0]}-${config.delayRange[1]}s`));
  write(chalk.white(`  Long posts:    ${config.expandLongText ? 'expanded' : 'as listed'}`));
  write(chalk.white(`  Output:        ${config.outputPath ?? 'stdout'}`));
  write('');
}

/**
 * Log final run result
 */
export function logRunResult(
  success: boolean,
  durationMs: number,
  recordCount: number,
  error?: string
): void {
  write('');
  logDivider();

  if (success) {
    logSuccess(`Harvest completed in ${formatDuration(durationMs)}`);
    write(chalk.green(`  Records: ${recordCount}`));
  } else {
    logError(`Harvest failed after ${formatDuration(durationMs)}`);
    write(chalk.red(`  Records written before failure: ${recordCount}`));
    if (error) {
      write(chalk.red(`  Error: ${error}`));
    }
  }

  logDivider();
  write('');
}
