/**
 * Commander Program Definition
 *
 * Configures the CLI program and normalizes its options.
 * No harvesting logic lives here.
 */

import { Command } from 'commander';
import { readFileSync } from 'fs';
import { fileURLToPath } from 'url';
import { dirname, join } from 'path';
import type { CliOptions } from '../config.js';
import type { IdSources } from '../utils/idLoader.js';
import { logWarning } from '../utils/logger.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);
const packageJsonPath = join(__dirname, '..', '..', 'package.json');

function getVersion(): string {
  try {
    const packageJson: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf-8'));
    if (
      typeof packageJson === 'object' &&
      packageJson !== null &&
      'version' in packageJson &&
      typeof packageJson.version === 'string'
    ) {
      return packageJson.version;
    }
    return '1.0.0';
  } catch {
    return '1.0.0';
  }
}

/**
 * Create and configure the Commander program.
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('weibo-harvest')
    .description('Harvest public Weibo timelines into a merged JSONL record stream')
    .version(getVersion(), '-V, --version', 'Show version number')
    .argument('[ids...]', 'Weibo user ids to collect')

    // Id Sources
    .option('--csv <path>', 'CSV file with an "id" column of user ids')
    .option('--txt <path>', 'Text file with one user id per line')

    // Output
    .option('--out <path>', 'JSONL output file (default: stdout)')
    .option('--encoding <name>', 'Output encoding: utf8|latin1|ascii', 'utf8')

    // Pacing
    .option('--step-range <min-max>', 'Requests between pauses', '1-5')
    .option('--delay-range <min-max>', 'Pause length in seconds', '6-10')
    .option('--seed <n>', 'Seed for pacing randomness (reproducible runs)')

    // Content
    .option('--expand-long-text', 'Fetch the full text of truncated posts')

    // Debug
    .option('--verbose', 'Show detailed progress')

    .addHelpText(
      'after',
      `
Examples:
  # Two users to stdout
  $ weibo-harvest 1669879400 1749127163

  # Ids from files, written to a file
  $ weibo-harvest --csv users.csv --txt more-users.txt --out posts.jsonl

  # Slower pacing, reproducible pauses, full long posts
  $ weibo-harvest 1669879400 --delay-range 10-20 --seed 42 --expand-long-text

Notes:
  - Progress is logged to stderr; stdout carries only records
  - Ctrl-C stops after the request in flight and reports the round reached
`
    );

  return program;
}

/**
 * Commander options as returned by program.opts().
 */
interface CommanderOptions {
  csv?: string;
  txt?: string;
  out?: string;
  encoding?: string;
  stepRange?: string;
  delayRange?: string;
  seed?: string;
  expandLongText?: boolean;
  verbose?: boolean;
}

/**
 * Result of parsing CLI options
 */
export interface ParsedCliResult {
  idSources: IdSources;
  options: CliOptions;
}

function readString(opts: Record<string, unknown>, key: keyof CommanderOptions): string | undefined {
  const value = opts[key];
  if (value === undefined) return undefined;
  if (typeof value === 'string') return value;
  logWarning(`Unexpected value for option ${key} ignored.`);
  return undefined;
}

function readBoolean(opts: Record<string, unknown>, key: keyof CommanderOptions): boolean | undefined {
  const value = opts[key];
  if (value === undefined) return undefined;
  if (typeof value === 'boolean') return value;
  logWarning(`Unexpected value for option ${key} ignored.`);
  return undefined;
}

/**
 * Normalize Commander output into id sources and CliOptions.
 *
 * @param opts - Raw options from Commander
 * @param args - Positional ids
 */
export function parseCliOptions(opts: Record<string, unknown>, args: string[]): ParsedCliResult {
  const commanderOpts: CommanderOptions = {
    csv: readString(opts, 'csv'),
    txt: readString(opts, 'txt'),
    out: readString(opts, 'out'),
    encoding: readString(opts, 'encoding'),
    stepRange: readString(opts, 'stepRange'),
    delayRange: readString(opts, 'delayRange'),
    seed: readString(opts, 'seed'),
    expandLongText: readBoolean(opts, 'expandLongText'),
    verbose: readBoolean(opts, 'verbose'),
  };

  return {
    idSources: {
      ids: args,
      csv: commanderOpts.csv,
      txt: commanderOpts.txt,
    },
    options: {
      out: commanderOpts.out,
      encoding: commanderOpts.encoding,
      stepRange: commanderOpts.stepRange,
      delayRange: commanderOpts.delayRange,
      seed: commanderOpts.seed,
      expandLongText: commanderOpts.expandLongText,
      verbose: commanderOpts.verbose,
    },
  };
}
