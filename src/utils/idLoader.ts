/**
 * User Id Loader
 *
 * Collects user ids from direct arguments, a CSV file with an `id` column
 * and a text file with one id per line. Order is preserved in that
 * sequence; repeated ids are dropped after their first occurrence.
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { DecimalIdSchema } from '../schemas/index.js';
import { logVerbose, logWarning } from './logger.js';

// ============================================
// Types
// ============================================

export interface IdSources {
  /** Ids given directly on the command line */
  ids?: string[];
  /** Path to a CSV file with an `id` column */
  csv?: string;
  /** Path to a text file with one id per line */
  txt?: string;
}

// ============================================
// Parsing
// ============================================

/**
 * Validate one id token. Returns null (with a warning) when it is not a
 * decimal number.
 *
 * @param origin - Where the token came from, for the warning
 */
export function parseUserId(raw: string, origin: string): string | null {
  const trimmed = raw.trim().replace(/^"(.*)"$/, '$1');
  const result = DecimalIdSchema.safeParse(trimmed);
  if (!result.success) {
    logWarning(`Skipping invalid user id "${raw.substring(0, 40)}" (${origin})`);
    return null;
  }
  return result.data;
}

function readInputFile(filepath: string): string {
  const resolvedPath = resolve(process.cwd(), filepath);
  if (!existsSync(resolvedPath)) {
    throw new Error(`Input file not found: ${resolvedPath}`);
  }
  return readFileSync(resolvedPath, 'utf-8');
}

/**
 * Load ids from a text file, one per line. Blank lines and `#` comments
 * are ignored.
 */
export function loadIdsFromText(filepath: string): string[] {
  const lines = readInputFile(filepath).split(/\r?\n/);
  const ids: string[] = [];

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i].trim();
    if (!line || line.startsWith('#')) continue;
    const id = parseUserId(line, `${filepath}:${i + 1}`);
    if (id) ids.push(id);
  }

  logVerbose(`Loaded ${ids.length} ids from ${filepath}`);
  return ids;
}

/**
 * Load ids from the `id` column of a CSV file with a header row.
 *
 * @throws Error if the file is missing or has no `id` column
 */
export function loadIdsFromCsv(filepath: string): string[] {
  const lines = readInputFile(filepath)
    .split(/\r?\n/)
    .filter((line) => line.trim().length > 0);

  if (lines.length === 0) {
    return [];
  }

  const header = lines[0].split(',').map((cell) => cell.trim().replace(/^"(.*)"$/, '$1'));
  const column = header.indexOf('id');
  if (column === -1) {
    throw new Error(`Invalid --csv option: ${filepath} has no "id" column`);
  }

  const ids: string[] = [];
  for (let i = 1; i < lines.length; i++) {
    const cell = lines[i].split(',')[column] ?? '';
    const id = parseUserId(cell, `${filepath}:${i + 1}`);
    if (id) ids.push(id);
  }

  logVerbose(`Loaded ${ids.length} ids from ${filepath}`);
  return ids;
}

// ============================================
// Main Function
// ============================================

/**
 * Gather ids from every source: direct ids first, then CSV, then text.
 */
export function collectUserIds(sources: IdSources): string[] {
  const collected: string[] = [];

  for (const raw of sources.ids ?? []) {
    const id = parseUserId(raw, 'argument');
    if (id) collected.push(id);
  }
  if (sources.csv) {
    collected.push(...loadIdsFromCsv(sources.csv));
  }
  if (sources.txt) {
    collected.push(...loadIdsFromText(sources.txt));
  }

  const seen = new Set<string>();
  const unique: string[] = [];
  for (const id of collected) {
    if (seen.has(id)) {
      logVerbose(`Duplicate user id ${id} ignored`);
      continue;
    }
    seen.add(id);
    unique.push(id);
  }

  return unique;
}
