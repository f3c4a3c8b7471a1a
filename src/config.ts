/**
 * Configuration & Environment Variables
 *
 * Handles environment loading and merging of defaults, environment
 * overrides and CLI options into a validated HarvestConfig.
 */

import 'dotenv/config';
import type { HarvestConfig, IntRange, OutputEncoding } from './types/index.js';
import { DEFAULT_CONFIG } from './types/index.js';
import { HarvestConfigSchema, OutputEncodingSchema } from './schemas/index.js';
import { logWarning } from './utils/logger.js';

export { DEFAULT_CONFIG };

// ============================================
// Environment Variable Names
// ============================================

export const ENV_KEYS = {
  WEIBO_API_URL: 'WEIBO_API_URL',
  WEIBO_DETAIL_URL: 'WEIBO_DETAIL_URL',
  HARVEST_TIMEOUT_MS: 'HARVEST_TIMEOUT_MS',
  HARVEST_USER_AGENT: 'HARVEST_USER_AGENT',
} as const;

/**
 * Read a trimmed, non-empty environment value.
 */
export function getEnv(key: keyof typeof ENV_KEYS): string | undefined {
  const value = process.env[ENV_KEYS[key]];
  if (value === undefined || value.trim().length === 0) {
    return undefined;
  }
  return value.trim();
}

// ============================================
// CLI Options
// ============================================

/**
 * CLI options that can be parsed from command line
 */
export interface CliOptions {
  out?: string;
  stepRange?: string;
  delayRange?: string;
  seed?: string;
  expandLongText?: boolean;
  encoding?: string;
  verbose?: boolean;
}

// ============================================
// Option Parsers
// ============================================

/**
 * Parse an inclusive range written as "min-max" (or a single "n").
 * Warns and returns the fallback on malformed input.
 */
export function parseRange(value: string, optionName: string, fallback: IntRange): IntRange {
  const match = value.trim().match(/^(\d+)(?:\s*-\s*(\d+))?$/);
  if (!match) {
    logWarning(
      `Invalid ${optionName} '${value}' ignored. Using ${fallback[0]}-${fallback[1]}. Expected format: min-max`
    );
    return fallback;
  }

  const min = parseInt(match[1], 10);
  const max = match[2] !== undefined ? parseInt(match[2], 10) : min;
  if (min > max) {
    logWarning(
      `Invalid ${optionName} '${value}' ignored (min > max). Using ${fallback[0]}-${fallback[1]}.`
    );
    return fallback;
  }

  return [min, max];
}

/**
 * Parse the random seed. Returns undefined (unseeded) when invalid.
 */
export function parseSeed(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    logWarning(`Invalid seed '${value}' ignored. Pacing will be unseeded.`);
    return undefined;
  }
  return parseInt(trimmed, 10);
}

/**
 * Parse output encoding, defaulting to 'utf8'.
 */
export function parseEncoding(value: string | undefined): OutputEncoding {
  if (!value) return 'utf8';
  const normalized = value.toLowerCase().replace('-', '');
  const result = OutputEncodingSchema.safeParse(normalized);
  if (!result.success) {
    logWarning(
      `Invalid encoding '${value}' ignored. Using 'utf8'. Valid options: ${OutputEncodingSchema.options.join(', ')}`
    );
    return 'utf8';
  }
  return result.data;
}

function parseTimeout(value: string): number | undefined {
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed <= 0) {
    logWarning(`Invalid ${ENV_KEYS.HARVEST_TIMEOUT_MS} '${value}' ignored.`);
    return undefined;
  }
  return parsed;
}

// ============================================
// Configuration Building
// ============================================

/**
 * Build a complete HarvestConfig.
 *
 * Merging order (later overrides earlier):
 * 1. DEFAULT_CONFIG
 * 2. Environment variables
 * 3. Explicit CLI options
 *
 * @throws Error if the merged configuration is invalid
 */
export function buildConfig(options: CliOptions): HarvestConfig {
  const config: HarvestConfig = { ...DEFAULT_CONFIG };

  const apiUrl = getEnv('WEIBO_API_URL');
  if (apiUrl !== undefined) config.apiUrl = apiUrl;

  const detailUrl = getEnv('WEIBO_DETAIL_URL');
  if (detailUrl !== undefined) config.detailUrl = detailUrl.replace(/\/+$/, '');

  const timeout = getEnv('HARVEST_TIMEOUT_MS');
  if (timeout !== undefined) {
    config.timeoutMs = parseTimeout(timeout) ?? config.timeoutMs;
  }

  const userAgent = getEnv('HARVEST_USER_AGENT');
  if (userAgent !== undefined) config.userAgent = userAgent;

  if (options.stepRange !== undefined) {
    config.stepRange = parseRange(options.stepRange, 'step range', DEFAULT_CONFIG.stepRange);
  }

  if (options.delayRange !== undefined) {
    config.delayRange = parseRange(options.delayRange, 'delay range', DEFAULT_CONFIG.delayRange);
  }

  const seed = parseSeed(options.seed);
  if (seed !== undefined) config.seed = seed;

  if (options.expandLongText !== undefined) {
    config.expandLongText = options.expandLongText;
  }

  if (options.encoding !== undefined) {
    config.outputEncoding = parseEncoding(options.encoding);
  }

  if (options.out !== undefined && options.out.trim().length > 0 && options.out !== '-') {
    config.outputPath = options.out;
  }

  if (options.verbose !== undefined) {
    config.verbose = options.verbose;
  }

  const result = HarvestConfigSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Configuration invalid: ${issues}`);
  }

  return result.data;
}
