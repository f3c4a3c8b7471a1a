/**
 * Field Normalization
 *
 * Converts raw API field encodings (abbreviated counts, relative dates,
 * free text) into the canonical values stored on a PostRecord.
 */

import type { OutputEncoding, RawCount } from '../types/index.js';

// ============================================
// Errors
// ============================================

/**
 * A count field in a shape the parser does not know
 */
export class CountFormatError extends Error {
  constructor(public readonly raw: string) {
    super(`Unrecognised count format: "${raw}"`);
    this.name = 'CountFormatError';
  }
}

/**
 * A created_at field in a shape the parser does not know
 */
export class DateFormatError extends Error {
  constructor(public readonly raw: string) {
    super(`Unrecognised date format: "${raw}"`);
    this.name = 'DateFormatError';
  }
}

// ============================================
// Counts
// ============================================

/** Ten-thousand unit marker used by abbreviated counts */
const TEN_THOUSAND = '万';

const ABBREVIATED_COUNT = new RegExp(`^(\\d+)(?:\\.(\\d+))?${TEN_THOUSAND}\\+?$`);

/**
 * Parse a count that may be abbreviated.
 *
 * - numbers pass through unchanged
 * - "35万", "35万+" → 350000
 * - "1.2万+" → 12000 (decimal point shifted four places, remainder truncated)
 * - "1024" → 1024
 *
 * Only the ten-thousand unit is recognised.
 *
 * @throws CountFormatError for anything else
 */
export function parseCount(value: RawCount): number {
  if (typeof value === 'number') {
    return value;
  }

  const trimmed = value.trim();

  const abbreviated = trimmed.match(ABBREVIATED_COUNT);
  if (abbreviated) {
    const [, whole, fraction = ''] = abbreviated;
    const digits = whole + fraction.padEnd(4, '0').slice(0, 4);
    return parseInt(digits, 10);
  }

  if (/^\d+$/.test(trimmed)) {
    return parseInt(trimmed, 10);
  }

  throw new CountFormatError(value);
}

// ============================================
// Dates
// ============================================

const MINUTES_MARKER = '分钟';
const HOURS_MARKER = '小时';
const JUST_NOW_MARKER = '刚刚';
const YESTERDAY_MARKER = '昨天';

/** e.g. "Sat Mar 16 10:00:00 +0800 2024" */
const FULL_TIMESTAMP = /^[A-Z][a-z]{2} [A-Z][a-z]{2} \d{1,2} \d{2}:\d{2}:\d{2} [+-]\d{4} \d{4}$/;

const DATE_ONLY = /^(\d{4})-(\d{1,2})-(\d{1,2})$/;

function leadingAmount(raw: string, marker: string): number {
  const amount = raw.slice(0, raw.indexOf(marker)).trim();
  if (!/^\d+$/.test(amount)) {
    throw new DateFormatError(raw);
  }
  return parseInt(amount, 10);
}

/**
 * Resolve a created_at value against an explicit "now".
 *
 * Relative phrasing depends on when the page was fetched, so the result is
 * only as precise as the phrase (minutes, hours, a day).
 *
 * - "刚刚" → now
 * - "5分钟前" → now − 5 minutes
 * - "3小时前" → now − 3 hours
 * - "昨天 …" → now − 1 day
 * - "03-15" → March 15 of now's year, local midnight
 * - "2023-03-15" → that date, local midnight
 * - "Sat Mar 16 10:00:00 +0800 2024" → that instant
 *
 * @throws DateFormatError for anything else (including impossible dates)
 */
export function parseCreatedAt(raw: string, now: Date): Date {
  const value = raw.trim();

  if (value.includes(JUST_NOW_MARKER)) {
    return new Date(now.getTime());
  }

  if (value.includes(MINUTES_MARKER)) {
    return new Date(now.getTime() - leadingAmount(value, MINUTES_MARKER) * 60_000);
  }

  if (value.includes(HOURS_MARKER)) {
    return new Date(now.getTime() - leadingAmount(value, HOURS_MARKER) * 3_600_000);
  }

  if (value.includes(YESTERDAY_MARKER)) {
    const yesterday = new Date(now.getTime());
    yesterday.setDate(yesterday.getDate() - 1);
    return yesterday;
  }

  if (FULL_TIMESTAMP.test(value)) {
    const parsed = new Date(value);
    if (isNaN(parsed.getTime())) {
      throw new DateFormatError(raw);
    }
    return parsed;
  }

  // A single dash means the year was left out
  const withYear = value.split('-').length === 2 ? `${now.getFullYear()}-${value}` : value;
  const match = withYear.match(DATE_ONLY);
  if (!match) {
    throw new DateFormatError(raw);
  }

  const year = parseInt(match[1], 10);
  const month = parseInt(match[2], 10);
  const day = parseInt(match[3], 10);
  const date = new Date(year, month - 1, day);

  // Reject rollover (e.g., 02-30 becoming March 2)
  if (date.getFullYear() !== year || date.getMonth() !== month - 1 || date.getDate() !== day) {
    throw new DateFormatError(raw);
  }

  return date;
}

/**
 * Format a date as local wall-clock time without zone: YYYY-MM-DDTHH:mm:ss
 */
export function formatNaiveIso(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `T${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

// ============================================
// Text Sanitation
// ============================================

const ZERO_WIDTH_SPACE = /\u200B/g;

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/g;

const OUT_OF_RANGE: Record<OutputEncoding, RegExp | null> = {
  utf8: null,
  latin1: /[^\u0000-\u00FF]/gu,
  ascii: /[^\u0000-\u007F]/gu,
};

/**
 * Strip zero-width spaces and characters the output encoding cannot hold.
 */
export function sanitizeText(text: string, encoding: OutputEncoding = 'utf8'): string {
  let cleaned = text.replace(ZERO_WIDTH_SPACE, '').replace(LONE_SURROGATE, '');
  const outOfRange = OUT_OF_RANGE[encoding];
  if (outOfRange) {
    cleaned = cleaned.replace(outOfRange, '');
  }
  return cleaned;
}

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Apply sanitizeText to every string inside a JSON-like value.
 * Object key order is preserved.
 */
export function sanitizeStrings(value: JsonValue, encoding: OutputEncoding = 'utf8'): JsonValue {
  if (typeof value === 'string') {
    return sanitizeText(value, encoding);
  }
  if (Array.isArray(value)) {
    return value.map((item) => sanitizeStrings(item, encoding));
  }
  if (value !== null && typeof value === 'object') {
    const result: { [key: string]: JsonValue } = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = sanitizeStrings(item, encoding);
    }
    return result;
  }
  return value;
}
