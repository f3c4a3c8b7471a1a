/**
 * JSON Decoding
 *
 * Weibo ids can exceed Number.MAX_SAFE_INTEGER while still arriving as
 * bare JSON numbers. Such numbers are kept as their digit strings; every
 * other number decodes as usual.
 */

import { isSafeNumber, parse } from 'lossless-json';

function parseNumber(value: string): number | string {
  return isSafeNumber(value) ? Number(value) : value;
}

/**
 * Parse JSON text, keeping unsafe integers as exact decimal strings.
 *
 * @throws SyntaxError when the text is not valid JSON
 */
export function decodeJson(text: string): unknown {
  return parse(text, null, parseNumber);
}
