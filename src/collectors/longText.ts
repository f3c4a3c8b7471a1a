/**
 * Long Post Recovery
 *
 * Listing responses truncate long posts. The detail page is an HTML
 * document with the full post embedded in a script as part of a larger
 * object literal; the `"status": {...}` entry is cut out by position,
 * between the `"status":` key and the `"hotScheme"` key that follows it.
 *
 * That cut depends on the page layout. When it stops matching, the failure
 * is an ExtractionFormatError, never a network error.
 */

import { z } from 'zod';
import type { OutputEncoding, PostRecord } from '../types/index.js';
import type { RateLimiter } from '../utils/rateLimiter.js';
import type { WeiboClient } from './client.js';
import { parsePost } from './parsePost.js';
import { decodeJson } from '../utils/json.js';

// ============================================
// Errors
// ============================================

const SNIPPET_LENGTH = 200;

/**
 * The detail page no longer has the expected shape.
 * `snippet` holds the start of the text that failed.
 */
export class ExtractionFormatError extends Error {
  constructor(
    public readonly reason: string,
    public readonly snippet: string
  ) {
    super(`Long post extraction failed: ${reason}`);
    this.name = 'ExtractionFormatError';
  }
}

function snippetOf(text: string): string {
  return text.length > SNIPPET_LENGTH ? `${text.slice(0, SNIPPET_LENGTH)}…` : text;
}

// ============================================
// Extraction
// ============================================

const STATUS_MARKER = '"status":';
const END_MARKER = '"hotScheme"';

const EmbeddedStatusSchema = z.object({
  status: z.record(z.unknown()),
});

/**
 * Escape raw control characters that appear inside JSON strings.
 * Inline scripts sometimes carry literal newlines or tabs in text fields,
 * which JSON.parse rejects.
 */
export function escapeControlCharacters(text: string): string {
  let result = '';
  let inString = false;
  let escaped = false;

  for (const char of text) {
    if (inString) {
      if (escaped) {
        escaped = false;
      } else if (char === '\\') {
        escaped = true;
      } else if (char === '"') {
        inString = false;
      } else if (char.charCodeAt(0) < 0x20) {
        result += `\\u${char.charCodeAt(0).toString(16).padStart(4, '0')}`;
        continue;
      }
    } else if (char === '"') {
      inString = true;
    }
    result += char;
  }

  return result;
}

/**
 * Cut the embedded `status` object out of a detail page.
 *
 * Takes the text from the first `"status":` to the last `"hotScheme"`,
 * drops everything after the last comma in that span, wraps it in braces
 * and parses it.
 *
 * @throws ExtractionFormatError when a marker is missing or the cut is not JSON
 */
export function extractEmbeddedObject(html: string): Record<string, unknown> {
  const start = html.indexOf(STATUS_MARKER);
  if (start === -1) {
    throw new ExtractionFormatError(`marker ${STATUS_MARKER} not found`, snippetOf(html));
  }

  const end = html.lastIndexOf(END_MARKER);
  if (end === -1 || end < start) {
    throw new ExtractionFormatError(`marker ${END_MARKER} not found`, snippetOf(html.slice(start)));
  }

  const span = html.slice(start, end);
  const lastComma = span.lastIndexOf(',');
  if (lastComma === -1) {
    throw new ExtractionFormatError('no separator before end marker', snippetOf(span));
  }

  const candidate = `{${span.slice(0, lastComma)}}`;

  let parsed: unknown;
  try {
    parsed = decodeJson(escapeControlCharacters(candidate));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ExtractionFormatError(`embedded object is not valid JSON (${message})`, snippetOf(candidate));
  }

  const result = EmbeddedStatusSchema.safeParse(parsed);
  if (!result.success) {
    throw new ExtractionFormatError('embedded object has no status entry', snippetOf(candidate));
  }

  return result.data.status;
}

// ============================================
// Fetching
// ============================================

export interface LongPostDeps {
  client: WeiboClient;
  /** Paces the detail request together with listing requests */
  limiter?: RateLimiter;
  clock?: () => Date;
  encoding?: OutputEncoding;
}

/**
 * Fetch a post's detail page and parse the full post from it.
 *
 * Network failures reject with the client's error; layout problems reject
 * with ExtractionFormatError.
 */
export async function fetchLongPost(postId: string, deps: LongPostDeps): Promise<PostRecord> {
  const request = () => deps.client.getDetailPage(postId);
  const html = deps.limiter ? await deps.limiter.run(request) : await request();

  const status = extractEmbeddedObject(html);
  return parsePost(status, {
    now: deps.clock ? deps.clock() : new Date(),
    encoding: deps.encoding ?? 'utf8',
  });
}
