/**
 * Unit Tests for Long Post Recovery
 */

import { describe, it, expect, vi } from 'vitest';
import {
  escapeControlCharacters,
  extractEmbeddedObject,
  fetchLongPost,
  ExtractionFormatError,
} from '../../src/collectors/longText.js';
import { RateLimiter } from '../../src/utils/rateLimiter.js';
import { FakeWeiboClient, detailPage, makeMblog } from '../fixtures/weibo.js';

vi.mock('../../src/utils/logger.js', () => ({
  logVerbose: vi.fn(),
}));

// ============================================
// Control Character Escaping
// ============================================

describe('escapeControlCharacters', () => {
  it('escapes control characters inside strings', () => {
    expect(escapeControlCharacters('{"a":"x\ty\nz"}')).toBe('{"a":"x\\u0009y\\u000az"}');
  });

  it('leaves whitespace between tokens alone', () => {
    expect(escapeControlCharacters('{\n\t"a": 1\n}')).toBe('{\n\t"a": 1\n}');
  });

  it('respects escaped quotes', () => {
    expect(escapeControlCharacters('"a\\"\nb"')).toBe('"a\\"\\u000ab"');
  });
});

// ============================================
// Extraction
// ============================================

describe('extractEmbeddedObject', () => {
  it('cuts the status object out of a detail page', () => {
    const status = makeMblog({ text: 'full text, with commas, inside' });

    expect(extractEmbeddedObject(detailPage(status))).toEqual(status);
  });

  it('keeps numeric ids past the safe integer range exact', () => {
    const html = detailPage(makeMblog()).replace('"id":"4990000000000001"', '"id":4990000000000000123');

    expect(extractEmbeddedObject(html).id).toBe('4990000000000000123');
  });

  it('accepts raw newlines inside string values', () => {
    const html = detailPage(makeMblog()).replace('"text":"hello"', '"text":"line one\nline two"');

    expect(extractEmbeddedObject(html).text).toBe('line one\nline two');
  });

  it('fails when the status marker is missing', () => {
    expect(() => extractEmbeddedObject('<html>nothing here</html>')).toThrow(
      'Long post extraction failed: marker "status": not found'
    );
  });

  it('fails when the end marker is missing', () => {
    const html = detailPage(makeMblog()).replace('"hotScheme"', '"coldScheme"');

    expect(() => extractEmbeddedObject(html)).toThrow(ExtractionFormatError);
  });

  it('fails with the offending text when the cut is not JSON', () => {
    const html = '"status": {"id": 1, oops}, "call": 1, "hotScheme": 1';

    const error = (() => {
      try {
        extractEmbeddedObject(html);
        return undefined;
      } catch (e) {
        return e;
      }
    })();

    expect(error).toBeInstanceOf(ExtractionFormatError);
    expect(error).toMatchObject({ snippet: '{"status": {"id": 1, oops}, "call": 1}' });
  });

  it('truncates long snippets', () => {
    const html = 'x'.repeat(500);

    try {
      extractEmbeddedObject(html);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ExtractionFormatError);
      if (error instanceof ExtractionFormatError) {
        expect(error.snippet).toBe(`${'x'.repeat(200)}…`);
      }
    }
  });
});

// ============================================
// Fetching
// ============================================

describe('fetchLongPost', () => {
  it('parses the full post from the detail page', async () => {
    const client = new FakeWeiboClient();
    client.details.set(
      '4990000000000001',
      detailPage(makeMblog({ text: 'The whole story <span class="surl-text">#Long#</span>', isLongText: true }))
    );

    const record = await fetchLongPost('4990000000000001', {
      client,
      clock: () => new Date(2024, 2, 16, 12, 0, 0),
    });

    expect(client.detailCalls).toEqual(['4990000000000001']);
    expect(record.text).toBe('The whole story #Long#');
    expect(record.topics).toEqual(['Long']);
    expect(record.is_long_text).toBe(true);
    expect(record.created).toBe('2024-03-10T00:00:00');
  });

  it('runs the request through the limiter', async () => {
    const client = new FakeWeiboClient();
    client.details.set('1', detailPage(makeMblog({ id: '1' })));
    const limiter = new RateLimiter({
      stepRange: [5, 5],
      delayRange: [1, 1],
      sleep: vi.fn().mockResolvedValue(undefined),
    });

    await fetchLongPost('1', { client, limiter });

    expect(limiter.state.remainingSteps).toBe(4);
  });

  it('passes network errors through unchanged', async () => {
    const client = new FakeWeiboClient();

    await expect(fetchLongPost('1', { client })).rejects.toThrow('Request failed with status code 404');
  });
});
