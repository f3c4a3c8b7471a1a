/**
 * Unit Tests for Post Body Extraction
 */

import { describe, it, expect } from 'vitest';
import { parsePostBody } from '../../src/processing/html.js';

describe('parsePostBody', () => {
  it('flattens markup and resolves entities', () => {
    const body = parsePostBody('Fish &amp; chips<br />today <b>only</b>');
    expect(body.text).toBe('Fish & chipstoday only');
  });

  it('extracts topics without their delimiters', () => {
    const body = parsePostBody(
      '<a href="https://m.weibo.cn/search?q=%23TS%23"><span class="surl-text">#TypeScript#</span></a> and ' +
        '<span class="surl-text">#Node#</span>'
    );

    expect(body.topics).toEqual(['TypeScript', 'Node']);
    expect(body.text).toBe('#TypeScript# and #Node#');
  });

  it('ignores spans that are not topics', () => {
    const body = parsePostBody(
      '<span class="surl-text">网页链接</span><span class="surl-text">##</span><span class="other">#x#</span>'
    );
    expect(body.topics).toEqual([]);
  });

  it('extracts mentions whose text matches the profile link', () => {
    const body = parsePostBody('Hi <a href="/n/Alice">@Alice</a> and <a href="/n/Bob">@Bob</a>!');

    expect(body.atUsers).toEqual(['Alice', 'Bob']);
    expect(body.text).toBe('Hi @Alice and @Bob!');
  });

  it('ignores links that are not mentions', () => {
    const body = parsePostBody(
      '<a href="/n/Bob">@Alice</a> <a href="https://t.cn/abc">网页链接</a> <a>@Carol</a>'
    );
    expect(body.atUsers).toEqual([]);
  });

  it('returns empty lists for plain text', () => {
    expect(parsePostBody('just text')).toEqual({ text: 'just text', topics: [], atUsers: [] });
  });
});
