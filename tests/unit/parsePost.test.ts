/**
 * Unit Tests for Card Parsing
 */

import { describe, it, expect } from 'vitest';
import { isOriginalPostCard, parsePost, type ParseContext } from '../../src/collectors/parsePost.js';
import { CardSchema } from '../../src/schemas/index.js';
import { makeMblog, postCard, repostCard } from '../fixtures/weibo.js';

const context: ParseContext = {
  now: new Date(2024, 2, 16, 12, 0, 0),
  encoding: 'utf8',
};

// ============================================
// Card Filtering
// ============================================

describe('isOriginalPostCard', () => {
  const card = (raw: unknown) => CardSchema.parse(raw);

  it('accepts type 9 cards with a post', () => {
    expect(isOriginalPostCard(card(postCard(makeMblog())))).toBe(true);
  });

  it('rejects reposts', () => {
    expect(isOriginalPostCard(card(repostCard(makeMblog())))).toBe(false);
  });

  it('rejects other card types and cards without a post', () => {
    expect(isOriginalPostCard(card({ card_type: 11, mblog: makeMblog() }))).toBe(false);
    expect(isOriginalPostCard(card({ card_type: 9 }))).toBe(false);
  });
});

// ============================================
// Post Parsing
// ============================================

describe('parsePost', () => {
  it('builds a normalized record', () => {
    const record = parsePost(
      makeMblog({
        id: '4990000000000001',
        text: 'Hi <a href="/n/Bob">@Bob</a> <span class="surl-text">#TS#</span>',
        created_at: '5分钟前',
        attitudes_count: '1.2万+',
        comments_count: 5,
        reposts_count: '100',
        pics: [{ large: { url: 'https://img.example/1.jpg' } }, { large: { url: 'https://img.example/2.jpg' } }],
        user: { id: 1669879400, screen_name: 'Alice' },
      }),
      context
    );

    expect(record).toEqual({
      user_id: '1669879400',
      user_name: 'Alice',
      id: '4990000000000001',
      text: 'Hi @Bob #TS#',
      images: ['https://img.example/1.jpg', 'https://img.example/2.jpg'],
      created: '2024-03-16T11:55:00',
      attitudes_count: 12000,
      comments_count: 5,
      reposts_count: 100,
      topics: ['TS'],
      at_users: ['Bob'],
      is_long_text: false,
    });
  });

  it('emits keys in record order', () => {
    const record = parsePost(makeMblog(), context);

    expect(Object.keys(record)).toEqual([
      'user_id',
      'user_name',
      'id',
      'text',
      'images',
      'created',
      'attitudes_count',
      'comments_count',
      'reposts_count',
      'topics',
      'at_users',
      'is_long_text',
    ]);
  });

  it('defaults missing pictures and long-text flag', () => {
    const raw = makeMblog({ isLongText: undefined });
    const record = parsePost(raw, context);

    expect(record.images).toEqual([]);
    expect(record.is_long_text).toBe(false);
  });

  it('keeps the long-text flag', () => {
    expect(parsePost(makeMblog({ isLongText: true }), context).is_long_text).toBe(true);
  });

  it('drops characters the output encoding cannot hold', () => {
    const record = parsePost(
      makeMblog({ text: 'Café 咖啡', user: { id: 1001, screen_name: '小明Ming' } }),
      { ...context, encoding: 'latin1' }
    );

    expect(record.text).toBe('Café ');
    expect(record.user_name).toBe('Ming');
  });

  it('throws when a required field is missing', () => {
    const raw = makeMblog();
    delete raw.created_at;

    expect(() => parsePost(raw, context)).toThrow();
  });

  it('keeps large ids exact when they arrive as digit strings', () => {
    const record = parsePost(
      makeMblog({ id: '4990000000000000123', user: { id: '9007199254740993', screen_name: 'Alice' } }),
      context
    );

    expect(record.id).toBe('4990000000000000123');
    expect(record.user_id).toBe('9007199254740993');
  });

  it('rejects numeric ids that already lost precision', () => {
    const raw: unknown = JSON.parse(
      '{"id":4990000000000000123,"text":"hi","created_at":"2024-03-10","attitudes_count":0,' +
        '"comments_count":0,"reposts_count":0,"user":{"id":9007199254740993,"screen_name":"Alice"}}'
    );

    expect(() => parsePost(raw, context)).toThrow();
  });

  it('throws on an unknown count encoding', () => {
    expect(() => parsePost(makeMblog({ comments_count: 'many' }), context)).toThrow(
      'Unrecognised count format: "many"'
    );
  });
});
