/**
 * Post Body Extraction
 *
 * Post bodies arrive as HTML fragments with hashtags wrapped in
 * `<span class="surl-text">` and mentions as `<a href="/n/name">@name</a>`.
 */

import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';

export interface PostBody {
  text: string;
  topics: string[];
  atUsers: string[];
}

/**
 * Flatten a fragment to its text content (entities resolved, tags dropped).
 */
export function htmlToText($: CheerioAPI): string {
  return $.root().text();
}

/**
 * Hashtag topics: `#topic#` spans, delimiters stripped.
 */
export function extractTopics($: CheerioAPI): string[] {
  const topics: string[] = [];
  $('span[class="surl-text"]').each((_, el) => {
    const text = $(el).text();
    if (text.length > 2 && text.startsWith('#') && text.endsWith('#')) {
      topics.push(text.slice(1, -1));
    }
  });
  return topics;
}

/**
 * Mentioned screen names.
 *
 * An anchor counts when its visible text is "@" followed by the account name
 * at the end of its href (the part after the "/n/" prefix). Other links
 * (topics, URLs, "full text") never match.
 */
export function extractMentions($: CheerioAPI): string[] {
  const mentions: string[] = [];
  $('a').each((_, el) => {
    const href = $(el).attr('href');
    if (href === undefined) return;
    const text = $(el).text();
    if (`@${href.slice(3)}` === text) {
      mentions.push(text.slice(1));
    }
  });
  return mentions;
}

/**
 * Parse a post body fragment once and pull out text, topics and mentions.
 */
export function parsePostBody(html: string): PostBody {
  const $ = cheerio.load(html);
  return {
    text: htmlToText($),
    topics: extractTopics($),
    atUsers: extractMentions($),
  };
}
