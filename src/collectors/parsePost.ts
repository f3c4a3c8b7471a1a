/**
 * Card Parsing
 *
 * Turns one raw post object (a listing card's `mblog`, or the `status`
 * object embedded in a detail page) into a PostRecord.
 */

import { MblogSchema, PostRecordSchema } from '../schemas/index.js';
import type { Card, OutputEncoding, PostRecord } from '../types/index.js';
import { POST_CARD_TYPE } from '../types/index.js';
import { parsePostBody } from '../processing/html.js';
import {
  formatNaiveIso,
  parseCount,
  parseCreatedAt,
  sanitizeStrings,
} from '../processing/normalize.js';

export interface ParseContext {
  /** Reference time for relative dates ("5分钟前") */
  now: Date;
  encoding: OutputEncoding;
}

export type PostCard = Card & { mblog: Record<string, unknown> };

/**
 * Original posts only: card type 9 without a reposted status.
 */
export function isOriginalPostCard(card: Card): card is PostCard {
  return (
    card.card_type === POST_CARD_TYPE &&
    card.mblog !== undefined &&
    !('retweeted_status' in card.mblog)
  );
}

/**
 * Parse and normalize one raw post.
 *
 * @throws ZodError when required fields are missing
 * @throws CountFormatError / DateFormatError on unknown field encodings
 */
export function parsePost(raw: unknown, context: ParseContext): PostRecord {
  const mblog = MblogSchema.parse(raw);
  const body = parsePostBody(mblog.text);

  const record: PostRecord = {
    user_id: mblog.user.id,
    user_name: mblog.user.screen_name,
    id: mblog.id,
    text: body.text,
    images: (mblog.pics ?? []).map((pic) => pic.large.url),
    created: formatNaiveIso(parseCreatedAt(mblog.created_at, context.now)),
    attitudes_count: parseCount(mblog.attitudes_count),
    comments_count: parseCount(mblog.comments_count),
    reposts_count: parseCount(mblog.reposts_count),
    topics: body.topics,
    at_users: body.atUsers,
    is_long_text: mblog.isLongText,
  };

  return PostRecordSchema.parse(sanitizeStrings(record, context.encoding));
}
