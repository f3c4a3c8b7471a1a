import { z } from 'zod';

/**
 * Decimal identifier kept as text.
 * Weibo ids can exceed Number.MAX_SAFE_INTEGER, so they never pass through `number`.
 */
export const DecimalIdSchema = z.string().regex(/^\d+$/, 'id must be a decimal digit string');

/**
 * Local wall-clock timestamp without zone: YYYY-MM-DDTHH:mm:ss
 */
export const NAIVE_ISO_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}$/;

const CountSchema = z.number().int().min(0);

/**
 * PostRecord Schema - one normalized post as written to the JSONL stream.
 *
 * Key order here is the key order of every output line.
 * Wire names stay snake_case so existing consumers of the stream keep working.
 */
export const PostRecordSchema = z.object({
  /** Author id */
  user_id: DecimalIdSchema,

  /** Author display name */
  user_name: z.string(),

  /** Post id */
  id: DecimalIdSchema,

  /** Body with markup stripped and entities resolved */
  text: z.string(),

  /** Full-resolution image URLs */
  images: z.array(z.string()),

  /** Creation time, resolved at fetch time */
  created: z.string().regex(NAIVE_ISO_PATTERN, 'created must be YYYY-MM-DDTHH:mm:ss'),

  attitudes_count: CountSchema,
  comments_count: CountSchema,
  reposts_count: CountSchema,

  /** Hashtag topics without the surrounding # */
  topics: z.array(z.string()),

  /** Mentioned screen names without the leading @ */
  at_users: z.array(z.string()),

  /** Body was truncated in the listing response */
  is_long_text: z.boolean(),
});

export type PostRecord = z.infer<typeof PostRecordSchema>;

/**
 * UserProfile Schema - snapshot taken once per user before paging starts.
 */
export const UserProfileSchema = z.object({
  id: DecimalIdSchema,
  screen_name: z.string(),
  followers_count: CountSchema,
  statuses_count: CountSchema,
  description: z.string(),
  avatar_hd: z.string(),
});

export type UserProfile = z.infer<typeof UserProfileSchema>;
