import { z } from 'zod';

/**
 * Weibo mobile API response schemas.
 *
 * Only the fields the harvester reads are declared; zod strips everything
 * else (toolbar_menus, tab lists, scheme links) on parse.
 */

// ============================================
// Shared Field Encodings
// ============================================

/**
 * Ids arrive as numbers (user ids) or strings (post ids). Numbers past
 * MAX_SAFE_INTEGER have already lost digits, so they are rejected.
 */
export const RawIdSchema = z
  .union([
    z.string().regex(/^\d+$/),
    z.number().int().nonnegative().refine(Number.isSafeInteger, { message: 'id exceeds safe integer range' }),
  ])
  .transform((value) => String(value));

/** Counts arrive as numbers or abbreviated strings such as "1.2万+" */
export const RawCountSchema = z.union([z.number(), z.string()]);
export type RawCount = z.infer<typeof RawCountSchema>;

/** `ok` is 1/0 on the mobile API; some proxies rewrite it to a boolean */
export const OkFlagSchema = z.union([z.number(), z.boolean()]);

export function isOkFlag(ok: z.infer<typeof OkFlagSchema>): boolean {
  return ok === true || ok === 1;
}

// ============================================
// Post (mblog)
// ============================================

export const PictureSchema = z.object({
  large: z.object({
    url: z.string(),
  }),
});

export const MblogSchema = z.object({
  id: RawIdSchema,
  text: z.string(),
  created_at: z.string(),
  attitudes_count: RawCountSchema,
  comments_count: RawCountSchema,
  reposts_count: RawCountSchema,
  isLongText: z.boolean().optional().default(false),
  pics: z.array(PictureSchema).optional(),
  user: z.object({
    id: RawIdSchema,
    screen_name: z.string(),
  }),
});

/**
 * A listing card. `mblog` stays untyped here so repost detection can look at
 * raw key presence before the post itself is parsed.
 */
export const CardSchema = z.object({
  card_type: z.number(),
  mblog: z.record(z.unknown()).optional(),
});

export type Card = z.infer<typeof CardSchema>;

// ============================================
// Container Responses
// ============================================

export const ContainerEnvelopeSchema = z.object({
  ok: OkFlagSchema,
  data: z.unknown().optional(),
});

export const UserInfoSchema = z.object({
  id: RawIdSchema,
  screen_name: z.string(),
  followers_count: RawCountSchema,
  statuses_count: RawCountSchema,
  description: z.string().optional().default(''),
  avatar_hd: z.string().optional().default(''),
});

export const ProfileDataSchema = z.object({
  userInfo: UserInfoSchema,
});

export const PageDataSchema = z.object({
  cards: z.array(CardSchema),
});
