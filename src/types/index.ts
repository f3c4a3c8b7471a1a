/**
 * Type Definitions
 *
 * Re-exports Zod-inferred types from schemas and defines
 * harvest defaults and API constants.
 */

import type { HarvestConfig } from '../schemas/index.js';

// ============================================
// Re-export all schema types
// ============================================

export type {
  PostRecord,
  UserProfile,
  RawCount,
  Card,
  IntRange,
  OutputEncoding,
  HarvestConfig,
} from '../schemas/index.js';

// ============================================
// API Constants
// ============================================

export const DEFAULT_API_URL = 'https://m.weibo.cn/api/container/getIndex';
export const DEFAULT_DETAIL_URL = 'https://m.weibo.cn/detail';

/**
 * Container id prefixes. The container id is the prefix followed by the user id.
 */
export const CONTAINER_PREFIX = {
  profile: '100505',
  posts: '107603',
} as const;

/** Posts per listing page; bounds pagination from statuses_count */
export const POSTS_PER_PAGE = 10;

/** Card type of an original post in listing responses */
export const POST_CARD_TYPE = 9;

// ============================================
// Default Configuration
// ============================================

/**
 * Default harvest configuration.
 * Pause every 1-5 requests for 6-10 seconds.
 */
export const DEFAULT_CONFIG: HarvestConfig = {
  stepRange: [1, 5],
  delayRange: [6, 10],
  expandLongText: false,
  outputEncoding: 'utf8',
  apiUrl: DEFAULT_API_URL,
  detailUrl: DEFAULT_DETAIL_URL,
  timeoutMs: 30000,
  verbose: false,
};
