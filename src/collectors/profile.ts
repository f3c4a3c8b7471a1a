/**
 * Profile Lookup
 *
 * One container request per user, made before any paging, to learn the
 * display name and the post count that bounds pagination.
 */

import {
  ContainerEnvelopeSchema,
  ProfileDataSchema,
  UserProfileSchema,
  isOkFlag,
} from '../schemas/index.js';
import type { OutputEncoding, UserProfile } from '../types/index.js';
import { CONTAINER_PREFIX, POSTS_PER_PAGE } from '../types/index.js';
import { parseCount, sanitizeStrings } from '../processing/normalize.js';
import type { WeiboClient } from './client.js';

/**
 * The profile lookup came back without user info.
 * `response` is the raw body for diagnostics.
 */
export class UserNotFoundError extends Error {
  constructor(
    public readonly userId: string,
    public readonly response: unknown
  ) {
    super(`Cannot find user info for id ${userId}`);
    this.name = 'UserNotFoundError';
  }
}

export interface ProfileLookupDeps {
  client: WeiboClient;
  encoding?: OutputEncoding;
}

/**
 * Fetch a user's profile snapshot.
 *
 * @throws UserNotFoundError on a non-OK response or missing user info
 */
export async function fetchUserProfile(
  userId: string,
  deps: ProfileLookupDeps
): Promise<UserProfile> {
  const response = await deps.client.getContainer({
    containerid: `${CONTAINER_PREFIX.profile}${userId}`,
  });

  const envelope = ContainerEnvelopeSchema.safeParse(response);
  if (!envelope.success || !isOkFlag(envelope.data.ok)) {
    throw new UserNotFoundError(userId, response);
  }

  const data = ProfileDataSchema.safeParse(envelope.data.data);
  if (!data.success) {
    throw new UserNotFoundError(userId, response);
  }

  const info = data.data.userInfo;
  const profile: UserProfile = {
    id: info.id,
    screen_name: info.screen_name,
    followers_count: parseCount(info.followers_count),
    statuses_count: parseCount(info.statuses_count),
    description: info.description,
    avatar_hd: info.avatar_hd,
  };

  return UserProfileSchema.parse(sanitizeStrings(profile, deps.encoding));
}

/**
 * Listing pages needed to cover every post: ceil(statuses_count / 10)
 */
export function countPages(profile: UserProfile): number {
  return Math.ceil(profile.statuses_count / POSTS_PER_PAGE);
}
