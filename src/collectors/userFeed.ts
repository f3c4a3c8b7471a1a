/**
 * User Feed - per-user page iterator
 *
 * Each step requests one listing page through the shared RateLimiter and
 * yields that page's original posts as PostRecords.
 *
 * A feed starts unbounded: `fetchPage()` can be called any number of times.
 * Iterating it (`for await`, or the merger) produces a bounded copy that
 * stops after the number of pages implied by the profile's post count.
 */

import { ContainerEnvelopeSchema, PageDataSchema, isOkFlag } from '../schemas/index.js';
import type { OutputEncoding, PostRecord, UserProfile } from '../types/index.js';
import { CONTAINER_PREFIX } from '../types/index.js';
import type { RateLimiter } from '../utils/rateLimiter.js';
import { logVerbose, logWarning } from '../utils/logger.js';
import type { WeiboClient } from './client.js';
import { countPages, fetchUserProfile } from './profile.js';
import { isOriginalPostCard, parsePost, type ParseContext } from './parsePost.js';
import { ExtractionFormatError, fetchLongPost } from './longText.js';

// ============================================
// Types
// ============================================

/**
 * Paging state. `page` is the next page to request.
 */
export type FeedState =
  | { kind: 'unbounded'; page: number }
  | { kind: 'bounded'; page: number; totalPages: number }
  | { kind: 'exhausted'; page: number };

export interface UserFeedDeps {
  client: WeiboClient;
  /** Shared across every feed of a run */
  limiter: RateLimiter;
  /** Reference time for relative dates; read once per page */
  clock?: () => Date;
  encoding?: OutputEncoding;
  /** Replace truncated posts with their detail-page version */
  expandLongText?: boolean;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================
// User Feed
// ============================================

export class UserFeed implements AsyncIterableIterator<PostRecord[]> {
  /** Fixed at construction; never refreshed during a run */
  readonly totalPages: number;
  private state: FeedState;

  constructor(
    readonly profile: UserProfile,
    private readonly deps: UserFeedDeps,
    initialState: FeedState = { kind: 'unbounded', page: 1 }
  ) {
    this.totalPages = countPages(profile);
    this.state = initialState;
  }

  /**
   * Look the user up and return an unbounded feed at page 1.
   *
   * @throws UserNotFoundError when the profile lookup fails
   */
  static async fromId(userId: string, deps: UserFeedDeps): Promise<UserFeed> {
    const profile = await fetchUserProfile(userId, {
      client: deps.client,
      encoding: deps.encoding,
    });
    return new UserFeed(profile, deps);
  }

  /** Next page to be requested */
  get page(): number {
    return this.state.page;
  }

  get mode(): FeedState['kind'] {
    return this.state.kind;
  }

  /**
   * Request the current page and advance by one.
   *
   * The counter moves even when the request fails, so one bad page never
   * stalls the feed. Failed or non-OK pages yield [].
   *
   * @throws ExtractionFormatError when long-post expansion hits an unknown page layout
   */
  async fetchPage(): Promise<PostRecord[]> {
    const page = this.state.page;
    this.state = { ...this.state, page: page + 1 };
    const label = `${this.profile.screen_name} (${this.profile.id}) page ${page}`;

    let response: unknown;
    try {
      response = await this.deps.limiter.run(() =>
        this.deps.client.getContainer({
          containerid: `${CONTAINER_PREFIX.posts}${this.profile.id}`,
          page: String(page),
        })
      );
    } catch (error) {
      logWarning(`${label}: request failed, skipping (${describeError(error)})`);
      return [];
    }

    const envelope = ContainerEnvelopeSchema.safeParse(response);
    if (!envelope.success || !isOkFlag(envelope.data.ok)) {
      logVerbose(`${label}: response not OK, skipping`);
      return [];
    }

    const data = PageDataSchema.safeParse(envelope.data.data);
    if (!data.success) {
      logWarning(`${label}: unexpected page shape, skipping`);
      return [];
    }

    const context: ParseContext = {
      now: this.now(),
      encoding: this.deps.encoding ?? 'utf8',
    };

    const records: PostRecord[] = [];
    for (const card of data.data.cards) {
      if (!isOriginalPostCard(card)) continue;
      try {
        records.push(parsePost(card.mblog, context));
      } catch (error) {
        logWarning(`${label}: skipping malformed post (${describeError(error)})`);
      }
    }

    logVerbose(`${label}: ${records.length} posts`);

    return this.deps.expandLongText ? this.expandLongPosts(records) : records;
  }

  /**
   * Iterator step. A bounded feed ends, without a request, once every
   * page up to totalPages has been requested.
   */
  async next(): Promise<IteratorResult<PostRecord[]>> {
    if (this.state.kind === 'exhausted') {
      return { done: true, value: undefined };
    }

    if (this.state.kind === 'bounded' && this.state.page > this.state.totalPages) {
      this.state = { kind: 'exhausted', page: this.state.page };
      return { done: true, value: undefined };
    }

    return { done: false, value: await this.fetchPage() };
  }

  /**
   * A bounded copy starting at this feed's current page. This feed is
   * left as it is.
   */
  [Symbol.asyncIterator](): UserFeed {
    return new UserFeed(this.profile, this.deps, {
      kind: 'bounded',
      page: this.state.page,
      totalPages: this.totalPages,
    });
  }

  private now(): Date {
    return this.deps.clock ? this.deps.clock() : new Date();
  }

  private async expandLongPosts(records: PostRecord[]): Promise<PostRecord[]> {
    const expanded: PostRecord[] = [];
    for (const record of records) {
      if (!record.is_long_text) {
        expanded.push(record);
        continue;
      }
      try {
        expanded.push(
          await fetchLongPost(record.id, {
            client: this.deps.client,
            limiter: this.deps.limiter,
            clock: this.deps.clock,
            encoding: this.deps.encoding,
          })
        );
      } catch (error) {
        if (error instanceof ExtractionFormatError) {
          throw error;
        }
        logWarning(`Long post ${record.id}: detail request failed, keeping truncated text (${describeError(error)})`);
        expanded.push(record);
      }
    }
    return expanded;
  }
}
