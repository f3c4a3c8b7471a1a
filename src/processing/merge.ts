/**
 * Round-Robin Feed Merging
 *
 * Drives several feeds in rounds: every round asks each feed, in the order
 * given, for one page and flattens the pages into one record sequence.
 * Exhausted feeds contribute an empty page, so a short feed never cuts a
 * long one off. Merging ends after the first round in which every feed is
 * exhausted; that round is not counted.
 */

import type { PostRecord } from '../types/index.js';
import { logVerbose } from '../utils/logger.js';

// ============================================
// Types
// ============================================

export interface MergedRound<T> {
  /** 1-based round number */
  round: number;
  /** Pages flattened in feed order, records in page order */
  records: T[];
  /** False when an abort cut the round short */
  complete: boolean;
}

export interface FeedMergerOptions {
  /**
   * Checked before every page request. Once aborted, pages already fetched
   * in the current round are emitted and merging ends.
   */
  signal?: AbortSignal;
}

// ============================================
// Feed Merger
// ============================================

export class FeedMerger<T = PostRecord> {
  private readonly signal?: AbortSignal;
  private currentRound = 0;
  private wasInterrupted = false;

  constructor(
    private readonly feeds: AsyncIterable<T[]>[],
    options: FeedMergerOptions = {}
  ) {
    this.signal = options.signal;
  }

  /** Last round emitted (0 before the first) */
  get round(): number {
    return this.currentRound;
  }

  /** Whether merging stopped because of the abort signal */
  get interrupted(): boolean {
    return this.wasInterrupted;
  }

  /**
   * Yield one entry per round until every feed is exhausted.
   */
  async *rounds(): AsyncGenerator<MergedRound<T>> {
    const iterators = this.feeds.map((feed) => feed[Symbol.asyncIterator]());
    const active = iterators.map(() => true);

    while (!this.wasInterrupted) {
      const pages: T[][] = [];
      let produced = false;

      for (let i = 0; i < iterators.length; i++) {
        if (this.signal?.aborted) {
          this.wasInterrupted = true;
          break;
        }

        if (!active[i]) {
          pages.push([]);
          continue;
        }

        const result = await iterators[i].next();
        if (result.done) {
          active[i] = false;
          pages.push([]);
          continue;
        }

        produced = true;
        pages.push(result.value);
      }

      if (!produced) {
        return;
      }

      this.currentRound += 1;
      const records: T[] = [];
      for (const page of pages) {
        records.push(...page);
      }
      logVerbose(`Round ${this.currentRound}: ${records.length} records`);

      yield { round: this.currentRound, records, complete: !this.wasInterrupted };
    }
  }

  /**
   * Flattened record stream across all rounds.
   */
  async *records(): AsyncGenerator<T> {
    for await (const merged of this.rounds()) {
      yield* merged.records;
    }
  }
}
