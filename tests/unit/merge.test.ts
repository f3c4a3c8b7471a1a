/**
 * Unit Tests for Round-Robin Feed Merging
 */

import { describe, it, expect, vi } from 'vitest';
import { FeedMerger, type MergedRound } from '../../src/processing/merge.js';

vi.mock('../../src/utils/logger.js', () => ({
  logVerbose: vi.fn(),
}));

async function* feedOf(pages: string[][], onPage?: (index: number) => void): AsyncGenerator<string[]> {
  for (let i = 0; i < pages.length; i++) {
    onPage?.(i);
    yield pages[i];
  }
}

/** Feed that counts how often it is asked for a page */
function countingFeed(pages: string[][]): { feed: AsyncIterable<string[]>; pulls: () => number } {
  let pulls = 0;
  let index = 0;
  const iterator: AsyncIterator<string[]> = {
    async next() {
      pulls += 1;
      if (index >= pages.length) {
        return { done: true, value: undefined };
      }
      return { done: false, value: pages[index++] };
    },
  };
  return { feed: { [Symbol.asyncIterator]: () => iterator }, pulls: () => pulls };
}

async function collectRounds<T>(merger: FeedMerger<T>) {
  const rounds: MergedRound<T>[] = [];
  for await (const round of merger.rounds()) {
    rounds.push(round);
  }
  return rounds;
}

// ============================================
// Rounds
// ============================================

describe('FeedMerger.rounds', () => {
  it('takes one page per feed per round, in feed order', async () => {
    const merger = new FeedMerger<string>([
      feedOf([['a1', 'a2']]),
      feedOf([['b1'], ['b2'], ['b3']]),
    ]);

    const rounds = await collectRounds(merger);

    expect(rounds).toEqual([
      { round: 1, records: ['a1', 'a2', 'b1'], complete: true },
      { round: 2, records: ['b2'], complete: true },
      { round: 3, records: ['b3'], complete: true },
    ]);
    expect(merger.round).toBe(3);
    expect(merger.interrupted).toBe(false);
  });

  it('counts empty pages as rounds', async () => {
    const merger = new FeedMerger<string>([feedOf([[], []])]);

    const rounds = await collectRounds(merger);

    expect(rounds.map((r) => r.records)).toEqual([[], []]);
    expect(merger.round).toBe(2);
  });

  it('produces nothing without feeds', async () => {
    const merger = new FeedMerger<string>([]);

    expect(await collectRounds(merger)).toEqual([]);
    expect(merger.round).toBe(0);
  });

  it('stops asking a feed once it is exhausted', async () => {
    const short = countingFeed([['a1']]);
    const long = countingFeed([['b1'], ['b2'], ['b3']]);

    await collectRounds(new FeedMerger<string>([short.feed, long.feed]));

    expect(short.pulls()).toBe(2);
    expect(long.pulls()).toBe(4);
  });
});

// ============================================
// Interruption
// ============================================

describe('FeedMerger interruption', () => {
  it('emits the pages fetched so far and stops', async () => {
    const controller = new AbortController();
    const feedA = feedOf([['a1'], ['a2'], ['a3']], (index) => {
      if (index === 1) controller.abort();
    });
    const feedB = countingFeed([['b1'], ['b2'], ['b3']]);
    const merger = new FeedMerger<string>([feedA, feedB.feed], { signal: controller.signal });

    const rounds = await collectRounds(merger);

    expect(rounds).toEqual([
      { round: 1, records: ['a1', 'b1'], complete: true },
      { round: 2, records: ['a2'], complete: false },
    ]);
    expect(feedB.pulls()).toBe(1);
    expect(merger.interrupted).toBe(true);
    expect(merger.round).toBe(2);
  });

  it('makes no request when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const feed = countingFeed([['a1']]);
    const merger = new FeedMerger<string>([feed.feed], { signal: controller.signal });

    expect(await collectRounds(merger)).toEqual([]);
    expect(feed.pulls()).toBe(0);
    expect(merger.interrupted).toBe(true);
    expect(merger.round).toBe(0);
  });
});

// ============================================
// Flattened Records
// ============================================

describe('FeedMerger.records', () => {
  it('yields every record in merge order', async () => {
    const merger = new FeedMerger<string>([feedOf([['a1'], ['a2']]), feedOf([['b1', 'b2']])]);

    const records: string[] = [];
    for await (const record of merger.records()) {
      records.push(record);
    }

    expect(records).toEqual(['a1', 'b1', 'b2', 'a2']);
  });
});
