/**
 * Harvest Runner
 *
 * Executes one harvest run:
 * 1. Profile lookup for every user id (not paced)
 * 2. Round-robin paging of every found user through one shared RateLimiter
 * 3. JSONL output in merge order
 *
 * Users whose profile cannot be found are reported and skipped; the run
 * goes on with the rest.
 */

import type { HarvestConfig } from '../types/index.js';
import { createWeiboClient, type WeiboClient } from '../collectors/client.js';
import { UserFeed } from '../collectors/userFeed.js';
import { FeedMerger } from '../processing/merge.js';
import { RateLimiter, sleep as defaultSleep } from '../utils/rateLimiter.js';
import { createSeededRandom, defaultRandom, type RandomSource } from '../utils/random.js';
import { openRecordSink, type RecordSink } from '../utils/fileWriter.js';
import { withErrorHandling, type ErrorHandlingResult } from './errorHandler.js';
import {
  logConfig,
  logInfo,
  logProgress,
  logRunResult,
  logStage,
  logSuccess,
  logVerbose,
  logWarning,
  setVerbose,
} from '../utils/logger.js';

// ============================================
// Types
// ============================================

/**
 * Collaborators a run can be given instead of the real ones.
 */
export interface HarvestDeps {
  client?: WeiboClient;
  sink?: RecordSink;
  random?: RandomSource;
  sleep?: (ms: number) => Promise<void>;
  clock?: () => Date;
  /** Aborting stops the merge before its next request */
  signal?: AbortSignal;
}

export interface MissingUser {
  userId: string;
  reason: string;
}

export interface HarvestResult {
  recordCount: number;
  /** Rounds emitted, including a partial one on interrupt */
  rounds: number;
  interrupted: boolean;
  missingUsers: MissingUser[];
  durationMs: number;
}

// ============================================
// Runner
// ============================================

/**
 * Run a harvest over `userIds` and write every record to the sink.
 *
 * The sink is closed when the run ends, also on failure.
 *
 * @throws ExtractionFormatError when long-post expansion meets an unknown page layout
 */
export async function runHarvest(
  userIds: string[],
  config: HarvestConfig,
  deps: HarvestDeps = {}
): Promise<HarvestResult> {
  const startTime = Date.now();
  setVerbose(config.verbose);

  logConfig({
    userCount: userIds.length,
    stepRange: config.stepRange,
    delayRange: config.delayRange,
    expandLongText: config.expandLongText,
    outputPath: config.outputPath,
  });

  const client = deps.client ?? createWeiboClient(config);
  const random =
    deps.random ?? (config.seed !== undefined ? createSeededRandom(config.seed) : defaultRandom);
  const limiter = new RateLimiter({
    stepRange: config.stepRange,
    delayRange: config.delayRange,
    random,
    sleep: deps.sleep ?? defaultSleep,
  });

  const feedDeps = {
    client,
    limiter,
    clock: deps.clock,
    encoding: config.outputEncoding,
    expandLongText: config.expandLongText,
  };

  // ============================================
  // Stage 1: Profile Lookup
  // ============================================
  logStage('Profile Lookup');

  const feeds: UserFeed[] = [];
  const missingUsers: MissingUser[] = [];
  for (const userId of userIds) {
    try {
      const feed = await UserFeed.fromId(userId, feedDeps);
      logInfo(
        `${feed.profile.screen_name} (${userId}): ${feed.profile.statuses_count} posts, ${feed.totalPages} pages`
      );
      feeds.push(feed);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      logWarning(`Skipping user ${userId}: ${reason}`);
      missingUsers.push({ userId, reason });
    }
  }

  // ============================================
  // Stage 2: Harvest
  // ============================================
  logStage('Harvest');

  const sink = deps.sink ?? (await openRecordSink(config.outputPath, config.outputEncoding));
  const merger = new FeedMerger(feeds, { signal: deps.signal });
  const maxRounds = Math.max(0, ...feeds.map((feed) => feed.totalPages));

  try {
    for await (const { round, records, complete } of merger.rounds()) {
      for (const record of records) {
        await sink.write(record);
      }
      logProgress(round, maxRounds, `${records.length} records${complete ? '' : ' (partial round)'}`);
    }
  } finally {
    await sink.close();
  }

  const durationMs = Date.now() - startTime;

  if (merger.interrupted) {
    logWarning(`Interrupted at round ${merger.round}`);
  } else {
    logVerbose(`All feeds exhausted after ${merger.round} rounds`);
  }

  if (missingUsers.length > 0) {
    logWarning(`${missingUsers.length} of ${userIds.length} users could not be found`);
  } else if (feeds.length > 0) {
    logSuccess(`Collected ${feeds.length} users`);
  }

  logRunResult(true, durationMs, sink.count);

  return {
    recordCount: sink.count,
    rounds: merger.round,
    interrupted: merger.interrupted,
    missingUsers,
    durationMs,
  };
}

/**
 * runHarvest with failures turned into a logged exit code.
 *
 * The sink is opened here so the failure report can give the number of
 * records already written.
 */
export async function runHarvestWithErrorHandling(
  userIds: string[],
  config: HarvestConfig,
  deps: HarvestDeps = {}
): Promise<ErrorHandlingResult<HarvestResult>> {
  let sink = deps.sink;

  return withErrorHandling(
    async () => {
      sink ??= await openRecordSink(config.outputPath, config.outputEncoding);
      return runHarvest(userIds, config, { ...deps, sink });
    },
    { startTime: Date.now(), recordCount: () => (sink ? sink.count : 0) }
  );
}
