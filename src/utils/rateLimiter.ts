/**
 * Request Pacing
 *
 * Wraps request-issuing operations so that after a random number of calls
 * the next call waits a random number of seconds before it runs. Both
 * numbers are redrawn after every pause.
 *
 * The pause is a plain awaited timer with no abort hook: once the countdown
 * reaches zero the wait always completes. Callers await every request in
 * sequence, so a single limiter paces every feed that shares it.
 */

import type { IntRange } from '../types/index.js';
import { defaultRandom, randomInt, type RandomSource } from './random.js';
import { logVerbose } from './logger.js';

// ============================================
// Types
// ============================================

export interface RateLimiterOptions {
  /** How many calls run before a pause (inclusive) */
  stepRange: IntRange;

  /** Pause length in seconds (inclusive) */
  delayRange: IntRange;

  /** Source of the random draws (default: Math.random) */
  random?: RandomSource;

  /** Wait implementation, injectable for tests */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Snapshot of the pacing countdown
 */
export interface RateLimiterState {
  remainingSteps: number;
  delaySeconds: number;
}

// ============================================
// Helpers
// ============================================

/**
 * Sleep for specified milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// ============================================
// Rate Limiter
// ============================================

export class RateLimiter {
  private readonly stepRange: IntRange;
  private readonly delayRange: IntRange;
  private readonly random: RandomSource;
  private readonly sleepFn: (ms: number) => Promise<void>;
  private remainingSteps = 0;
  private delaySeconds = 0;

  constructor(options: RateLimiterOptions) {
    this.stepRange = options.stepRange;
    this.delayRange = options.delayRange;
    this.random = options.random ?? defaultRandom;
    this.sleepFn = options.sleep ?? sleep;
    this.reset();
  }

  /**
   * Current countdown and pending pause length
   */
  get state(): RateLimiterState {
    return { remainingSteps: this.remainingSteps, delaySeconds: this.delaySeconds };
  }

  /**
   * Run one paced call. Pauses first when the countdown hits zero, then
   * always runs `fn`; its result or rejection passes through unchanged.
   */
  async run<T>(fn: () => Promise<T>): Promise<T> {
    this.remainingSteps -= 1;
    if (this.remainingSteps === 0) {
      logVerbose(`Pacing: pausing ${this.delaySeconds}s`);
      await this.sleepFn(this.delaySeconds * 1000);
      this.reset();
    }
    return fn();
  }

  /**
   * Bind an operation to this limiter.
   */
  wrap<A extends unknown[], T>(fn: (...args: A) => Promise<T>): (...args: A) => Promise<T> {
    return (...args: A) => this.run(() => fn(...args));
  }

  private reset(): void {
    this.remainingSteps = randomInt(this.stepRange, this.random);
    this.delaySeconds = randomInt(this.delayRange, this.random);
  }
}
