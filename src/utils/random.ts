/**
 * Random Sources
 *
 * Pacing decisions draw from an injected source instead of Math.random so
 * runs can be replayed and tests can script the draws.
 */

import type { IntRange } from '../types/index.js';

/**
 * Returns a float in [0, 1), like Math.random.
 */
export type RandomSource = () => number;

/**
 * Unseeded source backed by Math.random
 */
export const defaultRandom: RandomSource = () => Math.random();

/**
 * Seeded source (mulberry32). The same seed always yields the same sequence.
 *
 * @param seed - Any integer; only the low 32 bits are used
 */
export function createSeededRandom(seed: number): RandomSource {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Draw an integer uniformly from an inclusive range.
 */
export function randomInt(range: IntRange, random: RandomSource): number {
  const [min, max] = range;
  return min + Math.floor(random() * (max - min + 1));
}
