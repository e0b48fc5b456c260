/**
 * postsignal - Burst Detection
 *
 * A window is a burst when its count exceeds mean + k·stddev of all window
 * counts (population std-dev). Adjacent burst windows merge into one interval.
 */

import type { BurstWindow, WindowCount } from '../types.js';
import { mean, standardDeviation } from './stats.js';

export interface BurstOptions {
  /** k in mean + k·stddev */
  sensitivity: number;
  /** Fewer windows than this never produce bursts */
  minWindows: number;
}

export function burstThreshold(counts: readonly number[], sensitivity: number): number {
  return mean(counts) + sensitivity * standardDeviation(counts);
}

/**
 * Flag and merge burst windows
 *
 * @returns Non-overlapping intervals ordered by start; `end` is exclusive
 */
export function detectBursts(
  windows: readonly WindowCount[],
  windowMs: number,
  options: BurstOptions,
): BurstWindow[] {
  if (windows.length < Math.max(2, options.minWindows)) return [];

  const threshold = burstThreshold(
    windows.map(w => w.count),
    options.sensitivity,
  );

  const bursts: BurstWindow[] = [];
  let current: BurstWindow | null = null;

  for (const window of windows) {
    if (window.count <= threshold) {
      current = null;
      continue;
    }

    if (current) {
      current.end = new Date(window.start.getTime() + windowMs);
      current.postCount += window.count;
      current.windowCount += 1;
    } else {
      current = {
        start: window.start,
        end: new Date(window.start.getTime() + windowMs),
        postCount: window.count,
        windowCount: 1,
      };
      bursts.push(current);
    }
  }

  return bursts;
}

export function isInBurst(timestamp: Date, bursts: readonly BurstWindow[]): boolean {
  const t = timestamp.getTime();
  return bursts.some(burst => burst.start.getTime() <= t && t < burst.end.getTime());
}
