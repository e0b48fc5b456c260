/**
 * postsignal - Posting Frequency
 *
 * Partitions the timeline into fixed windows aligned to the epoch (hourly
 * windows start on the UTC hour) and counts posts per window. Empty windows
 * between the first and last post are part of the distribution.
 */

import type { FrequencyStats, IntervalStats, Post, WindowCount } from '../types.js';
import { mean, median, round, standardDeviation } from './stats.js';

const HOUR_MS = 60 * 60 * 1000;

export function windowSizeMs(windowHours: number): number {
  return Math.round(windowHours * HOUR_MS);
}

/**
 * Post counts per window, first window through last, in order
 */
export function countWindows(posts: readonly Post[], windowMs: number): WindowCount[] {
  if (posts.length === 0) return [];

  const firstStart = Math.floor(posts[0].createdAt.getTime() / windowMs) * windowMs;
  const lastStart = Math.floor(posts[posts.length - 1].createdAt.getTime() / windowMs) * windowMs;
  const counts = new Array<number>((lastStart - firstStart) / windowMs + 1).fill(0);

  for (const post of posts) {
    counts[Math.floor((post.createdAt.getTime() - firstStart) / windowMs)] += 1;
  }

  return counts.map((count, i) => ({ start: new Date(firstStart + i * windowMs), count }));
}

/**
 * Hours between consecutive posts; null with fewer than two posts
 */
export function calculateIntervals(posts: readonly Post[]): IntervalStats | null {
  if (posts.length < 2) return null;

  const gaps: number[] = [];
  for (let i = 1; i < posts.length; i++) {
    gaps.push((posts[i].createdAt.getTime() - posts[i - 1].createdAt.getTime()) / HOUR_MS);
  }

  return {
    mean: round(mean(gaps)),
    median: round(median(gaps)),
    min: round(Math.min(...gaps)),
    max: round(Math.max(...gaps)),
    stdDev: round(standardDeviation(gaps, true)),
  };
}

export function calculateFrequency(posts: readonly Post[], windowHours: number): FrequencyStats {
  const windowMs = windowSizeMs(windowHours);
  const windows = countWindows(posts, windowMs);
  const counts = windows.map(w => w.count);

  return {
    windowMs,
    windowCount: windows.length,
    meanPerWindow: round(mean(counts)),
    stdDevPerWindow: round(standardDeviation(counts)),
    windows,
    intervals: calculateIntervals(posts),
  };
}
