/**
 * postsignal - Timing Correlation
 *
 * Relates the UTC hour (and weekday) a post was made to its engagement and
 * sentiment. Hours whose mean engagement is above the configured percentile of
 * all hourly means are high-engagement hours.
 */

import type { ActivityProfile, HourBucket, Post, TimingCorrelation } from '../types.js';
import { engagementScore, hourOfDay } from '../posts/store.js';
import { mean, percentile, round } from './stats.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const TOP_N = 3;

export function buildHourBuckets(posts: readonly Post[], polarities: readonly number[]): HourBucket[] {
  const groups = new Map<number, { engagement: number[]; polarity: number[] }>();

  posts.forEach((post, i) => {
    const hour = hourOfDay(post);
    const group = groups.get(hour) ?? { engagement: [], polarity: [] };
    group.engagement.push(engagementScore(post));
    group.polarity.push(polarities[i] ?? 0);
    groups.set(hour, group);
  });

  return [...groups.entries()]
    .sort(([a], [b]) => a - b)
    .map(([hour, group]) => ({
      hour,
      postCount: group.engagement.length,
      meanEngagement: round(mean(group.engagement), 2),
      meanPolarity: round(mean(group.polarity)),
    }));
}

/**
 * Keys of the `n` highest (or lowest) values; ties go to the smaller key
 */
function rankKeys(entries: Array<[number, number]>, n: number, order: 'desc' | 'asc'): number[] {
  return [...entries]
    .sort(([keyA, a], [keyB, b]) => (a === b ? keyA - keyB : order === 'desc' ? b - a : a - b))
    .slice(0, n)
    .map(([key]) => key);
}

export function highEngagementHours(
  buckets: readonly HourBucket[],
  percentileRank: number,
): { hours: number[]; threshold: number } {
  const threshold = percentile(
    buckets.map(b => b.meanEngagement),
    percentileRank,
  );
  return {
    hours: buckets.filter(b => b.meanEngagement > threshold).map(b => b.hour),
    threshold: round(threshold, 2),
  };
}

export function correlateTiming(
  posts: readonly Post[],
  polarities: readonly number[],
  percentileRank: number,
): { timing: TimingCorrelation; highEngagementHours: number[] } {
  const buckets = buildHourBuckets(posts, polarities);
  const { hours, threshold } = highEngagementHours(buckets, percentileRank);

  const engagementByHour: Array<[number, number]> = buckets.map(b => [b.hour, b.meanEngagement]);
  const polarityByHour: Array<[number, number]> = buckets.map(b => [b.hour, b.meanPolarity]);

  const byDay = new Map<number, number[]>();
  for (const post of posts) {
    const day = post.createdAt.getUTCDay();
    const values = byDay.get(day) ?? [];
    values.push(engagementScore(post));
    byDay.set(day, values);
  }
  const engagementByDay: Array<[number, number]> = [...byDay.entries()].map(([day, values]) => [
    day,
    mean(values),
  ]);

  return {
    timing: {
      buckets,
      engagementThreshold: threshold,
      bestEngagementHours: rankKeys(engagementByHour, TOP_N, 'desc'),
      worstEngagementHours: rankKeys(engagementByHour, TOP_N, 'asc'),
      mostPositiveHours: rankKeys(polarityByHour, TOP_N, 'desc'),
      mostNegativeHours: rankKeys(polarityByHour, TOP_N, 'asc'),
      bestEngagementDays: rankKeys(engagementByDay, TOP_N, 'desc'),
    },
    highEngagementHours: hours,
  };
}

function distribution(values: readonly number[]): Record<number, number> {
  const counts: Record<number, number> = {};
  for (const value of values) {
    counts[value] = (counts[value] ?? 0) + 1;
  }
  return counts;
}

function mode(counts: Record<number, number>): number | null {
  const entries: Array<[number, number]> = Object.entries(counts).map(([key, count]) => [Number(key), count]);
  return rankKeys(entries, 1, 'desc')[0] ?? null;
}

/**
 * When the account posts: busiest hour and weekday, posts per day
 */
export function profileActivity(posts: readonly Post[]): ActivityProfile {
  const hourlyDistribution = distribution(posts.map(hourOfDay));
  const dailyDistribution = distribution(posts.map(p => p.createdAt.getUTCDay()));

  const spanDays =
    posts.length > 1
      ? Math.floor((posts[posts.length - 1].createdAt.getTime() - posts[0].createdAt.getTime()) / DAY_MS)
      : 0;

  return {
    mostActiveHour: mode(hourlyDistribution),
    mostActiveDay: mode(dailyDistribution),
    averagePostsPerDay: round(posts.length / Math.max(1, spanDays), 2),
    hourlyDistribution,
    dailyDistribution,
  };
}
