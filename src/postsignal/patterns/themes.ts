/**
 * postsignal - Content Themes
 *
 * Most frequent content words across the post history. Themes are
 * informational; nothing downstream scores on them.
 */

import { z } from 'zod';
import type { ContentStats, Post, ThemeCount } from '../types.js';
import { readDataJson } from '../data.js';
import { mean, median, round, standardDeviation } from './stats.js';

const URL_PATTERN = /https?:\/\/\S+/g;
const MENTION_PATTERN = /@\w+/g;
const TOKEN_PATTERN = /[a-z0-9][a-z0-9']*/g;
const MIN_TOKEN_LENGTH = 3;

let defaultStopwords: ReadonlySet<string> | null = null;

/**
 * Bundled English stopwords plus social filler ("rt", "amp", "via")
 */
export function getDefaultStopwords(): ReadonlySet<string> {
  if (!defaultStopwords) {
    const words = z.array(z.string()).parse(readDataJson('stopwords.json'));
    defaultStopwords = new Set(words.map(w => w.toLowerCase()));
  }
  return defaultStopwords;
}

/**
 * Content tokens of one text, in order; anything that is not a string has none
 */
export function* contentTokens(text: unknown, stopwords: ReadonlySet<string>): Generator<string> {
  if (typeof text !== 'string') return;

  const cleaned = text
    .toLowerCase()
    .replace(/[‘’]/g, "'")
    .replace(URL_PATTERN, ' ')
    .replace(MENTION_PATTERN, ' ');

  for (const match of cleaned.matchAll(TOKEN_PATTERN)) {
    const token = match[0].replace(/'s$/, '').replace(/'+$/, '');
    if (token.length < MIN_TOKEN_LENGTH) continue;
    if (/^\d+$/.test(token)) continue;
    if (stopwords.has(token)) continue;
    yield token;
  }
}

/**
 * Top `limit` tokens by count; ties ordered alphabetically
 */
export function extractThemes(
  posts: readonly Post[],
  limit: number,
  stopwords: ReadonlySet<string> = getDefaultStopwords(),
): ThemeCount[] {
  const counts = new Map<string, number>();
  for (const post of posts) {
    for (const token of contentTokens(post.text, stopwords)) {
      counts.set(token, (counts.get(token) ?? 0) + 1);
    }
  }

  return [...counts.entries()]
    .sort(([themeA, a], [themeB, b]) => b - a || (themeA < themeB ? -1 : themeA > themeB ? 1 : 0))
    .slice(0, limit)
    .map(([theme, count]) => ({ theme, count }));
}

export function describeContent(posts: readonly Post[], polarities: readonly number[]): ContentStats {
  const lengths = posts.map(p => (typeof p.text === 'string' ? p.text.length : 0));
  return {
    averageLength: round(mean(lengths), 1),
    medianLength: round(median(lengths), 1),
    averagePolarity: round(mean(polarities)),
    sentimentVolatility: round(standardDeviation(polarities, true)),
  };
}
