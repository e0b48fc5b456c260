/**
 * postsignal Signal Generator Tests
 *
 * Tests for qualification, classification, action text and context flags.
 */

import { describe, it, expect } from 'vitest';
import { createSignalGenerator } from '../src/postsignal/signals/generator.js';
import { actionFor, keywordLabel } from '../src/postsignal/signals/actions.js';
import { createPatternDetector } from '../src/postsignal/patterns/detector.js';
import { createDefaultConfig } from '../src/postsignal/config.js';
import type { KeywordMatch, PatternContext, Post, PostScore } from '../src/postsignal/types.js';

const HOUR = 60 * 60 * 1000;
const T0 = Date.UTC(2026, 0, 5, 0, 0, 0);

const NONE: KeywordMatch = { cryptoKeywords: [], stockKeywords: [] };
const DOGE: KeywordMatch = { cryptoKeywords: ['dogecoin'], stockKeywords: [] };

function makePost(id: string, offsetMs: number, overrides: Partial<Post> = {}): Post {
  return {
    id,
    author: 'tester',
    createdAt: new Date(T0 + offsetMs),
    text: 'placeholder',
    isRetweet: false,
    isReply: false,
    likeCount: 0,
    retweetCount: 0,
    replyCount: 0,
    ...overrides,
  };
}

function makeContext(overrides: Partial<PatternContext> = {}): PatternContext {
  const empty = createPatternDetector(createDefaultConfig()).detect([]);
  return { ...empty, ...overrides };
}

describe('actionFor()', () => {
  it('names crypto keywords before stock keywords', () => {
    const keywords = { cryptoKeywords: ['bitcoin', 'eth'], stockKeywords: ['tesla'] };
    expect(actionFor('BULLISH', keywords)).toBe('CONSIDER BUYING BITCOIN, ETH');
  });

  it('falls back to stock keywords', () => {
    expect(actionFor('BEARISH', { cryptoKeywords: [], stockKeywords: ['tesla', 'stock'] })).toBe(
      'CONSIDER SELLING TESLA, STOCK',
    );
  });

  it('monitors keywords on neutral sentiment', () => {
    expect(actionFor('NEUTRAL', DOGE)).toBe('MONITOR DOGECOIN');
  });

  it('suggests monitoring without keywords', () => {
    expect(actionFor('BULLISH', NONE)).toBe('MONITOR FOR BUYING OPPORTUNITY');
    expect(actionFor('BEARISH', NONE)).toBe('MONITOR FOR SELLING OPPORTUNITY');
    expect(keywordLabel(NONE)).toBeNull();
  });
});

describe('SignalGenerator', () => {
  const generator = createSignalGenerator({ positiveThreshold: 0.3, negativeThreshold: -0.3 });

  it('drops a neutral post without keywords regardless of engagement', () => {
    const post = makePost('1', 0, { likeCount: 1_000_000, retweetCount: 500_000 });
    expect(generator.generate(post, { polarity: 0, subjectivity: 0 }, NONE, makeContext())).toBeNull();
  });

  it('keeps a neutral post that mentions a keyword', () => {
    const candidate = generator.generate(makePost('1', 0), { polarity: 0.1, subjectivity: 0.2 }, DOGE, makeContext());

    expect(candidate?.type).toBe('NEUTRAL');
    expect(candidate?.action).toBe('MONITOR DOGECOIN');
  });

  it('keeps strong sentiment without keywords', () => {
    const candidate = generator.generate(makePost('1', 0), { polarity: 0.5, subjectivity: 0.5 }, NONE, makeContext());

    expect(candidate?.type).toBe('BULLISH');
    expect(candidate?.action).toBe('MONITOR FOR BUYING OPPORTUNITY');
  });

  it('treats the thresholds as inclusive', () => {
    expect(generator.classify(0.3)).toBe('BULLISH');
    expect(generator.classify(-0.3)).toBe('BEARISH');
    expect(generator.classify(0.29)).toBe('NEUTRAL');
  });

  it('computes weighted engagement', () => {
    const post = makePost('1', 0, { likeCount: 100000, retweetCount: 10000, replyCount: 5430 });
    const candidate = generator.generate(post, { polarity: 0.65, subjectivity: 0.5 }, DOGE, makeContext());

    expect(candidate?.engagementScore).toBe(125430);
  });

  it('copies the timestamp and keyword lists into the candidate', () => {
    const post = makePost('1', 0);
    const candidate = generator.generate(post, { polarity: 0.5, subjectivity: 0 }, DOGE, makeContext());

    expect(candidate?.timestamp).toEqual(post.createdAt);
    expect(candidate?.timestamp).not.toBe(post.createdAt);
    expect(candidate?.keywordMatch).toEqual(DOGE);
    expect(candidate?.keywordMatch.cryptoKeywords).not.toBe(DOGE.cryptoKeywords);
  });

  it('flags posts inside a burst and in a high-engagement hour', () => {
    const context = makeContext({
      burstWindows: [{ start: new Date(T0), end: new Date(T0 + HOUR), postCount: 8, windowCount: 1 }],
      highEngagementHours: [0],
    });

    const inside = generator.generate(makePost('1', HOUR / 2), { polarity: 0.5, subjectivity: 0 }, NONE, context);
    const atEnd = generator.generate(makePost('2', HOUR), { polarity: 0.5, subjectivity: 0 }, NONE, context);

    expect(inside?.contextFlags).toEqual(['IN_BURST', 'HIGH_ENGAGEMENT_HOUR']);
    expect(atEnd?.contextFlags).toEqual([]);
  });

  it('generates candidates for qualifying posts in post order', () => {
    const posts = [makePost('a', 0), makePost('b', HOUR), makePost('c', 2 * HOUR)];
    const score = (polarity: number, keywords: KeywordMatch): PostScore => ({
      sentiment: { polarity, subjectivity: 0.5 },
      keywords,
    });
    const scores = new Map<string, PostScore>([
      ['a', score(-0.6, NONE)],
      ['b', score(0, NONE)],
      ['c', score(0.1, DOGE)],
    ]);

    const candidates = generator.generateAll(posts, scores, makeContext());

    expect(candidates.map(c => [c.postId, c.type])).toEqual([
      ['a', 'BEARISH'],
      ['c', 'NEUTRAL'],
    ]);
  });
});
