/**
 * postsignal Signal Ranker Tests
 *
 * Tests for confidence, urgency tiers, filtering and ordering.
 */

import { describe, it, expect } from 'vitest';
import {
  createSignalRanker,
  normalizeEngagement,
  urgencyFor,
  compareSignals,
} from '../src/postsignal/signals/ranker.js';
import { createSignalGenerator } from '../src/postsignal/signals/generator.js';
import { createPatternDetector } from '../src/postsignal/patterns/detector.js';
import { createDefaultConfig } from '../src/postsignal/config.js';
import type { ContextFlag, SignalCandidate } from '../src/postsignal/types.js';

const HOUR = 60 * 60 * 1000;
const T0 = Date.UTC(2026, 0, 5, 0, 0, 0);

function makeCandidate(
  postId: string,
  polarity: number,
  options: { subjectivity?: number; engagement?: number; offsetMs?: number; flags?: ContextFlag[] } = {},
): SignalCandidate {
  return {
    postId,
    timestamp: new Date(T0 + (options.offsetMs ?? 0)),
    type: polarity > 0 ? 'BULLISH' : 'BEARISH',
    polarity,
    subjectivity: options.subjectivity ?? 1,
    keywordMatch: { cryptoKeywords: [], stockKeywords: [] },
    engagementScore: options.engagement ?? 0,
    action: 'MONITOR FOR BUYING OPPORTUNITY',
    contextFlags: options.flags ?? [],
  };
}

describe('urgencyFor()', () => {
  it('maps confidence to tiers', () => {
    expect(urgencyFor(0.85)).toBe('CRITICAL');
    expect(urgencyFor(0.8499)).toBe('HIGH');
    expect(urgencyFor(0.7)).toBe('HIGH');
    expect(urgencyFor(0.6999)).toBe('MEDIUM');
    expect(urgencyFor(0.5)).toBe('MEDIUM');
    expect(urgencyFor(0.4999)).toBe('LOW');
  });
});

describe('normalizeEngagement()', () => {
  it('scales logarithmically against the ceiling', () => {
    expect(normalizeEngagement(0, 100)).toBe(0);
    expect(normalizeEngagement(100, 100)).toBe(1);
    expect(normalizeEngagement(500, 100)).toBe(1);
    expect(normalizeEngagement(10, 0)).toBe(0);
  });
});

describe('SignalRanker', () => {
  it('uses sentiment strength alone without engagement or flags', () => {
    const ranker = createSignalRanker();
    expect(ranker.calculateConfidence(makeCandidate('1', 0.4), 0)).toBe(0.4);
  });

  it('adds engagement and context boosts', () => {
    const ranker = createSignalRanker();
    const candidate = makeCandidate('1', 0.65, {
      subjectivity: 0,
      engagement: 125430,
      flags: ['IN_BURST', 'HIGH_ENGAGEMENT_HOUR'],
    });

    // 0.65 · 0.75 + 0.2 + 0.15 + 0.1
    expect(ranker.calculateConfidence(candidate, 125430)).toBe(0.9375);
  });

  it('clamps confidence to 1', () => {
    const ranker = createSignalRanker();
    const candidate = makeCandidate('1', -1, { engagement: 50, flags: ['IN_BURST'] });

    expect(ranker.calculateConfidence(candidate, 50)).toBe(1);
  });

  it('honours custom weights', () => {
    const ranker = createSignalRanker({ sentimentWeight: 0.5, burstBoost: 0.3 });
    const candidate = makeCandidate('1', 0.8, { flags: ['IN_BURST'] });

    expect(ranker.calculateConfidence(candidate, 0)).toBe(0.7);
  });

  it('drops signals below the minimum confidence', () => {
    const signals = createSignalRanker().enhance([makeCandidate('weak', 0.4), makeCandidate('strong', 0.9)], 0.5);

    expect(signals.map(s => s.postId)).toEqual(['strong']);
    expect(signals.every(s => s.confidence >= 0.5)).toBe(true);
  });

  it('orders by confidence, then most recent, then post id', () => {
    const candidates = [
      makeCandidate('older', 0.6, { offsetMs: 0 }),
      makeCandidate('newer', 0.6, { offsetMs: HOUR }),
      makeCandidate('top', 0.9, { offsetMs: 0 }),
      makeCandidate('b-tie', -0.6, { offsetMs: HOUR }),
      makeCandidate('a-tie', -0.6, { offsetMs: HOUR }),
    ];

    const signals = createSignalRanker().enhance(candidates, 0);

    expect(signals.map(s => s.postId)).toEqual(['top', 'a-tie', 'b-tie', 'newer', 'older']);
    expect([...signals].sort(compareSignals)).toEqual(signals);
  });

  it('normalizes against the largest candidate engagement when no ceiling is given', () => {
    const candidates = [
      makeCandidate('1', 0.5, { engagement: 1000 }),
      makeCandidate('2', 0.5, { engagement: 0 }),
    ];

    const signals = createSignalRanker().enhance(candidates, 0);

    expect(signals.map(s => [s.postId, s.confidence])).toEqual([
      ['1', 0.7],
      ['2', 0.5],
    ]);
  });

  it('freezes ranked signals', () => {
    const [signal] = createSignalRanker().enhance([makeCandidate('1', 0.9)], 0);

    expect(Object.isFrozen(signal)).toBe(true);
    expect(Object.isFrozen(signal.contextFlags)).toBe(true);
  });

  it('produces a critical DOGECOIN signal for a strong, well-timed post', () => {
    const config = createDefaultConfig();
    const generator = createSignalGenerator(config);
    const context = {
      ...createPatternDetector(config).detect([]),
      burstWindows: [{ start: new Date(T0 + 9 * HOUR), end: new Date(T0 + 10 * HOUR), postCount: 10, windowCount: 1 }],
      highEngagementHours: [9],
    };
    const post = {
      id: 'doge-1',
      author: 'tester',
      createdAt: new Date(T0 + 9 * HOUR + 15 * 60 * 1000),
      text: 'placeholder',
      isRetweet: false,
      isReply: false,
      likeCount: 100000,
      retweetCount: 10000,
      replyCount: 5430,
    };

    const candidate = generator.generate(
      post,
      { polarity: 0.65, subjectivity: 0.5 },
      { cryptoKeywords: ['dogecoin'], stockKeywords: [] },
      context,
    );
    const signals = createSignalRanker(config.confidence, 125430).enhance(candidate ? [candidate] : [], 0.5);

    expect(signals).toHaveLength(1);
    expect(signals[0].type).toBe('BULLISH');
    expect(signals[0].urgency).toBe('CRITICAL');
    expect(signals[0].action).toContain('DOGECOIN');
    expect(signals[0].contextFlags).toEqual(['IN_BURST', 'HIGH_ENGAGEMENT_HOUR']);
  });
});
