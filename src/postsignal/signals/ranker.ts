/**
 * postsignal - Signal Ranker/Enhancer
 *
 * Scores candidates, assigns urgency, drops weak signals and orders the rest.
 *
 * confidence = sentimentWeight · min(1, |polarity| · (0.75 + 0.25 · subjectivity))
 *            + engagementWeight · ln(1 + engagement) / ln(1 + ceiling)
 *            + burstBoost (IN_BURST)
 *            + engagementHourBoost (HIGH_ENGAGEMENT_HOUR)
 * clamped to [0, 1]
 */

import type { Signal, SignalCandidate, Urgency } from '../types.js';
import type { ConfidenceWeights } from '../config.js';
import { clamp, round } from '../patterns/stats.js';
import { logger } from '../../logger.js';

export const DEFAULT_CONFIDENCE_WEIGHTS: ConfidenceWeights = {
  sentimentWeight: 1.0,
  engagementWeight: 0.2,
  burstBoost: 0.15,
  engagementHourBoost: 0.1,
};

const URGENCY_LEVELS: Array<[number, Urgency]> = [
  [0.85, 'CRITICAL'],
  [0.7, 'HIGH'],
  [0.5, 'MEDIUM'],
];

export function urgencyFor(confidence: number): Urgency {
  for (const [floor, urgency] of URGENCY_LEVELS) {
    if (confidence >= floor) return urgency;
  }
  return 'LOW';
}

/**
 * Log-scaled engagement relative to the ceiling, in [0, 1]
 */
export function normalizeEngagement(engagement: number, ceiling: number): number {
  if (ceiling <= 0 || engagement <= 0) return 0;
  return Math.min(1, Math.log1p(engagement) / Math.log1p(ceiling));
}

/** Confidence desc, then most recent first, then post id */
export function compareSignals(a: Signal, b: Signal): number {
  if (a.confidence !== b.confidence) return b.confidence - a.confidence;
  const diff = b.timestamp.getTime() - a.timestamp.getTime();
  if (diff !== 0) return diff;
  return a.postId < b.postId ? -1 : a.postId > b.postId ? 1 : 0;
}

export class SignalRanker {
  private readonly weights: ConfidenceWeights;

  /**
   * @param engagementCeiling - Largest engagement of the run; defaults to the
   *   largest among the candidates being ranked
   */
  constructor(
    weights?: Partial<ConfidenceWeights>,
    private readonly engagementCeiling?: number,
  ) {
    this.weights = { ...DEFAULT_CONFIDENCE_WEIGHTS, ...weights };
  }

  calculateConfidence(candidate: SignalCandidate, ceiling: number): number {
    const { sentimentWeight, engagementWeight, burstBoost, engagementHourBoost } = this.weights;

    const strength = Math.min(1, Math.abs(candidate.polarity) * (0.75 + 0.25 * candidate.subjectivity));
    let confidence =
      sentimentWeight * strength + engagementWeight * normalizeEngagement(candidate.engagementScore, ceiling);

    if (candidate.contextFlags.includes('IN_BURST')) confidence += burstBoost;
    if (candidate.contextFlags.includes('HIGH_ENGAGEMENT_HOUR')) confidence += engagementHourBoost;

    return round(clamp(confidence, 0, 1), 4);
  }

  /**
   * Score, filter and order candidates
   * Signals below `minConfidence` are dropped.
   */
  enhance(candidates: readonly SignalCandidate[], minConfidence: number): Signal[] {
    const ceiling =
      this.engagementCeiling ?? candidates.reduce((max, c) => Math.max(max, c.engagementScore), 0);

    const signals = candidates
      .map((candidate): Signal => {
        const confidence = this.calculateConfidence(candidate, ceiling);
        return Object.freeze({
          ...candidate,
          timestamp: new Date(candidate.timestamp.getTime()),
          keywordMatch: Object.freeze({
            cryptoKeywords: Object.freeze([...candidate.keywordMatch.cryptoKeywords]),
            stockKeywords: Object.freeze([...candidate.keywordMatch.stockKeywords]),
          }),
          contextFlags: Object.freeze([...candidate.contextFlags]),
          confidence,
          urgency: urgencyFor(confidence),
        });
      })
      .filter(signal => signal.confidence >= minConfidence)
      .sort(compareSignals);

    logger.signalsRanked({ candidates: candidates.length, kept: signals.length, minConfidence });
    return signals;
  }
}

export function createSignalRanker(weights?: Partial<ConfidenceWeights>, engagementCeiling?: number): SignalRanker {
  return new SignalRanker(weights, engagementCeiling);
}
