/**
 * postsignal - Signal Generator
 *
 * Turns one scored post plus the run's PatternContext into a signal candidate.
 * A post qualifies when it mentions a tracked keyword or its polarity crosses
 * either sentiment threshold; everything else is dropped here.
 */

import type {
  ContextFlag,
  KeywordMatch,
  PatternContext,
  Post,
  PostScore,
  SentimentScore,
  SignalCandidate,
  SignalType,
} from '../types.js';
import type { AnalysisConfig } from '../config.js';
import { engagementScore, hourOfDay } from '../posts/store.js';
import { hasKeywords } from '../scoring/keywords.js';
import { isInBurst } from '../patterns/bursts.js';
import { actionFor } from './actions.js';
import { logger } from '../../logger.js';

export type GeneratorConfig = Pick<AnalysisConfig, 'positiveThreshold' | 'negativeThreshold'>;

export class SignalGenerator {
  constructor(private readonly config: GeneratorConfig) {}

  classify(polarity: number): SignalType {
    if (polarity >= this.config.positiveThreshold) return 'BULLISH';
    if (polarity <= this.config.negativeThreshold) return 'BEARISH';
    return 'NEUTRAL';
  }

  qualifies(sentiment: SentimentScore, keywords: KeywordMatch): boolean {
    return hasKeywords(keywords) || this.classify(sentiment.polarity) !== 'NEUTRAL';
  }

  contextFlags(post: Post, context: PatternContext): ContextFlag[] {
    const flags: ContextFlag[] = [];
    if (isInBurst(post.createdAt, context.burstWindows)) flags.push('IN_BURST');
    if (context.highEngagementHours.includes(hourOfDay(post))) flags.push('HIGH_ENGAGEMENT_HOUR');
    return flags;
  }

  /**
   * Candidate for one post, or null when the post does not qualify
   */
  generate(
    post: Post,
    sentiment: SentimentScore,
    keywords: KeywordMatch,
    context: PatternContext,
  ): SignalCandidate | null {
    if (!this.qualifies(sentiment, keywords)) return null;

    const type = this.classify(sentiment.polarity);
    return {
      postId: post.id,
      timestamp: new Date(post.createdAt.getTime()),
      type,
      polarity: sentiment.polarity,
      subjectivity: sentiment.subjectivity,
      keywordMatch: {
        cryptoKeywords: [...keywords.cryptoKeywords],
        stockKeywords: [...keywords.stockKeywords],
      },
      engagementScore: engagementScore(post),
      action: actionFor(type, keywords),
      contextFlags: this.contextFlags(post, context),
    };
  }

  /**
   * Candidates for every scored post, in post order
   */
  generateAll(
    posts: readonly Post[],
    scores: ReadonlyMap<string, PostScore>,
    context: PatternContext,
  ): SignalCandidate[] {
    const candidates: SignalCandidate[] = [];
    for (const post of posts) {
      const score = scores.get(post.id);
      if (!score) continue;
      const candidate = this.generate(post, score.sentiment, score.keywords, context);
      if (candidate) candidates.push(candidate);
    }

    logger.candidatesGenerated({ posts: posts.length, candidates: candidates.length });
    return candidates;
  }
}

export function createSignalGenerator(config: GeneratorConfig): SignalGenerator {
  return new SignalGenerator(config);
}
