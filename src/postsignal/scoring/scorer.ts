/**
 * postsignal - Sentiment & Keyword Scorer
 *
 * Pure per-post scoring: the result depends on the post text and the
 * configured keyword lists only, so posts can be scored in any order.
 */

import type { Post, PostScore } from '../types.js';
import type { AnalysisConfig } from '../config.js';
import type { Lexicon } from './lexicon.js';
import { getDefaultLexicon } from './lexicon.js';
import { analyzeSentiment, NEUTRAL_SENTIMENT } from './sentiment.js';
import { matchKeywords, hasKeywords, NO_KEYWORDS } from './keywords.js';
import { logger } from '../../logger.js';

export type ScorerConfig = Pick<AnalysisConfig, 'cryptoKeywords' | 'stockKeywords'>;

export const NEUTRAL_SCORE: PostScore = Object.freeze({
  sentiment: NEUTRAL_SENTIMENT,
  keywords: NO_KEYWORDS,
});

export class PostScorer {
  private readonly lexicon: Lexicon;

  constructor(
    private readonly config: ScorerConfig,
    lexicon?: Lexicon,
  ) {
    this.lexicon = lexicon ?? getDefaultLexicon();
  }

  /**
   * Score one post
   * Malformed posts degrade to a neutral, keyword-free score
   */
  score(post: Post): PostScore {
    if (typeof post.text !== 'string' || post.text.trim().length === 0) {
      logger.scoreFallback({ postId: String(post.id), reason: 'empty or missing text' });
      return NEUTRAL_SCORE;
    }

    try {
      return {
        sentiment: analyzeSentiment(post.text, this.lexicon),
        keywords: matchKeywords(post.text, this.config.cryptoKeywords, this.config.stockKeywords),
      };
    } catch (error) {
      logger.scoreFallback({
        postId: String(post.id),
        reason: error instanceof Error ? error.message : String(error),
      });
      return NEUTRAL_SCORE;
    }
  }

  /**
   * Score every post, keyed by post id
   */
  scoreAll(posts: readonly Post[]): Map<string, PostScore> {
    const scores = new Map<string, PostScore>();
    for (const post of posts) {
      scores.set(post.id, this.score(post));
    }

    logger.scoresComputed({
      posts: posts.length,
      withKeywords: [...scores.values()].filter(s => hasKeywords(s.keywords)).length,
    });

    return scores;
  }
}

export function createPostScorer(config: ScorerConfig, lexicon?: Lexicon): PostScorer {
  return new PostScorer(config, lexicon);
}
