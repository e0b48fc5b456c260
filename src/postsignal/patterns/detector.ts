/**
 * postsignal - Pattern Detector
 *
 * Builds the PatternContext of a run from the full, filtered post history.
 * The context is computed once, deep-frozen, and shared read-only by every
 * signal of the run.
 */

import type { PatternContext, Post, PostScore } from '../types.js';
import type { AnalysisConfig } from '../config.js';
import { InvalidInputError } from '../errors.js';
import { deepFreeze } from '../freeze.js';
import { engagementScore, isOriginalPost } from '../posts/store.js';
import type { PostScorer } from '../scoring/scorer.js';
import { createPostScorer } from '../scoring/scorer.js';
import { calculateFrequency } from './frequency.js';
import { detectBursts } from './bursts.js';
import { rollingSentiment, sentimentShifts } from './trend.js';
import { correlateTiming, profileActivity } from './timing.js';
import { describeContent, extractThemes, getDefaultStopwords } from './themes.js';
import { logger } from '../../logger.js';

export type DetectorConfig = Pick<AnalysisConfig, 'patterns' | 'cryptoKeywords' | 'stockKeywords'>;

export class PatternDetector {
  private readonly scorer: PostScorer;
  private readonly stopwords: ReadonlySet<string>;

  constructor(
    private readonly config: DetectorConfig,
    scorer?: PostScorer,
    stopwords?: ReadonlySet<string>,
  ) {
    this.scorer = scorer ?? createPostScorer(config);
    this.stopwords = stopwords ?? getDefaultStopwords();
  }

  /**
   * Compute the pattern context
   *
   * @param posts - Original posts, ascending by createdAt
   * @param scores - Per-post scores keyed by id; missing posts are scored here
   * @throws InvalidInputError when the sequence is unordered, repeats an id or holds non-original posts
   */
  detect(posts: readonly Post[], scores?: ReadonlyMap<string, PostScore>): PatternContext {
    this.validate(posts);

    const { patterns } = this.config;
    const polarities = posts.map(post => (scores?.get(post.id) ?? this.scorer.score(post)).sentiment.polarity);

    const postingFrequency = calculateFrequency(posts, patterns.windowHours);
    const burstWindows = detectBursts(postingFrequency.windows, postingFrequency.windowMs, {
      sensitivity: patterns.burstSensitivity,
      minWindows: patterns.minBurstWindows,
    });
    const { timing, highEngagementHours } = correlateTiming(posts, polarities, patterns.highEngagementPercentile);

    const context: PatternContext = {
      totalPosts: posts.length,
      postingFrequency,
      burstWindows,
      sentimentTrend: [...rollingSentiment(posts, polarities, patterns.trendLookback)],
      sentimentShifts: [...sentimentShifts(posts, polarities, patterns.trendLookback, patterns.shiftThreshold)],
      highEngagementHours,
      timing,
      contentThemes: extractThemes(posts, patterns.themeCount, this.stopwords),
      content: describeContent(posts, polarities),
      activity: profileActivity(posts),
      engagementCeiling: posts.reduce((max, post) => Math.max(max, engagementScore(post)), 0),
    };

    logger.patternsDetected({
      posts: posts.length,
      windows: postingFrequency.windowCount,
      bursts: burstWindows.length,
      highEngagementHours,
    });

    return deepFreeze(context);
  }

  private validate(posts: readonly Post[]): void {
    let previous = -Infinity;
    const seen = new Set<string>();

    posts.forEach((post, index) => {
      const reject = (reason: string): never => {
        logger.inputRejected({ reason, postId: post.id, index });
        throw new InvalidInputError(reason, post.id, index);
      };

      if (!(post.createdAt instanceof Date) || Number.isNaN(post.createdAt.getTime())) {
        reject('createdAt is not a valid date');
      }
      if (!isOriginalPost(post)) {
        reject('retweets and replies must be filtered before detection');
      }
      const time = post.createdAt.getTime();
      if (time < previous) {
        reject('posts must be ordered by createdAt ascending');
      }
      previous = time;
      if (seen.has(post.id)) {
        reject('duplicate post id');
      }
      seen.add(post.id);
    });
  }
}

export function createPatternDetector(
  config: DetectorConfig,
  scorer?: PostScorer,
  stopwords?: ReadonlySet<string>,
): PatternDetector {
  return new PatternDetector(config, scorer, stopwords);
}
