/**
 * postsignal - Sentiment Trend
 *
 * Rolling mean polarity over the last N posts and the shift events derived
 * from it. Both are finite generators over the post history and can be
 * restarted by calling them again.
 */

import type { Post, SentimentShift, TrendPoint } from '../types.js';
import { mean, round } from './stats.js';

/**
 * Rolling average of polarity; early points average whatever history exists
 */
export function* rollingSentiment(
  posts: readonly Post[],
  polarities: readonly number[],
  lookback: number,
): Generator<TrendPoint> {
  for (let i = 0; i < posts.length; i++) {
    const window = polarities.slice(Math.max(0, i - lookback + 1), i + 1);
    yield {
      postId: posts[i].id,
      timestamp: new Date(posts[i].createdAt.getTime()),
      rollingSentiment: round(mean(window)),
    };
  }
}

/**
 * Compare the mean of the last `windowSize` polarities with the mean of the
 * last half of them; a difference of at least `threshold` is a shift
 */
export function* sentimentShifts(
  posts: readonly Post[],
  polarities: readonly number[],
  windowSize: number,
  threshold: number,
): Generator<SentimentShift> {
  const half = Math.max(1, Math.floor(windowSize / 2));

  for (let i = windowSize; i < posts.length; i++) {
    const previous = mean(polarities.slice(i - windowSize, i));
    const current = mean(polarities.slice(i - half, i));
    const change = current - previous;

    if (Math.abs(change) >= threshold) {
      yield {
        postId: posts[i].id,
        timestamp: new Date(posts[i].createdAt.getTime()),
        previousSentiment: round(previous),
        currentSentiment: round(current),
        change: round(change),
        direction: change > 0 ? 'POSITIVE' : 'NEGATIVE',
      };
    }
  }
}
