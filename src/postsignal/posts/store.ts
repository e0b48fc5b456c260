/**
 * postsignal - Post Store
 *
 * Turns whatever the fetch layer delivered into the ordered, frozen sequence of
 * original posts the analysis runs on.
 */

import type { Post } from '../types.js';
import { logger } from '../../logger.js';

/** Weighted engagement: retweets count double */
export function engagementScore(post: Post): number {
  return post.likeCount + post.retweetCount * 2 + post.replyCount;
}

export function isOriginalPost(post: Post): boolean {
  return !post.isRetweet && !post.isReply;
}

/** UTC hour of day, 0-23 */
export function hourOfDay(post: Post): number {
  return post.createdAt.getUTCHours();
}

/** Ascending by creation time, ties broken by id */
export function compareChronological(a: Post, b: Post): number {
  const diff = a.createdAt.getTime() - b.createdAt.getTime();
  if (diff !== 0) return diff;
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

/**
 * Keep original posts only, order them chronologically and keep the most
 * recent `limit` of them
 */
export function selectOriginalPosts(posts: readonly Post[], limit?: number): readonly Post[] {
  const originals = posts.filter(isOriginalPost).sort(compareChronological);
  const kept = limit !== undefined && originals.length > limit ? originals.slice(-limit) : originals;

  logger.postsSelected({ received: posts.length, originals: originals.length, kept: kept.length });

  return Object.freeze(kept.map(post => (Object.isFrozen(post) ? post : Object.freeze({ ...post }))));
}
