/**
 * postsignal - Post Loader
 *
 * Reads post records exported by the fetch layer. Files hold either a JSON
 * array of posts or an object with a `posts` array.
 */

import fs from 'fs';
import { PostRecordSchema } from '../types.js';
import type { Post } from '../types.js';
import { InvalidInputError } from '../errors.js';
import { readDataJson } from '../data.js';
import { logger } from '../../logger.js';

/**
 * Validate raw post records
 * The first invalid record aborts the load
 */
export function parsePosts(raw: unknown): Post[] {
  const records =
    typeof raw === 'object' && raw !== null && !Array.isArray(raw) && 'posts' in raw ? raw.posts : raw;

  if (!Array.isArray(records)) {
    throw new InvalidInputError('Expected an array of posts');
  }

  return records.map((record: unknown, index) => {
    const result = PostRecordSchema.safeParse(record);
    if (!result.success) {
      const issues = result.error.issues.map(issue => `${issue.path.join('.') || 'post'}: ${issue.message}`);
      const id =
        typeof record === 'object' && record !== null && 'id' in record ? String(record.id) : undefined;
      throw new InvalidInputError(`Malformed post record (${issues.join('; ')})`, id, index);
    }
    return result.data;
  });
}

export function loadPostsFile(path: string): Post[] {
  if (!fs.existsSync(path)) {
    throw new InvalidInputError(`Posts file '${path}' not found`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new InvalidInputError(
      `Posts file '${path}' is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  const posts = parsePosts(raw);
  logger.postsLoaded({ source: path, count: posts.length });
  return posts;
}

/**
 * Synthetic posts for runs without fetched data
 * Analysed exactly like real posts
 */
export function loadDemoPosts(): Post[] {
  const posts = parsePosts(readDataJson('demo-posts.json'));
  logger.postsLoaded({ source: 'demo', count: posts.length });
  return posts;
}
