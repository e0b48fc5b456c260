/**
 * postsignal - Bundled data files
 *
 * Lexicon, stopwords and the demo dataset live in the repository's data/
 * directory, next to src/ when run from sources and next to dist/ when built.
 */

import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

const CANDIDATE_ROOTS = [path.resolve(__dirname, '../../data'), path.resolve(__dirname, '../../../data')];

export function resolveDataPath(file: string): string {
  for (const root of CANDIDATE_ROOTS) {
    const candidate = path.join(root, file);
    if (fs.existsSync(candidate)) return candidate;
  }
  throw new Error(`Data file '${file}' not found (looked in ${CANDIDATE_ROOTS.join(', ')})`);
}

export function readDataJson(file: string): unknown {
  return JSON.parse(fs.readFileSync(resolveDataPath(file), 'utf-8'));
}
