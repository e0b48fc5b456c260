/**
 * postsignal - Sentiment Lexicon
 *
 * Word and emoji polarity/subjectivity values plus intensifier multipliers,
 * loaded once from data/lexicon.json.
 */

import { z } from 'zod';
import { readDataJson } from '../data.js';

const LexiconEntrySchema = z.object({
  polarity: z.number().min(-1).max(1),
  subjectivity: z.number().min(0).max(1),
});

export const LexiconSchema = z.object({
  words: z.record(z.string(), LexiconEntrySchema),
  intensifiers: z.record(z.string(), z.number().positive()).default({}),
  emoji: z.record(z.string(), LexiconEntrySchema).default({}),
});

export type LexiconEntry = z.infer<typeof LexiconEntrySchema>;

export interface Lexicon {
  words: ReadonlyMap<string, LexiconEntry>;
  intensifiers: ReadonlyMap<string, number>;
  emoji: ReadonlyMap<string, LexiconEntry>;
}

let defaultLexicon: Lexicon | null = null;

export function createLexicon(raw: unknown): Lexicon {
  const parsed = LexiconSchema.parse(raw);
  return {
    words: new Map(Object.entries(parsed.words).map(([word, entry]) => [word.toLowerCase(), entry])),
    intensifiers: new Map(Object.entries(parsed.intensifiers).map(([word, m]) => [word.toLowerCase(), m])),
    emoji: new Map(Object.entries(parsed.emoji)),
  };
}

/**
 * Bundled lexicon, read on first use
 */
export function getDefaultLexicon(): Lexicon {
  if (!defaultLexicon) {
    defaultLexicon = createLexicon(readDataJson('lexicon.json'));
  }
  return defaultLexicon;
}
