/**
 * postsignal - Lexicon Sentiment
 *
 * Polarity and subjectivity of a text:
 * - every occurrence of a lexicon word or emoji is one assessment
 * - an intensifier right before a word scales both values
 * - a negation shortly before a word flips and halves its polarity
 * - the score is the mean over assessments, clamped and rounded
 */

import type { SentimentScore } from '../types.js';
import type { Lexicon } from './lexicon.js';
import { getDefaultLexicon } from './lexicon.js';
import { isNegated, NEGATION_FACTOR } from './negation.js';
import { clamp, mean, round } from '../patterns/stats.js';

export const NEUTRAL_SENTIMENT: SentimentScore = Object.freeze({ polarity: 0, subjectivity: 0 });

const URL_PATTERN = /https?:\/\/\S+/g;
const CLAUSE_BREAK = /[.,;:!?\n]+/;
const WORD_PATTERN = /[a-z0-9]+(?:'[a-z]+)?/g;

interface Assessment {
  polarity: number;
  subjectivity: number;
}

/**
 * Lowercased word tokens, grouped by clause
 * Negation never crosses a clause boundary.
 */
export function tokenizeClauses(text: string): string[][] {
  return text
    .toLowerCase()
    .replace(/[‘’]/g, "'")
    .replace(URL_PATTERN, ' ')
    .split(CLAUSE_BREAK)
    .map(clause => clause.match(WORD_PATTERN) ?? [])
    .filter(tokens => tokens.length > 0);
}

function assessWords(clauses: string[][], lexicon: Lexicon): Assessment[] {
  const assessments: Assessment[] = [];

  for (const tokens of clauses) {
    tokens.forEach((token, i) => {
      const entry = lexicon.words.get(token);
      if (!entry) return;

      const intensity = i > 0 ? (lexicon.intensifiers.get(tokens[i - 1]) ?? 1) : 1;
      let polarity = entry.polarity * intensity;
      const subjectivity = entry.subjectivity * intensity;

      if (isNegated(tokens, i)) {
        polarity *= NEGATION_FACTOR;
      }

      assessments.push({ polarity, subjectivity });
    });
  }

  return assessments;
}

function assessEmoji(text: string, lexicon: Lexicon): Assessment[] {
  const assessments: Assessment[] = [];
  for (const [emoji, entry] of lexicon.emoji) {
    const occurrences = text.split(emoji).length - 1;
    for (let i = 0; i < occurrences; i++) {
      assessments.push({ polarity: entry.polarity, subjectivity: entry.subjectivity });
    }
  }
  return assessments;
}

/**
 * Score a text; anything that is not a non-empty string is neutral
 */
export function analyzeSentiment(text: unknown, lexicon: Lexicon = getDefaultLexicon()): SentimentScore {
  if (typeof text !== 'string' || text.trim().length === 0) {
    return NEUTRAL_SENTIMENT;
  }

  const assessments = [...assessWords(tokenizeClauses(text), lexicon), ...assessEmoji(text, lexicon)];
  if (assessments.length === 0) {
    return NEUTRAL_SENTIMENT;
  }

  return {
    polarity: round(clamp(mean(assessments.map(a => a.polarity)), -1, 1)),
    subjectivity: round(clamp(mean(assessments.map(a => a.subjectivity)), 0, 1)),
  };
}
