/**
 * postsignal - Keyword Detection
 *
 * Case-insensitive keyword lookup on word boundaries, so "eth" finds
 * "$ETH" and "#eth" but not "something".
 */

import type { KeywordMatch } from '../types.js';

export const NO_KEYWORDS: KeywordMatch = Object.freeze({
  cryptoKeywords: Object.freeze([]),
  stockKeywords: Object.freeze([]),
});

/**
 * Find the configured keywords present in the text
 *
 * @returns Matched keywords in configured order, without duplicates
 */
export function findKeywords(text: string, keywords: readonly string[]): string[] {
  const lowerText = text.toLowerCase();
  const found: string[] = [];

  for (const keyword of keywords) {
    const lowerWord = keyword.toLowerCase();
    if (lowerWord.length === 0 || found.includes(lowerWord)) continue;

    let position = lowerText.indexOf(lowerWord);
    while (position !== -1) {
      const before = position > 0 ? lowerText[position - 1] : ' ';
      const after = lowerText[position + lowerWord.length] ?? ' ';

      if (/\W/.test(before) && /\W/.test(after)) {
        found.push(lowerWord);
        break;
      }
      position = lowerText.indexOf(lowerWord, position + 1);
    }
  }

  return found;
}

export function matchKeywords(
  text: unknown,
  cryptoKeywords: readonly string[],
  stockKeywords: readonly string[],
): KeywordMatch {
  if (typeof text !== 'string' || text.length === 0) {
    return NO_KEYWORDS;
  }
  return {
    cryptoKeywords: findKeywords(text, cryptoKeywords),
    stockKeywords: findKeywords(text, stockKeywords),
  };
}

export function hasKeywords(match: KeywordMatch): boolean {
  return match.cryptoKeywords.length > 0 || match.stockKeywords.length > 0;
}
