/**
 * postsignal - Recommended Actions
 */

import type { KeywordMatch, SignalType } from '../types.js';

/**
 * Uppercase keyword label; crypto keywords win over stock keywords
 */
export function keywordLabel(keywords: KeywordMatch): string | null {
  const chosen = keywords.cryptoKeywords.length > 0 ? keywords.cryptoKeywords : keywords.stockKeywords;
  return chosen.length > 0 ? chosen.join(', ').toUpperCase() : null;
}

export function actionFor(type: SignalType, keywords: KeywordMatch): string {
  const label = keywordLabel(keywords);

  switch (type) {
    case 'BULLISH':
      return label ? `CONSIDER BUYING ${label}` : 'MONITOR FOR BUYING OPPORTUNITY';
    case 'BEARISH':
      return label ? `CONSIDER SELLING ${label}` : 'MONITOR FOR SELLING OPPORTUNITY';
    case 'NEUTRAL':
      return label ? `MONITOR ${label}` : 'MONITOR - NO CLEAR SIGNAL';
  }
}
