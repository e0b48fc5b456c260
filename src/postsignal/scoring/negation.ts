/**
 * postsignal - Negation Detection
 *
 * Handles patterns like "not great", "never a good time", "no longer bullish"
 * so the following sentiment word is flipped and damped.
 */

/** Single-token negations */
export const NEGATION_WORDS = new Set([
  'not',
  'no',
  'never',
  'none',
  'nothing',
  'neither',
  'nor',
  'nobody',
  'nowhere',
  'cannot',
  'without',
  'hardly',
  'isnt',
  'arent',
  'wasnt',
  'dont',
  'doesnt',
  'didnt',
  'cant',
  'wont',
]);

/** Multi-token negations, matched against the joined window */
export const NEGATION_PHRASES = ['no longer', 'not anymore', 'far from', 'anything but', 'opposite of'];

/** Tokens before a sentiment word that may negate it */
export const NEGATION_WINDOW = 3;

/** Polarity multiplier applied to a negated assessment */
export const NEGATION_FACTOR = -0.5;

export function isNegationToken(token: string): boolean {
  return NEGATION_WORDS.has(token) || token.endsWith("n't");
}

/**
 * Check whether the token at `index` is negated by one of the
 * NEGATION_WINDOW tokens before it (same clause only)
 */
export function isNegated(tokens: readonly string[], index: number): boolean {
  const window = tokens.slice(Math.max(0, index - NEGATION_WINDOW), index);
  if (window.some(isNegationToken)) return true;

  const joined = ` ${window.join(' ')} `;
  return NEGATION_PHRASES.some(phrase => joined.includes(` ${phrase} `));
}
