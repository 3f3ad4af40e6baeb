/**
 * Text Normalizer
 *
 * Prepares raw document text for shingling:
 * - Whitespace runs collapsed to a single space
 * - ASCII punctuation removed
 * - Lowercasing
 *
 * No stemming or stopword removal; shingles should reflect the literal text.
 */

// ASCII punctuation: !"#$%&'()*+,-./:;<=>?@[\]^_`{|}~
const PUNCTUATION = /[!-/:-@[-`{-~]/g;

export function basicNormalize(text: string): string {
  return text
    .replace(/\s+/g, ' ')
    .replace(PUNCTUATION, '')
    .toLowerCase();
}
