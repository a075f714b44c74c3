/**
 * FILE PURPOSE: Pick representative search phrases from a submission
 *
 * HOW: `maxPhrases` windows of `phraseWords` tokens, starting at evenly
 *      spaced offsets from the first token to the last full window.
 */

import { tokenize } from '../text/shingles.js';

export const DEFAULT_PHRASE_WORDS = 10;

export function extractPhrases(text: string, maxPhrases: number, phraseWords = DEFAULT_PHRASE_WORDS): string[] {
  const tokens = tokenize(text);
  if (tokens.length === 0 || maxPhrases < 1) return [];
  if (tokens.length <= phraseWords) return [tokens.join(' ')];

  const lastStart = tokens.length - phraseWords;
  const count = Math.min(maxPhrases, lastStart + 1);
  const stride = count > 1 ? lastStart / (count - 1) : 0;

  const phrases: string[] = [];
  const seen = new Set<string>();
  for (let i = 0; i < count; i++) {
    const start = Math.round(i * stride);
    const phrase = tokens.slice(start, start + phraseWords).join(' ');
    if (seen.has(phrase)) continue;
    seen.add(phrase);
    phrases.push(phrase);
  }
  return phrases;
}
