/**
 * FILE PURPOSE: Tokenizer, shingler and exact Jaccard similarity
 *
 * HOW: ASCII-only case folding; every run outside [a-z0-9] separates tokens.
 *      Tokens of every length are kept, so "a" and "i" count. Shingles are
 *      k consecutive tokens joined by a single space.
 */

export const DEFAULT_SHINGLE_SIZE = 5;

const SEPARATOR = /[^a-z0-9]+/;

/** Fold A-Z to a-z without touching any other code point. */
function foldAscii(text: string): string {
  return text.replace(/[A-Z]/g, (ch) => String.fromCharCode(ch.charCodeAt(0) + 32));
}

export function tokenize(text: string): string[] {
  if (!text) return [];
  return foldAscii(text).split(SEPARATOR).filter((t) => t.length > 0);
}

/**
 * Set of k-token shingles. A sequence of k tokens or fewer yields one
 * shingle holding the whole sequence; no tokens yields the empty set.
 */
export function shingle(tokens: readonly string[], k = DEFAULT_SHINGLE_SIZE): Set<string> {
  if (!Number.isInteger(k) || k < 1) {
    throw new RangeError(`Shingle size must be a positive integer, got ${k}`);
  }
  const out = new Set<string>();
  if (tokens.length === 0) return out;
  if (tokens.length <= k) {
    out.add(tokens.join(' '));
    return out;
  }
  for (let i = 0; i + k <= tokens.length; i++) {
    out.add(tokens.slice(i, i + k).join(' '));
  }
  return out;
}

export function shingleText(text: string, k = DEFAULT_SHINGLE_SIZE): Set<string> {
  return shingle(tokenize(text), k);
}

/** Jaccard index. Two empty sets are identical (1.0); one empty set shares nothing (0.0). */
export function jaccard(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  if (a.size === 0 && b.size === 0) return 1;
  if (a.size === 0 || b.size === 0) return 0;
  const [small, large] = a.size <= b.size ? [a, b] : [b, a];
  let inter = 0;
  for (const s of small) {
    if (large.has(s)) inter++;
  }
  return inter / (a.size + b.size - inter);
}

/** Members of `query` that also occur in `other`. */
export function sharedShingles(query: ReadonlySet<string>, other: ReadonlySet<string>): string[] {
  const out: string[] = [];
  for (const s of query) {
    if (other.has(s)) out.push(s);
  }
  return out;
}
