/**
 * Text Matching Utilities
 *
 * Normalization, tokenization and term lookup shared by the question
 * normalizer and mapper. Terms are lexicon entries: a single word matches a
 * token, a multi-word term matches a whole-word phrase.
 *
 * @module themes/text-matching
 */

/**
 * Lowercase, strip everything but letters/digits/whitespace, collapse spaces.
 */
export function normalizeText(text: string): string {
  return (text || "")
    .toLowerCase()
    .replace(/[^\p{L}\p{N}\s]/gu, "")
    .replace(/\s+/g, " ")
    .trim();
}

export function tokenize(normalized: string): string[] {
  return normalized ? normalized.split(" ") : [];
}

/** Pre-tokenized text, reused across many term lookups */
export interface TokenizedText {
  normalized: string;
  tokens: string[];
  tokenSet: Set<string>;
  /** Normalized text padded with spaces for whole-word phrase lookup */
  padded: string;
}

export function prepareText(text: string): TokenizedText {
  const normalized = normalizeText(text);
  const tokens = tokenize(normalized);
  return { normalized, tokens, tokenSet: new Set(tokens), padded: ` ${normalized} ` };
}

export function containsTerm(text: TokenizedText, term: string): boolean {
  const t = normalizeText(term);
  if (!t) return false;
  return t.includes(" ") ? text.padded.includes(` ${t} `) : text.tokenSet.has(t);
}

export function containsAnyTerm(text: TokenizedText, terms: readonly string[]): boolean {
  return terms.some((term) => containsTerm(text, term));
}

/**
 * Whole-word containment of one token run in another, in either direction.
 */
export function isTokenSubsequence(a: string, b: string): boolean {
  if (!a || !b) return false;
  return ` ${a} `.includes(` ${b} `) || ` ${b} `.includes(` ${a} `);
}

/**
 * |A ∩ B| / |A ∪ B|; 0 when either set is empty.
 */
export function jaccardIndex<T>(a: ReadonlySet<T>, b: ReadonlySet<T>): number {
  if (a.size === 0 || b.size === 0) return 0;
  let intersection = 0;
  for (const item of a) {
    if (b.has(item)) intersection++;
  }
  return intersection / (a.size + b.size - intersection);
}
