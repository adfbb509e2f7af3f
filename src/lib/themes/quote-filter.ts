/**
 * Quote Preprocessor
 *
 * Drops interviewer questions, hypotheticals and fragments that slipped into
 * the response stream, so only verbatim customer statements are clustered.
 *
 * @module themes/quote-filter
 */

import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from "../config-schemas";
import type { QuoteRecord } from "./types";

const NON_VERBATIM_PATTERNS: RegExp[] = [
  /^If\s+/i, // "If they built their own..."
  /^Would\s+/i,
  /^How\s+/i,
  /^What\s+if\s+/i,
  /^Do\s+you\s+think\s+/i,
  /^Could\s+you\s+/i,
  /\?\s*$/,
  /^Let's\s+say\s+/i,
  /^Imagine\s+if\s+/i,
  /^Suppose\s+/i,
];

const PREVIEW_LENGTH = 100;

export function isNonVerbatim(text: string): boolean {
  return NON_VERBATIM_PATTERNS.some((pattern) => pattern.test(text));
}

export interface QuoteFilterResult {
  quotes: QuoteRecord[];
  removed: QuoteRecord[];
}

export function filterVerbatimQuotes(
  quotes: readonly QuoteRecord[],
  config: Pick<EngineConfig, "minQuoteLength"> = DEFAULT_ENGINE_CONFIG,
): QuoteFilterResult {
  const kept: QuoteRecord[] = [];
  const removed: QuoteRecord[] = [];

  for (const quote of quotes) {
    if (isNonVerbatim(quote.text) || quote.text.length < config.minQuoteLength) {
      removed.push(quote);
    } else {
      kept.push(quote);
    }
  }

  if (removed.length > 0) {
    console.log(`[Themes] Removed ${removed.length} items: questions, hypotheticals, or very short responses`);
    for (const item of removed.slice(0, 2)) {
      const preview = item.text.length > PREVIEW_LENGTH ? `${item.text.slice(0, PREVIEW_LENGTH)}...` : item.text;
      console.log(`[Themes]   Removed: "${preview}"`);
    }
  }

  return { quotes: kept, removed };
}
