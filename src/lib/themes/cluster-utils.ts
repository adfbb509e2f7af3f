/**
 * Cluster helpers shared by the clusterers, gates and scorer.
 *
 * @module themes/cluster-utils
 */

import type { QuoteRecord, Sentiment, ThemeType } from "./types";

export function roundTo(value: number, decimals: number): number {
  const factor = 10 ** decimals;
  return Math.round(value * factor) / factor;
}

export function uniqueCompanyCount(quotes: readonly QuoteRecord[]): number {
  return new Set(quotes.map((q) => q.company)).size;
}

export function meanImpact(quotes: readonly QuoteRecord[]): number {
  if (quotes.length === 0) return 0;
  return quotes.reduce((sum, q) => sum + q.impactScore, 0) / quotes.length;
}

/**
 * At most one quote per company: the highest-impact one, earliest on ties.
 * Companies keep the order in which they first appear.
 */
export function selectOnePerCompany(quotes: readonly QuoteRecord[]): QuoteRecord[] {
  const best = new Map<string, QuoteRecord>();
  for (const quote of quotes) {
    const current = best.get(quote.company);
    if (!current || quote.impactScore > current.impactScore) {
      best.set(quote.company, quote);
    }
  }
  return Array.from(best.values());
}

export function expectedSentiment(themeType: ThemeType): Sentiment | null {
  if (themeType === "strength") return "positive";
  if (themeType === "weakness") return "negative";
  return null;
}

/**
 * Fraction of quotes carrying the theme type's expected sentiment;
 * null for types without one.
 */
export function sentimentCoherence(quotes: readonly QuoteRecord[], themeType: ThemeType): number | null {
  const expected = expectedSentiment(themeType);
  if (expected === null) return null;
  if (quotes.length === 0) return 0;
  return quotes.filter((q) => q.sentiment === expected).length / quotes.length;
}

/**
 * Counts per key in first-seen order, rendered as "a: 2, b: 1".
 */
export function formatBreakdown(values: readonly string[]): string {
  const counts = new Map<string, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }
  return Array.from(counts, ([key, count]) => `${key}: ${count}`).join(", ");
}
