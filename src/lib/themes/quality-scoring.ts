/**
 * Quality Scorer
 *
 * Composite 0-10 score over the one-per-company quote set. Default weighting:
 * company coverage 4.5, evidence quality 2.5, quote volume 2.0, coherence 1.0.
 *
 * @module themes/quality-scoring
 */

import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from "../config-schemas";
import { expectedSentiment, meanImpact, roundTo, uniqueCompanyCount } from "./cluster-utils";
import type { CompanyDistribution, QuoteRecord, ThemeType } from "./types";

export type ScoringConfig = Pick<
  EngineConfig,
  "scoreWeights" | "scoreCompanySaturation" | "scoreQuoteSaturation" | "biasSharePercent"
>;

const SENTIMENT_VARIETY_SATURATION = 3;
const SUMMARY_TOP_COMPANIES = 3;

export function calculateQualityScore(
  effectiveQuotes: readonly QuoteRecord[],
  themeType: ThemeType,
  config: ScoringConfig = DEFAULT_ENGINE_CONFIG,
): number {
  if (effectiveQuotes.length === 0) return 0;
  const weights = config.scoreWeights;

  const companyScore = Math.min(uniqueCompanyCount(effectiveQuotes) / config.scoreCompanySaturation, 1) * weights.companyCoverage;
  const evidenceScore = (meanImpact(effectiveQuotes) / 5) * weights.evidenceQuality;
  const volumeScore = Math.min(effectiveQuotes.length / config.scoreQuoteSaturation, 1) * weights.quoteVolume;

  const expected = expectedSentiment(themeType);
  const coherence =
    expected !== null
      ? effectiveQuotes.filter((q) => q.sentiment === expected).length / effectiveQuotes.length
      : Math.min(new Set(effectiveQuotes.map((q) => q.sentiment)).size / SENTIMENT_VARIETY_SATURATION, 1);
  const coherenceScore = coherence * weights.coherence;

  const score = roundTo(companyScore + evidenceScore + volumeScore + coherenceScore, 2);
  return Math.min(10, Math.max(0, score));
}

/**
 * Per-company quote counts, most quotes first; ties keep first-seen order.
 */
export function countByCompany(quotes: readonly QuoteRecord[]): Array<[string, number]> {
  const counts = new Map<string, number>();
  for (const quote of quotes) {
    counts.set(quote.company, (counts.get(quote.company) ?? 0) + 1);
  }
  return Array.from(counts).sort((a, b) => b[1] - a[1]);
}

/**
 * 1.0 when every company contributes equally, 0.0 at maximum imbalance.
 */
export function calculateBalanceScore(counts: readonly number[]): number {
  if (counts.length <= 1) return 0;
  const total = counts.reduce((sum, c) => sum + c, 0);
  const ideal = total / counts.length;
  const variance = counts.reduce((sum, c) => sum + (c - ideal) ** 2, 0) / counts.length;
  const maxVariance = ideal ** 2;
  return roundTo(Math.max(0, 1 - variance / maxVariance), 2);
}

export function createDistributionSummary(sortedCounts: ReadonlyArray<[string, number]>): string {
  if (sortedCounts.length === 0) return "No companies";
  if (sortedCounts.length === 1) {
    const [company, count] = sortedCounts[0];
    return `Single company: ${company} (${count} quotes)`;
  }
  const parts = sortedCounts.slice(0, SUMMARY_TOP_COMPANIES).map(([company, count]) => `${company}(${count})`);
  if (sortedCounts.length > SUMMARY_TOP_COMPANIES) {
    parts.push(`+${sortedCounts.length - SUMMARY_TOP_COMPANIES} more`);
  }
  return `${sortedCounts.length} companies: ${parts.join(", ")}`;
}

export function analyzeCompanyDistribution(
  quotes: readonly QuoteRecord[],
  config: Pick<EngineConfig, "biasSharePercent"> = DEFAULT_ENGINE_CONFIG,
): CompanyDistribution {
  const sorted = countByCompany(quotes);
  if (sorted.length === 0) {
    return {
      totalCompanies: 0,
      quoteDistribution: {},
      maxCompanyPercentage: 0,
      biasWarning: false,
      companyBalanceScore: 0,
      distributionSummary: "No companies",
    };
  }

  const maxCompanyPercentage = (sorted[0][1] / quotes.length) * 100;
  return {
    totalCompanies: sorted.length,
    quoteDistribution: Object.fromEntries(sorted),
    maxCompanyPercentage: roundTo(maxCompanyPercentage, 1),
    biasWarning: maxCompanyPercentage > config.biasSharePercent,
    companyBalanceScore: calculateBalanceScore(sorted.map(([, count]) => count)),
    distributionSummary: createDistributionSummary(sorted),
  };
}
