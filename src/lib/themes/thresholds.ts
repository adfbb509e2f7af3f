/**
 * Adaptive Threshold Calculator
 *
 * Relaxes the quality gates for small or low-signal corpora so a
 * single-company pilot or a thin interview set still yields themes.
 *
 * @module themes/thresholds
 */

import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from "../config-schemas";
import { meanImpact, uniqueCompanyCount } from "./cluster-utils";
import type { QualityThresholds, QuoteRecord } from "./types";

export type ThresholdConfig = Pick<
  EngineConfig,
  | "baseMinCompanies"
  | "baseMinQuotes"
  | "baseMinImpact"
  | "lowDensityQuotesPerCompany"
  | "lowDensityMinQuotes"
  | "lowImpactMeanCutoff"
  | "lowImpactFloor"
  | "lowImpactOffset"
>;

export function baseThresholds(config: ThresholdConfig = DEFAULT_ENGINE_CONFIG): QualityThresholds {
  return {
    minCompanies: config.baseMinCompanies,
    minQuotes: config.baseMinQuotes,
    minImpact: config.baseMinImpact,
  };
}

export function computeAdaptiveThresholds(
  quotes: readonly QuoteRecord[],
  config: ThresholdConfig = DEFAULT_ENGINE_CONFIG,
): QualityThresholds {
  if (quotes.length === 0) return baseThresholds(config);

  const companies = uniqueCompanyCount(quotes);
  const quotesPerCompany = quotes.length / Math.max(companies, 1);
  const avgImpact = meanImpact(quotes);

  let minCompanies = config.baseMinCompanies;
  if (companies === 1) {
    minCompanies = 1;
  } else if (companies <= 3) {
    minCompanies = 2;
  }

  const minQuotes = quotesPerCompany < config.lowDensityQuotesPerCompany ? config.lowDensityMinQuotes : config.baseMinQuotes;

  const minImpact =
    avgImpact < config.lowImpactMeanCutoff
      ? Math.max(config.lowImpactFloor, avgImpact - config.lowImpactOffset)
      : config.baseMinImpact;

  console.log(
    `[Themes] Quality gates: ${minCompanies} companies, ${minQuotes} quotes, ${minImpact.toFixed(1)} impact ` +
      `(${companies} companies, ${quotes.length} quotes, mean impact ${avgImpact.toFixed(2)})`,
  );

  return { minCompanies, minQuotes, minImpact };
}
