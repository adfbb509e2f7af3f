/**
 * Quality Gate Engine
 *
 * Four gates, strict order, first failure rejects:
 * - Gate 1: Cross-company (unique companies >= minCompanies)
 * - Gate 2: Evidence significance (one-per-company count >= minQuotes)
 * - Gate 3: Impact threshold (mean impact over all members >= minImpact)
 * - Gate 4: Narrative coherence (strength/weakness only)
 *
 * @module themes/quality-gates
 */

import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from "../config-schemas";
import { meanImpact, roundTo, selectOnePerCompany, sentimentCoherence, uniqueCompanyCount } from "./cluster-utils";
import { analyzeCompanyDistribution, calculateQualityScore } from "./quality-scoring";
import type { GateOutcome, QualityGate, QualityThresholds, ThemeCluster, ValidatedTheme } from "./types";

export type GateConfig = Pick<
  EngineConfig,
  "coherenceThreshold" | "scoreWeights" | "scoreCompanySaturation" | "scoreQuoteSaturation" | "biasSharePercent"
>;

export const GATE_ORDER: readonly QualityGate[] = [
  "cross_company",
  "evidence_significance",
  "impact_threshold",
  "narrative_coherence",
];

function reject(failedGate: QualityGate, reason: string): GateOutcome {
  return { passed: false, failedGate, reason };
}

export function validateThemeCluster(
  cluster: ThemeCluster,
  thresholds: QualityThresholds,
  config: GateConfig = DEFAULT_ENGINE_CONFIG,
): GateOutcome {
  const companiesCount = uniqueCompanyCount(cluster.quotes);
  if (companiesCount < thresholds.minCompanies) {
    return reject("cross_company", `${companiesCount} companies (need ${thresholds.minCompanies})`);
  }

  const effectiveQuotes = selectOnePerCompany(cluster.quotes);
  if (effectiveQuotes.length < thresholds.minQuotes) {
    return reject("evidence_significance", `${effectiveQuotes.length} effective quotes (need ${thresholds.minQuotes})`);
  }

  const avgImpactScore = meanImpact(cluster.quotes);
  if (avgImpactScore < thresholds.minImpact) {
    return reject(
      "impact_threshold",
      `average impact ${avgImpactScore.toFixed(1)} (need ${thresholds.minImpact.toFixed(1)})`,
    );
  }

  const coherence = sentimentCoherence(cluster.quotes, cluster.themeType);
  if (coherence !== null && coherence < config.coherenceThreshold) {
    return reject(
      "narrative_coherence",
      `sentiment coherence ${(coherence * 100).toFixed(1)}% (need ${(config.coherenceThreshold * 100).toFixed(1)}%)`,
    );
  }

  const theme: ValidatedTheme = {
    ...cluster,
    effectiveQuotes,
    metrics: {
      companiesCount,
      effectiveQuotesCount: effectiveQuotes.length,
      avgImpactScore: roundTo(avgImpactScore, 2),
      sentimentCoherence: coherence === null ? null : roundTo(coherence, 4),
      qualityScore: calculateQualityScore(effectiveQuotes, cluster.themeType, config),
      companyDistribution: analyzeCompanyDistribution(cluster.quotes, config),
    },
  };
  return { passed: true, theme };
}

export interface GateRunResult {
  validated: ValidatedTheme[];
  rejectedByGate: Record<QualityGate, number>;
}

/**
 * Run every candidate through the gates. Rejections are counted, never raised.
 */
export function applyQualityGates(
  clusters: readonly ThemeCluster[],
  thresholds: QualityThresholds,
  config: GateConfig = DEFAULT_ENGINE_CONFIG,
): GateRunResult {
  const validated: ValidatedTheme[] = [];
  const rejectedByGate: Record<QualityGate, number> = {
    cross_company: 0,
    evidence_significance: 0,
    impact_threshold: 0,
    narrative_coherence: 0,
  };

  for (const cluster of clusters) {
    const outcome = validateThemeCluster(cluster, thresholds, config);
    if (outcome.passed) {
      validated.push(outcome.theme);
    } else {
      rejectedByGate[outcome.failedGate]++;
      console.log(`[Gate] Rejected '${cluster.groupingKey}' (${cluster.themeType}) at ${outcome.failedGate}: ${outcome.reason}`);
    }
  }

  const rejected = clusters.length - validated.length;
  console.log(
    `[Gate] ${validated.length} of ${clusters.length} clusters passed; rejected ${rejected} ` +
      `(${GATE_ORDER.map((g) => `${g}: ${rejectedByGate[g]}`).join(", ")})`,
  );
  return { validated, rejectedByGate };
}
