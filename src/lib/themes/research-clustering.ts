/**
 * Research Clusterer
 *
 * Seeds clusters from the canonical research questions: every quote mapped to
 * a question, topped up from unmapped quotes when a question is sparse, then
 * deduplicated to one quote per company and split by sentiment.
 *
 * @module themes/research-clustering
 */

import { DEFAULT_ENGINE_CONFIG, type EngineConfig, type QuestionLexicon } from "../config-schemas";
import { meanImpact, selectOnePerCompany, uniqueCompanyCount } from "./cluster-utils";
import { debugLog } from "./debug";
import { scoreQuestionOverlap } from "./question-mapper";
import type { QualityThresholds, QuestionMapping, QuoteRecord, ThemeCluster, ThemeType } from "./types";

export interface ResearchClusteringOptions {
  config?: Pick<EngineConfig, "researchMinQuotesPerQuestion" | "researchAugmentationMinScore">;
  lexicon?: QuestionLexicon;
}

export interface ResearchClusteringResult {
  clusters: ThemeCluster[];
  /** Unmapped quotes pulled in by retrieval augmentation, summed over questions */
  augmentedQuotes: number;
}

function passesGuardrails(quotes: readonly QuoteRecord[], thresholds: QualityThresholds): boolean {
  return uniqueCompanyCount(quotes) >= thresholds.minCompanies && quotes.length >= thresholds.minQuotes;
}

function researchCluster(
  themeType: ThemeType,
  question: string,
  quotes: QuoteRecord[],
  patternSummary: string,
): ThemeCluster {
  return { themeType, groupingKey: question, origin: "research", quotes, patternSummary, researchQuestion: question };
}

/**
 * Sentiment cohorts over an already one-per-company set. Falls back to a
 * single investigation cluster when no cohort clears the guardrails.
 */
export function splitResearchCohorts(
  question: string,
  deduped: QuoteRecord[],
  thresholds: QualityThresholds,
): ThemeCluster[] {
  const cohorts: Array<[ThemeType, QuoteRecord[], string]> = [
    ["strength", deduped.filter((q) => q.sentiment === "positive"), "Strength theme seeded by research question"],
    ["weakness", deduped.filter((q) => q.sentiment === "negative"), "Weakness theme seeded by research question"],
    [
      "investigation_needed",
      deduped.filter((q) => q.sentiment === "mixed" || q.sentiment === "neutral"),
      "Investigation_Needed theme seeded by research question",
    ],
  ];

  const clusters: ThemeCluster[] = [];
  for (const [themeType, subset, summary] of cohorts) {
    if (subset.length === 0) continue;
    const members = selectOnePerCompany(subset);
    if (passesGuardrails(members, thresholds)) {
      clusters.push(researchCluster(themeType, question, members, summary));
    }
  }

  if (clusters.length === 0) {
    clusters.push(researchCluster("investigation_needed", question, deduped, "Mixed evidence seeded by research question"));
  }
  return clusters;
}

export function buildResearchClusters(
  quotes: readonly QuoteRecord[],
  mappings: ReadonlyMap<string, QuestionMapping>,
  canonicalQuestions: readonly string[],
  thresholds: QualityThresholds,
  options: ResearchClusteringOptions = {},
): ResearchClusteringResult {
  const config = options.config ?? DEFAULT_ENGINE_CONFIG;
  const clusters: ThemeCluster[] = [];
  let augmentedQuotes = 0;

  if (canonicalQuestions.length === 0 || quotes.length === 0) {
    return { clusters, augmentedQuotes };
  }

  const unmapped = quotes.filter((q) => {
    const mapping = mappings.get(q.responseId);
    return !mapping || mapping.method === "None" || !mapping.question;
  });

  for (const question of canonicalQuestions) {
    const members = quotes.filter((q) => mappings.get(q.responseId)?.question === question);

    if (members.length < config.researchMinQuotesPerQuestion) {
      const scoreByRawQuestion = new Map<string, number>();
      const candidates = unmapped
        .map((quote) => {
          let score = scoreByRawQuestion.get(quote.rawQuestion);
          if (score === undefined) {
            score = quote.rawQuestion ? scoreQuestionOverlap(quote.rawQuestion, question, options.lexicon) : 0;
            scoreByRawQuestion.set(quote.rawQuestion, score);
          }
          return { quote, score };
        })
        .filter((c) => c.score >= config.researchAugmentationMinScore)
        .sort((a, b) => b.score - a.score);

      const before = members.length;
      for (const { quote } of candidates) {
        if (members.length >= config.researchMinQuotesPerQuestion) break;
        members.push(quote);
      }
      augmentedQuotes += members.length - before;
      if (members.length > before) {
        debugLog(`[Themes] Augmented research question with ${members.length - before} unmapped quote(s)`, { question });
      }
    }

    if (members.length === 0) continue;

    const deduped = selectOnePerCompany(members);
    if (!passesGuardrails(deduped, thresholds) || meanImpact(deduped) < thresholds.minImpact) {
      continue;
    }

    clusters.push(...splitResearchCohorts(question, deduped, thresholds));
  }

  console.log(`[Themes] ${canonicalQuestions.length} research questions -> ${clusters.length} candidate clusters`);
  return { clusters, augmentedQuotes };
}

export function clusterByResearchQuestion(
  quotes: readonly QuoteRecord[],
  mappings: ReadonlyMap<string, QuestionMapping>,
  canonicalQuestions: readonly string[],
  thresholds: QualityThresholds,
  options: ResearchClusteringOptions = {},
): ThemeCluster[] {
  return buildResearchClusters(quotes, mappings, canonicalQuestions, thresholds, options).clusters;
}
