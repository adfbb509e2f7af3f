/**
 * Theme Discovery Pipeline
 *
 * Preprocess -> thresholds -> {subject clusters, question mapping -> research
 * clusters} -> merge -> gates/score. Synchronous; returns the validated themes
 * (quality score descending) with the run's statistics.
 *
 * @module themes/theme-pipeline
 */

import { loadEngineConfig, loadQuestionLexicon } from "../config-loader";
import type { EngineConfig, QuestionLexicon } from "../config-schemas";
import { mergeAllClusters } from "./cluster-merger";
import { applyQualityGates } from "./quality-gates";
import { buildQuestionIndex, mapQuotesToQuestions, summarizeMappings } from "./question-mapper";
import { normalizeCanonicalQuestions } from "./question-normalizer";
import { filterVerbatimQuotes } from "./quote-filter";
import { buildResearchClusters } from "./research-clustering";
import { clusterBySubject } from "./subject-clustering";
import { computeAdaptiveThresholds } from "./thresholds";
import type { QualityThresholds, QuestionMapping, QuoteRecord, RunStats, ThemeCluster, ValidatedTheme } from "./types";

export interface DiscoveryInput {
  quotes: readonly QuoteRecord[];
  /** Ordered guide questions; empty disables research-seeded clustering */
  canonicalQuestions?: readonly string[];
}

export interface DiscoveryOptions {
  config?: EngineConfig;
  /** Loaded only when there are canonical questions to map */
  lexicon?: QuestionLexicon;
  /** Fixed gates instead of adaptive ones */
  thresholds?: QualityThresholds;
}

export interface DiscoveryResult {
  themes: ValidatedTheme[];
  mappings: Map<string, QuestionMapping>;
  stats: RunStats;
}

export function runThemeDiscovery(input: DiscoveryInput, options: DiscoveryOptions = {}): DiscoveryResult {
  const config = options.config ?? loadEngineConfig().config;

  const { quotes, removed } = filterVerbatimQuotes(input.quotes, config);
  const thresholds = options.thresholds ?? computeAdaptiveThresholds(quotes, config);
  const { questions } = normalizeCanonicalQuestions(input.canonicalQuestions ?? []);

  const subjectClusters = clusterBySubject(quotes, thresholds);

  let mappings = new Map<string, QuestionMapping>();
  let researchClusters: ThemeCluster[] = [];
  let augmentedQuotes = 0;
  if (questions.length > 0 && quotes.length > 0) {
    const lexicon = options.lexicon ?? loadQuestionLexicon().config;
    mappings = mapQuotesToQuestions(quotes, buildQuestionIndex(questions, lexicon));
    const research = buildResearchClusters(quotes, mappings, questions, thresholds, { config, lexicon });
    researchClusters = research.clusters;
    augmentedQuotes = research.augmentedQuotes;
  }

  const candidates = [...subjectClusters, ...researchClusters];
  const merged = mergeAllClusters(candidates, config);
  const { validated, rejectedByGate } = applyQualityGates(merged, thresholds, config);
  const themes = [...validated].sort((a, b) => b.metrics.qualityScore - a.metrics.qualityScore);

  const mappingMethods = summarizeMappings(mappings);
  const stats: RunStats = {
    inputQuotes: input.quotes.length,
    filteredQuotes: quotes.length,
    removedQuotes: removed.length,
    canonicalQuestions: questions.length,
    mappedQuotes: mappings.size - mappingMethods.None,
    mappingMethods,
    subjectClusters: subjectClusters.length,
    researchClusters: researchClusters.length,
    augmentedQuotes,
    mergedClusters: candidates.length - merged.length,
    candidateClusters: merged.length,
    rejectedByGate,
    validatedThemes: themes.length,
    thresholds,
  };

  console.log(
    `[Themes] Discovery complete: ${themes.length} themes from ${stats.filteredQuotes} quotes ` +
      `(${stats.subjectClusters} subject + ${stats.researchClusters} research clusters, ${stats.mergedClusters} merged)`,
  );
  return { themes, mappings, stats };
}
