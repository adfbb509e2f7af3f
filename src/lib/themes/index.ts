/**
 * Theme Discovery Engine - public API
 *
 * @module themes
 */

export * from "./types";
export { normalizeQuoteRecord, normalizeQuoteRecords, RawQuoteRecordSchema, type RawQuoteRecord } from "./quote-normalization";
export { normalizeCanonicalQuestions, normalizeQuestionKey } from "./question-normalizer";
export {
  buildQuestionIndex,
  mapQuestion,
  mapQuotesToQuestions,
  scoreQuestionOverlap,
  MAPPING_THRESHOLDS,
  type QuestionIndex,
} from "./question-mapper";
export { filterVerbatimQuotes, isNonVerbatim } from "./quote-filter";
export { computeAdaptiveThresholds, baseThresholds } from "./thresholds";
export { clusterBySubject } from "./subject-clustering";
export { clusterByResearchQuestion, buildResearchClusters } from "./research-clustering";
export { validateThemeCluster, applyQualityGates } from "./quality-gates";
export { calculateQualityScore, analyzeCompanyDistribution } from "./quality-scoring";
export { mergeAllClusters, mergeClusters, clusterSimilarity } from "./cluster-merger";
export { selectOnePerCompany } from "./cluster-utils";
export {
  LlmStatementGenerator,
  TemplateStatementGenerator,
  generateStatementWithFallback,
  templateStatement,
  type StatementGenerator,
  type DealOutcomeContext,
} from "./statement-generator";
export { getModel, type ModelInfo } from "./llm";
export { SqliteThemeStore, type ThemeStore } from "./theme-storage";
export { labelResponses, type RawResponse, type ResponseLabel, type ResponseLabeler } from "./labeling-stage";
export { runThemeDiscovery, type DiscoveryInput, type DiscoveryOptions, type DiscoveryResult } from "./theme-pipeline";
export { buildThemeReport, type ThemeReport, type ThemeReportOptions } from "./theme-report";
export { debugLog, clearDebugLog } from "./debug";
export { loadEngineConfig, loadQuestionLexicon, clearConfigCache } from "../config-loader";
export { classifyError, ThemeEngineError } from "../error-classification";
