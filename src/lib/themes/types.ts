/**
 * Theme Engine - Type Definitions
 *
 * Records flowing through discovery: labeled quotes, question mappings,
 * candidate clusters, validated themes and per-run statistics.
 *
 * @module themes/types
 */

// ============================================================================
// QUOTES
// ============================================================================

export const SENTIMENTS = ["positive", "negative", "neutral", "mixed"] as const;
export type Sentiment = (typeof SENTIMENTS)[number];

export const DEAL_OUTCOMES = ["won", "lost", "other"] as const;
export type DealOutcome = (typeof DEAL_OUTCOMES)[number];

/**
 * One labeled interview excerpt. Identity is `responseId`.
 * `impactScore` is always an integer in [1, 5].
 */
export interface QuoteRecord {
  readonly responseId: string;
  readonly text: string;
  /** Harmonized subject, e.g. "Pricing and Commercial" */
  readonly subject: string;
  readonly sentiment: Sentiment;
  readonly impactScore: number;
  readonly company: string;
  readonly dealOutcome: DealOutcome;
  readonly interviewee: string;
  /** Question text as captured in the transcript */
  readonly rawQuestion: string;
}

// ============================================================================
// QUESTION MAPPING
// ============================================================================

export type MappingMethod = "Exact" | "Anchor" | "Prefix" | "Fuzzy" | "None";

export interface QuestionMapping {
  /** Canonical question text, or "" when nothing cleared a threshold */
  question: string;
  method: MappingMethod;
  confidence: number;
}

export interface NormalizedQuestions {
  questions: string[];
  /** Every input string -> its surviving canonical representative */
  aliases: Map<string, string>;
}

// ============================================================================
// CLUSTERS & THEMES
// ============================================================================

export const THEME_TYPES = ["strength", "weakness", "opportunity", "concern", "investigation_needed"] as const;
export type ThemeType = (typeof THEME_TYPES)[number];

export type ThemeOrigin = "discovered" | "research" | "hybrid";

export interface ThemeCluster {
  themeType: ThemeType;
  /** Harmonized subject (discovered) or canonical question (research) */
  groupingKey: string;
  origin: ThemeOrigin;
  quotes: QuoteRecord[];
  patternSummary: string;
  /** Seeding canonical question for research-origin clusters */
  researchQuestion?: string;
}

export interface QualityThresholds {
  minCompanies: number;
  minQuotes: number;
  minImpact: number;
}

export interface CompanyDistribution {
  totalCompanies: number;
  quoteDistribution: Record<string, number>;
  maxCompanyPercentage: number;
  biasWarning: boolean;
  companyBalanceScore: number;
  distributionSummary: string;
}

export interface ValidationMetrics {
  companiesCount: number;
  effectiveQuotesCount: number;
  avgImpactScore: number;
  /** Fraction matching the expected sentiment; null for non strength/weakness themes */
  sentimentCoherence: number | null;
  qualityScore: number;
  companyDistribution: CompanyDistribution;
}

export interface ValidatedTheme extends ThemeCluster {
  /** One quote per company, highest impact kept; the set the score was computed on */
  effectiveQuotes: QuoteRecord[];
  metrics: ValidationMetrics;
}

export type QualityGate = "cross_company" | "evidence_significance" | "impact_threshold" | "narrative_coherence";

export type GateOutcome =
  | { passed: true; theme: ValidatedTheme }
  | { passed: false; failedGate: QualityGate; reason: string };

// ============================================================================
// RUN STATISTICS
// ============================================================================

export interface RunStats {
  inputQuotes: number;
  filteredQuotes: number;
  removedQuotes: number;
  canonicalQuestions: number;
  mappedQuotes: number;
  mappingMethods: Record<MappingMethod, number>;
  subjectClusters: number;
  researchClusters: number;
  augmentedQuotes: number;
  mergedClusters: number;
  candidateClusters: number;
  rejectedByGate: Record<QualityGate, number>;
  validatedThemes: number;
  thresholds: QualityThresholds;
}

// ============================================================================
// REPORTING
// ============================================================================

export interface SupportingQuote {
  responseId: string;
  text: string;
  company: string;
  interviewee: string;
  sentiment: Sentiment;
  impactScore: number;
}

export interface ReportedTheme {
  /** Sequential "T001", "T002", ... in report order */
  themeId: string;
  statement: string;
  statementSource: "generator" | "template";
  themeType: ThemeType;
  groupingKey: string;
  origin: ThemeOrigin;
  researchQuestion: string | null;
  patternSummary: string;
  metrics: ValidationMetrics;
  supportingQuotes: SupportingQuote[];
  competitiveFlag: boolean;
  dealBreakdown: string;
  sentimentBreakdown: string;
  quotes: QuoteRecord[];
  generatedAt: string;
}
