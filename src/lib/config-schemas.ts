/**
 * Configuration Schemas
 *
 * Zod schemas for validating engine configuration and the question lexicon.
 * Engine parameters carry in-code defaults; the lexicon is file-backed only
 * (configs/question-lexicon.default.json) so keyword lists can be tuned
 * without touching control flow.
 *
 * @module config-schemas
 */

import { z } from "zod";
import crypto from "crypto";

// ============================================================================
// TYPES
// ============================================================================

export type ConfigType = "engine" | "lexicon";

// File-backed default schema versions. Used to validate configs/*.default.json.
export const SCHEMA_VERSIONS = {
  engine: "1.0.0",
  lexicon: "1.0.0",
} as const;

export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
}

// ============================================================================
// ENGINE CONFIG SCHEMA (1.0.0)
// ============================================================================

export const ScoreWeightsSchema = z.object({
  companyCoverage: z.number().min(0).max(10).describe("Points for corroborating-company breadth"),
  evidenceQuality: z.number().min(0).max(10).describe("Points for mean impact score"),
  quoteVolume: z.number().min(0).max(10).describe("Points for effective quote count"),
  coherence: z.number().min(0).max(10).describe("Points for sentiment coherence / variety"),
});

export type ScoreWeights = z.infer<typeof ScoreWeightsSchema>;

export const EngineConfigSchema = z
  .object({
    // === Base quality gates (adaptive thresholds start from these) ===
    baseMinCompanies: z.number().int().min(1).max(50),
    baseMinQuotes: z.number().int().min(1).max(100),
    baseMinImpact: z.number().min(1).max(5),

    // === Adaptive threshold parameters ===
    lowDensityQuotesPerCompany: z.number().min(0).describe("Below this avg quotes/company, the quote floor applies"),
    lowDensityMinQuotes: z.number().int().min(1),
    lowImpactMeanCutoff: z.number().min(1).max(5),
    lowImpactFloor: z.number().min(1).max(5),
    lowImpactOffset: z.number().min(0).max(4),

    // === Gates & scoring ===
    coherenceThreshold: z.number().min(0).max(1),
    scoreWeights: ScoreWeightsSchema,
    scoreCompanySaturation: z.number().int().min(1),
    scoreQuoteSaturation: z.number().int().min(1),
    biasSharePercent: z.number().min(0).max(100),

    // === Merger ===
    mergeSimilarityThreshold: z.number().min(0).max(1),
    mergeUntilStable: z.boolean().describe("Repeat merge passes until no pair clears the threshold"),

    // === Research clustering ===
    researchMinQuotesPerQuestion: z.number().int().min(0),
    researchAugmentationMinScore: z.number().min(0).max(1),

    // === Preprocessing & reporting ===
    minQuoteLength: z.number().int().min(0),
    supportingQuotesPerTheme: z.number().int().min(1).max(50),
  })
  .superRefine((cfg, ctx) => {
    const total =
      cfg.scoreWeights.companyCoverage +
      cfg.scoreWeights.evidenceQuality +
      cfg.scoreWeights.quoteVolume +
      cfg.scoreWeights.coherence;
    if (total > 10 + 1e-9) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["scoreWeights"],
        message: `Score weights sum to ${total}, must not exceed 10`,
      });
    }
  });

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

export const DEFAULT_ENGINE_CONFIG: EngineConfig = {
  baseMinCompanies: 2,
  baseMinQuotes: 3,
  baseMinImpact: 3.0,

  lowDensityQuotesPerCompany: 3,
  lowDensityMinQuotes: 2,
  lowImpactMeanCutoff: 3.5,
  lowImpactFloor: 2.5,
  lowImpactOffset: 0.5,

  coherenceThreshold: 0.7,
  scoreWeights: {
    companyCoverage: 4.5,
    evidenceQuality: 2.5,
    quoteVolume: 2.0,
    coherence: 1.0,
  },
  scoreCompanySaturation: 4,
  scoreQuoteSaturation: 10,
  biasSharePercent: 60,

  mergeSimilarityThreshold: 0.6,
  mergeUntilStable: false,

  researchMinQuotesPerQuestion: 8,
  researchAugmentationMinScore: 0.6,

  minQuoteLength: 20,
  supportingQuotesPerTheme: 5,
};

// ============================================================================
// QUESTION LEXICON SCHEMA (1.0.0)
// ============================================================================

const termList = z.array(z.string().min(1)).min(1);

export const QuestionLexiconSchema = z.object({
  stopwords: z.array(z.string().min(1)),

  introduction: z.object({
    // Cues that identify the self-introduction / firm-size canonical question
    canonicalCues: termList,
    introCues: termList,
    firmSizeCues: termList,
    exclusions: termList,
  }),

  competitor: z.object({
    strengthWeaknessTerms: termList,
    comparisonTerms: termList,
  }),

  pricing: z.object({
    ratingTerms: termList,
    pricingTerms: termList,
  }),

  painPoint: z.object({
    painCues: termList,
    triggerCues: termList,
  }),

  implementation: z.object({
    implementationTerms: termList,
    experienceTerms: termList,
  }),

  evaluationCriteria: z.object({
    terms: termList,
  }),

  boosts: z.object({
    competitive: z.number().min(0).max(1),
    pricing: z.number().min(0).max(1),
    implementation: z.number().min(0).max(1),
    evaluationCriteria: z.number().min(0).max(1),
  }),

  competitiveRelevance: z.object({
    keywords: termList,
    subjects: z.array(z.string().min(1)),
  }),
});

export type QuestionLexicon = z.infer<typeof QuestionLexiconSchema>;

// ============================================================================
// VALIDATION & CANONICALIZATION
// ============================================================================

function formatZodIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.length > 0 ? issue.path.join(".") : "(root)";
    return `${where}: ${issue.message}`;
  });
}

/**
 * Validate a parsed config object against its schema.
 * Warnings flag values that are legal but change behavior noticeably.
 */
export function validateConfig(configType: ConfigType, content: unknown): ValidationResult {
  if (configType === "lexicon") {
    const parsed = QuestionLexiconSchema.safeParse(content);
    return parsed.success
      ? { valid: true, errors: [], warnings: [] }
      : { valid: false, errors: formatZodIssues(parsed.error), warnings: [] };
  }

  const parsed = EngineConfigSchema.safeParse(content);
  if (!parsed.success) {
    return { valid: false, errors: formatZodIssues(parsed.error), warnings: [] };
  }

  const warnings: string[] = [];
  const cfg = parsed.data;
  if (cfg.mergeSimilarityThreshold < 0.3) {
    warnings.push(`mergeSimilarityThreshold=${cfg.mergeSimilarityThreshold} will merge loosely related themes`);
  }
  if (cfg.lowImpactFloor > cfg.baseMinImpact) {
    warnings.push("lowImpactFloor exceeds baseMinImpact; adaptive impact gate can be stricter than the base gate");
  }
  return { valid: true, errors: [], warnings };
}

/**
 * Deterministic JSON serialization (sorted keys) so equal configs hash equally.
 */
export function canonicalizeContent(value: unknown): string {
  const sortKeys = (v: unknown): unknown => {
    if (Array.isArray(v)) return v.map(sortKeys);
    if (v && typeof v === "object") {
      const entries = Object.entries(v).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
      return Object.fromEntries(entries.map(([key, inner]) => [key, sortKeys(inner)]));
    }
    return v;
  };
  return JSON.stringify(sortKeys(value));
}

export function computeContentHash(canonicalJson: string): string {
  return crypto.createHash("sha256").update(canonicalJson).digest("hex");
}
