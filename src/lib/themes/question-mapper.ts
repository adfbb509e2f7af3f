/**
 * Question Mapper
 *
 * Maps the question captured with each quote onto a canonical research
 * question. Tiers, first match wins:
 * - Exact: normalized equality (1.0)
 * - Anchor: paired-cue rules for recurring ambiguous categories (0.6-0.95)
 * - Prefix: first six tokens contained either way (0.9); needs two content tokens
 * - Fuzzy: stopword-filtered Jaccard + domain boosts (score)
 * - None
 *
 * The self-introduction question is lexically generic and attracts short,
 * unrelated questions, so it alone gets stricter prefix/fuzzy acceptance.
 *
 * @module themes/question-mapper
 */

import type { QuestionLexicon } from "../config-schemas";
import { loadQuestionLexicon } from "../config-loader";
import { containsAnyTerm, isTokenSubsequence, jaccardIndex, prepareText, type TokenizedText } from "./text-matching";
import type { MappingMethod, QuestionMapping, QuoteRecord } from "./types";

// ============================================================================
// CONSTANTS
// ============================================================================

export const MAPPING_THRESHOLDS = {
  prefixTokens: 6,
  prefixConfidence: 0.9,
  /** Raw questions with fewer content tokens never match by prefix */
  prefixMinContentTokens: 2,
  fuzzyAccept: 0.5,
  fuzzyFallback: 0.35,
  introFuzzyAccept: 0.8,
  introFuzzyAcceptWithCues: 0.5,
} as const;

export type QuestionCategory = "introduction" | "competitor" | "pricing" | "painPoint" | "implementation";

interface AnchorRule {
  category: QuestionCategory;
  confidence: number;
  /** Does this text carry the rule's paired cues? */
  matches: (text: TokenizedText, lexicon: QuestionLexicon) => boolean;
}

const ANCHOR_RULES: AnchorRule[] = [
  {
    category: "introduction",
    confidence: 0.95,
    matches: (t, lex) =>
      containsAnyTerm(t, lex.introduction.introCues) &&
      containsAnyTerm(t, lex.introduction.firmSizeCues) &&
      !containsAnyTerm(t, lex.introduction.exclusions),
  },
  {
    category: "competitor",
    confidence: 0.85,
    matches: (t, lex) =>
      containsAnyTerm(t, lex.competitor.strengthWeaknessTerms) && containsAnyTerm(t, lex.competitor.comparisonTerms),
  },
  {
    category: "pricing",
    confidence: 0.75,
    matches: (t, lex) => containsAnyTerm(t, lex.pricing.ratingTerms) && containsAnyTerm(t, lex.pricing.pricingTerms),
  },
  {
    category: "painPoint",
    confidence: 0.7,
    matches: (t, lex) => containsAnyTerm(t, lex.painPoint.painCues) && containsAnyTerm(t, lex.painPoint.triggerCues),
  },
  {
    category: "implementation",
    confidence: 0.6,
    matches: (t, lex) =>
      containsAnyTerm(t, lex.implementation.implementationTerms) &&
      containsAnyTerm(t, lex.implementation.experienceTerms),
  },
];

// ============================================================================
// INDEX
// ============================================================================

interface IndexedQuestion {
  question: string;
  text: TokenizedText;
  contentTokens: Set<string>;
  prefix: string;
  categories: Set<QuestionCategory>;
}

export interface QuestionIndex {
  entries: IndexedQuestion[];
  byNormalized: Map<string, IndexedQuestion>;
  lexicon: QuestionLexicon;
}

function contentTokensOf(text: TokenizedText, lexicon: QuestionLexicon): Set<string> {
  const stop = new Set(lexicon.stopwords);
  return new Set(text.tokens.filter((t) => t && !stop.has(t)));
}

function prefixOf(text: TokenizedText): string {
  return text.tokens.slice(0, MAPPING_THRESHOLDS.prefixTokens).join(" ");
}

function categorize(text: TokenizedText, lexicon: QuestionLexicon): Set<QuestionCategory> {
  const categories = new Set<QuestionCategory>();
  if (containsAnyTerm(text, lexicon.introduction.canonicalCues)) {
    categories.add("introduction");
  }
  for (const rule of ANCHOR_RULES) {
    if (rule.category !== "introduction" && rule.matches(text, lexicon)) {
      categories.add(rule.category);
    }
  }
  return categories;
}

/**
 * Precompute normalized text, content tokens, prefixes and categories for
 * each canonical question. Build once per run and reuse for every quote.
 */
export function buildQuestionIndex(
  canonicalQuestions: readonly string[],
  lexicon: QuestionLexicon = loadQuestionLexicon().config,
): QuestionIndex {
  const entries: IndexedQuestion[] = [];
  const byNormalized = new Map<string, IndexedQuestion>();

  for (const question of canonicalQuestions) {
    const text = prepareText(question);
    if (!text.normalized) continue;
    const entry: IndexedQuestion = {
      question,
      text,
      contentTokens: contentTokensOf(text, lexicon),
      prefix: prefixOf(text),
      categories: categorize(text, lexicon),
    };
    entries.push(entry);
    if (!byNormalized.has(text.normalized)) {
      byNormalized.set(text.normalized, entry);
    }
  }

  return { entries, byNormalized, lexicon };
}

function isIndex(value: readonly string[] | QuestionIndex): value is QuestionIndex {
  return !Array.isArray(value) && "entries" in value;
}

// ============================================================================
// SCORING
// ============================================================================

function domainBoost(raw: TokenizedText, canonical: TokenizedText, lexicon: QuestionLexicon): number {
  const groups: Array<[readonly string[], number]> = [
    [[...lexicon.competitor.comparisonTerms, ...lexicon.competitor.strengthWeaknessTerms], lexicon.boosts.competitive],
    [lexicon.pricing.pricingTerms, lexicon.boosts.pricing],
    [lexicon.implementation.implementationTerms, lexicon.boosts.implementation],
    [lexicon.evaluationCriteria.terms, lexicon.boosts.evaluationCriteria],
  ];

  let boost = 0;
  for (const [terms, amount] of groups) {
    if (containsAnyTerm(raw, terms) && containsAnyTerm(canonical, terms)) {
      boost += amount;
    }
  }
  return boost;
}

function overlapScore(raw: TokenizedText, rawContent: Set<string>, entry: IndexedQuestion, lexicon: QuestionLexicon): number {
  if (rawContent.size === 0 || entry.contentTokens.size === 0) return 0;
  const score = jaccardIndex(rawContent, entry.contentTokens) + domainBoost(raw, entry.text, lexicon);
  return Math.min(score, 1);
}

/**
 * Fuzzy overlap between a captured question and one canonical question,
 * without the introduction asymmetry. Used for retrieval augmentation.
 */
export function scoreQuestionOverlap(
  rawQuestion: string,
  canonicalQuestion: string,
  lexicon: QuestionLexicon = loadQuestionLexicon().config,
): number {
  const raw = prepareText(rawQuestion);
  const canonical = prepareText(canonicalQuestion);
  const entry: IndexedQuestion = {
    question: canonicalQuestion,
    text: canonical,
    contentTokens: contentTokensOf(canonical, lexicon),
    prefix: prefixOf(canonical),
    categories: new Set(),
  };
  return overlapScore(raw, contentTokensOf(raw, lexicon), entry, lexicon);
}

// ============================================================================
// MAPPING
// ============================================================================

const NO_MATCH: QuestionMapping = { question: "", method: "None", confidence: 0 };

function result(question: string, method: MappingMethod, confidence: number): QuestionMapping {
  return { question, method, confidence: Math.round(confidence * 10000) / 10000 };
}

/**
 * Map one captured question to a canonical question. Pure.
 */
export function mapQuestion(
  rawQuestion: string,
  canonicalQuestions: readonly string[] | QuestionIndex,
  lexicon?: QuestionLexicon,
): QuestionMapping {
  const index = isIndex(canonicalQuestions) ? canonicalQuestions : buildQuestionIndex(canonicalQuestions, lexicon);
  const lex = index.lexicon;
  const raw = prepareText(rawQuestion);
  if (!raw.normalized || index.entries.length === 0) return NO_MATCH;

  // 1. Exact
  const exact = index.byNormalized.get(raw.normalized);
  if (exact) return result(exact.question, "Exact", 1.0);

  // 2. Anchor rules
  for (const rule of ANCHOR_RULES) {
    if (!rule.matches(raw, lex)) continue;
    const target = index.entries.find((e) => e.categories.has(rule.category));
    if (target) return result(target.question, "Anchor", rule.confidence);
  }

  const hasIntroCues = containsAnyTerm(raw, lex.introduction.introCues);
  const rawContent = contentTokensOf(raw, lex);

  // 3. Prefix heuristic
  if (rawContent.size >= MAPPING_THRESHOLDS.prefixMinContentTokens) {
    const rawPrefix = prefixOf(raw);
    for (const entry of index.entries) {
      if (entry.categories.has("introduction") && !hasIntroCues) continue;
      if (isTokenSubsequence(rawPrefix, entry.prefix)) {
        return result(entry.question, "Prefix", MAPPING_THRESHOLDS.prefixConfidence);
      }
    }
  }

  // 4. Fuzzy token overlap
  const scored = index.entries.map((entry) => ({ entry, score: overlapScore(raw, rawContent, entry, lex) }));

  let best: { entry: IndexedQuestion; score: number } | null = null;
  for (const candidate of scored) {
    const isIntro = candidate.entry.categories.has("introduction");
    const threshold = isIntro
      ? hasIntroCues
        ? MAPPING_THRESHOLDS.introFuzzyAcceptWithCues
        : MAPPING_THRESHOLDS.introFuzzyAccept
      : MAPPING_THRESHOLDS.fuzzyAccept;
    if (candidate.score >= threshold && (!best || candidate.score > best.score)) {
      best = candidate;
    }
  }
  if (best) return result(best.entry.question, "Fuzzy", best.score);

  // Lower-confidence fallback, never for the introduction question
  let fallback: { entry: IndexedQuestion; score: number } | null = null;
  for (const candidate of scored) {
    if (candidate.entry.categories.has("introduction")) continue;
    if (candidate.score >= MAPPING_THRESHOLDS.fuzzyFallback && (!fallback || candidate.score > fallback.score)) {
      fallback = candidate;
    }
  }
  if (fallback) return result(fallback.entry.question, "Fuzzy", fallback.score);

  // 5. None
  return NO_MATCH;
}

/**
 * Map every quote's captured question. Identical question strings are mapped once.
 */
export function mapQuotesToQuestions(
  quotes: readonly QuoteRecord[],
  index: QuestionIndex,
): Map<string, QuestionMapping> {
  const byQuestion = new Map<string, QuestionMapping>();
  const mappings = new Map<string, QuestionMapping>();

  for (const quote of quotes) {
    let mapping = byQuestion.get(quote.rawQuestion);
    if (!mapping) {
      mapping = mapQuestion(quote.rawQuestion, index);
      byQuestion.set(quote.rawQuestion, mapping);
    }
    mappings.set(quote.responseId, mapping);
  }

  return mappings;
}

/**
 * Count mappings per method (run statistics)
 */
export function summarizeMappings(mappings: ReadonlyMap<string, QuestionMapping>): Record<MappingMethod, number> {
  const counts: Record<MappingMethod, number> = { Exact: 0, Anchor: 0, Prefix: 0, Fuzzy: 0, None: 0 };
  for (const mapping of mappings.values()) {
    counts[mapping.method]++;
  }
  return counts;
}
