/**
 * Theme Statement Generation
 *
 * A StatementGenerator turns a validated theme into one executive-ready
 * sentence. Generator failures never reach the caller: the templated
 * statement is used instead.
 *
 * @module themes/statement-generator
 */

import { generateText } from "ai";
import { classifyError } from "../error-classification";
import { formatBreakdown, meanImpact, uniqueCompanyCount } from "./cluster-utils";
import { getModel, type ModelInfo } from "./llm";
import type { DealOutcome, QuoteRecord, ThemeType } from "./types";

export type DealOutcomeContext = Record<DealOutcome, number>;

export interface StatementGenerator {
  readonly name: string;
  generate(
    themeType: ThemeType,
    subject: string,
    quotes: readonly QuoteRecord[],
    dealContext: DealOutcomeContext,
  ): Promise<string>;
}

export function buildDealContext(quotes: readonly QuoteRecord[]): DealOutcomeContext {
  const context: DealOutcomeContext = { won: 0, lost: 0, other: 0 };
  for (const quote of quotes) {
    context[quote.dealOutcome]++;
  }
  return context;
}

// ============================================================================
// TEMPLATE
// ============================================================================

/**
 * Deterministic statement from theme type, subject, sentiment distribution
 * and mean impact.
 */
export function templateStatement(themeType: ThemeType, subject: string, quotes: readonly QuoteRecord[]): string {
  const topic = subject.toLowerCase();
  const companies = uniqueCompanyCount(quotes);

  let lead: string;
  if (themeType === "strength") {
    lead = `Customers consistently praise ${topic} as a key differentiator, with ${companies} companies highlighting its positive impact on their decision.`;
  } else if (themeType === "weakness") {
    lead = `Multiple customers cite concerns about ${topic}, with ${companies} companies identifying this as a barrier to adoption.`;
  } else {
    lead = `Mixed feedback about ${topic} across ${companies} companies suggests this area requires deeper analysis.`;
  }

  const sentiment = formatBreakdown(quotes.map((q) => q.sentiment)) || "none";
  return `${lead} Sentiment: ${sentiment}. Mean impact: ${meanImpact(quotes).toFixed(1)}/5.`;
}

export class TemplateStatementGenerator implements StatementGenerator {
  readonly name = "template";

  async generate(themeType: ThemeType, subject: string, quotes: readonly QuoteRecord[]): Promise<string> {
    return templateStatement(themeType, subject, quotes);
  }
}

// ============================================================================
// LLM
// ============================================================================

const MAX_PROMPT_QUOTES = 8;
const MAX_QUOTE_CHARS = 400;

export function buildStatementPrompt(
  themeType: ThemeType,
  subject: string,
  quotes: readonly QuoteRecord[],
  dealContext: DealOutcomeContext,
): string {
  const excerpts = [...quotes]
    .sort((a, b) => b.impactScore - a.impactScore)
    .slice(0, MAX_PROMPT_QUOTES)
    .map((q) => {
      const text = q.text.length > MAX_QUOTE_CHARS ? `${q.text.slice(0, MAX_QUOTE_CHARS)}...` : q.text;
      return `- [${q.company}, ${q.sentiment}, impact ${q.impactScore}] "${text}"`;
    })
    .join("\n");

  return [
    `Theme type: ${themeType}`,
    `Subject: ${subject}`,
    `Deal outcomes: won ${dealContext.won}, lost ${dealContext.lost}, other ${dealContext.other}`,
    `Customer quotes:`,
    excerpts,
    ``,
    `Write one executive-ready sentence (max 40 words) stating the theme these quotes support.`,
    `Use only what the quotes say. Do not name individual people. Return the sentence only.`,
  ].join("\n");
}

export interface LlmStatementGeneratorOptions {
  modelInfo?: ModelInfo;
  temperature?: number;
}

export class LlmStatementGenerator implements StatementGenerator {
  readonly name: string;
  private readonly modelInfo: ModelInfo;
  private readonly temperature: number;

  constructor(options: LlmStatementGeneratorOptions = {}) {
    this.modelInfo = options.modelInfo ?? getModel();
    this.temperature = options.temperature ?? 0.2;
    this.name = `llm:${this.modelInfo.provider}/${this.modelInfo.modelName}`;
  }

  async generate(
    themeType: ThemeType,
    subject: string,
    quotes: readonly QuoteRecord[],
    dealContext: DealOutcomeContext,
  ): Promise<string> {
    const result = await generateText({
      model: this.modelInfo.model,
      system: "You are a qualitative research analyst writing win-loss findings for B2B software executives.",
      messages: [{ role: "user", content: buildStatementPrompt(themeType, subject, quotes, dealContext) }],
      temperature: this.temperature,
    });

    const text = result.text.trim().replace(/^["']+|["']+$/g, "").trim();
    if (!text) {
      throw new Error("Model returned an empty statement");
    }
    return text;
  }
}

// ============================================================================
// FALLBACK WRAPPER
// ============================================================================

export interface StatementResult {
  statement: string;
  source: "generator" | "template";
}

export async function generateStatementWithFallback(
  generator: StatementGenerator | null,
  themeType: ThemeType,
  subject: string,
  quotes: readonly QuoteRecord[],
): Promise<StatementResult> {
  if (generator) {
    try {
      const statement = await generator.generate(themeType, subject, quotes, buildDealContext(quotes));
      return { statement, source: "generator" };
    } catch (err) {
      const classified = classifyError(err);
      console.warn(
        `[Statement] ${generator.name} failed (${classified.category}): ${classified.message}; using template`,
      );
    }
  }
  return { statement: templateStatement(themeType, subject, quotes), source: "template" };
}
