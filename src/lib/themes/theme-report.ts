/**
 * Theme Report Assembly
 *
 * Turns validated themes into reported themes: ids, statements (with
 * templated fallback), supporting quotes, competitive flag and breakdowns,
 * then hands each one to the store. Store failures are logged and counted.
 *
 * @module themes/theme-report
 */

import { loadEngineConfig, loadQuestionLexicon } from "../config-loader";
import type { EngineConfig, QuestionLexicon } from "../config-schemas";
import { classifyError } from "../error-classification";
import { formatBreakdown } from "./cluster-utils";
import { generateStatementWithFallback, type StatementGenerator } from "./statement-generator";
import type { ThemeStore } from "./theme-storage";
import type { DiscoveryResult } from "./theme-pipeline";
import type { QuoteRecord, ReportedTheme, SupportingQuote, ValidatedTheme } from "./types";

export type CompetitiveRelevance = QuestionLexicon["competitiveRelevance"];

export function formatThemeId(position: number): string {
  return `T${String(position).padStart(3, "0")}`;
}

/**
 * Highest impact first; ties by response id.
 */
export function selectSupportingQuotes(quotes: readonly QuoteRecord[], maxQuotes: number): SupportingQuote[] {
  return [...quotes]
    .sort((a, b) => b.impactScore - a.impactScore || (a.responseId < b.responseId ? -1 : a.responseId > b.responseId ? 1 : 0))
    .slice(0, maxQuotes)
    .map((q) => ({
      responseId: q.responseId,
      text: q.text,
      company: q.company,
      interviewee: q.interviewee,
      sentiment: q.sentiment,
      impactScore: q.impactScore,
    }));
}

export function isCompetitiveTheme(theme: ValidatedTheme, relevance: CompetitiveRelevance): boolean {
  const keywords = relevance.keywords.map((k) => k.toLowerCase());
  if (theme.quotes.some((q) => keywords.some((k) => q.text.toLowerCase().includes(k)))) {
    return true;
  }
  const subjects = new Set(relevance.subjects);
  return subjects.has(theme.groupingKey) || theme.quotes.some((q) => subjects.has(q.subject));
}

export interface ThemeReportOptions {
  generator?: StatementGenerator | null;
  store?: ThemeStore | null;
  config?: Pick<EngineConfig, "supportingQuotesPerTheme">;
  competitiveRelevance?: CompetitiveRelevance;
  now?: () => Date;
}

export interface ThemeReport {
  themes: ReportedTheme[];
  saved: number;
  saveFailures: string[];
  statementFallbacks: number;
}

export async function buildThemeReport(result: DiscoveryResult, options: ThemeReportOptions = {}): Promise<ThemeReport> {
  const supportingCount = (options.config ?? loadEngineConfig().config).supportingQuotesPerTheme;
  const relevance = options.competitiveRelevance ?? loadQuestionLexicon().config.competitiveRelevance;
  const now = options.now ?? (() => new Date());

  const themes: ReportedTheme[] = [];
  let statementFallbacks = 0;

  for (const [index, theme] of result.themes.entries()) {
    const subject = theme.researchQuestion ?? theme.groupingKey;
    const { statement, source } = await generateStatementWithFallback(
      options.generator ?? null,
      theme.themeType,
      subject,
      theme.quotes,
    );
    if (options.generator && source === "template") statementFallbacks++;

    themes.push({
      themeId: formatThemeId(index + 1),
      statement,
      statementSource: source,
      themeType: theme.themeType,
      groupingKey: theme.groupingKey,
      origin: theme.origin,
      researchQuestion: theme.researchQuestion ?? null,
      patternSummary: theme.patternSummary,
      metrics: theme.metrics,
      supportingQuotes: selectSupportingQuotes(theme.quotes, supportingCount),
      competitiveFlag: isCompetitiveTheme(theme, relevance),
      dealBreakdown: formatBreakdown(theme.quotes.map((q) => q.dealOutcome)),
      sentimentBreakdown: formatBreakdown(theme.quotes.map((q) => q.sentiment)),
      quotes: theme.quotes,
      generatedAt: now().toISOString(),
    });
  }

  let saved = 0;
  const saveFailures: string[] = [];
  if (options.store) {
    for (const theme of themes) {
      let ok = false;
      try {
        ok = await options.store.save(theme);
      } catch (err) {
        const classified = classifyError(err);
        console.error(`[ThemeStore] Save threw for ${theme.themeId} (${classified.category}): ${classified.message}`);
      }
      if (ok) {
        saved++;
      } else {
        saveFailures.push(theme.themeId);
        console.warn(`[ThemeStore] Theme ${theme.themeId} was not persisted; continuing`);
      }
    }
  }

  console.log(
    `[Themes] Report: ${themes.length} themes, ${saved} saved, ${saveFailures.length} save failures, ` +
      `${statementFallbacks} statement fallbacks`,
  );
  return { themes, saved, saveFailures, statementFallbacks };
}
