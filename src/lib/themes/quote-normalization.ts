/**
 * Quote Record Normalization
 *
 * Coerces raw labeler output into QuoteRecords. Malformed sentiment and impact
 * values normalize instead of propagating: unknown sentiment -> "neutral",
 * impact rounded and clamped into [1, 5] (missing -> 1).
 *
 * @module themes/quote-normalization
 */

import { z } from "zod";
import { ThemeEngineError } from "../error-classification";
import type { DealOutcome, QuoteRecord, Sentiment } from "./types";

const stringish = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((v) => (v === null || v === undefined ? "" : String(v).trim()));

/** Shape accepted from the labeling collaborator; only responseId and text are required */
export const RawQuoteRecordSchema = z.object({
  responseId: z.union([z.string().min(1), z.number()]).transform((v) => String(v)),
  text: z.string(),
  subject: stringish,
  sentiment: z.unknown(),
  impactScore: z.unknown(),
  company: stringish,
  dealOutcome: z.unknown(),
  interviewee: stringish,
  rawQuestion: stringish,
});

export type RawQuoteRecord = z.input<typeof RawQuoteRecordSchema>;

const SENTIMENT_ALIASES: Record<string, Sentiment> = {
  positive: "positive",
  pos: "positive",
  "very positive": "positive",
  somewhat_positive: "positive",
  negative: "negative",
  neg: "negative",
  "very negative": "negative",
  somewhat_negative: "negative",
  neutral: "neutral",
  mixed: "mixed",
};

export function normalizeSentiment(value: unknown): Sentiment {
  if (typeof value !== "string") return "neutral";
  const key = value.trim().toLowerCase();
  return SENTIMENT_ALIASES[key] ?? SENTIMENT_ALIASES[key.replace(/[\s-]+/g, "_")] ?? "neutral";
}

export function normalizeImpactScore(value: unknown): number {
  const n = typeof value === "number" ? value : typeof value === "string" ? Number(value.trim()) : NaN;
  if (!Number.isFinite(n)) return 1;
  return Math.min(5, Math.max(1, Math.round(n)));
}

/**
 * Map CRM deal status strings ("Closed Won", "closed-lost", "won") to an outcome.
 */
export function normalizeDealOutcome(value: unknown): DealOutcome {
  if (typeof value !== "string") return "other";
  const t = value.toLowerCase();
  if (/\bwon\b|\bwin\b/.test(t)) return "won";
  if (/\blost\b|\bloss\b/.test(t)) return "lost";
  return "other";
}

export function normalizeQuoteRecord(raw: RawQuoteRecord): QuoteRecord | null {
  const parsed = RawQuoteRecordSchema.safeParse(raw);
  if (!parsed.success) return null;
  const r = parsed.data;
  return {
    responseId: r.responseId,
    text: r.text.trim(),
    subject: r.subject,
    sentiment: normalizeSentiment(r.sentiment),
    impactScore: normalizeImpactScore(r.impactScore),
    company: r.company,
    dealOutcome: normalizeDealOutcome(r.dealOutcome),
    interviewee: r.interviewee,
    rawQuestion: r.rawQuestion,
  };
}

/**
 * Normalize a batch. Records failing the schema are skipped (and counted);
 * with `strict` they raise instead. Later duplicates of a responseId are dropped.
 */
export function normalizeQuoteRecords(
  raws: readonly unknown[],
  options: { strict?: boolean } = {},
): { quotes: QuoteRecord[]; rejected: number; duplicates: number } {
  const quotes: QuoteRecord[] = [];
  const seen = new Set<string>();
  const problems: string[] = [];
  let duplicates = 0;

  raws.forEach((raw, index) => {
    const parsed = RawQuoteRecordSchema.safeParse(raw);
    if (!parsed.success) {
      problems.push(`#${index}: ${parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"} ${i.message}`).join("; ")}`);
      return;
    }
    const record = normalizeQuoteRecord(parsed.data);
    if (!record) return;
    if (seen.has(record.responseId)) {
      duplicates++;
      return;
    }
    seen.add(record.responseId);
    quotes.push(record);
  });

  if (problems.length > 0) {
    if (options.strict) {
      throw new ThemeEngineError(`${problems.length} quote record(s) failed validation`, "input_invalid", problems);
    }
    console.warn(`[Themes] Skipped ${problems.length} malformed quote record(s)`);
  }

  return { quotes, rejected: problems.length, duplicates };
}
