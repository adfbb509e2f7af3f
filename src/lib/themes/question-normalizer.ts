/**
 * Question Normalizer
 *
 * Deduplicates the canonical research-question list by normalized key and
 * records which representative each input phrasing collapsed into.
 *
 * @module themes/question-normalizer
 */

import { normalizeText } from "./text-matching";
import type { NormalizedQuestions } from "./types";

/**
 * Lowercase, punctuation stripped, whitespace collapsed.
 */
export function normalizeQuestionKey(question: string): string {
  return normalizeText(question);
}

/**
 * Keep the first occurrence per normalized key, in input order.
 * Blank entries are dropped. An empty input yields an empty list, which
 * downstream means "no research seeding available".
 */
export function normalizeCanonicalQuestions(rawQuestions: readonly string[]): NormalizedQuestions {
  const questions: string[] = [];
  const aliases = new Map<string, string>();
  const representativeByKey = new Map<string, string>();

  for (const raw of rawQuestions) {
    const key = normalizeQuestionKey(raw);
    if (!key) continue;

    const existing = representativeByKey.get(key);
    if (existing !== undefined) {
      aliases.set(raw, existing);
      continue;
    }

    const representative = raw.trim();
    representativeByKey.set(key, representative);
    questions.push(representative);
    aliases.set(raw, representative);
  }

  const collapsed = rawQuestions.length - questions.length;
  if (collapsed > 0) {
    console.log(`[QuestionMapper] Canonical questions: ${questions.length} kept, ${collapsed} duplicate/blank collapsed`);
  }

  return { questions, aliases };
}
