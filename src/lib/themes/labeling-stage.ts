/**
 * Labeling Stage
 *
 * Upstream of discovery: runs a sentiment/impact/subject labeler over raw
 * interview responses with a fixed-size pool, waits for every call, then
 * normalizes the results into QuoteRecords. The engine only ever sees the
 * fully collected set.
 *
 * @module themes/labeling-stage
 */

import pLimit from "p-limit";
import { classifyError } from "../error-classification";
import { normalizeQuoteRecords } from "./quote-normalization";
import type { QuoteRecord } from "./types";

export interface RawResponse {
  responseId: string;
  text: string;
  company: string;
  interviewee?: string;
  /** CRM deal status, e.g. "Closed Won" */
  dealStatus?: string;
  question?: string;
}

export interface ResponseLabel {
  sentiment: string;
  impactScore: number | string;
  subject: string;
}

export type ResponseLabeler = (response: RawResponse) => Promise<ResponseLabel>;

export interface LabelingOptions {
  maxConcurrency?: number;
  onProgress?: (completed: number, total: number) => void;
}

export interface LabelingResult {
  quotes: QuoteRecord[];
  /** Responses whose labeler call failed */
  failed: string[];
  /** Labeled records rejected by normalization */
  rejected: number;
}

const DEFAULT_MAX_CONCURRENCY = 5;

export async function labelResponses(
  responses: readonly RawResponse[],
  labeler: ResponseLabeler,
  options: LabelingOptions = {},
): Promise<LabelingResult> {
  const limit = pLimit(Math.max(1, options.maxConcurrency ?? DEFAULT_MAX_CONCURRENCY));
  let completed = 0;

  const settled = await Promise.allSettled(
    responses.map((response) =>
      limit(async () => {
        try {
          return await labeler(response);
        } finally {
          completed++;
          options.onProgress?.(completed, responses.length);
        }
      }),
    ),
  );

  const labeled: unknown[] = [];
  const failed: string[] = [];
  settled.forEach((outcome, index) => {
    const response = responses[index];
    if (outcome.status === "rejected") {
      const classified = classifyError(outcome.reason);
      console.warn(`[Themes] Labeling failed for ${response.responseId} (${classified.category}): ${classified.message}`);
      failed.push(response.responseId);
      return;
    }
    labeled.push({
      responseId: response.responseId,
      text: response.text,
      subject: outcome.value.subject,
      sentiment: outcome.value.sentiment,
      impactScore: outcome.value.impactScore,
      company: response.company,
      dealOutcome: response.dealStatus,
      interviewee: response.interviewee,
      rawQuestion: response.question,
    });
  });

  const { quotes, rejected } = normalizeQuoteRecords(labeled);
  console.log(`[Themes] Labeled ${quotes.length}/${responses.length} responses (${failed.length} failed, ${rejected} rejected)`);
  return { quotes, failed, rejected };
}
