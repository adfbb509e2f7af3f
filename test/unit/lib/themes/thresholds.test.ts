import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { computeAdaptiveThresholds } from "@/lib/themes/thresholds";
import { makeQuote } from "@test/helpers/quote-fixtures";
import type { QuoteRecord } from "@/lib/themes/types";

function corpus(companies: number, perCompany: number, impacts: number[]): QuoteRecord[] {
  const quotes: QuoteRecord[] = [];
  let i = 0;
  for (let c = 0; c < companies; c++) {
    for (let q = 0; q < perCompany; q++) {
      quotes.push(makeQuote({ company: `Company ${c}`, impactScore: impacts[i % impacts.length] }));
      i++;
    }
  }
  return quotes;
}

describe("computeAdaptiveThresholds", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns base values for an empty corpus", () => {
    expect(computeAdaptiveThresholds([])).toEqual({ minCompanies: 2, minQuotes: 3, minImpact: 3 });
  });

  it("allows single-company themes for a single-company corpus", () => {
    expect(computeAdaptiveThresholds(corpus(1, 4, [4]))).toEqual({ minCompanies: 1, minQuotes: 3, minImpact: 3 });
  });

  it("lowers the quote floor and impact gate for thin, low-impact corpora", () => {
    // 3 companies x 2 quotes, mean impact 16/6
    const result = computeAdaptiveThresholds(corpus(3, 2, [3, 3, 3, 3, 2, 2]));
    expect(result).toEqual({ minCompanies: 2, minQuotes: 2, minImpact: 2.5 });
  });

  it("uses mean - 0.5 when that is above the impact floor", () => {
    // mean impact 3.25
    const result = computeAdaptiveThresholds(corpus(4, 4, [3, 3, 4, 3]));
    expect(result).toEqual({ minCompanies: 2, minQuotes: 3, minImpact: 2.75 });
  });

  it("keeps base values for dense, high-impact corpora", () => {
    expect(computeAdaptiveThresholds(corpus(5, 3, [4]))).toEqual({ minCompanies: 2, minQuotes: 3, minImpact: 3 });
  });
});
