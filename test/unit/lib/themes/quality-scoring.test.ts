import { describe, it, expect } from "vitest";
import {
  analyzeCompanyDistribution,
  calculateBalanceScore,
  calculateQualityScore,
  createDistributionSummary,
} from "@/lib/themes/quality-scoring";
import { selectOnePerCompany } from "@/lib/themes/cluster-utils";
import { SENTIMENTS, THEME_TYPES } from "@/lib/themes/types";
import { makeQuote, seededRandom } from "@test/helpers/quote-fixtures";

describe("calculateQualityScore", () => {
  it("scores the two-company pricing strength at 5.9", () => {
    const effective = [
      makeQuote({ company: "A", sentiment: "positive", impactScore: 4 }),
      makeQuote({ company: "B", sentiment: "positive", impactScore: 5 }),
    ];
    // 4.5 * 2/4 + 2.5 * 4.5/5 + 2.0 * 2/10 + 1.0 * 1.0
    expect(calculateQualityScore(effective, "strength")).toBe(5.9);
  });

  it("rewards sentiment variety for non strength/weakness themes", () => {
    const effective = [
      makeQuote({ company: "A", sentiment: "positive" }),
      makeQuote({ company: "B", sentiment: "negative" }),
      makeQuote({ company: "C", sentiment: "mixed" }),
      makeQuote({ company: "D", sentiment: "neutral" }),
    ];
    // 4.5 + 2.5 * 3/5 + 2.0 * 4/10 + min(4/3, 1)
    expect(calculateQualityScore(effective, "investigation_needed")).toBe(7.8);
  });

  it("reaches 10 when every component saturates", () => {
    const effective = Array.from({ length: 10 }, (_, i) => makeQuote({ company: `C${i}`, impactScore: 5 }));
    expect(calculateQualityScore(effective, "strength")).toBe(10);
  });

  it("returns 0 for an empty set", () => {
    expect(calculateQualityScore([], "strength")).toBe(0);
  });

  it("honours configured weights", () => {
    const effective = [makeQuote({ company: "A", impactScore: 5 })];
    const score = calculateQualityScore(effective, "strength", {
      scoreWeights: { companyCoverage: 0, evidenceQuality: 5, quoteVolume: 0, coherence: 5 },
      scoreCompanySaturation: 4,
      scoreQuoteSaturation: 10,
      biasSharePercent: 60,
    });
    expect(score).toBe(10);
  });

  it("always stays within [0, 10]", () => {
    const random = seededRandom(42);
    for (let run = 0; run < 200; run++) {
      const size = 1 + Math.floor(random() * 15);
      const quotes = Array.from({ length: size }, () =>
        makeQuote({
          company: `C${Math.floor(random() * 8)}`,
          impactScore: 1 + Math.floor(random() * 5),
          sentiment: SENTIMENTS[Math.floor(random() * SENTIMENTS.length)],
        }),
      );
      const themeType = THEME_TYPES[Math.floor(random() * THEME_TYPES.length)];
      const score = calculateQualityScore(selectOnePerCompany(quotes), themeType);
      expect(score).toBeGreaterThanOrEqual(0);
      expect(score).toBeLessThanOrEqual(10);
    }
  });
});

describe("calculateBalanceScore", () => {
  it("is 0 for one company or none", () => {
    expect(calculateBalanceScore([5])).toBe(0);
    expect(calculateBalanceScore([])).toBe(0);
  });

  it("is 1 for an even spread", () => {
    expect(calculateBalanceScore([2, 2, 2])).toBe(1);
  });

  it("drops with imbalance", () => {
    expect(calculateBalanceScore([3, 1])).toBe(0.75);
    expect(calculateBalanceScore([4, 1, 1])).toBe(0.5);
  });
});

describe("analyzeCompanyDistribution", () => {
  it("flags a company holding more than 60% of quotes", () => {
    const quotes = [
      makeQuote({ company: "A" }),
      makeQuote({ company: "B" }),
      makeQuote({ company: "A" }),
      makeQuote({ company: "A" }),
    ];
    expect(analyzeCompanyDistribution(quotes)).toEqual({
      totalCompanies: 2,
      quoteDistribution: { A: 3, B: 1 },
      maxCompanyPercentage: 75,
      biasWarning: true,
      companyBalanceScore: 0.75,
      distributionSummary: "2 companies: A(3), B(1)",
    });
  });

  it("summarizes long tails", () => {
    const quotes = [
      ...["A", "A", "A", "B", "B"].map((company) => makeQuote({ company })),
      ...["C", "D", "E"].map((company) => makeQuote({ company })),
    ];
    const distribution = analyzeCompanyDistribution(quotes);
    expect(distribution.distributionSummary).toBe("5 companies: A(3), B(2), C(1), +2 more");
    expect(distribution.maxCompanyPercentage).toBe(37.5);
    expect(distribution.biasWarning).toBe(false);
  });

  it("describes single-company and empty sets", () => {
    expect(createDistributionSummary([["A", 2]])).toBe("Single company: A (2 quotes)");
    expect(analyzeCompanyDistribution([])).toEqual({
      totalCompanies: 0,
      quoteDistribution: {},
      maxCompanyPercentage: 0,
      biasWarning: false,
      companyBalanceScore: 0,
      distributionSummary: "No companies",
    });
  });
});
