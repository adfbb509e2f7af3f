import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { applyQualityGates, validateThemeCluster } from "@/lib/themes/quality-gates";
import { calculateQualityScore } from "@/lib/themes/quality-scoring";
import { selectOnePerCompany } from "@/lib/themes/cluster-utils";
import { SENTIMENTS, THEME_TYPES, type GateOutcome } from "@/lib/themes/types";
import { makeCluster, makeQuote, seededRandom } from "@test/helpers/quote-fixtures";

const thresholds = { minCompanies: 2, minQuotes: 2, minImpact: 3 };

function rejection(outcome: GateOutcome): { failedGate: string; reason: string } | null {
  return outcome.passed ? null : { failedGate: outcome.failedGate, reason: outcome.reason };
}

describe("validateThemeCluster", () => {
  it("passes the pricing strength scenario with full metrics", () => {
    const a = makeQuote({ company: "A", sentiment: "positive", impactScore: 4 });
    const b = makeQuote({ company: "B", sentiment: "positive", impactScore: 5 });

    const outcome = validateThemeCluster(makeCluster([a, b]), thresholds);

    expect(outcome.passed).toBe(true);
    if (!outcome.passed) return;
    expect(outcome.theme.effectiveQuotes).toEqual([a, b]);
    expect(outcome.theme.metrics).toEqual({
      companiesCount: 2,
      effectiveQuotesCount: 2,
      avgImpactScore: 4.5,
      sentimentCoherence: 1,
      qualityScore: 5.9,
      companyDistribution: {
        totalCompanies: 2,
        quoteDistribution: { A: 1, B: 1 },
        maxCompanyPercentage: 50,
        biasWarning: false,
        companyBalanceScore: 1,
        distributionSummary: "2 companies: A(1), B(1)",
      },
    });
  });

  it("rejects at cross_company first even when later gates would also fail", () => {
    const outcome = validateThemeCluster(makeCluster([makeQuote({ company: "A", impactScore: 1 })]), thresholds);
    expect(rejection(outcome)).toEqual({ failedGate: "cross_company", reason: "1 companies (need 2)" });
  });

  it("counts one quote per company for evidence significance", () => {
    const quotes = [
      makeQuote({ company: "A" }),
      makeQuote({ company: "A" }),
      makeQuote({ company: "B" }),
      makeQuote({ company: "B" }),
    ];
    const outcome = validateThemeCluster(makeCluster(quotes), { ...thresholds, minQuotes: 3 });
    expect(rejection(outcome)).toEqual({
      failedGate: "evidence_significance",
      reason: "2 effective quotes (need 3)",
    });
  });

  it("uses the unfiltered member set for the impact gate", () => {
    // One-per-company keeps A=5 and B=3 (mean 4), but all members average 2.75
    const quotes = [
      makeQuote({ company: "A", impactScore: 5 }),
      makeQuote({ company: "A", impactScore: 1 }),
      makeQuote({ company: "B", impactScore: 3 }),
      makeQuote({ company: "B", impactScore: 2 }),
    ];
    const outcome = validateThemeCluster(makeCluster(quotes), thresholds);
    expect(rejection(outcome)).toEqual({ failedGate: "impact_threshold", reason: "average impact 2.8 (need 3.0)" });
  });

  it("rejects incoherent strength themes", () => {
    const quotes = [
      makeQuote({ company: "A", sentiment: "positive" }),
      makeQuote({ company: "B", sentiment: "positive" }),
      makeQuote({ company: "C", sentiment: "negative" }),
    ];
    const outcome = validateThemeCluster(makeCluster(quotes), thresholds);
    expect(rejection(outcome)).toEqual({
      failedGate: "narrative_coherence",
      reason: "sentiment coherence 66.7% (need 70.0%)",
    });
  });

  it("skips the coherence gate for other theme types", () => {
    const quotes = [
      makeQuote({ company: "A", sentiment: "positive" }),
      makeQuote({ company: "B", sentiment: "negative" }),
    ];
    const outcome = validateThemeCluster(makeCluster(quotes, { themeType: "investigation_needed" }), thresholds);
    expect(outcome.passed).toBe(true);
    if (outcome.passed) {
      expect(outcome.theme.metrics.sentimentCoherence).toBeNull();
    }
  });

  it("reproduces the quality score from the theme's own effective quotes", () => {
    const quotes = [
      makeQuote({ company: "A", impactScore: 4 }),
      makeQuote({ company: "B", impactScore: 3 }),
      makeQuote({ company: "B", impactScore: 5 }),
      makeQuote({ company: "C", impactScore: 4 }),
    ];
    const outcome = validateThemeCluster(makeCluster(quotes), thresholds);
    expect(outcome.passed).toBe(true);
    if (!outcome.passed) return;
    expect(calculateQualityScore(outcome.theme.effectiveQuotes, outcome.theme.themeType)).toBe(
      outcome.theme.metrics.qualityScore,
    );
  });

  it("never passes a cluster with fewer companies than minCompanies", () => {
    const random = seededRandom(7);
    for (let run = 0; run < 300; run++) {
      const quotes = Array.from({ length: 1 + Math.floor(random() * 8) }, () =>
        makeQuote({
          company: `C${Math.floor(random() * 4)}`,
          impactScore: 1 + Math.floor(random() * 5),
          sentiment: SENTIMENTS[Math.floor(random() * SENTIMENTS.length)],
        }),
      );
      const gates = {
        minCompanies: 1 + Math.floor(random() * 4),
        minQuotes: 1 + Math.floor(random() * 3),
        minImpact: 1 + random() * 3,
      };
      const themeType = THEME_TYPES[Math.floor(random() * THEME_TYPES.length)];
      const outcome = validateThemeCluster(makeCluster(quotes, { themeType }), gates);
      const companies = new Set(quotes.map((q) => q.company)).size;
      if (companies < gates.minCompanies) {
        expect(outcome.passed).toBe(false);
      }
      expect(selectOnePerCompany(quotes).length).toBeLessThanOrEqual(quotes.length);
    }
  });
});

describe("applyQualityGates", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns passing themes and counts rejections per gate", () => {
    const passing = makeCluster([
      makeQuote({ company: "A", impactScore: 4 }),
      makeQuote({ company: "B", impactScore: 4 }),
    ]);
    const singleCompany = makeCluster([makeQuote({ company: "A" })]);
    const lowImpact = makeCluster([
      makeQuote({ company: "A", impactScore: 1 }),
      makeQuote({ company: "B", impactScore: 1 }),
    ]);

    const result = applyQualityGates([passing, singleCompany, lowImpact], thresholds);

    expect(result.validated).toHaveLength(1);
    expect(result.validated[0].quotes).toEqual(passing.quotes);
    expect(result.rejectedByGate).toEqual({
      cross_company: 1,
      evidence_significance: 0,
      impact_threshold: 1,
      narrative_coherence: 0,
    });
  });

  it("honours a configured coherence threshold", () => {
    const cluster = makeCluster([
      makeQuote({ company: "A", sentiment: "positive" }),
      makeQuote({ company: "B", sentiment: "negative" }),
    ]);
    const config = {
      coherenceThreshold: 0.5,
      scoreWeights: { companyCoverage: 4.5, evidenceQuality: 2.5, quoteVolume: 2.0, coherence: 1.0 },
      scoreCompanySaturation: 4,
      scoreQuoteSaturation: 10,
      biasSharePercent: 60,
    };
    expect(applyQualityGates([cluster], thresholds, config).validated).toHaveLength(1);
  });
});
