import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { clusterSimilarity, mergeAllClusters, mergeClusters } from "@/lib/themes/cluster-merger";
import { makeCluster, quoteRange } from "@test/helpers/quote-fixtures";

const singlePass = { mergeSimilarityThreshold: 0.6, mergeUntilStable: false };

function ids(cluster: { quotes: Array<{ responseId: string }> }): string[] {
  return cluster.quotes.map((q) => q.responseId).sort((a, b) => Number(a.slice(1)) - Number(b.slice(1)));
}

describe("clusterSimilarity", () => {
  it("is Jaccard over response ids and symmetric", () => {
    const x = makeCluster(quoteRange(1, 8));
    const y = makeCluster([...quoteRange(1, 6), ...quoteRange(9, 11)]);
    expect(clusterSimilarity(x, y)).toBeCloseTo(6 / 11, 10);
    expect(clusterSimilarity(y, x)).toBe(clusterSimilarity(x, y));
  });
});

describe("mergeClusters", () => {
  it("keeps the larger cluster's type and key", () => {
    const small = makeCluster(quoteRange(1, 3), { themeType: "weakness", groupingKey: "Support" });
    const large = makeCluster(quoteRange(2, 6), { themeType: "strength", groupingKey: "Pricing" });

    const merged = mergeClusters(small, large);

    expect(merged.themeType).toBe("strength");
    expect(merged.groupingKey).toBe("Pricing");
    expect(ids(merged)).toEqual(["R1", "R2", "R3", "R4", "R5", "R6"]);
  });

  it("marks mixed origins as hybrid and carries the seeding question", () => {
    const discovered = makeCluster(quoteRange(1, 7));
    const research = makeCluster([...quoteRange(1, 6), ...quoteRange(8, 8)], {
      origin: "research",
      groupingKey: "How would you rate our pricing?",
      researchQuestion: "How would you rate our pricing?",
    });

    const merged = mergeClusters(discovered, research);

    expect(merged.origin).toBe("hybrid");
    // Equal size: the first argument is the representative
    expect(merged.groupingKey).toBe("Pricing");
    expect(merged.researchQuestion).toBe("How would you rate our pricing?");
  });

  it("yields the same member set in either argument order", () => {
    const larger = makeCluster(quoteRange(1, 5), { themeType: "strength" });
    const smaller = makeCluster(quoteRange(4, 6), { themeType: "weakness" });
    expect(ids(mergeClusters(larger, smaller))).toEqual(ids(mergeClusters(smaller, larger)));
    expect(mergeClusters(smaller, larger).themeType).toBe("strength");

    const strength = makeCluster(quoteRange(1, 4), { themeType: "strength" });
    const weakness = makeCluster(quoteRange(3, 6), { themeType: "weakness" });
    const forward = mergeClusters(strength, weakness);
    const backward = mergeClusters(weakness, strength);
    expect(ids(forward)).toEqual(["R1", "R2", "R3", "R4", "R5", "R6"]);
    expect(ids(backward)).toEqual(ids(forward));
    // Equal size: the representative follows argument order
    expect(forward.themeType).toBe("strength");
    expect(backward.themeType).toBe("weakness");
  });

  it("keeps the origin when both sides agree", () => {
    const merged = mergeClusters(makeCluster(quoteRange(1, 2)), makeCluster(quoteRange(2, 3)));
    expect(merged.origin).toBe("discovered");
    expect(merged.researchQuestion).toBeUndefined();
  });
});

describe("mergeAllClusters", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("leaves clusters below the threshold apart", () => {
    const x = makeCluster(quoteRange(1, 8));
    const y = makeCluster([...quoteRange(1, 6), ...quoteRange(9, 11)]);
    expect(mergeAllClusters([x, y], singlePass)).toEqual([x, y]);
    expect(console.log).not.toHaveBeenCalled();
  });

  it("merges clusters at or above the threshold into their union", () => {
    const x = makeCluster(quoteRange(1, 7));
    const y = makeCluster([...quoteRange(1, 6), ...quoteRange(8, 8)]);

    const merged = mergeAllClusters([x, y], singlePass);

    expect(merged).toHaveLength(1);
    expect(ids(merged[0])).toEqual(["R1", "R2", "R3", "R4", "R5", "R6", "R7", "R8"]);
    expect(console.log).toHaveBeenCalledWith("[Merger] Merged 1 near-duplicate cluster(s): 2 -> 1");
  });

  it("compares later clusters against the growing merged set", () => {
    const a = makeCluster(quoteRange(1, 5));
    const b = makeCluster([...quoteRange(1, 3), ...quoteRange(6, 6)]);
    const c = makeCluster([...quoteRange(1, 4), ...quoteRange(6, 6)]);

    const once = mergeAllClusters([a, b, c], singlePass);

    expect(once).toHaveLength(2);
    expect(ids(once[0])).toEqual(["R1", "R2", "R3", "R4", "R5", "R6"]);
    expect(once[1]).toBe(b);
  });

  it("repeats passes until stable when configured", () => {
    const a = makeCluster(quoteRange(1, 5));
    const b = makeCluster([...quoteRange(1, 3), ...quoteRange(6, 6)]);
    const c = makeCluster([...quoteRange(1, 4), ...quoteRange(6, 6)]);

    const stable = mergeAllClusters([a, b, c], { mergeSimilarityThreshold: 0.6, mergeUntilStable: true });

    expect(stable).toHaveLength(1);
    expect(ids(stable[0])).toEqual(["R1", "R2", "R3", "R4", "R5", "R6"]);
  });

  it("never produces more clusters than it receives", () => {
    const clusters = [
      makeCluster(quoteRange(1, 4)),
      makeCluster(quoteRange(3, 6)),
      makeCluster(quoteRange(10, 12)),
    ];
    expect(mergeAllClusters(clusters, singlePass).length).toBeLessThanOrEqual(clusters.length);
    expect(mergeAllClusters([], singlePass)).toEqual([]);
  });
});
