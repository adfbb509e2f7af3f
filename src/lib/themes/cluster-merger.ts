/**
 * Cluster Merger
 *
 * Collapses near-duplicate clusters (typically a discovered cluster and a
 * research cluster over the same quotes) by Jaccard similarity of their
 * response-id sets.
 *
 * @module themes/cluster-merger
 */

import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from "../config-schemas";
import { jaccardIndex } from "./text-matching";
import type { QuoteRecord, ThemeCluster } from "./types";

export type MergeConfig = Pick<EngineConfig, "mergeSimilarityThreshold" | "mergeUntilStable">;

const MAX_MERGE_PASSES = 100;

function responseIds(cluster: ThemeCluster): Set<string> {
  return new Set(cluster.quotes.map((q) => q.responseId));
}

export function clusterSimilarity(a: ThemeCluster, b: ThemeCluster): number {
  return jaccardIndex(responseIds(a), responseIds(b));
}

/**
 * Union members by response id. Type, key, summary and seeding question come
 * from the larger cluster; `a` wins ties.
 */
export function mergeClusters(a: ThemeCluster, b: ThemeCluster): ThemeCluster {
  const representative = b.quotes.length > a.quotes.length ? b : a;
  const other = representative === a ? b : a;

  const members = new Map<string, QuoteRecord>();
  for (const quote of [...representative.quotes, ...other.quotes]) {
    if (!members.has(quote.responseId)) members.set(quote.responseId, quote);
  }

  const merged: ThemeCluster = {
    themeType: representative.themeType,
    groupingKey: representative.groupingKey,
    origin: a.origin === b.origin ? a.origin : "hybrid",
    quotes: Array.from(members.values()),
    patternSummary: representative.patternSummary,
  };
  const researchQuestion = representative.researchQuestion ?? other.researchQuestion;
  if (researchQuestion !== undefined) merged.researchQuestion = researchQuestion;
  return merged;
}

/**
 * One pass: each unused cluster absorbs every later unused cluster that is
 * similar enough to its growing member set; absorbed clusters are marked used.
 */
function mergePass(clusters: readonly ThemeCluster[], threshold: number): ThemeCluster[] {
  const used = new Array<boolean>(clusters.length).fill(false);
  const result: ThemeCluster[] = [];

  for (let i = 0; i < clusters.length; i++) {
    if (used[i]) continue;
    used[i] = true;
    let current = clusters[i];
    for (let j = i + 1; j < clusters.length; j++) {
      if (used[j]) continue;
      if (clusterSimilarity(current, clusters[j]) >= threshold) {
        current = mergeClusters(current, clusters[j]);
        used[j] = true;
      }
    }
    result.push(current);
  }
  return result;
}

/**
 * Single pass by default. With `mergeUntilStable`, passes repeat until the
 * cluster count stops shrinking.
 */
export function mergeAllClusters(
  clusters: readonly ThemeCluster[],
  config: MergeConfig = DEFAULT_ENGINE_CONFIG,
): ThemeCluster[] {
  let current = mergePass(clusters, config.mergeSimilarityThreshold);
  if (config.mergeUntilStable) {
    for (let pass = 1; pass < MAX_MERGE_PASSES; pass++) {
      const next = mergePass(current, config.mergeSimilarityThreshold);
      if (next.length === current.length) break;
      current = next;
    }
  }

  const merged = clusters.length - current.length;
  if (merged > 0) {
    console.log(`[Merger] Merged ${merged} near-duplicate cluster(s): ${clusters.length} -> ${current.length}`);
  }
  return current;
}
