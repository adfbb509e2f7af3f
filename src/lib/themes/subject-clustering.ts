/**
 * Subject Clusterer
 *
 * Splits each harmonized subject's quotes into up to five candidate clusters
 * by crossing sentiment with deal outcome. Candidates are not validated here;
 * the quality gates decide what survives.
 *
 * @module themes/subject-clustering
 */

import type { QualityThresholds, QuoteRecord, ThemeCluster, ThemeType } from "./types";

const INVESTIGATION_MIN_SUBJECT_QUOTES = 5;

export function groupBySubject(quotes: readonly QuoteRecord[]): Map<string, QuoteRecord[]> {
  const groups = new Map<string, QuoteRecord[]>();
  for (const quote of quotes) {
    const subject = quote.subject.trim();
    if (!subject) continue;
    const group = groups.get(subject);
    if (group) {
      group.push(quote);
    } else {
      groups.set(subject, [quote]);
    }
  }
  return groups;
}

function cluster(themeType: ThemeType, subject: string, quotes: QuoteRecord[], patternSummary: string): ThemeCluster {
  return { themeType, groupingKey: subject, origin: "discovered", quotes, patternSummary };
}

/**
 * Strength/weakness pool: the outcome-aligned subset when it alone meets
 * minQuotes, else the whole sentiment pool when that does, else nothing.
 */
function preferAligned(
  pool: QuoteRecord[],
  aligned: QuoteRecord[],
  minQuotes: number,
): { quotes: QuoteRecord[]; aligned: boolean } | null {
  if (aligned.length > 0 && aligned.length >= minQuotes) return { quotes: aligned, aligned: true };
  if (pool.length > 0 && pool.length >= minQuotes) return { quotes: pool, aligned: false };
  return null;
}

export function categorizeSubject(
  subject: string,
  quotes: readonly QuoteRecord[],
  thresholds: QualityThresholds,
): ThemeCluster[] {
  const clusters: ThemeCluster[] = [];
  const positive = quotes.filter((q) => q.sentiment === "positive");
  const negative = quotes.filter((q) => q.sentiment === "negative");

  const strength = preferAligned(
    positive,
    positive.filter((q) => q.dealOutcome === "won"),
    thresholds.minQuotes,
  );
  if (strength) {
    clusters.push(
      cluster(
        "strength",
        subject,
        strength.quotes,
        `Positive customer feedback about ${subject}${strength.aligned ? " from won deals" : ""}`,
      ),
    );
  }

  const weakness = preferAligned(
    negative,
    negative.filter((q) => q.dealOutcome === "lost"),
    thresholds.minQuotes,
  );
  if (weakness) {
    clusters.push(
      cluster(
        "weakness",
        subject,
        weakness.quotes,
        `Negative customer feedback about ${subject}${weakness.aligned ? " from lost deals" : ""}`,
      ),
    );
  }

  const opportunity = positive.filter((q) => q.dealOutcome === "lost");
  if (opportunity.length > 0) {
    clusters.push(
      cluster("opportunity", subject, opportunity, `Positive feedback about ${subject} from lost deals - unmet market opportunity`),
    );
  }

  const concern = negative.filter((q) => q.dealOutcome === "won");
  if (concern.length > 0) {
    clusters.push(
      cluster("concern", subject, concern, `Negative feedback about ${subject} from won deals - potential risk area`),
    );
  }

  const mixed = quotes.filter((q) => q.sentiment === "mixed" || q.sentiment === "neutral");
  const sentimentValues = new Set(quotes.map((q) => q.sentiment)).size;
  const conflicting = quotes.length > INVESTIGATION_MIN_SUBJECT_QUOTES && sentimentValues >= 2;
  if (mixed.length > 1 || conflicting) {
    clusters.push(
      cluster(
        "investigation_needed",
        subject,
        mixed.length > 0 ? mixed : [...quotes],
        `Mixed or unclear customer sentiment about ${subject} requiring deeper analysis`,
      ),
    );
  }

  return clusters;
}

export function clusterBySubject(quotes: readonly QuoteRecord[], thresholds: QualityThresholds): ThemeCluster[] {
  const groups = groupBySubject(quotes);
  const clusters: ThemeCluster[] = [];
  for (const [subject, members] of groups) {
    clusters.push(...categorizeSubject(subject, members, thresholds));
  }
  console.log(`[Themes] ${groups.size} subjects -> ${clusters.length} candidate clusters`);
  return clusters;
}
