/**
 * Theme Store
 *
 * SQLite persistence for reported themes and their evidence links.
 * A failed save is logged and reported as `false`; it never throws.
 *
 * @module themes/theme-storage
 */

import sqlite3 from "sqlite3";
import { open, type Database } from "sqlite";
import path from "path";
import { classifyError } from "../error-classification";
import type { ReportedTheme } from "./types";

export interface ThemeStore {
  save(theme: ReportedTheme): Promise<boolean>;
}

export interface StoredThemeRow {
  theme_id: string;
  theme_type: string;
  grouping_key: string;
  origin: string;
  research_question: string | null;
  statement: string;
  pattern_summary: string;
  quality_score: number;
  companies_count: number;
  effective_quotes_count: number;
  avg_impact_score: number;
  sentiment_coherence: number | null;
  competitive_flag: number;
  metrics_json: string;
  saved_at: string;
}

export interface StoredEvidenceRow {
  theme_id: string;
  response_id: string;
  company: string;
  impact_score: number;
  is_supporting: number;
}

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS themes (
    theme_id TEXT PRIMARY KEY,
    theme_type TEXT NOT NULL,
    grouping_key TEXT NOT NULL,
    origin TEXT NOT NULL,
    research_question TEXT,
    statement TEXT NOT NULL,
    pattern_summary TEXT NOT NULL,
    quality_score REAL NOT NULL,
    companies_count INTEGER NOT NULL,
    effective_quotes_count INTEGER NOT NULL,
    avg_impact_score REAL NOT NULL,
    sentiment_coherence REAL,
    competitive_flag INTEGER NOT NULL,
    metrics_json TEXT NOT NULL,
    saved_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS theme_evidence (
    theme_id TEXT NOT NULL REFERENCES themes(theme_id) ON DELETE CASCADE,
    response_id TEXT NOT NULL,
    company TEXT NOT NULL,
    impact_score INTEGER NOT NULL,
    is_supporting INTEGER NOT NULL,
    PRIMARY KEY (theme_id, response_id)
  );

  CREATE INDEX IF NOT EXISTS idx_themes_quality ON themes(quality_score);
  CREATE INDEX IF NOT EXISTS idx_theme_evidence_response ON theme_evidence(response_id);
`;

export class SqliteThemeStore implements ThemeStore {
  private constructor(private readonly db: Database) {}

  /**
   * Open (or create) the store. `:memory:` gives a throwaway database.
   */
  static async open(filename: string = process.env.TDE_THEME_DB_PATH || "./themes.db"): Promise<SqliteThemeStore> {
    const resolved = filename === ":memory:" ? filename : path.resolve(filename);
    console.log(`[ThemeStore] Opening database at ${resolved}`);

    const db = await open({ filename: resolved, driver: sqlite3.Database });
    await db.exec("PRAGMA foreign_keys = ON");
    await db.exec(SCHEMA_SQL);
    return new SqliteThemeStore(db);
  }

  async save(theme: ReportedTheme): Promise<boolean> {
    const supporting = new Set(theme.supportingQuotes.map((q) => q.responseId));
    try {
      await this.db.exec("BEGIN");
      await this.db.run(
        `INSERT OR REPLACE INTO themes
         (theme_id, theme_type, grouping_key, origin, research_question, statement, pattern_summary,
          quality_score, companies_count, effective_quotes_count, avg_impact_score, sentiment_coherence,
          competitive_flag, metrics_json, saved_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        [
          theme.themeId,
          theme.themeType,
          theme.groupingKey,
          theme.origin,
          theme.researchQuestion,
          theme.statement,
          theme.patternSummary,
          theme.metrics.qualityScore,
          theme.metrics.companiesCount,
          theme.metrics.effectiveQuotesCount,
          theme.metrics.avgImpactScore,
          theme.metrics.sentimentCoherence,
          theme.competitiveFlag ? 1 : 0,
          JSON.stringify(theme.metrics),
          theme.generatedAt,
        ],
      );
      await this.db.run("DELETE FROM theme_evidence WHERE theme_id = ?", [theme.themeId]);
      for (const quote of theme.quotes) {
        await this.db.run(
          `INSERT OR IGNORE INTO theme_evidence (theme_id, response_id, company, impact_score, is_supporting)
           VALUES (?, ?, ?, ?, ?)`,
          [theme.themeId, quote.responseId, quote.company, quote.impactScore, supporting.has(quote.responseId) ? 1 : 0],
        );
      }
      await this.db.exec("COMMIT");
      return true;
    } catch (err) {
      const classified = classifyError(err);
      console.error(`[ThemeStore] Failed to save ${theme.themeId} (${classified.category}): ${classified.message}`);
      await this.db.exec("ROLLBACK").catch((rollbackErr: unknown) => {
        console.error("[ThemeStore] Rollback failed:", rollbackErr);
      });
      return false;
    }
  }

  async getTheme(themeId: string): Promise<StoredThemeRow | null> {
    const row = await this.db.get<StoredThemeRow>("SELECT * FROM themes WHERE theme_id = ?", [themeId]);
    return row ?? null;
  }

  async listThemes(): Promise<StoredThemeRow[]> {
    return this.db.all<StoredThemeRow[]>("SELECT * FROM themes ORDER BY quality_score DESC, theme_id ASC");
  }

  async getEvidence(themeId: string): Promise<StoredEvidenceRow[]> {
    return this.db.all<StoredEvidenceRow[]>(
      "SELECT * FROM theme_evidence WHERE theme_id = ? ORDER BY response_id ASC",
      [themeId],
    );
  }

  async close(): Promise<void> {
    await this.db.close();
  }
}
