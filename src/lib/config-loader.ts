/**
 * Configuration Loader
 *
 * Loads engine config and question lexicon from file-backed defaults
 * (configs/*.default.json), then resolves environment variable overrides.
 * Results are cached per process; call clearConfigCache() after changing
 * files or env in tests.
 *
 * @module config-loader
 */

import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import {
  DEFAULT_ENGINE_CONFIG,
  EngineConfigSchema,
  QuestionLexiconSchema,
  SCHEMA_VERSIONS,
  canonicalizeContent,
  computeContentHash,
  validateConfig,
  type ConfigType,
  type EngineConfig,
  type QuestionLexicon,
} from "./config-schemas";
import { ThemeEngineError } from "./error-classification";

export type { EngineConfig, QuestionLexicon } from "./config-schemas";
export { DEFAULT_ENGINE_CONFIG } from "./config-schemas";

// ============================================================================
// PATHS
// ============================================================================

const BUNDLED_CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../configs");

const CONFIG_FILE_NAMES: Record<ConfigType, string> = {
  engine: "engine.default.json",
  lexicon: "question-lexicon.default.json",
};

function getDefaultsDir(): string {
  return process.env.TDE_CONFIG_DEFAULTS_DIR || BUNDLED_CONFIG_DIR;
}

// ============================================================================
// TYPES
// ============================================================================

export interface OverrideRecord {
  envVar: string;
  fieldPath: string;
  appliedValue: string | number | boolean;
}

export interface ResolvedConfig<T> {
  config: T;
  contentHash: string;
  source: "file" | "code";
  overrides: OverrideRecord[];
  skippedOverrides: string[];
}

// ============================================================================
// FILE-BACKED DEFAULTS
// ============================================================================

/**
 * Read configs/<type>.default.json from `dir`, check its schemaVersion, and
 * return the content without the version key. Returns null (and logs) when
 * the file is missing, unreadable, on a different version, or invalid.
 */
export function loadDefaultConfigFromFile(configType: ConfigType, dir: string = getDefaultsDir()): unknown | null {
  const filePath = path.join(dir, CONFIG_FILE_NAMES[configType]);
  if (!fs.existsSync(filePath)) {
    return null;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (err) {
    console.error(`[Config-Loader] Failed to load ${filePath}`, err);
    return null;
  }

  if (!raw || typeof raw !== "object" || Array.isArray(raw)) {
    console.error(`[Config-Loader] Failed to load ${filePath}`, "expected a JSON object");
    return null;
  }

  const record: Record<string, unknown> = Object.fromEntries(Object.entries(raw));
  const { schemaVersion, ...content } = record;
  if (schemaVersion !== SCHEMA_VERSIONS[configType]) {
    console.warn(
      `[Config-Loader] ${configType} config version mismatch in ${filePath}: ` +
        `found ${String(schemaVersion)}, expected ${SCHEMA_VERSIONS[configType]}; using fallback`,
    );
    return null;
  }

  const validation = validateConfig(configType, content);
  if (!validation.valid) {
    console.error(`[Config-Loader] Failed to load ${filePath}`, validation.errors);
    return null;
  }
  for (const warning of validation.warnings) {
    console.warn(`[Config-Loader] ${configType}: ${warning}`);
  }
  return content;
}

// ============================================================================
// ENVIRONMENT VARIABLE OVERRIDE MAPPING
// ============================================================================

type EnvParser = (v: string) => number | boolean | null;

const parseIntStrict: EnvParser = (v) => (/^\d+$/.test(v.trim()) ? parseInt(v, 10) : null);
const parseFloatStrict: EnvParser = (v) => {
  const n = Number(v.trim());
  return v.trim() !== "" && Number.isFinite(n) ? n : null;
};
const parseBool: EnvParser = (v) => {
  const t = v.trim().toLowerCase();
  return t === "true" ? true : t === "false" ? false : null;
};

const ENGINE_ENV_MAP: Array<{ envVar: string; field: keyof EngineConfig; parser: EnvParser }> = [
  { envVar: "TDE_MIN_COMPANIES", field: "baseMinCompanies", parser: parseIntStrict },
  { envVar: "TDE_MIN_QUOTES", field: "baseMinQuotes", parser: parseIntStrict },
  { envVar: "TDE_MIN_IMPACT", field: "baseMinImpact", parser: parseFloatStrict },
  { envVar: "TDE_COHERENCE_THRESHOLD", field: "coherenceThreshold", parser: parseFloatStrict },
  { envVar: "TDE_MERGE_THRESHOLD", field: "mergeSimilarityThreshold", parser: parseFloatStrict },
  { envVar: "TDE_MERGE_UNTIL_STABLE", field: "mergeUntilStable", parser: parseBool },
];

function overridesEnabled(): boolean {
  return (process.env.TDE_CONFIG_ENV_OVERRIDES || "on").toLowerCase() !== "off";
}

/**
 * Apply TDE_* environment overrides one field at a time. An override that
 * fails to parse, or makes the config invalid, is skipped with a warning.
 */
function applyEngineOverrides(base: EngineConfig): {
  result: EngineConfig;
  overrides: OverrideRecord[];
  skippedOverrides: string[];
} {
  const overrides: OverrideRecord[] = [];
  const skippedOverrides: string[] = [];
  if (!overridesEnabled()) {
    return { result: base, overrides, skippedOverrides };
  }

  let result: EngineConfig = base;
  for (const { envVar, field, parser } of ENGINE_ENV_MAP) {
    const raw = process.env[envVar];
    if (raw === undefined || raw === "") continue;

    const value = parser(raw);
    if (value === null) {
      console.warn(`[Config-Loader] Ignoring ${envVar}="${raw}": not a valid value`);
      skippedOverrides.push(envVar);
      continue;
    }

    const candidate = EngineConfigSchema.safeParse({ ...result, [field]: value });
    if (!candidate.success) {
      console.warn(`[Config-Loader] Ignoring ${envVar}="${raw}": ${candidate.error.issues[0]?.message ?? "invalid"}`);
      skippedOverrides.push(envVar);
      continue;
    }

    result = candidate.data;
    overrides.push({ envVar, fieldPath: field, appliedValue: value });
  }

  return { result, overrides, skippedOverrides };
}

// ============================================================================
// PUBLIC LOADERS
// ============================================================================

let engineCache: ResolvedConfig<EngineConfig> | null = null;
let lexiconCache: ResolvedConfig<QuestionLexicon> | null = null;

/**
 * Resolve the engine config: file defaults (or code defaults) + env overrides.
 */
export function loadEngineConfig(): ResolvedConfig<EngineConfig> {
  if (engineCache) return engineCache;

  const fromFile = loadDefaultConfigFromFile("engine");
  const parsedFile = fromFile === null ? null : EngineConfigSchema.safeParse(fromFile);
  const base = parsedFile?.success ? parsedFile.data : DEFAULT_ENGINE_CONFIG;
  const source: "file" | "code" = parsedFile?.success ? "file" : "code";

  const { result, overrides, skippedOverrides } = applyEngineOverrides(base);
  if (overrides.length > 0) {
    console.log(`[Config-Loader] Engine overrides applied: ${overrides.map((o) => o.envVar).join(", ")}`);
  }

  engineCache = {
    config: result,
    contentHash: computeContentHash(canonicalizeContent(result)),
    source,
    overrides,
    skippedOverrides,
  };
  return engineCache;
}

/**
 * Resolve the question lexicon. The override directory is tried first, then
 * the bundled configs/ directory; there is no in-code lexicon.
 */
export function loadQuestionLexicon(): ResolvedConfig<QuestionLexicon> {
  if (lexiconCache) return lexiconCache;

  const dirs = Array.from(new Set([getDefaultsDir(), BUNDLED_CONFIG_DIR]));
  for (const dir of dirs) {
    const content = loadDefaultConfigFromFile("lexicon", dir);
    if (content === null) continue;
    const parsed = QuestionLexiconSchema.safeParse(content);
    if (!parsed.success) continue;

    lexiconCache = {
      config: parsed.data,
      contentHash: computeContentHash(canonicalizeContent(parsed.data)),
      source: "file",
      overrides: [],
      skippedOverrides: [],
    };
    return lexiconCache;
  }

  throw new ThemeEngineError(
    `No valid question lexicon found (looked in: ${dirs.join(", ")})`,
    "config_invalid",
  );
}

/**
 * Drop cached configs (tests, config reload)
 */
export function clearConfigCache(): void {
  engineCache = null;
  lexiconCache = null;
}
