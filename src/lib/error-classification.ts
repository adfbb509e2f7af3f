/**
 * Error Classification
 *
 * Classifies collaborator errors (statement generation, persistence) so they
 * can be logged with a category and a retry hint. Nothing here rethrows:
 * callers decide whether to fall back or continue.
 *
 * @module error-classification
 */

export type ErrorCategory = "provider_outage" | "rate_limit" | "timeout" | "storage" | "unknown";

export type ClassifiedError = {
  category: ErrorCategory;
  message: string;
  retriable: boolean;
};

/**
 * Raised for misuse at the engine boundary (bad configuration, schema-invalid
 * input in strict mode). Data-quality problems never raise.
 */
export class ThemeEngineError extends Error {
  constructor(
    message: string,
    public readonly code: "config_invalid" | "input_invalid",
    public readonly details: string[] = [],
  ) {
    super(message);
    this.name = "ThemeEngineError";
  }
}

/** Patterns indicating LLM provider rate limiting or capacity problems */
const RATE_LIMIT_PATTERNS = [
  /status\s*(?:code\s*)?429/i,
  /status\s*(?:code\s*)?529/i,
  /status\s*(?:code\s*)?503/i,
  /rate\s*limit/i,
  /too\s*many\s*requests/i,
  /overloaded/i,
  /quota/i,
];

const AUTH_PATTERNS = [
  /api\s*key/i,
  /authentication/i,
  /unauthorized/i,
  /status\s*(?:code\s*)?401/i,
  /status\s*(?:code\s*)?403/i,
];

const TIMEOUT_PATTERNS = [/timeout/i, /timed?\s*out/i, /ETIMEDOUT/i, /ECONNRESET/i];

const STORAGE_PATTERNS = [/SQLITE_[A-Z]+/, /database is locked/i, /no such table/i, /constraint failed/i];

function readStatusCode(error: unknown): number | null {
  if (!error || typeof error !== "object") return null;
  const status = "status" in error ? error.status : "statusCode" in error ? error.statusCode : undefined;
  return typeof status === "number" ? status : null;
}

/**
 * Classify an error to determine its category and whether a retry could help.
 */
export function classifyError(error: unknown): ClassifiedError {
  const message = error instanceof Error ? error.message : String(error);
  const name = error instanceof Error ? error.name : "";

  if (name === "TimeoutError" || name === "AbortError" || TIMEOUT_PATTERNS.some((p) => p.test(message))) {
    return { category: "timeout", message, retriable: true };
  }

  if (STORAGE_PATTERNS.some((p) => p.test(message))) {
    return { category: "storage", message, retriable: /locked|busy/i.test(message) };
  }

  if (AUTH_PATTERNS.some((p) => p.test(message))) {
    return { category: "provider_outage", message, retriable: false };
  }

  if (RATE_LIMIT_PATTERNS.some((p) => p.test(message))) {
    return { category: "rate_limit", message, retriable: true };
  }

  // AI SDK errors carry the HTTP status on the object
  const statusCode = readStatusCode(error);
  if (statusCode === 429 || statusCode === 529 || statusCode === 503) {
    return { category: "rate_limit", message, retriable: true };
  }
  if (statusCode === 401 || statusCode === 403) {
    return { category: "provider_outage", message, retriable: false };
  }

  return { category: "unknown", message, retriable: false };
}
