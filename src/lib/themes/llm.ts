/**
 * Theme Engine - LLM Provider Selection
 *
 * Resolves the provider and model used for theme statement generation.
 *
 * @module themes/llm
 */

import { anthropic } from "@ai-sdk/anthropic";
import { openai } from "@ai-sdk/openai";
import type { LanguageModel } from "ai";

export type ProviderName = "anthropic" | "openai";

export interface ModelInfo {
  provider: ProviderName;
  modelName: string;
  model: LanguageModel;
}

const DEFAULT_MODEL_NAMES: Record<ProviderName, string> = {
  anthropic: "claude-3-5-haiku-20241022",
  openai: "gpt-4o-mini",
};

export function normalizeProvider(raw: string | undefined): ProviderName {
  const p = (raw || "").toLowerCase().trim();
  if (p === "openai" || p === "gpt") return "openai";
  return "anthropic";
}

export function detectProviderFromModelName(modelName: string): ProviderName | null {
  const name = (modelName || "").toLowerCase();
  if (name.includes("claude")) return "anthropic";
  if (name.includes("gpt") || /^o\d/.test(name)) return "openai";
  return null;
}

function buildModelInfo(provider: ProviderName, modelName: string): ModelInfo {
  if (provider === "openai") {
    return { provider, modelName, model: openai(modelName) };
  }
  return { provider, modelName, model: anthropic(modelName) };
}

/**
 * Provider from the override or TDE_LLM_PROVIDER (default anthropic); model
 * from TDE_LLM_MODEL unless it names another provider's model.
 */
export function getModel(providerOverride?: string, modelOverride?: string): ModelInfo {
  const provider = normalizeProvider(providerOverride ?? process.env.TDE_LLM_PROVIDER);
  const requested = modelOverride ?? process.env.TDE_LLM_MODEL;

  if (requested) {
    const inferred = detectProviderFromModelName(requested);
    if (inferred && inferred !== provider) {
      console.warn(`[LLM] Ignoring model override "${requested}" because provider is "${provider}"`);
    } else {
      return buildModelInfo(provider, requested);
    }
  }
  return buildModelInfo(provider, DEFAULT_MODEL_NAMES[provider]);
}
