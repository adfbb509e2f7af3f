/**
 * In-process language model for statement generation tests.
 */

import type { LanguageModelV1 } from "ai";
import type { ModelInfo } from "@/lib/themes/llm";

export interface FakeModel {
  info: ModelInfo;
  prompts: unknown[];
}

/**
 * Each call returns the next reply; an Error reply is thrown instead.
 */
export function fakeModel(replies: Array<string | Error>): FakeModel {
  const prompts: unknown[] = [];
  let call = 0;

  const model: LanguageModelV1 = {
    specificationVersion: "v1",
    provider: "fake",
    modelId: "fake-model",
    defaultObjectGenerationMode: undefined,
    async doGenerate(options) {
      prompts.push(options.prompt);
      const reply = replies[Math.min(call++, replies.length - 1)];
      if (reply instanceof Error) throw reply;
      return {
        text: reply,
        finishReason: "stop",
        usage: { promptTokens: 10, completionTokens: 20 },
        rawCall: { rawPrompt: null, rawSettings: {} },
      };
    },
    async doStream() {
      throw new Error("streaming is not used");
    },
  };

  return { info: { provider: "anthropic", modelName: "fake-model", model }, prompts };
}
