import type { AppConfig } from "../config.js";
import type { CompletionFn } from "../types/contracts.js";
import { OpenAIChatCompletions } from "./openai.js";
import { OpenAIResponses } from "./openai_responses.js";
import { completionFromProvider, type LLMProvider } from "./provider.js";
import { simulatedCompletion } from "./simulated.js";

export interface ResolvedCompletion {
  completion: CompletionFn;
  source: "live" | "simulated";
}

export function buildProvider(config: AppConfig, apiKey: string): LLMProvider {
  return config.apiStyle === "responses"
    ? new OpenAIResponses(apiKey, config.baseUrl)
    : new OpenAIChatCompletions(apiKey, config.baseUrl);
}

/** Live provider when a key is configured and simulation isn't forced; simulated output otherwise. */
export function resolveCompletion(config: AppConfig, simulate = false): ResolvedCompletion {
  if (simulate || !config.apiKey) return { completion: simulatedCompletion, source: "simulated" };
  const provider = buildProvider(config, config.apiKey);
  return {
    completion: completionFromProvider(provider, {
      model: config.model,
      temperature: config.temperature,
      maxTokens: config.maxTokens,
      timeoutMs: config.timeoutMs
    }),
    source: "live"
  };
}
