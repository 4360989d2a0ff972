import type { CompletionArgs, CompletionOut } from "../types/llm.js";
import type { CompletionFn } from "../types/contracts.js";

export interface LLMProvider {
  complete(args: CompletionArgs): Promise<CompletionOut>;
}

export interface CompletionSettings {
  model: string;
  temperature?: number;
  maxTokens?: number;
  timeoutMs?: number;
}

/** Adapts a provider to the single-call text-in/text-out collaborator the executor expects. */
export function completionFromProvider(provider: LLMProvider, settings: CompletionSettings): CompletionFn {
  return async (prompt, { expectedShape }) => {
    const out = await provider.complete({
      model: settings.model,
      messages: [{ role: "user", content: prompt }],
      temperature: settings.temperature,
      max_tokens: settings.maxTokens,
      timeout_ms: settings.timeoutMs,
      // JSON mode only guarantees an object, so arrays are left to the prompt.
      response_format: expectedShape === "json_object" ? { type: "json_object" } : undefined
    });
    return out.content;
  };
}

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}
