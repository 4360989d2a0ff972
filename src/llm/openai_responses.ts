import type { CompletionArgs, CompletionOut } from "../types/llm.js";
import { isRecord, type LLMProvider } from "./provider.js";
import { DEFAULT_BASE_URL, postJson } from "./openai.js";

/**
 * OpenAI "Responses" API adapter, normalised to the same CompletionOut shape as chat completions.
 *
 * Notes:
 * - Chat-style messages map onto the "input" array.
 * - JSON mode goes through `text.format`, the Responses equivalent of `response_format`.
 * - Assistant text comes from `output_text` when present, otherwise from the output message segments.
 */
export class OpenAIResponses implements LLMProvider {
  constructor(private apiKey: string, private baseUrl = DEFAULT_BASE_URL) {}

  async complete(args: CompletionArgs): Promise<CompletionOut> {
    const payload = {
      model: args.model,
      input: args.messages.map(m => ({ role: m.role, content: m.content })),
      temperature: args.temperature ?? 0.2,
      max_output_tokens: args.max_tokens ?? 800,
      text: args.response_format ? { format: args.response_format } : undefined
    };

    const data = await postJson(`${this.baseUrl}/responses`, this.apiKey, payload, args.timeout_ms);
    if (!isRecord(data)) return { content: "" };

    const usage = isRecord(data.usage) ? data.usage : undefined;
    const input = Number(usage?.input_tokens ?? 0);
    const output = Number(usage?.output_tokens ?? 0);

    return {
      content: extractText(data),
      finish_reason: data.status === "completed" ? "stop" : undefined,
      usage: usage ? { prompt_tokens: input, completion_tokens: output, total_tokens: input + output } : undefined
    };
  }
}

export function extractText(data: Record<string, unknown>): string {
  if (typeof data.output_text === "string") return data.output_text;
  if (!Array.isArray(data.output)) return "";

  const items = data.output.filter(isRecord);
  const msg = items.find(x => x.role === "assistant") ?? items[items.length - 1];
  if (!msg) return "";
  if (typeof msg.content === "string") return msg.content;
  if (!Array.isArray(msg.content)) return "";

  const segments = msg.content.filter(isRecord);
  const textSeg = segments.find(c => (c.type === "output_text" || c.type === "text") && typeof c.text === "string");
  if (textSeg && typeof textSeg.text === "string") return textSeg.text;
  return segments.map(c => (typeof c.text === "string" ? c.text : "")).join("\n");
}
