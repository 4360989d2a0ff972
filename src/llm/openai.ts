import type { CompletionArgs, CompletionOut } from "../types/llm.js";
import { isRecord, type LLMProvider } from "./provider.js";
import { UpstreamFailureError, errorMessage } from "../errors.js";

export const DEFAULT_BASE_URL = "https://api.openai.com/v1";

/** POSTs JSON and returns the decoded body, mapping transport and HTTP failures to UpstreamFailureError. */
export async function postJson(url: string, apiKey: string, body: unknown, timeoutMs?: number): Promise<unknown> {
  let res: Response;
  try {
    res = await fetch(url, {
      method: "POST",
      headers: {
        "content-type": "application/json",
        "authorization": `Bearer ${apiKey}`
      },
      body: JSON.stringify(body),
      signal: timeoutMs ? AbortSignal.timeout(timeoutMs) : undefined
    });
  } catch (e) {
    throw new UpstreamFailureError(`LLM request failed: ${errorMessage(e)}`);
  }
  if (!res.ok) {
    const text = await res.text();
    throw new UpstreamFailureError(`LLM HTTP ${res.status}: ${text}`, res.status);
  }
  return res.json();
}

const FINISH_REASONS = ["stop", "length", "content_filter"] as const;
type FinishReason = (typeof FINISH_REASONS)[number];

function finishReason(v: unknown): FinishReason | undefined {
  return FINISH_REASONS.find(r => r === v);
}

export class OpenAIChatCompletions implements LLMProvider {
  constructor(
    private apiKey: string,
    private baseUrl: string = DEFAULT_BASE_URL
  ) {}

  async complete(args: CompletionArgs): Promise<CompletionOut> {
    const body = {
      model: args.model,
      messages: args.messages.map(m => ({ role: m.role, content: m.content })),
      temperature: args.temperature ?? 0,
      max_tokens: args.max_tokens ?? 800,
      stop: args.stop,
      top_p: args.top_p,
      response_format: args.response_format
    };

    const data = await postJson(`${this.baseUrl}/chat/completions`, this.apiKey, body, args.timeout_ms);
    const choice = isRecord(data) && Array.isArray(data.choices) ? data.choices[0] : undefined;
    const msg: Record<string, unknown> = isRecord(choice) && isRecord(choice.message) ? choice.message : {};

    const out: CompletionOut = {
      content: typeof msg.content === "string" ? msg.content : "",
      finish_reason: isRecord(choice) ? finishReason(choice.finish_reason) : undefined
    };
    const usage = isRecord(data) ? data.usage : undefined;
    if (isRecord(usage)) {
      out.usage = {
        prompt_tokens: Number(usage.prompt_tokens ?? 0),
        completion_tokens: Number(usage.completion_tokens ?? 0),
        total_tokens: Number(usage.total_tokens ?? 0)
      };
    }
    return out;
  }
}
