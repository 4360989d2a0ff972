export type Role = "system" | "user" | "assistant";

export interface Message {
  role: Role;
  content: string;
}

export interface CompletionArgs {
  model: string;
  messages: Message[];
  temperature?: number;
  max_tokens?: number;
  stop?: string[];
  top_p?: number;
  response_format?: { type: "json_object" } | { type: "text" };
  timeout_ms?: number;
}

export interface CompletionOut {
  content: string;
  finish_reason?: "stop" | "length" | "content_filter";
  usage?: { prompt_tokens: number; completion_tokens: number; total_tokens: number };
}
