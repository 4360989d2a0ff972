import { ConfigError } from "./errors.js";
import { DEFAULT_BASE_URL } from "./llm/openai.js";

export type ApiStyle = "chat" | "responses";

export interface ModelProfile {
  model: string;
  temperature: number;
}

export const MODEL_PROFILES = {
  default: { model: "gpt-4-turbo", temperature: 0.2 },
  creative: { model: "gpt-4-turbo", temperature: 0.8 },
  fast: { model: "gpt-3.5-turbo", temperature: 0.5 }
} satisfies Record<string, ModelProfile>;

export type ProfileName = keyof typeof MODEL_PROFILES;

export interface AppConfig {
  apiKey?: string;
  baseUrl: string;
  apiStyle: ApiStyle;
  profile: ProfileName;
  model: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
  outputDir: string;
}

type Env = Record<string, string | undefined>;

function isProfileName(s: string): s is ProfileName {
  return Object.hasOwn(MODEL_PROFILES, s);
}

function numberVar(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === "") return fallback;
  const n = Number(raw);
  if (!Number.isFinite(n)) throw new ConfigError(`${key} must be a number, got '${raw}'`);
  return n;
}

/** Resolves settings from the environment (populated from .env by the entry points). */
export function loadConfig(env: Env = process.env): AppConfig {
  const profile = (env.MODEL_PROFILE || "default").toLowerCase();
  if (!isProfileName(profile)) {
    throw new ConfigError(`Unknown MODEL_PROFILE '${profile}' (expected ${Object.keys(MODEL_PROFILES).join(", ")})`);
  }
  const style = (env.OPENAI_API_STYLE || "chat").toLowerCase();
  if (style !== "chat" && style !== "responses") {
    throw new ConfigError(`Unknown OPENAI_API_STYLE '${style}' (expected chat or responses)`);
  }
  const base = MODEL_PROFILES[profile];

  return {
    apiKey: env.OPENAI_API_KEY || undefined,
    baseUrl: env.OPENAI_BASE_URL || DEFAULT_BASE_URL,
    apiStyle: style,
    profile,
    model: env.MODEL || base.model,
    temperature: numberVar(env, "TEMPERATURE", base.temperature),
    maxTokens: numberVar(env, "MAX_TOKENS", 1200),
    timeoutMs: numberVar(env, "COMPLETION_TIMEOUT_MS", 60_000),
    outputDir: env.OUTPUT_DIR || "output"
  };
}

/** Short, non-sensitive fingerprint of a key for diagnostics. */
export function maskKey(key: string | undefined): string | undefined {
  if (!key) return undefined;
  if (key.length <= 8) return "****";
  return `${key.slice(0, 4)}...${key.slice(-4)}`;
}
