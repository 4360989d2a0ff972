const RESET = "\x1b[0m";

export const COLOR = {
  reset: RESET,
  gray: (s: string) => `\x1b[90m${s}${RESET}`,
  cyan: (s: string) => `\x1b[36m${s}${RESET}`,
  green: (s: string) => `\x1b[32m${s}${RESET}`,
  yellow: (s: string) => `\x1b[33m${s}${RESET}`,
  red: (s: string) => `\x1b[31m${s}${RESET}`,
  magenta: (s: string) => `\x1b[35m${s}${RESET}`,
};

// Read on every call so tests and the CLI can flip them after import.
const quiet = () => process.env.QUIET === "1";
export const logSteps = () => !quiet() && (process.env.LOG_STEPS ?? "1") !== "0";
export const logPrompts = () => !quiet() && (process.env.LOG_PROMPTS ?? "0") === "1";

export const fmtMs = (ms: number) => `${Math.round(ms)}ms`;

export function preview(text: string, max = 140): string {
  const flat = text.replace(/\s+/g, " ").trim();
  return flat.length > max ? flat.slice(0, max) + "…" : flat;
}

export function warn(message: string): void {
  if (!quiet()) console.warn(COLOR.yellow(`[warn] ${message}`));
}
