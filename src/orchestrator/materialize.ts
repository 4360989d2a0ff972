import type { Chain, ExecutionResult, JsonValue, OutputShape, ParsedValue } from "../types/contracts.js";
import { parseResponse } from "../prompt/parser.js";
import { readArtifact, saveArtifact } from "../blackboard/fsStore.js";
import { MalformedResponseError, errorMessage } from "../errors.js";

export const COMBINED_FILE = "combined_output.json";

export function writeJson(dir: string, name: string, obj: unknown): string {
  return saveArtifact(dir, name, JSON.stringify(obj, null, 2));
}

/** One file per produced variable, holding the parsed value only. */
export function writeStepOutput(dir: string, producesVariable: string, result: ExecutionResult): string | undefined {
  if (result.status !== "success" || result.parsedValue === undefined) return undefined;
  return writeJson(dir, `${producesVariable}.json`, result.parsedValue);
}

export function writeCombined(dir: string, values: Record<string, ParsedValue>, results: ExecutionResult[]): string {
  return writeJson(dir, COMBINED_FILE, {
    ...values,
    _results: results.map(r => ({ step: r.stepName, status: r.status, error: r.error, warnings: r.warnings }))
  });
}

export interface SavedOutputs {
  values: Record<string, ParsedValue>;
  diagnostics: string[];
}

/** A saved value as the step would have produced it; JSON saved as a string is parsed again. */
function savedValue(v: JsonValue, shape: OutputShape): ParsedValue | undefined {
  if (shape === "plain_text") return typeof v === "string" ? v : undefined;
  if (typeof v === "string") {
    try {
      return parseResponse(v, shape);
    } catch (e) {
      if (e instanceof MalformedResponseError) return undefined;
      throw e;
    }
  }
  if (shape === "json_array") return Array.isArray(v) ? v : undefined;
  return typeof v === "object" && v !== null && !Array.isArray(v) ? v : undefined;
}

/**
 * Reads back what earlier runs wrote for this chain, so a caller can resume from it.
 * Values that do not match their step's shape are left out, so that step runs again.
 */
export function loadSavedOutputs(dir: string, chain: Chain): SavedOutputs {
  const values: Record<string, ParsedValue> = {};
  const diagnostics: string[] = [];
  for (const step of chain.steps) {
    const file = `${step.producesVariable}.json`;
    const text = readArtifact(dir, file);
    if (text === undefined) continue;
    let parsed: JsonValue;
    try {
      parsed = JSON.parse(text);
    } catch (e) {
      diagnostics.push(`Invalid JSON in ${file}: ${errorMessage(e)}`);
      continue;
    }
    const value = savedValue(parsed, step.template.expectedShape);
    if (value === undefined) {
      diagnostics.push(`Unexpected value in ${file}: expected ${step.template.expectedShape}`);
      continue;
    }
    values[step.producesVariable] = value;
  }
  return { values, diagnostics };
}
