export type OutputShape = "plain_text" | "json_object" | "json_array";

export const OUTPUT_SHAPES: readonly OutputShape[] = ["plain_text", "json_object", "json_array"];

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

export type ParsedValue = string | JsonObject | JsonValue[];

export interface Template {
  readonly name: string;
  readonly body: string;
  readonly expectedShape: OutputShape;
}

/** Placeholder name -> value. */
export type Bindings = Record<string, string>;

export interface Step {
  name: string;
  template: Template;
  inputs: string[];
  producesVariable: string;
}

export interface Chain {
  steps: Step[];
}

export type StepStatus = "success" | "parse_error" | "upstream_error";

export interface ExecutionResult {
  stepName: string;
  renderedPrompt: string;
  rawResponse: string;
  parsedValue?: ParsedValue;
  status: StepStatus;
  error?: string;
  warnings: string[];
  durationMs: number;
}

export interface CompletionContext {
  step: Step;
  expectedShape: OutputShape;
}

/**
 * The external completion collaborator. Resolves to the model's text or rejects;
 * whatever model, auth or rate limiting sits behind it is the caller's business.
 */
export type CompletionFn = (prompt: string, ctx: CompletionContext) => Promise<string>;
