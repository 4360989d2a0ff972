export type ErrorCode =
  | "missing_variable"
  | "malformed_response"
  | "upstream_failure"
  | "chain_definition"
  | "template_load"
  | "config";

export class PromptChainError extends Error {
  constructor(readonly code: ErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** A placeholder or declared step input has no binding. */
export class MissingVariableError extends PromptChainError {
  constructor(readonly variable: string, readonly templateName: string) {
    super("missing_variable", `Missing variable '${variable}' for template '${templateName}'`);
  }
}

export class MalformedResponseError extends PromptChainError {
  constructor(
    readonly raw: string,
    readonly offset: number,
    detail: string
  ) {
    super("malformed_response", `Malformed response: ${detail}`);
  }
}

export class UpstreamFailureError extends PromptChainError {
  constructor(message: string, readonly status?: number) {
    super("upstream_failure", message);
  }
}

export class ChainDefinitionError extends PromptChainError {
  constructor(message: string) {
    super("chain_definition", message);
  }
}

export class TemplateLoadError extends PromptChainError {
  constructor(message: string) {
    super("template_load", message);
  }
}

export class ConfigError extends PromptChainError {
  constructor(message: string) {
    super("config", message);
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
