import type { Bindings, Template } from "../types/contracts.js";
import { MissingVariableError } from "../errors.js";
import { warn } from "../log.js";

// `{{` and `}}` are literal braces; anything else in braces that is not an identifier
// (JSON examples in prompt prose, for instance) is left alone.
const TOKEN = /\{\{|\}\}|\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

export interface UnusedBindingWarning {
  kind: "unused_binding";
  variable: string;
  templateName: string;
  message: string;
}

export interface RenderOptions {
  onWarning?: (w: UnusedBindingWarning) => void;
}

export function findPlaceholders(body: string): string[] {
  const seen = new Set<string>();
  for (const m of body.matchAll(TOKEN)) {
    if (m[1] !== undefined) seen.add(m[1]);
  }
  return Array.from(seen);
}

export function findUnusedBindings(template: Template, bindings: Bindings): string[] {
  const used = new Set(findPlaceholders(template.body));
  return Object.keys(bindings).filter(k => !used.has(k));
}

/**
 * Substitutes bindings into the template body in one pass; substituted values are never re-scanned.
 * Throws MissingVariableError before producing anything if a placeholder is unbound.
 */
export function render(template: Template, bindings: Bindings, opts: RenderOptions = {}): string {
  for (const name of findPlaceholders(template.body)) {
    if (!Object.hasOwn(bindings, name)) throw new MissingVariableError(name, template.name);
  }

  for (const variable of findUnusedBindings(template, bindings)) {
    const w: UnusedBindingWarning = {
      kind: "unused_binding",
      variable,
      templateName: template.name,
      message: `Binding '${variable}' is not referenced by template '${template.name}'`
    };
    if (opts.onWarning) opts.onWarning(w);
    else warn(w.message);
  }

  return template.body.replace(TOKEN, (tok: string, name: string | undefined) => {
    if (name === undefined) return tok === "{{" ? "{" : "}";
    return bindings[name];
  });
}
