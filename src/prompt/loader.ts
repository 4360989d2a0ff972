import { readFileSync } from "node:fs";
import type { OutputShape, Template } from "../types/contracts.js";
import { OUTPUT_SHAPES } from "../types/contracts.js";
import { TemplateLoadError, errorMessage } from "../errors.js";

const HEADING = "### ";
const SHAPE_MARKER = /^<!--\s*output:\s*([\w-]+)\s*-->$/;

export function sectionKey(heading: string): string {
  return heading.trim().toLowerCase().replace(/\s+/g, "_");
}

function isOutputShape(s: string): s is OutputShape {
  return (OUTPUT_SHAPES as readonly string[]).includes(s);
}

function toTemplate(name: string, lines: string[]): Template {
  let expectedShape: OutputShape = "plain_text";
  const kept: string[] = [];
  for (const line of lines) {
    const m = SHAPE_MARKER.exec(line.trim());
    if (!m) { kept.push(line); continue; }
    const shape = m[1];
    if (!isOutputShape(shape)) {
      throw new TemplateLoadError(`Unknown output shape '${shape}' in section '${name}'`);
    }
    expectedShape = shape;
  }
  const body = kept.join("\n").trim();
  if (!body) throw new TemplateLoadError(`Section '${name}' has an empty body`);
  return Object.freeze({ name, body, expectedShape });
}

/**
 * Splits a markdown document on `### ` headings. Text before the first heading is ignored;
 * other heading levels stay part of the body.
 */
export function parseTemplates(markdown: string): Template[] {
  const out: Template[] = [];
  const seen = new Set<string>();
  let current: string | undefined;
  let lines: string[] = [];

  const flush = () => {
    if (current === undefined) return;
    if (seen.has(current)) throw new TemplateLoadError(`Duplicate section '${current}'`);
    seen.add(current);
    out.push(toTemplate(current, lines));
  };

  for (const line of markdown.split(/\r?\n/)) {
    if (line.startsWith(HEADING)) {
      flush();
      current = sectionKey(line.slice(HEADING.length));
      lines = [];
    } else {
      lines.push(line);
    }
  }
  flush();
  return out;
}

export class TemplateStore {
  private readonly templates: ReadonlyMap<string, Template>;

  constructor(templates: Iterable<Template>) {
    const map = new Map<string, Template>();
    for (const t of templates) {
      if (map.has(t.name)) throw new TemplateLoadError(`Duplicate template '${t.name}'`);
      map.set(t.name, t);
    }
    this.templates = map;
  }

  static fromMarkdown(markdown: string): TemplateStore {
    return new TemplateStore(parseTemplates(markdown));
  }

  get(name: string): Template {
    const t = this.templates.get(name);
    if (!t) throw new TemplateLoadError(`Template '${name}' not found`);
    return t;
  }

  has(name: string): boolean {
    return this.templates.has(name);
  }

  names(): string[] {
    return Array.from(this.templates.keys());
  }

  list(): Template[] {
    return Array.from(this.templates.values());
  }
}

export function loadTemplateStore(path: string): TemplateStore {
  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch (e) {
    throw new TemplateLoadError(`Failed to read templates from ${path}: ${errorMessage(e)}`);
  }
  return TemplateStore.fromMarkdown(text);
}
