import type { JsonObject, JsonValue, OutputShape, ParsedValue } from "../types/contracts.js";
import { MalformedResponseError, errorMessage } from "../errors.js";

// A `json` tag may run straight into the payload; any other tag ends at whitespace.
const OPEN_FENCE = /^(?:```|''')(?:json(?![\w-])|[A-Za-z][\w-]*(?=\s))?/;
const CLOSE_FENCE = /(?:```|''')$/;
const NUMBER = /-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?/y;

/** The text between one leading and one trailing fence, and where it starts in `text`. */
function fencedBody(text: string): { body: string; start: number } {
  let body = text.trim();
  let start = text.length - text.trimStart().length;
  const open = OPEN_FENCE.exec(body);
  if (open) {
    const rest = body.slice(open[0].length);
    body = rest.trimStart();
    start += open[0].length + rest.length - body.length;
  }
  const close = CLOSE_FENCE.exec(body);
  if (close) body = body.slice(0, close.index);
  return { body: body.trimEnd(), start };
}

/** Removes one leading and one trailing ``` or ''' fence, if present. */
export function stripFences(text: string): string {
  return fencedBody(text).body;
}

/**
 * Index of the first character that stops `text` from being a single JSON value.
 * Engine messages only sometimes carry a position, so the offset is found by scanning.
 */
export function syntaxErrorOffset(text: string): number {
  let i = 0;
  const at = () => text.charAt(i);
  const skipWs = () => { while (/[ \t\n\r]/.test(at())) i++; };

  const literal = (word: string): boolean => {
    for (const ch of word) {
      if (at() !== ch) return false;
      i++;
    }
    return true;
  };

  const string = (): boolean => {
    i++;
    while (i < text.length) {
      const ch = at();
      if (ch === '"') { i++; return true; }
      if (ch < " ") return false;
      if (ch === "\\") {
        i++;
        if (at() === "u") {
          i++;
          for (let k = 0; k < 4; k++, i++) if (!/[0-9a-fA-F]/.test(at())) return false;
          continue;
        }
        if (!/["\\/bfnrt]/.test(at())) return false;
      }
      i++;
    }
    return false;
  };

  const members = (close: string, member: () => boolean): boolean => {
    i++;
    skipWs();
    if (at() === close) { i++; return true; }
    for (;;) {
      if (!member()) return false;
      skipWs();
      if (at() === close) { i++; return true; }
      if (at() !== ",") return false;
      i++;
    }
  };

  const value = (): boolean => {
    skipWs();
    switch (at()) {
      case "{":
        return members("}", () => {
          skipWs();
          if (at() !== '"' || !string()) return false;
          skipWs();
          if (at() !== ":") return false;
          i++;
          return value();
        });
      case "[": return members("]", value);
      case '"': return string();
      case "t": return literal("true");
      case "f": return literal("false");
      case "n": return literal("null");
    }
    NUMBER.lastIndex = i;
    const m = NUMBER.exec(text);
    if (!m) return false;
    i += m[0].length;
    return true;
  };

  if (value()) skipWs();
  return i;
}

function isJsonObject(v: JsonValue): v is JsonObject {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

/** Offsets on the raised error index into `raw`, fences included. */
export function parseResponse(raw: string, expectedShape: OutputShape): ParsedValue {
  if (expectedShape === "plain_text") return raw.trim();

  const { body, start } = fencedBody(raw);
  let value: JsonValue;
  try {
    value = JSON.parse(body);
  } catch (e) {
    throw new MalformedResponseError(raw, start + syntaxErrorOffset(body), errorMessage(e));
  }

  if (expectedShape === "json_object") {
    if (!isJsonObject(value)) throw new MalformedResponseError(raw, 0, `expected a JSON object, got ${describe(value)}`);
    return value;
  }
  if (!Array.isArray(value)) throw new MalformedResponseError(raw, 0, `expected a JSON array, got ${describe(value)}`);
  return value;
}

function describe(v: JsonValue): string {
  if (v === null) return "null";
  return Array.isArray(v) ? "array" : typeof v;
}
