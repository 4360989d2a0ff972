import type { Bindings, ParsedValue } from "../types/contracts.js";
import { ChainDefinitionError } from "../errors.js";

export interface BindingRecord<T extends ParsedValue = ParsedValue> {
  value: T;
  source: string; // "initial" or the producing step's name
  at: string; // ISO timestamp
}

/** Caller-supplied bindings; values saved by an earlier run may be structured. */
export type InitialBindings = Record<string, ParsedValue>;

/** Bindings for a single chain run; names are written once and never replaced. */
export type Blackboard = Map<string, BindingRecord>;

export function createBlackboard(initial: InitialBindings = {}): Blackboard {
  const bb: Blackboard = new Map();
  for (const [k, v] of Object.entries(initial)) write(bb, k, v, "initial");
  return bb;
}

export function read(bb: Blackboard, key: string): ParsedValue | undefined {
  return bb.get(key)?.value;
}

export function write<T extends ParsedValue>(bb: Blackboard, key: string, value: T, source: string): BindingRecord<T> {
  if (bb.has(key)) throw new ChainDefinitionError(`Variable '${key}' is already bound`);
  const rec = { value, source, at: new Date().toISOString() };
  bb.set(key, rec);
  return rec;
}

export function exists(bb: Blackboard, key: string): boolean {
  return bb.has(key);
}

export function keys(bb: Blackboard): string[] {
  return Array.from(bb.keys());
}

/** Text form of a parsed value as it enters a later prompt. */
export function asText(value: ParsedValue): string {
  return typeof value === "string" ? value : JSON.stringify(value, null, 2);
}

export function bindingsFor(bb: Blackboard, names: Iterable<string>): Bindings {
  const out: Bindings = {};
  for (const n of names) {
    const v = read(bb, n);
    if (v !== undefined) out[n] = asText(v);
  }
  return out;
}

export function snapshot(bb: Blackboard): Record<string, ParsedValue> {
  return Object.fromEntries(Array.from(bb, ([k, rec]) => [k, rec.value]));
}
