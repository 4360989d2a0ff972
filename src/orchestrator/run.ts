// src/orchestrator/run.ts
// Sequential chain executor: render -> complete -> parse -> bind, halting on the first
// completion or parse failure while keeping every result produced so far.

import type { Chain, CompletionFn, ExecutionResult, Step } from "../types/contracts.js";
import { render } from "../prompt/renderer.js";
import { parseResponse } from "../prompt/parser.js";
import { bindingsFor, createBlackboard, snapshot, write, type Blackboard, type InitialBindings } from "../blackboard/index.js";
import { compileChain } from "./compiler.js";
import { writeCombined, writeStepOutput } from "./materialize.js";
import { COLOR, fmtMs, logPrompts, logSteps, preview, warn } from "../log.js";
import { MalformedResponseError, errorMessage } from "../errors.js";

export interface RunOptions {
  /** When set, each successful output and a combined summary are written here. */
  outputDir?: string;
  /** Receives the run's bindings once the chain stops; the board is discarded otherwise. */
  onComplete?: (blackboard: Blackboard) => void;
}

export async function runChain(
  chain: Chain,
  initialBindings: InitialBindings,
  completionFn: CompletionFn,
  opts: RunOptions = {}
): Promise<ExecutionResult[]> {
  compileChain(chain, Object.keys(initialBindings));
  const blackboard = createBlackboard(initialBindings);
  const results: ExecutionResult[] = [];
  const outputDir = opts.outputDir;

  // Reported on the first result, since no template ever sees these names.
  const unused = unusedInitialBindings(chain, initialBindings).map(k => `Binding '${k}' is not referenced by any step`);
  for (const w of unused) warn(w);

  let idx = 0;
  for (const step of chain.steps) {
    if (logSteps()) console.log(`\n${COLOR.cyan("▶ step")} ${++idx}/${chain.steps.length} ${step.name}`);
    const result = await runStep(step, blackboard, completionFn);
    if (results.length === 0) result.warnings.unshift(...unused);
    results.push(result);

    if (result.status !== "success") {
      if (logSteps()) console.log(`${COLOR.red("✗ " + result.status)} ${step.name} ${COLOR.gray("— " + (result.error ?? ""))}`);
      break;
    }
    if (outputDir) persist(() => writeStepOutput(outputDir, step.producesVariable, result));
    if (logSteps()) console.log(`${COLOR.green("✓ done")} ${step.name} ${COLOR.gray("(" + fmtMs(result.durationMs) + ")")}`);
  }

  if (outputDir) persist(() => writeCombined(outputDir, snapshot(blackboard), results));
  opts.onComplete?.(blackboard);
  return results;
}

export function unusedInitialBindings(chain: Chain, initialBindings: InitialBindings): string[] {
  const used = new Set(chain.steps.flatMap(s => s.inputs));
  return Object.keys(initialBindings).filter(k => !used.has(k));
}

// A failed write costs the file, not the results gathered so far.
function persist(save: () => unknown): void {
  try {
    save();
  } catch (e) {
    warn(`Could not save output: ${errorMessage(e)}`);
  }
}

export async function runStep(step: Step, blackboard: Blackboard, completionFn: CompletionFn): Promise<ExecutionResult> {
  const started = Date.now();
  const warnings: string[] = [];

  // Render failures are chain-construction bugs: let them propagate.
  const renderedPrompt = render(step.template, bindingsFor(blackboard, step.inputs), {
    onWarning: w => { warnings.push(w.message); warn(w.message); }
  });
  if (logPrompts()) console.log(COLOR.gray(`  prompt: ${preview(renderedPrompt)}`));

  const base = { stepName: step.name, renderedPrompt, warnings };
  const expectedShape = step.template.expectedShape;

  let rawResponse: string;
  try {
    rawResponse = await completionFn(renderedPrompt, { step, expectedShape });
  } catch (e) {
    return { ...base, rawResponse: "", status: "upstream_error", error: errorMessage(e), durationMs: Date.now() - started };
  }
  if (typeof rawResponse !== "string" || rawResponse.trim() === "") {
    return { ...base, rawResponse: "", status: "upstream_error", error: "Empty completion response", durationMs: Date.now() - started };
  }
  if (logSteps()) console.log(COLOR.magenta(`  response — ${preview(rawResponse, 96)}`));

  try {
    const parsedValue = parseResponse(rawResponse, expectedShape);
    write(blackboard, step.producesVariable, parsedValue, step.name);
    return { ...base, rawResponse, parsedValue, status: "success", durationMs: Date.now() - started };
  } catch (e) {
    if (!(e instanceof MalformedResponseError)) throw e;
    return { ...base, rawResponse, status: "parse_error", error: e.message, durationMs: Date.now() - started };
  }
}
