import type { Chain, Step, Template } from "../types/contracts.js";
import { findPlaceholders } from "../prompt/renderer.js";
import { ChainDefinitionError, MissingVariableError } from "../errors.js";

export function defineStep(template: Template, producesVariable: string, inputs?: string[]): Step {
  return {
    name: template.name,
    template,
    inputs: inputs ?? findPlaceholders(template.body),
    producesVariable
  };
}

/**
 * Checks a chain against the names bound before it runs: unique steps and outputs,
 * no forward references, and every placeholder declared as an input.
 */
export function compileChain(chain: Chain, initialNames: Iterable<string>): Chain {
  if (chain.steps.length === 0) throw new ChainDefinitionError("Chain has no steps");

  const available = new Set(initialNames);
  const stepNames = new Set<string>();

  for (const step of chain.steps) {
    if (stepNames.has(step.name)) throw new ChainDefinitionError(`Duplicate step name '${step.name}'`);
    stepNames.add(step.name);

    for (const input of step.inputs) {
      if (!available.has(input)) throw new MissingVariableError(input, step.template.name);
    }
    const declared = new Set(step.inputs);
    for (const ph of findPlaceholders(step.template.body)) {
      if (!declared.has(ph)) throw new MissingVariableError(ph, step.template.name);
    }

    if (available.has(step.producesVariable)) {
      throw new ChainDefinitionError(`Step '${step.name}' would rebind '${step.producesVariable}'`);
    }
    available.add(step.producesVariable);
  }
  return chain;
}

/** Drops the steps whose output is already bound, e.g. a supplied bio or outputs saved by an earlier run. */
export function resumeChain(chain: Chain, bound: Iterable<string>): Chain {
  const have = new Set(bound);
  return { steps: chain.steps.filter(s => !have.has(s.producesVariable)) };
}
