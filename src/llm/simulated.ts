import type { CompletionFn } from "../types/contracts.js";

/** Offline stand-in used when no API key is configured; output matches each step's expected shape. */
export const simulatedCompletion: CompletionFn = async (_prompt, { step, expectedShape }) => {
  const tag = { simulated: true, step: step.name };
  switch (expectedShape) {
    case "json_object":
      return JSON.stringify(tag);
    case "json_array":
      return JSON.stringify([tag]);
    default:
      return `Simulated output for ${step.name}`;
  }
};
