import { fileURLToPath } from "node:url";
import type { Chain } from "../types/contracts.js";
import type { TemplateStore } from "../prompt/loader.js";
import { defineStep } from "../orchestrator/compiler.js";

export const DEFAULT_TEMPLATES_PATH = fileURLToPath(new URL("../../templates/capability_prompts.md", import.meta.url));

/** Bound as a variable rather than run as a step. */
export const CAPABILITY_MODEL_SECTION = "ai_capability_model";

export const SECTION_SEQUENCE = [
  "bio",
  "audience_description",
  "fictional_profile",
  "capability_scripts",
  "capability_use_cases"
] as const;

export type CapabilitySection = (typeof SECTION_SEQUENCE)[number];

/** Each section's template produces a variable of the same name. */
export function buildCapabilityChain(store: TemplateStore): Chain {
  return { steps: SECTION_SEQUENCE.map(section => defineStep(store.get(section), section)) };
}
