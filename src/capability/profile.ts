import type { Chain } from "../types/contracts.js";
import type { TemplateStore } from "../prompt/loader.js";
import type { InitialBindings } from "../blackboard/index.js";
import { resumeChain } from "../orchestrator/compiler.js";
import { ChainDefinitionError } from "../errors.js";
import { CAPABILITY_MODEL_SECTION, buildCapabilityChain } from "./chain.js";

export interface PersonProfile {
  name: string;
  gender?: string;
  title?: string;
  company?: string;
  notes?: string;
  bio?: string;
}

export const PROFILE_FIELDS = ["name", "gender", "title", "company", "notes"] as const;

export function capabilityBindings(profile: PersonProfile, store: TemplateStore): InitialBindings {
  const name = profile.name.trim();
  if (!name) throw new ChainDefinitionError("Please provide a non-empty 'name' before running the chain.");

  const bindings: InitialBindings = {
    name,
    gender: profile.gender ?? "",
    title: profile.title ?? "",
    company: profile.company ?? "",
    notes: profile.notes ?? "",
    [CAPABILITY_MODEL_SECTION]: store.get(CAPABILITY_MODEL_SECTION).body
  };
  const bio = profile.bio?.trim();
  if (bio) bindings.bio = bio;
  return bindings;
}

export interface CapabilityRun {
  chain: Chain;
  bindings: InitialBindings;
}

/**
 * Builds the chain and its initial bindings for one person. Anything already known
 * (a supplied bio, outputs saved by an earlier run) is bound up front and its step skipped.
 */
export function planCapabilityRun(profile: PersonProfile, store: TemplateStore, saved: InitialBindings = {}): CapabilityRun {
  const bindings = { ...saved, ...capabilityBindings(profile, store) };
  return { chain: resumeChain(buildCapabilityChain(store), Object.keys(bindings)), bindings };
}
