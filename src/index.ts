export * from './types/contracts.js';
export type { Message, CompletionArgs, CompletionOut } from './types/llm.js';
export * from './errors.js';
export { render, findPlaceholders, findUnusedBindings, type RenderOptions, type UnusedBindingWarning } from './prompt/renderer.js';
export { parseResponse, stripFences } from './prompt/parser.js';
export { TemplateStore, loadTemplateStore, parseTemplates, sectionKey } from './prompt/loader.js';
export { compileChain, defineStep, resumeChain } from './orchestrator/compiler.js';
export { runChain, runStep, type RunOptions } from './orchestrator/run.js';
export { loadSavedOutputs, COMBINED_FILE, type SavedOutputs } from './orchestrator/materialize.js';
export { createBlackboard, read, keys, asText, bindingsFor, snapshot, type Blackboard, type InitialBindings } from './blackboard/index.js';
export { sanitizeName } from './blackboard/fsStore.js';
export { completionFromProvider, type LLMProvider, type CompletionSettings } from './llm/provider.js';
export { OpenAIChatCompletions } from './llm/openai.js';
export { OpenAIResponses } from './llm/openai_responses.js';
export { simulatedCompletion } from './llm/simulated.js';
export { resolveCompletion } from './llm/factory.js';
export { loadConfig, MODEL_PROFILES, type AppConfig } from './config.js';
export { buildCapabilityChain, SECTION_SEQUENCE, DEFAULT_TEMPLATES_PATH } from './capability/chain.js';
export { capabilityBindings, planCapabilityRun, type PersonProfile } from './capability/profile.js';
