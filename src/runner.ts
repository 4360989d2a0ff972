#!/usr/bin/env node
// src/runner.ts
// CLI for the capability profile chain:
// - Profile fields via --kv key=value and --file key=path (file contents as text)
// - Interactive prompt for a missing name (skipped with NO_INTERACTIVE=1)
// - file:// answers at the prompt load file contents as text
// - --save / --out persist outputs; --resume reuses outputs saved in that folder
// - --simulate (or no OPENAI_API_KEY) runs against shape-correct simulated output
import 'dotenv/config';
import fs from 'node:fs';
import path from 'node:path';
import readline from 'node:readline';
import { fileURLToPath } from 'node:url';
import { loadConfig, maskKey, type AppConfig } from './config.js';
import { loadTemplateStore } from './prompt/loader.js';
import { resolveCompletion } from './llm/factory.js';
import { runChain } from './orchestrator/run.js';
import { buildCapabilityChain, DEFAULT_TEMPLATES_PATH } from './capability/chain.js';
import { planCapabilityRun, PROFILE_FIELDS, type PersonProfile } from './capability/profile.js';
import { loadSavedOutputs } from './orchestrator/materialize.js';
import { sanitizeName } from './blackboard/fsStore.js';
import { COLOR, warn } from './log.js';
import { errorMessage } from './errors.js';
import type { ExecutionResult } from './types/contracts.js';
import type { InitialBindings } from './blackboard/index.js';

type KV = Record<string, string>;

export interface CliArgs {
  templatesPath: string;
  kv: KV;
  files: Array<{ key: string; path: string }>;
  outDir?: string;
  save: boolean;
  resume: boolean;
  simulate: boolean;
}

export function parseArgs(argv: string[]): CliArgs {
  const out: CliArgs = { templatesPath: DEFAULT_TEMPLATES_PATH, kv: {}, files: [], save: false, resume: false, simulate: false };
  const split = (spec: string): [string, string] | undefined => {
    const eq = spec.indexOf('=');
    return eq > 0 ? [spec.slice(0, eq), spec.slice(eq + 1)] : undefined;
  };
  for (let i = 2; i < argv.length; i++) {
    const a = argv[i];
    const value = (flag: string): string | undefined => {
      if (a.startsWith(flag + '=')) return a.slice(flag.length + 1);
      if (a === flag && i + 1 < argv.length) return argv[++i];
      return undefined;
    };
    let v: string | undefined;
    if ((v = value('--templates')) !== undefined) out.templatesPath = v;
    else if ((v = value('--out')) !== undefined) { out.outDir = v; out.save = true; }
    else if ((v = value('--kv')) !== undefined) {
      const kv = split(v);
      if (kv) out.kv[kv[0]] = kv[1];
    } else if ((v = value('--file')) !== undefined) {
      const kv = split(v);
      if (kv) out.files.push({ key: kv[0], path: kv[1] });
    }
    else if (a === '--save') out.save = true;
    else if (a === '--resume') { out.resume = true; out.save = true; }
    else if (a === '--simulate') out.simulate = true;
  }
  return out;
}

export function toProfile(kv: KV): PersonProfile {
  return {
    name: kv.name ?? '',
    gender: kv.gender,
    title: kv.title,
    company: kv.company,
    notes: kv.notes,
    bio: kv.bio
  };
}

function readFileUri(uri: string): string {
  const filePath = uri.startsWith('file:///') ? fileURLToPath(uri) : uri.slice('file://'.length);
  try {
    return fs.readFileSync(filePath, 'utf8');
  } catch (e) {
    throw new Error(`Failed to read ${uri}: ${errorMessage(e)}`);
  }
}

async function promptForMissing(provided: KV): Promise<KV> {
  const interactive = (process.env.NO_INTERACTIVE ?? '0') === '0';
  if (!interactive || (provided.name ?? '').trim()) return {};
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  const answers: KV = {};
  try {
    for (const k of PROFILE_FIELDS) {
      if (provided[k] !== undefined) continue;
      const answer: string = await new Promise(res => rl.question(`Enter ${k}${k === 'name' ? '' : ' (optional)'}: `, res));
      answers[k] = answer.trim().startsWith('file://') ? readFileUri(answer.trim()) : answer;
    }
  } finally {
    rl.close();
  }
  return answers;
}

export function formatResults(results: ExecutionResult[]): string {
  const width = Math.max(4, ...results.map(r => r.stepName.length));
  const lines = results.map(r => {
    const mark = r.status === 'success' ? COLOR.green('✓') : COLOR.red('✗');
    const detail = r.error ? ` ${COLOR.gray(r.error)}` : '';
    return `${mark} ${r.stepName.padEnd(width)}  ${r.status}${detail}`;
  });
  return lines.join('\n');
}

function printRuntime(config: AppConfig, source: string, outDir: string | undefined) {
  console.log(COLOR.gray(
    `[Runner] completion=${source} style=${config.apiStyle} profile=${config.profile} model=${config.model} ` +
    `temperature=${config.temperature} key=${maskKey(config.apiKey) ?? 'none'} output=${outDir ? path.resolve(outDir) : 'none'}`
  ));
}

export async function runCapabilityCli(args: CliArgs, config: AppConfig = loadConfig()): Promise<ExecutionResult[]> {
  const store = loadTemplateStore(args.templatesPath);

  const fileKV: KV = {};
  for (const f of args.files) fileKV[f.key] = fs.readFileSync(f.path, 'utf8');
  const provided = { ...args.kv, ...fileKV };
  const profile = toProfile({ ...provided, ...(await promptForMissing(provided)) });

  const outDir = args.save ? (args.outDir ?? path.join(config.outputDir, sanitizeName(profile.name))) : undefined;
  let saved: InitialBindings = {};
  if (outDir && args.resume) {
    const loaded = loadSavedOutputs(outDir, buildCapabilityChain(store));
    for (const d of loaded.diagnostics) warn(d);
    saved = loaded.values;
    const reused = Object.keys(saved);
    if (reused.length) console.log(`[Runner] --resume: reusing ${reused.join(', ')} from ${outDir}`);
  }

  const { chain, bindings } = planCapabilityRun(profile, store, saved);
  const { completion, source } = resolveCompletion(config, args.simulate);
  if (source === 'simulated' && !args.simulate) warn('OPENAI_API_KEY is not set. Falling back to simulated outputs.');
  printRuntime(config, source, outDir);

  if (chain.steps.length === 0) {
    console.log('[Runner] nothing to run: every section is already bound.');
    return [];
  }

  const results = await runChain(chain, bindings, completion, { outputDir: outDir });
  console.log('\n[Results]');
  console.log(formatResults(results));
  return results;
}

/** True when `entry` (argv[1]) is this module, also when reached through an npm bin symlink. */
export function isMainModule(entry: string | undefined, moduleUrl: string = import.meta.url): boolean {
  if (!entry || !fs.existsSync(entry)) return false;
  return fs.realpathSync(entry) === fs.realpathSync(fileURLToPath(moduleUrl));
}

if (isMainModule(process.argv[1])) {
  (async () => {
    const results = await runCapabilityCli(parseArgs(process.argv));
    const last = results[results.length - 1];
    if (last && last.status !== 'success') process.exitCode = 1;
  })().catch(e => { console.error(e); process.exit(1); });
}
