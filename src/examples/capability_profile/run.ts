import 'dotenv/config';
import { loadConfig } from '../../config.js';
import { loadTemplateStore } from '../../prompt/loader.js';
import { resolveCompletion } from '../../llm/factory.js';
import { runChain } from '../../orchestrator/run.js';
import { DEFAULT_TEMPLATES_PATH } from '../../capability/chain.js';
import { planCapabilityRun } from '../../capability/profile.js';
import { keys, read } from '../../blackboard/index.js';
import { parseArgs } from '../../runner.js';

async function main() {
  // --kv key=value as in the CLI; anything left out gets a sample value.
  const { kv, simulate } = parseArgs(process.argv);
  const store = loadTemplateStore(DEFAULT_TEMPLATES_PATH);
  const { chain, bindings } = planCapabilityRun({
    name: kv.name || 'Dana Okafor',
    gender: kv.gender || 'female',
    title: kv.title || 'Volunteer Coordinator',
    company: kv.company || 'Harbor Lane Community Center',
    notes: kv.notes || 'Curious about using AI to schedule volunteers.'
  }, store);

  const { completion, source } = resolveCompletion(loadConfig(), simulate);
  console.log(`[capability_profile] completion source: ${source}`);

  const results = await runChain(chain, bindings, completion, {
    onComplete: bb => {
      console.log('\n[Bindings]');
      for (const k of keys(bb)) {
        const v = read(bb, k);
        console.log(`• ${k}:`, typeof v === 'string' ? v.slice(0, 120) : JSON.stringify(v, null, 2));
      }
    }
  });

  const last = results[results.length - 1];
  console.log(`\nDone: ${results.length}/${chain.steps.length} steps, last status ${last?.status ?? 'none'}.`);
}

main().catch(e => { console.error(e); process.exit(1); });
