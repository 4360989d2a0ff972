import { describe, it, expect, vi, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { compileChain, defineStep, resumeChain } from '../orchestrator/compiler.js';
import { runChain } from '../orchestrator/run.js';
import { read, type Blackboard } from '../blackboard/index.js';
import { ChainDefinitionError, MissingVariableError } from '../errors.js';
import type { Chain, CompletionContext, OutputShape, Template } from '../types/contracts.js';

const tpl = (name: string, body: string, expectedShape: OutputShape = 'plain_text'): Template => ({ name, body, expectedShape });

function threeStepChain(): Chain {
  return {
    steps: [
      defineStep(tpl('summary', 'Summarise {topic}'), 'summary'),
      defineStep(tpl('details', 'Expand on {summary}', 'json_object'), 'details'),
      defineStep(tpl('items', 'List items from {details}', 'json_array'), 'items')
    ]
  };
}

function scripted(responses: Record<string, string | Error>) {
  return vi.fn(async (_prompt: string, ctx: CompletionContext) => {
    const r = responses[ctx.step.name];
    if (r instanceof Error) throw r;
    return r;
  });
}

describe('compiler', () => {
  it('defaults step inputs to the template placeholders', () => {
    const step = defineStep(tpl('s', 'Use {a} and {b} and {a}'), 'out');
    expect(step).toMatchObject({ name: 's', inputs: ['a', 'b'], producesVariable: 'out' });
  });

  it('accepts a chain whose inputs are all bound earlier', () => {
    const chain = threeStepChain();
    expect(compileChain(chain, ['topic'])).toBe(chain);
  });

  it('rejects forward references', () => {
    const chain: Chain = {
      steps: [
        defineStep(tpl('first', 'Needs {later}'), 'first'),
        defineStep(tpl('second', 'Plain'), 'later')
      ]
    };
    expect(() => compileChain(chain, [])).toThrow(MissingVariableError);
  });

  it('rejects a placeholder that is not a declared input', () => {
    const chain: Chain = { steps: [defineStep(tpl('s', 'Uses {a} and {b}'), 'out', ['a'])] };
    expect(() => compileChain(chain, ['a', 'b'])).toThrow("Missing variable 'b' for template 's'");
  });

  it('rejects rebinding a variable', () => {
    const chain: Chain = { steps: [defineStep(tpl('s', 'x'), 'topic')] };
    expect(() => compileChain(chain, ['topic'])).toThrow(ChainDefinitionError);
  });

  it('rejects duplicate step names', () => {
    const chain: Chain = {
      steps: [
        { ...defineStep(tpl('s', 'x'), 'one') },
        { ...defineStep(tpl('s', 'y'), 'two') }
      ]
    };
    expect(() => compileChain(chain, [])).toThrow("Duplicate step name 's'");
  });

  it('drops steps whose output is already bound', () => {
    const resumed = resumeChain(threeStepChain(), ['topic', 'summary']);
    expect(resumed.steps.map(s => s.name)).toEqual(['details', 'items']);
  });
});

describe('runChain', () => {
  let dir: string | undefined;
  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it('feeds each parsed output into later prompts', async () => {
    const completion = scripted({
      summary: '  A short summary  ',
      details: '```json\n{"k": "v"}\n```',
      items: '[1, 2]'
    });
    const results = await runChain(threeStepChain(), { topic: 'tides' }, completion);

    expect(results.map(r => r.status)).toEqual(['success', 'success', 'success']);
    expect(results.map(r => r.parsedValue)).toEqual(['A short summary', { k: 'v' }, [1, 2]]);
    expect(results[0].renderedPrompt).toBe('Summarise tides');
    expect(results[1].renderedPrompt).toBe('Expand on A short summary');
    expect(results[2].renderedPrompt).toBe('List items from {\n  "k": "v"\n}');
    expect(completion.mock.calls.map(c => c[1].expectedShape)).toEqual(['plain_text', 'json_object', 'json_array']);
  });

  it('halts on a completion failure and never invokes later steps', async () => {
    const completion = scripted({ summary: new Error('timeout'), details: '{}', items: '[]' });
    const results = await runChain(threeStepChain(), { topic: 'tides' }, completion);

    expect(results).toHaveLength(1);
    expect(results[0]).toMatchObject({ stepName: 'summary', status: 'upstream_error', error: 'timeout', rawResponse: '' });
    expect(results[0].parsedValue).toBeUndefined();
    expect(completion).toHaveBeenCalledTimes(1);
  });

  it('treats an empty response as an upstream failure', async () => {
    const completion = scripted({ summary: '   \n' });
    const results = await runChain(threeStepChain(), { topic: 'tides' }, completion);
    expect(results).toHaveLength(1);
    expect(results[0]).toMatchObject({ status: 'upstream_error', error: 'Empty completion response' });
  });

  it('halts on a parse failure and keeps earlier results', async () => {
    const completion = scripted({ summary: 'ok', details: 'not json', items: '[]' });
    const results = await runChain(threeStepChain(), { topic: 'tides' }, completion);

    expect(results.map(r => r.status)).toEqual(['success', 'parse_error']);
    expect(results[1].rawResponse).toBe('not json');
    expect(results[1].error).toMatch(/^Malformed response: /);
    expect(completion).toHaveBeenCalledTimes(2);
  });

  it('raises before any completion when a binding is missing', async () => {
    const completion = scripted({});
    await expect(runChain(threeStepChain(), {}, completion)).rejects.toBeInstanceOf(MissingVariableError);
    expect(completion).not.toHaveBeenCalled();
  });

  it('records declared inputs the template never uses as warnings', async () => {
    const chain: Chain = { steps: [defineStep(tpl('about', 'About {topic}'), 'about', ['topic', 'extra'])] };
    const results = await runChain(chain, { topic: 't', extra: 'e' }, scripted({ about: 'fine' }));
    expect(results[0].status).toBe('success');
    expect(results[0].warnings).toEqual(["Binding 'extra' is not referenced by template 'about'"]);
  });

  it('reports initial bindings that no step reads on the first result', async () => {
    const chain: Chain = {
      steps: [
        defineStep(tpl('about', 'About {topic}'), 'about'),
        defineStep(tpl('more', 'More on {about}'), 'more')
      ]
    };
    const results = await runChain(chain, { topic: 't', tpoic: 'typo' }, scripted({ about: 'a', more: 'm' }));
    expect(results[0].warnings).toEqual(["Binding 'tpoic' is not referenced by any step"]);
    expect(results[1].warnings).toEqual([]);
  });

  it('hands the final bindings to onComplete', async () => {
    const seen: { board?: Blackboard } = {};
    await runChain(threeStepChain(), { topic: 'tides' }, scripted({ summary: 's', details: '{"a": 1}', items: '[]' }), {
      onComplete: bb => { seen.board = bb; }
    });
    const board = seen.board;
    if (!board) throw new Error('onComplete was not called');
    expect(read(board, 'details')).toEqual({ a: 1 });
    expect(board.get('details')?.source).toBe('details');
    expect(board.get('topic')?.source).toBe('initial');
  });

  it('writes each output and a combined summary to the output directory', async () => {
    dir = mkdtempSync(join(tmpdir(), 'prompt-chain-'));
    const completion = scripted({ summary: 's', details: 'broken', items: '[]' });
    await runChain(threeStepChain(), { topic: 'tides' }, completion, { outputDir: dir });

    expect(JSON.parse(readFileSync(join(dir, 'summary.json'), 'utf-8'))).toBe('s');
    const combined = JSON.parse(readFileSync(join(dir, 'combined_output.json'), 'utf-8'));
    expect(combined.topic).toBe('tides');
    expect(combined.summary).toBe('s');
    expect(combined.details).toBeUndefined();
    expect(combined._results.map((r: { status: string }) => r.status)).toEqual(['success', 'parse_error']);
  });

  it('keeps the results when the output directory cannot be written', async () => {
    dir = mkdtempSync(join(tmpdir(), 'prompt-chain-'));
    const blocker = join(dir, 'blocker');
    writeFileSync(blocker, 'not a directory');
    const completion = scripted({ summary: 's', details: '{}', items: '[]' });
    const results = await runChain(threeStepChain(), { topic: 'tides' }, completion, { outputDir: join(blocker, 'out') });
    expect(results.map(r => r.status)).toEqual(['success', 'success', 'success']);
  });
});
