import { describe, it, expect, vi, afterEach } from 'vitest';
import { OpenAIChatCompletions } from '../llm/openai.js';
import { OpenAIResponses, extractText } from '../llm/openai_responses.js';
import { completionFromProvider, type LLMProvider } from '../llm/provider.js';
import { simulatedCompletion } from '../llm/simulated.js';
import { resolveCompletion } from '../llm/factory.js';
import { loadConfig } from '../config.js';
import { defineStep } from '../orchestrator/compiler.js';
import { UpstreamFailureError } from '../errors.js';
import type { CompletionArgs } from '../types/llm.js';
import type { CompletionContext, OutputShape } from '../types/contracts.js';

function stubFetch(status: number, body: unknown) {
  const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) =>
    new Response(typeof body === 'string' ? body : JSON.stringify(body), { status })
  );
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

function sentBody(fetchMock: ReturnType<typeof stubFetch>): Record<string, unknown> {
  return JSON.parse(String(fetchMock.mock.calls[0][1]?.body));
}

const ctx = (expectedShape: OutputShape): CompletionContext => ({
  step: defineStep({ name: 'probe', body: 'x', expectedShape }, 'probe'),
  expectedShape
});

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('OpenAIChatCompletions', () => {
  it('posts messages and normalises the reply', async () => {
    const fetchMock = stubFetch(200, {
      choices: [{ message: { content: 'hello' }, finish_reason: 'stop' }],
      usage: { prompt_tokens: 3, completion_tokens: 1, total_tokens: 4 }
    });
    const out = await new OpenAIChatCompletions('test-key', 'http://llm.local/v1').complete({
      model: 'm',
      messages: [{ role: 'user', content: 'hi' }]
    });

    expect(out).toEqual({
      content: 'hello',
      finish_reason: 'stop',
      usage: { prompt_tokens: 3, completion_tokens: 1, total_tokens: 4 }
    });
    expect(fetchMock.mock.calls[0][0]).toBe('http://llm.local/v1/chat/completions');
    expect(sentBody(fetchMock)).toMatchObject({ model: 'm', messages: [{ role: 'user', content: 'hi' }], temperature: 0, max_tokens: 800 });
  });

  it('raises UpstreamFailure on an HTTP error', async () => {
    stubFetch(429, 'rate limited');
    const call = new OpenAIChatCompletions('test-key').complete({ model: 'm', messages: [] });
    await expect(call).rejects.toBeInstanceOf(UpstreamFailureError);
    await expect(call).rejects.toMatchObject({ status: 429, message: 'LLM HTTP 429: rate limited' });
  });

  it('wraps transport failures', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => { throw new Error('connection reset'); }));
    await expect(new OpenAIChatCompletions('test-key').complete({ model: 'm', messages: [] }))
      .rejects.toMatchObject({ code: 'upstream_failure', message: 'LLM request failed: connection reset' });
  });
});

describe('OpenAIResponses', () => {
  it('prefers output_text and maps usage', async () => {
    const fetchMock = stubFetch(200, { output_text: 'done', status: 'completed', usage: { input_tokens: 2, output_tokens: 5 } });
    const out = await new OpenAIResponses('test-key', 'http://llm.local/v1').complete({
      model: 'm',
      messages: [{ role: 'user', content: 'go' }],
      response_format: { type: 'json_object' }
    });
    expect(out).toEqual({ content: 'done', finish_reason: 'stop', usage: { prompt_tokens: 2, completion_tokens: 5, total_tokens: 7 } });
    expect(fetchMock.mock.calls[0][0]).toBe('http://llm.local/v1/responses');
    expect(sentBody(fetchMock)).toMatchObject({ input: [{ role: 'user', content: 'go' }], text: { format: { type: 'json_object' } } });
  });

  it('reads text segments from the output message', () => {
    expect(extractText({
      output: [
        { type: 'reasoning' },
        { role: 'assistant', content: [{ type: 'output_text', text: '[1]' }] }
      ]
    })).toBe('[1]');
    expect(extractText({})).toBe('');
  });
});

describe('completionFromProvider', () => {
  function recording() {
    const calls: CompletionArgs[] = [];
    const provider: LLMProvider = {
      complete: async args => { calls.push(args); return { content: 'reply' }; }
    };
    return { calls, provider };
  }

  it('sends the prompt as one user message and requests JSON mode for objects', async () => {
    const { calls, provider } = recording();
    const fn = completionFromProvider(provider, { model: 'm', temperature: 0.4, maxTokens: 50, timeoutMs: 1000 });

    expect(await fn('prompt text', ctx('json_object'))).toBe('reply');
    expect(calls[0]).toEqual({
      model: 'm',
      messages: [{ role: 'user', content: 'prompt text' }],
      temperature: 0.4,
      max_tokens: 50,
      timeout_ms: 1000,
      response_format: { type: 'json_object' }
    });
  });

  it('leaves the response format alone for arrays and text', async () => {
    const { calls, provider } = recording();
    const fn = completionFromProvider(provider, { model: 'm' });
    await fn('a', ctx('json_array'));
    await fn('b', ctx('plain_text'));
    expect(calls.map(c => c.response_format)).toEqual([undefined, undefined]);
  });
});

describe('simulated completion', () => {
  it('returns output matching each shape', async () => {
    expect(await simulatedCompletion('p', ctx('plain_text'))).toBe('Simulated output for probe');
    expect(JSON.parse(await simulatedCompletion('p', ctx('json_object')))).toEqual({ simulated: true, step: 'probe' });
    expect(JSON.parse(await simulatedCompletion('p', ctx('json_array')))).toEqual([{ simulated: true, step: 'probe' }]);
  });

  it('is chosen when no key is configured or simulation is forced', () => {
    expect(resolveCompletion(loadConfig({})).source).toBe('simulated');
    expect(resolveCompletion(loadConfig({ OPENAI_API_KEY: 'test-key' }), true).source).toBe('simulated');
    expect(resolveCompletion(loadConfig({ OPENAI_API_KEY: 'test-key' })).source).toBe('live');
  });
});
