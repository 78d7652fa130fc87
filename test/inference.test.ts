import { describe, it, expect } from 'vitest';
import type { BackendConfig } from '../src/config.js';
import { ProviderUnavailableError } from '../src/errors.js';
import { toMessageParam } from '../src/inference/anthropic-client.js';
import { CostLedger, callCost } from '../src/inference/cost.js';
import { OllamaClient } from '../src/inference/ollama-client.js';
import { InferenceRouter } from '../src/inference/router.js';
import type { CompletionRequest } from '../src/inference/types.js';
import { ScriptedClient } from './helpers.js';

const backend: BackendConfig = {
  name: 'local',
  type: 'ollama',
  model: 'test-model',
  base_url: 'http://ollama.test',
  max_tokens: 1024,
  temperature: 0.2,
  pricing: { input: 3, output: 15 }
};

function fakeFetch(status: number, body: unknown) {
  const calls: Array<{ url: string; body: unknown }> = [];
  const impl: typeof fetch = async (input, init) => {
    calls.push({ url: String(input), body: JSON.parse(String(init?.body)) });
    return new Response(JSON.stringify(body), { status });
  };
  return { impl, calls };
}

const options = { signal: new AbortController().signal, timeoutMs: 1000 };

const request: CompletionRequest = {
  system: 'system prompt',
  transcript: [
    { role: 'user', content: 'classify' },
    { role: 'assistant', text: '', tool_calls: [{ id: 'call-1', name: 'verify_code', arguments: { code: '8516710000' } }] },
    {
      role: 'tool',
      results: [{ call_id: 'call-1', name: 'verify_code', result: { ok: true, tool: 'verify_code', data: { exists: true }, duration_ms: 1 } }]
    }
  ],
  tools: [{ name: 'verify_code', description: 'Check a code', parameters: { type: 'object', properties: {} } }]
};

describe('OllamaClient', () => {
  it('maps the transcript and normalizes tool calls and cost', async () => {
    const { impl, calls } = fakeFetch(200, {
      model: 'test-model',
      message: {
        role: 'assistant',
        content: '',
        tool_calls: [{ function: { name: 'search_codes', arguments: { prefix: '8516' } } }]
      },
      done_reason: 'stop',
      prompt_eval_count: 1000,
      eval_count: 500
    });
    const reply = await new OllamaClient(backend, impl).complete(request, options);

    expect(reply.tool_calls).toHaveLength(1);
    expect(reply.tool_calls[0]).toMatchObject({ name: 'search_codes', arguments: { prefix: '8516' } });
    expect(reply.usage).toMatchObject({ input_tokens: 1000, output_tokens: 500, cost_usd: 0.0105 });
    expect(reply.stop_reason).toBe('stop');

    expect(calls[0]?.url).toBe('http://ollama.test/api/chat');
    expect(calls[0]?.body).toMatchObject({
      model: 'test-model',
      stream: false,
      messages: [
        { role: 'system', content: 'system prompt' },
        { role: 'user', content: 'classify' },
        {
          role: 'assistant',
          content: '',
          tool_calls: [{ function: { name: 'verify_code', arguments: { code: '8516710000' } } }]
        },
        { role: 'tool', content: '{"exists":true}' }
      ],
      tools: [{ type: 'function', function: { name: 'verify_code' } }]
    });
  });

  it('raises ProviderUnavailableError on an HTTP error', async () => {
    const { impl } = fakeFetch(500, {});
    const call = new OllamaClient(backend, impl).complete(request, options);
    await expect(call).rejects.toBeInstanceOf(ProviderUnavailableError);
    await expect(call).rejects.toThrow('local: Ollama error: 500');
  });

  it('raises ProviderUnavailableError on a malformed body', async () => {
    const { impl } = fakeFetch(200, { unexpected: true });
    await expect(new OllamaClient(backend, impl).complete(request, options)).rejects.toThrow(
      'local: Malformed chat response'
    );
  });
});

describe('toMessageParam', () => {
  it('turns tool results into a user turn of tool_result blocks', () => {
    expect(
      toMessageParam({
        role: 'tool',
        results: [
          {
            call_id: 'call-9',
            name: 'search_codes',
            result: { ok: false, tool: 'search_codes', error: { code: 'timeout', message: 'slow' }, duration_ms: 5 }
          }
        ]
      })
    ).toEqual({
      role: 'user',
      content: [
        {
          type: 'tool_result',
          tool_use_id: 'call-9',
          content: '{"error":{"code":"timeout","message":"slow"}}',
          is_error: true
        }
      ]
    });
  });

  it('keeps text and tool_use blocks of an assistant turn', () => {
    expect(
      toMessageParam({ role: 'assistant', text: 'checking', tool_calls: [{ id: 'c1', name: 'check_memory', arguments: { description: 'kettle' } }] })
    ).toEqual({
      role: 'assistant',
      content: [
        { type: 'text', text: 'checking' },
        { type: 'tool_use', id: 'c1', name: 'check_memory', input: { description: 'kettle' } }
      ]
    });
  });
});

describe('cost', () => {
  it('prices calls per million tokens', () => {
    expect(callCost({ input: 3, output: 15 }, 1000, 500)).toBe(0.0105);
  });

  it('totals usage per provider', () => {
    const ledger = new CostLedger();
    ledger.add('local', { input_tokens: 10, output_tokens: 5, cost_usd: 0, latency_ms: 3 });
    ledger.add('claude', { input_tokens: 100, output_tokens: 50, cost_usd: 0.25, latency_ms: 7 });
    ledger.add('claude', { input_tokens: 100, output_tokens: 50, cost_usd: 0.5, latency_ms: 7 });

    expect(ledger.totalCost()).toBe(0.75);
    expect(ledger.byProvider().claude).toEqual({
      calls: 2,
      input_tokens: 200,
      output_tokens: 100,
      cost_usd: 0.75,
      latency_ms: 14
    });
  });
});

describe('InferenceRouter', () => {
  it('lists configured backends in order', () => {
    const router = InferenceRouter.fromConfig(backend, {
      ...backend,
      name: 'claude',
      type: 'anthropic',
      model: 'claude-test'
    });
    expect(router.getAvailableBackends()).toEqual(['local', 'claude']);
    expect(router.providers().primary).toBeInstanceOf(OllamaClient);
  });

  it('works without a secondary backend', () => {
    const router = new InferenceRouter({ primary: new ScriptedClient('only', []) });
    expect(router.getAvailableBackends()).toEqual(['only']);
    expect(router.providers().secondary).toBeUndefined();
  });
});
