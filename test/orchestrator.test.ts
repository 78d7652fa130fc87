import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { ProviderUnavailableError } from '../src/errors.js';
import { ToolCallingOrchestrator, type OrchestratorLimits } from '../src/orchestrator/tool-loop.js';
import { buildPrompt } from '../src/orchestrator/prompt.js';
import { ToolDispatcher } from '../src/tools/dispatcher.js';
import { ToolRegistry } from '../src/tools/registry.js';
import type { CompletionRequest, ModelClient, ModelReply } from '../src/inference/types.js';
import { ScriptedClient, logger, toolCall, type Step } from './helpers.js';

const prompt = { system: 'system prompt', user: 'PRODUCT LINES:\n1. Espresso machine' };

function dispatcher(signal: AbortSignal = new AbortController().signal): ToolDispatcher {
  const registry = new ToolRegistry().register({
    name: 'echo',
    description: 'Echo a value',
    schema: z.object({ value: z.string() }),
    invoke: async args => ({ echo: args.value })
  });
  return new ToolDispatcher(registry, { requestId: 'req-1', cache: new Map(), signal }, logger);
}

function orchestrator(limits: Partial<OrchestratorLimits> = {}, clock?: () => number): ToolCallingOrchestrator {
  return new ToolCallingOrchestrator(limits, logger, clock);
}

const echo = (value: string) => toolCall('echo', { value });

// Replays `lead` and then never answers again
class StallingClient implements ModelClient {
  readonly model = 'stalling-model';
  private calls = 0;
  private scripted: ScriptedClient;

  constructor(
    readonly name: string,
    private lead: Step[] = []
  ) {
    this.scripted = new ScriptedClient(name, lead);
  }

  complete(request: CompletionRequest): Promise<ModelReply> {
    if (this.calls++ < this.lead.length) return this.scripted.complete(request);
    return new Promise<never>(() => {});
  }
}

describe('ToolCallingOrchestrator', () => {
  it('returns the final text when the model calls no tools', async () => {
    const primary = new ScriptedClient('primary', [{ text: 'done' }]);
    const result = await orchestrator().run(prompt, dispatcher(), { primary });

    expect(result).toMatchObject({
      ok: true,
      text: 'done',
      stop_reason: 'final',
      degraded: false,
      provider_used: 'primary',
      provider_switched: false
    });
    expect(result.rounds).toEqual([{ round_index: 0, provider_used: 'primary', tool_invocations: [], emitted_text: 'done' }]);
  });

  it('numbers rounds contiguously and feeds tool results back', async () => {
    const primary = new ScriptedClient('primary', [
      { tool_calls: [echo('a')] },
      { text: 'checking', tool_calls: [echo('b')] },
      { text: 'final answer' }
    ]);
    const d = dispatcher();
    const result = await orchestrator().run(prompt, d, { primary });

    expect(result.rounds.map(r => r.round_index)).toEqual([0, 1, 2]);
    expect(result.rounds[0]?.tool_invocations[0]?.result).toMatchObject({ ok: true, data: { echo: 'a' } });
    expect(primary.requests[1]?.transcript.map(e => e.role)).toEqual(['user', 'assistant', 'tool']);
    expect(primary.requests[2]?.transcript).toHaveLength(5);
    expect(result.text).toBe('final answer');
    expect(d.stats()).toEqual({ echo: 2 });
  });

  it('freezes recorded rounds', async () => {
    const primary = new ScriptedClient('primary', [{ tool_calls: [echo('a')] }, { text: 'done' }]);
    const result = await orchestrator().run(prompt, dispatcher(), { primary });

    expect(Object.isFrozen(result.rounds)).toBe(true);
    expect(Object.isFrozen(result.rounds[0])).toBe(true);
    expect(Object.isFrozen(result.rounds[0]?.tool_invocations)).toBe(true);
  });

  it('stops at max rounds with the last text as degraded', async () => {
    const primary = new ScriptedClient('primary', () => ({ text: 'thinking', tool_calls: [echo('x')] }));
    const d = dispatcher();
    const result = await orchestrator({ maxRounds: 3 }).run(prompt, d, { primary });

    expect(result).toMatchObject({ ok: true, stop_reason: 'max_rounds', degraded: true, text: 'thinking' });
    expect(result.rounds).toHaveLength(3);
    expect(d.stats()).toEqual({ echo: 3 });
  });

  it('answers calls beyond the per-round limit with round_limit', async () => {
    const primary = new ScriptedClient('primary', [
      { tool_calls: [echo('a'), echo('b'), echo('c')] },
      { text: 'done' }
    ]);
    const d = dispatcher();
    const result = await orchestrator({ maxToolsPerRound: 2 }).run(prompt, d, { primary });

    const codes = result.rounds[0]?.tool_invocations.map(i => (i.result.ok ? 'ok' : i.result.error.code));
    expect(codes).toEqual(['ok', 'ok', 'round_limit']);
    expect(d.stats()).toEqual({ echo: 2 });
  });

  it('stops when the time budget runs out', async () => {
    let now = 0;
    const primary = new ScriptedClient(
      'primary',
      [
        { tool_calls: [echo('a')] },
        { text: 'partial', tool_calls: [echo('b')] }
      ],
      { onCall: () => (now += 70_000) }
    );
    const result = await orchestrator({ timeBudgetMs: 120_000, callTimeoutMs: 60_000 }, () => now).run(
      prompt,
      dispatcher(),
      { primary }
    );

    expect(result).toMatchObject({ stop_reason: 'time_budget', degraded: true, text: 'partial', elapsed_ms: 140_000 });
    expect(result.rounds).toHaveLength(2);
    const late = result.rounds[1]?.tool_invocations[0]?.result;
    expect(late?.ok === false && late.error.code).toBe('budget_exceeded');
    expect(primary.requests).toHaveLength(2);
  });

  it('switches to the secondary provider once on a round 0 failure', async () => {
    const primary = new ScriptedClient('primary', [new ProviderUnavailableError('primary', 'connection refused')]);
    const secondary = new ScriptedClient('secondary', [{ text: 'from secondary' }]);
    const result = await orchestrator().run(prompt, dispatcher(), { primary, secondary });

    expect(result).toMatchObject({
      ok: true,
      text: 'from secondary',
      provider_used: 'secondary',
      provider_switched: true,
      errors: ['primary: connection refused']
    });
    expect(result.rounds.map(r => r.provider_used)).toEqual(['secondary']);
    expect(secondary.requests[0]?.transcript).toEqual([{ role: 'user', content: prompt.user }]);
  });

  it('switches provider when the primary call times out at round 0', async () => {
    const primary = new StallingClient('primary');
    const secondary = new ScriptedClient('secondary', [{ text: 'ok' }]);
    const result = await orchestrator({ callTimeoutMs: 100, timeBudgetMs: 1000 }).run(prompt, dispatcher(), {
      primary,
      secondary
    });

    expect(result).toMatchObject({
      ok: true,
      text: 'ok',
      stop_reason: 'final',
      provider_used: 'secondary',
      provider_switched: true,
      errors: ['primary round 0 did not finish within 100ms']
    });
    expect(result.elapsed_ms).toBeGreaterThanOrEqual(90);
    expect(result.elapsed_ms).toBeLessThan(1000);
  });

  it('returns the earlier text when a later call times out', async () => {
    const primary = new StallingClient('primary', [{ text: 'partial', tool_calls: [echo('a')] }]);
    const secondary = new ScriptedClient('secondary', [{ text: 'unused' }]);
    const result = await orchestrator({ callTimeoutMs: 100, timeBudgetMs: 1000 }).run(prompt, dispatcher(), {
      primary,
      secondary
    });

    expect(result).toMatchObject({ ok: true, stop_reason: 'provider_error', degraded: true, text: 'partial' });
    expect(result.errors).toEqual(['primary round 1 did not finish within 100ms']);
    expect(secondary.requests).toHaveLength(0);
  });

  it('cuts a hanging call short at the remaining time budget', async () => {
    const primary = new StallingClient('primary', [{ text: 'partial', tool_calls: [echo('a')] }]);
    const result = await orchestrator({ callTimeoutMs: 5000, timeBudgetMs: 150 }).run(prompt, dispatcher(), {
      primary
    });

    expect(result.stop_reason).toBe('provider_error');
    expect(result.errors[0]).toMatch(/^primary round 1 did not finish within \d+ms$/);
    expect(result.elapsed_ms).toBeLessThan(1000);
  });

  it('fails when both providers fail at round 0', async () => {
    const primary = new ScriptedClient('primary', [new Error('down')]);
    const secondary = new ScriptedClient('secondary', [new Error('also down')]);
    const result = await orchestrator().run(prompt, dispatcher(), { primary, secondary });

    expect(result).toMatchObject({
      ok: false,
      text: '',
      stop_reason: 'failure',
      provider_used: null,
      provider_switched: true,
      errors: ['down', 'also down']
    });
  });

  it('fails without a secondary provider', async () => {
    const primary = new ScriptedClient('primary', [new Error('down')]);
    const result = await orchestrator().run(prompt, dispatcher(), { primary });
    expect(result.ok).toBe(false);
    expect(result.provider_switched).toBe(false);
  });

  it('does not switch after round 0 and keeps the accumulated text', async () => {
    const primary = new ScriptedClient('primary', [{ text: 'looking', tool_calls: [echo('a')] }, new Error('dropped')]);
    const secondary = new ScriptedClient('secondary', [{ text: 'unused' }]);
    const result = await orchestrator().run(prompt, dispatcher(), { primary, secondary });

    expect(result).toMatchObject({ ok: true, stop_reason: 'provider_error', degraded: true, text: 'looking' });
    expect(secondary.requests).toHaveLength(0);
  });

  it('fails after round 0 when no text was produced', async () => {
    const primary = new ScriptedClient('primary', [{ tool_calls: [echo('a')] }, new Error('dropped')]);
    const result = await orchestrator().run(prompt, dispatcher(), { primary });
    expect(result.ok).toBe(false);
    expect(result.stop_reason).toBe('failure');
  });

  it('stops before calling a provider when already cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const primary = new ScriptedClient('primary', [{ text: 'never' }]);
    const result = await orchestrator().run(prompt, dispatcher(controller.signal), { primary }, { signal: controller.signal });

    expect(result.stop_reason).toBe('cancelled');
    expect(primary.requests).toHaveLength(0);
  });

  it('totals the cost of every call', async () => {
    const primary = new ScriptedClient('primary', [{ tool_calls: [echo('a')] }, { text: 'done' }], { costPerCall: 0.01 });
    const result = await orchestrator().run(prompt, dispatcher(), { primary });

    expect(result.cost_usd).toBe(0.02);
    expect(result.costs.primary).toMatchObject({ calls: 2, input_tokens: 20, output_tokens: 10 });
  });
});

describe('buildPrompt', () => {
  it('lists lines with details, context and memory-resolved lines', () => {
    const built = buildPrompt(
      {
        lines: [
          { description: 'Espresso machine', quantity: 2, declared_origin: 'IT' },
          { description: 'Cotton t-shirt' }
        ],
        context: 'Invoice 42',
        enrichment: 'Chapter 85 notes apply'
      },
      new Map([[1, { description: 'Cotton t-shirt', code: '6109100000', confidence: 0.95, level: 'exact' as const }]])
    );

    expect(built.user).toBe(
      [
        'PRODUCT LINES:',
        '1. Espresso machine (quantity: 2, origin: IT)',
        '2. Cotton t-shirt',
        '',
        'CONTEXT:',
        'Invoice 42',
        '',
        'REFERENCE NOTES:',
        'Chapter 85 notes apply',
        '',
        'ALREADY RESOLVED FROM MEMORY (do not classify again):',
        '2. 6109.10.0000'
      ].join('\n')
    );
    expect(built.system).toContain('check_memory');
  });
});
