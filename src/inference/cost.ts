import type { CallUsage } from './types.js';

export interface Pricing {
  // USD per million tokens
  input: number;
  output: number;
}

export function callCost(pricing: Pricing, inputTokens: number, outputTokens: number): number {
  return (inputTokens * pricing.input + outputTokens * pricing.output) / 1_000_000;
}

export interface ProviderTotals {
  calls: number;
  input_tokens: number;
  output_tokens: number;
  cost_usd: number;
  latency_ms: number;
}

// One ledger per request
export class CostLedger {
  private totals = new Map<string, ProviderTotals>();

  add(provider: string, usage: CallUsage): void {
    const current = this.totals.get(provider) ?? {
      calls: 0,
      input_tokens: 0,
      output_tokens: 0,
      cost_usd: 0,
      latency_ms: 0
    };
    this.totals.set(provider, {
      calls: current.calls + 1,
      input_tokens: current.input_tokens + usage.input_tokens,
      output_tokens: current.output_tokens + usage.output_tokens,
      cost_usd: current.cost_usd + usage.cost_usd,
      latency_ms: current.latency_ms + usage.latency_ms
    });
  }

  totalCost(): number {
    let sum = 0;
    for (const t of this.totals.values()) sum += t.cost_usd;
    return Number(sum.toFixed(6));
  }

  byProvider(): Record<string, ProviderTotals> {
    return Object.fromEntries(this.totals);
  }
}
