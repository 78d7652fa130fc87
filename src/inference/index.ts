export { InferenceRouter, createModelClient } from './router.js';
export { AnthropicClient } from './anthropic-client.js';
export { OllamaClient } from './ollama-client.js';
export { CostLedger, callCost, type Pricing, type ProviderTotals } from './cost.js';
export type * from './types.js';
