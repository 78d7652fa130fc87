import type { BackendConfig } from '../config.js';
import { AnthropicClient } from './anthropic-client.js';
import { OllamaClient } from './ollama-client.js';
import type { ModelClient, ProviderPair } from './types.js';

export function createModelClient(backend: BackendConfig): ModelClient {
  switch (backend.type) {
    case 'anthropic':
      return new AnthropicClient(backend);

    case 'ollama':
      return new OllamaClient(backend);
  }
}

// Holds the primary (cost-optimized) and secondary (fallback) backends
export class InferenceRouter {
  constructor(private pair: ProviderPair) {}

  static fromConfig(primary: BackendConfig, secondary?: BackendConfig): InferenceRouter {
    return new InferenceRouter({
      primary: createModelClient(primary),
      secondary: secondary ? createModelClient(secondary) : undefined
    });
  }

  providers(): ProviderPair {
    return this.pair;
  }

  getAvailableBackends(): string[] {
    const { primary, secondary } = this.pair;
    return secondary ? [primary.name, secondary.name] : [primary.name];
  }
}
