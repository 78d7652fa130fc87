import Anthropic from '@anthropic-ai/sdk';
import { ProviderUnavailableError, errorMessage } from '../errors.js';
import type { BackendConfig } from '../config.js';
import { callCost } from './cost.js';
import type {
  CallOptions,
  CompletionRequest,
  ModelClient,
  ModelReply,
  ToolCall,
  TranscriptEntry
} from './types.js';

export class AnthropicClient implements ModelClient {
  readonly name: string;
  readonly model: string;
  private client?: Anthropic;

  constructor(private backend: BackendConfig, client?: Anthropic) {
    this.name = backend.name;
    this.model = backend.model;
    this.client = client;
  }

  // Created on first use so a missing API key fails the call, not startup
  private sdk(): Anthropic {
    this.client ??= new Anthropic(this.backend.base_url ? { baseURL: this.backend.base_url } : {});
    return this.client;
  }

  async complete(request: CompletionRequest, options: CallOptions): Promise<ModelReply> {
    const startTime = Date.now();

    let response: Anthropic.Message;
    try {
      response = await this.sdk().messages.create(
        {
          model: this.backend.model,
          max_tokens: this.backend.max_tokens,
          temperature: this.backend.temperature,
          system: request.system,
          tools: request.tools.map(tool => ({
            name: tool.name,
            description: tool.description,
            input_schema: tool.parameters
          })),
          messages: request.transcript.map(toMessageParam)
        },
        { signal: options.signal, timeout: options.timeoutMs, maxRetries: 0 }
      );
    } catch (error) {
      throw new ProviderUnavailableError(this.name, errorMessage(error), { cause: error });
    }

    const textParts: string[] = [];
    const toolCalls: ToolCall[] = [];
    for (const block of response.content) {
      if (block.type === 'text') {
        textParts.push(block.text);
      } else if (block.type === 'tool_use') {
        toolCalls.push({ id: block.id, name: block.name, arguments: asArguments(block.input) });
      }
    }

    const inputTokens = response.usage.input_tokens;
    const outputTokens = response.usage.output_tokens;

    return {
      text: textParts.join('\n'),
      tool_calls: toolCalls,
      stop_reason: response.stop_reason ?? 'unknown',
      model: response.model,
      usage: {
        input_tokens: inputTokens,
        output_tokens: outputTokens,
        cost_usd: callCost(this.backend.pricing, inputTokens, outputTokens),
        latency_ms: Date.now() - startTime
      }
    };
  }
}

export function toMessageParam(entry: TranscriptEntry): Anthropic.MessageParam {
  switch (entry.role) {
    case 'user':
      return { role: 'user', content: entry.content };

    case 'assistant': {
      const content: Array<Anthropic.TextBlockParam | Anthropic.ToolUseBlockParam> = [];
      if (entry.text) {
        content.push({ type: 'text', text: entry.text });
      }
      for (const call of entry.tool_calls) {
        content.push({ type: 'tool_use', id: call.id, name: call.name, input: call.arguments });
      }
      return { role: 'assistant', content };
    }

    case 'tool':
      return {
        role: 'user',
        content: entry.results.map(r => ({
          type: 'tool_result' as const,
          tool_use_id: r.call_id,
          content: JSON.stringify(r.result.ok ? r.result.data : { error: r.result.error }),
          is_error: !r.result.ok
        }))
      };
  }
}

export function asArguments(input: unknown): Record<string, unknown> {
  if (input !== null && typeof input === 'object' && !Array.isArray(input)) {
    return Object.fromEntries(Object.entries(input));
  }
  return {};
}
