import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { ProviderUnavailableError, errorMessage } from '../errors.js';
import type { BackendConfig } from '../config.js';
import { asArguments } from './anthropic-client.js';
import { callCost } from './cost.js';
import type {
  CallOptions,
  CompletionRequest,
  ModelClient,
  ModelReply,
  TranscriptEntry
} from './types.js';

const chatResponseSchema = z.object({
  model: z.string().optional(),
  message: z.object({
    role: z.string(),
    content: z.string().default(''),
    tool_calls: z
      .array(
        z.object({
          function: z.object({
            name: z.string(),
            arguments: z.unknown()
          })
        })
      )
      .optional()
  }),
  done_reason: z.string().optional(),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional()
});

interface OllamaMessage {
  role: 'system' | 'user' | 'assistant' | 'tool';
  content: string;
  tool_calls?: Array<{ function: { name: string; arguments: Record<string, unknown> } }>;
}

export class OllamaClient implements ModelClient {
  readonly name: string;
  readonly model: string;
  private baseUrl: string;

  constructor(private backend: BackendConfig, private fetchImpl: typeof fetch = fetch) {
    this.name = backend.name;
    this.model = backend.model;
    this.baseUrl = backend.base_url || 'http://localhost:11434';
  }

  async complete(request: CompletionRequest, options: CallOptions): Promise<ModelReply> {
    const startTime = Date.now();
    const messages: OllamaMessage[] = [
      { role: 'system', content: request.system },
      ...request.transcript.flatMap(toOllamaMessages)
    ];

    let body: unknown;
    try {
      const response = await this.fetchImpl(`${this.baseUrl}/api/chat`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        signal: options.signal,
        body: JSON.stringify({
          model: this.backend.model,
          messages,
          tools: request.tools.map(tool => ({ type: 'function', function: tool })),
          stream: false,
          options: {
            num_predict: this.backend.max_tokens,
            temperature: this.backend.temperature
          }
        })
      });

      if (!response.ok) {
        throw new Error(`Ollama error: ${response.status}`);
      }
      body = await response.json();
    } catch (error) {
      throw new ProviderUnavailableError(this.name, errorMessage(error), { cause: error });
    }

    const parsed = chatResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ProviderUnavailableError(this.name, 'Malformed chat response');
    }

    const data = parsed.data;
    const inputTokens = data.prompt_eval_count ?? 0;
    const outputTokens = data.eval_count ?? 0;

    return {
      text: data.message.content,
      // Ollama does not issue call ids
      tool_calls: (data.message.tool_calls ?? []).map(call => ({
        id: uuidv4(),
        name: call.function.name,
        arguments: asArguments(call.function.arguments)
      })),
      stop_reason: data.done_reason ?? 'stop',
      model: data.model ?? this.backend.model,
      usage: {
        input_tokens: inputTokens,
        output_tokens: outputTokens,
        cost_usd: callCost(this.backend.pricing, inputTokens, outputTokens),
        latency_ms: Date.now() - startTime
      }
    };
  }
}

function toOllamaMessages(entry: TranscriptEntry): OllamaMessage[] {
  switch (entry.role) {
    case 'user':
      return [{ role: 'user', content: entry.content }];

    case 'assistant':
      return [
        {
          role: 'assistant',
          content: entry.text,
          tool_calls: entry.tool_calls.map(call => ({
            function: { name: call.name, arguments: call.arguments }
          }))
        }
      ];

    case 'tool':
      return entry.results.map(r => ({
        role: 'tool',
        content: JSON.stringify(r.result.ok ? r.result.data : { error: r.result.error })
      }));
  }
}
