import type { ToolDefinition, ToolResult } from '../tools/types.js';

export interface ToolCall {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

export interface ToolResultMessage {
  call_id: string;
  name: string;
  result: ToolResult;
}

export type TranscriptEntry =
  | { role: 'user'; content: string }
  | { role: 'assistant'; text: string; tool_calls: ToolCall[] }
  | { role: 'tool'; results: ToolResultMessage[] };

export interface CompletionRequest {
  system: string;
  transcript: readonly TranscriptEntry[];
  tools: ToolDefinition[];
}

export interface CallOptions {
  signal: AbortSignal;
  timeoutMs: number;
}

export interface CallUsage {
  input_tokens: number;
  output_tokens: number;
  cost_usd: number;
  latency_ms: number;
}

// Normalized reply shared by every backend
export interface ModelReply {
  text: string;
  tool_calls: ToolCall[];
  stop_reason: string;
  model: string;
  usage: CallUsage;
}

export interface ModelClient {
  readonly name: string;
  readonly model: string;
  complete(request: CompletionRequest, options: CallOptions): Promise<ModelReply>;
}

export interface ProviderPair {
  primary: ModelClient;
  secondary?: ModelClient;
}
