import type { ZodType, ZodTypeDef } from 'zod';

// A type alias so it stays assignable to SDK index-signature types
export type ToolParameters = {
  type: 'object';
  properties: Record<string, unknown>;
  required?: string[];
};

// What the model sees
export interface ToolDefinition {
  name: string;
  description: string;
  parameters: ToolParameters;
}

export interface ToolContext {
  requestId: string;
  // Request-scoped lookup cache; never shared across requests
  cache: Map<string, unknown>;
  signal: AbortSignal;
}

export interface Tool<TArgs = unknown> {
  name: string;
  description: string;
  schema: ZodType<TArgs, ZodTypeDef, unknown>;
  invoke(args: TArgs, ctx: ToolContext): Promise<unknown>;
}

export type ToolErrorCode =
  | 'not_found'
  | 'invalid_arguments'
  | 'execution_failed'
  | 'timeout'
  | 'budget_exceeded'
  | 'round_limit';

export type ToolResult =
  | { ok: true; tool: string; data: unknown; duration_ms: number }
  | { ok: false; tool: string; error: { code: ToolErrorCode; message: string }; duration_ms: number };
