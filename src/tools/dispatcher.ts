import { ClassifierError, DeadlineError, errorMessage } from '../errors.js';
import type { Logger } from '../logger.js';
import { withDeadline } from '../utils/deadline.js';
import type { ToolRegistry } from './registry.js';
import type { ToolContext, ToolDefinition, ToolErrorCode, ToolResult } from './types.js';

export const DEFAULT_TOOL_TIMEOUT_MS = 30_000;

export interface ExecuteOptions {
  timeoutMs?: number;
}

/**
 * Per-request view of the registry. Every outcome, including unknown tools
 * and thrown errors, comes back as a `ToolResult`.
 */
export class ToolDispatcher {
  private counts = new Map<string, number>();

  constructor(
    private registry: ToolRegistry,
    private ctx: ToolContext,
    private logger: Logger,
    private defaultTimeoutMs: number = DEFAULT_TOOL_TIMEOUT_MS
  ) {}

  definitions(): ToolDefinition[] {
    return this.registry.getDefinitions();
  }

  async execute(toolName: string, args: unknown, options: ExecuteOptions = {}): Promise<ToolResult> {
    const startTime = Date.now();
    this.counts.set(toolName, (this.counts.get(toolName) ?? 0) + 1);

    const tool = this.registry.get(toolName);
    if (!tool) {
      this.logger.warn({ tool: toolName }, 'Unknown tool requested');
      return failure(toolName, 'not_found', `Unknown tool: ${toolName}`, startTime);
    }

    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    try {
      const data = await withDeadline(
        toolName,
        timeoutMs,
        signal => tool.run(args, { ...this.ctx, signal }),
        this.ctx.signal
      );
      const duration = Date.now() - startTime;
      this.logger.debug({ tool: toolName, duration_ms: duration }, 'Tool completed');
      return { ok: true, tool: toolName, data, duration_ms: duration };
    } catch (error) {
      const code = errorCode(error);
      this.logger.warn({ tool: toolName, code, err: errorMessage(error) }, 'Tool failed');
      return failure(toolName, code, errorMessage(error), startTime);
    }
  }

  failure(toolName: string, code: ToolErrorCode, message: string): ToolResult {
    return failure(toolName, code, message, Date.now());
  }

  stats(): Record<string, number> {
    return Object.fromEntries(this.counts);
  }
}

function errorCode(error: unknown): ToolErrorCode {
  if (error instanceof DeadlineError) {
    return error.cancelled ? 'budget_exceeded' : 'timeout';
  }
  if (error instanceof ClassifierError && error.code === 'TOOL_INVALID_ARGUMENTS') {
    return 'invalid_arguments';
  }
  return 'execution_failed';
}

function failure(tool: string, code: ToolErrorCode, message: string, startTime: number): ToolResult {
  return { ok: false, tool, error: { code, message }, duration_ms: Date.now() - startTime };
}
