/**
 * Tool registry for the capabilities the model may call
 */

import type { ZodTypeAny } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { ToolArgumentError } from '../errors.js';
import type { Tool, ToolContext, ToolDefinition, ToolParameters } from './types.js';

interface RegisteredTool {
  definition: ToolDefinition;
  run(args: unknown, ctx: ToolContext): Promise<unknown>;
}

export function toParameters(schema: ZodTypeAny): ToolParameters {
  const json: unknown = zodToJsonSchema(schema, { $refStrategy: 'none' });
  if (!isRecord(json) || !isRecord(json.properties)) {
    return { type: 'object', properties: {} };
  }

  const parameters: ToolParameters = { type: 'object', properties: { ...json.properties } };
  if (Array.isArray(json.required) && json.required.length > 0) {
    parameters.required = json.required.filter((r): r is string => typeof r === 'string');
  }
  return parameters;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export class ToolRegistry {
  private tools = new Map<string, RegisteredTool>();

  /**
   * Register a tool. Arguments are validated against its schema before
   * `invoke` sees them.
   */
  register<TArgs>(tool: Tool<TArgs>): this {
    if (this.tools.has(tool.name)) {
      throw new Error(`Tool already registered: ${tool.name}`);
    }

    this.tools.set(tool.name, {
      definition: {
        name: tool.name,
        description: tool.description,
        parameters: toParameters(tool.schema)
      },
      run: async (args, ctx) => {
        const parsed = tool.schema.safeParse(args);
        if (!parsed.success) {
          throw new ToolArgumentError(
            tool.name,
            parsed.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`)
          );
        }
        return tool.invoke(parsed.data, ctx);
      }
    });
    return this;
  }

  get(name: string): RegisteredTool | undefined {
    return this.tools.get(name);
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  getDefinitions(): ToolDefinition[] {
    return Array.from(this.tools.values()).map(t => t.definition);
  }

  getToolNames(): string[] {
    return Array.from(this.tools.keys()).sort();
  }
}
