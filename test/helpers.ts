import { fileURLToPath } from 'url';
import { parseConfig, toGatePolicy } from '../src/config.js';
import type {
  CompletionRequest,
  ModelClient,
  ModelReply,
  ToolCall
} from '../src/inference/types.js';
import { silentLogger } from '../src/logger.js';
import { SqliteAttemptStore } from '../src/repository/attempt-store.js';
import { initializeDatabase, type SqliteDatabase } from '../src/repository/database.js';
import { SqliteMemoryStore } from '../src/repository/memory-store.js';
import { SqliteReferenceDataset } from '../src/repository/reference-dataset.js';
import { loadReferenceFile } from '../src/repository/reference-loader.js';
import { checkMemoryTool, searchCodesTool, verifyCodeTool } from '../src/tools/builtin.js';
import { ToolRegistry } from '../src/tools/registry.js';
import type { GatePolicy } from '../src/types/index.js';

export const REFERENCE_FILE = fileURLToPath(new URL('./fixtures/reference.json', import.meta.url));

export const logger = silentLogger();

export function testPolicy(overrides: Partial<GatePolicy> = {}): GatePolicy {
  return { ...toGatePolicy(parseConfig({})), ...overrides };
}

export interface Stores {
  db: SqliteDatabase;
  dataset: SqliteReferenceDataset;
  memory: SqliteMemoryStore;
  attempts: SqliteAttemptStore;
}

export function createStores(): Stores {
  const db = initializeDatabase(':memory:');
  const dataset = new SqliteReferenceDataset(db);
  dataset.upsert(loadReferenceFile(REFERENCE_FILE));
  return {
    db,
    dataset,
    memory: new SqliteMemoryStore(db),
    attempts: new SqliteAttemptStore(db)
  };
}

export function builtinRegistry(stores: Stores): ToolRegistry {
  return new ToolRegistry()
    .register(checkMemoryTool(stores.memory))
    .register(verifyCodeTool(stores.dataset))
    .register(searchCodesTool(stores.dataset));
}

let callCounter = 0;

export function toolCall(name: string, args: Record<string, unknown>): ToolCall {
  callCounter += 1;
  return { id: `call-${callCounter}`, name, arguments: args };
}

export type Step = { text?: string; tool_calls?: ToolCall[] } | Error;

/**
 * Model client that replays a script. A function script is asked for the
 * step of every call, by call number starting at 0.
 */
export class ScriptedClient implements ModelClient {
  readonly model = 'scripted-model';
  readonly requests: CompletionRequest[] = [];
  private calls = 0;

  constructor(
    readonly name: string,
    private script: Step[] | ((call: number) => Step),
    private options: { costPerCall?: number; onCall?: () => void } = {}
  ) {}

  async complete(request: CompletionRequest): Promise<ModelReply> {
    this.requests.push({ ...request, transcript: [...request.transcript] });
    const call = this.calls++;
    this.options.onCall?.();

    const step = typeof this.script === 'function' ? this.script(call) : this.script[call];
    if (step === undefined) {
      throw new Error(`${this.name}: script exhausted at call ${call}`);
    }
    if (step instanceof Error) {
      throw step;
    }

    return {
      text: step.text ?? '',
      tool_calls: step.tool_calls ?? [],
      stop_reason: 'end_turn',
      model: this.model,
      usage: {
        input_tokens: 10,
        output_tokens: 5,
        cost_usd: this.options.costPerCall ?? 0,
        latency_ms: 1
      }
    };
  }
}

export function classificationJson(
  entries: Array<Record<string, unknown>>,
  summary = ''
): string {
  return '```json\n' + JSON.stringify({ classifications: entries, summary }) + '\n```';
}
