import { DeadlineError, errorMessage } from '../errors.js';
import { CostLedger, type ProviderTotals } from '../inference/cost.js';
import type {
  ModelClient,
  ModelReply,
  ProviderPair,
  ToolResultMessage,
  TranscriptEntry
} from '../inference/types.js';
import type { Logger } from '../logger.js';
import type { ToolDispatcher } from '../tools/dispatcher.js';
import type { ToolResult } from '../tools/types.js';
import type { PreparedPrompt } from '../types/index.js';
import { withDeadline } from '../utils/deadline.js';

export interface OrchestratorLimits {
  maxRounds: number;
  maxToolsPerRound: number;
  timeBudgetMs: number;
  callTimeoutMs: number;
}

export const DEFAULT_LIMITS: OrchestratorLimits = {
  maxRounds: 8,
  maxToolsPerRound: 6,
  timeBudgetMs: 120_000,
  callTimeoutMs: 60_000
};

export interface ToolInvocation {
  readonly tool_name: string;
  readonly arguments: Readonly<Record<string, unknown>>;
  readonly result: ToolResult;
  readonly duration_ms: number;
}

export interface ToolCallRound {
  readonly round_index: number;
  readonly provider_used: string;
  readonly tool_invocations: readonly ToolInvocation[];
  readonly emitted_text: string;
}

export type StopReason =
  | 'final'
  | 'time_budget'
  | 'max_rounds'
  | 'cancelled'
  | 'provider_error'
  | 'failure';

export interface OrchestratorResult {
  ok: boolean;
  text: string;
  stop_reason: StopReason;
  degraded: boolean;
  rounds: readonly ToolCallRound[];
  provider_used: string | null;
  provider_switched: boolean;
  elapsed_ms: number;
  cost_usd: number;
  costs: Record<string, ProviderTotals>;
  errors: string[];
}

export interface RunOptions {
  signal?: AbortSignal;
}

interface LoopState {
  startTime: number;
  provider: ModelClient;
  switched: boolean;
  rounds: ToolCallRound[];
  lastText: string;
  errors: string[];
  ledger: CostLedger;
}

/**
 * Bounded multi-round tool-calling loop. Time is read from `clock` so tests
 * can drive the budget without waiting.
 */
export class ToolCallingOrchestrator {
  private limits: OrchestratorLimits;

  constructor(
    limits: Partial<OrchestratorLimits>,
    private logger: Logger,
    private clock: () => number = Date.now
  ) {
    this.limits = { ...DEFAULT_LIMITS, ...limits };
  }

  async run(
    prompt: PreparedPrompt,
    dispatcher: ToolDispatcher,
    providers: ProviderPair,
    options: RunOptions = {}
  ): Promise<OrchestratorResult> {
    const { maxRounds, maxToolsPerRound, timeBudgetMs, callTimeoutMs } = this.limits;
    const signal = options.signal;
    const tools = dispatcher.definitions();

    const state: LoopState = {
      startTime: this.clock(),
      provider: providers.primary,
      switched: false,
      rounds: [],
      lastText: '',
      errors: [],
      ledger: new CostLedger()
    };

    let transcript: TranscriptEntry[] = [{ role: 'user', content: prompt.user }];
    let roundIndex = 0;

    while (roundIndex < maxRounds) {
      if (signal?.aborted) {
        return this.finish(state, 'cancelled', state.lastText);
      }
      const elapsed = this.clock() - state.startTime;
      if (elapsed >= timeBudgetMs) {
        return this.finish(state, 'time_budget', state.lastText);
      }

      const timeoutMs = Math.min(callTimeoutMs, timeBudgetMs - elapsed);
      this.logger.debug({ round: roundIndex, provider: state.provider.name, timeout_ms: timeoutMs }, 'Round started');

      let reply: ModelReply;
      try {
        const provider = state.provider;
        const request = { system: prompt.system, transcript: [...transcript], tools };
        reply = await withDeadline(
          `${provider.name} round ${roundIndex}`,
          timeoutMs,
          callSignal => provider.complete(request, { signal: callSignal, timeoutMs }),
          signal
        );
      } catch (error) {
        if (error instanceof DeadlineError && error.cancelled) {
          return this.finish(state, 'cancelled', state.lastText);
        }

        state.errors.push(errorMessage(error));
        this.logger.warn({ round: roundIndex, provider: state.provider.name, err: errorMessage(error) }, 'Provider call failed');

        if (roundIndex === 0) {
          if (!state.switched && providers.secondary) {
            this.logger.info(
              { from: state.provider.name, to: providers.secondary.name },
              'Switching provider'
            );
            state.provider = providers.secondary;
            state.switched = true;
            transcript = [{ role: 'user', content: prompt.user }];
            continue;
          }
          return this.fail(state);
        }

        return state.lastText ? this.finish(state, 'provider_error', state.lastText) : this.fail(state);
      }

      state.ledger.add(state.provider.name, reply.usage);
      if (reply.text.trim()) {
        state.lastText = reply.text;
      }

      if (reply.tool_calls.length === 0) {
        state.rounds.push(freezeRound(roundIndex, state.provider.name, [], reply.text));
        return this.finish(state, 'final', reply.text || state.lastText);
      }

      transcript.push({ role: 'assistant', text: reply.text, tool_calls: reply.tool_calls });

      const invocations: ToolInvocation[] = [];
      const results: ToolResultMessage[] = [];
      for (const [position, call] of reply.tool_calls.entries()) {
        let result: ToolResult;
        const remaining = timeBudgetMs - (this.clock() - state.startTime);

        if (position >= maxToolsPerRound) {
          result = dispatcher.failure(call.name, 'round_limit', `At most ${maxToolsPerRound} tool calls per round`);
        } else if (signal?.aborted || remaining <= 0) {
          result = dispatcher.failure(call.name, 'budget_exceeded', 'Time budget exhausted');
        } else {
          result = await dispatcher.execute(call.name, call.arguments, {
            timeoutMs: Math.min(callTimeoutMs, remaining)
          });
        }

        invocations.push(
          Object.freeze({
            tool_name: call.name,
            arguments: Object.freeze({ ...call.arguments }),
            result,
            duration_ms: result.duration_ms
          })
        );
        results.push({ call_id: call.id, name: call.name, result });
      }

      transcript.push({ role: 'tool', results });
      state.rounds.push(freezeRound(roundIndex, state.provider.name, invocations, reply.text));
      roundIndex++;
    }

    return this.finish(state, 'max_rounds', state.lastText);
  }

  private finish(state: LoopState, reason: StopReason, text: string): OrchestratorResult {
    const result = this.result(state, reason, text);
    this.logger.info(
      { stop_reason: reason, rounds: result.rounds.length, provider: result.provider_used, elapsed_ms: result.elapsed_ms },
      'Tool loop finished'
    );
    return result;
  }

  private fail(state: LoopState): OrchestratorResult {
    this.logger.error({ errors: state.errors }, 'No provider produced a reply');
    return { ...this.result(state, 'failure', ''), ok: false, provider_used: null };
  }

  private result(state: LoopState, reason: StopReason, text: string): OrchestratorResult {
    return {
      ok: true,
      text,
      stop_reason: reason,
      degraded: reason !== 'final',
      rounds: Object.freeze([...state.rounds]),
      provider_used: state.provider.name,
      provider_switched: state.switched,
      elapsed_ms: this.clock() - state.startTime,
      cost_usd: state.ledger.totalCost(),
      costs: state.ledger.byProvider(),
      errors: [...state.errors]
    };
  }
}

function freezeRound(
  roundIndex: number,
  provider: string,
  invocations: ToolInvocation[],
  text: string
): ToolCallRound {
  return Object.freeze({
    round_index: roundIndex,
    provider_used: provider,
    tool_invocations: Object.freeze([...invocations]),
    emitted_text: text
  });
}
