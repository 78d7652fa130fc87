import { v4 as uuidv4 } from 'uuid';
import { hashObject } from '../crypto/hasher.js';
import type { AuditEntry } from '../crypto/audit-log.js';
import { errorMessage } from '../errors.js';
import { runGatePipeline, type PipelineOutcome } from '../gates/index.js';
import type { ProviderPair } from '../inference/types.js';
import type { Logger } from '../logger.js';
import { buildPrompt } from '../orchestrator/prompt.js';
import {
  ToolCallingOrchestrator,
  type OrchestratorLimits,
  type OrchestratorResult
} from '../orchestrator/tool-loop.js';
import { EMPTY_PAYLOAD, isExactHit, mergeMemory, parseResponse } from '../parser/response-parser.js';
import type { AttemptStore } from '../repository/attempt-store.js';
import type { MemoryStore } from '../repository/memory-store.js';
import type { ReferenceDataset } from '../repository/reference-dataset.js';
import { ToolDispatcher } from '../tools/dispatcher.js';
import type { ToolRegistry } from '../tools/registry.js';
import type {
  CandidateClassification,
  ClassificationRequest,
  EngineStats,
  Escalation,
  FinalPayload,
  GatePolicy,
  MemoryMatch,
  ParsedPayload,
  PayloadStatus
} from '../types/index.js';
import { renderReport } from './render.js';

export interface AuditSink {
  log(entry: AuditEntry): unknown;
}

export interface ServiceDependencies {
  registry: ToolRegistry;
  providers: ProviderPair;
  dataset: ReferenceDataset;
  attempts: AttemptStore;
  memory: MemoryStore;
  policy: GatePolicy;
  limits: Partial<OrchestratorLimits>;
  logger: Logger;
  audit?: AuditSink;
  clock?: () => number;
}

export interface ClassifyOptions {
  signal?: AbortSignal;
}

interface Inference {
  result: OrchestratorResult | null;
  parsed: ParsedPayload;
  toolStats: Record<string, number>;
}

function freezeRequest(request: ClassificationRequest): ClassificationRequest {
  return Object.freeze({
    ...request,
    lines: Object.freeze(request.lines.map(line => Object.freeze({ ...line })))
  });
}

export class ClassificationService {
  private orchestrator: ToolCallingOrchestrator;
  private logger: Logger;
  private clock: () => number;

  constructor(private deps: ServiceDependencies) {
    this.clock = deps.clock ?? Date.now;
    this.logger = deps.logger.child({ component: 'service' });
    this.orchestrator = new ToolCallingOrchestrator(
      deps.limits,
      deps.logger.child({ component: 'orchestrator' }),
      this.clock
    );
  }

  /**
   * Classify every line of the request. Always resolves; failures come back
   * as a `no_classification` payload.
   */
  async classify(request: ClassificationRequest, options: ClassifyOptions = {}): Promise<FinalPayload> {
    const startTime = this.clock();
    const requestId = request.request_id || uuidv4();

    try {
      return await this.process(freezeRequest(request), requestId, startTime, options);
    } catch (error) {
      this.logger.error({ request_id: requestId, err: errorMessage(error) }, 'Classification failed');
      return this.failure(requestId, startTime, [`unexpected_error: ${errorMessage(error)}`]);
    }
  }

  private async process(
    request: ClassificationRequest,
    requestId: string,
    startTime: number,
    options: ClassifyOptions
  ): Promise<FinalPayload> {
    if (request.lines.length === 0) {
      return this.failure(requestId, startTime, ['no_lines']);
    }

    const matches = await this.checkMemory(request);
    const exactHits = new Map([...matches].filter(([, match]) => isExactHit(match)));

    const inference: Inference =
      exactHits.size === request.lines.length
        ? { result: null, parsed: EMPTY_PAYLOAD, toolStats: {} }
        : await this.infer(request, requestId, exactHits, options);

    // A disconnected caller does not use up an attempt on the thread
    if (inference.result?.stop_reason === 'cancelled') {
      return this.failure(requestId, startTime, ['cancelled'], inference);
    }

    const candidates = mergeMemory(inference.parsed, request.lines, matches);

    if (inference.result && !inference.result.ok && candidates.length === 0) {
      return this.failure(requestId, startTime, ['provider_failure'], inference);
    }

    const outcome = await runGatePipeline(
      {
        candidates,
        subject: request.subject,
        message_id: request.message_id,
        render: (validated, loop) => renderReport(validated, inference.parsed.narrative, loop)
      },
      {
        dataset: this.deps.dataset,
        attempts: this.deps.attempts,
        policy: this.deps.policy,
        logger: this.deps.logger
      }
    );

    const payload = this.assemble(requestId, startTime, outcome, inference, exactHits.size);

    await this.applySideEffects(request, payload, outcome);

    this.logger.info(
      {
        request_id: requestId,
        status: payload.status,
        candidates: payload.candidates.length,
        elapsed_ms: payload.engine.elapsed_ms
      },
      'Request classified'
    );
    return payload;
  }

  private async checkMemory(request: ClassificationRequest): Promise<Map<number, MemoryMatch>> {
    const matches = new Map<number, MemoryMatch>();
    for (const [index, line] of request.lines.entries()) {
      try {
        const match = await this.deps.memory.lookup(line.description);
        if (match) matches.set(index, match);
      } catch (error) {
        this.logger.warn({ line: index + 1, err: errorMessage(error) }, 'Memory lookup failed');
      }
    }
    return matches;
  }

  private async infer(
    request: ClassificationRequest,
    requestId: string,
    exactHits: ReadonlyMap<number, MemoryMatch>,
    options: ClassifyOptions
  ): Promise<Inference> {
    const signal = options.signal ?? new AbortController().signal;
    const dispatcher = new ToolDispatcher(
      this.deps.registry,
      { requestId, cache: new Map(), signal },
      this.deps.logger.child({ component: 'dispatcher', request_id: requestId }),
      this.deps.limits.callTimeoutMs
    );

    const result = await this.orchestrator.run(buildPrompt(request, exactHits), dispatcher, this.deps.providers, {
      signal
    });

    return { result, parsed: parseResponse(result.text), toolStats: dispatcher.stats() };
  }

  private engineStats(startTime: number, inference: Inference | null, memoryHits: number): EngineStats {
    const result = inference?.result ?? null;
    return {
      provider_used: result?.provider_used ?? null,
      provider_switched: result?.provider_switched ?? false,
      rounds: result?.rounds.length ?? 0,
      stop_reason: result ? result.stop_reason : 'memory',
      elapsed_ms: this.clock() - startTime,
      tool_stats: inference?.toolStats ?? {},
      cost_usd: result?.cost_usd ?? 0,
      memory_hits: memoryHits
    };
  }

  private assemble(
    requestId: string,
    startTime: number,
    outcome: PipelineOutcome,
    inference: Inference,
    memoryHits: number
  ): FinalPayload {
    const { candidates, loop } = outcome;
    const degraded = degradedReasons(inference.result, outcome);

    let escalation: Escalation | undefined;
    if (loop?.escalate) {
      escalation = {
        reason: 'attempt_limit',
        attempt_number: loop.attempt_number,
        prior_codes: loop.prior_codes
      };
    } else if (outcome.blocked) {
      escalation = {
        reason: 'invalid_code',
        attempt_number: loop?.attempt_number ?? 1,
        prior_codes: loop?.prior_codes ?? []
      };
    }

    let status: PayloadStatus;
    if (escalation) status = 'escalation_required';
    else if (candidates.length === 0) status = 'no_classification';
    else if (degraded.length > 0) status = 'degraded';
    else status = 'classified';

    const payload: FinalPayload = {
      request_id: requestId,
      status,
      text: outcome.text,
      candidates,
      blocking_issues: outcome.blocking_issues,
      audit: outcome.audit,
      attempt: loop,
      engine: this.engineStats(startTime, inference, memoryHits),
      degraded_reasons: degraded
    };
    if (escalation) payload.escalation = escalation;
    return payload;
  }

  private failure(
    requestId: string,
    startTime: number,
    reasons: string[],
    inference: Inference | null = null
  ): FinalPayload {
    return {
      request_id: requestId,
      status: 'no_classification',
      text: '',
      candidates: [],
      blocking_issues: [],
      audit: [],
      attempt: null,
      engine: this.engineStats(startTime, inference, 0),
      degraded_reasons: reasons
    };
  }

  // Runs after every gate; a failure here never changes the payload
  private async applySideEffects(
    request: ClassificationRequest,
    payload: FinalPayload,
    outcome: PipelineOutcome
  ): Promise<void> {
    const { attempts, memory, audit, policy } = this.deps;
    const released = payload.candidates.filter(c => c.status === 'valid' || c.status === 'corrected');
    const codes = [...new Set(released.map(c => c.code))];

    if (outcome.loop?.allowed && outcome.loop.thread_key) {
      try {
        await attempts.recordCodes(outcome.loop.thread_key, codes);
      } catch (error) {
        this.logger.warn({ err: errorMessage(error) }, 'Recording thread codes failed');
      }
    }

    if (payload.status !== 'escalation_required') {
      for (const candidate of released.filter(isLearnable)) {
        const line = candidate.line_index !== undefined ? request.lines[candidate.line_index] : undefined;
        try {
          await memory.learn(line?.description ?? candidate.item, candidate.code, payload.engine.provider_used ?? 'model');
        } catch (error) {
          this.logger.warn({ code: candidate.code, err: errorMessage(error) }, 'Memory learning failed');
        }
      }
    }

    if (audit) {
      try {
        audit.log({
          request_id: payload.request_id,
          status: payload.status,
          thread_key: outcome.loop?.thread_key ?? '',
          codes,
          gates_evaluated: payload.audit.filter(r => r.evaluated).map(r => r.gate_name),
          gates_failed: payload.audit.filter(r => r.evaluated && !r.passed).map(r => r.gate_name),
          phrases_replaced: outcome.filter?.phrases_found.length ?? 0,
          input: JSON.stringify(request),
          output: payload.text,
          policyHash: hashObject(policy)
        });
      } catch (error) {
        this.logger.warn({ err: errorMessage(error) }, 'Audit log write failed');
      }
    }
  }
}

function isLearnable(candidate: CandidateClassification): boolean {
  return candidate.source === 'model' && candidate.status === 'valid' && candidate.item.trim().length > 0;
}

function degradedReasons(result: OrchestratorResult | null, outcome: PipelineOutcome): string[] {
  const reasons: string[] = [];
  if (result && result.stop_reason !== 'final') reasons.push(result.stop_reason);
  for (const gate of outcome.audit) {
    if (!gate.evaluated) reasons.push(`gate_unevaluated:${gate.gate_name}`);
  }
  if (outcome.candidates.some(c => c.status === 'invalid')) reasons.push('invalid_codes');
  if (outcome.candidates.some(c => c.confidence === 'low')) reasons.push('low_confidence');
  return reasons;
}
