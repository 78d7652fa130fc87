export { validateCodes, pickSibling, type CodeValidationOutcome } from './gate1-code.js';
export { checkLoop, computeThreadKey, normalizeSubject } from './gate2-loop.js';
export { filterPhrases, BANNED_PHRASES } from './gate3-phrases.js';

import { errorMessage } from '../errors.js';
import type { Logger } from '../logger.js';
import type { AttemptStore } from '../repository/attempt-store.js';
import type { ReferenceDataset } from '../repository/reference-dataset.js';
import type {
  CandidateClassification,
  FilterOutcome,
  GateName,
  GatePolicy,
  GateResult,
  LoopCheck
} from '../types/index.js';
import { validateCodes } from './gate1-code.js';
import { checkLoop } from './gate2-loop.js';
import { filterPhrases } from './gate3-phrases.js';

export interface GateDependencies {
  dataset: ReferenceDataset;
  attempts: AttemptStore;
  policy: GatePolicy;
  logger: Logger;
}

export interface PipelineInput {
  candidates: CandidateClassification[];
  subject?: string;
  message_id?: string;
  // Produces the report text from the validated candidates
  render(candidates: readonly CandidateClassification[], loop: LoopCheck | null): string;
}

export interface PipelineOutcome {
  candidates: CandidateClassification[];
  text: string;
  audit: GateResult[];
  loop: LoopCheck | null;
  filter: FilterOutcome | null;
  blocking_issues: string[];
  blocked: boolean;
}

function unevaluated(gate: GateName, error: unknown): GateResult {
  return {
    gate_name: gate,
    evaluated: false,
    passed: true,
    blocking: false,
    findings: [],
    error: errorMessage(error)
  };
}

/**
 * Code validation, loop breaker and content filter, in that order. A gate
 * that throws is recorded as unevaluated and the next one still runs.
 */
export async function runGatePipeline(input: PipelineInput, deps: GateDependencies): Promise<PipelineOutcome> {
  const { dataset, attempts, policy } = deps;
  const logger = deps.logger.child({ component: 'gates' });
  const audit: GateResult[] = [];
  const blockingIssues: string[] = [];
  const candidates = input.candidates;

  // Stage A
  try {
    const outcome = await validateCodes(candidates, dataset, policy);
    const invalid = outcome.findings.some(f => f.kind === 'invalid' || f.kind === 'missing_code');
    blockingIssues.push(...outcome.blocking_issues);
    audit.push({
      gate_name: 'code_validation',
      evaluated: true,
      passed: !invalid,
      blocking: invalid && policy.block_on_invalid_code,
      findings: outcome.findings
    });
    if (outcome.findings.length > 0) {
      logger.info({ findings: outcome.findings.length, corrected: outcome.any_corrected }, 'Code validation findings');
    }
  } catch (error) {
    logger.warn({ err: errorMessage(error) }, 'Code validation gate failed open');
    audit.push(unevaluated('code_validation', error));
  }

  // Stage B
  let loop: LoopCheck | null = null;
  try {
    loop = await checkLoop(input.subject, input.message_id, attempts, policy);
    audit.push({
      gate_name: 'loop_breaker',
      evaluated: true,
      passed: loop.allowed,
      blocking: loop.escalate,
      findings: loop.escalate
        ? [
            {
              kind: 'escalation',
              message: `Attempt ${loop.attempt_number} exceeds the limit of ${policy.max_attempts}`
            }
          ]
        : []
    });
    if (loop.escalate) {
      logger.warn({ thread_key: loop.thread_key, attempt: loop.attempt_number }, 'Loop breaker escalation');
    }
  } catch (error) {
    logger.warn({ err: errorMessage(error) }, 'Loop breaker gate failed open');
    audit.push(unevaluated('loop_breaker', error));
  }

  const rendered = input.render(candidates, loop);

  // Stage C
  let filter: FilterOutcome | null = null;
  let text = rendered;
  try {
    filter = filterPhrases(rendered, policy);
    text = filter.cleaned_text;
    audit.push({
      gate_name: 'content_filter',
      evaluated: true,
      passed: !filter.was_modified,
      blocking: false,
      findings: filter.phrases_found.map(phrase => ({ kind: 'phrase_replaced', message: phrase }))
    });
    if (filter.was_modified) {
      logger.info({ phrases: filter.phrases_found }, 'Replaced banned phrases');
    }
  } catch (error) {
    logger.warn({ err: errorMessage(error) }, 'Content filter gate failed open');
    audit.push(unevaluated('content_filter', error));
  }

  return {
    candidates,
    text,
    audit,
    loop,
    filter,
    blocking_issues: blockingIssues,
    blocked: audit.some(r => r.blocking)
  };
}
