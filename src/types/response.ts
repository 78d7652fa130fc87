import type { CandidateClassification } from './classification.js';
import type { GateResult, LoopCheck } from './gate.js';

export type PayloadStatus =
  | 'classified'
  | 'degraded'
  | 'escalation_required'
  | 'no_classification';

export interface EngineStats {
  provider_used: string | null;
  provider_switched: boolean;
  rounds: number;
  stop_reason: string;
  elapsed_ms: number;
  tool_stats: Record<string, number>;
  cost_usd: number;
  memory_hits: number;
}

export interface Escalation {
  reason: string;
  attempt_number: number;
  prior_codes: string[];
}

export interface FinalPayload {
  request_id: string;
  status: PayloadStatus;
  text: string;
  candidates: CandidateClassification[];
  blocking_issues: string[];
  audit: GateResult[];
  attempt: LoopCheck | null;
  escalation?: Escalation;
  engine: EngineStats;
  degraded_reasons: string[];
}

export interface ErrorResponse {
  request_id: string;
  error_code: string;
  message: string;
}
