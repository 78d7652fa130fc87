export type GateName = 'code_validation' | 'loop_breaker' | 'content_filter';

export interface GateFinding {
  kind: string;
  message: string;
  index?: number;
  from?: string;
  to?: string;
}

export interface GateResult {
  gate_name: GateName;
  evaluated: boolean;
  passed: boolean;
  blocking: boolean;
  findings: GateFinding[];
  error?: string;
}

export interface ThreadAttemptRecord {
  thread_key: string;
  subject: string;
  attempts: number;
  prior_codes: string[];
  first_seen: string;
  last_seen: string;
}

export interface LoopCheck {
  allowed: boolean;
  attempt_number: number;
  escalate: boolean;
  prior_codes: string[];
  thread_key: string;
}

export interface FilterOutcome {
  cleaned_text: string;
  phrases_found: string[];
  was_modified: boolean;
}
