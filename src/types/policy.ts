export interface GatePolicy {
  max_attempts: number;
  sibling_prefix_length: number;
  broad_prefix_length: number;
  sibling_limit: number;
  tracking_token_pattern: string;
  block_on_invalid_code: boolean;
  extra_phrases: string[];
  contact_line: {
    en: string;
    he: string;
  };
}

export interface AuditRecord {
  event_id: string;
  timestamp: string;
  request_id: string;
  status: string;
  thread_key: string;
  codes: string[];
  gates_evaluated: string[];
  gates_failed: string[];
  phrases_replaced: number;
  hash_input: string;
  hash_output: string;
  policy_hash: string;
  prev_record_hash: string;
  engine_version: string;
}
