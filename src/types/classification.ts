export type ConfidenceTier = 'high' | 'medium' | 'low';

export type CandidateStatus = 'unchecked' | 'valid' | 'corrected' | 'invalid';

export interface ReferenceRecord {
  code: string;
  description: string;
  duty_rate?: string;
}

export interface CandidateClassification {
  line_index?: number;
  item: string;
  code: string;
  description: string;
  confidence: ConfidenceTier;
  source: 'model' | 'memory';
  reasoning: string;
  corrected_from?: string;
  corrected?: boolean;
  status?: CandidateStatus;
  validation_note?: string;
  canonical?: ReferenceRecord;
}

export interface MemoryMatch {
  description: string;
  code: string;
  confidence: number;
  level: 'exact' | 'partial';
}

export interface ParsedPayload {
  candidates: CandidateClassification[];
  narrative: string;
}
