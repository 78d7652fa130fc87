export interface ProductLine {
  description: string;
  quantity?: number | string;
  declared_origin?: string;
  declared_value?: number | string;
}

export interface ClassificationRequest {
  request_id?: string;
  lines: readonly ProductLine[];
  context: string;
  subject?: string;
  message_id?: string;
  // Deterministic pre-enrichment text prepared by the caller; passed to the model as-is
  enrichment?: string;
}

export interface PreparedPrompt {
  system: string;
  user: string;
}
