import { formatCode } from '../repository/reference-dataset.js';
import type { CandidateClassification, LoopCheck } from '../types/index.js';

export function renderEscalation(loop: LoopCheck): string {
  const prior = loop.prior_codes.length > 0 ? loop.prior_codes.map(formatCode).join(', ') : 'none recorded';
  return [
    `Escalation required: attempt ${loop.attempt_number} for this thread exceeds the automated limit.`,
    `Previously proposed codes: ${prior}`,
    'Automated classification stopped; manual review is needed.'
  ].join('\n');
}

function renderCandidate(candidate: CandidateClassification, position: number): string[] {
  const lines = [`${(candidate.line_index ?? position) + 1}. ${candidate.item || '(unnamed item)'}`];

  const code = candidate.code ? formatCode(candidate.code) : 'none';
  lines.push(`   Code: ${code}${candidate.description ? ` - ${candidate.description}` : ''}`);
  lines.push(`   Confidence: ${candidate.confidence} (${candidate.source})`);
  if (candidate.canonical?.duty_rate) lines.push(`   Duty: ${candidate.canonical.duty_rate}`);
  if (candidate.validation_note) lines.push(`   Note: ${candidate.validation_note}`);
  if (candidate.reasoning) lines.push(`   Reasoning: ${candidate.reasoning}`);
  return lines;
}

/**
 * Plain-text report released to the caller; the content filter scans
 * exactly this text.
 */
export function renderReport(
  candidates: readonly CandidateClassification[],
  narrative: string,
  loop: LoopCheck | null
): string {
  const sections: string[] = [];

  if (loop?.escalate) {
    sections.push(renderEscalation(loop));
  }

  if (candidates.length === 0) {
    sections.push('No classification was produced.');
  } else {
    sections.push(candidates.flatMap(renderCandidate).join('\n'));
  }

  if (narrative.trim()) {
    sections.push(`Summary: ${narrative.trim()}`);
  }

  return sections.join('\n\n');
}
