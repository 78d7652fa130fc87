import { descriptionTokens } from '../repository/memory-store.js';
import { formatCode, normalizeCode, type ReferenceDataset } from '../repository/reference-dataset.js';
import type {
  CandidateClassification,
  ConfidenceTier,
  GateFinding,
  GatePolicy,
  ReferenceRecord
} from '../types/index.js';

export interface CodeValidationOutcome {
  all_valid: boolean;
  any_corrected: boolean;
  blocking_issues: string[];
  findings: GateFinding[];
}

const DOWNGRADE: Record<ConfidenceTier, ConfidenceTier> = {
  high: 'medium',
  medium: 'low',
  low: 'low'
};

function commonPrefixLength(a: string, b: string): number {
  let i = 0;
  while (i < a.length && i < b.length && a[i] === b[i]) i++;
  return i;
}

/**
 * Rank siblings by shared description words, then by how much of the
 * proposed code they keep, then by the lower code.
 */
export function pickSibling(
  candidate: CandidateClassification,
  proposed: string,
  siblings: readonly ReferenceRecord[]
): ReferenceRecord | undefined {
  const words = descriptionTokens(`${candidate.item} ${candidate.description}`);

  const scored = siblings.map(record => {
    const siblingWords = descriptionTokens(record.description);
    return {
      record,
      shared: [...words].filter(w => siblingWords.has(w)).length,
      prefix: commonPrefixLength(proposed, normalizeCode(record.code))
    };
  });

  scored.sort(
    (a, b) =>
      b.shared - a.shared ||
      b.prefix - a.prefix ||
      (a.record.code < b.record.code ? -1 : a.record.code > b.record.code ? 1 : 0)
  );
  return scored[0]?.record;
}

async function findSiblings(
  code: string,
  dataset: ReferenceDataset,
  policy: GatePolicy
): Promise<{ prefix: string; siblings: ReferenceRecord[] }> {
  const heading = code.length >= policy.sibling_prefix_length ? code.slice(0, policy.sibling_prefix_length) : '';
  if (heading) {
    const siblings = await dataset.searchPrefix(heading, policy.sibling_limit);
    if (siblings.length > 0) return { prefix: heading, siblings };
  }

  const chapter = code.length >= policy.broad_prefix_length ? code.slice(0, policy.broad_prefix_length) : '';
  if (chapter) {
    const siblings = await dataset.searchPrefix(chapter, policy.sibling_limit);
    if (siblings.length > 0) return { prefix: chapter, siblings };
  }

  return { prefix: heading || chapter, siblings: [] };
}

/**
 * Stage A. Every candidate ends up valid, corrected to an existing sibling,
 * or invalid with a reason. Candidates are updated in place.
 */
export async function validateCodes(
  candidates: CandidateClassification[],
  dataset: ReferenceDataset,
  policy: GatePolicy
): Promise<CodeValidationOutcome> {
  const outcome: CodeValidationOutcome = {
    all_valid: true,
    any_corrected: false,
    blocking_issues: [],
    findings: []
  };

  for (const [index, candidate] of candidates.entries()) {
    const label = `line ${(candidate.line_index ?? index) + 1}`;
    const code = normalizeCode(candidate.code);

    if (!code) {
      outcome.all_valid = false;
      candidate.status = 'invalid';
      candidate.confidence = 'low';
      candidate.validation_note = 'No code was proposed';
      outcome.blocking_issues.push(`No code proposed for ${label}`);
      outcome.findings.push({ kind: 'missing_code', message: `No code proposed for ${label}`, index });
      continue;
    }

    const record = await dataset.lookupByCode(code);
    if (record) {
      candidate.code = normalizeCode(record.code);
      candidate.canonical = record;
      if (!candidate.description) candidate.description = record.description;
      // A code corrected on an earlier pass stays marked as corrected
      if (candidate.corrected) {
        candidate.status = 'corrected';
      } else {
        candidate.status = 'valid';
        candidate.validation_note = `Code ${formatCode(code)} found in the reference dataset`;
      }
      continue;
    }

    outcome.all_valid = false;
    const { prefix, siblings } = await findSiblings(code, dataset, policy);
    const best = pickSibling(candidate, code, siblings);

    if (best) {
      const to = normalizeCode(best.code);
      candidate.corrected_from = code;
      candidate.corrected = true;
      candidate.code = to;
      candidate.description = best.description;
      candidate.canonical = best;
      candidate.confidence = DOWNGRADE[candidate.confidence];
      candidate.status = 'corrected';
      candidate.validation_note = `Code ${formatCode(code)} not found; corrected to ${formatCode(to)}`;
      outcome.any_corrected = true;
      outcome.findings.push({
        kind: 'corrected',
        message: candidate.validation_note,
        index,
        from: code,
        to
      });
      continue;
    }

    const reason = `Code ${formatCode(code)} (${label}) does not exist in the reference dataset and no candidates were found under ${prefix || 'its prefix'}`;
    candidate.status = 'invalid';
    candidate.confidence = 'low';
    candidate.validation_note = `Code ${formatCode(code)} not found in the reference dataset`;
    outcome.blocking_issues.push(reason);
    outcome.findings.push({ kind: 'invalid', message: reason, index, from: code });
  }

  return outcome;
}
