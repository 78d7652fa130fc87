import { z } from 'zod';
import { normalizeDescription } from '../repository/memory-store.js';
import { normalizeCode } from '../repository/reference-dataset.js';
import type {
  CandidateClassification,
  ConfidenceTier,
  MemoryMatch,
  ParsedPayload,
  ProductLine
} from '../types/index.js';

export const EMPTY_PAYLOAD: ParsedPayload = Object.freeze({ candidates: [], narrative: '' });

const ITEM_KEY_LENGTH = 50;
const EXACT_HIT_THRESHOLD = 0.9;

const TIER_WORDS: Record<string, ConfidenceTier> = {
  high: 'high',
  medium: 'medium',
  low: 'low',
  'גבוהה': 'high',
  'בינונית': 'medium',
  'נמוכה': 'low'
};

const codeField = z.union([z.string(), z.number()]).transform(v => normalizeCode(String(v)));

const modelCandidateSchema = z.object({
  line: z.coerce.number().int().positive().optional().catch(undefined),
  item: z.string().optional().catch(undefined),
  item_description: z.string().optional().catch(undefined),
  code: codeField.optional().catch(undefined),
  hs_code: codeField.optional().catch(undefined),
  description: z.string().optional().catch(undefined),
  hs_description: z.string().optional().catch(undefined),
  confidence: z.unknown().optional(),
  reasoning: z.string().optional().catch(undefined)
});

type ModelCandidate = z.infer<typeof modelCandidateSchema>;

export function parseConfidence(value: unknown): ConfidenceTier {
  if (typeof value === 'number' && Number.isFinite(value)) {
    const score = value > 1 ? value / 100 : value;
    if (score >= 0.8) return 'high';
    if (score >= 0.5) return 'medium';
    return 'low';
  }
  if (typeof value === 'string') {
    const word = TIER_WORDS[value.trim().toLowerCase()];
    if (word) return word;
    const numeric = Number.parseFloat(value);
    if (!Number.isNaN(numeric)) return parseConfidence(numeric);
  }
  return 'low';
}

/**
 * Find the JSON document in a model reply: a fenced block first, then the
 * outermost object or array, whichever opens first. Returns null when
 * nothing parses.
 */
export function extractJson(text: string): unknown {
  const fenced = text.match(/```(?:json)?\s*\n?([\s\S]*?)\n?\s*```/);
  if (fenced?.[1]) {
    const value = tryParse(fenced[1]);
    if (value !== null) return value;
  }

  const spans = [outerSpan(text, '{', '}'), outerSpan(text, '[', ']')]
    .filter((span): span is [number, number] => span !== null)
    .sort((a, b) => a[0] - b[0]);

  for (const [start, end] of spans) {
    const value = tryParse(text.slice(start, end + 1));
    if (value !== null) return value;
  }

  return null;
}

function outerSpan(text: string, open: string, close: string): [number, number] | null {
  const start = text.indexOf(open);
  const end = text.lastIndexOf(close);
  return start !== -1 && end > start ? [start, end] : null;
}

function tryParse(source: string): unknown {
  try {
    return JSON.parse(source);
  } catch {
    return null;
  }
}

// Complete innermost objects from a truncated reply
function salvageObjects(text: string): unknown[] {
  const objects: unknown[] = [];
  for (const match of text.matchAll(/\{[^{}]*\}/g)) {
    const value = tryParse(match[0]);
    if (value !== null) objects.push(value);
  }
  return objects;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function toCandidate(raw: ModelCandidate): CandidateClassification | null {
  const item = raw.item ?? raw.item_description ?? '';
  const code = raw.code ?? raw.hs_code ?? '';
  if (!item && !code && raw.line === undefined) return null;

  const candidate: CandidateClassification = {
    item,
    code,
    description: raw.description ?? raw.hs_description ?? '',
    confidence: parseConfidence(raw.confidence),
    source: 'model',
    reasoning: raw.reasoning ?? ''
  };
  if (raw.line !== undefined) candidate.line_index = raw.line - 1;
  return candidate;
}

function candidatesFrom(list: unknown[]): CandidateClassification[] {
  const candidates: CandidateClassification[] = [];
  for (const entry of list) {
    if (!isRecord(entry)) continue;
    const candidate = toCandidate(modelCandidateSchema.parse(entry));
    if (candidate) candidates.push(candidate);
  }
  return candidates;
}

function narrativeFrom(doc: Record<string, unknown>): string {
  for (const key of ['summary', 'synthesis', 'narrative']) {
    const value = doc[key];
    if (typeof value === 'string' && value.trim()) return value.trim();
  }
  return '';
}

// Prose around the JSON block
function strippedProse(text: string): string {
  const unfenced = text.replace(/```[\s\S]*?```/g, '');
  const spans = [outerSpan(unfenced, '{', '}'), outerSpan(unfenced, '[', ']')].filter(
    (span): span is [number, number] => span !== null
  );
  if (spans.length === 0) return unfenced.trim();

  const start = Math.min(...spans.map(([s]) => s));
  const end = Math.max(...spans.map(([, e]) => e));
  return (unfenced.slice(0, start) + unfenced.slice(end + 1)).trim();
}

export function parseResponse(rawText: string | null | undefined): ParsedPayload {
  if (!rawText || !rawText.trim()) return { candidates: [], narrative: '' };

  const doc = extractJson(rawText);

  if (Array.isArray(doc)) {
    return { candidates: candidatesFrom(doc), narrative: strippedProse(rawText) };
  }

  if (isRecord(doc)) {
    const list = doc.classifications ?? doc.candidates ?? doc.items;
    return {
      candidates: Array.isArray(list) ? candidatesFrom(list) : [],
      narrative: narrativeFrom(doc) || strippedProse(rawText)
    };
  }

  // Malformed or truncated JSON: keep whatever complete records survive
  const salvaged = candidatesFrom(salvageObjects(rawText));
  if (salvaged.length > 0) {
    return { candidates: salvaged, narrative: '' };
  }

  return { candidates: [], narrative: rawText.includes('{') ? '' : rawText.trim() };
}

function itemKey(text: string): string {
  return normalizeDescription(text).slice(0, ITEM_KEY_LENGTH);
}

function matchLine(candidate: CandidateClassification, lines: readonly ProductLine[]): number | undefined {
  if (candidate.line_index !== undefined && candidate.line_index >= 0 && candidate.line_index < lines.length) {
    return candidate.line_index;
  }

  const key = itemKey(candidate.item);
  if (!key) return undefined;

  const exact = lines.findIndex(line => itemKey(line.description) === key);
  if (exact !== -1) return exact;

  const loose = lines.findIndex(line => {
    const lineKey = itemKey(line.description);
    return lineKey.length > 0 && (lineKey.includes(key) || key.includes(lineKey));
  });
  return loose === -1 ? undefined : loose;
}

export function isExactHit(match: MemoryMatch): boolean {
  return match.level === 'exact' && match.confidence >= EXACT_HIT_THRESHOLD;
}

export function memoryCandidate(lineIndex: number, line: ProductLine, match: MemoryMatch): CandidateClassification {
  return {
    line_index: lineIndex,
    item: line.description,
    code: normalizeCode(match.code),
    description: '',
    confidence: isExactHit(match) ? 'high' : parseConfidence(match.confidence),
    source: 'memory',
    reasoning: `From memory (${match.level}, confidence ${match.confidence.toFixed(2)})`
  };
}

/**
 * Combine model candidates with memory matches resolved before inference.
 * Exact hits always win; other matches only fill lines the model left
 * unaddressed or answered with an empty code.
 */
export function mergeMemory(
  payload: ParsedPayload,
  lines: readonly ProductLine[],
  memory: ReadonlyMap<number, MemoryMatch>
): CandidateClassification[] {
  const byLine = new Map<number, CandidateClassification>();
  const unmatched: CandidateClassification[] = [];

  for (const candidate of payload.candidates) {
    const lineIndex = matchLine(candidate, lines);
    if (lineIndex === undefined) {
      unmatched.push({ ...candidate });
    } else if (!byLine.has(lineIndex)) {
      byLine.set(lineIndex, { ...candidate, line_index: lineIndex });
    }
  }

  const merged: CandidateClassification[] = [];
  lines.forEach((line, index) => {
    const match = memory.get(index);
    const fromModel = byLine.get(index);

    if (match && isExactHit(match)) {
      merged.push(memoryCandidate(index, line, match));
    } else if (fromModel && (fromModel.code || !match)) {
      merged.push(fromModel);
    } else if (match) {
      merged.push(memoryCandidate(index, line, match));
    }
  });

  return [...merged, ...unmatched];
}
