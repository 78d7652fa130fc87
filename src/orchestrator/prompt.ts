import { formatCode } from '../repository/reference-dataset.js';
import type { ClassificationRequest, MemoryMatch, PreparedPrompt, ProductLine } from '../types/index.js';

export const CLASSIFICATION_SYSTEM_PROMPT = `You are a customs tariff classification assistant.
You assign each product line the most specific tariff code in the reference dataset.

WORKFLOW:
1. Call check_memory for each line first. It is cheap and may already hold the answer.
2. On a memory miss, call search_codes with the chapter or heading prefix you expect.
3. Pick the best code from the candidates and confirm it with verify_code.
4. Never invent a code you could not find with search_codes or verify_code.

OUTPUT FORMAT (final reply, JSON only):
{
  "classifications": [
    {
      "line": 1,
      "item": "product description as given",
      "code": "XXXX.XX.XXXX",
      "description": "official description of the code",
      "confidence": "high | medium | low",
      "reasoning": "one or two sentences"
    }
  ],
  "summary": "short summary of the classification"
}`;

function describeLine(line: ProductLine, index: number): string {
  const details: string[] = [];
  if (line.quantity !== undefined) details.push(`quantity: ${line.quantity}`);
  if (line.declared_origin) details.push(`origin: ${line.declared_origin}`);
  if (line.declared_value !== undefined) details.push(`declared value: ${line.declared_value}`);
  const suffix = details.length > 0 ? ` (${details.join(', ')})` : '';
  return `${index + 1}. ${line.description}${suffix}`;
}

/**
 * Render the request for the model. Lines already resolved from memory are
 * listed so the model does not spend tool calls on them.
 */
export function buildPrompt(
  request: ClassificationRequest,
  resolved: ReadonlyMap<number, MemoryMatch> = new Map()
): PreparedPrompt {
  const sections: string[] = [];

  sections.push('PRODUCT LINES:');
  sections.push(...request.lines.map(describeLine));

  if (request.context.trim()) {
    sections.push('', 'CONTEXT:', request.context.trim());
  }

  if (request.enrichment?.trim()) {
    sections.push('', 'REFERENCE NOTES:', request.enrichment.trim());
  }

  if (resolved.size > 0) {
    sections.push('', 'ALREADY RESOLVED FROM MEMORY (do not classify again):');
    for (const [index, match] of [...resolved.entries()].sort(([a], [b]) => a - b)) {
      sections.push(`${index + 1}. ${formatCode(match.code)}`);
    }
  }

  return { system: CLASSIFICATION_SYSTEM_PROMPT, user: sections.join('\n') };
}
