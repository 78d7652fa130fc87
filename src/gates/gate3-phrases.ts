import type { FilterOutcome, GatePolicy } from '../types/index.js';

// Phrases that must never reach a customer
export const BANNED_PHRASES: readonly string[] = [
  // Referrals to an outside broker
  'מומלץ לפנות לעמיל מכס',
  'מומלץ להתייעץ עם עמיל מכס',
  'מומלץ להתייעץ עם סוכן מכס',
  'יש לפנות לעמיל מכס',
  'יש להתייעץ עם עמיל מכס',
  'פנה לעמיל מכס',
  'פנו לעמיל מכס',
  'התייעצו עם עמיל מכס',
  'יש לאמת עם עמיל מכס מוסמך',
  'consult a licensed customs broker',
  'consult with a customs broker',
  'consult a customs broker',
  'seek professional customs advice',
  'contact a customs agent',
  // Uncertainty
  "I'm not sure",
  'I am not sure',
  'I cannot determine',
  'unable to classify',
  'unclassifiable',
  'לא ניתן לסווג',
  'לא ניתן לקבוע'
];

const HEBREW = /[\u0590-\u05FF]/;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Stage C. Case-insensitive literal replacement of every banned phrase with
 * the contact line in the phrase's own script.
 */
export function filterPhrases(
  text: string,
  policy: Pick<GatePolicy, 'extra_phrases' | 'contact_line'>
): FilterOutcome {
  const found: string[] = [];
  let cleaned = text;

  for (const phrase of [...BANNED_PHRASES, ...policy.extra_phrases]) {
    const pattern = new RegExp(escapeRegExp(phrase), 'gi');
    if (!pattern.test(cleaned)) continue;

    found.push(phrase);
    const replacement = HEBREW.test(phrase) ? policy.contact_line.he : policy.contact_line.en;
    pattern.lastIndex = 0;
    cleaned = cleaned.replace(pattern, () => replacement);
  }

  return { cleaned_text: cleaned, phrases_found: found, was_modified: found.length > 0 };
}
