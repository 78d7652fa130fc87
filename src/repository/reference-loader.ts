import { readFileSync } from 'fs';
import { z } from 'zod';
import { ConfigError } from '../errors.js';
import type { ReferenceEntry } from './reference-dataset.js';

const recordSchema = z.object({
  code: z.union([z.string(), z.number()]).transform(String),
  description: z.string().min(1),
  duty_rate: z.string().optional(),
  corrupt: z.boolean().optional(),
  corrupt_code: z.boolean().optional()
});

const fileSchema = z.array(recordSchema);

export function parseReferenceRecords(raw: unknown): ReferenceEntry[] {
  const result = fileSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigError(`Invalid reference data at ${issue?.path.join('.') || '(root)'}: ${issue?.message ?? 'unknown'}`);
  }
  return result.data.map(r => {
    const entry: ReferenceEntry = { code: r.code, description: r.description };
    if (r.duty_rate !== undefined) entry.duty_rate = r.duty_rate;
    if (r.corrupt || r.corrupt_code) entry.corrupt = true;
    return entry;
  });
}

export function loadReferenceFile(path: string): ReferenceEntry[] {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Cannot read reference data from ${path}`, { cause: error });
  }
  return parseReferenceRecords(raw);
}
