import type { MemoryMatch } from '../types/index.js';
import type { SqliteDatabase } from './database.js';

export const LEARNED_CONFIDENCE = 0.85;
export const MAX_CONFIDENCE = 0.99;
const REINFORCEMENT_FACTOR = 0.5;
const PARTIAL_OVERLAP = 0.6;

export interface MemoryStore {
  lookup(description: string): Promise<MemoryMatch | null>;
  learn(description: string, code: string, source: string): Promise<MemoryMatch>;
}

export function normalizeDescription(description: string): string {
  return description.toLowerCase().replace(/\s+/g, ' ').trim();
}

export function descriptionTokens(text: string): Set<string> {
  return new Set(normalizeDescription(text).match(/[\p{L}\p{N}]{3,}/gu) ?? []);
}

// Diminishing returns near the cap
export function reinforce(confidence: number): number {
  return Math.min(confidence + REINFORCEMENT_FACTOR * (1 - confidence), MAX_CONFIDENCE);
}

interface MemoryRow {
  description_key: string;
  description: string;
  code: string;
  confidence: number;
}

export class SqliteMemoryStore implements MemoryStore {
  constructor(
    private db: SqliteDatabase,
    private now: () => Date = () => new Date()
  ) {}

  async lookup(description: string): Promise<MemoryMatch | null> {
    const key = normalizeDescription(description);
    if (!key) return null;

    const exact = this.db
      .prepare('SELECT description_key, description, code, confidence FROM classification_memory WHERE description_key = ?')
      .get(key) as MemoryRow | undefined;
    if (exact) {
      return { description: exact.description, code: exact.code, confidence: exact.confidence, level: 'exact' };
    }

    const tokens = descriptionTokens(key);
    const anchor = [...tokens].sort((a, b) => b.length - a.length)[0];
    if (!anchor) return null;

    const rows = this.db
      .prepare('SELECT description_key, description, code, confidence FROM classification_memory WHERE description_key LIKE ? LIMIT 50')
      .all(`%${anchor}%`) as MemoryRow[];

    let best: { row: MemoryRow; overlap: number } | null = null;
    for (const row of rows) {
      const rowTokens = descriptionTokens(row.description_key);
      const shared = [...tokens].filter(t => rowTokens.has(t)).length;
      const overlap = shared / Math.max(tokens.size, rowTokens.size);
      if (overlap >= PARTIAL_OVERLAP && (!best || overlap > best.overlap)) {
        best = { row, overlap };
      }
    }

    if (!best) return null;
    return {
      description: best.row.description,
      code: best.row.code,
      confidence: Number((best.row.confidence * best.overlap).toFixed(3)),
      level: 'partial'
    };
  }

  async learn(description: string, code: string, source: string): Promise<MemoryMatch> {
    const key = normalizeDescription(description);
    const timestamp = this.now().toISOString();

    const tx = this.db.transaction((): MemoryMatch => {
      const existing = this.db
        .prepare('SELECT description_key, description, code, confidence FROM classification_memory WHERE description_key = ?')
        .get(key) as MemoryRow | undefined;

      // Same code confirms the memory, a different one replaces it
      const confidence = existing && existing.code === code ? reinforce(existing.confidence) : LEARNED_CONFIDENCE;

      this.db
        .prepare(
          `INSERT INTO classification_memory (description_key, description, code, confidence, source, updated_at)
           VALUES (?, ?, ?, ?, ?, ?)
           ON CONFLICT(description_key) DO UPDATE SET
             code = excluded.code,
             confidence = excluded.confidence,
             source = excluded.source,
             updated_at = excluded.updated_at`
        )
        .run(key, description, code, confidence, source, timestamp);

      return { description, code, confidence, level: 'exact' };
    });

    return tx.immediate();
  }
}
