import type { ReferenceRecord } from '../types/index.js';
import type { SqliteDatabase } from './database.js';

// A record as loaded; corrupt entries are stored but never served
export interface ReferenceEntry extends ReferenceRecord {
  corrupt?: boolean;
}

export interface ReferenceDataset {
  lookupByCode(code: string): Promise<ReferenceRecord | null>;
  searchPrefix(prefix: string, limit?: number): Promise<ReferenceRecord[]>;
}

// Tariff codes are compared as bare digits: "85.16.710000/2" -> "8516710000"
export function normalizeCode(code: string): string {
  return String(code)
    .trim()
    .replace(/\/\d$/, '')
    .replace(/[.\s/-]/g, '');
}

export function formatCode(code: string): string {
  const clean = normalizeCode(code);
  if (clean.length >= 6) return `${clean.slice(0, 4)}.${clean.slice(4, 6)}${clean.length > 6 ? '.' + clean.slice(6) : ''}`;
  if (clean.length > 4) return `${clean.slice(0, 4)}.${clean.slice(4)}`;
  return clean;
}

interface TariffRow {
  code: string;
  description: string;
  duty_rate: string | null;
}

export class SqliteReferenceDataset implements ReferenceDataset {
  constructor(private db: SqliteDatabase) {}

  async lookupByCode(code: string): Promise<ReferenceRecord | null> {
    const clean = normalizeCode(code);
    if (!clean) return null;

    const row = this.db
      .prepare('SELECT code, description, duty_rate FROM tariff_codes WHERE code = ? AND corrupt = 0')
      .get(clean) as TariffRow | undefined;
    return row ? this.toRecord(row) : null;
  }

  async searchPrefix(prefix: string, limit = 20): Promise<ReferenceRecord[]> {
    const clean = normalizeCode(prefix);
    if (!/^\d+$/.test(clean)) return [];

    const rows = this.db
      .prepare('SELECT code, description, duty_rate FROM tariff_codes WHERE code LIKE ? AND corrupt = 0 ORDER BY code LIMIT ?')
      .all(`${clean}%`, limit) as TariffRow[];
    return rows.map(row => this.toRecord(row));
  }

  upsert(records: ReferenceEntry[]): void {
    const stmt = this.db.prepare(
      `INSERT INTO tariff_codes (code, description, duty_rate, corrupt) VALUES (?, ?, ?, ?)
       ON CONFLICT(code) DO UPDATE SET description = excluded.description, duty_rate = excluded.duty_rate, corrupt = excluded.corrupt`
    );
    const insertAll = this.db.transaction((batch: ReferenceEntry[]) => {
      for (const r of batch) {
        stmt.run(normalizeCode(r.code), r.description, r.duty_rate ?? null, r.corrupt ? 1 : 0);
      }
    });
    insertAll(records);
  }

  private toRecord(row: TariffRow): ReferenceRecord {
    return row.duty_rate === null
      ? { code: row.code, description: row.description }
      : { code: row.code, description: row.description, duty_rate: row.duty_rate };
  }
}
