import type { ThreadAttemptRecord } from '../types/index.js';
import type { SqliteDatabase } from './database.js';

export interface AttemptOutcome {
  record: ThreadAttemptRecord;
  created: boolean;
  incremented: boolean;
}

export interface AttemptStore {
  get(threadKey: string): Promise<ThreadAttemptRecord | null>;
  /**
   * Creates the record with one attempt, or increments it while it is below
   * `maxAttempts`. Read and write happen in one transaction so racing
   * duplicates cannot push the counter past the limit.
   */
  incrementOrCreate(threadKey: string, maxAttempts: number, subject?: string): Promise<AttemptOutcome>;
  recordCodes(threadKey: string, codes: string[]): Promise<void>;
}

interface AttemptRow {
  thread_key: string;
  subject: string;
  attempts: number;
  prior_codes: string;
  first_seen: string;
  last_seen: string;
}

export class SqliteAttemptStore implements AttemptStore {
  constructor(
    private db: SqliteDatabase,
    private now: () => Date = () => new Date()
  ) {}

  async get(threadKey: string): Promise<ThreadAttemptRecord | null> {
    return this.read(threadKey);
  }

  async incrementOrCreate(threadKey: string, maxAttempts: number, subject = ''): Promise<AttemptOutcome> {
    const tx = this.db.transaction((): AttemptOutcome => {
      const timestamp = this.now().toISOString();
      const existing = this.read(threadKey);

      if (!existing) {
        const storedSubject = subject.slice(0, 200);
        this.db
          .prepare(
            `INSERT INTO classification_attempts (thread_key, subject, attempts, prior_codes, first_seen, last_seen)
             VALUES (?, ?, 1, '[]', ?, ?)`
          )
          .run(threadKey, storedSubject, timestamp, timestamp);
        return {
          record: { thread_key: threadKey, subject: storedSubject, attempts: 1, prior_codes: [], first_seen: timestamp, last_seen: timestamp },
          created: true,
          incremented: false
        };
      }

      if (existing.attempts >= maxAttempts) {
        return { record: existing, created: false, incremented: false };
      }

      this.db
        .prepare('UPDATE classification_attempts SET attempts = attempts + 1, last_seen = ? WHERE thread_key = ? AND attempts < ?')
        .run(timestamp, threadKey, maxAttempts);
      return {
        record: { ...existing, attempts: existing.attempts + 1, last_seen: timestamp },
        created: false,
        incremented: true
      };
    });

    // IMMEDIATE takes the write lock before the read
    return tx.immediate();
  }

  async recordCodes(threadKey: string, codes: string[]): Promise<void> {
    if (!threadKey || codes.length === 0) return;

    const tx = this.db.transaction(() => {
      const existing = this.read(threadKey);
      if (!existing) return;
      const merged = [...new Set([...existing.prior_codes, ...codes])];
      this.db
        .prepare('UPDATE classification_attempts SET prior_codes = ? WHERE thread_key = ?')
        .run(JSON.stringify(merged), threadKey);
    });
    tx.immediate();
  }

  private read(threadKey: string): ThreadAttemptRecord | null {
    const row = this.db
      .prepare('SELECT thread_key, subject, attempts, prior_codes, first_seen, last_seen FROM classification_attempts WHERE thread_key = ?')
      .get(threadKey) as AttemptRow | undefined;
    if (!row) return null;

    return {
      thread_key: row.thread_key,
      subject: row.subject,
      attempts: row.attempts,
      prior_codes: parseCodes(row.prior_codes),
      first_seen: row.first_seen,
      last_seen: row.last_seen
    };
  }
}

function parseCodes(raw: string): string[] {
  try {
    const value: unknown = JSON.parse(raw);
    return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
  } catch {
    return [];
  }
}
