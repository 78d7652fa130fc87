import { appendFileSync, readFileSync, existsSync, mkdirSync } from 'fs';
import { dirname } from 'path';
import { v4 as uuidv4 } from 'uuid';
import type { AuditRecord } from '../types/index.js';
import { HashChain, GENESIS_HASH, hashObject, sha256 } from './hasher.js';

export const ENGINE_VERSION = '0.1.0';

export interface AuditEntry {
  request_id: string;
  status: string;
  thread_key: string;
  codes: string[];
  gates_evaluated: string[];
  gates_failed: string[];
  phrases_replaced: number;
  input: string;
  output: string;
  policyHash: string;
}

export class AuditLog {
  private logPath: string;
  private chain: HashChain;

  constructor(logPath: string) {
    this.logPath = logPath;

    const dir = dirname(logPath);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }

    this.chain = new HashChain(this.lastRecordHash());
  }

  private readRecords(): AuditRecord[] {
    if (!existsSync(this.logPath)) return [];

    return readFileSync(this.logPath, 'utf-8')
      .split('\n')
      .filter(Boolean)
      .map(line => JSON.parse(line) as AuditRecord);
  }

  // A torn last line restarts the chain; verify() still reports the break
  private lastRecordHash(): string | undefined {
    try {
      const records = this.readRecords();
      const last = records[records.length - 1];
      return last ? hashObject(last) : undefined;
    } catch {
      return undefined;
    }
  }

  log(entry: AuditEntry): AuditRecord {
    const record: AuditRecord = {
      event_id: uuidv4(),
      timestamp: new Date().toISOString(),
      request_id: entry.request_id,
      status: entry.status,
      thread_key: entry.thread_key,
      codes: entry.codes,
      gates_evaluated: entry.gates_evaluated,
      gates_failed: entry.gates_failed,
      phrases_replaced: entry.phrases_replaced,
      hash_input: sha256(entry.input),
      hash_output: sha256(entry.output),
      policy_hash: entry.policyHash,
      prev_record_hash: this.chain.getCurrentHash(),
      engine_version: ENGINE_VERSION
    };

    appendFileSync(this.logPath, JSON.stringify(record) + '\n');
    this.chain.append(record);

    return record;
  }

  verify(): { valid: boolean; errors: string[] } {
    const errors: string[] = [];
    let records: AuditRecord[];

    try {
      records = this.readRecords();
    } catch {
      return { valid: false, errors: ['Audit log contains invalid JSON'] };
    }

    let expected = GENESIS_HASH;
    records.forEach((record, i) => {
      // A log may be rotated, so the first record's predecessor is not checked
      if (i > 0 && record.prev_record_hash !== expected) {
        errors.push(`Record ${i}: chain broken - expected ${expected}, got ${record.prev_record_hash}`);
      }
      expected = hashObject(record);
    });

    return {
      valid: errors.length === 0,
      errors
    };
  }
}
