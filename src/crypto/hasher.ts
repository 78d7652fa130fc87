import { createHash } from 'crypto';

export function sha256(data: string | Buffer): string {
  return createHash('sha256').update(data).digest('hex');
}

// Truncated digest used for store keys
export function shortHash(data: string, length = 16): string {
  return sha256(data).slice(0, length);
}

export function hashObject(obj: object): string {
  return sha256(stableStringify(obj));
}

function stableStringify(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map(stableStringify).join(',')}]`;
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, v]) => v !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([k, v]) => `${JSON.stringify(k)}:${stableStringify(v)}`);
    return `{${entries.join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}

export const GENESIS_HASH = sha256('tariff-gate-genesis');

// Each appended record carries the hash of its predecessor
export class HashChain {
  private prevHash: string;

  constructor(lastHash?: string) {
    this.prevHash = lastHash || GENESIS_HASH;
  }

  append(record: object): void {
    this.prevHash = hashObject(record);
  }

  getCurrentHash(): string {
    return this.prevHash;
  }
}
