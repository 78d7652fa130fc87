export { sha256, shortHash, hashObject, HashChain, GENESIS_HASH } from './hasher.js';
export { AuditLog, type AuditEntry } from './audit-log.js';
