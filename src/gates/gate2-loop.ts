import { shortHash } from '../crypto/hasher.js';
import type { AttemptStore } from '../repository/attempt-store.js';
import type { GatePolicy, LoopCheck } from '../types/index.js';

const REPLY_PREFIX = /^(?:(?:re|fwd?|fw)\s*:\s*)+/i;

export function normalizeSubject(subject: string, trackingPattern: string): string {
  return subject
    .replace(REPLY_PREFIX, '')
    .replace(new RegExp(trackingPattern, 'g'), '')
    .replace(/\s+/g, ' ')
    .trim()
    .toLowerCase();
}

/**
 * Stable key for a conversation thread. Empty when there is neither a
 * usable subject nor a message id.
 */
export function computeThreadKey(
  subject: string | undefined,
  messageId: string | undefined,
  trackingPattern: string
): string {
  const clean = normalizeSubject(subject ?? '', trackingPattern) || (messageId ?? '').trim();
  return clean ? shortHash(clean, 16) : '';
}

/**
 * Stage B. Counts automated attempts per thread and signals escalation
 * once `max_attempts` have been made.
 */
export async function checkLoop(
  subject: string | undefined,
  messageId: string | undefined,
  store: AttemptStore,
  policy: GatePolicy
): Promise<LoopCheck> {
  const threadKey = computeThreadKey(subject, messageId, policy.tracking_token_pattern);
  if (!threadKey) {
    return { allowed: true, attempt_number: 1, escalate: false, prior_codes: [], thread_key: '' };
  }

  const { record, created, incremented } = await store.incrementOrCreate(
    threadKey,
    policy.max_attempts,
    subject ?? ''
  );

  if (created || incremented) {
    return {
      allowed: true,
      attempt_number: record.attempts,
      escalate: false,
      prior_codes: record.prior_codes,
      thread_key: threadKey
    };
  }

  return {
    allowed: false,
    attempt_number: record.attempts + 1,
    escalate: true,
    prior_codes: record.prior_codes,
    thread_key: threadKey
  };
}
