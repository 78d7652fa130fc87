import { describe, it, expect, beforeEach } from 'vitest';
import { shortHash } from '../src/crypto/hasher.js';
import { validateCodes } from '../src/gates/gate1-code.js';
import { checkLoop, computeThreadKey, normalizeSubject } from '../src/gates/gate2-loop.js';
import { filterPhrases } from '../src/gates/gate3-phrases.js';
import type { CandidateClassification } from '../src/types/index.js';
import { createStores, testPolicy, type Stores } from './helpers.js';

function candidate(overrides: Partial<CandidateClassification>): CandidateClassification {
  return {
    item: 'Espresso machine',
    code: '8516710000',
    description: '',
    confidence: 'high',
    source: 'model',
    reasoning: '',
    ...overrides
  };
}

describe('code validation gate', () => {
  let stores: Stores;
  const policy = testPolicy();

  beforeEach(() => {
    stores = createStores();
  });

  it('marks an existing code valid and attaches the canonical record', async () => {
    const candidates = [candidate({ code: '8516.71.0000' })];
    const outcome = await validateCodes(candidates, stores.dataset, policy);

    expect(outcome).toEqual({ all_valid: true, any_corrected: false, blocking_issues: [], findings: [] });
    expect(candidates[0]).toMatchObject({
      code: '8516710000',
      status: 'valid',
      confidence: 'high',
      description: 'Coffee or tea makers, electro-thermic',
      validation_note: 'Code 8516.71.0000 found in the reference dataset',
      canonical: { code: '8516710000', duty_rate: '12%' }
    });
  });

  it('leaves valid candidates unchanged on a second pass', async () => {
    const candidates = [candidate({ code: '8516.71.0000' })];
    await validateCodes(candidates, stores.dataset, policy);
    const once = structuredClone(candidates);

    await validateCodes(candidates, stores.dataset, policy);
    expect(candidates).toEqual(once);
  });

  it('corrects to the sibling sharing the most description words', async () => {
    const candidates = [candidate({ item: 'Drip coffee maker', code: '8516720000' })];
    const outcome = await validateCodes(candidates, stores.dataset, policy);

    expect(candidates[0]).toMatchObject({
      code: '8516710000',
      corrected_from: '8516720000',
      corrected: true,
      confidence: 'medium',
      status: 'corrected',
      validation_note: 'Code 8516.72.0000 not found; corrected to 8516.71.0000'
    });
    expect(outcome.any_corrected).toBe(true);
    expect(outcome.all_valid).toBe(false);
    expect(outcome.findings).toEqual([
      {
        kind: 'corrected',
        message: 'Code 8516.72.0000 not found; corrected to 8516.71.0000',
        index: 0,
        from: '8516720000',
        to: '8516710000'
      }
    ]);
  });

  it('breaks ties by the longest shared code prefix', async () => {
    const candidates = [candidate({ item: 'Widget', code: '8516650000', confidence: 'medium' })];
    await validateCodes(candidates, stores.dataset, policy);

    expect(candidates[0]?.code).toBe('8516600000');
    expect(candidates[0]?.confidence).toBe('low');
  });

  it('falls back to the chapter and then the lowest code', async () => {
    const candidates = [candidate({ item: 'Thing', code: '8599000000' })];
    await validateCodes(candidates, stores.dataset, policy);

    expect(candidates[0]?.code).toBe('8509400000');
    expect(candidates[0]?.corrected_from).toBe('8599000000');
  });

  it('keeps a corrected candidate marked as corrected', async () => {
    const candidates = [candidate({ item: 'Drip coffee maker', code: '8516720000' })];
    await validateCodes(candidates, stores.dataset, policy);
    await validateCodes(candidates, stores.dataset, policy);

    expect(candidates[0]).toMatchObject({ status: 'corrected', corrected_from: '8516720000', confidence: 'medium' });
  });

  it('marks a code without siblings invalid', async () => {
    const candidates = [candidate({ code: '0101210000' })];
    const outcome = await validateCodes(candidates, stores.dataset, policy);

    expect(candidates[0]).toMatchObject({
      code: '0101210000',
      status: 'invalid',
      confidence: 'low',
      validation_note: 'Code 0101.21.0000 not found in the reference dataset'
    });
    expect(outcome.blocking_issues).toEqual([
      'Code 0101.21.0000 (line 1) does not exist in the reference dataset and no candidates were found under 0101'
    ]);
  });

  it('marks a missing code invalid', async () => {
    const candidates = [candidate({ code: '', line_index: 2 })];
    const outcome = await validateCodes(candidates, stores.dataset, policy);

    expect(candidates[0]?.status).toBe('invalid');
    expect(candidates[0]?.validation_note).toBe('No code was proposed');
    expect(outcome.blocking_issues).toEqual(['No code proposed for line 3']);
  });
});

describe('loop breaker gate', () => {
  const policy = testPolicy();

  it('strips reply prefixes and tracking tokens from the subject', () => {
    expect(normalizeSubject('Re: FW: Coffee machines  order ABC-20240101-001', policy.tracking_token_pattern)).toBe(
      'coffee machines order'
    );
  });

  it('derives the same key for equivalent subjects', () => {
    const a = computeThreadKey('Fwd: Coffee machines order', undefined, policy.tracking_token_pattern);
    const b = computeThreadKey('coffee   MACHINES order', undefined, policy.tracking_token_pattern);

    expect(a).toBe(b);
    expect(a).toMatch(/^[0-9a-f]{16}$/);
  });

  it('falls back to the message id', () => {
    expect(computeThreadKey('Re:', 'msg-1', policy.tracking_token_pattern)).toBe(shortHash('msg-1'));
    expect(computeThreadKey(undefined, undefined, policy.tracking_token_pattern)).toBe('');
  });

  it('allows two attempts and escalates the third with prior codes', async () => {
    const { attempts } = createStores();

    const first = await checkLoop('Coffee order', undefined, attempts, policy);
    expect(first).toMatchObject({ allowed: true, attempt_number: 1, escalate: false, prior_codes: [] });
    await attempts.recordCodes(first.thread_key, ['8516710000']);

    const second = await checkLoop('Re: Coffee order', undefined, attempts, policy);
    expect(second).toMatchObject({ allowed: true, attempt_number: 2, escalate: false, prior_codes: ['8516710000'] });

    const third = await checkLoop('FW: coffee ORDER', undefined, attempts, policy);
    expect(third).toEqual({
      allowed: false,
      attempt_number: 3,
      escalate: true,
      prior_codes: ['8516710000'],
      thread_key: first.thread_key
    });

    await checkLoop('Coffee order', undefined, attempts, policy);
    const record = await attempts.get(first.thread_key);
    expect(record?.attempts).toBe(2);
  });

  it('allows requests without a thread identity', async () => {
    const { attempts } = createStores();
    await expect(checkLoop(undefined, undefined, attempts, policy)).resolves.toEqual({
      allowed: true,
      attempt_number: 1,
      escalate: false,
      prior_codes: [],
      thread_key: ''
    });
  });
});

describe('content filter gate', () => {
  const policy = testPolicy();
  const en = 'For further details, contact the classification desk.';
  const he = 'לפרטים נוספים ניתן לפנות לצוות הסיווג.';

  it('replaces an English phrase regardless of case', () => {
    const outcome = filterPhrases('Line 1: 8516.71.0000. If unsure, please Consult A Customs Broker.', policy);

    expect(outcome).toEqual({
      cleaned_text: `Line 1: 8516.71.0000. If unsure, please ${en}.`,
      phrases_found: ['consult a customs broker'],
      was_modified: true
    });
  });

  it('uses the Hebrew contact line for a Hebrew phrase', () => {
    const outcome = filterPhrases('הסיווג: 8516.71. מומלץ לפנות לעמיל מכס', policy);

    expect(outcome.cleaned_text).toBe(`הסיווג: 8516.71. ${he}`);
    expect(outcome.phrases_found).toEqual(['מומלץ לפנות לעמיל מכס']);
  });

  it('replaces every occurrence', () => {
    const outcome = filterPhrases('I am not sure. I AM NOT SURE.', policy);
    expect(outcome.cleaned_text).toBe(`${en}. ${en}.`);
    expect(outcome.phrases_found).toEqual(['I am not sure']);
  });

  it('leaves clean text alone', () => {
    expect(filterPhrases('Code 8516.71.0000', policy)).toEqual({
      cleaned_text: 'Code 8516.71.0000',
      phrases_found: [],
      was_modified: false
    });
  });

  it('applies configured extra phrases', () => {
    const outcome = filterPhrases('Ask (another) firm', testPolicy({ extra_phrases: ['(another) firm'] }));
    expect(outcome.cleaned_text).toBe(`Ask ${en}`);
  });
});
