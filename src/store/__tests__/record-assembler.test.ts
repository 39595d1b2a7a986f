/**
 * Field-level merge policy and the locked write path
 */

import type { CaseCandidate, CaseRecord } from '../../types';
import { ErrorCodes, ExtractionError, StoreUnavailableError } from '../../utils/errors';
import { RecordAssembler, mergeCaseRecord } from '../record-assembler';
import { InMemoryCaseRepository, InMemoryStoreLock } from './fakes';

const T1 = '2025-08-01T12:00:00.000Z';
const T2 = '2025-08-02T12:00:00.000Z';

function candidate(overrides: Partial<CaseCandidate> = {}): CaseCandidate {
  return {
    causeNumber: '24-001234',
    fields: { wardFirst: 'Jane', wardLast: 'Park', guardian1Name: 'Karen Park', wardDob: '' },
    documentKind: 'arp',
    engine: 'text-layer',
    lowConfidence: false,
    reviewReasons: [],
    ...overrides,
  };
}

function stored(overrides: Partial<CaseCandidate> = {}): CaseRecord {
  return mergeCaseRecord(null, candidate(overrides), T1).record;
}

describe('mergeCaseRecord', () => {
  it('creates a record from the first candidate', () => {
    const result = mergeCaseRecord(null, candidate(), T1);

    expect(result.changed).toBe(true);
    expect(result.fieldsWritten).toEqual(['wardFirst', 'wardLast', 'guardian1Name']);
    expect(result.record.fields.wardFirst).toBe('Jane');
    expect(result.record.fieldStatus.wardFirst).toBe('extracted');
    expect(result.record.fieldStatus.wardDob).toBe('missing');
    expect(result.record.lastEngine).toBe('text-layer');
    expect(result.record.needsReview).toBe(false);
    expect(result.record.updatedAt).toBe(T1);
  });

  it('never overwrites a verified field', () => {
    const existing = stored();
    existing.fieldStatus.guardian1Name = 'verified';

    const result = mergeCaseRecord(existing, candidate({ fields: { guardian1Name: 'Karen Pack' } }), T2);

    expect(result.changed).toBe(false);
    expect(result.fieldsWritten).toEqual([]);
    expect(result.record).toBe(existing);
  });

  it('replaces an extracted value only from a confident pass', () => {
    const existing = stored({ fields: { guardian1Phone: '(512) 555-0142' } });

    const doubtful = mergeCaseRecord(existing, candidate({ fields: { guardian1Phone: '(512) 555-0199' }, lowConfidence: true }), T2);
    expect(doubtful.fieldsWritten).toEqual([]);

    const confident = mergeCaseRecord(existing, candidate({ fields: { guardian1Phone: '(512) 555-0199' }, engine: 'gemini' }), T2);
    expect(confident.fieldsWritten).toEqual(['guardian1Phone']);
    expect(confident.record.fields.guardian1Phone).toBe('(512) 555-0199');
    expect(confident.record.lastEngine).toBe('gemini');
  });

  it('fills a field flagged for review even from a low-confidence pass', () => {
    const existing = stored({ fields: { wardPhone: '512-555-01' } });
    existing.fieldStatus.wardPhone = 'needs_review';

    const result = mergeCaseRecord(existing, candidate({ fields: { wardPhone: '(512) 555-0100' }, lowConfidence: true }), T2);

    expect(result.fieldsWritten).toEqual(['wardPhone']);
    expect(result.record.fieldStatus.wardPhone).toBe('extracted');
    expect(result.record.lowConfidence).toBe(true);
  });

  it('never clears a field with an empty value', () => {
    const existing = stored();

    const result = mergeCaseRecord(existing, candidate({ fields: { wardFirst: '', guardian1Name: '  ' } }), T2);

    expect(result.changed).toBe(false);
    expect(result.record.fields.wardFirst).toBe('Jane');
  });

  it('is idempotent', () => {
    const first = mergeCaseRecord(null, candidate(), T1).record;
    const second = mergeCaseRecord(first, candidate(), T2);

    expect(second.changed).toBe(false);
    expect(second.record).toBe(first);
    expect(second.record.updatedAt).toBe(T1);
  });

  it('drops a review reason once the missing value arrives', () => {
    const existing = stored({ fields: { wardFirst: 'Jane', wardLast: 'Park' }, reviewReasons: ['MISSING_GUARDIAN_NAME'] });
    expect(existing.needsReview).toBe(true);

    const result = mergeCaseRecord(existing, candidate({ fields: { guardian1Name: 'Karen Park' } }), T2);

    expect(result.record.reviewReasons).toEqual([]);
    expect(result.record.needsReview).toBe(false);
  });

  it('adds review reasons without touching engine bookkeeping when no field changed', () => {
    const existing = stored();

    const result = mergeCaseRecord(
      existing,
      candidate({ engine: 'claude', lowConfidence: true, reviewReasons: ['LOW_CONFIDENCE_TEXT'] }),
      T2
    );

    expect(result.changed).toBe(true);
    expect(result.fieldsWritten).toEqual([]);
    expect(result.record.reviewReasons).toEqual(['LOW_CONFIDENCE_TEXT']);
    expect(result.record.needsReview).toBe(true);
    expect(result.record.lastEngine).toBe('text-layer');
    expect(result.record.lowConfidence).toBe(false);
  });
});

describe('RecordAssembler', () => {
  const clock = () => new Date(T1);

  it('writes a new record once and releases the lock', async () => {
    const repository = new InMemoryCaseRepository();
    const lock = new InMemoryStoreLock();
    const assembler = new RecordAssembler(repository, lock, clock);

    const result = await assembler.upsert(candidate());

    expect(result.fieldsWritten).toEqual(['wardFirst', 'wardLast', 'guardian1Name']);
    expect(repository.writes).toBe(1);
    expect(repository.records.get('24-001234')?.updatedAt).toBe(T1);
    expect(lock.holder).toBeNull();
  });

  it('skips the write when nothing changed', async () => {
    const repository = new InMemoryCaseRepository();
    const assembler = new RecordAssembler(repository, new InMemoryStoreLock(), clock);

    await assembler.upsert(candidate());
    const second = await assembler.upsert(candidate());

    expect(second.changed).toBe(false);
    expect(repository.writes).toBe(1);
  });

  it('fails without writing when another writer holds the lock', async () => {
    const repository = new InMemoryCaseRepository();
    const lock = new InMemoryStoreLock();
    lock.holder = 'someone-else';
    const assembler = new RecordAssembler(repository, lock, clock);

    await expect(assembler.upsert(candidate())).rejects.toThrow(StoreUnavailableError);
    await expect(assembler.upsert(candidate())).rejects.toThrow('Case store is locked by another writer');
    expect(repository.writes).toBe(0);
    expect(lock.holder).toBe('someone-else');
  });

  it('fails when the lock cannot be reached', async () => {
    const lock = new InMemoryStoreLock();
    lock.unreachable = true;
    const assembler = new RecordAssembler(new InMemoryCaseRepository(), lock, clock);

    await expect(assembler.upsert(candidate())).rejects.toThrow('Could not reach the store lock');
  });

  it('refuses a candidate without a cause number before touching the lock', async () => {
    const lock = new InMemoryStoreLock();
    lock.unreachable = true;
    const assembler = new RecordAssembler(new InMemoryCaseRepository(), lock, clock);

    const error = await assembler.upsert(candidate({ causeNumber: '' })).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExtractionError);
    expect(error).not.toBeInstanceOf(StoreUnavailableError);
    expect(error).toMatchObject({ code: ErrorCodes.MISSING_CAUSE_NUMBER, message: 'A case record needs a cause number' });
  });

  it('releases the lock when the write fails', async () => {
    const repository = new InMemoryCaseRepository();
    repository.failWrites = true;
    const lock = new InMemoryStoreLock();
    const assembler = new RecordAssembler(repository, lock, clock);

    await expect(assembler.upsert(candidate())).rejects.toThrow('write rejected');
    expect(lock.holder).toBeNull();
  });
});
