import {
  CASE_FIELD_KEYS,
  CaseCandidate,
  CaseFieldKey,
  CaseFields,
  CaseRecord,
  ExtractedCase,
  FieldStatus,
  ReviewReason,
  emptyFieldStatus,
  emptyFields,
} from '../types';
import { ErrorCodes, ExtractionError, StoreUnavailableError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import type { CaseRepository } from './case-repository';
import type { StoreLock } from './store-lock';

/**
 * Flatten a parsed document into store fields. The secondary guardian only
 * ever feeds the guardian2 columns.
 */
export function candidateFields(extracted: ExtractedCase): Partial<CaseFields> {
  const fields: Partial<CaseFields> = {
    wardFirst: extracted.ward.first,
    wardMiddle: extracted.ward.middle,
    wardLast: extracted.ward.last,
    wardDob: extracted.ward.dob,
    wardPhone: extracted.ward.phone,
    wardAddress: extracted.ward.address,
    livesWith: extracted.ward.livesWith,
    dateArpFiled: extracted.dateArpFiled,
    dateAppointed: extracted.dateAppointed,
  };

  const primary = extracted.primaryGuardian;
  if (primary) {
    fields.guardian1Name = primary.name;
    fields.guardian1Address = primary.address;
    fields.guardian1Email = primary.email;
    fields.guardian1Phone = primary.phone;
    fields.guardian1Relationship = primary.relationship;
    fields.guardian1Dob = primary.dob;
  }

  const secondary = extracted.secondaryGuardian;
  if (secondary) {
    fields.guardian2Name = secondary.name;
    fields.guardian2Address = secondary.address;
    fields.guardian2Email = secondary.email;
    fields.guardian2Phone = secondary.phone;
    fields.guardian2Relationship = secondary.relationship;
    fields.guardian2Dob = secondary.dob;
  }

  return fields;
}

export interface MergeResult {
  record: CaseRecord;
  /** Fields whose stored value changed */
  fieldsWritten: CaseFieldKey[];
  /** False when the merge left the stored record exactly as it was */
  changed: boolean;
}

function newRecord(causeNumber: string): CaseRecord {
  return {
    causeNumber,
    fields: emptyFields(),
    fieldStatus: emptyFieldStatus(),
    needsReview: false,
    reviewReasons: [],
    lastEngine: null,
    lowConfidence: false,
    updatedAt: '',
  };
}

function shouldWrite(status: FieldStatus, current: string, incoming: string, lowConfidence: boolean): boolean {
  if (status === 'verified') return false;
  if (incoming === current) return false;
  if (status === 'missing' || status === 'needs_review' || current === '') return true;
  // 'extracted': only a confident pass may replace an earlier extraction
  return !lowConfidence;
}

/** Review reasons that stop applying once the record has the value */
function stillApplies(reason: ReviewReason, fields: CaseFields): boolean {
  switch (reason) {
    case 'MISSING_WARD_NAME':
      return !fields.wardFirst && !fields.wardLast;
    case 'MISSING_GUARDIAN_NAME':
      return !fields.guardian1Name;
    default:
      return true;
  }
}

function sameReasons(a: ReviewReason[], b: ReviewReason[]): boolean {
  return a.length === b.length && a.every(reason => b.includes(reason));
}

/**
 * Merge one extraction pass into the stored record.
 *
 * Verified fields are never touched. Missing, empty or needs_review fields take
 * any non-empty value. An extracted field is replaced only by a different
 * non-empty value from a pass that was not low confidence. An empty value never
 * clears a field. Merging the same candidate twice changes nothing.
 */
export function mergeCaseRecord(existing: CaseRecord | null, candidate: CaseCandidate, now: string): MergeResult {
  const base = existing ?? newRecord(candidate.causeNumber);
  const fields: CaseFields = { ...base.fields };
  const fieldStatus: Record<CaseFieldKey, FieldStatus> = { ...base.fieldStatus };
  const fieldsWritten: CaseFieldKey[] = [];

  for (const key of CASE_FIELD_KEYS) {
    const incoming = (candidate.fields[key] ?? '').trim();
    if (!incoming) continue;

    if (shouldWrite(fieldStatus[key], fields[key], incoming, candidate.lowConfidence)) {
      fields[key] = incoming;
      fieldStatus[key] = 'extracted';
      fieldsWritten.push(key);
    }
  }

  const reviewReasons: ReviewReason[] = [];
  for (const reason of [...base.reviewReasons, ...candidate.reviewReasons]) {
    if (!reviewReasons.includes(reason) && stillApplies(reason, fields)) {
      reviewReasons.push(reason);
    }
  }

  const contributed = fieldsWritten.length > 0;
  const changed = existing === null || contributed || !sameReasons(reviewReasons, base.reviewReasons);

  if (!changed) {
    return { record: base, fieldsWritten, changed };
  }

  return {
    record: {
      causeNumber: base.causeNumber,
      fields,
      fieldStatus,
      needsReview: reviewReasons.length > 0,
      reviewReasons,
      lastEngine: contributed ? candidate.engine : base.lastEngine,
      lowConfidence: contributed ? candidate.lowConfidence : base.lowConfidence,
      updatedAt: now,
    },
    fieldsWritten,
    changed,
  };
}

/**
 * Single writer into the case store: lock, read, merge, write once, unlock.
 */
export class RecordAssembler {
  constructor(
    private readonly repository: CaseRepository,
    private readonly lock: StoreLock,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async upsert(candidate: CaseCandidate): Promise<MergeResult> {
    if (!candidate.causeNumber) {
      throw new ExtractionError(ErrorCodes.MISSING_CAUSE_NUMBER, 'A case record needs a cause number', {
        documentKind: candidate.documentKind,
      });
    }

    let token: string | null;
    try {
      token = await this.lock.acquire();
    } catch (error) {
      throw new StoreUnavailableError('Could not reach the store lock', {
        causeNumber: candidate.causeNumber,
        reason: errorMessage(error),
      });
    }
    if (!token) {
      throw new StoreUnavailableError('Case store is locked by another writer', {
        causeNumber: candidate.causeNumber,
      });
    }

    try {
      const existing = await this.repository.findByCauseNumber(candidate.causeNumber);
      const result = mergeCaseRecord(existing, candidate, this.clock().toISOString());

      if (result.changed) {
        await this.repository.upsert(result.record);
        logger.info(
          { causeNumber: candidate.causeNumber, fieldsWritten: result.fieldsWritten, created: existing === null },
          'Case record written'
        );
      } else {
        logger.info({ causeNumber: candidate.causeNumber }, 'Case record already up to date');
      }
      return result;
    } finally {
      await this.releaseQuietly(token, candidate.causeNumber);
    }
  }

  // An unreleased lock expires after its TTL
  private async releaseQuietly(token: string, causeNumber: string): Promise<void> {
    try {
      await this.lock.release(token);
    } catch (error) {
      logger.warn({ error: errorMessage(error), causeNumber }, 'Failed to release store lock');
    }
  }
}
