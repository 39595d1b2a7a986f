import type { SupabaseClient } from '@supabase/supabase-js';
import { z } from 'zod';
import type { EngineId } from '../types/ocr';
import {
  CASE_FIELD_KEYS,
  CaseFieldKey,
  CaseRecord,
  FieldStatus,
  ReviewReason,
  emptyFieldStatus,
  emptyFields,
} from '../types';
import { StoreUnavailableError } from '../utils/errors';
import { logger } from '../utils/logger';

/**
 * Read and write access to case records, keyed by cause number
 */
export interface CaseRepository {
  findByCauseNumber(causeNumber: string): Promise<CaseRecord | null>;
  upsert(record: CaseRecord): Promise<void>;
}

const FIELD_STATUSES: readonly FieldStatus[] = ['missing', 'extracted', 'needs_review', 'verified'];
const REVIEW_REASONS: readonly ReviewReason[] = [
  'MISSING_CAUSE_NUMBER',
  'MISSING_WARD_NAME',
  'MISSING_GUARDIAN_NAME',
  'LOW_CONFIDENCE_TEXT',
  'CAUSE_NUMBER_HINT_MISMATCH',
];
const ENGINE_IDS: readonly EngineId[] = ['text-layer', 'tesseract', 'gemini', 'claude'];

/** wardFirst -> ward_first, guardian1Name -> guardian1_name */
export function columnFor(key: CaseFieldKey): string {
  return key.replace(/([A-Z])/g, '_$1').toLowerCase();
}

/**
 * Columns this system owns. Downstream columns of the same table (case
 * management statuses and the like) are never selected or written.
 */
export const OWNED_COLUMNS: readonly string[] = [
  'cause_number',
  ...CASE_FIELD_KEYS.map(columnFor),
  'field_status',
  'needs_review',
  'review_reasons',
  'last_engine',
  'low_confidence',
  'updated_at',
];

const caseRowSchema = z
  .object({
    cause_number: z.string(),
    field_status: z.record(z.string(), z.string()).nullable().optional(),
    needs_review: z.boolean().nullable().optional(),
    review_reasons: z.array(z.string()).nullable().optional(),
    last_engine: z.string().nullable().optional(),
    low_confidence: z.boolean().nullable().optional(),
    updated_at: z.string().nullable().optional(),
  })
  .passthrough();

function isFieldStatus(value: string | undefined): value is FieldStatus {
  return FIELD_STATUSES.some(status => status === value);
}

function isReviewReason(value: string): value is ReviewReason {
  return REVIEW_REASONS.some(reason => reason === value);
}

function isEngineId(value: string | null | undefined): value is EngineId {
  return ENGINE_IDS.some(id => id === value);
}

export function rowToRecord(row: unknown): CaseRecord {
  const parsed = caseRowSchema.parse(row);
  const fields = emptyFields();
  const fieldStatus = emptyFieldStatus();

  for (const key of CASE_FIELD_KEYS) {
    const value: unknown = parsed[columnFor(key)];
    fields[key] = typeof value === 'string' ? value : '';
    const status = parsed.field_status?.[key];
    fieldStatus[key] = isFieldStatus(status) ? status : fields[key] ? 'extracted' : 'missing';
  }

  return {
    causeNumber: parsed.cause_number,
    fields,
    fieldStatus,
    needsReview: parsed.needs_review ?? false,
    reviewReasons: (parsed.review_reasons ?? []).filter(isReviewReason),
    lastEngine: isEngineId(parsed.last_engine) ? parsed.last_engine : null,
    lowConfidence: parsed.low_confidence ?? false,
    updatedAt: parsed.updated_at ?? '',
  };
}

export function recordToRow(record: CaseRecord): Record<string, unknown> {
  const row: Record<string, unknown> = { cause_number: record.causeNumber };
  for (const key of CASE_FIELD_KEYS) {
    row[columnFor(key)] = record.fields[key] || null;
  }
  row.field_status = record.fieldStatus;
  row.needs_review = record.needsReview;
  row.review_reasons = record.reviewReasons;
  row.last_engine = record.lastEngine;
  row.low_confidence = record.lowConfidence;
  row.updated_at = record.updatedAt;
  return row;
}

export class SupabaseCaseRepository implements CaseRepository {
  constructor(
    private readonly client: SupabaseClient,
    private readonly table: string
  ) {}

  async findByCauseNumber(causeNumber: string): Promise<CaseRecord | null> {
    const { data, error } = await this.client
      .from(this.table)
      .select(OWNED_COLUMNS.join(','))
      .eq('cause_number', causeNumber)
      .maybeSingle();

    if (error) {
      logger.error({ error, causeNumber }, 'Failed to read case record');
      throw new StoreUnavailableError('Case store read failed', { causeNumber, reason: error.message });
    }
    return data ? rowToRecord(data) : null;
  }

  async upsert(record: CaseRecord): Promise<void> {
    const { error } = await this.client
      .from(this.table)
      .upsert(recordToRow(record), { onConflict: 'cause_number' });

    if (error) {
      logger.error({ error, causeNumber: record.causeNumber }, 'Failed to write case record');
      throw new StoreUnavailableError('Case store write failed', {
        causeNumber: record.causeNumber,
        reason: error.message,
      });
    }
  }
}
