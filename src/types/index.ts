import type { EngineId, ExtractionAttempt } from './ocr';

export type DocumentKind = 'arp' | 'order' | 'approval' | 'unknown';

/**
 * Field-level lifecycle. Extraction only ever produces `missing` or `extracted`;
 * `needs_review` and `verified` are set by people outside this system.
 */
export type FieldStatus = 'missing' | 'extracted' | 'needs_review' | 'verified';

export const CASE_FIELD_KEYS = [
  'wardFirst',
  'wardMiddle',
  'wardLast',
  'wardDob',
  'wardPhone',
  'wardAddress',
  'livesWith',
  'guardian1Name',
  'guardian1Address',
  'guardian1Email',
  'guardian1Phone',
  'guardian1Relationship',
  'guardian1Dob',
  'guardian2Name',
  'guardian2Address',
  'guardian2Email',
  'guardian2Phone',
  'guardian2Relationship',
  'guardian2Dob',
  'dateArpFiled',
  'dateAppointed',
] as const;

export type CaseFieldKey = (typeof CASE_FIELD_KEYS)[number];

export type CaseFields = Record<CaseFieldKey, string>;

export type ReviewReason =
  | 'MISSING_CAUSE_NUMBER'
  | 'MISSING_WARD_NAME'
  | 'MISSING_GUARDIAN_NAME'
  | 'LOW_CONFIDENCE_TEXT'
  | 'CAUSE_NUMBER_HINT_MISMATCH';

export interface WardIdentity {
  first: string;
  middle: string;
  last: string;
  dob: string;
  phone: string;
  address: string;
  /** "Guardian" when the lives-with checkbox says YES, empty otherwise */
  livesWith: string;
}

export interface GuardianIdentity {
  name: string;
  dob: string;
  phone: string;
  email: string;
  address: string;
  relationship: string;
}

/**
 * Everything parsed out of one document, before it meets the store
 */
export interface ExtractedCase {
  documentKind: DocumentKind;
  /** Normalized NN-NNNNNN, empty when not found */
  causeNumber: string;
  ward: WardIdentity;
  primaryGuardian: GuardianIdentity | null;
  secondaryGuardian: GuardianIdentity | null;
  dateArpFiled: string;
  dateAppointed: string;
}

/**
 * What a single extraction pass proposes for the store
 */
export interface CaseCandidate {
  causeNumber: string;
  fields: Partial<CaseFields>;
  documentKind: DocumentKind;
  engine: EngineId | null;
  lowConfidence: boolean;
  reviewReasons: ReviewReason[];
}

/**
 * One row of the case store
 */
export interface CaseRecord {
  causeNumber: string;
  fields: CaseFields;
  fieldStatus: Record<CaseFieldKey, FieldStatus>;
  needsReview: boolean;
  reviewReasons: ReviewReason[];
  lastEngine: EngineId | null;
  lowConfidence: boolean;
  updatedAt: string;
}

export type DocumentOutcome = 'upserted' | 'needs_review' | 'store_unavailable' | 'skipped';

/**
 * Operator-facing summary produced for every document
 */
export interface DocumentResult {
  fileName: string;
  documentKind: DocumentKind;
  outcome: DocumentOutcome;
  causeNumber: string;
  /** Ward surname as parsed, used to pair ARP documents with ORDER cause numbers */
  wardLast: string;
  engine: EngineId | null;
  lowConfidence: boolean;
  escalated: boolean;
  fieldsExtracted: CaseFieldKey[];
  fieldsMissing: CaseFieldKey[];
  correctionsApplied: string[];
  reviewReasons: ReviewReason[];
  attempts: ExtractionAttempt[];
  /** Fields actually changed in the store by this document */
  fieldsWritten: CaseFieldKey[];
  error?: string;
}

export interface BatchReport {
  runId: string;
  startedAt: string;
  finishedAt: string;
  results: DocumentResult[];
}

export function emptyWard(): WardIdentity {
  return { first: '', middle: '', last: '', dob: '', phone: '', address: '', livesWith: '' };
}

export function emptyGuardian(): GuardianIdentity {
  return { name: '', dob: '', phone: '', email: '', address: '', relationship: '' };
}

export function emptyFields(): CaseFields {
  return {
    wardFirst: '',
    wardMiddle: '',
    wardLast: '',
    wardDob: '',
    wardPhone: '',
    wardAddress: '',
    livesWith: '',
    guardian1Name: '',
    guardian1Address: '',
    guardian1Email: '',
    guardian1Phone: '',
    guardian1Relationship: '',
    guardian1Dob: '',
    guardian2Name: '',
    guardian2Address: '',
    guardian2Email: '',
    guardian2Phone: '',
    guardian2Relationship: '',
    guardian2Dob: '',
    dateArpFiled: '',
    dateAppointed: '',
  };
}

export function emptyFieldStatus(): Record<CaseFieldKey, FieldStatus> {
  return {
    wardFirst: 'missing',
    wardMiddle: 'missing',
    wardLast: 'missing',
    wardDob: 'missing',
    wardPhone: 'missing',
    wardAddress: 'missing',
    livesWith: 'missing',
    guardian1Name: 'missing',
    guardian1Address: 'missing',
    guardian1Email: 'missing',
    guardian1Phone: 'missing',
    guardian1Relationship: 'missing',
    guardian1Dob: 'missing',
    guardian2Name: 'missing',
    guardian2Address: 'missing',
    guardian2Email: 'missing',
    guardian2Phone: 'missing',
    guardian2Relationship: 'missing',
    guardian2Dob: 'missing',
    dateArpFiled: 'missing',
    dateAppointed: 'missing',
  };
}
