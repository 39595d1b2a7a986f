import type { AnchorType } from '../extraction/section-segmenter';
import type { CaseFieldKey } from '../types';
import type { EngineId } from '../types/ocr';
import { FieldAmbiguousError, SectionNotFoundError, errorMessage } from '../utils/errors';
import { logger as defaultLogger, Logger } from '../utils/logger';

export type ProvenanceReason =
  | 'SECTION_NOT_FOUND'
  | 'LABEL_NOT_FOUND'
  | 'VALUE_REJECTED'
  | 'INSUFFICIENT_TEXT'
  | 'FIELD_AMBIGUOUS';

export interface FieldProvenance {
  field: CaseFieldKey;
  status: 'extracted' | 'missing';
  engine: EngineId | null;
  anchorType?: AnchorType;
  /** Anchor phrase, or "caption" / "page" for values read outside a section */
  anchorLabel?: string;
  corrections: string[];
  /** How a shared cell was split, e.g. "pair:conjunction" */
  split?: string;
  reason?: ProvenanceReason;
  detail?: string;
}

export interface ExtractedMeta {
  anchorType?: AnchorType;
  anchorLabel?: string;
  corrections?: string[];
  split?: string;
}

/**
 * Per-field audit trail for one parse of one document.
 *
 * Advisory only: nothing in the pipeline reads it to make a decision, and a failure
 * while recording is logged and dropped.
 */
export class ProvenanceTracker {
  private readonly fields = new Map<CaseFieldKey, FieldProvenance>();

  constructor(
    private readonly engine: EngineId | null,
    private readonly lowConfidence = false,
    private readonly log: Logger = defaultLogger
  ) {}

  extracted(field: CaseFieldKey, meta: ExtractedMeta = {}): void {
    this.safely(field, () => {
      this.fields.set(field, {
        field,
        status: 'extracted',
        engine: this.engine,
        anchorType: meta.anchorType,
        anchorLabel: meta.anchorLabel,
        corrections: [...new Set(meta.corrections ?? [])],
        split: meta.split,
      });
    });
  }

  /**
   * Low-confidence text turns every structural reason into INSUFFICIENT_TEXT,
   * keeping the structural one in the detail.
   */
  missing(field: CaseFieldKey, reason: ProvenanceReason, detail?: string): void {
    this.safely(field, () => {
      const effective: ProvenanceReason = this.lowConfidence ? 'INSUFFICIENT_TEXT' : reason;
      const note = this.lowConfidence && reason !== 'INSUFFICIENT_TEXT' ? [reason, detail].filter(Boolean).join(': ') : detail;
      this.fields.set(field, {
        field,
        status: 'missing',
        engine: this.engine,
        corrections: [],
        reason: effective,
        detail: note,
      });
      this.log.debug({ field, reason: effective, detail: note }, 'Field not extracted');
    });
  }

  sectionMissing(section: string, fields: readonly CaseFieldKey[]): void {
    const error = new SectionNotFoundError(section, { engine: this.engine });
    this.log.info({ code: error.code, section, engine: this.engine }, error.message);
    for (const field of fields) {
      this.missing(field, 'SECTION_NOT_FOUND', `${section} section`);
    }
  }

  /**
   * Conflicting separators are resolved by priority; this only records and logs the choice.
   */
  ambiguous(field: CaseFieldKey, chosen: string, separatorsSeen: readonly string[]): void {
    this.safely(field, () => {
      const error = new FieldAmbiguousError(field, { chosen, separatorsSeen });
      this.log.warn({ code: error.code, field, chosen, separatorsSeen }, error.message);
      const entry = this.fields.get(field);
      if (entry) {
        entry.detail = `FIELD_AMBIGUOUS: split on ${chosen}, also saw ${separatorsSeen.join(', ')}`;
      }
    });
  }

  get(field: CaseFieldKey): FieldProvenance | undefined {
    return this.fields.get(field);
  }

  entries(): FieldProvenance[] {
    return [...this.fields.values()];
  }

  extractedFields(): CaseFieldKey[] {
    return this.entries()
      .filter(entry => entry.status === 'extracted')
      .map(entry => entry.field);
  }

  missingFields(): CaseFieldKey[] {
    return this.entries()
      .filter(entry => entry.status === 'missing')
      .map(entry => entry.field);
  }

  correctionsApplied(): string[] {
    return [...new Set(this.entries().flatMap(entry => entry.corrections))];
  }

  private safely(field: CaseFieldKey, record: () => void): void {
    try {
      record();
    } catch (error) {
      this.log.warn({ field, error: errorMessage(error) }, 'Failed to record provenance');
    }
  }
}
