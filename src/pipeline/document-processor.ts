import type { ExtractionConfig } from '../config/extraction-config';
import { ProvenanceTracker } from '../diagnostics/provenance';
import { parseArp } from '../extraction/arp-parser';
import { normalizePageText } from '../extraction/corrections';
import { classifyByContent, classifyByName } from '../extraction/document-kind';
import { causeNumberDistance, normalizeCauseNumber } from '../extraction/normalizers';
import { parseOrder } from '../extraction/order-parser';
import type { OcrCascade } from '../ocr/cascade';
import { RecordAssembler, candidateFields } from '../store/record-assembler';
import type { DocumentKind, DocumentResult, ExtractedCase, ReviewReason } from '../types';
import type { CascadeOutput, CascadeRun, SourceDocument } from '../types/ocr';
import { StoreUnavailableError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

/**
 * A cause number known from another document of the same batch
 */
export interface CauseHint {
  causeNumber: string;
  wardLast: string;
}

interface ParsedPass {
  output: CascadeOutput;
  extracted: ExtractedCase;
  tracker: ProvenanceTracker;
  corrections: string[];
}

export interface HintResolution {
  causeNumber: string;
  mismatch: boolean;
  hint?: string;
}

/**
 * Reconcile a parsed cause number with the expected one.
 *
 * The hint only fills a missing cause number. A parsed number within
 * `maxDigitDifference` digits of the hint is kept and flagged; one further away
 * belongs to some other case and is left alone.
 */
export function applyCauseHint(parsed: string, hint: string | undefined, maxDigitDifference = 1): HintResolution {
  if (!hint) return { causeNumber: parsed, mismatch: false };
  if (!parsed) return { causeNumber: hint, mismatch: false, hint };
  const distance = causeNumberDistance(parsed, hint);
  return { causeNumber: parsed, mismatch: distance > 0 && distance <= maxDigitDifference, hint };
}

/**
 * Pick the hint for a document: an explicit one first, then the batch cause
 * nearest to the parsed number, then the batch cause filed under the same ward.
 */
export function chooseHint(
  document: SourceDocument,
  parsedCause: string,
  wardLast: string,
  known: readonly CauseHint[],
  maxDigitDifference = 1
): string | undefined {
  if (document.causeNumberHint) return normalizeCauseNumber(document.causeNumberHint);
  if (known.length === 0) return undefined;

  if (parsedCause) {
    let nearest: CauseHint | undefined;
    let nearestDistance = Infinity;
    for (const hint of known) {
      const distance = causeNumberDistance(parsedCause, hint.causeNumber);
      if (distance < nearestDistance) {
        nearest = hint;
        nearestDistance = distance;
      }
    }
    return nearest && nearestDistance <= maxDigitDifference ? nearest.causeNumber : undefined;
  }

  const sameWard = wardLast ? known.filter(hint => hint.wardLast.toLowerCase() === wardLast.toLowerCase()) : [];
  if (sameWard.length === 1) return sameWard[0].causeNumber;
  return known.length === 1 ? known[0].causeNumber : undefined;
}

function hasRequiredFields(kind: DocumentKind, extracted: ExtractedCase): boolean {
  if (kind === 'order') return Boolean(extracted.causeNumber && extracted.dateAppointed);
  return Boolean(extracted.primaryGuardian?.name);
}

/**
 * Runs one PDF through classification, OCR, parsing and the case store.
 */
export class DocumentProcessor {
  constructor(
    private readonly cascade: OcrCascade,
    private readonly assembler: RecordAssembler,
    private readonly config: ExtractionConfig,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async process(document: SourceDocument, known: readonly CauseHint[] = []): Promise<DocumentResult> {
    const byName = classifyByName(document.fileName);
    if (byName === 'approval') {
      logger.info({ fileName: document.fileName }, 'Skipping approval document');
      return this.skipped(document, byName);
    }

    const run = await this.cascade.run(document);
    const kind = byName !== 'unknown' ? byName : classifyByContent(normalizePageText(run.chosen.text, this.config).value);
    if (kind !== 'arp' && kind !== 'order') {
      logger.info({ fileName: document.fileName, kind }, 'Unrecognized document, nothing extracted');
      return { ...this.skipped(document, kind), attempts: run.attempts, engine: run.chosen.engine };
    }

    let pass = this.parse(kind, run.chosen);
    let escalated = false;
    if (!hasRequiredFields(kind, pass.extracted)) {
      const accepted = await this.escalate(kind, run);
      if (accepted) {
        pass = accepted;
        escalated = true;
      }
    }

    const { extracted, tracker, output } = pass;
    const { maxDigitDifference } = this.config.settings.causeNumberHint;
    const hint = chooseHint(document, extracted.causeNumber, extracted.ward.last, known, maxDigitDifference);
    const resolution = applyCauseHint(extracted.causeNumber, hint, maxDigitDifference);
    if (resolution.mismatch) {
      logger.warn(
        { fileName: document.fileName, parsed: extracted.causeNumber, hint: resolution.hint },
        'Cause number differs slightly from the expected one'
      );
    }

    const reviewReasons: ReviewReason[] = [];
    if (!resolution.causeNumber) reviewReasons.push('MISSING_CAUSE_NUMBER');
    if (!extracted.ward.first && !extracted.ward.last) reviewReasons.push('MISSING_WARD_NAME');
    if (kind === 'arp' && !extracted.primaryGuardian?.name) reviewReasons.push('MISSING_GUARDIAN_NAME');
    if (output.lowConfidence) reviewReasons.push('LOW_CONFIDENCE_TEXT');
    if (resolution.mismatch) reviewReasons.push('CAUSE_NUMBER_HINT_MISMATCH');

    const result: DocumentResult = {
      fileName: document.fileName,
      documentKind: kind,
      outcome: reviewReasons.length > 0 ? 'needs_review' : 'upserted',
      causeNumber: resolution.causeNumber,
      wardLast: extracted.ward.last,
      engine: output.engine,
      lowConfidence: output.lowConfidence,
      escalated,
      fieldsExtracted: tracker.extractedFields(),
      fieldsMissing: tracker.missingFields(),
      correctionsApplied: [...new Set([...pass.corrections, ...tracker.correctionsApplied()])],
      reviewReasons,
      attempts: run.attempts,
      fieldsWritten: [],
    };

    if (!resolution.causeNumber) {
      logger.warn({ fileName: document.fileName }, 'No cause number, record not written');
      return result;
    }

    try {
      const merge = await this.assembler.upsert({
        causeNumber: resolution.causeNumber,
        fields: candidateFields(extracted),
        documentKind: kind,
        engine: output.engine,
        lowConfidence: output.lowConfidence,
        reviewReasons,
      });
      result.fieldsWritten = merge.fieldsWritten;
    } catch (error) {
      if (!(error instanceof StoreUnavailableError)) throw error;
      logger.error({ code: error.code, fileName: document.fileName, ...error.details }, error.message);
      result.outcome = 'store_unavailable';
      result.error = errorMessage(error);
    }

    return result;
  }

  private parse(kind: 'arp' | 'order', output: CascadeOutput): ParsedPass {
    const tracker = new ProvenanceTracker(output.engine, output.lowConfidence);
    const normalized = normalizePageText(output.text, this.config);
    const extracted = kind === 'order' ? parseOrder(normalized.value, tracker) : parseArp(normalized.value, this.config, tracker, this.clock());
    return { output, extracted, tracker, corrections: normalized.fired };
  }

  private async escalate(kind: 'arp' | 'order', run: CascadeRun): Promise<ParsedPass | undefined> {
    logger.info(
      { fileName: run.document.fileName, kind, engine: run.chosen.engine },
      'Required fields missing, trying a higher OCR tier'
    );
    const accepted: ParsedPass[] = [];
    await this.cascade.escalate(run, candidate => {
      const pass = this.parse(kind, candidate);
      if (!hasRequiredFields(kind, pass.extracted)) return false;
      accepted.push(pass);
      return true;
    });
    return accepted.pop();
  }

  private skipped(document: SourceDocument, kind: DocumentKind): DocumentResult {
    return {
      fileName: document.fileName,
      documentKind: kind,
      outcome: 'skipped',
      causeNumber: '',
      wardLast: '',
      engine: null,
      lowConfidence: false,
      escalated: false,
      fieldsExtracted: [],
      fieldsMissing: [],
      correctionsApplied: [],
      reviewReasons: [],
      attempts: [],
      fieldsWritten: [],
    };
  }
}
