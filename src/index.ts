export * from './types';
export * from './types/ocr';
export { config } from './config';
export type { AppConfig } from './config';
export { loadExtractionConfig, parseExtractionConfig } from './config/extraction-config';
export type { ExtractionConfig } from './config/extraction-config';
export * from './ocr';
export { segment } from './extraction/section-segmenter';
export { extractField } from './extraction/field-extractor';
export { splitDualValue, inferSharedSurname, mirrorSecondaryAddress } from './extraction/dual-subject-splitter';
export { parseArp, guardianSignalScore } from './extraction/arp-parser';
export { parseOrder } from './extraction/order-parser';
export { classifyDocument } from './extraction/document-kind';
export { ProvenanceTracker } from './diagnostics/provenance';
export type { FieldProvenance, ProvenanceReason } from './diagnostics/provenance';
export { RecordAssembler, candidateFields, mergeCaseRecord } from './store/record-assembler';
export type { MergeResult } from './store/record-assembler';
export { SupabaseCaseRepository } from './store/case-repository';
export type { CaseRepository } from './store/case-repository';
export { RedisStoreLock } from './store/store-lock';
export type { StoreLock } from './store/store-lock';
export * from './pipeline';
export * from './utils/errors';
export { logger } from './utils/logger';
