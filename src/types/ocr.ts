/**
 * Types shared by the OCR engines and the cascade controller
 */

export type EngineId = 'text-layer' | 'tesseract' | 'gemini' | 'claude';

/**
 * A PDF handed to the pipeline
 */
export interface SourceDocument {
  /** File name used for classification and logs (e.g., "ORDER - Smith.pdf") */
  fileName: string;
  /** Absolute path when the document lives on disk */
  path?: string;
  /** Raw PDF bytes */
  bytes: Buffer;
  /** Expected cause number from a companion document or the file name */
  causeNumberHint?: string;
}

/**
 * Uniform adapter around one OCR backend.
 * `extractText` throws on failure; the cascade turns that into an attempt result.
 */
export interface OcrEngine {
  readonly id: EngineId;
  /** Position in the cost order, lower is cheaper */
  readonly tier: number;
  /** Network engines run under a bounded timeout */
  readonly usesNetwork: boolean;
  extractText(document: SourceDocument): Promise<string>;
}

export type AttemptStatus = 'success' | 'insufficient' | 'error';

/**
 * One engine invocation. Transient, never persisted.
 */
export interface ExtractionAttempt {
  engine: EngineId;
  tier: number;
  status: AttemptStatus;
  /** Non-whitespace characters produced */
  charCount: number;
  timestamp: string;
  durationMs: number;
  error?: string;
}

export interface CascadeOutput {
  engine: EngineId | null;
  text: string;
  charCount: number;
  /** True when no engine reached the sufficiency threshold */
  lowConfidence: boolean;
}

/**
 * State of one document's pass through the cascade.
 * Kept so a later escalation can reuse outputs instead of re-invoking engines.
 */
export interface CascadeRun {
  document: SourceDocument;
  chosen: CascadeOutput;
  attempts: ExtractionAttempt[];
  /** Text produced by every engine already invoked for this document */
  outputs: Map<EngineId, string>;
}
