/**
 * OCR engines and the cascade that orders them by cost.
 *
 * Engines:
 * - text-layer (embedded PDF text)
 * - tesseract (local, on rendered pages)
 * - gemini (File API upload of the PDF)
 * - claude (vision on rendered pages)
 */

export { OcrCascade, countChars } from './cascade';
export type { CascadeOptions } from './cascade';
export { ClaudeEngine, GeminiEngine, TesseractEngine, TextLayerEngine, createEngines } from './engines';
export { PDFConverter } from './pdf-converter';
export type { PDFToImageOptions, ConversionResult, MultiPageConversionResult } from './pdf-converter';
export { GeminiClient } from './gemini-client';
export { ClaudeOCRClient } from './claude-client';
export { TRANSCRIBE_PROMPT } from './prompts';
