import type { AppConfig } from '../../config';
import type { OcrEngine } from '../../types/ocr';
import { logger } from '../../utils/logger';
import { ClaudeOCRClient } from '../claude-client';
import { GeminiClient } from '../gemini-client';
import { PDFConverter } from '../pdf-converter';
import { ClaudeEngine } from './claude-engine';
import { GeminiEngine } from './gemini-engine';
import { TesseractEngine } from './tesseract-engine';
import { TextLayerEngine } from './text-layer-engine';

export { ClaudeEngine, GeminiEngine, TesseractEngine, TextLayerEngine };

/**
 * Engines in cost order. Cloud engines without credentials are left out.
 */
export function createEngines(appConfig: AppConfig): OcrEngine[] {
  const ocr = appConfig.ocr;
  const converter = new PDFConverter(ocr.tempDir);
  const engines: OcrEngine[] = [new TextLayerEngine(ocr.maxPages)];

  if (ocr.tesseractEnabled) {
    engines.push(new TesseractEngine(converter, { binary: ocr.tesseractBin, maxPages: ocr.maxPages }));
  }
  if (ocr.geminiApiKey) {
    engines.push(new GeminiEngine(new GeminiClient(ocr.geminiApiKey, ocr.geminiModel), converter));
  }
  if (ocr.anthropicApiKey) {
    engines.push(new ClaudeEngine(new ClaudeOCRClient({ apiKey: ocr.anthropicApiKey, model: ocr.claudeModel }), converter, ocr.maxPages));
  }

  logger.info({ engines: engines.map(engine => engine.id) }, 'OCR engines registered');
  return engines.sort((a, b) => a.tier - b.tier);
}
