import type { OcrEngine, SourceDocument } from '../../types/ocr';
import { EngineFailureError } from '../../utils/errors';
import { GeminiClient } from '../gemini-client';
import { PDFConverter } from '../pdf-converter';
import { TRANSCRIBE_PROMPT } from '../prompts';

/**
 * Cloud tier 1: the whole PDF goes through the Gemini File API.
 */
export class GeminiEngine implements OcrEngine {
  readonly id = 'gemini';
  readonly tier = 2;
  readonly usesNetwork = true;

  constructor(
    private readonly client: GeminiClient,
    private readonly converter: PDFConverter
  ) {}

  async extractText(document: SourceDocument): Promise<string> {
    const { pdfPath, temporary } = await this.converter.materialize(document);
    try {
      const result = await this.client.processFile(pdfPath, TRANSCRIBE_PROMPT);
      if (!result.success) {
        throw new EngineFailureError(this.id, result.error || 'Gemini transcription failed', {
          fileName: document.fileName,
        });
      }
      return result.content;
    } finally {
      if (temporary) {
        await this.converter.cleanup(pdfPath);
      }
    }
  }
}
