import pdfParse from 'pdf-parse';
import type { OcrEngine, SourceDocument } from '../../types/ocr';
import { logger } from '../../utils/logger';

/**
 * Embedded PDF text. Free and instant, empty for scanned pages.
 */
export class TextLayerEngine implements OcrEngine {
  readonly id = 'text-layer';
  readonly tier = 0;
  readonly usesNetwork = false;

  constructor(private readonly maxPages: number) {}

  async extractText(document: SourceDocument): Promise<string> {
    const result = await pdfParse(document.bytes, { max: this.maxPages });
    logger.debug({ fileName: document.fileName, pages: result.numpages, chars: result.text.length }, 'Text layer read');
    return result.text;
  }
}
