import type { OcrEngine, SourceDocument } from '../../types/ocr';
import { ClaudeOCRClient } from '../claude-client';
import { PDFConverter } from '../pdf-converter';
import { PAGE_SEPARATOR, TRANSCRIBE_PROMPT } from '../prompts';

/**
 * Cloud tier 2: rendered pages through Claude vision, one request per page.
 */
export class ClaudeEngine implements OcrEngine {
  readonly id = 'claude';
  readonly tier = 3;
  readonly usesNetwork = true;

  constructor(
    private readonly client: ClaudeOCRClient,
    private readonly converter: PDFConverter,
    private readonly maxPages: number
  ) {}

  async extractText(document: SourceDocument): Promise<string> {
    const { pdfPath, temporary } = await this.converter.materialize(document);
    const imagePaths: string[] = [];

    try {
      const { pages } = await this.converter.convertPages(pdfPath, this.maxPages, { format: 'jpg', dpi: 200 });
      imagePaths.push(...pages.map(page => page.imagePath));

      const texts: string[] = [];
      for (const page of pages) {
        const result = await this.client.extractTextFromImage(page.base64Data, page.mimeType, TRANSCRIBE_PROMPT);
        texts.push(result.text);
      }
      return texts.join(PAGE_SEPARATOR);
    } finally {
      for (const imagePath of imagePaths) {
        await this.converter.cleanup(imagePath);
      }
      if (temporary) {
        await this.converter.cleanup(pdfPath);
      }
    }
  }
}
