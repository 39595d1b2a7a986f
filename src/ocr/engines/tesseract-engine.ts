import { execFile } from 'child_process';
import { promisify } from 'util';
import { guardianSignalScore } from '../../extraction/arp-parser';
import type { OcrEngine, SourceDocument } from '../../types/ocr';
import { logger } from '../../utils/logger';
import { PDFConverter } from '../pdf-converter';
import { PAGE_SEPARATOR } from '../prompts';

const execFileAsync = promisify(execFile);

// Column-aware (4) and uniform-block (6) layouts read different form scans best
const PAGE_SEGMENTATION_MODES = [4, 6] as const;

export interface TesseractEngineOptions {
  binary: string;
  maxPages: number;
}

/**
 * Local OCR through the tesseract CLI over rendered page images.
 */
export class TesseractEngine implements OcrEngine {
  readonly id = 'tesseract';
  readonly tier = 1;
  readonly usesNetwork = false;

  constructor(
    private readonly converter: PDFConverter,
    private readonly options: TesseractEngineOptions
  ) {}

  async extractText(document: SourceDocument): Promise<string> {
    const { pdfPath, temporary } = await this.converter.materialize(document);
    const imagePaths: string[] = [];

    try {
      const { pages } = await this.converter.convertPages(pdfPath, this.options.maxPages);
      imagePaths.push(...pages.map(page => page.imagePath));

      let best = '';
      let bestScore = -1;
      for (const psm of PAGE_SEGMENTATION_MODES) {
        const texts: string[] = [];
        for (const imagePath of imagePaths) {
          texts.push(await this.recognize(imagePath, psm));
        }
        const text = texts.join(PAGE_SEPARATOR);
        const score = guardianSignalScore(text);
        logger.debug({ fileName: document.fileName, psm, score }, 'Tesseract pass scored');
        if (score > bestScore) {
          best = text;
          bestScore = score;
        }
      }
      return best;
    } finally {
      for (const imagePath of imagePaths) {
        await this.converter.cleanup(imagePath);
      }
      if (temporary) {
        await this.converter.cleanup(pdfPath);
      }
    }
  }

  private async recognize(imagePath: string, psm: number): Promise<string> {
    const { stdout } = await execFileAsync(this.options.binary, [imagePath, 'stdout', '--psm', String(psm)], {
      maxBuffer: 16 * 1024 * 1024,
    });
    return stdout;
  }
}
