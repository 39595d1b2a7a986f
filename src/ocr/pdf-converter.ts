import { execFile } from 'child_process';
import { promisify } from 'util';
import fs from 'fs/promises';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import type { SourceDocument } from '../types/ocr';
import { logger } from '../utils/logger';

const execFileAsync = promisify(execFile);

export interface PDFToImageOptions {
  dpi?: number;
  format?: 'png' | 'jpg';
  quality?: number;
}

export interface ConversionResult {
  imagePath: string;
  mimeType: string;
  base64Data: string;
}

export interface MultiPageConversionResult {
  pages: ConversionResult[];
  totalPages: number;
}

/**
 * Render PDF pages to images with ImageMagick, falling back to pdftoppm.
 * Page images land in a per-run temp directory and are removed by `cleanup`.
 */
export class PDFConverter {
  private tempDir: string;

  constructor(tempDir?: string) {
    this.tempDir = tempDir || '/tmp/guardian-ocr';
  }

  async initialize(): Promise<void> {
    try {
      await fs.mkdir(this.tempDir, { recursive: true });
      logger.debug({ tempDir: this.tempDir }, 'PDF converter initialized');
    } catch (error) {
      logger.error({ error, tempDir: this.tempDir }, 'Failed to create temp directory');
      throw error;
    }
  }

  /**
   * Path of the document on disk; in-memory documents are written to the temp dir first.
   */
  async materialize(document: SourceDocument): Promise<{ pdfPath: string; temporary: boolean }> {
    if (document.path) {
      return { pdfPath: document.path, temporary: false };
    }
    await this.initialize();
    const pdfPath = path.join(this.tempDir, `${uuidv4()}.pdf`);
    await fs.writeFile(pdfPath, document.bytes);
    return { pdfPath, temporary: true };
  }

  async getPageCount(pdfPath: string): Promise<number> {
    try {
      const { stdout } = await execFileAsync('pdfinfo', [pdfPath]);
      const match = stdout.match(/Pages:\s+(\d+)/);
      if (match) {
        return parseInt(match[1], 10);
      }
    } catch (error) {
      logger.warn({ error }, 'pdfinfo failed, trying ImageMagick identify');

      try {
        const { stdout } = await execFileAsync('identify', ['-format', '%n\n', pdfPath]);
        const pageCount = parseInt(stdout.split('\n')[0].trim(), 10);
        if (!isNaN(pageCount)) {
          return pageCount;
        }
      } catch (fallbackError) {
        logger.warn({ error: fallbackError }, 'Failed to get page count, assuming 1 page');
      }
    }

    return 1;
  }

  /**
   * Render the first `maxPages` pages, in page order.
   */
  async convertPages(pdfPath: string, maxPages: number, options?: PDFToImageOptions): Promise<MultiPageConversionResult> {
    // Page images always land in the temp dir, even for documents already on disk
    await this.initialize();
    const totalPages = await this.getPageCount(pdfPath);
    const count = Math.min(totalPages, Math.max(1, maxPages));
    logger.debug({ pdfPath, totalPages, count }, 'Converting PDF pages to images');

    const pages: ConversionResult[] = [];
    for (let page = 1; page <= count; page++) {
      pages.push(await this.convertPageToImage(pdfPath, page, options));
    }

    logger.debug(
      {
        pdfPath,
        pages: pages.length,
        totalSizeKB: Math.round(pages.reduce((sum, p) => sum + p.base64Data.length, 0) / 1024),
      },
      'PDF pages converted'
    );

    return { pages, totalPages };
  }

  async convertPageToImage(pdfPath: string, pageNumber: number, options?: PDFToImageOptions): Promise<ConversionResult> {
    const dpi = options?.dpi || 300;
    const format = options?.format || 'png';
    const quality = options?.quality || 95;

    const outputPath = path.join(this.tempDir, `${path.basename(pdfPath, '.pdf')}-${uuidv4()}-page${pageNumber}.${format}`);

    try {
      await this.convertPageWithImageMagick(pdfPath, outputPath, pageNumber, dpi, quality);
    } catch (error) {
      logger.warn({ error, pageNumber }, 'ImageMagick conversion failed, trying pdftoppm');

      try {
        await this.convertPageWithPdftoppm(pdfPath, outputPath, pageNumber, dpi, format);
      } catch (fallbackError) {
        logger.error({ error: fallbackError, pageNumber }, 'All PDF conversion methods failed');
        throw new Error(
          `Failed to convert PDF page ${pageNumber} to image. Please ensure ImageMagick or poppler-utils is installed.`
        );
      }
    }

    const imageBuffer = await fs.readFile(outputPath);
    const base64Data = imageBuffer.toString('base64');
    const mimeType = format === 'png' ? 'image/png' : 'image/jpeg';

    logger.debug({ pdfPath, pageNumber, sizeKB: Math.round(imageBuffer.length / 1024) }, 'PDF page converted to image');

    return { imagePath: outputPath, mimeType, base64Data };
  }

  private async convertPageWithImageMagick(
    pdfPath: string,
    outputPath: string,
    pageNumber: number,
    dpi: number,
    quality: number
  ): Promise<void> {
    // ImageMagick pages are 0-indexed
    const args = ['-density', String(dpi), '-quality', String(quality), `${pdfPath}[${pageNumber - 1}]`, outputPath];
    logger.debug({ args, pageNumber }, 'Running ImageMagick conversion');

    const { stderr } = await execFileAsync('convert', args);
    if (stderr && !stderr.includes('Warning')) {
      logger.warn({ stderr, pageNumber }, 'ImageMagick conversion warnings');
    }
  }

  private async convertPageWithPdftoppm(
    pdfPath: string,
    outputPath: string,
    pageNumber: number,
    dpi: number,
    format: 'png' | 'jpg'
  ): Promise<void> {
    const outputPrefix = outputPath.slice(0, -path.extname(outputPath).length);
    const args = [
      format === 'png' ? '-png' : '-jpeg',
      '-r',
      String(dpi),
      '-f',
      String(pageNumber),
      '-l',
      String(pageNumber),
      '-singlefile',
      pdfPath,
      outputPrefix,
    ];
    logger.debug({ args, pageNumber }, 'Running pdftoppm conversion');

    const { stderr } = await execFileAsync('pdftoppm', args);
    if (stderr) {
      logger.warn({ stderr, pageNumber }, 'pdftoppm conversion warnings');
    }
  }

  async cleanup(filePath: string): Promise<void> {
    try {
      await fs.unlink(filePath);
      logger.debug({ filePath }, 'Cleaned up temporary file');
    } catch (error) {
      logger.warn({ error, filePath }, 'Failed to clean up temporary file');
    }
  }
}
