import fs from 'fs/promises';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { classifyByName } from '../extraction/document-kind';
import { extractCauseNumber } from '../extraction/normalizers';
import type { BatchReport, DocumentResult } from '../types';
import type { SourceDocument } from '../types/ocr';
import { ConfigurationError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import type { CauseHint, DocumentProcessor } from './document-processor';
import { SummaryLogger } from './summary-logger';

export interface BatchOptions {
  /** Expected cause number, applied to every document of the run */
  causeNumberHint?: string;
}

/** ORDER documents first so their cause numbers are known when the ARPs are parsed */
function processingRank(fileName: string): number {
  switch (classifyByName(fileName)) {
    case 'order':
      return 0;
    case 'approval':
      return 2;
    default:
      return 1;
  }
}

export async function listPdfFiles(target: string): Promise<string[]> {
  const stats = await fs.stat(target);
  if (stats.isFile()) return [target];

  const entries = await fs.readdir(target, { withFileTypes: true });
  return entries
    .filter(entry => entry.isFile() && entry.name.toLowerCase().endsWith('.pdf'))
    .map(entry => path.join(target, entry.name))
    .sort((a, b) => {
      const rank = processingRank(path.basename(a)) - processingRank(path.basename(b));
      return rank !== 0 ? rank : a.localeCompare(b);
    });
}

/**
 * Processes a folder (or a single PDF) strictly one document at a time.
 */
export class BatchRunner {
  constructor(
    private readonly processor: DocumentProcessor,
    private readonly engineIds: string[] = []
  ) {}

  async run(target: string, options: BatchOptions = {}): Promise<BatchReport> {
    const runId = uuidv4();
    const startedAt = new Date().toISOString();
    const files = await listPdfFiles(target);
    const known: CauseHint[] = [];
    const results: DocumentResult[] = [];

    logger.info({ runId, target, documents: files.length }, 'Extraction run started');
    SummaryLogger.batchStarted(runId, files.length, this.engineIds);

    for (const filePath of files) {
      const result = await this.processFile(filePath, known, options);
      results.push(result);
      SummaryLogger.documentResult(result);

      if (result.documentKind === 'order' && result.causeNumber) {
        known.push({ causeNumber: result.causeNumber, wardLast: result.wardLast });
      }
    }

    const report: BatchReport = { runId, startedAt, finishedAt: new Date().toISOString(), results };
    logger.info(
      { runId, documents: results.length, outcomes: results.map(r => `${r.fileName}:${r.outcome}`) },
      'Extraction run complete'
    );
    SummaryLogger.batchComplete(report);
    return report;
  }

  private async processFile(filePath: string, known: CauseHint[], options: BatchOptions): Promise<DocumentResult> {
    const fileName = path.basename(filePath);
    const document: SourceDocument = {
      fileName,
      path: filePath,
      bytes: await fs.readFile(filePath),
      causeNumberHint: options.causeNumberHint || extractCauseNumber(fileName) || undefined,
    };

    try {
      return await this.processor.process(document, known);
    } catch (error) {
      if (error instanceof ConfigurationError) throw error;
      logger.error({ fileName, error: errorMessage(error) }, 'Document processing failed');
      return {
        fileName,
        documentKind: classifyByName(fileName),
        outcome: 'needs_review',
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
        error: errorMessage(error),
      };
    }
  }
}
