import { loadExtractionConfig } from '../../config/extraction-config';
import { OcrCascade } from '../../ocr/cascade';
import { RecordAssembler } from '../../store/record-assembler';
import { InMemoryCaseRepository, InMemoryStoreLock } from '../../store/__tests__/fakes';
import type { EngineId, OcrEngine, SourceDocument } from '../../types/ocr';
import { DocumentProcessor } from '../document-processor';

const NOW = '2025-08-01T12:00:00.000Z';

/**
 * An engine that "reads" a fixed text per file name
 */
export function scriptedEngine(id: EngineId, tier: number, texts: Record<string, string>) {
  const extractText = jest.fn<Promise<string>, [SourceDocument]>(async document => texts[document.fileName] ?? '');
  const engine: OcrEngine = { id, tier, usesNetwork: false, extractText };
  return { engine, extractText };
}

export function buildProcessor(engines: OcrEngine[]) {
  const config = loadExtractionConfig();
  const repository = new InMemoryCaseRepository();
  const lock = new InMemoryStoreLock();
  const cascade = new OcrCascade(engines, {
    sufficiencyThreshold: config.sufficiencyThreshold,
    cloudTimeoutMs: 1000,
    retry: { baseDelayMs: 1, jitterMs: 0 },
  });
  const processor = new DocumentProcessor(cascade, new RecordAssembler(repository, lock, () => new Date(NOW)), config, () => new Date(NOW));
  return { processor, repository, lock, cascade };
}

export function pdf(fileName: string): SourceDocument {
  return { fileName, bytes: Buffer.from('%PDF-1.4') };
}
