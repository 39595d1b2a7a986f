import type { AppConfig } from '../config';
import type { ExtractionConfig } from '../config/extraction-config';
import { OcrCascade } from '../ocr/cascade';
import { createEngines } from '../ocr/engines';
import { SupabaseCaseRepository } from '../store/case-repository';
import { RecordAssembler } from '../store/record-assembler';
import { RedisStoreLock } from '../store/store-lock';
import { getSupabaseClient } from '../utils/supabase';
import { BatchRunner } from './batch-runner';
import { DocumentProcessor } from './document-processor';

export { BatchRunner, listPdfFiles } from './batch-runner';
export type { BatchOptions } from './batch-runner';
export { DocumentProcessor, applyCauseHint, chooseHint } from './document-processor';
export type { CauseHint, HintResolution } from './document-processor';
export { SummaryLogger } from './summary-logger';

export interface Pipeline {
  runner: BatchRunner;
  close(): Promise<void>;
}

/**
 * Wire the production pipeline: every registered engine, the Supabase case
 * store and the Redis write lock.
 */
export function createPipeline(appConfig: AppConfig, extractionConfig: ExtractionConfig): Pipeline {
  const engines = createEngines(appConfig);
  const cascade = new OcrCascade(engines, {
    sufficiencyThreshold: extractionConfig.sufficiencyThreshold,
    cloudTimeoutMs: appConfig.ocr.cloudTimeoutMs,
    retry: { baseDelayMs: appConfig.ocr.retryBaseDelayMs },
  });

  const lock = new RedisStoreLock(appConfig.redis.url, appConfig.redis.lockKey, appConfig.redis.lockTtlMs, {
    connectTimeoutMs: appConfig.redis.connectTimeoutMs,
    maxReconnectAttempts: appConfig.redis.maxReconnectAttempts,
  });
  const repository = new SupabaseCaseRepository(getSupabaseClient(), appConfig.supabase.caseTable);
  const processor = new DocumentProcessor(cascade, new RecordAssembler(repository, lock), extractionConfig);

  return {
    runner: new BatchRunner(processor, cascade.engineIds),
    close: () => lock.disconnect(),
  };
}
