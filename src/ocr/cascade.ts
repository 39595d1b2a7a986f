import type { CascadeOutput, CascadeRun, EngineId, ExtractionAttempt, OcrEngine, SourceDocument } from '../types/ocr';
import { EngineFailureError, InsufficientTextError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { RetryOptions, withRetry, withTimeout } from '../utils/retry';

export interface CascadeOptions {
  /** Non-whitespace characters an output needs to stop the cascade */
  sufficiencyThreshold: number;
  /** Bound on a single network engine call */
  cloudTimeoutMs: number;
  retry?: Partial<RetryOptions>;
}

export function countChars(text: string): number {
  return text.replace(/\s+/g, '').length;
}

/**
 * Tries OCR engines cheapest first and stops at the first sufficient output.
 *
 * An engine is invoked at most once per document (its own single retry aside):
 * outputs are cached on the run so a later escalation only reads them.
 */
export class OcrCascade {
  private readonly engines: OcrEngine[];

  constructor(
    engines: OcrEngine[],
    private readonly options: CascadeOptions
  ) {
    this.engines = [...engines].sort((a, b) => a.tier - b.tier);
  }

  get engineIds(): EngineId[] {
    return this.engines.map(engine => engine.id);
  }

  async run(document: SourceDocument): Promise<CascadeRun> {
    const run: CascadeRun = {
      document,
      chosen: { engine: null, text: '', charCount: 0, lowConfidence: true },
      attempts: [],
      outputs: new Map(),
    };

    for (const engine of this.engines) {
      const attempt = await this.attempt(engine, run);
      if (attempt.status === 'success') {
        run.chosen = this.outputOf(engine.id, run);
        logger.info(
          { fileName: document.fileName, engine: engine.id, charCount: attempt.charCount },
          'OCR cascade stopped at sufficient engine'
        );
        return run;
      }
    }

    run.chosen = this.bestOutput(run);
    if (run.chosen.engine === null) {
      const failure = new EngineFailureError('all', 'Every OCR engine failed', { fileName: document.fileName });
      logger.warn(
        { code: failure.code, fileName: document.fileName, attempts: run.attempts.map(a => `${a.engine}:${a.error ?? a.status}`) },
        failure.message
      );
    } else {
      const insufficient = new InsufficientTextError('No OCR engine reached the sufficiency threshold', {
        threshold: this.options.sufficiencyThreshold,
      });
      logger.warn(
        {
          code: insufficient.code,
          fileName: document.fileName,
          engine: run.chosen.engine,
          charCount: run.chosen.charCount,
          threshold: this.options.sufficiencyThreshold,
        },
        insufficient.message
      );
    }
    return run;
  }

  /**
   * Look past the chosen engine for an output the caller accepts.
   *
   * Only engines of a higher tier are considered, cheapest first. Cached outputs
   * are reused; an engine not yet tried for this document is invoked once; an
   * engine that already failed is never called again.
   */
  async escalate(run: CascadeRun, accept: (output: CascadeOutput) => boolean): Promise<CascadeOutput | null> {
    const chosenTier = run.chosen.engine === null ? -1 : this.tierOf(run.chosen.engine);

    for (const engine of this.engines) {
      if (engine.tier <= chosenTier) continue;

      if (!run.outputs.has(engine.id)) {
        if (run.attempts.some(attempt => attempt.engine === engine.id)) continue;
        await this.attempt(engine, run);
        if (!run.outputs.has(engine.id)) continue;
      }

      const candidate = this.outputOf(engine.id, run);
      if (accept(candidate)) {
        logger.info(
          { fileName: run.document.fileName, from: run.chosen.engine, to: engine.id, charCount: candidate.charCount },
          'Escalated to higher-tier OCR output'
        );
        return candidate;
      }
    }

    logger.info({ fileName: run.document.fileName, from: run.chosen.engine }, 'No higher-tier OCR output was accepted');
    return null;
  }

  private async attempt(engine: OcrEngine, run: CascadeRun): Promise<ExtractionAttempt> {
    const started = Date.now();
    const timestamp = new Date(started).toISOString();
    const label = `${engine.id} OCR`;
    let attempt: ExtractionAttempt;

    try {
      const text = await withRetry(
        () =>
          engine.usesNetwork
            ? withTimeout(engine.extractText(run.document), this.options.cloudTimeoutMs, label)
            : engine.extractText(run.document),
        label,
        { maxAttempts: 2, ...this.options.retry }
      );
      const charCount = countChars(text);
      run.outputs.set(engine.id, text);
      attempt = {
        engine: engine.id,
        tier: engine.tier,
        status: charCount >= this.options.sufficiencyThreshold ? 'success' : 'insufficient',
        charCount,
        timestamp,
        durationMs: Date.now() - started,
      };
    } catch (error) {
      attempt = {
        engine: engine.id,
        tier: engine.tier,
        status: 'error',
        charCount: 0,
        timestamp,
        durationMs: Date.now() - started,
        error: errorMessage(error),
      };
    }

    run.attempts.push(attempt);
    logger.debug({ fileName: run.document.fileName, ...attempt }, 'OCR attempt finished');
    return attempt;
  }

  private outputOf(engineId: EngineId, run: CascadeRun): CascadeOutput {
    const text = run.outputs.get(engineId) ?? '';
    const charCount = countChars(text);
    return {
      engine: engineId,
      text,
      charCount,
      lowConfidence: charCount < this.options.sufficiencyThreshold,
    };
  }

  /** Most characters wins; ties go to the cheaper engine */
  private bestOutput(run: CascadeRun): CascadeOutput {
    let best: CascadeOutput = { engine: null, text: '', charCount: 0, lowConfidence: true };
    for (const engine of this.engines) {
      if (!run.outputs.has(engine.id)) continue;
      const output = this.outputOf(engine.id, run);
      if (best.engine === null || output.charCount > best.charCount) {
        best = output;
      }
    }
    return best;
  }

  private tierOf(engineId: EngineId): number {
    return this.engines.find(engine => engine.id === engineId)?.tier ?? -1;
  }
}
