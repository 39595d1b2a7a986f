import { config } from '../config';
import type { BatchReport, DocumentResult } from '../types';

/**
 * Operator-facing terminal output, one banner per document
 */

const SEPARATOR = '='.repeat(80);
const SUBSEPARATOR = '-'.repeat(80);

const OUTCOME_ICONS: Record<DocumentResult['outcome'], string> = {
  upserted: '✅',
  needs_review: '🔎',
  store_unavailable: '❌',
  skipped: '⏭️ ',
};

export class SummaryLogger {
  private static messageCounter = 0;
  private static muted = false;

  /** Keep stdout clean, e.g. when the report is printed as JSON */
  static mute(): void {
    this.muted = true;
  }

  private static get enabled(): boolean {
    return !this.muted && config.logging.level !== 'silent';
  }

  static batchStarted(runId: string, documentCount: number, engines: string[]): void {
    if (!this.enabled) return;
    this.messageCounter++;
    console.log('\n' + SEPARATOR);
    console.log(`🚀 Extraction Run Started - Message #${this.messageCounter}`);
    console.log(SEPARATOR);
    console.log('\n⚙️  Configuration');
    console.log(`   Run ID: ${runId}`);
    console.log(`   Documents: ${documentCount}`);
    console.log(`   Engines: ${engines.join(' → ') || 'none'}`);
    console.log('\n' + SEPARATOR + '\n');
  }

  static documentResult(result: DocumentResult): void {
    if (!this.enabled) return;
    this.messageCounter++;
    console.log('\n' + SEPARATOR);
    console.log(`${OUTCOME_ICONS[result.outcome]} ${result.fileName} - Message #${this.messageCounter}`);
    console.log(SEPARATOR);
    console.log('\n📋 Document');
    console.log(`   Kind: ${result.documentKind}`);
    console.log(`   Cause Number: ${result.causeNumber || '(none)'}`);
    console.log(`   Outcome: ${result.outcome}`);

    if (result.attempts.length > 0) {
      console.log('\n' + SUBSEPARATOR);
      console.log('📝 OCR');
      console.log(SUBSEPARATOR);
      for (const attempt of result.attempts) {
        const detail = attempt.error ? ` (${attempt.error})` : '';
        console.log(`   ${attempt.engine}: ${attempt.status} → ${attempt.charCount.toLocaleString()} chars${detail}`);
      }
      console.log(`   Chosen: ${result.engine ?? 'none'}${result.lowConfidence ? ' (low confidence)' : ''}${result.escalated ? ' (escalated)' : ''}`);
    }

    if (result.outcome !== 'skipped') {
      console.log('\n' + SUBSEPARATOR);
      console.log('📊 Fields');
      console.log(SUBSEPARATOR);
      console.log(`   Extracted: ${result.fieldsExtracted.join(', ') || 'none'}`);
      console.log(`   Missing: ${result.fieldsMissing.join(', ') || 'none'}`);
      console.log(`   Written: ${result.fieldsWritten.join(', ') || 'none'}`);
      if (result.correctionsApplied.length > 0) {
        console.log(`   Corrections: ${result.correctionsApplied.join(', ')}`);
      }
    }

    if (result.reviewReasons.length > 0) {
      console.log(`\n⚠️  Review: ${result.reviewReasons.join(', ')}`);
    }
    if (result.error) {
      console.log(`\n⚠️  Error: ${result.error}`);
    }
    console.log('\n' + SEPARATOR + '\n');
  }

  static batchComplete(report: BatchReport): void {
    if (!this.enabled) return;
    const count = (outcome: DocumentResult['outcome']) => report.results.filter(r => r.outcome === outcome).length;
    const seconds = (Date.parse(report.finishedAt) - Date.parse(report.startedAt)) / 1000;

    this.messageCounter++;
    console.log('\n' + SEPARATOR);
    console.log(`🏁 Extraction Run Complete - Message #${this.messageCounter}`);
    console.log(SEPARATOR);
    console.log('\n📊 Summary');
    console.log(`   Run ID: ${report.runId}`);
    console.log(`   Upserted: ${count('upserted')}`);
    console.log(`   Needs Review: ${count('needs_review')}`);
    console.log(`   Store Unavailable: ${count('store_unavailable')}`);
    console.log(`   Skipped: ${count('skipped')}`);
    console.log(`   Total Duration: ${seconds.toFixed(1)}s`);
    console.log('\n' + SEPARATOR + '\n');
  }
}
