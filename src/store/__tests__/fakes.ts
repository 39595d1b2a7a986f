import type { CaseRecord } from '../../types';
import type { CaseRepository } from '../case-repository';
import type { StoreLock } from '../store-lock';

function copy(record: CaseRecord): CaseRecord {
  return {
    ...record,
    fields: { ...record.fields },
    fieldStatus: { ...record.fieldStatus },
    reviewReasons: [...record.reviewReasons],
  };
}

/**
 * Case store kept in a Map, counting writes
 */
export class InMemoryCaseRepository implements CaseRepository {
  readonly records = new Map<string, CaseRecord>();
  writes = 0;
  failWrites = false;

  async findByCauseNumber(causeNumber: string): Promise<CaseRecord | null> {
    const record = this.records.get(causeNumber);
    return record ? copy(record) : null;
  }

  async upsert(record: CaseRecord): Promise<void> {
    if (this.failWrites) {
      throw new Error('write rejected');
    }
    this.writes++;
    this.records.set(record.causeNumber, copy(record));
  }
}

export class InMemoryStoreLock implements StoreLock {
  holder: string | null = null;
  unreachable = false;
  private counter = 0;

  async acquire(): Promise<string | null> {
    if (this.unreachable) {
      throw new Error('connect ECONNREFUSED 127.0.0.1:6379');
    }
    if (this.holder) return null;
    this.counter++;
    this.holder = `token-${this.counter}`;
    return this.holder;
  }

  async release(token: string): Promise<void> {
    if (this.holder === token) {
      this.holder = null;
    }
  }
}
