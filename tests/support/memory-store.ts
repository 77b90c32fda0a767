import type { RecordFilter, RecordStore } from '../../src/db/types.js';
import { StoreUnavailableError } from '../../src/errors.js';
import { KeyedLock } from '../../src/ingest/keyed-lock.js';
import { mergeRecords } from '../../src/records/merge.js';
import { naturalKeyOf, type Platform, type WorkflowRecord } from '../../src/records/types.js';

/**
 * In-process RecordStore. Upserts serialize per natural key the way the
 * Postgres function does, and the store can be told to start failing.
 */
export class MemoryRecordStore implements RecordStore {
  readonly rows = new Map<string, WorkflowRecord>();
  upserts = 0;
  /** Fail every call once this many upserts have succeeded. */
  failAfter: number | null = null;
  private readonly locks = new KeyedLock();

  constructor(private readonly clock: () => Date = () => new Date()) {}

  private check(): void {
    if (this.failAfter !== null && this.upserts >= this.failAfter) {
      throw new StoreUnavailableError('connection refused');
    }
  }

  upsert(record: WorkflowRecord): Promise<WorkflowRecord> {
    const key = naturalKeyOf(record);
    return this.locks.run(key, async () => {
      this.check();
      const merged = mergeRecords(this.rows.get(key) ?? null, record, this.clock());
      this.rows.set(key, merged);
      this.upserts++;
      return merged;
    });
  }

  async getByKey(workflowName: string, platform: Platform, country: string): Promise<WorkflowRecord | null> {
    this.check();
    return this.rows.get(naturalKeyOf({ workflow_name: workflowName, platform, country })) ?? null;
  }

  async list(filter: RecordFilter = {}): Promise<WorkflowRecord[]> {
    this.check();
    const country = filter.country?.toUpperCase();
    return [...this.rows.values()]
      .filter((r) => (!filter.platform || r.platform === filter.platform) && (!country || r.country === country))
      .slice(0, filter.limit ?? Infinity);
  }

  async count(options: { updatedSince?: Date } = {}): Promise<number> {
    this.check();
    const { updatedSince } = options;
    if (!updatedSince) return this.rows.size;
    return [...this.rows.values()].filter((r) => new Date(r.last_updated) >= updatedSince).length;
  }
}
