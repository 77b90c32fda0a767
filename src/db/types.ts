import type { Platform, WorkflowRecord } from '../records/types.js';

export interface RecordFilter {
  platform?: Platform;
  country?: string;
  limit?: number;
}

/**
 * Persistent home of WorkflowRecords. `upsert` must merge atomically per
 * natural key; implementations raise StoreUnavailableError when the backing
 * database cannot be reached or refuses the write.
 */
export interface RecordStore {
  upsert(record: WorkflowRecord): Promise<WorkflowRecord>;
  getByKey(workflowName: string, platform: Platform, country: string): Promise<WorkflowRecord | null>;
  list(filter?: RecordFilter): Promise<WorkflowRecord[]>;
  count(options?: { updatedSince?: Date }): Promise<number>;
}
