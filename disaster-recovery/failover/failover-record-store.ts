// DR Failover Record Store
// Single-slot, last-writer-wins record of the most recent failover decision

import type { Logger } from 'winston';
import {
  FAILOVER_STATUS_KEY,
  StoredFailoverRecordSchema,
  fromStoredFailoverRecord,
  toStoredFailoverRecord,
  type FailoverRecord,
} from '../models/contracts';
import type { RegionTableStore } from '../storage/region-store';

export interface FailoverRecordStore {
  /** Overwrites whatever record is currently stored. */
  write(record: FailoverRecord, signal?: AbortSignal): Promise<void>;
  read(signal?: AbortSignal): Promise<FailoverRecord | undefined>;
}

export class DynamoFailoverRecordStore implements FailoverRecordStore {
  constructor(
    private readonly store: RegionTableStore,
    private readonly table: string,
    private readonly logger: Logger
  ) {}

  async write(record: FailoverRecord, signal?: AbortSignal): Promise<void> {
    await this.store.putItem(this.table, { ...toStoredFailoverRecord(record) }, signal);
  }

  async read(signal?: AbortSignal): Promise<FailoverRecord | undefined> {
    const item = await this.store.getItem(this.table, { id: FAILOVER_STATUS_KEY }, signal);
    if (!item) return undefined;

    const parsed = StoredFailoverRecordSchema.safeParse(item);
    if (!parsed.success) {
      this.logger.warn('Stored failover record does not match the expected schema', {
        component: 'FailoverRecordStore',
        table: this.table,
        issues: parsed.error.issues.map((issue) => issue.message),
      });
      return undefined;
    }
    return fromStoredFailoverRecord(parsed.data);
  }
}
