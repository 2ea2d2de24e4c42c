// DR Backup Metadata
// Reads backup records written by the backup manager and derives freshness facts

import type { Logger } from 'winston';
import {
  BackupMetadataRecordSchema,
  FAILOVER_STATUS_KEY,
  type BackupFreshness,
  type BackupMetadataRecord,
} from '../models/contracts';
import type { RegionTableStore } from '../storage/region-store';

const SECONDS_PER_HOUR = 3600;
const SECONDS_PER_DAY = 86400;

export interface BackupMetadataRepository {
  listBackupRecords(signal?: AbortSignal): Promise<BackupMetadataRecord[]>;
  recordBackup(record: BackupMetadataRecord, signal?: AbortSignal): Promise<void>;
}

export class DynamoBackupMetadataRepository implements BackupMetadataRepository {
  constructor(
    private readonly store: RegionTableStore,
    private readonly table: string,
    private readonly logger: Logger
  ) {}

  async listBackupRecords(signal?: AbortSignal): Promise<BackupMetadataRecord[]> {
    const items = await this.store.scanAll(this.table, signal);
    const records: BackupMetadataRecord[] = [];

    for (const item of items) {
      // a failover status row may share this table
      if (item.backup_id === FAILOVER_STATUS_KEY || item.id === FAILOVER_STATUS_KEY) continue;

      const parsed = BackupMetadataRecordSchema.safeParse(item);
      if (parsed.success) {
        records.push(parsed.data);
      } else {
        this.logger.warn('Skipping malformed backup metadata record', {
          component: 'BackupMetadataRepository',
          table: this.table,
          backupId: typeof item.backup_id === 'string' ? item.backup_id : undefined,
          issues: parsed.error.issues.map((issue) => issue.message),
        });
      }
    }

    return records;
  }

  async recordBackup(record: BackupMetadataRecord, signal?: AbortSignal): Promise<void> {
    await this.store.putItem(this.table, { ...record }, signal);
  }
}

/**
 * Ages of the newest and oldest backup relative to `now`. Both ages are
 * absent when there are no backups.
 */
export function computeBackupFreshness(records: BackupMetadataRecord[], now: Date): BackupFreshness {
  if (records.length === 0) {
    return { backupCount: 0 };
  }

  const nowSeconds = Math.floor(now.getTime() / 1000);
  let newest = records[0].timestamp;
  let oldest = records[0].timestamp;
  for (const record of records) {
    newest = Math.max(newest, record.timestamp);
    oldest = Math.min(oldest, record.timestamp);
  }

  return {
    lastBackupAgeHours: (nowSeconds - newest) / SECONDS_PER_HOUR,
    backupCount: records.length,
    oldestBackupAgeDays: (nowSeconds - oldest) / SECONDS_PER_DAY,
  };
}
