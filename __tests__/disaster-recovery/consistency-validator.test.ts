/**
 * Consistency Validator Tests
 *
 * End-to-end runs of the validator over in-memory regions: table sampling,
 * the replication lag probe and backup freshness joined into one report.
 */

import { describe, test, expect, beforeEach } from '@jest/globals';
import { parseConfig } from '../../disaster-recovery/config/dr-config';
import { MetricsReporter } from '../../disaster-recovery/metrics/metrics-reporter';
import type { StoredItem } from '../../disaster-recovery/storage/region-store';
import { SentinelReplicationProber } from '../../disaster-recovery/replication/sentinel-prober';
import { ALL_CLEAR_MESSAGE } from '../../disaster-recovery/validation/consistency-scoring';
import { ConsistencyValidator } from '../../disaster-recovery/validation/consistency-validator';
import { TableConsistencySampler } from '../../disaster-recovery/validation/table-sampler';
import {
  FakeMetricsCollector,
  InMemoryBackupMetadata,
  InMemoryRegionStore,
  ReplicaRegionStore,
  silentLogger,
  table,
} from './support/fakes';

const NOW = new Date('2026-03-01T12:00:00.000Z');
const NOW_SECONDS = 1772366400;
const APP_TABLE = 'dr-application-table';
const ORDERS_TABLE = 'dr-orders-table';
const SENTINEL_TABLE = 'dr-sentinel-table';

function items(from: number, to: number): StoredItem[] {
  const result: StoredItem[] = [];
  for (let index = from; index < to; index++) {
    result.push({ id: `item-${index}`, payload: `value-${index}` });
  }
  return result;
}

describe('ConsistencyValidator', () => {
  let primary: InMemoryRegionStore;
  let secondary: ReplicaRegionStore;
  let backups: InMemoryBackupMetadata;
  let collector: FakeMetricsCollector;
  let clock: number;

  const buildValidator = (minConsistencyScore = 95, defaultTables = [table(APP_TABLE), table(ORDERS_TABLE)]) => {
    const logger = silentLogger();
    const config = parseConfig({ thresholds: { minConsistencyScore } });

    return new ConsistencyValidator(
      {
        primary,
        secondary,
        sampler: new TableConsistencySampler(primary, secondary, logger, { sampleSize: 10, keyAttribute: 'id' }),
        prober: new SentinelReplicationProber(logger, {
          sentinelTable: SENTINEL_TABLE,
          pollIntervalMs: 1000,
          maxAttempts: 10,
          now: () => clock,
          wait: async (ms) => {
            clock += ms;
          },
        }),
        backups,
        reporter: new MetricsReporter(collector, logger, { namespace: 'DisasterRecovery', now: () => NOW }),
        logger,
        now: () => NOW,
      },
      {
        defaultTables,
        thresholds: config.thresholds,
        tableSampleTimeoutMs: 1000,
        backupMetadataTimeoutMs: 1000,
      }
    );
  };

  const useReplica = (hiddenReads: number) => {
    secondary = new ReplicaRegionStore('us-west-2', primary, SENTINEL_TABLE, hiddenReads);
  };

  beforeEach(() => {
    clock = NOW.getTime();
    primary = new InMemoryRegionStore('us-east-1');
    useReplica(0);
    backups = new InMemoryBackupMetadata([
      { backup_id: 'recent', timestamp: NOW_SECONDS - 2 * 3600, status: 'completed' },
      { backup_id: 'oldest', timestamp: NOW_SECONDS - 5 * 86400, status: 'completed' },
    ]);
    collector = new FakeMetricsCollector();
  });

  describe('scoring scenarios', () => {
    test('reports a healthy run when both regions match', async () => {
      primary.seed(APP_TABLE, items(0, 100));
      secondary.seed(APP_TABLE, items(0, 100));

      const report = await buildValidator().validate({ mode: 'incremental', table: table(APP_TABLE), action: 'validate' });

      expect(report.status).toBe('healthy');
      expect(report.tablesValidated).toBe(1);
      expect(report.recordsChecked).toBe(100);
      expect(report.mismatchesFound).toBe(0);
      expect(report.consistencyScore).toBe(100);
      expect(report.replicationLagSeconds).toBe(0);
      expect(report.backup).toEqual({ lastBackupAgeHours: 2, backupCount: 2, oldestBackupAgeDays: 5 });
      expect(report.recommendations).toEqual([ALL_CLEAR_MESSAGE]);
      expect(report.syncPlan).toBeUndefined();
    });

    test('degrades when the secondary is missing items', async () => {
      primary.seed(APP_TABLE, items(0, 100));
      // item-0 and item-1 fall inside the 10-item sample
      secondary.seed(APP_TABLE, items(2, 92));

      const report = await buildValidator().validate({ mode: 'incremental', table: table(APP_TABLE), action: 'validate' });

      expect(report.status).toBe('degraded');
      expect(report.recordsChecked).toBe(100);
      expect(report.mismatchesFound).toBe(12);
      expect(report.consistencyScore).toBe(88);
      expect(report.tables[0].sampledMismatches).toEqual(['Item item-0 not found in DR', 'Item item-1 not found in DR']);
      expect(report.recommendations).toEqual([
        'Data consistency is below 95% (88.0%). Investigate mismatches immediately.',
      ]);
    });

    test('scores an empty table at 100', async () => {
      const report = await buildValidator().validate({ mode: 'full', table: table(APP_TABLE), action: 'validate' });

      expect(report.recordsChecked).toBe(0);
      expect(report.consistencyScore).toBe(100);
      expect(report.status).toBe('healthy');
    });
  });

  test('validates the default table set when no table is named', async () => {
    primary.seed(APP_TABLE, items(0, 4)).seed(ORDERS_TABLE, items(0, 6));
    secondary.seed(APP_TABLE, items(0, 4)).seed(ORDERS_TABLE, items(0, 6));

    const report = await buildValidator().validate({ mode: 'full', action: 'validate' });

    expect(report.tablesValidated).toBe(2);
    expect(report.recordsChecked).toBe(10);
    expect(report.tables.map((result) => result.table)).toEqual([APP_TABLE, ORDERS_TABLE]);
    expect(report.mode).toBe('full');
  });

  test('samples the sentinel table before the lag marker is written', async () => {
    const heartbeat = { id: 'sentinel', last_updated: NOW_SECONDS - 30 };
    primary.seed(APP_TABLE, items(0, 3)).seed(SENTINEL_TABLE, [heartbeat]);
    secondary.seed(APP_TABLE, items(0, 3)).seed(SENTINEL_TABLE, [heartbeat]);

    const report = await buildValidator(95, parseConfig().tables.defaultValidationSet).validate({
      mode: 'incremental',
      action: 'validate',
    });

    expect(report.tables.map((result) => result.table)).toEqual([APP_TABLE, SENTINEL_TABLE]);
    expect(report.recordsChecked).toBe(4);
    expect(report.mismatchesFound).toBe(0);
    expect(report.status).toBe('healthy');
    expect(report.replicationLagSeconds).toBe(0);

    const operations = primary.calls.map((call) => `${call.operation}:${call.table}`);
    expect(operations.indexOf(`sampleItems:${SENTINEL_TABLE}`)).toBeLessThan(operations.indexOf(`putItem:${SENTINEL_TABLE}`));
    expect(primary.items(SENTINEL_TABLE)).toEqual([heartbeat]);
  });

  test('excludes a table whose counts cannot be read', async () => {
    primary.seed(APP_TABLE, items(0, 4)).seed(ORDERS_TABLE, items(0, 6));
    secondary.seed(APP_TABLE, items(0, 4)).failWith('countItems', new Error('ResourceNotFound'), ORDERS_TABLE);

    const report = await buildValidator().validate({ mode: 'full', action: 'validate' });

    expect(report.tablesValidated).toBe(1);
    expect(report.recordsChecked).toBe(4);
    expect(report.tables.map((result) => result.table)).toEqual([APP_TABLE]);
  });

  test('recommends investigating high replication lag', async () => {
    useReplica(2);
    const validator = new ConsistencyValidator(
      {
        primary,
        secondary,
        sampler: new TableConsistencySampler(primary, secondary, silentLogger(), { sampleSize: 10, keyAttribute: 'id' }),
        prober: new SentinelReplicationProber(silentLogger(), {
          sentinelTable: SENTINEL_TABLE,
          pollIntervalMs: 61000,
          maxAttempts: 10,
          now: () => clock,
          wait: async (ms) => {
            clock += ms;
          },
        }),
        backups,
        reporter: new MetricsReporter(collector, silentLogger(), { namespace: 'DisasterRecovery' }),
        logger: silentLogger(),
        now: () => NOW,
      },
      {
        defaultTables: [table(APP_TABLE)],
        thresholds: parseConfig().thresholds,
        tableSampleTimeoutMs: 1000,
        backupMetadataTimeoutMs: 1000,
      }
    );

    const report = await validator.validate({ mode: 'incremental', action: 'validate' });

    expect(report.replicationLagSeconds).toBe(122);
    expect(report.recommendations).toEqual([
      'Replication lag is 122 seconds. Consider investigating DynamoDB Global Tables health.',
    ]);
  });

  test('falls back to defaults when lag and backup signals are unavailable', async () => {
    primary.seed(APP_TABLE, items(0, 5)).failWith('putItem', new Error('AccessDenied'), SENTINEL_TABLE);
    secondary.seed(APP_TABLE, items(0, 5));
    backups.listError = new Error('table missing');

    const report = await buildValidator().validate({ mode: 'incremental', table: table(APP_TABLE), action: 'validate' });

    expect(report.replicationLagSeconds).toBeUndefined();
    expect(report.backup).toEqual({ backupCount: 0 });
    expect(report.recommendations).toEqual([ALL_CLEAR_MESSAGE]);
  });

  test('plans a sync without performing it', async () => {
    primary.seed(APP_TABLE, items(0, 100));
    secondary.seed(APP_TABLE, items(2, 92));

    const report = await buildValidator().validate({ mode: 'incremental', table: table(APP_TABLE), action: 'sync' });

    expect(report.syncPlan).toEqual([{ table: APP_TABLE, itemsToSync: 10, performed: false }]);
    expect(secondary.items(APP_TABLE)).toHaveLength(90);
  });

  test('returns an empty sync plan when nothing differs', async () => {
    primary.seed(APP_TABLE, items(0, 3));
    secondary.seed(APP_TABLE, items(0, 3));

    const report = await buildValidator().validate({ mode: 'incremental', table: table(APP_TABLE), action: 'sync' });

    expect(report.syncPlan).toEqual([]);
  });

  test('publishes the score and mismatch count', async () => {
    primary.seed(APP_TABLE, items(0, 100));
    secondary.seed(APP_TABLE, items(2, 92));

    await buildValidator().validate({ mode: 'incremental', table: table(APP_TABLE), action: 'validate' });

    expect(collector.data).toEqual([
      { namespace: 'DisasterRecovery', metricName: 'ValidationConsistencyScore', value: 88, unit: 'Percent', timestamp: NOW },
      { namespace: 'DisasterRecovery', metricName: 'ValidationMismatches', value: 12, unit: 'Count', timestamp: NOW },
    ]);
  });

  test('still returns the report when metric publication fails', async () => {
    collector.rejected.add('ValidationConsistencyScore');
    collector.rejected.add('ValidationMismatches');

    const report = await buildValidator().validate({ mode: 'incremental', table: table(APP_TABLE), action: 'validate' });

    expect(report.status).toBe('healthy');
    expect(collector.data).toEqual([]);
  });

  test('returns an immutable report', async () => {
    const report = await buildValidator().validate({ mode: 'specific', table: table(APP_TABLE), action: 'validate' });

    expect(Object.isFrozen(report)).toBe(true);
  });
});
