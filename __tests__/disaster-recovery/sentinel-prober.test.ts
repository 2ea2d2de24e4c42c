import { describe, test, expect, beforeEach } from '@jest/globals';
import { BackendUnavailableError } from '../../disaster-recovery/errors';
import { SentinelReplicationProber } from '../../disaster-recovery/replication/sentinel-prober';
import { InMemoryRegionStore, ReplicaRegionStore, silentLogger } from './support/fakes';

const SENTINEL_TABLE = 'dr-sentinel-table';
const START = 1772366400000;

describe('SentinelReplicationProber', () => {
  let clock: number;
  let delays: number[];
  let primary: InMemoryRegionStore;

  // advances the fake clock instead of sleeping
  const wait = async (ms: number): Promise<void> => {
    delays.push(ms);
    clock += ms;
  };

  const prober = (maxAttempts = 10, pollIntervalMs = 1000) =>
    new SentinelReplicationProber(silentLogger(), {
      sentinelTable: SENTINEL_TABLE,
      pollIntervalMs,
      maxAttempts,
      now: () => clock,
      wait,
      markerSuffix: () => 'a1b2c3d4',
    });

  beforeEach(() => {
    clock = START;
    delays = [];
    primary = new InMemoryRegionStore('us-east-1');
  });

  test('measures whole seconds until the marker is visible', async () => {
    const secondary = new ReplicaRegionStore('us-west-2', primary, SENTINEL_TABLE, 3);

    const lag = await prober().measureLag(primary, secondary);

    expect(lag).toBe(3);
    expect(delays).toEqual([1000, 1000, 1000]);
    expect(secondary.callsTo('getItem')).toHaveLength(4);
  });

  test('writes a uniquely named marker and removes it afterwards', async () => {
    const secondary = new ReplicaRegionStore('us-west-2', primary, SENTINEL_TABLE);

    const lag = await prober().measureLag(primary, secondary);

    expect(lag).toBe(0);
    expect(secondary.callsTo('getItem')[0].key).toEqual({ id: 'lag-test-1772366400000-a1b2c3d4' });
    expect(primary.callsTo('deleteItem')).toEqual([
      { operation: 'deleteItem', table: SENTINEL_TABLE, key: { id: 'lag-test-1772366400000-a1b2c3d4' } },
    ]);
    expect(primary.items(SENTINEL_TABLE)).toEqual([]);
  });

  test('keeps markers of runs started in the same millisecond apart', async () => {
    const secondary = new ReplicaRegionStore('us-west-2', primary, SENTINEL_TABLE);
    const withDefaultSuffix = () =>
      new SentinelReplicationProber(silentLogger(), {
        sentinelTable: SENTINEL_TABLE,
        pollIntervalMs: 1000,
        maxAttempts: 10,
        now: () => clock,
        wait,
      });

    const lags = await Promise.all([
      withDefaultSuffix().measureLag(primary, secondary),
      withDefaultSuffix().measureLag(primary, secondary),
    ]);

    const markers = primary.callsTo('deleteItem').map((call) => call.key?.id);
    expect(lags).toEqual([0, 0]);
    expect(markers).toHaveLength(2);
    expect(markers[0]).toMatch(/^lag-test-1772366400000-[0-9a-f]{8}$/);
    expect(markers[1]).toMatch(/^lag-test-1772366400000-[0-9a-f]{8}$/);
    expect(markers[0]).not.toBe(markers[1]);
  });

  test('returns undefined when the marker never replicates', async () => {
    const secondary = new ReplicaRegionStore('us-west-2', primary, SENTINEL_TABLE, 100);

    const lag = await prober(3).measureLag(primary, secondary);

    expect(lag).toBeUndefined();
    expect(delays).toEqual([1000, 1000]);
    expect(primary.items(SENTINEL_TABLE)).toEqual([]);
  });

  test('fails with BackendUnavailableError when the marker cannot be written', async () => {
    primary.failWith('putItem', new Error('ProvisionedThroughputExceeded'));
    const secondary = new ReplicaRegionStore('us-west-2', primary, SENTINEL_TABLE);

    const outcome = prober().measureLag(primary, secondary);

    await expect(outcome).rejects.toThrow(BackendUnavailableError);
    await expect(outcome).rejects.toThrow(
      'Sentinel write to dr-sentinel-table failed in region us-east-1: ProvisionedThroughputExceeded'
    );
    expect(primary.callsTo('deleteItem')).toHaveLength(0);
  });

  test('still reports the lag when marker cleanup fails', async () => {
    primary.failWith('deleteItem', new Error('conditional check failed'));
    const secondary = new ReplicaRegionStore('us-west-2', primary, SENTINEL_TABLE, 1);

    await expect(prober().measureLag(primary, secondary)).resolves.toBe(1);
  });

  test('treats read errors in the secondary as not yet replicated', async () => {
    const secondary = new InMemoryRegionStore('us-west-2').failWith('getItem', new Error('timeout'));

    const lag = await prober(2).measureLag(primary, secondary);

    expect(lag).toBeUndefined();
    expect(secondary.callsTo('getItem')).toHaveLength(2);
  });

  test('stops polling once the caller aborts', async () => {
    const controller = new AbortController();
    controller.abort();
    const secondary = new ReplicaRegionStore('us-west-2', primary, SENTINEL_TABLE, 5);

    const lag = await prober().measureLag(primary, secondary, controller.signal);

    expect(lag).toBeUndefined();
    expect(delays).toEqual([]);
    expect(primary.items(SENTINEL_TABLE)).toEqual([]);
  });

  test('bounds a measurement by attempts times interval', () => {
    expect(prober(10, 1000).maxDurationMs).toBe(10000);
  });
});
