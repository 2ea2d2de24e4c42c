// DR Region Health Check
// Per-region status report: storage reachability, backup bucket reachability and sentinel age

import type { Logger } from 'winston';
import { describeError } from '../errors';
import type { Region } from '../models/region';
import type { MetricSample, MetricsReporter } from '../metrics/metrics-reporter';
import { withTimeout } from '../runtime/timeouts';
import type { BackupObjectStore } from '../storage/object-store';
import type { RegionStoreProvider } from '../storage/region-store';
import type { RegionHealthProbe } from './region-health-probe';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES AND INTERFACES
// ═══════════════════════════════════════════════════════════════════════════════

export const SENTINEL_HEARTBEAT_ID = 'sentinel';

export interface RegionServiceStatus {
  dynamodb: boolean;
  s3: boolean;
  replication_lag: number | null;
}

export interface RegionHealthReport {
  status: 'healthy' | 'unhealthy';
  region: Region;
  timestamp: string;
  services: RegionServiceStatus;
}

export interface RegionHealthCheckDependencies {
  probe: RegionHealthProbe;
  stores: RegionStoreProvider;
  backupBucket: BackupObjectStore;
  reporter: MetricsReporter;
  logger: Logger;
  now?: () => Date;
}

export interface RegionHealthCheckOptions {
  defaultRegion: Region;
  sentinelTable: string;
  timeoutMs: number;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HEALTH CHECK SERVICE
// ═══════════════════════════════════════════════════════════════════════════════

export class RegionHealthCheckService {
  private readonly now: () => Date;

  constructor(
    private readonly deps: RegionHealthCheckDependencies,
    private readonly options: RegionHealthCheckOptions
  ) {
    this.now = deps.now ?? (() => new Date());
  }

  async run(region: Region = this.options.defaultRegion, signal?: AbortSignal): Promise<RegionHealthReport> {
    const [dynamodb, s3, replicationLag] = await Promise.all([
      this.deps.probe.probe(region, signal),
      this.checkBackupBucket(signal),
      this.readSentinelAge(region, signal),
    ]);

    const services: RegionServiceStatus = { dynamodb, s3, replication_lag: replicationLag ?? null };

    const samples: MetricSample[] = [
      { name: 'DynamoDBHealth', value: dynamodb ? 1 : 0, unit: 'None' },
      { name: 'S3Health', value: s3 ? 1 : 0, unit: 'None' },
    ];
    if (replicationLag !== undefined) {
      samples.push({ name: 'ReplicationLag', value: replicationLag, unit: 'Seconds' });
    }
    await this.deps.reporter.publishAll(samples);

    const report: RegionHealthReport = {
      status: dynamodb && s3 ? 'healthy' : 'unhealthy',
      region,
      timestamp: this.now().toISOString(),
      services,
    };

    this.deps.logger.info(`Region ${region} is ${report.status}`, { component: 'RegionHealthCheck', services });
    return report;
  }

  private async checkBackupBucket(signal?: AbortSignal): Promise<boolean> {
    try {
      await withTimeout(
        (abortSignal) => this.deps.backupBucket.ping(abortSignal),
        this.options.timeoutMs,
        `Backup bucket ${this.deps.backupBucket.bucket} check`,
        signal
      );
      return true;
    } catch (error) {
      this.deps.logger.warn('Backup bucket unreachable', {
        component: 'RegionHealthCheck',
        bucket: this.deps.backupBucket.bucket,
        error: describeError(error),
      });
      return false;
    }
  }

  /**
   * Seconds since the heartbeat row's `last_updated`, as seen from `region`.
   */
  private async readSentinelAge(region: Region, signal?: AbortSignal): Promise<number | undefined> {
    try {
      const item = await withTimeout(
        (abortSignal) =>
          this.deps.stores.forRegion(region).getItem(this.options.sentinelTable, { id: SENTINEL_HEARTBEAT_ID }, abortSignal),
        this.options.timeoutMs,
        `Sentinel read in ${region}`,
        signal
      );

      const raw = item?.last_updated;
      const lastUpdated = typeof raw === 'number' || typeof raw === 'string' ? Number(raw) : Number.NaN;
      if (!Number.isFinite(lastUpdated)) return undefined;

      return Math.floor(this.now().getTime() / 1000) - lastUpdated;
    } catch (error) {
      this.deps.logger.debug('Sentinel heartbeat unavailable', {
        component: 'RegionHealthCheck',
        region,
        error: describeError(error),
      });
      return undefined;
    }
  }
}
