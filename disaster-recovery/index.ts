/**
 * DR Control Plane
 *
 * Wires configuration, AWS clients and the validation, failover, backup and
 * health services into transport-agnostic request handlers. Anything that
 * talks to AWS can be replaced through `ControlPlaneOverrides`.
 */

import { CloudWatchClient } from '@aws-sdk/client-cloudwatch';
import { S3Client } from '@aws-sdk/client-s3';
import { SNSClient } from '@aws-sdk/client-sns';
import { BackupManager } from './backup/backup-manager';
import { DynamoBackupMetadataRepository } from './backup/backup-metadata';
import { currentRegion, loadConfigFromEnv, type DisasterRecoveryConfig } from './config/dr-config';
import { DynamoFailoverRecordStore } from './failover/failover-record-store';
import { SnsFailoverNotifier, type FailoverNotifier } from './failover/failover-notifier';
import { FailoverOrchestrator } from './failover/failover-orchestrator';
import { createBackupHandler, type BackupHandler } from './handlers/backup-handler';
import {
  createFailoverHandler,
  createFailoverStatusHandler,
  type FailoverHandler,
  type FailoverStatusHandler,
} from './handlers/failover-handler';
import { createHealthHandler, type HealthHandler } from './handlers/health-handler';
import { createValidationHandler, type ValidationHandler } from './handlers/validation-handler';
import { RegionHealthCheckService } from './health/region-health-check';
import { StorageRegionHealthProbe } from './health/region-health-probe';
import { createLogger, type Logger } from './logging/logger';
import { CloudWatchMetricsCollector, MetricsReporter, type MetricsCollector } from './metrics/metrics-reporter';
import type { Region } from './models/region';
import { SentinelReplicationProber } from './replication/sentinel-prober';
import { S3BackupObjectStore, type BackupObjectStore } from './storage/object-store';
import { DynamoRegionStoreFactory, type RegionStoreProvider } from './storage/region-store';
import { ConsistencyValidator } from './validation/consistency-validator';
import { TableConsistencySampler } from './validation/table-sampler';

export interface ControlPlaneOverrides {
  stores?: RegionStoreProvider;
  objects?: BackupObjectStore;
  metrics?: MetricsCollector;
  /** null disables notifications even when a topic is configured. */
  notifier?: FailoverNotifier | null;
  logger?: Logger;
  now?: () => Date;
  /** Replaces the real sleep between replication polls. */
  wait?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface ControlPlane {
  config: DisasterRecoveryConfig;
  logger: Logger;
  orchestrator: FailoverOrchestrator;
  healthCheck: RegionHealthCheckService;
  backups: BackupManager;
  buildValidator(sourceRegion: Region, targetRegion: Region): ConsistencyValidator;
  handlers: {
    validate: ValidationHandler;
    failover: FailoverHandler;
    failoverStatus: FailoverStatusHandler;
    backup: BackupHandler;
    health: HealthHandler;
  };
  /** Release the AWS clients this instance created. */
  close(): void;
}

export function createControlPlane(
  config: DisasterRecoveryConfig = loadConfigFromEnv(),
  overrides: ControlPlaneOverrides = {}
): ControlPlane {
  const region = currentRegion(config);
  const now = overrides.now ?? (() => new Date());
  const logger =
    overrides.logger ??
    createLogger({ level: config.logging.level, environment: config.logging.environment });

  const releasers: Array<() => void> = [];

  let stores = overrides.stores;
  if (!stores) {
    const factory = new DynamoRegionStoreFactory();
    releasers.push(() => factory.destroy());
    stores = factory;
  }

  let objects = overrides.objects;
  if (!objects) {
    const s3 = new S3Client({ region });
    releasers.push(() => s3.destroy());
    objects = new S3BackupObjectStore(s3, config.storage.backupBucket, config.storage.kmsKeyId);
  }

  let collector = overrides.metrics;
  if (!collector) {
    const cloudwatch = new CloudWatchClient({ region });
    releasers.push(() => cloudwatch.destroy());
    collector = new CloudWatchMetricsCollector(cloudwatch);
  }

  let notifier = overrides.notifier === null ? undefined : overrides.notifier;
  if (overrides.notifier === undefined && config.notifications.topicArn) {
    const sns = new SNSClient({ region });
    releasers.push(() => sns.destroy());
    notifier = new SnsFailoverNotifier(sns, config.notifications.topicArn);
  }

  const reporter = new MetricsReporter(collector, logger, {
    namespace: config.metrics.namespace,
    enabled: config.metrics.enabled,
    now,
  });

  const localStore = stores.forRegion(region);
  const backupMetadata = new DynamoBackupMetadataRepository(localStore, config.tables.backupMetadata, logger);
  const probe = new StorageRegionHealthProbe(stores, logger, { timeoutMs: config.timeouts.healthProbeMs });
  const prober = new SentinelReplicationProber(logger, {
    sentinelTable: config.tables.sentinel,
    pollIntervalMs: config.replication.pollIntervalMs,
    maxAttempts: config.replication.maxAttempts,
    now: overrides.now ? () => now().getTime() : undefined,
    wait: overrides.wait,
  });

  const resolvedStores = stores;
  const buildValidator = (sourceRegion: Region, targetRegion: Region): ConsistencyValidator => {
    const primary = resolvedStores.forRegion(sourceRegion);
    const secondary = resolvedStores.forRegion(targetRegion);
    const sampler = new TableConsistencySampler(primary, secondary, logger, {
      sampleSize: config.validation.sampleSize,
      keyAttribute: config.validation.keyAttribute,
    });

    // backup metadata is read from the source region, where backups are recorded
    const backups = new DynamoBackupMetadataRepository(primary, config.tables.backupMetadata, logger);

    return new ConsistencyValidator(
      { primary, secondary, sampler, prober, backups, reporter, logger, now },
      {
        defaultTables: config.tables.defaultValidationSet,
        thresholds: config.thresholds,
        tableSampleTimeoutMs: config.timeouts.tableSampleMs,
        backupMetadataTimeoutMs: config.timeouts.backupMetadataMs,
      }
    );
  };

  const orchestrator = new FailoverOrchestrator(
    {
      probe,
      records: new DynamoFailoverRecordStore(localStore, config.tables.failoverStatus, logger),
      logger,
      notifier,
    },
    { currentRegion: region, recordRejectedAttempts: config.failover.recordRejectedAttempts, now }
  );

  const healthCheck = new RegionHealthCheckService(
    { probe, stores, backupBucket: objects, reporter, logger, now },
    { defaultRegion: region, sentinelTable: config.tables.sentinel, timeoutMs: config.timeouts.healthProbeMs }
  );

  const backups = new BackupManager(localStore, objects, backupMetadata, logger, {
    prefix: config.storage.backupPrefix,
    now,
  });

  logger.info('DR control plane initialized', {
    component: 'ControlPlane',
    region,
    primaryRegion: config.regions.primary,
    secondaryRegion: config.regions.secondary,
    notifications: notifier !== undefined,
  });

  return {
    config,
    logger,
    orchestrator,
    healthCheck,
    backups,
    buildValidator,
    handlers: {
      validate: createValidationHandler({ buildValidator, logger, now }),
      failover: createFailoverHandler({ orchestrator, logger, now }),
      failoverStatus: createFailoverStatusHandler({ orchestrator, logger, now }),
      backup: createBackupHandler({ manager: backups, logger, now }),
      health: createHealthHandler({ service: healthCheck, logger, now }),
    },
    close() {
      for (const release of releasers.splice(0)) {
        release();
      }
    },
  };
}

export * from './errors';
export * from './models/contracts';
export * from './models/region';
export { loadConfigFromEnv, parseConfig, currentRegion, DisasterRecoveryConfigSchema } from './config/dr-config';
export type { DisasterRecoveryConfig, DisasterRecoveryConfigInput, ThresholdConfig } from './config/dr-config';
export { createLogger } from './logging/logger';
export { ConsistencyValidator } from './validation/consistency-validator';
export { calculateConsistencyScore, buildRecommendations, ALL_CLEAR_MESSAGE } from './validation/consistency-scoring';
export { TableConsistencySampler } from './validation/table-sampler';
export { SentinelReplicationProber } from './replication/sentinel-prober';
export { FailoverOrchestrator } from './failover/failover-orchestrator';
export { RegionHealthCheckService } from './health/region-health-check';
export type { RegionHealthReport } from './health/region-health-check';
export type { RegionHealthProbe } from './health/region-health-probe';
export { BackupManager, generateBackupId } from './backup/backup-manager';
export { MetricsReporter } from './metrics/metrics-reporter';
export type { RegionTableStore, RegionStoreProvider } from './storage/region-store';
