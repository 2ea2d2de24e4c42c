import { describe, test, expect } from '@jest/globals';
import { currentRegion, loadConfigFromEnv, parseConfig } from '../../disaster-recovery/config/dr-config';
import { ConfigurationError } from '../../disaster-recovery/errors';

describe('Disaster recovery configuration', () => {
  test('applies defaults to an empty configuration', () => {
    const config = parseConfig();

    expect(config.regions).toEqual({ primary: 'us-east-1', secondary: 'us-west-2' });
    expect(config.tables).toEqual({
      application: 'dr-application-table',
      sentinel: 'dr-sentinel-table',
      backupMetadata: 'dr-backup-metadata',
      failoverStatus: 'dr-metadata',
      defaultValidationSet: ['dr-application-table', 'dr-sentinel-table'],
    });
    expect(config.storage).toEqual({ backupBucket: 'dr-demo-backup-bucket-primary', backupPrefix: 'backups' });
    expect(config.validation).toEqual({ sampleSize: 10, keyAttribute: 'id' });
    expect(config.replication).toEqual({ pollIntervalMs: 1000, maxAttempts: 10 });
    expect(config.thresholds).toEqual({
      minConsistencyScore: 95,
      maxReplicationLagSeconds: 60,
      maxBackupAgeHours: 24,
      maxBackupRetentionDays: 30,
    });
    expect(config.failover.recordRejectedAttempts).toBe(false);
    expect(config.metrics).toEqual({ enabled: true, namespace: 'DisasterRecovery' });
    expect(config.notifications.topicArn).toBeUndefined();
  });

  test('an empty environment yields the defaults', () => {
    expect(loadConfigFromEnv({})).toEqual(parseConfig());
  });

  test('reads overrides from environment variables', () => {
    const config = loadConfigFromEnv({
      AWS_REGION: 'us-west-2',
      DR_PRIMARY_REGION: 'eu-west-1',
      DR_SECONDARY_REGION: 'eu-central-1',
      DYNAMODB_APP_TABLE: 'orders',
      DR_VALIDATION_TABLES: 'orders, customers ,',
      DR_SAMPLE_SIZE: '25',
      DR_MIN_CONSISTENCY_SCORE: '99.5',
      DR_RECORD_REJECTED_FAILOVERS: 'yes',
      DR_METRICS_ENABLED: 'false',
      DR_NOTIFICATION_TOPIC_ARN: 'arn:aws:sns:us-east-1:000000000000:dr-events',
      LOG_LEVEL: 'DEBUG',
      NODE_ENV: 'test',
    });

    expect(config.regions).toEqual({ current: 'us-west-2', primary: 'eu-west-1', secondary: 'eu-central-1' });
    expect(config.tables.application).toBe('orders');
    expect(config.tables.defaultValidationSet).toEqual(['orders', 'customers']);
    expect(config.validation.sampleSize).toBe(25);
    expect(config.thresholds.minConsistencyScore).toBe(99.5);
    expect(config.failover.recordRejectedAttempts).toBe(true);
    expect(config.metrics.enabled).toBe(false);
    expect(config.notifications.topicArn).toBe('arn:aws:sns:us-east-1:000000000000:dr-events');
    expect(config.logging).toEqual({ level: 'debug', environment: 'test' });
  });

  test('ignores blank variables', () => {
    expect(loadConfigFromEnv({ DR_PRIMARY_REGION: '   ', DR_SAMPLE_SIZE: '' }).regions.primary).toBe('us-east-1');
  });

  test('rejects a non-numeric sample size', () => {
    expect(() => loadConfigFromEnv({ DR_SAMPLE_SIZE: 'many' })).toThrow(ConfigurationError);
  });

  test('names the offending field in the error', () => {
    expect(() => parseConfig({ regions: { primary: 'moon' } })).toThrow(/regions\.primary/);
  });

  test('currentRegion falls back to the primary region', () => {
    expect(currentRegion(parseConfig())).toBe('us-east-1');
    expect(currentRegion(loadConfigFromEnv({ AWS_REGION: 'us-west-2' }))).toBe('us-west-2');
  });
});
