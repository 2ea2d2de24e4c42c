// DR Control Plane Configuration
// Schema-validated settings with defaults, loaded from the process environment

import { z } from 'zod';
import { ConfigurationError } from '../errors';
import { RegionSchema, TableNameSchema } from '../models/region';

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION SCHEMA
// ═══════════════════════════════════════════════════════════════════════════════

const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'] as const;
type LogLevel = (typeof LOG_LEVELS)[number];

const ThresholdsSchema = z.object({
  minConsistencyScore: z.number().min(0).max(100).default(95), // percent
  maxReplicationLagSeconds: z.number().nonnegative().default(60),
  maxBackupAgeHours: z.number().positive().default(24),
  maxBackupRetentionDays: z.number().positive().default(30),
});

export const DisasterRecoveryConfigSchema = z.object({
  regions: z.object({
    current: RegionSchema.optional(),
    primary: RegionSchema.default('us-east-1'),
    secondary: RegionSchema.default('us-west-2'),
  }).default({}),

  tables: z.object({
    application: TableNameSchema.default('dr-application-table'),
    sentinel: TableNameSchema.default('dr-sentinel-table'),
    backupMetadata: TableNameSchema.default('dr-backup-metadata'),
    failoverStatus: TableNameSchema.default('dr-metadata'),
    defaultValidationSet: z.array(TableNameSchema).min(1).default(['dr-application-table', 'dr-sentinel-table']),
  }).default({}),

  storage: z.object({
    backupBucket: z.string().min(3).default('dr-demo-backup-bucket-primary'),
    backupPrefix: z.string().default('backups'),
    kmsKeyId: z.string().min(1).optional(),
  }).default({}),

  validation: z.object({
    sampleSize: z.number().int().min(1).max(100).default(10),
    keyAttribute: z.string().min(1).default('id'),
  }).default({}),

  replication: z.object({
    pollIntervalMs: z.number().int().nonnegative().default(1000),
    maxAttempts: z.number().int().min(1).max(120).default(10),
  }).default({}),

  thresholds: ThresholdsSchema.default({}),

  timeouts: z.object({
    healthProbeMs: z.number().int().positive().default(5000),
    tableSampleMs: z.number().int().positive().default(30000),
    backupMetadataMs: z.number().int().positive().default(10000),
  }).default({}),

  failover: z.object({
    recordRejectedAttempts: z.boolean().default(false),
  }).default({}),

  metrics: z.object({
    enabled: z.boolean().default(true),
    namespace: z.string().min(1).default('DisasterRecovery'),
  }).default({}),

  notifications: z.object({
    topicArn: z.string().startsWith('arn:').optional(),
  }).default({}),

  logging: z.object({
    level: z.enum(LOG_LEVELS).default('info'),
    environment: z.string().default('production'),
  }).default({}),
});

export type DisasterRecoveryConfig = z.infer<typeof DisasterRecoveryConfigSchema>;
export type DisasterRecoveryConfigInput = z.input<typeof DisasterRecoveryConfigSchema>;
export type ThresholdConfig = z.infer<typeof ThresholdsSchema>;

// ═══════════════════════════════════════════════════════════════════════════════
// LOADING
// ═══════════════════════════════════════════════════════════════════════════════

export function parseConfig(input: DisasterRecoveryConfigInput = {}): DisasterRecoveryConfig {
  const parsed = DisasterRecoveryConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigurationError(parsed.error.issues);
  }
  return parsed.data;
}

/**
 * Build the configuration from environment variables. Unset or empty
 * variables fall back to the schema defaults.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): DisasterRecoveryConfig {
  return parseConfig({
    regions: {
      current: text(env.AWS_REGION),
      primary: text(env.DR_PRIMARY_REGION),
      secondary: text(env.DR_SECONDARY_REGION),
    },
    tables: {
      application: text(env.DYNAMODB_APP_TABLE),
      sentinel: text(env.DR_SENTINEL_TABLE),
      backupMetadata: text(env.METADATA_TABLE),
      failoverStatus: text(env.FAILOVER_STATUS_TABLE),
      defaultValidationSet: list(env.DR_VALIDATION_TABLES),
    },
    storage: {
      backupBucket: text(env.BACKUP_BUCKET),
      backupPrefix: text(env.BACKUP_PREFIX),
      kmsKeyId: text(env.BACKUP_KMS_KEY_ID),
    },
    validation: {
      sampleSize: numeric(env.DR_SAMPLE_SIZE),
      keyAttribute: text(env.DR_KEY_ATTRIBUTE),
    },
    replication: {
      pollIntervalMs: numeric(env.DR_LAG_POLL_INTERVAL_MS),
      maxAttempts: numeric(env.DR_LAG_MAX_ATTEMPTS),
    },
    thresholds: {
      minConsistencyScore: numeric(env.DR_MIN_CONSISTENCY_SCORE),
      maxReplicationLagSeconds: numeric(env.DR_MAX_REPLICATION_LAG_SECONDS),
      maxBackupAgeHours: numeric(env.DR_MAX_BACKUP_AGE_HOURS),
      maxBackupRetentionDays: numeric(env.DR_MAX_BACKUP_RETENTION_DAYS),
    },
    timeouts: {
      healthProbeMs: numeric(env.DR_HEALTH_PROBE_TIMEOUT_MS),
      tableSampleMs: numeric(env.DR_TABLE_SAMPLE_TIMEOUT_MS),
      backupMetadataMs: numeric(env.DR_BACKUP_METADATA_TIMEOUT_MS),
    },
    failover: {
      recordRejectedAttempts: flag(env.DR_RECORD_REJECTED_FAILOVERS),
    },
    metrics: {
      enabled: flag(env.DR_METRICS_ENABLED),
      namespace: text(env.DR_METRICS_NAMESPACE),
    },
    notifications: {
      topicArn: text(env.DR_NOTIFICATION_TOPIC_ARN),
    },
    logging: {
      level: logLevel(env.LOG_LEVEL),
      environment: text(env.NODE_ENV),
    },
  });
}

/**
 * Region this process runs in; the primary region when AWS_REGION is unset.
 */
export function currentRegion(config: DisasterRecoveryConfig) {
  return config.regions.current ?? config.regions.primary;
}

function text(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function numeric(value: string | undefined): number | undefined {
  const raw = text(value);
  return raw === undefined ? undefined : Number(raw);
}

function flag(value: string | undefined): boolean | undefined {
  const raw = text(value)?.toLowerCase();
  if (raw === undefined) return undefined;
  return raw === 'true' || raw === '1' || raw === 'yes';
}

function list(value: string | undefined): string[] | undefined {
  const raw = text(value);
  if (raw === undefined) return undefined;
  return raw.split(',').map((entry) => entry.trim()).filter((entry) => entry.length > 0);
}

function logLevel(value: string | undefined): LogLevel | undefined {
  const raw = text(value)?.toLowerCase();
  return LOG_LEVELS.find((level) => level === raw);
}
