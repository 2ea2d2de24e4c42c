// DR Control Plane Contracts
// Domain types plus the snake_case JSON shapes exchanged with callers and stored in DynamoDB

import { z } from 'zod';
import { RegionSchema, TableNameSchema, type Region, type TableName } from './region';

// ═══════════════════════════════════════════════════════════════════════════════
// DOMAIN TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export const VALIDATION_MODES = ['full', 'incremental', 'specific'] as const;
export const VALIDATION_ACTIONS = ['validate', 'sync'] as const;
export const FAILOVER_ACTIONS = ['failover', 'failback'] as const;

export type ValidationMode = (typeof VALIDATION_MODES)[number];
export type ValidationAction = (typeof VALIDATION_ACTIONS)[number];
export type FailoverAction = (typeof FAILOVER_ACTIONS)[number];

// 'failed' is reserved; the scoring rules only ever produce healthy or degraded
export type ValidationStatus = 'healthy' | 'degraded' | 'failed';

export interface TableValidationResult {
  table: TableName;
  primaryCount: number;
  secondaryCount: number;
  sampledMismatches: string[];
}

export interface BackupFreshness {
  lastBackupAgeHours?: number;
  backupCount: number;
  oldestBackupAgeDays?: number;
}

export interface SyncPlanEntry {
  table: TableName;
  itemsToSync: number;
  performed: false;
}

export interface AggregatedValidationReport {
  status: ValidationStatus;
  mode: ValidationMode;
  timestamp: Date;
  tablesValidated: number;
  recordsChecked: number;
  mismatchesFound: number;
  replicationLagSeconds?: number;
  backup: BackupFreshness;
  consistencyScore: number;
  recommendations: string[];
  tables: TableValidationResult[];
  syncPlan?: SyncPlanEntry[];
}

export interface FailoverRequest {
  action: string;
  targetRegion: string;
  force: boolean;
}

export type FailoverRecordStatus = 'completed' | 'rejected';

export interface FailoverRecord {
  action: FailoverAction;
  sourceRegion: Region;
  targetRegion: Region;
  status: FailoverRecordStatus;
  timestamp: Date;
}

export function isFailoverAction(action: string): action is FailoverAction {
  return FAILOVER_ACTIONS.some((candidate) => candidate === action);
}

// ═══════════════════════════════════════════════════════════════════════════════
// REQUEST SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const ValidationRequestSchema = z.object({
  validation_mode: z.enum(VALIDATION_MODES).default('incremental'),
  table_name: TableNameSchema.optional(),
  source_region: RegionSchema.default('us-east-1'),
  target_region: RegionSchema.default('us-west-2'),
  action: z.enum(VALIDATION_ACTIONS).default('validate'),
});

// action stays a plain string so an unknown action is answered, not rejected at parse time
export const FailoverRequestSchema = z.object({
  action: z.string(),
  target_region: z.string(),
  force: z.boolean().default(false),
});

export const BackupRequestSchema = z.object({
  table_name: TableNameSchema,
  backup_type: z.enum(['full', 'incremental']).default('full'),
});

export const HealthRequestSchema = z.object({
  region: RegionSchema.optional(),
});

export type ValidationRequest = z.infer<typeof ValidationRequestSchema>;
export type FailoverRequestPayload = z.infer<typeof FailoverRequestSchema>;
export type BackupRequest = z.infer<typeof BackupRequestSchema>;
export type HealthRequest = z.infer<typeof HealthRequestSchema>;

// ═══════════════════════════════════════════════════════════════════════════════
// RESPONSE SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const BackupStatusSchema = z.object({
  last_backup_age_hours: z.number().nullable(),
  backup_count: z.number().int().nonnegative(),
  oldest_backup_days: z.number().nullable(),
});

export const SyncPlanEntrySchema = z.object({
  table_name: z.string(),
  items_to_sync: z.number().int().nonnegative(),
  performed: z.literal(false),
});

export const ValidationResponseSchema = z.object({
  status: z.enum(['healthy', 'degraded', 'failed']),
  validation_mode: z.enum(VALIDATION_MODES),
  timestamp: z.string().datetime(),
  results: z.object({
    tables_validated: z.number().int().nonnegative(),
    records_checked: z.number().int().nonnegative(),
    mismatches_found: z.number().int().nonnegative(),
    replication_lag_seconds: z.number().int().nullable(),
    backup_status: BackupStatusSchema,
    consistency_score: z.number().min(0).max(100),
    sync_plan: z.array(SyncPlanEntrySchema).optional(),
  }),
  recommendations: z.array(z.string()),
});

export const FailoverResponseSchema = z.object({
  status: z.enum(['success', 'failed']),
  message: z.string(),
  action: z.string(),
  timestamp: z.string().datetime(),
});

export const RequestRejectionSchema = z.object({
  status: z.literal('failed'),
  message: z.string(),
  timestamp: z.string().datetime(),
});

export type ValidationResponse = z.infer<typeof ValidationResponseSchema>;
export type FailoverResponse = z.infer<typeof FailoverResponseSchema>;
export type RequestRejection = z.infer<typeof RequestRejectionSchema>;

export interface BackupResponse {
  status: 'success' | 'failed';
  backup_id: string;
  timestamp: string;
  items_backed_up: number;
  message?: string;
}

export interface FailoverStatusResponse {
  status: 'success';
  record: StoredFailoverRecord | null;
  timestamp: string;
}

// ═══════════════════════════════════════════════════════════════════════════════
// STORED RECORD SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const FAILOVER_STATUS_KEY = 'failover_status';
export const FAILOVER_RECORD_SCHEMA_VERSION = 1;

export const StoredFailoverRecordSchema = z.object({
  id: z.literal(FAILOVER_STATUS_KEY),
  schema_version: z.literal(FAILOVER_RECORD_SCHEMA_VERSION).default(FAILOVER_RECORD_SCHEMA_VERSION),
  action: z.enum(FAILOVER_ACTIONS),
  source_region: RegionSchema,
  target_region: RegionSchema,
  status: z.enum(['completed', 'rejected']),
  timestamp: z.coerce.number().int().nonnegative(),
});

export type StoredFailoverRecord = z.infer<typeof StoredFailoverRecordSchema>;

export const BackupMetadataRecordSchema = z.object({
  backup_id: z.string().min(1),
  table_name: z.string().optional(),
  // older writers stored the epoch as a string attribute
  timestamp: z.coerce.number().int().positive(),
  items_count: z.coerce.number().int().nonnegative().optional(),
  status: z.string().default('completed'),
});

export type BackupMetadataRecord = z.infer<typeof BackupMetadataRecordSchema>;

// ═══════════════════════════════════════════════════════════════════════════════
// MAPPERS
// ═══════════════════════════════════════════════════════════════════════════════

export function toValidationResponse(report: AggregatedValidationReport): ValidationResponse {
  const response: ValidationResponse = {
    status: report.status,
    validation_mode: report.mode,
    timestamp: report.timestamp.toISOString(),
    results: {
      tables_validated: report.tablesValidated,
      records_checked: report.recordsChecked,
      mismatches_found: report.mismatchesFound,
      replication_lag_seconds: report.replicationLagSeconds ?? null,
      backup_status: {
        last_backup_age_hours: report.backup.lastBackupAgeHours ?? null,
        backup_count: report.backup.backupCount,
        oldest_backup_days: report.backup.oldestBackupAgeDays ?? null,
      },
      consistency_score: report.consistencyScore,
    },
    recommendations: [...report.recommendations],
  };

  if (report.syncPlan) {
    response.results.sync_plan = report.syncPlan.map((entry) => ({
      table_name: entry.table,
      items_to_sync: entry.itemsToSync,
      performed: entry.performed,
    }));
  }

  return response;
}

export function toStoredFailoverRecord(record: FailoverRecord): StoredFailoverRecord {
  return {
    id: FAILOVER_STATUS_KEY,
    schema_version: FAILOVER_RECORD_SCHEMA_VERSION,
    action: record.action,
    source_region: record.sourceRegion,
    target_region: record.targetRegion,
    status: record.status,
    timestamp: Math.floor(record.timestamp.getTime() / 1000),
  };
}

export function fromStoredFailoverRecord(stored: StoredFailoverRecord): FailoverRecord {
  return {
    action: stored.action,
    sourceRegion: stored.source_region,
    targetRegion: stored.target_region,
    status: stored.status,
    timestamp: new Date(stored.timestamp * 1000),
  };
}
