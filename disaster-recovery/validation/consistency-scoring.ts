// DR Consistency Scoring and Recommendations

import type { ThresholdConfig } from '../config/dr-config';
import type { BackupFreshness, ValidationStatus } from '../models/contracts';

export const ALL_CLEAR_MESSAGE = 'All validation checks passed. System is healthy.';

export interface ScoredSignals {
  consistencyScore: number;
  replicationLagSeconds?: number;
  backup: BackupFreshness;
}

/**
 * Percentage of checked records estimated to match. 100 when nothing was
 * checked; floored at 0 because count deltas and sampled misses can overlap.
 */
export function calculateConsistencyScore(recordsChecked: number, mismatchesFound: number): number {
  if (recordsChecked <= 0) return 100;
  const score = ((recordsChecked - mismatchesFound) * 100) / recordsChecked;
  return Math.max(0, score);
}

export function deriveValidationStatus(consistencyScore: number, thresholds: ThresholdConfig): ValidationStatus {
  return consistencyScore >= thresholds.minConsistencyScore ? 'healthy' : 'degraded';
}

/**
 * Threshold rules evaluated in a fixed order; each one that fires adds one
 * message. Never returns an empty list.
 */
export function buildRecommendations(signals: ScoredSignals, thresholds: ThresholdConfig): string[] {
  const recommendations: string[] = [];
  const { consistencyScore, replicationLagSeconds, backup } = signals;

  if (consistencyScore < thresholds.minConsistencyScore) {
    recommendations.push(
      `Data consistency is below ${thresholds.minConsistencyScore}% (${consistencyScore.toFixed(1)}%). Investigate mismatches immediately.`
    );
  }

  if (replicationLagSeconds !== undefined && replicationLagSeconds > thresholds.maxReplicationLagSeconds) {
    recommendations.push(
      `Replication lag is ${replicationLagSeconds} seconds. Consider investigating DynamoDB Global Tables health.`
    );
  }

  if (backup.lastBackupAgeHours !== undefined && backup.lastBackupAgeHours > thresholds.maxBackupAgeHours) {
    recommendations.push(
      `Last backup is ${backup.lastBackupAgeHours.toFixed(1)} hours old. Consider running a manual backup.`
    );
  }

  if (backup.oldestBackupAgeDays !== undefined && backup.oldestBackupAgeDays > thresholds.maxBackupRetentionDays) {
    recommendations.push(
      `Oldest backup is ${backup.oldestBackupAgeDays.toFixed(0)} days old. Consider reviewing retention policy.`
    );
  }

  if (recommendations.length === 0) {
    recommendations.push(ALL_CLEAR_MESSAGE);
  }

  return recommendations;
}
