/**
 * Failover Orchestrator
 *
 * Health-gated, one-shot region switch. Each call takes an explicit action and
 * target region, checks the target unless forced, and overwrites the single
 * failover status record. No active-region state is held between calls.
 *
 * The probe-then-write sequence is not transactional: concurrent requests race
 * and the record store keeps whichever write lands last.
 */

import type { Logger } from 'winston';
import { describeError } from '../errors';
import {
  isFailoverAction,
  type FailoverAction,
  type FailoverRecord,
  type FailoverRecordStatus,
  type FailoverRequest,
  type FailoverResponse,
} from '../models/contracts';
import { RegionSchema, type Region } from '../models/region';
import type { RegionHealthProbe } from '../health/region-health-probe';
import type { FailoverNotifier } from './failover-notifier';
import type { FailoverRecordStore } from './failover-record-store';

export interface FailoverOrchestratorOptions {
  currentRegion: Region;
  /** Write a `rejected` record when the health gate refuses a transition. */
  recordRejectedAttempts?: boolean;
  now?: () => Date;
}

export interface FailoverOrchestratorDependencies {
  probe: RegionHealthProbe;
  records: FailoverRecordStore;
  logger: Logger;
  notifier?: FailoverNotifier;
}

export class FailoverOrchestrator {
  private readonly now: () => Date;

  constructor(
    private readonly deps: FailoverOrchestratorDependencies,
    private readonly options: FailoverOrchestratorOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async handle(request: FailoverRequest, signal?: AbortSignal): Promise<FailoverResponse> {
    const { logger } = this.deps;

    if (!isFailoverAction(request.action)) {
      logger.error(`Invalid action: ${request.action}`, { component: 'FailoverOrchestrator' });
      return this.respond('failed', `Invalid action: ${request.action}`, request.action);
    }

    const action = request.action;
    const parsedTarget = RegionSchema.safeParse(request.targetRegion);
    if (!parsedTarget.success) {
      logger.error(`Invalid target region: ${request.targetRegion}`, { component: 'FailoverOrchestrator', action });
      return this.respond('failed', `Invalid target region: ${request.targetRegion}`, action);
    }

    const targetRegion = parsedTarget.data;
    logger.info(`Executing ${action} to region: ${targetRegion}`, {
      component: 'FailoverOrchestrator',
      sourceRegion: this.options.currentRegion,
      force: request.force,
    });

    if (!request.force) {
      const healthy = await this.isHealthy(targetRegion, signal);

      if (!healthy) {
        logger.warn(`Target region ${targetRegion} is not healthy. Use force=true to override.`, {
          component: 'FailoverOrchestrator',
          action,
        });
        if (this.options.recordRejectedAttempts) {
          await this.recordRejection(action, targetRegion, signal);
        }
        return this.respond('failed', `Target region ${targetRegion} is not healthy`, action);
      }
    } else {
      logger.warn('Health gate skipped by force override', { component: 'FailoverOrchestrator', action, targetRegion });
    }

    const record = this.buildRecord(action, targetRegion, 'completed');

    try {
      await this.deps.records.write(record, signal);
    } catch (error) {
      logger.error(`Failed to record ${action} to region ${targetRegion}`, {
        component: 'FailoverOrchestrator',
        error: describeError(error),
      });
      return this.respond('failed', `Failed to record ${action} to region ${targetRegion}`, action);
    }

    await this.notify(record);

    const verb = action === 'failover' ? 'Failover' : 'Failback';
    logger.info(`${verb} to region ${targetRegion} completed`, {
      component: 'FailoverOrchestrator',
      sourceRegion: record.sourceRegion,
    });
    return this.respond('success', `${verb} to region ${targetRegion} completed`, action);
  }

  /**
   * The last persisted decision, if any.
   */
  async currentRecord(signal?: AbortSignal): Promise<FailoverRecord | undefined> {
    return this.deps.records.read(signal);
  }

  // ═════════════════════════════════════════════════════════════════════════════
  // HELPERS
  // ═════════════════════════════════════════════════════════════════════════════

  // fails closed: a probe that throws counts as unhealthy
  private async isHealthy(region: Region, signal?: AbortSignal): Promise<boolean> {
    try {
      return await this.deps.probe.probe(region, signal);
    } catch (error) {
      this.deps.logger.error('Health probe raised an error', {
        component: 'FailoverOrchestrator',
        region,
        error: describeError(error),
      });
      return false;
    }
  }

  private async recordRejection(action: FailoverAction, targetRegion: Region, signal?: AbortSignal): Promise<void> {
    try {
      await this.deps.records.write(this.buildRecord(action, targetRegion, 'rejected'), signal);
    } catch (error) {
      this.deps.logger.error('Failed to record rejected transition', {
        component: 'FailoverOrchestrator',
        action,
        targetRegion,
        error: describeError(error),
      });
    }
  }

  private async notify(record: FailoverRecord): Promise<void> {
    if (!this.deps.notifier) return;

    try {
      await this.deps.notifier.notify(record);
    } catch (error) {
      this.deps.logger.error('Failed to send failover notification', {
        component: 'FailoverOrchestrator',
        action: record.action,
        error: describeError(error),
      });
    }
  }

  private buildRecord(action: FailoverAction, targetRegion: Region, status: FailoverRecordStatus): FailoverRecord {
    return {
      action,
      sourceRegion: this.options.currentRegion,
      targetRegion,
      status,
      timestamp: this.now(),
    };
  }

  private respond(status: FailoverResponse['status'], message: string, action: string): FailoverResponse {
    return { status, message, action, timestamp: this.now().toISOString() };
  }
}
