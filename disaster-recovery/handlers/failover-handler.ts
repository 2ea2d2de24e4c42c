// Failover / failback request handlers

import type { Logger } from 'winston';
import { describeError } from '../errors';
import {
  FailoverRequestSchema,
  toStoredFailoverRecord,
  type FailoverResponse,
  type FailoverStatusResponse,
  type RequestRejection,
} from '../models/contracts';
import type { FailoverOrchestrator } from '../failover/failover-orchestrator';
import { parseRequest, readStringField, rejection } from './request-parsing';

export interface FailoverHandlerDependencies {
  orchestrator: FailoverOrchestrator;
  logger: Logger;
  now?: () => Date;
}

export type FailoverHandler = (event: unknown, signal?: AbortSignal) => Promise<FailoverResponse>;
export type FailoverStatusHandler = (event?: unknown, signal?: AbortSignal) => Promise<FailoverStatusResponse | RequestRejection>;

export function createFailoverHandler(deps: FailoverHandlerDependencies): FailoverHandler {
  const now = deps.now ?? (() => new Date());

  return async (event, signal) => {
    const request = parseRequest(FailoverRequestSchema, event);
    if (!request.ok) {
      deps.logger.warn('Rejected failover request', { component: 'FailoverHandler', error: request.error.message });
      return {
        status: 'failed',
        message: request.error.message,
        action: readStringField(event, 'action') ?? 'unknown',
        timestamp: now().toISOString(),
      };
    }

    const { action, target_region, force } = request.value;

    try {
      return await deps.orchestrator.handle({ action, targetRegion: target_region, force }, signal);
    } catch (error) {
      deps.logger.error('Failover request failed', {
        component: 'FailoverHandler',
        action,
        targetRegion: target_region,
        error: describeError(error),
      });
      return {
        status: 'failed',
        message: `Unable to complete ${action} to region ${target_region}`,
        action,
        timestamp: now().toISOString(),
      };
    }
  };
}

export function createFailoverStatusHandler(deps: FailoverHandlerDependencies): FailoverStatusHandler {
  const now = deps.now ?? (() => new Date());

  return async (_event, signal) => {
    try {
      const record = await deps.orchestrator.currentRecord(signal);
      return {
        status: 'success',
        record: record ? toStoredFailoverRecord(record) : null,
        timestamp: now().toISOString(),
      };
    } catch (error) {
      deps.logger.error('Failed to read failover status', {
        component: 'FailoverStatusHandler',
        error: describeError(error),
      });
      return rejection('Failover status is unavailable', now());
    }
  };
}
