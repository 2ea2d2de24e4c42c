// Region health request handler

import type { Logger } from 'winston';
import { describeError } from '../errors';
import { HealthRequestSchema, type RequestRejection } from '../models/contracts';
import type { RegionHealthCheckService, RegionHealthReport } from '../health/region-health-check';
import { parseRequest, rejection } from './request-parsing';

export interface HealthHandlerDependencies {
  service: RegionHealthCheckService;
  logger: Logger;
  now?: () => Date;
}

export type HealthHandler = (event?: unknown, signal?: AbortSignal) => Promise<RegionHealthReport | RequestRejection>;

export function createHealthHandler(deps: HealthHandlerDependencies): HealthHandler {
  const now = deps.now ?? (() => new Date());

  return async (event, signal) => {
    const request = parseRequest(HealthRequestSchema, event);
    if (!request.ok) {
      return rejection(request.error.message, now());
    }

    try {
      return await deps.service.run(request.value.region, signal);
    } catch (error) {
      deps.logger.error('Health check failed', { component: 'HealthHandler', error: describeError(error) });
      return rejection('Health check failed', now());
    }
  };
}
