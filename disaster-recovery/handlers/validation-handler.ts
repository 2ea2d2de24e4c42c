// Data validation request handler

import type { Logger } from 'winston';
import { describeError } from '../errors';
import {
  ValidationRequestSchema,
  toValidationResponse,
  type RequestRejection,
  type ValidationResponse,
} from '../models/contracts';
import type { Region } from '../models/region';
import type { ConsistencyValidator } from '../validation/consistency-validator';
import { parseRequest, rejection } from './request-parsing';

export type ValidatorFactory = (sourceRegion: Region, targetRegion: Region) => ConsistencyValidator;

export interface ValidationHandlerDependencies {
  buildValidator: ValidatorFactory;
  logger: Logger;
  now?: () => Date;
}

export type ValidationHandler = (event: unknown, signal?: AbortSignal) => Promise<ValidationResponse | RequestRejection>;

export function createValidationHandler(deps: ValidationHandlerDependencies): ValidationHandler {
  const now = deps.now ?? (() => new Date());

  return async (event, signal) => {
    const request = parseRequest(ValidationRequestSchema, event);
    if (!request.ok) {
      deps.logger.warn('Rejected validation request', { component: 'ValidationHandler', error: request.error.message });
      return rejection(request.error.message, now());
    }

    const { validation_mode, table_name, source_region, target_region, action } = request.value;

    try {
      const validator = deps.buildValidator(source_region, target_region);
      const report = await validator.validate({ mode: validation_mode, table: table_name, action }, signal);
      return toValidationResponse(report);
    } catch (error) {
      deps.logger.error('Validation run failed', {
        component: 'ValidationHandler',
        sourceRegion: source_region,
        targetRegion: target_region,
        error: describeError(error),
      });
      return rejection(`Validation failed: ${describeError(error)}`, now());
    }
  };
}
