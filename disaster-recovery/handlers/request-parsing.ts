// Shared request decoding for the control plane handlers

import type { z } from 'zod';
import { RequestValidationError } from '../errors';
import type { RequestRejection } from '../models/contracts';

export type ParseOutcome<T> = { ok: true; value: T } | { ok: false; error: RequestValidationError };

/**
 * Accepts an already-decoded object, a JSON string, or nothing (treated as {}).
 */
export function parseRequest<S extends z.ZodTypeAny>(schema: S, event: unknown): ParseOutcome<z.output<S>> {
  let payload: unknown = event ?? {};

  if (typeof payload === 'string') {
    try {
      payload = JSON.parse(payload);
    } catch {
      return {
        ok: false,
        error: new RequestValidationError([{ code: 'custom', path: [], message: 'Request body is not valid JSON' }]),
      };
    }
  }

  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    return { ok: false, error: new RequestValidationError(parsed.error.issues) };
  }
  return { ok: true, value: parsed.data };
}

export function rejection(message: string, now: Date): RequestRejection {
  return { status: 'failed', message, timestamp: now.toISOString() };
}

export function readStringField(event: unknown, field: string): string | undefined {
  if (typeof event !== 'object' || event === null) return undefined;
  const value: unknown = Reflect.get(event, field);
  return typeof value === 'string' ? value : undefined;
}
