// DR Region Health Probe
// Answers "can region R serve core storage operations right now?"

import type { Logger } from 'winston';
import { describeError } from '../errors';
import type { Region } from '../models/region';
import { withTimeout } from '../runtime/timeouts';
import type { RegionStoreProvider } from '../storage/region-store';

export interface RegionHealthProbe {
  /** Resolves to false when the region cannot be reached in time; never rejects. */
  probe(region: Region, signal?: AbortSignal): Promise<boolean>;
}

export interface StorageHealthProbeOptions {
  timeoutMs: number;
}

export class StorageRegionHealthProbe implements RegionHealthProbe {
  constructor(
    private readonly stores: RegionStoreProvider,
    private readonly logger: Logger,
    private readonly options: StorageHealthProbeOptions
  ) {}

  async probe(region: Region, signal?: AbortSignal): Promise<boolean> {
    const startedAt = Date.now();

    try {
      await withTimeout(
        (abortSignal) => this.stores.forRegion(region).listTables(1, abortSignal),
        this.options.timeoutMs,
        `Health probe for ${region}`,
        signal
      );

      this.logger.debug('Region storage reachable', {
        component: 'RegionHealthProbe',
        region,
        responseTime: Date.now() - startedAt,
      });
      return true;
    } catch (error) {
      this.logger.warn('Region storage probe failed', {
        component: 'RegionHealthProbe',
        region,
        responseTime: Date.now() - startedAt,
        error: describeError(error),
      });
      return false;
    }
  }
}
