// DR Sentinel Replication Prober
// Measures cross-region replication lag by writing a throwaway marker and waiting for it to appear

import * as crypto from 'crypto';
import type { Logger } from 'winston';
import { BackendUnavailableError, describeError } from '../errors';
import { sleep } from '../runtime/timeouts';
import type { RegionTableStore } from '../storage/region-store';

export interface SentinelProberOptions {
  sentinelTable: string;
  pollIntervalMs: number;
  maxAttempts: number;
  now?: () => number;
  wait?: (ms: number, signal?: AbortSignal) => Promise<void>;
  /** Suffix that keeps concurrent markers apart; random by default. */
  markerSuffix?: () => string;
}

export class SentinelReplicationProber {
  private readonly now: () => number;
  private readonly wait: (ms: number, signal?: AbortSignal) => Promise<void>;
  private readonly markerSuffix: () => string;

  constructor(
    private readonly logger: Logger,
    private readonly options: SentinelProberOptions
  ) {
    this.now = options.now ?? Date.now;
    this.wait = options.wait ?? sleep;
    this.markerSuffix = options.markerSuffix ?? (() => crypto.randomUUID().slice(0, 8));
  }

  /**
   * Upper bound on how long a measurement may block.
   */
  get maxDurationMs(): number {
    return this.options.pollIntervalMs * this.options.maxAttempts;
  }

  /**
   * Whole seconds between the sentinel write in `primary` and its first
   * successful read in `secondary`, or undefined when it never showed up.
   * Throws BackendUnavailableError when the sentinel cannot be written.
   */
  async measureLag(
    primary: RegionTableStore,
    secondary: RegionTableStore,
    signal?: AbortSignal
  ): Promise<number | undefined> {
    const { sentinelTable, pollIntervalMs, maxAttempts } = this.options;
    const markerId = `lag-test-${this.now()}-${this.markerSuffix()}`;

    try {
      await primary.putItem(
        sentinelTable,
        { id: markerId, timestamp: Math.floor(this.now() / 1000), source: 'validator' },
        signal
      );
    } catch (error) {
      throw new BackendUnavailableError(primary.region, `Sentinel write to ${sentinelTable}`, error);
    }

    const writtenAt = this.now();

    try {
      for (let attempt = 1; attempt <= maxAttempts; attempt++) {
        if (await this.isVisible(secondary, markerId, signal)) {
          const lagSeconds = Math.floor((this.now() - writtenAt) / 1000);
          this.logger.info('Replication marker observed', {
            component: 'SentinelReplicationProber',
            primaryRegion: primary.region,
            secondaryRegion: secondary.region,
            attempt,
            lagSeconds,
          });
          return lagSeconds;
        }

        if (signal?.aborted) break;
        if (attempt < maxAttempts) {
          await this.wait(pollIntervalMs, signal);
        }
      }

      this.logger.warn('Replication marker not observed in secondary region', {
        component: 'SentinelReplicationProber',
        primaryRegion: primary.region,
        secondaryRegion: secondary.region,
        attempts: maxAttempts,
        markerId,
      });
      return undefined;
    } finally {
      await this.removeMarker(primary, markerId);
    }
  }

  private async isVisible(store: RegionTableStore, markerId: string, signal?: AbortSignal): Promise<boolean> {
    try {
      const item = await store.getItem(this.options.sentinelTable, { id: markerId }, signal);
      return item !== undefined;
    } catch (error) {
      this.logger.debug('Sentinel read failed, treating as not yet replicated', {
        component: 'SentinelReplicationProber',
        region: store.region,
        error: describeError(error),
      });
      return false;
    }
  }

  // runs without the caller's signal so a cancelled measurement still cleans up
  private async removeMarker(store: RegionTableStore, markerId: string): Promise<void> {
    try {
      await store.deleteItem(this.options.sentinelTable, { id: markerId });
    } catch (error) {
      this.logger.warn('Failed to delete replication sentinel', {
        component: 'SentinelReplicationProber',
        region: store.region,
        markerId,
        error: describeError(error),
      });
    }
  }
}
