// DR Table Consistency Sampler
// Count comparison plus bounded existence sampling for one table across two regions

import type { Logger } from 'winston';
import { BackendUnavailableError, describeError } from '../errors';
import type { TableValidationResult } from '../models/contracts';
import type { TableName } from '../models/region';
import type { RegionTableStore, StoredItem } from '../storage/region-store';

export interface TableSamplerOptions {
  sampleSize: number;
  keyAttribute: string;
}

export class TableConsistencySampler {
  constructor(
    private readonly primary: RegionTableStore,
    private readonly secondary: RegionTableStore,
    private readonly logger: Logger,
    private readonly options: TableSamplerOptions
  ) {}

  /**
   * Compare one table between regions. Count or sample-scan failures reject
   * with BackendUnavailableError; individual lookup failures become mismatches.
   */
  async sample(table: TableName, signal?: AbortSignal): Promise<TableValidationResult> {
    this.logger.info(`Validating table: ${table}`, { component: 'TableConsistencySampler', table });

    const [primaryCount, secondaryCount] = await Promise.all([
      this.countItems(this.primary, table, signal),
      this.countItems(this.secondary, table, signal),
    ]);

    let items: StoredItem[];
    try {
      items = await this.primary.sampleItems(table, this.options.sampleSize, signal);
    } catch (error) {
      throw new BackendUnavailableError(this.primary.region, `Sample scan of ${table}`, error);
    }

    const lookups = await Promise.all(
      items.slice(0, this.options.sampleSize).map((item) => this.checkItem(table, item, signal))
    );
    const sampledMismatches = lookups.filter((mismatch): mismatch is string => mismatch !== undefined);

    return { table, primaryCount, secondaryCount, sampledMismatches };
  }

  private async countItems(store: RegionTableStore, table: TableName, signal?: AbortSignal): Promise<number> {
    try {
      return await store.countItems(table, signal);
    } catch (error) {
      throw new BackendUnavailableError(store.region, `Item count of ${table}`, error);
    }
  }

  private async checkItem(table: TableName, item: StoredItem, signal?: AbortSignal): Promise<string | undefined> {
    const { keyAttribute } = this.options;
    const id = item[keyAttribute];

    if (typeof id !== 'string') {
      this.logger.debug('Sampled item has no string key, skipping', {
        component: 'TableConsistencySampler',
        table,
        keyAttribute,
      });
      return undefined;
    }

    try {
      const replica = await this.secondary.getItem(table, { [keyAttribute]: id }, signal);
      return replica === undefined ? `Item ${id} not found in DR` : undefined;
    } catch (error) {
      const reason = describeError(error);
      this.logger.warn(`Error checking item ${id} in DR`, {
        component: 'TableConsistencySampler',
        table,
        region: this.secondary.region,
        error: reason,
      });
      return `Item ${id} lookup failed in DR: ${reason}`;
    }
  }
}

export function mismatchCount(result: TableValidationResult): number {
  return Math.abs(result.primaryCount - result.secondaryCount) + result.sampledMismatches.length;
}
