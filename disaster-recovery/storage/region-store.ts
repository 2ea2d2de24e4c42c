// DR Region Table Store
// Narrow view of one region's DynamoDB tables used by the probes, sampler and record stores

import {
  DeleteItemCommand,
  DescribeTableCommand,
  DynamoDBClient,
  GetItemCommand,
  ListTablesCommand,
  PutItemCommand,
  ScanCommand,
  type AttributeValue,
} from '@aws-sdk/client-dynamodb';
import { marshall, unmarshall } from '@aws-sdk/util-dynamodb';
import type { Region } from '../models/region';

export type StoredItem = Record<string, unknown>;
export type ItemKey = Record<string, string>;

export interface RegionTableStore {
  readonly region: Region;

  /** Approximate item count as reported by the table description. */
  countItems(table: string, signal?: AbortSignal): Promise<number>;
  sampleItems(table: string, limit: number, signal?: AbortSignal): Promise<StoredItem[]>;
  getItem(table: string, key: ItemKey, signal?: AbortSignal): Promise<StoredItem | undefined>;
  putItem(table: string, item: StoredItem, signal?: AbortSignal): Promise<void>;
  deleteItem(table: string, key: ItemKey, signal?: AbortSignal): Promise<void>;
  scanAll(table: string, signal?: AbortSignal): Promise<StoredItem[]>;
  listTables(limit: number, signal?: AbortSignal): Promise<string[]>;
}

export interface RegionStoreProvider {
  forRegion(region: Region): RegionTableStore;
}

// ═══════════════════════════════════════════════════════════════════════════════
// DYNAMODB IMPLEMENTATION
// ═══════════════════════════════════════════════════════════════════════════════

export class DynamoRegionStore implements RegionTableStore {
  constructor(
    readonly region: Region,
    private readonly client: DynamoDBClient
  ) {}

  async countItems(table: string, signal?: AbortSignal): Promise<number> {
    const response = await this.client.send(new DescribeTableCommand({ TableName: table }), { abortSignal: signal });
    return response.Table?.ItemCount ?? 0;
  }

  async sampleItems(table: string, limit: number, signal?: AbortSignal): Promise<StoredItem[]> {
    const response = await this.client.send(new ScanCommand({ TableName: table, Limit: limit }), {
      abortSignal: signal,
    });
    return (response.Items ?? []).map((item) => fromAttributes(item));
  }

  async getItem(table: string, key: ItemKey, signal?: AbortSignal): Promise<StoredItem | undefined> {
    const response = await this.client.send(
      new GetItemCommand({ TableName: table, Key: marshall(key), ConsistentRead: false }),
      { abortSignal: signal }
    );
    return response.Item ? fromAttributes(response.Item) : undefined;
  }

  async putItem(table: string, item: StoredItem, signal?: AbortSignal): Promise<void> {
    await this.client.send(
      new PutItemCommand({ TableName: table, Item: marshall(item, { removeUndefinedValues: true }) }),
      { abortSignal: signal }
    );
  }

  async deleteItem(table: string, key: ItemKey, signal?: AbortSignal): Promise<void> {
    await this.client.send(new DeleteItemCommand({ TableName: table, Key: marshall(key) }), { abortSignal: signal });
  }

  async scanAll(table: string, signal?: AbortSignal): Promise<StoredItem[]> {
    const items: StoredItem[] = [];
    let exclusiveStartKey: Record<string, AttributeValue> | undefined;

    do {
      const response = await this.client.send(
        new ScanCommand({ TableName: table, ExclusiveStartKey: exclusiveStartKey }),
        { abortSignal: signal }
      );
      for (const item of response.Items ?? []) {
        items.push(fromAttributes(item));
      }
      exclusiveStartKey = response.LastEvaluatedKey;
    } while (exclusiveStartKey);

    return items;
  }

  async listTables(limit: number, signal?: AbortSignal): Promise<string[]> {
    const response = await this.client.send(new ListTablesCommand({ Limit: limit }), { abortSignal: signal });
    return response.TableNames ?? [];
  }
}

/**
 * Hands out one DynamoDB-backed store per region. Clients are created lazily
 * and owned by this factory instance.
 */
export class DynamoRegionStoreFactory implements RegionStoreProvider {
  private clients: Map<Region, DynamoDBClient> = new Map();
  private stores: Map<Region, DynamoRegionStore> = new Map();

  constructor(private readonly createClient: (region: Region) => DynamoDBClient = defaultClient) {}

  forRegion(region: Region): RegionTableStore {
    let store = this.stores.get(region);
    if (!store) {
      const client = this.createClient(region);
      store = new DynamoRegionStore(region, client);
      this.clients.set(region, client);
      this.stores.set(region, store);
    }
    return store;
  }

  destroy(): void {
    for (const client of this.clients.values()) {
      client.destroy();
    }
    this.clients.clear();
    this.stores.clear();
  }
}

function defaultClient(region: Region): DynamoDBClient {
  return new DynamoDBClient({ region, maxAttempts: 2 });
}

function fromAttributes(item: Record<string, AttributeValue>): StoredItem {
  return unmarshall(item);
}
