import {
  BatchWriteItemCommand,
  GetItemCommand,
  QueryCommand,
  UpdateItemCommand,
} from '@aws-sdk/client-dynamodb';

import type { AttributeValue, DynamoDBClient, WriteRequest } from '@aws-sdk/client-dynamodb';
import type { AggregateRecord } from '../types/aggregate-record.type';
import type { AggregateStore } from '../types/aggregate-store.interface';
import type { HealthStatus } from '../types/health-status.type';
import { META_KEY, buildEventTypeKey, buildGenerationKey } from './aggregate-key.builder';
import { isPermanentError } from './error-classifier.util';
import { PermanentError } from '../errors/permanent.error';
import { StoreUnavailableError } from '../errors/store-unavailable.error';
import { formatErrorMessage } from '../errors/format-error-message.util';
import { logger } from '../logging/logger';

const BATCH_WRITE_LIMIT = 25;

type Item = Record<string, AttributeValue>;

function toRecord(item: Item): AggregateRecord {
  return {
    count: Number(item['count']?.N ?? 0),
    sum: Number(item['sum']?.N ?? 0),
  };
}

function chunk<T>(items: T[], size: number): T[][] {
  const chunks: T[][] = [];

  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }

  return chunks;
}

/**
 * Aggregates live under `GEN#<n> / TYPE#<eventType>`, where `n` is the
 * generation held in the `META / GENERATION` item. `reset` bumps the
 * generation in a single write, so every record disappears at once for all
 * readers and writers; the previous generation's items are purged afterwards.
 *
 * An increment that read the old generation just before a reset lands in the
 * old generation and is cleared along with it.
 */
export class DynamoAggregateStore implements AggregateStore {
  private readonly log = logger.child({ component: 'aggregate-store' });

  constructor(
    private readonly client: DynamoDBClient,
    private readonly tableName: string,
  ) {}

  async increment(eventType: string, amount: number): Promise<AggregateRecord> {
    return this.execute('increment', async () => {
      const generation = await this.currentGeneration();

      const result = await this.client.send(
        new UpdateItemCommand({
          TableName: this.tableName,
          Key: {
            pk: { S: buildGenerationKey(generation) },
            sk: { S: buildEventTypeKey(eventType) },
          },
          UpdateExpression: 'ADD #count :one, #sum :amount SET #eventType = :eventType',
          ExpressionAttributeNames: {
            '#count': 'count',
            '#sum': 'sum',
            '#eventType': 'eventType',
          },
          ExpressionAttributeValues: {
            ':one': { N: '1' },
            ':amount': { N: amount.toString() },
            ':eventType': { S: eventType },
          },
          ReturnValues: 'ALL_NEW',
        }),
      );

      return toRecord(result.Attributes ?? {});
    });
  }

  async get(eventType: string): Promise<AggregateRecord | undefined> {
    return this.execute('get', async () => {
      const generation = await this.currentGeneration();

      const result = await this.client.send(
        new GetItemCommand({
          TableName: this.tableName,
          Key: {
            pk: { S: buildGenerationKey(generation) },
            sk: { S: buildEventTypeKey(eventType) },
          },
          ConsistentRead: true,
        }),
      );

      return result.Item ? toRecord(result.Item) : undefined;
    });
  }

  async getAll(): Promise<Record<string, AggregateRecord>> {
    return this.execute('getAll', async () => {
      const generation = await this.currentGeneration();
      const items = await this.queryGeneration(generation, false);
      const records: Record<string, AggregateRecord> = {};

      for (const item of items) {
        const eventType = item['eventType']?.S;

        if (eventType !== undefined) {
          records[eventType] = toRecord(item);
        }
      }

      return records;
    });
  }

  async reset(): Promise<void> {
    const previous = await this.execute('reset', async () => {
      const result = await this.client.send(
        new UpdateItemCommand({
          TableName: this.tableName,
          Key: {
            pk: { S: META_KEY.pk },
            sk: { S: META_KEY.sk },
          },
          UpdateExpression: 'ADD #generation :one',
          ExpressionAttributeNames: { '#generation': 'generation' },
          ExpressionAttributeValues: { ':one': { N: '1' } },
          ReturnValues: 'UPDATED_OLD',
        }),
      );

      return Number(result.Attributes?.['generation']?.N ?? 0);
    });

    this.log.info({ previousGeneration: previous }, 'aggregates reset');

    try {
      await this.purgeGeneration(previous);
    } catch (error) {
      this.log.warn(
        { generation: previous, error: formatErrorMessage(error) },
        'purge of previous generation failed, stale items remain unreachable',
      );
    }
  }

  async healthCheck(): Promise<HealthStatus> {
    try {
      await this.currentGeneration();

      return 'healthy';
    } catch (error) {
      this.log.warn({ error: formatErrorMessage(error) }, 'health check failed');

      return 'unhealthy';
    }
  }

  private async currentGeneration(): Promise<number> {
    const result = await this.client.send(
      new GetItemCommand({
        TableName: this.tableName,
        Key: {
          pk: { S: META_KEY.pk },
          sk: { S: META_KEY.sk },
        },
        ProjectionExpression: '#generation',
        ExpressionAttributeNames: { '#generation': 'generation' },
        ConsistentRead: true,
      }),
    );

    return Number(result.Item?.['generation']?.N ?? 0);
  }

  private async queryGeneration(generation: number, keysOnly: boolean): Promise<Item[]> {
    const items: Item[] = [];
    let exclusiveStartKey: Item | undefined;

    do {
      const result = await this.client.send(
        new QueryCommand({
          TableName: this.tableName,
          KeyConditionExpression: 'pk = :pk',
          ExpressionAttributeValues: {
            ':pk': { S: buildGenerationKey(generation) },
          },
          ...(keysOnly ? { ProjectionExpression: 'pk, sk' } : {}),
          ConsistentRead: true,
          ExclusiveStartKey: exclusiveStartKey,
        }),
      );

      items.push(...(result.Items ?? []));
      exclusiveStartKey = result.LastEvaluatedKey;
    } while (exclusiveStartKey);

    return items;
  }

  private async purgeGeneration(generation: number): Promise<void> {
    const items = await this.queryGeneration(generation, true);

    for (const batch of chunk(items, BATCH_WRITE_LIMIT)) {
      let requests: WriteRequest[] = batch.flatMap((item) => {
        const pk = item['pk'];
        const sk = item['sk'];

        return pk && sk ? [{ DeleteRequest: { Key: { pk, sk } } }] : [];
      });

      while (requests.length > 0) {
        const result = await this.client.send(
          new BatchWriteItemCommand({ RequestItems: { [this.tableName]: requests } }),
        );

        requests = result.UnprocessedItems?.[this.tableName] ?? [];
      }
    }

    this.log.debug({ generation, purged: items.length }, 'previous generation purged');
  }

  private async execute<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (isPermanentError(error)) {
        throw new PermanentError(`aggregate store ${operation} failed`, { cause: error });
      }

      throw new StoreUnavailableError(`aggregate store ${operation} failed`, { cause: error });
    }
  }
}
