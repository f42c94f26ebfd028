import type { Server } from 'node:http';

import { createStatsApp } from '../../src/api/stats.app';
import {
  checkHealth,
  getAllStats,
  getStatsByType,
  resetStats,
} from '../../src/api/stats-query.handler';
import { StoreUnavailableError } from '../../src/errors/store-unavailable.error';
import { errorResponseSchema } from '../../src/schemas/error-response.schema';
import { statsResponseSchema } from '../../src/schemas/stats-response.schema';
import { FakeAggregateStore } from '../helpers/fake-aggregate-store';
import { FakeQueueGateway } from '../helpers/fake-queue-gateway';

const REQUEST_ID = 'req-1';

let store: FakeAggregateStore;
let queue: FakeQueueGateway;

beforeEach(() => {
  store = new FakeAggregateStore();
  queue = new FakeQueueGateway();
});

describe('stats query handlers', () => {
  describe('getAllStats', () => {
    it('should return every event type keyed by name', async () => {
      // Arrange
      store.records.set('purchase', { count: 2, sum: 15.5 });
      store.records.set('page_view', { count: 7, sum: 7 });

      // Act
      const result = await getAllStats({ store }, REQUEST_ID);

      // Assert
      expect(result).toEqual({
        statusCode: 200,
        body: {
          purchase: { type: 'purchase', count: 2, sum: 15.5 },
          page_view: { type: 'page_view', count: 7, sum: 7 },
        },
      });
    });

    it('should return an empty mapping when nothing was aggregated', async () => {
      // Act & Assert
      expect(await getAllStats({ store }, REQUEST_ID)).toEqual({ statusCode: 200, body: {} });
    });

    it('should answer 503 when the store is unavailable', async () => {
      // Arrange
      store.readError = new StoreUnavailableError('aggregate store getAll failed');

      // Act
      const result = await getAllStats({ store }, REQUEST_ID);

      // Assert
      expect(result).toEqual({
        statusCode: 503,
        body: {
          error: {
            code: 'TRANSIENT_ERROR',
            message: 'stats query failed',
            requestId: REQUEST_ID,
            retryable: true,
          },
        },
      });
    });

    it('should answer 500 for an unexpected failure', async () => {
      // Arrange
      store.readError = new Error('boom');

      // Act
      const result = await getAllStats({ store }, REQUEST_ID);

      // Assert
      expect(result).toEqual({
        statusCode: 500,
        body: {
          error: {
            code: 'INTERNAL_ERROR',
            message: 'stats query failed',
            requestId: REQUEST_ID,
            retryable: false,
          },
        },
      });
    });
  });

  describe('getStatsByType', () => {
    it('should return the record for a known type', async () => {
      // Arrange
      store.records.set('purchase', { count: 75, sum: 650 });

      // Act
      const result = await getStatsByType({ store }, 'purchase', REQUEST_ID);

      // Assert
      expect(result).toEqual({
        statusCode: 200,
        body: { type: 'purchase', count: 75, sum: 650 },
      });
    });

    it('should answer 404 for an unknown type', async () => {
      // Act
      const result = await getStatsByType({ store }, 'refund', REQUEST_ID);

      // Assert
      expect(result).toEqual({
        statusCode: 404,
        body: {
          error: {
            code: 'NOT_FOUND',
            message: 'no stats for event type refund',
            requestId: REQUEST_ID,
          },
        },
      });
    });

    it('should answer 400 for an invalid type without reading the store', async () => {
      // Arrange
      store.readError = new Error('should not be read');

      // Act
      const result = await getStatsByType({ store }, 'bad\u0007type', REQUEST_ID);

      // Assert
      expect(result).toEqual({
        statusCode: 400,
        body: {
          error: {
            code: 'VALIDATION_ERROR',
            message: 'type must not contain control characters',
            requestId: REQUEST_ID,
          },
        },
      });
    });
  });

  describe('resetStats', () => {
    it('should clear the store and answer 204 without a body', async () => {
      // Arrange
      store.records.set('purchase', { count: 1, sum: 1 });

      // Act
      const result = await resetStats({ store }, REQUEST_ID);

      // Assert
      expect(result).toEqual({ statusCode: 204 });
      expect(store.records.size).toBe(0);
    });

    it('should answer 503 when the reset cannot reach the store', async () => {
      // Arrange
      store.readError = new StoreUnavailableError('aggregate store reset failed');

      // Act
      const result = await resetStats({ store }, REQUEST_ID);

      // Assert
      expect(result.statusCode).toBe(503);
      expect(errorResponseSchema.parse(result.body).error.message).toBe('stats reset failed');
    });
  });

  describe('checkHealth', () => {
    it('should answer 200 when both dependencies are healthy', async () => {
      // Act & Assert
      expect(await checkHealth({ store, queue })).toEqual({
        statusCode: 200,
        body: { status: 'healthy', store: 'healthy', queue: 'healthy' },
      });
    });

    it('should answer 503 when the queue is unhealthy', async () => {
      // Arrange
      queue.health = 'unhealthy';

      // Act & Assert
      expect(await checkHealth({ store, queue })).toEqual({
        statusCode: 503,
        body: { status: 'unhealthy', store: 'healthy', queue: 'unhealthy' },
      });
    });
  });
});

describe('stats http app', () => {
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    server = createStatsApp({ store, queue }).listen(0, '127.0.0.1');
    await new Promise<void>((resolve) => server.once('listening', resolve));

    const address = server.address();
    const port = typeof address === 'object' && address !== null ? address.port : 0;

    baseUrl = `http://127.0.0.1:${port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) =>
      server.close((error) => (error ? reject(error) : resolve())),
    );
  });

  it('should serve a single type as JSON', async () => {
    // Arrange
    store.records.set('add_to_cart', { count: 3, sum: 42 });

    // Act
    const response = await fetch(`${baseUrl}/stats/add_to_cart`);

    // Assert
    expect(response.status).toBe(200);
    expect(response.headers.get('content-type')).toContain('application/json');
    expect(statsResponseSchema.parse(await response.json())).toEqual({
      type: 'add_to_cart',
      count: 3,
      sum: 42,
    });
  });

  it('should decode percent-encoded type names', async () => {
    // Arrange
    store.records.set('gift card', { count: 1, sum: 20 });

    // Act
    const response = await fetch(`${baseUrl}/stats/gift%20card`);

    // Assert
    expect(response.status).toBe(200);
    expect(statsResponseSchema.parse(await response.json()).type).toBe('gift card');
  });

  it('should echo the caller request id', async () => {
    // Act
    const response = await fetch(`${baseUrl}/stats/refund`, {
      headers: { 'x-request-id': 'req-42' },
    });

    // Assert
    expect(response.status).toBe(404);
    expect(response.headers.get('x-request-id')).toBe('req-42');
    expect(errorResponseSchema.parse(await response.json()).error).toEqual({
      code: 'NOT_FOUND',
      message: 'no stats for event type refund',
      requestId: 'req-42',
    });
  });

  it('should generate a request id when none is sent', async () => {
    // Act
    const response = await fetch(`${baseUrl}/stats`);
    const body: unknown = await response.json();

    // Assert
    expect(response.status).toBe(200);
    expect(body).toEqual({});
    expect(response.headers.get('x-request-id')).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('should reset through DELETE with an empty 204', async () => {
    // Arrange
    store.records.set('purchase', { count: 1, sum: 5 });

    // Act
    const response = await fetch(`${baseUrl}/stats`, { method: 'DELETE' });

    // Assert
    expect(response.status).toBe(204);
    expect(await response.text()).toBe('');
    expect(store.records.size).toBe(0);
  });

  it('should report health', async () => {
    // Arrange
    queue.health = 'unhealthy';

    // Act
    const response = await fetch(`${baseUrl}/health`);

    // Assert
    expect(response.status).toBe(503);
    expect(await response.json()).toEqual({
      status: 'unhealthy',
      store: 'healthy',
      queue: 'unhealthy',
    });
  });
});
