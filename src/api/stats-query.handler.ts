import type { AggregateRecord } from '../types/aggregate-record.type';
import type { AggregateStore } from '../types/aggregate-store.interface';
import type { ErrorCode, ErrorResponse } from '../schemas/error-response.schema';
import type { HealthStatus } from '../types/health-status.type';
import type { QueueGateway } from '../types/queue-gateway.interface';
import type { AllStatsResponse, StatsResponse } from '../schemas/stats-response.schema';
import { validateEventType } from '../validators/event-type.validator';
import { ValidationError } from '../errors/validation.error';
import { TransientError } from '../errors/transient.error';
import { formatErrorMessage } from '../errors/format-error-message.util';
import { logger } from '../logging/logger';

export interface HealthResponse {
  status: HealthStatus;
  store: HealthStatus;
  queue: HealthStatus;
}

export interface HttpResult<T> {
  statusCode: number;
  body?: T | ErrorResponse;
}

export interface StatsDependencies {
  store: AggregateStore;
  queue: QueueGateway;
}

function toStatsResponse(type: string, record: AggregateRecord): StatsResponse {
  return { type, count: record.count, sum: record.sum };
}

function errorResult(
  statusCode: number,
  code: ErrorCode,
  message: string,
  requestId: string,
  retryable?: boolean,
): HttpResult<never> {
  return {
    statusCode,
    body: { error: { code, message, requestId, ...(retryable === undefined ? {} : { retryable }) } },
  };
}

function failure(error: unknown, operation: string, requestId: string): HttpResult<never> {
  const log = logger.child({ requestId });

  if (error instanceof ValidationError) {
    log.warn({ error: error.message }, 'validation failed');

    return errorResult(400, 'VALIDATION_ERROR', error.message, requestId);
  }

  const retryable = error instanceof TransientError;

  log.error({ error: formatErrorMessage(error), retryable, operation }, 'stats request failed');

  return retryable
    ? errorResult(503, 'TRANSIENT_ERROR', `${operation} failed`, requestId, true)
    : errorResult(500, 'INTERNAL_ERROR', `${operation} failed`, requestId, false);
}

export async function getAllStats(
  { store }: Pick<StatsDependencies, 'store'>,
  requestId: string,
): Promise<HttpResult<AllStatsResponse>> {
  try {
    const records = await store.getAll();
    const body: AllStatsResponse = {};

    for (const [type, record] of Object.entries(records)) {
      body[type] = toStatsResponse(type, record);
    }

    return { statusCode: 200, body };
  } catch (error) {
    return failure(error, 'stats query', requestId);
  }
}

export async function getStatsByType(
  { store }: Pick<StatsDependencies, 'store'>,
  rawType: unknown,
  requestId: string,
): Promise<HttpResult<StatsResponse>> {
  try {
    const type = validateEventType(rawType);
    const record = await store.get(type);

    if (!record) {
      return errorResult(404, 'NOT_FOUND', `no stats for event type ${type}`, requestId);
    }

    return { statusCode: 200, body: toStatsResponse(type, record) };
  } catch (error) {
    return failure(error, 'stats query', requestId);
  }
}

export async function resetStats(
  { store }: Pick<StatsDependencies, 'store'>,
  requestId: string,
): Promise<HttpResult<never>> {
  try {
    await store.reset();
    logger.child({ requestId }).info('stats reset');

    return { statusCode: 204 };
  } catch (error) {
    return failure(error, 'stats reset', requestId);
  }
}

export async function checkHealth({
  store,
  queue,
}: StatsDependencies): Promise<HttpResult<HealthResponse>> {
  const [storeStatus, queueStatus] = await Promise.all([store.healthCheck(), queue.healthCheck()]);
  const status = storeStatus === 'healthy' && queueStatus === 'healthy' ? 'healthy' : 'unhealthy';

  return {
    statusCode: status === 'healthy' ? 200 : 503,
    body: { status, store: storeStatus, queue: queueStatus },
  };
}
