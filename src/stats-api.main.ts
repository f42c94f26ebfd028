import { createStatsApp } from './api/stats.app';
import { DynamoAggregateStore } from './infrastructure/aggregate.repository';
import { SqsQueueGateway } from './infrastructure/sqs-queue.gateway';
import { createDynamoClient } from './infrastructure/dynamo.client';
import { createSqsClient } from './infrastructure/sqs.client';
import { getApiPort } from './config/api-port.config';
import { getConnectMaxRetries } from './config/connect-retries.config';
import { getDeadLetterQueueName, getQueueName } from './config/queue-name.config';
import { getTableName } from './config/table-name.config';
import { getVisibilityTimeoutSeconds } from './config/visibility-timeout.config';
import { RECONNECT_POLICY } from './retry/backoff.policy';
import { waitForHealthy } from './retry/wait-for-healthy.util';
import { formatErrorMessage } from './errors/format-error-message.util';
import { logger } from './logging/logger';

export async function main(): Promise<void> {
  const log = logger.child({ component: 'stats-api' });
  const store = new DynamoAggregateStore(createDynamoClient(), getTableName());
  const queue = new SqsQueueGateway(createSqsClient(), {
    queueName: getQueueName(),
    deadLetterQueueName: getDeadLetterQueueName(),
    visibilityTimeoutSeconds: getVisibilityTimeoutSeconds(),
  });

  const controller = new AbortController();

  process.once('SIGINT', () => controller.abort());
  process.once('SIGTERM', () => controller.abort());

  const reachable = await waitForHealthy('aggregate store', () => store.healthCheck(), {
    maxAttempts: getConnectMaxRetries(),
    policy: RECONNECT_POLICY,
    log,
    signal: controller.signal,
  });

  if (!reachable) {
    return;
  }

  const port = getApiPort();
  const server = createStatsApp({ store, queue }).listen(port, () => {
    log.info({ port }, 'stats api listening');
  });

  await new Promise<void>((resolve, reject) => {
    const close = (): void => {
      log.info('shutting down stats api');
      server.close((error) => (error ? reject(error) : resolve()));
    };

    server.once('error', reject);

    if (controller.signal.aborted) {
      close();
    } else {
      controller.signal.addEventListener('abort', close, { once: true });
    }
  });
}

if (require.main === module) {
  main().catch((error: unknown) => {
    logger.fatal({ error: formatErrorMessage(error) }, 'stats api failed');
    process.exitCode = 1;
  });
}
