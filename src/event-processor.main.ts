import { EventProcessor } from './processor/event-processor';
import { DynamoAggregateStore } from './infrastructure/aggregate.repository';
import { SqsQueueGateway } from './infrastructure/sqs-queue.gateway';
import { createDynamoClient } from './infrastructure/dynamo.client';
import { createSqsClient } from './infrastructure/sqs.client';
import { getProcessorConfig } from './config/processor.config';
import { getDeadLetterQueueName, getQueueName } from './config/queue-name.config';
import { getTableName } from './config/table-name.config';
import { formatErrorMessage } from './errors/format-error-message.util';
import { logger } from './logging/logger';

export async function main(): Promise<void> {
  const log = logger.child({ component: 'main' });
  const config = getProcessorConfig();
  const queueName = getQueueName();
  const deadLetterQueueName = getDeadLetterQueueName();

  const processor = new EventProcessor({
    queue: new SqsQueueGateway(createSqsClient(), {
      queueName,
      deadLetterQueueName,
      visibilityTimeoutSeconds: config.visibilityTimeoutSeconds,
    }),
    store: new DynamoAggregateStore(createDynamoClient(), getTableName()),
    config,
  });

  const controller = new AbortController();
  const shutdown = (signal: NodeJS.Signals): void => {
    log.info({ signal }, 'shutdown requested, draining');
    controller.abort();
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  log.info({ queueName, deadLetterQueueName, ...config }, 'starting event processor');

  await processor.run(controller.signal);

  log.info('event processor stopped');
}

if (require.main === module) {
  main().catch((error: unknown) => {
    logger.fatal({ error: formatErrorMessage(error) }, 'event processor failed');
    process.exitCode = 1;
  });
}
