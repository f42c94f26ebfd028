const DEFAULT_QUEUE_NAME = 'ecommerce-events';

export function getQueueName(): string {
  return process.env['SQS_QUEUE_NAME'] || DEFAULT_QUEUE_NAME;
}

export function getDeadLetterQueueName(): string {
  return process.env['DLQ_QUEUE_NAME'] || `${getQueueName()}-dlq`;
}
