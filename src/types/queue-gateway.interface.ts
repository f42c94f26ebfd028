import type { HealthStatus } from './health-status.type';
import type { QueueMessage } from './queue-message.type';

/** Failures surface as `TransientError` or `PermanentError`. */
export interface QueueGateway {
  connect(): Promise<void>;
  /** Long-polls for up to `waitSeconds`. An empty array means nothing arrived. */
  receiveBatch(maxMessages: number, waitSeconds: number): Promise<QueueMessage[]>;
  /** No-op when the message is already gone. */
  delete(message: QueueMessage): Promise<void>;
  extendVisibility(message: QueueMessage, seconds: number): Promise<void>;
  /** Publishes to the dead-letter queue, then deletes. A failed publish leaves the message in place. */
  moveToDeadLetter(message: QueueMessage, reason: string): Promise<void>;
  healthCheck(): Promise<HealthStatus>;
}
