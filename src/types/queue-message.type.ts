export interface QueueMessage {
  messageId: string;
  /** Opaque token for delete, visibility changes and dead-lettering. Changes on every receive. */
  receiptHandle: string;
  body: string;
  /** Deliveries so far, including the current one. */
  receiveCount: number;
  sentAt?: Date;
}
