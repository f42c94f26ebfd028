import {
  ChangeMessageVisibilityCommand,
  DeleteMessageCommand,
  GetQueueAttributesCommand,
  GetQueueUrlCommand,
  ReceiveMessageCommand,
  SendMessageCommand,
} from '@aws-sdk/client-sqs';

import type { Message, SQSClient } from '@aws-sdk/client-sqs';
import type { HealthStatus } from '../types/health-status.type';
import type { QueueGateway } from '../types/queue-gateway.interface';
import type { QueueMessage } from '../types/queue-message.type';
import { isPermanentError } from './error-classifier.util';
import { PermanentError } from '../errors/permanent.error';
import { TransientError } from '../errors/transient.error';
import { formatErrorMessage } from '../errors/format-error-message.util';
import { logger } from '../logging/logger';

const STALE_RECEIPT_ERROR_NAMES = new Set(['ReceiptHandleIsInvalid', 'InvalidParameterValue']);

export interface SqsQueueGatewayOptions {
  queueName: string;
  deadLetterQueueName: string;
  visibilityTimeoutSeconds: number;
}

interface QueueUrls {
  source: string;
  deadLetter: string;
}

function toQueueMessage(message: Message): QueueMessage | undefined {
  if (!message.MessageId || !message.ReceiptHandle || message.Body === undefined) {
    return undefined;
  }

  const receiveCount = Number(message.Attributes?.ApproximateReceiveCount);
  const sentTimestamp = Number(message.Attributes?.SentTimestamp);

  return {
    messageId: message.MessageId,
    receiptHandle: message.ReceiptHandle,
    body: message.Body,
    receiveCount: Number.isInteger(receiveCount) && receiveCount > 0 ? receiveCount : 1,
    ...(Number.isFinite(sentTimestamp) && sentTimestamp > 0
      ? { sentAt: new Date(sentTimestamp) }
      : {}),
  };
}

function isStaleReceipt(error: unknown): boolean {
  return error instanceof Error && STALE_RECEIPT_ERROR_NAMES.has(error.name);
}

export class SqsQueueGateway implements QueueGateway {
  private readonly log = logger.child({ component: 'queue-gateway' });
  private urls: QueueUrls | undefined;

  constructor(
    private readonly client: SQSClient,
    private readonly options: SqsQueueGatewayOptions,
  ) {}

  async connect(): Promise<void> {
    await this.resolveUrls();
  }

  async receiveBatch(maxMessages: number, waitSeconds: number): Promise<QueueMessage[]> {
    const { source } = await this.resolveUrls();

    const result = await this.execute('receive', () =>
      this.client.send(
        new ReceiveMessageCommand({
          QueueUrl: source,
          MaxNumberOfMessages: maxMessages,
          WaitTimeSeconds: waitSeconds,
          VisibilityTimeout: this.options.visibilityTimeoutSeconds,
          MessageSystemAttributeNames: ['ApproximateReceiveCount', 'SentTimestamp'],
        }),
      ),
    );

    const messages: QueueMessage[] = [];

    for (const raw of result.Messages ?? []) {
      const message = toQueueMessage(raw);

      if (message) {
        messages.push(message);
      } else {
        this.log.warn({ messageId: raw.MessageId }, 'received message without id, handle or body');
      }
    }

    return messages;
  }

  async delete(message: QueueMessage): Promise<void> {
    const { source } = await this.resolveUrls();

    try {
      await this.client.send(
        new DeleteMessageCommand({ QueueUrl: source, ReceiptHandle: message.receiptHandle }),
      );
    } catch (error) {
      if (isStaleReceipt(error)) {
        this.log.debug({ messageId: message.messageId }, 'message already deleted');

        return;
      }

      throw this.classify('delete', error);
    }
  }

  async extendVisibility(message: QueueMessage, seconds: number): Promise<void> {
    const { source } = await this.resolveUrls();

    await this.execute('extendVisibility', () =>
      this.client.send(
        new ChangeMessageVisibilityCommand({
          QueueUrl: source,
          ReceiptHandle: message.receiptHandle,
          VisibilityTimeout: seconds,
        }),
      ),
    );
  }

  async moveToDeadLetter(message: QueueMessage, reason: string): Promise<void> {
    const { deadLetter } = await this.resolveUrls();

    await this.execute('deadLetter', () =>
      this.client.send(
        new SendMessageCommand({
          QueueUrl: deadLetter,
          MessageBody: message.body,
          MessageAttributes: {
            SourceQueue: { DataType: 'String', StringValue: this.options.queueName },
            SourceMessageId: { DataType: 'String', StringValue: message.messageId },
            ReceiveCount: { DataType: 'Number', StringValue: String(message.receiveCount) },
            FailureReason: { DataType: 'String', StringValue: reason },
          },
        }),
      ),
    );

    await this.delete(message);
  }

  async healthCheck(): Promise<HealthStatus> {
    try {
      const { source } = await this.resolveUrls();

      await this.client.send(
        new GetQueueAttributesCommand({ QueueUrl: source, AttributeNames: ['QueueArn'] }),
      );

      return 'healthy';
    } catch (error) {
      this.log.warn({ error: formatErrorMessage(error) }, 'health check failed');

      return 'unhealthy';
    }
  }

  private async resolveUrls(): Promise<QueueUrls> {
    if (this.urls) {
      return this.urls;
    }

    const [source, deadLetter] = await Promise.all([
      this.resolveUrl(this.options.queueName),
      this.resolveUrl(this.options.deadLetterQueueName),
    ]);

    this.urls = { source, deadLetter };
    this.log.info({ source, deadLetter }, 'queue urls resolved');

    return this.urls;
  }

  private async resolveUrl(queueName: string): Promise<string> {
    const result = await this.execute(`resolve ${queueName}`, () =>
      this.client.send(new GetQueueUrlCommand({ QueueName: queueName })),
    );

    if (!result.QueueUrl) {
      throw new PermanentError(`queue ${queueName} has no url`);
    }

    return result.QueueUrl;
  }

  private async execute<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw this.classify(operation, error);
    }
  }

  private classify(operation: string, error: unknown): Error {
    if (isPermanentError(error)) {
      return new PermanentError(`queue ${operation} failed`, { cause: error });
    }

    return new TransientError(`queue ${operation} failed`, { cause: error });
  }
}
