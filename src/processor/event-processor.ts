import type { AggregateStore } from '../types/aggregate-store.interface';
import type { Event } from '../types/event.type';
import type {
  BatchSummary,
  MessageDisposition,
  MessageOutcome,
} from '../types/message-outcome.type';
import type { ProcessorConfig } from '../config/processor.config';
import type { QueueGateway } from '../types/queue-gateway.interface';
import type { QueueMessage } from '../types/queue-message.type';
import { validateEvent } from '../validators/event.validator';
import { ValidationError } from '../errors/validation.error';
import { PermanentError } from '../errors/permanent.error';
import { formatErrorMessage } from '../errors/format-error-message.util';
import { computeDelay } from '../retry/backoff.policy';
import { sleep } from '../retry/sleep.util';
import { waitForHealthy } from '../retry/wait-for-healthy.util';
import { logger } from '../logging/logger';

export type ProcessorState = 'starting' | 'connecting' | 'running' | 'draining' | 'stopped';

export const DEAD_LETTER_REASON = 'max-receive-count-exceeded';

export interface EventProcessorDependencies {
  queue: QueueGateway;
  store: AggregateStore;
  config: ProcessorConfig;
}

function emptySummary(received: number): BatchSummary {
  return { received, acknowledged: 0, discarded: 0, deadLettered: 0, retained: 0 };
}

function tally(summary: BatchSummary, disposition: MessageDisposition): void {
  switch (disposition) {
    case 'acknowledged':
      summary.acknowledged++;
      break;
    case 'discarded':
      summary.discarded++;
      break;
    case 'dead-lettered':
      summary.deadLettered++;
      break;
    case 'retained':
      summary.retained++;
      break;
  }
}

/**
 * Claims batches from the queue and folds each valid event into the shared
 * aggregate store. A message is deleted only after its increment succeeded,
 * so a crash between the two re-delivers it and the event is counted twice.
 */
export class EventProcessor {
  private readonly log = logger.child({ component: 'event-processor' });
  private readonly queue: QueueGateway;
  private readonly store: AggregateStore;
  private readonly config: ProcessorConfig;
  private currentState: ProcessorState = 'starting';

  constructor({ queue, store, config }: EventProcessorDependencies) {
    this.queue = queue;
    this.store = store;
    this.config = config;
  }

  get state(): ProcessorState {
    return this.currentState;
  }

  /**
   * Runs until `signal` aborts. The batch in flight when it aborts is finished
   * before this resolves. Rejects with `PermanentError` when the store or queue
   * cannot be reached at startup, or the queue turns out to be misconfigured.
   */
  async run(signal: AbortSignal): Promise<void> {
    const onAbort = (): void => {
      if (this.currentState === 'running') {
        this.transition('draining');
      }
    };

    signal.addEventListener('abort', onAbort, { once: true });

    try {
      this.transition('connecting');

      if (!(await this.connect(signal))) {
        return;
      }

      if (!signal.aborted) {
        this.transition('running');
        await this.poll(signal);
      }
    } finally {
      signal.removeEventListener('abort', onAbort);
      this.transition('stopped');
    }
  }

  async processBatch(messages: QueueMessage[]): Promise<BatchSummary> {
    const summary = emptySummary(messages.length);

    const results = await Promise.allSettled(messages.map((message) => this.handle(message)));

    results.forEach((result, index) => {
      if (result.status === 'fulfilled') {
        tally(summary, result.value);

        return;
      }

      this.log.error(
        { messageId: messages[index]?.messageId, error: formatErrorMessage(result.reason) },
        'message handling failed unexpectedly, leaving it for redelivery',
      );
      summary.retained++;
    });

    this.log.info(summary, 'batch processed');

    return summary;
  }

  async evaluate(message: QueueMessage): Promise<MessageOutcome> {
    if (message.receiveCount > this.config.maxReceiveCount) {
      return { kind: 'exceeded-retries', receiveCount: message.receiveCount };
    }

    let event: Event;

    try {
      event = validateEvent(message.body);
    } catch (error) {
      if (error instanceof ValidationError) {
        return { kind: 'validation-failed', error };
      }

      throw error;
    }

    if (message.receiveCount > 1) {
      await this.extendVisibility(message);
    }

    try {
      const record = await this.store.increment(event.type, event.value);

      return { kind: 'delivered', event, record };
    } catch (error) {
      return { kind: 'store-unavailable', error };
    }
  }

  private async handle(message: QueueMessage): Promise<MessageDisposition> {
    const outcome = await this.evaluate(message);

    return this.settle(message, outcome);
  }

  private async settle(message: QueueMessage, outcome: MessageOutcome): Promise<MessageDisposition> {
    const log = this.log.child({
      messageId: message.messageId,
      receiveCount: message.receiveCount,
    });

    switch (outcome.kind) {
      case 'delivered': {
        log.debug(
          { type: outcome.event.type, value: outcome.event.value, ...outcome.record },
          'event aggregated',
        );

        try {
          await this.queue.delete(message);
        } catch (error) {
          log.error(
            { error: formatErrorMessage(error) },
            'delete after aggregation failed, redelivery will count this event again',
          );

          return 'retained';
        }

        return 'acknowledged';
      }

      case 'validation-failed': {
        log.warn(
          { reason: outcome.error.reason, error: outcome.error.message, permanent: true },
          'message rejected: invalid event, discarding',
        );

        try {
          await this.queue.delete(message);
        } catch (error) {
          log.warn({ error: formatErrorMessage(error) }, 'discard of invalid message failed');

          return 'retained';
        }

        return 'discarded';
      }

      case 'store-unavailable': {
        log.warn(
          {
            error: formatErrorMessage(outcome.error),
            permanent: outcome.error instanceof PermanentError,
          },
          'aggregation failed, message left for redelivery',
        );

        if (message.receiveCount >= this.config.maxReceiveCount) {
          log.error('message will be dead-lettered on its next delivery');
        }

        return 'retained';
      }

      case 'exceeded-retries': {
        try {
          await this.queue.moveToDeadLetter(message, DEAD_LETTER_REASON);
        } catch (error) {
          log.error(
            { error: formatErrorMessage(error) },
            'dead-letter move failed, message left for redelivery',
          );

          return 'retained';
        }

        log.warn({ maxReceiveCount: this.config.maxReceiveCount }, 'message dead-lettered');

        return 'dead-lettered';
      }
    }
  }

  private async extendVisibility(message: QueueMessage): Promise<void> {
    try {
      await this.queue.extendVisibility(message, this.config.visibilityTimeoutSeconds);
    } catch (error) {
      this.log.warn(
        { messageId: message.messageId, error: formatErrorMessage(error) },
        'visibility extension failed',
      );
    }
  }

  private async connect(signal: AbortSignal): Promise<boolean> {
    const options = {
      maxAttempts: this.config.connectMaxRetries,
      policy: this.config.reconnectPolicy,
      log: this.log,
      signal,
    };

    if (!(await waitForHealthy('aggregate store', () => this.store.healthCheck(), options))) {
      return false;
    }

    return waitForHealthy(
      'queue',
      async () => {
        await this.queue.connect();

        return 'healthy';
      },
      options,
    );
  }

  private async poll(signal: AbortSignal): Promise<void> {
    let idleAttempt = 0;
    let failedAttempt = 0;

    while (!signal.aborted) {
      let messages: QueueMessage[];

      try {
        messages = await this.queue.receiveBatch(this.config.batchSize, this.config.waitTimeSeconds);
        failedAttempt = 0;
      } catch (error) {
        if (error instanceof PermanentError) {
          this.log.error({ error: formatErrorMessage(error) }, 'receive failed permanently');

          throw error;
        }

        const delayMs = computeDelay(failedAttempt++, this.config.reconnectPolicy);

        this.log.warn({ error: formatErrorMessage(error), delayMs }, 'receive failed, backing off');
        await sleep(delayMs, signal);

        continue;
      }

      if (messages.length === 0) {
        const delayMs = computeDelay(idleAttempt++, this.config.idlePolicy);

        this.log.debug({ delayMs }, 'no messages, idling');
        await sleep(delayMs, signal);

        continue;
      }

      idleAttempt = 0;
      this.log.info({ count: messages.length }, 'batch received');
      await this.processBatch(messages);
    }
  }

  private transition(next: ProcessorState): void {
    if (this.currentState === next) {
      return;
    }

    this.log.info({ from: this.currentState, to: next }, 'state changed');
    this.currentState = next;
  }
}
