import type { ValidationError } from '../errors/validation.error';
import type { AggregateRecord } from './aggregate-record.type';
import type { Event } from './event.type';

export type MessageOutcome =
  | { kind: 'delivered'; event: Event; record: AggregateRecord }
  | { kind: 'validation-failed'; error: ValidationError }
  | { kind: 'store-unavailable'; error: unknown }
  | { kind: 'exceeded-retries'; receiveCount: number };

export type MessageDisposition = 'acknowledged' | 'discarded' | 'dead-lettered' | 'retained';

export interface BatchSummary {
  received: number;
  acknowledged: number;
  discarded: number;
  deadLettered: number;
  retained: number;
}
