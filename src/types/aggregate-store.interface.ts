import type { AggregateRecord } from './aggregate-record.type';
import type { HealthStatus } from './health-status.type';

/**
 * Shared per-event-type accumulator. Every processor instance writes to the
 * same store, so implementations must apply `increment` as one indivisible
 * operation on the store side.
 *
 * Failures surface as `StoreUnavailableError` or `PermanentError`.
 */
export interface AggregateStore {
  /** Adds one to `count` and `amount` to `sum`, returning the record after the update. */
  increment(eventType: string, amount: number): Promise<AggregateRecord>;
  get(eventType: string): Promise<AggregateRecord | undefined>;
  getAll(): Promise<Record<string, AggregateRecord>>;
  reset(): Promise<void>;
  healthCheck(): Promise<HealthStatus>;
}
