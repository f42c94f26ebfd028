import type { BackoffPolicy } from '../retry/backoff.policy';
import { RECONNECT_POLICY } from '../retry/backoff.policy';
import { getBatchSize, getWaitTimeSeconds } from './batch-size.config';
import { getConnectMaxRetries } from './connect-retries.config';
import { getMaxReceiveCount } from './max-receive-count.config';
import { getMaxSleepIntervalMs, getSleepIntervalMs } from './sleep-interval.config';
import { getVisibilityTimeoutSeconds } from './visibility-timeout.config';

export interface ProcessorConfig {
  batchSize: number;
  waitTimeSeconds: number;
  visibilityTimeoutSeconds: number;
  maxReceiveCount: number;
  connectMaxRetries: number;
  reconnectPolicy: BackoffPolicy;
  idlePolicy: BackoffPolicy;
}

export function getProcessorConfig(): ProcessorConfig {
  return {
    batchSize: getBatchSize(),
    waitTimeSeconds: getWaitTimeSeconds(),
    visibilityTimeoutSeconds: getVisibilityTimeoutSeconds(),
    maxReceiveCount: getMaxReceiveCount(),
    connectMaxRetries: getConnectMaxRetries(),
    reconnectPolicy: RECONNECT_POLICY,
    idlePolicy: {
      baseDelayMs: getSleepIntervalMs(),
      maxDelayMs: getMaxSleepIntervalMs(),
    },
  };
}
