import type { Logger } from 'pino';

import type { HealthStatus } from '../types/health-status.type';
import { PermanentError } from '../errors/permanent.error';
import { formatErrorMessage } from '../errors/format-error-message.util';
import { computeDelay } from './backoff.policy';
import type { BackoffPolicy } from './backoff.policy';
import { sleep } from './sleep.util';

export interface WaitForHealthyOptions {
  maxAttempts: number;
  policy: BackoffPolicy;
  log: Logger;
  signal?: AbortSignal;
}

/**
 * Polls `probe` until it reports healthy, sleeping `computeDelay(attempt)` between tries.
 * Resolves `false` if `signal` aborts first; rejects with `PermanentError` once attempts run out.
 */
export async function waitForHealthy(
  name: string,
  probe: () => Promise<HealthStatus>,
  { maxAttempts, policy, log, signal }: WaitForHealthyOptions,
): Promise<boolean> {
  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    if (signal?.aborted) {
      return false;
    }

    try {
      if ((await probe()) === 'healthy') {
        log.info({ attempt: attempt + 1 }, `${name} reachable`);

        return true;
      }

      log.warn({ attempt: attempt + 1, maxAttempts }, `${name} unhealthy`);
    } catch (error) {
      if (error instanceof PermanentError) {
        throw error;
      }

      log.warn(
        { attempt: attempt + 1, maxAttempts, error: formatErrorMessage(error) },
        `${name} connection attempt failed`,
      );
    }

    if (attempt + 1 < maxAttempts && !(await sleep(computeDelay(attempt, policy), signal))) {
      return false;
    }
  }

  throw new PermanentError(`${name} unreachable after ${maxAttempts} attempts`);
}
