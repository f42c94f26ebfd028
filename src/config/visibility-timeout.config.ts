import { readPositiveNumber } from './read-number.util';

const DEFAULT_VISIBILITY_TIMEOUT_SECONDS = 300;

// SQS rejects visibility timeouts above 12 hours.
const MAX_VISIBILITY_TIMEOUT_SECONDS = 43_200;

export function getVisibilityTimeoutSeconds(): number {
  const value = Math.floor(
    readPositiveNumber('SQS_VISIBILITY_TIMEOUT', DEFAULT_VISIBILITY_TIMEOUT_SECONDS),
  );

  return Math.min(value, MAX_VISIBILITY_TIMEOUT_SECONDS);
}
