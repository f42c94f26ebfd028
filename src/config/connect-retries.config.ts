import { readPositiveNumber } from './read-number.util';

const DEFAULT_CONNECT_MAX_RETRIES = 30;

export function getConnectMaxRetries(): number {
  return Math.floor(readPositiveNumber('STORE_CONNECT_MAX_RETRIES', DEFAULT_CONNECT_MAX_RETRIES));
}
