import { readPositiveNumber } from './read-number.util';

const DEFAULT_MAX_RECEIVE_COUNT = 3;

export function getMaxReceiveCount(): number {
  return Math.floor(readPositiveNumber('SQS_MAX_RECEIVE_COUNT', DEFAULT_MAX_RECEIVE_COUNT));
}
