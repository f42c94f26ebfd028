import { readNonNegativeInteger, readPositiveNumber } from './read-number.util';

const DEFAULT_BATCH_SIZE = 10;
const MAX_BATCH_SIZE = 10;

const DEFAULT_WAIT_TIME_SECONDS = 20;
const MAX_WAIT_TIME_SECONDS = 20;

export function getBatchSize(): number {
  const value = Math.floor(readPositiveNumber('MAX_MESSAGES_PER_BATCH', DEFAULT_BATCH_SIZE));

  return Math.min(value, MAX_BATCH_SIZE);
}

export function getWaitTimeSeconds(): number {
  const value = readNonNegativeInteger('SQS_WAIT_TIME_SECONDS', DEFAULT_WAIT_TIME_SECONDS);

  return Math.min(value, MAX_WAIT_TIME_SECONDS);
}
