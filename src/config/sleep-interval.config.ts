import { readPositiveNumber } from './read-number.util';

const DEFAULT_SLEEP_INTERVAL_SECONDS = 1;
const DEFAULT_MAX_SLEEP_INTERVAL_SECONDS = 10;

export function getSleepIntervalMs(): number {
  return readPositiveNumber('PROCESSOR_SLEEP_INTERVAL', DEFAULT_SLEEP_INTERVAL_SECONDS) * 1000;
}

export function getMaxSleepIntervalMs(): number {
  const max =
    readPositiveNumber('PROCESSOR_MAX_SLEEP_INTERVAL', DEFAULT_MAX_SLEEP_INTERVAL_SECONDS) * 1000;

  return Math.max(max, getSleepIntervalMs());
}
