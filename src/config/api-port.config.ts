import { readNonNegativeInteger } from './read-number.util';

const DEFAULT_API_PORT = 8000;

export function getApiPort(): number {
  return readNonNegativeInteger('API_PORT', DEFAULT_API_PORT);
}
