import { TransientError } from './transient.error';

export class StoreUnavailableError extends TransientError {
  override readonly name = 'StoreUnavailableError';
}
