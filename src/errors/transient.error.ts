/** A failure that may succeed on retry: throttling, timeouts, an unreachable service. */
export class TransientError extends Error {
  override readonly name: string = 'TransientError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}
