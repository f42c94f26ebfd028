/** Misconfiguration or a missing resource. Retrying will not help. */
export class PermanentError extends Error {
  override readonly name = 'PermanentError';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}
