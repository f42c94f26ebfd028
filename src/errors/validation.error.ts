export type ValidationReason =
  | { kind: 'malformed-encoding' }
  | { kind: 'missing-field'; field: string }
  | { kind: 'invalid-value'; field: string };

export class ValidationError extends Error {
  override readonly name = 'ValidationError';

  constructor(
    readonly reason: ValidationReason,
    message: string,
  ) {
    super(message);
  }
}
