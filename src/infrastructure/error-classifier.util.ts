const TRANSIENT_ERROR_NAMES = new Set([
  'ProvisionedThroughputExceededException',
  'ThrottlingException',
  'RequestLimitExceeded',
  'RequestThrottled',
  'InternalServerError',
  'InternalError',
  'ServiceUnavailable',
  'ServiceUnavailableException',
  'TransactionConflictException',
  'KmsThrottled',
  'TimeoutError',
  'NetworkingError',
  'ECONNREFUSED',
  'ECONNRESET',
]);

const PERMANENT_ERROR_NAMES = new Set([
  'AccessDeniedException',
  'AccessDenied',
  'ResourceNotFoundException',
  'ValidationException',
  'SerializationException',
  'QueueDoesNotExist',
  'AWS.SimpleQueueService.NonExistentQueue',
  'InvalidAddress',
  'InvalidSecurity',
  'UnrecognizedClientException',
]);

interface ErrorWithMetadata extends Error {
  $metadata?: { httpStatusCode?: number };
  code?: string;
}

function errorNames(error: Error): string[] {
  const code = (error as ErrorWithMetadata).code;

  return code ? [error.name, code] : [error.name];
}

export function isTransientError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }

  if (errorNames(error).some((name) => TRANSIENT_ERROR_NAMES.has(name))) {
    return true;
  }

  const metadata = (error as ErrorWithMetadata).$metadata;

  if (metadata?.httpStatusCode !== undefined && metadata.httpStatusCode >= 500) {
    return true;
  }

  return false;
}

export function isPermanentError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }

  return errorNames(error).some((name) => PERMANENT_ERROR_NAMES.has(name));
}
