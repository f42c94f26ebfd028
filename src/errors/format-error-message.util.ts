export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    const text = error.stack ?? error.message;

    return error.cause === undefined
      ? text
      : `${text}\ncaused by: ${formatErrorMessage(error.cause)}`;
  }

  return String(error);
}
