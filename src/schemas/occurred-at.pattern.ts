export const OCCURRED_AT_PATTERN =
  /^(\d{4})-(0[1-9]|1[0-2])-(0[1-9]|[12]\d|3[01])[ T]([01]\d|2[0-3]):([0-5]\d):([0-5]\d)$/;

export function parseOccurredAt(value: string): Date | undefined {
  if (!OCCURRED_AT_PATTERN.test(value)) {
    return undefined;
  }

  const datePart = value.substring(0, 10);
  const parsed = new Date(`${datePart}T${value.substring(11)}Z`);

  // Date rolls 2021-02-30 over into March; the round trip catches it.
  if (isNaN(parsed.getTime()) || !parsed.toISOString().startsWith(datePart)) {
    return undefined;
  }

  return parsed;
}
