export interface BackoffPolicy {
  baseDelayMs: number;
  maxDelayMs: number;
}

export const RECONNECT_POLICY: BackoffPolicy = {
  baseDelayMs: 100,
  maxDelayMs: 5_000,
};

export function computeDelay(attempt: number, policy: BackoffPolicy): number {
  const exponent = Math.max(0, Math.floor(attempt));

  return Math.min(policy.baseDelayMs * 2 ** exponent, policy.maxDelayMs);
}
