export interface BackoffPolicy {
  baseMs: number;
  maxMs: number;
}

/**
 * Delay before the retry that follows the `failures`-th consecutive failure.
 * Equal jitter: the raw exponential step is halved and the other half is random,
 * so each result lies in [raw/2, raw]. With a doubling step that keeps the
 * sequence non-decreasing, and it never exceeds `maxMs`.
 */
export function backoffDelay(
  failures: number,
  policy: BackoffPolicy,
  random: () => number = Math.random
): number {
  const n = Math.max(1, failures);
  const raw = policy.baseMs * 2 ** (n - 1);
  const half = raw / 2;
  const jittered = half + random() * half;
  return Math.min(policy.maxMs, Math.round(jittered));
}
