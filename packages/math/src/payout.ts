/**
 * payout.ts
 * Policy pricing and payout arithmetic on wei amounts (bigint).
 */

/**
 * insurancePayout
 * Crediting pays 1.5x the insured value, computed as (value / 2) * 3.
 * Division happens first, so odd values lose the truncated half: 1 -> 0, 2 -> 3, 3 -> 3.
 */
export function insurancePayout(value: bigint): bigint {
  if (value <= 0n) return 0n
  return (value / 2n) * 3n
}

/** A policy value is acceptable when it is non-negative and does not exceed the cap. */
export function withinPolicyCap(value: bigint, cap: bigint): boolean {
  return value >= 0n && value <= cap
}

/** Sum a list of wei amounts. */
export function sumWei(values: bigint[]): bigint {
  return values.reduce((acc, v) => acc + v, 0n)
}
