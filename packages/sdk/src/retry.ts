/**
 * Retry Policy (SDK)
 * Encodes a conservative, deterministic retry policy that ledger clients can adopt by default.
 * Only safe for calls the ledger rolls back in full on failure; SuretyClient never retries withdrawals.
 */
import type { ReasonCode } from '@surety/dto'

/**
 * shouldRetry
 * - Retry when the failure was on the ledger's side of a transfer or a write: SETTLEMENT_FAILED, PERSISTENCE_FAILED.
 * - Do NOT auto-retry CLIENT_*, VALIDATION_* or rule rejections (caller must change the request or wait for state).
 * - INTERNAL_ERROR is not auto-retried by default to prevent thundering herds on server faults.
 */
export function shouldRetry(code: ReasonCode): boolean {
  if (code === 'SETTLEMENT_FAILED') return true
  if (code === 'PERSISTENCE_FAILED') return true
  if (code.startsWith('CLIENT_')) return false
  if (code.startsWith('VALIDATION_')) return false
  if (code === 'INTERNAL_ERROR') return false
  return false
}

export function retryDelay(attempt: number, base = 100, cap = 2000): number {
  // exponential backoff with jitter
  const exp = Math.min(base * Math.pow(2, Math.max(0, attempt)), cap)
  const jitter = Math.floor(Math.random() * 50)
  return Math.min(exp + jitter, cap)
}

export type RetryOptions = {
  /** Extra attempts after the first. */
  retries: number
  baseDelayMs?: number
  maxDelayMs?: number
  sleep?: (ms: number) => Promise<void>
}

const defaultSleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms))

/**
 * Run `fn`, retrying while `codeOf(err)` names a retryable reason and attempts remain.
 * Errors without a reason code are rethrown immediately.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  codeOf: (err: unknown) => ReasonCode | undefined,
  opts: RetryOptions
): Promise<T> {
  const sleep = opts.sleep ?? defaultSleep
  for (let attempt = 0; ; attempt++) {
    try {
      return await fn()
    } catch (err) {
      const code = codeOf(err)
      if (!code || !shouldRetry(code) || attempt >= opts.retries) throw err
      await sleep(retryDelay(attempt, opts.baseDelayMs, opts.maxDelayMs))
    }
  }
}
