/**
 * reason() factory
 * Merges a base registry entry with optional overrides.
 * Defaults come from REASONS; overrides can change `message`, `http_status`, and add `context`.
 * Adding new codes: extend the DTO registry. Keep codes stable once published so SDK retry logic keeps working.
 */
import { ReasonDetail, ReasonCode } from '@surety/dto'
import { REASONS } from './registry'
import { ReasonedRejection } from './errors'

export type ReasonOverrides = Partial<Pick<ReasonDetail, 'message' | 'http_status' | 'context'>>

export function reason(code: ReasonCode, overrides?: ReasonOverrides): ReasonDetail {
  const base = REASONS[code]
  const context = { ...(base.context || {}), ...(overrides?.context || {}) }
  return {
    ...base,
    message: overrides?.message ?? base.message,
    http_status: overrides?.http_status ?? base.http_status,
    context: Object.keys(context).length ? context : undefined,
  }
}

/** Build and throw a ReasonedRejection in one step. */
export function reject(code: ReasonCode, overrides?: ReasonOverrides): never {
  throw new ReasonedRejection(reason(code, overrides))
}
