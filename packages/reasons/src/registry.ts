/**
 * Reasons Registry
 * Centralizes all machine-parsable rejection codes for the ledger.
 */
import { REASONS as DTO_REASONS, ReasonCode, ReasonDetail } from '@surety/dto'

export const REASONS: Record<ReasonCode, ReasonDetail> = DTO_REASONS

export function getReason(code: ReasonCode): ReasonDetail { return DTO_REASONS[code] }

export type { ReasonDetail }
