import { ReasonCode, ReasonCategory, ReasonDetail } from './enums'

// Centralized mapping from ReasonCode -> ReasonDetail (stable code, category, http_status, message)
export const REASONS: Record<ReasonCode, ReasonDetail> = {
  // CLIENT
  CLIENT_BAD_REQUEST: { code: 'CLIENT_BAD_REQUEST', category: ReasonCategory.CLIENT, http_status: 400, message: 'Bad request' },
  CLIENT_NOT_FOUND: { code: 'CLIENT_NOT_FOUND', category: ReasonCategory.CLIENT, http_status: 404, message: 'Not found' },
  VALIDATION_SCHEMA_FAIL: { code: 'VALIDATION_SCHEMA_FAIL', category: ReasonCategory.CLIENT, http_status: 400, message: 'Schema validation failed' },

  // GATE
  NOT_OPERATIONAL: { code: 'NOT_OPERATIONAL', category: ReasonCategory.GATE, http_status: 503, message: 'Ledger is not operational' },

  // AUTH
  NOT_AUTHORIZED: { code: 'NOT_AUTHORIZED', category: ReasonCategory.AUTH, http_status: 403, message: 'Caller is not authorized' },

  // GOVERNANCE
  NOT_ELIGIBLE_VOTER: { code: 'NOT_ELIGIBLE_VOTER', category: ReasonCategory.GOVERNANCE, http_status: 403, message: 'Voter must be a paid airline' },
  NOT_ELIGIBLE_AIRLINE: { code: 'NOT_ELIGIBLE_AIRLINE', category: ReasonCategory.GOVERNANCE, http_status: 403, message: 'Airline must be a paid airline' },

  // POLICY
  INVALID_AMOUNT: { code: 'INVALID_AMOUNT', category: ReasonCategory.POLICY, http_status: 400, message: 'Amount outside allowed bounds' },
  FLIGHT_NOT_FOUND: { code: 'FLIGHT_NOT_FOUND', category: ReasonCategory.POLICY, http_status: 404, message: 'Flight not registered' },
  FLIGHT_STATUS_UNKNOWN: { code: 'FLIGHT_STATUS_UNKNOWN', category: ReasonCategory.POLICY, http_status: 409, message: 'Flight status unknown; nothing to resolve' },

  // SETTLEMENT
  SETTLEMENT_FAILED: { code: 'SETTLEMENT_FAILED', category: ReasonCategory.SETTLEMENT, http_status: 502, message: 'Settlement transfer failed' },

  // INTERNAL
  PERSISTENCE_FAILED: { code: 'PERSISTENCE_FAILED', category: ReasonCategory.INTERNAL, http_status: 500, message: 'Ledger state could not be persisted' },
  INTERNAL_ERROR: { code: 'INTERNAL_ERROR', category: ReasonCategory.INTERNAL, http_status: 500, message: 'Internal server error' },
}

export function getReason(code: ReasonCode): ReasonDetail {
  return REASONS[code]
}

export function isReasonCode(value: string): value is ReasonCode {
  return Object.prototype.hasOwnProperty.call(REASONS, value)
}
