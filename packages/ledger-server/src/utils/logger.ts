import pino from 'pino'

type OperationPayload = {
  operation: string
  caller?: string
  outcome: 'ok' | 'rejected' | 'failed'
  reason_code?: string
  corr_id?: string
  context?: Record<string, unknown>
}

type AirlineTransitionPayload = {
  airline: string
  from: string | null
  to: string
  corr_id?: string
}

type ResolutionPayload = {
  flightKey: string
  resolution: 'CREDITED' | 'CLOSED'
  affected: number
  total_wei: string
  corr_id?: string
}

type PayoutPayload = {
  beneficiary: string
  amount_wei: string
  reference: string | null
  corr_id?: string
}

type HttpPayload = {
  path: string
  method: string
  status: number
  corr_id?: string
  latency_ms?: number
}

// create default logger; tests can replace via setLogger
let logger: pino.Logger = pino({ level: process.env.LOG_LEVEL || 'info' })

export function setLogger(l: pino.Logger) {
  logger = l
}

export function getLogger(): pino.Logger {
  return logger
}

export function logOperation(payload: OperationPayload): void {
  const base = {
    event: 'ledger.operation',
    operation: payload.operation,
    caller: payload.caller,
    outcome: payload.outcome,
    reason_code: payload.reason_code,
    corr_id: payload.corr_id,
    ...payload.context,
  }
  if (payload.outcome === 'ok') logger.info(base)
  else if (payload.outcome === 'rejected') logger.warn(base)
  else logger.error(base)
}

export function logAirlineTransition(payload: AirlineTransitionPayload): void {
  logger.info({ event: 'airline.transition', airline: payload.airline, from: payload.from, to: payload.to, corr_id: payload.corr_id })
}

export function logResolution(payload: ResolutionPayload): void {
  logger.info({
    event: 'policy.resolution',
    flightKey: payload.flightKey,
    resolution: payload.resolution,
    affected: payload.affected,
    total_wei: payload.total_wei,
    corr_id: payload.corr_id,
  })
}

export function logPayout(payload: PayoutPayload): void {
  logger.info({ event: 'payout.transfer', beneficiary: payload.beneficiary, amount_wei: payload.amount_wei, reference: payload.reference, corr_id: payload.corr_id })
}

export function logHttp(payload: HttpPayload): void {
  const base = {
    event: 'http.request',
    path: payload.path,
    method: payload.method,
    status: payload.status,
    corr_id: payload.corr_id,
    latency_ms: payload.latency_ms
  }
  if (payload.status >= 500) logger.error(base)
  else logger.info(base)
}

export default logger
