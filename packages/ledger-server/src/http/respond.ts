import { Request, Response } from 'express'
import { ErrorEnvelope, getReason } from '@surety/dto'
import { isReasonedRejection } from '@surety/reasons'

function bigintReplacer(_key: string, value: unknown) {
  return typeof value === 'bigint' ? value.toString() : value
}

/** JSON response with bigints written as decimal strings. */
export function sendJson(res: Response, status: number, body: unknown) {
  res.status(status).type('application/json').send(JSON.stringify(body, bigintReplacer))
}

export function sendError(req: Request, res: Response, operation: string | undefined, e: unknown) {
  const corr_id = req.corr_id ?? 'corr_unknown'
  let reason = getReason('INTERNAL_ERROR')
  if (isReasonedRejection(e)) {
    reason = e.reason
  } else {
    req.log?.error({ event: 'http.unhandled_error', operation, err: e instanceof Error ? e.message : String(e) })
  }
  const envelope: ErrorEnvelope = { corr_id, operation, reason, ts: new Date().toISOString() }
  sendJson(res, reason.http_status, envelope)
}
