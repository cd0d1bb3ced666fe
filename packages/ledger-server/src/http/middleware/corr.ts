/**
 * corr middleware
 *
 * Enforces a stable correlation id for every request. If the incoming
 * request provides `x-corr-id` that value is used; otherwise a ULID-based
 * correlation id is generated. A request-scoped pino child logger carrying
 * the id is attached as `req.log`.
 */
import { Request, Response, NextFunction } from 'express'
import { ulid } from 'ulid'
import type { Logger } from 'pino'
import { getLogger } from '../../utils/logger'

declare global {
  namespace Express {
    interface Request {
      corr_id?: string
      caller?: string
      log?: Logger
    }
  }
}

export default function corr(req: Request, res: Response, next: NextFunction) {
  const header = req.header('x-corr-id') ?? ''
  const id = header.length ? header : `corr_${ulid()}`
  req.corr_id = id
  req.log = getLogger().child({ corr_id: id })
  res.setHeader('x-corr-id', id)
  next()
}
