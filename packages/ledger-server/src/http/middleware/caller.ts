/**
 * caller middleware
 *
 * The access-control gateway in front of the ledger authenticates the caller
 * and forwards its identity in `x-caller`. Role checks happen in the ledger.
 */
import { Request, Response, NextFunction } from 'express'

export default function caller(req: Request, _res: Response, next: NextFunction) {
  const header = req.header('x-caller')
  req.caller = header && header.length ? header : undefined
  next()
}
