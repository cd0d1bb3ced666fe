import { Request, Response, NextFunction } from 'express'
import { logHttp } from '../../utils/logger'

/** Emits one http.request line after the response is sent. */
export default function requestLog(req: Request, res: Response, next: NextFunction) {
  const start = Date.now()
  res.on('finish', () => {
    logHttp({ path: req.path, method: req.method, status: res.statusCode, corr_id: req.corr_id, latency_ms: Date.now() - start })
  })
  next()
}
