/**
 * HTTP router for ledger-server
 * Exposes `createApp(ledger)` so tests can mount the app without starting a server.
 */
import express, { NextFunction, Request, Response } from 'express'
import { getReason, ErrorEnvelope } from '@surety/dto'
import { ReasonedRejection, reason } from '@surety/reasons'
import corr from './middleware/corr'
import caller from './middleware/caller'
import requestLog from './middleware/requestLog'
import { sendJson, sendError } from './respond'
import { metricsHandler } from '../utils/metrics'
import { flightKey } from '../utils/flightKey'
import { toAddress } from '../utils/address'
import { SuretyLedger, CallContext } from '../SuretyLedger'
import {
  parseBody,
  OperationalSchema,
  AddressSchema,
  RegisterAirlineSchema,
  VoteSchema,
  FundSchema,
  RegisterFlightSchema,
  BuySchema,
  FlightStatusSchema,
} from '../validators/requests'

type Handler = (req: Request, ctx: CallContext) => Promise<unknown> | unknown

function ctxOf(req: Request): CallContext {
  return { caller: req.caller, corr_id: req.corr_id }
}

/** Wrap a handler: 200 with its JSON result, or the error envelope. */
function route(operation: string, fn: Handler, status = 200) {
  return async (req: Request, res: Response) => {
    try {
      const body = await fn(req, ctxOf(req))
      sendJson(res, status, body)
    } catch (e) {
      sendError(req, res, operation, e)
    }
  }
}

export function createApp(ledger: SuretyLedger) {
  const app = express()
  app.use(corr)
  app.use(express.json({ limit: '16kb' }))
  app.use(caller)
  app.use(requestLog)

  app.get('/health', (_req, res) => {
    sendJson(res, 200, { ok: true, operational: ledger.isOperational() })
  })
  app.get('/metrics', metricsHandler)

  const v1 = express.Router()

  // gate & access
  v1.get('/operational', route('isOperational', () => ({ operational: ledger.isOperational() })))
  v1.put('/operational', route('setOperatingStatus', async (req, ctx) => {
    const { operational } = parseBody(OperationalSchema, req.body)
    return { operational: await ledger.setOperatingStatus(ctx, operational) }
  }))
  v1.post('/callers', route('authorizeCaller', async (req, ctx) => {
    const { address } = parseBody(AddressSchema, req.body)
    return { address: await ledger.authorizeCaller(ctx, address), authorized: true }
  }, 201))
  v1.delete('/callers/:address', route('deauthorizeCaller', async (req, ctx) => {
    return { address: await ledger.deauthorizeCaller(ctx, req.params.address), authorized: false }
  }))

  // airlines
  v1.get('/airlines', route('listAirlines', () => ({
    airlines: ledger.listAirlines().map((a) => ({ ...a, funding: ledger.getFunding(a.address) })),
    roster: ledger.getRoster(),
  })))
  v1.post('/airlines', route('registerAirline', async (req, ctx) => {
    const { airline, name } = parseBody(RegisterAirlineSchema, req.body)
    return ledger.registerAirline(ctx, airline, name)
  }))
  v1.get('/airlines/:address', route('getAirline', (req) => {
    const airline = ledger.getAirline(req.params.address)
    if (!airline) throw notFound('airline')
    return { ...airline, funding: ledger.getFunding(airline.address) }
  }))
  v1.post('/airlines/:address/votes', route('vote', async (req, ctx) => {
    const { voter } = parseBody(VoteSchema, req.body)
    return ledger.vote(ctx, voter, req.params.address)
  }))
  v1.post('/airlines/:address/funding', route('fund', async (req, ctx) => {
    const { amount } = parseBody(FundSchema, req.body)
    return ledger.fund(ctx, req.params.address, amount)
  }))

  // flights & policies
  v1.post('/flights', route('registerFlight', async (req, ctx) => {
    const { airline, flight, timestamp } = parseBody(RegisterFlightSchema, req.body)
    return ledger.registerFlight(ctx, airline, flight, timestamp)
  }, 201))
  v1.get('/flight-keys', route('flightKey', (req) => {
    const q = parseBody(RegisterFlightSchema, {
      airline: req.query.airline,
      flight: req.query.flight,
      timestamp: Number(req.query.timestamp),
    })
    return { flightKey: flightKey(toAddress(q.airline, 'airline'), q.flight, q.timestamp) }
  }))
  v1.get('/flights/:flightKey', route('getFlight', (req) => {
    const flight = ledger.getFlight(req.params.flightKey)
    if (!flight) throw notFound('flight')
    return flight
  }))
  v1.get('/flights/:flightKey/policies', route('getPolicies', (req) => ({
    flightKey: req.params.flightKey,
    policies: ledger.getPolicies(req.params.flightKey),
  })))
  v1.post('/flights/:flightKey/policies', route('buy', async (req, ctx) => {
    const { passenger, value } = parseBody(BuySchema, req.body)
    return ledger.buy(ctx, passenger, req.params.flightKey, value)
  }, 201))
  v1.post('/flights/:flightKey/credit', route('creditInsurees', (req, ctx) => ledger.creditInsurees(ctx, req.params.flightKey)))
  v1.post('/flights/:flightKey/close', route('closeInsurees', (req, ctx) => ledger.closeInsurees(ctx, req.params.flightKey)))
  v1.post('/flights/:flightKey/status', route('processFlightStatus', async (req, ctx) => {
    const { statusCode } = parseBody(FlightStatusSchema, req.body)
    return ledger.processFlightStatus(ctx, req.params.flightKey, statusCode)
  }))

  // payouts
  v1.get('/payouts/:address', route('getBalance', (req) => {
    const beneficiary = toAddress(req.params.address, 'beneficiary')
    return { beneficiary, balance: ledger.getBalance(beneficiary) }
  }))
  v1.post('/payouts/:address/withdrawals', route('pay', (req, ctx) => ledger.pay(ctx, req.params.address)))

  app.use('/v1', v1)

  app.use((req, res) => {
    sendError(req, res, undefined, notFound('route'))
  })

  // malformed JSON bodies and anything else express raises before a handler runs
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof SyntaxError) {
      const detail = getReason('CLIENT_BAD_REQUEST')
      const envelope: ErrorEnvelope = { corr_id: req.corr_id ?? 'corr_unknown', reason: detail, ts: new Date().toISOString() }
      sendJson(res, detail.http_status, envelope)
      return
    }
    sendError(req, res, undefined, err)
  })

  return app
}

function notFound(what: string) {
  return new ReasonedRejection(reason('CLIENT_NOT_FOUND', { message: `${what} not found`, context: { what } }))
}

export default createApp
