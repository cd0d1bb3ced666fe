import axios, { AxiosInstance, Method } from 'axios'
import { isReasonCode } from '@surety/dto'
import type { ErrorEnvelope, ReasonCode } from '@surety/dto'
import { withRetry } from './retry'
import type {
  AirlineView,
  AirlineWithFunding,
  FlightStatusOutcome,
  FlightStatusOutcomeView,
  FlightView,
  FundResultView,
  PayoutReceipt,
  PayoutReceiptView,
  Policy,
  PolicyView,
  ResolutionSummary,
  ResolutionSummaryView,
} from './types'

export interface SuretyClientErrorDetails {
  statusCode: number
  message: string
  envelope?: ErrorEnvelope
}

export class SuretyClientError extends Error {
  public readonly statusCode: number
  public readonly envelope?: ErrorEnvelope
  constructor(details: SuretyClientErrorDetails) {
    super(details.message)
    this.name = 'SuretyClientError'
    this.statusCode = details.statusCode
    this.envelope = details.envelope
  }

  get code(): ReasonCode | undefined {
    return this.envelope?.reason.code
  }
}

export type SuretyClientOptions = {
  timeoutMs?: number
  /** Sent as x-caller; the gateway in front of the ledger vouches for it. */
  caller?: string
  /** Extra attempts for retryable reasons (see shouldRetry). */
  retries?: number
  sleep?: (ms: number) => Promise<void>
}

export class SuretyClient {
  private readonly client: AxiosInstance
  private readonly baseUrl: string
  private readonly opts: SuretyClientOptions

  constructor(baseUrl: string, opts: SuretyClientOptions = {}) {
    this.baseUrl = baseUrl.replace(/\/$/, '')
    this.opts = opts
    const headers: Record<string, string> = { 'Content-Type': 'application/json' }
    if (opts.caller) headers['x-caller'] = opts.caller
    this.client = axios.create({
      baseURL: this.baseUrl,
      timeout: opts.timeoutMs ?? 5000,
      headers,
    })
  }

  /** Same endpoint and settings, acting as another caller. */
  as(caller: string): SuretyClient {
    return new SuretyClient(this.baseUrl, { ...this.opts, caller })
  }

  // gate & access
  async isOperational(): Promise<boolean> {
    return (await this.request<{ operational: boolean }>('GET', '/v1/operational')).operational
  }

  async setOperatingStatus(operational: boolean): Promise<boolean> {
    return (await this.request<{ operational: boolean }>('PUT', '/v1/operational', { operational })).operational
  }

  async authorizeCaller(address: string): Promise<string> {
    return (await this.request<{ address: string }>('POST', '/v1/callers', { address })).address
  }

  async deauthorizeCaller(address: string): Promise<string> {
    return (await this.request<{ address: string }>('DELETE', `/v1/callers/${address}`)).address
  }

  // airlines
  async listAirlines(): Promise<{ airlines: Array<Omit<AirlineWithFunding, 'funding'> & { funding: bigint }>; roster: string[] }> {
    const res = await this.request<{ airlines: AirlineWithFunding[]; roster: string[] }>('GET', '/v1/airlines')
    return { airlines: res.airlines.map((a) => ({ ...a, funding: BigInt(a.funding) })), roster: res.roster }
  }

  /** null when the ledger has never seen the address. */
  async getAirline(address: string): Promise<(AirlineView & { funding: bigint }) | null> {
    try {
      const a = await this.request<AirlineWithFunding>('GET', `/v1/airlines/${address}`)
      return { ...a, funding: BigInt(a.funding) }
    } catch (e) {
      if (e instanceof SuretyClientError && e.code === 'CLIENT_NOT_FOUND') return null
      throw e
    }
  }

  registerAirline(airline: string, name: string): Promise<AirlineView> {
    return this.request<AirlineView>('POST', '/v1/airlines', { airline, name })
  }

  vote(voter: string, candidate: string): Promise<AirlineView> {
    return this.request<AirlineView>('POST', `/v1/airlines/${candidate}/votes`, { voter })
  }

  async fund(airline: string, amount: bigint): Promise<{ airline: AirlineView; total: bigint }> {
    const res = await this.request<FundResultView>('POST', `/v1/airlines/${airline}/funding`, { amount: amount.toString() })
    return { airline: res.airline, total: BigInt(res.total) }
  }

  // flights & policies
  registerFlight(airline: string, flight: string, timestamp: number): Promise<FlightView> {
    return this.request<FlightView>('POST', '/v1/flights', { airline, flight, timestamp })
  }

  async flightKey(airline: string, flight: string, timestamp: number): Promise<string> {
    const q = new URLSearchParams({ airline, flight, timestamp: String(timestamp) })
    return (await this.request<{ flightKey: string }>('GET', `/v1/flight-keys?${q.toString()}`)).flightKey
  }

  async getFlight(key: string): Promise<FlightView | null> {
    try {
      return await this.request<FlightView>('GET', `/v1/flights/${key}`)
    } catch (e) {
      if (e instanceof SuretyClientError && e.code === 'CLIENT_NOT_FOUND') return null
      throw e
    }
  }

  async getPolicies(key: string): Promise<Policy[]> {
    const res = await this.request<{ policies: PolicyView[] }>('GET', `/v1/flights/${key}/policies`)
    return res.policies.map(toPolicy)
  }

  async buy(passenger: string, key: string, value: bigint): Promise<Policy> {
    return toPolicy(await this.request<PolicyView>('POST', `/v1/flights/${key}/policies`, { passenger, value: value.toString() }))
  }

  async creditInsurees(key: string): Promise<ResolutionSummary> {
    return toSummary(await this.request<ResolutionSummaryView>('POST', `/v1/flights/${key}/credit`))
  }

  async closeInsurees(key: string): Promise<ResolutionSummary> {
    return toSummary(await this.request<ResolutionSummaryView>('POST', `/v1/flights/${key}/close`))
  }

  async processFlightStatus(key: string, statusCode: number): Promise<FlightStatusOutcome> {
    const res = await this.request<FlightStatusOutcomeView>('POST', `/v1/flights/${key}/status`, { statusCode })
    return { ...res, summary: toSummary(res.summary) }
  }

  // payouts
  async getBalance(beneficiary: string): Promise<bigint> {
    return BigInt((await this.request<{ balance: string }>('GET', `/v1/payouts/${beneficiary}`)).balance)
  }

  /** Never retried automatically: a failure reported after the transfer cannot be told apart from one before it. */
  async pay(beneficiary: string): Promise<PayoutReceipt> {
    const res = await this.request<PayoutReceiptView>('POST', `/v1/payouts/${beneficiary}/withdrawals`, undefined, 0)
    return { ...res, amount: BigInt(res.amount) }
  }

  private request<T>(method: Method, url: string, data?: unknown, retries = this.opts.retries ?? 0): Promise<T> {
    return withRetry(() => this.send<T>(method, url, data), codeOf, {
      retries,
      sleep: this.opts.sleep,
    })
  }

  private async send<T>(method: Method, url: string, data?: unknown): Promise<T> {
    try {
      const res = await this.client.request<T>({ method, url, data })
      return res.data
    } catch (err) {
      if (axios.isAxiosError(err)) {
        if (err.response) {
          // Server responded with an error status
          const envelope = isErrorEnvelope(err.response.data) ? err.response.data : undefined
          throw new SuretyClientError({
            statusCode: err.response.status,
            message: envelope?.reason.message ?? `Ledger error ${err.response.status}`,
            envelope,
          })
        }
        if (err.code === 'ECONNABORTED') {
          throw new SuretyClientError({ statusCode: 408, message: 'Ledger request timeout' })
        }
      }
      throw new SuretyClientError({ statusCode: 500, message: err instanceof Error ? err.message : 'Unknown ledger error' })
    }
  }
}

function codeOf(err: unknown): ReasonCode | undefined {
  return err instanceof SuretyClientError ? err.code : undefined
}

function isErrorEnvelope(data: unknown): data is ErrorEnvelope {
  if (typeof data !== 'object' || data === null) return false
  if (!('reason' in data) || !('corr_id' in data)) return false
  const reason = data.reason
  return (
    typeof reason === 'object' &&
    reason !== null &&
    'code' in reason &&
    typeof reason.code === 'string' &&
    isReasonCode(reason.code) &&
    'message' in reason &&
    typeof reason.message === 'string'
  )
}

function toPolicy(p: PolicyView): Policy {
  return { ...p, value: BigInt(p.value) }
}

function toSummary(s: ResolutionSummaryView): ResolutionSummary {
  return { ...s, totalCredited: BigInt(s.totalCredited) }
}
