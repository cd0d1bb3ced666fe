import { parseEther, isAddress, getAddress } from 'ethers'
import { AirlineState, FlightStatusCode, PolicyResolution, Role } from '@surety/dto'
import { reject, isReasonedRejection } from '@surety/reasons'
import { Sequencer } from './services/Sequencer'
import { OperationalGate } from './services/OperationalGate'
import { AccessControl } from './services/AccessControl'
import { AirlineRegistry } from './services/AirlineRegistry'
import { GovernanceEngine } from './services/GovernanceEngine'
import { InsuranceLedger } from './services/InsuranceLedger'
import { PayoutLedger, PayoutReceipt } from './services/PayoutLedger'
import { FlightRegistry } from './services/FlightRegistry'
import { InMemorySettlement, SettlementPort } from './services/Settlement'
import { LedgerSnapshot, MemorySnapshotStore, SnapshotStore } from './store/SnapshotStore'
import { toAddress } from './utils/address'
import { isFlightKey } from './utils/flightKey'
import { logOperation, logAirlineTransition, logResolution, logPayout, getLogger } from './utils/logger'
import * as metrics from './utils/metrics'
import { appendRejection } from './utils/rejectionAudit'
import type { Address, Airline, AirlineTransition, Flight, FlightKey, InsurancePolicy, ResolutionSummary } from './types'

export type LedgerOptions = {
  authority: string
  /** Admitted as Registered when the ledger starts without persisted state. */
  firstAirline?: { address: string; name: string }
  fundingThreshold?: bigint
  insuranceCap?: bigint
  bootstrapLimit?: number
  settlement?: SettlementPort
  store?: SnapshotStore
  /** Seconds since epoch; used to stamp flight status updates. */
  clock?: () => number
}

/** Who is calling, as established by the gateway in front of the ledger. */
export type CallContext = {
  caller?: string
  corr_id?: string
}

type Tx = {
  /** Persist the current state mid-operation (used before irreversible side effects). */
  commit: () => Promise<void>
  /** Deferred until the operation has committed. */
  after: (fn: () => void) => void
  /**
   * Marks an irreversible side effect as done. From here the operation is committed:
   * the last checkpoint is its durable state and it is never rolled back.
   */
  seal: () => void
}

export type FlightStatusOutcome = {
  flight: Flight
  resolution: PolicyResolution.CREDITED | PolicyResolution.CLOSED
  summary: ResolutionSummary
}

export const DEFAULT_FUNDING_THRESHOLD = parseEther('10')
export const DEFAULT_INSURANCE_CAP = parseEther('1')

const STATUS_CODES = new Set<number>(
  Object.values(FlightStatusCode).filter((v): v is FlightStatusCode => typeof v === 'number')
)

/**
 * SuretyLedger
 * The boundary every caller goes through. Each mutating operation:
 *   1. waits for the single-writer sequencer
 *   2. checks the gate, then the caller's role, then its own preconditions
 *   3. mutates the component tables
 *   4. persists a snapshot; on any failure the pre-operation snapshot is restored
 * Reads are synchronous and ungated.
 */
export class SuretyLedger {
  private readonly sequencer = new Sequencer()
  private readonly gate: OperationalGate
  private readonly access: AccessControl
  private readonly registry = new AirlineRegistry()
  private readonly governance: GovernanceEngine
  private readonly insurance: InsuranceLedger
  private readonly payouts: PayoutLedger
  private readonly flights = new FlightRegistry()
  private readonly store: SnapshotStore
  private readonly clock: () => number

  constructor(opts: LedgerOptions, initial?: LedgerSnapshot) {
    const authority = toAddress(opts.authority, 'authority')
    this.gate = new OperationalGate(true)
    this.access = new AccessControl(authority)
    this.governance = new GovernanceEngine(this.registry, {
      fundingThreshold: opts.fundingThreshold ?? DEFAULT_FUNDING_THRESHOLD,
      bootstrapLimit: opts.bootstrapLimit ?? 4,
    })
    this.insurance = new InsuranceLedger(opts.insuranceCap ?? DEFAULT_INSURANCE_CAP)
    this.payouts = new PayoutLedger(opts.settlement ?? new InMemorySettlement())
    this.store = opts.store ?? new MemorySnapshotStore()
    this.clock = opts.clock ?? (() => Math.floor(Date.now() / 1000))

    if (initial) {
      if (initial.authority !== authority) {
        throw new Error(`Persisted authority ${initial.authority} does not match configured authority ${authority}`)
      }
      this.restore(initial)
    } else if (opts.firstAirline) {
      this.governance.registerAirline(toAddress(opts.firstAirline.address, 'firstAirline'), opts.firstAirline.name)
    }
    metrics.setOperational(this.gate.isOperational())
  }

  /** Build a ledger from whatever the store holds, or a fresh one if it is empty. */
  static async open(opts: LedgerOptions): Promise<SuretyLedger> {
    const store = opts.store ?? new MemorySnapshotStore()
    const persisted = await store.load()
    const ledger = new SuretyLedger({ ...opts, store }, persisted ?? undefined)
    if (!persisted) await store.save(ledger.snapshot())
    return ledger
  }

  // ---------------------------------------------------------------- gate & access

  isOperational(): boolean {
    return this.gate.isOperational()
  }

  setOperatingStatus(ctx: CallContext, mode: boolean): Promise<boolean> {
    return this.execute('setOperatingStatus', ctx, Role.AUTHORITY, { gated: false }, (tx) => {
      this.gate.setOperatingStatus(mode)
      tx.after(() => metrics.setOperational(mode))
      return mode
    })
  }

  authorizeCaller(ctx: CallContext, address: string): Promise<Address> {
    return this.execute('authorizeCaller', ctx, Role.AUTHORITY, { gated: true }, () => {
      const a = toAddress(address)
      this.access.authorizeCaller(a)
      return a
    })
  }

  deauthorizeCaller(ctx: CallContext, address: string): Promise<Address> {
    return this.execute('deauthorizeCaller', ctx, Role.AUTHORITY, { gated: true }, () => {
      const a = toAddress(address)
      this.access.deauthorizeCaller(a)
      return a
    })
  }

  isAuthorizedCaller(address: string): boolean {
    return this.access.isAuthorizedCaller(toAddress(address))
  }

  get authority(): Address {
    return this.access.authority
  }

  // ---------------------------------------------------------------- governance

  registerAirline(ctx: CallContext, airline: string, name: string): Promise<Airline> {
    return this.execute('registerAirline', ctx, Role.AUTHORIZED_CALLER, { gated: true }, (tx) => {
      const res = this.governance.registerAirline(toAddress(airline, 'airline'), name)
      this.trackTransitions(tx, ctx, res.transitions)
      return copyAirline(res.airline)
    })
  }

  vote(ctx: CallContext, voter: string, candidate: string): Promise<Airline> {
    return this.execute('vote', ctx, Role.AUTHORIZED_CALLER, { gated: true }, (tx) => {
      const res = this.governance.vote(toAddress(voter, 'voter'), toAddress(candidate, 'candidate'))
      this.trackTransitions(tx, ctx, res.transitions)
      return copyAirline(res.airline)
    })
  }

  fund(ctx: CallContext, airline: string, amount: bigint): Promise<{ airline: Airline; total: bigint }> {
    return this.execute('fund', ctx, Role.ANY, { gated: true }, (tx) => {
      const res = this.governance.fund(toAddress(airline, 'airline'), amount)
      this.trackTransitions(tx, ctx, res.transitions)
      return { airline: copyAirline(res.airline), total: res.total }
    })
  }

  getAirline(address: string): Airline | null {
    const a = this.registry.get(toAddress(address))
    return a ? copyAirline(a) : null
  }

  /** Registered or Paid. */
  isAirline(address: string): boolean {
    const a = this.registry.get(toAddress(address))
    return a !== null && a.state !== AirlineState.APPLIED
  }

  getFunding(address: string): bigint {
    return this.registry.fundingOf(toAddress(address))
  }

  listAirlines(): Airline[] {
    return this.registry.list().map(copyAirline)
  }

  getRoster(): Address[] {
    return this.registry.getRoster()
  }

  // ---------------------------------------------------------------- insurance

  buy(ctx: CallContext, passenger: string, key: FlightKey, value: bigint): Promise<InsurancePolicy> {
    return this.execute('buy', ctx, Role.ANY, { gated: true }, () => {
      const p = toAddress(passenger, 'passenger')
      assertFlightKey(key)
      return { ...this.insurance.buy(p, key, value) }
    })
  }

  creditInsurees(ctx: CallContext, key: FlightKey): Promise<ResolutionSummary> {
    return this.execute('creditInsurees', ctx, Role.AUTHORIZED_CALLER, { gated: true }, (tx) => {
      assertFlightKey(key)
      return this.credit(tx, ctx, key)
    })
  }

  closeInsurees(ctx: CallContext, key: FlightKey): Promise<ResolutionSummary> {
    return this.execute('closeInsurees', ctx, Role.AUTHORIZED_CALLER, { gated: true }, (tx) => {
      assertFlightKey(key)
      return this.close(tx, ctx, key)
    })
  }

  getPolicies(key: FlightKey): InsurancePolicy[] {
    return this.insurance.getPolicies(key)
  }

  // ---------------------------------------------------------------- payouts

  pay(ctx: CallContext, beneficiary: string): Promise<PayoutReceipt> {
    return this.execute('pay', ctx, Role.AUTHORIZED_CALLER, { gated: true }, async (tx) => {
      const receipt = await this.payouts.pay(toAddress(beneficiary, 'beneficiary'), tx.commit)
      if (receipt.amount > 0n) {
        // funds have moved; the checkpoint already holds the cleared balance
        tx.seal()
        tx.after(() => {
          logPayout({ beneficiary: receipt.beneficiary, amount_wei: receipt.amount.toString(), reference: receipt.reference, corr_id: ctx.corr_id })
          metrics.addPayout(receipt.amount)
        })
      }
      return receipt
    })
  }

  getBalance(beneficiary: string): bigint {
    return this.payouts.balanceOf(toAddress(beneficiary, 'beneficiary'))
  }

  // ---------------------------------------------------------------- flights

  registerFlight(ctx: CallContext, airline: string, flight: string, timestamp: number): Promise<Flight> {
    return this.execute('registerFlight', ctx, Role.AUTHORIZED_CALLER, { gated: true }, () => {
      const a = toAddress(airline, 'airline')
      const record = this.registry.get(a)
      if (!record || record.state !== AirlineState.PAID) {
        reject('NOT_ELIGIBLE_AIRLINE', { context: { airline: a, state: record?.state ?? 'UNKNOWN' } })
      }
      if (!flight || !Number.isSafeInteger(timestamp) || timestamp < 0) {
        reject('VALIDATION_SCHEMA_FAIL', { message: 'flight and a non-negative integer timestamp are required' })
      }
      return this.flights.register(a, flight, timestamp).flight
    })
  }

  /** Oracle callback: LateAirline credits the flight's insurees, any other known status closes them. */
  processFlightStatus(ctx: CallContext, key: FlightKey, statusCode: number): Promise<FlightStatusOutcome> {
    return this.execute<FlightStatusOutcome>('processFlightStatus', ctx, Role.AUTHORIZED_CALLER, { gated: true }, (tx) => {
      assertFlightKey(key)
      if (!STATUS_CODES.has(statusCode)) {
        reject('VALIDATION_SCHEMA_FAIL', { message: 'unsupported flight status code', context: { statusCode } })
      }
      if (!this.flights.get(key)) reject('FLIGHT_NOT_FOUND', { context: { flightKey: key } })
      if (statusCode === FlightStatusCode.UNKNOWN) reject('FLIGHT_STATUS_UNKNOWN', { context: { flightKey: key } })

      const flight = this.flights.recordStatus(key, statusCode, this.clock())
      if (!flight) return reject('FLIGHT_NOT_FOUND', { context: { flightKey: key } })
      if (statusCode === FlightStatusCode.LATE_AIRLINE) {
        return { flight, resolution: PolicyResolution.CREDITED, summary: this.credit(tx, ctx, key) }
      }
      return { flight, resolution: PolicyResolution.CLOSED, summary: this.close(tx, ctx, key) }
    })
  }

  getFlight(key: FlightKey): Flight | null {
    return this.flights.get(key)
  }

  // ---------------------------------------------------------------- persistence

  snapshot(): LedgerSnapshot {
    const tables = this.registry.exportTables()
    return {
      version: 1,
      operational: this.gate.isOperational(),
      authority: this.access.authority,
      authorizedCallers: this.access.listAuthorizedCallers(),
      airlines: tables.airlines,
      funding: tables.funding,
      roster: tables.roster,
      policies: this.insurance.exportTable(),
      flights: this.flights.exportTable(),
      balances: this.payouts.exportTable(),
    }
  }

  private restore(s: LedgerSnapshot) {
    this.gate.setOperatingStatus(s.operational)
    for (const a of this.access.listAuthorizedCallers()) this.access.deauthorizeCaller(a)
    for (const a of s.authorizedCallers) this.access.authorizeCaller(a)
    this.registry.importTables({ airlines: s.airlines, funding: s.funding, roster: s.roster })
    this.insurance.importTable(s.policies)
    this.flights.importTable(s.flights)
    this.payouts.importTable(s.balances)
  }

  private async persist() {
    try {
      await this.store.save(this.snapshot())
    } catch (e) {
      reject('PERSISTENCE_FAILED', { context: { detail: e instanceof Error ? e.message : String(e) } })
    }
  }

  // ---------------------------------------------------------------- internals

  private credit(tx: Tx, ctx: CallContext, key: FlightKey): ResolutionSummary {
    const res = this.insurance.creditInsurees(key)
    for (const c of res.credits) this.payouts.credit(c.passenger, c.amount)
    const summary = { flightKey: res.flightKey, affected: res.affected, totalCredited: res.totalCredited }
    this.trackResolution(tx, ctx, PolicyResolution.CREDITED, summary)
    return summary
  }

  private close(tx: Tx, ctx: CallContext, key: FlightKey): ResolutionSummary {
    const summary = this.insurance.closeInsurees(key)
    this.trackResolution(tx, ctx, PolicyResolution.CLOSED, summary)
    return summary
  }

  private trackTransitions(tx: Tx, ctx: CallContext, transitions: AirlineTransition[]) {
    tx.after(() => {
      for (const t of transitions) {
        logAirlineTransition({ airline: t.airline, from: t.from, to: t.to, corr_id: ctx.corr_id })
        metrics.countTransition(t.from ?? 'NONE', t.to)
      }
    })
  }

  private trackResolution(tx: Tx, ctx: CallContext, resolution: PolicyResolution.CREDITED | PolicyResolution.CLOSED, summary: ResolutionSummary) {
    tx.after(() => {
      logResolution({ flightKey: summary.flightKey, resolution, affected: summary.affected, total_wei: summary.totalCredited.toString(), corr_id: ctx.corr_id })
      metrics.countResolution(resolution, summary.affected)
    })
  }

  private execute<T>(
    operation: string,
    ctx: CallContext,
    role: Role,
    opts: { gated: boolean },
    body: (tx: Tx) => Promise<T> | T
  ): Promise<T> {
    return this.sequencer.run(async () => {
      const before = this.snapshot()
      const effects: Array<() => void> = []
      let checkpointed = false
      let sealed = false
      const tx: Tx = {
        commit: async () => {
          await this.persist()
          checkpointed = true
        },
        after: (fn) => effects.push(fn),
        seal: () => {
          sealed = true
        },
      }
      const caller = parseCaller(ctx.caller)

      try {
        if (opts.gated) this.gate.assertOperational(operation)
        this.access.requireRole(caller, role)
        const result = await body(tx)
        if (!sealed) await this.persist()
        logOperation({ operation, caller, outcome: 'ok', corr_id: ctx.corr_id })
        metrics.countOperation(operation, 'ok')
        for (const fn of effects) fn()
        return result
      } catch (e) {
        if (sealed) {
          // committed side effect; keep the post-transfer state
          await this.recordFailure(operation, ctx, caller, e)
          throw e
        }
        this.restore(before)
        if (checkpointed) {
          try {
            await this.store.save(before)
          } catch (err) {
            getLogger().error({ event: 'ledger.rollback_persist_failed', operation, corr_id: ctx.corr_id, err: err instanceof Error ? err.message : String(err) })
          }
        }
        await this.recordFailure(operation, ctx, caller, e)
        throw e
      }
    })
  }

  private async recordFailure(operation: string, ctx: CallContext, caller: Address | undefined, e: unknown) {
    if (isReasonedRejection(e)) {
      logOperation({ operation, caller, outcome: 'rejected', reason_code: e.reason.code, corr_id: ctx.corr_id, context: e.reason.context })
      metrics.countOperation(operation, 'rejected')
      metrics.countRejection(operation, e.reason.code)
      await appendRejection({
        ts: new Date().toISOString(),
        corr_id: ctx.corr_id,
        operation,
        caller,
        reason: { code: e.reason.code, category: e.reason.category, http_status: e.reason.http_status, message: e.reason.message },
        context: e.reason.context,
      })
      return
    }
    logOperation({ operation, caller, outcome: 'failed', corr_id: ctx.corr_id, context: { err: e instanceof Error ? e.message : String(e) } })
    metrics.countOperation(operation, 'failed')
  }
}

// A malformed caller identity is treated as anonymous; role checks then decide.
function parseCaller(caller: string | undefined): Address | undefined {
  if (!caller || !isAddress(caller)) return undefined
  return getAddress(caller)
}

function assertFlightKey(key: string) {
  if (!isFlightKey(key)) {
    reject('VALIDATION_SCHEMA_FAIL', { message: 'flightKey must be a 32-byte hex string', context: { field: 'flightKey' } })
  }
}

function copyAirline(a: Airline): Airline {
  return { ...a, approvals: [...a.approvals] }
}

export default SuretyLedger
