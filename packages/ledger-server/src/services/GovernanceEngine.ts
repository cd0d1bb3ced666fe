import { AirlineState } from '@surety/dto'
import { reject } from '@surety/reasons'
import { admitsWithoutVote, meetsApprovalThreshold, meetsFundingThreshold } from '@surety/math'
import { AirlineRegistry } from './AirlineRegistry'
import type { Address, Airline, AirlineTransition } from '../types'

export type GovernanceOptions = {
  fundingThreshold: bigint
  bootstrapLimit: number
}

export type GovernanceResult = {
  airline: Airline
  transitions: AirlineTransition[]
}

// forward-only airline lifecycle
const ORDER: Record<AirlineState, number> = {
  [AirlineState.APPLIED]: 0,
  [AirlineState.REGISTERED]: 1,
  [AirlineState.PAID]: 2,
}

/**
 * GovernanceEngine
 * - admission: direct below the bootstrap limit, by vote above it
 * - voting: only Paid airlines vote; the parity threshold is checked after every vote
 * - funding: accumulates per airline and promotes Registered -> Paid at the threshold
 * State only ever moves forward; callers are expected to have checked gate and role already.
 */
export class GovernanceEngine {
  constructor(private readonly registry: AirlineRegistry, private readonly opts: GovernanceOptions) {}

  registerAirline(address: Address, name: string): GovernanceResult {
    const admitted = this.registry.admittedCount()
    const existing = this.registry.get(address)
    const airline = this.registry.ensure(address)
    const transitions: AirlineTransition[] = []
    if (!existing) transitions.push({ airline: address, from: null, to: AirlineState.APPLIED })

    airline.name = name
    if (airline.state === AirlineState.APPLIED && admitsWithoutVote(admitted, this.opts.bootstrapLimit)) {
      this.promote(airline, AirlineState.REGISTERED, transitions)
      this.applyFundingGate(airline, transitions)
    }
    return { airline, transitions }
  }

  vote(voter: Address, candidate: Address): GovernanceResult {
    const v = this.registry.get(voter)
    if (!v || v.state !== AirlineState.PAID) {
      reject('NOT_ELIGIBLE_VOTER', { context: { voter, state: v?.state ?? 'UNKNOWN' } })
    }

    const existing = this.registry.get(candidate)
    const airline = this.registry.ensure(candidate)
    const transitions: AirlineTransition[] = []
    if (!existing) transitions.push({ airline: candidate, from: null, to: AirlineState.APPLIED })

    // no dedup: a voter may endorse the same candidate more than once
    airline.approvals.push(voter)

    if (airline.state === AirlineState.APPLIED) {
      const n = airline.approvals.length
      const m = this.registry.admittedCount()
      if (meetsApprovalThreshold(n, m)) {
        this.promote(airline, AirlineState.REGISTERED, transitions)
        this.applyFundingGate(airline, transitions)
      }
    }
    return { airline, transitions }
  }

  fund(address: Address, amount: bigint): GovernanceResult & { total: bigint } {
    if (amount < 0n) {
      reject('INVALID_AMOUNT', { message: 'Funding amount must not be negative', context: { amount: amount.toString() } })
    }
    const existing = this.registry.get(address)
    const airline = this.registry.ensure(address)
    const transitions: AirlineTransition[] = []
    if (!existing) transitions.push({ airline: address, from: null, to: AirlineState.APPLIED })

    const total = this.registry.addFunding(address, amount)
    this.applyFundingGate(airline, transitions)
    return { airline, transitions, total }
  }

  /** Registered airlines whose funding has reached the threshold become Paid and join the roster. */
  private applyFundingGate(airline: Airline, transitions: AirlineTransition[]) {
    if (airline.state === AirlineState.APPLIED) return
    if (!meetsFundingThreshold(this.registry.fundingOf(airline.address), this.opts.fundingThreshold)) return
    if (airline.state === AirlineState.REGISTERED) this.promote(airline, AirlineState.PAID, transitions)
    this.registry.enroll(airline.address)
  }

  private promote(airline: Airline, to: AirlineState, transitions: AirlineTransition[]) {
    if (ORDER[to] <= ORDER[airline.state]) return
    transitions.push({ airline: airline.address, from: airline.state, to })
    airline.state = to
  }
}

export default GovernanceEngine
