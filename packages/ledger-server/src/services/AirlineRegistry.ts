/* The AirlineRegistry holds the consortium's membership tables:
   airline records (state, name, approvals), accumulated funding per airline,
   and the roster of airlines that reached Paid.
   It has no rules of its own; GovernanceEngine decides when records move. */

import { AirlineState } from '@surety/dto'
import type { Address, Airline } from '../types'

export class AirlineRegistry {
  private airlines: Map<Address, Airline> = new Map()
  private funding: Map<Address, bigint> = new Map()
  private roster: Address[] = []

  get(address: Address): Airline | null {
    return this.airlines.get(address) ?? null
  }

  /** Get-or-create: first reference yields an Applied airline with no name and no approvals. */
  ensure(address: Address): Airline {
    let airline = this.airlines.get(address)
    if (!airline) {
      airline = { address, name: '', state: AirlineState.APPLIED, approvals: [] }
      this.airlines.set(address, airline)
    }
    return airline
  }

  list(): Airline[] {
    return [...this.airlines.values()]
  }

  /** Airlines that are Registered or Paid. */
  admittedCount(): number {
    let n = 0
    for (const a of this.airlines.values()) {
      if (a.state !== AirlineState.APPLIED) n++
    }
    return n
  }

  fundingOf(address: Address): bigint {
    return this.funding.get(address) ?? 0n
  }

  addFunding(address: Address, amount: bigint): bigint {
    const total = this.fundingOf(address) + amount
    this.funding.set(address, total)
    return total
  }

  /** Adds to the paid roster once; repeated calls for the same airline are ignored. */
  enroll(address: Address): boolean {
    if (this.roster.includes(address)) return false
    this.roster.push(address)
    return true
  }

  getRoster(): Address[] {
    return [...this.roster]
  }

  // persistence hooks
  exportTables() {
    return {
      airlines: this.list().map((a) => ({ ...a, approvals: [...a.approvals] })),
      funding: [...this.funding.entries()],
      roster: [...this.roster],
    }
  }

  importTables(tables: { airlines: Airline[]; funding: Array<[Address, bigint]>; roster: Address[] }) {
    this.airlines = new Map(tables.airlines.map((a) => [a.address, { ...a, approvals: [...a.approvals] }]))
    this.funding = new Map(tables.funding)
    this.roster = [...tables.roster]
  }
}

export default AirlineRegistry
