import { PolicyStatus, PolicyResolution } from '@surety/dto'
import { reject } from '@surety/reasons'
import { insurancePayout, sumWei, withinPolicyCap } from '@surety/math'
import type { Address, FlightKey, InsurancePolicy, ResolutionSummary } from '../types'

export type Credit = { passenger: Address; amount: bigint }

/**
 * InsuranceLedger
 * Per-flight ordered policy sequences. A policy is Active until it is credited or closed,
 * and it is resolved at most once; re-resolving a flight touches only still-Active policies.
 * Resolution is planned in full before anything is written, so a flight resolves all-or-nothing.
 */
export class InsuranceLedger {
  private policies: Map<FlightKey, InsurancePolicy[]> = new Map()

  constructor(private readonly cap: bigint) {}

  buy(passenger: Address, key: FlightKey, value: bigint): InsurancePolicy {
    if (!withinPolicyCap(value, this.cap)) {
      reject('INVALID_AMOUNT', { context: { value: value.toString(), cap: this.cap.toString() } })
    }
    const policy: InsurancePolicy = { passenger, value, status: PolicyStatus.ACTIVE, resolution: PolicyResolution.NONE }
    const seq = this.policies.get(key) ?? []
    seq.push(policy)
    this.policies.set(key, seq)
    return policy
  }

  /**
   * Close every Active policy under `key` and return the credits owed.
   * The caller applies the credits to the payout ledger inside the same serialized step.
   */
  creditInsurees(key: FlightKey): ResolutionSummary & { credits: Credit[] } {
    const active = this.activePolicies(key)
    const credits = active.map((p) => ({ passenger: p.passenger, amount: insurancePayout(p.value) }))
    for (const p of active) {
      p.status = PolicyStatus.CLOSED
      p.resolution = PolicyResolution.CREDITED
    }
    const totalCredited = sumWei(credits.map((c) => c.amount))
    return { flightKey: key, affected: active.length, totalCredited, credits }
  }

  /** Close every policy under `key` without payout. Already-closed policies keep their resolution. */
  closeInsurees(key: FlightKey): ResolutionSummary {
    const active = this.activePolicies(key)
    for (const p of active) {
      p.status = PolicyStatus.CLOSED
      p.resolution = PolicyResolution.CLOSED
    }
    return { flightKey: key, affected: active.length, totalCredited: 0n }
  }

  getPolicies(key: FlightKey): InsurancePolicy[] {
    return (this.policies.get(key) ?? []).map((p) => ({ ...p }))
  }

  private activePolicies(key: FlightKey): InsurancePolicy[] {
    return (this.policies.get(key) ?? []).filter((p) => p.status === PolicyStatus.ACTIVE)
  }

  // persistence hooks
  exportTable(): Array<[FlightKey, InsurancePolicy[]]> {
    return [...this.policies.entries()].map(([k, seq]) => [k, seq.map((p) => ({ ...p }))])
  }

  importTable(entries: Array<[FlightKey, InsurancePolicy[]]>) {
    this.policies = new Map(entries.map(([k, seq]) => [k, seq.map((p) => ({ ...p }))]))
  }
}

export default InsuranceLedger
