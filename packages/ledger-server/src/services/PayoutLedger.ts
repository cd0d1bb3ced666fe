import { reject } from '@surety/reasons'
import type { SettlementPort } from './Settlement'
import type { Address } from '../types'

export type PayoutReceipt = {
  beneficiary: Address
  amount: bigint
  reference: string | null
}

/**
 * PayoutLedger
 * Pending balances owed to beneficiaries. Withdrawal clears the balance before the
 * settlement transfer is requested, so anything observing the ledger mid-transfer sees zero.
 * A failed transfer restores the balance and surfaces SETTLEMENT_FAILED.
 */
export class PayoutLedger {
  private balances: Map<Address, bigint> = new Map()

  constructor(private readonly settlement: SettlementPort) {}

  balanceOf(beneficiary: Address): bigint {
    return this.balances.get(beneficiary) ?? 0n
  }

  credit(beneficiary: Address, amount: bigint): bigint {
    const next = this.balanceOf(beneficiary) + amount
    this.balances.set(beneficiary, next)
    return next
  }

  /**
   * `checkpoint` runs after the balance is cleared and before the transfer is requested;
   * the facade uses it to persist the cleared balance.
   */
  async pay(beneficiary: Address, checkpoint?: () => Promise<void>): Promise<PayoutReceipt> {
    const amount = this.balanceOf(beneficiary)
    if (amount === 0n) return { beneficiary, amount, reference: null }

    this.balances.set(beneficiary, 0n)
    if (checkpoint) {
      try {
        await checkpoint()
      } catch (e) {
        this.balances.set(beneficiary, amount)
        throw e
      }
    }

    try {
      const { reference } = await this.settlement.transfer(beneficiary, amount)
      return { beneficiary, amount, reference }
    } catch (e) {
      this.balances.set(beneficiary, this.balanceOf(beneficiary) + amount)
      const detail = e instanceof Error ? e.message : String(e)
      return reject('SETTLEMENT_FAILED', { context: { beneficiary, amount: amount.toString(), detail } })
    }
  }

  // persistence hooks
  exportTable(): Array<[Address, bigint]> {
    return [...this.balances.entries()]
  }

  importTable(entries: Array<[Address, bigint]>) {
    this.balances = new Map(entries)
  }
}

export default PayoutLedger
