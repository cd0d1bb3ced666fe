import { reject } from '@surety/reasons'

/**
 * OperationalGate
 * Process-wide on/off switch. Every mutator except the one that flips it calls `assertOperational`.
 */
export class OperationalGate {
  private operational: boolean

  constructor(initial = true) {
    this.operational = initial
  }

  isOperational(): boolean {
    return this.operational
  }

  /** Always permitted, whatever the current value, so a halted ledger can be re-enabled. */
  setOperatingStatus(mode: boolean): void {
    this.operational = mode
  }

  assertOperational(operation: string): void {
    if (!this.operational) {
      reject('NOT_OPERATIONAL', { context: { operation } })
    }
  }
}

export default OperationalGate
