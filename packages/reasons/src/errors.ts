/**
 * ReasonedRejection Error
 * Wraps a ReasonDetail so every precondition failure in the ledger has one deterministic shape.
 * Rejections are raised before any state is touched; the ledger logs and audits them at the boundary.
 */
import { ReasonDetail } from '@surety/dto'

export class ReasonedRejection extends Error {
  public readonly reason: ReasonDetail

  constructor(reason: ReasonDetail, human?: string) {
    super(human ?? reason.message)
    this.name = 'ReasonedRejection'
    this.reason = reason
  }

  get code() {
    return this.reason.code
  }
}

export function isReasonedRejection(e: unknown): e is ReasonedRejection {
  return e instanceof ReasonedRejection
}
