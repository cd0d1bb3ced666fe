import type { AirlineState, FlightStatusCode, PolicyResolution, PolicyStatus } from '@surety/dto'

/*
 * Wire shapes returned by the ledger-server HTTP surface.
 * Wei amounts travel as decimal strings; the client converts them to bigint.
 */

export type Wei = string

export type AirlineView = {
  address: string
  name: string
  state: AirlineState
  approvals: string[]
}

export type AirlineWithFunding = AirlineView & { funding: Wei }

export type FundResultView = { airline: AirlineView; total: Wei }

export type PolicyView = {
  passenger: string
  value: Wei
  status: PolicyStatus
  resolution: PolicyResolution
}

export type FlightView = {
  key: string
  airline: string
  flight: string
  timestamp: number
  statusCode: FlightStatusCode
  updatedTimestamp: number
}

export type ResolutionSummaryView = { flightKey: string; affected: number; totalCredited: Wei }

export type FlightStatusOutcomeView = {
  flight: FlightView
  resolution: PolicyResolution.CREDITED | PolicyResolution.CLOSED
  summary: ResolutionSummaryView
}

export type PayoutReceiptView = { beneficiary: string; amount: Wei; reference: string | null }

// client-side shapes with amounts parsed
export type Policy = Omit<PolicyView, 'value'> & { value: bigint }
export type ResolutionSummary = Omit<ResolutionSummaryView, 'totalCredited'> & { totalCredited: bigint }
export type PayoutReceipt = Omit<PayoutReceiptView, 'amount'> & { amount: bigint }
export type FlightStatusOutcome = Omit<FlightStatusOutcomeView, 'summary'> & { summary: ResolutionSummary }
