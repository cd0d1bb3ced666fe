import { AirlineState, PolicyStatus, PolicyResolution, FlightStatusCode } from '@surety/dto'

export type Address = string
export type FlightKey = string

export type Airline = {
  address: Address
  name: string
  state: AirlineState
  approvals: Address[]
}

export type InsurancePolicy = {
  passenger: Address
  value: bigint
  status: PolicyStatus
  resolution: PolicyResolution
}

export type Flight = {
  key: FlightKey
  airline: Address
  flight: string
  timestamp: number
  statusCode: FlightStatusCode
  updatedTimestamp: number
}

/** Summary returned by the credit/close resolution operations. */
export type ResolutionSummary = {
  flightKey: FlightKey
  affected: number
  totalCredited: bigint
}

export type AirlineTransition = {
  airline: Address
  from: AirlineState | null
  to: AirlineState
}
