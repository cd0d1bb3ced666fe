import { FlightStatusCode } from '@surety/dto'
import { flightKey } from '../utils/flightKey'
import type { Address, Flight, FlightKey } from '../types'

/**
 * FlightRegistry
 * Flights announced by paid airlines, keyed by FlightKey, with the last status reported for each.
 */
export class FlightRegistry {
  private flights: Map<FlightKey, Flight> = new Map()

  /** Idempotent: registering the same (airline, flight, timestamp) again returns the existing record. */
  register(airline: Address, flight: string, timestamp: number): { flight: Flight; created: boolean } {
    const key = flightKey(airline, flight, timestamp)
    const existing = this.flights.get(key)
    if (existing) return { flight: { ...existing }, created: false }
    const record: Flight = { key, airline, flight, timestamp, statusCode: FlightStatusCode.UNKNOWN, updatedTimestamp: timestamp }
    this.flights.set(key, record)
    return { flight: { ...record }, created: true }
  }

  get(key: FlightKey): Flight | null {
    const f = this.flights.get(key)
    return f ? { ...f } : null
  }

  recordStatus(key: FlightKey, statusCode: FlightStatusCode, at: number): Flight | null {
    const f = this.flights.get(key)
    if (!f) return null
    f.statusCode = statusCode
    f.updatedTimestamp = at
    return { ...f }
  }

  list(): Flight[] {
    return [...this.flights.values()].map((f) => ({ ...f }))
  }

  // persistence hooks
  exportTable(): Flight[] {
    return this.list()
  }

  importTable(flights: Flight[]) {
    this.flights = new Map(flights.map((f) => [f.key, { ...f }]))
  }
}

export default FlightRegistry
