import { solidityPackedKeccak256 } from 'ethers'
import type { Address, FlightKey } from '../types'

/**
 * flightKey
 * keccak256 over the packed (airline, flight designator, timestamp) tuple.
 * Matches what an on-chain consumer would compute, so keys can be exchanged with one.
 */
export function flightKey(airline: Address, flight: string, timestamp: number | bigint): FlightKey {
  return solidityPackedKeccak256(['address', 'string', 'uint256'], [airline, flight, timestamp])
}

export function isFlightKey(value: string): boolean {
  return /^0x[0-9a-fA-F]{64}$/.test(value)
}
