import { getAddress, isAddress } from 'ethers'
import { reject } from '@surety/reasons'
import type { Address } from '../types'

/**
 * Normalise a caller-supplied identity to its checksummed form.
 * Every table is keyed by checksummed addresses so lookups never depend on letter case.
 */
export function toAddress(value: string, field = 'address'): Address {
  if (!isAddress(value)) {
    reject('VALIDATION_SCHEMA_FAIL', { message: `${field} is not a valid address`, context: { field } })
  }
  return getAddress(value)
}
