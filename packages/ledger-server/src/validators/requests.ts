/* Request body schemas for the HTTP surface.
   Amounts travel as decimal wei strings; address checksumming happens in the ledger. */

import { z } from 'zod'
import { reject } from '@surety/reasons'

const wei = z.string().regex(/^\d+$/, 'expected a decimal wei string').transform((s) => BigInt(s))

export const OperationalSchema = z.object({ operational: z.boolean() })
export const AddressSchema = z.object({ address: z.string() })
export const RegisterAirlineSchema = z.object({ airline: z.string(), name: z.string().min(1).max(128) })
export const VoteSchema = z.object({ voter: z.string() })
export const FundSchema = z.object({ amount: wei })
export const RegisterFlightSchema = z.object({
  airline: z.string(),
  flight: z.string().min(1).max(32),
  timestamp: z.number().int().nonnegative(),
})
export const BuySchema = z.object({ passenger: z.string(), value: wei })
export const FlightStatusSchema = z.object({ statusCode: z.number().int() })

/** Parse or throw VALIDATION_SCHEMA_FAIL naming the first failing field. */
export function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.output<S> {
  const res = schema.safeParse(body ?? {})
  if (!res.success) {
    const issue = res.error.issues[0]
    const field = issue && issue.path.length ? issue.path.join('.') : 'body'
    return reject('VALIDATION_SCHEMA_FAIL', { message: `${field}: ${issue?.message ?? 'invalid'}`, context: { field } })
  }
  return res.data
}
