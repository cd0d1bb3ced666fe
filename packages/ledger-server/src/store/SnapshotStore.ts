/* Durable state surface of the ledger.

   A snapshot holds the four keyed tables (airlines, funding, policies, balances),
   the paid roster, the flight registry, the gate and the authority/whitelist.
   Bigints are written as decimal strings and validated back with zod on load. */

import { promises as fs } from 'fs'
import path from 'path'
import { z } from 'zod'
import { AirlineState, PolicyStatus, PolicyResolution, FlightStatusCode } from '@surety/dto'

const wei = z.string().regex(/^\d+$/, 'expected a non-negative integer string').transform((s) => BigInt(s))
const address = z.string().regex(/^0x[0-9a-fA-F]{40}$/)

export const SnapshotSchema = z.object({
  version: z.literal(1),
  operational: z.boolean(),
  authority: address,
  authorizedCallers: z.array(address),
  airlines: z.array(
    z.object({
      address,
      name: z.string(),
      state: z.nativeEnum(AirlineState),
      approvals: z.array(address),
    })
  ),
  funding: z.array(z.tuple([address, wei])),
  roster: z.array(address),
  policies: z.array(
    z.tuple([
      z.string(),
      z.array(
        z.object({
          passenger: address,
          value: wei,
          status: z.nativeEnum(PolicyStatus),
          resolution: z.nativeEnum(PolicyResolution),
        })
      ),
    ])
  ),
  flights: z.array(
    z.object({
      key: z.string(),
      airline: address,
      flight: z.string(),
      timestamp: z.number().int(),
      statusCode: z.nativeEnum(FlightStatusCode),
      updatedTimestamp: z.number().int(),
    })
  ),
  balances: z.array(z.tuple([address, wei])),
})

export type LedgerSnapshot = z.output<typeof SnapshotSchema>

export function encodeSnapshot(snapshot: LedgerSnapshot): string {
  return JSON.stringify(snapshot, (_key, value) => (typeof value === 'bigint' ? value.toString() : value), 2)
}

export function decodeSnapshot(text: string): LedgerSnapshot {
  return SnapshotSchema.parse(JSON.parse(text))
}

export interface SnapshotStore {
  load(): Promise<LedgerSnapshot | null>
  save(snapshot: LedgerSnapshot): Promise<void>
}

/** Keeps the encoded form only, so round-tripping goes through the same codec as the file store. */
export class MemorySnapshotStore implements SnapshotStore {
  private encoded: string | null = null
  public saves = 0

  async load() {
    return this.encoded === null ? null : decodeSnapshot(this.encoded)
  }

  async save(snapshot: LedgerSnapshot) {
    this.encoded = encodeSnapshot(snapshot)
    this.saves++
  }
}

/** JSON file store; writes go to a temp file first and are renamed into place. */
export class FileSnapshotStore implements SnapshotStore {
  constructor(private readonly file: string) {}

  async load() {
    let text: string
    try {
      text = await fs.readFile(this.file, 'utf8')
    } catch (e) {
      if (isMissingFile(e)) return null
      throw e
    }
    return decodeSnapshot(text)
  }

  async save(snapshot: LedgerSnapshot) {
    await fs.mkdir(path.dirname(this.file), { recursive: true })
    const tmp = `${this.file}.${process.pid}.tmp`
    await fs.writeFile(tmp, encodeSnapshot(snapshot))
    await fs.rename(tmp, this.file)
  }
}

function isMissingFile(e: unknown): boolean {
  return typeof e === 'object' && e !== null && 'code' in e && e.code === 'ENOENT'
}
