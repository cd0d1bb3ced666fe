import { getAddress, parseEther } from 'ethers'
import { SnapshotStore, LedgerSnapshot, MemorySnapshotStore } from '../src/store/SnapshotStore'

/** Deterministic checksummed test address from a small integer. */
export function addr(n: number): string {
  return getAddress('0x' + n.toString(16).padStart(40, '0'))
}

export const eth = (v: string) => parseEther(v)

export const AUTHORITY = addr(1)

/** Memory store whose saves can be made to fail on demand. */
export class FlakyStore implements SnapshotStore {
  public failSaves = false
  public readonly inner = new MemorySnapshotStore()

  async load() {
    return this.inner.load()
  }

  async save(snapshot: LedgerSnapshot) {
    if (this.failSaves) throw new Error('disk full')
    await this.inner.save(snapshot)
  }
}
