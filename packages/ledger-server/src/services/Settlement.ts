import type { Address } from '../types'

/**
 * SettlementPort
 * The value-transfer collaborator. The ledger only records what is owed; moving funds is delegated here.
 */
export interface SettlementPort {
  transfer(beneficiary: Address, amount: bigint): Promise<{ reference: string }>
}

/** The slice of an ethers Signer used for settlement; an ethers Wallet satisfies it. */
export interface TransferSigner {
  sendTransaction(tx: { to: string; value: bigint }): Promise<{ hash: string }>
}

/** Records transfers in memory. Used for local runs and tests. */
export class InMemorySettlement implements SettlementPort {
  public readonly transfers: Array<{ beneficiary: Address; amount: bigint; reference: string }> = []

  async transfer(beneficiary: Address, amount: bigint) {
    const reference = `mem_${this.transfers.length + 1}`
    this.transfers.push({ beneficiary, amount, reference })
    return { reference }
  }

  totalTo(beneficiary: Address): bigint {
    return this.transfers.filter((t) => t.beneficiary === beneficiary).reduce((acc, t) => acc + t.amount, 0n)
  }
}

/** Sends a plain value transfer through an ethers signer and reports the tx hash. */
export class SignerSettlement implements SettlementPort {
  constructor(private readonly signer: TransferSigner) {}

  async transfer(beneficiary: Address, amount: bigint) {
    const tx = await this.signer.sendTransaction({ to: beneficiary, value: amount })
    return { reference: tx.hash }
  }
}
