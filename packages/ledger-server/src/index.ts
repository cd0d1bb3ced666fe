/**
 * Ledger server public surface: the ledger facade, its components and the HTTP app factory.
 */
export * from './types'
export { SuretyLedger, DEFAULT_FUNDING_THRESHOLD, DEFAULT_INSURANCE_CAP } from './SuretyLedger'
export type { LedgerOptions, CallContext, FlightStatusOutcome } from './SuretyLedger'
export { createApp } from './http'
export { flightKey } from './utils/flightKey'
export { InMemorySettlement, SignerSettlement } from './services/Settlement'
export type { SettlementPort, TransferSigner } from './services/Settlement'
export { MemorySnapshotStore, FileSnapshotStore } from './store/SnapshotStore'
export type { SnapshotStore, LedgerSnapshot } from './store/SnapshotStore'
export { loadConfig } from './config'
