/*
 * Application entry point for the ledger server
 *
 * Responsibilities:
 *  1. Load and validate configuration
 *  2. Open the ledger from its persisted snapshot (or start fresh)
 *  3. Start the HTTP API server (Express app)
 *  4. Provide graceful shutdown on SIGINT/SIGTERM
 */

import http from 'http'
import path from 'path'
import { JsonRpcProvider, Wallet } from 'ethers'
import { loadDotenv, loadConfig, LedgerConfig, CONSTANTS } from './config'
import { createApp } from './http'
import { SuretyLedger } from './SuretyLedger'
import { FileSnapshotStore } from './store/SnapshotStore'
import { InMemorySettlement, SettlementPort, SignerSettlement } from './services/Settlement'
import { getLogger, setLogger } from './utils/logger'
import { setRejectionAuditFile } from './utils/rejectionAudit'
import pino from 'pino'

// --- Runtime state ---
let server: http.Server | null = null
let shuttingDown = false

export function buildSettlement(cfg: LedgerConfig): SettlementPort {
  if (cfg.SETTLEMENT_MODE === 'signer') {
    const provider = new JsonRpcProvider(cfg.RPC_URL)
    return new SignerSettlement(new Wallet(cfg.SETTLEMENT_PRIVATE_KEY, provider))
  }
  return new InMemorySettlement()
}

export async function buildLedger(cfg: LedgerConfig, settlement: SettlementPort = buildSettlement(cfg)): Promise<SuretyLedger> {
  if (!cfg.AUTHORITY_ADDRESS) {
    throw new Error('AUTHORITY_ADDRESS is required to start the ledger')
  }
  return SuretyLedger.open({
    authority: cfg.AUTHORITY_ADDRESS,
    // only used when the state file is empty
    firstAirline: cfg.FIRST_AIRLINE_ADDRESS ? { address: cfg.FIRST_AIRLINE_ADDRESS, name: cfg.FIRST_AIRLINE_NAME } : undefined,
    fundingThreshold: cfg.FUNDING_THRESHOLD_ETH,
    insuranceCap: cfg.INSURANCE_CAP_ETH,
    bootstrapLimit: cfg.ADMISSION_BOOTSTRAP_LIMIT,
    store: new FileSnapshotStore(path.resolve(cfg.STATE_FILE)),
    settlement,
  })
}

async function start(): Promise<void> {
  loadDotenv()
  const cfg = loadConfig(process.env)
  setLogger(pino({ level: cfg.LOG_LEVEL }))
  const log = getLogger()
  log.info({ event: 'main.starting', app: CONSTANTS.APP_NAME, settlement: cfg.SETTLEMENT_MODE })

  setRejectionAuditFile(path.resolve(cfg.REJECTION_AUDIT_FILE))
  const ledger = await buildLedger(cfg)
  log.info({ event: 'main.ledger_ready', authority: ledger.authority, operational: ledger.isOperational(), airlines: ledger.listAirlines().length })

  const app = createApp(ledger)
  await new Promise<void>((resolve) => {
    server = app.listen(cfg.PORT, () => {
      log.info({ event: 'main.listening', port: cfg.PORT })
      resolve()
    })
  })

  process.once('SIGINT', () => {
    void shutdown('SIGINT')
  })
  process.once('SIGTERM', () => {
    void shutdown('SIGTERM')
  })
}

async function shutdown(signal: string) {
  if (shuttingDown) return
  shuttingDown = true
  const log = getLogger()
  log.info({ event: 'main.shutdown', signal })

  if (server) {
    await new Promise<void>((resolve) => {
      server?.close((err) => {
        if (err) log.error({ event: 'main.close_failed', err: err.message })
        resolve()
      })
    })
  }
  process.exit(0)
}

if (require.main === module) {
  start().catch((err) => {
    getLogger().fatal({ event: 'main.startup_failed', err: err instanceof Error ? err.message : String(err) })
    process.exit(1)
  })
}

export { start }
