// src/config.ts

/**
 * Centralized configuration module for environment variables and constants.
 */

import dotenv from 'dotenv'
import path from 'path'
import fs from 'fs'
import { z } from 'zod'
import { parseEther, isAddress, getAddress } from 'ethers'

// Resolve package root for both ts-jest (src) and built (dist/...) layouts
const distMarker = `${path.sep}dist${path.sep}`
const distIdx = __dirname.lastIndexOf(distMarker)
const packageRoot = distIdx !== -1 ? __dirname.slice(0, distIdx) : path.resolve(__dirname, '..')

/** Load .env.ledger-server from the package root, with cwd fallback. Existing env vars win. */
export function loadDotenv() {
  const candidateEnvPaths = [
    path.join(packageRoot, '.env.ledger-server'),
    path.join(process.cwd(), '.env.ledger-server')
  ]
  for (const p of candidateEnvPaths) {
    if (fs.existsSync(p)) {
      dotenv.config({ path: p })
      break
    }
  }
}

const ether = z
  .string()
  .regex(/^\d+(\.\d+)?$/, 'expected a decimal ether amount')
  .transform((s) => parseEther(s))

const EnvSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  AUTHORITY_ADDRESS: z
    .string()
    .refine((v) => isAddress(v), 'AUTHORITY_ADDRESS must be an address')
    .transform((v) => getAddress(v))
    .optional(),
  FIRST_AIRLINE_ADDRESS: z
    .string()
    .refine((v) => isAddress(v), 'FIRST_AIRLINE_ADDRESS must be an address')
    .transform((v) => getAddress(v))
    .optional(),
  FIRST_AIRLINE_NAME: z.string().min(1).default('Founding Airline'),
  STATE_FILE: z.string().default(path.join('data', 'ledger-state.json')),
  REJECTION_AUDIT_FILE: z.string().default(path.join('logs', 'rejections.jsonl')),
  FUNDING_THRESHOLD_ETH: ether.default('10'),
  INSURANCE_CAP_ETH: ether.default('1'),
  ADMISSION_BOOTSTRAP_LIMIT: z.coerce.number().int().min(0).default(4),
  SETTLEMENT_MODE: z.enum(['memory', 'signer']).default('memory'),
  RPC_URL: z.string().default('http://127.0.0.1:8545'),
  SETTLEMENT_PRIVATE_KEY: z.string().default(''),
})

export type LedgerConfig = z.output<typeof EnvSchema>

/** Pure: validates an env-like record. Throws with every failing field listed. */
export function loadConfig(env: Record<string, string | undefined> = process.env): LedgerConfig {
  const res = EnvSchema.safeParse(env)
  if (!res.success) {
    const fields = res.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')
    throw new Error(`Invalid ledger-server configuration: ${fields}`)
  }
  const cfg = res.data
  if (cfg.SETTLEMENT_MODE === 'signer' && !cfg.SETTLEMENT_PRIVATE_KEY) {
    throw new Error('Invalid ledger-server configuration: SETTLEMENT_PRIVATE_KEY is required when SETTLEMENT_MODE=signer')
  }
  return cfg
}

export const CONSTANTS = {
  APP_NAME: 'Surety Ledger',
  API_VERSION: 'v1',
}
