import { promises as fs } from 'fs'
import path from 'path'
import { getLogger } from './logger'

export type RejectionEntry = {
  ts: string
  corr_id?: string
  operation: string
  caller?: string
  reason: { code: string; category: string; http_status: number; message: string }
  context?: Record<string, unknown>
}

let auditFile: string | null = null

/** Point the audit at a JSONL file; `null` disables it. */
export function setRejectionAuditFile(file: string | null) {
  auditFile = file
}

/**
 * appendRejection
 * Appends a single JSONL record for a ReasonedRejection raised by a ledger operation.
 * Audit failures are logged and never change the outcome of the operation.
 */
export async function appendRejection(entry: RejectionEntry) {
  if (!auditFile) return
  try {
    await fs.mkdir(path.dirname(auditFile), { recursive: true })
    await fs.appendFile(auditFile, JSON.stringify(entry) + '\n')
  } catch (e) {
    getLogger().error({ event: 'rejection_audit.write_failed', file: auditFile, err: e instanceof Error ? e.message : String(e) })
  }
}
