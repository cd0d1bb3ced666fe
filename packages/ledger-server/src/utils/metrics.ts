import { Registry, Counter, Gauge } from 'prom-client'
import type { Request, Response } from 'express'
import { getLogger } from './logger'

let registry: Registry
let operationCounter: Counter<string>
let rejectionCounter: Counter<string>
let transitionCounter: Counter<string>
let resolutionCounter: Counter<string>
let payoutCounter: Counter<string>
let operationalGauge: Gauge<string>

function initMetrics(reg?: Registry) {
  registry = reg ?? new Registry()

  operationCounter = new Counter({
    name: 'ledger_operations_total',
    help: 'Ledger operations by outcome',
    labelNames: ['operation', 'outcome'],
    registers: [registry]
  })

  rejectionCounter = new Counter({
    name: 'ledger_rejections_total',
    help: 'Rejected ledger operations by reason',
    labelNames: ['operation', 'reason'],
    registers: [registry]
  })

  transitionCounter = new Counter({
    name: 'airline_transitions_total',
    help: 'Airline state transitions',
    labelNames: ['from', 'to'],
    registers: [registry]
  })

  resolutionCounter = new Counter({
    name: 'policy_resolutions_total',
    help: 'Policies resolved, by resolution',
    labelNames: ['resolution'],
    registers: [registry]
  })

  payoutCounter = new Counter({
    name: 'payouts_wei_total',
    help: 'Wei transferred to beneficiaries',
    registers: [registry]
  })

  operationalGauge = new Gauge({
    name: 'ledger_operational',
    help: '1 when the operational gate is open',
    registers: [registry]
  })
}

// initialize default metrics on module load
initMetrics()

export function setRegistry(reg: Registry) {
  initMetrics(reg)
}

export function countOperation(operation: string, outcome: 'ok' | 'rejected' | 'failed') {
  operationCounter.labels({ operation, outcome }).inc()
}

export function countRejection(operation: string, reason: string) {
  rejectionCounter.labels({ operation, reason }).inc()
}

export function countTransition(from: string, to: string) {
  transitionCounter.labels({ from, to }).inc()
}

export function countResolution(resolution: string, n: number) {
  if (n > 0) resolutionCounter.labels({ resolution }).inc(n)
}

// prom-client counters are float64; wei totals are reported in that precision
export function addPayout(amount: bigint) {
  if (amount > 0n) payoutCounter.inc(Number(amount))
}

export function setOperational(on: boolean) {
  operationalGauge.set(on ? 1 : 0)
}

export async function metricsHandler(_req: Request, res: Response) {
  try {
    res.setHeader('Content-Type', registry.contentType)
    res.status(200).send(await registry.metrics())
  } catch (e) {
    getLogger().error({ event: 'metrics.collect_failed', err: e instanceof Error ? e.message : String(e) })
    res.status(500).send('error')
  }
}
