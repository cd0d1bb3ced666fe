import pino from 'pino'
import { setLogger } from './packages/ledger-server/src/utils/logger'

// keep test output readable; logger tests install their own capture
setLogger(pino({ level: 'silent' }))
