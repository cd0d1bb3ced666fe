import { PassThrough } from 'stream'
import pino from 'pino'
import * as loggerModule from '../../src/utils/logger'

function makeCapture() {
  const stream = new PassThrough()
  const chunks: string[] = []
  stream.on('data', (c) => chunks.push(c.toString()))
  return { stream, chunks }
}

function lines(chunks: string[]) {
  return chunks.join('').split(/\n/).filter(Boolean).map((l) => JSON.parse(l))
}

describe('logger utilities', () => {
  let capture: ReturnType<typeof makeCapture>
  let original: pino.Logger

  beforeEach(() => {
    capture = makeCapture()
    original = loggerModule.getLogger()
    loggerModule.setLogger(pino({ level: 'info' }, capture.stream))
  })

  afterEach(() => {
    loggerModule.setLogger(original)
  })

  test('logOperation logs info when ok', () => {
    loggerModule.logOperation({ operation: 'fund', caller: '0xabc', outcome: 'ok', corr_id: 'c1' })
    const [parsed] = lines(capture.chunks)
    expect(parsed).toMatchObject({ event: 'ledger.operation', operation: 'fund', outcome: 'ok', corr_id: 'c1', level: 30 })
  })

  test('logOperation logs warn with the reason for rejections', () => {
    loggerModule.logOperation({ operation: 'vote', outcome: 'rejected', reason_code: 'NOT_ELIGIBLE_VOTER', context: { voter: '0x1' } })
    const [parsed] = lines(capture.chunks)
    expect(parsed).toMatchObject({ event: 'ledger.operation', reason_code: 'NOT_ELIGIBLE_VOTER', voter: '0x1', level: 40 })
  })

  test('logOperation logs error for failures', () => {
    loggerModule.logOperation({ operation: 'pay', outcome: 'failed' })
    expect(lines(capture.chunks)[0].level).toBe(50)
  })

  test('logResolution carries the total as a string', () => {
    loggerModule.logResolution({ flightKey: '0xk', resolution: 'CREDITED', affected: 2, total_wei: '15' })
    expect(lines(capture.chunks)[0]).toMatchObject({ event: 'policy.resolution', affected: 2, total_wei: '15' })
  })

  test('logHttp logs http.request, at error level for 5xx', () => {
    loggerModule.logHttp({ path: '/x', method: 'GET', status: 200, corr_id: 'c3', latency_ms: 12 })
    loggerModule.logHttp({ path: '/y', method: 'POST', status: 502 })
    const [ok, failed] = lines(capture.chunks)
    expect(ok).toMatchObject({ event: 'http.request', path: '/x', status: 200, level: 30 })
    expect(failed).toMatchObject({ path: '/y', status: 502, level: 50 })
  })
})
