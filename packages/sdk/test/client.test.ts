import nock from 'nock'
import { SuretyClient, SuretyClientError } from '../src/client'

describe('SuretyClient (unit)', () => {
  const BASE_URL = 'http://ledger.test'
  const AUTHORITY = '0x0000000000000000000000000000000000000001'
  const AIRLINE = '0x000000000000000000000000000000000000000B'
  const KEY = '0x' + 'ab'.repeat(32)

  function envelope(code: string, http_status: number, message: string) {
    return { corr_id: 'corr_1', operation: 'op', reason: { code, category: 'X', http_status, message }, ts: '2024-01-01T00:00:00.000Z' }
  }

  afterEach(() => {
    nock.cleanAll()
  })

  test('sends the caller header and parses wei amounts', async () => {
    nock(BASE_URL, { reqheaders: { 'x-caller': AUTHORITY } })
      .post(`/v1/airlines/${AIRLINE}/funding`, { amount: '10000000000000000000' })
      .reply(200, { airline: { address: AIRLINE, name: 'Air', state: 'PAID', approvals: [] }, total: '10000000000000000000' })

    const client = new SuretyClient(BASE_URL, { caller: AUTHORITY })
    const res = await client.fund(AIRLINE, 10n ** 19n)
    expect(res.total).toBe(10n ** 19n)
    expect(res.airline.state).toBe('PAID')
  })

  test('error responses become SuretyClientError with the envelope', async () => {
    nock(BASE_URL)
      .post('/v1/airlines', { airline: AIRLINE, name: 'Air' })
      .reply(403, envelope('NOT_AUTHORIZED', 403, 'Caller is not authorized'))

    const client = new SuretyClient(BASE_URL)
    const err = await client.registerAirline(AIRLINE, 'Air').catch((e: unknown) => e)
    expect(err).toBeInstanceOf(SuretyClientError)
    expect(err).toMatchObject({ statusCode: 403, message: 'Caller is not authorized', code: 'NOT_AUTHORIZED' })
  })

  test('non-envelope error bodies keep the status only', async () => {
    nock(BASE_URL).get('/v1/operational').reply(502, 'bad gateway')
    const err = await new SuretyClient(BASE_URL).isOperational().catch((e: unknown) => e)
    expect(err).toMatchObject({ statusCode: 502, message: 'Ledger error 502', envelope: undefined })
  })

  test('missing airlines read as null', async () => {
    nock(BASE_URL).get(`/v1/airlines/${AIRLINE}`).reply(404, envelope('CLIENT_NOT_FOUND', 404, 'airline not found'))
    await expect(new SuretyClient(BASE_URL).getAirline(AIRLINE)).resolves.toBeNull()
  })

  test('retries a failed write when asked to', async () => {
    nock(BASE_URL)
      .post(`/v1/airlines/${AIRLINE}/funding`, { amount: '10' })
      .reply(500, envelope('PERSISTENCE_FAILED', 500, 'Snapshot could not be persisted'))
      .post(`/v1/airlines/${AIRLINE}/funding`, { amount: '10' })
      .reply(200, { airline: { address: AIRLINE, name: 'Air 11', state: 'PAID', approvals: [] }, total: '10' })

    const sleep = jest.fn(async () => undefined)
    const client = new SuretyClient(BASE_URL, { caller: AUTHORITY, retries: 2, sleep })
    await expect(client.fund(AIRLINE, 10n)).resolves.toMatchObject({ total: 10n })
    expect(sleep).toHaveBeenCalledTimes(1)
  })

  test('withdrawals are sent once even when retries are enabled', async () => {
    const scope = nock(BASE_URL)
      .post(`/v1/payouts/${AIRLINE}/withdrawals`)
      .reply(500, envelope('PERSISTENCE_FAILED', 500, 'Snapshot could not be persisted'))
      .post(`/v1/payouts/${AIRLINE}/withdrawals`)
      .reply(200, { beneficiary: AIRLINE, amount: '15', reference: 'mem_2' })

    const sleep = jest.fn(async () => undefined)
    const client = new SuretyClient(BASE_URL, { caller: AUTHORITY, retries: 2, sleep })
    const err = await client.pay(AIRLINE).catch((e: unknown) => e)
    expect(err).toBeInstanceOf(SuretyClientError)
    expect(err).toMatchObject({ statusCode: 500, envelope: { reason: { code: 'PERSISTENCE_FAILED' } } })
    expect(sleep).not.toHaveBeenCalled()
    expect(scope.pendingMocks()).toHaveLength(1)
  })

  test('resolution summaries carry bigint totals', async () => {
    nock(BASE_URL)
      .post(`/v1/flights/${KEY}/status`, { statusCode: 20 })
      .reply(200, {
        flight: { key: KEY, airline: AIRLINE, flight: 'SR100', timestamp: 1, statusCode: 20, updatedTimestamp: 2 },
        resolution: 'CREDITED',
        summary: { flightKey: KEY, affected: 2, totalCredited: '18' },
      })
    const outcome = await new SuretyClient(BASE_URL).processFlightStatus(KEY, 20)
    expect(outcome.summary).toEqual({ flightKey: KEY, affected: 2, totalCredited: 18n })
    expect(outcome.resolution).toBe('CREDITED')
  })

  test('builds the flight-key query', async () => {
    nock(BASE_URL)
      .get('/v1/flight-keys')
      .query({ airline: AIRLINE, flight: 'SR100', timestamp: '1700000000' })
      .reply(200, { flightKey: KEY })
    await expect(new SuretyClient(BASE_URL).flightKey(AIRLINE, 'SR100', 1700000000)).resolves.toBe(KEY)
  })
})
