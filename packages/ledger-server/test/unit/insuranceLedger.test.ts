import { PolicyResolution, PolicyStatus } from '@surety/dto'
import { InsuranceLedger } from '../../src/services/InsuranceLedger'
import { flightKey } from '../../src/utils/flightKey'
import { addr, eth } from '../helpers'

const KEY = flightKey(addr(11), 'SR100', 1700000000)
const OTHER = flightKey(addr(11), 'SR200', 1700000000)

describe('InsuranceLedger', () => {
  it('records policies in purchase order', () => {
    const ledger = new InsuranceLedger(eth('1'))
    ledger.buy(addr(40), KEY, eth('1'))
    ledger.buy(addr(41), KEY, 2n)
    expect(ledger.getPolicies(KEY)).toEqual([
      { passenger: addr(40), value: eth('1'), status: PolicyStatus.ACTIVE, resolution: PolicyResolution.NONE },
      { passenger: addr(41), value: 2n, status: PolicyStatus.ACTIVE, resolution: PolicyResolution.NONE },
    ])
    expect(ledger.getPolicies(OTHER)).toEqual([])
  })

  it('rejects values above the cap', () => {
    const ledger = new InsuranceLedger(eth('1'))
    expect(() => ledger.buy(addr(40), KEY, eth('1') + 1n)).toThrow(
      expect.objectContaining({ reason: expect.objectContaining({ code: 'INVALID_AMOUNT', context: { value: '1000000000000000001', cap: '1000000000000000000' } }) })
    )
    expect(ledger.getPolicies(KEY)).toEqual([])
  })

  it('credits one-and-a-half times each active policy', () => {
    const ledger = new InsuranceLedger(eth('1'))
    ledger.buy(addr(40), KEY, eth('1'))
    ledger.buy(addr(41), KEY, 3n)
    const res = ledger.creditInsurees(KEY)
    expect(res.credits).toEqual([
      { passenger: addr(40), amount: eth('1.5') },
      { passenger: addr(41), amount: 3n },
    ])
    expect(res.affected).toBe(2)
    expect(res.totalCredited).toBe(eth('1.5') + 3n)
    expect(ledger.getPolicies(KEY).map((p) => p.resolution)).toEqual([PolicyResolution.CREDITED, PolicyResolution.CREDITED])
  })

  it('resolves each policy at most once', () => {
    const ledger = new InsuranceLedger(eth('1'))
    ledger.buy(addr(40), KEY, eth('1'))
    ledger.creditInsurees(KEY)
    expect(ledger.creditInsurees(KEY)).toEqual({ flightKey: KEY, affected: 0, totalCredited: 0n, credits: [] })
    expect(ledger.closeInsurees(KEY)).toEqual({ flightKey: KEY, affected: 0, totalCredited: 0n })
    expect(ledger.getPolicies(KEY)[0].resolution).toBe(PolicyResolution.CREDITED)
  })

  it('policies bought after a resolution are resolved by the next call', () => {
    const ledger = new InsuranceLedger(eth('1'))
    ledger.buy(addr(40), KEY, eth('1'))
    ledger.closeInsurees(KEY)
    ledger.buy(addr(41), KEY, 10n)
    const res = ledger.creditInsurees(KEY)
    expect(res.credits).toEqual([{ passenger: addr(41), amount: 15n }])
    expect(ledger.getPolicies(KEY).map((p) => p.resolution)).toEqual([PolicyResolution.CLOSED, PolicyResolution.CREDITED])
  })

  it('returned policies are copies', () => {
    const ledger = new InsuranceLedger(eth('1'))
    ledger.buy(addr(40), KEY, 5n)
    const [p] = ledger.getPolicies(KEY)
    p.status = PolicyStatus.CLOSED
    expect(ledger.getPolicies(KEY)[0].status).toBe(PolicyStatus.ACTIVE)
  })
})
