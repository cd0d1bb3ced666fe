import { AirlineState } from '@surety/dto'
import { AirlineRegistry } from '../../src/services/AirlineRegistry'
import { GovernanceEngine } from '../../src/services/GovernanceEngine'
import { addr, eth } from '../helpers'

const THRESHOLD = eth('10')

function setup() {
  const registry = new AirlineRegistry()
  const engine = new GovernanceEngine(registry, { fundingThreshold: THRESHOLD, bootstrapLimit: 4 })
  return { registry, engine }
}

/** Five paid airlines (11..15) on the roster. */
function consortiumOfFive() {
  const s = setup()
  for (let i = 11; i <= 15; i++) {
    s.engine.registerAirline(addr(i), `Air ${i}`)
    s.engine.fund(addr(i), THRESHOLD)
  }
  return s
}

describe('GovernanceEngine admission', () => {
  it('admits directly while at most four airlines are admitted', () => {
    const { engine, registry } = setup()
    for (let i = 11; i <= 15; i++) {
      expect(engine.registerAirline(addr(i), `Air ${i}`).airline.state).toBe(AirlineState.REGISTERED)
    }
    expect(registry.admittedCount()).toBe(5)
    expect(engine.registerAirline(addr(16), 'Air 16').airline.state).toBe(AirlineState.APPLIED)
  })

  it('records the creation and promotion transitions', () => {
    const { engine } = setup()
    expect(engine.registerAirline(addr(11), 'Air 11').transitions).toEqual([
      { airline: addr(11), from: null, to: AirlineState.APPLIED },
      { airline: addr(11), from: AirlineState.APPLIED, to: AirlineState.REGISTERED },
    ])
  })

  it('re-registering an admitted airline only updates its name', () => {
    const { engine } = setup()
    engine.registerAirline(addr(11), 'Old')
    const res = engine.registerAirline(addr(11), 'New')
    expect(res.airline).toMatchObject({ name: 'New', state: AirlineState.REGISTERED })
    expect(res.transitions).toEqual([])
  })
})

describe('GovernanceEngine voting', () => {
  it('rejects votes from airlines that have not paid', () => {
    const { engine } = setup()
    engine.registerAirline(addr(11), 'Air 11')
    expect(() => engine.vote(addr(11), addr(20))).toThrow(
      expect.objectContaining({ reason: expect.objectContaining({ code: 'NOT_ELIGIBLE_VOTER' }) })
    )
    expect(() => engine.vote(addr(99), addr(20))).toThrow(
      expect.objectContaining({ reason: expect.objectContaining({ code: 'NOT_ELIGIBLE_VOTER', context: { voter: addr(99), state: 'UNKNOWN' } }) })
    )
  })

  it('promotes a candidate once approvals meet the parity threshold of five admitted', () => {
    const { engine } = consortiumOfFive()
    engine.registerAirline(addr(16), 'Air 16')

    // m = 5, half = 2: one approval (odd) needs > 2, two approvals (even) need >= 2
    expect(engine.vote(addr(11), addr(16)).airline.state).toBe(AirlineState.APPLIED)
    const second = engine.vote(addr(12), addr(16))
    expect(second.airline.state).toBe(AirlineState.REGISTERED)
    expect(second.transitions).toEqual([{ airline: addr(16), from: AirlineState.APPLIED, to: AirlineState.REGISTERED }])

    const third = engine.vote(addr(13), addr(16))
    expect(third.airline.state).toBe(AirlineState.REGISTERED)
    expect(third.airline.approvals).toEqual([addr(11), addr(12), addr(13)])
    expect(third.transitions).toEqual([])
  })

  it('counts repeated votes from the same voter', () => {
    const { engine } = consortiumOfFive()
    engine.vote(addr(11), addr(16))
    const res = engine.vote(addr(11), addr(16))
    expect(res.airline.approvals).toEqual([addr(11), addr(11)])
    expect(res.airline.state).toBe(AirlineState.REGISTERED)
  })

  it('a voted-in airline that already funded becomes Paid in the same step', () => {
    const { engine, registry } = consortiumOfFive()
    engine.fund(addr(16), THRESHOLD)
    expect(registry.get(addr(16))?.state).toBe(AirlineState.APPLIED)
    engine.vote(addr(11), addr(16))
    const res = engine.vote(addr(12), addr(16))
    expect(res.airline.state).toBe(AirlineState.PAID)
    expect(registry.getRoster()).toContain(addr(16))
  })
})

describe('GovernanceEngine funding', () => {
  it('accumulates contributions and promotes at the threshold', () => {
    const { engine, registry } = setup()
    engine.registerAirline(addr(11), 'Air 11')
    expect(engine.fund(addr(11), eth('4')).airline.state).toBe(AirlineState.REGISTERED)
    const res = engine.fund(addr(11), eth('6'))
    expect(res.total).toBe(eth('10'))
    expect(res.airline.state).toBe(AirlineState.PAID)
    expect(registry.getRoster()).toEqual([addr(11)])
  })

  it('adds a paid airline to the roster only once', () => {
    const { engine, registry } = setup()
    engine.registerAirline(addr(11), 'Air 11')
    engine.fund(addr(11), THRESHOLD)
    const res = engine.fund(addr(11), eth('1'))
    expect(res.total).toBe(eth('11'))
    expect(res.transitions).toEqual([])
    expect(registry.getRoster()).toEqual([addr(11)])
  })

  it('funding an unknown airline creates it as Applied', () => {
    const { engine, registry } = setup()
    const res = engine.fund(addr(30), THRESHOLD)
    expect(res.airline.state).toBe(AirlineState.APPLIED)
    expect(res.transitions).toEqual([{ airline: addr(30), from: null, to: AirlineState.APPLIED }])
    expect(registry.getRoster()).toEqual([])
  })

  it('rejects negative contributions', () => {
    const { engine } = setup()
    expect(() => engine.fund(addr(11), -1n)).toThrow(
      expect.objectContaining({ reason: expect.objectContaining({ code: 'INVALID_AMOUNT' }) })
    )
  })

  it('zero contributions leave the total unchanged', () => {
    const { engine } = setup()
    engine.fund(addr(11), eth('3'))
    expect(engine.fund(addr(11), 0n).total).toBe(eth('3'))
  })
})
