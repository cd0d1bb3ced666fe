import { Role } from '@surety/dto'
import { AccessControl } from '../../src/services/AccessControl'
import { OperationalGate } from '../../src/services/OperationalGate'
import { addr, AUTHORITY } from '../helpers'

describe('AccessControl', () => {
  it('grants each tier to the right callers', () => {
    const ac = new AccessControl(AUTHORITY, [addr(2)])
    expect(ac.hasRole(undefined, Role.ANY)).toBe(true)
    expect(ac.hasRole(undefined, Role.AUTHORIZED_CALLER)).toBe(false)
    expect(ac.hasRole(addr(2), Role.AUTHORIZED_CALLER)).toBe(true)
    expect(ac.hasRole(addr(2), Role.AUTHORITY)).toBe(false)
    expect(ac.hasRole(AUTHORITY, Role.AUTHORITY)).toBe(true)
    expect(ac.hasRole(AUTHORITY, Role.AUTHORIZED_CALLER)).toBe(true)
  })

  it('requireRole throws NOT_AUTHORIZED with the caller in context', () => {
    const ac = new AccessControl(AUTHORITY)
    expect(() => ac.requireRole(addr(3), Role.AUTHORIZED_CALLER)).toThrow(
      expect.objectContaining({ reason: expect.objectContaining({ code: 'NOT_AUTHORIZED', context: { caller: addr(3), role: 'AUTHORIZED_CALLER' } }) })
    )
  })

  it('whitelist can be edited', () => {
    const ac = new AccessControl(AUTHORITY)
    ac.authorizeCaller(addr(4))
    expect(ac.isAuthorizedCaller(addr(4))).toBe(true)
    ac.deauthorizeCaller(addr(4))
    expect(ac.isAuthorizedCaller(addr(4))).toBe(false)
    expect(ac.listAuthorizedCallers()).toEqual([])
  })
})

describe('OperationalGate', () => {
  it('starts open and can be closed and reopened', () => {
    const gate = new OperationalGate()
    expect(gate.isOperational()).toBe(true)
    gate.setOperatingStatus(false)
    expect(() => gate.assertOperational('fund')).toThrow(expect.objectContaining({ reason: expect.objectContaining({ code: 'NOT_OPERATIONAL' }) }))
    gate.setOperatingStatus(true)
    expect(() => gate.assertOperational('fund')).not.toThrow()
  })
})
