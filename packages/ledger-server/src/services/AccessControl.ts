import { Role } from '@surety/dto'
import { reject } from '@surety/reasons'
import type { Address } from '../types'

/**
 * AccessControl
 * Three caller tiers: the authority (deploying identity), whitelisted callers, and anyone.
 * The authority satisfies the authorized-caller tier as well.
 */
export class AccessControl {
  private readonly authorized: Set<Address>

  constructor(public readonly authority: Address, authorizedCallers: Iterable<Address> = []) {
    this.authorized = new Set(authorizedCallers)
  }

  hasRole(caller: Address | undefined, role: Role): boolean {
    switch (role) {
      case Role.ANY:
        return true
      case Role.AUTHORITY:
        return caller === this.authority
      case Role.AUTHORIZED_CALLER:
        return caller !== undefined && (caller === this.authority || this.authorized.has(caller))
    }
  }

  requireRole(caller: Address | undefined, role: Role): void {
    if (!this.hasRole(caller, role)) {
      reject('NOT_AUTHORIZED', { context: { caller: caller ?? 'anonymous', role } })
    }
  }

  authorizeCaller(address: Address): void {
    this.authorized.add(address)
  }

  deauthorizeCaller(address: Address): void {
    this.authorized.delete(address)
  }

  isAuthorizedCaller(address: Address): boolean {
    return this.authorized.has(address)
  }

  listAuthorizedCallers(): Address[] {
    return [...this.authorized]
  }
}

export default AccessControl
