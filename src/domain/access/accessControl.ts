import type { StateStore } from '../../infra/storage/stateStore.js';
import type { Address } from '../../types.js';
import type { ChainClock } from '../chain/clock.js';

export const Role = {
  Governor: 'GOVERNOR_ROLE',
  DecayController: 'DECAY_CONTROLLER_ROLE',
} as const;

export type Role = typeof Role[keyof typeof Role];

/** Capability queries the governance core depends on. The core never writes through it. */
export interface AccessControl {
  hasRole(role: Role, account: Address): boolean;
  isActiveGuardian(account: Address): boolean;
}

/**
 * Roles and guardian expirations live in chain state, so they persist with
 * it and a failed operation rolls them back with everything else.
 */
export class ProtocolAccessManager implements AccessControl {
  constructor(
    private readonly store: StateStore,
    private readonly clock: ChainClock,
  ) {}

  grantRole(role: Role, account: Address): void {
    const { roles } = this.store.state().access;
    const holders = roles[role] ?? [];
    if (!holders.includes(account)) roles[role] = [...holders, account];
  }

  revokeRole(role: Role, account: Address): void {
    const { roles } = this.store.state().access;
    roles[role] = (roles[role] ?? []).filter((holder) => holder !== account);
  }

  setGuardianExpiration(account: Address, expiration: number): void {
    this.store.state().access.guardians[account] = expiration;
    this.store.emit('access.guardian.updated', { account, expiration });
  }

  hasRole(role: Role, account: Address): boolean {
    return this.store.state().access.roles[role]?.includes(account) ?? false;
  }

  guardianExpiration(account: Address): number | null {
    return this.store.state().access.guardians[account] ?? null;
  }

  isActiveGuardian(account: Address): boolean {
    const expiration = this.guardianExpiration(account);
    return expiration !== null && expiration > this.clock.now();
  }
}
