/**
 * Delegation graph.
 *
 * Each account has at most one outgoing edge. Edges are stored as address
 * handles, so walking a cycle is just a bounded loop. An account without an
 * edge, or pointing at itself, is terminal and keeps its votes.
 *
 * Chains that do not reach a terminal within `maxDelegationDepth` hops
 * resolve to the zero address: the units are counted nowhere.
 */

import { ZeroAddress } from 'ethers';
import { DomainError, ErrorCode } from '../../errors/taxonomy.js';
import type { StateStore } from '../../infra/storage/stateStore.js';
import type { Address } from '../../types.js';
import type { DecayLedger } from '../decay/decayLedger.js';
import type { ProtocolConfig } from '../protocol.js';

export interface ResolutionChange {
  account: Address;
  previous: Address;
  next: Address;
}

export type ResolutionListener = (changes: ResolutionChange[]) => void;

interface Walk {
  hops: number;
  terminal: Address | null;
}

export class DelegationGraph {
  private resolutionListener: ResolutionListener | null = null;

  constructor(
    private readonly store: StateStore,
    private readonly decay: DecayLedger,
    private readonly protocol: ProtocolConfig,
    /** Decay controller identity used for the refresh a delegation triggers. */
    private readonly controller: Address,
  ) {}

  /** Called with every account whose effective delegate moved. */
  setResolutionListener(listener: ResolutionListener): void {
    this.resolutionListener = listener;
  }

  delegateOf(account: Address): Address {
    return this.store.state().delegation.delegates[account] ?? ZeroAddress;
  }

  delegatorsOf(account: Address): Address[] {
    return [...(this.store.state().delegation.delegators[account] ?? [])];
  }

  isTerminal(account: Address): boolean {
    const next = this.store.state().delegation.delegates[account];
    return next === undefined || next === account;
  }

  delegate(from: Address, to: Address): void {
    if (from === ZeroAddress) {
      throw new DomainError(ErrorCode.ZeroAddress, 400, 'Delegator cannot be the zero address.');
    }

    const state = this.store.state();
    if (to === ZeroAddress && (state.rewards.stakes[from] ?? 0n) > 0n) {
      throw new DomainError(
        ErrorCode.CannotUndelegateWhileStaked,
        409,
        'Accounts with a staked balance must stay delegated.',
        { account: from },
      );
    }

    this.decay.refresh(this.controller, from);

    const affected = [from, ...this.upstream(from, this.protocol.maxDelegationDepth)];
    const before = affected.map((account) => this.effectiveDelegate(account));

    const previousDelegate = this.delegateOf(from);
    this.unlink(from);
    if (to !== ZeroAddress) this.link(from, to);

    const changes: ResolutionChange[] = [];
    affected.forEach((account, index) => {
      const next = this.effectiveDelegate(account);
      if (next !== before[index]) {
        changes.push({ account, previous: before[index], next });
      }
    });

    if (changes.length > 0) this.resolutionListener?.(changes);

    this.store.emit('delegate.changed', {
      delegator: from,
      fromDelegate: previousDelegate,
      toDelegate: to,
    });
  }

  /** Hops followed from `account`, never more than the configured depth. */
  resolveChainLength(account: Address): number {
    return this.walk(account).hops;
  }

  /** Terminal delegate, or the zero address when the chain is too deep or cyclic. */
  effectiveDelegate(account: Address): Address {
    return this.walk(account).terminal ?? ZeroAddress;
  }

  exceedsMaxDepth(account: Address): boolean {
    return this.walk(account).terminal === null;
  }

  /** Accounts whose chain passes through `account` within `depth` hops. */
  upstream(account: Address, depth: number): Address[] {
    const { delegators } = this.store.state().delegation;
    const seen = new Set<Address>([account]);
    const found: Address[] = [];
    let frontier = [account];

    for (let level = 0; level < depth && frontier.length > 0; level += 1) {
      const next: Address[] = [];
      for (const target of frontier) {
        for (const source of delegators[target] ?? []) {
          if (seen.has(source)) continue;
          seen.add(source);
          found.push(source);
          next.push(source);
        }
      }
      frontier = next;
    }

    return found;
  }

  private walk(account: Address): Walk {
    const { delegates } = this.store.state().delegation;
    const maxDepth = this.protocol.maxDelegationDepth;
    let current = account;
    let hops = 0;

    for (;;) {
      const next = delegates[current];
      if (next === undefined || next === current) return { hops, terminal: current };
      if (hops >= maxDepth) return { hops, terminal: null };
      current = next;
      hops += 1;
    }
  }

  private link(from: Address, to: Address): void {
    const delegation = this.store.state().delegation;
    delegation.delegates[from] = to;
    if (to === from) return;
    delegation.delegators[to] = [...(delegation.delegators[to] ?? []), from];
  }

  private unlink(from: Address): void {
    const delegation = this.store.state().delegation;
    const previous = delegation.delegates[from];
    if (previous === undefined) return;

    delete delegation.delegates[from];
    const remaining = (delegation.delegators[previous] ?? []).filter((account) => account !== from);
    if (remaining.length > 0) {
      delegation.delegators[previous] = remaining;
    } else {
      delete delegation.delegators[previous];
    }
  }
}
