/**
 * Voting power aggregation.
 *
 * An account's voting units are its wallet balance, its staked balance and
 * the balance of its vesting wallet. Units pool at the account's effective
 * delegate, where they are checkpointed. Live voting weight discounts each
 * holder's units by that holder's own decay factor before pooling.
 *
 * Staked balances sit with the rewards manager but keep counting for the
 * staker, so a stake or unstake only moves units when the staker and the
 * owner of the moved balance differ (a vesting wallet staking for itself).
 */

import { ZeroAddress } from 'ethers';
import { DomainError, ErrorCode } from '../../errors/taxonomy.js';
import type { StateStore } from '../../infra/storage/stateStore.js';
import type { Address, Checkpoint, SystemAddresses } from '../../types.js';
import type { ChainClock } from '../chain/clock.js';
import type { DecayLedger } from '../decay/decayLedger.js';
import { WAD } from '../decay/decayMath.js';
import type { DelegationGraph, ResolutionChange } from '../delegation/delegationGraph.js';
import type { ProtocolConfig } from '../protocol.js';
import { latestUnits, pushCheckpoint, pushResolution, resolutionAt, upperLookup } from './checkpoints.js';

export class VotingPowerAggregator {
  constructor(
    private readonly store: StateStore,
    private readonly clock: ChainClock,
    private readonly graph: DelegationGraph,
    private readonly decay: DecayLedger,
    private readonly addresses: SystemAddresses,
    private readonly protocol: ProtocolConfig,
  ) {
    graph.setResolutionListener((changes) => this.onResolutionChanged(changes));
  }

  votingUnits(account: Address): bigint {
    const { token, rewards } = this.store.state();
    if (account === ZeroAddress || account === this.addresses.rewardsManager) return 0n;

    const own = token.beneficiaryOf[account] ? 0n : token.balances[account] ?? 0n;
    const staked = rewards.stakes[account] ?? 0n;
    const wallet = token.vestingWalletOf[account];
    const vesting = wallet ? token.balances[wallet] ?? 0n : 0n;

    return own + staked + vesting;
  }

  /** Raw units currently pooled at `account`. */
  pooledUnits(account: Address): bigint {
    return this.store.state().voting.pools[account] ?? 0n;
  }

  /**
   * Live decay-weighted votes: every holder resolving to `account`
   * contributes `units * ownFactor / WAD`.
   */
  getVotes(account: Address): bigint {
    if (account === ZeroAddress || !this.graph.isTerminal(account)) return 0n;

    const contributors = [account, ...this.graph.upstream(account, this.protocol.maxDelegationDepth)];
    return contributors.reduce((total, holder) => {
      if (this.graph.effectiveDelegate(holder) !== account) return total;
      return total + (this.votingUnits(holder) * this.decay.projectedFactor(holder)) / WAD;
    }, 0n);
  }

  getPastVotes(account: Address, timepoint: number): bigint {
    this.requirePast(timepoint);
    return upperLookup(this.store.state().voting.checkpoints[account] ?? [], timepoint);
  }

  /**
   * Decay-weighted votes at `timepoint`: every holder that resolved to
   * `account` then contributes its units at that time, discounted by the
   * holder's own current decay factor.
   */
  getVotesAt(account: Address, timepoint: number): bigint {
    this.requirePast(timepoint);
    if (account === ZeroAddress) return 0n;

    const { unitCheckpoints } = this.store.state().voting;
    return this.contributorsAt(account, timepoint).reduce((total, holder) => {
      const units = upperLookup(unitCheckpoints[holder] ?? [], timepoint);
      return total + (units * this.decay.projectedFactor(holder)) / WAD;
    }, 0n);
  }

  getPastTotalSupply(timepoint: number): bigint {
    this.requirePast(timepoint);
    return upperLookup(this.store.state().voting.supplyCheckpoints, timepoint);
  }

  checkpoints(account: Address): Checkpoint[] {
    return (this.store.state().voting.checkpoints[account] ?? []).map((checkpoint) => ({ ...checkpoint }));
  }

  // ─── Mutation hooks ─────────────────────────────────────────────────

  /** Balance moved between two holders; mint and burn use the zero address. */
  onTransfer(from: Address, to: Address, amount: bigint): void {
    if (amount === 0n) return;

    if (from === ZeroAddress || to === ZeroAddress) {
      const supply = this.store.state().voting.supplyCheckpoints;
      const current = latestUnits(supply);
      pushCheckpoint(supply, this.clock.now(), from === ZeroAddress ? current + amount : current - amount);
    }

    const staking = this.addresses.rewardsManager;
    const fromOwner = from === staking ? to : this.unitsOwner(from);
    const toOwner = to === staking ? from : this.unitsOwner(to);

    if (fromOwner === toOwner) return;
    if (fromOwner !== ZeroAddress) this.shiftPool(this.graph.effectiveDelegate(fromOwner), -amount);
    if (toOwner !== ZeroAddress) this.shiftPool(this.graph.effectiveDelegate(toOwner), amount);
    this.recordUnits(fromOwner);
    this.recordUnits(toOwner);
  }

  /** A wallet's existing balance starts counting for its beneficiary. */
  onVestingWalletRegistered(beneficiary: Address, wallet: Address, walletBalance: bigint): void {
    if (walletBalance === 0n) return;
    const previousPool = this.graph.effectiveDelegate(wallet);
    const nextPool = this.graph.effectiveDelegate(beneficiary);
    this.recordUnits(beneficiary);
    this.recordUnits(wallet);
    if (previousPool === nextPool) return;
    this.shiftPool(previousPool, -walletBalance);
    this.shiftPool(nextPool, walletBalance);
  }

  private onResolutionChanged(changes: ResolutionChange[]): void {
    const { resolutions } = this.store.state().voting;
    const now = this.clock.now();

    for (const { account, previous, next } of changes) {
      const trace = resolutions[account] ?? [];
      resolutions[account] = trace;
      pushResolution(trace, now, next);

      const units = this.votingUnits(account);
      if (units === 0n) continue;
      this.shiftPool(previous, -units);
      this.shiftPool(next, units);
    }
  }

  /** Holders whose units pooled at `account` at `timepoint`. */
  private contributorsAt(account: Address, timepoint: number): Address[] {
    const { resolutions } = this.store.state().voting;
    const candidates = new Set<Address>([account]);
    for (const [holder, trace] of Object.entries(resolutions)) {
      if (trace.some((entry) => entry.delegate === account)) candidates.add(holder);
    }

    return [...candidates].filter(
      (holder) => resolutionAt(resolutions[holder] ?? [], timepoint, holder) === account,
    );
  }

  private recordUnits(holder: Address): void {
    if (holder === ZeroAddress || holder === this.addresses.rewardsManager) return;
    const { unitCheckpoints } = this.store.state().voting;
    const trace = unitCheckpoints[holder] ?? [];
    unitCheckpoints[holder] = trace;
    pushCheckpoint(trace, this.clock.now(), this.votingUnits(holder));
  }

  private unitsOwner(holder: Address): Address {
    if (holder === ZeroAddress) return ZeroAddress;
    return this.store.state().token.beneficiaryOf[holder] ?? holder;
  }

  private shiftPool(delegate: Address, delta: bigint): void {
    if (delegate === ZeroAddress || delta === 0n) return;

    const voting = this.store.state().voting;
    const previousVotes = voting.pools[delegate] ?? 0n;
    const newVotes = previousVotes + delta;
    voting.pools[delegate] = newVotes;

    const trace = voting.checkpoints[delegate] ?? [];
    voting.checkpoints[delegate] = trace;
    pushCheckpoint(trace, this.clock.now(), newVotes);

    this.store.emit('delegate.votes.changed', { delegate, previousVotes, newVotes });
  }

  private requirePast(timepoint: number): void {
    const now = this.clock.now();
    if (timepoint >= now) {
      throw new DomainError(ErrorCode.FutureLookup, 400, 'Timepoint must be in the past.', { timepoint, now });
    }
  }
}
