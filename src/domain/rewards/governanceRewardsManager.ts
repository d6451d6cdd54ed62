/**
 * Staking rewards for governance participants.
 *
 * Accrual follows the usual reward-per-token scheme over a fixed
 * distribution period. What an account can claim is its raw accrual scaled
 * by a smoothed decay factor, an exponential moving average of its decay
 * factor, so one sharp decay step does not wipe out accrued rewards.
 *
 * Every entry point refreshes the account's decay before touching rewards.
 */

import { ZeroAddress } from 'ethers';
import { DomainError, ErrorCode } from '../../errors/taxonomy.js';
import type { StateStore } from '../../infra/storage/stateStore.js';
import type { Address, SystemAddresses } from '../../types.js';
import { type AccessControl, Role } from '../access/accessControl.js';
import type { ChainClock } from '../chain/clock.js';
import type { DecayLedger } from '../decay/decayLedger.js';
import { WAD, smooth } from '../decay/decayMath.js';
import type { DelegationGraph } from '../delegation/delegationGraph.js';
import type { ProtocolConfig } from '../protocol.js';
import type { TokenLedger } from '../token/tokenLedger.js';
import type { RewardTokenState } from './rewardsTypes.js';

export interface ClaimedReward {
  rewardToken: Address;
  raw: bigint;
  paid: bigint;
}

export class GovernanceRewardsManager {
  constructor(
    private readonly store: StateStore,
    private readonly clock: ChainClock,
    private readonly access: AccessControl,
    private readonly decay: DecayLedger,
    private readonly token: TokenLedger,
    private readonly graph: DelegationGraph,
    private readonly addresses: SystemAddresses,
    private readonly protocol: ProtocolConfig,
  ) {}

  totalStaked(): bigint {
    return this.store.state().rewards.totalStaked;
  }

  balanceOf(account: Address): bigint {
    return this.store.state().rewards.stakes[account] ?? 0n;
  }

  rewardTokens(): Address[] {
    return Object.keys(this.store.state().rewards.tokens);
  }

  stake(account: Address, amount: bigint): void {
    this.requirePositive(amount);
    this.beforeEntry(account);

    // staked units must land in a pool, so an undelegated staker self-delegates
    if (this.graph.delegateOf(account) === ZeroAddress) {
      this.graph.delegate(account, account);
    }

    const rewards = this.store.state().rewards;
    rewards.stakes[account] = this.balanceOf(account) + amount;
    rewards.totalStaked += amount;
    this.token.depositStake(account, amount);

    this.store.emit('rewards.staked', { account, amount });
  }

  unstake(account: Address, amount: bigint): void {
    this.requirePositive(amount);
    this.beforeEntry(account);

    const staked = this.balanceOf(account);
    if (staked < amount) {
      throw new DomainError(ErrorCode.InsufficientStake, 400, 'Unstake amount exceeds the staked balance.', {
        account,
        staked: staked.toString(),
        amount: amount.toString(),
      });
    }

    const rewards = this.store.state().rewards;
    rewards.stakes[account] = staked - amount;
    rewards.totalStaked -= amount;
    this.token.withdrawStake(account, amount);

    this.store.emit('rewards.unstaked', { account, amount });
  }

  notifyRewardAmount(caller: Address, rewardToken: Address, reward: bigint, duration: number): void {
    if (!this.access.hasRole(Role.Governor, caller)) {
      throw new DomainError(ErrorCode.Unauthorized, 403, 'Caller lacks the governor role.', { caller });
    }
    this.requirePositive(reward);
    if (!Number.isInteger(duration) || duration <= 0) {
      throw new DomainError(ErrorCode.InvalidPayload, 400, 'Reward duration must be a positive number of seconds.', {
        duration,
      });
    }

    this.updateReward(null);
    const now = this.clock.now();
    const rewards = this.store.state().rewards;
    const state = rewards.tokens[rewardToken] ?? emptyRewardToken(now);
    rewards.tokens[rewardToken] = state;

    const leftover = now < state.periodFinish ? BigInt(state.periodFinish - now) * state.rewardRate : 0n;
    state.rewardRate = (reward * WAD + leftover) / BigInt(duration);
    state.lastUpdateTime = now;
    state.periodFinish = now + duration;

    this.store.emit('rewards.notified', { rewardToken, reward, duration, rewardRate: state.rewardRate });
  }

  getReward(account: Address): ClaimedReward[] {
    this.beforeEntry(account);

    const smoothed = this.store.state().rewards.smoothedDecayFactors[account] ?? WAD;
    const claimed: ClaimedReward[] = [];
    for (const [rewardToken, state] of Object.entries(this.store.state().rewards.tokens)) {
      const raw = state.rewards[account] ?? 0n;
      if (raw === 0n) continue;

      const paid = (raw * smoothed) / WAD;
      state.rewards[account] = 0n;
      state.paid[account] = (state.paid[account] ?? 0n) + paid;
      claimed.push({ rewardToken, raw, paid });
      this.store.emit('rewards.claimed', { account, rewardToken, raw, paid });
    }
    return claimed;
  }

  // ─── Views ──────────────────────────────────────────────────────────

  rewardPerToken(rewardToken: Address): bigint {
    const { rewards } = this.store.state();
    const state = rewards.tokens[rewardToken];
    if (!state) return 0n;
    if (rewards.totalStaked === 0n) return state.rewardPerTokenStored;

    const elapsed = BigInt(this.lastTimeRewardApplicable(state) - state.lastUpdateTime);
    return state.rewardPerTokenStored + (elapsed * state.rewardRate) / rewards.totalStaked;
  }

  /** Accrued rewards before smoothing. */
  rawEarned(account: Address, rewardToken: Address): bigint {
    const state = this.store.state().rewards.tokens[rewardToken];
    if (!state) return 0n;
    const pending = this.rewardPerToken(rewardToken) - (state.userRewardPerTokenPaid[account] ?? 0n);
    return (this.balanceOf(account) * pending) / WAD + (state.rewards[account] ?? 0n);
  }

  earned(account: Address, rewardToken: Address): bigint {
    return (this.rawEarned(account, rewardToken) * this.calculateSmoothedDecayFactor(account)) / WAD;
  }

  smoothedDecayFactor(account: Address): bigint {
    return this.store.state().rewards.smoothedDecayFactors[account] ?? WAD;
  }

  /** Smoothed factor an update would store now; no mutation. */
  calculateSmoothedDecayFactor(account: Address): bigint {
    const previous = this.store.state().rewards.smoothedDecayFactors[account] ?? 0n;
    return smooth(this.decay.projectedFactor(account), previous, this.protocol.smoothingFactor);
  }

  updateSmoothedFactor(account: Address): bigint {
    const next = this.calculateSmoothedDecayFactor(account);
    this.store.state().rewards.smoothedDecayFactors[account] = next;
    return next;
  }

  // ─── Internals ──────────────────────────────────────────────────────

  private beforeEntry(account: Address): void {
    this.decay.refresh(this.addresses.rewardsManager, account);
    this.updateReward(account);
  }

  private updateReward(account: Address | null): void {
    for (const [rewardToken, state] of Object.entries(this.store.state().rewards.tokens)) {
      state.rewardPerTokenStored = this.rewardPerToken(rewardToken);
      state.lastUpdateTime = this.lastTimeRewardApplicable(state);
      if (account) {
        state.rewards[account] = this.rawEarned(account, rewardToken);
        state.userRewardPerTokenPaid[account] = state.rewardPerTokenStored;
      }
    }
    if (account) this.updateSmoothedFactor(account);
  }

  private lastTimeRewardApplicable(state: RewardTokenState): number {
    return Math.min(this.clock.now(), state.periodFinish);
  }

  private requirePositive(amount: bigint): void {
    if (amount <= 0n) {
      throw new DomainError(ErrorCode.InvalidPayload, 400, 'Amount must be positive.', { amount: amount.toString() });
    }
  }
}

const emptyRewardToken = (now: number): RewardTokenState => ({
  rewardRate: 0n,
  periodFinish: now,
  lastUpdateTime: now,
  rewardPerTokenStored: 0n,
  userRewardPerTokenPaid: {},
  rewards: {},
  paid: {},
});
