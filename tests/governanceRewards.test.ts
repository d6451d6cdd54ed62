import { beforeEach, describe, expect, it } from 'vitest';
import { WAD } from '../src/domain/decay/decayMath.js';
import {
  ALICE,
  BOB,
  CAROL,
  DAY,
  REWARD_TOKEN,
  type TestNetwork,
  WALLET,
  captureError,
  createTestNetwork,
  wad,
} from './helpers/governanceFixture.js';

// a tenth of a year at 10%/yr is exactly 1% of decay
const TENTH_OF_A_YEAR = 3_155_760;

describe('GovernanceRewardsManager', () => {
  let net: TestNetwork;

  beforeEach(() => {
    net = createTestNetwork();
    net.hub.mint(ALICE, wad('100'));
    net.hub.mint(BOB, wad('300'));
  });

  it('moves staked tokens into the manager without changing voting units', () => {
    net.hub.stake(ALICE, wad('40'));

    expect(net.hub.token.balanceOf(ALICE)).toBe(wad('60'));
    expect(net.hub.token.balanceOf(net.hub.addresses.rewardsManager)).toBe(wad('40'));
    expect(net.hub.rewards.balanceOf(ALICE)).toBe(wad('40'));
    expect(net.hub.rewards.totalStaked()).toBe(wad('40'));
    expect(net.hub.votes.votingUnits(ALICE)).toBe(wad('100'));
    expect(net.hub.delegation.delegateOf(ALICE)).toBe(ALICE);
  });

  it('keeps an existing delegation when staking', () => {
    net.hub.delegate(ALICE, BOB);
    net.hub.stake(ALICE, wad('40'));

    expect(net.hub.delegation.delegateOf(ALICE)).toBe(BOB);
    expect(net.hub.votes.pooledUnits(BOB)).toBe(wad('400'));
  });

  it('returns tokens on unstake and refuses to unstake more than staked', () => {
    net.hub.stake(ALICE, wad('40'));
    net.hub.unstake(ALICE, wad('15'));

    expect(net.hub.token.balanceOf(ALICE)).toBe(wad('75'));
    expect(net.hub.rewards.balanceOf(ALICE)).toBe(wad('25'));
    expect(captureError(() => net.hub.unstake(ALICE, wad('26'))).code).toBe('insufficient_stake');
  });

  it('moves a vesting wallet stake out of the beneficiary pool and back', () => {
    net.hub.mint(WALLET, wad('40'));
    net.hub.registerVestingWallet(CAROL, WALLET);
    net.hub.stake(WALLET, wad('40'));

    expect(net.hub.votes.votingUnits(CAROL)).toBe(0n);
    expect(net.hub.votes.pooledUnits(CAROL)).toBe(0n);
    expect(net.hub.votes.votingUnits(WALLET)).toBe(wad('40'));
    expect(net.hub.votes.pooledUnits(WALLET)).toBe(wad('40'));

    net.hub.unstake(WALLET, wad('40'));

    expect(net.hub.votes.pooledUnits(WALLET)).toBe(0n);
    expect(net.hub.votes.pooledUnits(CAROL)).toBe(wad('40'));
    expect(net.hub.votes.getVotes(CAROL)).toBe(wad('40'));
  });

  it('refuses plain transfers into the staking holder', () => {
    const error = captureError(() => net.hub.transfer(ALICE, net.hub.addresses.rewardsManager, wad('1')));

    expect(error.code).toBe('invalid_payload');
    expect(net.hub.token.balanceOf(ALICE)).toBe(wad('100'));
    expect(net.hub.votes.pooledUnits(ALICE)).toBe(wad('100'));
  });

  it('only lets the governor role fund rewards', () => {
    const error = captureError(() => net.hub.store.transaction(
      () => net.hub.rewards.notifyRewardAmount(ALICE, REWARD_TOKEN, wad('1'), 100),
    ));
    expect(error.code).toBe('unauthorized');
    expect(captureError(() => net.hub.notifyRewardAmount(REWARD_TOKEN, wad('1'), 0)).code).toBe('invalid_payload');
  });

  it('accrues rewards pro rata over the distribution period', () => {
    net.hub.stake(ALICE, wad('100'));
    net.hub.notifyRewardAmount(REWARD_TOKEN, wad('1000'), 1_000);
    net.clock.advance(500);

    expect(net.hub.rewards.rewardPerToken(REWARD_TOKEN)).toBe(wad('5'));
    expect(net.hub.rewards.rawEarned(ALICE, REWARD_TOKEN)).toBe(wad('500'));
    expect(net.hub.rewards.earned(ALICE, REWARD_TOKEN)).toBe(wad('500'));
  });

  it('splits accrual between stakers by stake', () => {
    net.hub.stake(ALICE, wad('100'));
    net.hub.stake(BOB, wad('300'));
    net.hub.notifyRewardAmount(REWARD_TOKEN, wad('1000'), 1_000);
    net.clock.advance(2_000);

    expect(net.hub.rewards.rawEarned(ALICE, REWARD_TOKEN)).toBe(wad('250'));
    expect(net.hub.rewards.rawEarned(BOB, REWARD_TOKEN)).toBe(wad('750'));
  });

  it('scales claims by the smoothed decay factor', () => {
    net.hub.stake(ALICE, wad('100'));
    net.hub.notifyRewardAmount(REWARD_TOKEN, wad('1000'), 1_000);
    net.clock.advance(30 * DAY + TENTH_OF_A_YEAR);

    expect(net.hub.decay.projectedFactor(ALICE)).toBe(990_000_000_000_000_000n);
    expect(net.hub.rewards.calculateSmoothedDecayFactor(ALICE)).toBe(998_000_000_000_000_000n);
    expect(net.hub.rewards.smoothedDecayFactor(ALICE)).toBe(WAD);
    expect(net.hub.rewards.earned(ALICE, REWARD_TOKEN)).toBe(wad('998'));

    expect(net.hub.getReward(ALICE)).toEqual([{ rewardToken: REWARD_TOKEN, raw: wad('1000'), paid: wad('998') }]);
    expect(net.hub.rewards.smoothedDecayFactor(ALICE)).toBe(998_000_000_000_000_000n);
    expect(net.hub.rewards.rawEarned(ALICE, REWARD_TOKEN)).toBe(0n);
    expect(net.hub.getReward(ALICE)).toEqual([]);

    const claimed = net.events.filter((entry) => entry.event === 'rewards.claimed');
    expect(claimed).toHaveLength(1);
  });

  it('rolls leftover rewards into a new period', () => {
    net.hub.stake(ALICE, wad('100'));
    net.hub.notifyRewardAmount(REWARD_TOKEN, wad('1000'), 1_000);
    net.clock.advance(500);
    net.hub.notifyRewardAmount(REWARD_TOKEN, wad('500'), 1_000);
    net.clock.advance(1_000);

    expect(net.hub.rewards.rawEarned(ALICE, REWARD_TOKEN)).toBe(wad('1500'));
  });
});
