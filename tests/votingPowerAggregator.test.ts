import { beforeEach, describe, expect, it } from 'vitest';
import { SECONDS_PER_YEAR } from '../src/domain/decay/decayMath.js';
import {
  ALICE,
  BOB,
  CAROL,
  DAVE,
  DAY,
  T0,
  type TestNetwork,
  WALLET,
  captureError,
  createTestNetwork,
  wad,
} from './helpers/governanceFixture.js';

describe('VotingPowerAggregator', () => {
  let net: TestNetwork;

  beforeEach(() => {
    net = createTestNetwork();
  });

  it('discounts each delegator by its own decay factor', () => {
    net.hub.mint(ALICE, wad('200'));
    net.hub.delegate(ALICE, BOB);

    net.clock.advance(DAY);
    net.hub.mint(BOB, wad('100'));
    net.clock.advance(30 * DAY);

    // ALICE's window closed a day ago; BOB's is still open.
    expect(net.hub.decay.projectedFactor(ALICE)).toBe(999_726_214_921_286_790n);
    expect(net.hub.decay.projectedFactor(BOB)).toBe(wad('1'));
    expect(net.hub.votes.getVotes(BOB)).toBe(299_945_242_984_257_358_000n);
    expect(net.hub.votes.pooledUnits(BOB)).toBe(wad('300'));
  });

  it('answers historical lookups from checkpoints', () => {
    net.hub.mint(ALICE, wad('200'));
    net.hub.mint(BOB, wad('100'));
    net.hub.delegate(ALICE, BOB);
    net.clock.advance(10);
    net.hub.transfer(BOB, CAROL, wad('40'));
    net.clock.advance(10);

    expect(net.hub.votes.getPastVotes(BOB, T0 - 1)).toBe(0n);
    expect(net.hub.votes.getPastVotes(BOB, T0)).toBe(wad('300'));
    expect(net.hub.votes.getPastVotes(BOB, T0 + 10)).toBe(wad('260'));
    expect(net.hub.votes.getPastVotes(CAROL, T0 + 10)).toBe(wad('40'));
    expect(net.hub.votes.getPastTotalSupply(T0 + 10)).toBe(wad('300'));
    expect(net.hub.votes.checkpoints(BOB)).toEqual([
      { timestamp: T0, units: wad('300') },
      { timestamp: T0 + 10, units: wad('260') },
    ]);
  });

  it('refuses lookups at or after the current time', () => {
    net.hub.mint(ALICE, wad('1'));

    const error = captureError(() => net.hub.votes.getPastVotes(ALICE, T0));
    expect(error.code).toBe('future_lookup');
    expect(captureError(() => net.hub.votes.getPastTotalSupply(T0 + 5)).code).toBe('future_lookup');
  });

  it('scales past units by the current decay factor', () => {
    net.hub.mint(ALICE, wad('200'));
    net.hub.delegate(ALICE, ALICE);
    net.clock.advance(31 * DAY);

    expect(net.hub.votes.getVotesAt(ALICE, T0)).toBe(199_945_242_984_257_358_000n);
  });

  it('weights historical delegated units by the delegator decay, not the delegate', () => {
    net.hub.mint(DAVE, wad('1500'));
    net.hub.delegate(DAVE, CAROL);
    // five years past the window at 10%/yr linear halves DAVE's weight
    net.clock.advance(30 * DAY + 5 * SECONDS_PER_YEAR);
    const before = net.clock.now() - 1;

    expect(net.hub.decay.projectedFactor(CAROL)).toBe(wad('1'));
    expect(net.hub.votes.getPastVotes(CAROL, before)).toBe(wad('1500'));
    expect(net.hub.votes.getVotesAt(CAROL, before)).toBe(wad('750'));
    expect(net.hub.votes.getVotes(CAROL)).toBe(wad('750'));
  });

  it('only counts holders that resolved to the account at the timepoint', () => {
    net.hub.mint(ALICE, wad('100'));
    net.hub.mint(BOB, wad('50'));
    net.clock.advance(10);
    net.hub.delegate(ALICE, BOB);
    net.clock.advance(10);
    net.hub.delegate(ALICE, CAROL);
    net.hub.transfer(BOB, CAROL, wad('20'));
    net.clock.advance(10);

    expect(net.hub.votes.getVotesAt(BOB, T0)).toBe(wad('50'));
    expect(net.hub.votes.getVotesAt(BOB, T0 + 10)).toBe(wad('150'));
    expect(net.hub.votes.getVotesAt(BOB, T0 + 20)).toBe(wad('30'));
    expect(net.hub.votes.getVotesAt(CAROL, T0 + 20)).toBe(wad('120'));
    expect(net.hub.votes.getVotesAt(ALICE, T0 + 20)).toBe(0n);
  });

  it('counts staked balances once, for the staker', () => {
    net.hub.mint(ALICE, wad('100'));
    net.hub.stake(ALICE, wad('40'));

    expect(net.hub.token.balanceOf(ALICE)).toBe(wad('60'));
    expect(net.hub.votes.votingUnits(ALICE)).toBe(wad('100'));
    expect(net.hub.votes.votingUnits(net.hub.addresses.rewardsManager)).toBe(0n);
    expect(net.hub.votes.pooledUnits(ALICE)).toBe(wad('100'));
    expect(net.hub.votes.getVotes(ALICE)).toBe(wad('100'));
  });

  it('credits a vesting wallet balance to its beneficiary', () => {
    net.hub.mint(CAROL, wad('10'));
    net.hub.mint(WALLET, wad('40'));
    expect(net.hub.votes.pooledUnits(WALLET)).toBe(wad('40'));

    net.hub.registerVestingWallet(CAROL, WALLET);
    expect(net.hub.votes.votingUnits(WALLET)).toBe(0n);
    expect(net.hub.votes.votingUnits(CAROL)).toBe(wad('50'));
    expect(net.hub.votes.pooledUnits(WALLET)).toBe(0n);
    expect(net.hub.votes.pooledUnits(CAROL)).toBe(wad('50'));

    net.hub.mint(WALLET, wad('5'));
    expect(net.hub.votes.pooledUnits(CAROL)).toBe(wad('55'));
  });

  it('follows the beneficiary when it delegates', () => {
    net.hub.mint(WALLET, wad('40'));
    net.hub.registerVestingWallet(CAROL, WALLET);
    net.hub.delegate(CAROL, BOB);

    expect(net.hub.votes.pooledUnits(CAROL)).toBe(0n);
    expect(net.hub.votes.pooledUnits(BOB)).toBe(wad('40'));
  });

  it('rejects a second wallet for the same beneficiary', () => {
    net.hub.registerVestingWallet(CAROL, WALLET);
    expect(captureError(() => net.hub.registerVestingWallet(CAROL, ALICE)).code).toBe('invalid_payload');
  });

  it('gives nothing to accounts that delegated away', () => {
    net.hub.mint(ALICE, wad('10'));
    net.hub.delegate(ALICE, BOB);

    expect(net.hub.votes.getVotes(ALICE)).toBe(0n);
    expect(net.hub.votes.getVotes(BOB)).toBe(wad('10'));
  });
});
