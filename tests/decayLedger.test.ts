import { beforeEach, describe, expect, it } from 'vitest';
import { WAD } from '../src/domain/decay/decayMath.js';
import {
  ALICE,
  BOB,
  DAY,
  T0,
  type TestNetwork,
  captureError,
  createTestNetwork,
  wad,
} from './helpers/governanceFixture.js';

describe('DecayLedger', () => {
  let net: TestNetwork;

  beforeEach(() => {
    net = createTestNetwork();
  });

  const refresh = (account: string) => net.hub.store.transaction(
    () => net.hub.decay.refresh(net.hub.addresses.token, account),
  );

  it('treats unknown accounts as undecayed without creating a record', () => {
    expect(net.hub.decay.getFactor(ALICE)).toBe(WAD);
    expect(net.hub.decay.projectedFactor(ALICE)).toBe(WAD);
    expect(net.hub.decay.getRecord(ALICE)).toBeNull();
  });

  it('opens a decay-free window on the first refresh', () => {
    expect(refresh(ALICE)).toEqual({
      decayFactor: WAD,
      lastUpdatedAt: T0,
      decayFreeWindowEnd: T0 + 30 * DAY,
    });
  });

  it('does not decay inside the window, including its last second', () => {
    refresh(ALICE);
    net.clock.advance(30 * DAY);

    expect(net.hub.decay.projectedFactor(ALICE)).toBe(WAD);
    expect(refresh(ALICE)).toEqual({
      decayFactor: WAD,
      lastUpdatedAt: T0,
      decayFreeWindowEnd: T0 + 30 * DAY,
    });
  });

  it('decays only for the time past the window end and reopens the window', () => {
    refresh(ALICE);
    net.clock.advance(31 * DAY);

    expect(net.hub.decay.projectedFactor(ALICE)).toBe(999_726_214_921_286_790n);
    expect(net.hub.decay.getFactor(ALICE)).toBe(WAD);

    expect(refresh(ALICE)).toEqual({
      decayFactor: 999_726_214_921_286_790n,
      lastUpdatedAt: T0 + 31 * DAY,
      decayFreeWindowEnd: T0 + 61 * DAY,
    });
  });

  it('refreshes the recipient of a mint or transfer as well as the sender', () => {
    net.clock.advance(DAY);
    net.hub.mint(ALICE, wad('10'));
    net.hub.transfer(ALICE, BOB, wad('4'));

    const opened = { decayFactor: WAD, lastUpdatedAt: T0 + DAY, decayFreeWindowEnd: T0 + 31 * DAY };
    expect(net.hub.decay.getRecord(ALICE)).toEqual(opened);
    expect(net.hub.decay.getRecord(BOB)).toEqual(opened);
  });

  it('publishes decay.updated only after the operation commits', () => {
    net.hub.store.transaction(() => {
      net.hub.decay.refresh(net.hub.addresses.token, ALICE);
      expect(net.events).toHaveLength(0);
    });

    expect(net.events).toEqual([{
      event: 'decay.updated',
      data: {
        chainId: 1,
        account: ALICE,
        previousFactor: WAD,
        decayFactor: WAD,
        decayFreeWindowEnd: T0 + 30 * DAY,
      },
    }]);
  });

  it('only lets decay controllers refresh', () => {
    const error = captureError(() => net.hub.decay.refresh(BOB, ALICE));
    expect(error.code).toBe('unauthorized');
    expect(error.statusCode).toBe(403);
  });

  it('only lets the governor role change parameters, within bounds', () => {
    const { timelock } = net.hub.addresses;

    expect(captureError(() => net.hub.decay.setDecayRatePerYear(ALICE, wad('0.2'))).code).toBe('unauthorized');
    expect(captureError(() => net.hub.decay.setDecayRatePerYear(timelock, wad('0.51'))).code)
      .toBe('invalid_decay_rate');
    expect(captureError(() => net.hub.decay.setDecayFreeWindow(timelock, 29 * DAY)).code)
      .toBe('invalid_decay_window');
    expect(captureError(() => net.hub.decay.setDecayFreeWindow(timelock, 366 * DAY)).code)
      .toBe('invalid_decay_window');

    net.hub.store.transaction(() => {
      net.hub.decay.setDecayRatePerYear(timelock, wad('0.2'));
      net.hub.decay.setDecayFreeWindow(timelock, 60 * DAY);
      net.hub.decay.setDecayFunction(timelock, 'exponential');
    });

    expect(net.hub.decay.getParams()).toEqual({
      ratePerYear: wad('0.2'),
      decayFreeWindow: 60 * DAY,
      decayFunction: 'exponential',
    });
  });

  it('applies a new window length from the next refresh on', () => {
    refresh(ALICE);
    net.hub.store.transaction(() => net.hub.decay.setDecayFreeWindow(net.hub.addresses.timelock, 60 * DAY));
    net.clock.advance(31 * DAY);

    expect(refresh(ALICE).decayFreeWindowEnd).toBe(T0 + 91 * DAY);
  });
});
