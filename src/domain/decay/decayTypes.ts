/**
 * Voting decay types.
 *
 * Every governance participant carries a retention factor in [0, WAD] that
 * discounts their voting and reward weight after a period of inactivity.
 */

export type DecayFunction = 'linear' | 'exponential';

export interface AccountDecayRecord {
  decayFactor: bigint;
  lastUpdatedAt: number;
  /** No decay accrues up to and including this timestamp. */
  decayFreeWindowEnd: number;
}

export interface DecayParams {
  /** WAD fraction of retention lost per year. */
  ratePerYear: bigint;
  /** Seconds of grace granted after every refresh. */
  decayFreeWindow: number;
  decayFunction: DecayFunction;
}

export interface DecayState {
  params: DecayParams;
  accounts: Record<string, AccountDecayRecord>;
}
