export interface RewardTokenState {
  /** Tokens per second, WAD-scaled. */
  rewardRate: bigint;
  periodFinish: number;
  lastUpdateTime: number;
  rewardPerTokenStored: bigint;
  userRewardPerTokenPaid: Record<string, bigint>;
  /** Raw (unsmoothed) accrued rewards. */
  rewards: Record<string, bigint>;
  /** Smoothed amounts paid out so far. */
  paid: Record<string, bigint>;
}

export interface RewardsState {
  totalStaked: bigint;
  stakes: Record<string, bigint>;
  tokens: Record<string, RewardTokenState>;
  smoothedDecayFactors: Record<string, bigint>;
}
