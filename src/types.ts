import type { DecayState } from './domain/decay/decayTypes.js';
import type { GovernorState, TimelockState } from './domain/governance/governanceTypes.js';
import type { RelayState } from './domain/relay/relayTypes.js';
import type { RewardsState } from './domain/rewards/rewardsTypes.js';

/** Checksummed 0x-prefixed 20-byte account handle. */
export type Address = string;

export interface Checkpoint {
  timestamp: number;
  units: bigint;
}

/** Effective delegate a holder resolved to from `timestamp` on. */
export interface ResolutionCheckpoint {
  timestamp: number;
  delegate: Address;
}

export interface TokenState {
  balances: Record<Address, bigint>;
  totalSupply: bigint;
  /** beneficiary -> vesting wallet */
  vestingWalletOf: Record<Address, Address>;
  /** vesting wallet -> beneficiary */
  beneficiaryOf: Record<Address, Address>;
}

export interface DelegationState {
  /** Outgoing edge per account. Absent means no delegate (terminal). */
  delegates: Record<Address, Address>;
  /** Reverse index: target -> accounts pointing at it. */
  delegators: Record<Address, Address[]>;
}

export interface VotingState {
  /** Voting units currently pooled at each effective delegate. */
  pools: Record<Address, bigint>;
  checkpoints: Record<Address, Checkpoint[]>;
  supplyCheckpoints: Checkpoint[];
  /** Each holder's own voting units over time. */
  unitCheckpoints: Record<Address, Checkpoint[]>;
  /** Effective delegate history; a holder without entries resolved to itself. */
  resolutions: Record<Address, ResolutionCheckpoint[]>;
}

export interface AccessState {
  /** role -> holders */
  roles: Record<string, Address[]>;
  /** guardian -> expiration timestamp */
  guardians: Record<Address, number>;
}

export interface ChainState {
  eid: number;
  access: AccessState;
  decay: DecayState;
  token: TokenState;
  delegation: DelegationState;
  voting: VotingState;
  governor: GovernorState;
  timelock: TimelockState;
  relay: RelayState;
  rewards: RewardsState;
  /** Native gas-token balances used for relay fees and call values. */
  native: Record<Address, bigint>;
}

export interface SystemAddresses {
  governor: Address;
  timelock: Address;
  token: Address;
  /** Rewards manager, also the internal staking holder. */
  rewardsManager: Address;
}

export interface RuntimeMetrics {
  uptimeSeconds: number;
  pendingPackets: number;
  processPid: number;
  wsClients: number;
}
