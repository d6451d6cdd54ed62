/**
 * Governance proposal types.
 *
 * Proposals are created and voted on the hub chain. Satellites only hold
 * proposals relayed from the hub, which arrive already queued.
 */

export type ProposalState =
  | 'pending'
  | 'active'
  | 'cancelled'
  | 'defeated'
  | 'succeeded'
  | 'queued'
  | 'expired'
  | 'executed';

export type VoteSupport = 'against' | 'for' | 'abstain';

export interface ProposalActions {
  targets: string[];
  values: bigint[];
  calldatas: string[];
  descriptionHash: string;
}

export interface VoteReceipt {
  support: VoteSupport;
  weight: bigint;
  reason: string;
  castAt: number;
}

export interface ProposalTally {
  forVotes: bigint;
  againstVotes: bigint;
  abstainVotes: bigint;
}

export interface RelayedOrigin {
  srcEid: number;
  sourceProposalId: string;
  messageId: string;
  guid: string;
}

export interface ProposalRecord extends ProposalActions {
  /** uint256 proposal id, decimal. */
  id: string;
  proposer: string;
  description?: string;
  createdAt: number;
  voteStart: number;
  voteEnd: number;
  tally: ProposalTally;
  receipts: Record<string, VoteReceipt>;
  executed: boolean;
  cancelled: boolean;
  eta?: number;
  timelockOperationId?: string;
  relayedFrom?: RelayedOrigin;
}

export interface GovernorParams {
  votingDelay: number;
  votingPeriod: number;
  proposalThreshold: bigint;
  quorumNumerator: bigint;
}

export interface GovernorState {
  params: GovernorParams;
  proposals: Record<string, ProposalRecord>;
  /** account -> expiration timestamp of proposal-threshold exemption, kept as the full uint256. */
  whitelist: Record<string, bigint>;
}

export interface TimelockOperation {
  readyAt: number;
  done: boolean;
}

export interface TimelockState {
  minDelay: number;
  /** Seconds a queued proposal stays executable after its eta. */
  gracePeriod: number;
  operations: Record<string, TimelockOperation>;
}
