import { DomainError, ErrorCode } from '../../errors/taxonomy.js';
import type { StateStore } from '../../infra/storage/stateStore.js';
import type { Address } from '../../types.js';
import type { DecayLedger } from '../decay/decayLedger.js';
import type { ProtocolConfig } from '../protocol.js';
import type { VotingPowerAggregator } from '../voting/votingPowerAggregator.js';
import type { ProposalTally } from './governanceTypes.js';
import type { Timelock } from './timelock.js';

/** Proposal threshold, kept inside the protocol band. */
export class ThresholdPolicy {
  constructor(
    private readonly store: StateStore,
    private readonly protocol: ProtocolConfig,
  ) {
    this.validate(this.current());
  }

  current(): bigint {
    return this.store.state().governor.params.proposalThreshold;
  }

  set(threshold: bigint): void {
    this.validate(threshold);
    this.store.state().governor.params.proposalThreshold = threshold;
  }

  private validate(threshold: bigint): void {
    if (threshold < this.protocol.minProposalThreshold || threshold > this.protocol.maxProposalThreshold) {
      throw new DomainError(ErrorCode.InvalidThreshold, 400, 'Proposal threshold is outside the allowed band.', {
        threshold: threshold.toString(),
        min: this.protocol.minProposalThreshold.toString(),
        max: this.protocol.maxProposalThreshold.toString(),
      });
    }
  }
}

/** Fraction of past total supply that must take part (for + abstain). */
export class QuorumPolicy {
  constructor(
    private readonly store: StateStore,
    private readonly votes: VotingPowerAggregator,
    private readonly protocol: ProtocolConfig,
  ) {}

  numerator(): bigint {
    return this.store.state().governor.params.quorumNumerator;
  }

  quorum(timepoint: number): bigint {
    return (this.votes.getPastTotalSupply(timepoint) * this.numerator()) / this.protocol.quorumDenominator;
  }

  reached(tally: ProposalTally, snapshot: number): boolean {
    return tally.forVotes + tally.abstainVotes >= this.quorum(snapshot);
  }

  setNumerator(numerator: bigint): void {
    if (numerator < 0n || numerator > this.protocol.quorumDenominator) {
      throw new DomainError(ErrorCode.InvalidQuorum, 400, 'Quorum numerator exceeds the denominator.', {
        numerator: numerator.toString(),
        denominator: this.protocol.quorumDenominator.toString(),
      });
    }
    this.store.state().governor.params.quorumNumerator = numerator;
  }
}

/** Brings an account's decay up to date before its votes are counted. */
export class DecayPolicy {
  constructor(
    private readonly decay: DecayLedger,
    private readonly controller: Address,
  ) {}

  beforeCount(account: Address): void {
    this.decay.refresh(this.controller, account);
  }
}

export interface GovernorPolicies {
  threshold: ThresholdPolicy;
  quorum: QuorumPolicy;
  timelock: Timelock;
  decay: DecayPolicy;
}
