/**
 * Governor proposal lifecycle.
 *
 *   pending -> active -> succeeded -> queued -> executed
 *                    \-> defeated          \-> expired
 *   pending | active | queued -> cancelled
 *
 * Proposals are created and voted on the hub. A satellite only holds
 * proposals relayed from the hub; they start out queued and run their calls
 * directly, without scheduling on the local timelock.
 */

import { getAddress, isAddress } from 'ethers';
import { DomainError, ErrorCode } from '../../errors/taxonomy.js';
import type { StateStore } from '../../infra/storage/stateStore.js';
import type { Address, SystemAddresses } from '../../types.js';
import type { AccessControl } from '../access/accessControl.js';
import type { ChainClock } from '../chain/clock.js';
import type { VotingPowerAggregator } from '../voting/votingPowerAggregator.js';
import { type CallRouter, toActions } from './callRouter.js';
import type {
  GovernorParams,
  ProposalActions,
  ProposalRecord,
  ProposalState,
  RelayedOrigin,
  VoteSupport,
} from './governanceTypes.js';
import type { GovernorPolicies } from './policies.js';
import {
  hashDescription,
  hashProposal,
  isValidDescriptionForProposer,
  timelockSalt,
} from './proposalHashing.js';
import type { ScheduledBatch } from './timelock.js';

export interface ProposeInput {
  targets: string[];
  values: bigint[];
  calldatas: string[];
  description: string;
}

const CANCELLABLE: ProposalState[] = ['pending', 'active', 'queued'];

export class ProposalStateMachine {
  private executing: string | null = null;

  constructor(
    private readonly store: StateStore,
    private readonly clock: ChainClock,
    private readonly access: AccessControl,
    private readonly votes: VotingPowerAggregator,
    private readonly router: CallRouter,
    private readonly policies: GovernorPolicies,
    private readonly addresses: SystemAddresses,
    readonly isHub: boolean,
  ) {}

  params(): GovernorParams {
    return { ...this.store.state().governor.params };
  }

  proposalThreshold(): bigint {
    return this.policies.threshold.current();
  }

  quorum(timepoint: number): bigint {
    return this.policies.quorum.quorum(timepoint);
  }

  getProposal(proposalId: string): ProposalRecord {
    const proposal = this.store.state().governor.proposals[proposalId];
    if (!proposal) {
      throw new DomainError(ErrorCode.ProposalNotFound, 404, 'Proposal not found.', { proposalId });
    }
    return proposal;
  }

  listProposals(): ProposalRecord[] {
    return Object.values(this.store.state().governor.proposals).sort((a, b) => a.createdAt - b.createdAt);
  }

  hasVoted(proposalId: string, account: Address): boolean {
    return this.getProposal(proposalId).receipts[account] !== undefined;
  }

  /** False for unknown ids as well as for proposals not yet executed. */
  isExecuted(proposalId: string): boolean {
    return this.store.state().governor.proposals[proposalId]?.executed ?? false;
  }

  /** Proposal whose calls are running right now, if any. */
  executingProposal(): string | null {
    return this.executing;
  }

  isWhitelisted(account: Address): boolean {
    return (this.store.state().governor.whitelist[account] ?? 0n) > BigInt(this.clock.now());
  }

  state(proposalId: string): ProposalState {
    const proposal = this.getProposal(proposalId);
    if (proposal.executed) return 'executed';
    if (proposal.cancelled) return 'cancelled';

    const now = this.clock.now();
    if (!proposal.relayedFrom) {
      if (now <= proposal.voteStart) return 'pending';
      if (now <= proposal.voteEnd) return 'active';
      if (!this.succeeded(proposal)) return 'defeated';
    }

    if (proposal.eta === undefined) return 'succeeded';
    if (now > proposal.eta + this.policies.timelock.gracePeriod()) return 'expired';
    return 'queued';
  }

  propose(proposer: Address, input: ProposeInput): string {
    this.requireHub('propose');

    const { targets, values, calldatas, description } = input;
    if (targets.length === 0 || targets.length !== values.length || targets.length !== calldatas.length) {
      throw new DomainError(ErrorCode.InvalidProposalLength, 400, 'Proposal arrays must be non-empty and equal length.', {
        targets: targets.length,
        values: values.length,
        calldatas: calldatas.length,
      });
    }

    if (!isValidDescriptionForProposer(proposer, description)) {
      throw new DomainError(ErrorCode.RestrictedProposer, 403, 'Description is restricted to another proposer.', {
        proposer,
      });
    }

    const now = this.clock.now();
    if (!this.access.isActiveGuardian(proposer) && !this.isWhitelisted(proposer)) {
      const proposerVotes = this.votes.getVotesAt(proposer, now - 1);
      const threshold = this.policies.threshold.current();
      if (proposerVotes < threshold) {
        throw new DomainError(ErrorCode.BelowThreshold, 403, 'Proposer votes are below the proposal threshold.', {
          proposer,
          votes: proposerVotes.toString(),
          threshold: threshold.toString(),
        });
      }
    }

    const normalizedTargets = targets.map(normalizeTarget);
    const descriptionHash = hashDescription(description);
    const proposalId = hashProposal(normalizedTargets, values, calldatas, descriptionHash);
    const governor = this.store.state().governor;
    if (governor.proposals[proposalId]) {
      throw new DomainError(ErrorCode.ProposalExists, 409, 'Proposal already exists.', { proposalId });
    }

    const voteStart = now + governor.params.votingDelay;
    const voteEnd = voteStart + governor.params.votingPeriod;
    governor.proposals[proposalId] = {
      id: proposalId,
      proposer,
      description,
      targets: normalizedTargets,
      values: [...values],
      calldatas: [...calldatas],
      descriptionHash,
      createdAt: now,
      voteStart,
      voteEnd,
      tally: { forVotes: 0n, againstVotes: 0n, abstainVotes: 0n },
      receipts: {},
      executed: false,
      cancelled: false,
    };

    this.store.emit('proposal.created', { proposalId, proposer, voteStart, voteEnd, description });
    return proposalId;
  }

  castVote(voter: Address, proposalId: string, support: VoteSupport, reason = ''): bigint {
    this.requireHub('castVote');
    this.requireState(proposalId, ['active']);

    const proposal = this.getProposal(proposalId);
    if (proposal.receipts[voter]) {
      throw new DomainError(ErrorCode.AlreadyVoted, 409, 'Account already voted on this proposal.', {
        proposalId,
        voter,
      });
    }

    this.policies.decay.beforeCount(voter);
    const weight = this.votes.getVotes(voter);

    proposal.receipts[voter] = { support, weight, reason, castAt: this.clock.now() };
    if (support === 'for') proposal.tally.forVotes += weight;
    else if (support === 'against') proposal.tally.againstVotes += weight;
    else proposal.tally.abstainVotes += weight;

    this.store.emit('proposal.voted', { proposalId, voter, support, weight, reason });
    return weight;
  }

  queue(proposalId: string): number {
    this.requireState(proposalId, ['succeeded']);
    const proposal = this.getProposal(proposalId);
    const timelock = this.policies.timelock;

    const { operationId, readyAt } = timelock.scheduleBatch(
      this.addresses.governor,
      this.batchOf(proposal),
      timelock.minDelay(),
    );
    proposal.eta = readyAt;
    proposal.timelockOperationId = operationId;

    this.store.emit('proposal.queued', { proposalId, eta: readyAt, operationId });
    return readyAt;
  }

  execute(proposalId: string): void {
    this.requireState(proposalId, ['queued']);
    const proposal = this.getProposal(proposalId);
    proposal.executed = true;

    const outer = this.executing;
    this.executing = proposalId;
    try {
      if (proposal.relayedFrom) {
        this.router.executeBatch(
          this.addresses.timelock,
          toActions(proposal.targets, proposal.values, proposal.calldatas),
        );
      } else {
        this.policies.timelock.executeBatch(this.addresses.governor, this.batchOf(proposal));
      }
    } finally {
      this.executing = outer;
    }

    this.store.emit('proposal.executed', { proposalId, relayed: proposal.relayedFrom !== undefined });
  }

  cancel(caller: Address, proposalId: string): void {
    const current = this.requireState(proposalId, CANCELLABLE);
    const proposal = this.getProposal(proposalId);
    const guardian = this.access.isActiveGuardian(caller);

    const allowed = proposal.relayedFrom
      ? guardian
      : caller === proposal.proposer || guardian || this.proposerBelowThreshold(proposal.proposer);
    if (!allowed) {
      throw new DomainError(ErrorCode.UnableToCancel, 403, 'Caller cannot cancel this proposal.', {
        proposalId,
        caller,
      });
    }

    if (current === 'queued' && proposal.timelockOperationId) {
      this.policies.timelock.cancel(this.addresses.governor, proposal.timelockOperationId);
    }
    proposal.cancelled = true;

    this.store.emit('proposal.cancelled', { proposalId, cancelledBy: caller });
  }

  /** Register a proposal relayed from the hub as queued and ready to run. */
  acceptRelayed(actions: ProposalActions, origin: RelayedOrigin): string {
    const targets = actions.targets.map(normalizeTarget);
    const proposalId = hashProposal(targets, actions.values, actions.calldatas, actions.descriptionHash);
    const governor = this.store.state().governor;
    if (governor.proposals[proposalId]) {
      throw new DomainError(ErrorCode.ProposalExists, 409, 'Proposal already exists.', { proposalId });
    }

    const now = this.clock.now();
    governor.proposals[proposalId] = {
      id: proposalId,
      proposer: this.addresses.governor,
      targets,
      values: [...actions.values],
      calldatas: [...actions.calldatas],
      descriptionHash: actions.descriptionHash,
      createdAt: now,
      voteStart: now,
      voteEnd: now,
      tally: { forVotes: 0n, againstVotes: 0n, abstainVotes: 0n },
      receipts: {},
      executed: false,
      cancelled: false,
      eta: now,
      relayedFrom: { ...origin },
    };
    return proposalId;
  }

  // ─── Governance-only settings ───────────────────────────────────────

  setVotingDelay(votingDelay: number): void {
    this.store.state().governor.params.votingDelay = votingDelay;
  }

  setVotingPeriod(votingPeriod: number): void {
    if (votingPeriod <= 0) {
      throw new DomainError(ErrorCode.InvalidPayload, 400, 'Voting period must be positive.', { votingPeriod });
    }
    this.store.state().governor.params.votingPeriod = votingPeriod;
  }

  setProposalThreshold(threshold: bigint): void {
    this.policies.threshold.set(threshold);
  }

  updateQuorumNumerator(numerator: bigint): void {
    this.policies.quorum.setNumerator(numerator);
  }

  setWhitelistAccountExpiration(account: Address, expiration: bigint): void {
    this.store.state().governor.whitelist[account] = expiration;
  }

  // ─── Internals ──────────────────────────────────────────────────────

  private succeeded(proposal: ProposalRecord): boolean {
    return this.policies.quorum.reached(proposal.tally, proposal.voteStart)
      && proposal.tally.forVotes > proposal.tally.againstVotes;
  }

  private proposerBelowThreshold(proposer: Address): boolean {
    return this.votes.getVotesAt(proposer, this.clock.now() - 1) < this.policies.threshold.current();
  }

  private batchOf(proposal: ProposalRecord): ScheduledBatch {
    return {
      targets: proposal.targets,
      values: proposal.values,
      payloads: proposal.calldatas,
      salt: timelockSalt(this.addresses.governor, proposal.descriptionHash),
    };
  }

  private requireState(proposalId: string, allowed: ProposalState[]): ProposalState {
    const current = this.state(proposalId);
    if (!allowed.includes(current)) {
      throw new DomainError(ErrorCode.UnexpectedProposalState, 409, 'Proposal is not in an allowed state.', {
        proposalId,
        state: current,
        expected: allowed,
      });
    }
    return current;
  }

  private requireHub(operation: string): void {
    if (!this.isHub) {
      throw new DomainError(ErrorCode.NotHubChain, 403, `${operation} is only available on the hub chain.`, {
        chainId: this.store.eid,
      });
    }
  }
}

const normalizeTarget = (target: string): string => {
  if (!isAddress(target)) {
    throw new DomainError(ErrorCode.InvalidPayload, 400, 'Proposal target is not an address.', { target });
  }
  return getAddress(target);
};
