import { ZeroAddress } from 'ethers';
import { ProtocolAccessManager, Role } from '../domain/access/accessControl.js';
import type { ChainClock } from '../domain/chain/clock.js';
import { isSystemAddress, normalizeAddress, systemAddresses } from '../domain/chain/systemAddresses.js';
import { DecayLedger } from '../domain/decay/decayLedger.js';
import type { AccountDecayRecord } from '../domain/decay/decayTypes.js';
import { DelegationGraph } from '../domain/delegation/delegationGraph.js';
import { CallRouter } from '../domain/governance/callRouter.js';
import type { ProposalRecord, ProposalState, VoteSupport } from '../domain/governance/governanceTypes.js';
import { DecayPolicy, QuorumPolicy, ThresholdPolicy } from '../domain/governance/policies.js';
import { type ProposeInput, ProposalStateMachine } from '../domain/governance/proposalStateMachine.js';
import { Timelock } from '../domain/governance/timelock.js';
import type { ProtocolConfig } from '../domain/protocol.js';
import { CrossChainRelay } from '../domain/relay/crossChainRelay.js';
import type { MessageReceiver, MessageTransport, Origin } from '../domain/relay/relayTypes.js';
import { type ClaimedReward, GovernanceRewardsManager } from '../domain/rewards/governanceRewardsManager.js';
import { TokenLedger } from '../domain/token/tokenLedger.js';
import { VotingPowerAggregator } from '../domain/voting/votingPowerAggregator.js';
import { DomainError, ErrorCode } from '../errors/taxonomy.js';
import { type EventBus, eventBus as defaultEventBus } from '../infra/eventBus.js';
import { type GenesisParams, createDefaultState } from '../infra/storage/defaultState.js';
import { StateStore } from '../infra/storage/stateStore.js';
import type { Address, SystemAddresses } from '../types.js';
import { governorTarget, rewardsTarget, tokenTarget } from './callTargets.js';

export interface GovernanceChainOptions {
  name: string;
  isHub: boolean;
  genesis: GenesisParams;
  protocol: ProtocolConfig;
  clock: ChainClock;
  transport: MessageTransport;
  stateFile?: string;
  bus?: EventBus;
}

export interface AccountSummary {
  account: Address;
  balance: bigint;
  staked: bigint;
  votingUnits: bigint;
  votes: bigint;
  delegate: Address;
  effectiveDelegate: Address;
  delegationDepth: number;
  decay: AccountDecayRecord | null;
  projectedDecayFactor: bigint;
  smoothedDecayFactor: bigint;
  nativeBalance: bigint;
}

export interface ProposalView extends ProposalRecord {
  state: ProposalState;
}

export interface ChainSummary {
  eid: number;
  name: string;
  isHub: boolean;
  now: number;
  addresses: SystemAddresses;
  totalSupply: bigint;
  totalStaked: bigint;
  proposalCount: number;
  peers: Record<string, string>;
}

/**
 * One chain's governance deployment. Every public mutation runs as a single
 * store transaction, so a failure anywhere inside leaves no trace.
 */
export class GovernanceChain implements MessageReceiver {
  readonly eid: number;
  readonly name: string;
  readonly isHub: boolean;
  readonly addresses: SystemAddresses;
  readonly store: StateStore;
  readonly access: ProtocolAccessManager;
  readonly decay: DecayLedger;
  readonly delegation: DelegationGraph;
  readonly votes: VotingPowerAggregator;
  readonly token: TokenLedger;
  readonly router: CallRouter;
  readonly timelock: Timelock;
  readonly governor: ProposalStateMachine;
  readonly relay: CrossChainRelay;
  readonly rewards: GovernanceRewardsManager;

  constructor(private readonly options: GovernanceChainOptions) {
    const { genesis, protocol, clock, transport } = options;
    this.eid = genesis.eid;
    this.name = options.name;
    this.isHub = options.isHub;
    this.addresses = systemAddresses();
    const addresses = this.addresses;

    const roles = {
      [Role.Governor]: [addresses.timelock],
      [Role.DecayController]: [addresses.token, addresses.rewardsManager, addresses.governor],
    };
    this.store = new StateStore(
      createDefaultState({ ...genesis, roles }),
      options.stateFile,
      options.bus ?? defaultEventBus,
    );

    this.access = new ProtocolAccessManager(this.store, clock);

    this.decay = new DecayLedger(this.store, clock, this.access, protocol);
    this.delegation = new DelegationGraph(this.store, this.decay, protocol, addresses.governor);
    this.votes = new VotingPowerAggregator(this.store, clock, this.delegation, this.decay, addresses, protocol);
    this.token = new TokenLedger(this.store, this.access, this.decay, this.votes, addresses);

    this.router = new CallRouter(this.store);
    this.timelock = new Timelock(this.store, clock, this.router, addresses.timelock, addresses.governor);
    this.governor = new ProposalStateMachine(
      this.store,
      clock,
      this.access,
      this.votes,
      this.router,
      {
        threshold: new ThresholdPolicy(this.store, protocol),
        quorum: new QuorumPolicy(this.store, this.votes, protocol),
        timelock: this.timelock,
        decay: new DecayPolicy(this.decay, addresses.governor),
      },
      addresses,
      options.isHub,
    );

    this.relay = new CrossChainRelay(this.store, clock, transport, addresses.governor);
    this.relay.setProposalGate((proposalId) => this.governor.isExecuted(proposalId));
    this.relay.setInboundHandler((actions, origin) => this.governor.acceptRelayed(actions, origin));

    this.rewards = new GovernanceRewardsManager(
      this.store,
      clock,
      this.access,
      this.decay,
      this.token,
      this.delegation,
      addresses,
      protocol,
    );

    this.router.register(addresses.governor, governorTarget({
      governor: this.governor,
      relay: this.relay,
      decay: this.decay,
      addresses,
    }));
    this.router.register(addresses.timelock, this.timelock.callTarget());
    this.router.register(addresses.token, tokenTarget(this.token));
    this.router.register(addresses.rewardsManager, rewardsTarget(this.rewards));
  }

  async init(): Promise<void> {
    await this.store.init();
  }

  async flush(): Promise<void> {
    await this.store.flush();
  }

  now(): number {
    return this.options.clock.now();
  }

  /** True until anything has been minted. */
  isFresh(): boolean {
    return this.store.state().token.totalSupply === 0n;
  }

  // ─── Views ──────────────────────────────────────────────────────────

  summary(): ChainSummary {
    const state = this.store.state();
    return {
      eid: this.eid,
      name: this.name,
      isHub: this.isHub,
      now: this.now(),
      addresses: { ...this.addresses },
      totalSupply: state.token.totalSupply,
      totalStaked: state.rewards.totalStaked,
      proposalCount: Object.keys(state.governor.proposals).length,
      peers: this.relay.peers(),
    };
  }

  account(raw: string): AccountSummary {
    const account = normalizeAddress(raw);
    return {
      account,
      balance: this.token.balanceOf(account),
      staked: this.rewards.balanceOf(account),
      votingUnits: this.votes.votingUnits(account),
      votes: this.votes.getVotes(account),
      delegate: this.delegation.delegateOf(account),
      effectiveDelegate: this.delegation.effectiveDelegate(account),
      delegationDepth: this.delegation.resolveChainLength(account),
      decay: this.decay.getRecord(account),
      projectedDecayFactor: this.decay.projectedFactor(account),
      smoothedDecayFactor: this.rewards.smoothedDecayFactor(account),
      nativeBalance: this.store.state().native[account] ?? 0n,
    };
  }

  getVotes(raw: string, timepoint?: number): bigint {
    const account = normalizeAddress(raw);
    return timepoint === undefined ? this.votes.getVotes(account) : this.votes.getPastVotes(account, timepoint);
  }

  proposal(proposalId: string): ProposalView {
    const record = this.governor.getProposal(proposalId);
    return { ...structuredClone(record), state: this.governor.state(proposalId) };
  }

  proposals(): ProposalView[] {
    return this.governor.listProposals().map((record) => this.proposal(record.id));
  }

  // ─── Token and delegation ───────────────────────────────────────────

  /** Operator mint, performed with the timelock's governor role. */
  mint(to: string, amount: bigint): void {
    this.store.transaction(() => this.token.mint(this.addresses.timelock, normalizeAddress(to, 'to'), amount));
  }

  transfer(from: string, to: string, amount: bigint): void {
    this.store.transaction(() => {
      const sender = this.requireUserAccount(from, 'from');
      this.token.transfer(sender, normalizeAddress(to, 'to'), amount);
    });
  }

  burn(account: string, amount: bigint): void {
    this.store.transaction(() => this.token.burn(this.requireUserAccount(account), amount));
  }

  registerVestingWallet(beneficiary: string, wallet: string): void {
    this.store.transaction(() => this.token.registerVestingWallet(
      this.addresses.timelock,
      normalizeAddress(beneficiary, 'beneficiary'),
      normalizeAddress(wallet, 'wallet'),
    ));
  }

  delegate(from: string, to: string): void {
    this.store.transaction(() => {
      const delegator = this.requireUserAccount(from, 'from');
      const target = to === ZeroAddress ? ZeroAddress : normalizeAddress(to, 'to');
      this.delegation.delegate(delegator, target);
    });
  }

  fundNative(account: string, amount: bigint): void {
    if (amount <= 0n) {
      throw new DomainError(ErrorCode.InvalidPayload, 400, 'Amount must be positive.', { amount: amount.toString() });
    }
    this.store.transaction((state) => {
      const target = normalizeAddress(account);
      state.native[target] = (state.native[target] ?? 0n) + amount;
    });
  }

  // ─── Staking rewards ────────────────────────────────────────────────

  stake(account: string, amount: bigint): void {
    this.store.transaction(() => this.rewards.stake(this.requireUserAccount(account), amount));
  }

  unstake(account: string, amount: bigint): void {
    this.store.transaction(() => this.rewards.unstake(this.requireUserAccount(account), amount));
  }

  getReward(account: string): ClaimedReward[] {
    return this.store.transaction(() => this.rewards.getReward(this.requireUserAccount(account)));
  }

  /** Operator reward funding, performed with the timelock's governor role. */
  notifyRewardAmount(rewardToken: string, reward: bigint, duration: number): void {
    this.store.transaction(() => this.rewards.notifyRewardAmount(
      this.addresses.timelock,
      normalizeAddress(rewardToken, 'rewardToken'),
      reward,
      duration,
    ));
  }

  // ─── Governance ─────────────────────────────────────────────────────

  propose(proposer: string, input: ProposeInput): string {
    return this.store.transaction(() => this.governor.propose(this.requireUserAccount(proposer, 'proposer'), input));
  }

  castVote(voter: string, proposalId: string, support: VoteSupport, reason?: string): bigint {
    return this.store.transaction(() => this.governor.castVote(
      this.requireUserAccount(voter, 'voter'),
      proposalId,
      support,
      reason,
    ));
  }

  queue(proposalId: string): number {
    return this.store.transaction(() => this.governor.queue(proposalId));
  }

  execute(proposalId: string): void {
    this.store.transaction(() => this.governor.execute(proposalId));
  }

  cancel(caller: string, proposalId: string): void {
    this.store.transaction(() => this.governor.cancel(normalizeAddress(caller, 'caller'), proposalId));
  }

  setGuardian(account: string, expiration: number): void {
    this.store.transaction(() => this.access.setGuardianExpiration(normalizeAddress(account), expiration));
  }

  /** Bootstrap peer registration; later changes go through governance. */
  connectPeer(eid: number, peer: string): void {
    this.store.transaction(() => this.relay.setPeer(eid, peer));
  }

  lzReceive(origin: Origin, guid: string, payload: string, executor: string, extraData: string): void {
    this.store.transaction(() => this.relay.lzReceive(origin, guid, payload, executor, extraData));
  }

  private requireUserAccount(raw: string, field = 'account'): Address {
    const account = normalizeAddress(raw, field);
    if (account === ZeroAddress || isSystemAddress(this.addresses, account)) {
      throw new DomainError(ErrorCode.Unauthorized, 403, 'System accounts cannot act directly.', { [field]: account });
    }
    return account;
  }
}
