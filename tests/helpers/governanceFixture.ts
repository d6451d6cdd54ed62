import fs from 'node:fs/promises';
import path from 'node:path';
import { parseEther } from 'ethers';
import type { AppConfig } from '../../src/config.js';
import { config as baseConfig } from '../../src/config.js';
import { ManualClock } from '../../src/domain/chain/clock.js';
import { addressToBytes32 } from '../../src/domain/chain/systemAddresses.js';
import type { VoteSupport } from '../../src/domain/governance/governanceTypes.js';
import type { ProposeInput } from '../../src/domain/governance/proposalStateMachine.js';
import { buildProtocolConfig } from '../../src/domain/protocol.js';
import { LocalEndpoint } from '../../src/domain/relay/localEndpoint.js';
import { DomainError } from '../../src/errors/taxonomy.js';
import { EventBus, type EventType } from '../../src/infra/eventBus.js';
import type { GenesisParams } from '../../src/infra/storage/defaultState.js';
import { GovernanceChain } from '../../src/services/governanceChain.js';
import type { NetworkConfig } from '../../src/services/networkConfig.js';

export const T0 = 1_700_000_000;
export const DAY = 86_400;

export const ALICE = '0x1111111111111111111111111111111111111111';
export const BOB = '0x2222222222222222222222222222222222222222';
export const CAROL = '0x3333333333333333333333333333333333333333';
export const DAVE = '0x4444444444444444444444444444444444444444';
export const GUARDIAN = '0x6666666666666666666666666666666666666666';
export const WALLET = '0x7777777777777777777777777777777777777777';
export const REWARD_TOKEN = '0x8888888888888888888888888888888888888888';

export const HUB_EID = 1;
export const SATELLITE_EID = 2;

export const VOTING_DELAY = 100;
export const VOTING_PERIOD = 1_000;
export const MIN_DELAY = 200;
export const GRACE_PERIOD = 5_000;

export const wad = (amount: string): bigint => parseEther(amount);

export const FEES = { baseFee: 1_000n, feePerByte: 1n, gasPrice: 1n };

export const testGenesis = (eid: number): GenesisParams => ({
  eid,
  decay: {
    ratePerYear: wad('0.1'),
    decayFreeWindow: 30 * DAY,
    decayFunction: 'linear',
  },
  governor: {
    votingDelay: VOTING_DELAY,
    votingPeriod: VOTING_PERIOD,
    proposalThreshold: wad('1000'),
    quorumNumerator: 4n,
  },
  timelock: {
    minDelay: MIN_DELAY,
    gracePeriod: GRACE_PERIOD,
  },
});

export interface RecordedEvent {
  event: EventType;
  data: unknown;
}

export interface TestNetwork {
  clock: ManualClock;
  bus: EventBus;
  endpoint: LocalEndpoint;
  hub: GovernanceChain;
  satellite: GovernanceChain;
  events: RecordedEvent[];
}

/** Hub and one satellite on a shared manual clock, peered with each other, in memory only. */
export function createTestNetwork(): TestNetwork {
  const clock = new ManualClock(T0);
  const bus = new EventBus();
  const endpoint = new LocalEndpoint(FEES, bus);
  const protocol = buildProtocolConfig();

  const chainFor = (eid: number, name: string, isHub: boolean): GovernanceChain => {
    const chain = new GovernanceChain({
      name,
      isHub,
      genesis: testGenesis(eid),
      protocol,
      clock,
      transport: endpoint,
      bus,
    });
    endpoint.register(eid, chain);
    return chain;
  };

  const hub = chainFor(HUB_EID, 'hub', true);
  const satellite = chainFor(SATELLITE_EID, 'satellite', false);
  hub.connectPeer(SATELLITE_EID, addressToBytes32(satellite.addresses.governor));
  satellite.connectPeer(HUB_EID, addressToBytes32(hub.addresses.governor));

  const events: RecordedEvent[] = [];
  bus.on('*', (event, data) => {
    events.push({ event, data });
  });

  return { clock, bus, endpoint, hub, satellite, events };
}

/** The DomainError thrown by `fn`; fails the test when it does not throw one. */
export function captureError(fn: () => unknown): DomainError {
  try {
    fn();
  } catch (error) {
    if (error instanceof DomainError) return error;
    throw error;
  }
  throw new Error('expected a DomainError to be thrown');
}

/** Propose, vote it through with `voters` and queue; the proposal is left queued but not yet ready. */
export function queueProposal(
  net: TestNetwork,
  proposer: string,
  input: ProposeInput,
  voters: Array<[string, VoteSupport]> = [[proposer, 'for']],
): string {
  const proposalId = net.hub.propose(proposer, input);
  net.clock.advance(VOTING_DELAY + 1);
  for (const [voter, support] of voters) net.hub.castVote(voter, proposalId, support);
  net.clock.advance(VOTING_PERIOD);
  net.hub.queue(proposalId);
  return proposalId;
}

/** Full hub lifecycle through execution. */
export function passProposal(net: TestNetwork, proposer: string, input: ProposeInput): string {
  const proposalId = queueProposal(net, proposer, input);
  net.clock.advance(MIN_DELAY);
  net.hub.execute(proposalId);
  return proposalId;
}

export const makeNetworkConfig = (): NetworkConfig => ({
  chains: [
    {
      eid: HUB_EID,
      name: 'hub',
      hub: true,
      nativeTreasury: 1_000_000n,
      guardians: [{ account: GUARDIAN, expiresAt: T0 + 365 * DAY }],
      allocations: [
        { account: ALICE, amount: wad('5000') },
        { account: BOB, amount: wad('500') },
      ],
    },
    {
      eid: SATELLITE_EID,
      name: 'satellite',
      hub: false,
      nativeTreasury: 0n,
      guardians: [],
      allocations: [],
    },
  ],
});

export const makeTestConfig = (dir: string): AppConfig => ({
  ...baseConfig,
  app: { ...baseConfig.app, env: 'test', port: 0 },
  paths: {
    stateDir: path.join(dir, 'chains'),
    logFile: path.join(dir, 'events.ndjson'),
    networkFile: path.join(dir, 'network.json'),
  },
  clock: { mode: 'manual', startAt: T0 },
  relay: {
    ...baseConfig.relay,
    workerEnabled: false,
    intervalMs: 60_000,
    maxBatchSize: 10,
    baseFee: FEES.baseFee,
    feePerByte: FEES.feePerByte,
    gasPrice: FEES.gasPrice,
  },
  governance: {
    votingDelay: VOTING_DELAY,
    votingPeriod: VOTING_PERIOD,
    proposalThreshold: wad('1000'),
    quorumNumerator: 4n,
    timelockMinDelay: MIN_DELAY,
    gracePeriod: GRACE_PERIOD,
  },
  decay: {
    ratePerYear: wad('0.1'),
    decayFreeWindow: 30 * DAY,
    decayFunction: 'linear',
  },
});

export const makeTempDir = (prefix: string): Promise<string> => fs.mkdtemp(path.join(process.cwd(), `.test-${prefix}-`));
