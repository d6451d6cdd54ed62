import path from 'node:path';
import type { AppConfig } from '../config.js';
import { type ChainClock, ManualClock } from '../domain/chain/clock.js';
import { addressToBytes32 } from '../domain/chain/systemAddresses.js';
import { type ProtocolConfig, buildProtocolConfig } from '../domain/protocol.js';
import { type DeliveryResult, LocalEndpoint, type PacketRecord, type PacketStatus } from '../domain/relay/localEndpoint.js';
import { DomainError, ErrorCode } from '../errors/taxonomy.js';
import { type EventBus, eventBus as defaultEventBus } from '../infra/eventBus.js';
import type { GenesisParams } from '../infra/storage/defaultState.js';
import { GovernanceChain } from './governanceChain.js';
import type { ChainConfig, NetworkConfig } from './networkConfig.js';

export interface GovernanceNetworkOptions {
  config: AppConfig;
  network: NetworkConfig;
  clock: ChainClock;
  bus?: EventBus;
  /** Keep chain state in memory only. */
  ephemeral?: boolean;
}

/**
 * Every chain hosted by this process, wired to one shared endpoint with each
 * chain trusting the governor of every other chain.
 */
export class GovernanceNetwork {
  readonly endpoint: LocalEndpoint;
  readonly protocol: ProtocolConfig;
  private readonly chains: Map<number, GovernanceChain> = new Map();
  private readonly hubEid: number;

  private constructor(private readonly options: GovernanceNetworkOptions) {
    const { config, network, clock } = options;
    const bus = options.bus ?? defaultEventBus;

    this.endpoint = new LocalEndpoint(
      {
        baseFee: config.relay.baseFee,
        feePerByte: config.relay.feePerByte,
        gasPrice: config.relay.gasPrice,
      },
      bus,
      options.ephemeral ? undefined : path.join(config.paths.stateDir, 'packets.json'),
    );
    this.protocol = buildProtocolConfig({ smoothingFactor: config.rewards.smoothingFactor });

    const hub = network.chains.find((chain) => chain.hub);
    this.hubEid = hub ? hub.eid : network.chains[0].eid;

    for (const chainConfig of network.chains) {
      const chain = new GovernanceChain({
        name: chainConfig.name,
        isHub: chainConfig.eid === this.hubEid,
        genesis: genesisFor(config, chainConfig.eid),
        protocol: this.protocol,
        clock,
        transport: this.endpoint,
        stateFile: options.ephemeral ? undefined : path.join(config.paths.stateDir, `chain-${chainConfig.eid}.json`),
        bus,
      });
      this.endpoint.register(chain.eid, chain);
      this.chains.set(chain.eid, chain);
    }
  }

  static async create(options: GovernanceNetworkOptions): Promise<GovernanceNetwork> {
    const network = new GovernanceNetwork(options);
    await network.init();
    return network;
  }

  get clock(): ChainClock {
    return this.options.clock;
  }

  hub(): GovernanceChain {
    return this.chain(this.hubEid);
  }

  chain(eid: number): GovernanceChain {
    const chain = this.chains.get(eid);
    if (!chain) {
      throw new DomainError(ErrorCode.ChainNotFound, 404, 'Chain not found.', { chainId: eid });
    }
    return chain;
  }

  list(): GovernanceChain[] {
    return [...this.chains.values()];
  }

  packets(status?: PacketStatus): PacketRecord[] {
    return this.endpoint.list(status);
  }

  deliver(guid: string): DeliveryResult {
    return this.endpoint.deliver(guid);
  }

  /** Move the shared clock forward; only possible with a manual clock. */
  advanceClock(seconds: number): number {
    const { clock } = this.options;
    if (!(clock instanceof ManualClock)) {
      throw new DomainError(ErrorCode.ClockNotAdjustable, 409, 'The network runs on the system clock.');
    }
    return clock.advance(seconds);
  }

  async flush(): Promise<void> {
    await Promise.all([...this.list().map((chain) => chain.flush()), this.endpoint.flush()]);
  }

  private async init(): Promise<void> {
    const configs = new Map(this.options.network.chains.map((chain) => [chain.eid, chain]));

    for (const chain of this.list()) {
      await chain.init();
      const chainConfig = configs.get(chain.eid);
      if (chainConfig) this.applyGenesis(chain, chainConfig);
    }
    await this.endpoint.init();
  }

  private applyGenesis(chain: GovernanceChain, chainConfig: ChainConfig): void {
    // configured guardians override persisted ones on every boot
    for (const guardian of chainConfig.guardians) {
      if (chain.access.guardianExpiration(guardian.account) === guardian.expiresAt) continue;
      chain.setGuardian(guardian.account, guardian.expiresAt);
    }

    if (!chain.isFresh() || Object.keys(chain.relay.peers()).length > 0) return;

    for (const peer of this.list()) {
      if (peer.eid === chain.eid) continue;
      chain.connectPeer(peer.eid, addressToBytes32(peer.addresses.governor));
    }
    for (const allocation of chainConfig.allocations) {
      chain.mint(allocation.account, allocation.amount);
    }
    if (chainConfig.nativeTreasury > 0n) {
      chain.fundNative(chain.addresses.timelock, chainConfig.nativeTreasury);
    }
  }
}

export const genesisFor = (config: AppConfig, eid: number): GenesisParams => ({
  eid,
  decay: {
    ratePerYear: config.decay.ratePerYear,
    decayFreeWindow: config.decay.decayFreeWindow,
    decayFunction: config.decay.decayFunction,
  },
  governor: {
    votingDelay: config.governance.votingDelay,
    votingPeriod: config.governance.votingPeriod,
    proposalThreshold: config.governance.proposalThreshold,
    quorumNumerator: config.governance.quorumNumerator,
  },
  timelock: {
    minDelay: config.governance.timelockMinDelay,
    gracePeriod: config.governance.gracePeriod,
  },
});
