import type { DecayParams } from '../../domain/decay/decayTypes.js';
import type { GovernorParams } from '../../domain/governance/governanceTypes.js';
import type { AccessState, ChainState } from '../../types.js';

export interface GenesisParams {
  eid: number;
  decay: DecayParams;
  governor: GovernorParams;
  timelock: {
    minDelay: number;
    gracePeriod: number;
  };
  /** Role holders present from genesis. */
  roles?: AccessState['roles'];
}

export const createDefaultState = (genesis: GenesisParams): ChainState => ({
  eid: genesis.eid,
  access: {
    roles: structuredClone(genesis.roles ?? {}),
    guardians: {},
  },
  decay: {
    params: { ...genesis.decay },
    accounts: {},
  },
  token: {
    balances: {},
    totalSupply: 0n,
    vestingWalletOf: {},
    beneficiaryOf: {},
  },
  delegation: {
    delegates: {},
    delegators: {},
  },
  voting: {
    pools: {},
    checkpoints: {},
    supplyCheckpoints: [],
    unitCheckpoints: {},
    resolutions: {},
  },
  governor: {
    params: { ...genesis.governor },
    proposals: {},
    whitelist: {},
  },
  timelock: {
    minDelay: genesis.timelock.minDelay,
    gracePeriod: genesis.timelock.gracePeriod,
    operations: {},
  },
  relay: {
    peers: {},
    sent: {},
    received: {},
    outboundNonces: {},
  },
  rewards: {
    totalStaked: 0n,
    stakes: {},
    tokens: {},
    smoothedDecayFactors: {},
  },
  native: {},
});
