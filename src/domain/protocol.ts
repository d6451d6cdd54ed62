import { parseEther } from 'ethers';
import { DAY_SECONDS } from '../utils/time.js';

/**
 * Deployment-time protocol constants. Built once per chain and never mutated.
 */
export interface ProtocolConfig {
  readonly maxDelegationDepth: number;
  readonly minProposalThreshold: bigint;
  readonly maxProposalThreshold: bigint;
  readonly minDecayFreeWindow: number;
  readonly maxDecayFreeWindow: number;
  readonly maxDecayRatePerYear: bigint;
  /** EMA weight given to the newest decay observation (WAD). */
  readonly smoothingFactor: bigint;
  readonly quorumDenominator: bigint;
}

export const DEFAULT_PROTOCOL_CONFIG: ProtocolConfig = Object.freeze({
  maxDelegationDepth: 2,
  minProposalThreshold: parseEther('1000'),
  maxProposalThreshold: parseEther('100000'),
  minDecayFreeWindow: 30 * DAY_SECONDS,
  maxDecayFreeWindow: 365.25 * DAY_SECONDS,
  maxDecayRatePerYear: parseEther('0.5'),
  smoothingFactor: parseEther('0.2'),
  quorumDenominator: 100n,
});

export const buildProtocolConfig = (overrides: Partial<ProtocolConfig> = {}): ProtocolConfig => (
  Object.freeze({ ...DEFAULT_PROTOCOL_CONFIG, ...overrides })
);
