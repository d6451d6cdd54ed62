import dotenv from 'dotenv';
import path from 'node:path';
import { parseEther } from 'ethers';
import type { DecayFunction } from './domain/decay/decayTypes.js';

dotenv.config();

const parseBool = (input: string | undefined, fallback = false): boolean => {
  if (input === undefined) return fallback;
  return ['1', 'true', 'yes', 'on'].includes(input.toLowerCase());
};

const parseNumber = (input: string | undefined, fallback: number): number => {
  if (input === undefined) return fallback;
  const n = Number(input);
  return Number.isFinite(n) ? n : fallback;
};

/** Decimal token amount ("1000", "0.1") to WAD. */
const parseWad = (input: string | undefined, fallback: string): bigint => {
  try {
    return parseEther(input ?? fallback);
  } catch {
    return parseEther(fallback);
  }
};

const parseDecayFunction = (input: string | undefined): DecayFunction => (
  input === 'exponential' ? 'exponential' : 'linear'
);

const parseClockMode = (input: string | undefined): 'system' | 'manual' => (
  input === 'manual' ? 'manual' : 'system'
);

const DAY = 86_400;

const dataDir = process.env.DATA_DIR ?? path.resolve(process.cwd(), 'data');

export const config = {
  app: {
    name: 'decay-governance-relay',
    env: process.env.NODE_ENV ?? 'development',
    port: parseNumber(process.env.PORT, 8787),
  },
  paths: {
    stateDir: process.env.STATE_DIR ?? path.join(dataDir, 'chains'),
    logFile: process.env.LOG_FILE ?? path.join(dataDir, 'events.ndjson'),
    networkFile: process.env.NETWORK_FILE ?? path.resolve(process.cwd(), 'config', 'network.json'),
  },
  clock: {
    mode: parseClockMode(process.env.CLOCK_MODE),
    startAt: parseNumber(process.env.CLOCK_START_AT, 1_700_000_000),
  },
  relay: {
    workerEnabled: parseBool(process.env.RELAY_WORKER_ENABLED, true),
    intervalMs: parseNumber(process.env.RELAY_WORKER_INTERVAL_MS, 2000),
    maxBatchSize: parseNumber(process.env.RELAY_WORKER_MAX_BATCH_SIZE, 10),
    baseFee: parseWad(process.env.RELAY_BASE_FEE, '0.0001'),
    feePerByte: BigInt(parseNumber(process.env.RELAY_FEE_PER_BYTE_WEI, 1_000_000_000)),
    gasPrice: BigInt(parseNumber(process.env.RELAY_GAS_PRICE_WEI, 1_000_000_000)),
  },
  governance: {
    votingDelay: parseNumber(process.env.GOVERNOR_VOTING_DELAY, DAY),
    votingPeriod: parseNumber(process.env.GOVERNOR_VOTING_PERIOD, 7 * DAY),
    proposalThreshold: parseWad(process.env.GOVERNOR_PROPOSAL_THRESHOLD, '10000'),
    quorumNumerator: BigInt(parseNumber(process.env.GOVERNOR_QUORUM_NUMERATOR, 4)),
    timelockMinDelay: parseNumber(process.env.TIMELOCK_MIN_DELAY, 2 * DAY),
    gracePeriod: parseNumber(process.env.TIMELOCK_GRACE_PERIOD, 14 * DAY),
  },
  decay: {
    ratePerYear: parseWad(process.env.DECAY_RATE_PER_YEAR, '0.1'),
    decayFreeWindow: parseNumber(process.env.DECAY_FREE_WINDOW, 30 * DAY),
    decayFunction: parseDecayFunction(process.env.DECAY_FUNCTION),
  },
  rewards: {
    smoothingFactor: parseWad(process.env.REWARDS_SMOOTHING_FACTOR, '0.2'),
  },
};

export type AppConfig = typeof config;
