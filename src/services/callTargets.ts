/**
 * ABI surfaces of the local contracts that proposals can call. Calldata is
 * decoded with the contract's interface and dispatched to the owning
 * component; the caller seen by each component is the executing timelock.
 */

import { Interface, type Result } from 'ethers';
import type { DecayLedger } from '../domain/decay/decayLedger.js';
import type { DecayFunction } from '../domain/decay/decayTypes.js';
import {
  argAddress,
  argAddressList,
  argBigint,
  argBigintList,
  argBytes,
  argBytesList,
  argSafeInteger,
} from '../domain/governance/abiArgs.js';
import type { CallContext, CallTarget } from '../domain/governance/callRouter.js';
import type { ProposalStateMachine } from '../domain/governance/proposalStateMachine.js';
import type { CrossChainRelay } from '../domain/relay/crossChainRelay.js';
import type { GovernanceRewardsManager } from '../domain/rewards/governanceRewardsManager.js';
import type { TokenLedger } from '../domain/token/tokenLedger.js';
import { DomainError, ErrorCode } from '../errors/taxonomy.js';
import type { SystemAddresses } from '../types.js';

export const GOVERNOR_ABI = new Interface([
  'function setVotingDelay(uint48 newVotingDelay)',
  'function setVotingPeriod(uint32 newVotingPeriod)',
  'function setProposalThreshold(uint256 newProposalThreshold)',
  'function updateQuorumNumerator(uint256 newQuorumNumerator)',
  'function setWhitelistAccountExpiration(address account, uint256 expiration)',
  'function setDecayRatePerYear(uint256 newRatePerYear)',
  'function setDecayFreeWindow(uint40 newWindow)',
  'function setDecayFunction(uint8 newFunction)',
  'function setPeer(uint32 eid, bytes32 peer)',
  'function sendProposalToTargetChain(uint32 dstEid, address[] targets, uint256[] values, bytes[] calldatas, bytes32 descriptionHash, bytes options)',
]);

export const TOKEN_ABI = new Interface([
  'function mint(address to, uint256 amount)',
  'function registerVestingWallet(address beneficiary, address wallet)',
]);

export const REWARDS_ABI = new Interface([
  'function notifyRewardAmount(address rewardToken, uint256 reward, uint256 duration)',
]);

const DECAY_FUNCTIONS: DecayFunction[] = ['linear', 'exponential'];

export interface GovernorTargetDeps {
  governor: ProposalStateMachine;
  relay: CrossChainRelay;
  decay: DecayLedger;
  addresses: SystemAddresses;
}

export const governorTarget = (deps: GovernorTargetDeps): CallTarget => ({
  iface: GOVERNOR_ABI,
  invoke: (name: string, args: Result, context: CallContext): void => {
    const { governor, relay, decay, addresses } = deps;
    if (context.sender !== addresses.timelock) {
      throw new DomainError(ErrorCode.OnlyGovernance, 403, 'Only governance can call the governor.', {
        sender: context.sender,
        function: name,
      });
    }

    switch (name) {
      case 'setVotingDelay':
        governor.setVotingDelay(argSafeInteger(args, 0));
        return;
      case 'setVotingPeriod':
        governor.setVotingPeriod(argSafeInteger(args, 0));
        return;
      case 'setProposalThreshold':
        governor.setProposalThreshold(argBigint(args, 0));
        return;
      case 'updateQuorumNumerator':
        governor.updateQuorumNumerator(argBigint(args, 0));
        return;
      case 'setWhitelistAccountExpiration':
        governor.setWhitelistAccountExpiration(argAddress(args, 0), argBigint(args, 1));
        return;
      case 'setDecayRatePerYear':
        decay.setDecayRatePerYear(context.sender, argBigint(args, 0));
        return;
      case 'setDecayFreeWindow':
        decay.setDecayFreeWindow(context.sender, argSafeInteger(args, 0));
        return;
      case 'setDecayFunction': {
        const decayFunction = DECAY_FUNCTIONS[argSafeInteger(args, 0)];
        if (!decayFunction) {
          throw new DomainError(ErrorCode.CallReverted, 422, 'Unknown decay function.');
        }
        decay.setDecayFunction(context.sender, decayFunction);
        return;
      }
      case 'setPeer':
        relay.setPeer(argSafeInteger(args, 0), argBytes(args, 1));
        return;
      case 'sendProposalToTargetChain': {
        const sourceProposalId = governor.executingProposal();
        if (!sourceProposalId) {
          throw new DomainError(ErrorCode.OnlyGovernance, 403, 'Relaying requires an executing proposal.');
        }
        relay.send({
          sourceProposalId,
          dstEid: argSafeInteger(args, 0),
          targets: argAddressList(args, 1),
          values: argBigintList(args, 2),
          calldatas: argBytesList(args, 3),
          descriptionHash: argBytes(args, 4),
          options: argBytes(args, 5),
          paid: context.value > 0n ? context.value : null,
          refundTo: addresses.timelock,
        });
        return;
      }
      default:
        throw new DomainError(ErrorCode.CallReverted, 422, `Unsupported governor function ${name}.`);
    }
  },
});

export const tokenTarget = (token: TokenLedger): CallTarget => ({
  iface: TOKEN_ABI,
  invoke: (name: string, args: Result, context: CallContext): void => {
    if (name === 'mint') {
      token.mint(context.sender, argAddress(args, 0), argBigint(args, 1));
      return;
    }
    if (name === 'registerVestingWallet') {
      token.registerVestingWallet(context.sender, argAddress(args, 0), argAddress(args, 1));
      return;
    }
    throw new DomainError(ErrorCode.CallReverted, 422, `Unsupported token function ${name}.`);
  },
});

export const rewardsTarget = (rewards: GovernanceRewardsManager): CallTarget => ({
  iface: REWARDS_ABI,
  invoke: (name: string, args: Result, context: CallContext): void => {
    if (name !== 'notifyRewardAmount') {
      throw new DomainError(ErrorCode.CallReverted, 422, `Unsupported rewards function ${name}.`);
    }
    rewards.notifyRewardAmount(context.sender, argAddress(args, 0), argBigint(args, 1), argSafeInteger(args, 2));
  },
});
