import { AbiCoder, getAddress, keccak256, toBeHex, toUtf8Bytes } from 'ethers';
import type { Address } from '../../types.js';

const coder = AbiCoder.defaultAbiCoder();

export const hashDescription = (description: string): string => keccak256(toUtf8Bytes(description));

/**
 * uint256 proposal id, as decimal string:
 * `keccak256(abi.encode(targets, values, calldatas, descriptionHash))`.
 */
export const hashProposal = (
  targets: string[],
  values: bigint[],
  calldatas: string[],
  descriptionHash: string,
): string => {
  const encoded = coder.encode(
    ['address[]', 'uint256[]', 'bytes[]', 'bytes32'],
    [targets, values, calldatas, descriptionHash],
  );
  return BigInt(keccak256(encoded)).toString();
};

/** Timelock batch operation id. */
export const hashOperationBatch = (
  targets: string[],
  values: bigint[],
  payloads: string[],
  predecessor: string,
  salt: string,
): string => keccak256(coder.encode(
  ['address[]', 'uint256[]', 'bytes[]', 'bytes32', 'bytes32'],
  [targets, values, payloads, predecessor, salt],
));

/** Salt binding a timelock operation to the governor that queued it. */
export const timelockSalt = (governor: Address, descriptionHash: string): string => (
  toBeHex((BigInt(governor) << 96n) ^ BigInt(descriptionHash), 32)
);

const PROPOSER_SUFFIX = /#proposer=(0x[0-9a-fA-F]{40})$/;

/**
 * A description ending in `#proposer=0x…` may only be proposed by that
 * account. Descriptions without the suffix are open to anyone.
 */
export const isValidDescriptionForProposer = (proposer: Address, description: string): boolean => {
  const match = PROPOSER_SUFFIX.exec(description);
  if (!match) return true;
  return getAddress(match[1].toLowerCase()) === getAddress(proposer);
};
