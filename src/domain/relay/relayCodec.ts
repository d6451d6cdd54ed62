import { AbiCoder, type Result, keccak256, solidityPacked } from 'ethers';
import { DomainError, ErrorCode } from '../../errors/taxonomy.js';
import type { RelayMessage } from './relayTypes.js';

const coder = AbiCoder.defaultAbiCoder();

const PAYLOAD_TYPES = ['bytes32', 'uint256', 'address[]', 'uint256[]', 'bytes[]', 'bytes32'];

export interface MessageIdInput {
  srcEid: number;
  /** Sending governor, bytes32. */
  sender: string;
  sourceProposalId: string;
  targets: string[];
  values: bigint[];
  calldatas: string[];
  descriptionHash: string;
}

/**
 * Content-addressed id binding a relayed proposal to its origin. The
 * receiver recomputes it and rejects any payload that does not match.
 */
export const computeMessageId = (input: MessageIdInput): string => keccak256(coder.encode(
  ['uint32', 'bytes32', 'uint256', 'address[]', 'uint256[]', 'bytes[]', 'bytes32'],
  [
    input.srcEid,
    input.sender,
    BigInt(input.sourceProposalId),
    input.targets,
    input.values,
    input.calldatas,
    input.descriptionHash,
  ],
));

export const encodeRelayPayload = (message: RelayMessage): string => coder.encode(PAYLOAD_TYPES, [
  message.messageId,
  BigInt(message.sourceProposalId),
  message.targets,
  message.values,
  message.calldatas,
  message.descriptionHash,
]);

export const decodeRelayPayload = (payload: string): RelayMessage => {
  let decoded: Result;
  try {
    decoded = coder.decode(PAYLOAD_TYPES, payload);
  } catch (error) {
    throw new DomainError(ErrorCode.InvalidPayload, 400, 'Relay payload could not be decoded.', {
      reason: error instanceof Error ? error.message : String(error),
    });
  }

  const [messageId, sourceProposalId, targets, values, calldatas, descriptionHash] = Array.from<unknown>(decoded);
  if (
    typeof messageId !== 'string'
    || typeof sourceProposalId !== 'bigint'
    || !isStringList(targets)
    || !isBigintList(values)
    || !isStringList(calldatas)
    || typeof descriptionHash !== 'string'
  ) {
    throw new DomainError(ErrorCode.InvalidPayload, 400, 'Relay payload has an unexpected shape.');
  }

  return {
    messageId,
    sourceProposalId: sourceProposalId.toString(),
    targets: [...targets],
    values: [...values],
    calldatas: [...calldatas],
    descriptionHash,
  };
};

/** LayerZero v2 packet GUID. */
export const computeGuid = (
  nonce: bigint,
  srcEid: number,
  sender: string,
  dstEid: number,
  receiver: string,
): string => keccak256(solidityPacked(
  ['uint64', 'uint32', 'bytes32', 'uint32', 'bytes32'],
  [nonce, srcEid, sender, dstEid, receiver],
));

const isStringList = (value: unknown): value is string[] => (
  Array.isArray(value) && value.every((item) => typeof item === 'string')
);

const isBigintList = (value: unknown): value is bigint[] => (
  Array.isArray(value) && value.every((item) => typeof item === 'bigint')
);
