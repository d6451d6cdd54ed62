/**
 * Cross-chain relay types, shaped after the LayerZero v2 endpoint surface.
 */

export interface MessagingFee {
  nativeFee: bigint;
  lzTokenFee: bigint;
}

export interface Origin {
  srcEid: number;
  /** Sending application, left-padded to bytes32. */
  sender: string;
  nonce: bigint;
}

export interface MessagingReceipt {
  guid: string;
  nonce: bigint;
  fee: MessagingFee;
}

export interface OutboundPacket {
  guid: string;
  nonce: bigint;
  srcEid: number;
  sender: string;
  dstEid: number;
  receiver: string;
  payload: string;
  options: string;
  fee: MessagingFee;
}

/** Transport collaborator the relay sends through. */
export interface MessageTransport {
  quote(dstEid: number, payload: string, options: string): MessagingFee;
  send(packet: OutboundPacket): void;
}

/** Inbound entry point an endpoint delivers to. */
export interface MessageReceiver {
  lzReceive(origin: Origin, guid: string, payload: string, executor: string, extraData: string): void;
}

export interface RelayMessage {
  messageId: string;
  sourceProposalId: string;
  targets: string[];
  values: bigint[];
  calldatas: string[];
  descriptionHash: string;
}

export interface SentRecord {
  dstEid: number;
  proposalId: string;
  sourceProposalId: string;
  messageId: string;
  guid: string;
  sentAt: number;
}

export interface ReceivedRecord {
  srcEid: number;
  proposalId: string;
  sourceProposalId: string;
  guid: string;
  receivedAt: number;
}

export interface RelayState {
  /** eid -> trusted remote application (bytes32). */
  peers: Record<string, string>;
  /** `${dstEid}:${proposalId}` -> sent record. */
  sent: Record<string, SentRecord>;
  /** messageId -> received record. */
  received: Record<string, ReceivedRecord>;
  /** dstEid -> last outbound nonce. */
  outboundNonces: Record<string, bigint>;
}
