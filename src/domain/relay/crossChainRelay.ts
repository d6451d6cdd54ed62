/**
 * Cross-chain proposal relay.
 *
 * Outbound: a governor, while executing a proposal, ships the actions of a
 * follow-up proposal to a peer chain. Inbound: a verified payload becomes a
 * queued proposal on the receiving chain. Delivery is at-least-once and
 * unordered, so every message is deduplicated by its content-addressed id.
 */

import { DomainError, ErrorCode } from '../../errors/taxonomy.js';
import type { StateStore } from '../../infra/storage/stateStore.js';
import type { Address } from '../../types.js';
import type { ChainClock } from '../chain/clock.js';
import { addressToBytes32 } from '../chain/systemAddresses.js';
import type { ProposalActions, RelayedOrigin } from '../governance/governanceTypes.js';
import { hashProposal } from '../governance/proposalHashing.js';
import { decodeLzReceiveOptions } from './executorOptions.js';
import { computeGuid, computeMessageId, decodeRelayPayload, encodeRelayPayload } from './relayCodec.js';
import type {
  MessageReceiver,
  MessageTransport,
  MessagingFee,
  MessagingReceipt,
  Origin,
  OutboundPacket,
} from './relayTypes.js';

/** True when `sourceProposalId` has been executed locally. */
export type ProposalGate = (sourceProposalId: string) => boolean;

/** Turns a verified inbound message into a local proposal; returns its id. */
export type InboundHandler = (actions: ProposalActions, origin: RelayedOrigin) => string;

export interface SendProposalInput extends ProposalActions {
  sourceProposalId: string;
  dstEid: number;
  options: string;
  /**
   * Native amount offered for the fee, drawn from the application's balance.
   * `null` pays exactly the quote.
   */
  paid: bigint | null;
  refundTo: Address;
}

const BYTES32 = /^0x[0-9a-f]{64}$/;

export class CrossChainRelay implements MessageReceiver {
  private proposalGate: ProposalGate = () => false;
  private inboundHandler: InboundHandler | null = null;

  constructor(
    private readonly store: StateStore,
    private readonly clock: ChainClock,
    private readonly transport: MessageTransport,
    /** Local application address; peers register this, padded to bytes32. */
    private readonly app: Address,
  ) {}

  get eid(): number {
    return this.store.eid;
  }

  setProposalGate(gate: ProposalGate): void {
    this.proposalGate = gate;
  }

  setInboundHandler(handler: InboundHandler): void {
    this.inboundHandler = handler;
  }

  peers(): Record<string, string> {
    return { ...this.store.state().relay.peers };
  }

  setPeer(eid: number, peer: string): void {
    const normalized = peer.toLowerCase();
    if (!BYTES32.test(normalized)) {
      throw new DomainError(ErrorCode.InvalidPayload, 400, 'Peer must be a bytes32 value.', { eid, peer });
    }
    this.store.state().relay.peers[String(eid)] = normalized;
  }

  quoteSend(dstEid: number, actions: ProposalActions, sourceProposalId: string, options: string): MessagingFee {
    this.requirePeer(dstEid);
    decodeLzReceiveOptions(options);
    const payload = encodeRelayPayload({
      messageId: this.messageIdFor(actions, sourceProposalId),
      sourceProposalId,
      ...actions,
    });
    return this.transport.quote(dstEid, payload, options);
  }

  send(input: SendProposalInput): MessagingReceipt {
    const { dstEid, sourceProposalId, targets, values, calldatas, descriptionHash, options } = input;

    if (!this.proposalGate(sourceProposalId)) {
      throw new DomainError(ErrorCode.UnexpectedProposalState, 409, 'Only an executed proposal can relay actions.', {
        sourceProposalId,
      });
    }
    if (targets.length === 0) {
      throw new DomainError(ErrorCode.EmptyRelayPayload, 400, 'Relayed proposal has no actions.');
    }
    if (targets.length !== values.length || targets.length !== calldatas.length) {
      throw new DomainError(ErrorCode.InvalidProposalLength, 400, 'Relayed proposal arrays differ in length.');
    }

    const receiver = this.requirePeer(dstEid);
    const relay = this.store.state().relay;
    const dstProposalId = hashProposal(targets, values, calldatas, descriptionHash);
    const sentKey = `${dstEid}:${dstProposalId}`;
    if (relay.sent[sentKey]) {
      throw new DomainError(ErrorCode.ProposalAlreadySent, 409, 'Proposal was already sent to this chain.', {
        dstEid,
        proposalId: dstProposalId,
      });
    }

    decodeLzReceiveOptions(options);
    const actions = { targets, values, calldatas, descriptionHash };
    const messageId = this.messageIdFor(actions, sourceProposalId);
    const payload = encodeRelayPayload({ messageId, sourceProposalId, ...actions });
    const fee = this.transport.quote(dstEid, payload, options);
    this.chargeFee(fee, input.paid, input.refundTo);

    const nonce = (relay.outboundNonces[String(dstEid)] ?? 0n) + 1n;
    relay.outboundNonces[String(dstEid)] = nonce;

    const sender = addressToBytes32(this.app);
    const guid = computeGuid(nonce, this.eid, sender, dstEid, receiver);
    relay.sent[sentKey] = {
      dstEid,
      proposalId: dstProposalId,
      sourceProposalId,
      messageId,
      guid,
      sentAt: this.clock.now(),
    };

    const packet: OutboundPacket = {
      guid,
      nonce,
      srcEid: this.eid,
      sender,
      dstEid,
      receiver,
      payload,
      options,
      fee,
    };
    this.store.afterCommit(() => this.transport.send(packet));
    this.store.emit('proposal.sent.crosschain', {
      dstEid,
      proposalId: dstProposalId,
      sourceProposalId,
      messageId,
      guid,
      nativeFee: fee.nativeFee,
    });

    return { guid, nonce, fee };
  }

  lzReceive(origin: Origin, guid: string, payload: string, _executor: string, _extraData: string): void {
    const peer = this.store.state().relay.peers[String(origin.srcEid)];
    if (!peer || peer !== origin.sender.toLowerCase()) {
      throw new DomainError(ErrorCode.UntrustedRemote, 403, 'Message sender is not a trusted peer.', {
        srcEid: origin.srcEid,
        sender: origin.sender,
      });
    }
    if (payload === '0x' || payload.length === 0) {
      throw new DomainError(ErrorCode.EmptyRelayPayload, 400, 'Relay payload is empty.');
    }

    const message = decodeRelayPayload(payload);
    const expected = computeMessageId({
      srcEid: origin.srcEid,
      sender: peer,
      sourceProposalId: message.sourceProposalId,
      targets: message.targets,
      values: message.values,
      calldatas: message.calldatas,
      descriptionHash: message.descriptionHash,
    });
    if (expected !== message.messageId) {
      throw new DomainError(ErrorCode.MessageIdMismatch, 422, 'Embedded message id does not match the payload.', {
        expected,
        received: message.messageId,
      });
    }

    const relay = this.store.state().relay;
    if (relay.received[message.messageId]) {
      throw new DomainError(ErrorCode.ProposalAlreadyReceived, 409, 'Message was already received.', {
        messageId: message.messageId,
      });
    }
    if (!this.inboundHandler) {
      throw new DomainError(ErrorCode.InternalError, 500, 'No governor is attached to the relay.');
    }

    const proposalId = this.inboundHandler(
      {
        targets: message.targets,
        values: message.values,
        calldatas: message.calldatas,
        descriptionHash: message.descriptionHash,
      },
      { srcEid: origin.srcEid, sourceProposalId: message.sourceProposalId, messageId: message.messageId, guid },
    );

    relay.received[message.messageId] = {
      srcEid: origin.srcEid,
      proposalId,
      sourceProposalId: message.sourceProposalId,
      guid,
      receivedAt: this.clock.now(),
    };
    this.store.emit('proposal.received.crosschain', {
      srcEid: origin.srcEid,
      proposalId,
      sourceProposalId: message.sourceProposalId,
      messageId: message.messageId,
      guid,
    });
  }

  private messageIdFor(actions: ProposalActions, sourceProposalId: string): string {
    return computeMessageId({
      srcEid: this.eid,
      sender: addressToBytes32(this.app),
      sourceProposalId,
      ...actions,
    });
  }

  private chargeFee(fee: MessagingFee, offered: bigint | null, refundTo: Address): void {
    const paid = offered ?? fee.nativeFee;
    const native = this.store.state().native;
    const balance = native[this.app] ?? 0n;
    if (paid < fee.nativeFee || balance < paid) {
      throw new DomainError(ErrorCode.InsufficientFee, 402, 'Paid amount does not cover the messaging fee.', {
        quoted: fee.nativeFee.toString(),
        paid: paid.toString(),
        balance: balance.toString(),
      });
    }
    native[this.app] = balance - paid;
    const refund = paid - fee.nativeFee;
    if (refund > 0n) native[refundTo] = (native[refundTo] ?? 0n) + refund;
  }

  private requirePeer(dstEid: number): string {
    const peer = this.store.state().relay.peers[String(dstEid)];
    if (!peer) {
      throw new DomainError(ErrorCode.UntrustedRemote, 422, 'No peer is registered for the destination chain.', {
        dstEid,
      });
    }
    return peer;
  }
}
