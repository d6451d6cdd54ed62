import fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { DomainError, ErrorCode } from '../../errors/taxonomy.js';
import { type EventBus, eventBus as defaultEventBus } from '../../infra/eventBus.js';
import { isMissingFile } from '../../infra/storage/stateStore.js';
import { decodeState, encodeState } from '../../utils/json.js';
import { isoNow } from '../../utils/time.js';
import { decodeLzReceiveOptions } from './executorOptions.js';
import type { MessageReceiver, MessageTransport, MessagingFee, OutboundPacket } from './relayTypes.js';

export type PacketStatus = 'pending' | 'delivered' | 'failed';

export interface PacketRecord extends OutboundPacket {
  status: PacketStatus;
  attempts: number;
  queuedAt: string;
  deliveredAt?: string;
  lastError?: { code: string; message: string };
}

export interface EndpointFeeSchedule {
  baseFee: bigint;
  feePerByte: bigint;
  gasPrice: bigint;
}

export interface DeliveryResult {
  guid: string;
  status: PacketStatus;
  error?: { code: string; message: string };
}

const failureSchema = z.object({ code: z.string(), message: z.string() });

const packetFileSchema = z.array(z.object({
  guid: z.string(),
  nonce: z.bigint(),
  srcEid: z.number().int(),
  sender: z.string(),
  dstEid: z.number().int(),
  receiver: z.string(),
  payload: z.string(),
  options: z.string(),
  fee: z.object({ nativeFee: z.bigint(), lzTokenFee: z.bigint() }),
  status: z.enum(['pending', 'delivered', 'failed']),
  attempts: z.number().int().nonnegative(),
  queuedAt: z.string(),
  deliveredAt: z.string().optional(),
  lastError: failureSchema.optional(),
}));

/** Executor identity reported to receivers. */
export const LOCAL_EXECUTOR = '0x0000000000000000000000000000000000000001';

/**
 * In-process message endpoint shared by every chain of a network. Packets
 * queue until something delivers them; delivery may repeat and may happen in
 * any order. With a packet file the queue survives restarts.
 */
export class LocalEndpoint implements MessageTransport {
  private readonly receivers: Map<number, MessageReceiver> = new Map();
  private readonly packets: Map<string, PacketRecord> = new Map();
  private dirty = false;
  private lock: Promise<void> = Promise.resolve();

  constructor(
    private readonly fees: EndpointFeeSchedule,
    private readonly bus: EventBus = defaultEventBus,
    private readonly packetFilePath?: string,
  ) {}

  async init(): Promise<void> {
    if (!this.packetFilePath) return;
    await fs.mkdir(path.dirname(this.packetFilePath), { recursive: true });

    let raw: string;
    try {
      raw = await fs.readFile(this.packetFilePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) return;
      throw error;
    }

    for (const packet of packetFileSchema.parse(decodeState(raw))) {
      this.packets.set(packet.guid, packet);
    }
  }

  async flush(): Promise<void> {
    const previous = this.lock;
    let release: () => void = () => {};

    this.lock = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    try {
      if (this.dirty && this.packetFilePath) {
        this.dirty = false;
        await fs.writeFile(this.packetFilePath, encodeState([...this.packets.values()]));
      }
    } finally {
      release();
    }
  }

  register(eid: number, receiver: MessageReceiver): void {
    this.receivers.set(eid, receiver);
  }

  quote(dstEid: number, payload: string, options: string): MessagingFee {
    if (!this.receivers.has(dstEid)) {
      throw new DomainError(ErrorCode.ChainNotFound, 404, 'Destination chain is not connected.', { dstEid });
    }
    const { gas, value } = decodeLzReceiveOptions(options);
    const payloadBytes = BigInt(Math.max(0, (payload.length - 2) / 2));
    return {
      nativeFee: this.fees.baseFee + this.fees.feePerByte * payloadBytes + gas * this.fees.gasPrice + value,
      lzTokenFee: 0n,
    };
  }

  send(packet: OutboundPacket): void {
    this.packets.set(packet.guid, { ...packet, status: 'pending', attempts: 0, queuedAt: isoNow() });
    this.dirty = true;
  }

  list(status?: PacketStatus): PacketRecord[] {
    const all = [...this.packets.values()];
    return status ? all.filter((packet) => packet.status === status) : all;
  }

  pending(limit = Number.POSITIVE_INFINITY): PacketRecord[] {
    return this.list('pending').slice(0, limit);
  }

  get(guid: string): PacketRecord {
    const packet = this.packets.get(guid);
    if (!packet) {
      throw new DomainError(ErrorCode.PacketNotFound, 404, 'Packet not found.', { guid });
    }
    return packet;
  }

  /**
   * Hand a packet to its destination. Failures are recorded on the packet;
   * a packet already delivered stays delivered when a redelivery is rejected.
   */
  deliver(guid: string): DeliveryResult {
    const packet = this.get(guid);
    const receiver = this.receivers.get(packet.dstEid);
    if (!receiver) {
      throw new DomainError(ErrorCode.ChainNotFound, 404, 'Destination chain is not connected.', {
        dstEid: packet.dstEid,
      });
    }

    packet.attempts += 1;
    this.dirty = true;
    try {
      receiver.lzReceive(
        { srcEid: packet.srcEid, sender: packet.sender, nonce: packet.nonce },
        packet.guid,
        packet.payload,
        LOCAL_EXECUTOR,
        '0x',
      );
    } catch (error) {
      const failure = describeFailure(error);
      packet.lastError = failure;
      if (packet.status !== 'delivered') packet.status = 'failed';
      this.bus.emit('relay.packet.failed', {
        chainId: packet.dstEid,
        guid,
        srcEid: packet.srcEid,
        attempts: packet.attempts,
        ...failure,
      });
      return { guid, status: packet.status, error: failure };
    }

    packet.status = 'delivered';
    packet.deliveredAt = isoNow();
    delete packet.lastError;
    this.bus.emit('relay.packet.delivered', {
      chainId: packet.dstEid,
      guid,
      srcEid: packet.srcEid,
      attempts: packet.attempts,
    });
    return { guid, status: packet.status };
  }
}

const describeFailure = (error: unknown): { code: string; message: string } => {
  if (error instanceof DomainError) return { code: error.code, message: error.message };
  if (error instanceof Error) return { code: ErrorCode.InternalError, message: error.message };
  return { code: ErrorCode.InternalError, message: String(error) };
};
