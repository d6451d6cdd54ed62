import fs from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ManualClock } from '../src/domain/chain/clock.js';
import { addressToBytes32 } from '../src/domain/chain/systemAddresses.js';
import { hashDescription } from '../src/domain/governance/proposalHashing.js';
import { buildLzReceiveOptions } from '../src/domain/relay/executorOptions.js';
import { computeMessageId, encodeRelayPayload } from '../src/domain/relay/relayCodec.js';
import { EventBus } from '../src/infra/eventBus.js';
import { EventLogger, type LogEntry } from '../src/infra/logger.js';
import { GovernanceNetwork } from '../src/services/governanceNetwork.js';
import { RelayWorker } from '../src/services/relayWorker.js';
import { GOVERNOR_ABI } from '../src/services/callTargets.js';
import {
  HUB_EID,
  SATELLITE_EID,
  T0,
  makeNetworkConfig,
  makeTempDir,
  makeTestConfig,
} from './helpers/governanceFixture.js';

const GOOD_GUID = `0x${'01'.repeat(32)}`;
const BAD_GUID = `0x${'02'.repeat(32)}`;

describe('RelayWorker', () => {
  let dir: string;
  let network: GovernanceNetwork;
  let logger: EventLogger;

  beforeEach(async () => {
    dir = await makeTempDir('worker');
    const config = makeTestConfig(dir);
    network = await GovernanceNetwork.create({
      config,
      network: makeNetworkConfig(),
      clock: new ManualClock(T0),
      bus: new EventBus(),
      ephemeral: true,
    });
    logger = new EventLogger(config.paths.logFile);
    await logger.init();
  });

  afterEach(async () => {
    await logger.flush();
    await fs.rm(dir, { recursive: true, force: true });
  });

  const readLog = async (): Promise<LogEntry[]> => {
    const raw = await fs.readFile(path.join(dir, 'events.ndjson'), 'utf-8');
    return raw.trim().split('\n').map((line): LogEntry => JSON.parse(line));
  };

  const queuePacket = (guid: string, payload: string, target: GovernanceNetwork = network): void => {
    const hub = target.hub();
    const satellite = target.chain(SATELLITE_EID);
    target.endpoint.send({
      guid,
      nonce: 1n,
      srcEid: HUB_EID,
      sender: addressToBytes32(hub.addresses.governor),
      dstEid: SATELLITE_EID,
      receiver: addressToBytes32(satellite.addresses.governor),
      payload,
      options: buildLzReceiveOptions(200_000n),
      fee: { nativeFee: 0n, lzTokenFee: 0n },
    });
  };

  const validPayload = (): string => {
    const actions = {
      targets: [network.chain(SATELLITE_EID).addresses.governor],
      values: [0n],
      calldatas: [GOVERNOR_ABI.encodeFunctionData('setVotingDelay', [5])],
      descriptionHash: hashDescription('Worker delivery'),
    };
    const sender = addressToBytes32(network.hub().addresses.governor);
    const messageId = computeMessageId({ srcEid: HUB_EID, sender, sourceProposalId: '7', ...actions });
    return encodeRelayPayload({ messageId, sourceProposalId: '7', ...actions });
  };

  it('delivers pending packets and logs the tick', async () => {
    queuePacket(GOOD_GUID, validPayload());
    const worker = new RelayWorker(network, logger, { intervalMs: 60_000, maxBatchSize: 10 });

    expect(await worker.tick()).toEqual({ delivered: 1, failed: 0 });
    expect(network.endpoint.get(GOOD_GUID).status).toBe('delivered');
    expect(network.chain(SATELLITE_EID).proposals()).toHaveLength(1);

    const entries = await readLog();
    expect(entries).toHaveLength(1);
    expect(entries[0]).toMatchObject({ level: 'info', event: 'relay.worker.tick', data: { delivered: 1, failed: 0 } });

    expect(await worker.tick()).toEqual({ delivered: 0, failed: 0 });
    expect(await readLog()).toHaveLength(1);
  });

  it('counts and logs packets the destination rejects', async () => {
    queuePacket(GOOD_GUID, validPayload());
    queuePacket(BAD_GUID, '0x');
    const worker = new RelayWorker(network, logger, { intervalMs: 60_000, maxBatchSize: 10 });

    expect(await worker.tick()).toEqual({ delivered: 1, failed: 1 });
    expect(network.endpoint.get(BAD_GUID).status).toBe('failed');

    const entries = await readLog();
    expect(entries.map((entry) => [entry.level, entry.event])).toEqual([
      ['warn', 'relay.worker.delivery_failed'],
      ['info', 'relay.worker.tick'],
    ]);
    expect(entries[0].data).toMatchObject({ guid: BAD_GUID, srcEid: HUB_EID, dstEid: SATELLITE_EID });

    // failed packets are not retried by later ticks
    expect(await worker.tick()).toEqual({ delivered: 0, failed: 0 });
  });

  it('delivers at most one batch per tick', async () => {
    queuePacket(GOOD_GUID, validPayload());
    queuePacket(BAD_GUID, '0x');
    const worker = new RelayWorker(network, logger, { intervalMs: 60_000, maxBatchSize: 1 });

    expect(await worker.tick()).toEqual({ delivered: 1, failed: 0 });
    expect(network.packets('pending').map((packet) => packet.guid)).toEqual([BAD_GUID]);
  });

  it('delivers packets queued before a restart', async () => {
    const config = makeTestConfig(dir);
    const open = () => GovernanceNetwork.create({
      config,
      network: makeNetworkConfig(),
      clock: new ManualClock(T0),
      bus: new EventBus(),
    });

    const first = await open();
    queuePacket(GOOD_GUID, validPayload(), first);
    await first.flush();

    const restarted = await open();
    expect(restarted.packets('pending').map((packet) => packet.guid)).toEqual([GOOD_GUID]);

    const worker = new RelayWorker(restarted, logger, { intervalMs: 60_000, maxBatchSize: 10 });
    expect(await worker.tick()).toEqual({ delivered: 1, failed: 0 });
    expect(restarted.chain(SATELLITE_EID).proposals()).toHaveLength(1);
  });

  it('starts and stops its interval', async () => {
    const worker = new RelayWorker(network, logger, { intervalMs: 60_000, maxBatchSize: 10 });

    worker.start();
    expect(worker.isRunning()).toBe(true);
    await worker.stop();
    expect(worker.isRunning()).toBe(false);
  });
});
