import Fastify, { type FastifyInstance } from 'fastify';
import fastifyWebSocket from '@fastify/websocket';
import { registerRoutes } from './api/routes.js';
import { connectedClients, registerWebSocket } from './api/websocket.js';
import type { AppConfig } from './config.js';
import { type ChainClock, ManualClock, SystemClock } from './domain/chain/clock.js';
import { eventBus } from './infra/eventBus.js';
import { EventLogger, type LogLevel } from './infra/logger.js';
import { GovernanceNetwork } from './services/governanceNetwork.js';
import { type NetworkConfig, loadNetworkConfig } from './services/networkConfig.js';
import { RelayWorker } from './services/relayWorker.js';

export interface AppContext {
  app: FastifyInstance;
  network: GovernanceNetwork;
  worker: RelayWorker;
  logger: EventLogger;
}

export interface BuildOverrides {
  network?: NetworkConfig;
  clock?: ChainClock;
  /** Keep chain state in memory only. */
  ephemeral?: boolean;
}

const FAILURE_EVENTS = new Set(['relay.packet.failed']);

export async function buildApp(config: AppConfig, overrides: BuildOverrides = {}): Promise<AppContext> {
  const app = Fastify({
    logger: false,
  });

  // Register WebSocket plugin first so routes can use { websocket: true }.
  await app.register(fastifyWebSocket);

  const logger = new EventLogger(config.paths.logFile);
  await logger.init();

  const clock = overrides.clock ?? (
    config.clock.mode === 'manual' ? new ManualClock(config.clock.startAt) : new SystemClock()
  );
  const networkConfig = overrides.network ?? await loadNetworkConfig(config.paths.networkFile);
  const network = await GovernanceNetwork.create({
    config,
    network: networkConfig,
    clock,
    ephemeral: overrides.ephemeral,
  });
  await network.flush();

  const unsubscribeLogger = eventBus.on('*', (event, data) => {
    const level: LogLevel = FAILURE_EVENTS.has(event) ? 'warn' : 'info';
    void logger.log(level, event, data);
  });
  app.addHook('onClose', async () => {
    unsubscribeLogger();
  });

  const worker = new RelayWorker(network, logger, {
    intervalMs: config.relay.intervalMs,
    maxBatchSize: config.relay.maxBatchSize,
  });

  const startedAt = Date.now();
  await registerRoutes(app, {
    config,
    network,
    getRuntimeMetrics: () => ({
      uptimeSeconds: Math.floor((Date.now() - startedAt) / 1000),
      pendingPackets: network.packets('pending').length,
      processPid: process.pid,
      wsClients: connectedClients(),
    }),
  });
  await registerWebSocket(app);

  return { app, network, worker, logger };
}
