import { buildApp } from './app.js';
import { config } from './config.js';

async function main(): Promise<void> {
  const { app, network, worker, logger } = await buildApp(config);

  const shutdown = async (signal: string): Promise<void> => {
    await logger.log('info', 'shutdown.start', { signal });
    await worker.stop();
    await app.close();
    await network.flush();
    await logger.log('info', 'shutdown.complete', { signal });
    process.exit(0);
  };

  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });

  await app.listen({ port: config.app.port, host: '0.0.0.0' });
  if (config.relay.workerEnabled) worker.start();

  await logger.log('info', 'server.started', {
    port: config.app.port,
    env: config.app.env,
    clockMode: config.clock.mode,
    hubChainId: network.hub().eid,
    chains: network.list().map((chain) => chain.eid),
    relayWorker: config.relay.workerEnabled,
  });
}

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
