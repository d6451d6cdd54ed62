import type { EventLogger } from '../infra/logger.js';
import type { GovernanceNetwork } from './governanceNetwork.js';

export interface RelayWorkerOptions {
  intervalMs: number;
  maxBatchSize: number;
}

export interface RelayTickResult {
  delivered: number;
  failed: number;
}

/**
 * Drains pending endpoint packets on an interval. A failed packet is left
 * failed; redelivery is an operator decision.
 */
export class RelayWorker {
  private running = false;
  private timer: ReturnType<typeof setInterval> | null = null;
  private ticking = false;

  constructor(
    private readonly network: GovernanceNetwork,
    private readonly logger: EventLogger,
    private readonly options: RelayWorkerOptions,
  ) {}

  start(): void {
    if (this.running) return;
    this.running = true;
    this.timer = setInterval(() => void this.tick(), this.options.intervalMs);
  }

  async stop(): Promise<void> {
    this.running = false;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    await this.logger.flush();
  }

  isRunning(): boolean {
    return this.running;
  }

  async tick(): Promise<RelayTickResult> {
    const result: RelayTickResult = { delivered: 0, failed: 0 };
    if (this.ticking) return result;
    this.ticking = true;

    try {
      for (const packet of this.network.endpoint.pending(this.options.maxBatchSize)) {
        const outcome = this.network.deliver(packet.guid);
        if (outcome.status === 'delivered') {
          result.delivered += 1;
          continue;
        }
        result.failed += 1;
        await this.logger.log('warn', 'relay.worker.delivery_failed', {
          guid: packet.guid,
          srcEid: packet.srcEid,
          dstEid: packet.dstEid,
          error: outcome.error,
        });
      }

      if (result.delivered + result.failed > 0) {
        await this.network.flush();
        await this.logger.log('info', 'relay.worker.tick', result);
      }
    } catch (error) {
      await this.logger.log('error', 'relay.worker.tick_failed', {
        error: error instanceof Error ? error.message : String(error),
      });
    } finally {
      this.ticking = false;
    }

    return result;
  }
}
