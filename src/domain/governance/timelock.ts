import { Interface, ZeroHash } from 'ethers';
import { DomainError, ErrorCode } from '../../errors/taxonomy.js';
import type { StateStore } from '../../infra/storage/stateStore.js';
import type { Address } from '../../types.js';
import type { ChainClock } from '../chain/clock.js';
import { argSafeInteger } from './abiArgs.js';
import { type CallContext, type CallRouter, type CallTarget, toActions } from './callRouter.js';
import { hashOperationBatch } from './proposalHashing.js';

export type OperationState = 'unset' | 'waiting' | 'ready' | 'done';

export interface ScheduledBatch {
  targets: string[];
  values: bigint[];
  payloads: string[];
  salt: string;
}

const TIMELOCK_ABI = new Interface([
  'function updateDelay(uint256 newDelay)',
]);

/**
 * Timelock the governor queues through. Only the governor may schedule,
 * execute or cancel; the delay itself changes only through an executed
 * operation.
 */
export class Timelock {
  constructor(
    private readonly store: StateStore,
    private readonly clock: ChainClock,
    private readonly router: CallRouter,
    readonly address: Address,
    private readonly proposer: Address,
  ) {}

  minDelay(): number {
    return this.store.state().timelock.minDelay;
  }

  gracePeriod(): number {
    return this.store.state().timelock.gracePeriod;
  }

  operationId(batch: ScheduledBatch): string {
    return hashOperationBatch(batch.targets, batch.values, batch.payloads, ZeroHash, batch.salt);
  }

  operationState(id: string): OperationState {
    const operation = this.store.state().timelock.operations[id];
    if (!operation) return 'unset';
    if (operation.done) return 'done';
    return operation.readyAt <= this.clock.now() ? 'ready' : 'waiting';
  }

  scheduleBatch(caller: Address, batch: ScheduledBatch, delay: number): { operationId: string; readyAt: number } {
    this.requireProposer(caller);
    const timelock = this.store.state().timelock;
    if (delay < timelock.minDelay) {
      throw new DomainError(ErrorCode.InvalidTimelockDelay, 400, 'Delay is below the timelock minimum.', {
        delay,
        minDelay: timelock.minDelay,
      });
    }

    const operationId = this.operationId(batch);
    if (timelock.operations[operationId]) {
      throw new DomainError(ErrorCode.TimelockOperationExists, 409, 'Operation is already scheduled.', { operationId });
    }

    const readyAt = this.clock.now() + delay;
    timelock.operations[operationId] = { readyAt, done: false };
    return { operationId, readyAt };
  }

  executeBatch(caller: Address, batch: ScheduledBatch): void {
    this.requireProposer(caller);
    const operationId = this.operationId(batch);
    if (this.operationState(operationId) !== 'ready') {
      throw new DomainError(ErrorCode.TimelockNotReady, 409, 'Operation is not ready for execution.', {
        operationId,
        state: this.operationState(operationId),
      });
    }

    this.store.state().timelock.operations[operationId].done = true;
    this.router.executeBatch(this.address, toActions(batch.targets, batch.values, batch.payloads));
  }

  cancel(caller: Address, operationId: string): void {
    this.requireProposer(caller);
    const state = this.operationState(operationId);
    if (state !== 'waiting' && state !== 'ready') {
      throw new DomainError(ErrorCode.UnexpectedProposalState, 409, 'Only pending operations can be cancelled.', {
        operationId,
        state,
      });
    }
    delete this.store.state().timelock.operations[operationId];
  }

  callTarget(): CallTarget {
    return {
      iface: TIMELOCK_ABI,
      invoke: (name, args, context) => this.invoke(name, args, context),
    };
  }

  private invoke(name: string, args: Parameters<CallTarget['invoke']>[1], context: CallContext): void {
    if (context.sender !== this.address) {
      throw new DomainError(ErrorCode.OnlyGovernance, 403, 'Timelock settings change only through the timelock.');
    }
    if (name === 'updateDelay') {
      this.store.state().timelock.minDelay = argSafeInteger(args, 0);
    }
  }

  private requireProposer(caller: Address): void {
    if (caller !== this.proposer) {
      throw new DomainError(ErrorCode.Unauthorized, 403, 'Caller is not the timelock proposer.', { caller });
    }
  }
}
