import { type Interface, type Result, getAddress, isAddress } from 'ethers';
import { DomainError, ErrorCode } from '../../errors/taxonomy.js';
import type { StateStore } from '../../infra/storage/stateStore.js';
import type { Address } from '../../types.js';

export interface CallContext {
  sender: Address;
  value: bigint;
}

/** A local contract reachable from proposal actions. */
export interface CallTarget {
  readonly iface: Interface;
  invoke(name: string, args: Result, context: CallContext): void;
}

export interface CallAction {
  target: string;
  value: bigint;
  calldata: string;
}

/**
 * Dispatches encoded proposal actions to registered local targets. Any
 * failing action reverts the caller's whole operation.
 */
export class CallRouter {
  private readonly targets: Map<Address, CallTarget> = new Map();

  constructor(private readonly store: StateStore) {}

  register(address: Address, target: CallTarget): void {
    this.targets.set(getAddress(address), target);
  }

  has(address: string): boolean {
    return isAddress(address) && this.targets.has(getAddress(address));
  }

  execute(sender: Address, action: CallAction): void {
    const address = isAddress(action.target) ? getAddress(action.target) : null;
    const target = address ? this.targets.get(address) : undefined;
    if (!address || !target) {
      throw new DomainError(ErrorCode.CallReverted, 422, 'Call target is not a known contract.', {
        target: action.target,
      });
    }

    const parsed = target.iface.parseTransaction({ data: action.calldata, value: action.value });
    if (!parsed) {
      throw new DomainError(ErrorCode.CallReverted, 422, 'Calldata does not match any function of the target.', {
        target: address,
        selector: action.calldata.slice(0, 10),
      });
    }

    this.transferValue(sender, address, action.value);
    target.invoke(parsed.name, parsed.args, { sender, value: action.value });
  }

  executeBatch(sender: Address, actions: CallAction[]): void {
    for (const action of actions) this.execute(sender, action);
  }

  private transferValue(from: Address, to: Address, value: bigint): void {
    if (value === 0n) return;
    const native = this.store.state().native;
    const balance = native[from] ?? 0n;
    if (balance < value) {
      throw new DomainError(ErrorCode.CallReverted, 422, 'Sender cannot cover the call value.', {
        sender: from,
        balance: balance.toString(),
        value: value.toString(),
      });
    }
    native[from] = balance - value;
    native[to] = (native[to] ?? 0n) + value;
  }
}

export const toActions = (targets: string[], values: bigint[], calldatas: string[]): CallAction[] => (
  targets.map((target, index) => ({ target, value: values[index], calldata: calldatas[index] }))
);
