import fs from 'node:fs/promises';
import path from 'node:path';
import type { ChainState } from '../../types.js';
import { decodeState, encodeState } from '../../utils/json.js';
import { type EventBus, type EventType, eventBus as defaultEventBus } from '../eventBus.js';

interface PendingEvent {
  event: EventType;
  data: Record<string, unknown>;
}

const normalizeState = (raw: unknown, defaults: ChainState): ChainState => {
  const parsed = (raw && typeof raw === 'object' ? raw : {}) as Partial<ChainState>;

  return {
    ...defaults,
    ...parsed,
    eid: defaults.eid,
    access: {
      roles: { ...defaults.access.roles, ...(parsed.access?.roles ?? {}) },
      guardians: parsed.access?.guardians ?? {},
    },
    decay: {
      params: parsed.decay?.params ?? defaults.decay.params,
      accounts: parsed.decay?.accounts ?? {},
    },
    token: { ...defaults.token, ...(parsed.token ?? {}) },
    delegation: { ...defaults.delegation, ...(parsed.delegation ?? {}) },
    voting: { ...defaults.voting, ...(parsed.voting ?? {}) },
    governor: {
      ...defaults.governor,
      ...(parsed.governor ?? {}),
      params: { ...defaults.governor.params, ...(parsed.governor?.params ?? {}) },
    },
    timelock: { ...defaults.timelock, ...(parsed.timelock ?? {}) },
    relay: { ...defaults.relay, ...(parsed.relay ?? {}) },
    rewards: { ...defaults.rewards, ...(parsed.rewards ?? {}) },
    native: parsed.native ?? {},
  };
};

/**
 * Holds one chain's state. Every operation runs inside `transaction`, which
 * works on a copy and only swaps it in when the operation returns; a thrown
 * error leaves the committed state and the event stream untouched.
 */
export class StateStore {
  private committed: ChainState;
  private draft: ChainState | null = null;
  private pendingEvents: PendingEvent[] = [];
  private pendingEffects: Array<() => void> = [];
  private dirty = false;
  private lock: Promise<void> = Promise.resolve();

  constructor(
    private readonly defaults: ChainState,
    private readonly stateFilePath?: string,
    private readonly bus: EventBus = defaultEventBus,
  ) {
    this.committed = structuredClone(defaults);
  }

  get eid(): number {
    return this.committed.eid;
  }

  async init(): Promise<void> {
    if (!this.stateFilePath) return;
    await fs.mkdir(path.dirname(this.stateFilePath), { recursive: true });

    let raw: string | null = null;
    try {
      raw = await fs.readFile(this.stateFilePath, 'utf-8');
    } catch (error) {
      if (!isMissingFile(error)) throw error;
    }

    if (raw === null) {
      await this.persist();
      return;
    }
    this.committed = normalizeState(decodeState(raw), this.defaults);
  }

  /** Live state: the open draft inside a transaction, the committed state otherwise. */
  state(): ChainState {
    return this.draft ?? this.committed;
  }

  snapshot(): ChainState {
    return structuredClone(this.committed);
  }

  inTransaction(): boolean {
    return this.draft !== null;
  }

  transaction<T>(work: (state: ChainState) => T): T {
    if (this.draft) return work(this.draft);

    const draft = structuredClone(this.committed);
    this.draft = draft;
    this.pendingEvents = [];
    this.pendingEffects = [];

    let result: T;
    try {
      result = work(draft);
    } catch (error) {
      this.reset();
      throw error;
    }

    const events = this.pendingEvents;
    const effects = this.pendingEffects;
    this.committed = draft;
    this.dirty = true;
    this.reset();

    for (const effect of effects) effect();
    for (const { event, data } of events) {
      this.bus.emit(event, { chainId: this.committed.eid, ...data });
    }
    return result;
  }

  /** Queue an event for publication once the current operation commits. */
  emit(event: EventType, data: Record<string, unknown>): void {
    if (!this.draft) {
      this.bus.emit(event, { chainId: this.committed.eid, ...data });
      return;
    }
    this.pendingEvents.push({ event, data });
  }

  /** Run `effect` after the current operation commits; dropped on rollback. */
  afterCommit(effect: () => void): void {
    if (!this.draft) {
      effect();
      return;
    }
    this.pendingEffects.push(effect);
  }

  /** Writes the committed state; overlapping calls write one after another. */
  async flush(): Promise<void> {
    const previous = this.lock;
    let release: () => void = () => {};

    this.lock = new Promise<void>((resolve) => {
      release = resolve;
    });

    await previous;
    try {
      if (this.dirty) await this.persist();
    } finally {
      release();
    }
  }

  private reset(): void {
    this.draft = null;
    this.pendingEvents = [];
    this.pendingEffects = [];
  }

  private async persist(): Promise<void> {
    if (!this.stateFilePath) return;
    this.dirty = false;
    await fs.writeFile(this.stateFilePath, encodeState(this.committed));
  }
}

export const isMissingFile = (error: unknown): boolean => (
  error instanceof Error && 'code' in error && error.code === 'ENOENT'
);
