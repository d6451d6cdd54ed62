import fs from 'node:fs/promises';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { EventBus, type EventType } from '../src/infra/eventBus.js';
import { createDefaultState } from '../src/infra/storage/defaultState.js';
import { StateStore } from '../src/infra/storage/stateStore.js';
import { ALICE, makeTempDir, testGenesis } from './helpers/governanceFixture.js';

describe('StateStore', () => {
  let bus: EventBus;
  let received: Array<{ event: EventType; data: unknown }>;

  beforeEach(() => {
    bus = new EventBus();
    received = [];
    bus.on('*', (event, data) => {
      received.push({ event, data });
    });
  });

  const makeStore = (file?: string): StateStore => new StateStore(createDefaultState(testGenesis(5)), file, bus);

  it('commits the draft when the operation returns', () => {
    const store = makeStore();
    const result = store.transaction((state) => {
      state.native[ALICE] = 10n;
      return 'done';
    });

    expect(result).toBe('done');
    expect(store.state().native[ALICE]).toBe(10n);
    expect(store.inTransaction()).toBe(false);
  });

  it('discards every change and queued event when the operation throws', () => {
    const store = makeStore();

    expect(() => store.transaction((state) => {
      state.native[ALICE] = 10n;
      store.emit('rewards.staked', { account: ALICE });
      throw new Error('boom');
    })).toThrow('boom');

    expect(store.state().native[ALICE]).toBeUndefined();
    expect(received).toHaveLength(0);
  });

  it('publishes queued events after commit, tagged with the chain id', () => {
    const store = makeStore();
    store.transaction(() => {
      store.emit('rewards.staked', { account: ALICE });
      expect(received).toHaveLength(0);
    });

    expect(received).toEqual([{ event: 'rewards.staked', data: { chainId: 5, account: ALICE } }]);
  });

  it('runs nested operations inside the outer draft', () => {
    const store = makeStore();

    expect(() => store.transaction((outer) => {
      outer.native[ALICE] = 1n;
      store.transaction((inner) => {
        inner.native[ALICE] = 2n;
      });
      throw new Error('outer failed');
    })).toThrow('outer failed');

    expect(store.state().native[ALICE]).toBeUndefined();
  });

  it('runs after-commit effects only on success', () => {
    const store = makeStore();
    const effects: string[] = [];

    store.transaction(() => store.afterCommit(() => effects.push('committed')));
    expect(() => store.transaction(() => {
      store.afterCommit(() => effects.push('rolled back'));
      throw new Error('nope');
    })).toThrow('nope');

    expect(effects).toEqual(['committed']);
  });

  describe('persistence', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await makeTempDir('store');
    });

    afterEach(async () => {
      await fs.rm(dir, { recursive: true, force: true });
    });

    it('round-trips bigint amounts through the state file', async () => {
      const file = path.join(dir, 'chain-5.json');
      const store = makeStore(file);
      await store.init();
      store.transaction((state) => {
        state.native[ALICE] = 123_456_789_012_345_678_901_234_567_890n;
      });
      await store.flush();

      const reloaded = makeStore(file);
      await reloaded.init();
      expect(reloaded.state().native[ALICE]).toBe(123_456_789_012_345_678_901_234_567_890n);
      expect(reloaded.state().governor.params.proposalThreshold).toBe(10n ** 21n);
    });

    it('serialises overlapping flushes so the latest commit is what lands on disk', async () => {
      const file = path.join(dir, 'chain-5.json');
      const store = makeStore(file);
      await store.init();

      store.transaction((state) => {
        state.native[ALICE] = 1n;
      });
      const first = store.flush();
      store.transaction((state) => {
        state.native[ALICE] = 2n;
      });
      const second = store.flush();
      await Promise.all([first, second]);

      const reloaded = makeStore(file);
      await reloaded.init();
      expect(reloaded.state().native[ALICE]).toBe(2n);
    });

    it('writes the defaults when no state file exists yet', async () => {
      const file = path.join(dir, 'nested', 'chain-5.json');
      await makeStore(file).init();

      const raw = await fs.readFile(file, 'utf-8');
      expect(JSON.parse(raw)).toMatchObject({ eid: 5 });
    });
  });
});
