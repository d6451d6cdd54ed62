import { DomainError, ErrorCode } from '../../errors/taxonomy.js';
import type { StateStore } from '../../infra/storage/stateStore.js';
import type { Address } from '../../types.js';
import { type AccessControl, Role } from '../access/accessControl.js';
import type { ChainClock } from '../chain/clock.js';
import type { ProtocolConfig } from '../protocol.js';
import { WAD, decayFactor } from './decayMath.js';
import type { AccountDecayRecord, DecayFunction, DecayParams } from './decayTypes.js';

/**
 * Per-account decay state.
 *
 * Refreshes are explicit: reads never mutate, and only decay controllers
 * (token, rewards manager, governor) may advance an account's record.
 */
export class DecayLedger {
  constructor(
    private readonly store: StateStore,
    private readonly clock: ChainClock,
    private readonly access: AccessControl,
    private readonly protocol: ProtocolConfig,
  ) {}

  getParams(): DecayParams {
    return { ...this.store.state().decay.params };
  }

  getRecord(account: Address): AccountDecayRecord | null {
    const record = this.store.state().decay.accounts[account];
    return record ? { ...record } : null;
  }

  /** Stored factor, without applying decay accrued since the last refresh. */
  getFactor(account: Address): bigint {
    return this.store.state().decay.accounts[account]?.decayFactor ?? WAD;
  }

  /** Factor a refresh would store right now. */
  projectedFactor(account: Address): bigint {
    const record = this.store.state().decay.accounts[account];
    if (!record) return WAD;
    return this.project(record, this.clock.now()).decayFactor;
  }

  refresh(caller: Address, account: Address): AccountDecayRecord {
    if (!this.access.hasRole(Role.DecayController, caller)) {
      throw new DomainError(ErrorCode.Unauthorized, 403, 'Caller is not a decay controller.', { caller });
    }

    const decay = this.store.state().decay;
    const now = this.clock.now();
    const existing = decay.accounts[account];

    if (existing && now <= existing.decayFreeWindowEnd) {
      return { ...existing };
    }

    const next: AccountDecayRecord = existing
      ? this.project(existing, now)
      : { decayFactor: WAD, lastUpdatedAt: now, decayFreeWindowEnd: now + decay.params.decayFreeWindow };

    decay.accounts[account] = next;
    this.store.emit('decay.updated', {
      account,
      previousFactor: existing?.decayFactor ?? WAD,
      decayFactor: next.decayFactor,
      decayFreeWindowEnd: next.decayFreeWindowEnd,
    });

    return { ...next };
  }

  // ─── Governance configuration ───────────────────────────────────────

  setDecayRatePerYear(caller: Address, ratePerYear: bigint): void {
    this.requireGovernor(caller);
    if (ratePerYear < 0n || ratePerYear > this.protocol.maxDecayRatePerYear) {
      throw new DomainError(ErrorCode.InvalidDecayRate, 400, 'Decay rate is outside the allowed range.', {
        ratePerYear: ratePerYear.toString(),
        max: this.protocol.maxDecayRatePerYear.toString(),
      });
    }
    this.update({ ratePerYear });
  }

  setDecayFreeWindow(caller: Address, decayFreeWindow: number): void {
    this.requireGovernor(caller);
    if (
      !Number.isInteger(decayFreeWindow)
      || decayFreeWindow < this.protocol.minDecayFreeWindow
      || decayFreeWindow > this.protocol.maxDecayFreeWindow
    ) {
      throw new DomainError(ErrorCode.InvalidDecayWindow, 400, 'Decay-free window is outside the allowed range.', {
        decayFreeWindow,
        min: this.protocol.minDecayFreeWindow,
        max: this.protocol.maxDecayFreeWindow,
      });
    }
    this.update({ decayFreeWindow });
  }

  setDecayFunction(caller: Address, decayFunction: DecayFunction): void {
    this.requireGovernor(caller);
    this.update({ decayFunction });
  }

  // ─── Internals ──────────────────────────────────────────────────────

  private project(record: AccountDecayRecord, now: number): AccountDecayRecord {
    if (now <= record.decayFreeWindowEnd) return { ...record };

    const { params } = this.store.state().decay;
    return {
      decayFactor: decayFactor(
        record.decayFactor,
        now - record.decayFreeWindowEnd,
        params.ratePerYear,
        params.decayFunction,
      ),
      lastUpdatedAt: now,
      decayFreeWindowEnd: now + params.decayFreeWindow,
    };
  }

  private update(patch: Partial<DecayParams>): void {
    const decay = this.store.state().decay;
    decay.params = { ...decay.params, ...patch };
    this.store.emit('decay.config.updated', { ...decay.params });
  }

  private requireGovernor(caller: Address): void {
    if (!this.access.hasRole(Role.Governor, caller)) {
      throw new DomainError(ErrorCode.Unauthorized, 403, 'Caller lacks the governor role.', { caller });
    }
  }
}
