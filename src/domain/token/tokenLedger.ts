import { ZeroAddress } from 'ethers';
import { DomainError, ErrorCode } from '../../errors/taxonomy.js';
import type { StateStore } from '../../infra/storage/stateStore.js';
import type { Address, SystemAddresses } from '../../types.js';
import { type AccessControl, Role } from '../access/accessControl.js';
import { isSystemAddress } from '../chain/systemAddresses.js';
import type { DecayLedger } from '../decay/decayLedger.js';
import type { VotingPowerAggregator } from '../voting/votingPowerAggregator.js';

/**
 * Minimal governance-token balance ledger. It exists to drive voting-unit
 * checkpoints; allowances and the rest of ERC-20 are out of scope.
 */
export class TokenLedger {
  constructor(
    private readonly store: StateStore,
    private readonly access: AccessControl,
    private readonly decay: DecayLedger,
    private readonly votes: VotingPowerAggregator,
    private readonly addresses: SystemAddresses,
  ) {}

  balanceOf(account: Address): bigint {
    return this.store.state().token.balances[account] ?? 0n;
  }

  totalSupply(): bigint {
    return this.store.state().token.totalSupply;
  }

  vestingWalletOf(account: Address): Address | null {
    return this.store.state().token.vestingWalletOf[account] ?? null;
  }

  mint(caller: Address, to: Address, amount: bigint): void {
    this.requireGovernor(caller);
    this.requireAccount(to);
    this.update(ZeroAddress, to, amount);
  }

  burn(from: Address, amount: bigint): void {
    this.requireAccount(from);
    this.update(from, ZeroAddress, amount);
  }

  transfer(from: Address, to: Address, amount: bigint): void {
    this.requireAccount(from);
    this.requireAccount(to);
    this.update(from, to, amount);
  }

  /** Moves a staker's balance into the staking holder. */
  depositStake(account: Address, amount: bigint): void {
    this.requireAccount(account);
    this.update(account, this.addresses.rewardsManager, amount);
  }

  /** Returns staked balance from the staking holder to the staker. */
  withdrawStake(account: Address, amount: bigint): void {
    this.requireAccount(account);
    this.update(this.addresses.rewardsManager, account, amount);
  }

  registerVestingWallet(caller: Address, beneficiary: Address, wallet: Address): void {
    this.requireGovernor(caller);
    this.requireAccount(beneficiary);
    this.requireAccount(wallet);

    const token = this.store.state().token;
    if (token.vestingWalletOf[beneficiary] || token.beneficiaryOf[wallet] || wallet === beneficiary) {
      throw new DomainError(ErrorCode.InvalidPayload, 409, 'Vesting wallet association already exists.', {
        beneficiary,
        wallet,
      });
    }

    token.vestingWalletOf[beneficiary] = wallet;
    token.beneficiaryOf[wallet] = beneficiary;
    this.votes.onVestingWalletRegistered(beneficiary, wallet, this.balanceOf(wallet));
  }

  private update(from: Address, to: Address, amount: bigint): void {
    if (amount <= 0n) {
      throw new DomainError(ErrorCode.InvalidPayload, 400, 'Amount must be positive.', { amount: amount.toString() });
    }

    for (const account of [from, to]) {
      if (account !== ZeroAddress && !isSystemAddress(this.addresses, account)) {
        this.decay.refresh(this.addresses.token, account);
      }
    }

    const token = this.store.state().token;
    if (from === ZeroAddress) {
      token.totalSupply += amount;
    } else {
      const balance = token.balances[from] ?? 0n;
      if (balance < amount) {
        throw new DomainError(ErrorCode.InsufficientBalance, 400, 'Insufficient token balance.', {
          account: from,
          balance: balance.toString(),
          amount: amount.toString(),
        });
      }
      token.balances[from] = balance - amount;
    }

    if (to === ZeroAddress) {
      token.totalSupply -= amount;
    } else {
      token.balances[to] = (token.balances[to] ?? 0n) + amount;
    }

    this.votes.onTransfer(from, to, amount);
  }

  private requireAccount(account: Address): void {
    if (account === ZeroAddress) {
      throw new DomainError(ErrorCode.ZeroAddress, 400, 'A non-zero account is required.');
    }
    // staked balances only move through depositStake and withdrawStake
    if (account === this.addresses.rewardsManager) {
      throw new DomainError(ErrorCode.InvalidPayload, 400, 'The staking holder cannot be used directly.', { account });
    }
  }

  private requireGovernor(caller: Address): void {
    if (!this.access.hasRole(Role.Governor, caller)) {
      throw new DomainError(ErrorCode.Unauthorized, 403, 'Caller lacks the governor role.', { caller });
    }
  }
}
