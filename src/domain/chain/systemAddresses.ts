import { dataSlice, getAddress, isAddress, keccak256, toUtf8Bytes, zeroPadValue } from 'ethers';
import { DomainError, ErrorCode } from '../../errors/taxonomy.js';
import type { Address, SystemAddresses } from '../../types.js';

/** Deterministic deployment address for a protocol component, identical on every chain. */
export const componentAddress = (label: string): Address => (
  getAddress(dataSlice(keccak256(toUtf8Bytes(`governance.${label}`)), 12))
);

export const systemAddresses = (): SystemAddresses => ({
  governor: componentAddress('governor'),
  timelock: componentAddress('timelock'),
  token: componentAddress('token'),
  rewardsManager: componentAddress('rewards-manager'),
});

export const addressToBytes32 = (address: Address): string => zeroPadValue(address, 32).toLowerCase();

export const isSystemAddress = (addresses: SystemAddresses, account: Address): boolean => (
  account === addresses.governor
  || account === addresses.timelock
  || account === addresses.token
  || account === addresses.rewardsManager
);

/** Checksummed form of `value`; rejects anything that is not a 20-byte address. */
export const normalizeAddress = (value: string, field = 'account'): Address => {
  if (!isAddress(value)) {
    throw new DomainError(ErrorCode.InvalidPayload, 400, `${field} is not a valid address.`, { [field]: value });
  }
  return getAddress(value);
};
