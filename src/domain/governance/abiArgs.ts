import { type Result, getAddress, isAddress } from 'ethers';
import { DomainError, ErrorCode } from '../../errors/taxonomy.js';

const mismatch = (index: number, expected: string): DomainError => new DomainError(
  ErrorCode.CallReverted,
  400,
  `Call argument ${index} is not a ${expected}.`,
);

export const argAddress = (args: Result, index: number): string => {
  const value: unknown = args[index];
  if (typeof value !== 'string' || !isAddress(value)) throw mismatch(index, 'address');
  return getAddress(value);
};

export const argBigint = (args: Result, index: number): bigint => {
  const value: unknown = args[index];
  if (typeof value !== 'bigint') throw mismatch(index, 'uint');
  return value;
};

/** A uint that must fit a JS number exactly, such as a duration or an endpoint id. */
export const argSafeInteger = (args: Result, index: number): number => {
  const value = argBigint(args, index);
  if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new DomainError(ErrorCode.CallReverted, 400, `Call argument ${index} exceeds the safe integer range.`, {
      value: value.toString(),
    });
  }
  return Number(value);
};

export const argBytes = (args: Result, index: number): string => {
  const value: unknown = args[index];
  if (typeof value !== 'string') throw mismatch(index, 'bytes');
  return value;
};

const argList = (args: Result, index: number): unknown[] => {
  const value: unknown = args[index];
  if (!Array.isArray(value)) throw mismatch(index, 'array');
  return Array.from(value);
};

export const argAddressList = (args: Result, index: number): string[] => argList(args, index).map((value) => {
  if (typeof value !== 'string' || !isAddress(value)) throw mismatch(index, 'address[]');
  return getAddress(value);
});

export const argBigintList = (args: Result, index: number): bigint[] => argList(args, index).map((value) => {
  if (typeof value !== 'bigint') throw mismatch(index, 'uint[]');
  return value;
});

export const argBytesList = (args: Result, index: number): string[] => argList(args, index).map((value) => {
  if (typeof value !== 'string') throw mismatch(index, 'bytes[]');
  return value;
});
