import { concat, dataLength, dataSlice, getBytes, isHexString, solidityPacked, toBigInt, toNumber } from 'ethers';
import { DomainError, ErrorCode } from '../../errors/taxonomy.js';

/**
 * LayerZero type-3 executor options.
 *
 *   0x0003 | (workerId:uint8 | size:uint16 | optionType:uint8 | params)*
 *
 * Only the executor worker (1) and its lzReceive option (1) are understood:
 * params are `uint128 gas` optionally followed by `uint128 value`.
 */

const OPTIONS_TYPE_3 = 3;
const EXECUTOR_WORKER_ID = 1;
const OPTION_TYPE_LZRECEIVE = 1;
const MAX_UINT128 = (1n << 128n) - 1n;

export interface LzReceiveOption {
  gas: bigint;
  value: bigint;
}

export const newOptions = (): string => solidityPacked(['uint16'], [OPTIONS_TYPE_3]);

export const addExecutorLzReceiveOption = (options: string, gas: bigint, value = 0n): string => {
  if (gas < 0n || gas > MAX_UINT128 || value < 0n || value > MAX_UINT128) {
    throw new DomainError(ErrorCode.InvalidOptions, 400, 'Executor option values must fit in uint128.');
  }
  const params = value === 0n
    ? solidityPacked(['uint128'], [gas])
    : solidityPacked(['uint128', 'uint128'], [gas, value]);
  const option = solidityPacked(
    ['uint8', 'uint16', 'uint8', 'bytes'],
    [EXECUTOR_WORKER_ID, dataLength(params) + 1, OPTION_TYPE_LZRECEIVE, params],
  );
  return concat([options, option]);
};

export const buildLzReceiveOptions = (gas: bigint, value = 0n): string => (
  addExecutorLzReceiveOption(newOptions(), gas, value)
);

/** Sum of every lzReceive option in `options`. */
export const decodeLzReceiveOptions = (options: string): LzReceiveOption => {
  if (!isHexString(options) || dataLength(options) < 2) {
    throw invalid('Options must be hex and carry a type prefix.');
  }
  if (toNumber(dataSlice(options, 0, 2)) !== OPTIONS_TYPE_3) {
    throw invalid('Only type-3 options are supported.');
  }

  const bytes = getBytes(options);
  const total: LzReceiveOption = { gas: 0n, value: 0n };
  let cursor = 2;

  while (cursor < bytes.length) {
    if (cursor + 3 > bytes.length) throw invalid('Truncated option header.');
    const workerId = bytes[cursor];
    const size = (bytes[cursor + 1] << 8) | bytes[cursor + 2];
    const start = cursor + 3;
    const end = start + size;
    if (size === 0 || end > bytes.length) throw invalid('Option size exceeds the options length.');

    if (workerId === EXECUTOR_WORKER_ID && bytes[start] === OPTION_TYPE_LZRECEIVE) {
      const paramsLength = size - 1;
      if (paramsLength !== 16 && paramsLength !== 32) throw invalid('Malformed lzReceive option.');
      total.gas += toBigInt(dataSlice(options, start + 1, start + 17));
      if (paramsLength === 32) total.value += toBigInt(dataSlice(options, start + 17, end));
    }
    cursor = end;
  }

  return total;
};

const invalid = (message: string): DomainError => new DomainError(ErrorCode.InvalidOptions, 400, message);
