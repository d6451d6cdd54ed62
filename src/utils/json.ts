/**
 * JSON helpers for state that carries bigint amounts.
 *
 * `toJsonSafe` is for outbound payloads (HTTP, websocket, log lines) where
 * amounts are rendered as decimal strings. `encodeState` / `decodeState` tag
 * bigints so persisted chain state round-trips exactly.
 */

const BIGINT_TAG = '$bigint';

export const toJsonSafe = (value: unknown): unknown => {
  if (typeof value === 'bigint') return value.toString();
  if (Array.isArray(value)) return value.map((item) => toJsonSafe(item));
  if (value && typeof value === 'object') {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [key, toJsonSafe(item)]),
    );
  }
  return value;
};

const isTaggedBigint = (value: unknown): value is { [BIGINT_TAG]: string } => (
  typeof value === 'object'
  && value !== null
  && BIGINT_TAG in value
  && typeof value[BIGINT_TAG] === 'string'
);

export const encodeState = (state: unknown): string => JSON.stringify(
  state,
  (_key, value: unknown) => (typeof value === 'bigint' ? { [BIGINT_TAG]: value.toString() } : value),
  2,
);

export const decodeState = (raw: string): unknown => JSON.parse(
  raw,
  (_key, value: unknown) => (isTaggedBigint(value) ? BigInt(value[BIGINT_TAG]) : value),
);
