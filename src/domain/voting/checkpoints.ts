import type { Address, Checkpoint, ResolutionCheckpoint } from '../../types.js';

/**
 * Append a checkpoint. A write at the same timestamp as the latest entry
 * replaces it, so an account never gains more than one entry per instant.
 */
export function pushCheckpoint(trace: Checkpoint[], timestamp: number, units: bigint): void {
  const last = trace[trace.length - 1];
  if (last && timestamp < last.timestamp) {
    throw new RangeError(`checkpoint at ${timestamp} precedes latest ${last.timestamp}`);
  }
  if (last && last.timestamp === timestamp) {
    last.units = units;
    return;
  }
  trace.push({ timestamp, units });
}

export function latestUnits(trace: Checkpoint[]): bigint {
  return trace[trace.length - 1]?.units ?? 0n;
}

/** Index of the last entry with `timestamp <= at`, or -1. */
function lastIndexAt(trace: ReadonlyArray<{ timestamp: number }>, at: number): number {
  let low = 0;
  let high = trace.length;

  while (low < high) {
    const mid = (low + high) >>> 1;
    if (trace[mid].timestamp > at) {
      high = mid;
    } else {
      low = mid + 1;
    }
  }

  return high - 1;
}

/** Units of the last checkpoint with `timestamp <= at`, zero when none. */
export function upperLookup(trace: Checkpoint[], at: number): bigint {
  const index = lastIndexAt(trace, at);
  return index < 0 ? 0n : trace[index].units;
}

export function pushResolution(trace: ResolutionCheckpoint[], timestamp: number, delegate: Address): void {
  const last = trace[trace.length - 1];
  if (last && last.timestamp === timestamp) {
    last.delegate = delegate;
    return;
  }
  trace.push({ timestamp, delegate });
}

/** Delegate `holder` resolved to at `at`; the holder itself before its first change. */
export function resolutionAt(trace: ResolutionCheckpoint[], at: number, holder: Address): Address {
  const index = lastIndexAt(trace, at);
  return index < 0 ? holder : trace[index].delegate;
}
