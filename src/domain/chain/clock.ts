import { unixNow } from '../../utils/time.js';

/** Chain-native time source, in whole seconds. */
export interface ChainClock {
  now(): number;
}

export class SystemClock implements ChainClock {
  now(): number {
    return unixNow();
  }
}

/** Deterministic clock for tests and local simulation. Never runs backwards. */
export class ManualClock implements ChainClock {
  constructor(private current: number) {}

  now(): number {
    return this.current;
  }

  advance(seconds: number): number {
    if (seconds < 0) throw new RangeError('clock cannot move backwards');
    this.current += seconds;
    return this.current;
  }
}
