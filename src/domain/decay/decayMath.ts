/**
 * Fixed-point decay arithmetic.
 *
 * All fractions are bigint values scaled by WAD (1e18). Functions here are
 * pure and total for validated inputs: results are clamped into [0, WAD]
 * instead of failing.
 */

import type { DecayFunction } from './decayTypes.js';

export const WAD = 10n ** 18n;

/** 365.25 days. */
export const SECONDS_PER_YEAR = 31_557_600;

const LN2_WAD = 693_147_180_559_945_309n;
/** exp(-42) is below 1e-18, so anything smaller rounds to zero. */
const EXP_UNDERFLOW_WAD = -42n * WAD;

export const mulWad = (a: bigint, b: bigint): bigint => (a * b) / WAD;

export const divWad = (a: bigint, b: bigint): bigint => (a * WAD) / b;

export const clampWad = (value: bigint): bigint => {
  if (value < 0n) return 0n;
  if (value > WAD) return WAD;
  return value;
};

/** Natural logarithm of a positive WAD value. */
export function lnWad(x: bigint): bigint {
  if (x <= 0n) throw new RangeError('lnWad is undefined for non-positive input');

  let exponent = 0n;
  let mantissa = x;
  while (mantissa >= 2n * WAD) {
    mantissa /= 2n;
    exponent += 1n;
  }
  while (mantissa < WAD) {
    mantissa *= 2n;
    exponent -= 1n;
  }

  // ln(m) = 2 * atanh((m - 1) / (m + 1)), with m in [1, 2) the series converges fast.
  const z = divWad(mantissa - WAD, mantissa + WAD);
  const zSquared = mulWad(z, z);
  let term = z;
  let sum = 0n;
  for (let n = 1n; term !== 0n; n += 2n) {
    sum += term / n;
    term = mulWad(term, zSquared);
  }

  return exponent * LN2_WAD + 2n * sum;
}

/** e^x for a WAD exponent. */
export function expWad(x: bigint): bigint {
  if (x === 0n) return WAD;
  if (x <= EXP_UNDERFLOW_WAD) return 0n;
  if (x < 0n) return (WAD * WAD) / expWad(-x);

  const halvings = x / LN2_WAD;
  const remainder = x - halvings * LN2_WAD;

  let term = WAD;
  let sum = WAD;
  for (let n = 1n; term !== 0n; n += 1n) {
    term = (term * remainder) / (WAD * n);
    sum += term;
  }

  return sum << halvings;
}

/** base^exponent for WAD base in [0, WAD] and non-negative WAD exponent. */
export function powWad(base: bigint, exponent: bigint): bigint {
  if (exponent === 0n) return WAD;
  if (base === 0n) return 0n;
  if (base === WAD) return WAD;
  return clampWad(expWad(mulWad(lnWad(base), exponent)));
}

/**
 * Retention factor after `elapsedSeconds` of decay.
 *
 * Linear: `prev * (1 - rate * t / year)`.
 * Exponential: `prev * (1 - rate) ^ (t / year)`.
 */
export function decayFactor(
  previousFactor: bigint,
  elapsedSeconds: number,
  ratePerYear: bigint,
  fn: DecayFunction,
): bigint {
  const previous = clampWad(previousFactor);
  if (elapsedSeconds <= 0 || ratePerYear <= 0n || previous === 0n) return previous;

  const elapsed = BigInt(Math.floor(elapsedSeconds));

  if (fn === 'linear') {
    const totalDecay = (ratePerYear * elapsed) / BigInt(SECONDS_PER_YEAR);
    if (totalDecay >= WAD) return 0n;
    return clampWad(mulWad(previous, WAD - totalDecay));
  }

  const retentionPerYear = ratePerYear >= WAD ? 0n : WAD - ratePerYear;
  const years = (elapsed * WAD) / BigInt(SECONDS_PER_YEAR);
  return clampWad(mulWad(previous, powWad(retentionPerYear, years)));
}

/**
 * Exponential moving average of decay observations:
 * `alpha * current + (1 - alpha) * previous`. An unset previous value (0)
 * takes the current observation as is.
 */
export function smooth(currentFactor: bigint, previousSmoothed: bigint, alpha: bigint): bigint {
  if (previousSmoothed === 0n) return currentFactor;
  const weight = clampWad(alpha);
  return clampWad((weight * currentFactor + (WAD - weight) * previousSmoothed) / WAD);
}
