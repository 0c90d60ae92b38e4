import { Bps } from '../types';

/**
 * Fixed-point helpers. Every quantity is a bigint scaled by BPS_SCALE,
 * and every division truncates toward zero (native bigint division).
 */
export const BPS_SCALE = 10_000n;

/** Basis points per whole percent. */
export const BPS_PER_PERCENT = 100n;

/** a * b / denominator, truncating. */
export function mulDiv(a: bigint, b: bigint, denominator: bigint): bigint {
  return (a * b) / denominator;
}

/** amount * bps / 10000, truncating. */
export function applyBps(amount: bigint, bps: Bps): bigint {
  return mulDiv(amount, bps, BPS_SCALE);
}

/** numerator / denominator expressed in bps, truncating. */
export function ratioBps(numerator: bigint, denominator: bigint): Bps {
  return mulDiv(numerator, BPS_SCALE, denominator);
}

/** Whole percent contained in a bps value: 799 -> 7. */
export function bpsToWholePercent(bps: Bps): bigint {
  return bps / BPS_PER_PERCENT;
}

/** Parse a non-negative integer string (or safe integer number) into a bigint. */
export function parseAmount(value: unknown): bigint | null {
  if (typeof value === 'number') {
    return Number.isSafeInteger(value) && value >= 0 ? BigInt(value) : null;
  }
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) {
    return BigInt(value.trim());
  }
  return null;
}

/** JSON.stringify replacer for bigint fields. */
export function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}
