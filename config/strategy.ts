/**
 * Seed configuration for a fresh strategy: rate curve, tier ladder, lock
 * policies and performance fee. Used by createStrategyState.
 */
import {
  LockPeriod,
  LockPolicyConfig,
  LOCK_PERIOD_ORDER,
  RateCurveConfig,
  Tier,
  TierConfig,
  TIER_ORDER,
} from '../types';
import { BPS_SCALE } from '../utils/bps';

const ETHER = 10n ** 18n;
const DAY = 24n * 60n * 60n;

/** 2% floor, kink at 80% utilization, +0.05% per point below and +0.5% per point above. */
export const DEFAULT_RATE_CURVE: RateCurveConfig = {
  kinkBps: 8_000n,
  baseRateBps: 200n,
  lowSlope: 5n,
  highSlope: 50n,
};

export const DEFAULT_TIERS: Record<Tier, TierConfig> = {
  [Tier.Bronze]: { minDeposit: 0n, bonusBps: 0n },
  [Tier.Silver]: { minDeposit: 10n * ETHER, bonusBps: 50n },
  [Tier.Gold]: { minDeposit: 50n * ETHER, bonusBps: 100n },
  [Tier.Platinum]: { minDeposit: 200n * ETHER, bonusBps: 200n },
  [Tier.Diamond]: { minDeposit: 1_000n * ETHER, bonusBps: 300n },
};

/** Longer lock = larger multiplier on the snapshotted rate. */
export const DEFAULT_LOCK_POLICIES: Record<LockPeriod, LockPolicyConfig> = {
  [LockPeriod.None]: { duration: 0n, bonusMultiplierBps: 10_000n },
  [LockPeriod.ThirtyDays]: { duration: 30n * DAY, bonusMultiplierBps: 11_000n },
  [LockPeriod.NinetyDays]: { duration: 90n * DAY, bonusMultiplierBps: 12_500n },
  [LockPeriod.OneEightyDays]: { duration: 180n * DAY, bonusMultiplierBps: 15_000n },
  [LockPeriod.ThreeSixtyFiveDays]: { duration: 365n * DAY, bonusMultiplierBps: 20_000n },
};

/** 10% of gains above the high-water mark. */
export const DEFAULT_PERFORMANCE_FEE_BPS = 1_000n;

/** One unit of value per share, in value per 10000 shares. */
export const DEFAULT_HIGH_WATER_MARK = BPS_SCALE;

export const MAX_TIER_BONUS_BPS = 1_000n;
export const MIN_LOCK_MULTIPLIER_BPS = 10_000n;
export const MAX_LOCK_MULTIPLIER_BPS = 20_000n;
export const MAX_PERFORMANCE_FEE_BPS = 5_000n;

/** Identity that may never receive fees. */
export const NULL_IDENTITY = '';

/**
 * Copy an enum-indexed default table, failing fast when a variant has no entry.
 */
export function buildTable<K extends string, V extends object>(
  name: string,
  variants: readonly K[],
  defaults: Partial<Record<K, V>>
): Map<K, V> {
  const table = new Map<K, V>();
  for (const variant of variants) {
    const entry = defaults[variant];
    if (!entry) throw new Error(`Missing default ${name} config for ${variant}`);
    table.set(variant, { ...entry });
  }
  return table;
}

export const buildTierTable = (defaults: Partial<Record<Tier, TierConfig>> = DEFAULT_TIERS) =>
  buildTable('tier', TIER_ORDER, defaults);

export const buildLockPolicyTable = (
  defaults: Partial<Record<LockPeriod, LockPolicyConfig>> = DEFAULT_LOCK_POLICIES
) => buildTable('lock policy', LOCK_PERIOD_ORDER, defaults);
