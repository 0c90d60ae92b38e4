/** Basis points: integer units of 1/10000. */
export type Bps = bigint;

/** Identity of a vault participant (account id, public key or address). */
export type Identity = string;

/** Unix time in seconds. */
export type Timestamp = bigint;

export enum Tier {
  Bronze = 'Bronze',
  Silver = 'Silver',
  Gold = 'Gold',
  Platinum = 'Platinum',
  Diamond = 'Diamond',
}

/** Lowest to highest. */
export const TIER_ORDER: readonly Tier[] = [Tier.Bronze, Tier.Silver, Tier.Gold, Tier.Platinum, Tier.Diamond];

export enum LockPeriod {
  None = 'None',
  ThirtyDays = 'ThirtyDays',
  NinetyDays = 'NinetyDays',
  OneEightyDays = 'OneEightyDays',
  ThreeSixtyFiveDays = 'ThreeSixtyFiveDays',
}

export const LOCK_PERIOD_ORDER: readonly LockPeriod[] = [
  LockPeriod.None,
  LockPeriod.ThirtyDays,
  LockPeriod.NinetyDays,
  LockPeriod.OneEightyDays,
  LockPeriod.ThreeSixtyFiveDays,
];

export interface RateCurveConfig {
  kinkBps: Bps;
  baseRateBps: Bps;
  /** Rate added per whole percent of utilization below the kink. */
  lowSlope: bigint;
  /** Rate added per whole percent of utilization above the kink. */
  highSlope: bigint;
}

export interface TierConfig {
  minDeposit: bigint;
  bonusBps: Bps;
}

export interface LockPolicyConfig {
  /** Seconds. */
  duration: bigint;
  bonusMultiplierBps: Bps;
}

export interface UserLock {
  amount: bigint;
  unlockTime: Timestamp;
  period: LockPeriod;
  /** Frozen at lock time. */
  bonusRate: Bps;
}

export interface PerformanceFeeConfig {
  feeBps: Bps;
  recipient: Identity;
}

export interface StrategyInfo {
  rate: Bps;
  tier: Tier;
  tierBonus: Bps;
  isLocked: boolean;
  lockPeriod: LockPeriod;
  unlockTime: Timestamp;
  effectiveRate: Bps;
  pendingFee: bigint;
}

export function isTier(value: unknown): value is Tier {
  return TIER_ORDER.some((tier) => tier === value);
}

export function isLockPeriod(value: unknown): value is LockPeriod {
  return LOCK_PERIOD_ORDER.some((period) => period === value);
}
