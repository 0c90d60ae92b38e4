import {
  Identity,
  LockPeriod,
  LockPolicyConfig,
  PerformanceFeeConfig,
  RateCurveConfig,
  Tier,
  TierConfig,
  UserLock,
} from '../types';
import {
  DEFAULT_HIGH_WATER_MARK,
  DEFAULT_LOCK_POLICIES,
  DEFAULT_PERFORMANCE_FEE_BPS,
  DEFAULT_RATE_CURVE,
  DEFAULT_TIERS,
  buildLockPolicyTable,
  buildTierTable,
} from '../config/strategy';

/**
 * Everything the strategy mutates. Owned by one YieldStrategyService and
 * passed by reference into each component.
 */
export interface StrategyState {
  curve: RateCurveConfig;
  tiers: Map<Tier, TierConfig>;
  lockPolicies: Map<LockPeriod, LockPolicyConfig>;
  locks: Map<Identity, UserLock>;
  performanceFee: PerformanceFeeConfig;
  globalHighWaterMark: bigint;
  userHighWaterMarks: Map<Identity, bigint>;
}

export interface StrategySeed {
  curve?: RateCurveConfig;
  tiers?: Partial<Record<Tier, TierConfig>>;
  lockPolicies?: Partial<Record<LockPeriod, LockPolicyConfig>>;
  feeBps?: bigint;
  feeRecipient: Identity;
  globalHighWaterMark?: bigint;
}

export function createStrategyState(seed: StrategySeed): StrategyState {
  return {
    curve: { ...(seed.curve ?? DEFAULT_RATE_CURVE) },
    tiers: buildTierTable(seed.tiers ?? DEFAULT_TIERS),
    lockPolicies: buildLockPolicyTable(seed.lockPolicies ?? DEFAULT_LOCK_POLICIES),
    locks: new Map(),
    performanceFee: { feeBps: seed.feeBps ?? DEFAULT_PERFORMANCE_FEE_BPS, recipient: seed.feeRecipient },
    globalHighWaterMark: seed.globalHighWaterMark ?? DEFAULT_HIGH_WATER_MARK,
    userHighWaterMarks: new Map(),
  };
}

/** Deep copy used as the draft of a staged operation. */
export function cloneStrategyState(state: StrategyState): StrategyState {
  return structuredClone(state);
}

export function getTierConfig(state: StrategyState, tier: Tier): TierConfig {
  const config = state.tiers.get(tier);
  if (!config) throw new Error(`Tier table has no entry for ${tier}`);
  return config;
}

export function getLockPolicy(state: StrategyState, period: LockPeriod): LockPolicyConfig {
  const config = state.lockPolicies.get(period);
  if (!config) throw new Error(`Lock policy table has no entry for ${period}`);
  return config;
}
