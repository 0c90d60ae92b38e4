import { Bps, Tier, TierConfig, TIER_ORDER } from '../types';
import { MAX_TIER_BONUS_BPS } from '../config/strategy';
import { StrategyError } from '../utils/strategy-error';
import { ConfigurationChange } from './strategy-events';
import { StrategyState, getTierConfig } from './strategy-state';

export class TierService {
  /**
   * Highest tier whose minimum the cumulative deposit meets; Bronze otherwise.
   */
  tierOf(userDeposit: bigint, tiers: ReadonlyMap<Tier, TierConfig>): Tier {
    for (let i = TIER_ORDER.length - 1; i >= 0; i--) {
      const tier = TIER_ORDER[i];
      const config = tiers.get(tier);
      if (config && userDeposit >= config.minDeposit) return tier;
    }
    return Tier.Bronze;
  }

  bonusOf(state: StrategyState, tier: Tier): Bps {
    return getTierConfig(state, tier).bonusBps;
  }

  /**
   * Thresholds must stay strictly increasing with tier order.
   */
  validate(state: StrategyState, tier: Tier, config: TierConfig): void {
    if (config.bonusBps > MAX_TIER_BONUS_BPS) {
      throw new StrategyError('InvalidTierBonus', `Tier bonus must be at most ${MAX_TIER_BONUS_BPS} bps`);
    }
    const index = TIER_ORDER.indexOf(tier);
    const lower = index > 0 ? state.tiers.get(TIER_ORDER[index - 1]) : undefined;
    const upper = index < TIER_ORDER.length - 1 ? state.tiers.get(TIER_ORDER[index + 1]) : undefined;
    if (lower && config.minDeposit <= lower.minDeposit) {
      throw new StrategyError('InvalidTierOrdering', `${tier} minimum must exceed ${TIER_ORDER[index - 1]} minimum`);
    }
    if (upper && config.minDeposit >= upper.minDeposit) {
      throw new StrategyError('InvalidTierOrdering', `${tier} minimum must be below ${TIER_ORDER[index + 1]} minimum`);
    }
  }

  setConfig(state: StrategyState, tier: Tier, config: TierConfig): ConfigurationChange {
    this.validate(state, tier, config);
    const before = { ...getTierConfig(state, tier) };
    state.tiers.set(tier, { ...config });
    return { target: 'tier', tier, before, after: { ...config } };
  }
}

export const tierService = new TierService();
