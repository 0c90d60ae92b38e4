import { Bps, Identity, Timestamp } from '../types';
import { lockService } from './lock.service';
import { StrategyState } from './strategy-state';
import { tierService } from './tier.service';
import { utilizationRateService } from './utilization-rate.service';
import { IVaultAdapter } from './vault-adapter';

export class EffectiveRateService {
  /**
   * An active lock's frozen bonus replaces base + tier entirely.
   */
  effectiveRate(state: StrategyState, vault: IVaultAdapter, now: Timestamp, user: Identity): Bps {
    const lock = state.locks.get(user);
    if (lockService.isActive(lock, now)) return lock.bonusRate;

    const tier = tierService.tierOf(vault.userDeposit(user), state.tiers);
    return utilizationRateService.currentRate(state, vault) + tierService.bonusOf(state, tier);
  }
}

export const effectiveRateService = new EffectiveRateService();
