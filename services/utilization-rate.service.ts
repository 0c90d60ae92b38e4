import { Bps, RateCurveConfig } from '../types';
import { BPS_SCALE, bpsToWholePercent, ratioBps } from '../utils/bps';
import { StrategyError } from '../utils/strategy-error';
import { ConfigurationChange } from './strategy-events';
import { StrategyState } from './strategy-state';
import { IVaultAdapter } from './vault-adapter';

/**
 * Kinked utilization curve:
 *   util ≤ kink: base + ⌊util/100⌋ × lowSlope
 *   util >  kink: base + ⌊kink/100⌋ × lowSlope + ⌊(util − kink)/100⌋ × highSlope
 * The result is not capped; steep slopes can price above 10000 bps.
 */
export class UtilizationRateService {
  /** deposited / capacity in bps; 0 for a vault without capacity. */
  utilizationBps(capacity: bigint, deposited: bigint): Bps {
    return capacity === 0n ? 0n : ratioBps(deposited, capacity);
  }

  rate(capacity: bigint, deposited: bigint, curve: RateCurveConfig): Bps {
    if (capacity === 0n) return curve.baseRateBps;

    const utilizationBps = this.utilizationBps(capacity, deposited);
    if (utilizationBps <= curve.kinkBps) {
      return curve.baseRateBps + bpsToWholePercent(utilizationBps) * curve.lowSlope;
    }

    const kinkRate = curve.baseRateBps + bpsToWholePercent(curve.kinkBps) * curve.lowSlope;
    const excessPercent = bpsToWholePercent(utilizationBps - curve.kinkBps);
    return kinkRate + excessPercent * curve.highSlope;
  }

  currentRate(state: StrategyState, vault: IVaultAdapter): Bps {
    return this.rate(vault.maxCapacity(), vault.totalDeposited(), state.curve);
  }

  validate(curve: RateCurveConfig): void {
    if (curve.kinkBps > BPS_SCALE) {
      throw new StrategyError('InvalidKink', `Kink must be at most ${BPS_SCALE} bps`);
    }
    if (curve.baseRateBps > BPS_SCALE) {
      throw new StrategyError('InvalidBaseRate', `Base rate must be at most ${BPS_SCALE} bps`);
    }
  }

  setConfig(state: StrategyState, curve: RateCurveConfig): ConfigurationChange {
    this.validate(curve);
    const before = { ...state.curve };
    state.curve = { ...curve };
    return { target: 'utilization', before, after: { ...curve } };
  }
}

export const utilizationRateService = new UtilizationRateService();
