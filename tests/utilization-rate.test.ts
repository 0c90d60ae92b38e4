import fc from 'fast-check';
import { utilizationRateService } from '../services/utilization-rate.service';
import { createStrategyState } from '../services/strategy-state';
import { DEFAULT_RATE_CURVE } from '../config/strategy';
import { StrategyError } from '../utils/strategy-error';

const curve = DEFAULT_RATE_CURVE;

describe('UtilizationRateService.rate', () => {
  it('prices a capacity-less vault at the base rate', () => {
    expect(utilizationRateService.rate(0n, 500n, curve)).toBe(200n);
  });

  it('returns the base rate at zero utilization', () => {
    expect(utilizationRateService.rate(1000n, 0n, curve)).toBe(200n);
  });

  it('uses the low slope up to and including the kink', () => {
    expect(utilizationRateService.rate(1000n, 400n, curve)).toBe(400n);
    expect(utilizationRateService.rate(1000n, 800n, curve)).toBe(600n);
  });

  it('adds the high slope per whole percent above the kink', () => {
    expect(utilizationRateService.rate(10_000n, 8_100n, curve)).toBe(650n);
    expect(utilizationRateService.rate(10_000n, 10_000n, curve)).toBe(1_600n);
  });

  it('truncates utilization to whole percents', () => {
    // 799 bps → 7%
    expect(utilizationRateService.rate(10_000n, 799n, curve)).toBe(235n);
    // 8199 bps → 1% over the kink
    expect(utilizationRateService.rate(10_000n, 8_199n, curve)).toBe(650n);
    // 1/3 of capacity → 3333 bps → 33%
    expect(utilizationRateService.rate(3n, 1n, curve)).toBe(365n);
  });

  it('does not cap the rate when deposits exceed capacity', () => {
    expect(utilizationRateService.rate(10_000n, 20_000n, curve)).toBe(6_600n);
  });

  it('is continuous at the kink', () => {
    const atKink = utilizationRateService.rate(10_000n, 8_000n, curve);
    const justAbove = utilizationRateService.rate(10_000n, 8_099n, curve);
    expect(atKink).toBe(600n);
    expect(justAbove).toBe(600n);
  });

  it('never decreases as deposits grow up to capacity', () => {
    let previous = -1n;
    for (let deposited = 0n; deposited <= 1_000n; deposited += 7n) {
      const rate = utilizationRateService.rate(1_000n, deposited, curve);
      expect(rate >= previous).toBe(true);
      previous = rate;
    }
  });
});

describe('UtilizationRateService.setConfig', () => {
  it('rejects a kink above 100%', () => {
    const state = createStrategyState({ feeRecipient: 'treasury' });
    expect(() => utilizationRateService.setConfig(state, { ...curve, kinkBps: 10_001n })).toThrow(
      expect.objectContaining({ kind: 'InvalidKink' })
    );
    expect(state.curve).toEqual(curve);
  });

  it('rejects a base rate above 100%', () => {
    const state = createStrategyState({ feeRecipient: 'treasury' });
    expect(() => utilizationRateService.setConfig(state, { ...curve, baseRateBps: 10_001n })).toThrow(StrategyError);
    expect(state.curve.baseRateBps).toBe(200n);
  });

  it('replaces the curve and reports before and after', () => {
    const state = createStrategyState({ feeRecipient: 'treasury' });
    const next = { kinkBps: 10_000n, baseRateBps: 10_000n, lowSlope: 1n, highSlope: 2n };
    const change = utilizationRateService.setConfig(state, next);
    expect(change).toEqual({ target: 'utilization', before: curve, after: next });
    expect(state.curve).toEqual(next);
  });
});

describe('UtilizationRateService properties', () => {
  const curves = fc.record({
    kinkBps: fc.bigInt({ min: 0n, max: 10_000n }),
    baseRateBps: fc.bigInt({ min: 0n, max: 10_000n }),
    lowSlope: fc.bigInt({ min: 0n, max: 1_000n }),
    highSlope: fc.bigInt({ min: 0n, max: 1_000n }),
  });

  /** Capacity with two deposit levels no larger than it. */
  const vaults = fc
    .bigInt({ min: 1n, max: 10n ** 27n })
    .chain((capacity) =>
      fc.tuple(fc.constant(capacity), fc.bigInt({ min: 0n, max: capacity }), fc.bigInt({ min: 0n, max: capacity }))
    );

  it('never decreases as deposits grow up to capacity', () => {
    fc.assert(
      fc.property(curves, vaults, (config, [capacity, a, b]) => {
        const [low, high] = a <= b ? [a, b] : [b, a];
        expect(utilizationRateService.rate(capacity, low, config)).toBeLessThanOrEqual(
          utilizationRateService.rate(capacity, high, config)
        );
      })
    );
  });

  it('starts at the base rate and never drops below it', () => {
    fc.assert(
      fc.property(curves, vaults, (config, [capacity, deposited]) => {
        expect(utilizationRateService.rate(capacity, 0n, config)).toBe(config.baseRateBps);
        expect(utilizationRateService.rate(capacity, deposited, config)).toBeGreaterThanOrEqual(config.baseRateBps);
      })
    );
  });

  it('holds the kink rate through the first whole percent above the kink', () => {
    fc.assert(
      fc.property(curves, fc.bigInt({ min: 0n, max: 99n }), (config, offset) => {
        const kinkRate = config.baseRateBps + (config.kinkBps / 100n) * config.lowSlope;
        expect(utilizationRateService.rate(10_000n, config.kinkBps + offset, config)).toBe(kinkRate);
      })
    );
  });
});
