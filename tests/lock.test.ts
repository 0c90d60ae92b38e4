import { LockPeriod } from '../types';
import { ETHER, GOVERNANCE, START, StrategyFixture, setupStrategy } from './utils/strategy';

const NINETY_DAYS = 7_776_000n;

describe('Lock lifecycle', () => {
  let fx: StrategyFixture;

  beforeEach(() => {
    // 60 ether of 1000 capacity: 6% utilization → rate 230, Gold tier → bonus 100
    fx = setupStrategy(1_000n * ETHER);
    fx.deposit('alice', 60n * ETHER);
  });

  it('snapshots the whole balance and a frozen bonus rate', () => {
    const lock = fx.strategy.lockDeposit('alice', LockPeriod.NinetyDays);

    // (230 + 100) * 12500 / 10000 = 412.5 → 412
    expect(lock).toEqual({
      amount: 60n * ETHER,
      unlockTime: START + NINETY_DAYS,
      period: LockPeriod.NinetyDays,
      bonusRate: 412n,
    });
    expect(fx.strategy.lockOf('alice')).toEqual(lock);
    expect(fx.strategy.isLocked('alice')).toBe(true);
    expect(fx.events).toEqual([
      {
        type: 'LockCreated',
        user: 'alice',
        amount: 60n * ETHER,
        period: LockPeriod.NinetyDays,
        unlockTime: START + NINETY_DAYS,
        bonusRate: 412n,
      },
    ]);
  });

  it('refuses a second lock until the first is unlocked, even after expiry', () => {
    fx.strategy.lockDeposit('alice', LockPeriod.NinetyDays);
    expect(() => fx.strategy.lockDeposit('alice', LockPeriod.ThirtyDays)).toThrow(
      expect.objectContaining({ kind: 'LockAlreadyExists' })
    );

    fx.clock.now = START + NINETY_DAYS + 1_000n;
    expect(fx.strategy.isLocked('alice')).toBe(false);
    expect(() => fx.strategy.lockDeposit('alice', LockPeriod.ThirtyDays)).toThrow(
      expect.objectContaining({ kind: 'LockAlreadyExists' })
    );

    fx.strategy.unlockDeposit('alice');
    const relocked = fx.strategy.lockDeposit('alice', LockPeriod.ThirtyDays);
    expect(relocked.unlockTime).toBe(START + NINETY_DAYS + 1_000n + 2_592_000n);
  });

  it('keeps the deposit locked until exactly the unlock time', () => {
    fx.strategy.lockDeposit('alice', LockPeriod.NinetyDays);

    fx.clock.now = START + NINETY_DAYS - 1n;
    expect(fx.strategy.isLocked('alice')).toBe(true);
    expect(() => fx.strategy.unlockDeposit('alice')).toThrow(expect.objectContaining({ kind: 'StillLocked' }));
    expect(fx.strategy.lockOf('alice')).not.toBeNull();

    fx.clock.now = START + NINETY_DAYS;
    expect(fx.strategy.isLocked('alice')).toBe(false);
    fx.strategy.unlockDeposit('alice');
    expect(fx.strategy.lockOf('alice')).toBeNull();
    expect(fx.events[fx.events.length - 1]).toEqual({
      type: 'LockReleased',
      user: 'alice',
      amount: 60n * ETHER,
      period: LockPeriod.NinetyDays,
    });
  });

  it('counts only locks before their unlock time', () => {
    fx.deposit('bob', 20n * ETHER);
    fx.strategy.lockDeposit('alice', LockPeriod.NinetyDays);
    fx.strategy.lockDeposit('bob', LockPeriod.ThirtyDays);
    expect(fx.strategy.activeLockCount()).toBe(2);

    fx.clock.now = START + 2_592_000n;
    expect(fx.strategy.activeLockCount()).toBe(1);
    expect(fx.strategy.lockOf('bob')).not.toBeNull();
  });

  it('rejects unlocking without a lock', () => {
    expect(() => fx.strategy.unlockDeposit('alice')).toThrow(expect.objectContaining({ kind: 'NoLockFound' }));
  });

  it('rejects locking an empty balance', () => {
    expect(() => fx.strategy.lockDeposit('carol', LockPeriod.ThirtyDays)).toThrow(
      expect.objectContaining({ kind: 'InsufficientBalance' })
    );
    expect(fx.strategy.lockOf('carol')).toBeNull();
    expect(fx.events).toHaveLength(0);
  });

  it('rejects the None period', () => {
    expect(() => fx.strategy.lockDeposit('alice', LockPeriod.None)).toThrow(
      expect.objectContaining({ kind: 'InvalidLockPeriod' })
    );
  });

  it('does not follow later utilization or policy changes', () => {
    fx.strategy.lockDeposit('alice', LockPeriod.NinetyDays);
    // 860 ether of 1000: 86% → 600 + 6 * 50 = 900
    fx.deposit('bob', 800n * ETHER);
    fx.strategy.setLockConfig(GOVERNANCE, LockPeriod.NinetyDays, { duration: NINETY_DAYS, bonusMultiplierBps: 20_000n });

    expect(fx.strategy.rate()).toBe(900n);
    expect(fx.strategy.effectiveRate('alice')).toBe(412n);
    expect(fx.strategy.lockOf('alice')?.bonusRate).toBe(412n);

    fx.clock.now = START + NINETY_DAYS - 1n;
    expect(fx.strategy.effectiveRate('alice')).toBe(412n);

    // expired but not unlocked: back to base + tier
    fx.clock.now = START + NINETY_DAYS;
    expect(fx.strategy.effectiveRate('alice')).toBe(1_000n);
  });
});

describe('Lock policy configuration', () => {
  it('round-trips a valid policy', () => {
    const fx = setupStrategy(1_000n);
    const policy = { duration: 3_600n, bonusMultiplierBps: 20_000n };
    fx.strategy.setLockConfig(GOVERNANCE, LockPeriod.ThirtyDays, policy);
    expect(fx.strategy.getLockConfig(LockPeriod.ThirtyDays)).toEqual(policy);
  });

  it.each([9_999n, 20_001n])('rejects a multiplier of %s bps', (multiplier) => {
    const fx = setupStrategy(1_000n);
    expect(() =>
      fx.strategy.setLockConfig(GOVERNANCE, LockPeriod.ThirtyDays, { duration: 1n, bonusMultiplierBps: multiplier })
    ).toThrow(expect.objectContaining({ kind: 'InvalidLockMultiplier' }));
    expect(fx.strategy.getLockConfig(LockPeriod.ThirtyDays)).toEqual({ duration: 2_592_000n, bonusMultiplierBps: 11_000n });
  });
});
