import { Bps, Identity, LockPeriod, LockPolicyConfig, Timestamp, UserLock } from '../types';
import { MAX_LOCK_MULTIPLIER_BPS, MIN_LOCK_MULTIPLIER_BPS } from '../config/strategy';
import { applyBps } from '../utils/bps';
import { StrategyError } from '../utils/strategy-error';
import { ConfigurationChange, EventOf } from './strategy-events';
import { StrategyState, getLockPolicy } from './strategy-state';
import { tierService } from './tier.service';
import { utilizationRateService } from './utilization-rate.service';
import { ITokenLedger, IVaultAdapter } from './vault-adapter';

export interface LockContext {
  vault: IVaultAdapter;
  token: ITokenLedger;
  now: Timestamp;
}

/**
 * One optional time lock per user:
 *   Unlocked --lockDeposit--> Locked --unlockDeposit (now ≥ unlockTime)--> Unlocked
 * An expired lock still blocks a new one until it is explicitly unlocked.
 */
export class LockService {
  /**
   * (rate + tier bonus) × multiplier, computed once and frozen into the lock.
   */
  snapshotBonusRate(state: StrategyState, ctx: LockContext, user: Identity, policy: LockPolicyConfig): Bps {
    const rate = utilizationRateService.currentRate(state, ctx.vault);
    const tier = tierService.tierOf(ctx.vault.userDeposit(user), state.tiers);
    return applyBps(rate + tierService.bonusOf(state, tier), policy.bonusMultiplierBps);
  }

  lockDeposit(state: StrategyState, ctx: LockContext, user: Identity, period: LockPeriod): EventOf<'LockCreated'> {
    if (state.locks.has(user)) {
      throw new StrategyError('LockAlreadyExists', 'You already have a lock. Unlock it before creating a new one.');
    }
    if (period === LockPeriod.None) {
      throw new StrategyError('InvalidLockPeriod', 'Please choose a lock period.');
    }
    const amount = ctx.token.balanceOf(user);
    if (amount === 0n) {
      throw new StrategyError('InsufficientBalance', 'You have no deposit balance to lock.');
    }

    const policy = getLockPolicy(state, period);
    const lock: UserLock = {
      amount,
      unlockTime: ctx.now + policy.duration,
      period,
      bonusRate: this.snapshotBonusRate(state, ctx, user, policy),
    };
    state.locks.set(user, lock);

    return { type: 'LockCreated', user, ...lock };
  }

  unlockDeposit(state: StrategyState, now: Timestamp, user: Identity): EventOf<'LockReleased'> {
    const lock = state.locks.get(user);
    if (!lock) throw new StrategyError('NoLockFound', 'No lock found for this account.');
    if (now < lock.unlockTime) {
      throw new StrategyError('StillLocked', `Deposit is locked until ${lock.unlockTime}.`);
    }
    state.locks.delete(user);
    return { type: 'LockReleased', user, amount: lock.amount, period: lock.period };
  }

  lockOf(state: StrategyState, user: Identity): UserLock | null {
    const lock = state.locks.get(user);
    return lock ? { ...lock } : null;
  }

  /** Expired exactly at unlockTime. */
  isActive(lock: UserLock | undefined, now: Timestamp): lock is UserLock {
    return lock !== undefined && lock.unlockTime > now;
  }

  isLocked(state: StrategyState, now: Timestamp, user: Identity): boolean {
    return this.isActive(state.locks.get(user), now);
  }

  /** Locks that have not reached their unlock time. */
  activeCount(state: StrategyState, now: Timestamp): number {
    let count = 0;
    for (const lock of state.locks.values()) {
      if (this.isActive(lock, now)) count += 1;
    }
    return count;
  }

  validate(policy: LockPolicyConfig): void {
    if (policy.bonusMultiplierBps < MIN_LOCK_MULTIPLIER_BPS || policy.bonusMultiplierBps > MAX_LOCK_MULTIPLIER_BPS) {
      throw new StrategyError(
        'InvalidLockMultiplier',
        `Lock multiplier must be between ${MIN_LOCK_MULTIPLIER_BPS} and ${MAX_LOCK_MULTIPLIER_BPS} bps`
      );
    }
  }

  setConfig(state: StrategyState, period: LockPeriod, policy: LockPolicyConfig): ConfigurationChange {
    this.validate(policy);
    const before = { ...getLockPolicy(state, period) };
    state.lockPolicies.set(period, { ...policy });
    return { target: 'lock', period, before, after: { ...policy } };
  }
}

export const lockService = new LockService();
