import {
  Bps,
  Identity,
  LockPeriod,
  LockPolicyConfig,
  PerformanceFeeConfig,
  RateCurveConfig,
  StrategyInfo,
  Tier,
  TierConfig,
  Timestamp,
  UserLock,
} from '../types';
import { logger } from '../utils/logger';
import { StrategyError } from '../utils/strategy-error';
import { effectiveRateService } from './effective-rate.service';
import { lockService } from './lock.service';
import { performanceFeeService } from './performance-fee.service';
import { StrategyEvent, StrategyEventBus, StrategyEventListener } from './strategy-events';
import {
  StrategySeed,
  StrategyState,
  cloneStrategyState,
  createStrategyState,
  getLockPolicy,
  getTierConfig,
} from './strategy-state';
import { tierService } from './tier.service';
import { utilizationRateService } from './utilization-rate.service';
import { ITokenLedger, IVaultAdapter } from './vault-adapter';

export type Clock = () => Timestamp;

export const systemClock: Clock = () => BigInt(Math.floor(Date.now() / 1000));

export interface YieldStrategyOptions {
  vault: IVaultAdapter;
  token: ITokenLedger;
  clock?: Clock;
  /** Overrides for the seed tables; the fee recipient defaults to the vault's. */
  seed?: Partial<StrategySeed>;
}

/** Work done inside a staged operation; push notifications onto `events`. */
type StagedWork<T> = (draft: StrategyState, events: StrategyEvent[], now: Timestamp) => T;

/**
 * Yield strategy for one vault. Queries read the live state; every mutating
 * operation runs on a draft copy plus a token-ledger checkpoint and commits
 * only when all of its checks pass.
 */
export class YieldStrategyService {
  private state: StrategyState;
  private readonly vault: IVaultAdapter;
  private readonly token: ITokenLedger;
  private readonly clock: Clock;
  private readonly bus = new StrategyEventBus();

  constructor(options: YieldStrategyOptions) {
    this.vault = options.vault;
    this.token = options.token;
    this.clock = options.clock ?? systemClock;
    this.state = createStrategyState({
      ...options.seed,
      feeRecipient: options.seed?.feeRecipient ?? options.vault.feeRecipient(),
    });
  }

  onEvent(listener: StrategyEventListener): () => void {
    return this.bus.subscribe(listener);
  }

  // ---------------------------------------------------------------------------
  // Utilization curve
  // ---------------------------------------------------------------------------

  rate(): Bps {
    return utilizationRateService.currentRate(this.state, this.vault);
  }

  utilizationBps(): Bps {
    return utilizationRateService.utilizationBps(this.vault.maxCapacity(), this.vault.totalDeposited());
  }

  getUtilizationConfig(): RateCurveConfig {
    return { ...this.state.curve };
  }

  setUtilizationConfig(caller: Identity, curve: RateCurveConfig): void {
    this.staged(caller, 'setUtilizationConfig', (draft, events) => {
      events.push({ type: 'ConfigurationChanged', caller, ...utilizationRateService.setConfig(draft, curve) });
    });
    logger.success(`Utilization curve updated by ${caller}: kink=${curve.kinkBps} base=${curve.baseRateBps}`);
  }

  // ---------------------------------------------------------------------------
  // Tiers
  // ---------------------------------------------------------------------------

  tierOf(user: Identity): Tier {
    return tierService.tierOf(this.vault.userDeposit(user), this.state.tiers);
  }

  tierBonus(user: Identity): Bps {
    return tierService.bonusOf(this.state, this.tierOf(user));
  }

  getTierConfig(tier: Tier): TierConfig {
    return { ...getTierConfig(this.state, tier) };
  }

  setTierConfig(caller: Identity, tier: Tier, config: TierConfig): void {
    this.staged(caller, 'setTierConfig', (draft, events) => {
      events.push({ type: 'ConfigurationChanged', caller, ...tierService.setConfig(draft, tier, config) });
    });
    logger.success(`Tier ${tier} updated by ${caller}: min=${config.minDeposit} bonus=${config.bonusBps}`);
  }

  // ---------------------------------------------------------------------------
  // Locks
  // ---------------------------------------------------------------------------

  lockDeposit(caller: Identity, period: LockPeriod): UserLock {
    const lock = this.atomic((draft, events, now) => {
      const created = lockService.lockDeposit(draft, { vault: this.vault, token: this.token, now }, caller, period);
      events.push(created);
      const { amount, unlockTime, bonusRate } = created;
      return { amount, unlockTime, period, bonusRate };
    });
    logger.info(`Deposit locked: user=${caller} period=${period} amount=${lock.amount} bonus=${lock.bonusRate}`);
    return lock;
  }

  unlockDeposit(caller: Identity): void {
    this.atomic((draft, events, now) => {
      events.push(lockService.unlockDeposit(draft, now, caller));
    });
    logger.info(`Deposit unlocked: user=${caller}`);
  }

  lockOf(user: Identity): UserLock | null {
    return lockService.lockOf(this.state, user);
  }

  isLocked(user: Identity): boolean {
    return lockService.isLocked(this.state, this.clock(), user);
  }

  activeLockCount(): number {
    return lockService.activeCount(this.state, this.clock());
  }

  getLockConfig(period: LockPeriod): LockPolicyConfig {
    return { ...getLockPolicy(this.state, period) };
  }

  setLockConfig(caller: Identity, period: LockPeriod, policy: LockPolicyConfig): void {
    this.staged(caller, 'setLockConfig', (draft, events) => {
      events.push({ type: 'ConfigurationChanged', caller, ...lockService.setConfig(draft, period, policy) });
    });
    logger.success(`Lock policy ${period} updated by ${caller}: multiplier=${policy.bonusMultiplierBps}`);
  }

  // ---------------------------------------------------------------------------
  // Performance fee
  // ---------------------------------------------------------------------------

  pendingFee(user: Identity): bigint {
    return performanceFeeService.pendingFee(this.state, this.token, user);
  }

  /** Returns the fee charged, 0n when nothing was owed. */
  chargeFee(user: Identity): bigint {
    return this.atomic((draft, events) => this.chargeFeeOn(draft, events, user));
  }

  getPerformanceFeeConfig(): PerformanceFeeConfig {
    return { ...this.state.performanceFee };
  }

  setPerformanceFeeConfig(caller: Identity, feeBps: Bps, recipient: Identity): void {
    this.staged(caller, 'setPerformanceFeeConfig', (draft, events) => {
      events.push({ type: 'ConfigurationChanged', caller, ...performanceFeeService.setConfig(draft, feeBps, recipient) });
    });
    logger.success(`Performance fee updated by ${caller}: fee=${feeBps} recipient=${recipient}`);
  }

  /** Current value per 10000 shares, the unit the high-water marks use; null without shares. */
  valuePerShare(): bigint | null {
    return performanceFeeService.valuePerShare(this.token);
  }

  globalHighWaterMark(): bigint {
    return this.state.globalHighWaterMark;
  }

  userHighWaterMark(user: Identity): bigint | null {
    return this.state.userHighWaterMarks.get(user) ?? null;
  }

  updateGlobalHighWaterMark(caller: Identity): bigint {
    const change = this.staged(caller, 'updateGlobalHighWaterMark', (draft, events) => {
      const moved = performanceFeeService.updateGlobalHighWaterMark(draft, this.token);
      if (moved) events.push({ type: 'HighWaterMarkUpdated', caller, ...moved });
      return moved;
    });
    if (change) logger.success(`Global high-water mark raised ${change.previousMark} → ${change.newMark}`);
    else logger.warn(`Global high-water mark unchanged at ${this.state.globalHighWaterMark}`);
    return this.state.globalHighWaterMark;
  }

  // ---------------------------------------------------------------------------
  // Composition
  // ---------------------------------------------------------------------------

  effectiveRate(user: Identity): Bps {
    return effectiveRateService.effectiveRate(this.state, this.vault, this.clock(), user);
  }

  strategyInfo(user: Identity): StrategyInfo {
    const tier = this.tierOf(user);
    const lock = this.state.locks.get(user);
    return {
      rate: this.rate(),
      tier,
      tierBonus: tierService.bonusOf(this.state, tier),
      isLocked: this.isLocked(user),
      lockPeriod: lock?.period ?? LockPeriod.None,
      unlockTime: lock?.unlockTime ?? 0n,
      effectiveRate: this.effectiveRate(user),
      pendingFee: this.pendingFee(user),
    };
  }

  /**
   * Withdrawal gate: rejects while locked, charges the performance fee on
   * pre-withdrawal balances, then runs the host's release. A failure at any
   * step leaves strategy and ledger untouched.
   */
  withdraw<T>(caller: Identity, release: () => T): { fee: bigint; result: T } {
    const outcome = this.atomic((draft, events, now) => {
      if (lockService.isLocked(draft, now, caller)) {
        throw new StrategyError('StillLocked', 'Deposit is locked. Withdraw after the unlock time.');
      }
      const fee = this.chargeFeeOn(draft, events, caller);
      return { fee, result: release() };
    });
    logger.info(`Withdrawal released: user=${caller} fee=${outcome.fee}`);
    return outcome;
  }

  // ---------------------------------------------------------------------------
  // Staging
  // ---------------------------------------------------------------------------

  private chargeFeeOn(draft: StrategyState, events: StrategyEvent[], user: Identity): bigint {
    const charged = performanceFeeService.chargeFee(draft, this.token, user);
    if (!charged) return 0n;
    events.push(charged);
    logger.info(`Performance fee charged: user=${user} amount=${charged.amount} mark=${charged.newMark}`);
    return charged.amount;
  }

  private authorize(caller: Identity, operation: string): void {
    if (!this.vault.isAuthorized(caller)) {
      logger.warn(`Unauthorized ${operation} attempt by ${caller}`);
      throw new StrategyError('Unauthorized', 'You are not allowed to change strategy configuration.');
    }
  }

  /** Authorized variant of atomic: the check runs before any effect. */
  private staged<T>(caller: Identity, operation: string, work: StagedWork<T>): T {
    this.authorize(caller, operation);
    return this.atomic(work);
  }

  private atomic<T>(work: StagedWork<T>): T {
    const now = this.clock();
    const draft = cloneStrategyState(this.state);
    const checkpoint = this.token.checkpoint();
    const events: StrategyEvent[] = [];
    let result: T;
    try {
      result = work(draft, events, now);
    } catch (err) {
      checkpoint.rollback();
      throw err;
    }
    this.state = draft;
    this.bus.publish(events, now);
    return result;
  }
}
