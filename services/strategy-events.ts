import {
  Identity,
  LockPeriod,
  LockPolicyConfig,
  PerformanceFeeConfig,
  RateCurveConfig,
  Tier,
  TierConfig,
  Timestamp,
} from '../types';
import { logger } from '../utils/logger';

export type ConfigurationChange =
  | { target: 'utilization'; before: RateCurveConfig; after: RateCurveConfig }
  | { target: 'tier'; tier: Tier; before: TierConfig; after: TierConfig }
  | { target: 'lock'; period: LockPeriod; before: LockPolicyConfig; after: LockPolicyConfig }
  | { target: 'performanceFee'; before: PerformanceFeeConfig; after: PerformanceFeeConfig };

export type StrategyEvent =
  | ({ type: 'ConfigurationChanged'; caller: Identity } & ConfigurationChange)
  | {
      type: 'LockCreated';
      user: Identity;
      amount: bigint;
      period: LockPeriod;
      unlockTime: Timestamp;
      bonusRate: bigint;
    }
  | { type: 'LockReleased'; user: Identity; amount: bigint; period: LockPeriod }
  | { type: 'PerformanceFeeCharged'; user: Identity; recipient: Identity; amount: bigint; previousMark: bigint; newMark: bigint }
  | { type: 'HighWaterMarkUpdated'; caller: Identity; previousMark: bigint; newMark: bigint };

export type StrategyEventType = StrategyEvent['type'];

export type EventOf<K extends StrategyEventType> = Extract<StrategyEvent, { type: K }>;

export type StrategyEventListener = (event: StrategyEvent, emittedAt: Timestamp) => void;

/**
 * Fan-out for committed notifications. A failing listener is logged and
 * does not stop the others.
 */
export class StrategyEventBus {
  private listeners: StrategyEventListener[] = [];

  subscribe(listener: StrategyEventListener): () => void {
    this.listeners.push(listener);
    return () => {
      this.listeners = this.listeners.filter((l) => l !== listener);
    };
  }

  publish(events: readonly StrategyEvent[], emittedAt: Timestamp): void {
    for (const event of events) {
      for (const listener of this.listeners) {
        try {
          listener(event, emittedAt);
        } catch (err) {
          logger.error(`Strategy event listener failed on ${event.type}`, err);
        }
      }
    }
  }
}
