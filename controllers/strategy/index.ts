import { Request, Response } from 'express';
import { YieldStrategyService } from '../../services/yield-strategy.service';
import { LOCK_PERIOD_ORDER, TIER_ORDER, isLockPeriod } from '../../types';
import { parseAmount } from '../../utils/bps';
import { logger } from '../../utils/logger';
import { errorBody, errorBodyFrom, statusOf } from '../../utils/strategy-error';

/** Host hook that pays out `amount` to `user` once the strategy allows it. */
export type ReleaseValue = (user: string, amount: bigint) => void;

function userParam(req: Request): string {
  return req.params.user;
}

function fail(res: Response, operation: string, error: unknown) {
  const status = statusOf(error);
  if (status >= 500) logger.error(`${operation} failed:`, error);
  else logger.warn(`${operation} rejected: ${error instanceof Error ? error.message : String(error)}`);
  return res.status(status).json(errorBodyFrom(error));
}

export const createStrategyController = (strategy: YieldStrategyService, release: ReleaseValue) => ({
  getRate: (_req: Request, res: Response) => {
    try {
      return res.status(200).json({ data: { rate: strategy.rate() } });
    } catch (error) {
      return fail(res, 'getRate', error);
    }
  },

  getConfig: (_req: Request, res: Response) => {
    try {
      const tiers = TIER_ORDER.map((tier) => ({ tier, ...strategy.getTierConfig(tier) }));
      const locks = LOCK_PERIOD_ORDER.map((period) => ({ period, ...strategy.getLockConfig(period) }));
      return res.status(200).json({
        data: {
          utilization: strategy.getUtilizationConfig(),
          tiers,
          locks,
          performanceFee: strategy.getPerformanceFeeConfig(),
          globalHighWaterMark: strategy.globalHighWaterMark(),
        },
      });
    } catch (error) {
      return fail(res, 'getConfig', error);
    }
  },

  getStrategyInfo: (req: Request, res: Response) => {
    try {
      const user = userParam(req);
      return res.status(200).json({ data: { user, ...strategy.strategyInfo(user) } });
    } catch (error) {
      return fail(res, 'getStrategyInfo', error);
    }
  },

  getLock: (req: Request, res: Response) => {
    try {
      const user = userParam(req);
      const lock = strategy.lockOf(user);
      if (!lock) return res.status(404).json(errorBody('No lock found for this account.', 'NoLockFound'));
      return res.status(200).json({ data: { ...lock, isLocked: strategy.isLocked(user) } });
    } catch (error) {
      return fail(res, 'getLock', error);
    }
  },

  lockDeposit: (req: Request, res: Response) => {
    try {
      const caller = req.caller;
      if (!caller) return res.status(401).json(errorBody('Please sign in to lock your deposit.'));
      const period = req.body?.period;
      if (!isLockPeriod(period)) {
        return res.status(400).json(errorBody(`Please choose a lock period: ${LOCK_PERIOD_ORDER.join(', ')}.`));
      }
      const lock = strategy.lockDeposit(caller, period);
      return res.status(201).json({ data: lock });
    } catch (error) {
      return fail(res, 'lockDeposit', error);
    }
  },

  unlockDeposit: (req: Request, res: Response) => {
    try {
      const caller = req.caller;
      if (!caller) return res.status(401).json(errorBody('Please sign in to unlock your deposit.'));
      strategy.unlockDeposit(caller);
      return res.status(200).json({ success: true });
    } catch (error) {
      return fail(res, 'unlockDeposit', error);
    }
  },

  withdraw: (req: Request, res: Response) => {
    try {
      const caller = req.caller;
      if (!caller) return res.status(401).json(errorBody('Please sign in to withdraw.'));
      const amount = parseAmount(req.body?.amount);
      if (amount === null || amount === 0n) {
        return res.status(400).json(errorBody('Please enter a positive amount to withdraw.'));
      }
      const { fee } = strategy.withdraw(caller, () => release(caller, amount));
      return res.status(200).json({ data: { withdrawn: amount, performanceFee: fee } });
    } catch (error) {
      return fail(res, 'withdraw', error);
    }
  },
});

export type StrategyController = ReturnType<typeof createStrategyController>;
