import { Request, Response } from 'express';
import { EventLogService } from '../../services/event-log.service';
import { YieldStrategyService } from '../../services/yield-strategy.service';
import { StrategyEventName } from '../../models/StrategyEvent';
import { isLockPeriod, isTier } from '../../types';
import { parseAmount } from '../../utils/bps';
import { logger } from '../../utils/logger';
import { errorBody, errorBodyFrom, statusOf } from '../../utils/strategy-error';

const EVENT_NAMES: readonly StrategyEventName[] = [
  'ConfigurationChanged',
  'LockCreated',
  'LockReleased',
  'PerformanceFeeCharged',
  'HighWaterMarkUpdated',
];

const isEventName = (value: unknown): value is StrategyEventName => EVENT_NAMES.some((name) => name === value);

function param(req: Request, name: string): string {
  return req.params[name] ?? '';
}

/** Reads the named body fields as bigints; null when any is missing or malformed. */
function amounts<K extends string>(req: Request, names: readonly K[]): Record<K, bigint> | null {
  const body: Record<string, unknown> = req.body ?? {};
  const parsed: Partial<Record<K, bigint>> = {};
  for (const name of names) {
    const value = parseAmount(body[name]);
    if (value === null) return null;
    parsed[name] = value;
  }
  return isComplete(parsed, names) ? parsed : null;
}

function isComplete<K extends string>(parsed: Partial<Record<K, bigint>>, names: readonly K[]): parsed is Record<K, bigint> {
  return names.every((name) => parsed[name] !== undefined);
}

function fail(res: Response, operation: string, error: unknown) {
  const status = statusOf(error);
  if (status >= 500) logger.error(`${operation} failed:`, error);
  else logger.warn(`${operation} rejected: ${error instanceof Error ? error.message : String(error)}`);
  return res.status(status).json(errorBodyFrom(error));
}

export const createAdminController = (strategy: YieldStrategyService, eventLog: EventLogService) => ({
  setUtilizationConfig: (req: Request, res: Response) => {
    try {
      const curve = amounts(req, ['kinkBps', 'baseRateBps', 'lowSlope', 'highSlope'] as const);
      if (!curve) return res.status(400).json(errorBody('Please provide kinkBps, baseRateBps, lowSlope and highSlope.'));
      strategy.setUtilizationConfig(req.caller ?? '', curve);
      return res.status(200).json({ data: strategy.getUtilizationConfig() });
    } catch (error) {
      return fail(res, 'setUtilizationConfig', error);
    }
  },

  setTierConfig: (req: Request, res: Response) => {
    try {
      const tier = param(req, 'tier');
      if (!isTier(tier)) return res.status(404).json(errorBody(`Unknown tier ${tier}.`));
      const config = amounts(req, ['minDeposit', 'bonusBps'] as const);
      if (!config) return res.status(400).json(errorBody('Please provide minDeposit and bonusBps.'));
      strategy.setTierConfig(req.caller ?? '', tier, config);
      return res.status(200).json({ data: { tier, ...strategy.getTierConfig(tier) } });
    } catch (error) {
      return fail(res, 'setTierConfig', error);
    }
  },

  setLockConfig: (req: Request, res: Response) => {
    try {
      const period = param(req, 'period');
      if (!isLockPeriod(period)) return res.status(404).json(errorBody(`Unknown lock period ${period}.`));
      const policy = amounts(req, ['duration', 'bonusMultiplierBps'] as const);
      if (!policy) return res.status(400).json(errorBody('Please provide duration and bonusMultiplierBps.'));
      strategy.setLockConfig(req.caller ?? '', period, policy);
      return res.status(200).json({ data: { period, ...strategy.getLockConfig(period) } });
    } catch (error) {
      return fail(res, 'setLockConfig', error);
    }
  },

  setPerformanceFeeConfig: (req: Request, res: Response) => {
    try {
      const fee = amounts(req, ['feeBps'] as const);
      const recipient = req.body?.recipient;
      if (!fee || typeof recipient !== 'string') {
        return res.status(400).json(errorBody('Please provide feeBps and recipient.'));
      }
      strategy.setPerformanceFeeConfig(req.caller ?? '', fee.feeBps, recipient);
      return res.status(200).json({ data: strategy.getPerformanceFeeConfig() });
    } catch (error) {
      return fail(res, 'setPerformanceFeeConfig', error);
    }
  },

  updateGlobalHighWaterMark: (req: Request, res: Response) => {
    try {
      const mark = strategy.updateGlobalHighWaterMark(req.caller ?? '');
      return res.status(200).json({ data: { globalHighWaterMark: mark } });
    } catch (error) {
      return fail(res, 'updateGlobalHighWaterMark', error);
    }
  },

  listEvents: async (req: Request, res: Response) => {
    try {
      const subject = typeof req.query.subject === 'string' ? req.query.subject : undefined;
      const type = isEventName(req.query.type) ? req.query.type : undefined;
      const limit = typeof req.query.limit === 'string' ? Number(req.query.limit) || undefined : undefined;
      const events = await eventLog.listEvents({ subject, type, limit });
      return res.status(200).json({ data: events });
    } catch (error) {
      return fail(res, 'listEvents', error);
    }
  },
});

export type AdminController = ReturnType<typeof createAdminController>;
