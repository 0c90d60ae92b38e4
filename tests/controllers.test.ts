import { createAdminController } from '../controllers/admin';
import { createStrategyController } from '../controllers/strategy';
import { EventLogService } from '../services/event-log.service';
import { LockPeriod } from '../types';
import { logger } from '../utils/logger';
import { GOVERNANCE, StrategyFixture, TREASURY, mockHttp, setupStrategy } from './utils/strategy';

function setupGrowth(): StrategyFixture {
  const fx = setupStrategy(100_000n);
  fx.deposit('alice', 5_000n);
  fx.deposit('bob', 5_000n);
  fx.ledger.accrue(1_000n);
  return fx;
}

beforeEach(() => {
  jest.spyOn(logger, 'warn').mockImplementation(() => undefined);
});

afterEach(() => {
  jest.restoreAllMocks();
});

describe('strategy controller', () => {
  it('locks the caller deposit', () => {
    const fx = setupGrowth();
    const controller = createStrategyController(fx.strategy, jest.fn());
    const { req, res, captured } = mockHttp({ caller: 'alice', body: { period: 'ThirtyDays' } });

    controller.lockDeposit(req, res);

    expect(captured.statusCode).toBe(201);
    expect(captured.body).toEqual({
      data: { amount: 5_500n, unlockTime: 3_592_000n, period: LockPeriod.ThirtyDays, bonusRate: 275n },
    });
  });

  it('rejects an unknown lock period', () => {
    const fx = setupGrowth();
    const controller = createStrategyController(fx.strategy, jest.fn());
    const { req, res, captured } = mockHttp({ caller: 'alice', body: { period: 'Forever' } });

    controller.lockDeposit(req, res);

    expect(captured.statusCode).toBe(400);
    expect(fx.strategy.lockOf('alice')).toBeNull();
  });

  it('returns 404 for a missing lock', () => {
    const fx = setupGrowth();
    const controller = createStrategyController(fx.strategy, jest.fn());
    const { req, res, captured } = mockHttp({ params: { user: 'bob' } });

    controller.getLock(req, res);

    expect(captured.statusCode).toBe(404);
    expect(captured.body).toEqual({ success: false, message: 'No lock found for this account.', code: 'NoLockFound' });
  });

  it('charges the fee and releases the requested amount', () => {
    const fx = setupGrowth();
    const release = jest.fn();
    const controller = createStrategyController(fx.strategy, release);
    const { req, res, captured } = mockHttp({ caller: 'alice', body: { amount: '1000' } });

    controller.withdraw(req, res);

    expect(release).toHaveBeenCalledWith('alice', 1_000n);
    expect(captured.statusCode).toBe(200);
    expect(captured.body).toEqual({ data: { withdrawn: 1_000n, performanceFee: 55n } });
    expect(fx.ledger.balanceOf(TREASURY)).toBe(55n);
  });

  it('maps a locked withdrawal to 409', () => {
    const fx = setupGrowth();
    fx.strategy.lockDeposit('alice', LockPeriod.ThirtyDays);
    const release = jest.fn();
    const controller = createStrategyController(fx.strategy, release);
    const { req, res, captured } = mockHttp({ caller: 'alice', body: { amount: '1000' } });

    controller.withdraw(req, res);

    expect(release).not.toHaveBeenCalled();
    expect(captured.statusCode).toBe(409);
    expect(captured.body).toEqual({
      success: false,
      message: 'Deposit is locked. Withdraw after the unlock time.',
      code: 'StillLocked',
    });
  });

  it.each([{}, { amount: '0' }, { amount: 'ten' }])('rejects the withdrawal body %j', (body) => {
    const fx = setupGrowth();
    const controller = createStrategyController(fx.strategy, jest.fn());
    const { req, res, captured } = mockHttp({ caller: 'alice', body });

    controller.withdraw(req, res);

    expect(captured.statusCode).toBe(400);
  });
});

describe('admin controller', () => {
  const eventLog = new EventLogService({
    create: () => Promise.resolve({}),
    find: () => Promise.resolve([]),
  });

  it('updates a tier', () => {
    const fx = setupStrategy(1_000n);
    const controller = createAdminController(fx.strategy, eventLog);
    const { req, res, captured } = mockHttp({
      caller: GOVERNANCE,
      params: { tier: 'Silver' },
      body: { minDeposit: '20', bonusBps: 75 },
    });

    controller.setTierConfig(req, res);

    expect(captured.statusCode).toBe(200);
    expect(captured.body).toEqual({ data: { tier: 'Silver', minDeposit: 20n, bonusBps: 75n } });
  });

  it('returns 404 for an unknown tier', () => {
    const fx = setupStrategy(1_000n);
    const controller = createAdminController(fx.strategy, eventLog);
    const { req, res, captured } = mockHttp({ caller: GOVERNANCE, params: { tier: 'Mithril' }, body: {} });

    controller.setTierConfig(req, res);

    expect(captured.statusCode).toBe(404);
  });

  it('maps an unauthorized change to 403', () => {
    const fx = setupStrategy(1_000n);
    const controller = createAdminController(fx.strategy, eventLog);
    const { req, res, captured } = mockHttp({ caller: 'alice', body: { feeBps: '0', recipient: 'alice' } });

    controller.setPerformanceFeeConfig(req, res);

    expect(captured.statusCode).toBe(403);
    expect(captured.body).toEqual({
      success: false,
      message: 'You are not allowed to change strategy configuration.',
      code: 'Unauthorized',
    });
  });

  it('maps a validation failure to 400', () => {
    const fx = setupStrategy(1_000n);
    const controller = createAdminController(fx.strategy, eventLog);
    const { req, res, captured } = mockHttp({
      caller: GOVERNANCE,
      params: { period: 'NinetyDays' },
      body: { duration: '60', bonusMultiplierBps: '30000' },
    });

    controller.setLockConfig(req, res);

    expect(captured.statusCode).toBe(400);
    expect(captured.body).toMatchObject({ success: false, code: 'InvalidLockMultiplier' });
  });
});
