import { LockPeriod } from '../types';
import { MockTokenLedger, MockVaultAdapter, fundMockVault } from '../services/vault-adapter';
import { YieldStrategyService } from '../services/yield-strategy.service';
import { bigintReplacer } from '../utils/bps';
import { logger } from '../utils/logger';

const ETHER = 10n ** 18n;
const DAY = 86_400n;

/**
 * Walks a seeded in-memory vault through a lock, a yield accrual, a fee
 * charge and a withdrawal, printing strategy info at every step.
 */
export const simulateStrategy = () => {
  let now = 1_700_000_000n;
  const vault = new MockVaultAdapter(1_000n * ETHER, 'treasury', ['governance']);
  const ledger = new MockTokenLedger();
  const strategy = new YieldStrategyService({ vault, token: ledger, clock: () => now });

  strategy.onEvent((event) => logger.info(`event ${JSON.stringify(event, bigintReplacer)}`));

  const show = (label: string, user: string) => {
    logger.divider();
    logger.info(`${label}: ${JSON.stringify(strategy.strategyInfo(user), bigintReplacer)}`);
  };

  fundMockVault(vault, ledger, [
    { user: 'alice', amount: 60n * ETHER },
    { user: 'bob', amount: 500n * ETHER },
  ]);
  show('after deposits', 'alice');

  strategy.lockDeposit('alice', LockPeriod.NinetyDays);
  show('alice locked for 90 days', 'alice');

  ledger.accrue(56n * ETHER);
  show('after 10% yield', 'alice');

  now += 91n * DAY;
  strategy.unlockDeposit('alice');
  const { fee } = strategy.withdraw('alice', () => {
    ledger.burn('alice', 10n * ETHER);
    vault.recordWithdrawal(10n * ETHER);
  });
  logger.success(`alice withdrew 10 ether, performance fee ${fee}`);
  show('after withdrawal', 'alice');

  strategy.updateGlobalHighWaterMark('governance');
  show('bob after global mark update', 'bob');
};

if (require.main === module) {
  simulateStrategy();
}
