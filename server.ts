import { createApp } from './app';
import { connectDB } from './config/db';
import env from './config/env';
import { logger } from './utils/logger';
import { eventLogService } from './services/event-log.service';
import { isAuthenticated } from './middlewares/isAuthenticated';
import { MetricsService } from './services/metrics.service';
import { MockTokenLedger, MockVaultAdapter, fundMockVault } from './services/vault-adapter';
import { YieldStrategyService } from './services/yield-strategy.service';
import { StrategyError } from './utils/strategy-error';

const startServer = async () => {
  // In-memory collaborators until a custody adapter is plugged in. Balances
  // exist only for SEED_DEPOSITS; everyone else has nothing to lock or withdraw.
  const vault = new MockVaultAdapter(BigInt(env.VAULT_CAPACITY), env.FEE_RECIPIENT, env.ADMIN_IDS);
  const ledger = new MockTokenLedger();
  fundMockVault(vault, ledger, env.SEED_DEPOSITS);
  if (env.SEED_DEPOSITS.length === 0) {
    logger.warn('No SEED_DEPOSITS configured; the in-memory vault starts empty');
  }
  const strategy = new YieldStrategyService({ vault, token: ledger });
  const metrics = new MetricsService(strategy, vault, ledger);

  if (env.PERSIST_EVENTS) {
    await connectDB();
    strategy.onEvent((event, emittedAt) => eventLogService.record(event, emittedAt));
  }

  const release = (user: string, amount: bigint) => {
    if (ledger.balanceOf(user) < amount) {
      throw new StrategyError('InsufficientBalance', 'Withdrawal exceeds your balance.');
    }
    ledger.burn(user, amount);
    vault.recordWithdrawal(amount);
  };

  const app = createApp({ strategy, vault, eventLog: eventLogService, release, authenticate: isAuthenticated, metrics });

  app.listen(env.PORT, () => {
    logger.success(`Yield strategy engine running on port ${env.PORT}`);
  });
};

startServer().catch((error) => {
  logger.error('Failed to start server:', error);
  process.exit(1);
});
