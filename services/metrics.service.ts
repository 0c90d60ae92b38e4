import { Counter, Gauge, Registry } from 'prom-client';
import { StrategyEvent } from './strategy-events';
import { ITokenLedger, IVaultAdapter } from './vault-adapter';
import { YieldStrategyService } from './yield-strategy.service';

const PREFIX = 'yield_strategy_';

/**
 * Prometheus exposition for one strategy. Gauges are read from the strategy
 * at scrape time; counters accumulate committed events.
 */
export class MetricsService {
  readonly registry = new Registry();
  private readonly feesCharged: Counter;
  private readonly lockEvents: Counter<'event'>;
  private readonly unsubscribe: () => void;

  constructor(strategy: YieldStrategyService, vault: IVaultAdapter, token: ITokenLedger) {
    const registers = [this.registry];

    new Gauge({
      name: `${PREFIX}utilization_bps`,
      help: 'Vault utilization (basis points)',
      registers,
      collect() {
        this.set(Number(strategy.utilizationBps()));
      },
    });
    new Gauge({
      name: `${PREFIX}rate_bps`,
      help: 'Base yield rate from the utilization curve (basis points)',
      registers,
      collect() {
        this.set(Number(strategy.rate()));
      },
    });
    new Gauge({
      name: `${PREFIX}value_per_share`,
      help: 'Token supply per 10000 shares (0 without shares)',
      registers,
      collect() {
        this.set(Number(strategy.valuePerShare() ?? 0n));
      },
    });
    new Gauge({
      name: `${PREFIX}global_high_water_mark`,
      help: 'Global performance fee high-water mark (value per 10000 shares)',
      registers,
      collect() {
        this.set(Number(strategy.globalHighWaterMark()));
      },
    });
    new Gauge({
      name: `${PREFIX}active_locks`,
      help: 'Locks that have not reached their unlock time',
      registers,
      collect() {
        this.set(strategy.activeLockCount());
      },
    });
    new Gauge({
      name: `${PREFIX}total_deposited`,
      help: 'Total deposited into the vault (base units)',
      registers,
      collect() {
        this.set(Number(vault.totalDeposited()));
      },
    });
    new Gauge({
      name: `${PREFIX}total_supply`,
      help: 'Token supply backing the vault shares (base units)',
      registers,
      collect() {
        this.set(Number(token.totalSupply()));
      },
    });
    new Gauge({
      name: `${PREFIX}total_shares`,
      help: 'Vault shares outstanding',
      registers,
      collect() {
        this.set(Number(token.totalShares()));
      },
    });

    this.feesCharged = new Counter({
      name: `${PREFIX}performance_fees_charged_total`,
      help: 'Performance fees moved to the recipient (base units)',
      registers,
    });
    this.lockEvents = new Counter({
      name: `${PREFIX}lock_events_total`,
      help: 'Committed lock lifecycle events',
      labelNames: ['event'] as const,
      registers,
    });

    this.unsubscribe = strategy.onEvent((event) => this.observe(event));
  }

  observe(event: StrategyEvent): void {
    switch (event.type) {
      case 'PerformanceFeeCharged':
        this.feesCharged.inc(Number(event.amount));
        break;
      case 'LockCreated':
        this.lockEvents.inc({ event: 'created' });
        break;
      case 'LockReleased':
        this.lockEvents.inc({ event: 'released' });
        break;
      default:
        break;
    }
  }

  contentType(): string {
    return this.registry.contentType;
  }

  metrics(): Promise<string> {
    return this.registry.metrics();
  }

  close(): void {
    this.unsubscribe();
    this.registry.clear();
  }
}
