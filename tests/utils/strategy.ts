import { Request, Response } from 'express';
import { StrategyEvent } from '../../services/strategy-events';
import { ITokenLedger, LedgerCheckpoint, MockTokenLedger, MockVaultAdapter, fundMockVault } from '../../services/vault-adapter';
import { YieldStrategyService } from '../../services/yield-strategy.service';

export const ETHER = 10n ** 18n;
export const START = 1_000_000n;
export const GOVERNANCE = 'governance';
export const TREASURY = 'treasury';

export interface StrategyFixture {
  vault: MockVaultAdapter;
  ledger: MockTokenLedger;
  strategy: YieldStrategyService;
  events: StrategyEvent[];
  clock: { now: bigint };
  deposit(user: string, amount: bigint): void;
}

export function setupStrategy(capacity: bigint): StrategyFixture {
  const vault = new MockVaultAdapter(capacity, TREASURY, [GOVERNANCE]);
  const ledger = new MockTokenLedger();
  const clock = { now: START };
  const strategy = new YieldStrategyService({ vault, token: ledger, clock: () => clock.now });
  const events: StrategyEvent[] = [];
  strategy.onEvent((event) => events.push(event));
  return {
    vault,
    ledger,
    strategy,
    events,
    clock,
    deposit(user, amount) {
      fundMockVault(vault, ledger, [{ user, amount }]);
    },
  };
}

/**
 * Ledger with fixed figures, for checking fee arithmetic on exact values.
 */
export class StubLedger implements ITokenLedger {
  transfers: { from: string; to: string; amount: bigint }[] = [];
  transferSucceeds = true;

  constructor(
    public supply: bigint,
    public shares: bigint,
    public balances: Record<string, bigint> = {}
  ) {}

  totalSupply(): bigint {
    return this.supply;
  }

  totalShares(): bigint {
    return this.shares;
  }

  balanceOf(user: string): bigint {
    return this.balances[user] ?? 0n;
  }

  transferValue(from: string, to: string, amount: bigint): boolean {
    if (!this.transferSucceeds) return false;
    this.transfers.push({ from, to, amount });
    return true;
  }

  checkpoint(): LedgerCheckpoint {
    const transfers = [...this.transfers];
    return { rollback: () => { this.transfers = transfers; } };
  }
}

export interface MockResponse {
  statusCode: number;
  body: unknown;
  headers: Record<string, string>;
}

/** Minimal express request/response pair for handler tests. */
export function mockHttp(init: { body?: unknown; params?: Record<string, string>; headers?: Record<string, string>; caller?: string } = {}) {
  const captured: MockResponse = { statusCode: 200, body: undefined, headers: {} };
  const res = {
    status(code: number) {
      captured.statusCode = code;
      return this;
    },
    json(body: unknown) {
      captured.body = body;
      return this;
    },
    setHeader(name: string, value: string) {
      captured.headers[name] = value;
      return this;
    },
  };
  const req = {
    body: init.body ?? {},
    params: init.params ?? {},
    query: {},
    headers: init.headers ?? {},
    caller: init.caller,
    method: 'POST',
    originalUrl: '/test',
  };
  const next = jest.fn();
  return { req: req as unknown as Request, res: res as unknown as Response, next, captured };
}
