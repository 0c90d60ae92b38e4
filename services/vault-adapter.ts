/**
 * Vault and token collaborators: the strategy reads deposits, capacity,
 * shares and balances from them and moves fees through the token ledger.
 * Implement against the custody layer; the mocks below keep everything in memory.
 */
import { Identity } from '../types';

export interface IVaultAdapter {
  totalDeposited(): bigint;
  maxCapacity(): bigint;
  /** Cumulative amount the user has deposited. */
  userDeposit(user: Identity): bigint;
  feeRecipient(): Identity;
  isAuthorized(caller: Identity): boolean;
}

/** Restores the ledger to the moment the checkpoint was taken. */
export interface LedgerCheckpoint {
  rollback(): void;
}

export interface ITokenLedger {
  totalSupply(): bigint;
  totalShares(): bigint;
  balanceOf(user: Identity): bigint;
  transferValue(from: Identity, to: Identity, amount: bigint): boolean;
  checkpoint(): LedgerCheckpoint;
}

/**
 * Mock vault for development and tests. Replace with the custody implementation.
 */
export class MockVaultAdapter implements IVaultAdapter {
  private deposits: Map<Identity, bigint> = new Map();
  private deposited = 0n;
  private admins: Set<Identity>;

  constructor(
    private readonly capacity: bigint,
    private recipient: Identity,
    admins: Iterable<Identity> = []
  ) {
    this.admins = new Set(admins);
  }

  totalDeposited(): bigint {
    return this.deposited;
  }

  maxCapacity(): bigint {
    return this.capacity;
  }

  userDeposit(user: Identity): bigint {
    return this.deposits.get(user) ?? 0n;
  }

  feeRecipient(): Identity {
    return this.recipient;
  }

  isAuthorized(caller: Identity): boolean {
    return this.admins.has(caller);
  }

  /** Records a deposit; the cumulative figure never decreases. */
  recordDeposit(user: Identity, amount: bigint): void {
    this.deposits.set(user, this.userDeposit(user) + amount);
    this.deposited += amount;
  }

  recordWithdrawal(amount: bigint): void {
    if (amount > this.deposited) throw new Error('Withdrawal exceeds total deposited');
    this.deposited -= amount;
  }

  grant(caller: Identity): void {
    this.admins.add(caller);
  }
}

/** Records each deposit in the vault and mints the matching shares. */
export function fundMockVault(
  vault: MockVaultAdapter,
  ledger: MockTokenLedger,
  deposits: Iterable<{ user: Identity; amount: bigint }>
): void {
  for (const { user, amount } of deposits) {
    vault.recordDeposit(user, amount);
    ledger.mint(user, amount);
  }
}

/**
 * In-memory share ledger. Supply is total value, shares are the units held;
 * a holder's balance is their shares priced at supply / shares.
 */
export class MockTokenLedger implements ITokenLedger {
  private shares: Map<Identity, bigint> = new Map();
  private supply = 0n;
  private sharesOutstanding = 0n;
  /** Fails the next transfers while set; used to exercise rollback. */
  failTransfers = false;

  totalSupply(): bigint {
    return this.supply;
  }

  totalShares(): bigint {
    return this.sharesOutstanding;
  }

  balanceOf(user: Identity): bigint {
    const held = this.shares.get(user) ?? 0n;
    if (this.sharesOutstanding === 0n) return 0n;
    return (held * this.supply) / this.sharesOutstanding;
  }

  sharesOf(user: Identity): bigint {
    return this.shares.get(user) ?? 0n;
  }

  /** Mints `amount` of value at the current share price (1:1 when empty). */
  mint(user: Identity, amount: bigint): bigint {
    const minted =
      this.sharesOutstanding === 0n || this.supply === 0n ? amount : (amount * this.sharesOutstanding) / this.supply;
    this.shares.set(user, this.sharesOf(user) + minted);
    this.sharesOutstanding += minted;
    this.supply += amount;
    return minted;
  }

  /** Burns enough shares to remove `amount` of value from the user. */
  burn(user: Identity, amount: bigint): void {
    const sharesToBurn = this.sharesFor(amount);
    const held = this.sharesOf(user);
    if (sharesToBurn > held) throw new Error(`Insufficient balance for ${user}`);
    this.shares.set(user, held - sharesToBurn);
    this.sharesOutstanding -= sharesToBurn;
    this.supply -= amount;
  }

  /** Value growth without new shares, e.g. yield or a positive rebase. */
  accrue(amount: bigint): void {
    this.supply += amount;
  }

  transferValue(from: Identity, to: Identity, amount: bigint): boolean {
    if (this.failTransfers) return false;
    const sharesToMove = this.sharesFor(amount);
    const held = this.sharesOf(from);
    if (sharesToMove > held) return false;
    this.shares.set(from, held - sharesToMove);
    this.shares.set(to, this.sharesOf(to) + sharesToMove);
    return true;
  }

  checkpoint(): LedgerCheckpoint {
    const shares = new Map(this.shares);
    const supply = this.supply;
    const sharesOutstanding = this.sharesOutstanding;
    return {
      rollback: () => {
        this.shares = new Map(shares);
        this.supply = supply;
        this.sharesOutstanding = sharesOutstanding;
      },
    };
  }

  private sharesFor(amount: bigint): bigint {
    if (this.supply === 0n) return amount;
    return (amount * this.sharesOutstanding) / this.supply;
  }
}
