import dotenv from 'dotenv';

dotenv.config();

const list = (value: string | undefined): string[] =>
  (value || '')
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);

export interface SeedDeposit {
  user: string;
  amount: bigint;
}

/** "alice:1000,bob:500" → deposits; entries without a user or a whole amount are skipped. */
export const parseSeedDeposits = (value: string | undefined): SeedDeposit[] =>
  list(value).flatMap((entry) => {
    const [user, amount] = entry.split(':').map((part) => part.trim());
    if (!user || !amount || !/^\d+$/.test(amount)) return [];
    return [{ user, amount: BigInt(amount) }];
  });

const env = {
    PORT: Number(process.env.PORT || 5000),
    MONGO_URI: process.env.MONGO_URI || '',
    JWT_SECRET: process.env.JWT_SECRET || '',
    /** Identities allowed to call privileged configuration operations. */
    ADMIN_IDS: list(process.env.ADMIN_IDS),
    /** Initial performance fee recipient reported by the vault. */
    FEE_RECIPIENT: process.env.FEE_RECIPIENT || 'treasury',
    /** Maximum vault capacity in base units (decimal string). */
    VAULT_CAPACITY: process.env.VAULT_CAPACITY || '1000000000000000000000000',
    /** Deposits funded into the in-memory vault at startup, as user:amount pairs. */
    SEED_DEPOSITS: parseSeedDeposits(process.env.SEED_DEPOSITS),
    /** Persist strategy notifications to MongoDB. */
    PERSIST_EVENTS: process.env.PERSIST_EVENTS !== 'false',
}

export default env;
