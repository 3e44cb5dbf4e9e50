import { fundsError, validationError } from "@prize-wheel/core-errors";
import { IDbClient } from "@prize-wheel/core-db";
import { IKeyValueStore, ILockManager } from "@prize-wheel/core-redis";

/**
 * Custody primitive. Balances are integers in the currency's smallest unit and
 * are scoped by (userId, currency).
 */
export interface IWalletPort {
  getBalance(userId: string, currency: string): Promise<bigint>;
  debitIfSufficient(userId: string, amount: bigint, currency: string): Promise<void>;
  credit(userId: string, amount: bigint, currency: string): Promise<void>;
}

export const WALLET = Symbol("WALLET");

export type WalletImpl = "demo" | "db";

const WALLET_KEY = (userId: string, currency: string) => `wallet:${currency}:${userId}`;
const WALLET_LOCK_KEY = (userId: string, currency: string) => `wallet:lock:${currency}:${userId}`;

export function parseWalletImpl(input: string | undefined): WalletImpl {
  const value = (input ?? "demo").trim().toLowerCase();
  if (value !== "demo" && value !== "db") {
    throw new Error(`Unsupported WALLET_IMPL: ${input}. Supported: demo, db`);
  }
  return value;
}

function assertPositive(amount: bigint): void {
  if (amount <= 0n) {
    throw validationError("INVALID_AMOUNT", "wallet movements must be positive", { amount: amount.toString() });
  }
}

function insufficient(userId: string, currency: string, balance: bigint, amount: bigint) {
  return fundsError("INSUFFICIENT_WALLET_BALANCE", "wallet balance is too low", {
    userId,
    currency,
    balance: balance.toString(),
    amount: amount.toString(),
  });
}

export class DemoWalletService implements IWalletPort {
  constructor(private readonly store: IKeyValueStore, private readonly lock: ILockManager, private readonly lockTtlMs = 2000) {}

  async getBalance(userId: string, currency: string): Promise<bigint> {
    const record = await this.store.get<{ balance: string }>(WALLET_KEY(userId, currency));
    return record ? BigInt(record.balance) : 0n;
  }

  async debitIfSufficient(userId: string, amount: bigint, currency: string): Promise<void> {
    assertPositive(amount);
    const key = WALLET_KEY(userId, currency);
    await this.lock.withLock(WALLET_LOCK_KEY(userId, currency), this.lockTtlMs, async () => {
      const record = (await this.store.get<{ balance: string }>(key)) ?? { balance: "0" };
      const balance = BigInt(record.balance);
      if (balance < amount) {
        throw insufficient(userId, currency, balance, amount);
      }
      await this.store.set(key, { balance: (balance - amount).toString() });
    });
  }

  async credit(userId: string, amount: bigint, currency: string): Promise<void> {
    assertPositive(amount);
    const key = WALLET_KEY(userId, currency);
    await this.lock.withLock(WALLET_LOCK_KEY(userId, currency), this.lockTtlMs, async () => {
      const record = (await this.store.get<{ balance: string }>(key)) ?? { balance: "0" };
      await this.store.set(key, { balance: (BigInt(record.balance) + amount).toString() });
    });
  }
}

export class DbWalletService implements IWalletPort {
  constructor(private readonly db: IDbClient, private readonly lock: ILockManager, private readonly lockTtlMs = 2000) {}

  async getBalance(userId: string, currency: string): Promise<bigint> {
    const rows = await this.db.query<WalletBalanceRow>(
      `SELECT id, user_id, currency, balance FROM wallet_balances WHERE user_id = $1 AND currency = $2`,
      [userId, currency]
    );
    return rows.length ? BigInt(rows[0].balance) : 0n;
  }

  async debitIfSufficient(userId: string, amount: bigint, currency: string): Promise<void> {
    assertPositive(amount);
    await this.lock.withLock(WALLET_LOCK_KEY(userId, currency), this.lockTtlMs, async () => {
      await this.db.transaction(async (tx) => {
        const row = await this.findOrCreateForUpdate(tx, userId, currency);
        const balance = BigInt(row.balance);
        if (balance < amount) {
          throw insufficient(userId, currency, balance, amount);
        }
        await tx.query(`UPDATE wallet_balances SET balance = $1, updated_at = NOW() WHERE id = $2`, [
          (balance - amount).toString(),
          row.id,
        ]);
      });
    });
  }

  async credit(userId: string, amount: bigint, currency: string): Promise<void> {
    assertPositive(amount);
    await this.lock.withLock(WALLET_LOCK_KEY(userId, currency), this.lockTtlMs, async () => {
      await this.db.transaction(async (tx) => {
        const row = await this.findOrCreateForUpdate(tx, userId, currency);
        await tx.query(`UPDATE wallet_balances SET balance = $1, updated_at = NOW() WHERE id = $2`, [
          (BigInt(row.balance) + amount).toString(),
          row.id,
        ]);
      });
    });
  }

  private async findOrCreateForUpdate(tx: IDbClient, userId: string, currency: string): Promise<WalletBalanceRow> {
    const rows = await tx.query<WalletBalanceRow>(
      `SELECT id, user_id, currency, balance FROM wallet_balances WHERE user_id = $1 AND currency = $2 FOR UPDATE`,
      [userId, currency]
    );
    if (rows.length) {
      return rows[0];
    }
    const inserted = await tx.query<WalletBalanceRow>(
      `INSERT INTO wallet_balances (user_id, currency, balance)
       VALUES ($1,$2,0)
       RETURNING id, user_id, currency, balance`,
      [userId, currency]
    );
    return inserted[0];
  }
}

type WalletBalanceRow = {
  id: string;
  user_id: string;
  currency: string;
  balance: string;
};
