import { randomUUID } from "crypto";
import type { Pool } from "pg";
import { DataType, newDb } from "pg-mem";
import { IDbClient, PgDbClient, applySchema } from "@prize-wheel/core-db";
import { ILogger } from "@prize-wheel/core-logging";
import { IMetrics } from "@prize-wheel/core-metrics";
import { IKeyValueStore, ILockManager, LockUnavailableError, deserializeFromRedis, serializeForRedis } from "@prize-wheel/core-redis";
import { IClock } from "@prize-wheel/core-types";
import { IRandomOracleFactory, PreparedOracle, SingleUseOracle } from "@prize-wheel/core-rng";

// In-process stand-ins for Redis, Postgres, the clock and the random source.

export class InMemoryStore implements IKeyValueStore {
  private store = new Map<string, string>();

  async get<T>(key: string): Promise<T | null> {
    return deserializeFromRedis<T>(this.store.get(key) ?? null);
  }

  async set<T>(key: string, value: T, _ttlSeconds?: number): Promise<void> {
    this.store.set(key, serializeForRedis(value));
  }

  async incr(key: string, _ttlSeconds?: number): Promise<number> {
    const next = Number(this.store.get(key) ?? "0") + 1;
    this.store.set(key, next.toString());
    return next;
  }

  async del(key: string): Promise<void> {
    this.store.delete(key);
  }

  has(key: string): boolean {
    return this.store.has(key);
  }
}

export class NoopLockManager implements ILockManager {
  async withLock<T>(_key: string, _ttlMs: number, fn: () => Promise<T>): Promise<T> {
    return fn();
  }
}

/** Rejects a second holder the way the Redis lock does. */
export class InMemoryLockManager implements ILockManager {
  private readonly held = new Set<string>();

  async withLock<T>(key: string, _ttlMs: number, fn: () => Promise<T>): Promise<T> {
    if (this.held.has(key)) {
      throw new LockUnavailableError(key);
    }
    this.held.add(key);
    try {
      return await fn();
    } finally {
      this.held.delete(key);
    }
  }
}

export interface LogLine {
  level: "info" | "warn" | "error";
  msg: string;
  meta: Record<string, unknown>;
}

export class InMemoryLogger implements ILogger {
  readonly lines: LogLine[] = [];

  info(msg: string, meta: Record<string, unknown> = {}): void {
    this.lines.push({ level: "info", msg, meta });
  }

  warn(msg: string, meta: Record<string, unknown> = {}): void {
    this.lines.push({ level: "warn", msg, meta });
  }

  error(msg: string, meta: Record<string, unknown> = {}): void {
    this.lines.push({ level: "error", msg, meta });
  }

  messages(): string[] {
    return this.lines.map((line) => line.msg);
  }
}

export class NoopMetrics implements IMetrics {
  increment(): void {}
  observe(): void {}
}

export class RecordingMetrics implements IMetrics {
  readonly counters: Array<{ name: string; labels: Record<string, string> }> = [];

  increment(name: string, labels: Record<string, string> = {}): void {
    this.counters.push({ name, labels });
  }

  observe(): void {}
}

export class FixedClock implements IClock {
  constructor(private current: number) {}

  now(): number {
    return this.current;
  }

  set(value: number): void {
    this.current = value;
  }

  advance(ms: number): void {
    this.current += ms;
  }
}

/** Replays queued indices; every read is recorded with its bound. */
export class ScriptedOracle implements SingleUseOracle {
  readonly calls: number[] = [];

  constructor(private readonly values: number[] = []) {}

  randomBelow(bound: number): number {
    this.calls.push(bound);
    const next = this.values.shift();
    if (next === undefined) {
      throw new Error("ScriptedOracle ran out of values");
    }
    return next;
  }

  get consumed(): boolean {
    return this.calls.length > 0;
  }
}

export class ScriptedOracleFactory implements IRandomOracleFactory {
  private readonly queue: number[] = [];
  private nonce = 0;

  push(...values: number[]): void {
    this.queue.push(...values);
  }

  async prepare(_wheelId: string): Promise<PreparedOracle> {
    this.nonce += 1;
    const next = this.queue.shift();
    return {
      oracle: new ScriptedOracle(next === undefined ? [] : [next]),
      proof: { serverSeedHash: "test-hash", clientSeed: "test-client-seed", nonce: this.nonce },
    };
  }
}

/** pg-mem database with the project schema applied. */
export async function createDbClient(): Promise<IDbClient> {
  const db = newDb({ autoCreateForeignKeyIndices: true });
  db.public.registerFunction({
    name: "now",
    returns: DataType.timestamptz,
    implementation: () => new Date(),
  });
  db.public.registerFunction({
    name: "gen_random_uuid",
    returns: DataType.uuid,
    implementation: () => randomUUID(),
  });

  const pg = db.adapters.createPg();
  const pool: Pool = new pg.Pool();
  const client = new PgDbClient(pool);
  await applySchema(client);
  return client;
}
