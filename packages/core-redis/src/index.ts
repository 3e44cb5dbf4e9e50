import { Global, Logger, Module } from "@nestjs/common";
import { ConfigModule, ConfigService } from "@nestjs/config";
import { Redis } from "ioredis";
import { randomUUID } from "crypto";

export interface IKeyValueStore {
  get<T>(key: string): Promise<T | null>;
  set<T>(key: string, value: T, ttlSeconds?: number): Promise<void>;
  incr(key: string, ttlSeconds?: number): Promise<number>;
  del(key: string): Promise<void>;
}

/** Runs `fn` while holding `key`; a held key is rejected, not waited on. */
export interface ILockManager {
  withLock<T>(key: string, ttlMs: number, fn: () => Promise<T>): Promise<T>;
}

export const REDIS_CLIENT = Symbol("REDIS_CLIENT");
export const KEY_VALUE_STORE = Symbol("KEY_VALUE_STORE");
export const LOCK_MANAGER = Symbol("LOCK_MANAGER");

const BIGINT_FLAG = "__pw_bigint__";

/** JSON with bigints tagged, so amounts survive a round trip through Redis. */
export function serializeForRedis(value: unknown): string {
  const replacer = (input: unknown): unknown => {
    if (typeof input === "bigint") {
      return { [BIGINT_FLAG]: input.toString() };
    }
    if (Array.isArray(input)) {
      return input.map((item) => replacer(item));
    }
    if (input && typeof input === "object") {
      return Object.fromEntries(Object.entries(input).map(([key, val]) => [key, replacer(val)]));
    }
    return input;
  };

  return JSON.stringify(replacer(value));
}

export function deserializeFromRedis<T>(payload: string | null): T | null {
  if (!payload) return null;
  const reviver = (input: unknown): unknown => {
    if (Array.isArray(input)) {
      return input.map((item) => reviver(item));
    }
    if (input && typeof input === "object") {
      const entries = Object.entries(input);
      if (entries.length === 1 && entries[0][0] === BIGINT_FLAG) {
        const raw: unknown = entries[0][1];
        if (typeof raw === "string" && /^-?\d+$/.test(raw)) {
          return BigInt(raw);
        }
      }
      return Object.fromEntries(entries.map(([key, val]) => [key, reviver(val)]));
    }
    return input;
  };

  return reviver(JSON.parse(payload)) as T;
}

export class RedisKeyValueStore implements IKeyValueStore {
  constructor(private readonly redis: Redis) {}

  async get<T>(key: string): Promise<T | null> {
    const result = await this.redis.get(key);
    return deserializeFromRedis<T>(result);
  }

  async set<T>(key: string, value: T, ttlSeconds?: number): Promise<void> {
    const payload = serializeForRedis(value);
    if (ttlSeconds) {
      await this.redis.set(key, payload, "EX", ttlSeconds);
    } else {
      await this.redis.set(key, payload);
    }
  }

  async incr(key: string, ttlSeconds?: number): Promise<number> {
    const value = await this.redis.incr(key);
    if (ttlSeconds) {
      await this.redis.expire(key, ttlSeconds);
    }
    return value;
  }

  async del(key: string): Promise<void> {
    await this.redis.del(key);
  }
}

export class LockUnavailableError extends Error {
  constructor(public readonly key: string) {
    super(`Failed to acquire lock for ${key}`);
    this.name = "LockUnavailableError";
  }
}

export class RedisLockManager implements ILockManager {
  constructor(private readonly redis: Redis) {}

  async withLock<T>(key: string, ttlMs: number, fn: () => Promise<T>): Promise<T> {
    const token = randomUUID();
    const acquired = await this.redis.set(key, token, "PX", ttlMs, "NX");
    if (!acquired) {
      throw new LockUnavailableError(key);
    }

    try {
      return await fn();
    } finally {
      const script = `if redis.call("get", KEYS[1]) == ARGV[1] then return redis.call("del", KEYS[1]) else return 0 end`;
      await this.redis.eval(script, 1, key, token);
    }
  }
}

export interface RedisModuleOptions {
  url?: string;
  keyPrefix?: string;
}

export const redisModuleOptionsToken = Symbol("REDIS_MODULE_OPTIONS");

@Global()
@Module({
  imports: [ConfigModule.forRoot({ isGlobal: true })],
  providers: [
    {
      provide: REDIS_CLIENT,
      inject: [ConfigService, redisModuleOptionsToken],
      useFactory: (config: ConfigService, options?: RedisModuleOptions) => {
        const url = options?.url ?? config.get<string>("REDIS_URL") ?? "redis://localhost:6379";
        const client = new Redis(url, {
          keyPrefix: options?.keyPrefix ?? config.get<string>("REDIS_KEY_PREFIX") ?? "pw:",
        });
        const logger = new Logger("RedisModule");
        client.on("error", (err) => {
          logger.error("Redis connection error", err);
        });
        return client;
      },
    },
    {
      provide: KEY_VALUE_STORE,
      inject: [REDIS_CLIENT],
      useFactory: (redis: Redis) => new RedisKeyValueStore(redis),
    },
    {
      provide: LOCK_MANAGER,
      inject: [REDIS_CLIENT],
      useFactory: (redis: Redis) => new RedisLockManager(redis),
    },
  ],
  exports: [REDIS_CLIENT, KEY_VALUE_STORE, LOCK_MANAGER],
})
export class RedisModule {
  static forRoot(options?: RedisModuleOptions) {
    return {
      module: RedisModule,
      providers: [
        {
          provide: redisModuleOptionsToken,
          useValue: options ?? {},
        },
      ],
      exports: [redisModuleOptionsToken],
    };
  }
}
