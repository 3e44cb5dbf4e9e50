import { randomBytes, createHmac, createHash } from "crypto";
import { IKeyValueStore } from "@prize-wheel/core-redis";

export interface ProvablyFairContext {
  wheelId: string;
  serverSeed: string;
  serverSeedHash: string;
  clientSeed: string;
}

export interface FairnessProof {
  serverSeedHash: string;
  clientSeed: string;
  nonce: number;
}

export interface IProvablyFairService {
  generateServerSeed(): string;
  hashServerSeed(serverSeed: string): string;
  initContext(params: { wheelId: string; clientSeed?: string }): ProvablyFairContext;
  rollIntBelow(ctx: ProvablyFairContext, nonce: number, bound: number): number;
  verifyRoll(params: { serverSeed: string; clientSeed: string; nonce: number; bound: number; expected: number }): boolean;
}

export interface IProvablyFairStateStore {
  getOrInitContext(params: { wheelId: string; clientSeed?: string }): Promise<ProvablyFairContext>;
  nextNonce(params: { wheelId: string }): Promise<number>;
  currentNonce(params: { wheelId: string }): Promise<number>;
  revealServerSeed(params: { wheelId: string }): Promise<string | null>;
}

export const PROVABLY_FAIR_SERVICE = Symbol("PROVABLY_FAIR_SERVICE");
export const PROVABLY_FAIR_STATE_STORE = Symbol("PROVABLY_FAIR_STATE_STORE");

const UINT32_RANGE = 0x1_0000_0000;
const MAX_SAMPLING_ROUNDS = 64;

export class ProvablyFairService implements IProvablyFairService {
  generateServerSeed(): string {
    return randomBytes(32).toString("hex");
  }

  hashServerSeed(serverSeed: string): string {
    return createHash("sha256").update(serverSeed).digest("hex");
  }

  initContext(params: { wheelId: string; clientSeed?: string }): ProvablyFairContext {
    const serverSeed = this.generateServerSeed();
    return {
      wheelId: params.wheelId,
      serverSeed,
      serverSeedHash: this.hashServerSeed(serverSeed),
      clientSeed: params.clientSeed ?? randomBytes(16).toString("hex"),
    };
  }

  /**
   * Uniform integer in [0, bound). Reads the HMAC digest as 32-bit words and
   * rejects words from the incomplete top bucket, so no index is favoured.
   */
  rollIntBelow(ctx: ProvablyFairContext, nonce: number, bound: number): number {
    if (!Number.isSafeInteger(bound) || bound <= 0 || bound > UINT32_RANGE) {
      throw new Error("Invalid rollIntBelow bound");
    }
    const limit = UINT32_RANGE - (UINT32_RANGE % bound);
    for (let round = 0; round < MAX_SAMPLING_ROUNDS; round++) {
      const digest = createHmac("sha256", ctx.serverSeed).update(`${ctx.clientSeed}:${nonce}:${round}`).digest();
      for (let offset = 0; offset + 4 <= digest.length; offset += 4) {
        const word = digest.readUInt32BE(offset);
        if (word < limit) {
          return word % bound;
        }
      }
    }
    throw new Error("rollIntBelow exhausted its sampling rounds");
  }

  verifyRoll(params: { serverSeed: string; clientSeed: string; nonce: number; bound: number; expected: number }): boolean {
    const ctx: ProvablyFairContext = {
      wheelId: "verify",
      serverSeed: params.serverSeed,
      serverSeedHash: this.hashServerSeed(params.serverSeed),
      clientSeed: params.clientSeed,
    };
    return this.rollIntBelow(ctx, params.nonce, params.bound) === params.expected;
  }
}

const CONTEXT_KEY = (wheelId: string) => `pf:ctx:${wheelId}`;
const NONCE_KEY = (wheelId: string) => `pf:nonce:${wheelId}`;

/**
 * One seed pair per wheel. The nonce advances once per draw so every draw of a
 * wheel can be replayed from the revealed server seed.
 */
export class RedisProvablyFairStateStore implements IProvablyFairStateStore {
  constructor(private readonly kv: IKeyValueStore, private readonly pfService: IProvablyFairService) {}

  async getOrInitContext(params: { wheelId: string; clientSeed?: string }): Promise<ProvablyFairContext> {
    const key = CONTEXT_KEY(params.wheelId);
    const existing = await this.kv.get<ProvablyFairContext>(key);
    if (existing) {
      return existing;
    }
    const created = this.pfService.initContext(params);
    await this.kv.set(key, created);
    return created;
  }

  async nextNonce(params: { wheelId: string }): Promise<number> {
    return this.kv.incr(NONCE_KEY(params.wheelId));
  }

  async currentNonce(params: { wheelId: string }): Promise<number> {
    const value = await this.kv.get<number | string>(NONCE_KEY(params.wheelId));
    return value == null ? 0 : Number(value);
  }

  async revealServerSeed(params: { wheelId: string }): Promise<string | null> {
    const ctx = await this.kv.get<ProvablyFairContext>(CONTEXT_KEY(params.wheelId));
    return ctx?.serverSeed ?? null;
  }
}
