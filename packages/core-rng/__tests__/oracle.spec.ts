import { describe, expect, it } from "vitest";
import { ProvablyFairService, RedisProvablyFairStateStore } from "@prize-wheel/core-provably-fair";
import { ProvablyFairOracleFactory, ProvablyFairRandomOracle } from "@prize-wheel/core-rng";
import { InMemoryStore } from "@prize-wheel/test-utils";

const service = new ProvablyFairService();

describe("ProvablyFairRandomOracle", () => {
  it("answers once and then refuses", () => {
    const ctx = service.initContext({ wheelId: "wheel-1", clientSeed: "client" });
    const oracle = new ProvablyFairRandomOracle(service, ctx, 4);

    expect(oracle.consumed).toBe(false);
    const value = oracle.randomBelow(5);
    expect(value).toBe(service.rollIntBelow(ctx, 4, 5));
    expect(oracle.consumed).toBe(true);
    expect(() => oracle.randomBelow(5)).toThrow("Random oracle already consumed for this operation");
  });
});

describe("ProvablyFairOracleFactory", () => {
  it("binds each prepared oracle to the next nonce of the wheel", async () => {
    const store = new RedisProvablyFairStateStore(new InMemoryStore(), service);
    const factory = new ProvablyFairOracleFactory(service, store);
    const ctx = await store.getOrInitContext({ wheelId: "wheel-1", clientSeed: "client" });

    const first = await factory.prepare("wheel-1");
    const second = await factory.prepare("wheel-1");

    expect(first.proof).toEqual({ serverSeedHash: ctx.serverSeedHash, clientSeed: "client", nonce: 1 });
    expect(second.proof.nonce).toBe(2);
    expect(second.oracle.randomBelow(10)).toBe(service.rollIntBelow(ctx, 2, 10));
    expect(first.oracle.consumed).toBe(false);
  });
});
