import { describe, expect, it } from "vitest";
import { ProvablyFairService, RedisProvablyFairStateStore } from "@prize-wheel/core-provably-fair";
import { InMemoryStore } from "@prize-wheel/test-utils";

function createStore() {
  const kv = new InMemoryStore();
  return { kv, store: new RedisProvablyFairStateStore(kv, new ProvablyFairService()) };
}

describe("RedisProvablyFairStateStore", () => {
  it("keeps one seed pair per wheel", async () => {
    const { kv, store } = createStore();

    const first = await store.getOrInitContext({ wheelId: "wheel-a", clientSeed: "seed-a" });
    const again = await store.getOrInitContext({ wheelId: "wheel-a", clientSeed: "ignored" });
    const other = await store.getOrInitContext({ wheelId: "wheel-b" });

    expect(again).toEqual(first);
    expect(again.clientSeed).toBe("seed-a");
    expect(other.serverSeedHash).not.toEqual(first.serverSeedHash);
    expect(kv.has("pf:ctx:wheel-a")).toBe(true);
  });

  it("advances the nonce once per draw", async () => {
    const { store } = createStore();
    await store.getOrInitContext({ wheelId: "wheel-a" });

    expect(await store.currentNonce({ wheelId: "wheel-a" })).toBe(0);
    const [first, second] = await Promise.all([
      store.nextNonce({ wheelId: "wheel-a" }),
      store.nextNonce({ wheelId: "wheel-a" }),
    ]);

    expect(new Set([first, second])).toEqual(new Set([1, 2]));
    expect(await store.currentNonce({ wheelId: "wheel-a" })).toBe(2);
    expect(await store.currentNonce({ wheelId: "wheel-b" })).toBe(0);
  });

  it("reveals the server seed behind the published hash", async () => {
    const { store } = createStore();
    const service = new ProvablyFairService();
    const ctx = await store.getOrInitContext({ wheelId: "wheel-a" });

    const revealed = await store.revealServerSeed({ wheelId: "wheel-a" });

    expect(revealed).toBe(ctx.serverSeed);
    expect(service.hashServerSeed(revealed ?? "")).toBe(ctx.serverSeedHash);
    expect(await store.revealServerSeed({ wheelId: "missing" })).toBeNull();
  });
});
