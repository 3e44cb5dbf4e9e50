import { describe, expect, it } from "vitest";
import { WheelError } from "@prize-wheel/core-errors";
import { InMemoryStore, NoopLockManager } from "@prize-wheel/test-utils";
import { DemoWalletService, parseWalletImpl } from "../src";

describe("DemoWalletService", () => {
  it("tracks balances for credit/debit", async () => {
    const store = new InMemoryStore();
    const wallet = new DemoWalletService(store, new NoopLockManager());

    await wallet.credit("user-1", 500n, "USD");
    expect(await wallet.getBalance("user-1", "USD")).toBe(500n);

    await wallet.debitIfSufficient("user-1", 200n, "USD");
    expect(await wallet.getBalance("user-1", "USD")).toBe(300n);
    expect(store.has("wallet:USD:user-1")).toBe(true);
  });

  it("isolates balances per currency", async () => {
    const wallet = new DemoWalletService(new InMemoryStore(), new NoopLockManager());

    await wallet.credit("user-1", 100n, "USD");
    await wallet.credit("user-1", 200n, "EUR");

    expect(await wallet.getBalance("user-1", "USD")).toBe(100n);
    expect(await wallet.getBalance("user-1", "EUR")).toBe(200n);
    expect(await wallet.getBalance("user-2", "USD")).toBe(0n);
  });

  it("rejects overdrafts and non-positive movements", async () => {
    const wallet = new DemoWalletService(new InMemoryStore(), new NoopLockManager());
    await wallet.credit("user-1", 50n, "USD");

    const overdraft = await wallet.debitIfSufficient("user-1", 51n, "USD").catch((err: unknown) => err);
    expect(overdraft).toBeInstanceOf(WheelError);
    expect(overdraft).toMatchObject({
      reason: "INSUFFICIENT_WALLET_BALANCE",
      details: { userId: "user-1", currency: "USD", balance: "50", amount: "51" },
    });
    await expect(wallet.credit("user-1", 0n, "USD")).rejects.toMatchObject({ reason: "INVALID_AMOUNT" });
    expect(await wallet.getBalance("user-1", "USD")).toBe(50n);
  });
});

describe("parseWalletImpl", () => {
  it("defaults to the demo wallet", () => {
    expect(parseWalletImpl(undefined)).toBe("demo");
    expect(parseWalletImpl(" DB ")).toBe("db");
    expect(() => parseWalletImpl("ledger")).toThrow("Unsupported WALLET_IMPL: ledger. Supported: demo, db");
  });
});
