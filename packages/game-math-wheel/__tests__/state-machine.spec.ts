import { beforeEach, describe, expect, it } from "vitest";
import { WheelError, WheelErrorCode } from "@prize-wheel/core-errors";
import type { WheelState } from "@prize-wheel/core-types";
import { FixedClock, ScriptedOracle } from "@prize-wheel/test-utils";
import type { CreateWheelInput } from "../src";
import {
  WheelStateMachine,
  describeWheel,
  findInvariantViolations,
  isPrizeClaimed,
  phaseOf,
} from "../src";

const ORG = "organizer";
const DAY_MS = 86_400_000;

function rejection(fn: () => unknown): WheelError {
  try {
    fn();
  } catch (err) {
    if (err instanceof WheelError) return err;
    throw err;
  }
  throw new Error("expected the operation to be rejected");
}

describe("WheelStateMachine", () => {
  let engine: WheelStateMachine;
  let clock: FixedClock;

  beforeEach(() => {
    engine = new WheelStateMachine();
    clock = new FixedClock(1_000);
  });

  function create(overrides: Partial<CreateWheelInput> = {}): WheelState {
    return engine.create(
      {
        id: "wheel-1",
        currency: "USD",
        organizer: ORG,
        entries: ["A", "B", "C"],
        prizeAmounts: [1000n, 500n, 200n],
        delayMs: 0,
        claimWindowMs: 0,
        ...overrides,
      },
      clock,
    ).state;
  }

  function fund(state: WheelState, amount: bigint): WheelState {
    return engine.donate(state, ORG, amount).state;
  }

  describe("creation", () => {
    it("starts unfunded with the default claim window", () => {
      const outcome = engine.create(
        {
          id: "wheel-1",
          currency: "USD",
          organizer: ORG,
          entries: ["A", "B", "C"],
          prizeAmounts: [1000n, 500n, 200n],
          delayMs: 0,
          claimWindowMs: 0,
        },
        clock,
      );

      expect(outcome.state.pool).toBe(0n);
      expect(outcome.state.remainingEntries).toHaveLength(3);
      expect(outcome.state.isCancelled).toBe(false);
      expect(outcome.state.claimWindowMs).toBe(DAY_MS);
      expect(outcome.state.createdAt).toBe(1_000);
      expect(phaseOf(outcome.state)).toBe("CREATED");
      expect(outcome.events).toEqual([{ type: "WHEEL_CREATED", wheelId: "wheel-1", organizer: ORG }]);
      expect(outcome.payout).toBeNull();
    });

    it("rejects a blank organizer and bad durations", () => {
      expect(rejection(() => create({ organizer: " " })).reason).toBe("INVALID_IDENTITY");
      expect(rejection(() => create({ delayMs: -5 })).reason).toBe("INVALID_DURATION");
    });

    it("rejects fewer distinct entries than prizes", () => {
      const err = rejection(() => create({ entries: ["A", "A", "B"] }));
      expect(err.code).toBe(WheelErrorCode.VALIDATION);
      expect(err.reason).toBe("NOT_ENOUGH_UNIQUE_ENTRIES");
    });
  });

  describe("draws", () => {
    it("draws and auto-assigns the last prize when one identifier is left", () => {
      const state = fund(create({ entries: ["A", "A", "B", "B"], prizeAmounts: [1000n, 500n] }), 1500n);
      const oracle = new ScriptedOracle([0]);

      const outcome = engine.drawAndAutoAssign(state, ORG, oracle, clock);

      expect(oracle.calls).toEqual([4]);
      expect(outcome.state.spunCount).toBe(2);
      expect(outcome.state.remainingEntries).toEqual([]);
      expect(outcome.result).toEqual([
        { winner: "A", prizeIndex: 0, spinTime: 1_000, autoAssigned: false },
        { winner: "B", prizeIndex: 1, spinTime: 1_000, autoAssigned: true },
      ]);
      expect(new Set(outcome.state.winners.map((winner) => winner.address)).size).toBe(2);
      expect(outcome.events).toEqual([
        { type: "WHEEL_DRAWN", wheelId: "wheel-1", winner: "A", prizeIndex: 0 },
        { type: "WHEEL_DRAWN", wheelId: "wheel-1", winner: "B", prizeIndex: 1 },
      ]);
      expect(phaseOf(outcome.state)).toBe("EXHAUSTED");
    });

    it("does not auto-assign while several identifiers remain", () => {
      const state = fund(create({ prizeAmounts: [100n, 100n] }), 200n);
      const outcome = engine.drawAndAutoAssign(state, ORG, new ScriptedOracle([0]), clock);
      expect(outcome.result).toHaveLength(1);
      expect(outcome.state.remainingEntries).toEqual(["B", "C"]);
    });

    it("removes every copy of the winner in the default draw", () => {
      const state = fund(create({ entries: ["A", "A", "B", "C"], prizeAmounts: [100n, 100n] }), 200n);
      const outcome = engine.draw(state, ORG, new ScriptedOracle([0]), clock);
      expect(outcome.result.winner).toBe("A");
      expect(outcome.state.remainingEntries).toEqual(["B", "C"]);
    });

    it("removes only the drawn slot in the ordered draw", () => {
      const state = fund(create({ entries: ["A", "A", "B", "C"], prizeAmounts: [100n, 100n] }), 200n);
      const outcome = engine.drawWithOrder(state, ORG, [0, 1, 2, 3], new ScriptedOracle([1]), clock);
      expect(outcome.result.winner).toBe("A");
      expect(outcome.state.remainingEntries).toEqual(["A", "B", "C"]);
    });

    it("auto-assigns in the ordered mode as well", () => {
      const state = fund(create({ entries: ["A", "B", "B"], prizeAmounts: [100n, 100n] }), 200n);
      const outcome = engine.drawWithOrderAndAutoAssign(state, ORG, [0, 1, 2], new ScriptedOracle([0]), clock);
      expect(outcome.result.map((draw) => [draw.winner, draw.autoAssigned])).toEqual([
        ["A", false],
        ["B", true],
      ]);
      expect(outcome.state.remainingEntries).toEqual([]);
    });

    it("refuses to draw before the pool covers the prizes", () => {
      const state = fund(create(), 1699n);
      const err = rejection(() => engine.draw(state, ORG, new ScriptedOracle([0]), clock));
      expect(err.code).toBe(WheelErrorCode.FUNDS);
      expect(err.details).toEqual({ required: "1700", pool: "1699", shortfall: "1" });
    });

    it("needs the full prize total again once an early claim drained the pool", () => {
      let state = fund(create({ prizeAmounts: [1000n, 500n] }), 1500n);
      state = engine.draw(state, ORG, new ScriptedOracle([0]), clock).state;
      state = engine.claim(state, "A", clock).state;
      expect(state.pool).toBe(500n);

      const err = rejection(() => engine.draw(state, ORG, new ScriptedOracle([1]), clock));
      expect(err.code).toBe(WheelErrorCode.FUNDS);
      expect(err.details).toEqual({ required: "1500", pool: "500", shortfall: "1000" });

      state = fund(state, 1000n);
      const second = engine.draw(state, ORG, new ScriptedOracle([1]), clock);
      expect(second.result).toMatchObject({ winner: "C", prizeIndex: 1 });
    });

    it("reads the oracle for a pool holding one identifier several times", () => {
      let state = fund(create({ entries: ["A", "A", "B"], prizeAmounts: [100n, 100n] }), 200n);
      state = engine.drawWithOrder(state, ORG, [2, 0, 1], new ScriptedOracle([0]), clock).state;
      expect(state.remainingEntries).toEqual(["A", "A"]);

      const oracle = new ScriptedOracle([1]);
      const outcome = engine.draw(state, ORG, oracle, clock);
      expect(oracle.calls).toEqual([2]);
      expect(outcome.result).toMatchObject({ winner: "A", prizeIndex: 1, autoAssigned: false });
      expect(outcome.state.remainingEntries).toEqual([]);
    });

    it("rejects draws once every prize is drawn", () => {
      let state = fund(create({ prizeAmounts: [100n] }), 100n);
      state = engine.draw(state, ORG, new ScriptedOracle([2]), clock).state;
      const err = rejection(() => engine.draw(state, ORG, new ScriptedOracle([0]), clock));
      expect(err.code).toBe(WheelErrorCode.STATE);
      expect(err.reason).toBe("WHEEL_EXHAUSTED");
    });

    it("only lets the organizer draw", () => {
      const state = fund(create(), 1700n);
      const err = rejection(() => engine.draw(state, "A", new ScriptedOracle([0]), clock));
      expect(err.code).toBe(WheelErrorCode.AUTHORIZATION);
      expect(err.reason).toBe("NOT_ORGANIZER");
    });

    it("never touches the state it was handed", () => {
      const state = fund(create(), 1700n);
      const before = structuredClone(state);

      engine.draw(state, ORG, new ScriptedOracle([1]), clock);
      expect(() => engine.drawWithOrder(state, ORG, [0, 1], new ScriptedOracle([0]), clock)).toThrow(WheelError);

      expect(state).toEqual(before);
    });
  });

  describe("auto-assign", () => {
    it("hands the last prize to the only identifier left", () => {
      let state = fund(create({ entries: ["A", "B", "B"], prizeAmounts: [100n, 100n] }), 200n);
      state = engine.draw(state, ORG, new ScriptedOracle([0]), clock).state;

      clock.advance(50);
      const outcome = engine.autoAssignLast(state, ORG, clock);
      expect(outcome.result).toEqual({ winner: "B", prizeIndex: 1, spinTime: 1_050, autoAssigned: true });
      expect(outcome.state.spinTimes).toEqual([1_000, 1_050]);
    });

    it("is unavailable with more than one draw or identifier left", () => {
      const fresh = fund(create({ prizeAmounts: [100n, 100n] }), 200n);
      expect(rejection(() => engine.autoAssignLast(fresh, ORG, clock)).details).toEqual({ remainingDraws: 2 });

      const afterOne = engine.draw(fresh, ORG, new ScriptedOracle([0]), clock).state;
      expect(rejection(() => engine.autoAssignLast(afterOne, ORG, clock)).details).toEqual({ distinct: 2 });
    });
  });

  describe("claims", () => {
    it("opens the claim only after the delay", () => {
      let state = fund(
        create({ entries: ["A", "B"], prizeAmounts: [1000n], delayMs: 1000, claimWindowMs: DAY_MS }),
        1000n,
      );
      clock.set(DAY_MS);
      state = engine.draw(state, ORG, new ScriptedOracle([0]), clock).state;
      expect(state.spinTimes).toEqual([DAY_MS]);

      clock.set(DAY_MS + 999);
      const early = rejection(() => engine.claim(state, "A", clock));
      expect(early.code).toBe(WheelErrorCode.TIMING);
      expect(early.reason).toBe("CLAIM_TOO_EARLY");
      expect(early.details).toEqual({ prizeIndex: 0, now: DAY_MS + 999, opensAt: DAY_MS + 1000, closesAt: 2 * DAY_MS + 1000 });

      clock.set(DAY_MS + 1000);
      const outcome = engine.claim(state, "A", clock);
      expect(outcome.result).toEqual({ prizeIndex: 0, amount: 1000n });
      expect(outcome.payout).toEqual({ to: "A", amount: 1000n });
      expect(outcome.state.pool).toBe(0n);
      expect(outcome.events).toEqual([{ type: "PRIZE_CLAIMED", wheelId: "wheel-1", winner: "A", amount: 1000n }]);
      expect(isPrizeClaimed(outcome.state, 0)).toBe(true);
    });

    it("closes the claim at the end of the window", () => {
      let state = fund(create({ prizeAmounts: [1000n] }), 1000n);
      state = engine.draw(state, ORG, new ScriptedOracle([0]), clock).state;

      clock.set(1_000 + DAY_MS);
      expect(rejection(() => engine.claim(state, "A", clock)).reason).toBe("CLAIM_WINDOW_PASSED");
    });

    it("rejects callers without a prize and repeated claims", () => {
      let state = fund(create({ prizeAmounts: [1000n] }), 1000n);
      state = engine.draw(state, ORG, new ScriptedOracle([0]), clock).state;

      const stranger = rejection(() => engine.claim(state, "B", clock));
      expect(stranger.code).toBe(WheelErrorCode.AUTHORIZATION);
      expect(stranger.reason).toBe("NOT_WINNER");

      state = engine.claim(state, "A", clock).state;
      const again = rejection(() => engine.claim(state, "A", clock));
      expect(again.code).toBe(WheelErrorCode.NOT_FOUND);
      expect(again.reason).toBe("NO_UNCLAIMED_PRIZE");
    });

    it("pays a repeat winner one prize per call", () => {
      let state = fund(create({ entries: ["A", "A", "B"], prizeAmounts: [300n, 200n] }), 500n);
      state = engine.drawWithOrder(state, ORG, [0, 1, 2], new ScriptedOracle([0]), clock).state;
      state = engine.drawWithOrder(state, ORG, [0, 1], new ScriptedOracle([0]), clock).state;
      expect(state.winners.map((winner) => winner.address)).toEqual(["A", "A"]);

      const first = engine.claim(state, "A", clock);
      expect(first.result).toEqual({ prizeIndex: 0, amount: 300n });
      const second = engine.claim(first.state, "A", clock);
      expect(second.result).toEqual({ prizeIndex: 1, amount: 200n });
      expect(second.state.pool).toBe(0n);
    });
  });

  describe("reclaim", () => {
    it("returns the unclaimed remainder once every window has closed", () => {
      let state = fund(create({ prizeAmounts: [1000n, 500n] }), 2000n);
      state = engine.draw(state, ORG, new ScriptedOracle([0]), clock).state;
      state = engine.draw(state, ORG, new ScriptedOracle([1]), clock).state;
      state = engine.claim(state, "A", clock).state;

      clock.set(1_000 + DAY_MS - 1);
      const early = rejection(() => engine.reclaim(state, ORG, clock));
      expect(early.reason).toBe("RECLAIM_TOO_EARLY");
      expect(early.details).toEqual({ now: 1_000 + DAY_MS - 1, opensAt: 1_000 + DAY_MS });

      clock.set(1_000 + DAY_MS);
      const outcome = engine.reclaim(state, ORG, clock);
      expect(outcome.result).toBe(1000n);
      expect(outcome.payout).toEqual({ to: ORG, amount: 1000n });
      expect(outcome.events).toEqual([{ type: "POOL_RECLAIMED", wheelId: "wheel-1", amount: 1000n }]);

      // donated 2000 = claimed 1000 + reclaimed 1000
      expect(outcome.state.pool).toBe(0n);
      expect(rejection(() => engine.reclaim(outcome.state, ORG, clock)).reason).toBe("NOTHING_TO_RECLAIM");
      expect(rejection(() => engine.claim(outcome.state, "C", clock)).reason).toBe("CLAIM_WINDOW_PASSED");
    });

    it("requires every prize to be drawn", () => {
      const state = fund(create(), 1700n);
      const err = rejection(() => engine.reclaim(state, ORG, clock));
      expect(err.code).toBe(WheelErrorCode.STATE);
      expect(err.reason).toBe("WHEEL_NOT_EXHAUSTED");
    });
  });

  describe("configuration", () => {
    it("rolls back a prize update the pool cannot cover", () => {
      const state = fund(create({ prizeAmounts: [1000n, 500n] }), 1500n);

      const err = rejection(() => engine.updatePrizes(state, ORG, [1000n, 500n, 200n]));
      expect(err.code).toBe(WheelErrorCode.FUNDS);
      expect(state.prizeAmounts).toEqual([1000n, 500n]);
      expect(state.pool).toBe(1500n);
    });

    it("applies updates before the first draw only", () => {
      let state = fund(create({ prizeAmounts: [100n] }), 100n);
      state = engine.updateEntries(state, ORG, ["A", "B", "C", "D"]).state;
      state = engine.updateDelay(state, ORG, 250).state;
      const window = engine.updateClaimWindow(state, ORG, 1);
      expect(window.result).toBe(3_600_000);
      state = window.state;
      expect(state.remainingEntries).toEqual(["A", "B", "C", "D"]);
      expect(state.delayMs).toBe(250);

      state = engine.draw(state, ORG, new ScriptedOracle([3]), clock).state;
      expect(rejection(() => engine.updateEntries(state, ORG, ["X", "Y"])).reason).toBe("ALREADY_DRAWN");
      expect(rejection(() => engine.updateDelay(state, ORG, 0)).reason).toBe("ALREADY_DRAWN");
      expect(rejection(() => engine.cancelAndReclaim(state, ORG)).reason).toBe("ALREADY_DRAWN");
    });

    it("checks new prizes against the current entries", () => {
      const state = create({ entries: ["A", "A", "B"], prizeAmounts: [100n] });
      expect(rejection(() => engine.updatePrizes(state, ORG, [50n, 50n, 50n])).reason).toBe("NOT_ENOUGH_UNIQUE_ENTRIES");
    });
  });

  describe("cancellation", () => {
    it("returns the whole pool and freezes the wheel", () => {
      const state = fund(create(), 1700n);
      const outcome = engine.cancelAndReclaim(state, ORG);

      expect(outcome.result).toBe(1700n);
      expect(outcome.payout).toEqual({ to: ORG, amount: 1700n });
      expect(outcome.state.isCancelled).toBe(true);
      expect(outcome.state.pool).toBe(0n);
      expect(outcome.events).toEqual([
        { type: "WHEEL_CANCELLED", wheelId: "wheel-1" },
        { type: "POOL_RECLAIMED", wheelId: "wheel-1", amount: 1700n },
      ]);

      const cancelled = outcome.state;
      const attempts: Array<() => unknown> = [
        () => engine.donate(cancelled, ORG, 10n),
        () => engine.updateEntries(cancelled, ORG, ["A", "B", "C"]),
        () => engine.updatePrizes(cancelled, ORG, [1n]),
        () => engine.updateDelay(cancelled, ORG, 0),
        () => engine.updateClaimWindow(cancelled, ORG, 0),
        () => engine.draw(cancelled, ORG, new ScriptedOracle([0]), clock),
        () => engine.autoAssignLast(cancelled, ORG, clock),
        () => engine.cancelAndReclaim(cancelled, ORG),
      ];
      for (const attempt of attempts) {
        const err = rejection(attempt);
        expect(err.code).toBe(WheelErrorCode.STATE);
        expect(err.reason).toBe("WHEEL_CANCELLED");
      }
    });

    it("reports no reclaim for an unfunded wheel", () => {
      const outcome = engine.cancelAndReclaim(create(), ORG);
      expect(outcome.result).toBeNull();
      expect(outcome.payout).toBeNull();
      expect(outcome.events).toEqual([{ type: "WHEEL_CANCELLED", wheelId: "wheel-1" }]);
    });
  });

  describe("version gate", () => {
    it("aborts every operation when the gate is closed", () => {
      const state = create();
      const gated = new WheelStateMachine({ versionGate: { isCurrent: () => false } });

      const err = rejection(() => gated.donate(state, ORG, 10n));
      expect(err.code).toBe(WheelErrorCode.STATE);
      expect(err.reason).toBe("VERSION_MISMATCH");
      expect(rejection(() => gated.claim(state, "A", clock)).reason).toBe("VERSION_MISMATCH");
    });

    it("refuses records written by another engine version", () => {
      const upgraded = new WheelStateMachine({ engineVersion: 2 });
      expect(rejection(() => upgraded.updateDelay(create(), ORG, 10)).details).toEqual({ version: 1, engineVersion: 2 });
    });
  });

  describe("reader", () => {
    it("describes an exhausted wheel with its reclaim time", () => {
      let state = fund(create({ prizeAmounts: [1000n], delayMs: 10 }), 1500n);
      state = engine.draw(state, ORG, new ScriptedOracle([1]), clock).state;

      const snapshot = describeWheel(state);
      expect(snapshot.phase).toBe("EXHAUSTED");
      expect(snapshot.remainingDraws).toBe(0);
      expect(snapshot.totalPrizes).toBe(1000n);
      expect(snapshot.outstanding).toBe(1000n);
      expect(snapshot.reclaimOpensAt).toBe(1_000 + 10 + DAY_MS);
      expect(findInvariantViolations(state)).toEqual([]);
    });

    it("flags a corrupted record", () => {
      const state = create();
      const corrupted: WheelState = { ...state, spunCount: 1 };
      expect(findInvariantViolations(corrupted)).toEqual(["winners, spinTimes and spunCount disagree"]);
      expect(rejection(() => isPrizeClaimed(state, 0)).reason).toBe("INVALID_PRIZE_INDEX");
    });
  });
});
