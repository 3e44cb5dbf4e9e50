import { fundsError, notFoundError, stateError, validationError } from "@prize-wheel/core-errors";
import type { WheelState } from "@prize-wheel/core-types";

export function totalPrizes(prizeAmounts: readonly bigint[]): bigint {
  return prizeAmounts.reduce((sum, amount) => sum + amount, 0n);
}

/** Prize money the pool still owes: every prize that has not been paid out by a claim. */
export function outstandingLiability(state: Pick<WheelState, "prizeAmounts" | "winners">): bigint {
  const claimed = new Set(state.winners.filter((winner) => winner.claimed).map((winner) => winner.prizeIndex));
  return state.prizeAmounts.reduce((sum, amount, idx) => (claimed.has(idx) ? sum : sum + amount), 0n);
}

/** Every configured prize, claimed or not, must be covered by the current pool. */
export function assertSufficient(state: Pick<WheelState, "prizeAmounts" | "pool">): void {
  const required = totalPrizes(state.prizeAmounts);
  if (required > state.pool) {
    throw fundsError("INSUFFICIENT_POOL", "pool does not cover the configured prizes", {
      required: required.toString(),
      pool: state.pool.toString(),
      shortfall: (required - state.pool).toString(),
    });
  }
}

export function validatePrizeAmounts(prizeAmounts: readonly bigint[]): bigint[] {
  if (!Array.isArray(prizeAmounts) || prizeAmounts.length === 0) {
    throw validationError("INVALID_PRIZE_COUNT", "at least one prize amount is required", {
      count: Array.isArray(prizeAmounts) ? prizeAmounts.length : null,
    });
  }
  prizeAmounts.forEach((amount, idx) => {
    if (typeof amount !== "bigint" || amount <= 0n) {
      throw validationError("INVALID_PRIZE_AMOUNT", `prizeAmounts[${idx}] must be a positive integer`, {
        index: idx,
        amount: String(amount),
      });
    }
  });
  return [...prizeAmounts];
}

// The functions below mutate a draft copy owned by the state machine.

export function donate(draft: WheelState, amount: bigint): void {
  if (amount <= 0n) {
    throw validationError("INVALID_AMOUNT", "donation must be a positive amount", { amount: amount.toString() });
  }
  draft.pool += amount;
}

export function settleClaim(draft: WheelState, prizeIndex: number): bigint {
  const winner = draft.winners[prizeIndex];
  if (!winner) {
    throw notFoundError("NO_UNCLAIMED_PRIZE", "no winner recorded for prize", { prizeIndex });
  }
  if (winner.claimed) {
    throw notFoundError("NO_UNCLAIMED_PRIZE", "prize already claimed", { prizeIndex });
  }
  const amount = draft.prizeAmounts[prizeIndex];
  if (amount > draft.pool) {
    throw fundsError("INSUFFICIENT_POOL", "pool cannot pay the prize", {
      prizeIndex,
      amount: amount.toString(),
      pool: draft.pool.toString(),
    });
  }
  draft.pool -= amount;
  winner.claimed = true;
  return amount;
}

export function drainPool(draft: WheelState): bigint {
  const amount = draft.pool;
  draft.pool = 0n;
  return amount;
}

export function reclaimRemainder(draft: WheelState): bigint {
  if (draft.pool === 0n) {
    throw notFoundError("NOTHING_TO_RECLAIM", "pool is already empty");
  }
  return drainPool(draft);
}

/**
 * Swaps the prize list before the first draw. Winner bookkeeping is reset since
 * its indices refer to the old list, and the pool must already cover the new total.
 */
export function replacePrizes(draft: WheelState, prizeAmounts: readonly bigint[]): void {
  if (draft.spunCount !== 0) {
    throw stateError("ALREADY_DRAWN", "prizes can only change before the first draw", { spunCount: draft.spunCount });
  }
  draft.prizeAmounts = validatePrizeAmounts(prizeAmounts);
  draft.winners = [];
  draft.spinTimes = [];
  assertSufficient(draft);
}
