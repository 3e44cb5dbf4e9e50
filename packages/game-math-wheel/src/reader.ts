import { validationError } from "@prize-wheel/core-errors";
import type { WheelPhase, WheelState, WinnerRecord } from "@prize-wheel/core-types";
import { reclaimOpensAt } from "./claim-window";
import { outstandingLiability, totalPrizes } from "./prize-ledger";

export interface WheelSnapshot {
  id: string;
  currency: string;
  organizer: string;
  phase: WheelPhase;
  remainingEntries: string[];
  prizeAmounts: bigint[];
  winners: WinnerRecord[];
  spinTimes: number[];
  spunCount: number;
  remainingDraws: number;
  delayMs: number;
  claimWindowMs: number;
  pool: bigint;
  totalPrizes: bigint;
  outstanding: bigint;
  isCancelled: boolean;
  reclaimOpensAt: number | null;
}

export function phaseOf(state: WheelState): WheelPhase {
  if (state.isCancelled) return "CANCELLED";
  if (state.spunCount === 0) return "CREATED";
  if (state.spunCount >= state.prizeAmounts.length) return "EXHAUSTED";
  return "ACTIVE";
}

export function isPrizeClaimed(state: WheelState, prizeIndex: number): boolean {
  const winner = state.winners[prizeIndex];
  if (!winner) {
    throw validationError("INVALID_PRIZE_INDEX", "no winner recorded at that prize index", {
      prizeIndex,
      spunCount: state.spunCount,
    });
  }
  return winner.claimed;
}

export function describeWheel(state: WheelState): WheelSnapshot {
  const phase = phaseOf(state);
  return {
    id: state.id,
    currency: state.currency,
    organizer: state.organizer,
    phase,
    remainingEntries: [...state.remainingEntries],
    prizeAmounts: [...state.prizeAmounts],
    winners: state.winners.map((winner) => ({ ...winner })),
    spinTimes: [...state.spinTimes],
    spunCount: state.spunCount,
    remainingDraws: state.isCancelled ? 0 : state.prizeAmounts.length - state.spunCount,
    delayMs: state.delayMs,
    claimWindowMs: state.claimWindowMs,
    pool: state.pool,
    totalPrizes: totalPrizes(state.prizeAmounts),
    outstanding: outstandingLiability(state),
    isCancelled: state.isCancelled,
    reclaimOpensAt:
      phase === "EXHAUSTED" ? reclaimOpensAt(Math.max(...state.spinTimes), state.delayMs, state.claimWindowMs) : null,
  };
}

/**
 * Lists every structural invariant the record violates. Hosts run it on
 * records loaded from storage; an empty list means the record is consistent.
 */
export function findInvariantViolations(state: WheelState): string[] {
  const violations: string[] = [];
  if (state.winners.length !== state.spunCount || state.spinTimes.length !== state.spunCount) {
    violations.push("winners, spinTimes and spunCount disagree");
  }
  if (state.spunCount > state.prizeAmounts.length) {
    violations.push("spunCount exceeds prize count");
  }
  state.winners.forEach((winner, idx) => {
    if (winner.prizeIndex !== idx) {
      violations.push(`winners[${idx}] points at prize ${winner.prizeIndex}`);
    }
  });
  if (state.pool < 0n) {
    violations.push("pool is negative");
  }
  if (state.isCancelled && state.pool !== 0n) {
    violations.push("cancelled wheel still holds funds");
  }
  return violations;
}
