import { describeWheel } from "@prize-wheel/game-math-wheel";
import type { DrawResult } from "@prize-wheel/game-math-wheel";
import type { RecordedWheelEvent, WheelState } from "@prize-wheel/core-types";
import { DrawView, WheelEventView, WheelView } from "./dto/wheel-response.dto";

export function toWheelView(state: WheelState): WheelView {
  const snapshot = describeWheel(state);
  return {
    id: snapshot.id,
    currency: snapshot.currency,
    organizer: snapshot.organizer,
    phase: snapshot.phase,
    remainingEntries: snapshot.remainingEntries,
    prizeAmounts: snapshot.prizeAmounts.map((amount) => amount.toString()),
    winners: snapshot.winners.map((winner) => ({
      address: winner.address,
      prizeIndex: winner.prizeIndex,
      amount: snapshot.prizeAmounts[winner.prizeIndex].toString(),
      claimed: winner.claimed,
      spinTime: snapshot.spinTimes[winner.prizeIndex],
    })),
    spunCount: snapshot.spunCount,
    remainingDraws: snapshot.remainingDraws,
    delayMs: snapshot.delayMs,
    claimWindowMs: snapshot.claimWindowMs,
    pool: snapshot.pool.toString(),
    totalPrizes: snapshot.totalPrizes.toString(),
    outstanding: snapshot.outstanding.toString(),
    isCancelled: snapshot.isCancelled,
    reclaimOpensAt: snapshot.reclaimOpensAt,
    createdAt: state.createdAt,
  };
}

export function toDrawView(result: DrawResult): DrawView {
  return {
    winner: result.winner,
    prizeIndex: result.prizeIndex,
    spinTime: result.spinTime,
    autoAssigned: result.autoAssigned,
  };
}

export function toEventView(event: RecordedWheelEvent): WheelEventView {
  return {
    id: event.id,
    type: event.type,
    payload: event.payload,
    createdAt: event.createdAt.toISOString(),
  };
}
