import {
  authorizationError,
  notFoundError,
  stateError,
  timingError,
  validationError,
} from "@prize-wheel/core-errors";
import type { IRandomOracle } from "@prize-wheel/core-rng";
import { DEFAULT_WHEEL_LIMITS } from "@prize-wheel/core-types";
import type { IClock, WheelEvent, WheelLimits, WheelState, WinnerRecord } from "@prize-wheel/core-types";
import {
  assertCanClaim,
  assertDuration,
  canClaim,
  canReclaim,
  claimEligibility,
  normalizeClaimWindow,
  reclaimOpensAt,
} from "./claim-window";
import { autoPopIfSingleton, countDistinct, validateEntries } from "./entry-pool";
import { assertSufficient, donate as donateToPool, drainPool, reclaimRemainder, replacePrizes, settleClaim, validatePrizeAmounts } from "./prize-ledger";
import { selectRandom, selectWithOrder } from "./spin-engine";
import {
  ClaimResult,
  CreateWheelInput,
  DrawResult,
  FixedVersionGate,
  IVersionGate,
  OperationOutcome,
  SpinSelection,
  WheelEngineOptions,
} from "./types";

export const CURRENT_ENGINE_VERSION = 1;

/**
 * Draw/claim state machine for one wheel. Every operation validates against the
 * given state, applies its changes to a private copy and hands that copy back;
 * a thrown error therefore never leaves a half-applied wheel behind.
 *
 * The machine holds no locks. Hosts must serialize operations per wheel.
 */
export class WheelStateMachine {
  readonly limits: WheelLimits;
  readonly engineVersion: number;
  private readonly versionGate: IVersionGate;

  constructor(options: WheelEngineOptions = {}) {
    this.limits = options.limits ?? DEFAULT_WHEEL_LIMITS;
    this.engineVersion = options.engineVersion ?? CURRENT_ENGINE_VERSION;
    this.versionGate = options.versionGate ?? new FixedVersionGate(this.engineVersion);
  }

  create(input: CreateWheelInput, clock: IClock): OperationOutcome<WheelState> {
    this.assertVersion(this.engineVersion);
    assertIdentity(input.id, "id");
    assertIdentity(input.organizer, "organizer");
    assertIdentity(input.currency, "currency");

    const prizeAmounts = validatePrizeAmounts(input.prizeAmounts);
    const remainingEntries = validateEntries(input.entries, prizeAmounts.length, this.limits);
    assertDuration(input.delayMs, "delayMs");
    const claimWindowMs = normalizeClaimWindow(input.claimWindowMs, this.limits);

    const state: WheelState = {
      id: input.id,
      currency: input.currency,
      version: this.engineVersion,
      organizer: input.organizer,
      remainingEntries,
      winners: [],
      prizeAmounts,
      spunCount: 0,
      spinTimes: [],
      delayMs: input.delayMs,
      claimWindowMs,
      pool: 0n,
      isCancelled: false,
      createdAt: clock.now(),
    };

    return {
      state,
      events: [{ type: "WHEEL_CREATED", wheelId: state.id, organizer: state.organizer }],
      payout: null,
      result: state,
    };
  }

  donate(state: WheelState, caller: string, amount: bigint): OperationOutcome<bigint> {
    this.assertOrganizerCall(state, caller);
    assertNotCancelled(state);

    const draft = draftOf(state);
    donateToPool(draft, amount);
    return {
      state: draft,
      events: [{ type: "POOL_DONATED", wheelId: draft.id, amount }],
      payout: null,
      result: draft.pool,
    };
  }

  updateEntries(state: WheelState, caller: string, entries: string[]): OperationOutcome {
    this.assertConfigurable(state, caller);
    const draft = draftOf(state);
    draft.remainingEntries = validateEntries(entries, draft.prizeAmounts.length, this.limits);
    return quiet(draft);
  }

  updatePrizes(state: WheelState, caller: string, prizeAmounts: bigint[]): OperationOutcome {
    this.assertConfigurable(state, caller);
    const draft = draftOf(state);
    const distinct = countDistinct(draft.remainingEntries);
    const amounts = validatePrizeAmounts(prizeAmounts);
    if (distinct < amounts.length) {
      throw validationError("NOT_ENOUGH_UNIQUE_ENTRIES", "distinct entries must cover every prize", {
        distinct,
        prizeCount: amounts.length,
      });
    }
    replacePrizes(draft, amounts);
    return quiet(draft);
  }

  updateDelay(state: WheelState, caller: string, delayMs: number): OperationOutcome {
    this.assertConfigurable(state, caller);
    assertDuration(delayMs, "delayMs");
    const draft = draftOf(state);
    draft.delayMs = delayMs;
    return quiet(draft);
  }

  updateClaimWindow(state: WheelState, caller: string, claimWindowMs: number): OperationOutcome<number> {
    this.assertConfigurable(state, caller);
    const draft = draftOf(state);
    draft.claimWindowMs = normalizeClaimWindow(claimWindowMs, this.limits);
    return { ...quiet(draft), result: draft.claimWindowMs };
  }

  draw(state: WheelState, caller: string, oracle: IRandomOracle, clock: IClock): OperationOutcome<DrawResult> {
    this.assertDrawable(state, caller);
    const draft = draftOf(state);
    const result = recordWin(draft, selectRandom(draft.remainingEntries, oracle), clock.now(), false);
    return drawn(draft, [result]);
  }

  drawWithOrder(
    state: WheelState,
    caller: string,
    permutation: number[],
    oracle: IRandomOracle,
    clock: IClock,
  ): OperationOutcome<DrawResult> {
    this.assertDrawable(state, caller);
    const draft = draftOf(state);
    const result = recordWin(draft, selectWithOrder(draft.remainingEntries, permutation, oracle), clock.now(), false);
    return drawn(draft, [result]);
  }

  autoAssignLast(state: WheelState, caller: string, clock: IClock): OperationOutcome<DrawResult> {
    this.assertAutoAssignable(state, caller);
    const draft = draftOf(state);
    return drawn(draft, [this.assignLast(draft, clock.now())]);
  }

  drawAndAutoAssign(
    state: WheelState,
    caller: string,
    oracle: IRandomOracle,
    clock: IClock,
  ): OperationOutcome<DrawResult[]> {
    this.assertDrawable(state, caller);
    const now = clock.now();
    const draft = draftOf(state);
    const results = [recordWin(draft, selectRandom(draft.remainingEntries, oracle), now, false)];
    this.maybeAssignLast(draft, now, results);
    return drawnMany(draft, results);
  }

  drawWithOrderAndAutoAssign(
    state: WheelState,
    caller: string,
    permutation: number[],
    oracle: IRandomOracle,
    clock: IClock,
  ): OperationOutcome<DrawResult[]> {
    this.assertDrawable(state, caller);
    const now = clock.now();
    const draft = draftOf(state);
    const results = [recordWin(draft, selectWithOrder(draft.remainingEntries, permutation, oracle), now, false)];
    this.maybeAssignLast(draft, now, results);
    return drawnMany(draft, results);
  }

  /**
   * Pays the caller's earliest prize whose window is open. A caller holding
   * several prizes claims them one call at a time.
   */
  claim(state: WheelState, caller: string, clock: IClock): OperationOutcome<ClaimResult> {
    this.assertVersion(state.version);
    assertNotCancelled(state);

    const mine = state.winners.filter((winner) => winner.address === caller);
    if (mine.length === 0) {
      throw authorizationError("NOT_WINNER", "caller is not a recorded winner", { caller });
    }
    const unclaimed = mine.filter((winner) => !winner.claimed);
    if (unclaimed.length === 0) {
      throw notFoundError("NO_UNCLAIMED_PRIZE", "caller has no unclaimed prize", { caller });
    }

    const now = clock.now();
    const { delayMs, claimWindowMs } = state;
    const spinTimeOf = (winner: WinnerRecord) => state.spinTimes[winner.prizeIndex];
    // An open prize first; otherwise one that will still open is reported before one that has passed.
    const chosen =
      unclaimed.find((winner) => canClaim(now, spinTimeOf(winner), delayMs, claimWindowMs)) ??
      unclaimed.find((winner) => claimEligibility(now, spinTimeOf(winner), delayMs, claimWindowMs) === "TOO_EARLY") ??
      unclaimed[0];
    assertCanClaim(now, spinTimeOf(chosen), delayMs, claimWindowMs, { prizeIndex: chosen.prizeIndex });

    const draft = draftOf(state);
    const amount = settleClaim(draft, chosen.prizeIndex);
    return {
      state: draft,
      events: [{ type: "PRIZE_CLAIMED", wheelId: draft.id, winner: caller, amount }],
      payout: { to: caller, amount },
      result: { prizeIndex: chosen.prizeIndex, amount },
    };
  }

  reclaim(state: WheelState, caller: string, clock: IClock): OperationOutcome<bigint> {
    this.assertOrganizerCall(state, caller);
    assertNotCancelled(state);
    if (state.spunCount !== state.prizeAmounts.length) {
      throw stateError("WHEEL_NOT_EXHAUSTED", "every prize must be drawn before reclaiming", {
        spunCount: state.spunCount,
        prizeCount: state.prizeAmounts.length,
      });
    }

    const now = clock.now();
    const lastSpin = Math.max(...state.spinTimes);
    if (!canReclaim(now, lastSpin, state.delayMs, state.claimWindowMs)) {
      throw timingError("RECLAIM_TOO_EARLY", "claim windows are still open", {
        now,
        opensAt: reclaimOpensAt(lastSpin, state.delayMs, state.claimWindowMs),
      });
    }

    const draft = draftOf(state);
    const amount = reclaimRemainder(draft);
    return {
      state: draft,
      events: [{ type: "POOL_RECLAIMED", wheelId: draft.id, amount }],
      payout: { to: draft.organizer, amount },
      result: amount,
    };
  }

  cancelAndReclaim(state: WheelState, caller: string): OperationOutcome<bigint | null> {
    this.assertOrganizerCall(state, caller);
    assertNotCancelled(state);
    assertNotDrawn(state);

    const draft = draftOf(state);
    draft.isCancelled = true;
    const amount = drainPool(draft);
    const events: WheelEvent[] = [{ type: "WHEEL_CANCELLED", wheelId: draft.id }];
    if (amount > 0n) {
      events.push({ type: "POOL_RECLAIMED", wheelId: draft.id, amount });
    }
    return {
      state: draft,
      events,
      payout: amount > 0n ? { to: draft.organizer, amount } : null,
      result: amount > 0n ? amount : null,
    };
  }

  // ---------- guards ----------

  private assertVersion(version: number): void {
    if (!this.versionGate.isCurrent(version)) {
      throw stateError("VERSION_MISMATCH", "wheel was written by an engine version that is not enabled", {
        version,
        engineVersion: this.engineVersion,
      });
    }
  }

  private assertOrganizerCall(state: WheelState, caller: string): void {
    this.assertVersion(state.version);
    if (caller !== state.organizer) {
      throw authorizationError("NOT_ORGANIZER", "only the organizer may perform this operation", { caller });
    }
  }

  private assertConfigurable(state: WheelState, caller: string): void {
    this.assertOrganizerCall(state, caller);
    assertNotCancelled(state);
    assertNotDrawn(state);
  }

  /** Draw guards on their own, for hosts that must refuse before preparing randomness. */
  assertDrawable(state: WheelState, caller: string): void {
    this.assertOrganizerCall(state, caller);
    assertNotCancelled(state);
    if (state.spunCount >= state.prizeAmounts.length) {
      throw stateError("WHEEL_EXHAUSTED", "every prize has already been drawn", { spunCount: state.spunCount });
    }
    if (state.remainingEntries.length === 0) {
      throw notFoundError("NO_ENTRIES", "no entries remain to draw from");
    }
    assertSufficient(state);
  }

  private assertAutoAssignable(state: WheelState, caller: string): void {
    this.assertOrganizerCall(state, caller);
    assertNotCancelled(state);
    const remainingDraws = state.prizeAmounts.length - state.spunCount;
    if (remainingDraws !== 1) {
      throw stateError("AUTO_ASSIGN_UNAVAILABLE", "auto-assign needs exactly one prize left", { remainingDraws });
    }
    if (state.remainingEntries.length === 0) {
      throw notFoundError("NO_ENTRIES", "no entries remain to draw from");
    }
    const distinct = countDistinct(state.remainingEntries);
    if (distinct !== 1) {
      throw stateError("AUTO_ASSIGN_UNAVAILABLE", "auto-assign needs exactly one entry left", { distinct });
    }
    assertSufficient(state);
  }

  // ---------- draws ----------

  private assignLast(draft: WheelState, now: number): DrawResult {
    const popped = autoPopIfSingleton(draft.remainingEntries);
    if (!popped) {
      throw stateError("AUTO_ASSIGN_UNAVAILABLE", "auto-assign needs exactly one entry left", {
        count: draft.remainingEntries.length,
      });
    }
    return recordWin(draft, { ...popped, position: 0, consumedRandomness: false }, now, true);
  }

  private maybeAssignLast(draft: WheelState, now: number, results: DrawResult[]): void {
    const remainingDraws = draft.prizeAmounts.length - draft.spunCount;
    if (remainingDraws === 1 && countDistinct(draft.remainingEntries) === 1) {
      results.push(this.assignLast(draft, now));
    }
  }
}

function recordWin(draft: WheelState, selection: SpinSelection, now: number, autoAssigned: boolean): DrawResult {
  const prizeIndex = draft.spunCount;
  draft.remainingEntries = selection.remaining;
  draft.winners.push({ address: selection.winner, prizeIndex, claimed: false });
  draft.spinTimes.push(now);
  draft.spunCount += 1;
  return { winner: selection.winner, prizeIndex, spinTime: now, autoAssigned };
}

function drawn(draft: WheelState, results: [DrawResult]): OperationOutcome<DrawResult> {
  return { ...drawnMany(draft, results), result: results[0] };
}

function drawnMany(draft: WheelState, results: DrawResult[]): OperationOutcome<DrawResult[]> {
  return {
    state: draft,
    events: results.map((result): WheelEvent => ({
      type: "WHEEL_DRAWN",
      wheelId: draft.id,
      winner: result.winner,
      prizeIndex: result.prizeIndex,
    })),
    payout: null,
    result: results,
  };
}

function quiet(draft: WheelState): OperationOutcome {
  return { state: draft, events: [], payout: null, result: undefined };
}

function assertNotCancelled(state: WheelState): void {
  if (state.isCancelled) {
    throw stateError("WHEEL_CANCELLED", "wheel has been cancelled", { wheelId: state.id });
  }
}

function assertNotDrawn(state: WheelState): void {
  if (state.spunCount !== 0) {
    throw stateError("ALREADY_DRAWN", "operation is only allowed before the first draw", { spunCount: state.spunCount });
  }
}

function assertIdentity(value: string, field: string): void {
  if (typeof value !== "string" || value.trim() === "") {
    throw validationError("INVALID_IDENTITY", `${field} must be a non-empty string`, { field });
  }
}

export function draftOf(state: WheelState): WheelState {
  return {
    ...state,
    remainingEntries: [...state.remainingEntries],
    winners: state.winners.map((winner) => ({ ...winner })),
    prizeAmounts: [...state.prizeAmounts],
    spinTimes: [...state.spinTimes],
  };
}
