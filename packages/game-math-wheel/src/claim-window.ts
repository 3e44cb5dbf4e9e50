import { timingError, validationError } from "@prize-wheel/core-errors";
import type { WheelLimits } from "@prize-wheel/core-types";

export type ClaimEligibility = "TOO_EARLY" | "OPEN" | "PASSED";

export function claimEligibility(now: number, spinTime: number, delayMs: number, windowMs: number): ClaimEligibility {
  const opensAt = spinTime + delayMs;
  if (now < opensAt) {
    return "TOO_EARLY";
  }
  if (now >= opensAt + windowMs) {
    return "PASSED";
  }
  return "OPEN";
}

export function canClaim(now: number, spinTime: number, delayMs: number, windowMs: number): boolean {
  return claimEligibility(now, spinTime, delayMs, windowMs) === "OPEN";
}

export function claimWindowDetails(now: number, spinTime: number, delayMs: number, windowMs: number) {
  const opensAt = spinTime + delayMs;
  return { now, opensAt, closesAt: opensAt + windowMs };
}

/** `context` is merged into the error details, e.g. the prize being claimed. */
export function assertCanClaim(
  now: number,
  spinTime: number,
  delayMs: number,
  windowMs: number,
  context: Record<string, unknown> = {},
): void {
  const eligibility = claimEligibility(now, spinTime, delayMs, windowMs);
  if (eligibility === "OPEN") {
    return;
  }
  const details = { ...context, ...claimWindowDetails(now, spinTime, delayMs, windowMs) };
  throw eligibility === "TOO_EARLY"
    ? timingError("CLAIM_TOO_EARLY", "claim window has not opened yet", details)
    : timingError("CLAIM_WINDOW_PASSED", "claim window has closed", details);
}

export function reclaimOpensAt(maxSpinTime: number, delayMs: number, windowMs: number): number {
  return maxSpinTime + delayMs + windowMs;
}

export function canReclaim(now: number, maxSpinTime: number, delayMs: number, windowMs: number): boolean {
  return now >= reclaimOpensAt(maxSpinTime, delayMs, windowMs);
}

/**
 * 0 selects the default window, anything else below the floor is raised to it.
 */
export function normalizeClaimWindow(requestedMs: number, limits: WheelLimits): number {
  assertDuration(requestedMs, "claimWindowMs");
  if (requestedMs === 0) {
    return limits.defaultClaimWindowMs;
  }
  if (requestedMs < limits.minClaimWindowMs) {
    return limits.minClaimWindowMs;
  }
  return requestedMs;
}

export function assertDuration(value: number, field: string): void {
  if (!Number.isSafeInteger(value) || value < 0) {
    throw validationError("INVALID_DURATION", `${field} must be a non-negative integer of milliseconds`, { field, value });
  }
}
