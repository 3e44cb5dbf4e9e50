export type WheelPhase = "CREATED" | "ACTIVE" | "EXHAUSTED" | "CANCELLED";

export interface WinnerRecord {
  address: string;
  prizeIndex: number;
  claimed: boolean;
}

export interface WheelState {
  id: string;
  currency: string;
  version: number;
  organizer: string;
  remainingEntries: string[];
  winners: WinnerRecord[];
  prizeAmounts: bigint[];
  spunCount: number;
  spinTimes: number[];
  delayMs: number;
  claimWindowMs: number;
  pool: bigint;
  isCancelled: boolean;
  createdAt: number;
}

export type WheelEventType =
  | "WHEEL_CREATED"
  | "POOL_DONATED"
  | "WHEEL_DRAWN"
  | "PRIZE_CLAIMED"
  | "POOL_RECLAIMED"
  | "WHEEL_CANCELLED";

export type WheelEvent =
  | { type: "WHEEL_CREATED"; wheelId: string; organizer: string }
  | { type: "POOL_DONATED"; wheelId: string; amount: bigint }
  | { type: "WHEEL_DRAWN"; wheelId: string; winner: string; prizeIndex: number }
  | { type: "PRIZE_CLAIMED"; wheelId: string; winner: string; amount: bigint }
  | { type: "POOL_RECLAIMED"; wheelId: string; amount: bigint }
  | { type: "WHEEL_CANCELLED"; wheelId: string };

export interface RecordedWheelEvent {
  id: string;
  wheelId: string;
  type: WheelEventType;
  payload: Record<string, unknown>;
  createdAt: Date;
}

/** Funds leaving the custody pool as a result of an operation. */
export interface Payout {
  to: string;
  amount: bigint;
}

export interface IClock {
  now(): number;
}

export const CLOCK = Symbol("CLOCK");

export class SystemClock implements IClock {
  now(): number {
    return Date.now();
  }
}

export interface WheelLimits {
  minEntries: number;
  maxEntries: number;
  defaultClaimWindowMs: number;
  minClaimWindowMs: number;
}

export const HOUR_MS = 60 * 60 * 1000;

export const DEFAULT_WHEEL_LIMITS: WheelLimits = {
  minEntries: 2,
  maxEntries: 200,
  defaultClaimWindowMs: 24 * HOUR_MS,
  minClaimWindowMs: HOUR_MS,
};
