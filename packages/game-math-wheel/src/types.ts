import type { Payout, WheelEvent, WheelLimits, WheelState } from "@prize-wheel/core-types";

export type { IRandomOracle } from "@prize-wheel/core-rng";

/** Admin gate deciding whether records written by a given engine version may be operated on. */
export interface IVersionGate {
  isCurrent(version: number): boolean;
}

export class FixedVersionGate implements IVersionGate {
  constructor(private readonly currentVersion: number) {}

  isCurrent(version: number): boolean {
    return version === this.currentVersion;
  }
}

export interface WheelEngineOptions {
  limits?: WheelLimits;
  engineVersion?: number;
  versionGate?: IVersionGate;
}

export interface CreateWheelInput {
  id: string;
  currency: string;
  organizer: string;
  entries: string[];
  prizeAmounts: bigint[];
  delayMs: number;
  claimWindowMs: number;
}

/**
 * Result of one engine operation. Nothing is applied until the caller commits
 * `state`; discarding the outcome leaves the stored wheel untouched.
 */
export interface OperationOutcome<TResult = void> {
  state: WheelState;
  events: WheelEvent[];
  payout: Payout | null;
  result: TResult;
}

export interface DrawResult {
  winner: string;
  prizeIndex: number;
  spinTime: number;
  autoAssigned: boolean;
}

export interface ClaimResult {
  prizeIndex: number;
  amount: bigint;
}

export interface SpinSelection {
  winner: string;
  position: number;
  remaining: string[];
  consumedRandomness: boolean;
}
