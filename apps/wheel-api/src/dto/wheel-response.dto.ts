import type { FairnessProof } from "@prize-wheel/core-provably-fair";
import type { WheelEventType, WheelPhase } from "@prize-wheel/core-types";

export interface WinnerView {
  address: string;
  prizeIndex: number;
  amount: string;
  claimed: boolean;
  spinTime: number;
}

export interface WheelView {
  id: string;
  currency: string;
  organizer: string;
  phase: WheelPhase;
  remainingEntries: string[];
  prizeAmounts: string[];
  winners: WinnerView[];
  spunCount: number;
  remainingDraws: number;
  delayMs: number;
  claimWindowMs: number;
  pool: string;
  totalPrizes: string;
  outstanding: string;
  isCancelled: boolean;
  reclaimOpensAt: number | null;
  createdAt: number;
}

export interface DrawView {
  winner: string;
  prizeIndex: number;
  spinTime: number;
  autoAssigned: boolean;
}

export interface DrawResponse {
  wheel: WheelView;
  draws: DrawView[];
  fairness: FairnessProof | null;
}

export interface DonateResponse {
  wheelId: string;
  amount: string;
  pool: string;
}

export interface ClaimResponse {
  wheelId: string;
  prizeIndex: number;
  amount: string;
  pool: string;
}

export interface ReclaimResponse {
  wheelId: string;
  amount: string | null;
}

export interface FairnessView {
  wheelId: string;
  serverSeedHash: string;
  clientSeed: string;
  nonce: number;
  serverSeed: string | null;
}

export interface WheelEventView {
  id: string;
  type: WheelEventType;
  payload: Record<string, unknown>;
  createdAt: string;
}
