export enum WheelErrorCode {
  AUTHORIZATION = "AUTHORIZATION",
  STATE = "STATE",
  VALIDATION = "VALIDATION",
  TIMING = "TIMING",
  FUNDS = "FUNDS",
  NOT_FOUND = "NOT_FOUND",
}

export type WheelErrorReason =
  | "NOT_ORGANIZER"
  | "NOT_WINNER"
  | "VERSION_MISMATCH"
  | "WHEEL_CANCELLED"
  | "ALREADY_DRAWN"
  | "WHEEL_EXHAUSTED"
  | "WHEEL_NOT_EXHAUSTED"
  | "AUTO_ASSIGN_UNAVAILABLE"
  | "INVALID_IDENTITY"
  | "INVALID_ENTRY"
  | "ENTRY_COUNT_OUT_OF_RANGE"
  | "NOT_ENOUGH_UNIQUE_ENTRIES"
  | "INVALID_PRIZE_AMOUNT"
  | "INVALID_PRIZE_COUNT"
  | "INVALID_DURATION"
  | "INVALID_AMOUNT"
  | "INVALID_PERMUTATION"
  | "INVALID_PRIZE_INDEX"
  | "CLAIM_TOO_EARLY"
  | "CLAIM_WINDOW_PASSED"
  | "RECLAIM_TOO_EARLY"
  | "INSUFFICIENT_POOL"
  | "INSUFFICIENT_WALLET_BALANCE"
  | "NO_UNCLAIMED_PRIZE"
  | "NO_ENTRIES"
  | "NOTHING_TO_RECLAIM"
  | "WHEEL_NOT_FOUND";

export interface WheelErrorPayload {
  error: WheelErrorCode;
  reason: WheelErrorReason;
  message: string;
  details?: Record<string, unknown>;
}

export class WheelError extends Error {
  constructor(
    public readonly code: WheelErrorCode,
    public readonly reason: WheelErrorReason,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = "WheelError";
  }

  toPayload(): WheelErrorPayload {
    return wheelErrorPayload(this.code, this.reason, this.message, this.details);
  }
}

export function wheelErrorPayload(
  code: WheelErrorCode,
  reason: WheelErrorReason,
  message: string,
  details?: Record<string, unknown>,
): WheelErrorPayload {
  return { error: code, reason, message, details };
}

export function isWheelError(err: unknown, code?: WheelErrorCode): err is WheelError {
  return err instanceof WheelError && (code === undefined || err.code === code);
}

const HTTP_STATUS: Record<WheelErrorCode, number> = {
  [WheelErrorCode.AUTHORIZATION]: 403,
  [WheelErrorCode.STATE]: 409,
  [WheelErrorCode.VALIDATION]: 400,
  [WheelErrorCode.TIMING]: 409,
  [WheelErrorCode.FUNDS]: 422,
  [WheelErrorCode.NOT_FOUND]: 404,
};

export function httpStatusFor(code: WheelErrorCode): number {
  return HTTP_STATUS[code];
}

// Shorthands used by the engine guards.

export const authorizationError = (reason: WheelErrorReason, message: string, details?: Record<string, unknown>) =>
  new WheelError(WheelErrorCode.AUTHORIZATION, reason, message, details);

export const stateError = (reason: WheelErrorReason, message: string, details?: Record<string, unknown>) =>
  new WheelError(WheelErrorCode.STATE, reason, message, details);

export const validationError = (reason: WheelErrorReason, message: string, details?: Record<string, unknown>) =>
  new WheelError(WheelErrorCode.VALIDATION, reason, message, details);

export const timingError = (reason: WheelErrorReason, message: string, details?: Record<string, unknown>) =>
  new WheelError(WheelErrorCode.TIMING, reason, message, details);

export const fundsError = (reason: WheelErrorReason, message: string, details?: Record<string, unknown>) =>
  new WheelError(WheelErrorCode.FUNDS, reason, message, details);

export const notFoundError = (reason: WheelErrorReason, message: string, details?: Record<string, unknown>) =>
  new WheelError(WheelErrorCode.NOT_FOUND, reason, message, details);
