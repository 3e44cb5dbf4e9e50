import { randomUUID } from "crypto";
import { Inject, Injectable } from "@nestjs/common";
import { AuthContext } from "@prize-wheel/core-auth";
import { isWheelError, notFoundError, validationError } from "@prize-wheel/core-errors";
import { IWheelEventLog, WHEEL_EVENT_LOG } from "@prize-wheel/core-event-log";
import { ILogger, LOGGER, LogContext } from "@prize-wheel/core-logging";
import { IMetrics, METRICS, WHEEL_OPERATION_LATENCY_MS, WHEEL_OPERATIONS_TOTAL } from "@prize-wheel/core-metrics";
import { IProvablyFairStateStore, PROVABLY_FAIR_STATE_STORE } from "@prize-wheel/core-provably-fair";
import { ILockManager, LOCK_MANAGER, LockUnavailableError } from "@prize-wheel/core-redis";
import { IRandomOracleFactory, RANDOM_ORACLE_FACTORY, SingleUseOracle } from "@prize-wheel/core-rng";
import { CLOCK, IClock, WheelState } from "@prize-wheel/core-types";
import { IWalletPort, WALLET } from "@prize-wheel/core-wallet";
import {
  DrawResult,
  OperationOutcome,
  WheelStateMachine,
  findInvariantViolations,
  phaseOf,
} from "@prize-wheel/game-math-wheel";
import {
  CreateWheelDto,
  DonateDto,
  DrawDto,
  UpdateClaimWindowDto,
  UpdateDelayDto,
  UpdateEntriesDto,
  UpdatePrizesDto,
} from "./dto/wheel-request.dto";
import {
  ClaimResponse,
  DonateResponse,
  DrawResponse,
  FairnessView,
  ReclaimResponse,
  WheelEventView,
  WheelView,
} from "./dto/wheel-response.dto";
import { IWheelRepository, WHEEL_REPOSITORY } from "./wheel.repository";
import { WHEEL_STATE_MACHINE } from "./wheel.tokens";
import { toDrawView, toEventView, toWheelView } from "./wheel.view";

export type WheelOperation =
  | "create"
  | "donate"
  | "update_entries"
  | "update_prizes"
  | "update_delay"
  | "update_claim_window"
  | "draw"
  | "auto_assign"
  | "claim"
  | "reclaim"
  | "cancel";

const WHEEL_LOCK_KEY = (wheelId: string) => `wheel:lock:${wheelId}`;
const WHEEL_LOCK_TTL_MS = 5_000;
const AMOUNT_PATTERN = /^\d+$/;

interface Deposit {
  from: string;
  amount: bigint;
}

interface UndoStep {
  step: string;
  run: () => Promise<void>;
}

/**
 * Hosts the wheel state machine. Each mutation runs under the wheel's lock:
 * load, engine, custody transfers, save, event append. Any failure after a
 * transfer or save is compensated before the error is rethrown.
 */
@Injectable()
export class WheelService {
  constructor(
    @Inject(WHEEL_STATE_MACHINE) private readonly engine: WheelStateMachine,
    @Inject(WHEEL_REPOSITORY) private readonly repository: IWheelRepository,
    @Inject(WALLET) private readonly wallet: IWalletPort,
    @Inject(WHEEL_EVENT_LOG) private readonly eventLog: IWheelEventLog,
    @Inject(RANDOM_ORACLE_FACTORY) private readonly oracles: IRandomOracleFactory,
    @Inject(PROVABLY_FAIR_STATE_STORE) private readonly provablyFairStore: IProvablyFairStateStore,
    @Inject(LOCK_MANAGER) private readonly lockManager: ILockManager,
    @Inject(CLOCK) private readonly clock: IClock,
    @Inject(LOGGER) private readonly logger: ILogger,
    @Inject(METRICS) private readonly metrics: IMetrics,
  ) {}

  async create(ctx: AuthContext, dto: CreateWheelDto): Promise<WheelView> {
    const wheelId = randomUUID();
    return this.track("create", ctx, wheelId, async () => {
      const outcome = this.engine.create(
        {
          id: wheelId,
          currency: ctx.currency,
          organizer: ctx.userId,
          entries: dto.entries,
          prizeAmounts: parseAmounts(dto.prizeAmounts),
          delayMs: dto.delayMs,
          claimWindowMs: dto.claimWindowMs ?? 0,
        },
        this.clock,
      );
      // Commit to a server seed before any draw can happen.
      await this.provablyFairStore.getOrInitContext({ wheelId, clientSeed: dto.clientSeed });
      await this.commit(null, outcome);
      return toWheelView(outcome.state);
    });
  }

  async getWheel(wheelId: string): Promise<WheelView> {
    return toWheelView(await this.load(wheelId));
  }

  async listEvents(wheelId: string, limit?: number, offset?: number): Promise<WheelEventView[]> {
    await this.load(wheelId);
    const events = await this.eventLog.listForWheel(wheelId, limit, offset);
    return events.map(toEventView);
  }

  /** The server seed is only revealed once no further draw can use it. */
  async fairness(wheelId: string): Promise<FairnessView> {
    const state = await this.load(wheelId);
    const ctx = await this.provablyFairStore.getOrInitContext({ wheelId });
    const nonce = await this.provablyFairStore.currentNonce({ wheelId });
    const phase = phaseOf(state);
    const revealed = phase === "EXHAUSTED" || phase === "CANCELLED";
    return {
      wheelId,
      serverSeedHash: ctx.serverSeedHash,
      clientSeed: ctx.clientSeed,
      nonce,
      serverSeed: revealed ? await this.provablyFairStore.revealServerSeed({ wheelId }) : null,
    };
  }

  async donate(ctx: AuthContext, wheelId: string, dto: DonateDto): Promise<DonateResponse> {
    const amount = parseAmount(dto.amount, "amount");
    const outcome = await this.mutate(
      "donate",
      ctx,
      wheelId,
      (state) => this.engine.donate(state, ctx.userId, amount),
      { from: ctx.userId, amount },
    );
    return { wheelId, amount: amount.toString(), pool: outcome.result.toString() };
  }

  async updateEntries(ctx: AuthContext, wheelId: string, dto: UpdateEntriesDto): Promise<WheelView> {
    const outcome = await this.mutate("update_entries", ctx, wheelId, (state) =>
      this.engine.updateEntries(state, ctx.userId, dto.entries),
    );
    return toWheelView(outcome.state);
  }

  async updatePrizes(ctx: AuthContext, wheelId: string, dto: UpdatePrizesDto): Promise<WheelView> {
    const prizeAmounts = parseAmounts(dto.prizeAmounts);
    const outcome = await this.mutate("update_prizes", ctx, wheelId, (state) =>
      this.engine.updatePrizes(state, ctx.userId, prizeAmounts),
    );
    return toWheelView(outcome.state);
  }

  async updateDelay(ctx: AuthContext, wheelId: string, dto: UpdateDelayDto): Promise<WheelView> {
    const outcome = await this.mutate("update_delay", ctx, wheelId, (state) =>
      this.engine.updateDelay(state, ctx.userId, dto.delayMs),
    );
    return toWheelView(outcome.state);
  }

  async updateClaimWindow(ctx: AuthContext, wheelId: string, dto: UpdateClaimWindowDto): Promise<WheelView> {
    const outcome = await this.mutate("update_claim_window", ctx, wheelId, (state) =>
      this.engine.updateClaimWindow(state, ctx.userId, dto.claimWindowMs),
    );
    return toWheelView(outcome.state);
  }

  async draw(ctx: AuthContext, wheelId: string, dto: DrawDto): Promise<DrawResponse> {
    const outcome = await this.mutate("draw", ctx, wheelId, async (state) => {
      // A refused draw must not take a nonce.
      this.engine.assertDrawable(state, ctx.userId);
      const prepared = await this.oracles.prepare(wheelId);
      const drawn = this.drawWith(state, ctx.userId, dto, prepared.oracle);
      return {
        ...drawn,
        result: { draws: drawn.result, fairness: prepared.oracle.consumed ? prepared.proof : null },
      };
    });
    return {
      wheel: toWheelView(outcome.state),
      draws: outcome.result.draws.map(toDrawView),
      fairness: outcome.result.fairness,
    };
  }

  async autoAssignLast(ctx: AuthContext, wheelId: string): Promise<DrawResponse> {
    const outcome = await this.mutate("auto_assign", ctx, wheelId, (state) =>
      this.engine.autoAssignLast(state, ctx.userId, this.clock),
    );
    return { wheel: toWheelView(outcome.state), draws: [toDrawView(outcome.result)], fairness: null };
  }

  async claim(ctx: AuthContext, wheelId: string): Promise<ClaimResponse> {
    const outcome = await this.mutate("claim", ctx, wheelId, (state) => this.engine.claim(state, ctx.userId, this.clock));
    return {
      wheelId,
      prizeIndex: outcome.result.prizeIndex,
      amount: outcome.result.amount.toString(),
      pool: outcome.state.pool.toString(),
    };
  }

  async reclaim(ctx: AuthContext, wheelId: string): Promise<ReclaimResponse> {
    const outcome = await this.mutate("reclaim", ctx, wheelId, (state) =>
      this.engine.reclaim(state, ctx.userId, this.clock),
    );
    return { wheelId, amount: outcome.result.toString() };
  }

  async cancel(ctx: AuthContext, wheelId: string): Promise<ReclaimResponse> {
    const outcome = await this.mutate("cancel", ctx, wheelId, (state) =>
      this.engine.cancelAndReclaim(state, ctx.userId),
    );
    return { wheelId, amount: outcome.result === null ? null : outcome.result.toString() };
  }

  private drawWith(
    state: WheelState,
    caller: string,
    dto: DrawDto,
    oracle: SingleUseOracle,
  ): OperationOutcome<DrawResult[]> {
    const { permutation, autoAssign } = dto;
    if (permutation) {
      if (autoAssign) {
        return this.engine.drawWithOrderAndAutoAssign(state, caller, permutation, oracle, this.clock);
      }
      const single = this.engine.drawWithOrder(state, caller, permutation, oracle, this.clock);
      return { ...single, result: [single.result] };
    }
    if (autoAssign) {
      return this.engine.drawAndAutoAssign(state, caller, oracle, this.clock);
    }
    const single = this.engine.draw(state, caller, oracle, this.clock);
    return { ...single, result: [single.result] };
  }

  private async mutate<T>(
    operation: WheelOperation,
    ctx: AuthContext,
    wheelId: string,
    apply: (state: WheelState) => OperationOutcome<T> | Promise<OperationOutcome<T>>,
    deposit?: Deposit,
  ): Promise<OperationOutcome<T>> {
    return this.track(operation, ctx, wheelId, () =>
      this.lockManager.withLock(WHEEL_LOCK_KEY(wheelId), WHEEL_LOCK_TTL_MS, async () => {
        const previous = await this.load(wheelId);
        const outcome = await apply(previous);
        await this.commit(previous, outcome, deposit);
        return outcome;
      }),
    );
  }

  private async load(wheelId: string): Promise<WheelState> {
    const state = await this.repository.findById(wheelId);
    if (!state) {
      throw notFoundError("WHEEL_NOT_FOUND", "wheel does not exist", { wheelId });
    }
    const violations = findInvariantViolations(state);
    if (violations.length) {
      this.logger.error("wheel.record.inconsistent", { wheelId, violations });
      throw new Error(`Wheel ${wheelId} record is inconsistent`);
    }
    return state;
  }

  private async commit(previous: WheelState | null, outcome: OperationOutcome<unknown>, deposit?: Deposit): Promise<void> {
    const { state, payout } = outcome;
    const undo: UndoStep[] = [];
    try {
      if (deposit) {
        await this.wallet.debitIfSufficient(deposit.from, deposit.amount, state.currency);
        undo.push({ step: "deposit", run: () => this.wallet.credit(deposit.from, deposit.amount, state.currency) });
      }
      if (payout) {
        await this.wallet.credit(payout.to, payout.amount, state.currency);
        undo.push({
          step: "payout",
          run: () => this.wallet.debitIfSufficient(payout.to, payout.amount, state.currency),
        });
      }
      await this.repository.save(state);
      undo.push({
        step: "state",
        run: () => (previous ? this.repository.save(previous) : this.repository.remove(state.id)),
      });
      await this.eventLog.append(outcome.events);
    } catch (err) {
      await this.compensate(state.id, undo, err);
      throw err;
    }
  }

  private async compensate(wheelId: string, undo: UndoStep[], cause: unknown): Promise<void> {
    for (const action of [...undo].reverse()) {
      try {
        await action.run();
        this.logger.warn("wheel.compensation.applied", { wheelId, step: action.step, cause: errorMessage(cause) });
      } catch (err) {
        this.logger.error("wheel.compensation.failed", {
          wheelId,
          step: action.step,
          cause: errorMessage(cause),
          err: errorMessage(err),
        });
      }
    }
  }

  private async track<T>(operation: WheelOperation, ctx: AuthContext, wheelId: string, fn: () => Promise<T>): Promise<T> {
    const start = Date.now();
    const meta: LogContext = { wheelId, caller: ctx.userId, currency: ctx.currency, operation };
    try {
      const result = await fn();
      this.metrics.increment(WHEEL_OPERATIONS_TOTAL, { operation, status: "success" });
      this.logger.info(`wheel.${operation}.committed`, meta);
      return result;
    } catch (err) {
      if (isWheelError(err)) {
        this.metrics.increment(WHEEL_OPERATIONS_TOTAL, { operation, status: err.reason.toLowerCase() });
        this.logger.warn(`wheel.${operation}.rejected`, { ...meta, code: err.code, reason: err.reason });
      } else if (err instanceof LockUnavailableError) {
        this.metrics.increment(WHEEL_OPERATIONS_TOTAL, { operation, status: "locked" });
        this.logger.warn(`wheel.${operation}.locked`, meta);
      } else {
        this.metrics.increment(WHEEL_OPERATIONS_TOTAL, { operation, status: "error" });
        this.logger.error(`wheel.${operation}.failed`, { ...meta, err: errorMessage(err) });
      }
      throw err;
    } finally {
      this.metrics.observe(WHEEL_OPERATION_LATENCY_MS, Date.now() - start, { operation });
    }
  }
}

function parseAmount(value: string, field: string): bigint {
  if (typeof value !== "string" || !AMOUNT_PATTERN.test(value)) {
    throw validationError("INVALID_AMOUNT", `${field} must be an integer string`, { field, value: String(value) });
  }
  return BigInt(value);
}

function parseAmounts(values: string[]): bigint[] {
  if (!Array.isArray(values)) {
    throw validationError("INVALID_PRIZE_COUNT", "prizeAmounts must be an array of integer strings");
  }
  return values.map((value, idx) => {
    if (typeof value !== "string" || !AMOUNT_PATTERN.test(value)) {
      throw validationError("INVALID_PRIZE_AMOUNT", `prizeAmounts[${idx}] must be an integer string`, {
        index: idx,
        amount: String(value),
      });
    }
    return BigInt(value);
  });
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
