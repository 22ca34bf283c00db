import { ExecutionSettings, SettingsStore } from "../config/settings";
import { MarketBook } from "../exchange/MarketBook";
import { normalizeOrder, SymbolFilterRegistry } from "../exchange/SymbolFilters";
import { IEventSink } from "../types/event.types";
import {
  ExecutionFailureReason,
  ExecutionStatus,
  IExecutionAttempt,
  IExecutionResult,
  IFill,
  IGatewayOrder,
  ILatencyTrace,
  IOrderGateway,
  IOrderIntent,
  IOrderRequest,
  IPosition,
} from "../types/execution.types";
import { computeBackoffDelay, sleep } from "../utils/backoff";
import { Clock, systemClock } from "../utils/clock";
import { errorMessage, isTransient } from "../utils/errors";
import { logger } from "../utils/logger";
import { IdempotencyCache } from "./IdempotencyCache";
import { PositionManager } from "./PositionManager";
import { RiskGate } from "./RiskGate";

export interface ExecutionEngineDeps {
  settings: SettingsStore;
  events: IEventSink;
  book: MarketBook;
  filters: SymbolFilterRegistry;
  positions: PositionManager;
  risk: RiskGate;
  paper: IOrderGateway;
  live?: IOrderGateway | null;
  clock?: Clock;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

type Prepared =
  | { ok: true; request: IOrderRequest; admission: Record<string, number> }
  | { ok: false; reason: ExecutionFailureReason; detail: string };

interface RunContext {
  intent: IOrderIntent;
  gateway: IOrderGateway;
  request: IOrderRequest;
  attempts: IExecutionAttempt[];
  trace: ILatencyTrace;
}

/**
 * Turns accepted intents into orders. One signalId maps to at most one live
 * order: duplicates resolve from the idempotency cache, retries reuse the
 * signalId as the exchange client order id, and a transient failure is
 * reconciled against the exchange before anything is resent.
 */
export class ExecutionEngine {
  private settings: SettingsStore;
  private events: IEventSink;
  private book: MarketBook;
  private filters: SymbolFilterRegistry;
  private positions: PositionManager;
  private risk: RiskGate;
  private paper: IOrderGateway;
  private live: IOrderGateway | null;
  private clock: Clock;
  private sleep: (ms: number) => Promise<void>;
  private random: () => number;
  private cache: IdempotencyCache<IExecutionResult>;

  constructor(deps: ExecutionEngineDeps) {
    this.settings = deps.settings;
    this.events = deps.events;
    this.book = deps.book;
    this.filters = deps.filters;
    this.positions = deps.positions;
    this.risk = deps.risk;
    this.paper = deps.paper;
    this.live = deps.live ?? null;
    this.clock = deps.clock ?? systemClock;
    this.sleep = deps.sleep ?? sleep;
    this.random = deps.random ?? Math.random;
    this.cache = new IdempotencyCache(() => this.settings.current.execution.idempotencyTtlMs, this.clock);
  }

  execute(intent: IOrderIntent): Promise<IExecutionResult> {
    const cached = this.cache.lookup(intent.signalId);
    if (cached) {
      this.events.publish({
        level: "INFO",
        category: "ORDER",
        symbol: intent.symbol,
        correlationId: intent.signalId,
        message: "Duplicate intent resolved from idempotency cache",
        payload: { inFlight: this.cache.isInFlight(intent.signalId) },
      });
      return cached.then((result) => ({ ...result, fromCache: true }));
    }

    const run = this.run(intent);
    this.cache.register(intent.signalId, run);
    return run;
  }

  /** Reduce-only market order closing the whole position. */
  executeExit(position: IPosition, reason: string): Promise<IExecutionResult> {
    const key = `exit-${position.symbol}-${position.openedAt}`;
    const now = this.clock.now();
    const intent: IOrderIntent = {
      signalId: key,
      symbol: position.symbol,
      side: position.side === "LONG" ? "SELL" : "BUY",
      notional: position.qty * position.markPrice,
      priceHint: position.markPrice,
      confidence: 1,
      reduceOnly: true,
      quantity: position.qty,
      signalTimestamp: now,
      decidedAt: now,
    };
    this.events.publish({
      level: "INFO",
      category: "ORDER",
      symbol: position.symbol,
      correlationId: key,
      message: `Exit ${position.side} ${position.symbol} (${reason})`,
      payload: { reason, qty: position.qty, markPrice: position.markPrice },
    });
    return this.execute(intent).then((result) => {
      // Whatever is still open must stay closable by the next exit
      if (result.status !== "FILLED" || this.positions.get(position.symbol)) this.cache.forget(key);
      return result;
    });
  }

  isInFlight(signalId: string): boolean {
    return this.cache.isInFlight(signalId);
  }

  inFlight(): string[] {
    return this.cache.inFlightKeys();
  }

  // ==================== PIPELINE ====================

  private async run(intent: IOrderIntent): Promise<IExecutionResult> {
    const trace: ILatencyTrace = { signalAt: intent.signalTimestamp, decidedAt: intent.decidedAt };
    const attempts: IExecutionAttempt[] = [];
    const settings = this.settings.current.execution;
    const gateway = settings.dryRun || !this.live ? this.paper : this.live;

    let result: IExecutionResult;
    try {
      const prepared = this.prepare(intent, settings);
      if (!prepared.ok) {
        result = this.result(intent, "SKIPPED", attempts, trace, prepared.reason, prepared.detail);
      } else {
        this.events.publish({
          level: "DEBUG",
          category: "ORDER",
          symbol: intent.symbol,
          correlationId: intent.signalId,
          message: "Admission passed",
          payload: prepared.admission,
        });
        result = await this.submit({ intent, gateway, request: prepared.request, attempts, trace }, settings);
      }
    } catch (err) {
      logger.error(`[Execution] Unexpected failure for ${intent.signalId}`, err);
      result = this.result(intent, "FAILED", attempts, trace, undefined, errorMessage(err));
    }

    if (result.status !== "FILLED") {
      this.risk.releaseReservation(intent.signalId, result.reason ?? result.status);
    }
    this.publishResult(result);
    return result;
  }

  /** Normalize to exchange filters and run the pre-trade guards. */
  private prepare(intent: IOrderIntent, settings: ExecutionSettings): Prepared {
    const filters = this.filters.get(intent.symbol);
    if (!filters) {
      return { ok: false, reason: "NO_FILTERS", detail: `no exchange filters for ${intent.symbol}` };
    }

    const book = this.book.get(intent.symbol);
    if (!book && !intent.reduceOnly) {
      return { ok: false, reason: "NO_BOOK", detail: `no order book for ${intent.symbol}` };
    }

    const touch = intent.side === "BUY" ? this.book.bestAsk(intent.symbol) : this.book.bestBid(intent.symbol);
    const reference = touch ?? intent.priceHint;
    if (!(reference > 0)) {
      return { ok: false, reason: "NO_BOOK", detail: `no reference price for ${intent.symbol}` };
    }
    const rawQty = intent.quantity ?? intent.notional / reference;
    const normalized = normalizeOrder(filters, rawQty, reference, intent.reduceOnly);
    if (normalized === "BELOW_MIN_QTY" || normalized === "BELOW_MIN_NOTIONAL") {
      return {
        ok: false,
        reason: "BELOW_MIN_NOTIONAL",
        detail: `${normalized}: qty ${rawQty} @ ${reference} (minQty ${filters.minQty}, minNotional ${filters.minNotional})`,
      };
    }

    const request: IOrderRequest = {
      clientOrderId: intent.signalId,
      symbol: intent.symbol,
      side: intent.side,
      quantity: normalized.quantity,
      reduceOnly: intent.reduceOnly,
      priceHint: normalized.price,
    };
    if (intent.reduceOnly) return { ok: true, request, admission: {} };

    const spreadBps = this.book.spreadBps(intent.symbol);
    const mid = this.book.mid(intent.symbol);
    if (spreadBps === null || mid === null || touch === null) {
      return { ok: false, reason: "NO_BOOK", detail: `one-sided book for ${intent.symbol}` };
    }
    if (spreadBps > settings.spreadGuardBps) {
      return {
        ok: false,
        reason: "SPREAD_GUARD",
        detail: `spread ${spreadBps.toFixed(2)}bps > ${settings.spreadGuardBps}bps`,
      };
    }

    const depth = this.book.depthNotional(intent.symbol, intent.side);
    if (depth < settings.minDepthNotional) {
      return {
        ok: false,
        reason: "DEPTH_GUARD",
        detail: `depth $${depth.toFixed(0)} < $${settings.minDepthNotional}`,
      };
    }

    const walk = this.book.walk(intent.symbol, intent.side, normalized.quantity);
    if (walk.filledQty < normalized.quantity) {
      return {
        ok: false,
        reason: "INSUFFICIENT_DEPTH",
        detail: `book holds ${walk.filledQty} of ${normalized.quantity}`,
      };
    }

    const slippageBps = (Math.abs(walk.avgPrice - touch) / touch) * 10_000;
    if (slippageBps > settings.maxSlippageBps) {
      return {
        ok: false,
        reason: "SLIPPAGE_GUARD",
        detail: `modeled slippage ${slippageBps.toFixed(2)}bps > ${settings.maxSlippageBps}bps`,
      };
    }

    // Cost is measured from mid, so it includes half the spread
    const costBps = (Math.abs(walk.avgPrice - mid) / mid) * 10_000;
    const edgeBps = intent.confidence * settings.edgeBpsAtFullConfidence;
    const allowedCost = settings.edgeSafetyFactor * edgeBps;
    if (costBps > allowedCost) {
      return {
        ok: false,
        reason: "COST_EXCEEDS_EDGE",
        detail: `cost ${costBps.toFixed(2)}bps > ${settings.edgeSafetyFactor} x edge ${edgeBps.toFixed(2)}bps`,
      };
    }

    return { ok: true, request, admission: { spreadBps, depth, slippageBps, costBps, edgeBps } };
  }

  private async submit(ctx: RunContext, settings: ExecutionSettings): Promise<IExecutionResult> {
    const { intent, gateway, request, attempts, trace } = ctx;

    for (let attemptNumber = 1; attemptNumber <= settings.maxRetryAttempts; attemptNumber++) {
      const attempt: IExecutionAttempt = {
        signalId: intent.signalId,
        attemptNumber,
        sentAt: this.clock.now(),
        status: "PENDING",
      };
      attempts.push(attempt);
      if (trace.sentAt === undefined) trace.sentAt = attempt.sentAt;

      this.events.publish({
        level: "INFO",
        category: "ORDER",
        symbol: intent.symbol,
        correlationId: intent.signalId,
        message: `Attempt ${attemptNumber} ${request.side} ${request.quantity} via ${gateway.name}`,
        payload: { attemptNumber, ...request },
      });

      try {
        const order = await gateway.placeOrder(request);
        return await this.handleAck(ctx, attempt, order, settings);
      } catch (err) {
        attempt.error = errorMessage(err);

        if (!isTransient(err)) {
          attempt.status = "REJECTED";
          this.events.publish({
            level: "ERROR",
            category: "ORDER",
            symbol: intent.symbol,
            correlationId: intent.signalId,
            message: `Order rejected: ${attempt.error}`,
            payload: { attemptNumber, request, error: attempt.error },
          });
          return this.result(intent, "REJECTED", attempts, trace, "EXCHANGE_REJECTED", attempt.error);
        }

        attempt.status = "TIMED_OUT";
        this.events.publish({
          level: "WARNING",
          category: "ORDER",
          symbol: intent.symbol,
          correlationId: intent.signalId,
          message: `Attempt ${attemptNumber} failed transiently: ${attempt.error}`,
          payload: { attemptNumber, error: attempt.error },
        });

        const existing = await this.reconcile(gateway, request);
        if (existing) {
          return this.handleAck(ctx, attempt, existing, settings);
        }

        if (attemptNumber < settings.maxRetryAttempts) {
          const delay = computeBackoffDelay(
            attemptNumber,
            {
              baseDelayMs: settings.retryBaseDelayMs,
              maxDelayMs: settings.retryMaxDelayMs,
              jitterRatio: settings.retryJitter,
            },
            this.random
          );
          await this.sleep(delay);
        }
      }
    }

    return this.result(
      intent,
      "FAILED",
      attempts,
      trace,
      "RETRY_EXHAUSTED",
      `${settings.maxRetryAttempts} attempts failed`
    );
  }

  /** Ask the exchange whether a failed send actually landed. */
  private async reconcile(gateway: IOrderGateway, request: IOrderRequest): Promise<IGatewayOrder | null> {
    try {
      const order = await gateway.queryOrder(request.symbol, request.clientOrderId);
      if (order) {
        logger.warning(`[Execution] Reconciled ${request.clientOrderId}: exchange has it as ${order.status}`);
      }
      return order;
    } catch (err) {
      logger.warning(`[Execution] Reconcile query failed for ${request.clientOrderId}: ${errorMessage(err)}`);
      return null;
    }
  }

  private async handleAck(
    ctx: RunContext,
    attempt: IExecutionAttempt,
    order: IGatewayOrder,
    settings: ExecutionSettings
  ): Promise<IExecutionResult> {
    const { intent, gateway, request, attempts, trace } = ctx;
    attempt.ackAt = this.clock.now();
    attempt.orderId = order.orderId;
    attempt.status = "ACKED";
    attempt.error = undefined;
    trace.ackAt = attempt.ackAt;

    let current = order;
    const deadline = attempt.ackAt + settings.fillTimeoutMs;
    while (current.status === "NEW" || current.status === "PARTIALLY_FILLED") {
      if (this.clock.now() >= deadline) {
        return this.cancelAfterTimeout(ctx, attempt, current);
      }
      await this.sleep(settings.fillPollIntervalMs);
      try {
        current = (await gateway.queryOrder(request.symbol, request.clientOrderId)) ?? current;
      } catch (err) {
        logger.warning(`[Execution] Fill poll failed for ${request.clientOrderId}: ${errorMessage(err)}`);
      }
    }

    if (current.status === "FILLED") {
      return this.applyFill(ctx, attempt, current);
    }

    attempt.status = "REJECTED";
    attempt.error = `order ${current.status}`;
    return this.result(intent, "REJECTED", attempts, trace, "EXCHANGE_REJECTED", attempt.error, current);
  }

  private async cancelAfterTimeout(
    ctx: RunContext,
    attempt: IExecutionAttempt,
    order: IGatewayOrder
  ): Promise<IExecutionResult> {
    const { intent, gateway, request, attempts, trace } = ctx;
    attempt.status = "TIMED_OUT";
    attempt.error = "fill timeout";

    let final = order;
    try {
      final = (await gateway.cancelOrder(request.symbol, request.clientOrderId)) ?? order;
    } catch (err) {
      this.events.publish({
        level: "ERROR",
        category: "ORDER",
        symbol: intent.symbol,
        correlationId: intent.signalId,
        message: `Cancel after fill timeout failed: ${errorMessage(err)}`,
        payload: { orderId: order.orderId },
      });
    }

    // A partial fill before the cancel is still a position
    if (final.executedQty > 0) {
      return this.applyFill(ctx, attempt, final);
    }
    return this.result(intent, "FAILED", attempts, trace, "FILL_TIMEOUT", attempt.error, final);
  }

  private applyFill(ctx: RunContext, attempt: IExecutionAttempt, order: IGatewayOrder): IExecutionResult {
    const { intent, attempts, trace } = ctx;
    const now = this.clock.now();
    attempt.status = "FILLED";
    attempt.fillAt = now;
    trace.fillAt = now;

    const fill: IFill = {
      signalId: intent.signalId,
      symbol: intent.symbol,
      side: intent.side,
      qty: order.executedQty,
      price: order.avgPrice,
      fee: order.fee,
      timestamp: now,
      orderId: order.orderId,
    };

    const change = this.positions.applyFill(fill);
    this.risk.applyPositionChange(change);

    this.events.publish({
      level: "INFO",
      category: "FILL",
      symbol: fill.symbol,
      correlationId: fill.signalId,
      message: `Filled ${fill.side} ${fill.qty} @ ${fill.price}`,
      payload: { ...fill, latency: latencyBreakdown(trace) },
    });
    this.events.publish({
      level: "INFO",
      category: "POSITION",
      symbol: fill.symbol,
      correlationId: fill.signalId,
      message: `${change.kind} ${fill.symbol}`,
      payload: {
        kind: change.kind,
        position: change.position,
        realizedPnl: change.realizedPnl,
        fee: change.fee,
        closedQty: change.closedQty,
        entryPrice: change.entryPrice,
        exitPrice: change.exitPrice,
        side: fill.side,
      },
    });

    return { ...this.result(intent, "FILLED", attempts, trace, undefined, undefined, order), fill };
  }

  private result(
    intent: IOrderIntent,
    status: ExecutionStatus,
    attempts: IExecutionAttempt[],
    trace: ILatencyTrace,
    reason?: ExecutionFailureReason,
    detail?: string,
    order?: IGatewayOrder
  ): IExecutionResult {
    return {
      signalId: intent.signalId,
      symbol: intent.symbol,
      status,
      reason,
      detail,
      attempts: attempts.map((a) => ({ ...a })),
      order,
      trace: { ...trace },
      fromCache: false,
    };
  }

  private publishResult(result: IExecutionResult): void {
    if (result.status === "FILLED") return;
    this.events.publish({
      level: result.status === "SKIPPED" ? "INFO" : "ERROR",
      category: "ORDER",
      symbol: result.symbol,
      correlationId: result.signalId,
      message: `${result.status}${result.reason ? ` ${result.reason}` : ""}${result.detail ? `: ${result.detail}` : ""}`,
      payload: { status: result.status, reason: result.reason, attempts: result.attempts.length },
    });
  }
}

function latencyBreakdown(trace: ILatencyTrace): Record<string, number | null> {
  const delta = (from: number | undefined, to: number | undefined) =>
    from === undefined || to === undefined ? null : to - from;
  return {
    signalToDecisionMs: delta(trace.signalAt, trace.decidedAt),
    decisionToSendMs: delta(trace.decidedAt, trace.sentAt),
    sendToAckMs: delta(trace.sentAt, trace.ackAt),
    ackToFillMs: delta(trace.ackAt, trace.fillAt),
    signalToFillMs: delta(trace.signalAt, trace.fillAt),
  };
}
