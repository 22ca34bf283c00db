import { RiskSettings, SettingsStore } from "../config/settings";
import { IEventSink } from "../types/event.types";
import { IOrderIntent, IPosition, IPositionChange } from "../types/execution.types";
import { IRiskDecision, IRiskState, RiskBlockReason } from "../types/risk.types";
import { ISignal } from "../types/signal.types";
import { Clock, systemClock, tradingDayOf } from "../utils/clock";
import { clamp } from "../utils/mathUtils";

const HOUR_MS = 3_600_000;

interface Reservation {
  symbol: string;
  notional: number;
}

interface Violation {
  reason: RiskBlockReason;
  detail: string;
}

export interface RiskGateDecision {
  decision: IRiskDecision;
  intent: IOrderIntent | null;
}

/**
 * Account-wide risk authority. Every entry passes through decide(), which
 * never awaits: checks and the exposure reservation happen in one
 * synchronous step, so concurrent symbols always see a consistent state.
 */
export class RiskGate {
  private equity: number;
  private startingEquity: number;
  private dailyPnl = 0;
  private unrealizedPnl = 0;
  private tradingDay: string;
  private exposure: Map<string, number> = new Map();
  private reservations: Map<string, Reservation> = new Map();
  private consecutiveLosses = 0;
  private cooldownUntil = 0;
  private cooldownReason: string | null = null;
  private symbolCooldownUntil: Map<string, number> = new Map();
  private killSwitchEngaged = false;
  private killSwitchReason: string | null = null;
  private entriesPaused = false;
  private pausedSymbols: Set<string> = new Set();
  private staleSymbols: Set<string> = new Set();
  private acceptedAt: number[] = [];

  constructor(
    private readonly settings: SettingsStore,
    private readonly events: IEventSink,
    private readonly clock: Clock = systemClock
  ) {
    this.equity = settings.current.account.startingEquity;
    this.startingEquity = this.equity;
    this.tradingDay = tradingDayOf(clock.now());
  }

  // ==================== DECISIONS ====================

  decide(signal: ISignal): RiskGateDecision {
    const now = this.clock.now();
    const risk = this.settings.current.risk;
    this.rollIfNewDay(now);

    const notional = this.sizeFor(signal.confidence, risk);
    const violation = this.firstViolation(signal.symbol, notional, now, risk);

    if (violation) {
      const decision: IRiskDecision = {
        signalId: signal.id,
        symbol: signal.symbol,
        outcome: "BLOCK",
        blockedReason: violation.reason,
        detail: violation.detail,
        decidedAt: now,
      };
      this.events.publish({
        level: "WARNING",
        category: "RISK",
        symbol: signal.symbol,
        correlationId: signal.id,
        message: `BLOCK ${violation.reason}: ${violation.detail}`,
        payload: { outcome: "BLOCK", blockedReason: violation.reason, detail: violation.detail },
      });
      return { decision, intent: null };
    }

    this.reservations.set(signal.id, { symbol: signal.symbol, notional });
    this.acceptedAt.push(now);
    if (risk.symbolCooldownMs > 0) {
      this.symbolCooldownUntil.set(signal.symbol, now + risk.symbolCooldownMs);
    }

    const decision: IRiskDecision = {
      signalId: signal.id,
      symbol: signal.symbol,
      outcome: "ACCEPT",
      notional,
      decidedAt: now,
    };
    const intent: IOrderIntent = {
      signalId: signal.id,
      symbol: signal.symbol,
      side: signal.side,
      notional,
      priceHint: signal.features.price,
      confidence: signal.confidence,
      reduceOnly: false,
      signalTimestamp: signal.timestamp,
      decidedAt: now,
    };
    this.events.publish({
      level: "INFO",
      category: "RISK",
      symbol: signal.symbol,
      correlationId: signal.id,
      message: `ACCEPT ${signal.side} notional $${notional.toFixed(2)}`,
      payload: { outcome: "ACCEPT", notional, confidence: signal.confidence },
    });
    return { decision, intent };
  }

  /**
   * Risk budget scaled by confidence over the stop distance, capped by
   * the per-trade notional limit and the margin-based order value.
   */
  sizeFor(confidence: number, risk: RiskSettings = this.settings.current.risk): number {
    const budget = this.equity * (risk.maxTradeRiskPct / 100) * clamp(confidence, 0.1, 1);
    const sized = budget / (risk.stopDistancePct / 100);
    const orderValueCap = this.equity * (risk.orderValuePctEquity / 100) * risk.maxLeverage;
    const notional = Math.min(sized, risk.maxNotionalPerTrade, orderValueCap);
    return Number.isFinite(notional) && notional > 0 ? Math.round(notional * 100) / 100 : 0;
  }

  private firstViolation(symbol: string, notional: number, now: number, risk: RiskSettings): Violation | null {
    // 1. Kill switch
    if (this.killSwitchEngaged) {
      return { reason: "KILL_SWITCH", detail: this.killSwitchReason ?? "engaged" };
    }

    // 2. Operator pause
    if (this.entriesPaused || this.pausedSymbols.has(symbol)) {
      return { reason: "ENTRIES_PAUSED", detail: this.entriesPaused ? "all symbols" : symbol };
    }

    // 3. Feed liveness
    if (this.staleSymbols.has(symbol)) {
      return { reason: "FEED_STALE", detail: `${symbol} feed is stale` };
    }

    // 4. Daily loss
    const pnl = this.dailyPnl + (risk.includeUnrealizedPnl ? this.unrealizedPnl : 0);
    const lossLimit = this.startingEquity * (risk.maxDailyLossPct / 100);
    if (-pnl >= lossLimit) {
      return {
        reason: "DAILY_LOSS_LIMIT",
        detail: `loss $${(-pnl).toFixed(2)} >= limit $${lossLimit.toFixed(2)}`,
      };
    }

    // 5. Account exposure
    const accountExposure = this.totalExposure() + this.totalReserved();
    if (accountExposure + notional > risk.maxAccountExposure) {
      return {
        reason: "ACCOUNT_EXPOSURE_LIMIT",
        detail: `$${accountExposure.toFixed(0)} + $${notional.toFixed(0)} > max $${risk.maxAccountExposure}`,
      };
    }

    // 6. Symbol exposure
    const symbolExposure = (this.exposure.get(symbol) ?? 0) + this.reservedFor(symbol);
    if (symbolExposure + notional > risk.maxExposurePerSymbol) {
      return {
        reason: "SYMBOL_EXPOSURE_LIMIT",
        detail: `${symbol} $${symbolExposure.toFixed(0)} + $${notional.toFixed(0)} > max $${risk.maxExposurePerSymbol}`,
      };
    }

    // 7. Position counts
    const openSymbols = this.symbolsWithExposure();
    if (!openSymbols.has(symbol) && openSymbols.size >= risk.maxPositions) {
      return { reason: "POSITION_LIMIT", detail: `${openSymbols.size} >= max ${risk.maxPositions}` };
    }
    const symbolPositions = (this.exposure.has(symbol) ? 1 : 0) + this.reservationCount(symbol);
    if (symbolPositions >= risk.maxPositionsPerSymbol) {
      return {
        reason: "SYMBOL_POSITION_LIMIT",
        detail: `${symbol} ${symbolPositions} >= max ${risk.maxPositionsPerSymbol}`,
      };
    }

    // 8. Cooldowns
    if (now < this.cooldownUntil) {
      return {
        reason: "COOLDOWN_ACTIVE",
        detail: `${this.cooldownReason ?? "cooldown"} (${Math.ceil((this.cooldownUntil - now) / 1000)}s remaining)`,
      };
    }
    const symbolCooldown = this.symbolCooldownUntil.get(symbol) ?? 0;
    if (now < symbolCooldown) {
      return {
        reason: "COOLDOWN_ACTIVE",
        detail: `${symbol} cooldown (${Math.ceil((symbolCooldown - now) / 1000)}s remaining)`,
      };
    }

    // 9. Loss streak
    if (this.consecutiveLosses >= risk.maxConsecutiveLosses) {
      return {
        reason: "CONSECUTIVE_LOSS_LIMIT",
        detail: `${this.consecutiveLosses} consecutive losses >= max ${risk.maxConsecutiveLosses}`,
      };
    }

    // 10. Trade rate
    this.acceptedAt = this.acceptedAt.filter((t) => now - t < HOUR_MS);
    if (this.acceptedAt.length >= risk.maxTradesPerHour) {
      return {
        reason: "TRADE_RATE_LIMIT",
        detail: `${this.acceptedAt.length} entries in the last hour >= max ${risk.maxTradesPerHour}`,
      };
    }

    // 11. Size
    if (notional <= 0) {
      return { reason: "INVALID_SIZE", detail: `sized notional ${notional}` };
    }
    return null;
  }

  // ==================== STATE UPDATES ====================

  releaseReservation(signalId: string, reason: string): void {
    const reservation = this.reservations.get(signalId);
    if (!reservation) return;
    this.reservations.delete(signalId);
    this.events.publish({
      level: "DEBUG",
      category: "RISK",
      symbol: reservation.symbol,
      correlationId: signalId,
      message: `Released $${reservation.notional.toFixed(2)} reservation (${reason})`,
      payload: { notional: reservation.notional, reason },
    });
  }

  /**
   * Fold an authoritative position change into exposure and PnL. Closing
   * a trade at a net loss extends the loss streak and starts a cooldown.
   */
  applyPositionChange(change: IPositionChange): void {
    const now = this.clock.now();
    const risk = this.settings.current.risk;
    this.reservations.delete(change.signalId);
    this.setExposure(change.symbol, change.position);

    const net = change.realizedPnl - change.fee;
    this.dailyPnl += net;
    this.equity += net;

    if (change.closedQty > 0) {
      if (net < 0) {
        this.consecutiveLosses++;
        if (risk.lossCooldownMs > 0) {
          this.startCooldown(now + risk.lossCooldownMs, `loss cooldown after ${change.symbol}`);
        }
      } else if (net > 0) {
        this.consecutiveLosses = 0;
      }
    }

    this.events.publish({
      level: "DEBUG",
      category: "RISK",
      symbol: change.symbol,
      correlationId: change.signalId,
      message: `${change.kind} net $${net.toFixed(4)} | daily $${this.dailyPnl.toFixed(2)}`,
      payload: {
        kind: change.kind,
        net,
        dailyPnl: this.dailyPnl,
        equity: this.equity,
        consecutiveLosses: this.consecutiveLosses,
      },
    });
  }

  /** Rebuild exposure from a recovered position table. */
  syncPositions(positions: IPosition[]): void {
    this.exposure.clear();
    for (const position of positions) this.setExposure(position.symbol, position);
  }

  markToMarket(unrealizedPnl: number): void {
    this.unrealizedPnl = unrealizedPnl;
  }

  /**
   * Volatility kill: above the threshold every entry cools down. Returns
   * true when this observation started a new cooldown.
   */
  observeVolatility(symbol: string, volatility: number): boolean {
    const risk = this.settings.current.risk;
    if (volatility <= risk.volatilityKillThreshold) return false;
    const now = this.clock.now();
    const alreadyCooling = now < this.cooldownUntil;
    this.startCooldown(now + risk.volatilityCooldownMs, `volatility kill on ${symbol}`);
    if (!alreadyCooling) {
      this.events.publish({
        level: "WARNING",
        category: "RISK",
        symbol,
        message: `Volatility ${volatility.toFixed(5)} > ${risk.volatilityKillThreshold}, entries cooling down`,
        payload: { volatility, threshold: risk.volatilityKillThreshold, cooldownUntil: this.cooldownUntil },
      });
    }
    return !alreadyCooling;
  }

  setFeedLive(symbol: string, live: boolean): void {
    if (live) this.staleSymbols.delete(symbol);
    else this.staleSymbols.add(symbol);
  }

  pauseEntries(symbol?: string): void {
    if (symbol) this.pausedSymbols.add(symbol);
    else this.entriesPaused = true;
  }

  /** Resume also clears the loss streak, which otherwise holds until the day rolls. */
  resumeEntries(symbol?: string): void {
    if (symbol) {
      this.pausedSymbols.delete(symbol);
      return;
    }
    this.entriesPaused = false;
    this.pausedSymbols.clear();
    this.consecutiveLosses = 0;
  }

  /** Idempotent; returns false when already engaged. */
  engageKillSwitch(reason: string): boolean {
    if (this.killSwitchEngaged) return false;
    this.killSwitchEngaged = true;
    this.killSwitchReason = reason;
    this.events.publish({
      level: "ERROR",
      category: "RISK",
      message: `Kill switch engaged: ${reason}`,
      payload: { reason },
    });
    return true;
  }

  disengageKillSwitch(): boolean {
    if (!this.killSwitchEngaged) return false;
    this.killSwitchEngaged = false;
    this.killSwitchReason = null;
    this.events.publish({ level: "WARNING", category: "RISK", message: "Kill switch disengaged" });
    return true;
  }

  isKillSwitchEngaged(): boolean {
    return this.killSwitchEngaged;
  }

  rollTradingDay(day: string = tradingDayOf(this.clock.now())): void {
    const previous = this.tradingDay;
    this.tradingDay = day;
    this.dailyPnl = 0;
    this.consecutiveLosses = 0;
    this.startingEquity = this.equity;
    this.events.publish({
      level: "INFO",
      category: "RISK",
      message: `Trading day rolled ${previous} -> ${day}`,
      payload: { previous, day, equity: this.equity },
    });
  }

  /** Restore counters from a snapshot; daily counters only for the same day. */
  restore(state: IRiskState): void {
    this.equity = state.equity;
    this.startingEquity = state.startingEquity;
    this.killSwitchEngaged = state.killSwitchEngaged;
    this.killSwitchReason = state.killSwitchReason;
    this.entriesPaused = state.entriesPaused;
    this.pausedSymbols = new Set(state.pausedSymbols);
    this.cooldownUntil = state.cooldownUntil;
    this.cooldownReason = state.cooldownReason;
    this.symbolCooldownUntil = new Map(Object.entries(state.symbolCooldownUntil));
    if (state.tradingDay === this.tradingDay) {
      this.dailyPnl = state.dailyPnl;
      this.consecutiveLosses = state.consecutiveLosses;
    }
  }

  snapshot(): IRiskState {
    const now = this.clock.now();
    const openPositionsBySymbol: Record<string, number> = {};
    for (const symbol of this.exposure.keys()) openPositionsBySymbol[symbol] = 1;
    const reservedNotional: Record<string, number> = {};
    for (const [signalId, reservation] of this.reservations) reservedNotional[signalId] = reservation.notional;

    return {
      equity: this.equity,
      startingEquity: this.startingEquity,
      dailyPnl: this.dailyPnl,
      unrealizedPnl: this.unrealizedPnl,
      tradingDay: this.tradingDay,
      openPositionsBySymbol,
      exposureBySymbol: Object.fromEntries(this.exposure),
      reservedNotional,
      consecutiveLosses: this.consecutiveLosses,
      cooldownUntil: this.cooldownUntil,
      cooldownReason: this.cooldownReason,
      symbolCooldownUntil: Object.fromEntries(this.symbolCooldownUntil),
      killSwitchEngaged: this.killSwitchEngaged,
      killSwitchReason: this.killSwitchReason,
      entriesPaused: this.entriesPaused,
      pausedSymbols: Array.from(this.pausedSymbols),
      staleSymbols: Array.from(this.staleSymbols),
      tradesLastHour: this.acceptedAt.filter((t) => now - t < HOUR_MS).length,
    };
  }

  // ==================== HELPERS ====================

  private rollIfNewDay(now: number): void {
    const day = tradingDayOf(now);
    if (day !== this.tradingDay) this.rollTradingDay(day);
  }

  private startCooldown(until: number, reason: string): void {
    if (until > this.cooldownUntil) {
      this.cooldownUntil = until;
      this.cooldownReason = reason;
    }
  }

  private setExposure(symbol: string, position: IPosition | null): void {
    if (!position || position.qty <= 0) {
      this.exposure.delete(symbol);
      return;
    }
    this.exposure.set(symbol, position.qty * position.entryPrice);
  }

  private totalExposure(): number {
    let total = 0;
    for (const value of this.exposure.values()) total += value;
    return total;
  }

  private totalReserved(): number {
    let total = 0;
    for (const reservation of this.reservations.values()) total += reservation.notional;
    return total;
  }

  private reservedFor(symbol: string): number {
    let total = 0;
    for (const reservation of this.reservations.values()) {
      if (reservation.symbol === symbol) total += reservation.notional;
    }
    return total;
  }

  private reservationCount(symbol: string): number {
    let count = 0;
    for (const reservation of this.reservations.values()) {
      if (reservation.symbol === symbol) count++;
    }
    return count;
  }

  private symbolsWithExposure(): Set<string> {
    const symbols = new Set(this.exposure.keys());
    for (const reservation of this.reservations.values()) symbols.add(reservation.symbol);
    return symbols;
  }
}
