import { v4 as uuidv4 } from "uuid";
import { SettingsStore, StrategySettings } from "../config/settings";
import { IEventSink } from "../types/event.types";
import { IFeatureSnapshot } from "../types/market.types";
import {
  ImpulseDirection,
  ISignal,
  ISymbolStateView,
  SignalReasonCode,
  SignalState,
  StateResetReason,
} from "../types/signal.types";
import { clamp, sign } from "../utils/mathUtils";

interface SymbolCycle {
  state: SignalState;
  armed: boolean;
  direction: ImpulseDirection | null;
  cycleStartedAt: number | null;
  path: SignalState[];
  peakDisplacementPct: number;
  peakVolumeZScore: number;
  peakTradeRateRatio: number;
  exhaustionRatio: number;
  exhaustionPrice: number;
  lowLiquiditySeen: boolean;
  filterReported: boolean;
}

function freshCycle(armed: boolean): SymbolCycle {
  return {
    state: "BUILDUP",
    armed,
    direction: null,
    cycleStartedAt: null,
    path: ["BUILDUP"],
    peakDisplacementPct: 0,
    peakVolumeZScore: 0,
    peakTradeRateRatio: 0,
    exhaustionRatio: 0,
    exhaustionPrice: 0,
    lowLiquiditySeen: false,
    filterReported: false,
  };
}

function directionSign(direction: ImpulseDirection | null): number {
  if (direction === "UP") return 1;
  if (direction === "DOWN") return -1;
  return 0;
}

/**
 * Weighted average of per-feature scores. Each feature scores
 * value / threshold / saturation, clamped to [0, 1].
 */
export function computeConfidence(
  strategy: StrategySettings,
  peaks: { displacementPct: number; volumeZScore: number; tradeRateRatio: number; exhaustionRatio: number }
): number {
  const s = strategy.confidenceSaturation;
  const score = (value: number, threshold: number) => clamp(value / threshold / s, 0, 1);
  const w = strategy.confidenceWeights;
  const totalWeight = w.displacement + w.volume + w.tradeRate + w.exhaustion;
  if (totalWeight <= 0) return 0;

  const weighted =
    w.displacement * score(Math.abs(peaks.displacementPct), strategy.impulseThresholdPct) +
    w.volume * score(peaks.volumeZScore, strategy.volumeZScoreThreshold) +
    w.tradeRate * score(peaks.tradeRateRatio, strategy.tradeRateBurstThreshold) +
    w.exhaustion * score(peaks.exhaustionRatio, strategy.exhaustionRatioThreshold);
  return clamp(weighted / totalWeight, 0, 1);
}

/**
 * Per-symbol BUILDUP → IMPULSE → CLIMAX → EXHAUSTION → REBALANCE cycle.
 *
 * A cycle emits at most one Signal. After an impulse the symbol is disarmed
 * until displacement falls back under the impulse threshold, so the same
 * move cannot start a second cycle.
 */
export class SignalStateMachine {
  private cycles: Map<string, SymbolCycle> = new Map();

  constructor(
    private readonly settings: SettingsStore,
    private readonly events: IEventSink,
    private readonly newId: () => string = uuidv4
  ) {}

  getState(symbol: string): SignalState {
    return this.cycles.get(symbol)?.state ?? "BUILDUP";
  }

  view(): ISymbolStateView[] {
    return Array.from(this.cycles.entries()).map(([symbol, cycle]) => ({
      symbol,
      state: cycle.state,
      direction: cycle.direction,
      cycleStartedAt: cycle.cycleStartedAt,
      armed: cycle.armed,
    }));
  }

  /** Evaluate one feature snapshot. Returns the Signal when a cycle completes. */
  update(features: IFeatureSnapshot): ISignal | null {
    const strategy = this.settings.current.strategy;
    const cycle = this.cycleFor(features.symbol);

    if (
      cycle.state !== "BUILDUP" &&
      cycle.cycleStartedAt !== null &&
      features.timestamp - cycle.cycleStartedAt >= strategy.hardTimeStopMs
    ) {
      this.resetCycle(features.symbol, cycle, "TIME_STOP", features.timestamp);
      return null;
    }

    const absDisplacement = Math.abs(features.displacementPct);

    switch (cycle.state) {
      case "BUILDUP": {
        if (!cycle.armed) {
          if (absDisplacement < strategy.impulseThresholdPct) cycle.armed = true;
          return null;
        }
        if (absDisplacement >= strategy.impulseThresholdPct) {
          cycle.direction = features.displacementPct > 0 ? "UP" : "DOWN";
          cycle.cycleStartedAt = features.timestamp;
          cycle.armed = false;
          this.trackPeaks(cycle, features);
          this.transition(features.symbol, cycle, "IMPULSE", features, `displacement ${features.displacementPct.toFixed(3)}%`);
        }
        return null;
      }

      case "IMPULSE": {
        this.trackPeaks(cycle, features);
        const sameDirection = sign(features.displacementPct) === directionSign(cycle.direction);
        if (
          sameDirection &&
          features.tradeRateRatio >= strategy.tradeRateBurstThreshold &&
          features.volumeZScore >= strategy.volumeZScoreThreshold
        ) {
          this.transition(
            features.symbol,
            cycle,
            "CLIMAX",
            features,
            `rate ${features.tradeRateRatio.toFixed(2)}x, volume z ${features.volumeZScore.toFixed(2)}`
          );
        }
        return null;
      }

      case "CLIMAX": {
        this.trackPeaks(cycle, features);
        if (features.exhaustionRatio < strategy.exhaustionRatioThreshold) return null;

        if (strategy.regimeFilterEnabled && this.trendContradicts(cycle, features, strategy)) {
          if (!cycle.filterReported) {
            cycle.filterReported = true;
            this.events.publish({
              level: "INFO",
              category: "FILTER",
              symbol: features.symbol,
              message: "REGIME_FILTER suppressed exhaustion",
              payload: {
                filter: "REGIME_FILTER",
                direction: cycle.direction,
                trendStrengthPct: features.trendStrengthPct,
                threshold: strategy.trendStrengthThresholdPct,
              },
            });
          }
          return null;
        }

        cycle.exhaustionRatio = features.exhaustionRatio;
        cycle.exhaustionPrice = features.price;
        this.transition(features.symbol, cycle, "EXHAUSTION", features, `exhaustion ${features.exhaustionRatio.toFixed(2)}`);
        return null;
      }

      case "EXHAUSTION": {
        this.trackPeaks(cycle, features);
        const reversed =
          cycle.direction === "UP"
            ? features.price < cycle.exhaustionPrice
            : features.price > cycle.exhaustionPrice;
        if (!reversed) return null;

        this.transition(features.symbol, cycle, "REBALANCE", features, "structure confirmed");
        return this.emitSignal(cycle, features, strategy);
      }

      case "REBALANCE": {
        this.transition(features.symbol, cycle, "BUILDUP", features, "cycle complete");
        this.restart(features.symbol, cycle);
        if (absDisplacement < strategy.impulseThresholdPct) this.cycleFor(features.symbol).armed = true;
        return null;
      }
    }
  }

  /** Force a symbol back to BUILDUP (stale feed, settings change). */
  reset(symbol: string, reason: StateResetReason, timestamp: number): void {
    const cycle = this.cycles.get(symbol);
    if (!cycle) return;
    this.resetCycle(symbol, cycle, reason, timestamp);
  }

  resetAll(reason: StateResetReason, timestamp: number): void {
    for (const symbol of Array.from(this.cycles.keys())) {
      this.reset(symbol, reason, timestamp);
    }
  }

  private cycleFor(symbol: string): SymbolCycle {
    let cycle = this.cycles.get(symbol);
    if (!cycle) {
      cycle = freshCycle(true);
      this.cycles.set(symbol, cycle);
    }
    return cycle;
  }

  private restart(symbol: string, previous: SymbolCycle): void {
    this.cycles.set(symbol, freshCycle(previous.armed));
  }

  private resetCycle(symbol: string, cycle: SymbolCycle, reason: StateResetReason, timestamp: number): void {
    if (cycle.state === "BUILDUP") {
      if (reason === "STALE") cycle.armed = false;
      return;
    }
    this.events.publish({
      level: reason === "TIME_STOP" ? "INFO" : "WARNING",
      category: "SIGNAL",
      symbol,
      message: `${cycle.state} -> BUILDUP (${reason})`,
      payload: { from: cycle.state, to: "BUILDUP", reason, timestamp },
    });
    // Re-arms only once displacement is back under the threshold
    this.cycles.set(symbol, freshCycle(false));
  }

  private trackPeaks(cycle: SymbolCycle, features: IFeatureSnapshot): void {
    const direction = directionSign(cycle.direction);
    const directional = features.displacementPct * direction;
    if (directional > cycle.peakDisplacementPct) cycle.peakDisplacementPct = directional;
    if (features.volumeZScore > cycle.peakVolumeZScore) cycle.peakVolumeZScore = features.volumeZScore;
    if (features.tradeRateRatio > cycle.peakTradeRateRatio) cycle.peakTradeRateRatio = features.tradeRateRatio;
    if (features.lowLiquidity) cycle.lowLiquiditySeen = true;
  }

  /** True when the prevailing trend runs with the impulse strongly enough to veto a fade. */
  private trendContradicts(cycle: SymbolCycle, features: IFeatureSnapshot, strategy: StrategySettings): boolean {
    const withImpulse = sign(features.trendStrengthPct) === directionSign(cycle.direction);
    return withImpulse && Math.abs(features.trendStrengthPct) >= strategy.trendStrengthThresholdPct;
  }

  private transition(
    symbol: string,
    cycle: SymbolCycle,
    to: SignalState,
    features: IFeatureSnapshot,
    reason: string
  ): void {
    const from = cycle.state;
    cycle.state = to;
    cycle.path.push(to);
    this.events.publish({
      level: "DEBUG",
      category: "SIGNAL",
      symbol,
      message: `${from} -> ${to} (${reason})`,
      payload: { from, to, reason, timestamp: features.timestamp, price: features.price },
    });
  }

  private emitSignal(cycle: SymbolCycle, features: IFeatureSnapshot, strategy: StrategySettings): ISignal {
    const direction: ImpulseDirection = cycle.direction === "DOWN" ? "DOWN" : "UP";
    const reasonCodes: SignalReasonCode[] = [
      "IMPULSE_DISPLACEMENT",
      "VOLUME_ZSCORE",
      "TRADE_RATE_BURST",
      "EXHAUSTION_RATIO",
      "STRUCTURE_CONFIRMED",
    ];
    if (strategy.regimeFilterEnabled) reasonCodes.push("REGIME_OK");
    if (cycle.lowLiquiditySeen) reasonCodes.push("LOW_LIQUIDITY");

    const confidence = computeConfidence(strategy, {
      displacementPct: cycle.peakDisplacementPct,
      volumeZScore: cycle.peakVolumeZScore,
      tradeRateRatio: cycle.peakTradeRateRatio,
      exhaustionRatio: cycle.exhaustionRatio,
    });

    const signal: ISignal = {
      id: this.newId(),
      symbol: features.symbol,
      timestamp: features.timestamp,
      statePath: Object.freeze([...cycle.path]),
      side: direction === "UP" ? "SELL" : "BUY",
      impulseDirection: direction,
      confidence,
      reasonCodes: Object.freeze(reasonCodes),
      features: Object.freeze({ ...features }),
    };
    Object.freeze(signal);

    this.events.publish({
      level: "INFO",
      category: "SIGNAL",
      symbol: signal.symbol,
      correlationId: signal.id,
      message: `Signal ${signal.side} confidence ${confidence.toFixed(3)}`,
      payload: {
        signalId: signal.id,
        side: signal.side,
        confidence,
        statePath: signal.statePath,
        reasonCodes: signal.reasonCodes,
        price: features.price,
      },
    });
    return signal;
  }
}
