import { describe, expect, it } from "vitest";
import { RiskGate } from "../src/engine/RiskGate";
import { IPositionChange } from "../src/types/execution.types";
import { BASE_TIME, makeSettings, makeSignal, ManualClock, RecordingSink } from "./helpers";

function setup(patch: unknown = {}) {
  const clock = new ManualClock();
  const settings = makeSettings(patch);
  const events = new RecordingSink(clock);
  const gate = new RiskGate(settings, events, clock);
  return { clock, settings, events, gate };
}

function closedTrade(symbol: string, realizedPnl: number, signalId = "exit-1"): IPositionChange {
  return {
    kind: "CLOSED",
    symbol,
    signalId,
    position: null,
    realizedPnl,
    fee: 0,
    closedQty: 1,
    entryPrice: 100,
    exitPrice: 100 + realizedPnl,
    timestamp: BASE_TIME,
  };
}

describe("RiskGate", () => {
  it("accepts a clean signal, sizes it and reserves the exposure", () => {
    const { gate, events } = setup();
    const { decision, intent } = gate.decide(makeSignal({ id: "sig-1", confidence: 0.8 }));

    expect(decision.outcome).toBe("ACCEPT");
    expect(decision.notional).toBe(250);
    expect(intent).toEqual({
      signalId: "sig-1",
      symbol: "BTCUSDT",
      side: "SELL",
      notional: 250,
      priceHint: 100,
      confidence: 0.8,
      reduceOnly: false,
      signalTimestamp: BASE_TIME,
      decidedAt: BASE_TIME,
    });
    expect(gate.snapshot().reservedNotional).toEqual({ "sig-1": 250 });
    expect(events.messages("RISK")).toEqual(["ACCEPT SELL notional $250.00"]);
  });

  it("blocks on the daily loss limit", () => {
    const { gate } = setup({ risk: { maxDailyLossPct: 2 } });
    gate.restore({ ...gate.snapshot(), equity: 10_000, dailyPnl: -210 });

    const { decision, intent } = gate.decide(makeSignal());
    expect(intent).toBeNull();
    expect(decision.outcome).toBe("BLOCK");
    expect(decision.blockedReason).toBe("DAILY_LOSS_LIMIT");
    expect(decision.detail).toBe("loss $210.00 >= limit $200.00");
  });

  it("measures the daily loss limit against the equity the day started with", () => {
    const { gate } = setup({ risk: { maxDailyLossPct: 2 } });
    gate.restore({ ...gate.snapshot(), startingEquity: 10_000, equity: 9_801, dailyPnl: -199 });
    expect(gate.decide(makeSignal({ id: "a" })).decision.outcome).toBe("ACCEPT");

    gate.restore({ ...gate.snapshot(), startingEquity: 10_000, equity: 9_800, dailyPnl: -200 });
    const { decision } = gate.decide(makeSignal({ id: "b", symbol: "ETHUSDT" }));
    expect(decision.blockedReason).toBe("DAILY_LOSS_LIMIT");
    expect(decision.detail).toBe("loss $200.00 >= limit $200.00");
  });

  it("counts unrealized losses toward the daily limit when configured", () => {
    const { gate } = setup({ risk: { maxDailyLossPct: 2, includeUnrealizedPnl: true } });
    gate.markToMarket(-205);
    expect(gate.decide(makeSignal()).decision.blockedReason).toBe("DAILY_LOSS_LIMIT");
  });

  it("lets the kill switch win over every other reason", () => {
    const { gate } = setup();
    gate.pauseEntries();
    gate.setFeedLive("BTCUSDT", false);
    expect(gate.engageKillSwitch("operator")).toBe(true);
    expect(gate.engageKillSwitch("again")).toBe(false);

    const { decision } = gate.decide(makeSignal());
    expect(decision.blockedReason).toBe("KILL_SWITCH");
    expect(decision.detail).toBe("operator");
  });

  it("blocks entries while paused and resumes them", () => {
    const { gate } = setup();
    gate.pauseEntries();
    expect(gate.decide(makeSignal({ id: "a" })).decision.blockedReason).toBe("ENTRIES_PAUSED");
    gate.resumeEntries();
    expect(gate.decide(makeSignal({ id: "b" })).decision.outcome).toBe("ACCEPT");
  });

  it("blocks only the symbol whose feed is stale", () => {
    const { gate } = setup();
    gate.setFeedLive("BTCUSDT", false);
    expect(gate.decide(makeSignal({ id: "a" })).decision.blockedReason).toBe("FEED_STALE");
    expect(gate.decide(makeSignal({ id: "b", symbol: "ETHUSDT" })).decision.outcome).toBe("ACCEPT");
  });

  it("enforces account exposure including reservations", () => {
    const { gate } = setup({ risk: { maxAccountExposure: 400 } });
    expect(gate.decide(makeSignal({ id: "a" })).decision.outcome).toBe("ACCEPT");
    expect(gate.decide(makeSignal({ id: "b", symbol: "ETHUSDT" })).decision.blockedReason).toBe(
      "ACCOUNT_EXPOSURE_LIMIT"
    );
  });

  it("enforces the open position count across symbols", () => {
    const { gate } = setup({ risk: { maxPositions: 1 } });
    gate.decide(makeSignal({ id: "a" }));
    expect(gate.decide(makeSignal({ id: "b", symbol: "ETHUSDT" })).decision.blockedReason).toBe("POSITION_LIMIT");
  });

  it("allows one position per symbol while a reservation is pending", () => {
    const { gate } = setup();
    gate.decide(makeSignal({ id: "a" }));
    expect(gate.decide(makeSignal({ id: "b" })).decision.blockedReason).toBe("SYMBOL_POSITION_LIMIT");
  });

  it("applies the symbol cooldown after an accepted entry", () => {
    const { gate, clock } = setup();
    gate.decide(makeSignal({ id: "a" }));
    gate.releaseReservation("a", "SKIPPED");

    const blocked = gate.decide(makeSignal({ id: "b" })).decision;
    expect(blocked.blockedReason).toBe("COOLDOWN_ACTIVE");
    expect(blocked.detail).toBe("BTCUSDT cooldown (45s remaining)");

    clock.advance(45_000);
    expect(gate.decide(makeSignal({ id: "c" })).decision.outcome).toBe("ACCEPT");
  });

  it("cools down after a losing trade and stops after the loss streak", () => {
    const { gate, clock } = setup({ risk: { lossCooldownMs: 10_000, maxConsecutiveLosses: 2 } });
    gate.applyPositionChange(closedTrade("BTCUSDT", -5, "x1"));
    expect(gate.decide(makeSignal({ id: "a" })).decision.blockedReason).toBe("COOLDOWN_ACTIVE");

    gate.applyPositionChange(closedTrade("ETHUSDT", -5, "x2"));
    clock.advance(10_000);
    expect(gate.decide(makeSignal({ id: "b" })).decision.blockedReason).toBe("CONSECUTIVE_LOSS_LIMIT");

    gate.resumeEntries();
    expect(gate.snapshot().consecutiveLosses).toBe(0);
    expect(gate.decide(makeSignal({ id: "c" })).decision.outcome).toBe("ACCEPT");
  });

  it("resets the loss streak on a winning trade", () => {
    const { gate } = setup({ risk: { lossCooldownMs: 0 } });
    gate.applyPositionChange(closedTrade("BTCUSDT", -5, "x1"));
    gate.applyPositionChange(closedTrade("BTCUSDT", 8, "x2"));
    const state = gate.snapshot();
    expect(state.consecutiveLosses).toBe(0);
    expect(state.dailyPnl).toBe(3);
    expect(state.equity).toBe(10_003);
  });

  it("limits accepted entries per hour", () => {
    const { gate } = setup({ risk: { maxTradesPerHour: 2 } });
    gate.decide(makeSignal({ id: "a", symbol: "BTCUSDT" }));
    gate.decide(makeSignal({ id: "b", symbol: "ETHUSDT" }));
    expect(gate.decide(makeSignal({ id: "c", symbol: "SOLUSDT" })).decision.blockedReason).toBe("TRADE_RATE_LIMIT");
  });

  it("starts one global cooldown on a volatility spike", () => {
    const { gate, events } = setup({ risk: { volatilityKillThreshold: 0.005, volatilityCooldownMs: 30_000 } });
    expect(gate.observeVolatility("BTCUSDT", 0.004)).toBe(false);
    expect(gate.observeVolatility("BTCUSDT", 0.008)).toBe(true);
    expect(gate.observeVolatility("BTCUSDT", 0.009)).toBe(false);
    expect(events.events.filter((e) => e.category === "RISK" && e.level === "WARNING")).toHaveLength(1);

    const { decision } = gate.decide(makeSignal({ symbol: "ETHUSDT" }));
    expect(decision.blockedReason).toBe("COOLDOWN_ACTIVE");
    expect(decision.detail).toBe("volatility kill on BTCUSDT (30s remaining)");
  });

  it("turns a position change into exposure and drops the reservation", () => {
    const { gate } = setup();
    gate.decide(makeSignal({ id: "a" }));
    gate.applyPositionChange({
      kind: "OPENED",
      symbol: "BTCUSDT",
      signalId: "a",
      position: {
        symbol: "BTCUSDT",
        side: "SHORT",
        qty: 2.5,
        entryPrice: 100,
        openedAt: BASE_TIME,
        markPrice: 100,
        unrealizedPnl: 0,
      },
      realizedPnl: 0,
      fee: 0.1,
      closedQty: 0,
      timestamp: BASE_TIME,
    });

    const state = gate.snapshot();
    expect(state.reservedNotional).toEqual({});
    expect(state.exposureBySymbol).toEqual({ BTCUSDT: 250 });
    expect(state.dailyPnl).toBeCloseTo(-0.1, 10);
    expect(state.consecutiveLosses).toBe(0);
  });

  it("sizes by risk budget and confidence within the notional caps", () => {
    const { gate } = setup({ risk: { maxNotionalPerTrade: 100_000 } });
    // 0.5% of 10k over a 1% stop, scaled by confidence, capped at 2.5% x 5 of equity
    expect(gate.sizeFor(0.1)).toBe(500);
    expect(gate.sizeFor(0.02)).toBe(500);
    expect(gate.sizeFor(0.2)).toBe(1_000);
    expect(gate.sizeFor(0.9)).toBe(1_250);
  });

  it("rolls the trading day on the first decision after midnight UTC", () => {
    const { gate, clock } = setup({ risk: { lossCooldownMs: 0 } });
    gate.applyPositionChange(closedTrade("BTCUSDT", -50));
    expect(gate.snapshot().dailyPnl).toBe(-50);

    clock.set(Date.UTC(2026, 2, 3, 0, 0, 1));
    gate.decide(makeSignal());
    const state = gate.snapshot();
    expect(state.tradingDay).toBe("2026-03-03");
    expect(state.dailyPnl).toBe(0);
    expect(state.startingEquity).toBe(9_950);
  });

  it("restores daily counters only for the same trading day", () => {
    const { gate } = setup();
    gate.restore({
      ...gate.snapshot(),
      tradingDay: "2026-03-01",
      dailyPnl: -120,
      consecutiveLosses: 3,
      killSwitchEngaged: true,
      killSwitchReason: "restored",
    });
    const state = gate.snapshot();
    expect(state.dailyPnl).toBe(0);
    expect(state.consecutiveLosses).toBe(0);
    expect(state.killSwitchEngaged).toBe(true);
  });
});
