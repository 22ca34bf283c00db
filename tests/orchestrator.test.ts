import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { Orchestrator, OrchestratorOptions } from "../src/engine/Orchestrator";
import { RiskGate } from "../src/engine/RiskGate";
import { SnapshotManager } from "../src/engine/SnapshotManager";
import { ILiveGateway, IPosition, ISymbolFilters } from "../src/types/execution.types";
import { GatewayError } from "../src/utils/errors";
import {
  BASE_TIME,
  FakeConnectionFactory,
  makeBook,
  makeSettings,
  makeTick,
  ManualClock,
  RecordingSink,
  ScriptedGateway,
  settle,
} from "./helpers";

class ScriptedLiveGateway extends ScriptedGateway implements ILiveGateway {
  connectError: Error | null = null;

  async connect(symbols: readonly string[]): Promise<ISymbolFilters[]> {
    if (this.connectError) throw this.connectError;
    return symbols.map((symbol) => ({ symbol, tickSize: 0.01, stepSize: 0.001, minQty: 0.001, minNotional: 5 }));
  }
}

// Fast windows so a whole impulse and its fade fit in a few seconds of ticks
const FAST_PIPELINE = {
  features: { windowMs: 1_000, rateHorizonMs: 500, baselineWindows: 5, minBaselineWindows: 2, stdFloorRatio: 0.1 },
  strategy: {
    impulseThresholdPct: 2,
    tradeRateBurstThreshold: 3,
    volumeZScoreThreshold: 2,
    exhaustionRatioThreshold: 0.5,
    regimeFilterEnabled: true,
    trendStrengthThresholdPct: 0.25,
  },
  risk: { volatilityKillThreshold: 1 },
};

/** Two flat buckets, a sharp rally, a stall, then the first lower print. */
const RALLY_AND_FADE: Array<[number, number]> = [
  [0, 100],
  [1_000, 100],
  [2_000, 100],
  [2_100, 101],
  [2_200, 102.1],
  [2_300, 102.3],
  [2_500, 102.3],
  [2_900, 102.3],
  [2_950, 102],
];

const SHORT_BTC: IPosition = {
  symbol: "BTCUSDT",
  side: "SHORT",
  qty: 2,
  entryPrice: 100,
  openedAt: BASE_TIME,
  markPrice: 100,
  unrealizedPnl: 0,
};

describe("Orchestrator", () => {
  let dir: string;
  let clock: ManualClock;
  let factory: FakeConnectionFactory;
  const running: Orchestrator[] = [];

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "impulse-engine-"));
    clock = new ManualClock();
    factory = new FakeConnectionFactory();
  });

  afterEach(async () => {
    for (const engine of running.splice(0)) await engine.shutdown();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function engine(overrides: Partial<OrchestratorOptions> = {}): Orchestrator {
    const orchestrator = new Orchestrator({
      settings: makeSettings(),
      connect: factory.connect,
      clock,
      random: () => 0,
      scheduleDayRoll: false,
      ...overrides,
    });
    running.push(orchestrator);
    return orchestrator;
  }

  /** Leave a snapshot on disk as a previous run would have. */
  async function seedSnapshot(file: string, positions: IPosition[], killSwitch = false): Promise<void> {
    const risk = new RiskGate(makeSettings(), new RecordingSink(clock), clock);
    if (killSwitch) risk.engageKillSwitch("drawdown");
    const snapshots = new SnapshotManager(
      file,
      () => ({ runState: "running", settingsVersion: 1, symbols: [], positions, risk: risk.snapshot() }),
      new RecordingSink(clock),
      clock
    );
    await snapshots.saveNow();
  }

  describe("lifecycle", () => {
    it("starts once in paper mode", async () => {
      const orchestrator = engine();

      expect(await orchestrator.start()).toEqual({
        ok: true,
        message: "Engine started (paper) on BTCUSDT, ETHUSDT, SOLUSDT",
      });
      expect(await orchestrator.start()).toEqual({ ok: false, message: "Engine already running" });
      expect(orchestrator.getState().runState).toBe("running");
      expect(orchestrator.getState().preset).toBe("CUSTOM");
      expect(factory.connections).toHaveLength(1);
    });

    it("pauses entries and resumes them", async () => {
      const orchestrator = engine();
      await orchestrator.start();

      expect((await orchestrator.pause()).message).toBe("New entries paused; exits stay active");
      expect(orchestrator.getState().risk.entriesPaused).toBe(true);
      expect((await orchestrator.pause()).ok).toBe(false);

      expect((await orchestrator.resume()).ok).toBe(true);
      expect(orchestrator.getState().risk.entriesPaused).toBe(false);
      expect(orchestrator.getState().runState).toBe("running");
    });

    it("stops the feed and refuses to stop twice", async () => {
      const orchestrator = engine();
      await orchestrator.start();

      expect(await orchestrator.stop()).toEqual({ ok: true, message: "Engine stopped" });
      expect(factory.connections[0].closed).toBe(true);
      expect(await orchestrator.stop()).toEqual({ ok: false, message: "Engine is stopped" });
    });

    it("stays down after a kill until the switch is disengaged", async () => {
      const orchestrator = engine();
      await orchestrator.start();

      expect(await orchestrator.kill("operator")).toEqual({ ok: true, message: "Kill switch engaged: operator" });
      expect(orchestrator.getState().runState).toBe("killed");
      expect(await orchestrator.start()).toEqual({
        ok: false,
        message: "Kill switch engaged; disengage before starting",
      });

      expect((await orchestrator.disengageKillSwitch()).ok).toBe(true);
      expect(orchestrator.getState().runState).toBe("stopped");
      expect((await orchestrator.start()).ok).toBe(true);
    });

    it("publishes every command reply as a system event", async () => {
      const orchestrator = engine();
      await orchestrator.start();
      await orchestrator.pause();

      const replies = orchestrator.events.recent(10, { category: "SYSTEM" }).map((e) => e.message);
      expect(replies).toEqual([
        "Engine started (paper) on BTCUSDT, ETHUSDT, SOLUSDT",
        "New entries paused; exits stay active",
      ]);
    });
  });

  describe("feed liveness", () => {
    it("blocks a silent symbol in the risk gate until its next tick", async () => {
      vi.useFakeTimers();
      try {
        const orchestrator = engine();
        await orchestrator.start();
        const connection = factory.latestFor("BTCUSDT");

        connection.tick(makeTick({ tradeId: 1 }));
        expect(orchestrator.getState().liveness.find((l) => l.symbol === "BTCUSDT")?.live).toBe(true);

        clock.advance(5_001);
        vi.advanceTimersByTime(1_000);
        expect(orchestrator.getState().risk.staleSymbols).toEqual(["BTCUSDT"]);

        connection.tick(makeTick({ tradeId: 2, timestamp: BASE_TIME + 5_001 }));
        expect(orchestrator.getState().risk.staleSymbols).toEqual([]);

        await orchestrator.stop();
      } finally {
        vi.useRealTimers();
      }
    });
  });

  describe("signal pipeline", () => {
    function replayRallyAndFade(): void {
      const connection = factory.latestFor("BTCUSDT");
      connection.book(makeBook("BTCUSDT", 101.99, 102.01));
      RALLY_AND_FADE.forEach(([offset, price], i) => {
        connection.tick(makeTick({ timestamp: BASE_TIME + offset, price, tradeId: i + 1 }));
      });
    }

    it("fades a rally with the regime filter on and fills it on paper", async () => {
      const orchestrator = engine({ settings: makeSettings(FAST_PIPELINE) });
      await orchestrator.start();

      replayRallyAndFade();
      await settle();
      await orchestrator.drain();

      const state = orchestrator.getState();
      expect(state.recentSignals.map((s) => s.side)).toEqual(["SELL"]);
      expect(orchestrator.events.recent(50, { category: "FILTER" })).toEqual([]);

      const fills = orchestrator.events.recent(50, { category: "FILL" }).map((e) => e.message);
      expect(fills).toHaveLength(1);
      expect(fills[0]).toMatch(/^Filled SELL /);
      expect(state.positions.map((p) => [p.symbol, p.side])).toEqual([["BTCUSDT", "SHORT"]]);
    });

    it("sends no order for the same fade while entries are paused", async () => {
      const orchestrator = engine({ settings: makeSettings(FAST_PIPELINE) });
      await orchestrator.start();
      await orchestrator.pause();

      replayRallyAndFade();
      await settle();
      await orchestrator.drain();

      expect(orchestrator.getState().recentSignals.map((s) => s.side)).toEqual(["SELL"]);
      const risk = orchestrator.events.recent(50, { category: "RISK" }).map((e) => e.message);
      expect(risk.some((m) => m.startsWith("BLOCK ENTRIES_PAUSED: "))).toBe(true);
      expect(orchestrator.events.recent(50, { category: "ORDER" })).toEqual([]);
      expect(orchestrator.events.recent(50, { category: "FILL" })).toEqual([]);
      expect(orchestrator.getState().positions).toEqual([]);
    });
  });

  describe("live venue", () => {
    it("loads filters from the venue and trades live with dry run off", async () => {
      const live = new ScriptedLiveGateway(() => GatewayError.transient("TIMEOUT", "timed out"), clock);
      const orchestrator = engine({ settings: makeSettings({ execution: { dryRun: false } }), live });

      expect((await orchestrator.start()).message).toBe("Engine started (live) on BTCUSDT, ETHUSDT, SOLUSDT");
      expect(orchestrator.getState().mode).toBe("live");
    });

    it("refuses to start when the venue is unreachable", async () => {
      const live = new ScriptedLiveGateway(() => GatewayError.transient("TIMEOUT", "timed out"), clock);
      live.connectError = GatewayError.transient("DISCONNECTED", "connect ECONNREFUSED");
      const orchestrator = engine({ live });

      expect(await orchestrator.start()).toEqual({
        ok: false,
        message: "Exchange connection failed: connect ECONNREFUSED",
      });
      expect(orchestrator.getState().runState).toBe("stopped");
      expect(factory.connections).toHaveLength(0);
    });
  });

  describe("settings", () => {
    it("applies a valid patch and reports the version", async () => {
      const orchestrator = engine();
      expect(await orchestrator.patchSettings({ risk: { maxPositions: 1 } })).toEqual({
        ok: true,
        message: "Settings updated to version 2 (CUSTOM)",
      });
    });

    it("rejects an invalid patch with its issues", async () => {
      const orchestrator = engine();
      const result = await orchestrator.patchSettings({ risk: { maxLeverage: -1 } });
      expect(result.ok).toBe(false);
      expect(result.message.startsWith("Settings rejected: risk.maxLeverage: ")).toBe(true);
      expect(orchestrator.getState().settingsVersion).toBe(1);
    });
  });

  describe("recovery and exits", () => {
    it("restores positions from the snapshot and flattens them", async () => {
      const file = path.join(dir, "state.json");
      await seedSnapshot(file, [SHORT_BTC]);
      const orchestrator = engine({ snapshotPath: file });

      await orchestrator.start();
      expect(orchestrator.getState().positions).toEqual([SHORT_BTC]);
      expect(orchestrator.getState().risk.exposureBySymbol).toEqual({ BTCUSDT: 200 });

      expect(await orchestrator.flatten()).toEqual({ ok: true, message: "Flatten closed 1/1 position(s)" });
      expect(orchestrator.getState().positions).toEqual([]);
      expect(await orchestrator.flatten()).toEqual({ ok: true, message: "No open positions" });
    });

    it("keeps a restored kill switch engaged", async () => {
      const file = path.join(dir, "state.json");
      await seedSnapshot(file, [], true);
      const orchestrator = engine({ snapshotPath: file });

      expect((await orchestrator.start()).ok).toBe(false);
      expect(orchestrator.getState().runState).toBe("killed");
      expect(orchestrator.getState().risk.killSwitchReason).toBe("drawdown");
    });

    it("exits a position whose loss reaches the stop", async () => {
      const file = path.join(dir, "state.json");
      await seedSnapshot(file, [SHORT_BTC]);
      const orchestrator = engine({ snapshotPath: file });
      await orchestrator.start();

      factory.latestFor("BTCUSDT").tick(makeTick({ price: 101.5, tradeId: 1 }));
      await settle();
      await orchestrator.drain();

      const state = orchestrator.getState();
      expect(state.positions).toEqual([]);
      expect(state.risk.consecutiveLosses).toBe(1);
      expect(orchestrator.events.recent(50, { category: "ORDER" }).map((e) => e.message)).toContain(
        "Exit SHORT BTCUSDT (STOP_LOSS)"
      );
    });

    it("writes a snapshot when killed", async () => {
      const file = path.join(dir, "state.json");
      const orchestrator = engine({ snapshotPath: file });
      await orchestrator.start();
      await orchestrator.kill("test");

      const saved: unknown = JSON.parse(fs.readFileSync(file, "utf-8"));
      expect(saved).toMatchObject({ version: 1, runState: "killed", risk: { killSwitchEngaged: true } });
    });
  });
});
