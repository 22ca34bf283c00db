import cron from "node-cron";
import { detectPreset, PresetName } from "../config/presets";
import { EngineSettings, SettingsStore } from "../config/settings";
import { binanceStreamFactory } from "../exchange/BinanceMarketStream";
import { MarketBook } from "../exchange/MarketBook";
import { PaperSimulator } from "../exchange/PaperSimulator";
import { SymbolFilterRegistry } from "../exchange/SymbolFilters";
import { HistoryRecorder } from "../services/HistoryRecorder";
import { ILiveGateway, IExecutionResult, IPosition } from "../types/execution.types";
import { IHistoryStore } from "../types/history.types";
import { IFeedLiveness, ITick, LivenessChange, MarketDataConnectionFactory } from "../types/market.types";
import { IRiskState } from "../types/risk.types";
import { ISignal, ISymbolStateView } from "../types/signal.types";
import { Clock, systemClock } from "../utils/clock";
import { errorMessage } from "../utils/errors";
import { logger } from "../utils/logger";
import { EventBus } from "./EventBus";
import { ExecutionEngine } from "./ExecutionEngine";
import { FeatureWindow } from "./FeatureWindow";
import { FeedSupervisor } from "./FeedSupervisor";
import { PositionManager } from "./PositionManager";
import { RiskGate } from "./RiskGate";
import { SignalStateMachine } from "./SignalStateMachine";
import { RunState, SnapshotManager } from "./SnapshotManager";

const RECENT_SIGNAL_LIMIT = 50;

export interface CommandResult {
  ok: boolean;
  message: string;
}

export interface OrchestratorOptions {
  settings: SettingsStore;
  /** Market-data connections; defaults to the exchange's combined stream. */
  connect?: MarketDataConnectionFactory;
  live?: ILiveGateway | null;
  history?: IHistoryStore | null;
  snapshotPath?: string | null;
  clock?: Clock;
  random?: () => number;
  sleep?: (ms: number) => Promise<void>;
  scheduleDayRoll?: boolean;
}

export interface EngineState {
  runState: RunState;
  settingsVersion: number;
  preset: PresetName | "CUSTOM";
  mode: "paper" | "live";
  risk: IRiskState;
  positions: IPosition[];
  symbols: ISymbolStateView[];
  recentSignals: ISignal[];
  liveness: IFeedLiveness[];
  inFlight: string[];
  droppedTicks: number;
}

/**
 * Wires the pipeline: feed -> features -> state machine -> risk -> execution.
 * Tick handling is synchronous; only order placement runs in the background.
 */
export class Orchestrator {
  readonly events: EventBus;

  private settings: SettingsStore;
  private clock: Clock;
  private book = new MarketBook();
  private filters = new SymbolFilterRegistry();
  private positions = new PositionManager();
  private feed: FeedSupervisor;
  private machine: SignalStateMachine;
  private risk: RiskGate;
  private execution: ExecutionEngine;
  private live: ILiveGateway | null;
  private snapshots: SnapshotManager | null;
  private recorder: HistoryRecorder | null;
  private scheduleDayRoll: boolean;

  private windows: Map<string, FeatureWindow> = new Map();
  private recentSignals: ISignal[] = [];
  private tasks: Set<Promise<void>> = new Set();
  private exiting: Set<string> = new Set();
  private cronJobs: ReturnType<typeof cron.schedule>[] = [];
  private pipeline: Promise<void> | null = null;
  private runState: RunState = "stopped";
  private restored = false;

  constructor(options: OrchestratorOptions) {
    this.settings = options.settings;
    this.clock = options.clock ?? systemClock;
    this.live = options.live ?? null;
    this.scheduleDayRoll = options.scheduleDayRoll ?? true;

    this.events = new EventBus({ clock: this.clock });
    this.risk = new RiskGate(this.settings, this.events, this.clock);
    this.machine = new SignalStateMachine(this.settings, this.events);
    this.feed = new FeedSupervisor({
      settings: this.settings,
      events: this.events,
      book: this.book,
      connect: options.connect ?? binanceStreamFactory(this.settings.current.feed.wsBaseUrl),
      clock: this.clock,
      random: options.random,
    });
    this.execution = new ExecutionEngine({
      settings: this.settings,
      events: this.events,
      book: this.book,
      filters: this.filters,
      positions: this.positions,
      risk: this.risk,
      paper: new PaperSimulator(this.book, this.settings, this.clock),
      live: this.live,
      clock: this.clock,
      sleep: options.sleep,
      random: options.random,
    });

    this.snapshots = options.snapshotPath
      ? new SnapshotManager(
          options.snapshotPath,
          () => ({
            runState: this.runState,
            settingsVersion: this.settings.version,
            symbols: this.machine.view(),
            positions: this.positions.list(),
            risk: this.risk.snapshot(),
          }),
          this.events,
          this.clock
        )
      : null;
    this.recorder = options.history ? new HistoryRecorder(options.history) : null;

    this.feed.onLiveness((symbol, change) => this.onLiveness(symbol, change));
    this.settings.onChange((next, previous) => this.onSettingsChanged(next, previous));
  }

  // ==================== COMMANDS ====================

  async start(): Promise<CommandResult> {
    if (this.runState === "running" || this.runState === "paused") {
      return this.reply(false, "Engine already running");
    }

    // 1. Crash recovery
    if (!this.restored) {
      this.restoreSnapshot();
      this.restored = true;
    }

    // 2. Kill switch must be cleared explicitly
    if (this.risk.isKillSwitchEngaged()) {
      this.runState = "killed";
      return this.reply(false, "Kill switch engaged; disengage before starting");
    }

    // 3. Live venue: symbol filters for order normalization
    if (this.live) {
      try {
        this.filters.setAll(await this.live.connect(this.settings.current.symbols));
      } catch (err) {
        return this.reply(false, `Exchange connection failed: ${errorMessage(err)}`, "ERROR");
      }
    }

    // 4. History
    this.recorder?.attach(this.events);

    // 5. Market data and pipeline
    this.feed.start();
    this.pipeline = this.runPipeline().catch((err) => {
      logger.error("[Orchestrator] Pipeline stopped unexpectedly", err);
    });

    // 6. Snapshots and day roll
    this.snapshots?.start(this.settings.current.snapshot.intervalMs);
    this.scheduleCronJobs();

    this.runState = "running";
    const mode = this.modeLabel();
    return this.reply(true, `Engine started (${mode}) on ${this.settings.current.symbols.join(", ")}`);
  }

  async stop(): Promise<CommandResult> {
    if (this.runState === "stopped" || this.runState === "killed") {
      return this.reply(false, `Engine is ${this.runState}`);
    }
    await this.stopPipeline();
    this.runState = "stopped";
    await this.snapshots?.saveNow();
    return this.reply(true, "Engine stopped");
  }

  async pause(): Promise<CommandResult> {
    if (this.runState !== "running") return this.reply(false, `Cannot pause while ${this.runState}`);
    this.risk.pauseEntries();
    this.runState = "paused";
    return this.reply(true, "New entries paused; exits stay active");
  }

  async resume(): Promise<CommandResult> {
    if (this.runState !== "paused") return this.reply(false, `Cannot resume while ${this.runState}`);
    this.risk.resumeEntries();
    this.runState = "running";
    return this.reply(true, "Entries resumed");
  }

  /** Close every open position with a reduce-only order. */
  async flatten(): Promise<CommandResult> {
    const open = this.positions.list();
    if (open.length === 0) return this.reply(true, "No open positions");

    const results = await Promise.all(open.map((position) => this.exit(position, "FLATTEN")));
    const filled = results.filter((r) => r?.status === "FILLED").length;
    return this.reply(
      filled === open.length,
      `Flatten closed ${filled}/${open.length} position(s)`,
      filled === open.length ? "INFO" : "WARNING"
    );
  }

  async kill(reason = "manual"): Promise<CommandResult> {
    const engaged = this.risk.engageKillSwitch(reason);
    await this.stopPipeline();
    this.runState = "killed";
    await this.snapshots?.saveNow();
    return this.reply(true, engaged ? `Kill switch engaged: ${reason}` : "Kill switch already engaged", "WARNING");
  }

  async disengageKillSwitch(): Promise<CommandResult> {
    if (!this.risk.disengageKillSwitch()) return this.reply(false, "Kill switch is not engaged");
    if (this.runState === "killed") this.runState = "stopped";
    await this.snapshots?.saveNow();
    return this.reply(true, "Kill switch disengaged; engine stopped until started");
  }

  async patchSettings(partial: unknown): Promise<CommandResult> {
    const result = this.settings.patch(partial);
    if (!result.ok) {
      return this.reply(false, `Settings rejected: ${result.issues.join("; ")}`, "WARNING");
    }
    return this.reply(true, `Settings updated to version ${result.version} (${detectPreset(result.settings)})`);
  }

  // ==================== STATE ====================

  getState(): EngineState {
    return {
      runState: this.runState,
      settingsVersion: this.settings.version,
      preset: detectPreset(this.settings.current),
      mode: this.modeLabel(),
      risk: this.risk.snapshot(),
      positions: this.positions.list(),
      symbols: this.machine.view(),
      recentSignals: [...this.recentSignals],
      liveness: this.feed.getLiveness(),
      inFlight: this.execution.inFlight(),
      droppedTicks: this.feed.getDroppedTicks(),
    };
  }

  /** Resolves once every background execution has settled. */
  async drain(): Promise<void> {
    while (this.tasks.size > 0) {
      await Promise.all(Array.from(this.tasks));
    }
  }

  /** Stop everything, including history and the event bus. */
  async shutdown(): Promise<void> {
    if (this.runState === "running" || this.runState === "paused") await this.stop();
    await this.drain();
    this.recorder?.detach();
    this.events.close();
  }

  // ==================== PIPELINE ====================

  private async runPipeline(): Promise<void> {
    for await (const tick of this.feed.ticks()) {
      this.onTick(tick);
    }
  }

  /** Everything a single tick triggers, in one synchronous pass. */
  onTick(tick: ITick): void {
    // 1. Marks
    this.positions.markToMarket(tick.symbol, tick.price);
    this.risk.markToMarket(this.positions.totalUnrealizedPnl());

    // 2. Features
    const features = this.windowFor(tick.symbol).observe(tick);
    if (!features) return;

    // 3. Volatility kill
    if (!features.warmingUp) this.risk.observeVolatility(tick.symbol, features.volatility);

    // 4. State machine
    const signal = this.machine.update(features);

    // 5. Protective exits
    this.checkProtectiveExits(tick.symbol);

    if (signal) this.onSignal(signal);
  }

  private onSignal(signal: ISignal): void {
    this.recentSignals.push(signal);
    if (this.recentSignals.length > RECENT_SIGNAL_LIMIT) this.recentSignals.shift();

    if (!this.feed.isLive(signal.symbol)) {
      this.events.publish({
        level: "DEBUG",
        category: "RISK",
        symbol: signal.symbol,
        correlationId: signal.id,
        message: "Signal not evaluated: feed not live",
        payload: { signalId: signal.id },
      });
      return;
    }

    const { intent } = this.risk.decide(signal);
    if (!intent) return;
    this.track(
      this.execution.execute(intent).then((result) => this.logResult(result))
    );
  }

  private checkProtectiveExits(symbol: string): void {
    const position = this.positions.get(symbol);
    if (!position || this.exiting.has(symbol)) return;

    const { strategy, risk } = this.settings.current;
    const direction = position.side === "LONG" ? 1 : -1;
    const movePct = ((position.markPrice - position.entryPrice) / position.entryPrice) * 100 * direction;
    const age = this.clock.now() - position.openedAt;

    let reason: string | null = null;
    if (movePct <= -risk.stopLossPct) reason = "STOP_LOSS";
    else if (movePct >= strategy.takeProfitPct) reason = "TAKE_PROFIT";
    else if (age >= strategy.positionTimeStopMs) reason = "TIME_STOP";
    if (!reason) return;

    this.track(this.exit(position, reason).then(() => undefined));
  }

  private async exit(position: IPosition, reason: string): Promise<IExecutionResult | null> {
    if (this.exiting.has(position.symbol)) return null;
    this.exiting.add(position.symbol);
    try {
      const result = await this.execution.executeExit(position, reason);
      this.logResult(result);
      return result;
    } finally {
      this.exiting.delete(position.symbol);
    }
  }

  private track(task: Promise<void>): void {
    const guarded = task.catch((err) => {
      logger.error("[Orchestrator] Execution task failed", err);
    });
    this.tasks.add(guarded);
    guarded.finally(() => this.tasks.delete(guarded)).catch((err) => {
      logger.error("[Orchestrator] Task bookkeeping failed", err);
    });
  }

  private logResult(result: IExecutionResult): void {
    if (result.status === "FILLED") {
      logger.success(`[Orchestrator] ${result.symbol} ${result.signalId} filled`);
    } else {
      logger.info(`[Orchestrator] ${result.symbol} ${result.signalId} ${result.status} ${result.reason ?? ""}`.trim());
    }
  }

  private windowFor(symbol: string): FeatureWindow {
    let window = this.windows.get(symbol);
    if (!window) {
      window = new FeatureWindow(symbol, this.settings.current.features);
      this.windows.set(symbol, window);
    }
    return window;
  }

  // ==================== LISTENERS ====================

  private onLiveness(symbol: string, change: LivenessChange): void {
    if (change === "STALE") {
      this.risk.setFeedLive(symbol, false);
      this.machine.reset(symbol, "STALE", this.clock.now());
    } else {
      this.risk.setFeedLive(symbol, true);
    }
  }

  private onSettingsChanged(next: EngineSettings, previous: EngineSettings): void {
    const featuresChanged = JSON.stringify(next.features) !== JSON.stringify(previous.features);
    const strategyChanged = JSON.stringify(next.strategy) !== JSON.stringify(previous.strategy);
    if (featuresChanged) {
      // Windows refill from live ticks with the new parameters
      this.windows.clear();
    }
    if (featuresChanged || strategyChanged) {
      this.machine.resetAll("SETTINGS_CHANGED", this.clock.now());
    }
  }

  // ==================== LIFECYCLE ====================

  private restoreSnapshot(): void {
    const snapshot = this.snapshots?.load();
    if (!snapshot) return;
    this.positions.restore(snapshot.positions);
    this.risk.restore(snapshot.risk);
    this.risk.syncPositions(this.positions.list());
    this.events.publish({
      level: "INFO",
      category: "SYSTEM",
      message: `Restored ${snapshot.positions.length} position(s) from snapshot`,
      payload: { savedAt: snapshot.savedAt, killSwitchEngaged: snapshot.risk.killSwitchEngaged },
    });
  }

  private async stopPipeline(): Promise<void> {
    for (const job of this.cronJobs) job.stop();
    this.cronJobs = [];
    this.snapshots?.stop();
    this.feed.stop();
    if (this.pipeline) await this.pipeline;
    this.pipeline = null;
  }

  private scheduleCronJobs(): void {
    if (!this.scheduleDayRoll) return;
    // Trading day rolls at 00:00 UTC
    this.cronJobs.push(
      cron.schedule("0 0 * * *", () => this.risk.rollTradingDay(), { timezone: "UTC" })
    );
  }

  private modeLabel(): "paper" | "live" {
    return this.settings.current.execution.dryRun || !this.live ? "paper" : "live";
  }

  private reply(ok: boolean, message: string, level: "INFO" | "WARNING" | "ERROR" = ok ? "INFO" : "WARNING"): CommandResult {
    this.events.publish({ level, category: "SYSTEM", message, payload: { ok, runState: this.runState } });
    return { ok, message };
  }
}
