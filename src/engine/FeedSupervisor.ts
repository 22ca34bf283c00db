import { SettingsStore } from "../config/settings";
import { MarketBook } from "../exchange/MarketBook";
import { IEventSink } from "../types/event.types";
import {
  IFeedLiveness,
  IMarketDataConnection,
  ITick,
  LivenessChange,
  MarketDataConnectionFactory,
} from "../types/market.types";
import { computeBackoffDelay } from "../utils/backoff";
import { Clock, systemClock } from "../utils/clock";
import { logger } from "../utils/logger";

const MAX_QUEUED_TICKS = 50_000;

interface SymbolLiveness {
  lastTickAt: number | null;
  lastTradeId: number;
  lastTimestamp: number;
  stale: boolean;
}

interface ConnectionGroup {
  id: number;
  symbols: readonly string[];
  connection: IMarketDataConnection | null;
  attempts: number;
  reconnectTimer: NodeJS.Timeout | null;
}

export type LivenessListener = (symbol: string, change: LivenessChange) => void;

export interface FeedSupervisorDeps {
  settings: SettingsStore;
  events: IEventSink;
  book: MarketBook;
  connect: MarketDataConnectionFactory;
  clock?: Clock;
  random?: () => number;
}

/**
 * Owns the market-data connections. Normalizes ticks, tracks per-symbol
 * liveness and reconnects with backoff. A lost connection degrades the
 * affected symbols to STALE; it never throws into the pipeline.
 */
export class FeedSupervisor {
  private settings: SettingsStore;
  private events: IEventSink;
  private book: MarketBook;
  private connect: MarketDataConnectionFactory;
  private clock: Clock;
  private random: () => number;

  private groups: ConnectionGroup[] = [];
  private liveness: Map<string, SymbolLiveness> = new Map();
  private listeners: LivenessListener[] = [];
  private queue: ITick[] = [];
  private waiter: (() => void) | null = null;
  private staleTimer: NodeJS.Timeout | null = null;
  private running = false;
  private droppedTicks = 0;

  constructor(deps: FeedSupervisorDeps) {
    this.settings = deps.settings;
    this.events = deps.events;
    this.book = deps.book;
    this.connect = deps.connect;
    this.clock = deps.clock ?? systemClock;
    this.random = deps.random ?? Math.random;
  }

  start(): void {
    if (this.running) return;
    this.running = true;

    const { symbols, feed } = this.settings.current;
    this.liveness.clear();
    for (const symbol of symbols) {
      this.liveness.set(symbol, { lastTickAt: null, lastTradeId: -1, lastTimestamp: 0, stale: false });
    }

    this.groups = [];
    for (let i = 0; i < symbols.length; i += feed.symbolsPerConnection) {
      this.groups.push({
        id: this.groups.length + 1,
        symbols: symbols.slice(i, i + feed.symbolsPerConnection),
        connection: null,
        attempts: 0,
        reconnectTimer: null,
      });
    }
    for (const group of this.groups) this.openGroup(group);

    this.staleTimer = setInterval(() => this.checkStaleness(), feed.staleCheckIntervalMs);
    logger.success(`[FeedSupervisor] Started ${this.groups.length} connection(s) for ${symbols.join(", ")}`);
  }

  stop(): void {
    if (!this.running) return;
    this.running = false;

    if (this.staleTimer) clearInterval(this.staleTimer);
    this.staleTimer = null;
    for (const group of this.groups) {
      if (group.reconnectTimer) clearTimeout(group.reconnectTimer);
      group.reconnectTimer = null;
      group.connection?.close();
      group.connection = null;
    }
    this.queue = [];
    this.wake();
    logger.info("[FeedSupervisor] Stopped");
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Normalized ticks in arrival order. Ends when the supervisor stops;
   * call again after a restart.
   */
  async *ticks(): AsyncGenerator<ITick, void, undefined> {
    while (this.running) {
      const tick = this.queue.shift();
      if (tick) {
        yield tick;
        continue;
      }
      await new Promise<void>((resolve) => {
        this.waiter = resolve;
      });
    }
  }

  onLiveness(listener: LivenessListener): void {
    this.listeners.push(listener);
  }

  isLive(symbol: string): boolean {
    const state = this.liveness.get(symbol);
    return state !== undefined && state.lastTickAt !== null && !state.stale;
  }

  getLiveness(): IFeedLiveness[] {
    return Array.from(this.liveness.entries()).map(([symbol, state]) => ({
      symbol,
      live: state.lastTickAt !== null && !state.stale,
      stale: state.stale,
      lastTickAt: state.lastTickAt,
    }));
  }

  getDroppedTicks(): number {
    return this.droppedTicks;
  }

  /** Mark symbols STALE when no tick arrived within the threshold. */
  checkStaleness(now: number = this.clock.now()): string[] {
    const { staleAfterMs } = this.settings.current.feed;
    const newlyStale: string[] = [];
    for (const [symbol, state] of this.liveness) {
      if (state.stale || state.lastTickAt === null) continue;
      if (now - state.lastTickAt > staleAfterMs) {
        state.stale = true;
        newlyStale.push(symbol);
        this.events.publish({
          level: "WARNING",
          category: "WS",
          symbol,
          message: `STALE: no ticks for ${now - state.lastTickAt}ms`,
          payload: { change: "STALE", lastTickAt: state.lastTickAt, staleAfterMs },
        });
        this.notify(symbol, "STALE");
      }
    }
    return newlyStale;
  }

  // ==================== CONNECTIONS ====================

  private openGroup(group: ConnectionGroup): void {
    if (!this.running) return;
    group.reconnectTimer = null;

    const connection = this.connect(group.symbols);
    group.connection = connection;
    connection.connect({
      onOpen: () => {
        group.attempts = 0;
        this.events.publish({
          level: "INFO",
          category: "WS",
          message: `Connection ${group.id} open`,
          payload: { connection: group.id, symbols: group.symbols },
        });
      },
      onTick: (tick) => this.ingest(tick),
      onBook: (book) => this.book.update(book),
      onClose: (reason) => {
        if (group.connection !== connection) return;
        group.connection = null;
        this.events.publish({
          level: "WARNING",
          category: "WS",
          message: `Connection ${group.id} closed: ${reason}`,
          payload: { connection: group.id, reason },
        });
        this.scheduleReconnect(group);
      },
      onError: (err) => {
        this.events.publish({
          level: "ERROR",
          category: "WS",
          message: `Connection ${group.id} error: ${err.message}`,
          payload: { connection: group.id },
        });
      },
    });
  }

  private scheduleReconnect(group: ConnectionGroup): void {
    if (!this.running || group.reconnectTimer) return;
    const feed = this.settings.current.feed;
    group.attempts++;
    const delay = computeBackoffDelay(
      group.attempts,
      { baseDelayMs: feed.reconnectBaseMs, maxDelayMs: feed.reconnectMaxMs, jitterRatio: feed.reconnectJitter },
      this.random
    );
    this.events.publish({
      level: "WARNING",
      category: "WS",
      message: `Reconnecting connection ${group.id} in ${delay}ms (attempt ${group.attempts})`,
      payload: { connection: group.id, attempt: group.attempts, delayMs: delay },
    });
    group.reconnectTimer = setTimeout(() => this.openGroup(group), delay);
  }

  // ==================== TICKS ====================

  private ingest(tick: ITick): void {
    if (!this.running) return;
    const state = this.liveness.get(tick.symbol);
    if (!state) return;
    if (!(tick.price > 0) || !(tick.size > 0) || !Number.isFinite(tick.timestamp)) return;
    // Duplicate or out-of-order delivery
    if (tick.tradeId <= state.lastTradeId || tick.timestamp < state.lastTimestamp) return;

    const firstTick = state.lastTickAt === null;
    const wasStale = state.stale;
    state.lastTradeId = tick.tradeId;
    state.lastTimestamp = tick.timestamp;
    state.lastTickAt = this.clock.now();
    state.stale = false;

    if (firstTick || wasStale) {
      this.events.publish({
        level: "INFO",
        category: "WS",
        symbol: tick.symbol,
        message: firstTick ? "First tick, feed live" : "RESTORED",
        payload: { change: "RESTORED" },
      });
      this.notify(tick.symbol, "RESTORED");
    }

    this.queue.push(tick);
    if (this.queue.length > MAX_QUEUED_TICKS) {
      this.queue.shift();
      this.droppedTicks++;
    }
    this.wake();
  }

  private wake(): void {
    const resolve = this.waiter;
    this.waiter = null;
    resolve?.();
  }

  private notify(symbol: string, change: LivenessChange): void {
    for (const listener of this.listeners) {
      try {
        listener(symbol, change);
      } catch (err) {
        logger.error(`[FeedSupervisor] Liveness listener failed for ${symbol}`, err);
      }
    }
  }
}
