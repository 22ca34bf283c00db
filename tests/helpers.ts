import { defaultSettings, mergeSettings, parseSettings, SettingsStore } from "../src/config/settings";
import { IEngineEvent, IEventInput, IEventSink } from "../src/types/event.types";
import {
  IGatewayOrder,
  IOrderGateway,
  IOrderRequest,
} from "../src/types/execution.types";
import {
  IBookSnapshot,
  IFeatureSnapshot,
  IMarketDataConnection,
  IMarketDataHandlers,
  ITick,
} from "../src/types/market.types";
import { ISignal } from "../src/types/signal.types";
import { Clock } from "../src/utils/clock";

// 2026-03-02T09:00:00Z
export const BASE_TIME = Date.UTC(2026, 2, 2, 9, 0, 0);

export class ManualClock implements Clock {
  constructor(private time: number = BASE_TIME) {}

  now(): number {
    return this.time;
  }

  advance(ms: number): void {
    this.time += ms;
  }

  set(time: number): void {
    this.time = time;
  }
}

export function makeSettings(patch: unknown = {}): SettingsStore {
  return new SettingsStore(parseSettings(mergeSettings(defaultSettings(), patch)));
}

/** Event sink that keeps everything it receives. */
export class RecordingSink implements IEventSink {
  readonly events: IEngineEvent[] = [];
  private nextId = 1;

  constructor(private readonly clock: Clock = new ManualClock()) {}

  publish(input: IEventInput): IEngineEvent {
    const event: IEngineEvent = {
      id: this.nextId++,
      ts: this.clock.now(),
      level: input.level,
      category: input.category,
      symbol: input.symbol ?? null,
      correlationId: input.correlationId ?? null,
      message: input.message,
      payload: input.payload ?? {},
    };
    this.events.push(event);
    return event;
  }

  messages(category?: IEngineEvent["category"]): string[] {
    return this.events.filter((e) => !category || e.category === category).map((e) => e.message);
  }
}

export function features(overrides: Partial<IFeatureSnapshot> = {}): IFeatureSnapshot {
  return {
    symbol: "BTCUSDT",
    timestamp: BASE_TIME,
    price: 100,
    displacementPct: 0,
    volumeZScore: 0,
    tradeRateRatio: 1,
    exhaustionRatio: 0,
    trendStrengthPct: 0,
    volatility: 0.001,
    lowLiquidity: false,
    warmingUp: false,
    ...overrides,
  };
}

export function makeSignal(overrides: Partial<ISignal> = {}): ISignal {
  return {
    id: "sig-1",
    symbol: "BTCUSDT",
    timestamp: BASE_TIME,
    statePath: ["BUILDUP", "IMPULSE", "CLIMAX", "EXHAUSTION", "REBALANCE"],
    side: "SELL",
    impulseDirection: "UP",
    confidence: 0.8,
    reasonCodes: ["IMPULSE_DISPLACEMENT", "VOLUME_ZSCORE", "TRADE_RATE_BURST", "EXHAUSTION_RATIO", "STRUCTURE_CONFIRMED"],
    features: features({ symbol: overrides.symbol ?? "BTCUSDT" }),
    ...overrides,
  };
}

export function makeTick(overrides: Partial<ITick> = {}): ITick {
  return { symbol: "BTCUSDT", timestamp: BASE_TIME, price: 100, size: 1, tradeId: 1, ...overrides };
}

export function makeBook(symbol: string, bid: number, ask: number, size = 1_000, timestamp = BASE_TIME): IBookSnapshot {
  return { symbol, timestamp, bids: [{ price: bid, size }], asks: [{ price: ask, size }] };
}

/**
 * What the scripted gateway does with the next placeOrder call:
 * FILL fills at the price hint, NEW rests unfilled, PARTIAL fills one unit,
 * LAND_THEN_TIMEOUT stores a fill but reports a timeout, an Error is thrown.
 */
export type PlaceOutcome = "FILL" | "NEW" | "PARTIAL" | "LAND_THEN_TIMEOUT" | Error;

export class ScriptedGateway implements IOrderGateway {
  readonly name = "scripted";
  readonly placed: IOrderRequest[] = [];
  readonly orders: Map<string, IGatewayOrder> = new Map();
  readonly script: PlaceOutcome[] = [];
  private sequence = 0;

  constructor(
    private readonly timeoutError: () => Error,
    private readonly clock: Clock = new ManualClock()
  ) {}

  async placeOrder(request: IOrderRequest): Promise<IGatewayOrder> {
    this.placed.push(request);
    const outcome = this.script.shift() ?? "FILL";
    if (outcome instanceof Error) throw outcome;

    const order = this.order(request, outcome);
    this.orders.set(request.clientOrderId, order);
    if (outcome === "LAND_THEN_TIMEOUT") throw this.timeoutError();
    return order;
  }

  async queryOrder(_symbol: string, clientOrderId: string): Promise<IGatewayOrder | null> {
    return this.orders.get(clientOrderId) ?? null;
  }

  async cancelOrder(_symbol: string, clientOrderId: string): Promise<IGatewayOrder | null> {
    const order = this.orders.get(clientOrderId);
    if (!order) return null;
    const canceled: IGatewayOrder = { ...order, status: "CANCELED" };
    this.orders.set(clientOrderId, canceled);
    return canceled;
  }

  private order(request: IOrderRequest, outcome: Exclude<PlaceOutcome, Error>): IGatewayOrder {
    const executedQty = outcome === "NEW" ? 0 : outcome === "PARTIAL" ? 1 : request.quantity;
    const status = outcome === "NEW" ? "NEW" : outcome === "PARTIAL" ? "PARTIALLY_FILLED" : "FILLED";
    return {
      orderId: `order-${++this.sequence}`,
      clientOrderId: request.clientOrderId,
      symbol: request.symbol,
      side: request.side,
      status,
      quantity: request.quantity,
      executedQty,
      avgPrice: executedQty > 0 ? request.priceHint : 0,
      fee: 0,
      updatedAt: this.clock.now(),
    };
  }
}

/** In-process market-data connection driven by the test. */
export class FakeConnection implements IMarketDataConnection {
  handlers: IMarketDataHandlers | null = null;
  closed = false;

  constructor(readonly symbols: readonly string[]) {}

  connect(handlers: IMarketDataHandlers): void {
    this.handlers = handlers;
  }

  close(): void {
    this.closed = true;
  }

  open(): void {
    this.handlers?.onOpen();
  }

  tick(tick: ITick): void {
    this.handlers?.onTick(tick);
  }

  book(book: IBookSnapshot): void {
    this.handlers?.onBook(book);
  }

  drop(reason = "socket closed (1006)"): void {
    this.handlers?.onClose(reason);
  }
}

export class FakeConnectionFactory {
  readonly connections: FakeConnection[] = [];

  readonly connect = (symbols: readonly string[]): FakeConnection => {
    const connection = new FakeConnection(symbols);
    this.connections.push(connection);
    return connection;
  };

  latestFor(symbol: string): FakeConnection {
    for (let i = this.connections.length - 1; i >= 0; i--) {
      if (this.connections[i].symbols.includes(symbol)) return this.connections[i];
    }
    throw new Error(`no connection for ${symbol}`);
  }
}

/** Let queued promise callbacks run. */
export async function flush(times = 10): Promise<void> {
  for (let i = 0; i < times; i++) await Promise.resolve();
}

/** Wait until every queued microtask has run. */
export function settle(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
