import WebSocket from "ws";
import { z } from "zod";
import {
  IBookSnapshot,
  IMarketDataConnection,
  IMarketDataHandlers,
  ITick,
  MarketDataConnectionFactory,
} from "../types/market.types";
import { logger } from "../utils/logger";

const DEPTH_STREAM = "depth5@100ms";

const numeric = z.union([z.string(), z.number()]).transform((v) => Number(v));
const LevelSchema = z.tuple([numeric, numeric]);

const AggTradeSchema = z.object({
  e: z.literal("aggTrade"),
  s: z.string(),
  a: z.number(),
  p: numeric,
  q: numeric,
  T: z.number(),
});

const DepthSchema = z.object({
  e: z.literal("depthUpdate"),
  s: z.string(),
  T: z.number().optional(),
  E: z.number(),
  b: z.array(LevelSchema),
  a: z.array(LevelSchema),
});

const CombinedSchema = z.object({
  stream: z.string(),
  data: z.unknown(),
});

export type MarketMessage = { kind: "tick"; tick: ITick } | { kind: "book"; book: IBookSnapshot };

/** Decode one combined-stream frame. Unknown or malformed frames yield null. */
export function parseMarketMessage(raw: string): MarketMessage | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }

  const combined = CombinedSchema.safeParse(json);
  const payload = combined.success ? combined.data.data : json;

  const trade = AggTradeSchema.safeParse(payload);
  if (trade.success) {
    const t = trade.data;
    return {
      kind: "tick",
      tick: { symbol: t.s, timestamp: t.T, price: t.p, size: t.q, tradeId: t.a },
    };
  }

  const depth = DepthSchema.safeParse(payload);
  if (depth.success) {
    const d = depth.data;
    return {
      kind: "book",
      book: {
        symbol: d.s,
        timestamp: d.T ?? d.E,
        bids: d.b.map(([price, size]) => ({ price, size })),
        asks: d.a.map(([price, size]) => ({ price, size })),
      },
    };
  }
  return null;
}

export function buildStreamUrl(baseUrl: string, symbols: readonly string[]): string {
  const streams = symbols.flatMap((s) => {
    const lower = s.toLowerCase();
    return [`${lower}@aggTrade`, `${lower}@${DEPTH_STREAM}`];
  });
  return `${baseUrl}/stream?streams=${streams.join("/")}`;
}

/**
 * One combined-stream socket (aggTrade + depth5) for a group of symbols.
 * Reconnects are the supervisor's job; this class only reports.
 */
export class BinanceMarketStream implements IMarketDataConnection {
  private ws: WebSocket | null = null;
  private closedByUs = false;

  constructor(
    readonly symbols: readonly string[],
    private readonly baseUrl: string
  ) {}

  connect(handlers: IMarketDataHandlers): void {
    const url = buildStreamUrl(this.baseUrl, this.symbols);
    logger.info(`[BinanceWS] Connecting ${this.symbols.length} symbol(s)`);
    this.closedByUs = false;

    const ws = new WebSocket(url);
    this.ws = ws;

    ws.on("open", () => {
      logger.success(`[BinanceWS] Connected: ${this.symbols.join(", ")}`);
      handlers.onOpen();
    });

    ws.on("message", (data: WebSocket.RawData) => {
      const message = parseMarketMessage(data.toString());
      if (!message) return;
      if (message.kind === "tick") handlers.onTick(message.tick);
      else handlers.onBook(message.book);
    });

    ws.on("close", (code: number) => {
      this.ws = null;
      if (this.closedByUs) return;
      handlers.onClose(`socket closed (${code})`);
    });

    ws.on("error", (err: Error) => {
      if (this.closedByUs) return;
      handlers.onError(err);
    });
  }

  close(): void {
    this.closedByUs = true;
    if (this.ws) {
      this.ws.removeAllListeners("message");
      this.ws.close();
      this.ws = null;
    }
  }
}

export function binanceStreamFactory(baseUrl: string): MarketDataConnectionFactory {
  return (symbols) => new BinanceMarketStream(symbols, baseUrl);
}
