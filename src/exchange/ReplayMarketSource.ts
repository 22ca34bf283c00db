import * as fs from "fs";
import { z } from "zod";
import {
  IMarketDataConnection,
  IMarketDataHandlers,
  MarketDataConnectionFactory,
} from "../types/market.types";
import { ConfigurationError } from "../utils/errors";
import { logger } from "../utils/logger";

const BATCH_SIZE = 500;

const LevelSchema = z.tuple([z.number().positive(), z.number().nonnegative()]);

export const ReplayRecordSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("tick"),
    symbol: z.string(),
    timestamp: z.number(),
    price: z.number().positive(),
    size: z.number().positive(),
    tradeId: z.number().int(),
  }),
  z.object({
    type: z.literal("book"),
    symbol: z.string(),
    timestamp: z.number(),
    bids: z.array(LevelSchema),
    asks: z.array(LevelSchema),
  }),
]);

export type ReplayRecord = z.infer<typeof ReplayRecordSchema>;

/**
 * Read newline-delimited replay records. Each line is one tick or one
 * book snapshot; records must be in time order.
 */
export function loadReplayFile(path: string): ReplayRecord[] {
  if (!fs.existsSync(path)) {
    throw new ConfigurationError(`Replay file ${path} not found`);
  }
  const records: ReplayRecord[] = [];
  const lines = fs.readFileSync(path, "utf-8").split(/\r?\n/);
  lines.forEach((line, index) => {
    if (line.trim() === "") return;
    let json: unknown;
    try {
      json = JSON.parse(line);
    } catch (err) {
      throw new ConfigurationError(`Replay file ${path} line ${index + 1} is not JSON`, [String(err)]);
    }
    const parsed = ReplayRecordSchema.safeParse(json);
    if (!parsed.success) {
      throw new ConfigurationError(
        `Replay file ${path} line ${index + 1} is invalid`,
        parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`)
      );
    }
    records.push(parsed.data);
  });
  return records;
}

/**
 * Plays recorded market data through the same connection contract the
 * live socket uses. Emits in batches so the event loop keeps turning.
 * Stays open after the last record.
 */
export class ReplayMarketSource implements IMarketDataConnection {
  private closed = false;
  private cursor = 0;

  constructor(
    readonly symbols: readonly string[],
    private readonly records: readonly ReplayRecord[]
  ) {}

  connect(handlers: IMarketDataHandlers): void {
    this.closed = false;
    this.cursor = 0;
    const wanted = new Set(this.symbols);
    const mine = this.records.filter((r) => wanted.has(r.symbol));

    const pump = () => {
      if (this.closed) return;
      const end = Math.min(this.cursor + BATCH_SIZE, mine.length);
      for (; this.cursor < end; this.cursor++) {
        const record = mine[this.cursor];
        if (record.type === "tick") {
          handlers.onTick({
            symbol: record.symbol,
            timestamp: record.timestamp,
            price: record.price,
            size: record.size,
            tradeId: record.tradeId,
          });
        } else {
          handlers.onBook({
            symbol: record.symbol,
            timestamp: record.timestamp,
            bids: record.bids.map(([price, size]) => ({ price, size })),
            asks: record.asks.map(([price, size]) => ({ price, size })),
          });
        }
      }
      if (this.cursor < mine.length) {
        setImmediate(pump);
      } else {
        logger.info(`[Replay] Finished ${mine.length} record(s) for ${this.symbols.join(", ")}`);
      }
    };

    setImmediate(() => {
      if (this.closed) return;
      handlers.onOpen();
      pump();
    });
  }

  close(): void {
    this.closed = true;
  }

  get position(): number {
    return this.cursor;
  }
}

export function replayFactory(records: readonly ReplayRecord[]): MarketDataConnectionFactory {
  return (symbols) => new ReplayMarketSource(symbols, records);
}
