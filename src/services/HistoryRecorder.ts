import { z } from "zod";
import { EventBus, EventSubscription } from "../engine/EventBus";
import { IEngineEvent } from "../types/event.types";
import { IHistoryStore, IIncidentRecord, ISignalRecord, ITradeRecord } from "../types/history.types";
import { logger } from "../utils/logger";

const SignalPayloadSchema = z.object({
  signalId: z.string(),
  side: z.enum(["BUY", "SELL"]),
  confidence: z.number(),
  price: z.number(),
  statePath: z.array(z.string()),
  reasonCodes: z.array(z.string()),
});

const TradePayloadSchema = z.object({
  kind: z.enum(["CLOSED", "REDUCED", "REVERSED"]),
  side: z.enum(["BUY", "SELL"]),
  closedQty: z.number().positive(),
  entryPrice: z.number(),
  exitPrice: z.number(),
  realizedPnl: z.number(),
  fee: z.number(),
});

export function toSignalRecord(event: IEngineEvent): ISignalRecord | null {
  if (event.category !== "SIGNAL" || event.level !== "INFO" || event.symbol === null) return null;
  const parsed = SignalPayloadSchema.safeParse(event.payload);
  if (!parsed.success) return null;
  return { ...parsed.data, symbol: event.symbol, emittedAt: event.ts };
}

export function toTradeRecord(event: IEngineEvent): ITradeRecord | null {
  if (event.category !== "POSITION" || event.symbol === null) return null;
  const parsed = TradePayloadSchema.safeParse(event.payload);
  if (!parsed.success) return null;
  const { side, ...rest } = parsed.data;
  return {
    ...rest,
    signalId: event.correlationId ?? "",
    symbol: event.symbol,
    exitSide: side,
    closedAt: event.ts,
  };
}

export function toIncidentRecord(event: IEngineEvent): IIncidentRecord | null {
  if (event.level !== "ERROR") return null;
  return {
    eventId: event.id,
    category: event.category,
    symbol: event.symbol,
    correlationId: event.correlationId,
    message: event.message,
    payload: { ...event.payload },
    occurredAt: event.ts,
  };
}

/**
 * Copies signals, completed trades and incidents from the event bus into
 * a history store. Store failures are logged and dropped.
 */
export class HistoryRecorder {
  private subscription: EventSubscription | null = null;
  private written = 0;
  private failed = 0;

  constructor(private readonly store: IHistoryStore) {}

  attach(bus: EventBus): void {
    if (this.subscription) return;
    this.subscription = bus.onEvent((event) => this.record(event), {
      filter: { minLevel: "INFO" },
    });
    logger.info("[History] Recording signals, trades and incidents");
  }

  detach(): void {
    this.subscription?.close();
    this.subscription = null;
  }

  async record(event: IEngineEvent): Promise<void> {
    const signal = toSignalRecord(event);
    if (signal) await this.write("signal", () => this.store.saveSignal(signal));

    const trade = toTradeRecord(event);
    if (trade) await this.write("trade", () => this.store.saveTrade(trade));

    const incident = toIncidentRecord(event);
    if (incident) await this.write("incident", () => this.store.saveIncident(incident));
  }

  getStats(): { written: number; failed: number } {
    return { written: this.written, failed: this.failed };
  }

  private async write(kind: string, save: () => Promise<void>): Promise<void> {
    try {
      await save();
      this.written++;
    } catch (err) {
      this.failed++;
      logger.error(`[History] Failed to write ${kind} record`, err);
    }
  }
}
