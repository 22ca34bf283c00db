import { EventCategory } from "./event.types";
import { OrderSide } from "./signal.types";

export interface ISignalRecord {
  signalId: string;
  symbol: string;
  side: OrderSide;
  confidence: number;
  price: number;
  statePath: string[];
  reasonCodes: string[];
  emittedAt: number;
}

export interface ITradeRecord {
  signalId: string;
  symbol: string;
  kind: "CLOSED" | "REDUCED" | "REVERSED";
  exitSide: OrderSide;
  closedQty: number;
  entryPrice: number;
  exitPrice: number;
  realizedPnl: number;
  fee: number;
  closedAt: number;
}

export interface IIncidentRecord {
  eventId: number;
  category: EventCategory;
  symbol: string | null;
  correlationId: string | null;
  message: string;
  payload: Record<string, unknown>;
  occurredAt: number;
}

/** Append-only sink for trading history. */
export interface IHistoryStore {
  saveSignal(record: ISignalRecord): Promise<void>;
  saveTrade(record: ITradeRecord): Promise<void>;
  saveIncident(record: IIncidentRecord): Promise<void>;
}
