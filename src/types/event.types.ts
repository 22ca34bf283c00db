export type EventCategory =
  | "WS"
  | "SIGNAL"
  | "FILTER"
  | "ORDER"
  | "FILL"
  | "POSITION"
  | "RISK"
  | "SYSTEM"
  | "ERROR";

export type EventLevel = "DEBUG" | "INFO" | "WARNING" | "ERROR";

export interface IEngineEvent {
  readonly id: number;
  readonly ts: number;
  readonly level: EventLevel;
  readonly category: EventCategory;
  readonly symbol: string | null;
  readonly correlationId: string | null;
  readonly message: string;
  readonly payload: Readonly<Record<string, unknown>>;
}

export interface IEventInput {
  level: EventLevel;
  category: EventCategory;
  message: string;
  symbol?: string | null;
  correlationId?: string | null;
  payload?: Record<string, unknown>;
}

export interface IEventFilter {
  category?: EventCategory;
  symbol?: string;
  minLevel?: EventLevel;
}

/** Anything that accepts events; components depend on this, not on the bus. */
export interface IEventSink {
  publish(input: IEventInput): IEngineEvent;
}
