import { OrderSide } from "./signal.types";

// ==================== INTENTS ====================

export interface IOrderIntent {
  readonly signalId: string;
  readonly symbol: string;
  readonly side: OrderSide;
  readonly notional: number;
  readonly priceHint: number;
  readonly confidence: number;
  readonly reduceOnly: boolean;
  readonly quantity?: number; // exits carry an exact quantity
  readonly signalTimestamp: number;
  readonly decidedAt: number;
}

// ==================== GATEWAY ====================

export interface ISymbolFilters {
  symbol: string;
  tickSize: number;
  stepSize: number;
  minQty: number;
  minNotional: number;
}

export interface IOrderRequest {
  clientOrderId: string;
  symbol: string;
  side: OrderSide;
  quantity: number;
  reduceOnly: boolean;
  priceHint: number;
}

export type GatewayOrderStatus = "NEW" | "PARTIALLY_FILLED" | "FILLED" | "CANCELED" | "REJECTED" | "EXPIRED";

export interface IGatewayOrder {
  orderId: string;
  clientOrderId: string;
  symbol: string;
  side: OrderSide;
  status: GatewayOrderStatus;
  quantity: number;
  executedQty: number;
  avgPrice: number;
  fee: number;
  updatedAt: number;
}

export interface IOrderGateway {
  readonly name: string;
  placeOrder(request: IOrderRequest): Promise<IGatewayOrder>;
  /** null when the exchange has no order with this client id. */
  queryOrder(symbol: string, clientOrderId: string): Promise<IGatewayOrder | null>;
  cancelOrder(symbol: string, clientOrderId: string): Promise<IGatewayOrder | null>;
}

/** A gateway backed by a real venue; connecting yields its symbol filters. */
export interface ILiveGateway extends IOrderGateway {
  connect(symbols: readonly string[]): Promise<ISymbolFilters[]>;
}

// ==================== ATTEMPTS / RESULTS ====================

export type AttemptStatus = "PENDING" | "ACKED" | "FILLED" | "REJECTED" | "TIMED_OUT";

export interface IExecutionAttempt {
  signalId: string;
  attemptNumber: number;
  sentAt: number;
  ackAt?: number;
  fillAt?: number;
  status: AttemptStatus;
  orderId?: string;
  error?: string;
}

export type ExecutionStatus = "FILLED" | "REJECTED" | "FAILED" | "SKIPPED";

export type ExecutionFailureReason =
  | "NO_BOOK"
  | "SPREAD_GUARD"
  | "DEPTH_GUARD"
  | "INSUFFICIENT_DEPTH"
  | "SLIPPAGE_GUARD"
  | "COST_EXCEEDS_EDGE"
  | "BELOW_MIN_NOTIONAL"
  | "NO_FILTERS"
  | "EXCHANGE_REJECTED"
  | "RETRY_EXHAUSTED"
  | "FILL_TIMEOUT";

export interface IFill {
  signalId: string;
  symbol: string;
  side: OrderSide;
  qty: number;
  price: number;
  fee: number;
  timestamp: number;
  orderId: string;
}

export interface ILatencyTrace {
  signalAt: number;
  decidedAt: number;
  sentAt?: number;
  ackAt?: number;
  fillAt?: number;
}

export interface IExecutionResult {
  signalId: string;
  symbol: string;
  status: ExecutionStatus;
  reason?: ExecutionFailureReason;
  detail?: string;
  attempts: IExecutionAttempt[];
  order?: IGatewayOrder;
  fill?: IFill;
  trace: ILatencyTrace;
  fromCache: boolean;
}

// ==================== POSITIONS ====================

export type PositionSide = "LONG" | "SHORT";

export interface IPosition {
  symbol: string;
  side: PositionSide;
  qty: number;
  entryPrice: number;
  openedAt: number;
  markPrice: number;
  unrealizedPnl: number;
}

export type PositionChangeKind = "OPENED" | "INCREASED" | "REDUCED" | "CLOSED" | "REVERSED";

export interface IPositionChange {
  kind: PositionChangeKind;
  symbol: string;
  signalId: string;
  position: IPosition | null; // null once flat
  realizedPnl: number;
  fee: number;
  closedQty: number;
  exitPrice?: number;
  entryPrice?: number;
  timestamp: number;
}
