// ==================== TICKS ====================

export interface ITick {
  readonly symbol: string;
  readonly timestamp: number; // exchange trade time, ms
  readonly price: number;
  readonly size: number;
  readonly tradeId: number;
}

// ==================== ORDERBOOK ====================

export interface IBookLevel {
  price: number;
  size: number;
}

/** Best level first on both sides. */
export interface IBookSnapshot {
  symbol: string;
  timestamp: number;
  bids: IBookLevel[];
  asks: IBookLevel[];
}

// ==================== FEED LIVENESS ====================

export interface IFeedLiveness {
  symbol: string;
  live: boolean;
  stale: boolean;
  lastTickAt: number | null;
}

export type LivenessChange = "STALE" | "RESTORED";

/**
 * One upstream market-data connection (a socket, a replay file, a test fake).
 * The supervisor owns reconnects; a connection only reports what happened.
 */
export interface IMarketDataConnection {
  readonly symbols: readonly string[];
  connect(handlers: IMarketDataHandlers): void;
  close(): void;
}

export interface IMarketDataHandlers {
  onOpen(): void;
  onTick(tick: ITick): void;
  onBook(book: IBookSnapshot): void;
  onClose(reason: string): void;
  onError(err: Error): void;
}

export type MarketDataConnectionFactory = (symbols: readonly string[]) => IMarketDataConnection;

// ==================== FEATURES ====================

export interface IFeatureSnapshot {
  symbol: string;
  timestamp: number;
  price: number;
  displacementPct: number;
  volumeZScore: number;
  tradeRateRatio: number;
  exhaustionRatio: number;
  trendStrengthPct: number;
  volatility: number;
  lowLiquidity: boolean;
  warmingUp: boolean;
}
