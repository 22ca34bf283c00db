export type RiskOutcome = "ACCEPT" | "BLOCK";

export type RiskBlockReason =
  | "KILL_SWITCH"
  | "ENTRIES_PAUSED"
  | "FEED_STALE"
  | "DAILY_LOSS_LIMIT"
  | "ACCOUNT_EXPOSURE_LIMIT"
  | "SYMBOL_EXPOSURE_LIMIT"
  | "POSITION_LIMIT"
  | "SYMBOL_POSITION_LIMIT"
  | "COOLDOWN_ACTIVE"
  | "CONSECUTIVE_LOSS_LIMIT"
  | "TRADE_RATE_LIMIT"
  | "INVALID_SIZE";

export interface IRiskDecision {
  readonly signalId: string;
  readonly symbol: string;
  readonly outcome: RiskOutcome;
  readonly blockedReason?: RiskBlockReason;
  readonly detail?: string;
  readonly notional?: number;
  readonly decidedAt: number;
}

export interface IRiskState {
  equity: number;
  startingEquity: number;
  dailyPnl: number;
  unrealizedPnl: number;
  tradingDay: string;
  openPositionsBySymbol: Record<string, number>;
  exposureBySymbol: Record<string, number>;
  reservedNotional: Record<string, number>;
  consecutiveLosses: number;
  cooldownUntil: number;
  cooldownReason: string | null;
  symbolCooldownUntil: Record<string, number>;
  killSwitchEngaged: boolean;
  killSwitchReason: string | null;
  entriesPaused: boolean;
  pausedSymbols: string[];
  staleSymbols: string[];
  tradesLastHour: number;
}
