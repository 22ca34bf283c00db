import { IFeatureSnapshot } from "./market.types";

export type SignalState = "BUILDUP" | "IMPULSE" | "CLIMAX" | "EXHAUSTION" | "REBALANCE";

export type OrderSide = "BUY" | "SELL";

export type ImpulseDirection = "UP" | "DOWN";

export type SignalReasonCode =
  | "IMPULSE_DISPLACEMENT"
  | "VOLUME_ZSCORE"
  | "TRADE_RATE_BURST"
  | "EXHAUSTION_RATIO"
  | "STRUCTURE_CONFIRMED"
  | "REGIME_OK"
  | "LOW_LIQUIDITY";

export type StateResetReason = "TIME_STOP" | "STALE" | "SETTINGS_CHANGED";

/** Immutable once created; consumed once by the RiskGate. */
export interface ISignal {
  readonly id: string;
  readonly symbol: string;
  readonly timestamp: number;
  readonly statePath: readonly SignalState[];
  readonly side: OrderSide;
  readonly impulseDirection: ImpulseDirection;
  readonly confidence: number;
  readonly reasonCodes: readonly SignalReasonCode[];
  readonly features: Readonly<IFeatureSnapshot>;
}

export interface IStateTransition {
  symbol: string;
  from: SignalState;
  to: SignalState;
  timestamp: number;
  reason: string;
}

export interface ISymbolStateView {
  symbol: string;
  state: SignalState;
  direction: ImpulseDirection | null;
  cycleStartedAt: number | null;
  armed: boolean;
}
