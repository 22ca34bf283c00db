import { ISymbolFilters } from "../types/execution.types";
import { floorToStep, roundToStep } from "../utils/mathUtils";

// Used in paper mode until exchange filters are known
export const DEFAULT_FILTERS: Omit<ISymbolFilters, "symbol"> = {
  tickSize: 0.01,
  stepSize: 0.001,
  minQty: 0.001,
  minNotional: 5,
};

export interface NormalizedOrder {
  quantity: number;
  price: number;
  notional: number;
}

export type NormalizeFailure = "BELOW_MIN_QTY" | "BELOW_MIN_NOTIONAL";

/**
 * Round an order to exchange filters: quantity down to the lot step,
 * price to the nearest tick.
 */
export function normalizeOrder(
  filters: ISymbolFilters,
  rawQuantity: number,
  rawPrice: number,
  reduceOnly = false
): NormalizedOrder | NormalizeFailure {
  const quantity = floorToStep(rawQuantity, filters.stepSize);
  const price = roundToStep(rawPrice, filters.tickSize);
  if (quantity <= 0 || quantity < filters.minQty) return "BELOW_MIN_QTY";
  const notional = quantity * price;
  // The exchange waives min notional for reduce-only orders
  if (!reduceOnly && notional < filters.minNotional) return "BELOW_MIN_NOTIONAL";
  return { quantity, price, notional };
}

export class SymbolFilterRegistry {
  private filters: Map<string, ISymbolFilters> = new Map();

  constructor(private readonly fallback: Omit<ISymbolFilters, "symbol"> | null = DEFAULT_FILTERS) {}

  set(filters: ISymbolFilters): void {
    this.filters.set(filters.symbol, filters);
  }

  setAll(filters: ISymbolFilters[]): void {
    for (const entry of filters) this.set(entry);
  }

  get(symbol: string): ISymbolFilters | null {
    const known = this.filters.get(symbol);
    if (known) return known;
    return this.fallback ? { symbol, ...this.fallback } : null;
  }

  size(): number {
    return this.filters.size;
  }
}
