import { IFill, IPosition, IPositionChange, PositionSide } from "../types/execution.types";
import { logger } from "../utils/logger";

const QTY_EPSILON = 1e-12;

function sideOfFill(fill: IFill): PositionSide {
  return fill.side === "BUY" ? "LONG" : "SHORT";
}

function pnlPerUnit(side: PositionSide, entryPrice: number, exitPrice: number): number {
  return side === "LONG" ? exitPrice - entryPrice : entryPrice - exitPrice;
}

/**
 * Authoritative position table, one net position per symbol. Positions
 * change only through fills.
 */
export class PositionManager {
  private positions: Map<string, IPosition> = new Map();

  applyFill(fill: IFill): IPositionChange {
    const fillSide = sideOfFill(fill);
    const existing = this.positions.get(fill.symbol);
    const base = { symbol: fill.symbol, signalId: fill.signalId, fee: fill.fee, timestamp: fill.timestamp };

    if (!existing) {
      const position = this.open(fill, fillSide, fill.qty);
      return { ...base, kind: "OPENED", position: { ...position }, realizedPnl: 0, closedQty: 0 };
    }

    if (existing.side === fillSide) {
      const qty = existing.qty + fill.qty;
      existing.entryPrice = (existing.entryPrice * existing.qty + fill.price * fill.qty) / qty;
      existing.qty = qty;
      this.mark(existing, fill.price);
      return { ...base, kind: "INCREASED", position: { ...existing }, realizedPnl: 0, closedQty: 0 };
    }

    const closedQty = Math.min(existing.qty, fill.qty);
    const realizedPnl = pnlPerUnit(existing.side, existing.entryPrice, fill.price) * closedQty;
    const remainder = fill.qty - closedQty;
    const entryPrice = existing.entryPrice;

    if (existing.qty - closedQty > QTY_EPSILON) {
      existing.qty -= closedQty;
      this.mark(existing, fill.price);
      return {
        ...base,
        kind: "REDUCED",
        position: { ...existing },
        realizedPnl,
        closedQty,
        entryPrice,
        exitPrice: fill.price,
      };
    }

    this.positions.delete(fill.symbol);
    if (remainder > QTY_EPSILON) {
      const position = this.open(fill, fillSide, remainder);
      return {
        ...base,
        kind: "REVERSED",
        position: { ...position },
        realizedPnl,
        closedQty,
        entryPrice,
        exitPrice: fill.price,
      };
    }

    logger.info(
      `[Positions] Closed ${existing.side} ${fill.symbol} | Qty: ${closedQty} | PnL: $${realizedPnl.toFixed(4)}`
    );
    return { ...base, kind: "CLOSED", position: null, realizedPnl, closedQty, entryPrice, exitPrice: fill.price };
  }

  markToMarket(symbol: string, price: number): void {
    const position = this.positions.get(symbol);
    if (position) this.mark(position, price);
  }

  get(symbol: string): IPosition | undefined {
    const position = this.positions.get(symbol);
    return position ? { ...position } : undefined;
  }

  list(): IPosition[] {
    return Array.from(this.positions.values()).map((p) => ({ ...p }));
  }

  count(): number {
    return this.positions.size;
  }

  totalUnrealizedPnl(): number {
    let total = 0;
    for (const position of this.positions.values()) total += position.unrealizedPnl;
    return total;
  }

  /** Replace the table with positions recovered from a snapshot. */
  restore(positions: IPosition[]): void {
    this.positions.clear();
    for (const position of positions) {
      this.positions.set(position.symbol, { ...position });
    }
  }

  private open(fill: IFill, side: PositionSide, qty: number): IPosition {
    const position: IPosition = {
      symbol: fill.symbol,
      side,
      qty,
      entryPrice: fill.price,
      openedAt: fill.timestamp,
      markPrice: fill.price,
      unrealizedPnl: 0,
    };
    this.positions.set(fill.symbol, position);
    logger.info(`[Positions] Opened ${side} ${fill.symbol} | Qty: ${qty} @ $${fill.price.toFixed(4)}`);
    return position;
  }

  private mark(position: IPosition, price: number): void {
    position.markPrice = price;
    position.unrealizedPnl = pnlPerUnit(position.side, position.entryPrice, price) * position.qty;
  }
}
