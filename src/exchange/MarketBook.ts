import { IBookLevel, IBookSnapshot } from "../types/market.types";
import { OrderSide } from "../types/signal.types";

export interface BookWalk {
  filledQty: number;
  avgPrice: number;
  levelsUsed: number;
}

/**
 * Latest top-of-book per symbol. Written by the feed, read by the
 * execution path for admission checks and by the paper simulator.
 */
export class MarketBook {
  private books: Map<string, IBookSnapshot> = new Map();

  update(book: IBookSnapshot): void {
    const current = this.books.get(book.symbol);
    if (current && current.timestamp > book.timestamp) return;
    this.books.set(book.symbol, book);
  }

  get(symbol: string): IBookSnapshot | undefined {
    return this.books.get(symbol);
  }

  bestBid(symbol: string): number | null {
    return this.books.get(symbol)?.bids[0]?.price ?? null;
  }

  bestAsk(symbol: string): number | null {
    return this.books.get(symbol)?.asks[0]?.price ?? null;
  }

  mid(symbol: string): number | null {
    const bid = this.bestBid(symbol);
    const ask = this.bestAsk(symbol);
    if (bid === null || ask === null) return null;
    return (bid + ask) / 2;
  }

  spreadBps(symbol: string): number | null {
    const bid = this.bestBid(symbol);
    const ask = this.bestAsk(symbol);
    const mid = this.mid(symbol);
    if (bid === null || ask === null || mid === null || mid <= 0) return null;
    return ((ask - bid) / mid) * 10_000;
  }

  /** Levels a market order of this side would take from. */
  takerLevels(symbol: string, side: OrderSide): IBookLevel[] {
    const book = this.books.get(symbol);
    if (!book) return [];
    return side === "BUY" ? book.asks : book.bids;
  }

  depthNotional(symbol: string, side: OrderSide): number {
    return this.takerLevels(symbol, side).reduce((sum, level) => sum + level.price * level.size, 0);
  }

  /** Walk the taker side for `qty`, returning the volume-weighted price. */
  walk(symbol: string, side: OrderSide, qty: number): BookWalk {
    let remaining = qty;
    let cost = 0;
    let levelsUsed = 0;
    for (const level of this.takerLevels(symbol, side)) {
      if (remaining <= 0) break;
      const take = Math.min(remaining, level.size);
      cost += take * level.price;
      remaining -= take;
      levelsUsed++;
    }
    const filledQty = qty - Math.max(0, remaining);
    return {
      filledQty,
      avgPrice: filledQty > 0 ? cost / filledQty : 0,
      levelsUsed,
    };
  }
}
