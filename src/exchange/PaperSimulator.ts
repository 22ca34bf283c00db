import { v4 as uuidv4 } from "uuid";
import { SettingsStore } from "../config/settings";
import { IGatewayOrder, IOrderGateway, IOrderRequest } from "../types/execution.types";
import { Clock, systemClock } from "../utils/clock";
import { GatewayError } from "../utils/errors";
import { logger } from "../utils/logger";
import { MarketBook } from "./MarketBook";

/**
 * Paper gateway. Market orders fill immediately at the touch (or the
 * price hint when no book is known) moved by the configured slippage.
 * Client order ids are unique here as they are on the exchange.
 */
export class PaperSimulator implements IOrderGateway {
  readonly name = "paper";
  private orders: Map<string, IGatewayOrder> = new Map();
  private totalFees = 0;

  constructor(
    private readonly book: MarketBook,
    private readonly settings: SettingsStore,
    private readonly clock: Clock = systemClock
  ) {}

  async placeOrder(request: IOrderRequest): Promise<IGatewayOrder> {
    const existing = this.orders.get(request.clientOrderId);
    if (existing) return existing;

    if (request.quantity <= 0) {
      throw GatewayError.permanent("INVALID_ORDER", `Quantity must be positive, got ${request.quantity}`);
    }

    const touch =
      request.side === "BUY" ? this.book.bestAsk(request.symbol) : this.book.bestBid(request.symbol);
    const reference = touch ?? request.priceHint;
    if (!(reference > 0)) {
      throw GatewayError.permanent("INVALID_ORDER", `No price available for ${request.symbol}`);
    }

    const { slippageBps, feeBps } = this.settings.current.paper;
    const slip = slippageBps / 10_000;
    const fillPrice = request.side === "BUY" ? reference * (1 + slip) : reference * (1 - slip);
    const fee = fillPrice * request.quantity * (feeBps / 10_000);

    const order: IGatewayOrder = {
      orderId: uuidv4(),
      clientOrderId: request.clientOrderId,
      symbol: request.symbol,
      side: request.side,
      status: "FILLED",
      quantity: request.quantity,
      executedQty: request.quantity,
      avgPrice: fillPrice,
      fee,
      updatedAt: this.clock.now(),
    };
    this.orders.set(order.clientOrderId, order);
    this.totalFees += fee;

    logger.info(
      `[Paper] ${request.side} ${request.symbol} | Qty: ${request.quantity} @ $${fillPrice.toFixed(4)} | ` +
        `Fee: $${fee.toFixed(4)}${request.reduceOnly ? " | reduce-only" : ""}`
    );
    return order;
  }

  async queryOrder(_symbol: string, clientOrderId: string): Promise<IGatewayOrder | null> {
    return this.orders.get(clientOrderId) ?? null;
  }

  async cancelOrder(_symbol: string, clientOrderId: string): Promise<IGatewayOrder | null> {
    const order = this.orders.get(clientOrderId);
    if (!order) return null;
    if (order.status === "NEW" || order.status === "PARTIALLY_FILLED") {
      const canceled: IGatewayOrder = { ...order, status: "CANCELED", updatedAt: this.clock.now() };
      this.orders.set(clientOrderId, canceled);
      return canceled;
    }
    return order;
  }

  getState(): { orders: number; totalFees: number } {
    return { orders: this.orders.size, totalFees: this.totalFees };
  }
}
