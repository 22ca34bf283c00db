/**
 * BINANCE USDT-M FUTURES CLIENT
 *
 * Signed REST gateway used for live execution. HMAC-SHA256 signing.
 * Testnet: https://testnet.binancefuture.com
 * Live:    https://fapi.binance.com
 */

import * as crypto from "crypto";
import axios, { AxiosInstance } from "axios";
import { z } from "zod";
import {
  GatewayOrderStatus,
  IGatewayOrder,
  ILiveGateway,
  IOrderRequest,
  ISymbolFilters,
} from "../types/execution.types";
import { Clock, systemClock } from "../utils/clock";
import { errorMessage, GatewayError } from "../utils/errors";
import { logger } from "../utils/logger";
import { RateLimiter } from "../utils/rateLimit";
import { maskSecret } from "../config/environment";

const LIVE_BASE_URL = "https://fapi.binance.com";
const TESTNET_BASE_URL = "https://testnet.binancefuture.com";

// Exchange error codes (https://binance-docs.github.io/apidocs/futures/en/#error-codes)
const ERR_DISCONNECTED = -1001;
const ERR_TOO_MANY_REQUESTS = -1003;
const ERR_TIMEOUT = -1007;
const ERR_TIMESTAMP = -1021;
const ERR_NO_SUCH_ORDER = -2013;
const ERR_UNKNOWN_ORDER = -2011;
const ERR_INSUFFICIENT_MARGIN = -2019;

// ==================== RESPONSE SCHEMAS ====================

const numeric = z.union([z.string(), z.number()]).transform((v) => Number(v));

const ServerTimeSchema = z.object({ serverTime: z.number() });

const FilterSchema = z
  .object({
    filterType: z.string(),
    tickSize: numeric.optional(),
    stepSize: numeric.optional(),
    minQty: numeric.optional(),
    notional: numeric.optional(),
  })
  .passthrough();

const ExchangeInfoSchema = z.object({
  symbols: z.array(
    z.object({
      symbol: z.string(),
      filters: z.array(FilterSchema),
    })
  ),
});

const BalanceSchema = z.array(
  z.object({
    asset: z.string(),
    balance: numeric,
    availableBalance: numeric,
  })
);

const OrderSchema = z.object({
  orderId: z.union([z.number(), z.string()]),
  clientOrderId: z.string(),
  symbol: z.string(),
  side: z.enum(["BUY", "SELL"]),
  status: z.string(),
  origQty: numeric,
  executedQty: numeric,
  avgPrice: numeric.optional(),
  cumQuote: numeric.optional(),
  updateTime: z.number().optional(),
});

const ErrorBodySchema = z.object({ code: z.number(), msg: z.string() });

const KNOWN_STATUSES: readonly GatewayOrderStatus[] = [
  "NEW",
  "PARTIALLY_FILLED",
  "FILLED",
  "CANCELED",
  "REJECTED",
  "EXPIRED",
];

function toOrderStatus(raw: string): GatewayOrderStatus {
  return KNOWN_STATUSES.find((status) => status === raw) ?? "EXPIRED";
}

// ==================== ERROR CLASSIFICATION ====================

/**
 * Map any failure from the REST layer onto the transient/permanent split.
 * No response, throttling, 5xx and a few exchange codes are transient;
 * everything the exchange explicitly refused is permanent.
 */
export function classifyBinanceError(err: unknown): GatewayError {
  if (err instanceof GatewayError) return err;
  if (!axios.isAxiosError(err)) {
    return GatewayError.permanent("UNKNOWN", errorMessage(err));
  }

  if (!err.response) {
    const timedOut = err.code === "ECONNABORTED" || err.code === "ETIMEDOUT";
    return GatewayError.transient(timedOut ? "TIMEOUT" : "DISCONNECTED", err.message);
  }

  const { status } = err.response;
  const body = ErrorBodySchema.safeParse(err.response.data);
  const code = body.success ? body.data.code : undefined;
  const msg = body.success ? body.data.msg : `HTTP ${status}`;

  if (status === 429 || status === 418 || code === ERR_TOO_MANY_REQUESTS) {
    return GatewayError.transient("RATE_LIMITED", msg, code);
  }
  if (code === ERR_DISCONNECTED) return GatewayError.transient("DISCONNECTED", msg, code);
  if (code === ERR_TIMEOUT) return GatewayError.transient("TIMEOUT", msg, code);
  if (code === ERR_TIMESTAMP) return GatewayError.transient("TIMESTAMP_SKEW", msg, code);
  if (status >= 500) return GatewayError.transient("EXCHANGE_UNAVAILABLE", msg, code);
  if (code === ERR_INSUFFICIENT_MARGIN) return GatewayError.permanent("INSUFFICIENT_MARGIN", msg, code);
  if (code !== undefined && code <= -1100 && code > -1200) {
    return GatewayError.permanent("INVALID_ORDER", msg, code);
  }
  return GatewayError.permanent("REJECTED", msg, code);
}

// ==================== CLIENT ====================

export interface BinanceFuturesClientOptions {
  apiKey: string;
  apiSecret: string;
  testnet?: boolean;
  recvWindow?: number;
  timeoutMs?: number;
  http?: AxiosInstance;
  clock?: Clock;
  rateLimiter?: RateLimiter;
}

type Method = "GET" | "POST" | "DELETE";

export class BinanceFuturesClient implements ILiveGateway {
  readonly name = "binance-futures";
  private apiKey: string;
  private apiSecret: string;
  private isTestnet: boolean;
  private recvWindow: number;
  private http: AxiosInstance;
  private clock: Clock;
  private limiter: RateLimiter;
  private timeOffsetMs = 0;
  private needsTimeSync = true;

  constructor(options: BinanceFuturesClientOptions) {
    this.apiKey = options.apiKey;
    this.apiSecret = options.apiSecret;
    this.isTestnet = options.testnet ?? false;
    this.recvWindow = options.recvWindow ?? 5000;
    this.clock = options.clock ?? systemClock;
    // 2400 weight per minute on the futures API
    this.limiter = options.rateLimiter ?? new RateLimiter(40, 40, this.clock);
    this.http =
      options.http ??
      axios.create({
        baseURL: this.isTestnet ? TESTNET_BASE_URL : LIVE_BASE_URL,
        timeout: options.timeoutMs ?? 5000,
      });
  }

  private sign(query: string): string {
    return crypto.createHmac("sha256", this.apiSecret).update(query).digest("hex");
  }

  private async request(
    method: Method,
    path: string,
    params: Record<string, string | number | boolean> = {},
    signed = true,
    weight = 1
  ): Promise<unknown> {
    if (signed && this.needsTimeSync) {
      await this.syncTime();
    }
    await this.limiter.acquire(weight);

    const qs = new URLSearchParams();
    for (const [k, v] of Object.entries(params)) {
      qs.set(k, String(v));
    }
    if (signed) {
      qs.set("timestamp", String(this.clock.now() + this.timeOffsetMs));
      qs.set("recvWindow", String(this.recvWindow));
      qs.set("signature", this.sign(qs.toString()));
    }

    try {
      const response = await this.http.request({
        method,
        url: method === "POST" ? path : `${path}?${qs.toString()}`,
        data: method === "POST" ? qs.toString() : undefined,
        headers: {
          "X-MBX-APIKEY": this.apiKey,
          "Content-Type": "application/x-www-form-urlencoded",
        },
      });
      return response.data;
    } catch (err) {
      const classified = classifyBinanceError(err);
      if (classified.code === "TIMESTAMP_SKEW") this.needsTimeSync = true;
      throw classified;
    }
  }

  private parse<S extends z.ZodTypeAny>(schema: S, data: unknown, what: string): z.output<S> {
    const result = schema.safeParse(data);
    if (!result.success) {
      throw GatewayError.permanent("UNKNOWN", `Unexpected ${what} payload: ${result.error.issues[0]?.message ?? "invalid"}`);
    }
    return result.data;
  }

  async syncTime(): Promise<number> {
    const data = await this.request("GET", "/fapi/v1/time", {}, false);
    const { serverTime } = this.parse(ServerTimeSchema, data, "server time");
    this.timeOffsetMs = serverTime - this.clock.now();
    this.needsTimeSync = false;
    logger.info(`[BINANCE] Server time offset ${this.timeOffsetMs}ms`);
    return this.timeOffsetMs;
  }

  async connect(symbols: readonly string[]): Promise<ISymbolFilters[]> {
    // 1. Time sync
    await this.syncTime();

    // 2. Symbol filters for order normalization
    const filters = await this.loadSymbolFilters(symbols);

    // 3. Auth check with balance
    const balance = await this.getBalance();

    logger.success(
      `[BINANCE] Connected to ${this.isTestnet ? "TESTNET" : "LIVE"} | ` +
        `Key: ${maskSecret(this.apiKey)} | USDT: $${balance.total.toFixed(2)} | Symbols: ${filters.length}`
    );
    return filters;
  }

  // ==================== EXCHANGE INFO ====================

  async loadSymbolFilters(symbols: readonly string[]): Promise<ISymbolFilters[]> {
    const data = await this.request("GET", "/fapi/v1/exchangeInfo", {}, false, 1);
    const info = this.parse(ExchangeInfoSchema, data, "exchangeInfo");
    const wanted = new Set(symbols);
    const result: ISymbolFilters[] = [];

    for (const sym of info.symbols) {
      if (!wanted.has(sym.symbol)) continue;
      const price = sym.filters.find((f) => f.filterType === "PRICE_FILTER");
      const lot = sym.filters.find((f) => f.filterType === "MARKET_LOT_SIZE") ?? sym.filters.find((f) => f.filterType === "LOT_SIZE");
      const notional = sym.filters.find((f) => f.filterType === "MIN_NOTIONAL");
      result.push({
        symbol: sym.symbol,
        tickSize: price?.tickSize ?? 0.01,
        stepSize: lot?.stepSize ?? 0.001,
        minQty: lot?.minQty ?? 0.001,
        minNotional: notional?.notional ?? 5,
      });
    }

    const missing = symbols.filter((s) => !result.some((f) => f.symbol === s));
    if (missing.length > 0) {
      logger.warning(`[BINANCE] No exchange filters for ${missing.join(", ")}`);
    }
    return result;
  }

  // ==================== BALANCE ====================

  async getBalance(): Promise<{ total: number; free: number; used: number }> {
    const data = await this.request("GET", "/fapi/v2/balance", {}, true, 5);
    const balances = this.parse(BalanceSchema, data, "balance");
    const usdt = balances.find((b) => b.asset === "USDT");
    if (!usdt) return { total: 0, free: 0, used: 0 };
    return { total: usdt.balance, free: usdt.availableBalance, used: usdt.balance - usdt.availableBalance };
  }

  // ==================== ORDERS ====================

  async placeOrder(request: IOrderRequest): Promise<IGatewayOrder> {
    const params: Record<string, string | number | boolean> = {
      symbol: request.symbol,
      side: request.side,
      type: "MARKET",
      quantity: request.quantity,
      newClientOrderId: request.clientOrderId,
      newOrderRespType: "RESULT",
    };
    if (request.reduceOnly) params.reduceOnly = "true";

    const data = await this.request("POST", "/fapi/v1/order", params);
    const order = this.toGatewayOrder(data);
    logger.info(
      `[BINANCE] ${request.side} ${request.symbol} | Qty: ${request.quantity} @ $${order.avgPrice.toFixed(4)} | ` +
        `Status: ${order.status} | ID: ${order.orderId}`
    );
    return order;
  }

  async queryOrder(symbol: string, clientOrderId: string): Promise<IGatewayOrder | null> {
    try {
      const data = await this.request("GET", "/fapi/v1/order", { symbol, origClientOrderId: clientOrderId });
      return this.toGatewayOrder(data);
    } catch (err) {
      if (err instanceof GatewayError && err.exchangeCode === ERR_NO_SUCH_ORDER) return null;
      throw err;
    }
  }

  async cancelOrder(symbol: string, clientOrderId: string): Promise<IGatewayOrder | null> {
    try {
      const data = await this.request("DELETE", "/fapi/v1/order", { symbol, origClientOrderId: clientOrderId });
      return this.toGatewayOrder(data);
    } catch (err) {
      if (
        err instanceof GatewayError &&
        (err.exchangeCode === ERR_UNKNOWN_ORDER || err.exchangeCode === ERR_NO_SUCH_ORDER)
      ) {
        return null;
      }
      throw err;
    }
  }

  // ==================== HELPERS ====================

  private toGatewayOrder(data: unknown): IGatewayOrder {
    const order = this.parse(OrderSchema, data, "order");
    const executedQty = order.executedQty;
    let avgPrice = order.avgPrice ?? 0;
    if (avgPrice <= 0 && order.cumQuote && executedQty > 0) {
      avgPrice = order.cumQuote / executedQty;
    }
    return {
      orderId: String(order.orderId),
      clientOrderId: order.clientOrderId,
      symbol: order.symbol,
      side: order.side,
      status: toOrderStatus(order.status),
      quantity: order.origQty,
      executedQty,
      avgPrice,
      // Commission arrives on the user-data stream; order responses omit it
      fee: 0,
      updatedAt: order.updateTime ?? this.clock.now(),
    };
  }
}
