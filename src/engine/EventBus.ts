import {
  EventLevel,
  IEngineEvent,
  IEventFilter,
  IEventInput,
  IEventSink,
} from "../types/event.types";
import { Clock, systemClock } from "../utils/clock";
import { maskSecret } from "../config/environment";
import { logger } from "../utils/logger";

const LEVEL_RANK: Record<EventLevel, number> = {
  DEBUG: 10,
  INFO: 20,
  WARNING: 30,
  ERROR: 40,
};

const DEFAULT_HISTORY_SIZE = 2_000;
const DEFAULT_SUBSCRIBER_CAPACITY = 1_000;
const MAX_SANITIZE_DEPTH = 4;

const REDACTED_KEY = /(secret|signature|password|passphrase|token)/i;
const MASKED_KEY = /api[_-]?key/i;

export function matchesFilter(event: IEngineEvent, filter?: IEventFilter): boolean {
  if (!filter) return true;
  if (filter.category && event.category !== filter.category) return false;
  if (filter.symbol && event.symbol !== filter.symbol) return false;
  if (filter.minLevel && LEVEL_RANK[event.level] < LEVEL_RANK[filter.minLevel]) return false;
  return true;
}

/** Strip credentials from event payloads before they leave the engine. */
export function sanitizePayload(value: unknown, depth = 0): unknown {
  if (depth > MAX_SANITIZE_DEPTH || value === null || typeof value !== "object") {
    return value;
  }
  if (Array.isArray(value)) {
    return value.map((item) => sanitizePayload(item, depth + 1));
  }
  const clean: Record<string, unknown> = {};
  for (const [key, item] of Object.entries(value)) {
    if (MASKED_KEY.test(key)) {
      clean[key] = maskSecret(typeof item === "string" ? item : undefined);
    } else if (REDACTED_KEY.test(key)) {
      clean[key] = "***";
    } else {
      clean[key] = sanitizePayload(item, depth + 1);
    }
  }
  return clean;
}

/**
 * Bounded per-subscriber queue. When full the oldest event is dropped so a
 * slow consumer never blocks publishers.
 */
export class EventSubscription implements AsyncIterable<IEngineEvent> {
  private queue: IEngineEvent[] = [];
  private waiter: ((result: IteratorResult<IEngineEvent>) => void) | null = null;
  private droppedCount = 0;
  private closed = false;

  constructor(
    private readonly capacity: number,
    private readonly filter: IEventFilter | undefined,
    private readonly onClose: (subscription: EventSubscription) => void
  ) {}

  get dropped(): number {
    return this.droppedCount;
  }

  get size(): number {
    return this.queue.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  offer(event: IEngineEvent): void {
    if (this.closed || !matchesFilter(event, this.filter)) return;

    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve({ value: event, done: false });
      return;
    }

    this.queue.push(event);
    if (this.queue.length > this.capacity) {
      this.queue.shift();
      this.droppedCount++;
    }
  }

  /** Take up to `limit` queued events without waiting. */
  drain(limit = Number.POSITIVE_INFINITY): IEngineEvent[] {
    const count = Math.min(limit, this.queue.length);
    return this.queue.splice(0, count);
  }

  next(): Promise<IteratorResult<IEngineEvent>> {
    const event = this.queue.shift();
    if (event) return Promise.resolve({ value: event, done: false });
    if (this.closed) return Promise.resolve({ value: undefined, done: true });
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.queue = [];
    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve({ value: undefined, done: true });
    }
    this.onClose(this);
  }

  [Symbol.asyncIterator](): AsyncIterator<IEngineEvent> {
    return {
      next: () => this.next(),
      return: () => {
        this.close();
        return Promise.resolve({ value: undefined, done: true });
      },
    };
  }
}

export interface EventBusOptions {
  historySize?: number;
  defaultCapacity?: number;
  clock?: Clock;
  mirrorToLogger?: boolean;
}

export interface SubscribeOptions {
  capacity?: number;
  filter?: IEventFilter;
}

export type EventHandler = (event: IEngineEvent) => void | Promise<void>;

export class EventBus implements IEventSink {
  private readonly historySize: number;
  private readonly defaultCapacity: number;
  private readonly clock: Clock;
  private readonly mirrorToLogger: boolean;
  private history: IEngineEvent[] = [];
  private subscriptions: Set<EventSubscription> = new Set();
  private nextId = 1;

  constructor(options: EventBusOptions = {}) {
    this.historySize = options.historySize ?? DEFAULT_HISTORY_SIZE;
    this.defaultCapacity = options.defaultCapacity ?? DEFAULT_SUBSCRIBER_CAPACITY;
    this.clock = options.clock ?? systemClock;
    this.mirrorToLogger = options.mirrorToLogger ?? true;
  }

  publish(input: IEventInput): IEngineEvent {
    const sanitized = sanitizePayload(input.payload ?? {});
    const event: IEngineEvent = Object.freeze({
      id: this.nextId++,
      ts: this.clock.now(),
      level: input.level,
      category: input.category,
      symbol: input.symbol ?? null,
      correlationId: input.correlationId ?? null,
      message: input.message,
      payload: isRecord(sanitized) ? sanitized : {},
    });

    this.history.push(event);
    if (this.history.length > this.historySize) {
      this.history.splice(0, this.history.length - this.historySize);
    }

    if (this.mirrorToLogger) this.mirror(event);

    for (const subscription of this.subscriptions) {
      subscription.offer(event);
    }
    return event;
  }

  subscribe(options: SubscribeOptions = {}): EventSubscription {
    const subscription = new EventSubscription(
      options.capacity ?? this.defaultCapacity,
      options.filter,
      (closed) => this.subscriptions.delete(closed)
    );
    this.subscriptions.add(subscription);
    return subscription;
  }

  /**
   * Deliver events to a handler from its own queue. Handler failures are
   * logged and do not stop delivery.
   */
  onEvent(handler: EventHandler, options: SubscribeOptions = {}): EventSubscription {
    const subscription = this.subscribe(options);
    this.pump(subscription, handler).catch((err) => {
      logger.error("[EventBus] Subscriber pump stopped", err);
    });
    return subscription;
  }

  recent(limit = 100, filter?: IEventFilter): IEngineEvent[] {
    const matching = filter ? this.history.filter((e) => matchesFilter(e, filter)) : this.history;
    return matching.slice(-limit);
  }

  subscriberCount(): number {
    return this.subscriptions.size;
  }

  close(): void {
    for (const subscription of Array.from(this.subscriptions)) {
      subscription.close();
    }
  }

  private async pump(subscription: EventSubscription, handler: EventHandler): Promise<void> {
    for await (const event of subscription) {
      try {
        await handler(event);
      } catch (err) {
        logger.error(`[EventBus] Handler failed on event ${event.id}`, err);
      }
    }
  }

  private mirror(event: IEngineEvent): void {
    const line = `[${event.category}]${event.symbol ? ` ${event.symbol}` : ""} ${event.message}`;
    const context = { correlationId: event.correlationId, payload: event.payload };
    switch (event.level) {
      case "DEBUG":
        logger.debug(line, context);
        break;
      case "INFO":
        logger.info(line, context);
        break;
      case "WARNING":
        logger.warning(line, context);
        break;
      case "ERROR":
        logger.error(line, context);
        break;
    }
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
