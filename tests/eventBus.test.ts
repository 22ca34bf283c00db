import { describe, expect, it } from "vitest";
import { EventBus, matchesFilter, sanitizePayload } from "../src/engine/EventBus";
import { IEngineEvent } from "../src/types/event.types";
import { BASE_TIME, ManualClock, settle } from "./helpers";

function bus(options: { historySize?: number } = {}): EventBus {
  return new EventBus({ clock: new ManualClock(), mirrorToLogger: false, ...options });
}

describe("EventBus", () => {
  it("stamps events with a sequence id and the clock time", () => {
    const events = bus();
    const first = events.publish({ level: "INFO", category: "SYSTEM", message: "one" });
    const second = events.publish({ level: "INFO", category: "SYSTEM", message: "two", symbol: "BTCUSDT" });

    expect(first.id).toBe(1);
    expect(second.id).toBe(2);
    expect(second.ts).toBe(BASE_TIME);
    expect(first.symbol).toBeNull();
    expect(first.payload).toEqual({});
    expect(Object.isFrozen(second)).toBe(true);
  });

  it("masks api keys and redacts secrets in payloads", () => {
    const events = bus();
    const event = events.publish({
      level: "INFO",
      category: "SYSTEM",
      message: "credentials",
      payload: { apiKey: "test-key-123456", apiSecret: "test-secret", nested: { signature: "abc", qty: 2 } },
    });

    expect(event.payload).toEqual({
      apiKey: "test****3456",
      apiSecret: "***",
      nested: { signature: "***", qty: 2 },
    });
  });

  it("keeps a bounded history filtered on read", () => {
    const events = bus({ historySize: 3 });
    events.publish({ level: "DEBUG", category: "WS", message: "a" });
    events.publish({ level: "INFO", category: "SIGNAL", message: "b" });
    events.publish({ level: "WARNING", category: "RISK", message: "c" });
    events.publish({ level: "ERROR", category: "ORDER", message: "d" });

    expect(events.recent().map((e) => e.message)).toEqual(["b", "c", "d"]);
    expect(events.recent(10, { minLevel: "WARNING" }).map((e) => e.message)).toEqual(["c", "d"]);
    expect(events.recent(1).map((e) => e.message)).toEqual(["d"]);
  });

  it("drops the oldest events of a full subscriber", () => {
    const events = bus();
    const subscription = events.subscribe({ capacity: 2 });
    for (const message of ["a", "b", "c"]) {
      events.publish({ level: "INFO", category: "SYSTEM", message });
    }

    expect(subscription.dropped).toBe(1);
    expect(subscription.drain().map((e) => e.message)).toEqual(["b", "c"]);
    expect(subscription.size).toBe(0);
  });

  it("delivers only matching events to a filtered subscriber", () => {
    const events = bus();
    const subscription = events.subscribe({ filter: { category: "ORDER", symbol: "ETHUSDT" } });
    events.publish({ level: "INFO", category: "ORDER", symbol: "BTCUSDT", message: "btc" });
    events.publish({ level: "INFO", category: "ORDER", symbol: "ETHUSDT", message: "eth" });
    events.publish({ level: "INFO", category: "FILL", symbol: "ETHUSDT", message: "fill" });

    expect(subscription.drain().map((e) => e.message)).toEqual(["eth"]);
  });

  it("wakes a waiting consumer and ends iteration on close", async () => {
    const events = bus();
    const subscription = events.subscribe();
    const pending = subscription.next();
    events.publish({ level: "INFO", category: "SYSTEM", message: "hello" });

    const first = await pending;
    expect(first.done).toBe(false);
    expect(first.value?.message).toBe("hello");

    const waiting = subscription.next();
    subscription.close();
    expect((await waiting).done).toBe(true);
    expect(events.subscriberCount()).toBe(0);
  });

  it("keeps delivering to a handler after it throws", async () => {
    const events = bus();
    const seen: string[] = [];
    events.onEvent((event) => {
      seen.push(event.message);
      if (event.message === "boom") throw new Error("handler failed");
    });

    events.publish({ level: "INFO", category: "SYSTEM", message: "boom" });
    await settle();
    events.publish({ level: "INFO", category: "SYSTEM", message: "after" });
    await settle();

    expect(seen).toEqual(["boom", "after"]);
    events.close();
  });
});

describe("matchesFilter", () => {
  const event: IEngineEvent = {
    id: 1,
    ts: BASE_TIME,
    level: "WARNING",
    category: "RISK",
    symbol: "BTCUSDT",
    correlationId: null,
    message: "m",
    payload: {},
  };

  it("compares levels by severity", () => {
    expect(matchesFilter(event, { minLevel: "INFO" })).toBe(true);
    expect(matchesFilter(event, { minLevel: "ERROR" })).toBe(false);
    expect(matchesFilter(event)).toBe(true);
  });
});

describe("sanitizePayload", () => {
  it("walks arrays and leaves scalars alone", () => {
    expect(sanitizePayload([{ token: "t" }, 3])).toEqual([{ token: "***" }, 3]);
    expect(sanitizePayload("plain")).toBe("plain");
  });
});
